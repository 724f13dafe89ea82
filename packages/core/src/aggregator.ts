/**
 * Result aggregation.
 *
 * A pure function of the execution results: the same results in any
 * arrival order give the same outcome. Aggregation is strict: a failure in
 * any phase up to and including the last phase listed in `failOn` fails the
 * pipeline even though execution carried on past it. Provisioning and
 * install failures gate every later phase and always count.
 */

import {
    PHASES,
    type EnvironmentOutcome,
    type ExecutionResult,
    type OverallStatus,
    type Phase,
    type PipelineSummary,
    type Step,
} from './types.js';

export interface AggregateOptions {
    /** Fatal phases; a failure at or before the last of them fails the pipeline */
    failOn: readonly Phase[];

    /** Matrix order for the per-environment mapping; locale order when omitted */
    environments?: readonly string[];
}

export interface Aggregate {
    status: OverallStatus;
    perEnvironment: Record<string, EnvironmentOutcome>;
    summary: PipelineSummary;
}

const STEP_ORDER: readonly Step[] = ['provision', ...PHASES];

export function aggregateResults(
    results: readonly ExecutionResult[],
    options: AggregateOptions
): Aggregate {
    const byEnvironment = new Map<string, ExecutionResult[]>();
    for (const result of results) {
        const group = byEnvironment.get(result.environment) ?? [];
        group.push(result);
        byEnvironment.set(result.environment, group);
    }

    const perEnvironment: Record<string, EnvironmentOutcome> = {};
    const lastFatal = lastFatalIndex(options.failOn);
    let failing = false;
    let passed = 0;
    let failed = 0;
    let skippedPhases = 0;

    for (const identifier of orderIdentifiers([...byEnvironment.keys()], options.environments)) {
        const group = [...(byEnvironment.get(identifier) ?? [])]
            .sort((a, b) => STEP_ORDER.indexOf(a.phase) - STEP_ORDER.indexOf(b.phase));

        const outcome: EnvironmentOutcome = {
            identifier,
            status: group.some(r => r.status === 'failed') ? 'failed' : 'passed',
            phases: {},
        };

        for (const result of group) {
            if (result.phase === 'provision') {
                outcome.provision = result;
            } else {
                outcome.phases[result.phase] = result;
            }

            if (result.status === 'skipped') {
                skippedPhases++;
            }
            if (result.status === 'failed' && countsAsFailure(result.phase, lastFatal)) {
                failing = true;
            }
        }

        if (outcome.status === 'failed') {
            failed++;
        } else {
            passed++;
        }
        perEnvironment[identifier] = outcome;
    }

    return {
        status: failing ? 'failure' : 'success',
        perEnvironment,
        summary: {
            environments: byEnvironment.size,
            passed,
            failed,
            skippedPhases,
        },
    };
}

/** Position in `PHASES` of the latest fatal phase, -1 when none is */
function lastFatalIndex(failOn: readonly Phase[]): number {
    return Math.max(-1, ...failOn.map(phase => PHASES.indexOf(phase)));
}

function countsAsFailure(step: Step, lastFatal: number): boolean {
    return step === 'provision' || step === 'install' || PHASES.indexOf(step) <= lastFatal;
}

/**
 * Declared matrix order first, then anything undeclared in locale order.
 */
function orderIdentifiers(present: string[], declared?: readonly string[]): string[] {
    const sorted = [...present].sort((a, b) => a.localeCompare(b));
    if (!declared) {
        return sorted;
    }
    const presentSet = new Set(present);
    const declaredSet = new Set(declared);
    return [
        ...declared.filter(identifier => presentSet.has(identifier)),
        ...sorted.filter(identifier => !declaredSet.has(identifier)),
    ];
}
