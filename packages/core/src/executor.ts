/**
 * Matrix executor.
 *
 * Runs install, lint and test in order for every ready environment, with
 * environments in parallel up to the configured concurrency. Execution is
 * tolerant: an install failure skips the rest of its own environment only,
 * and lint or test failures stop nothing.
 */

import { artifactDirFor, collectArtifacts } from './artifacts.js';
import { mapWithConcurrency } from './concurrency.js';
import {
    createPhaseError,
    errorMessage,
    throwIfAborted,
    type ProvisionError,
} from './errors.js';
import { expandTemplate, resolveConfigPath, type PipelineConfig } from './config.js';
import { silentLogger, type Logger } from './logger.js';
import { applyTransition, transitionWorkerState, type WorkerState } from './state-machine.js';
import {
    PHASES,
    type CommandRunner,
    type ErrorInfo,
    type ExecutionResult,
    type Phase,
    type ProvisionedEnvironment,
} from './types.js';

export interface ExecutorOptions {
    logger?: Logger;

    /** Clock used for durations */
    now?: () => number;
}

export class MatrixExecutor {
    private readonly logger: Logger;
    private readonly now: () => number;

    constructor(
        private readonly runner: CommandRunner,
        private readonly config: Readonly<PipelineConfig>,
        options: ExecutorOptions = {}
    ) {
        this.logger = options.logger ?? silentLogger;
        this.now = options.now ?? Date.now;
    }

    /**
     * Run every phase for every environment.
     *
     * @returns Results grouped by environment in the given order, phases in order
     * @throws PipelineCancelledError when the signal aborts; partial results are dropped
     */
    async execute(
        environments: readonly ProvisionedEnvironment[],
        signal?: AbortSignal
    ): Promise<ExecutionResult[]> {
        const perEnvironment = await mapWithConcurrency(
            environments,
            this.config.concurrency,
            environment => this.runEnvironment(environment, signal)
        );
        throwIfAborted(signal);
        return perEnvironment.flat();
    }

    /**
     * Drive one environment's worker through the phase sequence.
     */
    private async runEnvironment(
        environment: ProvisionedEnvironment,
        signal?: AbortSignal
    ): Promise<ExecutionResult[]> {
        const results: ExecutionResult[] = [];
        let state: WorkerState = 'pending';

        for (const phase of PHASES) {
            if (state === 'aborted') {
                results.push(skippedResult(environment.identifier, phase));
                continue;
            }

            throwIfAborted(signal);
            state = applyTransition(transitionWorkerState(state, phase));
            const result = await this.runPhase(environment, phase, signal);
            results.push(result);

            if (phase === 'install' && result.status === 'failed') {
                state = applyTransition(transitionWorkerState(state, 'aborted'));
            }
        }

        if (state !== 'aborted') {
            applyTransition(transitionWorkerState(state, 'done'));
        }

        return results;
    }

    private async runPhase(
        environment: ProvisionedEnvironment,
        phase: Phase,
        signal?: AbortSignal
    ): Promise<ExecutionResult> {
        const { identifier } = environment;
        const command = expandTemplate(this.config.phases[phase], identifier);
        const started = this.now();

        this.logger.info(`[${identifier}] ${phase}: ${command}`);

        let exitCode: number | null;
        let startupError: unknown;
        try {
            const result = await this.runner.execute({
                command,
                cwd: this.config.basePath,
                env: {
                    MATRIX_ENV: identifier,
                    MATRIX_RUNTIME_DIR: environment.location,
                },
                timeoutMs: this.config.timeoutMs,
                label: `${identifier}:${phase}`,
            }, signal);
            exitCode = result.exitCode;
        } catch (error) {
            throwIfAborted(signal);
            exitCode = null;
            startupError = error;
        }

        // Test reports matter most when the tests failed, so collect regardless
        const artifactPaths = phase === 'test'
            ? await this.collect(identifier)
            : [];

        let error: ErrorInfo | undefined;
        if (exitCode !== 0) {
            const phaseError = createPhaseError(phase, identifier, exitCode, startupError);
            this.logger.warn(phaseError.message);
            error = phaseError.toInfo();
        }

        return Object.freeze({
            environment: identifier,
            phase,
            status: exitCode === 0 ? 'passed' : 'failed',
            exitCode,
            artifactPaths: Object.freeze(artifactPaths),
            durationMs: this.now() - started,
            ...(error ? { error } : {}),
        });
    }

    private async collect(identifier: string): Promise<string[]> {
        const { artifacts } = this.config;
        const source = resolveConfigPath(this.config, expandTemplate(artifacts.source, identifier));
        const target = artifactDirFor(resolveConfigPath(this.config, artifacts.directory), identifier);
        try {
            const collected = await collectArtifacts(source, target, { patterns: artifacts.patterns, clean: true });
            if (collected.length > 0) {
                this.logger.info(`[${identifier}] collected ${collected.length} artifact(s)`);
            }
            return collected;
        } catch (error) {
            this.logger.warn(`[${identifier}] artifact collection failed: ${errorMessage(error)}`);
            return [];
        }
    }
}

function skippedResult(identifier: string, phase: Phase): ExecutionResult {
    return Object.freeze({
        environment: identifier,
        phase,
        status: 'skipped',
        exitCode: null,
        artifactPaths: Object.freeze([]),
        durationMs: 0,
    });
}

/**
 * Results recorded for an environment that never became ready:
 * one failed provision row and every phase skipped.
 */
export function provisionFailedResults(error: ProvisionError): ExecutionResult[] {
    const provision: ExecutionResult = Object.freeze({
        environment: error.identifier,
        phase: 'provision',
        status: 'failed',
        exitCode: null,
        artifactPaths: Object.freeze([]),
        durationMs: 0,
        error: error.toInfo(),
    });
    return [provision, ...PHASES.map(phase => skippedResult(error.identifier, phase))];
}
