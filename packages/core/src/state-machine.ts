/**
 * Environment and worker state machines.
 *
 * The provisioner moves environments through EnvironmentStatus; the
 * executor moves each environment's worker through its phases. Both
 * reject transitions that are not in their tables.
 */

import { MatrixCiError } from './errors.js';
import type { EnvironmentStatus, Phase } from './types.js';

/**
 * Worker progress through the phase sequence.
 * `aborted` is terminal and means the remaining phases are skipped.
 */
export type WorkerState = 'pending' | Phase | 'done' | 'aborted';

export const ENVIRONMENT_TRANSITIONS: Readonly<Record<EnvironmentStatus, readonly EnvironmentStatus[]>> = {
    // requested -> ready is a cache hit
    requested: ['provisioning', 'ready', 'failed'],
    provisioning: ['ready', 'failed'],
    ready: [],
    failed: [],
};

export const WORKER_TRANSITIONS: Readonly<Record<WorkerState, readonly WorkerState[]>> = {
    pending: ['install', 'aborted'],
    install: ['lint', 'aborted'],
    lint: ['test'],
    test: ['done'],
    done: [],
    aborted: [],
};

/** Result of a transition attempt. */
export interface TransitionResult<S> {
    success: boolean;
    newStatus?: S;
    error?: MatrixCiError;
}

function attempt<S extends string>(
    table: Readonly<Record<S, readonly S[]>>,
    kind: string,
    current: S,
    target: S
): TransitionResult<S> {
    const validTargets = table[current];
    if (!validTargets.includes(target)) {
        return {
            success: false,
            error: new MatrixCiError(
                `Invalid ${kind} transition: ${current} -> ${target}`,
                'INVALID_TRANSITION'
            ),
        };
    }
    return { success: true, newStatus: target };
}

export function transitionEnvironmentStatus(
    current: EnvironmentStatus,
    target: EnvironmentStatus
): TransitionResult<EnvironmentStatus> {
    return attempt(ENVIRONMENT_TRANSITIONS, 'environment', current, target);
}

export function transitionWorkerState(
    current: WorkerState,
    target: WorkerState
): TransitionResult<WorkerState> {
    return attempt(WORKER_TRANSITIONS, 'worker', current, target);
}

/**
 * Apply a transition or throw; an invalid move is a programming error.
 */
export function applyTransition<S>(result: TransitionResult<S>): S {
    if (!result.success || result.newStatus === undefined) {
        throw result.error ?? new MatrixCiError('Invalid transition', 'INVALID_TRANSITION');
    }
    return result.newStatus;
}
