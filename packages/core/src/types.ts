/**
 * Core type definitions for matrix-ci.
 *
 * These types describe the lifecycle of one pipeline run: environments
 * requested from the matrix, the cache entries that let provisioning be
 * skipped, the per-phase results the executor produces, and the outcome
 * the aggregator derives from them. The collaborator interfaces at the
 * bottom are the seams where concrete process runners, installers and
 * storage backends plug in.
 */

import type { PipelineConfig } from './config.js';

/**
 * The ordered phases executed once per environment.
 *
 * - install: fatal for its environment; lint and test are skipped after a failure
 * - lint: recorded, never stops later phases
 * - test: recorded, produces the artifacts collected for the environment
 */
export const PHASES = ['install', 'lint', 'test'] as const;

export type Phase = (typeof PHASES)[number];

/** A result row is either one of the phases or the provisioning step that precedes them. */
export type Step = 'provision' | Phase;

/**
 * Lifecycle of an environment as driven by the provisioner.
 * See ENVIRONMENT_TRANSITIONS in state-machine.ts for the allowed moves.
 */
export type EnvironmentStatus = 'requested' | 'provisioning' | 'ready' | 'failed';

export interface EnvironmentSpec {
    /** Runtime version identifier as declared in the matrix, e.g. "3.6.2" */
    identifier: string;
    status: EnvironmentStatus;
}

/**
 * A runtime that is ready to run phases in.
 */
export interface ProvisionedEnvironment {
    identifier: string;

    /** Absolute path to the materialized runtime */
    location: string;
}

/**
 * A stored provisioning payload.
 *
 * The payload is opaque to the cache; only the runtime installer that
 * produced it knows how to restore it.
 */
export interface CacheEntry {
    key: string;
    payload: Buffer;

    /** ISO 8601 timestamp of the write */
    createdAt: string;
}

/**
 * Result of a cache lookup.
 *
 * A `hint` comes from a fallback prefix key. It can warm-start provisioning
 * but never counts as an exact hit. A `miss` carries the cache error when the
 * backend could not be reached.
 */
export type CacheLookup =
    | { kind: 'hit'; entry: CacheEntry }
    | { kind: 'hint'; entry: CacheEntry }
    | { kind: 'miss'; error?: Error };

/**
 * How the environment set was obtained for this run.
 *
 * - hit: restored from an exact fingerprint match, no installs ran
 * - restored: warm-started from a fallback hint, then fully reinstalled
 * - miss: provisioned from scratch
 * - unavailable: the cache backend failed, provisioned from scratch
 * - disabled: caching is turned off
 */
export type CacheState = 'hit' | 'restored' | 'miss' | 'unavailable' | 'disabled';

export type ResultStatus = 'passed' | 'failed' | 'skipped';

/** Serializable error attached to a failed result. */
export interface ErrorInfo {
    code: string;
    message: string;
}

/**
 * Outcome of one step for one environment. Frozen once produced.
 */
export interface ExecutionResult {
    environment: string;
    phase: Step;
    status: ResultStatus;

    /** Exit code of the command, or null when it did not run or could not be started */
    exitCode: number | null;

    /** Collected artifact files, in path order. Only the test phase produces any. */
    artifactPaths: readonly string[];

    durationMs: number;
    error?: ErrorInfo;
}

export interface EnvironmentOutcome {
    identifier: string;
    status: 'passed' | 'failed';
    phases: Partial<Record<Phase, ExecutionResult>>;

    /** Present only when provisioning failed */
    provision?: ExecutionResult;
}

export type OverallStatus = 'success' | 'failure';

export interface PipelineSummary {
    environments: number;
    passed: number;
    failed: number;
    skippedPhases: number;
}

/**
 * The aggregated verdict of a pipeline run.
 */
export interface PipelineOutcome {
    status: OverallStatus;
    perEnvironment: Record<string, EnvironmentOutcome>;
    summary: PipelineSummary;
    metadata: {
        /** ISO 8601 timestamp when the run started */
        startTime: string;
        durationMs: number;
        /** Tool version */
        version: string;
        /** Exact cache key of the matrix */
        fingerprint: string;
        cache: CacheState;
        /** Configuration used (for reproducibility) */
        config: PipelineConfig;
    };
}

/**
 * A command to run on behalf of one environment.
 */
export interface CommandSpec {
    command: string;
    cwd: string;

    /** Extra environment variables, merged over the process environment */
    env?: Record<string, string>;

    timeoutMs?: number;

    /** Used to label streamed output */
    label?: string;
}

export interface CommandResult {
    exitCode: number;

    /** Tail of the combined output, when the runner captures it */
    output?: string;
}

/**
 * Capability interface for running external commands.
 *
 * Implementations resolve with the exit code for any command that ran,
 * whatever that code is, and reject only when the command could not be
 * started or the signal aborted it.
 */
export interface CommandRunner {
    execute(command: CommandSpec, signal?: AbortSignal): Promise<CommandResult>;
}

/**
 * Installs runtimes and converts an installed set to and from a cache payload.
 */
export interface RuntimeInstaller {
    /** Install one runtime. Rejects with ProvisionError on failure. */
    install(identifier: string, signal?: AbortSignal): Promise<ProvisionedEnvironment>;

    /** Pack the installed environments into an opaque payload. */
    snapshot(environments: readonly ProvisionedEnvironment[]): Promise<Buffer>;

    /**
     * Materialize a payload and return the requested environments.
     * Rejects when the payload does not contain all of them.
     */
    restore(payload: Buffer, identifiers: readonly string[]): Promise<ProvisionedEnvironment[]>;
}

/**
 * Key/blob storage behind the cache store.
 */
export interface CacheBackend {
    get(key: string): Promise<CacheEntry | undefined>;

    /** Must replace any existing entry atomically. */
    put(key: string, payload: Buffer): Promise<void>;

    /** Most recently written entry whose key starts with the prefix. */
    findLatest(prefix: string): Promise<CacheEntry | undefined>;
}

/**
 * Durable storage for the collected artifact tree.
 */
export interface ArtifactStore {
    /** Copy the artifact directory under `destination`; resolves with the stored paths. */
    persist(artifactDir: string, destination: string): Promise<string[]>;
}

export interface CoverageSubmission {
    outcome: PipelineOutcome;
    artifactDir: string;

    /** File name of the coverage report inside each environment's artifact directory */
    coverageFile: string;
}

/**
 * External coverage service.
 */
export interface CoverageUploader {
    upload(submission: CoverageSubmission): Promise<void>;
}
