/**
 * Pipeline orchestrator.
 *
 * This is the main entry point for a matrix run. It coordinates
 * fingerprinting, provisioning, phase execution, aggregation and
 * reporting, in that order.
 */

import { aggregateResults } from './aggregator.js';
import { CacheStore } from './cache.js';
import { resolveConfigPath, type PipelineConfig } from './config.js';
import { throwIfAborted } from './errors.js';
import { MatrixExecutor, provisionFailedResults } from './executor.js';
import { checksumManifest, computeFingerprint } from './fingerprint.js';
import { silentLogger, type Logger } from './logger.js';
import { Provisioner } from './provisioner.js';
import type { Reporter, ReportSummary } from './reporter.js';
import type {
    CacheBackend,
    CommandRunner,
    ExecutionResult,
    PipelineOutcome,
    RuntimeInstaller,
} from './types.js';

// Package version - kept in step with package.json
export const VERSION = '0.1.0';

/**
 * Collaborators supplied by the frontend.
 */
export interface PipelineDependencies {
    runner: CommandRunner;
    installer: RuntimeInstaller;

    /** Omit to run without a cache */
    cacheBackend?: CacheBackend;

    reporter?: Reporter;
    logger?: Logger;

    /** Clock, for deterministic metadata in tests */
    now?: () => Date;
}

export interface RunOptions {
    /** Aborting cancels in-flight work; run() then rejects with PipelineCancelledError */
    signal?: AbortSignal;
}

export interface PipelineRun {
    outcome: PipelineOutcome;

    /** Absent when no reporter is configured */
    report?: ReportSummary;
}

/**
 * Runs one matrix described by an immutable configuration.
 */
export class Pipeline {
    private readonly logger: Logger;
    private readonly now: () => Date;

    constructor(
        private readonly config: Readonly<PipelineConfig>,
        private readonly deps: PipelineDependencies
    ) {
        this.logger = deps.logger ?? silentLogger;
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Run the matrix.
     *
     * This:
     * 1. Fingerprints the matrix and the dependency manifest
     * 2. Provisions every environment, from cache when possible
     * 3. Runs install, lint and test per ready environment
     * 4. Aggregates the verdict
     * 5. Publishes artifacts and coverage
     *
     * @throws PipelineCancelledError when the signal aborts
     * @throws MatrixCiError when the dependency manifest cannot be read
     */
    async run(options: RunOptions = {}): Promise<PipelineRun> {
        const { signal } = options;
        const { config } = this;
        const startTime = this.now();

        const manifestChecksum = await checksumManifest(resolveConfigPath(config, config.manifest));
        const computed = computeFingerprint({
            version: config.cache.version,
            prefix: config.cache.prefix,
            environments: config.environments,
            manifestChecksum,
        });
        const fingerprint = config.cache.fallback ? computed : { ...computed, fallbackKeys: [] };
        this.logger.debug(`Fingerprint ${fingerprint.key}`);
        throwIfAborted(signal);

        const cache = config.cache.enabled && this.deps.cacheBackend
            ? new CacheStore(this.deps.cacheBackend, this.logger)
            : null;
        const provisioner = new Provisioner(this.deps.installer, cache, {
            concurrency: config.concurrency,
            logger: this.logger,
        });
        const provisioned = await provisioner.provision(config.environments, fingerprint, signal);

        const executor = new MatrixExecutor(this.deps.runner, config, { logger: this.logger });
        const executed = await executor.execute(provisioned.ready, signal);

        const results: ExecutionResult[] = [
            ...[...provisioned.failures.values()].flatMap(provisionFailedResults),
            ...executed,
        ];
        const aggregate = aggregateResults(results, {
            failOn: config.failOn,
            environments: config.environments,
        });

        const endTime = this.now();
        const outcome: PipelineOutcome = {
            ...aggregate,
            metadata: {
                startTime: startTime.toISOString(),
                durationMs: endTime.getTime() - startTime.getTime(),
                version: VERSION,
                fingerprint: fingerprint.key,
                cache: provisioned.cache,
                config,
            },
        };

        if (!this.deps.reporter) {
            return { outcome };
        }
        const report = await this.deps.reporter.report(
            outcome,
            resolveConfigPath(config, config.artifacts.directory)
        );
        return { outcome, report };
    }
}
