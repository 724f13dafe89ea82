/**
 * Environment provisioner.
 *
 * Makes every identifier of the matrix ready, either from an exact cache
 * hit (no installs at all) or by installing each runtime independently.
 * A runtime that fails to install marks only its own environment failed.
 */

import type { CacheStore } from './cache.js';
import { mapWithConcurrency } from './concurrency.js';
import { CacheError, ProvisionError, errorMessage, throwIfAborted } from './errors.js';
import type { Fingerprint } from './fingerprint.js';
import { silentLogger, type Logger } from './logger.js';
import { applyTransition, transitionEnvironmentStatus } from './state-machine.js';
import type {
    CacheEntry,
    CacheState,
    EnvironmentSpec,
    EnvironmentStatus,
    ProvisionedEnvironment,
    RuntimeInstaller,
} from './types.js';

export interface ProvisionerOptions {
    /** Maximum number of runtimes installed at once */
    concurrency: number;
    logger?: Logger;
}

export interface ProvisionResult {
    /** Final status of every requested environment, in matrix order */
    environments: EnvironmentSpec[];

    /** Ready environments, in matrix order */
    ready: ProvisionedEnvironment[];

    failures: Map<string, ProvisionError>;
    cache: CacheState;

    /** Number of install calls made; zero on an exact hit */
    installs: number;
}

export class Provisioner {
    private readonly logger: Logger;

    /**
     * @param cache - Null when caching is disabled
     */
    constructor(
        private readonly installer: RuntimeInstaller,
        private readonly cache: CacheStore | null,
        private readonly options: ProvisionerOptions
    ) {
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Provision the identifiers of one matrix.
     *
     * @throws PipelineCancelledError when the signal aborts
     */
    async provision(
        identifiers: readonly string[],
        fingerprint: Fingerprint,
        signal?: AbortSignal
    ): Promise<ProvisionResult> {
        const statuses = new Map<string, EnvironmentStatus>(
            identifiers.map((identifier): [string, EnvironmentStatus] => [identifier, 'requested'])
        );
        const move = (identifier: string, target: EnvironmentStatus): void => {
            const current = statuses.get(identifier) ?? 'requested';
            statuses.set(identifier, applyTransition(transitionEnvironmentStatus(current, target)));
        };
        const finish = (
            ready: ProvisionedEnvironment[],
            failures: Map<string, ProvisionError>,
            cache: CacheState,
            installs: number
        ): ProvisionResult => ({
            environments: identifiers.map(identifier => ({
                identifier,
                status: statuses.get(identifier) ?? 'requested',
            })),
            ready,
            failures,
            cache,
            installs,
        });

        if (identifiers.length === 0) {
            return finish([], new Map(), this.cache ? 'miss' : 'disabled', 0);
        }

        let cacheState: CacheState = this.cache ? 'miss' : 'disabled';
        let hint: CacheEntry | undefined;

        if (this.cache) {
            const lookup = await this.cache.lookup(fingerprint.key, fingerprint.fallbackKeys);
            throwIfAborted(signal);

            if (lookup.kind === 'hit') {
                const restored = await this.restore(lookup.entry, identifiers);
                if (restored) {
                    this.logger.info(`Cache hit for ${fingerprint.key}; skipping installation`);
                    for (const identifier of identifiers) {
                        move(identifier, 'ready');
                    }
                    return finish(restored, new Map(), 'hit', 0);
                }
            } else if (lookup.kind === 'hint') {
                hint = lookup.entry;
            } else if (lookup.error) {
                cacheState = 'unavailable';
            }
        }

        if (hint && await this.restore(hint, identifiers, true)) {
            // A hint only warm-starts the runtime root; every runtime is still installed
            this.logger.info(`Restored ${hint.key} as a starting point; reinstalling ${identifiers.length} runtime(s)`);
            cacheState = 'restored';
        }

        const failures = new Map<string, ProvisionError>();
        const outcomes = await mapWithConcurrency(identifiers, this.options.concurrency, async identifier => {
            throwIfAborted(signal);
            move(identifier, 'provisioning');
            this.logger.info(`Provisioning ${identifier}`);
            try {
                const environment = await this.installer.install(identifier, signal);
                move(identifier, 'ready');
                return environment;
            } catch (error) {
                throwIfAborted(signal);
                const provisionError = error instanceof ProvisionError
                    ? error
                    : new ProvisionError(identifier, errorMessage(error), { cause: error });
                failures.set(identifier, provisionError);
                move(identifier, 'failed');
                this.logger.error(provisionError.message);
                return undefined;
            }
        });
        throwIfAborted(signal);

        const ready = outcomes.filter((env): env is ProvisionedEnvironment => env !== undefined);

        if (this.cache && failures.size === 0) {
            await this.save(fingerprint.key, ready);
        }

        return finish(ready, failures, cacheState, identifiers.length);
    }

    /**
     * Materialize a cached payload.
     *
     * @param partial - Accept a payload that lacks some identifiers (restore hints)
     * @returns The restored environments, or undefined when the payload is unusable
     */
    private async restore(
        entry: CacheEntry,
        identifiers: readonly string[],
        partial = false
    ): Promise<ProvisionedEnvironment[] | undefined> {
        try {
            const restored = await this.installer.restore(entry.payload, partial ? [] : identifiers);
            if (partial) {
                return restored;
            }

            const byIdentifier = new Map(restored.map((env): [string, ProvisionedEnvironment] => [env.identifier, env]));
            const ordered: ProvisionedEnvironment[] = [];
            for (const identifier of identifiers) {
                const env = byIdentifier.get(identifier);
                if (!env) {
                    throw new Error(`payload has no runtime for ${identifier}`);
                }
                ordered.push(env);
            }
            return ordered;
        } catch (error) {
            this.logger.warn(`${new CacheError('restore', entry.key, error).message}; provisioning from scratch`);
            return undefined;
        }
    }

    private async save(key: string, environments: readonly ProvisionedEnvironment[]): Promise<void> {
        if (!this.cache) {
            return;
        }

        let payload: Buffer;
        try {
            payload = await this.installer.snapshot(environments);
        } catch (error) {
            this.logger.warn(new CacheError('snapshot', key, error).message);
            return;
        }

        if (await this.cache.put(key, payload)) {
            this.logger.info(`Saved provisioned runtimes under ${key}`);
        }
    }
}
