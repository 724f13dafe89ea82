/**
 * Deterministic collaborators for tests. Not exported from the package index.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { loadPipelineConfig, type PipelineConfig } from './config.js';
import { ProvisionError } from './errors.js';
import type { Logger } from './logger.js';
import type {
    CommandResult,
    CommandRunner,
    CommandSpec,
    ProvisionedEnvironment,
    RuntimeInstaller,
} from './types.js';

export function testConfig(
    basePath: string,
    extra: Record<string, unknown> = {}
): Readonly<PipelineConfig> {
    return loadPipelineConfig({
        environments: ['3.5', '3.6'],
        manifest: 'tox.ini',
        provision: { command: 'pyenv install -s {env}' },
        phases: { install: 'pip install -e .', lint: 'flake8', test: 'tox -e py{env}' },
        artifacts: { source: 'test-reports/{env}' },
        cache: { dir: `${basePath}/cache` },
        ...extra,
    }, {}, basePath);
}

export interface FakeInstallerOptions {
    /** Identifiers whose install rejects */
    failFor?: string[];
    delayMs?: number;
}

/**
 * Installer whose payload is the JSON list of installed identifiers.
 */
export class FakeInstaller implements RuntimeInstaller {
    readonly installs: string[] = [];
    readonly restores: Array<readonly string[]> = [];

    constructor(private readonly options: FakeInstallerOptions = {}) {}

    async install(identifier: string, signal?: AbortSignal): Promise<ProvisionedEnvironment> {
        this.installs.push(identifier);
        if (this.options.delayMs) {
            await sleep(this.options.delayMs, undefined, { signal });
        }
        if (this.options.failFor?.includes(identifier)) {
            throw new ProvisionError(identifier, 'version not available');
        }
        return { identifier, location: `/runtimes/${identifier}` };
    }

    async snapshot(environments: readonly ProvisionedEnvironment[]): Promise<Buffer> {
        return Buffer.from(JSON.stringify(environments.map(env => env.identifier)));
    }

    async restore(payload: Buffer, identifiers: readonly string[]): Promise<ProvisionedEnvironment[]> {
        this.restores.push(identifiers);
        const parsed: unknown = JSON.parse(payload.toString('utf-8'));
        if (!Array.isArray(parsed)) {
            throw new Error('payload is not a list');
        }
        const stored = parsed.filter((item): item is string => typeof item === 'string');
        for (const identifier of identifiers) {
            if (!stored.includes(identifier)) {
                throw new Error(`missing ${identifier}`);
            }
        }
        return stored.map(identifier => ({ identifier, location: `/runtimes/${identifier}` }));
    }
}

export interface FakeRunnerOptions {
    /** Exit codes by label ("<identifier>:<phase>"); 0 otherwise */
    exitCodes?: Record<string, number>;

    /** Labels whose command cannot be started */
    throwFor?: string[];

    delayMs?: number;

    /** Called before the command "exits", e.g. to write test reports */
    onRun?: (spec: CommandSpec) => Promise<void>;
}

export class FakeRunner implements CommandRunner {
    readonly calls: CommandSpec[] = [];
    private active = 0;
    maxActive = 0;

    constructor(private readonly options: FakeRunnerOptions = {}) {}

    async execute(spec: CommandSpec, signal?: AbortSignal): Promise<CommandResult> {
        this.calls.push(spec);
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            if (this.options.delayMs) {
                await sleep(this.options.delayMs, undefined, { signal });
            }
            await this.options.onRun?.(spec);
            const label = spec.label ?? '';
            if (this.options.throwFor?.includes(label)) {
                throw new Error('spawn fake ENOENT');
            }
            return { exitCode: this.options.exitCodes?.[label] ?? 0 };
        } finally {
            this.active--;
        }
    }

    labels(): string[] {
        return this.calls.map(call => call.label ?? '');
    }
}

export class RecordingLogger implements Logger {
    readonly lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string }> = [];

    debug(message: string): void {
        this.lines.push({ level: 'debug', message });
    }

    info(message: string): void {
        this.lines.push({ level: 'info', message });
    }

    warn(message: string): void {
        this.lines.push({ level: 'warn', message });
    }

    error(message: string): void {
        this.lines.push({ level: 'error', message });
    }

    messages(level: 'debug' | 'info' | 'warn' | 'error'): string[] {
        return this.lines.filter(line => line.level === level).map(line => line.message);
    }
}
