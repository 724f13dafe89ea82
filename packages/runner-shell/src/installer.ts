/**
 * Runtime installer driven by a shell command.
 *
 * Each runtime lives in its own directory under the provision root. The
 * install command receives the identifier through `{env}` and the
 * MATRIX_ENV variable, and the target directory through MATRIX_RUNTIME_DIR.
 * Snapshots are zip archives of those directories.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
    ProvisionError,
    environmentDirName,
    errorMessage,
    expandTemplate,
    resolveConfigPath,
    silentLogger,
    type CommandRunner,
    type Logger,
    type PipelineConfig,
    type ProvisionedEnvironment,
    type RuntimeInstaller,
} from '@matrix-ci/core';

/** Archive entry listing the identifiers a snapshot holds */
export const SNAPSHOT_MANIFEST = '.matrix-ci-snapshot.json';

interface SnapshotManifest {
    environments: string[];
}

export interface ShellRuntimeInstallerOptions {
    config: Readonly<PipelineConfig>;
    runner: CommandRunner;
    logger?: Logger;
}

export class ShellRuntimeInstaller implements RuntimeInstaller {
    private readonly config: Readonly<PipelineConfig>;
    private readonly runner: CommandRunner;
    private readonly logger: Logger;
    private readonly root: string;

    constructor(options: ShellRuntimeInstallerOptions) {
        this.config = options.config;
        this.runner = options.runner;
        this.logger = options.logger ?? silentLogger;
        this.root = resolveConfigPath(options.config, options.config.provision.root);
    }

    /** Directory a runtime is installed into */
    locationOf(identifier: string): string {
        return path.join(this.root, environmentDirName(identifier));
    }

    async install(identifier: string, signal?: AbortSignal): Promise<ProvisionedEnvironment> {
        const location = this.locationOf(identifier);
        await fs.mkdir(location, { recursive: true });

        const command = expandTemplate(this.config.provision.command, identifier);
        this.logger.debug(`[${identifier}] ${command}`);

        let exitCode: number;
        try {
            ({ exitCode } = await this.runner.execute({
                command,
                cwd: this.config.basePath,
                env: {
                    MATRIX_ENV: identifier,
                    MATRIX_RUNTIME_DIR: location,
                    MATRIX_RUNTIME_ROOT: this.root,
                },
                timeoutMs: this.config.timeoutMs,
                label: `${identifier}:provision`,
            }, signal));
        } catch (error) {
            if (signal?.aborted) {
                throw error;
            }
            throw new ProvisionError(
                identifier,
                `could not run "${command}": ${errorMessage(error)}`,
                { cause: error }
            );
        }

        if (exitCode !== 0) {
            throw new ProvisionError(identifier, `"${command}" exited with code ${exitCode}`);
        }
        return { identifier, location };
    }

    async snapshot(environments: readonly ProvisionedEnvironment[]): Promise<Buffer> {
        // Dynamic import to avoid loading adm-zip unless the cache is written
        const AdmZip = (await import('adm-zip')).default;
        const zip = new AdmZip();

        for (const env of environments) {
            zip.addLocalFolder(env.location, environmentDirName(env.identifier));
        }

        const manifest: SnapshotManifest = {
            environments: environments.map(env => env.identifier),
        };
        zip.addFile(SNAPSHOT_MANIFEST, Buffer.from(JSON.stringify(manifest), 'utf-8'));

        return zip.toBuffer();
    }

    /**
     * Extract a snapshot over the provision root.
     *
     * An empty identifier list restores whatever the snapshot holds.
     */
    async restore(payload: Buffer, identifiers: readonly string[]): Promise<ProvisionedEnvironment[]> {
        const AdmZip = (await import('adm-zip')).default;
        const zip = new AdmZip(payload);

        const entry = zip.getEntry(SNAPSHOT_MANIFEST);
        if (!entry) {
            throw new Error(`snapshot has no ${SNAPSHOT_MANIFEST}`);
        }
        const contained = parseManifest(zip.readAsText(entry));

        const missing = identifiers.filter(identifier => !contained.includes(identifier));
        if (missing.length > 0) {
            throw new Error(`snapshot does not contain ${missing.join(', ')}`);
        }

        await fs.mkdir(this.root, { recursive: true });
        zip.extractAllTo(this.root, true);
        await fs.rm(path.join(this.root, SNAPSHOT_MANIFEST), { force: true });

        const wanted = identifiers.length > 0 ? identifiers : contained;
        return wanted.map(identifier => ({ identifier, location: this.locationOf(identifier) }));
    }
}

function parseManifest(text: string): string[] {
    const parsed: unknown = JSON.parse(text);
    if (
        typeof parsed === 'object' && parsed !== null &&
        'environments' in parsed && Array.isArray(parsed.environments) &&
        parsed.environments.every((item: unknown) => typeof item === 'string')
    ) {
        return parsed.environments.filter((item: unknown): item is string => typeof item === 'string');
    }
    throw new Error(`malformed ${SNAPSHOT_MANIFEST}`);
}
