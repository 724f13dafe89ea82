/**
 * One CLI invocation, from parsed options to exit code.
 */

import chalk from 'chalk';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
    ConfigError,
    FileCacheBackend,
    Pipeline,
    PipelineCancelledError,
    Reporter,
    errorMessage,
    parsePhaseList,
    readPipelineConfig,
    resolveConfigPath,
    withMaskedSecrets,
    type ConfigOverrides,
    type Logger,
    type PipelineConfig,
    type ReporterOptions,
} from '@matrix-ci/core';
import {
    DirectoryArtifactStore,
    HttpCoverageUploader,
    PLAIN_STYLE,
    formatStatusTable,
    generateJsonReport,
    renderMarkdownSummary,
    type TableStyle,
} from '@matrix-ci/report';
import { ShellCommandRunner, ShellRuntimeInstaller } from '@matrix-ci/runner-shell';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_ERROR = 2;
export const EXIT_CANCELLED = 130;

export interface CliOptions {
    config: string;
    basePath?: string;
    concurrency?: string;
    failOn?: string;
    cache?: boolean;
    json?: boolean;
    report?: string;
    markdown?: string;
    verbose?: boolean;
    color?: boolean;
}

export interface CliContext {
    logger: Logger;

    /** Receives the table or the JSON outcome */
    stdout: (text: string) => void;

    env: NodeJS.ProcessEnv;
    signal?: AbortSignal;
}

/**
 * Main execution function.
 * Returns exit code: 0 = success, 1 = failure, 2 = execution error, 130 = cancelled
 */
export async function runCli(options: CliOptions, context: CliContext): Promise<number> {
    let logger = context.logger;

    try {
        const config = await readPipelineConfig(path.resolve(options.config), parseOverrides(options));

        const token = context.env[config.report.tokenEnv];
        const secrets = token ? [token] : [];
        logger = withMaskedSecrets(context.logger, secrets);

        const runner = new ShellCommandRunner({
            onOutput: (line, _stream, label) => logger.debug(label ? `[${label}] ${line}` : line),
        });
        const pipeline = new Pipeline(config, {
            runner,
            installer: new ShellRuntimeInstaller({ config, runner, logger }),
            cacheBackend: new FileCacheBackend(resolveConfigPath(config, config.cache.dir)),
            reporter: createReporter(config, token, secrets, logger),
            logger,
        });

        logger.info(`Running ${config.environments.length} environment(s)`);
        const { outcome, report } = await pipeline.run({ signal: context.signal });
        logger.info(`Finished in ${outcome.metadata.durationMs}ms (cache: ${outcome.metadata.cache})`);

        if (options.json) {
            context.stdout(JSON.stringify(outcome, null, 2));
        } else {
            context.stdout(formatStatusTable(outcome, options.color === false ? PLAIN_STYLE : COLOR_STYLE));
        }

        if (options.report) {
            await writeOutput(options.report, generateJsonReport(outcome, { report }), 'JSON report', logger);
        }
        if (options.markdown) {
            await writeOutput(options.markdown, renderMarkdownSummary(outcome), 'Markdown summary', logger);
        }

        return outcome.status === 'success' ? EXIT_SUCCESS : EXIT_FAILURE;
    } catch (error) {
        if (error instanceof PipelineCancelledError) {
            logger.error('Run cancelled; partial results discarded');
            return EXIT_CANCELLED;
        }
        logger.error(error instanceof ConfigError ? error.format() : errorMessage(error));
        return EXIT_ERROR;
    }
}

const COLOR_STYLE: TableStyle = {
    passed: text => chalk.green(text),
    failed: text => chalk.red(text),
    skipped: text => chalk.yellow(text),
    header: text => chalk.bold(text),
};

function parseOverrides(options: CliOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    if (options.basePath !== undefined) {
        overrides.basePath = path.resolve(options.basePath);
    }
    if (options.concurrency !== undefined) {
        const concurrency = Number(options.concurrency);
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new ConfigError(`--concurrency must be a positive integer, got "${options.concurrency}"`);
        }
        overrides.concurrency = concurrency;
    }
    if (options.failOn !== undefined) {
        overrides.failOn = parsePhaseList(options.failOn);
    }
    if (options.cache === false) {
        overrides.cacheEnabled = false;
    }

    return overrides;
}

function createReporter(
    config: Readonly<PipelineConfig>,
    token: string | undefined,
    secrets: string[],
    logger: Logger
): Reporter | undefined {
    const { report } = config;
    const options: ReporterOptions = {
        destination: report.destination,
        coverageFile: report.coverageFile,
        secrets,
        logger,
    };

    if (report.storeDir) {
        options.artifactStore = new DirectoryArtifactStore({ root: resolveConfigPath(config, report.storeDir) });
    }
    if (report.url) {
        options.coverageUploader = new HttpCoverageUploader({ url: report.url, token, logger });
    }

    return options.artifactStore || options.coverageUploader ? new Reporter(options) : undefined;
}

/**
 * Output files are a reporting concern: failing to write one does not change the exit code.
 */
async function writeOutput(file: string, content: string, what: string, logger: Logger): Promise<void> {
    try {
        await fs.writeFile(file, content);
        logger.info(`${what} written to ${file}`);
    } catch (error) {
        logger.warn(`Could not write ${what} to ${file}: ${errorMessage(error)}`);
    }
}
