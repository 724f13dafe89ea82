/**
 * GitHub Action entry point for matrix-ci.
 *
 * This action:
 * 1. Reads inputs from the workflow
 * 2. Runs the matrix, restoring runtimes from cache when possible
 * 3. Publishes artifacts and coverage when configured
 * 4. Writes a job summary and sets outputs for downstream steps
 * 5. Optionally posts a commit status
 */

import * as core from '@actions/core';
import * as github from '@actions/github';
import * as fs from 'node:fs/promises';
import {
    FileCacheBackend,
    Pipeline,
    PipelineCancelledError,
    Reporter,
    errorMessage,
    readPipelineConfig,
    resolveConfigPath,
    type Logger,
    type PipelineConfig,
    type PipelineOutcome,
    type ReporterOptions,
} from '@matrix-ci/core';
import {
    DirectoryArtifactStore,
    HttpCoverageUploader,
    STATUS_COLUMNS,
    generateJsonReport,
    statusRows,
    summaryLine,
} from '@matrix-ci/report';
import { ShellCommandRunner, ShellRuntimeInstaller } from '@matrix-ci/runner-shell';
import { failedEnvironments, readActionInputs } from './inputs.js';
import { publishQuietly } from './publish.js';

const actionsLogger: Logger = {
    debug: message => core.debug(message),
    info: message => core.info(message),
    warn: message => core.warning(message),
    error: message => core.error(message),
};

const warn = (message: string): void => core.warning(message);

async function run(): Promise<void> {
    const controller = new AbortController();
    process.once('SIGTERM', () => controller.abort());
    process.once('SIGINT', () => controller.abort());

    try {
        const workspace = process.env.GITHUB_WORKSPACE ?? process.cwd();
        const inputs = readActionInputs(name => core.getInput(name), workspace);
        const config = await readPipelineConfig(inputs.configPath, inputs.overrides);

        const token = inputs.coverageToken || process.env[config.report.tokenEnv] || '';
        if (token) {
            core.setSecret(token);
        }

        const runner = new ShellCommandRunner({
            onOutput: (line, _stream, label) => core.debug(label ? `[${label}] ${line}` : line),
        });
        const pipeline = new Pipeline(config, {
            runner,
            installer: new ShellRuntimeInstaller({ config, runner, logger: actionsLogger }),
            cacheBackend: new FileCacheBackend(resolveConfigPath(config, config.cache.dir)),
            reporter: createReporter(config, token),
            logger: actionsLogger,
        });

        core.info(`🧪 Running ${config.environments.length} environment(s)...`);
        const { outcome, report } = await pipeline.run({ signal: controller.signal });
        core.info(`📊 ${summaryLine(outcome)} in ${outcome.metadata.durationMs}ms`);

        // Set outputs
        core.setOutput('status', outcome.status);
        core.setOutput('failed-environments', failedEnvironments(outcome).join(','));
        core.setOutput('fingerprint', outcome.metadata.fingerprint);
        core.setOutput('cache', outcome.metadata.cache);

        if (inputs.reportPath) {
            const written = await publishQuietly('write the JSON report', async () => {
                await fs.writeFile(inputs.reportPath, generateJsonReport(outcome, { report }));
            }, warn);
            if (written) {
                core.info(`📝 JSON report written to ${inputs.reportPath}`);
                core.setOutput('report-file', inputs.reportPath);
            }
        }

        await publishQuietly('write the job summary', () => postSummary(outcome), warn);

        if (inputs.githubToken) {
            await postCommitStatus(inputs.githubToken, outcome);
        }

        if (outcome.status === 'failure') {
            core.setFailed(`Matrix failed: ${failedEnvironments(outcome).join(', ') || 'see job summary'}`);
        }
    } catch (error) {
        if (error instanceof PipelineCancelledError) {
            core.setFailed('Run cancelled; partial results discarded');
            return;
        }
        core.setFailed(errorMessage(error));
    }
}

function createReporter(config: Readonly<PipelineConfig>, token: string): Reporter | undefined {
    const { report } = config;
    const options: ReporterOptions = {
        destination: report.destination,
        coverageFile: report.coverageFile,
        secrets: token ? [token] : [],
        logger: actionsLogger,
    };

    if (report.storeDir) {
        options.artifactStore = new DirectoryArtifactStore({ root: resolveConfigPath(config, report.storeDir) });
    }
    if (report.url) {
        options.coverageUploader = new HttpCoverageUploader({
            url: report.url,
            token: token || undefined,
            logger: actionsLogger,
        });
    }

    return options.artifactStore || options.coverageUploader ? new Reporter(options) : undefined;
}

/**
 * Write the per-environment table to the job summary.
 */
async function postSummary(outcome: PipelineOutcome): Promise<void> {
    const heading = outcome.status === 'success' ? '✅ Matrix passed' : '❌ Matrix failed';

    await core.summary
        .addHeading(heading, 2)
        .addTable([
            STATUS_COLUMNS.map(column => ({ data: column, header: true })),
            ...statusRows(outcome),
        ])
        .addRaw(`\n${summaryLine(outcome)}\n`)
        .addRaw(`\nCache: ${outcome.metadata.cache} (\`${outcome.metadata.fingerprint}\`)\n`)
        .write();
}

/**
 * Report the verdict as a commit status. Failing to post it only warns.
 */
async function postCommitStatus(githubToken: string, outcome: PipelineOutcome): Promise<void> {
    const octokit = github.getOctokit(githubToken);
    const { owner, repo } = github.context.repo;

    try {
        await octokit.rest.repos.createCommitStatus({
            owner,
            repo,
            sha: github.context.sha,
            state: outcome.status === 'success' ? 'success' : 'failure',
            context: 'matrix-ci',
            description: summaryLine(outcome).slice(0, 140),
        });
        core.info('📤 Commit status posted');
    } catch (error) {
        // The token may lack statuses: write
        core.warning(`Failed to post commit status: ${errorMessage(error)}`);
    }
}

await run();
