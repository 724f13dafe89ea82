#!/usr/bin/env node
/**
 * matrix-ci command-line interface.
 *
 * Usage:
 *   matrix-ci [options]
 *
 * Examples:
 *   matrix-ci
 *   matrix-ci -c ci/matrix.json --report matrix.json
 *   matrix-ci --fail-on install,test --no-cache
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_CONFIG_FILE, errorMessage } from '@matrix-ci/core';
import { createConsoleLogger } from './logger.js';
import { EXIT_ERROR, runCli, type CliOptions } from './run.js';

// Read version from package.json
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const packageJsonPath = path.resolve(__dirname, '../package.json');
const packageJson: unknown = JSON.parse(await fs.readFile(packageJsonPath, 'utf-8'));
const version = typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
    && typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';

// Aborting kills in-flight commands; the run then exits with 130
const controller = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => controller.abort());
}

const program = new Command();

program
    .name('matrix-ci')
    .description('Run install, lint and test across a matrix of runtime versions')
    .version(version)
    .option('-c, --config <file>', 'Configuration file', DEFAULT_CONFIG_FILE)
    .option('--base-path <dir>', 'Base directory for resolving paths (default: the config file directory)')
    .option('--concurrency <n>', 'Environments run at once')
    .option('--fail-on <phases>', 'Fail on these phases (comma-separated)')
    .option('--no-cache', 'Provision every runtime without the cache')
    .option('--json', 'Output the outcome as JSON')
    .option('--report <file>', 'Write the JSON report to file')
    .option('--markdown <file>', 'Write a Markdown summary to file')
    .option('-v, --verbose', 'Show command output and debug messages')
    .option('--no-color', 'Disable colored output')
    .action(async (options: CliOptions) => {
        try {
            const exitCode = await runCli(options, {
                logger: createConsoleLogger({ verbose: options.verbose, color: options.color }),
                stdout: text => console.log(text),
                env: process.env,
                signal: controller.signal,
            });
            process.exit(exitCode);
        } catch (error) {
            console.error(chalk.red('Error:'), errorMessage(error));
            process.exit(EXIT_ERROR);
        }
    });

await program.parseAsync();
