/**
 * @matrix-ci/cli
 *
 * Command-line interface for matrix-ci.
 *
 * @example
 * ```bash
 * # Run the matrix described by ./matrix-ci.json
 * npx matrix-ci
 *
 * # Write a JSON report and a Markdown summary
 * npx matrix-ci --report matrix.json --markdown summary.md
 * ```
 */

export { runCli, EXIT_SUCCESS, EXIT_FAILURE, EXIT_ERROR, EXIT_CANCELLED, type CliContext, type CliOptions } from './run.js';
export { createConsoleLogger, type ConsoleLoggerOptions } from './logger.js';
