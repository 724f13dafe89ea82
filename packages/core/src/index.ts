/**
 * @matrix-ci/core
 *
 * Orchestration core of matrix-ci.
 *
 * This package provides:
 * - Type definitions for environments, cache entries, results and outcomes
 * - Configuration loading and validation
 * - Cache fingerprints and the cache store with memory and file backends
 * - The provisioner, matrix executor, result aggregator and reporter
 * - The Pipeline class tying them together
 *
 * @example
 * ```typescript
 * import { FileCacheBackend, Pipeline, readPipelineConfig } from '@matrix-ci/core';
 * import { ShellCommandRunner, ShellRuntimeInstaller } from '@matrix-ci/runner-shell';
 *
 * const config = await readPipelineConfig('matrix-ci.json');
 * const runner = new ShellCommandRunner();
 * const pipeline = new Pipeline(config, {
 *   runner,
 *   installer: new ShellRuntimeInstaller({ config, runner }),
 *   cacheBackend: new FileCacheBackend(config.cache.dir),
 * });
 *
 * const { outcome } = await pipeline.run();
 * process.exitCode = outcome.status === 'success' ? 0 : 1;
 * ```
 */

export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './paths.js';
export * from './fingerprint.js';
export * from './cache.js';
export * from './state-machine.js';
export * from './concurrency.js';
export * from './artifacts.js';
export * from './provisioner.js';
export * from './executor.js';
export * from './aggregator.js';
export * from './reporter.js';
export * from './pipeline.js';
