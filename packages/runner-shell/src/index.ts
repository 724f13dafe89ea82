/**
 * @matrix-ci/runner-shell
 *
 * Runs phase commands through the system shell and installs runtimes with
 * a configured provision command. Snapshots of the installed runtimes are
 * zip archives, so they can be stored by any cache backend.
 */

export { ShellCommandRunner } from './runner.js';
export type { OutputSink, ShellRunnerOptions } from './runner.js';
export { ShellRuntimeInstaller, SNAPSHOT_MANIFEST } from './installer.js';
export type { ShellRuntimeInstallerOptions } from './installer.js';
