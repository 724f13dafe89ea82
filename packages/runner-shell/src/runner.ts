/**
 * Shell command runner.
 *
 * Runs phase and install commands through the system shell and reports
 * their exit codes. Output is streamed line by line to an optional sink
 * and its tail is kept for the result.
 */

import { spawn } from 'node:child_process';
import type { CommandResult, CommandRunner, CommandSpec } from '@matrix-ci/core';

/** Characters of combined output kept on the result */
const OUTPUT_TAIL_LIMIT = 64 * 1024;

export type OutputSink = (line: string, stream: 'stdout' | 'stderr', label?: string) => void;

export interface ShellRunnerOptions {
    /** Receives every complete output line */
    onOutput?: OutputSink;

    /** Shell to use; the platform default when omitted */
    shell?: string;
}

export class ShellCommandRunner implements CommandRunner {
    constructor(private readonly options: ShellRunnerOptions = {}) {}

    /**
     * Run one command.
     *
     * A command killed by a signal or by its timeout resolves with exit code
     * 128 + signal number where known, and 1 otherwise.
     */
    async execute(spec: CommandSpec, signal?: AbortSignal): Promise<CommandResult> {
        return new Promise((resolve, reject) => {
            const proc = spawn(spec.command, {
                cwd: spec.cwd,
                env: { ...process.env, ...spec.env },
                shell: this.options.shell ?? true,
                stdio: ['ignore', 'pipe', 'pipe'],
                signal,
                timeout: spec.timeoutMs,
            });

            let output = '';
            const pending = { stdout: '', stderr: '' };

            const consume = (stream: 'stdout' | 'stderr', data: Buffer): void => {
                const text = data.toString();
                output = (output + text).slice(-OUTPUT_TAIL_LIMIT);

                if (!this.options.onOutput) {
                    return;
                }
                const lines = (pending[stream] + text).split(/\r?\n/);
                pending[stream] = lines.pop() ?? '';
                for (const line of lines) {
                    this.options.onOutput(line, stream, spec.label);
                }
            };

            proc.stdout.on('data', (data: Buffer) => consume('stdout', data));
            proc.stderr.on('data', (data: Buffer) => consume('stderr', data));

            proc.on('close', (code, killedBy) => {
                for (const stream of ['stdout', 'stderr'] as const) {
                    if (pending[stream] && this.options.onOutput) {
                        this.options.onOutput(pending[stream], stream, spec.label);
                    }
                }
                if (signal?.aborted) {
                    // 'error' has already rejected with the abort reason
                    return;
                }
                resolve({ exitCode: code ?? signalExitCode(killedBy), output });
            });

            proc.on('error', (error) => {
                reject(new Error(
                    `Failed to run "${spec.command}": ${error.message}`,
                    { cause: error }
                ));
            });
        });
    }
}

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
    SIGHUP: 1,
    SIGINT: 2,
    SIGKILL: 9,
    SIGTERM: 15,
};

function signalExitCode(killedBy: NodeJS.Signals | null): number {
    const number = killedBy ? SIGNAL_NUMBERS[killedBy] : undefined;
    return number === undefined ? 1 : 128 + number;
}
