import chalk from 'chalk';
import type { Logger } from '@matrix-ci/core';

export interface ConsoleLoggerOptions {
    /** Show debug messages, including command output */
    verbose?: boolean;
    color?: boolean;

    /** Line sink; stderr by default so that stdout stays machine-readable */
    write?: (line: string) => void;
}

/**
 * Logger for the terminal. Every level goes to stderr.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const write = options.write ?? ((line: string) => {
        process.stderr.write(`${line}\n`);
    });

    // chalk v5 doesn't have Instance constructor, use conditional styling
    const c = options.color === false ? {
        dim: (s: string) => s,
        red: (s: string) => s,
        yellow: (s: string) => s,
    } : chalk;

    return {
        debug: message => {
            if (options.verbose) {
                write(c.dim(message));
            }
        },
        info: message => write(message),
        warn: message => write(c.yellow(`warning: ${message}`)),
        error: message => write(c.red(`error: ${message}`)),
    };
}
