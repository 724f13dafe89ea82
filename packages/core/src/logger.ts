/**
 * Logging contract.
 *
 * Core components never write to the console themselves; frontends pass a
 * Logger (chalk-coloured stderr for the CLI, @actions/core for the Action).
 */

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

/** Replacement for a secret in logged text; reveals nothing of its length or content */
export const SECRET_MASK = '***';

export function maskSecretsInMessage(message: string, secrets: readonly string[]): string {
    let result = message;
    for (const secret of secrets) {
        if (secret.length > 0) {
            result = result.split(secret).join(SECRET_MASK);
        }
    }
    return result;
}

/**
 * Wrap a logger so that none of the given secrets reach it.
 */
export function withMaskedSecrets(logger: Logger, secrets: readonly string[]): Logger {
    const active = secrets.filter(secret => secret.length > 0);
    if (active.length === 0) {
        return logger;
    }
    return {
        debug: message => logger.debug(maskSecretsInMessage(message, active)),
        info: message => logger.info(maskSecretsInMessage(message, active)),
        warn: message => logger.warn(maskSecretsInMessage(message, active)),
        error: message => logger.error(maskSecretsInMessage(message, active)),
    };
}
