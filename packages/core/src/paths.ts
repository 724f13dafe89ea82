import * as os from 'node:os';
import * as path from 'node:path';

export function getDefaultCacheDir(): string {
    return path.join(os.homedir(), '.cache', 'matrix-ci');
}

/**
 * Directory name for an environment identifier.
 * Identifiers are version strings; anything outside [A-Za-z0-9._-] becomes "_".
 */
export function environmentDirName(identifier: string): string {
    const safe = identifier.replace(/[^A-Za-z0-9._-]/g, '_');
    return safe === '.' || safe === '..' ? safe.replace(/\./g, '_') : safe;
}
