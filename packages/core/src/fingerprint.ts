/**
 * Cache fingerprints.
 *
 * A fingerprint is a deterministic function of the ordered matrix and the
 * dependency manifest content. Its fallback keys are the progressively
 * looser prefixes used to find a restore hint when the exact key misses.
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { MatrixCiError, errorMessage } from './errors.js';

export interface Fingerprint {
    /** Exact key: "<version>-<prefix>-<matrixHash>-<manifestChecksum>" */
    key: string;

    /** Prefixes tried in order when the exact key misses */
    fallbackKeys: string[];
}

export interface FingerprintInput {
    version: string;
    prefix: string;
    environments: readonly string[];
    manifestChecksum: string;
}

function sha256(content: string | Buffer): string {
    return createHash('sha256').update(content).digest('hex');
}

/**
 * Checksum of the dependency manifest.
 */
export async function checksumManifest(manifestPath: string): Promise<string> {
    let content: Buffer;
    try {
        content = await fs.readFile(manifestPath);
    } catch (error) {
        throw new MatrixCiError(
            `Cannot read dependency manifest ${manifestPath}: ${errorMessage(error)}`,
            'MANIFEST_UNREADABLE',
            { cause: error }
        );
    }
    return sha256(content);
}

/**
 * Hash of the ordered identifier list. Reordering the matrix changes it.
 */
export function matrixHash(environments: readonly string[]): string {
    return sha256(environments.join('\n')).substring(0, 16);
}

export function computeFingerprint(input: FingerprintInput): Fingerprint {
    const base = `${input.version}-${input.prefix}-`;
    const matrixKey = `${base}${matrixHash(input.environments)}-`;

    return {
        key: `${matrixKey}${input.manifestChecksum}`,
        fallbackKeys: [matrixKey, base],
    };
}
