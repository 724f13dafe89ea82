/**
 * Artifact collection.
 *
 * Copies files produced by the test phase into the well-known artifact
 * directory, one subdirectory per environment so that reports with the
 * same name from different environments never collide.
 */

import fastGlob from 'fast-glob';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { isNodeError } from './errors.js';
import { environmentDirName } from './paths.js';

/**
 * Options for artifact collection.
 */
export interface CollectOptions {
    /** Glob patterns relative to the source directory */
    patterns?: string[];

    /** Patterns to exclude from results */
    exclude?: string[];

    /** Remove the target directory first, dropping copies from earlier runs */
    clean?: boolean;
}

/**
 * Copy the files matching `patterns` from `sourceDir` into `targetDir`,
 * preserving their relative paths.
 *
 * A missing source directory yields no artifacts.
 *
 * @returns Absolute paths of the copies, sorted
 */
export async function collectArtifacts(
    sourceDir: string,
    targetDir: string,
    options: CollectOptions = {}
): Promise<string[]> {
    const { patterns = ['**/*'], exclude = [], clean = false } = options;

    if (clean) {
        await fs.rm(targetDir, { recursive: true, force: true });
    }

    if (!await isDirectory(sourceDir)) {
        return [];
    }

    const files = await fastGlob(patterns, {
        cwd: sourceDir,
        dot: true,
        followSymbolicLinks: false,
        ignore: [
            ...exclude,
            '**/node_modules/**',
            '**/.git/**',
        ],
        onlyFiles: true,
    });

    // Sort for deterministic output
    files.sort((a, b) => a.localeCompare(b));

    const copied: string[] = [];
    for (const relative of files) {
        const destination = path.join(targetDir, relative);
        await fs.mkdir(path.dirname(destination), { recursive: true });
        await fs.copyFile(path.join(sourceDir, relative), destination);
        copied.push(destination);
    }

    return copied;
}

/**
 * Collection directory for one environment under the artifact root.
 */
export function artifactDirFor(artifactRoot: string, identifier: string): string {
    return path.join(artifactRoot, environmentDirName(identifier));
}

async function isDirectory(dir: string): Promise<boolean> {
    try {
        return (await fs.stat(dir)).isDirectory();
    } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
            return false;
        }
        throw error;
    }
}
