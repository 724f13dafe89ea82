/**
 * Coverage bundle: a zip holding each environment's coverage report next
 * to the JSON report of the run.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { artifactDirFor, environmentDirName, isNodeError, type PipelineOutcome } from '@matrix-ci/core';
import { generateJsonReport } from './json.js';

export const BUNDLE_SUMMARY_ENTRY = 'summary.json';

export interface CoverageBundle {
    payload: Buffer;

    /** Entry names of the coverage reports, in matrix order */
    reports: string[];
}

/**
 * Build the bundle from the collected artifacts.
 *
 * @throws Error when no environment produced a coverage report
 */
export async function bundleCoverage(
    outcome: PipelineOutcome,
    artifactDir: string,
    coverageFile: string
): Promise<CoverageBundle> {
    // Dynamic import to avoid loading adm-zip unless coverage is uploaded
    const AdmZip = (await import('adm-zip')).default;
    const zip = new AdmZip();
    const reports: string[] = [];

    for (const identifier of Object.keys(outcome.perEnvironment)) {
        const file = path.join(artifactDirFor(artifactDir, identifier), coverageFile);
        const content = await readIfPresent(file);
        if (content) {
            const entry = `${environmentDirName(identifier)}/${coverageFile.split(path.sep).join('/')}`;
            zip.addFile(entry, content);
            reports.push(entry);
        }
    }

    if (reports.length === 0) {
        throw new Error(`No ${coverageFile} found under ${artifactDir}`);
    }

    zip.addFile(BUNDLE_SUMMARY_ENTRY, Buffer.from(generateJsonReport(outcome), 'utf-8'));
    return { payload: zip.toBuffer(), reports };
}

async function readIfPresent(file: string): Promise<Buffer | undefined> {
    try {
        return await fs.readFile(file);
    } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
            return undefined;
        }
        throw error;
    }
}
