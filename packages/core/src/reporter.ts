/**
 * Reporter.
 *
 * Publishes the artifact tree and the coverage bundle once the outcome is
 * known. Every failure here is logged as a warning and swallowed into the
 * returned summary: reporting affects the visibility of the verdict, never
 * the verdict itself.
 */

import { ReportError } from './errors.js';
import { maskSecretsInMessage, silentLogger, type Logger } from './logger.js';
import type { ArtifactStore, CoverageUploader, PipelineOutcome } from './types.js';

export type PublishStatus = 'published' | 'failed' | 'skipped';

export interface ReportSummary {
    artifacts: PublishStatus;
    coverage: PublishStatus;
    errors: ReportError[];
}

export interface ReporterOptions {
    artifactStore?: ArtifactStore;

    /** Destination name under the artifact store */
    destination?: string;

    coverageUploader?: CoverageUploader;
    coverageFile?: string;

    /** Values masked out of every logged message, such as the upload token */
    secrets?: readonly string[];

    logger?: Logger;
}

export class Reporter {
    private readonly logger: Logger;
    private readonly secrets: readonly string[];

    constructor(private readonly options: ReporterOptions = {}) {
        this.logger = options.logger ?? silentLogger;
        this.secrets = options.secrets ?? [];
    }

    async report(outcome: PipelineOutcome, artifactDir: string): Promise<ReportSummary> {
        const summary: ReportSummary = { artifacts: 'skipped', coverage: 'skipped', errors: [] };
        const { artifactStore, coverageUploader } = this.options;

        if (artifactStore) {
            try {
                const stored = await artifactStore.persist(artifactDir, this.options.destination ?? 'test-reports');
                summary.artifacts = 'published';
                this.logger.info(`Published ${stored.length} artifact(s)`);
            } catch (error) {
                summary.artifacts = 'failed';
                summary.errors.push(this.warn(new ReportError('artifacts', error)));
            }
        }

        if (coverageUploader) {
            try {
                await coverageUploader.upload({
                    outcome,
                    artifactDir,
                    coverageFile: this.options.coverageFile ?? 'coverage.xml',
                });
                summary.coverage = 'published';
                this.logger.info('Coverage submitted');
            } catch (error) {
                summary.coverage = 'failed';
                summary.errors.push(this.warn(new ReportError('coverage', error)));
            }
        }

        return summary;
    }

    private warn(error: ReportError): ReportError {
        this.logger.warn(maskSecretsInMessage(error.message, this.secrets));
        return error;
    }
}
