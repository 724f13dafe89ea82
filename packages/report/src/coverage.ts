/**
 * Coverage upload over HTTP.
 */

import { silentLogger, type CoverageSubmission, type CoverageUploader, type Logger } from '@matrix-ci/core';
import { bundleCoverage } from './bundle.js';

/** Characters of a failed response body kept in the error message */
const RESPONSE_EXCERPT = 200;

export interface HttpCoverageUploaderOptions {
    url: string;

    /** Sent as a bearer token when set */
    token?: string;

    fetch?: typeof fetch;
    logger?: Logger;
}

export class HttpCoverageUploader implements CoverageUploader {
    private readonly url: URL;
    private readonly fetch: typeof fetch;
    private readonly logger: Logger;

    /**
     * @throws Error when the URL is not an http(s) URL
     */
    constructor(private readonly options: HttpCoverageUploaderOptions) {
        this.url = new URL(options.url);
        if (this.url.protocol !== 'http:' && this.url.protocol !== 'https:') {
            throw new Error(`Coverage URL must use http or https, got ${this.url.protocol}`);
        }
        this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
        this.logger = options.logger ?? silentLogger;
    }

    async upload(submission: CoverageSubmission): Promise<void> {
        const bundle = await bundleCoverage(submission.outcome, submission.artifactDir, submission.coverageFile);
        this.logger.debug(`Uploading ${bundle.reports.length} coverage report(s) to ${this.url.origin}`);

        const headers: Record<string, string> = { 'Content-Type': 'application/zip' };
        if (this.options.token) {
            headers.Authorization = `Bearer ${this.options.token}`;
        }

        const response = await this.fetch(this.url, {
            method: 'POST',
            headers,
            body: bundle.payload,
        });

        if (!response.ok) {
            const text = (await response.text()).trim().slice(0, RESPONSE_EXCERPT);
            throw new Error(`Coverage upload failed (${response.status}): ${text || response.statusText}`);
        }
    }
}
