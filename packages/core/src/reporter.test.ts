import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { aggregateResults } from './aggregator.js';
import { ReportError } from './errors.js';
import { Reporter } from './reporter.js';
import { RecordingLogger, testConfig } from './test-fakes.js';
import type { ArtifactStore, CoverageSubmission, CoverageUploader, PipelineOutcome } from './types.js';

function outcome(): PipelineOutcome {
    return {
        ...aggregateResults([], { failOn: ['install', 'lint', 'test'] }),
        metadata: {
            startTime: '2024-01-01T00:00:00.000Z',
            durationMs: 0,
            version: '0.1.0',
            fingerprint: 'v1-dependencies-x-y',
            cache: 'miss',
            config: testConfig('/work'),
        },
    };
}

describe('Reporter', () => {
    it('skips both targets when none is configured', async () => {
        const summary = await new Reporter().report(outcome(), '/artifacts');
        assert.deepEqual(summary, { artifacts: 'skipped', coverage: 'skipped', errors: [] });
    });

    it('publishes artifacts and coverage', async () => {
        const persisted: Array<[string, string]> = [];
        const submissions: CoverageSubmission[] = [];
        const store: ArtifactStore = {
            persist: async (dir, destination) => {
                persisted.push([dir, destination]);
                return ['a', 'b'];
            },
        };
        const uploader: CoverageUploader = {
            upload: async submission => {
                submissions.push(submission);
            },
        };
        const logger = new RecordingLogger();

        const summary = await new Reporter({
            artifactStore: store,
            destination: 'reports',
            coverageUploader: uploader,
            coverageFile: 'lcov.info',
            logger,
        }).report(outcome(), '/artifacts');

        assert.deepEqual(summary, { artifacts: 'published', coverage: 'published', errors: [] });
        assert.deepEqual(persisted, [['/artifacts', 'reports']]);
        assert.equal(submissions[0].coverageFile, 'lcov.info');
        assert.equal(submissions[0].artifactDir, '/artifacts');
        assert.deepEqual(logger.messages('info'), ['Published 2 artifact(s)', 'Coverage submitted']);
    });

    it('logs an upload failure as a warning with the token masked', async () => {
        const token = 'test-secret-token';
        const logger = new RecordingLogger();
        const uploader: CoverageUploader = {
            upload: async () => {
                throw new Error(`connect ECONNREFUSED (token ${token})`);
            },
        };

        const summary = await new Reporter({ coverageUploader: uploader, secrets: [token], logger })
            .report(outcome(), '/artifacts');

        assert.equal(summary.coverage, 'failed');
        assert.ok(summary.errors[0] instanceof ReportError);
        assert.deepEqual(logger.messages('warn'), [
            'Publishing coverage failed: connect ECONNREFUSED (token ***)',
        ]);
    });

    it('still uploads coverage when publishing artifacts fails', async () => {
        let uploaded = false;
        const summary = await new Reporter({
            artifactStore: { persist: async () => { throw new Error('disk full'); } },
            coverageUploader: { upload: async () => { uploaded = true; } },
        }).report(outcome(), '/artifacts');

        assert.equal(summary.artifacts, 'failed');
        assert.equal(summary.coverage, 'published');
        assert.ok(uploaded);
    });
});
