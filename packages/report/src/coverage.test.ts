import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import AdmZip from 'adm-zip';
import { Reporter } from '@matrix-ci/core';
import { BUNDLE_SUMMARY_ENTRY } from './bundle.js';
import { HttpCoverageUploader } from './coverage.js';
import { outcomeOf, phaseResults } from './test-outcomes.js';

interface RecordedRequest {
    url: string;
    init?: RequestInit;
}

function fakeFetch(status: number, body = ''): { fetch: typeof fetch; requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = [];
    return {
        requests,
        fetch: async (input, init) => {
            requests.push({ url: String(input), init });
            return new Response(body, { status });
        },
    };
}

const UPLOAD_URL = 'https://coverage.example.test/upload';
const TOKEN = 'test-secret';

describe('HttpCoverageUploader', () => {
    let artifactDir: string;
    const outcome = outcomeOf([
        ...phaseResults('3.5', [0, 0, 1]),
        ...phaseResults('3.6', [0, 0, 0]),
    ]);

    before(async () => {
        artifactDir = await fs.mkdtemp(path.join(os.tmpdir(), 'matrix-ci-coverage-'));
        for (const env of ['3.5', '3.6']) {
            await fs.mkdir(path.join(artifactDir, env), { recursive: true });
            await fs.writeFile(path.join(artifactDir, env, 'coverage.xml'), `<coverage env="${env}"/>`);
        }
    });

    after(async () => {
        await fs.rm(artifactDir, { recursive: true, force: true });
    });

    it('posts a zip of the coverage reports with a bearer token', async () => {
        const { fetch, requests } = fakeFetch(202);
        await new HttpCoverageUploader({ url: UPLOAD_URL, token: TOKEN, fetch })
            .upload({ outcome, artifactDir, coverageFile: 'coverage.xml' });

        assert.equal(requests.length, 1);
        const [request] = requests;
        assert.equal(request.url, UPLOAD_URL);
        assert.equal(request.init?.method, 'POST');

        const headers = new Headers(request.init?.headers);
        assert.equal(headers.get('authorization'), 'Bearer test-secret');
        assert.equal(headers.get('content-type'), 'application/zip');

        const body = request.init?.body;
        assert.ok(body instanceof Uint8Array);
        const zip = new AdmZip(Buffer.from(body));
        assert.deepEqual(
            zip.getEntries().map(entry => entry.entryName).sort(),
            ['3.5/coverage.xml', '3.6/coverage.xml', BUNDLE_SUMMARY_ENTRY]
        );
        assert.equal(zip.readAsText('3.5/coverage.xml'), '<coverage env="3.5"/>');
        assert.equal(JSON.parse(zip.readAsText(BUNDLE_SUMMARY_ENTRY)).status, 'failure');
    });

    it('sends no authorization header without a token', async () => {
        const { fetch, requests } = fakeFetch(200);
        await new HttpCoverageUploader({ url: UPLOAD_URL, fetch })
            .upload({ outcome, artifactDir, coverageFile: 'coverage.xml' });

        assert.equal(new Headers(requests[0].init?.headers).get('authorization'), null);
    });

    it('rejects on a non-2xx response', async () => {
        const { fetch } = fakeFetch(401, 'invalid token\n');
        await assert.rejects(
            new HttpCoverageUploader({ url: UPLOAD_URL, token: TOKEN, fetch })
                .upload({ outcome, artifactDir, coverageFile: 'coverage.xml' }),
            { message: 'Coverage upload failed (401): invalid token' }
        );
    });

    it('rejects without calling the service when no report exists', async () => {
        const { fetch, requests } = fakeFetch(200);
        await assert.rejects(
            new HttpCoverageUploader({ url: UPLOAD_URL, fetch })
                .upload({ outcome, artifactDir, coverageFile: 'lcov.info' }),
            { message: `No lcov.info found under ${artifactDir}` }
        );
        assert.equal(requests.length, 0);
    });

    it('accepts only http and https URLs', () => {
        assert.throws(
            () => new HttpCoverageUploader({ url: 'ftp://coverage.example.test/upload' }),
            { message: 'Coverage URL must use http or https, got ftp:' }
        );
    });

    it('leaves the outcome alone when the service fails', async () => {
        const { fetch } = fakeFetch(503, `upstream down for ${TOKEN}`);
        const warnings: string[] = [];
        const reporter = new Reporter({
            coverageUploader: new HttpCoverageUploader({ url: UPLOAD_URL, token: TOKEN, fetch }),
            secrets: [TOKEN],
            logger: {
                debug: () => undefined,
                info: () => undefined,
                warn: message => warnings.push(message),
                error: () => undefined,
            },
        });

        const summary = await reporter.report(outcome, artifactDir);

        assert.equal(summary.coverage, 'failed');
        assert.equal(outcome.status, 'failure');
        assert.deepEqual(warnings, [
            'Publishing coverage failed: Coverage upload failed (503): upstream down for ***',
        ]);
    });
});
