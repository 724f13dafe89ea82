import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { MatrixCiError } from './errors.js';
import { checksumManifest, computeFingerprint, matrixHash } from './fingerprint.js';

describe('computeFingerprint', () => {
    const input = {
        version: 'v1',
        prefix: 'dependencies',
        environments: ['2.7.13', '3.6.2'],
        manifestChecksum: 'abc123',
    };

    it('is deterministic', () => {
        assert.deepEqual(computeFingerprint(input), computeFingerprint({ ...input }));
    });

    it('builds the key from version, prefix, matrix and manifest', () => {
        const fingerprint = computeFingerprint(input);
        assert.equal(fingerprint.key, `v1-dependencies-${matrixHash(['2.7.13', '3.6.2'])}-abc123`);
    });

    it('falls back to the same matrix, then to any entry of the version', () => {
        const fingerprint = computeFingerprint(input);
        assert.deepEqual(fingerprint.fallbackKeys, [
            `v1-dependencies-${matrixHash(['2.7.13', '3.6.2'])}-`,
            'v1-dependencies-',
        ]);
        for (const prefix of fingerprint.fallbackKeys) {
            assert.ok(fingerprint.key.startsWith(prefix));
        }
    });

    it('changes when the matrix is reordered', () => {
        const reordered = computeFingerprint({ ...input, environments: ['3.6.2', '2.7.13'] });
        assert.notEqual(reordered.key, computeFingerprint(input).key);
    });

    it('keeps the matrix prefix when only the manifest changes', () => {
        const changed = computeFingerprint({ ...input, manifestChecksum: 'def456' });
        const original = computeFingerprint(input);
        assert.notEqual(changed.key, original.key);
        assert.equal(changed.fallbackKeys[0], original.fallbackKeys[0]);
    });

    it('hashes the matrix to 16 hex characters', () => {
        assert.match(matrixHash(['3.5']), /^[0-9a-f]{16}$/);
    });
});

describe('checksumManifest', () => {
    let tempDir: string;

    before(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'matrix-ci-manifest-'));
        await fs.writeFile(path.join(tempDir, 'tox.ini'), '[tox]\nenvlist = py35,py36\n');
    });

    after(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('returns the sha256 of the file content', async () => {
        const expected = createHash('sha256').update('[tox]\nenvlist = py35,py36\n').digest('hex');
        assert.equal(await checksumManifest(path.join(tempDir, 'tox.ini')), expected);
    });

    it('rejects with MANIFEST_UNREADABLE for a missing file', async () => {
        await assert.rejects(
            checksumManifest(path.join(tempDir, 'missing.ini')),
            (error: unknown) => error instanceof MatrixCiError && error.code === 'MANIFEST_UNREADABLE'
        );
    });
});
