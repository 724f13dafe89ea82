import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ProvisionError, provisionFailedResults } from '@matrix-ci/core';
import { formatStatusTable, renderMarkdownSummary, statusRows, type TableStyle } from './table.js';
import { outcomeOf, phaseResults } from './test-outcomes.js';

const failing = () => outcomeOf([
    ...phaseResults('3.5', [0, 0, 1]),
    ...phaseResults('3.6', [0, 0, 0]),
]);

describe('formatStatusTable', () => {
    it('aligns one row per environment and ends with the verdict', () => {
        assert.equal(formatStatusTable(failing()), [
            'Environment  Provision  Install  Lint    Test        Result',
            '-----------  ---------  -------  ------  ----------  ------',
            '3.5          ready      passed   passed  failed (1)  failed',
            '3.6          ready      passed   passed  passed      passed',
            '',
            'FAILURE: 1 passed, 1 failed, 0 phase(s) skipped',
        ].join('\n'));
    });

    it('shows a provisioning failure with its skipped phases', () => {
        const outcome = outcomeOf([
            ...provisionFailedResults(new ProvisionError('3.3', 'version not available')),
            ...phaseResults('3.6', [0, 0, 0]),
        ], { environments: ['3.3', '3.6'] });

        assert.deepEqual(formatStatusTable(outcome).split('\n'), [
            'Environment  Provision  Install  Lint     Test     Result',
            '-----------  ---------  -------  -------  -------  ------',
            '3.3          failed     skipped  skipped  skipped  failed',
            '3.6          ready      passed   passed   passed   passed',
            '',
            'FAILURE: 1 passed, 1 failed, 3 phase(s) skipped',
        ]);
    });

    it('styles status cells after padding them', () => {
        const style: TableStyle = {
            passed: text => `<p>${text}</p>`,
            failed: text => `<f>${text}</f>`,
            skipped: text => `<s>${text}</s>`,
            header: text => text,
        };

        assert.equal(
            formatStatusTable(failing(), style).split('\n')[2],
            '3.5          ready      <p>passed </p>  <p>passed</p>  <f>failed (1)</f>  <f>failed</f>'
        );
    });

    it('prints only the header and verdict for an empty matrix', () => {
        assert.deepEqual(formatStatusTable(outcomeOf([])).split('\n'), [
            'Environment  Provision  Install  Lint  Test  Result',
            '-----------  ---------  -------  ----  ----  ------',
            '',
            'SUCCESS: 0 passed, 0 failed, 0 phase(s) skipped',
        ]);
    });
});

describe('statusRows', () => {
    it('omits the exit code of a command that could not start', () => {
        assert.deepEqual(
            statusRows(outcomeOf(phaseResults('3.6', [0, null, null]).map(result =>
                result.phase === 'test' ? { ...result, status: 'failed' as const } : result
            ))),
            [['3.6', 'ready', 'passed', 'skipped', 'failed', 'failed']]
        );
    });
});

describe('renderMarkdownSummary', () => {
    it('renders a table with the cache state', () => {
        const outcome = outcomeOf(phaseResults('3.6', [0, 0, 0]));

        assert.equal(renderMarkdownSummary(outcome), [
            '## ✅ Matrix passed',
            '',
            '| Environment | Provision | Install | Lint | Test | Result |',
            '| --- | --- | --- | --- | --- | --- |',
            '| 3.6 | ready | passed | passed | passed | passed |',
            '',
            'SUCCESS: 1 passed, 0 failed, 0 phase(s) skipped',
            '',
            'Cache: hit (`v1-dependencies-abc-def`), 1200 ms',
            '',
        ].join('\n'));
    });

    it('marks a failed matrix in the heading', () => {
        assert.ok(renderMarkdownSummary(failing()).startsWith('## ❌ Matrix failed\n'));
    });
});
