/**
 * Per-environment status tables for terminals and job summaries.
 */

import { PHASES, type EnvironmentOutcome, type ExecutionResult, type PipelineOutcome } from '@matrix-ci/core';

export const STATUS_COLUMNS = ['Environment', 'Provision', 'Install', 'Lint', 'Test', 'Result'] as const;

type CellKind = 'passed' | 'failed' | 'skipped' | 'plain';

interface Cell {
    text: string;
    kind: CellKind;
}

/**
 * Colouring hooks. The CLI passes chalk functions; everything else stays plain.
 */
export interface TableStyle {
    passed(text: string): string;
    failed(text: string): string;
    skipped(text: string): string;
    header(text: string): string;
}

const identity = (text: string): string => text;

export const PLAIN_STYLE: TableStyle = {
    passed: identity,
    failed: identity,
    skipped: identity,
    header: identity,
};

function resultCell(result: ExecutionResult | undefined): Cell {
    if (!result) {
        return { text: '-', kind: 'plain' };
    }
    if (result.status === 'failed') {
        return {
            text: result.exitCode === null ? 'failed' : `failed (${result.exitCode})`,
            kind: 'failed',
        };
    }
    return { text: result.status, kind: result.status };
}

function environmentCells(env: EnvironmentOutcome): Cell[] {
    return [
        { text: env.identifier, kind: 'plain' },
        env.provision ? { text: 'failed', kind: 'failed' } : { text: 'ready', kind: 'plain' },
        ...PHASES.map(phase => resultCell(env.phases[phase])),
        { text: env.status, kind: env.status },
    ];
}

/**
 * Plain-text rows in matrix order, without the header.
 */
export function statusRows(outcome: PipelineOutcome): string[][] {
    return Object.values(outcome.perEnvironment).map(env => environmentCells(env).map(cell => cell.text));
}

/**
 * One line summing up the run, e.g. "FAILURE: 1 passed, 1 failed, 0 phase(s) skipped".
 */
export function summaryLine(outcome: PipelineOutcome): string {
    const { passed, failed, skippedPhases } = outcome.summary;
    return `${outcome.status.toUpperCase()}: ${passed} passed, ${failed} failed, ${skippedPhases} phase(s) skipped`;
}

/**
 * Render the outcome as an aligned text table followed by the summary line.
 */
export function formatStatusTable(outcome: PipelineOutcome, style: TableStyle = PLAIN_STYLE): string {
    const header: Cell[] = STATUS_COLUMNS.map(text => ({ text, kind: 'plain' }));
    const rows = Object.values(outcome.perEnvironment).map(environmentCells);

    const widths = STATUS_COLUMNS.map((_, column) =>
        Math.max(...[header, ...rows].map(row => row[column]?.text.length ?? 0))
    );
    const last = STATUS_COLUMNS.length - 1;

    // Pad before styling so escape codes do not count towards the width
    const render = (row: Cell[], paint: (cell: Cell, text: string) => string): string =>
        row.map((cell, column) => paint(cell, column === last ? cell.text : cell.text.padEnd(widths[column]))).join('  ');

    const paintCell = (cell: Cell, text: string): string => cell.kind === 'plain' ? text : style[cell.kind](text);

    return [
        render(header, (_, text) => style.header(text)),
        widths.map(width => '-'.repeat(width)).join('  '),
        ...rows.map(row => render(row, paintCell)),
        '',
        summaryLine(outcome),
    ].join('\n');
}

/**
 * Markdown summary for pull requests and job summaries.
 */
export function renderMarkdownSummary(outcome: PipelineOutcome): string {
    const heading = outcome.status === 'success' ? '✅ Matrix passed' : '❌ Matrix failed';
    const lines = [
        `## ${heading}`,
        '',
        `| ${STATUS_COLUMNS.join(' | ')} |`,
        `| ${STATUS_COLUMNS.map(() => '---').join(' | ')} |`,
        ...statusRows(outcome).map(row => `| ${row.join(' | ')} |`),
        '',
        summaryLine(outcome),
        '',
        `Cache: ${outcome.metadata.cache} (\`${outcome.metadata.fingerprint}\`), ${outcome.metadata.durationMs} ms`,
    ];
    return lines.join('\n') + '\n';
}
