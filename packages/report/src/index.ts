/**
 * @matrix-ci/report
 *
 * Output formats and publishing targets for matrix-ci: the status table,
 * the Markdown summary, the JSON report, the coverage bundle and its
 * HTTP uploader, and a directory-backed artifact store.
 */

export {
    formatStatusTable,
    renderMarkdownSummary,
    statusRows,
    summaryLine,
    PLAIN_STYLE,
    STATUS_COLUMNS,
    type TableStyle,
} from './table.js';
export {
    buildJsonReport,
    generateJsonReport,
    type JsonEnvironmentReport,
    type JsonReport,
    type JsonReportOptions,
    type JsonStepReport,
} from './json.js';
export { bundleCoverage, BUNDLE_SUMMARY_ENTRY, type CoverageBundle } from './bundle.js';
export { HttpCoverageUploader, type HttpCoverageUploaderOptions } from './coverage.js';
export { DirectoryArtifactStore, type DirectoryArtifactStoreOptions } from './store.js';
