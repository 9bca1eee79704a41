export type { ConfusionMatrix, ReportAnalysis, ScalarResult, TableResult } from './analyses.js';
export { analysesFromMetrics } from './analyses.js';
export { CSV_CORNER_HEADER, renderConfusionMatrixCsv } from './csv.js';
export type { HtmlReportInput } from './html.js';
export { DEFAULT_REPORT_TITLE, escapeHtml, renderHtmlReport } from './html.js';
export {
  defaultRenderCount,
  defaultRenderDuration,
  defaultRenderPercentage,
  formatMetric,
} from './render-numbers.js';
export type { RendererOptions, SummaryInput } from './renderer.js';
export { renderSplitSummary, renderSummaryTable } from './renderer.js';
export type { ReportArtifacts, ReportFileNames, ReportInput } from './report.js';
export {
  DEFAULT_CSV_FILE_NAME,
  DEFAULT_HTML_FILE_NAME,
  listGalleryImages,
  writeReport,
} from './report.js';
