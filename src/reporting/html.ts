/**
 * Static HTML report.
 *
 * The document is self-contained apart from relative references to the CSV
 * and the sample folder, and holds no timestamp, so equal inputs render to
 * an equal string.
 */

import type { MetricsReport } from '../types.js';
import {
  analysesFromMetrics,
  type ConfusionMatrix,
  type ReportAnalysis,
  type ScalarResult,
  type TableResult,
} from './analyses.js';
import { formatMetric } from './render-numbers.js';

export const DEFAULT_REPORT_TITLE = 'Classification Report';

export interface HtmlReportInput {
  title?: string;
  metrics: MetricsReport;
  /** Samples left out of the metrics because inference failed. */
  excludedCount?: number;
  /** CSV file name, linked relative to the report. */
  csvFileName: string;
  /** Sample folder as a '/'-separated path relative to the report; '' for the report's own folder. */
  sampleFolderPath: string;
  /** Image file names inside the sample folder. */
  sampleImages: readonly string[];
}

const STYLE = `    body { font-family: Arial, sans-serif; padding: 20px; }
    h1 { color: #333; }
    table { border-collapse: collapse; margin-top: 20px; }
    th, td { border: 1px solid #ccc; padding: 8px; text-align: center; }
    td.diagonal { background: #e6f4ea; font-weight: bold; }
    .gallery img { height: 200px; margin: 10px; }`;

export function renderHtmlReport(input: HtmlReportInput): string {
  const title = escapeHtml(input.title ?? DEFAULT_REPORT_TITLE);
  const analyses = analysesFromMetrics(input.metrics);
  const scalars = analyses.filter((a): a is ScalarResult => a.type === 'scalar');
  const others = analyses.filter(
    (a): a is Exclude<ReportAnalysis, ScalarResult> => a.type !== 'scalar',
  );

  const lines: string[] = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="UTF-8">',
    `  <title>${title}</title>`,
    '  <style>',
    STYLE,
    '  </style>',
    '</head>',
    '<body>',
    `  <h1>${title}</h1>`,
    '  <h2>Metrics</h2>',
    `  <p>Evaluated ${input.metrics.sampleCount} samples (${input.excludedCount ?? 0} excluded).</p>`,
    '  <ul>',
    ...scalars.map((s) => `    <li><b>${escapeHtml(s.title)}:</b> ${formatMetric(s.value)}</li>`),
    '  </ul>',
  ];

  for (const analysis of others) {
    lines.push(`  <h2>${escapeHtml(analysis.title)}</h2>`);
    if (analysis.type === 'confusion_matrix') {
      lines.push(`  <p><a href="${escapeHtml(encodePath(input.csvFileName))}">Download CSV</a></p>`);
    }
    lines.push(...renderAnalysis(analysis));
  }

  lines.push('  <h2>Sample Predictions</h2>', '  <div class="gallery">');
  for (const image of input.sampleImages) {
    const src = encodePath(input.sampleFolderPath === '' ? image : `${input.sampleFolderPath}/${image}`);
    lines.push(`    <img src="${escapeHtml(src)}" alt="${escapeHtml(image)}">`);
  }
  lines.push('  </div>', '</body>', '</html>');

  return `${lines.join('\n')}\n`;
}

function renderAnalysis(analysis: Exclude<ReportAnalysis, ScalarResult>): string[] {
  switch (analysis.type) {
    case 'table':
      return renderTable(analysis);
    case 'confusion_matrix':
      return renderMatrix(analysis);
  }
}

function renderTable(table: TableResult): string[] {
  const head = table.columns.map((c) => `<th>${escapeHtml(c)}</th>`).join('');
  const rows = table.rows.map((row) => {
    const cells = row.map((cell) => `<td>${escapeHtml(formatCell(cell))}</td>`).join('');
    return `    <tr>${cells}</tr>`;
  });
  return ['  <table>', `    <tr>${head}</tr>`, ...rows, '  </table>'];
}

function renderMatrix(cm: ConfusionMatrix): string[] {
  const head = ['GroundTruth \\ Predicted', ...cm.classLabels]
    .map((c) => `<th>${escapeHtml(c)}</th>`)
    .join('');
  const rows = cm.classLabels.map((label, i) => {
    const counts = (cm.matrix[i] ?? [])
      .map((count, j) => (i === j ? `<td class="diagonal">${count}</td>` : `<td>${count}</td>`))
      .join('');
    return `    <tr><th>${escapeHtml(label)}</th>${counts}</tr>`;
  });
  return ['  <table>', `    <tr>${head}</tr>`, ...rows, '  </table>'];
}

function formatCell(cell: string | number | boolean | null): string {
  if (cell === null) return '-';
  return String(cell);
}

/**
 * Percent-encode each segment of a relative path for use in an href/src.
 */
function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
