/**
 * Report-level analysis types: confusion matrix, scalar, table.
 */

import type { MetricsReport } from '../types.js';
import { formatMetric } from './render-numbers.js';

export interface ConfusionMatrix {
  type: 'confusion_matrix';
  title: string;
  /** Sorted class labels (used for both axes). */
  classLabels: string[];
  /** matrix[groundTruthIdx][predictedIdx] = count of samples. */
  matrix: number[][];
}

export interface ScalarResult {
  type: 'scalar';
  title: string;
  value: number;
}

export interface TableResult {
  type: 'table';
  title: string;
  /** Column headers. */
  columns: string[];
  /** Row data, one array per row. */
  rows: (string | number | boolean | null)[][];
}

/** Discriminated union of all report-level analysis types. */
export type ReportAnalysis = ConfusionMatrix | ScalarResult | TableResult;

/**
 * Express a metrics report as the analyses rendered in reports: one scalar per
 * macro metric, the per-label table (metrics formatted to 4 decimals), then
 * the confusion matrix.
 */
export function analysesFromMetrics(report: MetricsReport): ReportAnalysis[] {
  const { metrics } = report;
  const scalars: ScalarResult[] = [
    { type: 'scalar', title: 'Accuracy', value: metrics.accuracy },
    { type: 'scalar', title: 'Precision', value: metrics.precision },
    { type: 'scalar', title: 'Recall', value: metrics.recall },
    { type: 'scalar', title: 'F1 Score', value: metrics.f1 },
  ];

  const perLabel: TableResult = {
    type: 'table',
    title: 'Per-Label Metrics',
    columns: ['Label', 'Precision', 'Recall', 'F1', 'Support'],
    rows: report.perLabel.map((l) => [
      l.label,
      formatMetric(l.precision),
      formatMetric(l.recall),
      formatMetric(l.f1),
      l.support,
    ]),
  };

  return [...scalars, perLabel, report.confusionMatrix];
}
