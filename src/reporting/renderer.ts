/**
 * Terminal rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { SplitPlan } from '../dataset/splitter.js';
import type { MetricsReport } from '../types.js';
import { analysesFromMetrics, type ConfusionMatrix, type TableResult } from './analyses.js';
import {
  defaultRenderCount,
  defaultRenderDuration,
  defaultRenderPercentage,
  formatMetric,
} from './render-numbers.js';

export interface SummaryInput {
  title: string;
  metrics: MetricsReport;
  excludedCount?: number;
  /** Wall-clock duration of the run in seconds. */
  duration?: number;
}

export interface RendererOptions {
  includePerLabel?: boolean;
  includeConfusionMatrix?: boolean;
}

/**
 * Render a metrics summary, the per-label table and the confusion matrix as
 * formatted tables.
 */
export function renderSummaryTable(input: SummaryInput, opts?: RendererOptions): string {
  const sections: string[] = [`Evaluation Summary: ${input.title}`];

  const excluded = input.excludedCount ?? 0;
  const summary = new Table({
    head: [chalk.bold('Metric'), chalk.bold('Value')],
    style: { head: [], border: [] },
  });
  for (const analysis of analysesFromMetrics(input.metrics)) {
    if (analysis.type !== 'scalar') continue;
    summary.push([analysis.title, formatMetric(analysis.value)]);
  }
  summary.push(['Samples', defaultRenderCount(input.metrics.sampleCount)]);
  if (excluded > 0) {
    const share = defaultRenderPercentage(excluded / (excluded + input.metrics.sampleCount));
    summary.push(['Excluded', chalk.yellow(`${defaultRenderCount(excluded)} (${share})`)]);
  } else {
    summary.push(['Excluded', '0']);
  }
  if (input.duration !== undefined) {
    summary.push(['Duration', defaultRenderDuration(input.duration)]);
  }
  sections.push(summary.toString());

  for (const analysis of analysesFromMetrics(input.metrics)) {
    if (analysis.type === 'table' && (opts?.includePerLabel ?? true)) {
      sections.push(analysis.title, renderTable(analysis));
    }
    if (analysis.type === 'confusion_matrix' && (opts?.includeConfusionMatrix ?? true)) {
      sections.push(analysis.title, renderMatrix(analysis));
    }
  }

  return sections.join('\n');
}

function renderTable(result: TableResult): string {
  const table = new Table({
    head: result.columns.map((c) => chalk.bold(c)),
    style: { head: [], border: [] },
  });
  for (const row of result.rows) {
    table.push(row.map((cell) => (cell === null ? '-' : String(cell))));
  }
  return table.toString();
}

function renderMatrix(cm: ConfusionMatrix): string {
  const table = new Table({
    head: [chalk.bold('GT \\ Pred'), ...cm.classLabels.map((l) => chalk.bold(l))],
    style: { head: [], border: [] },
  });
  cm.classLabels.forEach((label, i) => {
    const counts = (cm.matrix[i] ?? []).map((count, j) =>
      i === j ? chalk.green(String(count)) : count > 0 ? chalk.red(String(count)) : String(count),
    );
    table.push([chalk.bold(label), ...counts]);
  });
  return table.toString();
}

/**
 * Per-class subset sizes of a split, with a totals row.
 */
export function renderSplitSummary(plan: SplitPlan): string {
  const table = new Table({
    head: ['Class', 'Train', 'Val', 'Test'].map((c) => chalk.bold(c)),
    style: { head: [], border: [] },
  });
  const totals = { train: 0, val: 0, test: 0 };
  for (const a of plan.assignments) {
    table.push([a.className, a.train.length, a.val.length, a.test.length].map(String));
    totals.train += a.train.length;
    totals.val += a.val.length;
    totals.test += a.test.length;
  }
  table.push([chalk.bold('Total'), String(totals.train), String(totals.val), String(totals.test)]);
  return [`Split (seed ${plan.seed})`, table.toString()].join('\n');
}
