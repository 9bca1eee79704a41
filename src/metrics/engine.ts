/**
 * Multi-class metrics over paired (groundTruth, prediction) label sequences.
 *
 * Precision, recall and F1 are macro-averaged: every label weighs the same
 * regardless of how many samples carry it. Sample-weighted averages would be
 * a separate metric; use `perLabel[].support` to derive them.
 */

import { MetricsInputError } from '../errors.js';
import type { ConfusionMatrix } from '../reporting/analyses.js';
import type { ClassLabel, LabelMetrics, Metrics, MetricsReport } from '../types.js';

/** Guards every ratio against a zero denominator. */
export const EPSILON = 1e-10;

/**
 * Sorted union of both label sequences. Sorting is by UTF-16 code unit, so the
 * order does not depend on the host locale.
 */
export function labelSet(groundTruths: readonly ClassLabel[], predictions: readonly ClassLabel[]): ClassLabel[] {
  return [...new Set([...groundTruths, ...predictions])].sort();
}

/**
 * Cross-tabulate ground truth (rows) against predictions (columns).
 * Pairs whose labels are not in `classLabels` are skipped.
 */
export function buildConfusionMatrix(
  groundTruths: readonly ClassLabel[],
  predictions: readonly ClassLabel[],
  classLabels: ClassLabel[] = labelSet(groundTruths, predictions),
  title = 'Confusion Matrix',
): ConfusionMatrix {
  assertPaired(groundTruths, predictions);

  const labelToIdx = new Map(classLabels.map((label, i) => [label, i]));
  const matrix = classLabels.map(() => classLabels.map(() => 0));

  groundTruths.forEach((gt, i) => {
    const gi = labelToIdx.get(gt);
    const pi = labelToIdx.get(predictions[i] ?? '');
    const row = gi === undefined ? undefined : matrix[gi];
    if (row === undefined || pi === undefined) return;
    row[pi] = (row[pi] ?? 0) + 1;
  });

  return { type: 'confusion_matrix', title, classLabels, matrix };
}

export function matrixTotal(cm: ConfusionMatrix): number {
  return cm.matrix.reduce((sum, row) => sum + row.reduce((a, b) => a + b, 0), 0);
}

export function matrixTrace(cm: ConfusionMatrix): number {
  return cm.matrix.reduce((sum, row, i) => sum + (row[i] ?? 0), 0);
}

/**
 * Accuracy read off a confusion matrix: trace / total.
 */
export function accuracyFromMatrix(cm: ConfusionMatrix): number {
  const total = matrixTotal(cm);
  if (total === 0) {
    throw new MetricsInputError('Accuracy is undefined for an empty confusion matrix');
  }
  return matrixTrace(cm) / total;
}

/**
 * Compute accuracy, per-label and macro precision/recall/F1, and the confusion
 * matrix for index-paired label sequences.
 *
 * Throws MetricsInputError when the sequences are empty or differ in length.
 */
export function computeMetrics(
  groundTruths: readonly ClassLabel[],
  predictions: readonly ClassLabel[],
): MetricsReport {
  assertPaired(groundTruths, predictions);
  if (groundTruths.length === 0) {
    throw new MetricsInputError('Cannot compute metrics over zero samples', { length: 0 });
  }

  const labels = labelSet(groundTruths, predictions);
  const confusionMatrix = buildConfusionMatrix(groundTruths, predictions, labels);
  const perLabel = labels.map((label, i) => labelMetrics(confusionMatrix, label, i));

  const n = perLabel.length;
  const metrics: Metrics = {
    accuracy: accuracyFromMatrix(confusionMatrix),
    precision: perLabel.reduce((sum, l) => sum + l.precision, 0) / n,
    recall: perLabel.reduce((sum, l) => sum + l.recall, 0) / n,
    f1: perLabel.reduce((sum, l) => sum + l.f1, 0) / n,
  };

  return { metrics, perLabel, confusionMatrix, sampleCount: groundTruths.length };
}

function labelMetrics(cm: ConfusionMatrix, label: ClassLabel, idx: number): LabelMetrics {
  const row = cm.matrix[idx] ?? [];
  const tp = row[idx] ?? 0;
  const support = row.reduce((a, b) => a + b, 0);
  const predicted = cm.matrix.reduce((sum, r) => sum + (r[idx] ?? 0), 0);

  const fp = predicted - tp;
  const fn = support - tp;
  const precision = tp / (tp + fp + EPSILON);
  const recall = tp / (tp + fn + EPSILON);
  const f1 = (2 * precision * recall) / (precision + recall + EPSILON);

  return { label, precision, recall, f1, support, predicted, truePositives: tp };
}

function assertPaired(groundTruths: readonly ClassLabel[], predictions: readonly ClassLabel[]): void {
  if (groundTruths.length !== predictions.length) {
    throw new MetricsInputError(
      `Ground truth and prediction sequences differ in length (${groundTruths.length} vs ${predictions.length})`,
      { groundTruths: groundTruths.length, predictions: predictions.length },
    );
  }
}
