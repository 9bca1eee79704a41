/**
 * Core type definitions shared across indexing, metrics, export and reporting.
 */

import type { ConfusionMatrix } from './reporting/analyses.js';

/**
 * A class identifier, equal to the name of a dataset subfolder.
 */
export type ClassLabel = string;

/**
 * One image in the dataset. `predictedLabel` is absent until inference has run.
 */
export interface Sample {
  readonly imagePath: string;
  readonly groundTruthLabel: ClassLabel;
  readonly predictedLabel?: ClassLabel;
}

/**
 * A sample whose prediction has been recorded.
 */
export interface EvaluatedSample extends Sample {
  readonly predictedLabel: ClassLabel;
}

/**
 * Macro-averaged classification metrics. Every value is in [0, 1].
 */
export interface Metrics {
  accuracy: number;
  precision: number;
  recall: number;
  f1: number;
}

/**
 * Per-label breakdown backing the macro averages.
 */
export interface LabelMetrics {
  label: ClassLabel;
  precision: number;
  recall: number;
  f1: number;
  /** Number of ground-truth occurrences of the label. */
  support: number;
  /** Number of times the label was predicted. */
  predicted: number;
  truePositives: number;
}

/**
 * Everything the metrics engine derives from one set of paired labels.
 */
export interface MetricsReport {
  metrics: Metrics;
  perLabel: LabelMetrics[];
  confusionMatrix: ConfusionMatrix;
  /** Number of (groundTruth, prediction) pairs the metrics were computed over. */
  sampleCount: number;
}

/**
 * Return a copy of the sample with its prediction recorded.
 */
export function withPrediction(sample: Sample, predictedLabel: ClassLabel): EvaluatedSample {
  return {
    imagePath: sample.imagePath,
    groundTruthLabel: sample.groundTruthLabel,
    predictedLabel,
  };
}
