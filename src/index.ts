/**
 * classifier-evals: evaluate image classifiers against labeled folder datasets.
 *
 * @example
 * ```ts
 * import { EvaluationPipeline, FunctionClassifier } from 'classifier-evals';
 *
 * const pipeline = new EvaluationPipeline({
 *   classifier: new FunctionClassifier((imagePath) => myModel.label(imagePath)),
 *   sampleCount: 3,
 * });
 *
 * const result = await pipeline.run('data/flowers', 'out/report');
 * result.print();
 * ```
 */

// Classifiers
export type { ClassifierPort, ModelTrainer, TrainingData } from './classifier/port.js';
export { FunctionClassifier, predictLabel } from './classifier/port.js';
export type { PredictionFile, PredictionFormat } from './classifier/prediction-table.js';
export {
  loadPredictionTable,
  parsePredictions,
  PredictionTableClassifier,
  predictionFileSchema,
} from './classifier/prediction-table.js';
// Config
export type { ConfigFormat, EvalConfig, EvalConfigInput } from './config/index.js';
export {
  defaultEvalConfig,
  evalConfigSchema,
  loadConfigFromFile,
  loadConfigFromObject,
  loadConfigFromText,
  splitConfigSchema,
} from './config/index.js';
// Dataset
export type { IndexOptions } from './dataset/indexer.js';
export { DEFAULT_IMAGE_EXTENSIONS, groupByClass, indexDataset } from './dataset/indexer.js';
export type {
  CopiedFile,
  SplitAssignment,
  SplitDestinations,
  SplitOptions,
  SplitPlan,
  SplitRatios,
  SplitResult,
  SplitSubset,
} from './dataset/splitter.js';
export {
  clearSplitDestinations,
  DEFAULT_SPLIT_RATIOS,
  planSplit,
  resolveRatios,
  splitCounts,
  splitDataset,
  splitDestinationsUnder,
} from './dataset/splitter.js';
// Errors
export type { ErrorCode, PipelineStage } from './errors.js';
export {
  ConfigError,
  DatasetReadError,
  ErrorCodes,
  EvalsError,
  InferenceError,
  MetricsInputError,
  PipelineError,
  ReportWriteError,
  SplitIOError,
} from './errors.js';
// Events
export type { EventLevel, StageEvent } from './events.js';
export { emitEvent, withStageEvents } from './events.js';
// Sample export
export type { ExportedSample, ExportFailure, ExportOptions, ExportResult } from './export/samples.js';
export { DEFAULT_SAMPLE_COUNT, exportSamples, sampleFileName } from './export/samples.js';
// Metrics
export {
  accuracyFromMatrix,
  buildConfusionMatrix,
  computeMetrics,
  EPSILON,
  labelSet,
  matrixTotal,
  matrixTrace,
} from './metrics/engine.js';
// Pipeline
export type {
  ExcludedSample,
  PipelineOptions,
  PipelineResult,
  PipelineState,
  RunSelection,
} from './pipeline.js';
export { allInputsSelected, DEFAULT_SAMPLE_FOLDER, EvaluationPipeline } from './pipeline.js';
export type { RandomSource } from './random.js';
export { createSeededRandom, shuffle } from './random.js';
// Reporting
export type {
  ConfusionMatrix,
  HtmlReportInput,
  RendererOptions,
  ReportAnalysis,
  ReportArtifacts,
  ReportFileNames,
  ReportInput,
  ScalarResult,
  SummaryInput,
  TableResult,
} from './reporting/index.js';
export {
  analysesFromMetrics,
  CSV_CORNER_HEADER,
  DEFAULT_CSV_FILE_NAME,
  DEFAULT_HTML_FILE_NAME,
  DEFAULT_REPORT_TITLE,
  renderConfusionMatrixCsv,
  renderHtmlReport,
  renderSplitSummary,
  renderSummaryTable,
  writeReport,
} from './reporting/index.js';
// Training
export type { TrainingWorkflowOptions, TrainingWorkflowResult } from './training.js';
export { runTrainingWorkflow, TRAINING_SPLIT_FOLDERS } from './training.js';
// Types
export type {
  ClassLabel,
  EvaluatedSample,
  LabelMetrics,
  Metrics,
  MetricsReport,
  Sample,
} from './types.js';
export { withPrediction } from './types.js';
