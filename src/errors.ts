/**
 * Error taxonomy for evaluation runs.
 *
 * Per-item errors (InferenceError, SplitIOError, ReportWriteError) are collected
 * into stage results. Run-level errors (DatasetReadError, MetricsInputError)
 * stop the pipeline and are rethrown wrapped in a PipelineError.
 */

export const ErrorCodes = {
  DATASET_READ: 'DATASET_READ',
  INFERENCE: 'INFERENCE',
  SPLIT_IO: 'SPLIT_IO',
  METRICS_INPUT: 'METRICS_INPUT',
  REPORT_WRITE: 'REPORT_WRITE',
  PIPELINE: 'PIPELINE',
  CONFIG: 'CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class EvalsError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EvalsError';
    this.code = code;
    this.context = context;
  }

  toJSON(): { error: string; code: ErrorCode; context: Record<string, unknown> } {
    return { error: this.message, code: this.code, context: this.context };
  }
}

/** The dataset root (or one of its class folders) could not be read. */
export class DatasetReadError extends EvalsError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Cannot read dataset at '${path}': ${reason}`, ErrorCodes.DATASET_READ, { path }, { cause });
    this.name = 'DatasetReadError';
    this.path = path;
  }
}

/** The classifier failed to produce a label for one image. */
export class InferenceError extends EvalsError {
  readonly imagePath: string;

  constructor(imagePath: string, cause?: unknown) {
    super(
      `Inference failed for '${imagePath}': ${describeCause(cause)}`,
      ErrorCodes.INFERENCE,
      { imagePath },
      { cause },
    );
    this.name = 'InferenceError';
    this.imagePath = imagePath;
  }
}

/** A split directory could not be created or a file could not be copied. */
export class SplitIOError extends EvalsError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Split I/O failed for '${path}': ${describeCause(cause)}`, ErrorCodes.SPLIT_IO, { path }, { cause });
    this.name = 'SplitIOError';
    this.path = path;
  }
}

export class MetricsInputError extends EvalsError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCodes.METRICS_INPUT, context);
    this.name = 'MetricsInputError';
  }
}

/** A report artifact could not be written. Never fatal. */
export class ReportWriteError extends EvalsError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Cannot write report artifact '${path}': ${describeCause(cause)}`, ErrorCodes.REPORT_WRITE, { path }, { cause });
    this.name = 'ReportWriteError';
    this.path = path;
  }
}

export type PipelineStage = 'index' | 'infer' | 'aggregate' | 'report' | 'split' | 'train';

/**
 * Run-level failure: carries the stage and the path being processed so the
 * caller can tell where the run stopped.
 */
export class PipelineError extends EvalsError {
  readonly stage: PipelineStage;
  readonly path: string;

  constructor(stage: PipelineStage, path: string, cause: unknown) {
    super(
      `Evaluation failed during '${stage}' (${path}): ${describeCause(cause)}`,
      ErrorCodes.PIPELINE,
      { stage, path, ...(cause instanceof EvalsError ? { causeCode: cause.code } : {}) },
      { cause },
    );
    this.name = 'PipelineError';
    this.stage = stage;
    this.path = path;
  }
}

export class ConfigError extends EvalsError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, ErrorCodes.CONFIG, { issues });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export function describeCause(cause: unknown): string {
  if (cause === undefined) return 'unknown error';
  const error = toError(cause);
  return `${error.name}: ${error.message}`;
}
