/**
 * EvaluationPipeline: index a dataset, run the classifier over every image,
 * aggregate metrics and write report artifacts.
 *
 * States advance linearly: Idle -> Indexed -> Inferred -> Aggregated -> Reported.
 * Per-image inference failures are absorbed in the Inferred stage (the sample
 * is excluded from both label sequences); anything else aborts the run with a
 * PipelineError naming the stage and path.
 */

import { join } from 'node:path';
import pLimit from 'p-limit';
import { type ClassifierPort, predictLabel } from './classifier/port.js';
import { indexDataset } from './dataset/indexer.js';
import { InferenceError, type PipelineStage, PipelineError, toError } from './errors.js';
import { emitEvent, type StageEvent, withStageEvents } from './events.js';
import { DEFAULT_SAMPLE_COUNT, type ExportResult, exportSamples } from './export/samples.js';
import { createComponentLogger } from './logger.js';
import { computeMetrics } from './metrics/engine.js';
import { randomSeed } from './random.js';
import { DEFAULT_REPORT_TITLE } from './reporting/html.js';
import { type RendererOptions, renderSummaryTable } from './reporting/renderer.js';
import { type ReportArtifacts, type ReportFileNames, writeReport } from './reporting/report.js';
import { type EvaluatedSample, type MetricsReport, type Sample, withPrediction } from './types.js';

const log = createComponentLogger('pipeline');

export type PipelineState = 'Idle' | 'Indexed' | 'Inferred' | 'Aggregated' | 'Reported';

export const DEFAULT_SAMPLE_FOLDER = 'samples';

export interface PipelineOptions {
  classifier: ClassifierPort;
  /** Report title. */
  title?: string;
  /** Number of images exported to the sample gallery. Defaults to 3. */
  sampleCount?: number;
  /** Seed for sample selection. A random seed is drawn when omitted. */
  seed?: number;
  /** Maximum number of concurrent classifier calls. Defaults to 1. */
  maxConcurrency?: number;
  /** Accepted image extensions for indexing. */
  extensions?: readonly string[];
  /** Name of the sample folder under the output directory. */
  sampleFolderName?: string;
  reportFileNames?: ReportFileNames;
  /** Interrupts the run between samples. */
  signal?: AbortSignal;
  /** Called after each classifier call settles. */
  onProgress?: (done: number, total: number) => void;
}

export interface ExcludedSample {
  sample: Sample;
  error: InferenceError;
}

export interface PipelineResult {
  state: 'Reported';
  title: string;
  metrics: MetricsReport;
  /** Samples with a recorded prediction, in dataset order. */
  evaluated: EvaluatedSample[];
  /** Samples left out of the metrics because inference failed. */
  excluded: ExcludedSample[];
  sampleCount: number;
  excludedCount: number;
  exported: ExportResult;
  artifacts: ReportArtifacts;
  events: StageEvent[];
  stages: PipelineState[];
  /** Wall-clock duration in seconds. */
  duration: number;

  /** Render the summary as formatted tables. */
  render(opts?: RendererOptions): string;
  /** Print the summary to the console. */
  print(opts?: RendererOptions): void;
}

type InferenceOutcome =
  | { ok: true; sample: EvaluatedSample }
  | { ok: false; sample: Sample; error: InferenceError };

export class EvaluationPipeline {
  private readonly opts: PipelineOptions;
  private currentState: PipelineState = 'Idle';
  private readonly visited: PipelineState[] = [];

  constructor(opts: PipelineOptions) {
    const maxConcurrency = opts.maxConcurrency ?? 1;
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new Error(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }
    this.opts = opts;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  async run(datasetRoot: string, outputDir: string): Promise<PipelineResult> {
    this.currentState = 'Idle';
    this.visited.length = 0;
    const t0 = performance.now();
    const events: StageEvent[] = [];
    const title = this.opts.title ?? DEFAULT_REPORT_TITLE;

    const samples = await this.stage('index', datasetRoot, events, () =>
      indexDataset(datasetRoot, { extensions: this.opts.extensions }),
    );
    this.advance('Indexed');

    const outcomes = await this.stage('infer', datasetRoot, events, () => this.inferAll(samples));
    const evaluated: EvaluatedSample[] = [];
    const excluded: ExcludedSample[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        evaluated.push(outcome.sample);
      } else {
        excluded.push({ sample: outcome.sample, error: outcome.error });
      }
    }
    this.advance('Inferred');

    const metrics = await this.stage('aggregate', datasetRoot, events, async () => {
      const report = computeMetrics(
        evaluated.map((s) => s.groundTruthLabel),
        evaluated.map((s) => s.predictedLabel),
      );
      emitEvent('info', 'Computed metrics', {
        ...report.metrics,
        samples: report.sampleCount,
        excluded: excluded.length,
        labels: report.confusionMatrix.classLabels.length,
      });
      return report;
    });
    this.advance('Aggregated');

    const sampleFolder = join(outputDir, this.opts.sampleFolderName ?? DEFAULT_SAMPLE_FOLDER);
    const { exported, artifacts } = await this.stage('report', outputDir, events, async () => {
      const exported = await exportSamples(evaluated, sampleFolder, {
        count: this.opts.sampleCount ?? DEFAULT_SAMPLE_COUNT,
        seed: this.opts.seed ?? randomSeed(),
      });
      const artifacts = await writeReport(
        { title, metrics, excludedCount: excluded.length, sampleFolder, extensions: this.opts.extensions },
        outputDir,
        this.opts.reportFileNames,
      );
      return { exported, artifacts };
    });
    events.push(...exported.events, ...artifacts.events);
    this.advance('Reported');

    return createPipelineResult({
      title,
      metrics,
      evaluated,
      excluded,
      exported,
      artifacts,
      events,
      stages: [...this.visited],
      duration: (performance.now() - t0) / 1000,
    });
  }

  private async inferAll(samples: Sample[]): Promise<InferenceOutcome[]> {
    const { classifier, signal, onProgress } = this.opts;
    const limit = pLimit(this.opts.maxConcurrency ?? 1);
    const total = samples.length;
    let done = 0;

    // Outcomes are collected by index, so completion order never reaches the metrics.
    const outcomes = await Promise.all(
      samples.map((sample) =>
        limit(async (): Promise<InferenceOutcome> => {
          signal?.throwIfAborted();
          try {
            const label = await predictLabel(classifier, sample.imagePath);
            return { ok: true, sample: withPrediction(sample, label) };
          } catch (e) {
            const error = e instanceof InferenceError ? e : new InferenceError(sample.imagePath, e);
            return { ok: false, sample, error };
          } finally {
            done++;
            onProgress?.(done, total);
          }
        }),
      ),
    );
    signal?.throwIfAborted();

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        emitEvent('warn', 'Excluded sample after inference failure', {
          imagePath: outcome.sample.imagePath,
          groundTruth: outcome.sample.groundTruthLabel,
          error: outcome.error.message,
        });
      }
    }
    const failed = outcomes.filter((o) => !o.ok).length;
    emitEvent('info', 'Inference finished', { total, evaluated: total - failed, excluded: failed });
    return outcomes;
  }

  private async stage<T>(
    stage: PipelineStage,
    path: string,
    events: StageEvent[],
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      const { result, events: stageEvents } = await withStageEvents(stage, fn);
      events.push(...stageEvents);
      return result;
    } catch (e) {
      const error = new PipelineError(stage, path, e);
      log.error({ err: toError(e), stage, path, state: this.currentState }, error.message);
      throw error;
    }
  }

  private advance(state: PipelineState): void {
    this.currentState = state;
    this.visited.push(state);
  }
}

/**
 * Inputs the caller must have chosen before a run can start.
 */
export interface RunSelection {
  datasetRoot?: string | null;
  outputDir?: string | null;
  [input: string]: string | null | undefined;
}

/**
 * True when every input in the selection is a non-empty string.
 */
export function allInputsSelected(selection: RunSelection): boolean {
  const required = ['datasetRoot', 'outputDir'];
  const keys = new Set([...required, ...Object.keys(selection)]);
  return [...keys].every((key) => {
    const value = selection[key];
    return typeof value === 'string' && value.trim().length > 0;
  });
}

function createPipelineResult(
  fields: Omit<PipelineResult, 'state' | 'sampleCount' | 'excludedCount' | 'render' | 'print'>,
): PipelineResult {
  const result: PipelineResult = {
    state: 'Reported',
    ...fields,
    sampleCount: fields.evaluated.length,
    excludedCount: fields.excluded.length,

    render(opts) {
      return renderSummaryTable(
        {
          title: result.title,
          metrics: result.metrics,
          excludedCount: result.excludedCount,
          duration: result.duration,
        },
        opts,
      );
    },

    print(opts) {
      // eslint-disable-next-line no-console
      console.log(result.render(opts));
    },
  };
  return result;
}
