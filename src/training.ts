/**
 * Split, train, evaluate: the end-to-end flow around a ModelTrainer.
 *
 * The dataset is split into a scratch work directory, the trainer builds a
 * classifier from the train/val parts, and the evaluation pipeline runs over
 * the test part. The work directory is removed afterwards, also on failure.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ModelTrainer } from './classifier/port.js';
import { indexDataset } from './dataset/indexer.js';
import {
  clearSplitDestinations,
  type SplitRatios,
  type SplitResult,
  splitDataset,
  splitDestinationsUnder,
} from './dataset/splitter.js';
import { ConfigError, type PipelineStage, PipelineError } from './errors.js';
import { createComponentLogger } from './logger.js';
import {
  allInputsSelected,
  EvaluationPipeline,
  type PipelineOptions,
  type PipelineResult,
} from './pipeline.js';

const log = createComponentLogger('training');

export const TRAINING_SPLIT_FOLDERS = {
  train: 'train_data',
  val: 'val_data',
  test: 'test_data',
} as const;

export interface TrainingWorkflowOptions extends Omit<PipelineOptions, 'classifier'> {
  trainer: ModelTrainer;
  datasetRoot: string;
  outputDir: string;
  /**
   * Directory that receives the split folders. A fresh temp directory, removed
   * afterwards, when omitted; otherwise only the split folders are removed.
   */
  workDir?: string;
  ratios?: Partial<SplitRatios>;
  /** Keep the split folders after the run. */
  keepWorkDir?: boolean;
}

export interface TrainingWorkflowResult {
  split: SplitResult;
  evaluation: PipelineResult;
}

export async function runTrainingWorkflow(
  opts: TrainingWorkflowOptions,
): Promise<TrainingWorkflowResult> {
  const { trainer, datasetRoot, outputDir, workDir, ratios, keepWorkDir, ...pipelineOpts } = opts;
  if (!allInputsSelected({ datasetRoot, outputDir })) {
    throw new ConfigError('Dataset root and output directory must both be selected');
  }

  const root = workDir ?? (await mkdtemp(join(tmpdir(), 'classifier-evals-')));
  const destinations = splitDestinationsUnder(root, TRAINING_SPLIT_FOLDERS);
  log.info({ datasetRoot, workDir: root }, 'Starting training workflow');

  try {
    const split = await step('split', datasetRoot, async () => {
      await clearSplitDestinations(destinations);
      const samples = await indexDataset(datasetRoot, { extensions: pipelineOpts.extensions });
      return splitDataset(samples, destinations, { seed: pipelineOpts.seed, ratios });
    });

    const classifier = await step('train', destinations.train, () =>
      trainer.train({ trainRoot: destinations.train, valRoot: destinations.val }),
    );

    const pipeline = new EvaluationPipeline({ ...pipelineOpts, classifier });
    const evaluation = await pipeline.run(destinations.test, outputDir);
    return { split, evaluation };
  } finally {
    if (!keepWorkDir) {
      const targets = workDir === undefined ? [root] : Object.values(destinations);
      for (const target of targets) {
        await rm(target, { recursive: true, force: true });
      }
    }
  }
}

async function step<T>(stage: PipelineStage, path: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    const error = new PipelineError(stage, path, e);
    log.error({ err: e, stage, path }, error.message);
    throw error;
  }
}
