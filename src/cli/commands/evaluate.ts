/**
 * Evaluate CLI Command
 *
 * Scores recorded predictions against a labeled dataset and writes the report.
 */

import type { Command } from 'commander';
import { loadPredictionTable } from '../../classifier/prediction-table.js';
import { defaultEvalConfig, type EvalConfig, loadConfigFromFile, loadConfigFromObject } from '../../config/index.js';
import { ConfigError } from '../../errors.js';
import { allInputsSelected, EvaluationPipeline, type PipelineResult } from '../../pipeline.js';
import { handleCliError } from '../utils/errors.js';
import { parseInteger } from '../utils/options.js';

export type EvaluateCommandOptions = {
  dataset: string;
  out: string;
  predictions: string;
  samples?: number;
  seed?: number;
  concurrency?: number;
  config?: string;
  title?: string;
};

export function addEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Evaluate recorded predictions against a labeled image folder')
    .requiredOption('--dataset <dir>', 'Dataset root with one folder per class')
    .requiredOption('--out <dir>', 'Directory for the report, CSV and sample images')
    .requiredOption('--predictions <file>', 'Predictions file (.yaml, .json or .csv)')
    .option('--samples <n>', 'Number of sample images to export', parseInteger)
    .option('--seed <n>', 'Seed for sample selection', parseInteger)
    .option('--concurrency <n>', 'Maximum concurrent classifier calls', parseInteger)
    .option('--config <file>', 'Evaluation config file (.yaml or .json)')
    .option('--title <text>', 'Report title')
    .action(async (_options: unknown, cmd: Command) => {
      try {
        const result = await runEvaluateCommand(cmd.opts<EvaluateCommandOptions>());
        result.print();
        if (result.artifacts.htmlPath !== null) {
          console.log(`Report: ${result.artifacts.htmlPath}`);
        }
      } catch (error) {
        handleCliError(error);
      }
    });
}

export async function runEvaluateCommand(options: EvaluateCommandOptions): Promise<PipelineResult> {
  if (
    !allInputsSelected({
      datasetRoot: options.dataset,
      outputDir: options.out,
      predictions: options.predictions,
    })
  ) {
    throw new ConfigError('--dataset, --out and --predictions must all be non-empty');
  }

  const config = resolveEvalConfig(options);
  const pipeline = new EvaluationPipeline({
    classifier: loadPredictionTable(options.predictions),
    title: config.title,
    sampleCount: config.sampleCount,
    seed: config.seed,
    maxConcurrency: config.maxConcurrency,
    extensions: config.extensions,
  });
  return pipeline.run(options.dataset, options.out);
}

/**
 * Config file values (or the defaults), overridden by any flags given.
 */
export function resolveEvalConfig(options: EvaluateCommandOptions): EvalConfig {
  const base = options.config !== undefined ? loadConfigFromFile(options.config) : defaultEvalConfig;
  const flags = {
    title: options.title,
    sampleCount: options.samples,
    seed: options.seed,
    maxConcurrency: options.concurrency,
  };
  const overrides = Object.fromEntries(Object.entries(flags).filter(([, v]) => v !== undefined));
  return loadConfigFromObject({ ...base, ...overrides });
}
