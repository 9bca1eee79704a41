/**
 * Split CLI Command
 *
 * Copies a labeled dataset into stratified train/val/test folders.
 */

import type { Command } from 'commander';
import { loadConfigFromFile } from '../../config/index.js';
import { indexDataset } from '../../dataset/indexer.js';
import {
  clearSplitDestinations,
  type SplitResult,
  splitDataset,
  splitDestinationsUnder,
} from '../../dataset/splitter.js';
import { ConfigError } from '../../errors.js';
import { allInputsSelected } from '../../pipeline.js';
import { renderSplitSummary } from '../../reporting/renderer.js';
import { handleCliError } from '../utils/errors.js';
import { parseInteger } from '../utils/options.js';

export type SplitCommandOptions = {
  dataset: string;
  dest: string;
  seed?: number;
  clear?: boolean;
  config?: string;
};

export function addSplitCommand(program: Command): void {
  program
    .command('split')
    .description('Split a labeled image folder into train/, val/ and test/')
    .requiredOption('--dataset <dir>', 'Dataset root with one folder per class')
    .requiredOption('--dest <dir>', 'Directory that receives train/, val/ and test/')
    .option('--seed <n>', 'Seed for the per-class shuffle', parseInteger)
    .option('--clear', 'Empty the destination folders first', false)
    .option('--config <file>', 'Config file whose split ratios and extensions apply (.yaml or .json)')
    .action(async (_options: unknown, cmd: Command) => {
      try {
        const result = await runSplitCommand(cmd.opts<SplitCommandOptions>());
        console.log(renderSplitSummary(result));
        if (result.failures.length > 0) {
          console.error(`${result.failures.length} file(s) could not be copied`);
        }
      } catch (error) {
        handleCliError(error);
      }
    });
}

export async function runSplitCommand(options: SplitCommandOptions): Promise<SplitResult> {
  if (!allInputsSelected({ datasetRoot: options.dataset, outputDir: options.dest })) {
    throw new ConfigError('--dataset and --dest must both be non-empty');
  }
  const config = options.config ? loadConfigFromFile(options.config) : undefined;
  const destinations = splitDestinationsUnder(options.dest);
  const samples = await indexDataset(options.dataset, { extensions: config?.extensions });
  if (options.clear) {
    await clearSplitDestinations(destinations);
  }
  return splitDataset(samples, destinations, {
    seed: options.seed ?? config?.seed,
    ratios: config?.split,
  });
}
