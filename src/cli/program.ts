/**
 * CLI Main Program
 *
 * Commander.js program setup for the classifier-evals CLI.
 */

import { Command } from 'commander';
import { addEvaluateCommand } from './commands/evaluate.js';
import { addSplitCommand } from './commands/split.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('classifier-evals')
    .description('Evaluate image classifiers against labeled folder datasets')
    .version(VERSION);

  addEvaluateCommand(program);
  addSplitCommand(program);

  return program;
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
