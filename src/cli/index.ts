#!/usr/bin/env node
// CLI entry point for classifier-evals

import { handleCliError } from './utils/errors.js';
import { runCli } from './program.js';

runCli(process.argv.slice(2)).catch(handleCliError);
