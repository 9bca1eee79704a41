import { existsSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resolveEvalConfig, runEvaluateCommand } from '../src/cli/commands/evaluate.js';
import { runSplitCommand } from '../src/cli/commands/split.js';
import { createProgram } from '../src/cli/program.js';
import { formatCliError, handleCliError } from '../src/cli/utils/errors.js';
import { parseInteger } from '../src/cli/utils/options.js';
import { ConfigError, DatasetReadError } from '../src/errors.js';
import { makeTempDir, writeDataset } from './helpers.js';

describe('CLI', () => {
  let root: string;
  let dataset: string;
  let out: string;
  let predictions: string;

  beforeEach(() => {
    root = makeTempDir();
    dataset = join(root, 'dataset');
    out = join(root, 'out');
    predictions = join(root, 'predictions.csv');
    writeDataset(dataset, { rose: ['a.jpg', 'b.jpg'], tulip: ['c.jpg', 'd.jpg'] });
    writeFileSync(
      predictions,
      [
        'imagePath,label',
        'dataset/rose/a.jpg,rose',
        'dataset/rose/b.jpg,tulip',
        'dataset/tulip/c.jpg,tulip',
        'dataset/tulip/d.jpg,tulip',
      ].join('\n'),
    );
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('evaluate', () => {
    it('scores recorded predictions and prints the summary', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});

      await createProgram().parseAsync(
        ['evaluate', '--dataset', dataset, '--out', out, '--predictions', predictions, '--title', 'Flowers', '--seed', '1'],
        { from: 'user' },
      );

      expect(log).toHaveBeenCalledTimes(2);
      expect(String(log.mock.calls[0]![0])).toMatch(/^Evaluation Summary: Flowers\n/);
      expect(log.mock.calls[1]).toEqual([`Report: ${join(out, 'report.html')}`]);
      expect(readFileSync(join(out, 'confusion_matrix.csv'), 'utf-8')).toBe(
        'GroundTruth/Predicted,rose,tulip\nrose,1,1\ntulip,0,2\n',
      );
    });

    it('excludes images without a recorded prediction', async () => {
      writeDataset(dataset, { tulip: ['e.jpg'] });
      const result = await runEvaluateCommand({ dataset, out, predictions, samples: 0 });
      expect(result.sampleCount).toBe(4);
      expect(result.excludedCount).toBe(1);
      expect(readdirSync(join(out, 'samples'))).toEqual([]);
    });

    it('rejects empty inputs', async () => {
      await expect(runEvaluateCommand({ dataset, out: '', predictions })).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('resolveEvalConfig', () => {
    it('lets flags override the config file', () => {
      const config = join(root, 'evals.yaml');
      writeFileSync(config, 'title: From file\nsampleCount: 1\n');
      expect(resolveEvalConfig({ dataset, out, predictions, config, samples: 2 })).toEqual({
        title: 'From file',
        sampleCount: 2,
        maxConcurrency: 1,
      });
    });

    it('validates flag values', () => {
      expect(() => resolveEvalConfig({ dataset, out, predictions, concurrency: 0 })).toThrow(ConfigError);
    });
  });

  describe('split', () => {
    it('writes train, val and test folders and prints the counts', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const dest = join(root, 'split');

      await createProgram().parseAsync(['split', '--dataset', dataset, '--dest', dest, '--seed', '1'], {
        from: 'user',
      });

      expect(readdirSync(dest).sort()).toEqual(['test', 'train', 'val']);
      expect(readdirSync(join(dest, 'train', 'rose'))).toHaveLength(1);
      expect(readdirSync(join(dest, 'test', 'rose'))).toHaveLength(1);
      expect(String(log.mock.calls[0]![0]).split('\n')[0]).toBe('Split (seed 1)');
    });

    it('clears stale files when asked', async () => {
      const dest = join(root, 'split');
      writeDataset(join(dest, 'train'), { old: ['stale.jpg'] });

      await runSplitCommand({ dataset, dest, seed: 1, clear: true });

      expect(existsSync(join(dest, 'train', 'old'))).toBe(false);
      expect(readdirSync(join(dest, 'train')).sort()).toEqual(['rose', 'tulip']);
    });

    it('applies split ratios from a config file', async () => {
      const dest = join(root, 'split');
      const config = join(root, 'evals.yaml');
      writeFileSync(config, 'split:\n  train: 0.5\n  val: 0.5\n');

      const result = await runSplitCommand({ dataset, dest, seed: 1, config });

      expect(result.copied.filter((c) => c.subset === 'train')).toHaveLength(2);
      expect(result.copied.filter((c) => c.subset === 'val')).toHaveLength(2);
      expect(result.copied.filter((c) => c.subset === 'test')).toHaveLength(0);
      expect(readdirSync(join(dest, 'val', 'rose'))).toHaveLength(1);
      expect(readdirSync(join(dest, 'val', 'tulip'))).toHaveLength(1);
    });
  });

  describe('errors', () => {
    it('formats evaluation errors with code and details', () => {
      expect(formatCliError(new DatasetReadError('/d', 'no class folders found'))).toEqual({
        error: "Cannot read dataset at '/d': no class folders found",
        code: 'DATASET_READ',
        details: { path: '/d' },
      });
      expect(formatCliError(new Error('boom'))).toEqual({ error: 'boom', code: 'INTERNAL_ERROR' });
    });

    it('writes JSON to stderr and exits with code 1', () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
      const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit');
      });

      expect(() => handleCliError(new ConfigError('Invalid config', ['seed: Expected number']))).toThrow(
        'process.exit',
      );
      expect(exit).toHaveBeenCalledWith(1);
      expect(JSON.parse(String(stderr.mock.calls[0]![0]))).toEqual({
        error: 'Invalid config: seed: Expected number',
        code: 'CONFIG',
        details: { issues: ['seed: Expected number'] },
      });
    });
  });

  describe('parseInteger', () => {
    it('parses base-10 integers', () => {
      expect(parseInteger('12')).toBe(12);
      expect(parseInteger('-3')).toBe(-3);
    });

    it('rejects anything else', () => {
      expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
      expect(() => parseInteger('abc')).toThrow('Not an integer.');
    });
  });
});
