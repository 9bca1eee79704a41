/**
 * Classifier backed by precomputed predictions.
 *
 * Lets an evaluation run over labels produced elsewhere (by any inference
 * engine) without loading a model in-process. Files are YAML, JSON or CSV:
 *
 * ```yaml
 * predictions:
 *   cats/001.jpg: cat
 *   dogs/002.jpg: cat
 * ```
 *
 * ```csv
 * imagePath,label
 * cats/001.jpg,cat
 * ```
 *
 * Relative paths resolve against the directory of the predictions file.
 */

import { readFileSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, describeCause, InferenceError } from '../errors.js';
import type { ClassLabel } from '../types.js';
import type { ClassifierPort } from './port.js';

export const predictionFileSchema = z
  .object({
    $schema: z.string().optional(),
    predictions: z.record(z.string(), z.string().min(1)),
  })
  .strict();

export type PredictionFile = z.infer<typeof predictionFileSchema>;

export type PredictionFormat = 'yaml' | 'json' | 'csv';

export class PredictionTableClassifier implements ClassifierPort {
  private readonly table: Map<string, ClassLabel>;

  /**
   * @param entries - image path to label; relative paths resolve against `baseDir`
   * @param baseDir - defaults to the current working directory
   */
  constructor(entries: Iterable<[string, ClassLabel]>, baseDir?: string) {
    this.table = new Map();
    for (const [path, label] of entries) {
      this.table.set(resolve(baseDir ?? '.', path), label);
    }
  }

  get size(): number {
    return this.table.size;
  }

  predict(imagePath: string): ClassLabel {
    const label = this.table.get(resolve(imagePath));
    if (label === undefined) {
      throw new InferenceError(imagePath, new Error('no prediction recorded for this image'));
    }
    return label;
  }
}

/**
 * Load a predictions file into a classifier.
 */
export function loadPredictionTable(path: string, fmt?: PredictionFormat): PredictionTableClassifier {
  const format = fmt ?? inferPredictionFormat(path);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Cannot read predictions file '${path}'`, [describeCause(e)]);
  }
  const entries = parsePredictions(content, format);
  return new PredictionTableClassifier(entries, dirname(resolve(path)));
}

/**
 * Parse predictions text into `[imagePath, label]` pairs.
 */
export function parsePredictions(content: string, fmt: PredictionFormat): [string, ClassLabel][] {
  if (fmt === 'csv') {
    return parsePredictionCsv(content);
  }
  let raw: unknown;
  try {
    raw = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  } catch (e) {
    throw new ConfigError(`Predictions file is not valid ${fmt.toUpperCase()}`, [describeCause(e)]);
  }
  const parsed = predictionFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid predictions file',
      parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`),
    );
  }
  return Object.entries(parsed.data.predictions);
}

function parsePredictionCsv(content: string): [string, ClassLabel][] {
  const rows: [string, ClassLabel][] = [];
  const lines = content.split(/\r?\n/);
  lines.forEach((line, i) => {
    if (line.trim() === '') return;
    const comma = line.lastIndexOf(',');
    if (comma <= 0 || comma === line.length - 1) {
      throw new ConfigError('Invalid predictions file', [`line ${i + 1}: expected 'imagePath,label'`]);
    }
    const imagePath = line.slice(0, comma).trim();
    const label = line.slice(comma + 1).trim();
    if (i === 0 && imagePath === 'imagePath' && label === 'label') return;
    rows.push([imagePath, label]);
  });
  return rows;
}

function inferPredictionFormat(path: string): PredictionFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  if (ext === '.csv') return 'csv';
  throw new ConfigError(`Could not infer predictions format for '${path}'; use .yaml, .json or .csv`);
}
