/**
 * Copy a random handful of evaluated images, renamed with their ground truth
 * and prediction, for visual inspection.
 *
 * Copy failures are reported as warnings and in the result; they never throw.
 */

import { copyFile, mkdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { describeCause } from '../errors.js';
import { emitEvent, type StageEvent, withStageEvents } from '../events.js';
import { createSeededRandom, randomSeed, sampleWithoutReplacement } from '../random.js';
import type { EvaluatedSample } from '../types.js';

export const DEFAULT_SAMPLE_COUNT = 3;

export interface ExportOptions {
  /** Number of samples to export. Defaults to 3. */
  count?: number;
  /** Seed for the selection. A random seed is drawn when omitted. */
  seed?: number;
}

export interface ExportedSample {
  /** 1-based position in the export. */
  index: number;
  sample: EvaluatedSample;
  destination: string;
}

export interface ExportFailure {
  sample: EvaluatedSample;
  destination: string;
  error: string;
}

export interface ExportResult {
  seed: number;
  exported: ExportedSample[];
  failures: ExportFailure[];
  events: StageEvent[];
}

/**
 * `sample{N}_gt_{groundTruth}_pred_{predicted}.{ext}`, keeping the source
 * extension as-is.
 */
export function sampleFileName(index: number, sample: EvaluatedSample): string {
  const ext = extname(sample.imagePath);
  return `sample${index}_gt_${sample.groundTruthLabel}_pred_${sample.predictedLabel}${ext}`;
}

export async function exportSamples(
  samples: readonly EvaluatedSample[],
  outputDir: string,
  opts?: ExportOptions,
): Promise<ExportResult> {
  const count = opts?.count ?? DEFAULT_SAMPLE_COUNT;
  const seed = opts?.seed ?? randomSeed();
  const selected = sampleWithoutReplacement(samples, count, createSeededRandom(seed));

  const { result, events } = await withStageEvents('export', async () => {
    const exported: ExportedSample[] = [];
    const failures: ExportFailure[] = [];

    try {
      await mkdir(outputDir, { recursive: true });
    } catch (e) {
      emitEvent('warn', 'Cannot create sample folder', { path: outputDir, error: describeCause(e) });
    }

    for (const [i, sample] of selected.entries()) {
      const index = i + 1;
      const destination = join(outputDir, sampleFileName(index, sample));
      try {
        await copyFile(sample.imagePath, destination);
        exported.push({ index, sample, destination });
      } catch (e) {
        const error = describeCause(e);
        failures.push({ sample, destination, error });
        emitEvent('warn', 'Cannot export sample', { source: sample.imagePath, destination, error });
      }
    }

    emitEvent('info', 'Exported samples', {
      path: outputDir,
      requested: count,
      exported: exported.length,
      failed: failures.length,
    });
    return { exported, failures };
  });

  return { seed, ...result, events };
}
