/**
 * Class-stratified train/val/test split.
 *
 * Ratios are applied independently within each class so class balance is kept
 * in every subset: train = floor(n * train), val = floor(n * val), and test
 * takes the rest. Small classes may end up with empty subsets.
 */

import { copyFile, mkdir, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { ConfigError, SplitIOError } from '../errors.js';
import { emitEvent, type StageEvent, withStageEvents } from '../events.js';
import { createSeededRandom, randomSeed, shuffle } from '../random.js';
import type { ClassLabel, Sample } from '../types.js';
import { groupByClass } from './indexer.js';

export const DEFAULT_SPLIT_RATIOS: SplitRatios = { train: 0.6, val: 0.2 };

export type SplitSubset = 'train' | 'val' | 'test';

export interface SplitRatios {
  train: number;
  val: number;
}

export interface SplitDestinations {
  train: string;
  val: string;
  test: string;
}

export interface SplitOptions {
  /** Seed for the per-class shuffle. A random seed is drawn when omitted. */
  seed?: number;
  ratios?: Partial<SplitRatios>;
}

export interface SplitAssignment {
  className: ClassLabel;
  train: Sample[];
  val: Sample[];
  test: Sample[];
}

export interface SplitPlan {
  seed: number;
  assignments: SplitAssignment[];
}

export interface CopiedFile {
  subset: SplitSubset;
  source: string;
  destination: string;
}

export interface SplitResult extends SplitPlan {
  copied: CopiedFile[];
  failures: SplitIOError[];
  events: StageEvent[];
}

const SUBSETS: readonly SplitSubset[] = ['train', 'val', 'test'];

/**
 * Validate and fill in split ratios.
 */
export function resolveRatios(ratios?: Partial<SplitRatios>): SplitRatios {
  const resolved: SplitRatios = {
    train: ratios?.train ?? DEFAULT_SPLIT_RATIOS.train,
    val: ratios?.val ?? DEFAULT_SPLIT_RATIOS.val,
  };
  const issues: string[] = [];
  for (const [name, value] of Object.entries(resolved)) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      issues.push(`${name} ratio must be within [0, 1], got ${value}`);
    }
  }
  if (resolved.train + resolved.val > 1) {
    issues.push(`train + val ratios must not exceed 1, got ${resolved.train + resolved.val}`);
  }
  if (issues.length > 0) {
    throw new ConfigError('Invalid split ratios', issues);
  }
  return resolved;
}

/**
 * Subset sizes for a class of `total` samples.
 */
export function splitCounts(
  total: number,
  ratios: SplitRatios = DEFAULT_SPLIT_RATIOS,
): Record<SplitSubset, number> {
  const train = Math.floor(total * ratios.train);
  const val = Math.floor(total * ratios.val);
  return { train, val, test: total - train - val };
}

/**
 * Decide, without touching the filesystem, which subset every sample goes to.
 */
export function planSplit(samples: readonly Sample[], opts?: SplitOptions): SplitPlan {
  const ratios = resolveRatios(opts?.ratios);
  const seed = opts?.seed ?? randomSeed();
  const random = createSeededRandom(seed);

  const assignments: SplitAssignment[] = [];
  for (const [className, classSamples] of groupByClass(samples)) {
    const shuffled = shuffle(classSamples, random);
    const counts = splitCounts(shuffled.length, ratios);
    assignments.push({
      className,
      train: shuffled.slice(0, counts.train),
      val: shuffled.slice(counts.train, counts.train + counts.val),
      test: shuffled.slice(counts.train + counts.val),
    });
  }
  return { seed, assignments };
}

/**
 * Split samples and copy each image to `{destRoot}/{className}/{imageName}`.
 *
 * Destinations are expected to be empty. Directory and copy failures are
 * recorded as SplitIOErrors and the split continues with the remaining files.
 */
export async function splitDataset(
  samples: readonly Sample[],
  destinations: SplitDestinations,
  opts?: SplitOptions,
): Promise<SplitResult> {
  const plan = planSplit(samples, opts);

  const { result, events } = await withStageEvents('split', async () => {
    const copied: CopiedFile[] = [];
    const failures: SplitIOError[] = [];

    for (const assignment of plan.assignments) {
      for (const subset of SUBSETS) {
        const members = assignment[subset];
        if (members.length === 0) {
          emitEvent('warn', 'Empty subset for class', {
            className: assignment.className,
            subset,
            classSize: assignment.train.length + assignment.val.length + assignment.test.length,
          });
        }

        const classDir = join(destinations[subset], assignment.className);
        try {
          await mkdir(classDir, { recursive: true });
        } catch (e) {
          const failure = new SplitIOError(classDir, e);
          failures.push(failure);
          emitEvent('error', failure.message, { path: classDir, subset });
          continue;
        }

        for (const sample of members) {
          const destination = join(classDir, basename(sample.imagePath));
          try {
            await copyFile(sample.imagePath, destination);
            copied.push({ subset, source: sample.imagePath, destination });
          } catch (e) {
            const failure = new SplitIOError(sample.imagePath, e);
            failures.push(failure);
            emitEvent('error', failure.message, { path: sample.imagePath, destination, subset });
          }
        }
      }
    }

    emitEvent('info', 'Dataset split', {
      seed: plan.seed,
      classes: plan.assignments.length,
      copied: copied.length,
      failed: failures.length,
    });
    return { copied, failures };
  });

  return { ...plan, ...result, events };
}

/**
 * Remove and recreate the three split roots so that splitDataset starts from
 * empty destinations.
 */
export async function clearSplitDestinations(destinations: SplitDestinations): Promise<void> {
  for (const subset of SUBSETS) {
    await rm(destinations[subset], { recursive: true, force: true });
    await mkdir(destinations[subset], { recursive: true });
  }
}

/**
 * `{root}/train`, `{root}/val` and `{root}/test`, or custom directory names.
 */
export function splitDestinationsUnder(
  root: string,
  names: SplitDestinations = { train: 'train', val: 'val', test: 'test' },
): SplitDestinations {
  return {
    train: join(root, names.train),
    val: join(root, names.val),
    test: join(root, names.test),
  };
}
