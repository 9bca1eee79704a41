/**
 * Walk a class-partitioned image folder into labeled samples.
 *
 * Layout: `root/{className}/{image}.{jpg|jpeg|png}`. Only immediate
 * subdirectories are classes; nested folders are not descended into.
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { DatasetReadError, describeCause } from '../errors.js';
import { emitEvent } from '../events.js';
import type { ClassLabel, Sample } from '../types.js';

export const DEFAULT_IMAGE_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png'];

export interface IndexOptions {
  /** Accepted file extensions, without the dot. Matched case-insensitively. */
  extensions?: readonly string[];
}

/**
 * Index every qualifying image under `root`.
 *
 * Samples are ordered by class name, then file name. A class folder with no
 * qualifying images contributes nothing and is reported as a warning.
 * Throws DatasetReadError if the root cannot be listed or holds no class folders.
 */
export async function indexDataset(root: string, opts?: IndexOptions): Promise<Sample[]> {
  const extensions = new Set(
    (opts?.extensions ?? DEFAULT_IMAGE_EXTENSIONS).map((e) => e.replace(/^\./, '').toLowerCase()),
  );

  const classNames = (await listDir(root))
    .filter((entry) => entry.isDirectory() && !isHidden(entry.name))
    .map((entry) => entry.name)
    .sort();

  if (classNames.length === 0) {
    throw new DatasetReadError(root, 'no class folders found');
  }

  const samples: Sample[] = [];
  for (const className of classNames) {
    const classDir = join(root, className);
    const images = (await listDir(classDir))
      .filter((entry) => entry.isFile() && !isHidden(entry.name) && hasExtension(entry.name, extensions))
      .map((entry) => entry.name)
      .sort();

    if (images.length === 0) {
      emitEvent('warn', 'Class folder has no images', { className, path: classDir });
    }
    for (const image of images) {
      samples.push({ imagePath: join(classDir, image), groundTruthLabel: className });
    }
  }

  emitEvent('info', 'Indexed dataset', {
    root,
    classes: classNames.length,
    samples: samples.length,
  });
  return samples;
}

/**
 * Group samples by ground-truth label, in sorted label order. Input order is
 * kept within each group.
 */
export function groupByClass<T extends Sample>(samples: readonly T[]): Map<ClassLabel, T[]> {
  const groups = new Map<ClassLabel, T[]>();
  const labels = [...new Set(samples.map((s) => s.groundTruthLabel))].sort();
  for (const label of labels) groups.set(label, []);
  for (const sample of samples) {
    groups.get(sample.groundTruthLabel)?.push(sample);
  }
  return groups;
}

async function listDir(path: string): Promise<Dirent[]> {
  try {
    return await readdir(path, { withFileTypes: true });
  } catch (e) {
    throw new DatasetReadError(path, describeCause(e), e);
  }
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

function hasExtension(name: string, extensions: Set<string>): boolean {
  const ext = extname(name).slice(1).toLowerCase();
  return ext !== '' && extensions.has(ext);
}
