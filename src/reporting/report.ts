/**
 * Write report artifacts: the confusion matrix CSV and the HTML report.
 *
 * Every artifact is attempted independently; a failed write is recorded as a
 * ReportWriteError and the remaining artifacts are still written.
 */

import type { Dirent } from 'node:fs';
import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { extname, join, relative, sep } from 'node:path';
import { DEFAULT_IMAGE_EXTENSIONS } from '../dataset/indexer.js';
import { describeCause, ReportWriteError } from '../errors.js';
import { emitEvent, type StageEvent, withStageEvents } from '../events.js';
import type { MetricsReport } from '../types.js';
import { renderConfusionMatrixCsv } from './csv.js';
import { renderHtmlReport } from './html.js';

export const DEFAULT_CSV_FILE_NAME = 'confusion_matrix.csv';
export const DEFAULT_HTML_FILE_NAME = 'report.html';

export interface ReportInput {
  title?: string;
  metrics: MetricsReport;
  excludedCount?: number;
  /** Folder holding exported sample images. Missing or empty yields an empty gallery. */
  sampleFolder: string;
  /** Image extensions listed in the gallery. Defaults to jpg, jpeg and png. */
  extensions?: readonly string[];
}

export interface ReportFileNames {
  csv?: string;
  html?: string;
}

export interface ReportArtifacts {
  /** Path of the CSV, or null if it could not be written. */
  csvPath: string | null;
  /** Path of the HTML report, or null if it could not be written. */
  htmlPath: string | null;
  /** Image file names included in the gallery. */
  galleryImages: string[];
  failures: ReportWriteError[];
  events: StageEvent[];
}

export async function writeReport(
  input: ReportInput,
  outputDir: string,
  fileNames?: ReportFileNames,
): Promise<ReportArtifacts> {
  const csvFileName = fileNames?.csv ?? DEFAULT_CSV_FILE_NAME;
  const htmlFileName = fileNames?.html ?? DEFAULT_HTML_FILE_NAME;

  const { result, events } = await withStageEvents('report', async () => {
    const failures: ReportWriteError[] = [];

    try {
      await mkdir(outputDir, { recursive: true });
    } catch (e) {
      emitEvent('warn', 'Cannot create output folder', { path: outputDir, error: describeCause(e) });
    }

    const write = async (path: string, content: string): Promise<string | null> => {
      try {
        await writeFile(path, content, 'utf-8');
        emitEvent('info', 'Wrote report artifact', { path });
        return path;
      } catch (e) {
        const failure = new ReportWriteError(path, e);
        failures.push(failure);
        emitEvent('error', failure.message, { path });
        return null;
      }
    };

    const csv = renderConfusionMatrixCsv(input.metrics.confusionMatrix);
    const csvPath = await write(join(outputDir, csvFileName), csv);

    const galleryImages = await listGalleryImages(input.sampleFolder, input.extensions);
    const html = renderHtmlReport({
      title: input.title,
      metrics: input.metrics,
      excludedCount: input.excludedCount,
      csvFileName,
      sampleFolderPath: relative(outputDir, input.sampleFolder).split(sep).join('/'),
      sampleImages: galleryImages,
    });
    const htmlPath = await write(join(outputDir, htmlFileName), html);

    return { csvPath, htmlPath, galleryImages, failures };
  });

  return { ...result, events };
}

/**
 * Sorted image file names in the sample folder; empty if it does not exist.
 * Extensions match case-insensitively, with or without a leading dot.
 */
export async function listGalleryImages(
  folder: string,
  extensions: readonly string[] = DEFAULT_IMAGE_EXTENSIONS,
): Promise<string[]> {
  const accepted = new Set(extensions.map((e) => e.replace(/^\./, '').toLowerCase()));
  let entries: Dirent[];
  try {
    entries = await readdir(folder, { withFileTypes: true });
  } catch (e) {
    emitEvent('info', 'No sample folder; gallery left empty', { path: folder, error: describeCause(e) });
    return [];
  }
  return entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .filter((name) => accepted.has(extname(name).slice(1).toLowerCase()))
    .sort();
}
