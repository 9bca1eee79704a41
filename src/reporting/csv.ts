/**
 * Confusion matrix CSV: header `GroundTruth/Predicted,<labels...>`, then one
 * row of counts per ground-truth label.
 */

import type { ConfusionMatrix } from './analyses.js';

export const CSV_CORNER_HEADER = 'GroundTruth/Predicted';

export function renderConfusionMatrixCsv(cm: ConfusionMatrix): string {
  const lines = [[CSV_CORNER_HEADER, ...cm.classLabels].map(csvField).join(',')];
  cm.classLabels.forEach((label, i) => {
    const counts = cm.matrix[i] ?? [];
    lines.push([csvField(label), ...counts.map(String)].join(','));
  });
  return `${lines.join('\n')}\n`;
}

/**
 * Quote a field only when it holds a delimiter, quote or line break.
 */
function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
