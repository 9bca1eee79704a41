import { describe, expect, it } from 'vitest';
import { planSplit } from '../src/dataset/splitter.js';
import { computeMetrics } from '../src/metrics/engine.js';
import { renderSplitSummary, renderSummaryTable } from '../src/reporting/renderer.js';

// eslint-disable-next-line no-control-regex
const ANSI = /\u001b\[[0-9;]*m/g;

function plain(text: string): string[] {
  return text.replace(ANSI, '').split('\n');
}

const metrics = computeMetrics(['A', 'A', 'B', 'B'], ['A', 'B', 'B', 'B']);

describe('renderSummaryTable', () => {
  it('renders the summary, per-label and matrix tables', () => {
    const lines = plain(renderSummaryTable({ title: 'Flowers', metrics }));
    expect(lines[0]).toBe('Evaluation Summary: Flowers');
    expect(lines).toContain('│ Metric    │ Value  │');
    expect(lines).toContain('│ Accuracy  │ 0.5000 │');
    expect(lines).toContain('│ Precision │ 0.8333 │');
    expect(lines).toContain('│ Recall    │ 0.7500 │');
    expect(lines).toContain('│ F1 Score  │ 0.7333 │');
    expect(lines).toContain('│ Samples   │ 4      │');
    expect(lines).toContain('│ Excluded  │ 0      │');
    expect(lines).toContain('Per-Label Metrics');
    expect(lines).toContain('│ A     │ 1.0000    │ 0.5000 │ 0.6667 │ 2       │');
    expect(lines).toContain('Confusion Matrix');
    expect(lines).toContain('│ GT \\ Pred │ A │ B │');
    expect(lines).toContain('│ B         │ 0 │ 2 │');
  });

  it('shows the excluded share and the duration', () => {
    const lines = plain(renderSummaryTable({ title: 't', metrics, excludedCount: 1, duration: 0.25 }));
    expect(lines).toContain('│ Excluded  │ 1 (20.0%) │');
    expect(lines).toContain('│ Duration  │ 250.0ms   │');
  });

  it('can leave out the per-label and matrix tables', () => {
    const lines = plain(
      renderSummaryTable({ title: 't', metrics }, { includePerLabel: false, includeConfusionMatrix: false }),
    );
    expect(lines).not.toContain('Per-Label Metrics');
    expect(lines).not.toContain('Confusion Matrix');
  });
});

describe('renderSplitSummary', () => {
  it('lists subset sizes per class with totals', () => {
    const samples = [
      ...Array.from({ length: 5 }, (_, i) => ({ imagePath: `rose/${i}.jpg`, groundTruthLabel: 'rose' })),
      ...Array.from({ length: 10 }, (_, i) => ({ imagePath: `tulip/${i}.jpg`, groundTruthLabel: 'tulip' })),
    ];
    const lines = plain(renderSplitSummary(planSplit(samples, { seed: 4 })));
    expect(lines[0]).toBe('Split (seed 4)');
    expect(lines).toContain('│ Class │ Train │ Val │ Test │');
    expect(lines).toContain('│ rose  │ 3     │ 1   │ 1    │');
    expect(lines).toContain('│ tulip │ 6     │ 2   │ 2    │');
    expect(lines).toContain('│ Total │ 9     │ 3   │ 3    │');
  });
});
