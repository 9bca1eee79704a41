import { rmSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FunctionClassifier, predictLabel } from '../src/classifier/port.js';
import {
  loadPredictionTable,
  parsePredictions,
  PredictionTableClassifier,
} from '../src/classifier/prediction-table.js';
import { ConfigError, InferenceError } from '../src/errors.js';
import { makeTempDir } from './helpers.js';

describe('predictLabel', () => {
  it('returns the label of a sync or async classifier', async () => {
    expect(await predictLabel(new FunctionClassifier(() => 'rose'), 'a.jpg')).toBe('rose');
    expect(await predictLabel(new FunctionClassifier(async () => 'tulip'), 'a.jpg')).toBe('tulip');
  });

  it('wraps thrown errors in an InferenceError', async () => {
    const classifier = new FunctionClassifier(() => {
      throw new Error('model not loaded');
    });
    const error = await predictLabel(classifier, 'a.jpg').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InferenceError);
    expect(error).toMatchObject({
      imagePath: 'a.jpg',
      code: 'INFERENCE',
      message: "Inference failed for 'a.jpg': Error: model not loaded",
    });
  });

  it('passes an InferenceError through unchanged', async () => {
    const original = new InferenceError('a.jpg', new Error('timeout'));
    const classifier = new FunctionClassifier(() => {
      throw original;
    });
    await expect(predictLabel(classifier, 'a.jpg')).rejects.toBe(original);
  });

  it('rejects an empty label', async () => {
    await expect(predictLabel(new FunctionClassifier(() => ''), 'a.jpg')).rejects.toThrow(
      `Inference failed for 'a.jpg': TypeError: Classifier returned "" instead of a label`,
    );
  });
});

describe('PredictionTableClassifier', () => {
  it('looks up predictions by resolved path', () => {
    const classifier = new PredictionTableClassifier([['rose/a.jpg', 'tulip']], '/data');
    expect(classifier.size).toBe(1);
    expect(classifier.predict('/data/rose/a.jpg')).toBe('tulip');
    expect(classifier.predict('/data/./rose/../rose/a.jpg')).toBe('tulip');
  });

  it('resolves relative keys against the working directory by default', () => {
    const classifier = new PredictionTableClassifier([['rose/a.jpg', 'rose']]);
    expect(classifier.predict(resolve('rose/a.jpg'))).toBe('rose');
  });

  it('raises an InferenceError for an unknown image', () => {
    const classifier = new PredictionTableClassifier([], '/data');
    expect(() => classifier.predict('/data/x.jpg')).toThrow(
      "Inference failed for '/data/x.jpg': Error: no prediction recorded for this image",
    );
  });
});

describe('parsePredictions', () => {
  it('parses YAML', () => {
    const content = 'predictions:\n  rose/a.jpg: rose\n  tulip/b.jpg: rose\n';
    expect(parsePredictions(content, 'yaml')).toEqual([
      ['rose/a.jpg', 'rose'],
      ['tulip/b.jpg', 'rose'],
    ]);
  });

  it('parses JSON', () => {
    const content = JSON.stringify({ predictions: { 'a.png': 'daisy' } });
    expect(parsePredictions(content, 'json')).toEqual([['a.png', 'daisy']]);
  });

  it('parses CSV with and without a header', () => {
    expect(parsePredictions('imagePath,label\nrose/a.jpg,rose\n', 'csv')).toEqual([['rose/a.jpg', 'rose']]);
    expect(parsePredictions('a,b.jpg, tulip\r\n\r\nc.jpg,rose', 'csv')).toEqual([
      ['a,b.jpg', 'tulip'],
      ['c.jpg', 'rose'],
    ]);
  });

  it('rejects malformed CSV lines', () => {
    expect(() => parsePredictions('a.jpg,rose\nno-label-here\n', 'csv')).toThrow(
      "Invalid predictions file: line 2: expected 'imagePath,label'",
    );
  });

  it('rejects files that do not match the schema', () => {
    expect(() => parsePredictions('predictions:\n  a.jpg: ""\n', 'yaml')).toThrow(ConfigError);
    expect(() => parsePredictions('{"preds": {}}', 'json')).toThrow('Invalid predictions file');
  });

  it('rejects unparseable JSON', () => {
    expect(() => parsePredictions('{', 'json')).toThrow('Predictions file is not valid JSON');
  });
});

describe('loadPredictionTable', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('resolves entries against the file location', () => {
    const file = join(dir, 'predictions.csv');
    writeFileSync(file, 'imagePath,label\nrose/a.jpg,tulip\n');
    const classifier = loadPredictionTable(file);
    expect(classifier.predict(join(dir, 'rose', 'a.jpg'))).toBe('tulip');
  });

  it('infers the format from the extension', () => {
    const file = join(dir, 'predictions.yml');
    writeFileSync(file, 'predictions:\n  x.jpg: rose\n');
    expect(loadPredictionTable(file).size).toBe(1);
    expect(() => loadPredictionTable(join(dir, 'predictions.txt'))).toThrow(
      'Could not infer predictions format',
    );
  });

  it('reports a missing file as a ConfigError', () => {
    const file = join(dir, 'missing.json');
    expect(() => loadPredictionTable(file)).toThrow(`Cannot read predictions file '${file}'`);
  });
});
