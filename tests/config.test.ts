import { rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  defaultEvalConfig,
  loadConfigFromFile,
  loadConfigFromObject,
  loadConfigFromText,
} from '../src/config/index.js';
import { ConfigError } from '../src/errors.js';
import { makeTempDir } from './helpers.js';

describe('loadConfigFromText', () => {
  it('fills in defaults for an empty document', () => {
    expect(loadConfigFromText('')).toEqual({ sampleCount: 3, maxConcurrency: 1 });
    expect(defaultEvalConfig).toEqual({ sampleCount: 3, maxConcurrency: 1 });
  });

  it('parses YAML', () => {
    const config = loadConfigFromText(
      [
        'title: Flowers',
        'sampleCount: 5',
        'seed: 42',
        'maxConcurrency: 4',
        'extensions: [jpg, webp]',
        'split:',
        '  train: 0.7',
        '  val: 0.1',
      ].join('\n'),
    );
    expect(config).toEqual({
      title: 'Flowers',
      sampleCount: 5,
      seed: 42,
      maxConcurrency: 4,
      extensions: ['jpg', 'webp'],
      split: { train: 0.7, val: 0.1 },
    });
  });

  it('parses JSON', () => {
    expect(loadConfigFromText('{"sampleCount": 0}', 'json')).toEqual({ sampleCount: 0, maxConcurrency: 1 });
  });

  it('rejects unknown keys', () => {
    expect(() => loadConfigFromText('samples: 3')).toThrow(ConfigError);
  });

  it('lists every issue', () => {
    try {
      loadConfigFromObject({ sampleCount: -1, maxConcurrency: 0 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      const issues = e instanceof ConfigError ? e.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^sampleCount: /);
      expect(issues[1]).toMatch(/^maxConcurrency: /);
    }
  });

  it('rejects split ratios that add up to more than 1', () => {
    expect(() => loadConfigFromObject({ split: { train: 0.9 } })).toThrow(
      'train + val ratios must not exceed 1',
    );
  });

  it('rejects invalid syntax', () => {
    expect(() => loadConfigFromText('{', 'json')).toThrow('Config is not valid JSON');
    expect(() => loadConfigFromText('a: [1', 'yaml')).toThrow('Config is not valid YAML');
  });
});

describe('loadConfigFromFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('infers the format from the extension', () => {
    writeFileSync(join(dir, 'evals.yaml'), 'sampleCount: 2\n');
    writeFileSync(join(dir, 'evals.json'), '{"seed": 9}');
    expect(loadConfigFromFile(join(dir, 'evals.yaml')).sampleCount).toBe(2);
    expect(loadConfigFromFile(join(dir, 'evals.json')).seed).toBe(9);
  });

  it('rejects unknown extensions', () => {
    expect(() => loadConfigFromFile(join(dir, 'evals.toml'))).toThrow(
      "Could not infer format for filename 'evals.toml'",
    );
  });

  it('reports a missing file', () => {
    const path = join(dir, 'missing.yaml');
    expect(() => loadConfigFromFile(path)).toThrow(`Cannot read config file '${path}'`);
  });
});
