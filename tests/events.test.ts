import { describe, expect, it, vi } from 'vitest';
import { emitEvent, withStageEvents } from '../src/events.js';
import { logger } from '../src/logger.js';

describe('withStageEvents', () => {
  it('collects events emitted inside the scope, including awaited helpers', async () => {
    const helper = async () => {
      await Promise.resolve();
      emitEvent('warn', 'from helper', { n: 1 });
    };
    const { result, events } = await withStageEvents('index', async () => {
      emitEvent('info', 'start');
      await helper();
      return 42;
    });

    expect(result).toBe(42);
    expect(events).toEqual([
      { stage: 'index', level: 'info', message: 'start', fields: {} },
      { stage: 'index', level: 'warn', message: 'from helper', fields: { n: 1 } },
    ]);
  });

  it('keeps nested scopes apart', async () => {
    const outer = await withStageEvents('outer', async () => {
      emitEvent('info', 'outer event');
      const inner = await withStageEvents('inner', async () => {
        emitEvent('error', 'inner event');
      });
      return inner.events;
    });

    expect(outer.events.map((e) => e.message)).toEqual(['outer event']);
    expect(outer.result.map((e) => [e.stage, e.message])).toEqual([['inner', 'inner event']]);
  });

  it('ignores events emitted outside any scope', async () => {
    emitEvent('info', 'nowhere');
    const { events } = await withStageEvents('empty', async () => undefined);
    expect(events).toEqual([]);
  });
});

describe('emitEvent', () => {
  it('reuses one child logger per stage', async () => {
    const child = vi.spyOn(logger, 'child');
    try {
      await withStageEvents('cached-stage', async () => {
        emitEvent('info', 'first');
        emitEvent('warn', 'second');
      });
      expect(child).toHaveBeenCalledTimes(1);
      expect(child).toHaveBeenCalledWith({ component: 'cached-stage' });
    } finally {
      child.mockRestore();
    }
  });
});
