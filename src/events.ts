/**
 * AsyncLocalStorage-based event collection for pipeline stages.
 *
 * Each stage runs inside withStageEvents(); emitEvent() calls made anywhere
 * below it (including inside awaited helpers) are appended to that stage's
 * event list and returned with the stage result, in addition to being logged.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { createComponentLogger } from './logger.js';

type StageLogger = ReturnType<typeof createComponentLogger>;

export type EventLevel = 'info' | 'warn' | 'error';

export interface StageEvent {
  stage: string;
  level: EventLevel;
  message: string;
  fields: Record<string, unknown>;
}

interface StageScope {
  stage: string;
  events: StageEvent[];
}

const stageStorage = new AsyncLocalStorage<StageScope>();
const stageLoggers = new Map<string, StageLogger>();

function loggerFor(stage: string): StageLogger {
  let stageLogger = stageLoggers.get(stage);
  if (stageLogger === undefined) {
    stageLogger = createComponentLogger(stage);
    stageLoggers.set(stage, stageLogger);
  }
  return stageLogger;
}

/**
 * Run a function within a new stage scope.
 * Returns the result along with the events emitted while it ran.
 */
export async function withStageEvents<T>(
  stage: string,
  fn: () => Promise<T>,
): Promise<{ result: T; events: StageEvent[] }> {
  const scope: StageScope = { stage, events: [] };
  const result = await stageStorage.run(scope, fn);
  return { result, events: scope.events };
}

/**
 * Record an event on the current stage and forward it to the logger.
 * Outside of a stage scope the event is only logged.
 */
export function emitEvent(
  level: EventLevel,
  message: string,
  fields: Record<string, unknown> = {},
): void {
  const scope = stageStorage.getStore();
  const stage = scope?.stage ?? 'default';
  scope?.events.push({ stage, level, message, fields });
  loggerFor(stage)[level](fields, message);
}

