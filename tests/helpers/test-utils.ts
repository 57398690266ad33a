import { vi } from 'vitest';
import type { Logger, LogLevel } from '../../src/logger.js';
import type { Outcome } from '../../src/outcome.js';
import type { StepFunction } from '../../src/types/index.js';

type LoggedLevel = Exclude<LogLevel, 'silent'>;

interface LogEntry {
  level: LoggedLevel;
  message: string;
  args: unknown[];
}

/**
 * In-memory Logger. `calls` keeps every entry in order; `messages(level)`
 * returns the messages logged at one level.
 */
export function createMockLogger(): Logger & {
  calls: LogEntry[];
  messages(level: LoggedLevel): string[];
} {
  const calls: LogEntry[] = [];
  const record = (level: LoggedLevel) => vi.fn((message: string, ...args: unknown[]) => {
    calls.push({ level, message, args });
  });

  return {
    calls,
    messages: (level) => calls.filter(entry => entry.level === level).map(entry => entry.message),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * A step that appends its name to `executed` before running `body`
 * (default: pass the value through).
 */
export function tracked(
  executed: string[],
  name: string,
  body: StepFunction = (input: Outcome) => input.continueWith(input.value)
): StepFunction {
  return (input) => {
    executed.push(name);
    return body(input);
  };
}

/**
 * Counts how many steps are in flight at once.
 */
export function concurrencyProbe(waitMs = 10) {
  let active = 0;
  const probe = {
    maxActive: 0,
    step: (async (input: Outcome) => {
      active++;
      probe.maxActive = Math.max(probe.maxActive, active);
      await delay(waitMs);
      active--;
      return input.continueWith(input.value);
    }) satisfies StepFunction,
  };
  return probe;
}
