import { afterEach, describe, it, expect, vi } from 'vitest';
import { resolvePipelineOptions } from '../src/config.js';
import { createLogger, formatLogLine } from '../src/logger.js';
import { PipelineConfigurationError } from '../src/errors.js';
import { createMockLogger } from './helpers/test-utils.js';

describe('resolvePipelineOptions', () => {
  it('defaults to parallel concurrency', () => {
    expect(resolvePipelineOptions({}, {}).concurrency).toBe('parallel');
  });

  it('reads concurrency from the environment', () => {
    expect(resolvePipelineOptions({}, { STEPGRAPH_CONCURRENCY: 'sequential' }).concurrency).toBe('sequential');
  });

  it('prefers explicit options over the environment', () => {
    const resolved = resolvePipelineOptions({ concurrency: 'parallel' }, { STEPGRAPH_CONCURRENCY: 'sequential' });

    expect(resolved.concurrency).toBe('parallel');
  });

  it('keeps an injected logger', () => {
    const logger = createMockLogger();

    expect(resolvePipelineOptions({ logger }, {}).logger).toBe(logger);
  });

  it('rejects an unknown environment value', () => {
    let caught: unknown;
    try {
      resolvePipelineOptions({}, { STEPGRAPH_LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PipelineConfigurationError);
    expect(caught instanceof PipelineConfigurationError && caught.code).toBe('INVALID_OPTIONS');
    expect(caught instanceof Error && caught.message).toMatch(/^Invalid pipeline options: logLevel: /);
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats lines with timestamp, level and scope', () => {
    const line = formatLogLine('warn', 'stepgraph', 'Step a halted', new Date('2024-01-02T03:04:05.000Z'));

    expect(line).toBe('[2024-01-02T03:04:05.000Z] [WARN] [stepgraph] Step a halted');
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('test', 'warn');

    logger.debug('hidden');
    logger.warn('shown', { step: 'a' });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/\[WARN\] \[test\] shown$/), { step: 'a' });
  });

  it('writes nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('test', 'silent').error('hidden');

    expect(error).not.toHaveBeenCalled();
  });
});
