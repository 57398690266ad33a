/**
 * Pipeline options: validation, defaults and environment overrides.
 */

import { z } from 'zod';
import { PipelineConfigurationError } from './errors.js';
import { createLogger, LOG_LEVELS, type Logger } from './logger.js';

export const ConcurrencySchema = z.enum(['parallel', 'sequential']);

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Zod schema for the serializable part of the pipeline options.
 */
export const PipelineOptionsSchema = z.object({
  concurrency: ConcurrencySchema.optional(),
  logLevel: LogLevelSchema.optional(),
});

export type PipelineOptionsData = z.infer<typeof PipelineOptionsSchema>;

/** Options accepted by PipelineBuilder and buildPipeline */
export interface PipelineOptions extends PipelineOptionsData {
  /** Overrides the console logger built from `logLevel` */
  logger?: Logger;
}

export interface ResolvedPipelineOptions {
  concurrency: z.infer<typeof ConcurrencySchema>;
  logger: Logger;
}

/** Environment variables read by resolvePipelineOptions */
export const ENV_CONCURRENCY = 'STEPGRAPH_CONCURRENCY';
export const ENV_LOG_LEVEL = 'STEPGRAPH_LOG_LEVEL';

/**
 * Apply defaults and environment overrides to pipeline options.
 * Explicit options win over the environment.
 *
 * @throws PipelineConfigurationError if a value is not recognised
 */
export function resolvePipelineOptions(
  options: PipelineOptions = {},
  env: Record<string, string | undefined> = process.env
): ResolvedPipelineOptions {
  const result = PipelineOptionsSchema.safeParse({
    concurrency: options.concurrency ?? env[ENV_CONCURRENCY],
    logLevel: options.logLevel ?? env[ENV_LOG_LEVEL],
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new PipelineConfigurationError(
      `Invalid pipeline options: ${issues.join('; ')}`,
      'INVALID_OPTIONS',
      { issues: result.error.issues }
    );
  }

  return {
    concurrency: result.data.concurrency ?? 'parallel',
    logger: options.logger ?? createLogger('stepgraph', result.data.logLevel ?? 'warn'),
  };
}
