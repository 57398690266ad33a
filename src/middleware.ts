/**
 * Step middleware: wrap an action in another action with the same contract.
 *
 * Middleware is applied once, when a pipeline is built. The first middleware
 * registered becomes the outermost wrapper.
 */

import ms from 'ms';
import type { Logger, Middleware, StepFunction, StepInfo } from './types/index.js';
import { stepLabel } from './pipeline/utils.js';

/**
 * Wrap `action` with every middleware, first registered outermost.
 */
export function applyMiddleware(action: StepFunction, info: StepInfo, middleware: readonly Middleware[]): StepFunction {
  return middleware.reduceRight<StepFunction>((wrapped, wrap) => wrap(wrapped, info), action);
}

/**
 * Log step start, completion and halts.
 */
export function loggingMiddleware(logger: Logger): Middleware {
  return (action, info) => async (input) => {
    const label = stepLabel(info);
    logger.debug(`Step ${label} started`);
    const output = await action(input);
    if (output.shouldContinue()) {
      logger.info(`Step ${label} completed`);
    } else {
      logger.warn(`Step ${label} halted`, output.errors);
    }
    return output;
  };
}

export interface InstrumentationOptions {
  logger: Logger;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Log how long each step took, e.g. `Step fetch_user took 12ms`.
 * Faulting steps are timed too before the fault propagates.
 */
export function instrumentationMiddleware({ logger, now = Date.now }: InstrumentationOptions): Middleware {
  return (action, info) => async (input) => {
    const label = stepLabel(info);
    const startedAt = now();
    try {
      return await action(input);
    } finally {
      logger.info(`Step ${label} took ${ms(now() - startedAt)}`);
    }
  };
}

/**
 * Record which step halted the pipeline under a context key.
 */
export function haltTrackingMiddleware(key = 'haltedStep'): Middleware {
  return (action, info) => async (input) => {
    const output = await action(input);
    return output.shouldContinue() ? output : output.withContext(key, stepLabel(info));
  };
}
