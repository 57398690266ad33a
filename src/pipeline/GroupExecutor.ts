import type { Outcome } from '../outcome.js';
import type { Concurrency, Logger, PipelineStep } from '../types/index.js';
import { mergeOutcomes, stepLabel } from './utils.js';

/**
 * Configuration for group execution.
 */
export interface GroupExecutorConfig {
  concurrency: Concurrency;
  logger: Logger;
}

/**
 * Runs a group of mutually independent steps against one input outcome and
 * merges what they return. Holds no state beyond its configuration.
 */
export class GroupExecutor {
  private readonly config: GroupExecutorConfig;

  constructor(config: GroupExecutorConfig) {
    this.config = config;
  }

  get concurrency(): Concurrency {
    return this.config.concurrency;
  }

  /**
   * Run every step of the group against `input`.
   *
   * A single step is invoked directly. Larger groups wait for every member
   * to settle, whatever the others did, then rethrow the first fault in
   * declaration order or merge the outcomes in declaration order.
   */
  async runGroup(steps: readonly PipelineStep[], input: Outcome): Promise<Outcome> {
    if (steps.length === 0) {
      return input;
    }
    if (steps.length === 1) {
      return steps[0].run(input);
    }

    const labels = steps.map(stepLabel).join(', ');
    this.config.logger.debug(`Running group [${labels}] (${this.config.concurrency})`);

    const settled = this.config.concurrency === 'sequential'
      ? await this.settleSequentially(steps, input)
      : await Promise.allSettled(steps.map(step => invoke(step, input)));

    const outcomes: Outcome[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        throw result.reason;
      }
      outcomes.push(result.value);
    }

    const merged = mergeOutcomes(outcomes, input);
    this.config.logger.debug(
      `Group [${labels}] finished (continue=${merged.shouldContinue()})`
    );
    return merged;
  }

  /**
   * Fallback path: one member at a time, same settle-then-merge contract.
   */
  private async settleSequentially(
    steps: readonly PipelineStep[],
    input: Outcome
  ): Promise<PromiseSettledResult<Outcome>[]> {
    const settled: PromiseSettledResult<Outcome>[] = [];
    for (const step of steps) {
      try {
        settled.push({ status: 'fulfilled', value: await invoke(step, input) });
      } catch (reason) {
        settled.push({ status: 'rejected', reason });
      }
    }
    return settled;
  }
}

// async so that a synchronous throw becomes a rejection
async function invoke(step: PipelineStep, input: Outcome): Promise<Outcome> {
  return step.run(input);
}
