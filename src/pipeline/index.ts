/**
 * Pipeline Execution Module
 *
 * Builds pipelines from step declarations and runs them either as ordered
 * stages or as a dependency graph executed level by level.
 */

import { Outcome } from '../outcome.js';
import type { Pipeline } from './Pipeline.js';

/**
 * Run a pipeline against a raw value or an existing outcome.
 *
 * @param pipeline - Built pipeline
 * @param input - Initial value, wrapped in a fresh Outcome unless it already is one
 * @returns Final outcome; check `shouldContinue()` and `errors` to tell a halt from a normal finish
 */
export async function runPipeline(pipeline: Pipeline, input: unknown): Promise<Outcome> {
  return pipeline.call(input instanceof Outcome ? input : new Outcome(input));
}

export { Pipeline, type PipelineParts } from './Pipeline.js';
export { PipelineBuilder, ParallelBlockBuilder, type NamedStepOptions, type ParallelGroupOptions } from './PipelineBuilder.js';
export { Scheduler, type SchedulerDefinition } from './Scheduler.js';
export { GroupExecutor, type GroupExecutorConfig } from './GroupExecutor.js';
export { mergeOutcomes, toStepFunction, stepLabel } from './utils.js';
