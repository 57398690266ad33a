export { Outcome, type OutcomeInit } from './outcome.js';
export { DependencyGraph, type DependencyInput } from './toposort.js';
export {
  Pipeline,
  PipelineBuilder,
  ParallelBlockBuilder,
  Scheduler,
  GroupExecutor,
  mergeOutcomes,
  runPipeline,
  type NamedStepOptions,
  type ParallelGroupOptions,
} from './pipeline/index.js';
export {
  applyMiddleware,
  loggingMiddleware,
  instrumentationMiddleware,
  haltTrackingMiddleware,
  type InstrumentationOptions,
} from './middleware.js';
export { ActionRegistry } from './registry.js';
export {
  loadPipelineDefinition,
  parsePipelineDefinition,
  definitionGraph,
  buildPipeline,
  PipelineDefinitionSchema,
  type PipelineDefinition,
  type BuildPipelineOptions,
} from './loader.js';
export { resolvePipelineOptions, PipelineOptionsSchema, type PipelineOptions, type ResolvedPipelineOptions } from './config.js';
export { createLogger, formatLogLine } from './logger.js';
export * from './errors.js';
export type * from './types/index.js';
