/**
 * Centralized type exports for the pipeline engine.
 */

export type {
  StepFunction,
  ExecutableStep,
  StepAction,
  StepInfo,
  PipelineStep,
  Stage,
  Middleware,
  Concurrency,
  ExecutionStrategy,
  ExecutionMode,
} from './core.js';

export type { Logger, LogLevel } from '../logger.js';
