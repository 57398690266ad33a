import type { Outcome } from '../outcome.js';

/**
 * A step action in function form.
 */
export type StepFunction = (input: Outcome) => Outcome | Promise<Outcome>;

/**
 * Any object exposing a single `execute` operation can act as a step.
 */
export interface ExecutableStep {
  execute(input: Outcome): Outcome | Promise<Outcome>;
}

export type StepAction = StepFunction | ExecutableStep;

/**
 * Identity handed to middleware when it wraps a step.
 */
export interface StepInfo {
  /** Step name; absent for anonymous sequential steps */
  name?: string;
  /** 0-based declaration index within the pipeline */
  position: number;
}

/**
 * A declared step after middleware has been applied.
 */
export interface PipelineStep extends StepInfo {
  run: StepFunction;
  dependencies: readonly string[];
  optional: boolean;
}

/**
 * A unit of sequential execution: one step, or an explicit parallel block.
 */
export type Stage =
  | { kind: 'step'; step: PipelineStep }
  | { kind: 'parallel'; steps: readonly PipelineStep[] };

/**
 * Wraps a step action. Must invoke the wrapped action exactly once per call.
 */
export type Middleware = (action: StepFunction, info: StepInfo) => StepFunction;

/**
 * How members of one group are invoked.
 * - 'parallel': all started before any is awaited
 * - 'sequential': awaited one after another, same merge result
 */
export type Concurrency = 'parallel' | 'sequential';

/**
 * Parallel execution strategy.
 * - 'auto': dependency graph when named steps exist, otherwise sequential stages
 * - 'explicit': sequential stages only; concurrency comes from explicit parallel blocks
 */
export type ExecutionStrategy = 'auto' | 'explicit';

export type ExecutionMode = 'dependency' | 'sequential';
