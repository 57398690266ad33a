/**
 * Configuration errors raised while a pipeline or dependency graph is built.
 *
 * Step faults are never wrapped in these: an exception thrown by a step's
 * action reaches the caller as-is.
 */

export type ConfigurationErrorCode =
  | 'UNKNOWN_DEPENDENCY'
  | 'CYCLIC_DEPENDENCY'
  | 'DUPLICATE_STEP'
  | 'UNKNOWN_ACTION'
  | 'INVALID_ACTIVATION'
  | 'INVALID_DEFINITION'
  | 'INVALID_OPTIONS';

export class PipelineConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigurationErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineConfigurationError';
  }
}

export class UnknownDependencyError extends PipelineConfigurationError {
  constructor(
    public readonly step: string,
    public readonly dependency: string
  ) {
    super(`Step '${step}' depends on undefined step '${dependency}'`, 'UNKNOWN_DEPENDENCY', { step, dependency });
    this.name = 'UnknownDependencyError';
  }
}

export class CyclicDependencyError extends PipelineConfigurationError {
  /** Nodes on the detected cycle, first node repeated at the end when known. */
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Cyclic dependency detected: ${cycle.join(' -> ')}`, 'CYCLIC_DEPENDENCY', { cycle });
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

export class DuplicateStepError extends PipelineConfigurationError {
  constructor(public readonly step: string) {
    super(`Duplicate step name: ${step}`, 'DUPLICATE_STEP', { step });
    this.name = 'DuplicateStepError';
  }
}

export class UnknownActionError extends PipelineConfigurationError {
  constructor(
    public readonly action: string,
    available: string[]
  ) {
    super(
      `Action '${action}' is not registered. Registered actions: ${available.join(', ') || 'none'}`,
      'UNKNOWN_ACTION',
      { action, available }
    );
    this.name = 'UnknownActionError';
  }
}

export class InvalidActivationError extends PipelineConfigurationError {
  constructor(
    public readonly step: string,
    reason: 'unknown' | 'not-optional'
  ) {
    super(
      reason === 'unknown'
        ? `Cannot activate unknown step '${step}'`
        : `Cannot activate non-optional step '${step}'`,
      'INVALID_ACTIVATION',
      { step, reason }
    );
    this.name = 'InvalidActivationError';
  }
}
