import { PipelineConfigurationError, UnknownActionError } from './errors.js';
import type { Logger, StepAction } from './types/index.js';

/**
 * Named step actions that pipeline definitions refer to by name.
 * Each pipeline loader gets its own registry; there is no global one.
 */
export class ActionRegistry {
  private readonly actions = new Map<string, StepAction>();

  constructor(private readonly logger?: Logger) {}

  /**
   * Register an action under a name.
   * @throws PipelineConfigurationError if the name is already taken
   */
  register(name: string, action: StepAction): this {
    if (this.actions.has(name)) {
      throw new PipelineConfigurationError(`Action '${name}' is already registered`, 'INVALID_DEFINITION', { action: name });
    }
    this.actions.set(name, action);
    this.logger?.debug(`Registered action: ${name}`);
    return this;
  }

  /**
   * Register several actions at once.
   */
  registerAll(actions: Record<string, StepAction>): this {
    for (const [name, action] of Object.entries(actions)) {
      this.register(name, action);
    }
    return this;
  }

  get(name: string): StepAction | undefined {
    return this.actions.get(name);
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  names(): string[] {
    return [...this.actions.keys()];
  }

  /**
   * Look up an action that must exist.
   * @throws UnknownActionError
   */
  resolve(name: string): StepAction {
    const action = this.actions.get(name);
    if (!action) {
      throw new UnknownActionError(name, this.names());
    }
    return action;
  }
}
