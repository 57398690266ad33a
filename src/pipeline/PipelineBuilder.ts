import { resolvePipelineOptions, type PipelineOptions } from '../config.js';
import { DuplicateStepError, PipelineConfigurationError } from '../errors.js';
import { applyMiddleware } from '../middleware.js';
import { DependencyGraph } from '../toposort.js';
import type { Middleware, PipelineStep, Stage, StepAction } from '../types/index.js';
import { Pipeline } from './Pipeline.js';
import { toStepFunction } from './utils.js';

export interface NamedStepOptions {
  /** Step or parallel-group names that must complete first */
  dependsOn?: readonly string[];
  /** Only run once a previous step activates it */
  optional?: boolean;
}

export interface ParallelGroupOptions {
  dependsOn?: readonly string[];
}

interface BlockEntry {
  name?: string;
  action: StepAction;
}

/**
 * Collects the members of a parallel block.
 */
export class ParallelBlockBuilder {
  readonly entries: BlockEntry[] = [];

  step(action: StepAction): this;
  step(name: string, action: StepAction): this;
  step(nameOrAction: string | StepAction, action?: StepAction): this {
    this.entries.push(typeof nameOrAction === 'string'
      ? { name: nameOrAction, action: requireAction(nameOrAction, action) }
      : { action: nameOrAction });
    return this;
  }
}

type Declaration =
  | { kind: 'named'; name: string; action: StepAction; dependsOn: readonly string[]; optional: boolean }
  | { kind: 'anonymous'; action: StepAction }
  | { kind: 'block'; actions: StepAction[] };

/**
 * Accumulates step declarations and middleware, then builds an immutable
 * Pipeline. Each build() produces an independent pipeline.
 *
 * @example
 * ```ts
 * const pipeline = new PipelineBuilder()
 *   .step('fetch_user', fetchUser)
 *   .step('fetch_orders', fetchOrders, { dependsOn: ['fetch_user'] })
 *   .step('fetch_preferences', fetchPreferences, { dependsOn: ['fetch_user'] })
 *   .build();
 *
 * pipeline.levelOrder(); // [['fetch_user'], ['fetch_orders', 'fetch_preferences']]
 * ```
 */
export class PipelineBuilder {
  private readonly declarations: Declaration[] = [];
  private readonly groups = new Map<string, string[]>();
  private readonly middleware: Middleware[] = [];
  private readonly options: PipelineOptions;

  constructor(options: PipelineOptions = {}) {
    this.options = options;
  }

  /**
   * Register middleware; the first registered wraps outermost.
   */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  /** Anonymous step, run in declaration order. */
  step(action: StepAction): this;
  /** Named step with optional dependencies. */
  step(name: string, action: StepAction, options?: NamedStepOptions): this;
  step(nameOrAction: string | StepAction, action?: StepAction, options: NamedStepOptions = {}): this {
    if (typeof nameOrAction !== 'string') {
      this.declarations.push({ kind: 'anonymous', action: nameOrAction });
      return this;
    }

    this.declarations.push({
      kind: 'named',
      name: nameOrAction,
      action: requireAction(nameOrAction, action),
      dependsOn: options.dependsOn ?? [],
      optional: options.optional ?? false,
    });
    return this;
  }

  /** Explicit parallel block between anonymous steps. */
  parallel(build: (block: ParallelBlockBuilder) => void): this;
  /**
   * Named parallel group. Every member inherits the group's dependencies,
   * and depending on the group name means depending on every member.
   */
  parallel(name: string, build: (block: ParallelBlockBuilder) => void, options?: ParallelGroupOptions): this;
  parallel(
    nameOrBuild: string | ((block: ParallelBlockBuilder) => void),
    build?: (block: ParallelBlockBuilder) => void,
    options: ParallelGroupOptions = {}
  ): this {
    const block = new ParallelBlockBuilder();

    if (typeof nameOrBuild !== 'string') {
      nameOrBuild(block);
      if (block.entries.some(entry => entry.name !== undefined)) {
        throw new PipelineConfigurationError(
          'Anonymous parallel blocks only take anonymous steps; use a named parallel group for named steps',
          'INVALID_DEFINITION'
        );
      }
      this.declarations.push({ kind: 'block', actions: block.entries.map(entry => entry.action) });
      return this;
    }

    const groupName = nameOrBuild;
    if (!build) {
      throw new PipelineConfigurationError(`Parallel group '${groupName}' must have a body`, 'INVALID_DEFINITION');
    }
    if (this.groups.has(groupName)) {
      throw new DuplicateStepError(groupName);
    }
    build(block);
    if (block.entries.length === 0) {
      throw new PipelineConfigurationError(`Parallel group '${groupName}' must contain at least one step`, 'INVALID_DEFINITION');
    }

    const members: string[] = [];
    for (const entry of block.entries) {
      if (entry.name === undefined) {
        throw new PipelineConfigurationError(
          `Parallel group '${groupName}' only takes named steps`,
          'INVALID_DEFINITION'
        );
      }
      members.push(entry.name);
      this.declarations.push({
        kind: 'named',
        name: entry.name,
        action: entry.action,
        dependsOn: options.dependsOn ?? [],
        optional: false,
      });
    }
    this.groups.set(groupName, members);
    return this;
  }

  /**
   * Validate the declarations and assemble the pipeline.
   *
   * @throws PipelineConfigurationError for duplicate names, mixed named and
   * anonymous steps, empty parallel blocks, unknown dependencies or cycles
   */
  build(): Pipeline {
    const options = resolvePipelineOptions(this.options);
    const named = this.declarations.filter(
      (declaration): declaration is Extract<Declaration, { kind: 'named' }> => declaration.kind === 'named'
    );

    if (named.length > 0 && named.length < this.declarations.length) {
      throw new PipelineConfigurationError(
        'Cannot mix named steps with anonymous steps or parallel blocks in one pipeline',
        'INVALID_DEFINITION'
      );
    }

    const dependencies = new Map<string, string[]>();
    for (const declaration of named) {
      if (dependencies.has(declaration.name)) {
        throw new DuplicateStepError(declaration.name);
      }
      if (this.groups.has(declaration.name)) {
        throw new PipelineConfigurationError(
          `Step name '${declaration.name}' is already used by a parallel group`,
          'INVALID_DEFINITION'
        );
      }
      dependencies.set(declaration.name, declaration.dependsOn.flatMap(dep => this.groups.get(dep) ?? [dep]));
    }

    const graph = new DependencyGraph(dependencies);

    let position = 0;
    const steps = new Map<string, PipelineStep>();
    const stages: Stage[] = [];

    for (const declaration of this.declarations) {
      switch (declaration.kind) {
        case 'named': {
          const info = { name: declaration.name, position: position++ };
          steps.set(declaration.name, {
            ...info,
            run: applyMiddleware(toStepFunction(declaration.action), info, this.middleware),
            dependencies: graph.dependenciesOf(declaration.name),
            optional: declaration.optional,
          });
          break;
        }
        case 'anonymous': {
          const info = { position: position++ };
          stages.push({ kind: 'step', step: this.anonymousStep(declaration.action, info) });
          break;
        }
        case 'block': {
          if (declaration.actions.length === 0) {
            throw new PipelineConfigurationError('Parallel block must contain at least one step', 'INVALID_DEFINITION');
          }
          stages.push({
            kind: 'parallel',
            steps: declaration.actions.map(action => this.anonymousStep(action, { position: position++ })),
          });
          break;
        }
      }
    }

    return new Pipeline({ graph, steps, stages, options });
  }

  private anonymousStep(action: StepAction, info: { position: number }): PipelineStep {
    return {
      ...info,
      run: applyMiddleware(toStepFunction(action), info, this.middleware),
      dependencies: [],
      optional: false,
    };
  }
}

function requireAction(name: string, action: StepAction | undefined): StepAction {
  if (!action) {
    throw new PipelineConfigurationError(`Named step '${name}' must have an action`, 'INVALID_DEFINITION');
  }
  return action;
}
