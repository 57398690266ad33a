import type { Outcome } from '../outcome.js';
import type { DependencyGraph } from '../toposort.js';
import { InvalidActivationError } from '../errors.js';
import type { Logger, PipelineStep, Stage } from '../types/index.js';
import type { GroupExecutor } from './GroupExecutor.js';

/**
 * Everything the scheduler drives.
 */
export interface SchedulerDefinition {
  graph: DependencyGraph;
  /** Named steps keyed by name, in declaration order */
  steps: ReadonlyMap<string, PipelineStep>;
  /** Anonymous steps and explicit parallel blocks */
  stages: readonly Stage[];
  executor: GroupExecutor;
  logger: Logger;
}

/**
 * Orchestrates execution: folds sequential stages, or walks the dependency
 * graph one level at a time. Every group is a barrier; a halted outcome stops
 * the run before the next stage or group starts.
 */
export class Scheduler {
  private readonly definition: SchedulerDefinition;
  private readonly optionalSteps: ReadonlySet<string>;

  constructor(definition: SchedulerDefinition) {
    this.definition = definition;
    this.optionalSteps = new Set(
      [...definition.steps].filter(([, step]) => step.optional).map(([name]) => name)
    );
  }

  /**
   * Fold the stages over the input, one at a time.
   */
  async runSequential(input: Outcome): Promise<Outcome> {
    const { executor, stages } = this.definition;
    let current = input;

    for (const stage of stages) {
      if (!current.shouldContinue()) {
        break;
      }
      current = stage.kind === 'step'
        ? await stage.step.run(current)
        : await executor.runGroup(stage.steps, current);
    }

    return current;
  }

  /**
   * Run the dependency graph level by level, feeding each merged outcome to
   * the next level.
   */
  async runDependencies(input: Outcome): Promise<Outcome> {
    if (this.optionalSteps.size > 0) {
      return this.runWithActivations(input);
    }

    const { graph, logger } = this.definition;
    const levels = graph.levelOrder();
    let current = input;

    for (const [index, level] of levels.entries()) {
      if (!current.shouldContinue()) {
        logger.debug(`Halted before level ${index + 1}/${levels.length}`);
        break;
      }
      logger.debug(`Level ${index + 1}/${levels.length}: ${level.join(', ')}`);
      current = await this.definition.executor.runGroup(level.map(name => this.stepNamed(name)), current);
      this.readActivations(current);
    }

    return current;
  }

  /**
   * Frontier scheduling for graphs with optional steps: after each group,
   * every step whose dependencies have all run, and which is either required
   * or activated, forms the next group. Steps downstream of an optional step
   * that never ran are never ready.
   */
  private async runWithActivations(input: Outcome): Promise<Outcome> {
    const { graph, logger } = this.definition;
    const completed = new Set<string>();
    let current = input;
    let activated = this.readActivations(current);

    while (current.shouldContinue()) {
      const ready = graph.nodes().filter(name =>
        !completed.has(name) &&
        (!this.optionalSteps.has(name) || activated.has(name)) &&
        graph.dependenciesOf(name).every(dep => completed.has(dep))
      );
      if (ready.length === 0) {
        break;
      }

      logger.debug(`Ready: ${ready.join(', ')}`);
      current = await this.definition.executor.runGroup(ready.map(name => this.stepNamed(name)), current);
      ready.forEach(name => completed.add(name));
      activated = this.readActivations(current);
    }

    return current;
  }

  /**
   * Validate the activations carried by an outcome.
   *
   * @throws InvalidActivationError for unknown or non-optional steps
   */
  private readActivations(outcome: Outcome): Set<string> {
    for (const name of outcome.activatedSteps) {
      if (!this.definition.graph.has(name)) {
        throw new InvalidActivationError(name, 'unknown');
      }
      if (!this.optionalSteps.has(name)) {
        throw new InvalidActivationError(name, 'not-optional');
      }
    }
    return new Set(outcome.activatedSteps);
  }

  private stepNamed(name: string): PipelineStep {
    const step = this.definition.steps.get(name);
    if (!step) {
      throw new Error(`No step registered for graph node '${name}'`);
    }
    return step;
  }
}
