import { PipelineConfigurationError } from '../errors.js';
import type { ResolvedPipelineOptions } from '../config.js';
import type { Outcome } from '../outcome.js';
import type { DependencyGraph } from '../toposort.js';
import type { ExecutionMode, ExecutionStrategy, PipelineStep, Stage } from '../types/index.js';
import { GroupExecutor } from './GroupExecutor.js';
import { Scheduler } from './Scheduler.js';

/**
 * The pieces a pipeline is assembled from. Steps are already wrapped in
 * their middleware.
 */
export interface PipelineParts {
  graph: DependencyGraph;
  steps: ReadonlyMap<string, PipelineStep>;
  stages: readonly Stage[];
  options: ResolvedPipelineOptions;
}

/**
 * A built pipeline: named steps driven by a dependency graph, or anonymous
 * stages folded in order. Immutable; merge and subgraph return new pipelines.
 */
export class Pipeline {
  private readonly parts: PipelineParts;
  private readonly scheduler: Scheduler;

  constructor(parts: PipelineParts) {
    this.parts = parts;
    this.scheduler = new Scheduler({
      graph: parts.graph,
      steps: parts.steps,
      stages: parts.stages,
      executor: new GroupExecutor(parts.options),
      logger: parts.options.logger,
    });
  }

  /**
   * 'dependency' when named steps exist, otherwise 'sequential'.
   * This is what call() uses.
   */
  get mode(): ExecutionMode {
    return this.parts.graph.isEmpty() ? 'sequential' : 'dependency';
  }

  get dependencyGraph(): DependencyGraph {
    return this.parts.graph;
  }

  get stages(): readonly Stage[] {
    return this.parts.stages;
  }

  /**
   * Named steps in declaration order.
   */
  get steps(): PipelineStep[] {
    return [...this.parts.steps.values()];
  }

  get optionalSteps(): string[] {
    return [...this.parts.steps].filter(([, step]) => step.optional).map(([name]) => name);
  }

  topologicalOrder(): string[] {
    return this.parts.graph.topologicalOrder();
  }

  levelOrder(): string[][] {
    return this.parts.graph.levelOrder();
  }

  reverseOrder(): string[] {
    return this.parts.graph.reverseOrder();
  }

  /**
   * Run in the mode reported by `mode`.
   */
  async call(input: Outcome): Promise<Outcome> {
    return this.mode === 'dependency'
      ? this.scheduler.runDependencies(input)
      : this.scheduler.runSequential(input);
  }

  /**
   * Fold the anonymous stages only.
   */
  async callSequential(input: Outcome): Promise<Outcome> {
    return this.scheduler.runSequential(input);
  }

  /**
   * Run with parallelism. 'auto' follows the dependency graph when there is
   * one; 'explicit' only parallelizes explicit parallel blocks.
   */
  async callParallel(input: Outcome, strategy: ExecutionStrategy = 'auto'): Promise<Outcome> {
    return strategy === 'explicit' ? this.scheduler.runSequential(input) : this.call(input);
  }

  /**
   * Combine two dependency-driven pipelines. Dependency lists of steps
   * declared in both are unioned; the action of this pipeline's step wins.
   */
  merge(other: Pipeline): Pipeline {
    this.assertDependencyDriven('merge');
    other.assertDependencyDriven('merge');

    const graph = this.parts.graph.merge(other.parts.graph);
    const steps = new Map([...other.parts.steps, ...this.parts.steps]);
    return this.derive(graph, graph.nodes().map(name => steps.get(name)));
  }

  /**
   * A pipeline holding only `name` and its transitive dependencies.
   */
  subgraph(name: string): Pipeline {
    this.assertDependencyDriven('subgraph');

    const graph = this.parts.graph.subgraph(name);
    return this.derive(graph, graph.nodes().map(node => this.parts.steps.get(node)));
  }

  private derive(graph: DependencyGraph, steps: (PipelineStep | undefined)[]): Pipeline {
    const byName = new Map<string, PipelineStep>();
    for (const step of steps) {
      if (step?.name !== undefined) {
        byName.set(step.name, { ...step, dependencies: graph.dependenciesOf(step.name) });
      }
    }
    return new Pipeline({ graph, steps: byName, stages: [], options: this.parts.options });
  }

  private assertDependencyDriven(operation: string): void {
    if (this.parts.stages.length > 0) {
      throw new PipelineConfigurationError(
        `Cannot ${operation}: pipeline has anonymous steps and no dependency graph`,
        'INVALID_DEFINITION'
      );
    }
  }
}
