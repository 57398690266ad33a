/**
 * Dependency Graph and Topological Ordering
 *
 * Validates step dependencies and derives execution orders: a total
 * topological order, parallel levels, the reverse order for teardown, and
 * derived graphs (subgraph, merge). Detects cycles and undefined dependencies.
 */

import { DepGraph, DepGraphCycleError } from 'dependency-graph';
import { CyclicDependencyError, UnknownDependencyError } from './errors.js';

/**
 * Step name -> names of the steps it depends on.
 * `null` and `undefined` lists are treated as empty.
 */
export type DependencyInput =
  | Readonly<Record<string, readonly string[] | null | undefined>>
  | DependencyMap;

type DependencyMap = ReadonlyMap<string, readonly string[] | null | undefined>;

function isMapInput(input: DependencyInput): input is DependencyMap {
  return input instanceof Map;
}

/**
 * Immutable directed acyclic graph over step names.
 *
 * Uses the dependency-graph library to:
 * - Detect circular dependencies at construction
 * - Answer transitive dependency and dependant queries
 *
 * Orders are computed here so that ties always resolve in declaration order.
 */
export class DependencyGraph {
  private readonly edges: Map<string, string[]>;
  private readonly graph: DepGraph<undefined>;

  constructor(input: DependencyInput = {}) {
    const entries = isMapInput(input) ? [...input.entries()] : Object.entries(input);
    this.edges = new Map(entries.map(([name, deps]): [string, string[]] => [name, [...new Set<string>(deps ?? [])]]));
    this.graph = new DepGraph<undefined>();

    for (const name of this.edges.keys()) {
      this.graph.addNode(name);
    }

    for (const [name, deps] of this.edges) {
      for (const dep of deps) {
        if (!this.graph.hasNode(dep)) {
          throw new UnknownDependencyError(name, dep);
        }
        this.graph.addDependency(name, dep);
      }
    }

    try {
      this.graph.overallOrder();
    } catch (error) {
      if (error instanceof DepGraphCycleError) {
        throw new CyclicDependencyError(error.cyclePath);
      }
      throw error;
    }
  }

  /**
   * Raw edge mapping, copied.
   */
  get dependencies(): Record<string, string[]> {
    return Object.fromEntries([...this.edges].map(([name, deps]) => [name, [...deps]]));
  }

  get size(): number {
    return this.edges.size;
  }

  isEmpty(): boolean {
    return this.edges.size === 0;
  }

  has(name: string): boolean {
    return this.edges.has(name);
  }

  /**
   * Node names in declaration order.
   */
  nodes(): string[] {
    return [...this.edges.keys()];
  }

  /**
   * Direct dependencies of a node (empty for unknown nodes).
   */
  dependenciesOf(name: string): string[] {
    return [...(this.edges.get(name) ?? [])];
  }

  /**
   * All steps the given step depends on (direct + transitive).
   */
  transitiveDependenciesOf(name: string): Set<string> {
    if (!this.graph.hasNode(name)) {
      return new Set();
    }
    return new Set(this.graph.dependenciesOf(name));
  }

  /**
   * All steps that depend on the given step (direct + transitive).
   */
  dependentsOf(name: string): Set<string> {
    if (!this.graph.hasNode(name)) {
      return new Set();
    }
    return new Set(this.graph.dependantsOf(name));
  }

  /**
   * Every node after all of its dependencies. Among nodes that are ready at
   * the same time, the one declared first comes first.
   *
   * @throws CyclicDependencyError if no ready node remains
   */
  topologicalOrder(): string[] {
    const declared = this.nodes();
    const placed = new Set<string>();
    const order: string[] = [];

    while (order.length < declared.length) {
      const next = declared.find(
        name => !placed.has(name) && this.dependenciesOf(name).every(dep => placed.has(dep))
      );
      if (next === undefined) {
        throw new CyclicDependencyError(declared.filter(name => !placed.has(name)));
      }
      placed.add(next);
      order.push(next);
    }

    return order;
  }

  /**
   * Group nodes into levels that can run concurrently.
   *
   * Level i holds every node whose dependencies all sit in levels 0..i-1,
   * in declaration order. Nodes do not need identical dependency sets to
   * share a level.
   *
   * @throws CyclicDependencyError if a round places nothing
   */
  levelOrder(): string[][] {
    const remaining = this.nodes();
    const placed = new Set<string>();
    const levels: string[][] = [];

    while (remaining.length > 0) {
      const level = remaining.filter(name => this.dependenciesOf(name).every(dep => placed.has(dep)));
      if (level.length === 0) {
        throw new CyclicDependencyError(remaining);
      }
      for (const name of level) {
        placed.add(name);
        remaining.splice(remaining.indexOf(name), 1);
      }
      levels.push(level);
    }

    return levels;
  }

  /**
   * Exact reverse of topologicalOrder(), for teardown-style execution.
   */
  reverseOrder(): string[] {
    return this.topologicalOrder().reverse();
  }

  /**
   * The given node and everything it depends on, transitively.
   * An unknown node yields an empty graph.
   */
  subgraph(name: string): DependencyGraph {
    if (!this.has(name)) {
      return new DependencyGraph();
    }

    const closure = this.transitiveDependenciesOf(name).add(name);
    return new DependencyGraph(
      new Map([...this.edges].filter(([node]) => closure.has(node)))
    );
  }

  /**
   * Union of both graphs. A node declared in both keeps the union of its
   * dependency lists (this graph's entries first).
   *
   * @throws CyclicDependencyError if the union is cyclic
   */
  merge(other: DependencyGraph): DependencyGraph {
    const merged = new Map<string, string[]>();
    for (const name of [...this.nodes(), ...other.nodes()]) {
      merged.set(name, [...new Set([...this.dependenciesOf(name), ...other.dependenciesOf(name)])]);
    }
    return new DependencyGraph(merged);
  }
}
