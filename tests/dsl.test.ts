import { describe, it, expect } from 'vitest';
import {
  buildPipeline,
  definitionGraph,
  loadPipelineDefinition,
  parsePipelineDefinition,
  type PipelineDefinition,
} from '../src/loader.js';
import { ActionRegistry } from '../src/registry.js';
import {
  CyclicDependencyError,
  DuplicateStepError,
  PipelineConfigurationError,
  UnknownActionError,
  UnknownDependencyError,
} from '../src/errors.js';
import { Outcome } from '../src/outcome.js';
import { createMockLogger } from './helpers/test-utils.js';

const dslPath = new URL('../dsl/example.pipeline.yaml', import.meta.url).pathname;

const orderActions = (executed: string[]) => {
  const record = (name: string, body: (input: Outcome) => Outcome) => (input: Outcome) => {
    executed.push(name);
    return body(input);
  };

  return new ActionRegistry(createMockLogger()).registerAll({
    loadCustomer: record('loadCustomer', input => input.withContext('customer', input.value)),
    fetchOrders: record('fetchOrders', input => input.withContext('orders', 3)),
    fetchPreferences: record('fetchPreferences', input => input.withContext('channel', 'email')),
    summarise: record('summarise', input => {
      const next = input.continueWith(`${String(input.context.customer)}: ${String(input.context.orders)} orders`);
      return input.context.customer === 'vip-1' ? next.activate('notify_vip') : next;
    }),
    notifyVip: record('notifyVip', input => input.withContext('notified', true)),
  });
};

describe('DSL: example.pipeline.yaml', () => {
  it('loads and validates the definition', async () => {
    const def: PipelineDefinition = await loadPipelineDefinition(dslPath);

    expect(def.name).toBe('order-summary');
    expect(def.version).toBe('1.2.0');
    expect(def.concurrency).toBe('parallel');
    expect(def.steps).toHaveLength(4);
  });

  it('names unnamed group members after their action', async () => {
    const graph = definitionGraph(await loadPipelineDefinition(dslPath));

    expect(graph.levelOrder()).toEqual([
      ['load_customer', 'notify_vip'],
      ['fetch_orders', 'fetchPreferences'],
      ['summarise'],
    ]);
    expect(graph.dependenciesOf('summarise')).toEqual(['fetch_orders', 'fetchPreferences']);
  });

  it('runs against registered actions', async () => {
    const executed: string[] = [];
    const pipeline = buildPipeline(await loadPipelineDefinition(dslPath), orderActions(executed), {
      logger: createMockLogger(),
    });

    const result = await pipeline.call(new Outcome('c-7'));

    expect(pipeline.optionalSteps).toEqual(['notify_vip']);
    expect(executed).toEqual(['loadCustomer', 'fetchOrders', 'fetchPreferences', 'summarise']);
    expect(result.value).toBe('c-7: 3 orders');
    expect(result.context).toEqual({ customer: 'c-7', orders: 3, channel: 'email' });
  });

  it('runs the optional step once it is activated', async () => {
    const executed: string[] = [];
    const pipeline = buildPipeline(await loadPipelineDefinition(dslPath), orderActions(executed), {
      logger: createMockLogger(),
    });

    const result = await pipeline.call(new Outcome('vip-1'));

    expect(executed).toEqual(['loadCustomer', 'fetchOrders', 'fetchPreferences', 'summarise', 'notifyVip']);
    expect(result.context.notified).toBe(true);
  });

  it('reports a missing file with its path', async () => {
    const missing = new URL('../dsl/missing.pipeline.yaml', import.meta.url).pathname;

    await expect(loadPipelineDefinition(missing)).rejects.toThrow(`Failed to load pipeline from ${missing}`);
  });
});

describe('parsePipelineDefinition', () => {
  it('defaults the version', () => {
    const def = parsePipelineDefinition(`
name: minimal
steps:
  - action: first
`);

    expect(def.version).toBe('1.0.0');
    expect(def.concurrency).toBeUndefined();
  });

  it('rejects a definition without steps', () => {
    expect(() => parsePipelineDefinition('name: empty\nsteps: []\n')).toThrow(
      'Invalid pipeline definition: steps: Pipeline must contain at least one step'
    );
  });

  it('rejects a malformed version', () => {
    expect(() => parsePipelineDefinition('name: bad\nversion: "1.0"\nsteps:\n  - action: a\n')).toThrow(
      'Invalid pipeline definition: version: Must be semver format (e.g., 1.0.0)'
    );
  });

  it('rejects an unknown concurrency', () => {
    expect(() => parsePipelineDefinition('name: bad\nconcurrency: eager\nsteps:\n  - action: a\n')).toThrow(
      PipelineConfigurationError
    );
  });

  it('rejects dependencies on undefined steps', () => {
    const source = `
name: dangling
steps:
  - name: report
    action: report
    dependsOn: [fetch]
`;

    expect(() => parsePipelineDefinition(source)).toThrow(UnknownDependencyError);
  });

  it('rejects cyclic dependencies', () => {
    const source = `
name: loop
steps:
  - name: a
    action: a
    dependsOn: [b]
  - name: b
    action: b
    dependsOn: [a]
`;

    expect(() => parsePipelineDefinition(source)).toThrow(CyclicDependencyError);
  });

  it('reports malformed YAML as a configuration error', () => {
    let caught: unknown;
    try {
      parsePipelineDefinition('name: "unterminated\nsteps: []\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PipelineConfigurationError);
    expect(caught instanceof PipelineConfigurationError && caught.code).toBe('INVALID_DEFINITION');
    expect(caught instanceof Error && caught.message).toMatch(/^Invalid YAML: /);
  });

  it('rejects named and anonymous steps in one definition', () => {
    const source = `
name: mixed
steps:
  - name: first
    action: first
  - action: second
`;

    expect(() => parsePipelineDefinition(source)).toThrow(
      'Cannot mix named steps with anonymous steps or parallel blocks in one pipeline'
    );
  });

  it('rejects named members in an unnamed parallel block', () => {
    const source = `
name: block
steps:
  - action: start
  - parallel:
      - name: left
        action: left
      - action: right
`;

    expect(() => parsePipelineDefinition(source)).toThrow(
      'steps.1: anonymous parallel blocks only take anonymous steps; name the block to use named members'
    );
  });

  it('rejects a step that reuses a group member name', () => {
    const source = `
name: clash
steps:
  - name: fetch
    parallel:
      - action: orders
  - name: orders
    action: orders
`;

    expect(() => parsePipelineDefinition(source)).toThrow(DuplicateStepError);
  });
});

describe('buildPipeline', () => {
  it('fails on an unregistered action', () => {
    const def = parsePipelineDefinition('name: one\nsteps:\n  - name: only\n    action: ghost\n');
    const registry = new ActionRegistry().register('real', input => input);

    expect(() => buildPipeline(def, registry)).toThrow(UnknownActionError);
    expect(() => buildPipeline(def, registry)).toThrow("Action 'ghost' is not registered. Registered actions: real");
  });

  it('builds sequential pipelines from anonymous steps and blocks', async () => {
    const def = parsePipelineDefinition(`
name: sequence
steps:
  - action: start
  - parallel:
      - action: left
      - action: right
  - action: finish
`);
    const registry = new ActionRegistry().registerAll({
      start: input => input.withContext('started', true),
      left: input => input.withContext('left', 1),
      right: input => input.withContext('right', 2),
      finish: input => input.continueWith(Number(input.context.left) + Number(input.context.right)),
    });

    const pipeline = buildPipeline(def, registry, { logger: createMockLogger() });
    const result = await pipeline.call(new Outcome(0));

    expect(pipeline.mode).toBe('sequential');
    expect(result.value).toBe(3);
  });

  it('lets explicit concurrency override the definition', () => {
    const def = parsePipelineDefinition('name: one\nconcurrency: parallel\nsteps:\n  - name: only\n    action: a\n');
    const registry = new ActionRegistry().register('a', input => input);
    const middlewareCalls: string[] = [];

    const pipeline = buildPipeline(def, registry, {
      logger: createMockLogger(),
      concurrency: 'sequential',
      middleware: [(action, info) => {
        middlewareCalls.push(info.name ?? '');
        return action;
      }],
    });

    expect(pipeline.topologicalOrder()).toEqual(['only']);
    expect(middlewareCalls).toEqual(['only']);
  });
});

describe('ActionRegistry', () => {
  it('rejects a second registration under the same name', () => {
    const registry = new ActionRegistry().register('a', input => input);

    expect(() => registry.register('a', input => input)).toThrow("Action 'a' is already registered");
  });

  it('lists names in registration order', () => {
    const registry = new ActionRegistry().registerAll({ b: input => input, a: input => input });

    expect(registry.names()).toEqual(['b', 'a']);
    expect(registry.has('a')).toBe(true);
    expect(registry.get('missing')).toBeUndefined();
  });
});
