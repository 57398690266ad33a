/**
 * YAML Pipeline Loader
 *
 * Loads and validates pipeline definitions from YAML files, checks their
 * dependency graph, and builds runnable pipelines from them against an
 * ActionRegistry.
 */

import * as fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConcurrencySchema, type PipelineOptions } from './config.js';
import { DuplicateStepError, PipelineConfigurationError } from './errors.js';
import { PipelineBuilder } from './pipeline/PipelineBuilder.js';
import type { Pipeline } from './pipeline/Pipeline.js';
import type { ActionRegistry } from './registry.js';
import { DependencyGraph } from './toposort.js';
import type { Middleware } from './types/index.js';

/**
 * Zod schema for a single step entry.
 */
export const StepItemSchema = z.object({
  name: z.string().min(1).optional(),
  action: z.string().min(1),
  dependsOn: z.array(z.string().min(1)).optional(),
  optional: z.boolean().optional(),
}).strict();

/**
 * Zod schema for a member of a parallel block. In a named block, a member
 * without a name is named after its action.
 */
export const ParallelMemberSchema = z.object({
  name: z.string().min(1).optional(),
  action: z.string().min(1),
}).strict();

/**
 * Zod schema for a parallel block; named blocks become parallel groups.
 */
export const ParallelItemSchema = z.object({
  name: z.string().min(1).optional(),
  parallel: z.array(ParallelMemberSchema).min(1),
  dependsOn: z.array(z.string().min(1)).optional(),
}).strict();

export const PipelineDefinitionSchema = z.object({
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+$/, 'Must be semver format (e.g., 1.0.0)').default('1.0.0'),
  description: z.string().optional(),
  concurrency: ConcurrencySchema.optional(),
  steps: z.array(z.union([ParallelItemSchema, StepItemSchema])).min(1, 'Pipeline must contain at least one step'),
});

export type StepItem = z.infer<typeof StepItemSchema>;
export type ParallelMember = z.infer<typeof ParallelMemberSchema>;
export type ParallelItem = z.infer<typeof ParallelItemSchema>;
export type PipelineDefinition = z.infer<typeof PipelineDefinitionSchema>;

const isParallelItem = (item: StepItem | ParallelItem): item is ParallelItem => 'parallel' in item;

const groupMemberName = (member: ParallelMember): string => member.name ?? member.action;

/**
 * Parse and validate a YAML pipeline definition.
 *
 * @throws PipelineConfigurationError if the text is not YAML, the document
 * does not match the schema, or its dependencies are undefined or cyclic
 */
export function parsePipelineDefinition(source: string): PipelineDefinition {
  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PipelineConfigurationError(`Invalid YAML: ${message}`, 'INVALID_DEFINITION', { cause: error });
  }

  const result = PipelineDefinitionSchema.safeParse(document);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new PipelineConfigurationError(
      `Invalid pipeline definition: ${issues.join('; ')}`,
      'INVALID_DEFINITION',
      { issues: result.error.issues }
    );
  }

  checkStepKinds(result.data);
  definitionGraph(result.data);
  return result.data;
}

/**
 * A definition is either all named steps and groups or all anonymous steps
 * and blocks; unnamed blocks only hold unnamed members.
 */
function checkStepKinds(definition: PipelineDefinition): void {
  const named = definition.steps.filter(item => item.name !== undefined).length;
  if (named > 0 && named < definition.steps.length) {
    throw new PipelineConfigurationError(
      'Cannot mix named steps with anonymous steps or parallel blocks in one pipeline',
      'INVALID_DEFINITION'
    );
  }

  for (const [index, item] of definition.steps.entries()) {
    if (isParallelItem(item) && item.name === undefined && item.parallel.some(member => member.name !== undefined)) {
      throw new PipelineConfigurationError(
        `steps.${index}: anonymous parallel blocks only take anonymous steps; name the block to use named members`,
        'INVALID_DEFINITION'
      );
    }
  }
}

/**
 * Loads a pipeline definition from a YAML file.
 *
 * @param filePath - Path to the YAML pipeline definition file
 * @returns Parsed and validated pipeline definition
 * @throws PipelineConfigurationError if the file cannot be read or the pipeline is invalid
 */
export async function loadPipelineDefinition(filePath: string): Promise<PipelineDefinition> {
  try {
    const fileContent = await fs.promises.readFile(filePath, 'utf8');
    return parsePipelineDefinition(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PipelineConfigurationError(
      `Failed to load pipeline from ${filePath}: ${message}`,
      error instanceof PipelineConfigurationError ? error.code : 'INVALID_DEFINITION',
      { filePath, cause: error }
    );
  }
}

/**
 * Dependency graph of the named steps in a definition, with parallel group
 * names expanded to their members. Anonymous steps are not part of it.
 */
export function definitionGraph(definition: PipelineDefinition): DependencyGraph {
  const groups = new Map<string, string[]>();
  for (const item of definition.steps) {
    if (isParallelItem(item) && item.name !== undefined) {
      groups.set(item.name, item.parallel.map(groupMemberName));
    }
  }

  const expand = (names: string[] = []) => names.flatMap(name => groups.get(name) ?? [name]);
  const dependencies = new Map<string, string[]>();
  const declare = (name: string, dependsOn: string[]) => {
    if (dependencies.has(name) || groups.has(name)) {
      throw new DuplicateStepError(name);
    }
    dependencies.set(name, dependsOn);
  };

  for (const item of definition.steps) {
    if (isParallelItem(item)) {
      if (item.name !== undefined) {
        item.parallel.forEach(member => declare(groupMemberName(member), expand(item.dependsOn)));
      }
    } else if (item.name !== undefined) {
      declare(item.name, expand(item.dependsOn));
    }
  }

  return new DependencyGraph(dependencies);
}

export interface BuildPipelineOptions extends PipelineOptions {
  /** Applied in order; the first wraps outermost */
  middleware?: readonly Middleware[];
}

/**
 * Build a runnable pipeline from a definition, resolving each step's
 * action in the registry.
 *
 * @throws UnknownActionError if an action is not registered
 */
export function buildPipeline(
  definition: PipelineDefinition,
  registry: ActionRegistry,
  options: BuildPipelineOptions = {}
): Pipeline {
  const { middleware = [], ...pipelineOptions } = options;
  const builder = new PipelineBuilder({
    ...pipelineOptions,
    concurrency: pipelineOptions.concurrency ?? definition.concurrency,
  });
  middleware.forEach(wrap => builder.use(wrap));

  for (const item of definition.steps) {
    if (!isParallelItem(item)) {
      const action = registry.resolve(item.action);
      if (item.name === undefined) {
        builder.step(action);
      } else {
        builder.step(item.name, action, { dependsOn: item.dependsOn, optional: item.optional });
      }
      continue;
    }

    const members = item.parallel;
    if (item.name === undefined) {
      builder.parallel(block => {
        for (const member of members) {
          const action = registry.resolve(member.action);
          if (member.name === undefined) {
            block.step(action);
          } else {
            block.step(member.name, action);
          }
        }
      });
    } else {
      builder.parallel(item.name, block => {
        for (const member of members) {
          block.step(groupMemberName(member), registry.resolve(member.action));
        }
      }, { dependsOn: item.dependsOn });
    }
  }

  return builder.build();
}
