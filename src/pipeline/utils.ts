import { categoryOf, Outcome } from '../outcome.js';
import type { StepAction, StepFunction, StepInfo } from '../types/index.js';

/**
 * Normalize a step action to its function form.
 */
export function toStepFunction(action: StepAction): StepFunction {
  if (typeof action === 'function') {
    return action;
  }
  return (input) => action.execute(input);
}

/**
 * Human-readable label for log lines: the step name, or `#<position>`.
 */
export function stepLabel(info: StepInfo): string {
  return info.name ?? `#${info.position}`;
}

/**
 * Merge the outcomes of one group, in declaration order.
 *
 * - value: last continuing outcome's value, else the last outcome's value
 * - context: union; later outcomes overwrite earlier keys
 * - errors: union; messages of a shared category are concatenated
 * - activated steps: union, first occurrence kept
 * - continuation: false if any outcome halted
 *
 * An empty list yields `fallback` unchanged.
 */
export function mergeOutcomes(outcomes: readonly Outcome[], fallback: Outcome): Outcome {
  const last = outcomes.at(-1);
  if (last === undefined) {
    return fallback;
  }

  const continuing = outcomes.filter(outcome => outcome.shouldContinue());
  const value = (continuing.at(-1) ?? last).value;

  const context = outcomes.reduce<Record<string, unknown>>((acc, outcome) => ({ ...acc, ...outcome.context }), {});

  const errors: Record<string, string[]> = Object.create(null);
  for (const outcome of outcomes) {
    for (const [key, messages] of Object.entries(outcome.errors)) {
      errors[key] = [...categoryOf(errors, key), ...messages];
    }
  }

  const activatedSteps = [...new Set(outcomes.flatMap(outcome => outcome.activatedSteps))];

  return new Outcome(value, {
    context,
    errors,
    activatedSteps,
    continues: continuing.length === outcomes.length,
  });
}
