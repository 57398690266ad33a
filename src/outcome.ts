/**
 * Immutable carrier passed through every step and every group merge.
 *
 * Each mutator returns a fresh Outcome; context, errors and activated steps
 * are copied and frozen on construction, so a single Outcome can be handed to
 * several concurrently running steps.
 */

export interface OutcomeInit {
  context?: Readonly<Record<string, unknown>>;
  errors?: Readonly<Record<string, readonly string[]>>;
  /** Optional steps requested for execution so far. */
  activatedSteps?: readonly string[];
  /** Continuation flag (default: true). */
  continues?: boolean;
}

// own keys only: a category named like an Object.prototype member starts empty
export function categoryOf(errors: Readonly<Record<string, readonly string[]>>, key: string): readonly string[] {
  return Object.hasOwn(errors, key) ? errors[key] : [];
}

export class Outcome<T = unknown> {
  readonly value: T;
  readonly context: Readonly<Record<string, unknown>>;
  readonly errors: Readonly<Record<string, readonly string[]>>;
  readonly activatedSteps: readonly string[];
  private readonly continues: boolean;

  constructor(value: T, init: OutcomeInit = {}) {
    this.value = value;
    this.context = Object.freeze({ ...(init.context ?? {}) });
    this.errors = Object.freeze(
      Object.entries(init.errors ?? {}).reduce<Record<string, readonly string[]>>((acc, [key, messages]) => ({
        ...acc,
        [key]: Object.freeze([...messages])
      }), {})
    );
    this.activatedSteps = Object.freeze([...(init.activatedSteps ?? [])]);
    this.continues = init.continues ?? true;
  }

  /**
   * Set a context key, overwriting any previous value.
   */
  withContext(key: string, value: unknown): Outcome<T> {
    return this.derive(this.value, { context: { ...this.context, [key]: value } });
  }

  /**
   * Append an error message under a category key.
   */
  withError(key: string, message: string): Outcome<T> {
    return this.derive(this.value, {
      errors: { ...this.errors, [key]: [...categoryOf(this.errors, key), message] }
    });
  }

  /**
   * Replace the value and mark the outcome as continuing.
   *
   * This clears an earlier halt: a step that calls `continueWith` on a halted
   * outcome re-enables downstream execution.
   */
  continueWith<U>(value: U): Outcome<U> {
    return this.derive(value, { continues: true });
  }

  /**
   * Stop downstream execution. The current value is kept unless a new one
   * is passed.
   */
  halt(): Outcome<T>;
  halt<U>(value: U): Outcome<U>;
  halt<U>(...args: [] | [U]): Outcome<T> | Outcome<U> {
    if (args.length === 0) {
      return this.derive(this.value, { continues: false });
    }
    return this.derive(args[0], { continues: false });
  }

  shouldContinue(): boolean {
    return this.continues;
  }

  /**
   * Request that the named optional steps run later in the pipeline.
   */
  activate(...stepNames: string[]): Outcome<T> {
    return this.derive(this.value, { activatedSteps: [...this.activatedSteps, ...stepNames] });
  }

  private derive<U>(value: U, changes: OutcomeInit): Outcome<U> {
    return new Outcome(value, {
      context: changes.context ?? this.context,
      errors: changes.errors ?? this.errors,
      activatedSteps: changes.activatedSteps ?? this.activatedSteps,
      continues: changes.continues ?? this.continues,
    });
  }
}
