import type { ValidationIssue } from '../domain/model/ValidationResult.js';
import { issue } from '../domain/model/ValidationResult.js';
import { isNil } from '../domain/model/values.js';
import { CoercionError } from '../domain/errors/CoercionError.js';
import { SchemaValidationError } from '../domain/errors/SchemaErrors.js';
import type { RejectionStage } from '../domain/events/DomainEvents.js';
import type { BaseType, CoercionPolicy } from '../domain/types/BaseType.js';
import { EventBus } from './EventBus.js';

export interface SchemaGuardOptions {
  /** Name carried by emitted events. Defaults to the type's `toString()`. */
  readonly name?: string;
  /** Coercion policy applied before validation. Default: `'lenient'`. */
  readonly policy?: CoercionPolicy;
  /** Bus to publish `value:accepted` / `value:rejected` on. A private bus is created when omitted. */
  readonly eventBus?: EventBus;
}

export interface GuardAccepted<TOutput> {
  readonly ok: true;
  readonly value: TOutput;
}

export interface GuardRejected {
  readonly ok: false;
  readonly stage: RejectionStage;
  readonly errors: readonly string[];
  readonly issues: readonly ValidationIssue[];
}

export type GuardResult<TOutput> = GuardAccepted<TOutput> | GuardRejected;

/**
 * Coerce-then-validate pipeline for untrusted input such as request
 * parameters or decoded bodies.
 */
export class SchemaGuard<TOutput> {
  readonly name: string;
  readonly events: EventBus;
  private readonly policy: CoercionPolicy;

  constructor(
    private readonly type: BaseType<TOutput>,
    options: SchemaGuardOptions = {},
  ) {
    this.name = options.name ?? type.toString();
    this.policy = options.policy ?? 'lenient';
    this.events = options.eventBus ?? new EventBus();
  }

  /** Run the pipeline and report the outcome without throwing for bad input. */
  check(input: unknown): GuardResult<TOutput> {
    if (isNil(input)) {
      const issues = this.type.check(input);
      if (issues.length > 0) return this.reject('validation', issues, input);
    }

    let value: TOutput;
    try {
      value = this.type.coerce(input, { policy: this.policy });
    } catch (error) {
      if (!(error instanceof CoercionError)) throw error;
      return this.reject('coercion', [issue('TYPE_MISMATCH', error.message)], input);
    }

    const issues = this.type.check(value);
    if (issues.length > 0) return this.reject('validation', issues, input);

    this.events.emit({ type: 'value:accepted', guard: this.name, value, timestamp: Date.now() });
    return { ok: true, value };
  }

  /**
   * Return the coerced value.
   * @throws SchemaValidationError when the input is rejected at either stage
   */
  parse(input: unknown): TOutput {
    const result = this.check(input);
    if (!result.ok) throw new SchemaValidationError(result.errors);
    return result.value;
  }

  private reject(stage: RejectionStage, issues: readonly ValidationIssue[], input: unknown): GuardRejected {
    const errors = issues.map((i) => i.message);
    this.events.emit({ type: 'value:rejected', guard: this.name, stage, errors, value: input, timestamp: Date.now() });
    return { ok: false, stage, errors, issues };
  }
}
