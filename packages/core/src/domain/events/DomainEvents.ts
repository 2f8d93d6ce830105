/** Pipeline stage at which a guarded value was turned away. */
export type RejectionStage = 'coercion' | 'validation';

/** Emitted when a guard coerces and validates a value successfully. */
export interface ValueAcceptedEvent {
  readonly type: 'value:accepted';
  readonly guard: string;
  /** The coerced value. */
  readonly value: unknown;
  readonly timestamp: number;
}

/** Emitted when a guard rejects a value. `value` is the raw input. */
export interface ValueRejectedEvent {
  readonly type: 'value:rejected';
  readonly guard: string;
  readonly stage: RejectionStage;
  readonly errors: readonly string[];
  readonly value: unknown;
  readonly timestamp: number;
}

/** Emitted after a schema has been inferred from sample records. */
export interface SampleAnalyzedEvent {
  readonly type: 'sample:analyzed';
  readonly recordsAnalyzed: number;
  readonly fields: number;
  readonly timestamp: number;
}

/** Union of all domain events. */
export type DomainEvent = ValueAcceptedEvent | ValueRejectedEvent | SampleAnalyzedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
