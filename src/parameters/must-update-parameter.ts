import { NonDistinctValueError, StaleReadError } from "../core/errors.js";
import { logSessionEvent, toJsonValue, type EventLogger } from "../core/logger.js";
import { valuesEqual } from "../core/utils.js";
import type { Component } from "../station/component.js";

// =============================================================================
// TYPES
// =============================================================================

export type MustUpdateParameterOptions = {
  /** Reject a set() whose value equals the stored one. Default true. */
  mustDiffer?: boolean;
  /** Reject a second get() of the same settled value. Default true. */
  strict?: boolean;
  label?: string;
  unit?: string;
  logger?: EventLogger;
};

type StoredValue<T> = { present: false } | { present: true; value: T };

export type MustUpdateParameterSnapshot<T = unknown> = {
  name: string;
  label: string;
  unit: string;
  must_differ: boolean;
  strict: boolean;
  has_value: boolean;
  value?: T;
  consumed_by_measurement: boolean;
  read_since_set: boolean;
};

// =============================================================================
// PARAMETER
// =============================================================================

/**
 * A parameter that must receive a new value between measurements.
 *
 * A fresh parameter counts as already consumed, so the first measurement sweep
 * fails until something has been set. Measurement code claims the current value
 * through checkParametersUpdated().
 */
export class MustUpdateParameter<T = unknown> implements Component {
  readonly kind = "parameter" as const;
  readonly label: string;
  readonly unit: string;
  readonly mustDiffer: boolean;
  readonly strict: boolean;

  private stored: StoredValue<T> = { present: false };
  private consumedByMeasurement = true;
  private readSinceSet = false;
  private readonly logger?: EventLogger;

  constructor(
    readonly name: string,
    options: MustUpdateParameterOptions = {},
  ) {
    this.mustDiffer = options.mustDiffer ?? true;
    this.strict = options.strict ?? true;
    this.label = options.label ?? name;
    this.unit = options.unit ?? "";
    this.logger = options.logger;
  }

  get hasValue(): boolean {
    return this.stored.present;
  }

  get isConsumed(): boolean {
    return this.consumedByMeasurement;
  }

  get isReadSinceSet(): boolean {
    return this.readSinceSet;
  }

  /** Current value without counting as a read. */
  peek(): T | undefined {
    return this.stored.present ? this.stored.value : undefined;
  }

  get(): T | undefined {
    if (this.strict && this.readSinceSet) {
      throw new StaleReadError(this.name);
    }
    this.readSinceSet = true;
    return this.peek();
  }

  set(value: T): void {
    if (this.mustDiffer && this.stored.present && valuesEqual(this.stored.value, value)) {
      throw new NonDistinctValueError(this.name);
    }
    this.stored = { present: true, value };
    this.readSinceSet = false;
    this.consumedByMeasurement = false;
    logSessionEvent(this.logger, "parameter.set", {
      parameter: this.name,
      value: toJsonValue(value),
    });
  }

  markConsumed(): void {
    this.consumedByMeasurement = true;
  }

  snapshot(): MustUpdateParameterSnapshot<T> {
    const base = {
      name: this.name,
      label: this.label,
      unit: this.unit,
      must_differ: this.mustDiffer,
      strict: this.strict,
      consumed_by_measurement: this.consumedByMeasurement,
      read_since_set: this.readSinceSet,
    };
    return this.stored.present
      ? { ...base, has_value: true, value: this.stored.value }
      : { ...base, has_value: false };
  }

  /** Restores value and flags without running the set() guards. */
  restoreState(snapshot: MustUpdateParameterSnapshot<T>): void {
    this.stored =
      snapshot.has_value && snapshot.value !== undefined
        ? { present: true, value: snapshot.value }
        : { present: false };
    this.consumedByMeasurement = snapshot.consumed_by_measurement;
    this.readSinceSet = snapshot.read_since_set;
  }

  static restore<T>(
    snapshot: MustUpdateParameterSnapshot<T>,
    logger?: EventLogger,
  ): MustUpdateParameter<T> {
    const parameter = new MustUpdateParameter<T>(snapshot.name, {
      mustDiffer: snapshot.must_differ,
      strict: snapshot.strict,
      label: snapshot.label,
      unit: snapshot.unit,
      logger,
    });
    parameter.restoreState(snapshot);
    return parameter;
  }
}

export function isMustUpdateParameter(value: unknown): value is MustUpdateParameter {
  return value instanceof MustUpdateParameter;
}
