// ─── Interval Base ───────────────────────────────────────────────────────────
//
// Intervals (and interval classes) form a group under addition and can be
// scaled by numbers. Subclasses supply the coordinate algebra and the
// family-specific notions of direction and step.
// ─────────────────────────────────────────────────────────────────────────────

import { DomainError, TypeMismatchError } from "../errors.js";
import type { Sign } from "./algebra.js";
import { PitchTypeValue, type AnyValue, type BinaryOp, type ValueType } from "./value.js";

export const OPERATION_VERBS: Record<BinaryOp, string> = {
  add: "add",
  sub: "subtract",
};

export abstract class Interval<V, I extends Interval<V, I>> extends PitchTypeValue<V> {
  protected abstract get intervalType(): ValueType<I>;

  protected abstract create(value: V): I;

  /** 1 for upward, -1 for downward, 0 for neutral. */
  abstract direction(): Sign;

  add(other: I): I {
    const interval = this.expectInterval("add", other);
    return this.create(this.algebra.add(this.value, interval.value));
  }

  sub(other: I): I {
    const interval = this.expectInterval("sub", other);
    return this.create(this.algebra.sub(this.value, interval.value));
  }

  mul(factor: number): I {
    if (!Number.isFinite(factor)) {
      throw new DomainError(`Cannot scale ${this.typeName} by ${factor}`, factor);
    }
    return this.create(this.algebra.scale(this.value, factor));
  }

  /** Divide by a number; integer-valued types reject inexact results. */
  div(divisor: number): I {
    if (divisor === 0 || !Number.isFinite(divisor)) {
      throw new DomainError(`Cannot divide ${this.typeName} by ${divisor}`, divisor);
    }
    return this.create(this.algebra.divide(this.value, divisor));
  }

  neg(): I {
    return this.create(this.algebra.neg(this.value));
  }

  /** The upward counterpart of a downward interval. */
  abs(): I {
    return this.direction() < 0 ? this.neg() : this.create(this.value);
  }

  combine(op: BinaryOp, other: AnyValue): I {
    const interval = this.expectInterval(op, other);
    return op === "add" ? this.add(interval) : this.sub(interval);
  }

  protected expectInterval(op: BinaryOp, other: AnyValue): I {
    if (other instanceof this.intervalType) return other;
    throw new TypeMismatchError(OPERATION_VERBS[op], this.typeName, other.typeName);
  }
}
