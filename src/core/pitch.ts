// ─── Pitch Base ──────────────────────────────────────────────────────────────
//
// Pitches form an affine space over their interval type:
//   pitch - pitch    → interval
//   pitch ± interval → pitch
// Pitches cannot be added to each other or scaled.
// ─────────────────────────────────────────────────────────────────────────────

import { TypeMismatchError } from "../errors.js";
import { OPERATION_VERBS, type Interval } from "./interval.js";
import { PitchTypeValue, type AnyValue, type BinaryOp, type ValueType } from "./value.js";

export abstract class Pitch<V, P extends Pitch<V, P, I>, I extends Interval<V, I>> extends PitchTypeValue<V> {
  protected abstract get pitchType(): ValueType<P>;

  protected abstract get intervalType(): ValueType<I>;

  protected abstract createPitch(value: V): P;

  protected abstract createInterval(value: V): I;

  /** Transpose by an interval. */
  add(interval: I): P {
    const checked = this.expectInterval("add", interval);
    return this.createPitch(this.algebra.add(this.value, checked.value));
  }

  /** The interval between two pitches, or a transposition downwards. */
  sub(other: P): I;
  sub(other: I): P;
  sub(other: P | I): P | I {
    if (other instanceof this.pitchType) {
      return this.createInterval(this.algebra.sub(this.value, other.value));
    }
    const interval = this.expectInterval("sub", other);
    return this.createPitch(this.algebra.sub(this.value, interval.value));
  }

  /** The interval from `other` up to this pitch. */
  intervalFrom(other: P): I {
    return this.sub(other);
  }

  /** The interval from this pitch up to `other`. */
  intervalTo(other: P): I {
    return other.sub(this.self());
  }

  combine(op: BinaryOp, other: AnyValue): P | I {
    if (op === "sub" && other instanceof this.pitchType) return this.sub(other);
    return op === "add" ? this.add(this.expectInterval(op, other)) : this.sub(this.expectInterval(op, other));
  }

  protected self(): P {
    return this.createPitch(this.value);
  }

  protected expectInterval(op: BinaryOp, other: AnyValue): I {
    if (other instanceof this.intervalType) return other;
    throw new TypeMismatchError(OPERATION_VERBS[op], this.typeName, other.typeName);
  }
}
