// ─── Pitch Type Value ────────────────────────────────────────────────────────
//
// Root of every pitch and interval type. A value carries its raw
// coordinate plus a (family, kind) tag; the tag decides which operands
// it may be combined with and which converters apply to it.
// ─────────────────────────────────────────────────────────────────────────────

import type { Algebra, Sign } from "./algebra.js";
import { defaultRegistry, type ConverterRegistry } from "../converters/registry.js";
import { typeName, isPitchKind, isClassKind, type Family, type Kind, type TypeTag } from "./tags.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/** A concrete pitch type: its constructor plus the static tag. */
export type ValueType<T> = (abstract new (...args: never) => T) & TypeTag;

export type AnyValue = PitchTypeValue<unknown>;
export type AnyValueType = ValueType<AnyValue>;

export type BinaryOp = "add" | "sub";

// ─── Base Class ──────────────────────────────────────────────────────────────

export abstract class PitchTypeValue<V> {
  readonly value: V;
  readonly family: Family;
  readonly kind: Kind;

  protected constructor(value: V, tag: TypeTag) {
    this.value = value;
    this.family = tag.family;
    this.kind = tag.kind;
    Object.freeze(this);
  }

  protected abstract get algebra(): Algebra<V>;

  get isPitch(): boolean {
    return isPitchKind(this.kind);
  }

  get isInterval(): boolean {
    return !this.isPitch;
  }

  get isClass(): boolean {
    return isClassKind(this.kind);
  }

  get typeName(): string {
    return typeName(this);
  }

  /** Same family, same kind, same coordinates. */
  equals(other: AnyValue): boolean {
    return (
      other.family === this.family &&
      other.kind === this.kind &&
      this.algebra.is(other.value) &&
      this.algebra.equals(this.value, other.value)
    );
  }

  abstract compare(other: PitchTypeValue<V>): Sign;

  abstract name(): string;

  /** Reduce to the class variant; classes return themselves. */
  abstract toClass(): AnyValue;

  /** Lift a class into its default octave; non-classes return themselves. */
  abstract embed(): AnyValue;

  /**
   * Apply `op` to an operand whose type is only known at run time.
   * Throws TypeMismatchError when the combination is not defined.
   */
  abstract combine(op: BinaryOp, other: AnyValue): AnyValue;

  /** Convert into another family through the converter registry. */
  convertTo<T extends AnyValue>(target: ValueType<T>, registry: ConverterRegistry = defaultRegistry): T {
    return registry.convert(this, target);
  }

  toString(): string {
    return this.name();
  }
}
