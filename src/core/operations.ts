// ─── Dynamic Operations ──────────────────────────────────────────────────────
//
// Arithmetic over values whose concrete types are only known at run time,
// e.g. after parseSpelled(). The table lists every legal combination within
// one family; anything else is a TypeMismatchError.
// ─────────────────────────────────────────────────────────────────────────────

import { TypeMismatchError } from "../errors.js";
import { Interval, OPERATION_VERBS } from "./interval.js";
import type { Kind, TypeTag } from "./tags.js";
import type { AnyValue, BinaryOp } from "./value.js";

type KindRule = readonly [left: Kind, right: Kind, result: Kind];

const RESULT_KINDS: Record<BinaryOp, readonly KindRule[]> = {
  add: [
    ["pitch", "interval", "pitch"],
    ["pitch-class", "interval-class", "pitch-class"],
    ["interval", "interval", "interval"],
    ["interval-class", "interval-class", "interval-class"],
  ],
  sub: [
    ["pitch", "pitch", "interval"],
    ["pitch", "interval", "pitch"],
    ["pitch-class", "pitch-class", "interval-class"],
    ["pitch-class", "interval-class", "pitch-class"],
    ["interval", "interval", "interval"],
    ["interval-class", "interval-class", "interval-class"],
  ],
};

/** Kind of `a op b`, or undefined when the combination is not defined. */
export function resultKind(op: BinaryOp, a: TypeTag, b: TypeTag): Kind | undefined {
  if (a.family !== b.family) return undefined;
  return RESULT_KINDS[op].find(([left, right]) => left === a.kind && right === b.kind)?.[2];
}

function combine(op: BinaryOp, a: AnyValue, b: AnyValue): AnyValue {
  if (resultKind(op, a, b) === undefined) {
    throw new TypeMismatchError(OPERATION_VERBS[op], a.typeName, b.typeName);
  }
  return a.combine(op, b);
}

export function add(a: AnyValue, b: AnyValue): AnyValue {
  return combine("add", a, b);
}

export function sub(a: AnyValue, b: AnyValue): AnyValue {
  return combine("sub", a, b);
}

/** Scale an interval; pitches cannot be scaled. */
export function mul(a: AnyValue, factor: number): AnyValue {
  if (a instanceof Interval) return a.mul(factor);
  throw new TypeMismatchError("multiply", a.typeName, "number");
}

export function div(a: AnyValue, divisor: number): AnyValue {
  if (a instanceof Interval) return a.div(divisor);
  throw new TypeMismatchError("divide", a.typeName, "number");
}

export function neg(a: AnyValue): AnyValue {
  if (a instanceof Interval) return a.neg();
  throw new TypeMismatchError("negate", a.typeName);
}
