// ─── Coordinate Algebra ──────────────────────────────────────────────────────
//
// Floor arithmetic and the vector-space operations over the raw value
// that sits inside every pitch or interval. Pitch types only ever touch
// their coordinates through an Algebra, so the pitch/interval rules are
// written once in the base classes.
// ─────────────────────────────────────────────────────────────────────────────

export type Sign = -1 | 0 | 1;

/** Floor division: rounds toward negative infinity. */
export function floorDiv(a: number, n: number): number {
  return Math.floor(a / n);
}

/** Floor modulo: the result has the sign of the divisor. */
export function mod(a: number, n: number): number {
  return zero(((a % n) + n) % n);
}

export function sign(x: number): Sign {
  if (x > 0) return 1;
  if (x < 0) return -1;
  return 0;
}

/** Maps -0 to 0 so equality and printing never see a negative zero. */
export function zero(x: number): number {
  return x === 0 ? 0 : x;
}

// ─── Algebra ─────────────────────────────────────────────────────────────────

export interface Algebra<V> {
  is(value: unknown): value is V;
  equals(a: V, b: V): boolean;
  add(a: V, b: V): V;
  sub(a: V, b: V): V;
  neg(a: V): V;
  scale(a: V, k: number): V;
  divide(a: V, k: number): V;
}

/** Plain numbers: semitones, fifths, log frequencies. */
export const scalarAlgebra: Algebra<number> = {
  is: (value): value is number => typeof value === "number",
  equals: (a, b) => a === b,
  add: (a, b) => zero(a + b),
  sub: (a, b) => zero(a - b),
  neg: (a) => zero(-a),
  scale: (a, k) => zero(a * k),
  divide: (a, k) => zero(a / k),
};

/** Line-of-fifths position paired with an internal octave. */
export interface FifthsOctaves {
  readonly fifths: number;
  readonly octaves: number;
}

export function fifthsOctaves(fifths: number, octaves: number): FifthsOctaves {
  return Object.freeze({ fifths: zero(fifths), octaves: zero(octaves) });
}

export const fifthsOctavesAlgebra: Algebra<FifthsOctaves> = {
  is: (value): value is FifthsOctaves =>
    typeof value === "object" &&
    value !== null &&
    "fifths" in value &&
    "octaves" in value &&
    typeof value.fifths === "number" &&
    typeof value.octaves === "number",
  equals: (a, b) => a.fifths === b.fifths && a.octaves === b.octaves,
  add: (a, b) => fifthsOctaves(a.fifths + b.fifths, a.octaves + b.octaves),
  sub: (a, b) => fifthsOctaves(a.fifths - b.fifths, a.octaves - b.octaves),
  neg: (a) => fifthsOctaves(-a.fifths, -a.octaves),
  scale: (a, k) => fifthsOctaves(a.fifths * k, a.octaves * k),
  divide: (a, k) => fifthsOctaves(a.fifths / k, a.octaves / k),
};
