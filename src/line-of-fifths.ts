// ─── Line of Fifths ──────────────────────────────────────────────────────────
//
// Pure integer functions over the fifths coordinate:
//   … Bb  F  C  G  D  A  E  B  F# …
//     -2 -1  0  1  2  3  4  5  6
// Every accidental moves a pitch class 7 steps along the line.
// ─────────────────────────────────────────────────────────────────────────────

import { floorDiv, mod } from "./core/algebra.js";
import { DomainError } from "./errors.js";

export const NATURAL_LETTERS = ["F", "C", "G", "D", "A", "E", "B"] as const;
export type Letter = (typeof NATURAL_LETTERS)[number];

/** Letters in diatonic order starting at C. */
export const DIATONIC_LETTERS: readonly Letter[] = ["C", "D", "E", "F", "G", "A", "B"];

const LETTER_FIFTHS: Record<Letter, number> = {
  F: -1,
  C: 0,
  G: 1,
  D: 2,
  A: 3,
  E: 4,
  B: 5,
};

// Qualities of the unaltered band, fifths -5..5.
const BAND_QUALITIES = ["m", "m", "m", "m", "P", "P", "P", "M", "M", "M", "M"];

export function isLetter(s: string): s is Letter {
  return Object.hasOwn(LETTER_FIFTHS, s);
}

/** Diatonic steps spanned by `fifths` stacked fifths. */
export function diatonicSteps(fifths: number): number {
  return 4 * fifths;
}

/** Scale degree 0..6 (unison = 0). */
export function degreeFromFifths(fifths: number): number {
  return mod(diatonicSteps(fifths), 7);
}

/** Generic interval number 1..7. */
export function genericIntervalNumber(fifths: number): number {
  return degreeFromFifths(fifths) + 1;
}

/** Sharps (positive) or flats (negative) on the pitch class at `fifths`. */
export function accidentals(fifths: number): number {
  return floorDiv(fifths + 1, 7);
}

export function accidentalString(count: number): string {
  return count >= 0 ? "#".repeat(count) : "b".repeat(-count);
}

/** Letter name plus accidentals: 7 → "C#", -6 → "Gb". */
export function pitchClassLetter(fifths: number): string {
  const letter = NATURAL_LETTERS[mod(fifths + 1, 7)];
  return letter + accidentalString(accidentals(fifths));
}

/** Quality prefix: "P", "M", "m", "a", "aa", "d", "dd", … */
export function intervalQuality(fifths: number): string {
  if (fifths > 5) return "a".repeat(floorDiv(fifths + 1, 7));
  if (fifths < -5) return "d".repeat(floorDiv(-fifths + 1, 7));
  return BAND_QUALITIES[fifths + 5];
}

/**
 * Name of an interval class: quality plus generic number.
 * With `inverse`, names the complementary class instead.
 */
export function intervalClassName(fifths: number, inverse = false): string {
  const f = inverse ? -fifths : fifths;
  return intervalQuality(f) + genericIntervalNumber(f);
}

export function fifthsFromLetter(letter: string): number {
  if (!isLetter(letter)) {
    throw new DomainError(`Unknown pitch letter "${letter}" (expected one of A-G)`, letter);
  }
  return LETTER_FIFTHS[letter];
}

/** Fifths of the perfect or major interval with generic number `n` (1..7). */
export function fifthsFromGeneric(n: number): number {
  if (!Number.isInteger(n) || n < 1 || n > 7) {
    throw new DomainError(`Generic interval must be an integer in 1..7, got ${n}`, n);
  }
  return mod(2 * n - 1, 7) - 1;
}

/** The natural letter on scale degree `degree` above C. */
export function letterFromDegree(degree: number): Letter {
  return DIATONIC_LETTERS[mod(degree, 7)];
}
