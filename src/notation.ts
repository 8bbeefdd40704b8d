// ─── Notation ────────────────────────────────────────────────────────────────
//
// The two string grammars of spelled pitch and interval notation:
//
//   pitch     <letter><accidentals><octave?>          "C#4", "Dbb5", "F♯"
//   interval  <sign?><quality><generic><:octave?>     "M6:0", "-m3:0", "aa2"
//
// A missing octave marks a class. Parsing yields line-of-fifths coordinates;
// printing is the canonical inverse.
// ─────────────────────────────────────────────────────────────────────────────

import { floorDiv, mod } from "./core/algebra.js";
import { DomainError, ParseError } from "./errors.js";
import {
  diatonicSteps,
  fifthsFromGeneric,
  fifthsFromLetter,
  intervalClassName,
  pitchClassLetter,
} from "./line-of-fifths.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface PitchNotation {
  /** Written octave; null for a pitch class. */
  octave: number | null;
  fifths: number;
}

export interface IntervalNotation {
  sign: 1 | -1;
  /** Written octave; null for an interval class. */
  octave: number | null;
  /** Fifths of the upward interval, before the sign is applied. */
  fifths: number;
}

export type ParsedNotation =
  | { kind: "pitch"; fifths: number; octave: number }
  | { kind: "pitch-class"; fifths: number }
  | { kind: "interval"; sign: 1 | -1; fifths: number; octave: number }
  | { kind: "interval-class"; sign: 1 | -1; fifths: number };

// ─── Grammars ────────────────────────────────────────────────────────────────

export const PITCH_GRAMMAR = "<letter A-G><accidentals: all #, all b, all ♯ or all ♭><octave?>";
export const INTERVAL_GRAMMAR = "<sign -/+?><quality P|M|m|a+|d+><generic 1-7><:octave?>";

const PITCH_PATTERN = /^([A-G])(#*|b*|♯*|♭*)(-?\d+)?$/;

const INTERVAL_PATTERN = /^([-+])?(?:(P)([145])|(M|m|)([2367])|(a+|d+)([1-7]))(?::(-?\d+))?$/;

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Parse a pitch or pitch class.
 *
 * Examples:
 *   "C4"   → { octave: 4, fifths: 0 }
 *   "F#"   → { octave: null, fifths: 6 }
 *   "Eb-1" → { octave: -1, fifths: -3 }
 */
export function parsePitchNotation(input: string): PitchNotation {
  const match = input.match(PITCH_PATTERN);
  if (!match) {
    throw new ParseError(input, `a pitch (${PITCH_GRAMMAR})`);
  }

  const [, letter, modifiers, octaveStr] = match;
  const sharp = modifiers.startsWith("#") || modifiers.startsWith("♯");
  const steps = 7 * modifiers.length;
  const fifths = fifthsFromLetter(letter) + (sharp ? steps : -steps);

  return {
    octave: octaveStr === undefined ? null : parseInt(octaveStr, 10),
    fifths,
  };
}

/**
 * Parse an interval or interval class.
 *
 * Diminished imperfect intervals sit one extra step of 7 further down
 * the line than diminished perfect ones: "d5" is -6, "d6" is -11.
 */
export function parseIntervalNotation(input: string): IntervalNotation {
  const match = input.match(INTERVAL_PATTERN);
  if (!match) {
    throw new ParseError(input, `an interval (${INTERVAL_GRAMMAR})`);
  }

  const [, signStr, perfect, perfectGeneric, imperfect, imperfectGeneric, altered, alteredGeneric, octaveStr] = match;

  let fifths: number;
  if (perfect !== undefined) {
    fifths = fifthsFromGeneric(parseInt(perfectGeneric, 10));
  } else if (imperfect !== undefined) {
    fifths = fifthsFromGeneric(parseInt(imperfectGeneric, 10));
    if (imperfect === "m") fifths -= 7;
  } else {
    const generic = parseInt(alteredGeneric, 10);
    fifths = fifthsFromGeneric(generic);
    if (altered.startsWith("a")) {
      fifths += 7 * altered.length;
    } else if (generic === 1 || generic === 4 || generic === 5) {
      fifths -= 7 * altered.length;
    } else {
      fifths -= 7 * (altered.length + 1);
    }
  }

  let octave: number | null = null;
  if (octaveStr !== undefined) {
    octave = parseInt(octaveStr, 10);
    if (octave < 0) {
      throw new DomainError(
        `Interval octave in "${input}" must not be negative; write the direction as a leading "-"`,
        octave,
      );
    }
  }

  return { sign: signStr === "-" ? -1 : 1, octave, fifths };
}

/** Parse any spelled notation and report which of the four kinds it is. */
export function parseNotation(input: string): ParsedNotation {
  if (PITCH_PATTERN.test(input)) {
    const { octave, fifths } = parsePitchNotation(input);
    return octave === null ? { kind: "pitch-class", fifths } : { kind: "pitch", fifths, octave };
  }
  if (INTERVAL_PATTERN.test(input)) {
    const { sign, octave, fifths } = parseIntervalNotation(input);
    return octave === null
      ? { kind: "interval-class", sign, fifths }
      : { kind: "interval", sign, fifths, octave };
  }
  throw new ParseError(input, `a pitch (${PITCH_GRAMMAR}) or an interval (${INTERVAL_GRAMMAR})`);
}

// ─── Octave Bookkeeping ──────────────────────────────────────────────────────

/** Octaves contributed by stacking `fifths` fifths: floor(4·fifths / 7). */
export function fifthsOctaveOffset(fifths: number): number {
  return floorDiv(diatonicSteps(fifths), 7);
}

/** Internal (C-based) octave for a written octave. */
export function internalOctave(fifths: number, octave: number): number {
  return octave - fifthsOctaveOffset(fifths);
}

/** Written octave for an internal octave. */
export function writtenOctave(fifths: number, internal: number): number {
  return internal + fifthsOctaveOffset(fifths);
}

// ─── Printing ────────────────────────────────────────────────────────────────

export function formatPitchClass(fifths: number): string {
  return pitchClassLetter(fifths);
}

export function formatPitch(fifths: number, octave: number): string {
  return pitchClassLetter(fifths) + octave;
}

/** Interval class name; `inverse` prints the downward form ("-m3" for M6). */
export function formatIntervalClass(fifths: number, inverse = false): string {
  return (inverse ? "-" : "") + intervalClassName(fifths, inverse);
}

/**
 * Interval name from fifths and internal octaves.
 * Downward intervals print the inverted class with a leading "-";
 * their first octave is ":0" unless the interval is a unison.
 */
export function formatInterval(fifths: number, internal: number): string {
  const steps = diatonicSteps(fifths) + 7 * internal;
  let octave = Math.abs(writtenOctave(fifths, internal));
  if (steps < 0) {
    if (mod(steps, 7) !== 0) octave -= 1;
    return `-${intervalClassName(fifths, true)}:${octave}`;
  }
  return `${intervalClassName(fifths)}:${octave}`;
}
