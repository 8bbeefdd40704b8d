// ─── Spelled Pitches and Intervals ───────────────────────────────────────────
//
// Pitches and intervals that keep their spelling: C# and Db are different
// values. Non-class values store (fifths, internal octaves); the octave a
// reader sees is internal + floor(4·fifths / 7). Class values store fifths
// only.
// ─────────────────────────────────────────────────────────────────────────────

import {
  fifthsOctaves,
  fifthsOctavesAlgebra,
  scalarAlgebra,
  sign,
  zero,
  type Algebra,
  type FifthsOctaves,
  type Sign,
} from "./core/algebra.js";
import { Interval } from "./core/interval.js";
import { Pitch } from "./core/pitch.js";
import type { ValueType } from "./core/value.js";
import { DomainError, ParseError } from "./errors.js";
import {
  accidentals,
  degreeFromFifths,
  diatonicSteps,
  letterFromDegree,
  type Letter,
} from "./line-of-fifths.js";
import {
  fifthsOctaveOffset,
  formatInterval,
  formatIntervalClass,
  formatPitch,
  formatPitchClass,
  internalOctave,
  parseIntervalNotation,
  parseNotation,
  parsePitchNotation,
  writtenOctave,
  PITCH_GRAMMAR,
  INTERVAL_GRAMMAR,
} from "./notation.js";

export type SpelledValue = SpelledPitch | SpelledInterval | SpelledPitchClass | SpelledIntervalClass;

function checkedFifths(fifths: number, typeName: string): number {
  if (!Number.isInteger(fifths)) {
    throw new DomainError(`${typeName} needs integer fifths, got ${fifths}`, fifths);
  }
  return zero(fifths);
}

function checkedCoordinates(value: FifthsOctaves, typeName: string): FifthsOctaves {
  if (!Number.isInteger(value.fifths) || !Number.isInteger(value.octaves)) {
    throw new DomainError(
      `${typeName} needs integer fifths and octaves, got (${value.fifths}, ${value.octaves})`,
      value,
    );
  }
  return fifthsOctaves(value.fifths, value.octaves);
}

// ─── SpelledPitch ────────────────────────────────────────────────────────────

export class SpelledPitch extends Pitch<FifthsOctaves, SpelledPitch, SpelledInterval> {
  static readonly family = "spelled";
  static readonly kind = "pitch";

  constructor(value: FifthsOctaves) {
    super(checkedCoordinates(value, "SpelledPitch"), SpelledPitch);
  }

  /** Parse "C#4", "Dbb5", "B♭-1". */
  static parse(input: string): SpelledPitch {
    const { octave, fifths } = parsePitchNotation(input);
    if (octave === null) {
      throw new ParseError(input, `a spelled pitch (${PITCH_GRAMMAR})`, "the octave is missing");
    }
    return SpelledPitch.fromIndependent(fifths, octave);
  }

  /** From fifths and internal (C-based) octaves. */
  static fromFifthsAndOctaves(fifths: number, octaves: number): SpelledPitch {
    return new SpelledPitch({ fifths, octaves });
  }

  /** From fifths and the written octave. */
  static fromIndependent(fifths: number, octave: number): SpelledPitch {
    return new SpelledPitch({ fifths, octaves: internalOctave(fifths, octave) });
  }

  protected get algebra(): Algebra<FifthsOctaves> {
    return fifthsOctavesAlgebra;
  }

  protected get pitchType(): ValueType<SpelledPitch> {
    return SpelledPitch;
  }

  protected get intervalType(): ValueType<SpelledInterval> {
    return SpelledInterval;
  }

  protected createPitch(value: FifthsOctaves): SpelledPitch {
    return new SpelledPitch(value);
  }

  protected createInterval(value: FifthsOctaves): SpelledInterval {
    return new SpelledInterval(value);
  }

  fifths(): number {
    return this.value.fifths;
  }

  /** Written octave: C4 is middle C, B#3 sounds like C4 but sits in octave 3. */
  octaves(): number {
    return writtenOctave(this.value.fifths, this.value.octaves);
  }

  internalOctaves(): number {
    return this.value.octaves;
  }

  /** Letter index above C: C=0, D=1, …, B=6. */
  degree(): number {
    return degreeFromFifths(this.value.fifths);
  }

  /** Sharps (positive) or flats (negative). */
  alteration(): number {
    return accidentals(this.value.fifths);
  }

  letter(): Letter {
    return letterFromDegree(this.degree());
  }

  name(): string {
    return formatPitch(this.value.fifths, this.octaves());
  }

  toClass(): SpelledPitchClass {
    return new SpelledPitchClass(this.value.fifths);
  }

  pc(): SpelledPitchClass {
    return this.toClass();
  }

  embed(): SpelledPitch {
    return this;
  }

  /** Diatonic order; among equal letters, sharper sorts higher. */
  compare(other: SpelledPitch): Sign {
    const d = this.sub(other);
    return d.direction() || sign(d.fifths());
  }
}

// ─── SpelledInterval ─────────────────────────────────────────────────────────

export class SpelledInterval extends Interval<FifthsOctaves, SpelledInterval> {
  static readonly family = "spelled";
  static readonly kind = "interval";

  constructor(value: FifthsOctaves) {
    super(checkedCoordinates(value, "SpelledInterval"), SpelledInterval);
  }

  /** Parse "M6:0", "-m3:0", "aa2:1". */
  static parse(input: string): SpelledInterval {
    const { sign: direction, octave, fifths } = parseIntervalNotation(input);
    if (octave === null) {
      throw new ParseError(input, `a spelled interval (${INTERVAL_GRAMMAR})`, "the :octave is missing");
    }
    const upward = SpelledInterval.fromFifthsAndOctaves(fifths, internalOctave(fifths, octave));
    return direction < 0 ? upward.neg() : upward;
  }

  static fromFifthsAndOctaves(fifths: number, octaves: number): SpelledInterval {
    return new SpelledInterval({ fifths, octaves });
  }

  /** P1:0 */
  static unison(): SpelledInterval {
    return SpelledInterval.fromFifthsAndOctaves(0, 0);
  }

  /** P1:1 */
  static octave(): SpelledInterval {
    return SpelledInterval.fromFifthsAndOctaves(0, 1);
  }

  /** a1:0 */
  static chromaticSemitone(): SpelledInterval {
    return SpelledInterval.fromFifthsAndOctaves(7, -4);
  }

  protected get algebra(): Algebra<FifthsOctaves> {
    return fifthsOctavesAlgebra;
  }

  protected get intervalType(): ValueType<SpelledInterval> {
    return SpelledInterval;
  }

  protected create(value: FifthsOctaves): SpelledInterval {
    return new SpelledInterval(value);
  }

  fifths(): number {
    return this.value.fifths;
  }

  /** Octaves spanned; downward intervals start at -1. */
  octaves(): number {
    return writtenOctave(this.value.fifths, this.value.octaves);
  }

  internalOctaves(): number {
    return this.value.octaves;
  }

  /** Diatonic steps including octaves: unison 0, second 1, octave 7. */
  diatonicSteps(): number {
    return diatonicSteps(this.value.fifths) + 7 * this.value.octaves;
  }

  /** Scale degree the interval points to (0..6, a second down is 6). */
  degree(): number {
    return degreeFromFifths(this.value.fifths);
  }

  /** Like degree(), but signed: a second down is -1. */
  generic(): number {
    return this.direction() < 0 ? zero(-this.neg().degree()) : this.degree();
  }

  /** Semitones away from the perfect or major form of the upward interval. */
  alteration(): number {
    return accidentals(this.abs().fifths());
  }

  /** Sign of the diatonic steps; every unison is neutral. */
  direction(): Sign {
    return sign(this.diatonicSteps());
  }

  isStep(): boolean {
    return Math.abs(this.diatonicSteps()) <= 1;
  }

  name(): string {
    return formatInterval(this.value.fifths, this.value.octaves);
  }

  toClass(): SpelledIntervalClass {
    return new SpelledIntervalClass(this.value.fifths);
  }

  ic(): SpelledIntervalClass {
    return this.toClass();
  }

  embed(): SpelledInterval {
    return this;
  }

  /** Diatonic size; among equal generic sizes, the sharper interval is larger. */
  compare(other: SpelledInterval): Sign {
    const d = this.sub(other);
    return d.direction() || sign(d.fifths());
  }
}

// ─── SpelledPitchClass ───────────────────────────────────────────────────────

export class SpelledPitchClass extends Pitch<number, SpelledPitchClass, SpelledIntervalClass> {
  static readonly family = "spelled";
  static readonly kind = "pitch-class";

  constructor(fifths: number) {
    super(checkedFifths(fifths, "SpelledPitchClass"), SpelledPitchClass);
  }

  /** Parse "C#", "Dbb", "F♯". */
  static parse(input: string): SpelledPitchClass {
    const { octave, fifths } = parsePitchNotation(input);
    if (octave !== null) {
      throw new ParseError(input, `a spelled pitch class (${PITCH_GRAMMAR})`, "pitch classes take no octave");
    }
    return new SpelledPitchClass(fifths);
  }

  /** Position on the line of fifths: C=0, G=1, F=-1. */
  static fromFifths(fifths: number): SpelledPitchClass {
    return new SpelledPitchClass(fifths);
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get pitchType(): ValueType<SpelledPitchClass> {
    return SpelledPitchClass;
  }

  protected get intervalType(): ValueType<SpelledIntervalClass> {
    return SpelledIntervalClass;
  }

  protected createPitch(value: number): SpelledPitchClass {
    return new SpelledPitchClass(value);
  }

  protected createInterval(value: number): SpelledIntervalClass {
    return new SpelledIntervalClass(value);
  }

  fifths(): number {
    return this.value;
  }

  octaves(): number {
    return 0;
  }

  internalOctaves(): number {
    return 0;
  }

  degree(): number {
    return degreeFromFifths(this.value);
  }

  alteration(): number {
    return accidentals(this.value);
  }

  letter(): Letter {
    return letterFromDegree(this.degree());
  }

  name(): string {
    return formatPitchClass(this.value);
  }

  toClass(): SpelledPitchClass {
    return this;
  }

  pc(): SpelledPitchClass {
    return this;
  }

  /** The pitch of this class in octave 0. */
  embed(): SpelledPitch {
    return SpelledPitch.fromFifthsAndOctaves(this.value, -fifthsOctaveOffset(this.value));
  }

  /** Orders by position on the line of fifths. */
  compare(other: SpelledPitchClass): Sign {
    return sign(this.value - other.value);
  }
}

// ─── SpelledIntervalClass ────────────────────────────────────────────────────

export class SpelledIntervalClass extends Interval<number, SpelledIntervalClass> {
  static readonly family = "spelled";
  static readonly kind = "interval-class";

  constructor(fifths: number) {
    super(checkedFifths(fifths, "SpelledIntervalClass"), SpelledIntervalClass);
  }

  /** Parse "M6", "-m3" (the same class as M6), "aa2". */
  static parse(input: string): SpelledIntervalClass {
    const { sign: direction, octave, fifths } = parseIntervalNotation(input);
    if (octave !== null) {
      throw new ParseError(input, `a spelled interval class (${INTERVAL_GRAMMAR})`, "interval classes take no :octave");
    }
    return new SpelledIntervalClass(direction * fifths);
  }

  static fromFifths(fifths: number): SpelledIntervalClass {
    return new SpelledIntervalClass(fifths);
  }

  /** P1 */
  static unison(): SpelledIntervalClass {
    return new SpelledIntervalClass(0);
  }

  /** P1, since octaves vanish in the class. */
  static octave(): SpelledIntervalClass {
    return new SpelledIntervalClass(0);
  }

  /** a1 */
  static chromaticSemitone(): SpelledIntervalClass {
    return new SpelledIntervalClass(7);
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get intervalType(): ValueType<SpelledIntervalClass> {
    return SpelledIntervalClass;
  }

  protected create(value: number): SpelledIntervalClass {
    return new SpelledIntervalClass(value);
  }

  fifths(): number {
    return this.value;
  }

  octaves(): number {
    return 0;
  }

  internalOctaves(): number {
    return 0;
  }

  degree(): number {
    return degreeFromFifths(this.value);
  }

  generic(): number {
    return this.degree();
  }

  diatonicSteps(): number {
    return this.degree();
  }

  alteration(): number {
    return accidentals(this.value);
  }

  /**
   * Direction of the shortest realization: seconds to fourths point up,
   * fifths to sevenths point down. Altered unisons follow their alteration.
   */
  direction(): Sign {
    const degree = this.degree();
    if (degree === 0) return sign(this.alteration());
    return degree > 3 ? -1 : 1;
  }

  isStep(): boolean {
    const degree = this.degree();
    return degree === 0 || degree === 1 || degree === 6;
  }

  /** With `inverse`, names the class by its downward form ("-m3" for M6). */
  name(inverse = false): string {
    return formatIntervalClass(this.value, inverse);
  }

  toClass(): SpelledIntervalClass {
    return this;
  }

  ic(): SpelledIntervalClass {
    return this;
  }

  /** The interval of this class within the first octave. */
  embed(): SpelledInterval {
    return SpelledInterval.fromFifthsAndOctaves(this.value, -fifthsOctaveOffset(this.value));
  }

  /** Orders by position on the line of fifths. */
  compare(other: SpelledIntervalClass): Sign {
    return sign(this.value - other.value);
  }
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/** Parse any spelled notation into the matching one of the four types. */
export function parseSpelled(input: string): SpelledValue {
  const parsed = parseNotation(input);
  switch (parsed.kind) {
    case "pitch":
      return SpelledPitch.fromIndependent(parsed.fifths, parsed.octave);
    case "pitch-class":
      return new SpelledPitchClass(parsed.fifths);
    case "interval": {
      const upward = SpelledInterval.fromFifthsAndOctaves(parsed.fifths, internalOctave(parsed.fifths, parsed.octave));
      return parsed.sign < 0 ? upward.neg() : upward;
    }
    case "interval-class":
      return new SpelledIntervalClass(parsed.sign * parsed.fifths);
  }
}
