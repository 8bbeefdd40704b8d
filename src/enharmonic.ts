// ─── Enharmonic Pitches and Intervals ────────────────────────────────────────
//
// Twelve-tone equal temperament: a pitch is a MIDI-style semitone number
// (C4 = 60), an interval a signed semitone count. Class values live in
// [0, 12). C# and Db are the same value here; sharp or flat spelling is a
// printing option only.
// ─────────────────────────────────────────────────────────────────────────────

import { floorDiv, mod, scalarAlgebra, sign, zero, type Algebra, type Sign } from "./core/algebra.js";
import { Interval } from "./core/interval.js";
import { Pitch } from "./core/pitch.js";
import type { ValueType } from "./core/value.js";
import { resolveEnharmonicNotation, type AccidentalStyle, type EnharmonicNameOptions } from "./config/schema.js";
import { DomainError } from "./errors.js";
import {
  SpelledInterval,
  SpelledIntervalClass,
  SpelledPitch,
  SpelledPitchClass,
} from "./spelled.js";

const PITCH_CLASS_NAMES: Record<AccidentalStyle, readonly string[]> = {
  sharp: ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"],
  flat: ["C", "Db", "D", "Eb", "E", "F", "Gb", "G", "Ab", "A", "Bb", "B"],
};

// ─── Spelled → Semitones ─────────────────────────────────────────────────────

/**
 * Semitones above C of the pitch class at `fifths`, before octave reduction:
 * the natural letter's semitone plus one per sharp (minus one per flat).
 *
 *   C# (7)   → 1
 *   B# (12)  → 12
 *   Cb (-7)  → -1
 */
export function semitonesFromFifths(fifths: number): number {
  const fromF = fifths + 1;
  const natural = mod((mod(fromF, 7) - 1) * 7, 12);
  const accidentals = floorDiv(fromF, 7);
  return natural + accidentals;
}

/** MIDI number of a spelled pitch: B#4 and Dbb5 both give 72. */
export function midiFromSpelled(fifths: number, octave: number): number {
  return 12 * (octave + 1) + semitonesFromFifths(fifths);
}

function checkedSemitones(value: number, typeName: string): number {
  if (!Number.isInteger(value)) {
    throw new DomainError(`${typeName} needs an integer semitone value, got ${value}`, value);
  }
  return zero(value);
}

function pitchClassName(semitones: number, style: AccidentalStyle): string {
  return PITCH_CLASS_NAMES[style][mod(semitones, 12)];
}

function intervalName(semitones: number): string {
  return (semitones < 0 ? "-" : "") + Math.abs(semitones);
}

// ─── EnharmonicPitch ─────────────────────────────────────────────────────────

export class EnharmonicPitch extends Pitch<number, EnharmonicPitch, EnharmonicInterval> {
  static readonly family = "enharmonic";
  static readonly kind = "pitch";

  constructor(midi: number) {
    super(checkedSemitones(midi, "EnharmonicPitch"), EnharmonicPitch);
  }

  /** Parse spelled notation ("C#4", "Db4") and drop the spelling. */
  static parse(input: string): EnharmonicPitch {
    return EnharmonicPitch.fromSpelled(SpelledPitch.parse(input));
  }

  static fromSpelled(pitch: SpelledPitch): EnharmonicPitch {
    return new EnharmonicPitch(midiFromSpelled(pitch.fifths(), pitch.octaves()));
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get pitchType(): ValueType<EnharmonicPitch> {
    return EnharmonicPitch;
  }

  protected get intervalType(): ValueType<EnharmonicInterval> {
    return EnharmonicInterval;
  }

  protected createPitch(value: number): EnharmonicPitch {
    return new EnharmonicPitch(value);
  }

  protected createInterval(value: number): EnharmonicInterval {
    return new EnharmonicInterval(value);
  }

  get midi(): number {
    return this.value;
  }

  /** Octave number: 60 is in octave 4. */
  octaves(): number {
    return floorDiv(this.value, 12) - 1;
  }

  /** Frequency in Hz at A4 = 440. */
  freq(): number {
    return 2 ** ((this.value - 69) / 12) * 440;
  }

  name(options?: EnharmonicNameOptions): string {
    const { accidentals, asInt } = resolveEnharmonicNotation(options);
    if (asInt) return String(this.value);
    return pitchClassName(this.value, accidentals) + this.octaves();
  }

  toClass(): EnharmonicPitchClass {
    return new EnharmonicPitchClass(this.value);
  }

  pc(): EnharmonicPitchClass {
    return this.toClass();
  }

  embed(): EnharmonicPitch {
    return this;
  }

  compare(other: EnharmonicPitch): Sign {
    return sign(this.value - other.value);
  }
}

// ─── EnharmonicInterval ──────────────────────────────────────────────────────

export class EnharmonicInterval extends Interval<number, EnharmonicInterval> {
  static readonly family = "enharmonic";
  static readonly kind = "interval";

  constructor(semitones: number) {
    super(checkedSemitones(semitones, "EnharmonicInterval"), EnharmonicInterval);
  }

  /** Parse spelled notation ("M3:0", "-m2:1"). */
  static parse(input: string): EnharmonicInterval {
    return EnharmonicInterval.fromSpelled(SpelledInterval.parse(input));
  }

  /** Semitones measured downwards from C4, so the octave rule of pitches applies. */
  static fromSpelled(interval: SpelledInterval): EnharmonicInterval {
    const reference = SpelledPitch.fromIndependent(0, 4);
    return EnharmonicPitch.fromSpelled(reference).sub(EnharmonicPitch.fromSpelled(reference.sub(interval)));
  }

  static unison(): EnharmonicInterval {
    return new EnharmonicInterval(0);
  }

  static octave(): EnharmonicInterval {
    return new EnharmonicInterval(12);
  }

  static chromaticSemitone(): EnharmonicInterval {
    return new EnharmonicInterval(1);
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get intervalType(): ValueType<EnharmonicInterval> {
    return EnharmonicInterval;
  }

  protected create(value: number): EnharmonicInterval {
    return new EnharmonicInterval(value);
  }

  /** Full octaves spanned; downward intervals start at -1. */
  octaves(): number {
    return floorDiv(this.value, 12);
  }

  direction(): Sign {
    return sign(this.value);
  }

  /** Up to a whole tone in either direction. */
  isStep(): boolean {
    return Math.abs(this.value) <= 2;
  }

  name(): string {
    return intervalName(this.value);
  }

  toClass(): EnharmonicIntervalClass {
    return new EnharmonicIntervalClass(this.value);
  }

  ic(): EnharmonicIntervalClass {
    return this.toClass();
  }

  embed(): EnharmonicInterval {
    return this;
  }

  compare(other: EnharmonicInterval): Sign {
    return sign(this.value - other.value);
  }
}

// ─── EnharmonicPitchClass ────────────────────────────────────────────────────

export class EnharmonicPitchClass extends Pitch<number, EnharmonicPitchClass, EnharmonicIntervalClass> {
  static readonly family = "enharmonic";
  static readonly kind = "pitch-class";

  constructor(semitones: number) {
    super(mod(checkedSemitones(semitones, "EnharmonicPitchClass"), 12), EnharmonicPitchClass);
  }

  /** Parse spelled notation ("C#", "Db"). */
  static parse(input: string): EnharmonicPitchClass {
    return EnharmonicPitchClass.fromSpelled(SpelledPitchClass.parse(input));
  }

  static fromSpelled(pitchClass: SpelledPitchClass): EnharmonicPitchClass {
    return new EnharmonicPitchClass(semitonesFromFifths(pitchClass.fifths()));
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get pitchType(): ValueType<EnharmonicPitchClass> {
    return EnharmonicPitchClass;
  }

  protected get intervalType(): ValueType<EnharmonicIntervalClass> {
    return EnharmonicIntervalClass;
  }

  protected createPitch(value: number): EnharmonicPitchClass {
    return new EnharmonicPitchClass(value);
  }

  protected createInterval(value: number): EnharmonicIntervalClass {
    return new EnharmonicIntervalClass(value);
  }

  name(options?: EnharmonicNameOptions): string {
    const { accidentals, asInt } = resolveEnharmonicNotation(options);
    if (asInt) return String(this.value);
    return pitchClassName(this.value, accidentals);
  }

  toClass(): EnharmonicPitchClass {
    return this;
  }

  pc(): EnharmonicPitchClass {
    return this;
  }

  /** The pitch of this class in octave 0 (C0 = 12). */
  embed(): EnharmonicPitch {
    return new EnharmonicPitch(this.value + 12);
  }

  compare(other: EnharmonicPitchClass): Sign {
    return sign(this.value - other.value);
  }
}

// ─── EnharmonicIntervalClass ─────────────────────────────────────────────────

export class EnharmonicIntervalClass extends Interval<number, EnharmonicIntervalClass> {
  static readonly family = "enharmonic";
  static readonly kind = "interval-class";

  constructor(semitones: number) {
    super(mod(checkedSemitones(semitones, "EnharmonicIntervalClass"), 12), EnharmonicIntervalClass);
  }

  /** Parse spelled notation ("M6", "-m3"). */
  static parse(input: string): EnharmonicIntervalClass {
    return EnharmonicIntervalClass.fromSpelled(SpelledIntervalClass.parse(input));
  }

  static fromSpelled(intervalClass: SpelledIntervalClass): EnharmonicIntervalClass {
    const reference = SpelledPitchClass.fromFifths(0);
    return EnharmonicPitchClass.fromSpelled(reference).sub(
      EnharmonicPitchClass.fromSpelled(reference.sub(intervalClass)),
    );
  }

  static unison(): EnharmonicIntervalClass {
    return new EnharmonicIntervalClass(0);
  }

  static octave(): EnharmonicIntervalClass {
    return new EnharmonicIntervalClass(0);
  }

  static chromaticSemitone(): EnharmonicIntervalClass {
    return new EnharmonicIntervalClass(1);
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get intervalType(): ValueType<EnharmonicIntervalClass> {
    return EnharmonicIntervalClass;
  }

  protected create(value: number): EnharmonicIntervalClass {
    return new EnharmonicIntervalClass(value);
  }

  /** 0 for the unison, otherwise 1: the stored value is never negative. */
  direction(): Sign {
    return sign(this.value);
  }

  /** Within a whole tone of the unison, either way round. */
  isStep(): boolean {
    return this.value <= 2 || this.value >= 10;
  }

  name(): string {
    return intervalName(this.value);
  }

  toClass(): EnharmonicIntervalClass {
    return this;
  }

  ic(): EnharmonicIntervalClass {
    return this;
  }

  embed(): EnharmonicInterval {
    return new EnharmonicInterval(this.value);
  }

  compare(other: EnharmonicIntervalClass): Sign {
    return sign(this.value - other.value);
  }
}
