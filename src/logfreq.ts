// ─── Log-Frequency Pitches and Intervals ─────────────────────────────────────
//
// Continuous pitch space. Pitches store ln(frequency in Hz), intervals
// store ln(frequency ratio); class values are reduced modulo ln 2, so a
// pitch class is a frequency in [1 Hz, 2 Hz) and an interval class a
// ratio in [1, 2).
// ─────────────────────────────────────────────────────────────────────────────

import { mod, scalarAlgebra, sign, zero, type Algebra, type Sign } from "./core/algebra.js";
import { Interval } from "./core/interval.js";
import { Pitch } from "./core/pitch.js";
import type { ValueType } from "./core/value.js";
import { resolveLogFreqNotation, type LogFreqNameOptions } from "./config/schema.js";
import { DomainError, ParseError } from "./errors.js";

export const LN2 = Math.log(2);

const NUMBER = String.raw`[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?`;
const FREQUENCY_PATTERN = new RegExp(`^(${NUMBER})Hz$`);
const RATIO_PATTERN = new RegExp(`^(${NUMBER})$`);

// ─── Helpers ─────────────────────────────────────────────────────────────────

function checkedLog(value: number, typeName: string): number {
  if (!Number.isFinite(value)) {
    throw new DomainError(`${typeName} needs a finite log value, got ${value}`, value);
  }
  return zero(value);
}

function logOfPositive(x: number, what: string): number {
  if (!Number.isFinite(x) || x <= 0) {
    throw new DomainError(`A ${what} must be a positive finite number, got ${x}`, x);
  }
  return Math.log(x);
}

function parseFrequency(input: string, typeName: string): number {
  const match = input.match(FREQUENCY_PATTERN);
  if (!match) {
    throw new ParseError(input, `a ${typeName} (a number followed by "Hz", e.g. "440Hz")`);
  }
  return logOfPositive(Number(match[1]), "frequency");
}

function parseRatio(input: string, typeName: string): number {
  const match = input.match(RATIO_PATTERN);
  if (!match) {
    throw new ParseError(input, `a ${typeName} (a frequency ratio, e.g. "1.5")`);
  }
  return logOfPositive(Number(match[1]), "ratio");
}

/** Round to `precision` decimals and drop trailing zeros. */
function formatDecimal(x: number, precision: number): string {
  return String(Number(x.toFixed(precision)));
}

function reduceOctave(logValue: number): number {
  return mod(logValue, LN2);
}

/** Whether two log values lie within `tolerance` of each other. */
export function isLogClose(a: number, b: number, tolerance = 1e-9): boolean {
  return Math.abs(a - b) <= tolerance;
}

// ─── LogFreqPitch ────────────────────────────────────────────────────────────

export class LogFreqPitch extends Pitch<number, LogFreqPitch, LogFreqInterval> {
  static readonly family = "logfreq";
  static readonly kind = "pitch";

  /** Construct from a natural-log frequency; see fromFrequency for Hz. */
  constructor(logFrequency: number) {
    super(checkedLog(logFrequency, "LogFreqPitch"), LogFreqPitch);
  }

  static fromFrequency(hz: number): LogFreqPitch {
    return new LogFreqPitch(logOfPositive(hz, "frequency"));
  }

  /** Parse "440Hz". */
  static parse(input: string): LogFreqPitch {
    return new LogFreqPitch(parseFrequency(input, "LogFreqPitch"));
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get pitchType(): ValueType<LogFreqPitch> {
    return LogFreqPitch;
  }

  protected get intervalType(): ValueType<LogFreqInterval> {
    return LogFreqInterval;
  }

  protected createPitch(value: number): LogFreqPitch {
    return new LogFreqPitch(value);
  }

  protected createInterval(value: number): LogFreqInterval {
    return new LogFreqInterval(value);
  }

  freq(): number {
    return Math.exp(this.value);
  }

  name(options?: LogFreqNameOptions): string {
    const { precision } = resolveLogFreqNotation(options);
    return `${formatDecimal(this.freq(), precision)}Hz`;
  }

  toClass(): LogFreqPitchClass {
    return new LogFreqPitchClass(this.value);
  }

  pc(): LogFreqPitchClass {
    return this.toClass();
  }

  embed(): LogFreqPitch {
    return this;
  }

  compare(other: LogFreqPitch): Sign {
    return sign(this.value - other.value);
  }

  isCloseTo(other: LogFreqPitch, tolerance?: number): boolean {
    return isLogClose(this.value, other.value, tolerance);
  }
}

// ─── LogFreqInterval ─────────────────────────────────────────────────────────

export class LogFreqInterval extends Interval<number, LogFreqInterval> {
  static readonly family = "logfreq";
  static readonly kind = "interval";

  /** Construct from a natural-log ratio; see fromRatio for plain ratios. */
  constructor(logRatio: number) {
    super(checkedLog(logRatio, "LogFreqInterval"), LogFreqInterval);
  }

  static fromRatio(ratio: number): LogFreqInterval {
    return new LogFreqInterval(logOfPositive(ratio, "ratio"));
  }

  /** Parse a ratio such as "1.5". */
  static parse(input: string): LogFreqInterval {
    return new LogFreqInterval(parseRatio(input, "LogFreqInterval"));
  }

  static unison(): LogFreqInterval {
    return new LogFreqInterval(0);
  }

  static octave(): LogFreqInterval {
    return new LogFreqInterval(LN2);
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get intervalType(): ValueType<LogFreqInterval> {
    return LogFreqInterval;
  }

  protected create(value: number): LogFreqInterval {
    return new LogFreqInterval(value);
  }

  ratio(): number {
    return Math.exp(this.value);
  }

  direction(): Sign {
    return sign(this.value);
  }

  name(options?: LogFreqNameOptions): string {
    const { precision } = resolveLogFreqNotation(options);
    return formatDecimal(this.ratio(), precision);
  }

  toClass(): LogFreqIntervalClass {
    return new LogFreqIntervalClass(this.value);
  }

  ic(): LogFreqIntervalClass {
    return this.toClass();
  }

  embed(): LogFreqInterval {
    return this;
  }

  compare(other: LogFreqInterval): Sign {
    return sign(this.value - other.value);
  }

  isCloseTo(other: LogFreqInterval, tolerance?: number): boolean {
    return isLogClose(this.value, other.value, tolerance);
  }
}

// ─── LogFreqPitchClass ───────────────────────────────────────────────────────

export class LogFreqPitchClass extends Pitch<number, LogFreqPitchClass, LogFreqIntervalClass> {
  static readonly family = "logfreq";
  static readonly kind = "pitch-class";

  constructor(logFrequency: number) {
    super(reduceOctave(checkedLog(logFrequency, "LogFreqPitchClass")), LogFreqPitchClass);
  }

  static fromFrequency(hz: number): LogFreqPitchClass {
    return new LogFreqPitchClass(logOfPositive(hz, "frequency"));
  }

  static parse(input: string): LogFreqPitchClass {
    return new LogFreqPitchClass(parseFrequency(input, "LogFreqPitchClass"));
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get pitchType(): ValueType<LogFreqPitchClass> {
    return LogFreqPitchClass;
  }

  protected get intervalType(): ValueType<LogFreqIntervalClass> {
    return LogFreqIntervalClass;
  }

  protected createPitch(value: number): LogFreqPitchClass {
    return new LogFreqPitchClass(value);
  }

  protected createInterval(value: number): LogFreqIntervalClass {
    return new LogFreqIntervalClass(value);
  }

  /** Representative frequency in [1 Hz, 2 Hz). */
  freq(): number {
    return Math.exp(this.value);
  }

  name(options?: LogFreqNameOptions): string {
    const { precision } = resolveLogFreqNotation(options);
    return `${formatDecimal(this.freq(), precision)}Hz`;
  }

  toClass(): LogFreqPitchClass {
    return this;
  }

  pc(): LogFreqPitchClass {
    return this;
  }

  embed(): LogFreqPitch {
    return new LogFreqPitch(this.value);
  }

  compare(other: LogFreqPitchClass): Sign {
    return sign(this.value - other.value);
  }

  isCloseTo(other: LogFreqPitchClass, tolerance?: number): boolean {
    return isLogClose(this.value, other.value, tolerance);
  }
}

// ─── LogFreqIntervalClass ────────────────────────────────────────────────────

export class LogFreqIntervalClass extends Interval<number, LogFreqIntervalClass> {
  static readonly family = "logfreq";
  static readonly kind = "interval-class";

  constructor(logRatio: number) {
    super(reduceOctave(checkedLog(logRatio, "LogFreqIntervalClass")), LogFreqIntervalClass);
  }

  static fromRatio(ratio: number): LogFreqIntervalClass {
    return new LogFreqIntervalClass(logOfPositive(ratio, "ratio"));
  }

  static parse(input: string): LogFreqIntervalClass {
    return new LogFreqIntervalClass(parseRatio(input, "LogFreqIntervalClass"));
  }

  static unison(): LogFreqIntervalClass {
    return new LogFreqIntervalClass(0);
  }

  static octave(): LogFreqIntervalClass {
    return new LogFreqIntervalClass(0);
  }

  protected get algebra(): Algebra<number> {
    return scalarAlgebra;
  }

  protected get intervalType(): ValueType<LogFreqIntervalClass> {
    return LogFreqIntervalClass;
  }

  protected create(value: number): LogFreqIntervalClass {
    return new LogFreqIntervalClass(value);
  }

  /** Representative ratio in [1, 2). */
  ratio(): number {
    return Math.exp(this.value);
  }

  direction(): Sign {
    return sign(this.value);
  }

  name(options?: LogFreqNameOptions): string {
    const { precision } = resolveLogFreqNotation(options);
    return formatDecimal(this.ratio(), precision);
  }

  toClass(): LogFreqIntervalClass {
    return this;
  }

  ic(): LogFreqIntervalClass {
    return this;
  }

  embed(): LogFreqInterval {
    return new LogFreqInterval(this.value);
  }

  compare(other: LogFreqIntervalClass): Sign {
    return sign(this.value - other.value);
  }

  isCloseTo(other: LogFreqIntervalClass, tolerance?: number): boolean {
    return isLogClose(this.value, other.value, tolerance);
  }
}
