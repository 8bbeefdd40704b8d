// ─── pitch-algebra ───────────────────────────────────────────────────────────
//
// Pitches and intervals as algebraic values: spelled (line of fifths),
// enharmonic (12-TET semitones) and log-frequency, each with pitch,
// interval, pitch-class and interval-class variants.
//
// Usage:
//   import { SpelledPitch, EnharmonicPitch } from "pitch-algebra";
//   SpelledPitch.parse("C#4").convertTo(EnharmonicPitch).midi; // 61
// ─────────────────────────────────────────────────────────────────────────────

import { defaultRegistry } from "./converters/registry.js";
import { registerDefaultConverters } from "./converters/defaults.js";

registerDefaultConverters(defaultRegistry);
defaultRegistry.freeze();

// Value families
export {
  SpelledPitch,
  SpelledInterval,
  SpelledPitchClass,
  SpelledIntervalClass,
  parseSpelled,
} from "./spelled.js";
export type { SpelledValue } from "./spelled.js";

export {
  EnharmonicPitch,
  EnharmonicInterval,
  EnharmonicPitchClass,
  EnharmonicIntervalClass,
  semitonesFromFifths,
  midiFromSpelled,
} from "./enharmonic.js";

export {
  LogFreqPitch,
  LogFreqInterval,
  LogFreqPitchClass,
  LogFreqIntervalClass,
  isLogClose,
  LN2,
} from "./logfreq.js";

// Generic algebra
export { PitchTypeValue } from "./core/value.js";
export type { AnyValue, AnyValueType, BinaryOp, ValueType } from "./core/value.js";
export { Pitch } from "./core/pitch.js";
export { Interval } from "./core/interval.js";
export { add, sub, mul, div, neg, resultKind } from "./core/operations.js";
export { floorDiv, mod, sign, scalarAlgebra, fifthsOctaves, fifthsOctavesAlgebra } from "./core/algebra.js";
export type { Algebra, FifthsOctaves, Sign } from "./core/algebra.js";
export { FAMILIES, KINDS, typeName } from "./core/tags.js";
export type { Family, Kind, TypeTag } from "./core/tags.js";

// Line of fifths and notation
export {
  NATURAL_LETTERS,
  DIATONIC_LETTERS,
  diatonicSteps,
  degreeFromFifths,
  genericIntervalNumber,
  accidentals,
  pitchClassLetter,
  intervalQuality,
  intervalClassName,
  fifthsFromLetter,
  fifthsFromGeneric,
} from "./line-of-fifths.js";
export type { Letter } from "./line-of-fifths.js";

export {
  parsePitchNotation,
  parseIntervalNotation,
  parseNotation,
  formatPitch,
  formatPitchClass,
  formatInterval,
  formatIntervalClass,
  PITCH_GRAMMAR,
  INTERVAL_GRAMMAR,
} from "./notation.js";
export type { PitchNotation, IntervalNotation, ParsedNotation } from "./notation.js";

// Conversion
export { ConverterRegistry, defaultRegistry, validateRegistry } from "./converters/registry.js";
export type { Converter, ConverterEdge, ConverterStats, RegisterOptions } from "./converters/registry.js";
export { registerDefaultConverters } from "./converters/defaults.js";

// Configuration
export {
  NotationConfigSchema,
  EnharmonicNotationSchema,
  LogFreqNotationSchema,
  validateNotationConfig,
  resolveEnharmonicNotation,
  resolveLogFreqNotation,
} from "./config/schema.js";
export type {
  AccidentalStyle,
  ConfigError,
  EnharmonicNameOptions,
  LogFreqNameOptions,
  NotationConfig,
} from "./config/schema.js";
export { loadNotationConfig } from "./config/loader.js";

// Errors
export {
  ValueError,
  ParseError,
  DomainError,
  TypeMismatchError,
  ConversionNotFoundError,
  ConversionConsistencyError,
  InvalidConverterError,
  ConverterExistsError,
  RegistryFrozenError,
} from "./errors.js";
