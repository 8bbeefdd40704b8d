// ─── Default Converters ──────────────────────────────────────────────────────
//
// Spelled → Enharmonic drops the spelling; Enharmonic → LogFreq tunes to
// 12-tone equal temperament at A4 = 440 Hz. Registering the second step
// with createImplicit chains the two, giving Spelled → LogFreq.
// ─────────────────────────────────────────────────────────────────────────────

import type { ConverterRegistry } from "./registry.js";
import {
  SpelledInterval,
  SpelledIntervalClass,
  SpelledPitch,
  SpelledPitchClass,
} from "../spelled.js";
import {
  EnharmonicInterval,
  EnharmonicIntervalClass,
  EnharmonicPitch,
  EnharmonicPitchClass,
} from "../enharmonic.js";
import {
  LogFreqInterval,
  LogFreqIntervalClass,
  LogFreqPitch,
  LogFreqPitchClass,
} from "../logfreq.js";

/** Frequency of a semitone number at A4 (69) = 440 Hz. */
function equalTemperedFrequency(semitones: number): number {
  return 2 ** ((semitones - 69) / 12) * 440;
}

function equalTemperedRatio(semitones: number): number {
  return 2 ** (semitones / 12);
}

export function registerDefaultConverters(registry: ConverterRegistry): void {
  registry.register(SpelledPitch, EnharmonicPitch, (p) => EnharmonicPitch.fromSpelled(p));
  registry.register(SpelledInterval, EnharmonicInterval, (i) => EnharmonicInterval.fromSpelled(i));
  registry.register(SpelledPitchClass, EnharmonicPitchClass, (pc) => EnharmonicPitchClass.fromSpelled(pc));
  registry.register(SpelledIntervalClass, EnharmonicIntervalClass, (ic) => EnharmonicIntervalClass.fromSpelled(ic));

  const implicit = { createImplicit: true };
  registry.register(
    EnharmonicPitch,
    LogFreqPitch,
    (p) => LogFreqPitch.fromFrequency(equalTemperedFrequency(p.value)),
    implicit,
  );
  registry.register(
    EnharmonicInterval,
    LogFreqInterval,
    (i) => LogFreqInterval.fromRatio(equalTemperedRatio(i.value)),
    implicit,
  );
  registry.register(
    EnharmonicPitchClass,
    LogFreqPitchClass,
    (pc) => LogFreqPitchClass.fromFrequency(equalTemperedFrequency(pc.value)),
    implicit,
  );
  registry.register(
    EnharmonicIntervalClass,
    LogFreqIntervalClass,
    (ic) => LogFreqIntervalClass.fromRatio(equalTemperedRatio(ic.value)),
    implicit,
  );
}
