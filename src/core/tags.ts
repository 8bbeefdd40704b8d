// ─── Type Tags ───────────────────────────────────────────────────────────────
//
// The closed set of pitch families and the four kinds each family has.
// ─────────────────────────────────────────────────────────────────────────────

export const FAMILIES = ["spelled", "enharmonic", "logfreq"] as const;
export const KINDS = ["pitch", "interval", "pitch-class", "interval-class"] as const;

export type Family = (typeof FAMILIES)[number];
export type Kind = (typeof KINDS)[number];

export interface TypeTag {
  readonly family: Family;
  readonly kind: Kind;
}

const FAMILY_NAMES: Record<Family, string> = {
  spelled: "Spelled",
  enharmonic: "Enharmonic",
  logfreq: "LogFreq",
};

const KIND_NAMES: Record<Kind, string> = {
  pitch: "Pitch",
  interval: "Interval",
  "pitch-class": "PitchClass",
  "interval-class": "IntervalClass",
};

/** "SpelledPitchClass", "LogFreqInterval", ... */
export function typeName(tag: TypeTag): string {
  return FAMILY_NAMES[tag.family] + KIND_NAMES[tag.kind];
}

export function isPitchKind(kind: Kind): boolean {
  return kind === "pitch" || kind === "pitch-class";
}

export function isClassKind(kind: Kind): boolean {
  return kind === "pitch-class" || kind === "interval-class";
}
