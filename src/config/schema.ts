// ─── Notation Config Schema ──────────────────────────────────────────────────
//
// Presentation options for printing values. They never change a value,
// only how name() spells it: sharps or flats, raw integers, decimal places.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { DomainError } from "../errors.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const ACCIDENTAL_STYLES = ["sharp", "flat"] as const;

export const EnharmonicNotationSchema = z.object({
  accidentals: z.enum(ACCIDENTAL_STYLES).default("sharp"),
  asInt: z.boolean().default(false),
});

export const LogFreqNotationSchema = z.object({
  precision: z.number().int().min(0).max(12).default(2),
});

export const NotationConfigSchema = z.object({
  enharmonic: EnharmonicNotationSchema.default({}),
  logfreq: LogFreqNotationSchema.default({}),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type AccidentalStyle = (typeof ACCIDENTAL_STYLES)[number];
export type EnharmonicNotation = z.infer<typeof EnharmonicNotationSchema>;
export type LogFreqNotation = z.infer<typeof LogFreqNotationSchema>;
export type NotationConfig = z.infer<typeof NotationConfigSchema>;

/** Options accepted by name(): any subset, the rest defaulted. */
export type EnharmonicNameOptions = z.input<typeof EnharmonicNotationSchema>;
export type LogFreqNameOptions = z.input<typeof LogFreqNotationSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

function toConfigErrors(error: z.ZodError): ConfigError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Validate a notation config object.
 * Returns an empty array if valid.
 */
export function validateNotationConfig(config: unknown): ConfigError[] {
  const result = NotationConfigSchema.safeParse(config);
  if (result.success) return [];
  return toConfigErrors(result.error);
}

function resolve<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: unknown, label: string): T {
  const result = schema.safeParse(options ?? {});
  if (result.success) return result.data;

  const issues = toConfigErrors(result.error)
    .map((e) => `${e.field}: ${e.message}`)
    .join("; ");
  throw new DomainError(`Invalid ${label} options: ${issues}`, options);
}

export function resolveEnharmonicNotation(options?: EnharmonicNameOptions): EnharmonicNotation {
  return resolve(EnharmonicNotationSchema, options, "enharmonic name");
}

export function resolveLogFreqNotation(options?: LogFreqNameOptions): LogFreqNotation {
  return resolve(LogFreqNotationSchema, options, "log-frequency name");
}
