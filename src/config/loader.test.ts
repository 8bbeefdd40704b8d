import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { loadNotationConfig } from "./loader.js";
import {
  validateNotationConfig,
  resolveEnharmonicNotation,
  resolveLogFreqNotation,
  NotationConfigSchema,
} from "./schema.js";
import { DomainError } from "../errors.js";

const fixture = (name: string) => fileURLToPath(new URL(`../__fixtures__/${name}`, import.meta.url));

describe("NotationConfigSchema", () => {
  it("defaults every field", () => {
    expect(NotationConfigSchema.parse({})).toEqual({
      enharmonic: { accidentals: "sharp", asInt: false },
      logfreq: { precision: 2 },
    });
  });
});

describe("validateNotationConfig", () => {
  it("returns no errors for a valid config", () => {
    expect(validateNotationConfig({ enharmonic: { asInt: true } })).toEqual([]);
  });

  it("reports the offending field", () => {
    const errors = validateNotationConfig({ logfreq: { precision: -1 } });
    expect(errors).toHaveLength(1);
    expect(errors[0].field).toBe("logfreq.precision");
  });

  it("reports non-objects against the root", () => {
    const errors = validateNotationConfig("flat");
    expect(errors).toHaveLength(1);
    expect(errors[0].field).toBe("root");
  });
});

describe("name option resolution", () => {
  it("fills in defaults", () => {
    expect(resolveEnharmonicNotation()).toEqual({ accidentals: "sharp", asInt: false });
    expect(resolveEnharmonicNotation({ accidentals: "flat" })).toEqual({ accidentals: "flat", asInt: false });
    expect(resolveLogFreqNotation({})).toEqual({ precision: 2 });
  });

  it("throws DomainError on out-of-range options", () => {
    expect(() => resolveLogFreqNotation({ precision: 13 })).toThrow(DomainError);
    expect(() => resolveLogFreqNotation({ precision: 13 })).toThrow("Invalid log-frequency name options: precision:");
  });
});

describe("loadNotationConfig", () => {
  it("loads and defaults a config file", () => {
    expect(loadNotationConfig(fixture("notation.config.json"))).toEqual({
      enharmonic: { accidentals: "flat", asInt: false },
      logfreq: { precision: 3 },
    });
  });

  it("lists every invalid field", () => {
    const load = () => loadNotationConfig(fixture("notation.invalid.json"));
    expect(load).toThrow("Invalid config notation.invalid.json:");
    expect(load).toThrow("enharmonic.accidentals");
    expect(load).toThrow("enharmonic.asInt");
    expect(load).toThrow("logfreq.precision");
  });

  it("throws when the file is missing", () => {
    expect(() => loadNotationConfig(fixture("missing.json"))).toThrow("Config not found");
  });

  it("throws on malformed JSON", () => {
    const dir = mkdtempSync(join(tmpdir(), "notation-config-"));
    const file = join(dir, "broken.json");
    writeFileSync(file, "{ not json");
    try {
      expect(() => loadNotationConfig(file)).toThrow("Invalid config broken.json");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
