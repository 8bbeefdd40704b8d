// ─── Notation Config Loader ──────────────────────────────────────────────────
//
// Reads a notation config .json file, validates it with Zod, and returns
// a fully defaulted NotationConfig.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { basename } from "node:path";
import { NotationConfigSchema, type NotationConfig } from "./schema.js";

/**
 * Load and validate a notation config from a JSON file.
 */
export function loadNotationConfig(filePath: string): NotationConfig {
  if (!existsSync(filePath)) {
    throw new Error(`Config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid config ${basename(filePath)}: ${reason}`);
  }

  const result = NotationConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${basename(filePath)}:\n${issues}`);
  }

  return result.data;
}
