// ─── Engine Config Loader ────────────────────────────────────────────────────
//
// Reads an engine config .json file, validates it with Zod, and returns a
// fully defaulted EngineConfig.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { basename } from "node:path";
import { EngineConfigSchema, type EngineConfig } from "./schema.js";

/**
 * Load and validate an engine config from a JSON file.
 */
export function loadEngineConfig(filePath: string): EngineConfig {
  if (!existsSync(filePath)) {
    throw new Error(`Config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new Error(`Invalid JSON in ${basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${basename(filePath)}:\n${issues}`);
  }

  console.error(`Engine config loaded: ${basename(filePath)}`);
  return result.data;
}
