// ─── Engine Config Schema ────────────────────────────────────────────────────
//
// Policy defaults for the transforms that have more than one reasonable
// behavior. Authored as JSON; every field is optional and falls back to
// the defaults below.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { ARPEGGIO_PATTERNS } from "../transform/advanced.js";
import { DEFAULT_HARMONY_DEGREES } from "../transform/scales.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const ReverseConfigSchema = z.object({
  nonNoteEvents: z.enum(["keep", "mirror"]).default("keep"),
  reorder: z.boolean().default(false),
});

export const ExtractConfigSchema = z.object({
  keepContext: z.boolean().default(false),
});

export const EngineConfigSchema = z.object({
  /** Center note of extractNotes' band. */
  extractCenter: z.number().int().min(0).max(127).default(60),
  reverse: ReverseConfigSchema.default({}),
  extract: ExtractConfigSchema.default({}),
  /** Scale-degree offsets used when a mode names none. */
  harmonyDegrees: z.array(z.number().int().positive()).default([...DEFAULT_HARMONY_DEGREES]),
  arpeggioPattern: z.enum(ARPEGGIO_PATTERNS).default("up"),
  /** Resolution written by the codec. */
  ticksPerBeat: z.number().int().min(1).max(0x7fff).default(480),
}).strict();

// ─── Derived Types ───────────────────────────────────────────────────────────

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
/** What a caller may write: any subset of EngineConfig. */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate an engine config object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateEngineConfig(config: unknown): ConfigError[] {
  const result = EngineConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/** Fill defaults; throws the zod error on invalid input. */
export function resolveEngineConfig(config: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(config);
}
