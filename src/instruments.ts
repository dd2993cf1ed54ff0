// ─── General MIDI Instruments ───────────────────────────────────────────────
//
// Program-number lookup over the General MIDI table: names, families of
// eight contiguous programs, and "next program in the same family".
// The table lives in data/general-midi.json next to the package root.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { TransformError, requireInteger } from "./errors.js";

const InstrumentTableSchema = z.object({
  familySize: z.number().int().positive(),
  families: z.array(z.string().min(1)),
  programs: z.array(z.string().min(1)).length(128),
}).refine(
  (t) => t.families.length * t.familySize === t.programs.length,
  "families × familySize must cover every program",
);

export type InstrumentTable = z.infer<typeof InstrumentTableSchema>;

/** The family a program belongs to. */
export interface InstrumentFamily {
  /** 0-based family index (0 = Piano, 1 = Chromatic Percussion, ...). */
  index: number;
  name: string;
  /** First program number in the family. */
  first: number;
  /** Last program number in the family. */
  last: number;
}

let table: InstrumentTable | null = null;

function tablePath(): string {
  // src/instruments.ts and dist/instruments.js both sit one level below the root
  const thisDir = dirname(fileURLToPath(import.meta.url));
  return join(thisDir, "..", "data", "general-midi.json");
}

/** Load (once) and validate the instrument table. */
export function loadInstrumentTable(): InstrumentTable {
  if (table) return table;
  const path = tablePath();
  const result = InstrumentTableSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid instrument table ${path}:\n${issues}`);
  }
  table = result.data;
  return table;
}

function checkProgram(program: number, operation: string): void {
  requireInteger(program, operation, "program", 0, 127);
}

/** Human-readable name, e.g. 40 → "Violin". */
export function instrumentName(program: number): string {
  checkProgram(program, "instrumentName");
  return loadInstrumentTable().programs[program];
}

export function instrumentFamily(program: number): InstrumentFamily {
  checkProgram(program, "instrumentFamily");
  const { familySize, families } = loadInstrumentTable();
  const index = Math.floor(program / familySize);
  const first = index * familySize;
  return { index, name: families[index], first, last: first + familySize - 1 };
}

/**
 * Next program within the same family, wrapping from the family's last
 * member back to its first (7 → 0, 47 → 40).
 */
export function nextInFamily(program: number): number {
  checkProgram(program, "nextInFamily");
  const { first, last } = instrumentFamily(program);
  return program === last ? first : program + 1;
}

/** Find a program number by (case-insensitive) name. */
export function findProgram(name: string): number {
  const wanted = name.trim().toLowerCase();
  const index = loadInstrumentTable().programs.findIndex(p => p.toLowerCase() === wanted);
  if (index === -1) {
    throw new TransformError("InvalidArgument", "findProgram", `Unknown instrument: "${name}"`);
  }
  return index;
}
