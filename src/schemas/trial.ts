import { z } from "zod";

/**
 * Scored families. Instruction and attention tags map onto one of these for
 * their rating scale.
 */
export type TestFamily = "similarity" | "comparative" | "quality" | "naturalness" | "edit-fidelity";

export const REFERENCE_FREE_FAMILIES: ReadonlySet<string> = new Set(["quality", "naturalness", "edit-fidelity"]);

const INSTRUCTION_SUFFIX = "-instruction";

export function isInstructionTag(tag: string): boolean {
  return tag.endsWith(INSTRUCTION_SUFFIX);
}

/**
 * The scored tag an instruction tag illustrates (`comparative-instruction`
 * → `comparative`). Other tags map to themselves.
 */
export function scoredCounterpart(tag: string): string {
  return isInstructionTag(tag) ? tag.slice(0, -INSTRUCTION_SUFFIX.length) : tag;
}

/**
 * Legacy and shorthand tags accepted in catalog files
 */
export const TEST_TYPE_ALIASES: Readonly<Record<string, string>> = {
  SMOS: "similarity",
  smos: "similarity",
  smos_instruction: "similarity-instruction",
  CMOS: "comparative",
  cmos: "comparative",
  cmos_instruction: "comparative-instruction",
  QMOS: "quality",
  qmos: "quality",
  qmos_instruction: "quality-instruction",
  MOS: "quality",
  NMOS: "naturalness",
  nmos: "naturalness",
  nmos_instruction: "naturalness-instruction",
  EMOS: "edit-fidelity",
  emos: "edit-fidelity",
  emos_instruction: "edit-fidelity-instruction",
};

/**
 * Resolve an alias to its canonical tag. Unknown tags pass through unchanged
 * so the registry can decide.
 */
export function canonicalTag(tag: string): string {
  return TEST_TYPE_ALIASES[tag] ?? tag;
}

/**
 * Audio reference: an http(s) URL or a path under the audio root
 */
export const AudioRef = z.string().min(1);

/**
 * A trial record as found in catalog and study files. Field names follow
 * the catalog format; `system` is the reference-free builders' name for the
 * target system.
 */
export const TrialRecord = z
  .object({
    type: z.string().min(1),
    reference: AudioRef.nullable().optional(),
    target: AudioRef,
    ref_system: z.string().nullable().optional(),
    target_system: z.string().nullable().optional(),
    system: z.string().nullable().optional(),
    swap: z.boolean().optional(),
    edited_transcript: z.string().nullable().optional(),
    ref_filename: z.string().optional(),
    target_filename: z.string().optional(),
    metalst_line: z.number().int().optional(),
  })
  .passthrough();
export type TrialRecordT = z.infer<typeof TrialRecord>;

/**
 * Immutable sampled trial
 */
export interface TrialSpec {
  readonly type: string;
  readonly reference: string | null;
  readonly target: string;
  readonly ref_system: string | null;
  readonly target_system: string | null;
  readonly swap: boolean;
  readonly edited_transcript: string | null;
  readonly ref_filename?: string;
  readonly target_filename?: string;
  readonly metalst_line?: number;
}

export type ComparisonGroup = readonly TrialSpec[];

/**
 * Catalog: test-type bucket → comparison groups. Map keeps the file's key
 * order, which fixes bucket order in sampled sessions.
 */
export type Catalog = ReadonlyMap<string, readonly ComparisonGroup[]>;

export const CatalogFile = z.record(z.array(z.array(TrialRecord)));

/**
 * Normalise a parsed record into a TrialSpec with a canonical tag
 */
export function toTrialSpec(record: TrialRecordT): TrialSpec {
  const spec: {
    -readonly [K in keyof TrialSpec]: TrialSpec[K];
  } = {
    type: canonicalTag(record.type),
    reference: record.reference ?? null,
    target: record.target,
    ref_system: record.ref_system ?? null,
    target_system: record.target_system ?? record.system ?? null,
    swap: record.swap ?? false,
    edited_transcript: record.edited_transcript ?? null,
  };
  if (record.ref_filename !== undefined) spec.ref_filename = record.ref_filename;
  if (record.target_filename !== undefined) spec.target_filename = record.target_filename;
  if (record.metalst_line !== undefined) spec.metalst_line = record.metalst_line;
  return spec;
}
