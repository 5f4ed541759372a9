/**
 * Catalog Builder
 *
 * Scans per-system audio directories under one root and writes the catalog
 * the service loads. Paths in the output are relative to the root, so the
 * root doubles as the server's AUDIO_ROOT.
 */

import type { Dirent } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { z } from "zod";
import { log } from "../utils/telemetry.js";
import type { TrialRecordT } from "../schemas/trial.js";
import { defaultRandom, sampleWithoutReplacement, type RandomSource } from "../trials/random.js";

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([".wav", ".mp3", ".m4a", ".flac", ".ogg", ".aac"]);

const PairEntry = z.object({ ref: z.string().min(1), target: z.string().min(1) });
const MetaListEntry = PairEntry.extend({ metalst: z.string().min(1) });
const TargetEntry = z.object({ target: z.string().min(1) });

export const BuilderConfig = z.object({
  root_dir: z.string().min(1),
  systems: z.array(z.string().min(1)).min(1),
  tests: z
    .object({
      comparative: z.array(PairEntry).optional(),
      similarity: z.array(MetaListEntry).optional(),
      quality: z.array(TargetEntry).optional(),
      naturalness: z.array(TargetEntry).optional(),
    })
    .strict(),
  num_pairs: z.number().int().positive().default(50),
  seed: z.number().int().optional(),
});
export type BuilderConfigT = z.infer<typeof BuilderConfig>;

export interface AudioFile {
  /** File name, the matching key across systems */
  name: string;
  /** Path relative to the root, forward slashes */
  path: string;
}

export type SystemFiles = ReadonlyMap<string, readonly AudioFile[]>;

/** Catalog document: bucket → comparison groups → trial records */
export type CatalogDocument = Record<string, TrialRecordT[][]>;

/**
 * Audio files directly inside `<root>/<system>`, sorted by name. A missing
 * directory yields an empty list.
 */
export async function scanSystem(root: string, system: string): Promise<AudioFile[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(join(root, system), { withFileTypes: true });
  } catch (error) {
    log.warn({ system, error: error instanceof Error ? error.message : String(error) }, "System directory not readable");
    return [];
  }

  return entries
    .filter((entry) => entry.isFile() && AUDIO_EXTENSIONS.has(extname(entry.name).toLowerCase()))
    .map((entry) => ({ name: entry.name, path: `${system}/${entry.name}` }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export async function scanSystems(root: string, systems: readonly string[]): Promise<Map<string, AudioFile[]>> {
  const files = new Map<string, AudioFile[]>();
  for (const system of systems) {
    const found = await scanSystem(root, system);
    log.info({ system, files: found.length }, "Scanned system directory");
    files.set(system, found);
  }
  return files;
}

function byName(files: readonly AudioFile[]): Map<string, AudioFile> {
  return new Map(files.map((file) => [file.name, file]));
}

/**
 * Same-named files from both systems, walking the reference listing in
 * order. Reference files without a counterpart still use up a slot.
 */
export function comparativeGroup(
  files: SystemFiles,
  entry: z.infer<typeof PairEntry>,
  numPairs: number
): TrialRecordT[] | null {
  const refFiles = files.get(entry.ref) ?? [];
  const targetFiles = files.get(entry.target) ?? [];
  if (refFiles.length === 0 || targetFiles.length === 0) {
    log.warn({ ref: entry.ref, target: entry.target }, "No audio for comparative pair, skipped");
    return null;
  }

  const targets = byName(targetFiles);
  const limit = Math.min(refFiles.length, targetFiles.length, numPairs);
  const group: TrialRecordT[] = [];

  for (const refFile of refFiles.slice(0, limit)) {
    const targetFile = targets.get(refFile.name);
    if (!targetFile) {
      log.warn({ file: refFile.name, system: entry.target }, "No matching target file");
      continue;
    }
    group.push({
      type: "comparative",
      reference: refFile.path,
      target: targetFile.path,
      ref_system: entry.ref,
      target_system: entry.target,
      ref_filename: refFile.path,
      target_filename: targetFile.path,
    });
  }

  return group;
}

/**
 * Pairs listed in a tab-separated meta list: field 0 names the reference
 * file, field 3 the target. Blank lines and lines with fewer than four
 * fields are skipped; line numbers are zero-based.
 */
export function similarityGroup(
  files: SystemFiles,
  entry: z.infer<typeof MetaListEntry>,
  metaList: string,
  numPairs: number
): TrialRecordT[] | null {
  const refFiles = files.get(entry.ref) ?? [];
  const targetFiles = files.get(entry.target) ?? [];
  if (refFiles.length === 0 || targetFiles.length === 0) {
    log.warn({ ref: entry.ref, target: entry.target }, "No audio for similarity pair, skipped");
    return null;
  }

  const refs = byName(refFiles);
  const targets = byName(targetFiles);
  const group: TrialRecordT[] = [];

  const lines = metaList.split(/\r?\n/);
  for (let lineNumber = 0; lineNumber < lines.length && group.length < numPairs; lineNumber++) {
    const line = lines[lineNumber].trim();
    if (!line) continue;

    const fields = line.split("\t");
    if (fields.length < 4) {
      log.warn({ metalst: entry.metalst, line: lineNumber }, "Meta list line has fewer than 4 fields");
      continue;
    }

    const refFile = refs.get(basename(fields[0]));
    const targetFile = targets.get(basename(fields[3]));
    if (!refFile || !targetFile) {
      log.warn({ metalst: entry.metalst, line: lineNumber }, "Meta list line names files not found");
      continue;
    }

    group.push({
      type: "similarity",
      reference: refFile.path,
      target: targetFile.path,
      ref_system: entry.ref,
      target_system: entry.target,
      ref_filename: refFile.path,
      target_filename: targetFile.path,
      metalst_line: lineNumber,
    });
  }

  return group;
}

/**
 * Random single-stimulus sample from one system
 */
export function singleStimulusGroup(
  files: SystemFiles,
  type: "quality" | "naturalness",
  system: string,
  numPairs: number,
  rng: RandomSource
): TrialRecordT[] | null {
  const targetFiles = files.get(system) ?? [];
  if (targetFiles.length === 0) {
    log.warn({ type, system }, "No audio for single-stimulus evaluation, skipped");
    return null;
  }

  return sampleWithoutReplacement(targetFiles, numPairs, rng).map((file) => ({
    type,
    reference: null,
    target: file.path,
    system,
    target_filename: file.path,
  }));
}

export interface BuildCatalogOptions {
  rng?: RandomSource;
  /** Meta list reader; paths are resolved against the working directory */
  readMetaList?: (path: string) => Promise<string>;
}

/**
 * Assemble the catalog document. Buckets appear in config order and only
 * when they produced at least one group.
 */
export async function buildCatalog(
  cfg: BuilderConfigT,
  files: SystemFiles,
  options: BuildCatalogOptions = {}
): Promise<CatalogDocument> {
  const rng = options.rng ?? defaultRandom;
  const readMetaList = options.readMetaList ?? ((path: string) => readFile(resolve(path), "utf-8"));
  const catalog: CatalogDocument = {};

  const add = (bucket: string, group: TrialRecordT[] | null) => {
    if (group === null) return;
    (catalog[bucket] ??= []).push(group);
  };

  for (const entry of cfg.tests.comparative ?? []) {
    add("comparative", comparativeGroup(files, entry, cfg.num_pairs));
  }

  for (const entry of cfg.tests.similarity ?? []) {
    let text: string;
    try {
      text = await readMetaList(entry.metalst);
    } catch (error) {
      log.warn(
        { metalst: entry.metalst, error: error instanceof Error ? error.message : String(error) },
        "Meta list not readable, similarity pair skipped"
      );
      continue;
    }
    add("similarity", similarityGroup(files, entry, text, cfg.num_pairs));
  }

  for (const type of ["quality", "naturalness"] as const) {
    for (const entry of cfg.tests[type] ?? []) {
      add(type, singleStimulusGroup(files, type, entry.target, cfg.num_pairs, rng));
    }
  }

  return catalog;
}

export function countCatalogTrials(catalog: CatalogDocument): number {
  return Object.values(catalog).reduce(
    (total, groups) => total + groups.reduce((sum, group) => sum + group.length, 0),
    0
  );
}
