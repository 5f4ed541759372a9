import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { RESULTS_FILE_SUFFIX } from "../results/persister.js";
import { ResultBundle, type ResultBundleT } from "../schemas/results.js";
import { log } from "../utils/telemetry.js";
import { checkAttention } from "./attention.js";

export interface LoadedBundle {
  file: string;
  bundle: ResultBundleT;
}

export interface BundleLoadResult {
  bundles: LoadedBundle[];
  /** Files that could not be read or did not match the bundle shape */
  skipped: string[];
}

/**
 * Read every `*_results.json` in a directory, in file-name order
 */
export async function loadResultBundles(directory: string): Promise<BundleLoadResult> {
  const names = (await readdir(directory)).filter((name) => name.endsWith(RESULTS_FILE_SUFFIX)).sort();
  const bundles: LoadedBundle[] = [];
  const skipped: string[] = [];

  for (const name of names) {
    const file = join(directory, name);
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(file, "utf-8"));
    } catch (error) {
      log.warn({ file: name, error: error instanceof Error ? error.message : String(error) }, "Skipping unreadable result file");
      skipped.push(name);
      continue;
    }

    const parsed = ResultBundle.safeParse(raw);
    if (!parsed.success) {
      log.warn({ file: name, issues: parsed.error.issues.length }, "Skipping result file with unexpected shape");
      skipped.push(name);
      continue;
    }
    bundles.push({ file: name, bundle: parsed.data });
  }

  return { bundles, skipped };
}

export interface AttentionFilterResult {
  kept: LoadedBundle[];
  excluded: string[];
}

/**
 * Drop whole bundles that fail an attention check
 */
export function filterByAttention(bundles: readonly LoadedBundle[]): AttentionFilterResult {
  const kept: LoadedBundle[] = [];
  const excluded: string[] = [];

  for (const loaded of bundles) {
    const outcome = checkAttention(loaded.bundle.results);
    for (const path of outcome.unparsed) {
      log.warn({ file: loaded.file, audio: path }, "Attention check has no readable expected score, ignored");
    }
    if (outcome.passed) {
      kept.push(loaded);
    } else {
      excluded.push(loaded.file);
    }
  }

  return { kept, excluded };
}
