/**
 * Trial Catalog Loader
 *
 * Reads the precomputed catalog (test type → comparison groups → trials),
 * canonicalises type aliases and checks every type against the descriptor
 * registry. Nothing is sampled or mutated here.
 */

import { readFile } from "node:fs/promises";
import { CatalogMalformedError, CatalogNotFoundError, UnknownTrialTypeError } from "../domain/errors.js";
import {
  CatalogFile,
  REFERENCE_FREE_FAMILIES,
  canonicalTag,
  scoredCounterpart,
  toTrialSpec,
  type Catalog,
  type ComparisonGroup,
  type TrialSpec,
} from "../schemas/trial.js";
import type { TrialDescriptorRegistry } from "../trials/registry.js";

/**
 * Validate an already-parsed catalog document
 *
 * @throws CatalogMalformedError on shape errors or missing required fields
 * @throws UnknownTrialTypeError when a type has no registered descriptor
 */
export function parseCatalog(raw: unknown, registry?: TrialDescriptorRegistry): Catalog {
  const parsed = CatalogFile.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogMalformedError(
      "Catalog does not match the expected shape",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const catalog = new Map<string, ComparisonGroup[]>();
  const issues: string[] = [];

  for (const [rawBucket, groups] of Object.entries(parsed.data)) {
    const bucket = canonicalTag(rawBucket);
    if (registry && !registry.has(bucket)) {
      throw new UnknownTrialTypeError(rawBucket, registry.language);
    }

    const converted = groups.map((group, groupIndex) =>
      group.map((record, trialIndex): TrialSpec => {
        const spec = toTrialSpec(record);
        if (registry && !registry.has(spec.type)) {
          throw new UnknownTrialTypeError(record.type, registry.language);
        }
        if (spec.reference === null && !REFERENCE_FREE_FAMILIES.has(scoredCounterpart(spec.type))) {
          issues.push(`${rawBucket}.${groupIndex}.${trialIndex}: "reference" is required for ${spec.type}`);
        }
        return spec;
      })
    );

    const existing = catalog.get(bucket);
    catalog.set(bucket, existing ? [...existing, ...converted] : converted);
  }

  if (issues.length > 0) {
    throw new CatalogMalformedError("Catalog has trials missing required fields", issues);
  }

  return catalog;
}

/**
 * Load and validate the catalog file
 *
 * @throws CatalogNotFoundError when the file is absent or unreadable
 */
export async function loadCatalog(path: string, registry?: TrialDescriptorRegistry): Promise<Catalog> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new CatalogNotFoundError(path, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CatalogMalformedError("Catalog is not valid JSON", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parseCatalog(raw, registry);
}

export function countTrials(catalog: Catalog): number {
  let total = 0;
  for (const groups of catalog.values()) {
    for (const group of groups) {
      total += group.length;
    }
  }
  return total;
}
