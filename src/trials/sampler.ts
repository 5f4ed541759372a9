/**
 * Trial Sampler
 *
 * Builds one session's fixed trial sequence from the catalog:
 * 1. per comparison group, min(len, n) trials without replacement
 * 2. per type bucket, the drawn trials shuffled; buckets kept in catalog order
 * 3. one instruction trial at the head of its family's bucket
 * 4. attention checks at sorted random positions inside a fractional window
 */

import { StudyConfigError } from "../domain/errors.js";
import { canonicalTag, scoredCounterpart, type Catalog, type TrialSpec } from "../schemas/trial.js";
import { log } from "../utils/telemetry.js";
import { defaultRandom, sampleWithoutReplacement, shuffle, type RandomSource } from "./random.js";

export interface AttentionWindow {
  /** Fraction of the final length before which no check is placed */
  readonly start: number;
  /** Fraction of the final length after which no check is placed */
  readonly end: number;
}

export const DEFAULT_ATTENTION_WINDOW: AttentionWindow = { start: 0.2, end: 0.9 };

export interface SamplerOptions {
  sampleSizePerGroup: number;
  instructionTrials?: readonly TrialSpec[];
  attentionPool?: readonly TrialSpec[];
  numAttentionChecks?: number;
  attentionWindow?: AttentionWindow;
  random?: RandomSource;
}

/**
 * Draw a fresh trial sequence for one session
 */
export function sampleSession(catalog: Catalog, options: SamplerOptions): TrialSpec[] {
  const rng = options.random ?? defaultRandom;
  const numChecks = options.numAttentionChecks ?? 0;
  const pool = options.attentionPool ?? [];

  if (numChecks > pool.length) {
    throw new StudyConfigError(
      `Requested ${numChecks} attention checks but the pool holds ${pool.length}`
    );
  }

  const buckets = new Map<string, TrialSpec[]>();
  for (const [bucket, groups] of catalog) {
    const drawn = groups.flatMap((group) => sampleWithoutReplacement(group, options.sampleSizePerGroup, rng));
    buckets.set(canonicalTag(bucket), shuffle(drawn, rng));
  }

  const placed = new Set<string>();
  for (const instruction of options.instructionTrials ?? []) {
    const family = scoredCounterpart(canonicalTag(instruction.type));
    const bucket = buckets.get(family);
    if (placed.has(family)) {
      log.warn({ test_type: instruction.type }, "Additional instruction trial for family ignored");
      continue;
    }
    if (!bucket || bucket.length === 0) {
      log.warn({ test_type: instruction.type, family }, "No trials for instruction family, instruction skipped");
      continue;
    }
    bucket.unshift(instruction);
    placed.add(family);
  }

  const base = [...buckets.values()].flat();
  const checks = sampleWithoutReplacement(pool, numChecks, rng);
  return insertAttentionChecks(base, checks, options.attentionWindow ?? DEFAULT_ATTENTION_WINDOW, rng);
}

/**
 * Positions (sorted, distinct) in a sequence of `length` items where `count`
 * checks go. Drawn from [ceil(start·L), min(L-1, floor(end·L))]; when that
 * window is too small the whole sequence is used.
 */
export function attentionPositions(
  length: number,
  count: number,
  window: AttentionWindow,
  rng: RandomSource
): number[] {
  if (count <= 0) {
    return [];
  }

  const lo = Math.ceil(window.start * length);
  const hi = Math.min(length - 1, Math.floor(window.end * length));
  const [from, to] = hi - lo + 1 >= count ? [lo, hi] : [0, length - 1];

  const slots = Array.from({ length: to - from + 1 }, (_, i) => from + i);
  return sampleWithoutReplacement(slots, count, rng).sort((a, b) => a - b);
}

export function insertAttentionChecks(
  base: readonly TrialSpec[],
  checks: readonly TrialSpec[],
  window: AttentionWindow,
  rng: RandomSource
): TrialSpec[] {
  const total = base.length + checks.length;
  const positions = new Set(attentionPositions(total, checks.length, window, rng));

  const result: TrialSpec[] = [];
  let baseIndex = 0;
  let checkIndex = 0;
  for (let i = 0; i < total; i++) {
    if (positions.has(i)) {
      result.push(checks[checkIndex++]);
    } else {
      result.push(base[baseIndex++]);
    }
  }
  return result;
}
