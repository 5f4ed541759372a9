/**
 * Score aggregation
 *
 * Pure functions over loaded result bundles. Swap correction lives here and
 * nowhere else: stored scores are always raw.
 */

import { basename } from "node:path";
import tQuantile from "@stdlib/stats-base-dists-t-quantile";
import { max, mean, median, min, quantile, sampleStandardDeviation } from "simple-statistics";
import type { ResponseRecordT, ResultBundleT } from "../schemas/results.js";
import { REFERENCE_FREE_FAMILIES, canonicalTag, isInstructionTag } from "../schemas/trial.js";
import { ATTENTION_TEST_TYPES } from "./attention.js";

export interface ScoreSample {
  /** Row key: a family, or `edit-fidelity:naturalness` / `edit-fidelity:editing` */
  testType: string;
  system: string;
  score: number;
  /** Target file name, the utterance identifier */
  utterance: string;
}

export interface SystemSummary {
  test_type: string;
  system: string;
  mean: number;
  ci_lower: number | null;
  ci_upper: number | null;
  n_samples: number;
}

export interface DistributionSummary {
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  mean: number;
  std: number;
  n_samples: number;
}

export interface UtteranceAverage {
  average_score: number;
  n_ratings: number;
  all_scores: number[];
}

export interface SystemUtteranceReport {
  total_utterances: number;
  distribution: DistributionSummary | null;
  per_utterance: Record<string, UtteranceAverage>;
}

/** test type → system → report */
export type UtteranceReport = Record<string, Record<string, SystemUtteranceReport>>;

export type ScoreOffsets = Readonly<Record<string, number>>;

/**
 * Evaluated system and corrected score for one scored response. On swapped
 * trials the evaluated system sat in the reference slot; comparative scores
 * are then negated, other families only relabelled.
 */
export function attributeScore(record: ResponseRecordT): { family: string; system: string | null; score: number } {
  const family = canonicalTag(record.test_type);
  if (record.swap && !REFERENCE_FREE_FAMILIES.has(family)) {
    return {
      family,
      system: record.ref_system,
      score: family === "comparative" ? -record.score : record.score,
    };
  }
  return { family, system: record.target_system, score: record.score };
}

export function isScoredRecord(record: ResponseRecordT): boolean {
  const tag = canonicalTag(record.test_type);
  return !ATTENTION_TEST_TYPES.has(tag) && !isInstructionTag(tag);
}

/**
 * Flatten bundles into per-system samples. Responses without a system
 * label are dropped.
 */
export function collectSamples(bundles: readonly ResultBundleT[]): ScoreSample[] {
  const samples: ScoreSample[] = [];

  for (const bundle of bundles) {
    for (const record of bundle.results) {
      if (!isScoredRecord(record)) continue;

      const { family, system, score } = attributeScore(record);
      if (!system) continue;
      const utterance = basename(record.target_audio);

      if (family === "edit-fidelity") {
        samples.push({
          testType: "edit-fidelity:naturalness",
          system,
          score: record.naturalness_score ?? score,
          utterance,
        });
        if (record.editing_score !== undefined) {
          samples.push({ testType: "edit-fidelity:editing", system, score: record.editing_score, utterance });
        }
        continue;
      }

      samples.push({ testType: family, system, score, utterance });
    }
  }

  return samples;
}

/**
 * Mean with a two-sided 95% t-interval; bounds are null below two samples
 */
export function confidenceInterval(scores: readonly number[]): { mean: number; lower: number | null; upper: number | null } {
  const m = mean([...scores]);
  if (scores.length < 2) {
    return { mean: m, lower: null, upper: null };
  }
  const halfWidth =
    (tQuantile(0.975, scores.length - 1) * sampleStandardDeviation([...scores])) / Math.sqrt(scores.length);
  return { mean: m, lower: m - halfWidth, upper: m + halfWidth };
}

/**
 * Accumulate one `type=number` offset option
 */
export function parseScoreOffset(value: string, previous: ScoreOffsets): ScoreOffsets {
  const eq = value.indexOf("=");
  const key = eq > 0 ? value.slice(0, eq).trim() : "";
  const amount = eq > 0 ? Number(value.slice(eq + 1)) : Number.NaN;
  if (!key || !Number.isFinite(amount)) {
    throw new Error(`Invalid offset "${value}", expected <test_type>=<number>`);
  }
  return { ...previous, [key]: amount };
}

function offsetFor(testType: string, offsets: ScoreOffsets): number {
  return offsets[testType] ?? offsets[testType.split(":")[0]] ?? 0;
}

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

/**
 * One row per (test type, system), sorted by test type then system. An
 * offset shifts mean and both bounds.
 */
export function summarizeSystems(samples: readonly ScoreSample[], offsets: ScoreOffsets = {}): SystemSummary[] {
  const rows: SystemSummary[] = [];

  for (const group of groupBy(samples, (s) => `${s.testType}\u0000${s.system}`).values()) {
    const { testType, system } = group[0];
    const shift = offsetFor(testType, offsets);
    const ci = confidenceInterval(group.map((s) => s.score));
    rows.push({
      test_type: testType,
      system,
      mean: ci.mean + shift,
      ci_lower: ci.lower === null ? null : ci.lower + shift,
      ci_upper: ci.upper === null ? null : ci.upper + shift,
      n_samples: group.length,
    });
  }

  return rows.sort((a, b) => a.test_type.localeCompare(b.test_type) || a.system.localeCompare(b.system));
}

export function distributionSummary(values: readonly number[]): DistributionSummary | null {
  if (values.length === 0) {
    return null;
  }
  const data = [...values];
  return {
    min: min(data),
    q1: quantile(data, 0.25),
    median: median(data),
    q3: quantile(data, 0.75),
    max: max(data),
    mean: mean(data),
    std: data.length > 1 ? sampleStandardDeviation(data) : 0,
    n_samples: data.length,
  };
}

/**
 * Per-utterance means for reference-free families, with a distribution
 * summary over those means
 */
export function summarizeUtterances(samples: readonly ScoreSample[]): UtteranceReport {
  const report: UtteranceReport = {};

  const referenceFree = samples.filter((s) => REFERENCE_FREE_FAMILIES.has(s.testType.split(":")[0]));
  for (const [testType, byType] of groupBy(referenceFree, (s) => s.testType)) {
    const systems: Record<string, SystemUtteranceReport> = {};

    for (const [system, bySystem] of groupBy(byType, (s) => s.system)) {
      const perUtterance: Record<string, UtteranceAverage> = {};
      for (const [utterance, ratings] of groupBy(bySystem, (s) => s.utterance)) {
        const scores = ratings.map((r) => r.score);
        perUtterance[utterance] = { average_score: mean(scores), n_ratings: scores.length, all_scores: scores };
      }

      const averages = Object.values(perUtterance).map((u) => u.average_score);
      systems[system] = {
        total_utterances: averages.length,
        distribution: distributionSummary(averages),
        per_utterance: perUtterance,
      };
    }

    report[testType] = systems;
  }

  return report;
}
