import { basename, extname } from "node:path";
import type { ResponseRecordT } from "../schemas/results.js";

/**
 * Test types recorded for attention checks. `no_reference_attention` comes
 * from single-stimulus quality studies.
 */
export const ATTENTION_TEST_TYPES: ReadonlySet<string> = new Set(["attention", "no_reference_attention"]);

const QUALITY_WORD_SCORES: Readonly<Record<string, number>> = {
  bad: 1,
  poor: 2,
  fair: 3,
  good: 4,
  excellent: 5,
};

/**
 * Expected answer encoded as the last `_`-separated part of a file stem:
 * `check_-2.wav` → -2, `reference_good.wav` → 4. Null when absent.
 */
export function expectedScoreFromPath(path: string): number | null {
  const file = basename(path.replace(/\\/g, "/"));
  const stem = file.slice(0, file.length - extname(file).length);
  const token = stem.split("_").pop()?.toLowerCase() ?? "";

  if (/^[+-]?\d+$/.test(token)) {
    return Number.parseInt(token, 10);
  }
  return QUALITY_WORD_SCORES[token] ?? null;
}

export function expectedAttentionScore(record: ResponseRecordT): number | null {
  const fromTarget = expectedScoreFromPath(record.target_audio);
  if (fromTarget !== null) {
    return fromTarget;
  }
  return record.reference_audio ? expectedScoreFromPath(record.reference_audio) : null;
}

export interface AttentionCheckOutcome {
  passed: boolean;
  checked: number;
  /** Audio paths whose expected score could not be read */
  unparsed: string[];
}

/**
 * A bundle passes when every attention response whose expectation can be
 * read matches it exactly
 */
export function checkAttention(results: readonly ResponseRecordT[]): AttentionCheckOutcome {
  let checked = 0;
  let passed = true;
  const unparsed: string[] = [];

  for (const record of results) {
    if (!ATTENTION_TEST_TYPES.has(record.test_type)) continue;

    const expected = expectedAttentionScore(record);
    if (expected === null) {
      unparsed.push(record.target_audio);
      continue;
    }
    checked++;
    if (record.score !== expected) {
      passed = false;
    }
  }

  return { passed, checked, unparsed };
}
