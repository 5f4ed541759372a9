import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  attributeScore,
  collectSamples,
  confidenceInterval,
  distributionSummary,
  parseScoreOffset,
  summarizeSystems,
  summarizeUtterances,
  type ScoreSample,
} from "../../src/analysis/aggregate.js";
import { checkAttention, expectedScoreFromPath } from "../../src/analysis/attention.js";
import { filterByAttention, loadResultBundles } from "../../src/analysis/io.js";
import { renderSummaryCsv, renderSummaryTable } from "../../src/analysis/report.js";
import type { ResponseRecordT, ResultBundleT } from "../../src/schemas/results.js";

function record(fields: Partial<ResponseRecordT> & Pick<ResponseRecordT, "test_type" | "score">): ResponseRecordT {
  return {
    reference_audio: null,
    target_audio: "sys/utt.wav",
    ref_system: null,
    target_system: null,
    swap: false,
    url_params: {},
    ...fields,
  };
}

function samples(testType: string, system: string, scores: number[]): ScoreSample[] {
  return scores.map((score, i) => ({ testType, system, score, utterance: `u${i}.wav` }));
}

describe("attributeScore", () => {
  it("negates and relabels swapped comparative scores", () => {
    const swapped = record({ test_type: "comparative", ref_system: "A", target_system: "B", swap: true, score: 2 });
    expect(attributeScore(swapped)).toEqual({ family: "comparative", system: "A", score: -2 });
  });

  it("relabels swapped similarity scores without negating", () => {
    const swapped = record({ test_type: "SMOS", ref_system: "A", target_system: "B", swap: true, score: 4 });
    expect(attributeScore(swapped)).toEqual({ family: "similarity", system: "A", score: 4 });
  });

  it("ignores the swap flag for reference-free families", () => {
    const q = record({ test_type: "quality", target_system: "B", swap: true, score: 4 });
    expect(attributeScore(q)).toEqual({ family: "quality", system: "B", score: 4 });
  });
});

describe("collectSamples", () => {
  it("skips attention and instruction responses and unlabelled systems", () => {
    const bundle: ResultBundleT = {
      user_id: "u1",
      timestamp: "t",
      results: [
        record({ test_type: "attention", target_audio: "check_0.wav", score: 0 }),
        record({ test_type: "comparative-instruction", target_system: "B", score: 1 }),
        record({ test_type: "quality", score: 3 }),
        record({ test_type: "quality", target_system: "B", target_audio: "B/x.wav", score: 4 }),
      ],
    };
    expect(collectSamples([bundle])).toEqual([{ testType: "quality", system: "B", score: 4, utterance: "x.wav" }]);
  });

  it("splits edit-fidelity into naturalness and editing rows", () => {
    const bundle: ResultBundleT = {
      user_id: "u1",
      timestamp: "t",
      results: [
        record({
          test_type: "edit-fidelity",
          target_system: "E",
          target_audio: "E/y.wav",
          score: 4,
          naturalness_score: 4,
          editing_score: 2,
        }),
      ],
    };
    expect(collectSamples([bundle])).toEqual([
      { testType: "edit-fidelity:naturalness", system: "E", score: 4, utterance: "y.wav" },
      { testType: "edit-fidelity:editing", system: "E", score: 2, utterance: "y.wav" },
    ]);
  });
});

describe("confidenceInterval", () => {
  it("uses the t distribution with n-1 degrees of freedom", () => {
    const ci = confidenceInterval([1, 2, 3, 4]);
    expect(ci.mean).toBe(2.5);
    expect(ci.lower).toBeCloseTo(0.44574, 4);
    expect(ci.upper).toBeCloseTo(4.55426, 4);

    const five = confidenceInterval([2, 3, 3, 4, 5]);
    expect(five.lower).toBeCloseTo(1.98429, 4);
    expect(five.upper).toBeCloseTo(4.81571, 4);
  });

  it("has no bounds for a single sample", () => {
    expect(confidenceInterval([3])).toEqual({ mean: 3, lower: null, upper: null });
  });
});

describe("summarizeSystems", () => {
  it("sorts rows and applies offsets by test type prefix", () => {
    const rows = summarizeSystems(
      [
        ...samples("similarity", "B", [1, 2, 3, 4]),
        ...samples("comparative", "A", [-1]),
        ...samples("edit-fidelity:editing", "E", [2]),
      ],
      { similarity: 3, "edit-fidelity": 1 }
    );

    expect(rows.map((r) => [r.test_type, r.system, r.n_samples])).toEqual([
      ["comparative", "A", 1],
      ["edit-fidelity:editing", "E", 1],
      ["similarity", "B", 4],
    ]);
    expect(rows[0].mean).toBe(-1);
    expect(rows[1].mean).toBe(3);
    expect(rows[2].mean).toBe(5.5);
    expect(rows[2].ci_lower).toBeCloseTo(3.44574, 4);
  });
});

describe("parseScoreOffset", () => {
  it("accumulates type=value pairs", () => {
    expect(parseScoreOffset("quality=-1.5", parseScoreOffset("similarity=3", {}))).toEqual({
      similarity: 3,
      quality: -1.5,
    });
  });

  it("rejects malformed values", () => {
    expect(() => parseScoreOffset("similarity", {})).toThrow("Invalid offset");
    expect(() => parseScoreOffset("=2", {})).toThrow("Invalid offset");
    expect(() => parseScoreOffset("quality=high", {})).toThrow("Invalid offset");
  });
});

describe("distributionSummary", () => {
  it("summarises a small sample", () => {
    expect(distributionSummary([3, 1, 5, 2, 4])).toEqual({
      min: 1,
      q1: 2,
      median: 3,
      q3: 4,
      max: 5,
      mean: 3,
      std: expect.closeTo(1.58114, 4),
      n_samples: 5,
    });
  });

  it("reports zero spread for one value and nothing for none", () => {
    expect(distributionSummary([4])?.std).toBe(0);
    expect(distributionSummary([])).toBeNull();
  });
});

describe("summarizeUtterances", () => {
  it("averages ratings per utterance for reference-free tests only", () => {
    const report = summarizeUtterances([
      { testType: "quality", system: "B", score: 4, utterance: "a.wav" },
      { testType: "quality", system: "B", score: 2, utterance: "a.wav" },
      { testType: "quality", system: "B", score: 5, utterance: "b.wav" },
      { testType: "comparative", system: "B", score: 1, utterance: "a.wav" },
    ]);

    expect(Object.keys(report)).toEqual(["quality"]);
    expect(report.quality.B.total_utterances).toBe(2);
    expect(report.quality.B.per_utterance["a.wav"]).toEqual({ average_score: 3, n_ratings: 2, all_scores: [4, 2] });
    expect(report.quality.B.distribution?.mean).toBe(4);
  });
});

describe("attention checks", () => {
  it("reads the expected score from the file stem", () => {
    expect(expectedScoreFromPath("audio/attention/check_-2.wav")).toBe(-2);
    expect(expectedScoreFromPath("audio/attention/check_+3.wav")).toBe(3);
    expect(expectedScoreFromPath("ref_Good.mp3")).toBe(4);
    expect(expectedScoreFromPath("audio/plain.wav")).toBeNull();
  });

  it("fails a bundle on any mismatch and ignores unreadable checks", () => {
    const pass = checkAttention([
      record({ test_type: "attention", target_audio: "check_0.wav", score: 0 }),
      record({ test_type: "attention", target_audio: "unlabelled.wav", score: 2 }),
    ]);
    expect(pass).toEqual({ passed: true, checked: 1, unparsed: ["unlabelled.wav"] });

    const fail = checkAttention([record({ test_type: "attention", target_audio: "check_-3.wav", score: 3 })]);
    expect(fail.passed).toBe(false);
  });

  it("falls back to the reference file name", () => {
    const result = checkAttention([
      record({ test_type: "no_reference_attention", reference_audio: "ref_excellent.wav", target_audio: "stim.wav", score: 5 }),
    ]);
    expect(result).toEqual({ passed: true, checked: 1, unparsed: [] });
  });
});

describe("result bundle loading", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "analysis-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads bundles in name order, skips bad files and filters failures", async () => {
    const good: ResultBundleT = {
      user_id: "b",
      timestamp: "t",
      results: [record({ test_type: "attention", target_audio: "check_1.wav", score: 1 })],
    };
    const failed: ResultBundleT = {
      user_id: "a",
      timestamp: "t",
      results: [record({ test_type: "attention", target_audio: "check_1.wav", score: -1 })],
    };
    await writeFile(join(dir, "b_results.json"), JSON.stringify(good));
    await writeFile(join(dir, "a_results.json"), JSON.stringify(failed));
    await writeFile(join(dir, "c_results.json"), "{ broken");
    await writeFile(join(dir, "d_results.json"), JSON.stringify({ user_id: "d" }));
    await writeFile(join(dir, "notes.json"), "{}");

    const { bundles, skipped } = await loadResultBundles(dir);
    expect(bundles.map((b) => b.file)).toEqual(["a_results.json", "b_results.json"]);
    expect(skipped).toEqual(["c_results.json", "d_results.json"]);

    const { kept, excluded } = filterByAttention(bundles);
    expect(kept.map((k) => k.bundle.user_id)).toEqual(["b"]);
    expect(excluded).toEqual(["a_results.json"]);
  });
});

describe("reports", () => {
  it("writes blank bounds for single-sample rows", () => {
    const rows = summarizeSystems([...samples("quality", "A", [5]), ...samples("quality", "B", [1, 2, 3, 4])]);
    const csv = renderSummaryCsv(rows).split("\n");
    expect(csv[0]).toBe("test_type,system,mean,ci_lower,ci_upper,n_samples");
    expect(csv[1]).toBe("quality,A,5,,,1");
    expect(csv[2].startsWith("quality,B,2.5,0.4457")).toBe(true);
  });

  it("prints one block per test type", () => {
    const table = renderSummaryTable(summarizeSystems(samples("quality", "A", [5])));
    expect(table.split("\n")).toContain(`${"A".padEnd(20)} ${"5.000".padEnd(8)} ${"N/A".padEnd(20)} 1`);
    expect(table.split("\n")).toContain("QUALITY");
  });
});
