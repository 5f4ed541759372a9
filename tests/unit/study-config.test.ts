import { describe, it, expect } from "vitest";
import { parseStudyConfig, resolveSamplingPolicy } from "../../src/config/study.js";
import { StudyConfigError } from "../../src/domain/errors.js";

const envDefaults = {
  sampleSizePerGroup: 5,
  numAttentionChecks: 2,
  attentionWindowStart: 0.2,
  attentionWindowEnd: 0.9,
  seed: undefined,
};

const attention = (expected: number) => ({
  type: "attention",
  reference: "audio/attention/reference.wav",
  target: `audio/attention/check_${expected}.wav`,
});

describe("parseStudyConfig", () => {
  it("defaults to English with empty pools", () => {
    expect(parseStudyConfig(undefined)).toEqual({
      language: "en",
      completionCode: null,
      customCss: null,
      sampleSizePerGroup: undefined,
      numAttentionChecks: undefined,
      attentionWindow: undefined,
      attentionPool: [],
      instructionTrials: [],
    });
  });

  it("reads pools as trial specs", () => {
    const study = parseStudyConfig({
      language: "fi",
      completion_code: "CODE-1",
      attention_pool: [attention(0)],
      instruction_trials: [{ type: "cmos_instruction", reference: "i_ref.wav", target: "i_tgt.wav" }],
    });
    expect(study.language).toBe("fi");
    expect(study.completionCode).toBe("CODE-1");
    expect(study.attentionPool[0].reference).toBe("audio/attention/reference.wav");
    expect(study.instructionTrials[0].type).toBe("comparative-instruction");
  });

  it("rejects pool entries of the wrong kind", () => {
    expect(() => parseStudyConfig({ attention_pool: [{ type: "quality", target: "a.wav" }] })).toThrow(StudyConfigError);
    expect(() => parseStudyConfig({ instruction_trials: [{ type: "quality", target: "a.wav" }] })).toThrow(StudyConfigError);
  });

  it("rejects attention checks without reference audio", () => {
    expect(() => parseStudyConfig({ attention_pool: [{ type: "attention", target: "check_0.wav" }] })).toThrow(
      StudyConfigError
    );
  });

  it("rejects unsupported languages and inverted windows", () => {
    expect(() => parseStudyConfig({ language: "de" })).toThrow(StudyConfigError);
    expect(() => parseStudyConfig({ attention_window: { start: 0.8, end: 0.2 } })).toThrow(StudyConfigError);
  });
});

describe("resolveSamplingPolicy", () => {
  it("lets the study file override the environment", () => {
    const study = parseStudyConfig({
      sample_size_per_group: 3,
      num_attention_checks: 1,
      attention_window: { start: 0.1, end: 0.5 },
      attention_pool: [attention(0)],
    });
    expect(resolveSamplingPolicy(study, envDefaults)).toEqual({
      sampleSizePerGroup: 3,
      numAttentionChecks: 1,
      attentionWindow: { start: 0.1, end: 0.5 },
    });
  });

  it("fails when more checks are requested than the pool holds", () => {
    const study = parseStudyConfig({ attention_pool: [attention(0)] });
    expect(() => resolveSamplingPolicy(study, envDefaults)).toThrow(StudyConfigError);
  });
});
