import { resolveSamplingPolicy, type StudyConfig } from "../../src/config/study.js";
import type { Catalog, TrialSpec } from "../../src/schemas/trial.js";
import type { StudyContext } from "../../src/session/service.js";
import { loadLocale, type LanguageT } from "../../src/trials/locale.js";
import { createDefaultRegistry } from "../../src/trials/registry.js";

/**
 * Trial spec with the optional fields defaulted
 */
export function trial(fields: Partial<TrialSpec> & Pick<TrialSpec, "type" | "target">): TrialSpec {
  return {
    reference: null,
    ref_system: null,
    target_system: null,
    swap: false,
    edited_transcript: null,
    ...fields,
  };
}

export function comparativeTrial(n: number, swap = false): TrialSpec {
  return trial({
    type: "comparative",
    reference: `audio/${swap ? "candidate" : "baseline"}/utt_${n}.wav`,
    target: `audio/${swap ? "baseline" : "candidate"}/utt_${n}.wav`,
    ref_system: swap ? "candidate" : "baseline",
    target_system: swap ? "baseline" : "candidate",
    swap,
  });
}

export function attentionTrial(expected: number): TrialSpec {
  return trial({
    type: "attention",
    reference: "audio/attention/reference.wav",
    target: `audio/attention/check_${expected}.wav`,
  });
}

export function studyConfig(overrides: Partial<StudyConfig> = {}): StudyConfig {
  return {
    language: "en",
    completionCode: null,
    customCss: null,
    attentionPool: [],
    instructionTrials: [],
    ...overrides,
  };
}

export interface ContextOptions {
  language?: LanguageT;
  catalog?: Catalog;
  study?: Partial<StudyConfig>;
  sampleSizePerGroup?: number;
  numAttentionChecks?: number;
}

/**
 * Study context built from the shipped locale tables, without any files
 */
export function studyContext(options: ContextOptions = {}): StudyContext {
  const study = studyConfig({ language: options.language ?? "en", ...options.study });
  const locale = loadLocale(study.language);
  return {
    study,
    locale,
    registry: createDefaultRegistry(locale),
    catalog: options.catalog ?? new Map(),
    policy: resolveSamplingPolicy(study, {
      sampleSizePerGroup: options.sampleSizePerGroup ?? 5,
      numAttentionChecks: options.numAttentionChecks ?? 0,
      attentionWindowStart: 0.2,
      attentionWindowEnd: 0.9,
      seed: undefined,
    }),
  };
}
