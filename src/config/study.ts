/**
 * Study file (YAML)
 *
 * Describes one listening study: participant language, attention-check
 * pool, instruction trials, completion code and optional styling. Sampling
 * knobs set here override the environment defaults.
 */

import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { StudyConfigError } from "../domain/errors.js";
import { TrialRecord, canonicalTag, isInstructionTag, toTrialSpec, type TrialSpec } from "../schemas/trial.js";
import { Language, type LanguageT } from "../trials/locale.js";
import type { AttentionWindow } from "../trials/sampler.js";
import type { Config } from "./index.js";

const StudyFile = z
  .object({
    language: Language.default("en"),
    completion_code: z.string().min(1).optional(),
    custom_css: z.string().optional(),
    sample_size_per_group: z.number().int().positive().optional(),
    num_attention_checks: z.number().int().nonnegative().optional(),
    attention_window: z
      .object({
        start: z.number().min(0).max(1),
        end: z.number().min(0).max(1),
      })
      .refine((w) => w.start <= w.end, { message: "start must not exceed end" })
      .optional(),
    attention_pool: z.array(TrialRecord).default([]),
    instruction_trials: z.array(TrialRecord).default([]),
  })
  .superRefine((study, ctx) => {
    study.attention_pool.forEach((record, i) => {
      if (canonicalTag(record.type) !== "attention") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["attention_pool", i, "type"],
          message: `attention pool entries must have type "attention", got "${record.type}"`,
        });
      }
      if (!record.reference) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["attention_pool", i, "reference"],
          message: "attention checks need reference audio",
        });
      }
    });
    study.instruction_trials.forEach((record, i) => {
      if (!isInstructionTag(canonicalTag(record.type))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["instruction_trials", i, "type"],
          message: `"${record.type}" is not an instruction type`,
        });
      }
    });
  });

export interface StudyConfig {
  language: LanguageT;
  completionCode: string | null;
  customCss: string | null;
  sampleSizePerGroup?: number;
  numAttentionChecks?: number;
  attentionWindow?: AttentionWindow;
  attentionPool: TrialSpec[];
  instructionTrials: TrialSpec[];
}

export interface SamplingPolicy {
  sampleSizePerGroup: number;
  numAttentionChecks: number;
  attentionWindow: AttentionWindow;
}

export function parseStudyConfig(raw: unknown): StudyConfig {
  const parsed = StudyFile.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new StudyConfigError(
      "Study file is invalid",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const study = parsed.data;
  return {
    language: study.language,
    completionCode: study.completion_code ?? null,
    customCss: study.custom_css ?? null,
    sampleSizePerGroup: study.sample_size_per_group,
    numAttentionChecks: study.num_attention_checks,
    attentionWindow: study.attention_window,
    attentionPool: study.attention_pool.map(toTrialSpec),
    instructionTrials: study.instruction_trials.map(toTrialSpec),
  };
}

export async function loadStudyConfig(path: string): Promise<StudyConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new StudyConfigError(`Study file could not be read: ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new StudyConfigError("Study file is not valid YAML", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parseStudyConfig(raw);
}

/**
 * Merge study overrides onto environment defaults
 *
 * @throws StudyConfigError when more checks are requested than the pool holds
 */
export function resolveSamplingPolicy(study: StudyConfig, env: Config["sampling"]): SamplingPolicy {
  const policy: SamplingPolicy = {
    sampleSizePerGroup: study.sampleSizePerGroup ?? env.sampleSizePerGroup,
    numAttentionChecks: study.numAttentionChecks ?? env.numAttentionChecks,
    attentionWindow: study.attentionWindow ?? {
      start: env.attentionWindowStart,
      end: env.attentionWindowEnd,
    },
  };

  if (policy.numAttentionChecks > study.attentionPool.length) {
    throw new StudyConfigError(
      `${policy.numAttentionChecks} attention checks requested but the attention pool holds ${study.attentionPool.length}`
    );
  }

  return policy;
}
