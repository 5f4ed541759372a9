/**
 * Locale tables
 *
 * A language is data, not code: instructions, level labels and participant
 * messages come from locales/<language>.json. A family missing from a table
 * is not offered in that language.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { StudyConfigError } from "../domain/errors.js";

export const SUPPORTED_LANGUAGES = ["en", "fi", "sv"] as const;
export const Language = z.enum(SUPPORTED_LANGUAGES);
export type LanguageT = z.infer<typeof Language>;

export const RichText = z.object({
  title: z.string(),
  paragraphs: z.array(z.string()).default([]),
  points: z.array(z.string()).default([]),
});
export type RichTextT = z.infer<typeof RichText>;

export const ScaleTable = z
  .object({
    min: z.number().int(),
    max: z.number().int(),
    default: z.number().int(),
    labels: z.array(z.string().min(1)),
  })
  .superRefine((scale, ctx) => {
    if (scale.max < scale.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "max must not be below min" });
      return;
    }
    if (scale.labels.length !== scale.max - scale.min + 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["labels"],
        message: `expected ${scale.max - scale.min + 1} labels, got ${scale.labels.length}`,
      });
    }
    if (scale.default < scale.min || scale.default > scale.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["default"], message: "default outside scale" });
    }
  });
export type ScaleTableT = z.infer<typeof ScaleTable>;

const ScoredFamilyTexts = z.object({
  instructions: RichText,
  instruction_intro: z.string().optional(),
  instruction_hint: z.string().optional(),
  scale: ScaleTable,
});

export const LocaleTable = z.object({
  language: Language,
  messages: z.object({
    page_title: z.string(),
    identity_prompt: z.string(),
    email_label: z.string(),
    start_button: z.string(),
    invalid_identity: z.string(),
    incomplete_playback_pair: z.string(),
    incomplete_playback_single: z.string(),
    missing_score: z.string(),
    missing_editing_score: z.string(),
    score_out_of_range: z.string(),
    progress: z.string(),
    submit_button: z.string(),
    reference_label: z.string(),
    target_label: z.string(),
    single_target_label: z.string(),
    score_label: z.string(),
    editing_score_label: z.string(),
    edited_transcript_label: z.string(),
    completed_email: z.string(),
    completed_external: z.string(),
    return_button: z.string(),
    study_full: z.string(),
    persist_failed: z.string(),
  }),
  families: z.object({
    similarity: ScoredFamilyTexts.optional(),
    comparative: ScoredFamilyTexts.optional(),
    quality: ScoredFamilyTexts.optional(),
    naturalness: ScoredFamilyTexts.optional(),
    "edit-fidelity": ScoredFamilyTexts.extend({ editing_scale: ScaleTable }).optional(),
    attention: z.object({ instructions: RichText }).optional(),
  }),
});
export type LocaleTableT = z.infer<typeof LocaleTable>;
export type LocaleMessages = LocaleTableT["messages"];

/**
 * locales/ sits at the repository root: two levels up from src/trials when
 * run from sources, three from dist/src/trials.
 */
function defaultLocalesDir(): string {
  const candidates = ["../../locales/", "../../../locales/"].map((rel) =>
    fileURLToPath(new URL(rel, import.meta.url))
  );
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0];
}

const localeCache = new Map<string, LocaleTableT>();

/**
 * Load and validate a locale table. Cached per directory and language.
 */
export function loadLocale(language: LanguageT, localesDir?: string): LocaleTableT {
  const dir = localesDir ?? defaultLocalesDir();
  const cacheKey = `${dir}:${language}`;
  const cached = localeCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const path = join(dir, `${language}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new StudyConfigError(`Locale table for "${language}" could not be read`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = LocaleTable.safeParse(raw);
  if (!parsed.success) {
    throw new StudyConfigError(
      `Locale table for "${language}" is invalid`,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  localeCache.set(cacheKey, parsed.data);
  return parsed.data;
}

/**
 * Interpolate `{name}` placeholders
 */
export function formatMessage(template: string, vars: Record<string, string | number> = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in vars ? String(vars[name]) : match
  );
}
