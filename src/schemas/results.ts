import { z } from "zod";

export const UrlParams = z.record(z.string());
export type UrlParamsT = z.infer<typeof UrlParams>;

/**
 * One recorded answer. `score` is stored raw; swap correction happens in
 * the analyzer.
 */
export const ResponseRecord = z.object({
  test_type: z.string(),
  reference_audio: z.string().nullable(),
  target_audio: z.string(),
  ref_system: z.string().nullable(),
  target_system: z.string().nullable(),
  swap: z.boolean(),
  score: z.number().int(),
  naturalness_score: z.number().int().optional(),
  editing_score: z.number().int().optional(),
  edited_transcript: z.string().nullable().optional(),
  url_params: UrlParams,
});
export type ResponseRecordT = z.infer<typeof ResponseRecord>;

export const ResultBundle = z.object({
  user_id: z.string().min(1),
  timestamp: z.string(),
  results: z.array(ResponseRecord),
});
export type ResultBundleT = z.infer<typeof ResultBundle>;
