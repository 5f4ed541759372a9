import { z } from "zod";

/**
 * Request bodies for the session API
 */

export const StartSessionInput = z
  .object({
    url_params: z.record(z.string().max(512)).optional(),
  })
  .strict();

export const SessionParams = z.object({
  id: z.string().uuid(),
});

export const IdentityInput = z
  .object({
    email: z.string().max(254).optional(),
    participant_id: z.string().max(128).optional(),
  })
  .strict();

export const PlaybackInput = z
  .object({
    trial_index: z.number().int().nonnegative(),
    slot: z.enum(["reference", "target"]),
  })
  .strict();

/**
 * Scores arrive as the chosen option's `value`; null means nothing was
 * selected. Non-integers are accepted here and rejected by the scale check.
 */
export const SubmissionInput = z
  .object({
    trial_index: z.number().int().nonnegative(),
    score: z.number().nullable(),
    editing_score: z.number().nullable().optional(),
  })
  .strict();
