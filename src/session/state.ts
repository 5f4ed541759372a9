/**
 * Session State Machine
 *
 *   unidentified ──identify──▶ in_progress ──submit (last)──▶ completed
 *                                 │  ▲
 *                                 └──┘ submit / playback
 *   in_progress | completed ──persist failure──▶ failed
 *
 * All transitions are pure: they take a SessionState and return a new one.
 * Nothing here touches storage, the clock or randomness directly.
 */

import { SessionConflictError } from "../domain/errors.js";
import type { ResponseRecordT, ResultBundleT, UrlParamsT } from "../schemas/results.js";
import type { TrialSpec } from "../schemas/trial.js";
import type { TrialDescriptor } from "../trials/descriptor.js";

export type SessionStatus = "unidentified" | "in_progress" | "completed" | "failed";

export type AudioSlot = "reference" | "target";

export interface Identity {
  kind: "email" | "participant_id";
  value: string;
}

export interface PlayedFlags {
  reference: boolean;
  target: boolean;
}

export interface SessionState {
  id: string;
  status: SessionStatus;
  identity: Identity | null;
  url_params: UrlParamsT;
  trials: TrialSpec[];
  cursor: number;
  responses: ResponseRecordT[];
  played: PlayedFlags;
  created_at: string;
  updated_at: string;
}

export type RejectionReason =
  | "invalid_identity"
  | "incomplete_playback"
  | "missing_score"
  | "score_out_of_range"
  | "study_full";

export interface Rejection {
  reason: RejectionReason;
  /** Slots still to be played (incomplete_playback) */
  missing_slots?: AudioSlot[];
  /** Which score failed (missing_score, score_out_of_range) */
  field?: "score" | "editing_score";
  range?: { min: number; max: number };
}

export type TransitionResult =
  | { accepted: true; state: SessionState }
  | { accepted: false; state: SessionState; rejection: Rejection };

export interface IdentityInput {
  email?: string;
  participant_id?: string;
}

export interface SubmissionInput {
  trial_index: number;
  score: number | null;
  editing_score?: number | null;
}

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

/** URL parameter carrying the recruiting platform's participant id */
export const EXTERNAL_ID_PARAM = "PROLIFIC_PID";

const NOT_PLAYED: PlayedFlags = { reference: false, target: false };

export function createSession(id: string, urlParams: UrlParamsT, now: Date): SessionState {
  const timestamp = now.toISOString();
  return {
    id,
    status: "unidentified",
    identity: null,
    url_params: { ...urlParams },
    trials: [],
    cursor: 0,
    responses: [],
    played: { ...NOT_PLAYED },
    created_at: timestamp,
    updated_at: timestamp,
  };
}

/**
 * Resolve identity input. A participant id wins over an email; an email
 * must match EMAIL_PATTERN.
 */
export function resolveIdentity(input: IdentityInput): Identity | null {
  const participantId = input.participant_id?.trim();
  if (participantId) {
    return { kind: "participant_id", value: participantId };
  }

  const email = input.email?.trim();
  if (email && EMAIL_PATTERN.test(email)) {
    return { kind: "email", value: email };
  }

  return null;
}

/**
 * Identity from the entry URL, if the recruiting platform supplied one
 */
export function identityFromUrl(urlParams: UrlParamsT): IdentityInput | null {
  const externalId = urlParams[EXTERNAL_ID_PARAM]?.trim();
  return externalId ? { participant_id: externalId } : null;
}

/**
 * unidentified → in_progress. `sample` is called once, only when the
 * identity is valid, and its result is fixed for the session.
 */
export function identify(
  state: SessionState,
  input: IdentityInput,
  sample: () => TrialSpec[],
  now: Date
): TransitionResult {
  if (state.status !== "unidentified") {
    throw new SessionConflictError("Session has already started");
  }

  const identity = resolveIdentity(input);
  if (!identity) {
    return { accepted: false, state, rejection: { reason: "invalid_identity" } };
  }

  const trials = sample();
  return {
    accepted: true,
    state: {
      ...state,
      status: trials.length === 0 ? "completed" : "in_progress",
      identity,
      trials,
      cursor: 0,
      responses: [],
      played: { ...NOT_PLAYED },
      updated_at: now.toISOString(),
    },
  };
}

/**
 * Refuse entry (participant cap reached). State is unchanged.
 */
export function refuse(state: SessionState, reason: RejectionReason): TransitionResult {
  return { accepted: false, state, rejection: { reason } };
}

export function currentTrial(state: SessionState): TrialSpec | null {
  if (state.status !== "in_progress") {
    return null;
  }
  return state.trials[state.cursor] ?? null;
}

/**
 * Playback-finished notification for one slot of the current trial.
 * Notifications for any other trial are stale and ignored.
 */
export function markPlayed(state: SessionState, trialIndex: number, slot: AudioSlot, now: Date): SessionState {
  if (state.status !== "in_progress" || trialIndex !== state.cursor || state.played[slot]) {
    return state;
  }
  return {
    ...state,
    played: { ...state.played, [slot]: true },
    updated_at: now.toISOString(),
  };
}

export function requiredSlots(descriptor: TrialDescriptor): AudioSlot[] {
  return descriptor.needsReferenceAudio() ? ["reference", "target"] : ["target"];
}

/**
 * Record a rating for the current trial
 *
 * Rejections leave the state untouched. Acceptance appends one response,
 * advances the cursor by one and clears the played flags; the last
 * acceptance completes the session.
 *
 * @throws SessionConflictError when the session is not in progress or the
 *   submission targets a trial other than the current one
 */
export function submit(
  state: SessionState,
  descriptor: TrialDescriptor,
  input: SubmissionInput,
  now: Date
): TransitionResult {
  if (state.status !== "in_progress") {
    throw new SessionConflictError(`Session is ${state.status}; no trial awaits a response`);
  }
  if (input.trial_index !== state.cursor) {
    throw new SessionConflictError(
      `Submission is for trial ${input.trial_index} but the current trial is ${state.cursor}`
    );
  }

  const missing = requiredSlots(descriptor).filter((slot) => !state.played[slot]);
  if (missing.length > 0) {
    return { accepted: false, state, rejection: { reason: "incomplete_playback", missing_slots: missing } };
  }

  const scale = descriptor.ratingScale();
  if (input.score === null || input.score === undefined) {
    return { accepted: false, state, rejection: { reason: "missing_score", field: "score" } };
  }
  if (!descriptor.validate(input.score)) {
    return {
      accepted: false,
      state,
      rejection: { reason: "score_out_of_range", field: "score", range: { min: scale.min, max: scale.max } },
    };
  }

  const editingScale = descriptor.editingScale();
  let editingScore: number | undefined;
  if (editingScale) {
    if (input.editing_score === null || input.editing_score === undefined) {
      return { accepted: false, state, rejection: { reason: "missing_score", field: "editing_score" } };
    }
    const value = input.editing_score;
    if (!Number.isInteger(value) || value < editingScale.min || value > editingScale.max) {
      return {
        accepted: false,
        state,
        rejection: {
          reason: "score_out_of_range",
          field: "editing_score",
          range: { min: editingScale.min, max: editingScale.max },
        },
      };
    }
    editingScore = value;
  }

  const record = buildResponseRecord(descriptor, input.score, editingScore, state.url_params);
  const cursor = state.cursor + 1;

  return {
    accepted: true,
    state: {
      ...state,
      status: cursor >= state.trials.length ? "completed" : "in_progress",
      cursor,
      responses: [...state.responses, record],
      played: { ...NOT_PLAYED },
      updated_at: now.toISOString(),
    },
  };
}

/**
 * Raw response record. The swap flag is stored as-is; correcting for it is
 * the analyzer's job.
 */
export function buildResponseRecord(
  descriptor: TrialDescriptor,
  score: number,
  editingScore: number | undefined,
  urlParams: UrlParamsT
): ResponseRecordT {
  const { trial } = descriptor;
  const record: ResponseRecordT = {
    test_type: descriptor.testType,
    reference_audio: trial.reference,
    target_audio: trial.target,
    ref_system: trial.ref_system,
    target_system: trial.target_system,
    swap: trial.swap,
    score,
    url_params: { ...urlParams },
  };

  if (editingScore !== undefined) {
    record.naturalness_score = score;
    record.editing_score = editingScore;
    record.edited_transcript = descriptor.editedTranscript();
  }

  return record;
}

export function markFailed(state: SessionState, now: Date): SessionState {
  return { ...state, status: "failed", updated_at: now.toISOString() };
}

/**
 * Result bundle for a completed session
 */
export function toResultBundle(state: SessionState, now: Date): ResultBundleT {
  if (state.status !== "completed" || !state.identity) {
    throw new SessionConflictError("Only completed, identified sessions produce a result bundle");
  }
  return {
    user_id: state.identity.value,
    timestamp: now.toISOString(),
    results: state.responses,
  };
}
