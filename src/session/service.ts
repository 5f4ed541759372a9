/**
 * Listening test service
 *
 * Glue between the HTTP routes and the pure state machine: loads a session,
 * applies one transition under a per-session lock, persists on completion
 * and renders the participant-facing view.
 */

import { randomUUID } from "node:crypto";
import type { Config } from "../config/index.js";
import { loadStudyConfig, resolveSamplingPolicy, type SamplingPolicy, type StudyConfig } from "../config/study.js";
import { countTrials, loadCatalog } from "../catalog/loader.js";
import { PersistFailureError, SessionConflictError, SessionNotFoundError, UnknownTrialTypeError } from "../domain/errors.js";
import type { ResultPersister } from "../results/persister.js";
import type { UrlParamsT } from "../schemas/results.js";
import type { Catalog, TrialSpec } from "../schemas/trial.js";
import { scaleOptions, type RatingScale, type ScaleOption, type TrialDescriptor, type TrialInstructions } from "../trials/descriptor.js";
import { formatMessage, loadLocale, type LocaleMessages, type LocaleTableT } from "../trials/locale.js";
import { defaultRandom, type RandomSource } from "../trials/random.js";
import { createDefaultRegistry, type TrialDescriptorRegistry } from "../trials/registry.js";
import { sampleSession } from "../trials/sampler.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import {
  createSession,
  currentTrial,
  identify,
  identityFromUrl,
  markFailed,
  markPlayed,
  refuse,
  requiredSlots,
  submit,
  toResultBundle,
  type AudioSlot,
  type IdentityInput,
  type PlayedFlags,
  type Rejection,
  type RejectionReason,
  type SessionState,
  type SessionStatus,
  type SubmissionInput,
} from "./state.js";
import type { SessionStore } from "./store.js";

/** Exit page used when no completion code is configured */
export const DEFAULT_EXIT_URL = "https://app.prolific.com/";

export interface StudyContext {
  study: StudyConfig;
  policy: SamplingPolicy;
  locale: LocaleTableT;
  registry: TrialDescriptorRegistry;
  catalog: Catalog;
}

export interface ScaleView {
  min: number;
  max: number;
  default: number;
  options: ScaleOption[];
}

export interface TrialView {
  index: number;
  test_type: string;
  instructions: TrialInstructions;
  reference_audio: string | null;
  target_audio: string;
  required_slots: AudioSlot[];
  played: PlayedFlags;
  scale: ScaleView;
  editing_scale: ScaleView | null;
  edited_transcript: string | null;
}

export interface SessionView {
  session_id: string;
  status: SessionStatus;
  language: string;
  progress: { current: number; total: number; label: string } | null;
  trial: TrialView | null;
  completion: { message: string; redirect_url: string | null } | null;
}

export type ServiceOutcome =
  | { accepted: true; view: SessionView }
  | { accepted: false; reason: RejectionReason; message: string; view: SessionView };

export interface ListeningTestServiceOptions {
  context: StudyContext;
  store: SessionStore;
  persister: ResultPersister;
  completionBaseUrl: string;
  maxParticipants?: number;
  random?: RandomSource;
  clock?: () => Date;
  generateId?: () => string;
}

/**
 * Load study file, locale, registry and catalog, and check that every
 * trial type they mention can be rendered.
 *
 * @throws CatalogNotFoundError, CatalogMalformedError, StudyConfigError, UnknownTrialTypeError
 */
export async function loadStudyContext(cfg: Config): Promise<StudyContext> {
  const study = await loadStudyConfig(cfg.study.studyConfigPath);
  const locale = loadLocale(study.language, cfg.study.localesDir);
  const registry = createDefaultRegistry(locale);

  for (const trial of [...study.attentionPool, ...study.instructionTrials]) {
    if (!registry.has(trial.type)) {
      throw new UnknownTrialTypeError(trial.type, locale.language);
    }
  }

  const catalog = await loadCatalog(cfg.study.catalogPath, registry);
  const policy = resolveSamplingPolicy(study, cfg.sampling);

  emit(TelemetryEvents.CatalogLoaded, {
    language: locale.language,
    buckets: [...catalog.keys()],
    trials: countTrials(catalog),
    attention_pool: study.attentionPool.length,
    instruction_trials: study.instructionTrials.length,
  });

  return { study, policy, locale, registry, catalog };
}

/**
 * Browser-facing URL for an audio reference. Remote URLs pass through;
 * paths are served by the audio route relative to the audio root.
 */
export function audioUrl(ref: string): string {
  if (/^https?:\/\//i.test(ref)) {
    return ref;
  }
  const segments = ref
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".");
  return `/audio/${segments.map(encodeURIComponent).join("/")}`;
}

function scaleView(scale: RatingScale): ScaleView {
  return { min: scale.min, max: scale.max, default: scale.default, options: scaleOptions(scale) };
}

export class ListeningTestService {
  private readonly locks = new Map<string, Promise<void>>();
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly options: ListeningTestServiceOptions) {
    this.random = options.random ?? defaultRandom;
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get storeBackend(): string {
    return this.options.store.backend;
  }

  get messages(): LocaleMessages {
    return this.options.context.locale.messages;
  }

  get language(): string {
    return this.options.context.locale.language;
  }

  get customCss(): string | null {
    return this.options.context.study.customCss;
  }

  /**
   * New session. A PROLIFIC_PID in the URL parameters identifies it at once.
   */
  async start(urlParams: UrlParamsT = {}): Promise<ServiceOutcome> {
    const session = createSession(this.generateId(), urlParams, this.clock());
    const external = identityFromUrl(urlParams);
    await this.options.store.set(session);
    emit(TelemetryEvents.SessionStarted, { session_id: session.id, external_id: external !== null });

    if (!external) {
      return { accepted: true, view: this.render(session) };
    }
    return this.identify(session.id, external);
  }

  async view(id: string): Promise<SessionView> {
    return this.render(await this.load(id));
  }

  async identify(id: string, input: IdentityInput): Promise<ServiceOutcome> {
    return this.withLock(id, async () => {
      const session = await this.load(id);
      const full = session.status === "unidentified" && (await this.isStudyFull());
      const result = full
        ? refuse(session, "study_full")
        : identify(session, input, () => this.sample(), this.clock());

      if (!result.accepted) {
        emit(TelemetryEvents.SessionRejected, { session_id: id, reason: result.rejection.reason });
        return this.rejected(result.state, result.rejection);
      }

      emit(TelemetryEvents.SessionIdentified, {
        session_id: id,
        identity_kind: result.state.identity?.kind ?? null,
        trials: result.state.trials.length,
      });
      return { accepted: true, view: this.render(await this.commit(session, result.state)) };
    });
  }

  async playback(id: string, trialIndex: number, slot: AudioSlot): Promise<SessionView> {
    return this.withLock(id, async () => {
      const session = await this.load(id);
      const next = markPlayed(session, trialIndex, slot, this.clock());
      if (next !== session) {
        await this.options.store.set(next);
      } else {
        log.debug({ session_id: id, trial_index: trialIndex, slot }, "Playback notification ignored");
      }
      return this.render(next);
    });
  }

  async respond(id: string, input: SubmissionInput): Promise<ServiceOutcome> {
    return this.withLock(id, async () => {
      const session = await this.load(id);
      const trial = currentTrial(session);
      if (!trial) {
        throw new SessionConflictError(`Session is ${session.status}; no trial awaits a response`);
      }
      const descriptor = this.options.context.registry.create(trial);
      const result = submit(session, descriptor, input, this.clock());

      if (!result.accepted) {
        emit(TelemetryEvents.ResponseRejected, {
          session_id: id,
          trial_index: input.trial_index,
          reason: result.rejection.reason,
          field: result.rejection.field ?? null,
        });
        return this.rejected(result.state, result.rejection, descriptor);
      }

      emit(TelemetryEvents.ResponseAccepted, {
        session_id: id,
        trial_index: input.trial_index,
        test_type: descriptor.testType,
      });
      return { accepted: true, view: this.render(await this.commit(session, result.state)) };
    });
  }

  /**
   * Store the new state; on the transition into completed, write the
   * result bundle exactly once.
   */
  private async commit(before: SessionState, after: SessionState): Promise<SessionState> {
    if (before.status === "completed" || after.status !== "completed") {
      await this.options.store.set(after);
      return after;
    }

    const now = this.clock();
    const bundle = toResultBundle(after, now);
    try {
      await this.options.persister.persist(bundle);
    } catch (error) {
      const failed = markFailed(after, now);
      await this.options.store.set(failed);
      emit(TelemetryEvents.SessionPersistFailed, {
        session_id: after.id,
        records: bundle.results.length,
        error: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof PersistFailureError) {
        throw error;
      }
      throw new PersistFailureError(bundle.user_id, error);
    }

    await this.options.store.set(after);
    emit(TelemetryEvents.SessionCompleted, {
      session_id: after.id,
      records: bundle.results.length,
      duration_ms: now.getTime() - Date.parse(after.created_at),
    });
    return after;
  }

  private sample(): TrialSpec[] {
    const { catalog, policy, study } = this.options.context;
    return sampleSession(catalog, {
      sampleSizePerGroup: policy.sampleSizePerGroup,
      numAttentionChecks: policy.numAttentionChecks,
      attentionWindow: policy.attentionWindow,
      attentionPool: study.attentionPool,
      instructionTrials: study.instructionTrials,
      random: this.random,
    });
  }

  /**
   * Soft cap: counts persisted bundles only. Sessions admitted before the
   * cap is reached all run to completion, so the final count can exceed it
   * by the number of sessions in progress.
   */
  private async isStudyFull(): Promise<boolean> {
    const max = this.options.maxParticipants;
    if (max === undefined) {
      return false;
    }
    return (await this.options.persister.count()) >= max;
  }

  private async load(id: string): Promise<SessionState> {
    const session = await this.options.store.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  /**
   * Serialise operations on one session id
   */
  private async withLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(id, settled);
    try {
      return await run;
    } finally {
      if (this.locks.get(id) === settled) {
        this.locks.delete(id);
      }
    }
  }

  private rejected(state: SessionState, rejection: Rejection, descriptor?: TrialDescriptor): ServiceOutcome {
    return {
      accepted: false,
      reason: rejection.reason,
      message: this.rejectionMessage(rejection, descriptor ?? null),
      view: this.render(state),
    };
  }

  rejectionMessage(rejection: Rejection, descriptor: TrialDescriptor | null): string {
    const messages = this.messages;
    switch (rejection.reason) {
      case "invalid_identity":
        return messages.invalid_identity;
      case "study_full":
        return messages.study_full;
      case "incomplete_playback":
        return descriptor && requiredSlots(descriptor).length > 1
          ? messages.incomplete_playback_pair
          : messages.incomplete_playback_single;
      case "missing_score":
        return rejection.field === "editing_score" ? messages.missing_editing_score : messages.missing_score;
      case "score_out_of_range":
        return formatMessage(messages.score_out_of_range, {
          min: rejection.range?.min ?? "",
          max: rejection.range?.max ?? "",
        });
    }
  }

  render(session: SessionState): SessionView {
    const total = session.trials.length;
    const trial = currentTrial(session);

    return {
      session_id: session.id,
      status: session.status,
      language: this.language,
      progress:
        session.status === "in_progress"
          ? {
              current: session.cursor + 1,
              total,
              label: formatMessage(this.messages.progress, { current: session.cursor + 1, total }),
            }
          : null,
      trial: trial ? this.trialView(session, trial) : null,
      completion: session.status === "completed" ? this.completionView(session) : null,
    };
  }

  private trialView(session: SessionState, trial: TrialSpec): TrialView {
    const descriptor = this.options.context.registry.create(trial);
    const editingScale = descriptor.editingScale();
    return {
      index: session.cursor,
      test_type: descriptor.testType,
      instructions: descriptor.instructions(),
      reference_audio: descriptor.needsReferenceAudio() && trial.reference ? audioUrl(trial.reference) : null,
      target_audio: audioUrl(trial.target),
      required_slots: requiredSlots(descriptor),
      played: { ...session.played },
      scale: scaleView(descriptor.ratingScale()),
      editing_scale: editingScale ? scaleView(editingScale) : null,
      edited_transcript: descriptor.editedTranscript(),
    };
  }

  private completionView(session: SessionState): SessionView["completion"] {
    if (session.identity?.kind !== "participant_id") {
      return { message: this.messages.completed_email, redirect_url: null };
    }
    const code = this.options.context.study.completionCode;
    const redirect = code
      ? `${this.options.completionBaseUrl}?cc=${encodeURIComponent(code)}`
      : DEFAULT_EXIT_URL;
    return { message: this.messages.completed_external, redirect_url: redirect };
  }
}
