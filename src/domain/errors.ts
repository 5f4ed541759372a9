/**
 * Domain error types
 *
 * Each carries a stable `code` for programmatic handling and the error.v1
 * envelope code it surfaces as over HTTP. Recoverable participant mistakes
 * (bad email, unplayed audio, missing score) are not errors; see
 * Rejection in ../session/state.ts.
 */

import type { ErrorCode } from "../utils/errors.js";

/**
 * Catalog file absent or unreadable. Fatal at startup.
 */
export class CatalogNotFoundError extends Error {
  readonly name = "CatalogNotFoundError";
  readonly code = "CATALOG_NOT_FOUND";
  readonly errorCode: ErrorCode = "INTERNAL";

  constructor(
    public readonly path: string,
    public readonly cause?: unknown
  ) {
    super(`Trial catalog not found or unreadable: ${path}`);
    Error.captureStackTrace?.(this, CatalogNotFoundError);
  }
}

/**
 * Catalog file present but not a valid catalog. Fatal at startup.
 */
export class CatalogMalformedError extends Error {
  readonly name = "CatalogMalformedError";
  readonly code = "CATALOG_MALFORMED";
  readonly errorCode: ErrorCode = "INTERNAL";

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    Error.captureStackTrace?.(this, CatalogMalformedError);
  }
}

/**
 * A test type with no registered descriptor. Never skipped silently.
 */
export class UnknownTrialTypeError extends Error {
  readonly name = "UnknownTrialTypeError";
  readonly code = "UNKNOWN_TRIAL_TYPE";
  readonly errorCode: ErrorCode = "INTERNAL";

  constructor(
    public readonly testType: string,
    public readonly language?: string
  ) {
    super(
      language
        ? `Unknown trial type "${testType}" for language "${language}"`
        : `Unknown trial type "${testType}"`
    );
    Error.captureStackTrace?.(this, UnknownTrialTypeError);
  }
}

/**
 * Study file or locale table invalid. Fatal at startup.
 */
export class StudyConfigError extends Error {
  readonly name = "StudyConfigError";
  readonly code = "STUDY_CONFIG_INVALID";
  readonly errorCode: ErrorCode = "INTERNAL";

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    Error.captureStackTrace?.(this, StudyConfigError);
  }
}

/**
 * Result bundle could not be written. Fatal to the session.
 */
export class PersistFailureError extends Error {
  readonly name = "PersistFailureError";
  readonly code = "PERSIST_FAILURE";
  readonly errorCode: ErrorCode = "PERSIST_FAILED";

  constructor(
    public readonly userId: string,
    public readonly cause?: unknown
  ) {
    super("Your responses could not be saved. Please contact the study organisers.");
    Error.captureStackTrace?.(this, PersistFailureError);
  }
}

export class SessionNotFoundError extends Error {
  readonly name = "SessionNotFoundError";
  readonly code = "SESSION_NOT_FOUND";
  readonly errorCode: ErrorCode = "NOT_FOUND";

  constructor(public readonly sessionId: string) {
    super("Session not found or expired. Please reload the page to start again.");
    Error.captureStackTrace?.(this, SessionNotFoundError);
  }
}

/**
 * Operation not valid in the session's current state (stale trial index,
 * submission after completion, identity given twice).
 */
export class SessionConflictError extends Error {
  readonly name = "SessionConflictError";
  readonly code = "SESSION_CONFLICT";
  readonly errorCode: ErrorCode = "CONFLICT";

  constructor(message: string) {
    super(message);
    Error.captureStackTrace?.(this, SessionConflictError);
  }
}
