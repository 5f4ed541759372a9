import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  CatalogNotFoundError,
  PersistFailureError,
  SessionConflictError,
  SessionNotFoundError,
} from "../../src/domain/errors.js";
import { buildErrorV1, getStatusCodeForErrorCode, toErrorV1 } from "../../src/utils/errors.js";
import { redactLogMessage, redactUrl, safeLog } from "../../src/utils/redaction.js";
import { getOrGenerateRequestId } from "../../src/utils/request-id.js";

describe("redaction", () => {
  it("masks emails and key=value secrets in messages", () => {
    expect(redactLogMessage("saved for rater@example.com")).toBe("saved for [email]");
    expect(redactLogMessage("using API_KEY=test-secret now")).toBe("using [KEY_REDACTED] now");
  });

  it("masks identifying query parameters only", () => {
    expect(redactUrl("/?PROLIFIC_PID=abc&lang=en")).toBe("/?PROLIFIC_PID=[REDACTED]&lang=en");
    expect(redactUrl("/v1/status")).toBe("/v1/status");
  });

  it("redacts nested log objects and drops prototype keys", () => {
    const input = JSON.parse('{"url":"/?STUDY_ID=s1","email":"a@example.com","nested":{"note":"by b@example.com"},"__proto__":{"x":1}}');
    expect(safeLog(input)).toEqual({
      url: "/?STUDY_ID=[REDACTED]",
      email: "[REDACTED]",
      nested: { note: "by [email]" },
    });
  });
});

describe("error envelope", () => {
  it("omits empty details and keeps the request id", () => {
    expect(buildErrorV1("NOT_FOUND", "gone", {}, "req-1")).toEqual({
      schema: "error.v1",
      code: "NOT_FOUND",
      message: "gone",
      request_id: "req-1",
    });
  });

  it("maps domain errors to their envelope codes", () => {
    expect(toErrorV1(new SessionNotFoundError("abc")).code).toBe("NOT_FOUND");
    expect(toErrorV1(new SessionConflictError("stale")).code).toBe("CONFLICT");
    expect(toErrorV1(new PersistFailureError("rater@example.com")).code).toBe("PERSIST_FAILED");
    expect(toErrorV1(new SessionConflictError("stale")).details).toEqual({ reason: "SESSION_CONFLICT" });
  });

  it("strips file paths from messages", () => {
    expect(toErrorV1(new CatalogNotFoundError("/srv/data/catalog.json")).message).toBe(
      "Trial catalog not found or unreadable: [path]"
    );
  });

  it("turns zod failures into BAD_INPUT", () => {
    const result = z.object({ score: z.number() }).safeParse({ score: "x" });
    if (result.success) throw new Error("expected failure");
    expect(toErrorV1(result.error).code).toBe("BAD_INPUT");
  });

  it("treats unknown throwables as INTERNAL", () => {
    expect(toErrorV1(42)).toEqual({ schema: "error.v1", code: "INTERNAL", message: "An unexpected error occurred" });
  });

  it("maps codes to HTTP statuses", () => {
    expect(getStatusCodeForErrorCode("BAD_INPUT")).toBe(400);
    expect(getStatusCodeForErrorCode("NOT_FOUND")).toBe(404);
    expect(getStatusCodeForErrorCode("CONFLICT")).toBe(409);
    expect(getStatusCodeForErrorCode("RATE_LIMITED")).toBe(429);
    expect(getStatusCodeForErrorCode("PERSIST_FAILED")).toBe(500);
  });
});

describe("request ids", () => {
  it("reuses a sane incoming id and replaces an oversized one", () => {
    expect(getOrGenerateRequestId({ "x-request-id": " abc-123 " })).toBe("abc-123");
    expect(getOrGenerateRequestId({ "x-request-id": "x".repeat(129) })).toMatch(/^[0-9a-f-]{36}$/);
  });
});
