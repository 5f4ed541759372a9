/**
 * Redaction utilities for participant privacy
 *
 * Logs and error responses never carry:
 * - participant emails
 * - external participant ids passed in query strings
 * - secrets in KEY=value form
 */

const REDACTED_MARKER = "[REDACTED]";

/**
 * Query parameters that identify a participant on the recruiting platform
 */
const IDENTIFYING_PARAMS = new Set(["prolific_pid", "participant_id", "email", "session_id", "study_id"]);

/**
 * Dangerous prototype keys that should never be set dynamically
 */
const UNSAFE_KEYS = new Set(["__proto__", "constructor", "prototype"]);

const EMAIL_PATTERN = /[\w.+-]+@[\w.-]+\.\w+/g;

/**
 * Strip PII from a free-text log or error message
 */
export function redactLogMessage(message: string): string {
  return message
    .replace(EMAIL_PATTERN, "[email]")
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/[A-Z_]+_?SECRET=\S+/gi, "[SECRET_REDACTED]");
}

/**
 * Mask identifying query parameter values in a request URL
 *
 * `/?PROLIFIC_PID=abc&lang=en` becomes `/?PROLIFIC_PID=[REDACTED]&lang=en`
 */
export function redactUrl(url: string): string {
  const queryStart = url.indexOf("?");
  if (queryStart === -1) {
    return url;
  }

  const path = url.slice(0, queryStart);
  const query = url
    .slice(queryStart + 1)
    .split("&")
    .map((pair) => {
      const eq = pair.indexOf("=");
      const key = eq === -1 ? pair : pair.slice(0, eq);
      return IDENTIFYING_PARAMS.has(key.toLowerCase()) && eq !== -1 ? `${key}=${REDACTED_MARKER}` : pair;
    })
    .join("&");

  return `${path}?${query}`;
}

/**
 * Deep clone and redact an object for safe logging
 */
export function safeLog(value: unknown): unknown {
  if (typeof value === "string") {
    return redactLogMessage(value);
  }

  if (typeof value !== "object" || value === null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => safeLog(item));
  }

  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    if (UNSAFE_KEYS.has(key)) {
      continue;
    }
    if (key === "url" && typeof child === "string") {
      result[key] = redactUrl(child);
    } else if (IDENTIFYING_PARAMS.has(key.toLowerCase())) {
      result[key] = REDACTED_MARKER;
    } else {
      result[key] = safeLog(child);
    }
  }
  return result;
}
