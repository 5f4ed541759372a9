/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino redaction paths, shared by the Fastify
 * logger (server.ts) and the standalone logger (telemetry.ts).
 *
 * Participant identity is PII: emails and external participant ids must
 * never reach log output.
 */

/**
 * Paths to redact from all log output (Pino path syntax)
 */
export const REDACT_PATHS = [
  "*.password",
  "*.secret",
  "*.token",
  "*.authorization",
  "*.headers.authorization",
  "*.headers.cookie",

  // Participant identity
  "*.email",
  "*.participant_id",
  "*.user_id",
  "*.identity",
  "*.url_params.PROLIFIC_PID",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
