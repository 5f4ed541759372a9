import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * Redaction paths live in ./logger-config.ts so the Fastify logger and
 * this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetrySink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check: config may not be initialised yet
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Telemetry event names
 */
export const TelemetryEvents = {
  SessionStarted: "session.started",
  SessionIdentified: "session.identified",
  SessionRejected: "session.rejected",
  ResponseAccepted: "response.accepted",
  ResponseRejected: "response.rejected",
  SessionCompleted: "session.completed",
  SessionPersistFailed: "session.persist_failed",
  CatalogLoaded: "catalog.loaded",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * StatsD client (optional, configured via DD_AGENT_HOST)
 */
let statsdClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  statsdClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "listening_test.",
    globalTags: {
      service: env.DD_SERVICE || "listening-test-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "StatsD client initialized");
}

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryValue = TelemetryLeaf | TelemetryShape | TelemetryValue[];
export type TelemetryShape = { [key: string]: TelemetryValue };

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }

  if (Array.isArray(value)) {
    const items: TelemetryValue[] = [];
    for (const item of value) {
      const sanitized = sanitizeTelemetryValue(item);
      if (sanitized !== undefined) {
        items.push(sanitized);
      }
    }
    return items;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  // functions, symbols, bigints and undefined are dropped
  return undefined;
}

function sanitizeTelemetryData(data: Record<string, unknown>): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: TelemetryValue | undefined, fallback: string): string {
  return typeof value === "string" || typeof value === "number" ? String(value) : fallback;
}

/**
 * Emit a telemetry event: always logged, mirrored to StatsD when configured
 */
export function emit(event: TelemetryEventName, data: Record<string, unknown>): void {
  const eventData = sanitizeTelemetryData(data);

  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!statsdClient) {
    return;
  }

  try {
    switch (event) {
      case TelemetryEvents.ResponseAccepted:
        statsdClient.increment("response.accepted", 1, { test_type: tag(eventData.test_type, "unknown") });
        break;
      case TelemetryEvents.ResponseRejected:
        statsdClient.increment("response.rejected", 1, { reason: tag(eventData.reason, "unknown") });
        break;
      case TelemetryEvents.SessionCompleted:
        statsdClient.increment("session.completed");
        if (typeof eventData.duration_ms === "number") {
          statsdClient.histogram("session.duration_ms", eventData.duration_ms);
        }
        break;
      case TelemetryEvents.SessionPersistFailed:
        statsdClient.increment("session.persist_failed");
        break;
      default:
        statsdClient.increment(event);
    }
  } catch (error) {
    log.error({ error, event }, "Failed to send StatsD metrics");
  }
}

/**
 * Flush StatsD metrics (graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = statsdClient;
  if (!client) {
    return;
  }
  await new Promise<void>((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing StatsD metrics");
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
