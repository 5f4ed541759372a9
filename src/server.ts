// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import compress from "@fastify/compress";
import { config } from "./config/index.js";
import { statusRoutes, incrementRequestCount, incrementErrorCount } from "./routes/v1.status.js";
import { sessionRoutes } from "./routes/v1.sessions.js";
import { audioRoutes } from "./routes/audio.js";
import { uiRoutes } from "./routes/ui.js";
import observabilityPlugin from "./plugins/observability.js";
import { closeRedis, getRedis } from "./platform/redis.js";
import { FileResultPersister } from "./results/persister.js";
import { ListeningTestService, loadStudyContext } from "./session/service.js";
import { createSessionStore } from "./session/store.js";
import { seededRandom } from "./trials/random.js";
import { SERVICE_VERSION } from "./version.js";
import { genReqId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { flushMetrics } from "./utils/telemetry.js";

const DEV_ORIGINS = ["http://localhost:3000", "http://localhost:5173"];

function resolveAllowedOrigins(): string[] {
  const origins = config.server.allowedOrigins.length > 0 ? config.server.allowedOrigins : DEV_ORIGINS;

  if (config.server.nodeEnv === "production" && origins.some((origin) => origin === "*" || origin === '"*"')) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return origins;
}

/**
 * Wire the service from configuration: study context, session store
 * (Redis when reachable) and the results directory.
 */
export async function createService(): Promise<ListeningTestService> {
  const context = await loadStudyContext(config);
  const redis = await getRedis();
  const store = createSessionStore(redis, {
    ttlSeconds: config.session.ttlSeconds,
    maxInMemory: config.session.maxInMemory,
  });

  return new ListeningTestService({
    context,
    store,
    persister: new FileResultPersister(config.study.resultsDir),
    completionBaseUrl: config.participants.completionBaseUrl,
    maxParticipants: config.participants.maxParticipants,
    random: config.sampling.seed !== undefined ? seededRandom(config.sampling.seed) : undefined,
  });
}

export interface BuildOptions {
  /** Pre-built service (tests); otherwise created from configuration */
  service?: ListeningTestService;
  audioRoot?: string;
}

/**
 * Build and configure the Fastify instance
 * (imported by tests, or run directly below)
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const service = options.service ?? (await createService());
  const globalRateLimitRpm = config.server.globalRateLimitRpm;

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    genReqId,
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: config.server.requestTimeoutMs,
    requestTimeout: config.server.requestTimeoutMs,
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  // The participant page sets its own CSP (see routes/ui.ts)
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  // Audio is already compressed; only JSON and the page are worth it
  await app.register(compress, {
    threshold: 1024,
    encodings: ["gzip", "deflate"],
    customTypes: /^(application\/json|text\/html|text\/plain)/,
  });

  await app.register(rateLimit, {
    global: true,
    max: globalRateLimitRpm,
    timeWindow: "1 minute",
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn({ event: "rate_limit_hit", max: globalRateLimitRpm, request_id: requestId }, "Rate limit exceeded");

      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  await app.register(observabilityPlugin);

  app.addHook("onRequest", async () => {
    incrementRequestCount();
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    incrementErrorCount(statusCode);

    if (statusCode >= 500) {
      app.log.error(
        { error, request_id: errorV1.request_id, method: request.method },
        `[${errorV1.code}] ${errorV1.message}`
      );
    } else {
      app.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method },
        `[${errorV1.code}] ${errorV1.message}`
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    incrementErrorCount(404);
    return reply.status(404).send(buildErrorV1("NOT_FOUND", "Route not found", undefined, getRequestId(request)));
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: "listening-test",
    version: SERVICE_VERSION,
    language: service.language,
    store_backend: service.storeBackend,
  }));

  await statusRoutes(app, service);
  await sessionRoutes(app, service);
  await audioRoutes(app, options.audioRoot ?? config.study.audioRoot);
  await uiRoutes(app, {
    language: service.language,
    messages: service.messages,
    customCss: service.customCss,
  });

  app.addHook("onClose", async () => {
    await closeRedis();
  });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info(
        {
          service: "listening-test-service",
          version: SERVICE_VERSION,
          global_rate_limit_rpm: config.server.globalRateLimitRpm,
          body_limit_kb: Math.round(config.server.bodyLimitBytes / 1024),
          cors_origins: resolveAllowedOrigins(),
          catalog_path: config.study.catalogPath,
          results_dir: config.study.resultsDir,
          max_participants: config.participants.maxParticipants ?? null,
        },
        "Listening test service starting"
      );

      const shutdown = (signal: string) => {
        app.log.info({ signal }, "Shutting down");
        app
          .close()
          .then(() => flushMetrics())
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            console.error("Shutdown failed:", err);
            process.exit(1);
          });
      };
      process.once("SIGTERM", shutdown);
      process.once("SIGINT", shutdown);

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
