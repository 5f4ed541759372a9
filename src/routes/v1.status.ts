/**
 * /v1/status - Service diagnostics
 *
 * Uptime, request counters and the active session-store backend. No
 * participant data.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { SERVICE_VERSION } from "../version.js";

const SERVICE_START_TIME = Date.now();

let totalRequests = 0;
let client4xxErrors = 0;
let server5xxErrors = 0;

export function incrementRequestCount(): void {
  totalRequests++;
}

/**
 * Called by the error handler; 5xx are the health-relevant errors
 */
export function incrementErrorCount(statusCode: number): void {
  if (statusCode >= 500) {
    server5xxErrors++;
  } else if (statusCode >= 400) {
    client4xxErrors++;
  }
}

export interface StatusSource {
  storeBackend: string;
  language: string;
}

interface StatusResponse {
  service: string;
  version: string;
  uptime_seconds: number;
  timestamp: string;
  requests: {
    total: number;
    client_errors_4xx: number;
    server_errors_5xx: number;
    /** Percentage, two decimals */
    error_rate_5xx: number;
  };
  sessions: {
    store_backend: string;
  };
  study: {
    language: string;
  };
}

export async function statusRoutes(app: FastifyInstance, source: StatusSource): Promise<void> {
  app.get("/v1/status", async (_request: FastifyRequest, reply: FastifyReply) => {
    const errorRate5xx = totalRequests > 0 ? server5xxErrors / totalRequests : 0;

    const status: StatusResponse = {
      service: "listening-test",
      version: SERVICE_VERSION,
      uptime_seconds: Math.floor((Date.now() - SERVICE_START_TIME) / 1000),
      timestamp: new Date().toISOString(),
      requests: {
        total: totalRequests,
        client_errors_4xx: client4xxErrors,
        server_errors_5xx: server5xxErrors,
        error_rate_5xx: Math.round(errorRate5xx * 10000) / 100,
      },
      sessions: {
        store_backend: source.storeBackend,
      },
      study: {
        language: source.language,
      },
    };

    return reply.status(200).send(status);
  });
}
