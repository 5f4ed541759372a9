/**
 * Redis client platform layer
 *
 * Lazy singleton with a ping on connect. When REDIS_URL is unset or the
 * connection fails, callers get null and use the in-memory session store.
 */

import { Redis, type RedisOptions } from "ioredis";
import { log } from "../utils/telemetry.js";
import { config, isProduction } from "../config/index.js";

let redisClient: Redis | null = null;
let isInitialized = false;

let lastReconnectLogTime = 0;
let reconnectAttemptsSinceLastLog = 0;
const RECONNECT_LOG_INTERVAL_MS = 30000;

interface RedisTarget {
  url: string;
  options: RedisOptions;
}

function getRedisTarget(): RedisTarget | null {
  const url = config.redis.url;
  if (!url) {
    return null;
  }

  const enableTLS = config.redis.tls || url.startsWith("rediss://");

  const options: RedisOptions = {
    connectTimeout: config.redis.connectTimeout,
    commandTimeout: config.redis.commandTimeout,
    retryStrategy(times: number) {
      const delay = Math.min(times * 100, 30000) + Math.random() * 1000;

      reconnectAttemptsSinceLastLog++;
      const now = Date.now();
      if (now - lastReconnectLogTime >= RECONNECT_LOG_INTERVAL_MS || times === 1) {
        log.warn(
          {
            attempt: times,
            delay_ms: Math.round(delay),
            attempts_since_last_log: reconnectAttemptsSinceLastLog,
          },
          "Redis reconnecting"
        );
        lastReconnectLogTime = now;
        reconnectAttemptsSinceLastLog = 0;
      }

      return delay;
    },
    lazyConnect: true,
    ...(enableTLS && { tls: { rejectUnauthorized: isProduction() } }),
    keyPrefix: `${config.redis.namespace}:`,
  };

  return { url, options };
}

async function initializeRedis(): Promise<Redis | null> {
  if (isInitialized) {
    return redisClient;
  }

  const target = getRedisTarget();
  if (!target) {
    log.info("Redis not configured (REDIS_URL not set), sessions kept in memory");
    isInitialized = true;
    return null;
  }

  const client = new Redis(target.url, target.options);
  client.on("error", (error: Error) => {
    log.error({ error }, "Redis error");
  });
  client.on("close", () => {
    log.warn("Redis connection closed");
  });

  try {
    await client.connect();
    await client.ping();
  } catch (error) {
    isInitialized = true;
    client.disconnect();
    log.error({ error }, "Redis initialization failed, sessions kept in memory");
    return null;
  }

  redisClient = client;
  isInitialized = true;
  log.info(
    { namespace: target.options.keyPrefix, tls: Boolean(target.options.tls) },
    "Redis initialized"
  );
  return client;
}

/**
 * Shared client, or null when Redis is not configured or unreachable
 */
export async function getRedis(): Promise<Redis | null> {
  if (!isInitialized) {
    return initializeRedis();
  }
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (!redisClient) {
    return;
  }
  try {
    await redisClient.quit();
    log.info("Redis connection closed gracefully");
  } catch (error) {
    log.error({ error }, "Error closing Redis connection");
  } finally {
    redisClient = null;
    isInitialized = false;
  }
}
