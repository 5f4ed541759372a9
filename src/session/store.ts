/**
 * Session store
 *
 * Sessions live in Redis under `<namespace>:session:<id>` when it is
 * reachable, otherwise in a bounded in-memory map. Both expire entries
 * after the configured TTL, refreshed on every write.
 *
 * Stored sessions are re-validated on read; a record that no longer parses
 * is treated as expired.
 */

import type { Redis } from "ioredis";
import { z } from "zod";
import { ResponseRecord, UrlParams } from "../schemas/results.js";
import { TrialRecord, toTrialSpec } from "../schemas/trial.js";
import { log } from "../utils/telemetry.js";
import type { SessionState } from "./state.js";

export type StoreBackend = "redis" | "memory";

export interface SessionStore {
  readonly backend: StoreBackend;
  get(id: string): Promise<SessionState | null>;
  set(session: SessionState): Promise<void>;
  delete(id: string): Promise<void>;
}

/**
 * The Redis commands the store uses; an ioredis client satisfies it
 */
export interface SessionKeyValue {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

export const SESSION_KEY_PREFIX = "session:";

const StoredSession = z.object({
  id: z.string(),
  status: z.enum(["unidentified", "in_progress", "completed", "failed"]),
  identity: z
    .object({
      kind: z.enum(["email", "participant_id"]),
      value: z.string(),
    })
    .nullable(),
  url_params: UrlParams,
  trials: z.array(TrialRecord),
  cursor: z.number().int().nonnegative(),
  responses: z.array(ResponseRecord),
  played: z.object({ reference: z.boolean(), target: z.boolean() }),
  created_at: z.string(),
  updated_at: z.string(),
});

export function decodeSession(raw: string): SessionState | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    log.warn({ error }, "Stored session is not valid JSON");
    return null;
  }
  const parsed = StoredSession.safeParse(json);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues.length }, "Stored session failed validation");
    return null;
  }
  return { ...parsed.data, trials: parsed.data.trials.map(toTrialSpec) };
}

interface MemoryEntry {
  data: SessionState;
  expires: number;
}

export class MemorySessionStore implements SessionStore {
  readonly backend = "memory";
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly maxEntries: number,
    private readonly clock: () => number = Date.now
  ) {}

  async get(id: string): Promise<SessionState | null> {
    const entry = this.entries.get(id);
    if (!entry) {
      return null;
    }
    if (entry.expires <= this.clock()) {
      this.entries.delete(id);
      return null;
    }
    return entry.data;
  }

  async set(session: SessionState): Promise<void> {
    this.entries.delete(session.id);
    this.cleanExpired();
    this.evictIfNeeded();
    this.entries.set(session.id, { data: session, expires: this.clock() + this.ttlSeconds * 1000 });
  }

  async delete(id: string): Promise<void> {
    this.entries.delete(id);
  }

  size(): number {
    this.cleanExpired();
    return this.entries.size;
  }

  private cleanExpired(): void {
    const now = this.clock();
    for (const [key, entry] of this.entries) {
      if (entry.expires <= now) {
        this.entries.delete(key);
      }
    }
  }

  /**
   * Drops a tenth of the store once full, least recently written first.
   * Sessions still in progress go only after every other session.
   */
  private evictIfNeeded(): void {
    if (this.entries.size < this.maxEntries) {
      return;
    }
    const toRemove = Math.max(1, Math.ceil(this.maxEntries * 0.1));
    const idle: string[] = [];
    const live: string[] = [];
    for (const [key, entry] of this.entries) {
      (entry.data.status === "in_progress" ? live : idle).push(key);
    }
    const keys = [...idle, ...live].slice(0, toRemove);
    const liveEvicted = Math.max(0, keys.length - idle.length);
    for (const key of keys) {
      this.entries.delete(key);
    }

    if (liveEvicted > 0) {
      log.warn(
        { evicted: keys.length, in_progress_evicted: liveEvicted, max_entries: this.maxEntries },
        "Session store full, in-progress sessions evicted"
      );
    } else {
      log.warn({ evicted: keys.length, max_entries: this.maxEntries }, "Session store full, idle sessions evicted");
    }
  }
}

export class RedisSessionStore implements SessionStore {
  readonly backend = "redis";

  constructor(
    private readonly redis: SessionKeyValue,
    private readonly ttlSeconds: number
  ) {}

  async get(id: string): Promise<SessionState | null> {
    const raw = await this.redis.get(`${SESSION_KEY_PREFIX}${id}`);
    return raw ? decodeSession(raw) : null;
  }

  async set(session: SessionState): Promise<void> {
    await this.redis.setex(`${SESSION_KEY_PREFIX}${session.id}`, this.ttlSeconds, JSON.stringify(session));
  }

  async delete(id: string): Promise<void> {
    await this.redis.del(`${SESSION_KEY_PREFIX}${id}`);
  }
}

/**
 * Redis-backed store when a client is given, memory otherwise
 */
export function createSessionStore(
  redis: Redis | null,
  options: { ttlSeconds: number; maxInMemory: number }
): SessionStore {
  if (redis) {
    log.info({ ttl_seconds: options.ttlSeconds }, "Sessions stored in Redis");
    return new RedisSessionStore(redis, options.ttlSeconds);
  }
  log.info({ ttl_seconds: options.ttlSeconds, max_entries: options.maxInMemory }, "Sessions stored in memory");
  return new MemorySessionStore(options.ttlSeconds, options.maxInMemory);
}
