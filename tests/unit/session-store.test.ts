import { describe, it, expect } from "vitest";
import {
  MemorySessionStore,
  RedisSessionStore,
  createSessionStore,
  decodeSession,
  type SessionKeyValue,
} from "../../src/session/store.js";
import { createSession, type SessionState } from "../../src/session/state.js";
import { toTrialSpec } from "../../src/schemas/trial.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");

describe("MemorySessionStore", () => {
  it("returns what was stored until the TTL runs out", async () => {
    let now = 1_000;
    const store = new MemorySessionStore(60, 10, () => now);
    const session = createSession("s-1", {}, NOW);

    await store.set(session);
    expect(await store.get("s-1")).toBe(session);

    now += 59_999;
    expect(await store.get("s-1")).toBe(session);

    now += 1;
    expect(await store.get("s-1")).toBeNull();
  });

  it("refreshes the TTL on every write", async () => {
    let now = 0;
    const store = new MemorySessionStore(10, 10, () => now);
    const session = createSession("s-1", {}, NOW);

    await store.set(session);
    now = 9_000;
    await store.set(session);
    now = 15_000;
    expect(await store.get("s-1")).toBe(session);
  });

  it("evicts the oldest tenth when full", async () => {
    const store = new MemorySessionStore(60, 10, () => 0);
    for (let i = 0; i < 10; i++) {
      await store.set(createSession(`s-${i}`, {}, NOW));
    }
    await store.set(createSession("s-new", {}, NOW));

    expect(store.size()).toBe(10);
    expect(await store.get("s-0")).toBeNull();
    expect(await store.get("s-1")).not.toBeNull();
    expect(await store.get("s-new")).not.toBeNull();
  });

  it("evicts idle sessions before ones still in progress", async () => {
    const store = new MemorySessionStore(60, 10, () => 0);
    await store.set({ ...createSession("s-0", {}, NOW), status: "in_progress" });
    for (let i = 1; i < 10; i++) {
      await store.set(createSession(`s-${i}`, {}, NOW));
    }
    await store.set(createSession("s-new", {}, NOW));

    expect(await store.get("s-0")).not.toBeNull();
    expect(await store.get("s-1")).toBeNull();
    expect(await store.get("s-2")).not.toBeNull();
  });

  it("evicts in-progress sessions once nothing else is left", async () => {
    const store = new MemorySessionStore(60, 10, () => 0);
    for (let i = 0; i < 10; i++) {
      await store.set({ ...createSession(`s-${i}`, {}, NOW), status: "in_progress" });
    }
    await store.set(createSession("s-new", {}, NOW));

    expect(store.size()).toBe(10);
    expect(await store.get("s-0")).toBeNull();
    expect(await store.get("s-new")).not.toBeNull();
  });

  it("deletes on request", async () => {
    const store = new MemorySessionStore(60, 10);
    await store.set(createSession("s-1", {}, NOW));
    await store.delete("s-1");
    expect(await store.get("s-1")).toBeNull();
  });
});

describe("createSessionStore", () => {
  it("falls back to memory without a Redis client", () => {
    expect(createSessionStore(null, { ttlSeconds: 60, maxInMemory: 10 }).backend).toBe("memory");
  });
});

class InMemoryRedis implements SessionKeyValue {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async setex(key: string, seconds: number, value: string): Promise<"OK"> {
    this.values.set(key, value);
    this.ttls.set(key, seconds);
    return "OK";
  }

  async del(key: string): Promise<number> {
    this.ttls.delete(key);
    return this.values.delete(key) ? 1 : 0;
  }
}

function sessionInProgress(): SessionState {
  return {
    ...createSession("s-1", { PROLIFIC_PID: "pid-1", cohort: "b" }, NOW),
    status: "in_progress",
    identity: { kind: "participant_id", value: "pid-1" },
    trials: [
      toTrialSpec({
        type: "similarity",
        reference: "ref/utt_1.wav",
        target: "sys/utt_1.wav",
        ref_system: "ref",
        target_system: "sys",
        ref_filename: "ref/utt_1.wav",
        target_filename: "sys/utt_1.wav",
        metalst_line: 4,
      }),
      toTrialSpec({
        type: "comparative",
        reference: "b/utt_2.wav",
        target: "a/utt_2.wav",
        ref_system: "b",
        target_system: "a",
        swap: true,
      }),
      toTrialSpec({ type: "quality", reference: null, target: "sys/utt_3.wav", system: "sys" }),
      toTrialSpec({
        type: "edit-fidelity",
        target: "edit/utt_4.wav",
        target_system: "edit",
        edited_transcript: "the quick brown fox",
      }),
    ],
    cursor: 2,
    responses: [
      {
        test_type: "edit-fidelity",
        reference_audio: null,
        target_audio: "edit/utt_4.wav",
        ref_system: null,
        target_system: "edit",
        swap: false,
        score: 4,
        naturalness_score: 4,
        editing_score: 2,
        edited_transcript: "the quick brown fox",
        url_params: { PROLIFIC_PID: "pid-1", cohort: "b" },
      },
      {
        test_type: "comparative",
        reference_audio: "b/utt_2.wav",
        target_audio: "a/utt_2.wav",
        ref_system: "b",
        target_system: "a",
        swap: true,
        score: -2,
        url_params: { PROLIFIC_PID: "pid-1", cohort: "b" },
      },
    ],
    played: { reference: true, target: false },
    updated_at: "2026-03-01T10:05:00.000Z",
  };
}

describe("RedisSessionStore", () => {
  it("writes under session:<id> with the TTL and reads the same session back", async () => {
    const redis = new InMemoryRedis();
    const store = new RedisSessionStore(redis, 3600);
    const session = sessionInProgress();

    await store.set(session);

    expect([...redis.values.keys()]).toEqual(["session:s-1"]);
    expect(redis.ttls.get("session:s-1")).toBe(3600);
    expect(await store.get("s-1")).toEqual(session);
  });

  it("keeps optional trial fields only where they were set", async () => {
    const store = new RedisSessionStore(new InMemoryRedis(), 60);
    await store.set(sessionInProgress());

    const restored = await store.get("s-1");
    expect(restored?.trials[0].metalst_line).toBe(4);
    expect(restored?.trials[1].swap).toBe(true);
    expect(restored?.trials[2].reference).toBeNull();
    expect(restored?.trials[2].target_system).toBe("sys");
    expect(restored?.trials[2]).not.toHaveProperty("metalst_line");
    expect(restored?.trials[3].edited_transcript).toBe("the quick brown fox");
  });

  it("returns null for a missing key", async () => {
    expect(await new RedisSessionStore(new InMemoryRedis(), 60).get("nope")).toBeNull();
  });

  it("treats unreadable stored data as expired", async () => {
    const redis = new InMemoryRedis();
    const store = new RedisSessionStore(redis, 60);
    await redis.setex("session:bad-json", 60, "{not json");
    await redis.setex("session:bad-shape", 60, JSON.stringify({ id: "bad-shape", status: "paused" }));

    expect(await store.get("bad-json")).toBeNull();
    expect(await store.get("bad-shape")).toBeNull();
  });

  it("deletes the key", async () => {
    const redis = new InMemoryRedis();
    const store = new RedisSessionStore(redis, 60);
    await store.set(sessionInProgress());
    await store.delete("s-1");

    expect(redis.values.size).toBe(0);
    expect(await store.get("s-1")).toBeNull();
  });
});

describe("decodeSession", () => {
  it("canonicalises trial tags on the way back", () => {
    const stored = { ...createSession("s-2", {}, NOW), trials: [{ type: "CMOS", reference: "r.wav", target: "t.wav" }] };

    expect(decodeSession(JSON.stringify(stored))?.trials).toEqual([
      {
        type: "comparative",
        reference: "r.wav",
        target: "t.wav",
        ref_system: null,
        target_system: null,
        swap: false,
        edited_transcript: null,
      },
    ]);
  });
});
