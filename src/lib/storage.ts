import { randomUUID } from "crypto";
import { EventEmitter } from "events";
import { kv as vercelKv } from "@vercel/kv";

type StoredValue = { value: string; expiresAt?: number };

type MinimalRedisClient = {
  connect: () => Promise<unknown>;
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string, opts?: { EX?: number; NX?: boolean }) => Promise<string | null>;
  eval: (script: string, opts: { keys: string[]; arguments: string[] }) => Promise<unknown>;
  publish: (channel: string, message: string) => Promise<unknown>;
  subscribe: (channel: string, listener: (message: string) => void) => Promise<unknown>;
  unsubscribe: (channel: string) => Promise<unknown>;
  quit: () => Promise<unknown>;
  duplicate: () => MinimalRedisClient;
  on: (event: "error", listener: (err: unknown) => void) => unknown;
};

export type Unsubscribe = () => Promise<void>;

export type StorageBackend = "vercel-kv" | "redis" | "memory";

declare global {
  // eslint-disable-next-line no-var
  var __WORDLERS_MEM_KV__: Map<string, StoredValue> | undefined;
  // eslint-disable-next-line no-var
  var __WORDLERS_MEM_EVENTS__: EventEmitter | undefined;
  // eslint-disable-next-line no-var
  var __WORDLERS_REDIS_CLIENT__: MinimalRedisClient | undefined;
}

const DEFAULT_POLL_MS = 2000;

function getMemoryStore(): Map<string, StoredValue> {
  if (!globalThis.__WORDLERS_MEM_KV__) {
    globalThis.__WORDLERS_MEM_KV__ = new Map<string, StoredValue>();
  }
  return globalThis.__WORDLERS_MEM_KV__;
}

function getMemoryEvents(): EventEmitter {
  if (!globalThis.__WORDLERS_MEM_EVENTS__) {
    const events = new EventEmitter();
    // One listener per open watch; a busy thread can have many.
    events.setMaxListeners(0);
    globalThis.__WORDLERS_MEM_EVENTS__ = events;
  }
  return globalThis.__WORDLERS_MEM_EVENTS__;
}

/** Drops every key and watcher held by the in-process backend. */
export function resetMemoryStore(): void {
  getMemoryStore().clear();
  getMemoryEvents().removeAllListeners();
}

function hasVercelKV(): boolean {
  // Vercel KV typically provides these env vars.
  return Boolean(process.env.KV_REST_API_URL && process.env.KV_REST_API_TOKEN);
}

function hasRedisUrl(): boolean {
  return Boolean(process.env.REDIS_URL);
}

export function activeBackend(): StorageBackend {
  if (hasVercelKV()) return "vercel-kv";
  if (hasRedisUrl()) return "redis";
  return "memory";
}

export function watchPollIntervalMs(): number {
  const n = Number(process.env.SCOREBOARD_WATCH_POLL_MS);
  return Number.isFinite(n) && n > 0 ? n : DEFAULT_POLL_MS;
}

async function getRedisClient(): Promise<MinimalRedisClient> {
  if (globalThis.__WORDLERS_REDIS_CLIENT__) return globalThis.__WORDLERS_REDIS_CLIENT__;

  if (!process.env.REDIS_URL) {
    throw new Error("REDIS_URL is not set");
  }

  const { createClient } = await import("redis");
  const client = createClient({
    url: process.env.REDIS_URL,
  }) as unknown as MinimalRedisClient;

  client.on("error", (err) => {
    console.error("Redis error:", err);
  });

  await client.connect();
  globalThis.__WORDLERS_REDIS_CLIENT__ = client;
  return client;
}

function changeChannel(key: string): string {
  return `kv:changed:${key}`;
}

function parseRaw(key: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    console.warn(`Unparsable JSON at ${key}; reading it as empty.`);
    return null;
  }
}

// @vercel/kv deserializes JSON on read, so a stored string may come back as an object already.
function fromVercelKv(key: string, raw: unknown): unknown {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "string") return parseRaw(key, raw);
  return raw;
}

export async function kvGetJSON(key: string): Promise<unknown> {
  if (hasVercelKV()) {
    const raw = await vercelKv.get<unknown>(key);
    return fromVercelKv(key, raw);
  }

  if (hasRedisUrl()) {
    const client = await getRedisClient();
    const raw = await client.get(key);
    if (!raw) return null;
    return parseRaw(key, raw);
  }

  const store = getMemoryStore();
  const entry = store.get(key);
  if (!entry) return null;
  if (entry.expiresAt && Date.now() > entry.expiresAt) {
    store.delete(key);
    return null;
  }
  return parseRaw(key, entry.value);
}

export async function kvSetJSON(
  key: string,
  value: unknown,
  opts?: { exSeconds?: number },
): Promise<void> {
  const raw = JSON.stringify(value);
  if (hasVercelKV()) {
    if (opts?.exSeconds) {
      await vercelKv.set(key, raw, { ex: opts.exSeconds });
    } else {
      await vercelKv.set(key, raw);
    }
    return;
  }

  if (hasRedisUrl()) {
    const client = await getRedisClient();
    if (opts?.exSeconds) {
      await client.set(key, raw, { EX: opts.exSeconds });
    } else {
      await client.set(key, raw);
    }
    await client.publish(changeChannel(key), raw);
    return;
  }

  const store = getMemoryStore();
  const expiresAt =
    typeof opts?.exSeconds === "number" ? Date.now() + opts.exSeconds * 1000 : undefined;
  store.set(key, { value: raw, expiresAt });
  getMemoryEvents().emit(key, raw);
}

// Deletes the lock only while it still holds the caller's token.
const RELEASE_LOCK_SCRIPT =
  'if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end';

/**
 * SET NX with a TTL. Resolves to an ownership token when this caller now
 * holds the lock, or null when someone else does. A holder that never
 * releases loses the lock once the TTL runs out.
 */
export async function kvTryAcquireLock(args: { key: string; ttlSeconds: number }): Promise<string | null> {
  const token = randomUUID();

  if (hasVercelKV()) {
    const res = await vercelKv.set(args.key, token, { nx: true, ex: args.ttlSeconds });
    return res === "OK" ? token : null;
  }

  if (hasRedisUrl()) {
    const client = await getRedisClient();
    const res = await client.set(args.key, token, { NX: true, EX: args.ttlSeconds });
    return res === "OK" ? token : null;
  }

  const store = getMemoryStore();
  const held = store.get(args.key);
  if (held && (!held.expiresAt || Date.now() <= held.expiresAt)) return null;
  store.set(args.key, { value: token, expiresAt: Date.now() + args.ttlSeconds * 1000 });
  return token;
}

/** No-op when the lock has expired and been taken by another holder. */
export async function kvReleaseLock(key: string, token: string): Promise<void> {
  if (hasVercelKV()) {
    await vercelKv.eval(RELEASE_LOCK_SCRIPT, [key], [token]);
    return;
  }

  if (hasRedisUrl()) {
    const client = await getRedisClient();
    await client.eval(RELEASE_LOCK_SCRIPT, { keys: [key], arguments: [token] });
    return;
  }

  const store = getMemoryStore();
  if (store.get(key)?.value === token) store.delete(key);
}

/**
 * Calls `onChange` with the parsed value after every write to `key`.
 * Redis watches use pub/sub on a duplicated connection; Vercel KV has no
 * pub/sub over REST, so those watches poll.
 */
export async function kvWatchJSON(
  key: string,
  onChange: (value: unknown) => void,
  onError?: (err: unknown) => void,
): Promise<Unsubscribe> {
  if (hasVercelKV()) {
    let last = JSON.stringify(await kvGetJSON(key));
    let stopped = false;
    const poll = async () => {
      const cur = await kvGetJSON(key);
      const serialized = JSON.stringify(cur);
      if (stopped || serialized === last) return;
      last = serialized;
      onChange(cur);
    };
    const timer = setInterval(() => {
      poll().catch((err: unknown) => {
        if (onError) onError(err);
        else console.error(`Watch poll failed for ${key}:`, err);
      });
    }, watchPollIntervalMs());
    return async () => {
      stopped = true;
      clearInterval(timer);
    };
  }

  if (hasRedisUrl()) {
    const client = await getRedisClient();
    const subscriber = client.duplicate();
    subscriber.on("error", (err) => {
      if (onError) onError(err);
      else console.error("Redis subscriber error:", err);
    });
    await subscriber.connect();
    const channel = changeChannel(key);
    await subscriber.subscribe(channel, (message) => onChange(parseRaw(key, message)));
    return async () => {
      await subscriber.unsubscribe(channel);
      await subscriber.quit();
    };
  }

  const events = getMemoryEvents();
  const listener = (raw: string) => onChange(parseRaw(key, raw));
  events.on(key, listener);
  return async () => {
    events.off(key, listener);
  };
}
