import { createHash } from "node:crypto";
import { createClient } from "redis";
import { trackEvent, trackException } from "./telemetry";

const redisUrl = process.env.REDIS_URL?.trim();
const redisKey = process.env.REDIS_KEY?.trim();

type CacheClient = ReturnType<typeof createClient>;

let client: CacheClient | null = null;
let connecting: Promise<CacheClient | null> | null = null;

export function isCacheConfigured(): boolean {
  return Boolean(redisUrl && redisKey);
}

async function getClient(): Promise<CacheClient | null> {
  if (!isCacheConfigured()) return null;
  if (client?.isOpen) return client;
  if (connecting) return connecting;

  const nextClient = createClient({ url: redisUrl, password: redisKey });
  nextClient.on("error", (error) => {
    trackException(error, { component: "redis", operation: "client.error" });
  });

  connecting = nextClient
    .connect()
    .then(() => {
      client = nextClient;
      trackEvent("cache.redis.connected");
      return nextClient;
    })
    .catch((error: unknown) => {
      trackException(error, { component: "redis", operation: "connect" });
      return null;
    })
    .finally(() => {
      connecting = null;
    });

  return connecting;
}

/**
 * Stable cache key for a palette request. Object keys are sorted so that
 * equivalent option objects hash the same.
 */
export function paletteCacheKey(image: string, options: Record<string, unknown>): string {
  const canonical = JSON.stringify(
    Object.keys(options)
      .sort()
      .map((key) => [key, options[key]])
  );
  const digest = createHash("sha256").update(image).update("\n").update(canonical).digest("hex");
  return `palette:${digest.slice(0, 32)}`;
}

export async function cacheGetJson<T>(key: string): Promise<T | null> {
  const redis = await getClient();
  if (!redis) return null;

  try {
    const raw = await redis.get(key);
    return raw ? (JSON.parse(raw) as T) : null;
  } catch (error) {
    trackException(error, { component: "redis", operation: "get", key });
    return null;
  }
}

export async function cacheSetJson(key: string, value: unknown, ttlSeconds: number): Promise<void> {
  const redis = await getClient();
  if (!redis) return;

  try {
    await redis.set(key, JSON.stringify(value), { EX: ttlSeconds });
  } catch (error) {
    trackException(error, { component: "redis", operation: "set", key, ttlSeconds });
  }
}

/** Get/set pair the palette endpoint caches through. */
export interface JsonCache {
  get<T>(key: string): Promise<T | null>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
}

export const redisJsonCache: JsonCache = {
  get: cacheGetJson,
  set: cacheSetJson,
};
