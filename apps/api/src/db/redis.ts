import Redis from "ioredis";
import { config } from "../config";

export interface RedisConnectionOptions {
  /** Defer the socket until the first command */
  lazyConnect?: boolean;
  debug?: boolean;
}

let cacheConnection: Redis | null = null;

/**
 * Reconnect delay for the cache connection: grows 100 ms per attempt up to
 * 3 s, and gives up after 20 attempts so cache reads fail over to misses.
 */
export function reconnectDelay(attempt: number): number | null {
  if (attempt > 20) return null;
  return Math.min(attempt * 100, 3000);
}

export function createRedisConnection(url: string, options: RedisConnectionOptions = {}): Redis {
  const debug = options.debug ?? false;
  const connection = new Redis(url, {
    connectionName: "translation-cache",
    lazyConnect: options.lazyConnect ?? false,
    maxRetriesPerRequest: 2,
    retryStrategy: reconnectDelay,
  });

  connection.on("error", (error) => {
    console.error("[Redis] Cache connection error:", error);
  });
  connection.on("ready", () => {
    if (debug) {
      console.log(`[Redis] Cache connection ready (${url})`);
    }
  });

  return connection;
}

/** Shared connection for the persistent cache tier, created on first use. */
export function getRedisConnection(): Redis {
  if (!cacheConnection) {
    cacheConnection = createRedisConnection(config.redisUrl, { debug: config.debugRedis });
  }
  return cacheConnection;
}

export async function pingRedis(): Promise<boolean> {
  if (!cacheConnection) return false;
  try {
    return (await cacheConnection.ping()) === "PONG";
  } catch (error) {
    if (config.debugRedis) {
      console.warn("[Redis] Ping failed:", error);
    }
    return false;
  }
}

export async function closeRedisConnection(): Promise<void> {
  if (!cacheConnection) return;
  const connection = cacheConnection;
  cacheConnection = null;
  await connection.quit();
}
