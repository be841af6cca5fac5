import type { KeyValueStore } from "@repo/core";

/**
 * The hash commands the store needs; an ioredis client satisfies it.
 */
export interface RedisHashClient {
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, field: string, value: string): Promise<number>;
  hdel(key: string, field: string): Promise<number>;
  del(key: string): Promise<number>;
  hlen(key: string): Promise<number>;
}

/**
 * Persistent cache tier kept in a single Redis hash.
 */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    private readonly redis: RedisHashClient,
    private readonly hashKey: string = "translation-cache"
  ) {}

  get(key: string): Promise<string | null> {
    return this.redis.hget(this.hashKey, key);
  }

  async getAll(): Promise<Map<string, string>> {
    const entries = await this.redis.hgetall(this.hashKey);
    return new Map(Object.entries(entries));
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.hset(this.hashKey, key, value);
  }

  async remove(key: string): Promise<void> {
    await this.redis.hdel(this.hashKey, key);
  }

  async clear(): Promise<void> {
    await this.redis.del(this.hashKey);
  }

  count(): Promise<number> {
    return this.redis.hlen(this.hashKey);
  }
}
