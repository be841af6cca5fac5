import type { KeyValueStore } from "@repo/core";
import { TranslationCacheEntry } from "../models/TranslationCacheEntry";

/**
 * Persistent cache tier on MongoDB, one document per storage key.
 */
export class MongoKeyValueStore implements KeyValueStore {
  constructor(private debug: boolean = false) {}

  async get(key: string): Promise<string | null> {
    const entry = await TranslationCacheEntry.findOne({ key }).lean();
    return entry ? entry.value : null;
  }

  async getAll(): Promise<Map<string, string>> {
    const entries = await TranslationCacheEntry.find({}, { key: 1, value: 1 }).lean();
    return new Map(entries.map((entry) => [entry.key, entry.value]));
  }

  async set(key: string, value: string): Promise<void> {
    await TranslationCacheEntry.findOneAndUpdate({ key }, { key, value }, { upsert: true });

    if (this.debug) {
      console.log(`[Mongo] Cache SET: ${key}`);
    }
  }

  async remove(key: string): Promise<void> {
    await TranslationCacheEntry.deleteOne({ key });
  }

  async clear(): Promise<void> {
    const result = await TranslationCacheEntry.deleteMany({});

    if (this.debug) {
      console.log(`[Mongo] Cache cleared: ${result.deletedCount} entries`);
    }
  }

  count(): Promise<number> {
    return TranslationCacheEntry.countDocuments().exec();
  }
}
