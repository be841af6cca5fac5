import type { KeyValueStore } from "../interfaces";

/**
 * Process-local KeyValueStore. Lost on restart; used where no database is
 * configured and as the substrate in tests.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async getAll(): Promise<Map<string, string>> {
    return new Map(this.data);
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async remove(key: string): Promise<void> {
    this.data.delete(key);
  }

  async clear(): Promise<void> {
    this.data.clear();
  }

  async count(): Promise<number> {
    return this.data.size;
  }
}
