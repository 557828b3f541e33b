import type { CacheStore } from "../../src/cache/cacheStore";

export class MemoryCacheStore implements CacheStore {
  readonly entries = new Map<string, string>();
  puts = 0;

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    this.puts++;
    this.entries.set(key, value);
  }
}
