import type { CostCacheStore, CostEntry, CostStoreStats, Revision } from '@rebisect/shared';

export function costKey(signature: string, revision: Revision): string {
  return `${signature}:${revision}`;
}

/** Cost store that lives for one process. */
export class MemoryCostStore implements CostCacheStore {
  private readonly entries = new Map<string, CostEntry>();

  async get(signature: string, revision: Revision): Promise<CostEntry | undefined> {
    return this.entries.get(costKey(signature, revision));
  }

  async insert(entry: CostEntry): Promise<CostEntry> {
    const key = costKey(entry.signature, entry.revision);
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }
    this.entries.set(key, entry);
    return entry;
  }

  async stats(): Promise<CostStoreStats> {
    return { entries: this.entries.size, corruptRecords: 0, location: 'memory' };
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async close(): Promise<void> {}
}
