import fs from 'node:fs/promises';
import {
  AppError,
  CacheCorruptionError,
  appendText,
  atomicWrite,
  eventBase,
  type CostCacheStore,
  type CostEntry,
  type CostStoreStats,
  type Logger,
  type Revision,
} from '@rebisect/shared';
import { costKey } from './memory-store';
import { parseCostRecord, serializeCostRecord } from './record';

export interface JsonlCostStoreOptions {
  logger?: Logger;
  sessionId?: string;
}

export interface CompactResult {
  kept: number;
  dropped: number;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Append-only JSON Lines file of measured costs, one record per line.
 *
 * The file is read once when the store opens. The first valid record of a key wins;
 * lines that cannot be decoded are reported and otherwise ignored, so the key reads as a miss
 * until a new measurement is appended.
 */
export class JsonlCostStore implements CostCacheStore {
  private readonly entries = new Map<string, CostEntry>();
  private corruptRecords = 0;
  private lines = 0;
  private needsNewline = false;
  private writeChain: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(
    readonly filePath: string,
    private readonly options: JsonlCostStoreOptions,
  ) {}

  static async open(filePath: string, options: JsonlCostStoreOptions = {}): Promise<JsonlCostStore> {
    const store = new JsonlCostStore(filePath, options);
    await store.load();
    return store;
  }

  private async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return;
      throw new AppError('CacheError', `Cannot read cost store at ${this.filePath}`, {
        cause: error,
      });
    }

    this.needsNewline = content.length > 0 && !content.endsWith('\n');
    const lines = content.split('\n');
    for (const [index, line] of lines.entries()) {
      if (line.trim().length === 0) continue;
      this.lines++;
      try {
        const entry = parseCostRecord(line, `${this.filePath}:${index + 1}`);
        const key = costKey(entry.signature, entry.revision);
        if (!this.entries.has(key)) {
          this.entries.set(key, entry);
        }
      } catch (error) {
        if (!(error instanceof CacheCorruptionError)) throw error;
        await this.reportCorrupt(error);
      }
    }
  }

  private async reportCorrupt(error: CacheCorruptionError): Promise<void> {
    this.corruptRecords++;
    const { logger, sessionId = 'cache' } = this.options;
    if (!logger) return;
    await logger.log({
      ...eventBase(sessionId),
      type: 'CacheRecordCorrupt',
      payload: { location: error.location, message: error.message },
    });
    await logger.warn(`${error.message}; the record is ignored`);
  }

  async get(signature: string, revision: Revision): Promise<CostEntry | undefined> {
    return this.entries.get(costKey(signature, revision));
  }

  async insert(entry: CostEntry): Promise<CostEntry> {
    this.assertOpen();
    const key = costKey(entry.signature, entry.revision);
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    this.entries.set(key, entry);
    try {
      await this.enqueue(async () => {
        const prefix = this.needsNewline ? '\n' : '';
        await appendText(this.filePath, `${prefix}${serializeCostRecord(entry)}\n`);
        this.needsNewline = false;
        this.lines++;
      });
    } catch (error) {
      this.entries.delete(key);
      throw new AppError('CacheError', `Cannot append to cost store at ${this.filePath}`, {
        cause: error,
      });
    }
    return entry;
  }

  async stats(): Promise<CostStoreStats> {
    return {
      entries: this.entries.size,
      corruptRecords: this.corruptRecords,
      location: this.filePath,
    };
  }

  async clear(): Promise<void> {
    this.assertOpen();
    await this.enqueue(async () => {
      await fs.rm(this.filePath, { force: true });
      this.entries.clear();
      this.corruptRecords = 0;
      this.lines = 0;
      this.needsNewline = false;
    });
  }

  /**
   * Rewrites the file with one valid record per key, in the order they were first stored.
   * Served values do not change.
   */
  async compact(): Promise<CompactResult> {
    this.assertOpen();
    let result: CompactResult = { kept: 0, dropped: 0 };
    await this.enqueue(async () => {
      const records = [...this.entries.values()].map(serializeCostRecord);
      await atomicWrite(this.filePath, records.map((line) => `${line}\n`).join(''));
      result = { kept: records.length, dropped: this.lines - records.length };
      this.lines = records.length;
      this.corruptRecords = 0;
      this.needsNewline = false;
    });
    return result;
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.writeChain;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new AppError('CacheError', `Cost store at ${this.filePath} is closed`);
    }
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(task);
    // The caller receives the failure through `run`; the chain itself keeps going.
    this.writeChain = run.catch(() => undefined);
    return run;
  }
}

/** Opens the store at `filePath`, runs `fn`, and closes the store however `fn` ends. */
export async function withCostStore<T>(
  filePath: string,
  options: JsonlCostStoreOptions,
  fn: (store: JsonlCostStore) => Promise<T>,
): Promise<T> {
  const store = await JsonlCostStore.open(filePath, options);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
