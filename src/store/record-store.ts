// RecordStore - keyed persistence for the bridge's identity and subscriptions.
// FileRecordStore keeps every record in one JSON document and rewrites it
// with write-file-atomic on each mutation, so a crash never leaves a torn file.

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

/**
 * Durable key/value collaborator. Values must be JSON-serializable.
 * Single-key operations are atomic; nothing spans keys.
 */
export interface RecordStore {
  get(key: string): Promise<unknown>;
  put(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
  /** All entries whose key starts with `prefix`, in key order */
  list(prefix: string): Promise<Array<[string, unknown]>>;
}

function sortedEntries(map: Map<string, unknown>, prefix: string): Array<[string, unknown]> {
  return [...map.entries()]
    .filter(([key]) => key.startsWith(prefix))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Values are stored as JSON text so callers never share object
 * references with the store.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly records = new Map<string, string>();

  async get(key: string): Promise<unknown> {
    const raw = this.records.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async put(key: string, value: unknown): Promise<void> {
    this.records.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  async list(prefix: string): Promise<Array<[string, unknown]>> {
    const parsed = new Map<string, unknown>();
    for (const [key, raw] of this.records) {
      parsed.set(key, JSON.parse(raw));
    }
    return sortedEntries(parsed, prefix);
  }
}

const StoreFileSchema = z.object({
  version: z.literal(1),
  records: z.record(z.string(), z.unknown()),
});

/**
 * JSON-file backed store. The file is read once, on first access; every
 * mutation persists the whole document before resolving and rolls the
 * in-memory copy back if the write fails.
 */
export class FileRecordStore implements RecordStore {
  private records: Map<string, unknown> | null = null;

  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<unknown> {
    const records = await this.load();
    return records.get(key);
  }

  async put(key: string, value: unknown): Promise<void> {
    const records = await this.load();
    const had = records.has(key);
    const previous = records.get(key);
    // Round-trip through JSON so the cached copy matches what is on disk
    records.set(key, JSON.parse(JSON.stringify(value)));
    try {
      await this.persist(records);
    } catch (err) {
      if (had) records.set(key, previous);
      else records.delete(key);
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    const records = await this.load();
    if (!records.has(key)) return;
    const previous = records.get(key);
    records.delete(key);
    try {
      await this.persist(records);
    } catch (err) {
      records.set(key, previous);
      throw err;
    }
  }

  async list(prefix: string): Promise<Array<[string, unknown]>> {
    return sortedEntries(await this.load(), prefix);
  }

  private async load(): Promise<Map<string, unknown>> {
    if (this.records) return this.records;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        this.records = new Map();
        return this.records;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new Error(`Record store contains invalid JSON: ${this.filePath}`);
    }

    const result = StoreFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Record store has invalid schema: ${this.filePath} -- ${result.error.message}`);
    }
    this.records = new Map(Object.entries(result.data.records));
    return this.records;
  }

  private async persist(records: Map<string, unknown>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const document = { version: 1, records: Object.fromEntries(records) };
    await writeFileAtomic(this.filePath, JSON.stringify(document, null, 2) + '\n');
  }
}
