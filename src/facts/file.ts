import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logger.js';
import type { FactRecord } from '../types/index.js';
import { FactRecordSchema, errorMessage } from '../types/index.js';
import { SerialQueue } from '../utils/serial.js';
import { compositeKey } from './memory.js';
import type { FactBackend } from './store.js';

const FactFileSchema = z.record(z.unknown());

interface FactFile {
  /** Entries that are valid records */
  records: Record<string, FactRecord>;
  /** Every entry as read; written back as-is on the next set */
  raw: Record<string, unknown>;
}

const emptyFile = (): FactFile => ({ records: {}, raw: {} });

/**
 * Local JSON file backend.
 *
 * The file is one document mapping "<ownerId>:<key>" to the record. Every
 * set loads the whole document, changes one entry and rewrites it through a
 * temporary file, so readers see either the old or the new document.
 * Entries that are not valid records are skipped on read and kept on write.
 */
export class FileFactBackend implements FactBackend {
  readonly kind = 'file' as const;
  private readonly writes = new SerialQueue();

  constructor(
    readonly filePath: string,
    private readonly logger: Logger
  ) {}

  async set(record: FactRecord): Promise<void> {
    await this.writes.run(async () => {
      const { raw } = await this.load();
      raw[compositeKey(record.ownerId, record.key)] = record;
      await this.save(raw);
    });
  }

  async get(ownerId: string, key: string): Promise<FactRecord | null> {
    const { records } = await this.load();
    return records[compositeKey(ownerId, key)] ?? null;
  }

  async list(ownerId: string): Promise<Record<string, FactRecord>> {
    const { records } = await this.load();
    const out: Record<string, FactRecord> = {};
    for (const record of Object.values(records)) {
      if (record.ownerId === ownerId) out[record.key] = record;
    }
    return out;
  }

  /** Missing, unreadable or non-object files read as an empty store. */
  private async load(): Promise<FactFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return emptyFile();
      this.logger.warn({ filePath: this.filePath, err: errorMessage(err) }, '[facts] file unreadable, treating as empty');
      return emptyFile();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn({ filePath: this.filePath, err: errorMessage(err) }, '[facts] file is not valid JSON, treating as empty');
      return emptyFile();
    }

    const document = FactFileSchema.safeParse(parsed);
    if (!document.success) {
      this.logger.warn({ filePath: this.filePath }, '[facts] file is not a JSON object, treating as empty');
      return emptyFile();
    }

    const records: Record<string, FactRecord> = {};
    const skipped: string[] = [];
    for (const [key, entry] of Object.entries(document.data)) {
      const record = FactRecordSchema.safeParse(entry);
      if (record.success) records[key] = record.data;
      else skipped.push(key);
    }
    if (skipped.length > 0) {
      this.logger.warn({ filePath: this.filePath, skipped }, '[facts] skipping entries that are not valid records');
    }
    return { records, raw: document.data };
  }

  private async save(data: Record<string, unknown>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
    await rename(tmpPath, this.filePath);
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
