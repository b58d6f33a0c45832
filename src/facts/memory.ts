import type { FactRecord } from '../types/index.js';
import type { FactBackend } from './store.js';

// ============================================================================
// In-Memory Backend (for development / testing without MongoDB)
// ============================================================================

export class MemoryFactBackend implements FactBackend {
  readonly kind = 'memory' as const;
  private readonly records: Map<string, FactRecord> = new Map();

  async set(record: FactRecord): Promise<void> {
    this.records.set(compositeKey(record.ownerId, record.key), structuredClone(record));
  }

  async get(ownerId: string, key: string): Promise<FactRecord | null> {
    const record = this.records.get(compositeKey(ownerId, key));
    return record ? structuredClone(record) : null;
  }

  async list(ownerId: string): Promise<Record<string, FactRecord>> {
    const out: Record<string, FactRecord> = {};
    for (const record of this.records.values()) {
      if (record.ownerId === ownerId) out[record.key] = structuredClone(record);
    }
    return out;
  }

  /** Number of stored records across all owners */
  get size(): number {
    return this.records.size;
  }
}

/** "<ownerId>:<key>", the addressing used by the file layout as well */
export function compositeKey(ownerId: string, key: string): string {
  return `${ownerId}:${key}`;
}
