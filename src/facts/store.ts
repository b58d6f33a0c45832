/**
 * Fact Store
 *
 * Keyed record storage addressed by (ownerId, key). Two durable backends are
 * interchangeable behind the same contract:
 *
 *   1. MongoDB - chosen when a connection string is configured and a
 *      bounded-time ping succeeds.
 *   2. Local JSON file - everything else, including a failed ping.
 *
 * The backend is fixed when the store is created; there is no migration
 * between backends at run time.
 */

import { join } from 'node:path';
import type { Logger } from '../logger.js';
import { logger as defaultLogger } from '../logger.js';
import type { FactRecord, JsonObject } from '../types/index.js';
import { StorageDegradedError, errorMessage } from '../types/index.js';
import { FileFactBackend } from './file.js';
import { connectMongoFacts, type MongoConnectOptions } from './mongo.js';

// ============================================================================
// Backend Contract
// ============================================================================

export type FactBackendKind = 'mongo' | 'file' | 'memory';

export interface FactBackend {
  readonly kind: FactBackendKind;
  /** Upsert by (record.ownerId, record.key) */
  set(record: FactRecord): Promise<void>;
  get(ownerId: string, key: string): Promise<FactRecord | null>;
  /** All records owned by ownerId, keyed by record key */
  list(ownerId: string): Promise<Record<string, FactRecord>>;
  close?(): Promise<void>;
}

export interface FactStoreStatus {
  degraded: boolean;
  reason?: StorageDegradedError;
}

// ============================================================================
// Fact Store
// ============================================================================

export class FactStore {
  private readonly backendImpl: FactBackend;
  private readonly now: () => Date;
  readonly status: FactStoreStatus;

  constructor(
    backend: FactBackend,
    options: { now?: () => Date; status?: FactStoreStatus } = {}
  ) {
    this.backendImpl = backend;
    this.now = options.now ?? (() => new Date());
    this.status = options.status ?? { degraded: false };
  }

  get backend(): FactBackendKind {
    return this.backendImpl.kind;
  }

  async set(ownerId: string, key: string, value: JsonObject): Promise<void> {
    await this.backendImpl.set({
      ownerId,
      key,
      value,
      timestamp: this.now().toISOString(),
    });
  }

  async get(ownerId: string, key: string): Promise<FactRecord | null> {
    return this.backendImpl.get(ownerId, key);
  }

  async list(ownerId: string): Promise<Record<string, FactRecord>> {
    return this.backendImpl.list(ownerId);
  }

  async close(): Promise<void> {
    await this.backendImpl.close?.();
  }
}

// ============================================================================
// Store Factory
// ============================================================================

export const DEFAULT_DB_NAME = 'agent_registry';
export const DEFAULT_PROBE_TIMEOUT_MS = 1500;
export const DEFAULT_FACTS_FILE = 'agent_facts.json';

export interface FactStoreOptions {
  /** MongoDB connection string; absent means the file backend */
  mongoUrl?: string;
  dbName?: string;
  /** File backend location (default: ./agent_facts.json) */
  filePath?: string;
  /** Upper bound for the database connectivity probe */
  probeTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
  /** Opens the database backend; replaced in tests */
  connect?: (url: string, options: MongoConnectOptions) => Promise<FactBackend>;
}

/**
 * Create a FactStore, probing the database first when one is configured.
 *
 * Never rejects on an unreachable database: the store degrades to the file
 * backend, logs a warning and records the reason in `status`.
 */
export async function createFactStore(options: FactStoreOptions = {}): Promise<FactStore> {
  const log = options.logger ?? defaultLogger;
  const filePath = options.filePath ?? join(process.cwd(), DEFAULT_FACTS_FILE);
  const connect = options.connect ?? connectMongoFacts;

  if (options.mongoUrl) {
    try {
      const backend = await connect(options.mongoUrl, {
        dbName: options.dbName ?? DEFAULT_DB_NAME,
        timeoutMs: options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
      });
      log.info({ backend: backend.kind, dbName: options.dbName ?? DEFAULT_DB_NAME }, '[facts] using database backend');
      return new FactStore(backend, { now: options.now });
    } catch (err) {
      const reason = new StorageDegradedError(
        `Database unreachable, falling back to file backend: ${errorMessage(err)}`
      );
      log.warn({ err: reason, filePath }, '[facts] storage degraded');
      return new FactStore(new FileFactBackend(filePath, log), {
        now: options.now,
        status: { degraded: true, reason },
      });
    }
  }

  return new FactStore(new FileFactBackend(filePath, log), { now: options.now });
}
