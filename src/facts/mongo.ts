import mongoose, { Schema, type Connection, type Model } from 'mongoose';
import type { FactRecord } from '../types/index.js';
import { FactRecordSchema } from '../types/index.js';
import type { FactBackend } from './store.js';

// ============================================================================
// Schema
// ============================================================================

export const FACTS_COLLECTION = 'agent_facts';

export interface FactDocument {
  ownerId: string;
  key: string;
  /** Re-validated as a JSON object on read */
  value: Record<string, unknown>;
  timestamp: string;
}

export const FactDocumentSchema = new Schema<FactDocument>(
  {
    ownerId: { type: String, required: true },
    key: { type: String, required: true },
    value: { type: Schema.Types.Mixed, required: true },
    timestamp: { type: String, required: true },
  },
  { collection: FACTS_COLLECTION, versionKey: false, minimize: false }
);

FactDocumentSchema.index({ ownerId: 1, key: 1 }, { unique: true });

// ============================================================================
// MongoDB Backend
// ============================================================================

export class MongoFactBackend implements FactBackend {
  readonly kind = 'mongo' as const;

  constructor(
    private readonly model: Model<FactDocument>,
    private readonly connection?: Connection
  ) {}

  async set(record: FactRecord): Promise<void> {
    await this.model
      .updateOne(
        { ownerId: record.ownerId, key: record.key },
        { $set: { ...record } },
        { upsert: true }
      )
      .exec();
  }

  async get(ownerId: string, key: string): Promise<FactRecord | null> {
    const doc = await this.model
      .findOne({ ownerId, key }, { _id: 0 })
      .lean<FactDocument>()
      .exec();
    return doc ? FactRecordSchema.parse(doc) : null;
  }

  async list(ownerId: string): Promise<Record<string, FactRecord>> {
    const docs = await this.model
      .find({ ownerId }, { _id: 0 })
      .lean<FactDocument[]>()
      .exec();
    const out: Record<string, FactRecord> = {};
    for (const doc of docs) {
      const record = FactRecordSchema.parse(doc);
      out[record.key] = record;
    }
    return out;
  }

  async close(): Promise<void> {
    await this.connection?.close();
  }
}

// ============================================================================
// Connection
// ============================================================================

export interface MongoConnectOptions {
  dbName: string;
  /** Bound on server selection and the ping */
  timeoutMs: number;
}

/**
 * Connect and ping. Rejects when the server cannot be reached within
 * `timeoutMs`; the connection is closed before the rejection.
 */
export async function connectMongoFacts(
  url: string,
  options: MongoConnectOptions
): Promise<MongoFactBackend> {
  const connection = mongoose.createConnection(url, {
    dbName: options.dbName,
    serverSelectionTimeoutMS: options.timeoutMs,
  });

  try {
    await connection.asPromise();
    await connection.db?.admin().ping();
  } catch (err) {
    await connection.close(true);
    throw err;
  }

  const model = connection.model<FactDocument>('AgentFact', FactDocumentSchema);
  return new MongoFactBackend(model, connection);
}
