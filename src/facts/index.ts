export {
  FactStore,
  createFactStore,
  DEFAULT_DB_NAME,
  DEFAULT_FACTS_FILE,
  DEFAULT_PROBE_TIMEOUT_MS,
  type FactBackend,
  type FactBackendKind,
  type FactStoreOptions,
  type FactStoreStatus,
} from './store.js';
export { MemoryFactBackend, compositeKey } from './memory.js';
export { FileFactBackend } from './file.js';
export {
  MongoFactBackend,
  connectMongoFacts,
  FactDocumentSchema,
  FACTS_COLLECTION,
  type FactDocument,
  type MongoConnectOptions,
} from './mongo.js';
