import type { AxiosInstance } from 'axios';
import { createFactStore, type FactStore } from '../facts/store.js';
import type { Logger } from '../logger.js';
import { logger as defaultLogger } from '../logger.js';
import type { PaymentsEnvConfig } from './config.js';
import { CapabilityOracle } from './services/capability.js';
import { WalletLedger } from './services/ledger.js';
import { AgentTransport, PeerResolver } from './services/peers.js';
import { QuoteService } from './services/quote.js';

export interface EngineOptions {
  logger?: Logger;
  /** Use this store instead of creating one from config.facts */
  store?: FactStore;
  /** Shared HTTP client for registry, oracle and peer calls */
  http?: AxiosInstance;
  now?: () => Date;
}

/**
 * Wire the fact store, ledger, resolver, oracle and transport into a
 * QuoteService for the configured local agent.
 */
export async function createQuoteService(
  config: PaymentsEnvConfig,
  options: EngineOptions = {}
): Promise<QuoteService> {
  const logger = options.logger ?? defaultLogger;

  const store =
    options.store ??
    (await createFactStore({
      mongoUrl: config.facts.mongoUrl,
      dbName: config.facts.dbName,
      filePath: config.facts.filePath,
      probeTimeoutMs: config.facts.probeTimeoutMs,
      logger,
      now: options.now,
    }));

  const resolver = new PeerResolver({
    registryUrl: config.registryUrl,
    timeoutMs: config.registryTimeoutMs,
    http: options.http,
    logger,
  });

  return new QuoteService({
    selfAgentId: config.agentId,
    ledger: new WalletLedger(store, { logger, now: options.now }),
    resolver,
    oracle: new CapabilityOracle({ ...config.oracle, http: options.http, logger }),
    transport: new AgentTransport({
      selfAgentId: config.agentId,
      timeoutMs: config.deliveryTimeoutMs,
      resolver,
      http: options.http,
    }),
    logger,
    now: options.now,
  });
}
