/**
 * a2a-points - negotiate and settle points payments between agents
 *
 * Resolves a peer through the agent registry, checks that it can accept a
 * payment, charges the asking user once per question and sends the peer an
 * x402-style quote.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { loadConfig, createQuoteService } from 'a2a-points';
 *
 * const quotes = await createQuoteService(loadConfig());
 * const result = await quotes.quoteAndCharge({
 *   username: 'alice',
 *   peer: 'weather-agent',
 *   question: 'Will it rain tomorrow?',
 * });
 * ```
 *
 * @example
 * ```typescript
 * // Standalone HTTP server
 * import { startPaymentsServer } from 'a2a-points';
 *
 * startPaymentsServer(3000, { quotes });
 * // Now serving: /quote, /wallets/:owner, /transactions/:owner, /facts/:owner, /health
 * ```
 */

export * from './types/index.js';
export * from './facts/index.js';
export * from './payments/index.js';
export { createLogger, logger, type Logger } from './logger.js';
export { SerialQueue } from './utils/serial.js';
