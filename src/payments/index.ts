/**
 * Points payments for agent-to-agent questions.
 *
 * @packageDocumentation
 */

// Configuration (env-driven)
export {
  loadConfig,
  DEFAULT_AGENT_ID,
  DEFAULT_ORACLE_URL,
  DEFAULT_ORACLE_MODEL,
  DEFAULT_REGISTRY_TIMEOUT_MS,
  DEFAULT_DELIVERY_TIMEOUT_MS,
  DEFAULT_ORACLE_TIMEOUT_MS,
  DEFAULT_PORT,
  type PaymentsEnvConfig,
} from './config.js';

// Wiring
export { createQuoteService, type EngineOptions } from './engine.js';

// Server & routes
export {
  createPaymentsRouter,
  startPaymentsServer,
  QuoteRequestSchema,
  QUOTE_FAILURE_STATUS,
  SERVICE_NAME,
  type PaymentsServerConfig,
} from './server.js';

// Services
export {
  WalletLedger,
  questionHash,
  walletKey,
  transactionKey,
  interactionKey,
  makeTxnId,
  type NewTransaction,
} from './services/ledger.js';
export {
  PeerResolver,
  AgentTransport,
  type PeerResolverConfig,
  type AgentTransportConfig,
} from './services/peers.js';
export {
  CapabilityOracle,
  heuristicCanAcceptPayment,
  presenceCanAcceptPayment,
  parseOracleDecision,
  buildOraclePrompt,
  capabilityBase,
  PAYMENT_CAPABILITY_MARKERS,
  type CapabilityAssessment,
  type CapabilitySource,
  type CapabilityOracleConfig,
} from './services/capability.js';
export {
  decidePoints,
  BASE_POINTS,
  MIN_POINTS,
  MAX_POINTS,
  LONG_QUESTION_CHARS,
  TECHNICAL_KEYWORDS,
} from './services/pricing.js';
export {
  QuoteService,
  REPEAT_QUOTE,
  buildPriceQuote,
  quoteFailureToError,
  type QuoteServiceConfig,
  type QuoteState,
} from './services/quote.js';
