import { z } from 'zod';

// ============================================================================
// Constants
// ============================================================================

/** JSON-LD style type tag carried by every fact value */
export const FACT_TYPE = 'AgentFacts' as const;

/** Key prefixes used in the fact store */
export const FACT_KEYS = {
  WALLET: 'wallet:',
  TRANSACTION: 'txn:',
  INTERACTION: 'q:',
} as const;

/** Currency label carried on every quote */
export const POINTS_CURRENCY = 'POINTS' as const;

/** Path appended to a peer's agent_url for agent-to-agent delivery */
export const A2A_MESSAGE_PATH = '/handle_external_message' as const;

// ============================================================================
// Fact Records
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema = z.record(JsonValueSchema);

/**
 * A stored fact. Uniquely identified by (ownerId, key); the latest write wins.
 */
export interface FactRecord<V extends JsonObject = JsonObject> {
  ownerId: string;
  key: string;
  value: V;
  /** ISO-8601 time of the last write */
  timestamp: string;
}

export const FactRecordSchema = z.object({
  ownerId: z.string(),
  key: z.string(),
  value: JsonObjectSchema,
  timestamp: z.string(),
});

// ============================================================================
// Fact Values
// ============================================================================

export interface WalletFact extends JsonObject {
  '@type': typeof FACT_TYPE;
  category: 'wallet';
  owner: string;
  balance: number;
  observedAt: string;
}

export interface TransactionFact extends JsonObject {
  '@type': typeof FACT_TYPE;
  category: 'transaction';
  txnId: string;
  from: string;
  to: string;
  points: number;
  question: string;
  peerAgent: string;
  observedAt: string;
}

export interface InteractionFact extends JsonObject {
  '@type': typeof FACT_TYPE;
  category: 'interaction';
  user: string;
  question: string;
  observedAt: string;
}

export const WalletFactSchema = z.object({
  balance: z.number().int().nonnegative(),
});

export const TransactionFactSchema = z.object({
  '@type': z.literal(FACT_TYPE),
  category: z.literal('transaction'),
  txnId: z.string(),
  from: z.string(),
  to: z.string(),
  points: z.number().int().nonnegative(),
  question: z.string(),
  peerAgent: z.string(),
  observedAt: z.string(),
});

// ============================================================================
// Registry
// ============================================================================

/**
 * Registry resolve response. At least agent_id; anything else the registry
 * publishes (agent_url, the capability document) is kept.
 */
export const PeerRecordSchema = z
  .object({
    agent_id: z.string().min(1),
    /** Absent or null when the agent publishes no endpoint; delivery then fails */
    agent_url: z.string().nullish(),
  })
  .passthrough();

export type PeerRecord = z.infer<typeof PeerRecordSchema>;

// ============================================================================
// Quotes (agent-to-agent payloads)
// ============================================================================

export interface RepeatQuotePayload {
  type: 'quote';
  points: 0;
  reason: 'repeat_question';
}

export interface PriceQuotePayload {
  type: 'x402.quote' | 'price_quote';
  amount_points: number;
  currency: typeof POINTS_CURRENCY;
  question: string;
}

export type QuotePayload = RepeatQuotePayload | PriceQuotePayload;

/** Envelope posted to a peer's message endpoint */
export interface A2AEnvelope {
  from: string;
  message: QuotePayload;
}

/** The peer's reply, or the captured delivery failure */
export type A2AResponse = unknown;

// ============================================================================
// Quote-and-Charge Results
// ============================================================================

export interface QuoteRequest {
  /** Paying user */
  username: string;
  /** Peer agent identifier, as known to the registry */
  peer: string;
  question: string;
  /** Send an x402-flavoured quote instead of a plain price quote (default true) */
  useX402?: boolean;
}

export type QuoteFailure =
  | { ok: false; error: 'peer_not_found' }
  | { ok: false; error: 'registry_unavailable'; message: string }
  | { ok: false; error: 'peer_cannot_accept_payment' }
  | { ok: false; error: 'insufficient_points'; required: number; available: number };

export type QuoteSuccess =
  | { ok: true; charged: false; points: 0; a2aResponse: A2AResponse }
  | { ok: true; charged: true; points: number; txnId: string; a2aResponse: A2AResponse };

export type QuoteResult = QuoteFailure | QuoteSuccess;

export type QuoteErrorCode = QuoteFailure['error'];

// ============================================================================
// Error Types
// ============================================================================

export class PaymentsError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PaymentsError';
    Object.setPrototypeOf(this, PaymentsError.prototype);
  }
}

/** A peer or record is absent. Expected, not exceptional. */
export class NotFoundError extends PaymentsError {
  constructor(what: string) {
    super(`${what} not found`, 'NOT_FOUND', { what });
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class CapabilityRejectedError extends PaymentsError {
  constructor(peerId: string) {
    super(`Peer "${peerId}" cannot accept payment`, 'CAPABILITY_REJECTED', { peerId });
    this.name = 'CapabilityRejectedError';
    Object.setPrototypeOf(this, CapabilityRejectedError.prototype);
  }
}

export class InsufficientFundsError extends PaymentsError {
  constructor(
    public required: number,
    public available: number
  ) {
    super(
      `Insufficient points: ${required} required, ${available} available`,
      'INSUFFICIENT_FUNDS',
      { required, available }
    );
    this.name = 'InsufficientFundsError';
    Object.setPrototypeOf(this, InsufficientFundsError.prototype);
  }
}

/** Network failure, timeout or unexpected status from the registry or a peer */
export class TransportError extends PaymentsError {
  constructor(
    message: string,
    public status?: number,
    code: string = 'TRANSPORT_ERROR'
  ) {
    super(message, code, status === undefined ? undefined : { status });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class DeliveryError extends TransportError {
  constructor(message: string, status?: number) {
    super(message, status, 'DELIVERY_FAILED');
    this.name = 'DeliveryError';
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }
}

/** Database unreachable at construction. Non-fatal: the file backend takes over. */
export class StorageDegradedError extends PaymentsError {
  constructor(message: string) {
    super(message, 'STORAGE_DEGRADED');
    this.name = 'StorageDegradedError';
    Object.setPrototypeOf(this, StorageDegradedError.prototype);
  }
}

export class InvalidBalanceError extends PaymentsError {
  constructor(owner: string, balance: number) {
    super(
      `Balance for "${owner}" must be a non-negative integer, got ${balance}`,
      'INVALID_BALANCE',
      { owner, balance }
    );
    this.name = 'InvalidBalanceError';
    Object.setPrototypeOf(this, InvalidBalanceError.prototype);
  }
}

export class ConfigError extends PaymentsError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/** UTC timestamp to whole seconds, e.g. 2024-05-01T12:00:00Z */
export function toObservedAt(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
