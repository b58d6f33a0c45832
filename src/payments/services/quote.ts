/**
 * Quote-and-Charge Service
 *
 * Negotiates and settles a points payment for one question:
 *
 *   ResolvingPeer → CheckingCapability → CheckingIdempotency
 *     → Repeat   (zero-point quote, nothing charged)
 *     → Charging (mark, price, balance check, debit/credit, transaction)
 *   → Delivering → Done
 *
 * Business outcomes are returned, never thrown. The charge commits before the
 * quote is delivered: a delivery failure is reported inside a successful
 * result and the charge stands. `ok: true, charged: true` with an error in
 * `a2aResponse` means billed, peer notification uncertain.
 *
 * Charges on one service instance run one at a time. Separate processes
 * sharing a store can still race on the same payer or question.
 */

import type { Logger } from '../../logger.js';
import { logger as defaultLogger } from '../../logger.js';
import type {
  A2AResponse,
  PeerRecord,
  PriceQuotePayload,
  QuoteFailure,
  QuotePayload,
  QuoteRequest,
  QuoteResult,
  RepeatQuotePayload,
} from '../../types/index.js';
import {
  CapabilityRejectedError,
  InsufficientFundsError,
  NotFoundError,
  POINTS_CURRENCY,
  PaymentsError,
  TransportError,
  errorMessage,
} from '../../types/index.js';
import { SerialQueue } from '../../utils/serial.js';
import type { CapabilityOracle } from './capability.js';
import { makeTxnId, type WalletLedger } from './ledger.js';
import type { AgentTransport, PeerResolver } from './peers.js';
import { decidePoints } from './pricing.js';

export type QuoteState =
  | 'ResolvingPeer'
  | 'CheckingCapability'
  | 'CheckingIdempotency'
  | 'Repeat'
  | 'Charging'
  | 'Delivering'
  | 'Done';

export const REPEAT_QUOTE: RepeatQuotePayload = {
  type: 'quote',
  points: 0,
  reason: 'repeat_question',
};

export function buildPriceQuote(points: number, question: string, useX402: boolean): PriceQuotePayload {
  return {
    type: useX402 ? 'x402.quote' : 'price_quote',
    amount_points: points,
    currency: POINTS_CURRENCY,
    question,
  };
}

/** The error class matching a failed result, for callers that want to throw */
export function quoteFailureToError(failure: QuoteFailure, peer: string): PaymentsError {
  switch (failure.error) {
    case 'peer_not_found':
      return new NotFoundError(`Peer "${peer}"`);
    case 'registry_unavailable':
      return new TransportError(failure.message, undefined, 'REGISTRY_UNAVAILABLE');
    case 'peer_cannot_accept_payment':
      return new CapabilityRejectedError(peer);
    case 'insufficient_points':
      return new InsufficientFundsError(failure.required, failure.available);
  }
}

// ============================================================================
// Quote Service
// ============================================================================

export interface QuoteServiceConfig {
  /** The local agent; credited with every charge */
  selfAgentId: string;
  ledger: WalletLedger;
  resolver: PeerResolver;
  oracle: CapabilityOracle;
  transport: AgentTransport;
  logger?: Logger;
  now?: () => Date;
}

export class QuoteService {
  private readonly config: QuoteServiceConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly queue = new SerialQueue();

  constructor(config: QuoteServiceConfig) {
    this.config = config;
    this.logger = config.logger ?? defaultLogger;
    this.now = config.now ?? (() => new Date());
  }

  get selfAgentId(): string {
    return this.config.selfAgentId;
  }

  get ledger(): WalletLedger {
    return this.config.ledger;
  }

  async quoteAndCharge(request: QuoteRequest): Promise<QuoteResult> {
    return this.queue.run(() => this.negotiate(request));
  }

  private async negotiate(request: QuoteRequest): Promise<QuoteResult> {
    const { username, question } = request;
    const useX402 = request.useX402 ?? true;
    const { ledger, resolver, oracle, selfAgentId } = this.config;

    this.enter('ResolvingPeer', request.peer);
    let peer: PeerRecord | null;
    try {
      peer = await resolver.resolve(request.peer);
    } catch (err) {
      if (err instanceof TransportError) {
        return { ok: false, error: 'registry_unavailable', message: err.message };
      }
      throw err;
    }
    if (!peer) return { ok: false, error: 'peer_not_found' };
    const peerId = peer.agent_id;

    this.enter('CheckingCapability', peerId);
    if (!(await oracle.canAcceptPayment(peer))) {
      return { ok: false, error: 'peer_cannot_accept_payment' };
    }

    this.enter('CheckingIdempotency', peerId);
    if (await ledger.hasInteraction(selfAgentId, username, question)) {
      this.enter('Repeat', peerId);
      const a2aResponse = await this.deliver(peer, REPEAT_QUOTE);
      this.enter('Done', peerId);
      return { ok: true, charged: false, points: 0, a2aResponse };
    }

    this.enter('Charging', peerId);
    // Marked before the balance check: a refused charge still counts as billed.
    await ledger.markInteraction(selfAgentId, username, question);

    const points = decidePoints(question, false);
    const available = await ledger.getBalance(username);
    if (available < points) {
      return { ok: false, error: 'insufficient_points', required: points, available };
    }

    // Two independent overwrites; not atomic across the pair.
    await ledger.setBalance(username, available - points);
    const selfBalance = await ledger.getBalance(selfAgentId);
    await ledger.setBalance(selfAgentId, selfBalance + points);

    const txnId = makeTxnId(username, question, this.now());
    await ledger.addTransaction({
      txnId,
      from: username,
      to: selfAgentId,
      points,
      question,
      peerAgent: peerId,
    });
    this.logger.info({ txnId, from: username, to: selfAgentId, points, peer: peerId }, '[quote] charge committed');

    const a2aResponse = await this.deliver(peer, buildPriceQuote(points, question, useX402));
    this.enter('Done', peerId);
    return { ok: true, charged: true, points, txnId, a2aResponse };
  }

  /** Delivery failures are captured as { error } and never rethrown */
  private async deliver(peer: PeerRecord, payload: QuotePayload): Promise<A2AResponse> {
    this.enter('Delivering', peer.agent_id);
    try {
      return await this.config.transport.deliverTo(peer, payload);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn({ peer: peer.agent_id, err: message }, '[quote] delivery failed');
      return { error: message };
    }
  }

  private enter(state: QuoteState, peer: string): void {
    this.logger.debug({ state, peer }, '[quote] state');
  }
}
