/**
 * Peer Resolver & Agent Transport
 *
 * Resolves agent identifiers through the registry and posts quote payloads to
 * the resolved agent's message endpoint. One attempt per call, no retries.
 *
 * The resolver keeps "peer does not exist" (null) apart from "registry could
 * not answer" (TransportError).
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { Logger } from '../../logger.js';
import { logger as defaultLogger } from '../../logger.js';
import type { A2AEnvelope, PeerRecord, QuotePayload } from '../../types/index.js';
import {
  A2A_MESSAGE_PATH,
  DeliveryError,
  PeerRecordSchema,
  TransportError,
  errorMessage,
} from '../../types/index.js';

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

// ============================================================================
// Peer Resolver
// ============================================================================

export interface PeerResolverConfig {
  registryUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: Logger;
}

export class PeerResolver {
  private readonly http: AxiosInstance;
  private readonly registryUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(config: PeerResolverConfig) {
    this.registryUrl = trimTrailingSlashes(config.registryUrl);
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger ?? defaultLogger;
    this.http = config.http ?? axios.create({ validateStatus: () => true });
  }

  /**
   * POST {registryUrl}/resolve with { agent_id }.
   *
   * @returns the registry's record, or null on 404
   * @throws TransportError on timeout, network failure, any other non-2xx
   *   status or a body without agent_id
   */
  async resolve(identifier: string): Promise<PeerRecord | null> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        `${this.registryUrl}/resolve`,
        { agent_id: identifier },
        { timeout: this.timeoutMs, validateStatus: () => true }
      );
    } catch (err) {
      this.logger.warn({ identifier, err: errorMessage(err) }, '[resolve] registry unreachable');
      throw new TransportError(`Registry request failed: ${errorMessage(err)}`, undefined, 'REGISTRY_UNREACHABLE');
    }

    if (response.status === 404) return null;

    if (!isSuccess(response.status)) {
      this.logger.warn({ identifier, status: response.status }, '[resolve] registry error');
      throw new TransportError(
        `Registry responded with status ${response.status}`,
        response.status,
        'REGISTRY_ERROR'
      );
    }

    const parsed = PeerRecordSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new TransportError(
        `Invalid registry response: ${parsed.error.issues.map(i => i.message).join('; ')}`,
        response.status,
        'INVALID_REGISTRY_RESPONSE'
      );
    }
    return parsed.data;
  }
}

// ============================================================================
// Agent Transport
// ============================================================================

export interface AgentTransportConfig {
  /** Sent as `from` on every envelope */
  selfAgentId: string;
  timeoutMs: number;
  resolver: PeerResolver;
  http?: AxiosInstance;
}

export class AgentTransport {
  private readonly http: AxiosInstance;
  private readonly resolver: PeerResolver;
  private readonly selfAgentId: string;
  private readonly timeoutMs: number;

  constructor(config: AgentTransportConfig) {
    this.resolver = config.resolver;
    this.selfAgentId = config.selfAgentId;
    this.timeoutMs = config.timeoutMs;
    this.http = config.http ?? axios.create({ validateStatus: () => true });
  }

  /** Resolve receiverId, then deliver. Every failure is a DeliveryError. */
  async deliver(receiverId: string, payload: QuotePayload): Promise<unknown> {
    let peer: PeerRecord | null;
    try {
      peer = await this.resolver.resolve(receiverId);
    } catch (err) {
      throw new DeliveryError(`A2A resolution failed: ${errorMessage(err)}`);
    }
    if (!peer) {
      throw new DeliveryError(`A2A resolution failed: "${receiverId}" not found`);
    }
    return this.deliverTo(peer, payload);
  }

  /** Deliver to an already-resolved peer */
  async deliverTo(peer: PeerRecord, payload: QuotePayload): Promise<unknown> {
    if (!peer.agent_url) {
      throw new DeliveryError(`A2A resolution failed: "${peer.agent_id}" has no agent_url`);
    }

    const endpoint = trimTrailingSlashes(peer.agent_url) + A2A_MESSAGE_PATH;
    const envelope: A2AEnvelope = { from: this.selfAgentId, message: payload };

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(endpoint, envelope, {
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
    } catch (err) {
      throw new DeliveryError(`A2A delivery to ${endpoint} failed: ${errorMessage(err)}`);
    }

    if (!isSuccess(response.status)) {
      throw new DeliveryError(
        `A2A delivery to ${endpoint} failed with status ${response.status}`,
        response.status
      );
    }
    return response.data;
  }
}
