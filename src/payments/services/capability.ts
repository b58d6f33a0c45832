/**
 * Payment-Capability Oracle
 *
 * Decides whether a peer can accept a points payment from its published
 * capability document (AgentFacts card).
 *
 *   - No oracle credential: heuristic over `economy.pricing` and `capabilities`.
 *   - Oracle credential: a text-completion request answered with "true" or
 *     "false". Failures and ambiguous answers fall back to a presence check.
 *
 * Never rejects.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from '../../logger.js';
import { logger as defaultLogger } from '../../logger.js';
import { errorMessage, isJsonObject } from '../../types/index.js';

export const ORACLE_API_VERSION = '2023-06-01';
export const ORACLE_MAX_TOKENS = 20;

/** Capability markers recognised by the heuristic */
export const PAYMENT_CAPABILITY_MARKERS = ['payments.points', 'x402'] as const;

export type CapabilitySource = 'heuristic' | 'oracle' | 'fallback';

export interface CapabilityAssessment {
  accepted: boolean;
  source: CapabilitySource;
  /** Why a fallback decision was taken */
  reason?: string;
}

export interface CapabilityOracleConfig {
  /** Oracle credential; absent means heuristic only */
  apiKey?: string;
  url: string;
  model: string;
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: Logger;
}

const OracleResponseSchema = z.object({
  content: z.array(
    z.union([z.string(), z.object({ text: z.string().optional() }).passthrough()])
  ),
});

// ============================================================================
// Document Inspection
// ============================================================================

/** A registry record may nest the card under `card`. */
export function capabilityBase(doc: unknown): Record<string, unknown> {
  if (!isJsonObject(doc)) return {};
  const card = doc['card'];
  return isJsonObject(card) ? card : doc;
}

function hasContent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return Boolean(value);
}

/** economy.pricing is an object, or capabilities mention a payment protocol */
export function heuristicCanAcceptPayment(doc: unknown): boolean {
  const base = capabilityBase(doc);
  const economy = base['economy'];
  const hasPricing = isJsonObject(economy) && isJsonObject(economy['pricing']);

  const capabilitiesText = JSON.stringify(base['capabilities'] ?? {});
  const hasCapability = PAYMENT_CAPABILITY_MARKERS.some(marker => capabilitiesText.includes(marker));

  return hasPricing || hasCapability;
}

/** Degraded decision: the card declares an economy or any capabilities at all */
export function presenceCanAcceptPayment(doc: unknown): boolean {
  const base = capabilityBase(doc);
  return hasContent(base['economy']) || hasContent(base['capabilities']);
}

export function buildOraclePrompt(doc: unknown): string {
  return (
    'Check if an AI agent can accept payment from its AgentFacts JSON. ' +
    "Return only 'true' or 'false'.\n\n" +
    `AgentFacts: ${JSON.stringify(capabilityBase(doc))}`
  );
}

/** "true" xor "false" in the normalised text; anything else is undecided. */
export function parseOracleDecision(text: string): boolean | null {
  const t = text.trim().toLowerCase();
  const saysTrue = t.includes('true');
  const saysFalse = t.includes('false');
  if (saysTrue === saysFalse) return null;
  return saysTrue;
}

// ============================================================================
// Capability Oracle
// ============================================================================

export class CapabilityOracle {
  private readonly http: AxiosInstance;
  private readonly config: CapabilityOracleConfig;
  private readonly logger: Logger;

  constructor(config: CapabilityOracleConfig) {
    this.config = config;
    this.logger = config.logger ?? defaultLogger;
    this.http = config.http ?? axios.create({ validateStatus: () => true });
  }

  get usesOracle(): boolean {
    return Boolean(this.config.apiKey);
  }

  async canAcceptPayment(doc: unknown): Promise<boolean> {
    return (await this.assess(doc)).accepted;
  }

  async assess(doc: unknown): Promise<CapabilityAssessment> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      return { accepted: heuristicCanAcceptPayment(doc), source: 'heuristic' };
    }

    try {
      const text = await this.classify(doc, apiKey);
      const decision = parseOracleDecision(text);
      if (decision === null) {
        return this.fallback(doc, `ambiguous oracle answer: "${text.trim()}"`);
      }
      return { accepted: decision, source: 'oracle' };
    } catch (err) {
      return this.fallback(doc, errorMessage(err));
    }
  }

  private fallback(doc: unknown, reason: string): CapabilityAssessment {
    this.logger.warn({ reason }, '[oracle] fallback');
    return { accepted: presenceCanAcceptPayment(doc), source: 'fallback', reason };
  }

  private async classify(doc: unknown, apiKey: string): Promise<string> {
    const response = await this.http.post<unknown>(
      this.config.url,
      {
        model: this.config.model,
        max_tokens: ORACLE_MAX_TOKENS,
        messages: [{ role: 'user', content: buildOraclePrompt(doc) }],
      },
      {
        timeout: this.config.timeoutMs,
        validateStatus: () => true,
        headers: {
          'x-api-key': apiKey,
          'anthropic-version': ORACLE_API_VERSION,
          'content-type': 'application/json',
        },
      }
    );

    if (response.status < 200 || response.status >= 300) {
      throw new Error(`Oracle responded with status ${response.status}`);
    }

    const parsed = OracleResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error('Malformed oracle response');
    }

    return parsed.data.content
      .map(block => (typeof block === 'string' ? block : block.text ?? ''))
      .join('');
  }
}
