/**
 * Points Payments Server
 *
 * Thin HTTP surface over the quote-and-charge service for agent runtimes that
 * live in another process. Read-only views expose wallets, received
 * transactions and raw facts.
 */

import express, { type Express, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Logger } from '../logger.js';
import { logger as defaultLogger } from '../logger.js';
import type { QuoteErrorCode } from '../types/index.js';
import { NotFoundError } from '../types/index.js';
import { quoteFailureToError, type QuoteService } from './services/quote.js';

export const SERVICE_NAME = 'a2a-points';

export const QuoteRequestSchema = z.object({
  username: z.string().min(1, 'username is required'),
  peer: z.string().min(1, 'peer is required'),
  question: z.string().min(1, 'question is required'),
  use_x402: z.boolean().default(true),
});

/** HTTP status for each business failure */
export const QUOTE_FAILURE_STATUS: Record<QuoteErrorCode, number> = {
  peer_not_found: 404,
  peer_cannot_accept_payment: 422,
  insufficient_points: 402,
  registry_unavailable: 502,
};

export interface PaymentsServerConfig {
  quotes: QuoteService;
  logger?: Logger;
}

function param(req: Partial<Request>, name: string): string | undefined {
  return req.params?.[name];
}

// ============================================================================
// Create Router (mount routes on an Express app)
// ============================================================================

export function createPaymentsRouter(app: Express, config: PaymentsServerConfig): void {
  const { quotes } = config;
  const log = config.logger ?? defaultLogger;
  const facts = quotes.ledger.facts;

  // --------------------------------------------------------------------------
  // GET /health
  // --------------------------------------------------------------------------
  app.get('/health', (_req: Partial<Request>, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      service: SERVICE_NAME,
      agent: quotes.selfAgentId,
      backend: facts.backend,
      degraded: facts.status.degraded,
      timestamp: new Date().toISOString(),
    });
  });

  // --------------------------------------------------------------------------
  // POST /quote - negotiate and charge for a question
  // --------------------------------------------------------------------------
  app.post('/quote', async (req: Partial<Request>, res: Response) => {
    const parsed = QuoteRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'INVALID_REQUEST',
        details: parsed.error.issues.map(i => i.message),
      });
      return;
    }

    const { username, peer, question, use_x402 } = parsed.data;
    try {
      const result = await quotes.quoteAndCharge({ username, peer, question, useX402: use_x402 });
      if (result.ok) {
        res.status(200).json(result);
        return;
      }
      const err = quoteFailureToError(result, peer);
      res.status(QUOTE_FAILURE_STATUS[result.error]).json({ ...result, code: err.code, message: err.message });
    } catch (err) {
      log.error({ err }, '[server] quote failed');
      res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Quote failed' });
    }
  });

  // --------------------------------------------------------------------------
  // GET /wallets/:owner - current balance
  // --------------------------------------------------------------------------
  app.get('/wallets/:owner', async (req: Partial<Request>, res: Response) => {
    const owner = param(req, 'owner');
    if (!owner) {
      res.status(400).json({ error: 'INVALID_OWNER' });
      return;
    }
    try {
      const balance = await quotes.ledger.getBalance(owner);
      res.status(200).json({ owner, balance });
    } catch (err) {
      log.error({ err, owner }, '[server] balance lookup failed');
      res.status(500).json({ error: 'INTERNAL_ERROR' });
    }
  });

  // --------------------------------------------------------------------------
  // GET /transactions/:owner - transactions received by owner
  // --------------------------------------------------------------------------
  app.get('/transactions/:owner', async (req: Partial<Request>, res: Response) => {
    const owner = param(req, 'owner');
    if (!owner) {
      res.status(400).json({ error: 'INVALID_OWNER' });
      return;
    }
    try {
      const transactions = await quotes.ledger.listTransactions(owner);
      res.status(200).json({ owner, transactions, total: transactions.length });
    } catch (err) {
      log.error({ err, owner }, '[server] transaction listing failed');
      res.status(500).json({ error: 'INTERNAL_ERROR' });
    }
  });

  // --------------------------------------------------------------------------
  // GET /transactions/:owner/:txnId
  // --------------------------------------------------------------------------
  app.get('/transactions/:owner/:txnId', async (req: Partial<Request>, res: Response) => {
    const owner = param(req, 'owner');
    const txnId = param(req, 'txnId');
    if (!owner || !txnId) {
      res.status(400).json({ error: 'INVALID_REQUEST' });
      return;
    }
    try {
      const txn = await quotes.ledger.getTransaction(owner, txnId);
      if (!txn) throw new NotFoundError(`Transaction "${txnId}"`);
      res.status(200).json(txn);
    } catch (err) {
      if (err instanceof NotFoundError) {
        res.status(404).json({ error: err.code, message: err.message });
      } else {
        log.error({ err, owner, txnId }, '[server] transaction lookup failed');
        res.status(500).json({ error: 'INTERNAL_ERROR' });
      }
    }
  });

  // --------------------------------------------------------------------------
  // GET /facts/:owner - every record the owner holds
  // --------------------------------------------------------------------------
  app.get('/facts/:owner', async (req: Partial<Request>, res: Response) => {
    const owner = param(req, 'owner');
    if (!owner) {
      res.status(400).json({ error: 'INVALID_OWNER' });
      return;
    }
    try {
      const records = await facts.list(owner);
      res.status(200).json({ owner, facts: records });
    } catch (err) {
      log.error({ err, owner }, '[server] fact listing failed');
      res.status(500).json({ error: 'INTERNAL_ERROR' });
    }
  });
}

// ============================================================================
// Standalone Server
// ============================================================================

export function startPaymentsServer(port: number, config: PaymentsServerConfig): ReturnType<Express['listen']> {
  const log = config.logger ?? defaultLogger;
  const app = express();
  app.use(express.json());

  createPaymentsRouter(app, config);

  return app.listen(port, () => {
    log.info(
      { port, agent: config.quotes.selfAgentId, backend: config.quotes.ledger.facts.backend },
      `[server] ${SERVICE_NAME} running on port ${port}`
    );
  });
}
