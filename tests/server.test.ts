import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { AxiosInstance } from 'axios';
import type { Express, Request } from 'express';
import pino from 'pino';
import { FactStore } from '../src/facts/store.js';
import { MemoryFactBackend } from '../src/facts/memory.js';
import { StorageDegradedError } from '../src/types/index.js';
import type { PaymentsEnvConfig } from '../src/payments/config.js';
import { createQuoteService } from '../src/payments/engine.js';
import { createPaymentsRouter, QuoteRequestSchema } from '../src/payments/server.js';
import type { QuoteService } from '../src/payments/services/quote.js';

// ============================================================================
// Mock Express
// ============================================================================

interface MockRoute {
  method: string;
  path: string;
  handler: (req: Partial<Request>, res: MockResponse) => Promise<void> | void;
}

interface MockResponse {
  status: (code: number) => MockResponse;
  json: (data: unknown) => MockResponse;
  _statusCode: number;
  _body: unknown;
}

function createMockResponse(): MockResponse {
  const res: MockResponse = {
    _statusCode: 200,
    _body: null,
    status(code: number) {
      res._statusCode = code;
      return res;
    },
    json(data: unknown) {
      res._body = data;
      return res;
    },
  };
  return res;
}

function createMockApp(): { app: Express; routes: MockRoute[] } {
  const routes: MockRoute[] = [];

  const app = {
    get(path: string, handler: MockRoute['handler']) {
      routes.push({ method: 'GET', path, handler });
    },
    post(path: string, handler: MockRoute['handler']) {
      routes.push({ method: 'POST', path, handler });
    },
  } as unknown as Express;

  return { app, routes };
}

function findRoute(routes: MockRoute[], method: string, path: string): MockRoute {
  const route = routes.find(r => r.method === method && r.path === path);
  if (!route) throw new Error(`route ${method} ${path} not registered`);
  return route;
}

// ============================================================================
// Fixtures
// ============================================================================

const NOW = new Date('2025-01-01T00:00:00.000Z');

const CONFIG: PaymentsEnvConfig = {
  agentId: 'agent-self',
  registryUrl: 'http://registry.test',
  registryTimeoutMs: 10_000,
  deliveryTimeoutMs: 20_000,
  oracle: { url: 'http://oracle.test/v1/messages', model: 'test-model', timeoutMs: 20_000 },
  facts: { dbName: 'agent_registry', filePath: 'unused.json', probeTimeoutMs: 1500 },
  port: 3000,
  logLevel: 'silent',
};

const PAYING_PEER = {
  agent_id: 'peer-1',
  agent_url: 'http://peer.test',
  capabilities: ['x402'],
};

async function createQuotes(store: FactStore, registry: { status: number; data: unknown }): Promise<QuoteService> {
  const post = vi.fn(async (url: string) =>
    url.endsWith('/resolve') ? registry : { status: 200, data: { received: true } }
  );
  return createQuoteService(CONFIG, {
    store,
    http: { post } as unknown as AxiosInstance,
    logger: pino({ level: 'silent' }),
    now: () => NOW,
  });
}

// ============================================================================
// Payments Server Tests
// ============================================================================

describe('Payments Server', () => {
  let routes: MockRoute[];
  let store: FactStore;
  let quotes: QuoteService;
  let registry: { status: number; data: unknown };

  async function mount(factStore: FactStore): Promise<void> {
    store = factStore;
    quotes = await createQuotes(store, registry);
    const mock = createMockApp();
    routes = mock.routes;
    createPaymentsRouter(mock.app, { quotes, logger: pino({ level: 'silent' }) });
  }

  beforeEach(async () => {
    registry = { status: 200, data: PAYING_PEER };
    await mount(new FactStore(new MemoryFactBackend(), { now: () => NOW }));
  });

  // ========================================================================
  // Route Registration Tests
  // ========================================================================

  describe('Route Registration', () => {
    it.each([
      ['GET', '/health'],
      ['POST', '/quote'],
      ['GET', '/wallets/:owner'],
      ['GET', '/transactions/:owner'],
      ['GET', '/transactions/:owner/:txnId'],
      ['GET', '/facts/:owner'],
    ])('should register %s %s', (method, path) => {
      expect(() => findRoute(routes, method, path)).not.toThrow();
    });
  });

  // ========================================================================
  // Health Check Tests
  // ========================================================================

  describe('GET /health', () => {
    it('should report the agent and storage backend', async () => {
      const res = createMockResponse();
      await findRoute(routes, 'GET', '/health').handler({}, res);

      expect(res._statusCode).toBe(200);
      expect(res._body).toMatchObject({
        status: 'healthy',
        service: 'a2a-points',
        agent: 'agent-self',
        backend: 'memory',
        degraded: false,
      });
    });

    it('should report a degraded store', async () => {
      await mount(
        new FactStore(new MemoryFactBackend(), {
          status: { degraded: true, reason: new StorageDegradedError('Database unreachable') },
        })
      );

      const res = createMockResponse();
      await findRoute(routes, 'GET', '/health').handler({}, res);

      expect(res._body).toMatchObject({ degraded: true });
    });
  });

  // ========================================================================
  // Quote Tests
  // ========================================================================

  describe('POST /quote', () => {
    it('should charge and return the result', async () => {
      await quotes.ledger.setBalance('alice', 10);
      const res = createMockResponse();

      await findRoute(routes, 'POST', '/quote').handler(
        { body: { username: 'alice', peer: 'peer-1', question: 'hello' } },
        res
      );

      expect(res._statusCode).toBe(200);
      expect(res._body).toMatchObject({ ok: true, charged: true, points: 6 });
      expect(await quotes.ledger.getBalance('alice')).toBe(4);
    });

    it('should reject a body without a username', async () => {
      const res = createMockResponse();

      await findRoute(routes, 'POST', '/quote').handler({ body: { peer: 'peer-1', question: 'hello' } }, res);

      expect(res._statusCode).toBe(400);
      expect(res._body).toMatchObject({ error: 'INVALID_REQUEST' });
    });

    it('should answer 402 with the shortfall on insufficient points', async () => {
      const res = createMockResponse();

      await findRoute(routes, 'POST', '/quote').handler(
        { body: { username: 'alice', peer: 'peer-1', question: 'hello' } },
        res
      );

      expect(res._statusCode).toBe(402);
      expect(res._body).toEqual({
        ok: false,
        error: 'insufficient_points',
        required: 6,
        available: 0,
        code: 'INSUFFICIENT_FUNDS',
        message: 'Insufficient points: 6 required, 0 available',
      });
    });

    it('should answer 404 for an unknown peer', async () => {
      registry.status = 404;
      const res = createMockResponse();

      await findRoute(routes, 'POST', '/quote').handler(
        { body: { username: 'alice', peer: 'ghost', question: 'hello' } },
        res
      );

      expect(res._statusCode).toBe(404);
      expect(res._body).toMatchObject({ error: 'peer_not_found', message: 'Peer "ghost" not found' });
    });

    it('should answer 422 for a peer that cannot accept payment', async () => {
      registry.data = { agent_id: 'peer-2', agent_url: 'http://peer.test' };
      const res = createMockResponse();

      await findRoute(routes, 'POST', '/quote').handler(
        { body: { username: 'alice', peer: 'peer-2', question: 'hello' } },
        res
      );

      expect(res._statusCode).toBe(422);
      expect(res._body).toMatchObject({ error: 'peer_cannot_accept_payment', code: 'CAPABILITY_REJECTED' });
    });

    it('should answer 502 when the registry is unavailable', async () => {
      registry.status = 500;
      const res = createMockResponse();

      await findRoute(routes, 'POST', '/quote').handler(
        { body: { username: 'alice', peer: 'peer-1', question: 'hello' } },
        res
      );

      expect(res._statusCode).toBe(502);
      expect(res._body).toMatchObject({
        error: 'registry_unavailable',
        message: 'Registry responded with status 500',
      });
    });
  });

  // ========================================================================
  // Read-only Views
  // ========================================================================

  describe('GET /wallets/:owner', () => {
    it('should return the balance', async () => {
      await quotes.ledger.setBalance('alice', 7);
      const res = createMockResponse();

      await findRoute(routes, 'GET', '/wallets/:owner').handler({ params: { owner: 'alice' } }, res);

      expect(res._body).toEqual({ owner: 'alice', balance: 7 });
    });
  });

  describe('GET /transactions/:owner', () => {
    it('should list received transactions', async () => {
      await quotes.ledger.setBalance('alice', 10);
      await quotes.quoteAndCharge({ username: 'alice', peer: 'peer-1', question: 'hello' });
      const res = createMockResponse();

      await findRoute(routes, 'GET', '/transactions/:owner').handler({ params: { owner: 'agent-self' } }, res);

      expect(res._body).toMatchObject({ owner: 'agent-self', total: 1 });
    });

    it('should answer 404 for an unknown transaction', async () => {
      const res = createMockResponse();

      await findRoute(routes, 'GET', '/transactions/:owner/:txnId').handler(
        { params: { owner: 'agent-self', txnId: 'txn_missing' } },
        res
      );

      expect(res._statusCode).toBe(404);
      expect(res._body).toEqual({ error: 'NOT_FOUND', message: 'Transaction "txn_missing" not found' });
    });
  });

  describe('GET /facts/:owner', () => {
    it('should return every record the owner holds', async () => {
      await quotes.ledger.setBalance('alice', 7);
      const res = createMockResponse();

      await findRoute(routes, 'GET', '/facts/:owner').handler({ params: { owner: 'alice' } }, res);

      expect(res._body).toEqual({
        owner: 'alice',
        facts: {
          'wallet:alice': {
            ownerId: 'alice',
            key: 'wallet:alice',
            value: {
              '@type': 'AgentFacts',
              category: 'wallet',
              owner: 'alice',
              balance: 7,
              observedAt: '2025-01-01T00:00:00Z',
            },
            timestamp: '2025-01-01T00:00:00.000Z',
          },
        },
      });
    });
  });
});

describe('QuoteRequestSchema', () => {
  it('should default use_x402 to true', () => {
    expect(QuoteRequestSchema.parse({ username: 'a', peer: 'p', question: 'q' }).use_x402).toBe(true);
  });
});
