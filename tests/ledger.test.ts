import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { FactStore } from '../src/facts/store.js';
import { MemoryFactBackend } from '../src/facts/memory.js';
import {
  WalletLedger,
  questionHash,
  walletKey,
  transactionKey,
  interactionKey,
  makeTxnId,
} from '../src/payments/services/ledger.js';
import { InvalidBalanceError } from '../src/types/index.js';

const NOW = new Date('2025-01-01T00:00:00.000Z');

describe('ledger keys', () => {
  it('should hash questions to 16 hex chars of SHA-256', () => {
    expect(questionHash('abc')).toBe('ba7816bf8f01cfea');
  });

  it('should build fact keys', () => {
    expect(walletKey('alice')).toBe('wallet:alice');
    expect(transactionKey('txn_1_abc')).toBe('txn:txn_1_abc');
    expect(interactionKey('alice', 'abc')).toBe('q:alice:ba7816bf8f01cfea');
  });

  it('should derive transaction ids from time and participant + question', () => {
    expect(makeTxnId('alice', 'hi', NOW)).toBe(`txn_1735689600_${questionHash('alicehi')}`);
  });
});

describe('WalletLedger', () => {
  let backend: MemoryFactBackend;
  let store: FactStore;
  let ledger: WalletLedger;

  beforeEach(() => {
    backend = new MemoryFactBackend();
    store = new FactStore(backend, { now: () => NOW });
    ledger = new WalletLedger(store, { logger: pino({ level: 'silent' }), now: () => NOW });
  });

  // ==========================================================================
  // Balances
  // ==========================================================================

  describe('balances', () => {
    it('should read 0 for an owner without a wallet', async () => {
      expect(await ledger.getBalance('alice')).toBe(0);
    });

    it('should overwrite the single wallet record', async () => {
      await ledger.setBalance('alice', 10);
      await ledger.setBalance('alice', 4);

      expect(await ledger.getBalance('alice')).toBe(4);
      expect(backend.size).toBe(1);
    });

    it('should store the wallet fact shape', async () => {
      await ledger.setBalance('alice', 7);

      const record = await store.get('alice', 'wallet:alice');
      expect(record?.value).toEqual({
        '@type': 'AgentFacts',
        category: 'wallet',
        owner: 'alice',
        balance: 7,
        observedAt: '2025-01-01T00:00:00Z',
      });
    });

    it('should reject a negative balance', async () => {
      await expect(ledger.setBalance('alice', -1)).rejects.toBeInstanceOf(InvalidBalanceError);
      expect(backend.size).toBe(0);
    });

    it('should reject a fractional balance', async () => {
      await expect(ledger.setBalance('alice', 1.5)).rejects.toThrow(
        'Balance for "alice" must be a non-negative integer, got 1.5'
      );
    });

    it('should read a malformed stored balance as 0', async () => {
      await store.set('alice', 'wallet:alice', { balance: 'lots' });
      expect(await ledger.getBalance('alice')).toBe(0);
    });
  });

  // ==========================================================================
  // Transactions
  // ==========================================================================

  describe('transactions', () => {
    const txn = {
      txnId: 'txn_1735689600_0123456789abcdef',
      from: 'alice',
      to: 'agent-self',
      points: 6,
      question: 'What is the capital of France?',
      peerAgent: 'peer-1',
    };

    it('should store the transaction under the receiver', async () => {
      const fact = await ledger.addTransaction(txn);

      expect(fact).toEqual({
        '@type': 'AgentFacts',
        category: 'transaction',
        ...txn,
        observedAt: '2025-01-01T00:00:00Z',
      });
      expect(await store.get('agent-self', 'txn:txn_1735689600_0123456789abcdef')).not.toBeNull();
      expect(await store.get('alice', 'txn:txn_1735689600_0123456789abcdef')).toBeNull();
    });

    it('should fetch a transaction by id', async () => {
      await ledger.addTransaction(txn);
      expect((await ledger.getTransaction('agent-self', txn.txnId))?.points).toBe(6);
      expect(await ledger.getTransaction('agent-self', 'txn_missing')).toBeNull();
    });

    it('should list only transaction facts, ordered by id within a second', async () => {
      await ledger.addTransaction({ ...txn, txnId: 'txn_b' });
      await ledger.addTransaction({ ...txn, txnId: 'txn_a' });
      await ledger.setBalance('agent-self', 12);
      await ledger.markInteraction('agent-self', 'alice', 'hi');

      const listed = await ledger.listTransactions('agent-self');
      expect(listed.map(t => t.txnId)).toEqual(['txn_a', 'txn_b']);
    });
  });

  // ==========================================================================
  // Interaction markers
  // ==========================================================================

  describe('interactions', () => {
    it('should report a marked question as seen', async () => {
      expect(await ledger.hasInteraction('agent-self', 'alice', 'hi')).toBe(false);
      await ledger.markInteraction('agent-self', 'alice', 'hi');
      expect(await ledger.hasInteraction('agent-self', 'alice', 'hi')).toBe(true);
    });

    it('should match questions by exact text', async () => {
      await ledger.markInteraction('agent-self', 'alice', 'hi');
      expect(await ledger.hasInteraction('agent-self', 'alice', 'Hi')).toBe(false);
      expect(await ledger.hasInteraction('agent-self', 'bob', 'hi')).toBe(false);
    });

    it('should store the interaction fact shape', async () => {
      await ledger.markInteraction('agent-self', 'alice', 'abc');
      const record = await store.get('agent-self', 'q:alice:ba7816bf8f01cfea');
      expect(record?.value).toEqual({
        '@type': 'AgentFacts',
        category: 'interaction',
        user: 'alice',
        question: 'abc',
        observedAt: '2025-01-01T00:00:00Z',
      });
    });
  });
});
