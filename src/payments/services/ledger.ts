/**
 * Wallet Ledger
 *
 * Point balances and the transaction log, kept as facts:
 *   - wallet:<owner>          one overwritten record per owner
 *   - txn:<txnId>             one record per charge, owned by the receiver
 *   - q:<user>:<hash>         marks a question as already billed
 *
 * Balances and transactions are written independently. A crash between the
 * two writes leaves them disagreeing; transactions are never replayed into
 * balances.
 */

import { createHash } from 'node:crypto';
import type { FactStore } from '../../facts/store.js';
import type { Logger } from '../../logger.js';
import { logger as defaultLogger } from '../../logger.js';
import type { InteractionFact, TransactionFact, WalletFact } from '../../types/index.js';
import {
  FACT_KEYS,
  FACT_TYPE,
  InvalidBalanceError,
  TransactionFactSchema,
  WalletFactSchema,
  toObservedAt,
} from '../../types/index.js';

// ============================================================================
// Keys & Identifiers
// ============================================================================

/** First 16 hex chars of the SHA-256 of the UTF-8 text */
export function questionHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, 16);
}

export function walletKey(owner: string): string {
  return `${FACT_KEYS.WALLET}${owner}`;
}

export function transactionKey(txnId: string): string {
  return `${FACT_KEYS.TRANSACTION}${txnId}`;
}

export function interactionKey(username: string, question: string): string {
  return `${FACT_KEYS.INTERACTION}${username}:${questionHash(question)}`;
}

/** txn_<unix seconds>_<hash of payer + question> */
export function makeTxnId(username: string, question: string, at: Date): string {
  return `txn_${Math.floor(at.getTime() / 1000)}_${questionHash(username + question)}`;
}

// ============================================================================
// Wallet Ledger
// ============================================================================

export interface NewTransaction {
  txnId: string;
  from: string;
  to: string;
  points: number;
  question: string;
  peerAgent: string;
}

export class WalletLedger {
  private readonly store: FactStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(store: FactStore, options: { logger?: Logger; now?: () => Date } = {}) {
    this.store = store;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  get facts(): FactStore {
    return this.store;
  }

  /** 0 for an owner with no wallet yet */
  async getBalance(owner: string): Promise<number> {
    const row = await this.store.get(owner, walletKey(owner));
    if (!row) return 0;

    const parsed = WalletFactSchema.safeParse(row.value);
    if (!parsed.success) {
      this.logger.warn({ owner }, '[ledger] stored wallet has no valid balance, reading as 0');
      return 0;
    }
    return parsed.data.balance;
  }

  /** Unconditional overwrite. The balance must be a non-negative integer. */
  async setBalance(owner: string, balance: number): Promise<void> {
    if (!Number.isInteger(balance) || balance < 0) {
      throw new InvalidBalanceError(owner, balance);
    }

    const wallet: WalletFact = {
      '@type': FACT_TYPE,
      category: 'wallet',
      owner,
      balance,
      observedAt: toObservedAt(this.now()),
    };
    await this.store.set(owner, walletKey(owner), wallet);
  }

  /** Single write; the caller guarantees txnId is unique. */
  async addTransaction(txn: NewTransaction): Promise<TransactionFact> {
    const fact: TransactionFact = {
      '@type': FACT_TYPE,
      category: 'transaction',
      txnId: txn.txnId,
      from: txn.from,
      to: txn.to,
      points: txn.points,
      question: txn.question,
      peerAgent: txn.peerAgent,
      observedAt: toObservedAt(this.now()),
    };
    await this.store.set(txn.to, transactionKey(txn.txnId), fact);
    return fact;
  }

  async getTransaction(owner: string, txnId: string): Promise<TransactionFact | null> {
    const row = await this.store.get(owner, transactionKey(txnId));
    if (!row) return null;
    const parsed = TransactionFactSchema.safeParse(row.value);
    return parsed.success ? parsed.data : null;
  }

  /** Transactions received by owner, oldest first */
  async listTransactions(owner: string): Promise<TransactionFact[]> {
    const rows = await this.store.list(owner);
    const out: TransactionFact[] = [];
    for (const [key, row] of Object.entries(rows)) {
      if (!key.startsWith(FACT_KEYS.TRANSACTION)) continue;
      const parsed = TransactionFactSchema.safeParse(row.value);
      if (parsed.success) out.push(parsed.data);
    }
    return out.sort((a, b) =>
      a.observedAt === b.observedAt
        ? a.txnId.localeCompare(b.txnId)
        : a.observedAt.localeCompare(b.observedAt)
    );
  }

  async hasInteraction(selfId: string, username: string, question: string): Promise<boolean> {
    return (await this.store.get(selfId, interactionKey(username, question))) !== null;
  }

  async markInteraction(selfId: string, username: string, question: string): Promise<void> {
    const interaction: InteractionFact = {
      '@type': FACT_TYPE,
      category: 'interaction',
      user: username,
      question,
      observedAt: toObservedAt(this.now()),
    };
    await this.store.set(selfId, interactionKey(username, question), interaction);
  }
}
