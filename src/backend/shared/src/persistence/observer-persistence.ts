/**
 * Observer Persistence Collaborator
 *
 * Transactional write path for an observer's rules blob. Each caller opens
 * its own transaction and follows refresh -> saveRules -> commit on it,
 * rolling back on any failure. Transactions of different callers are
 * independent.
 */

import type { Observer } from '../models/geo-object.js';
import type { RawRuleConfiguration } from '../models/rule-config.js';

export interface ObserverTransaction {
  /** Re-reads the observer from storage into the given record */
  refresh(observer: Observer): Promise<void>;
  /** Replaces the observer's stored rules; takes effect on commit */
  saveRules(observer: Observer, rules: RawRuleConfiguration): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface ObserverPersistence {
  beginTransaction(): Promise<ObserverTransaction>;
}

interface StoredObserver {
  rules: Observer['rules'];
  version: number;
}

export interface PendingWrite {
  observer: Observer;
  rules: RawRuleConfiguration;
}

/**
 * One open transaction against an InMemoryObserverStore
 *
 * Writes stay pending on the transaction until commit; once committed or
 * rolled back it accepts no further calls.
 */
export class InMemoryObserverTransaction implements ObserverTransaction {
  private pending: PendingWrite[] = [];
  private active = true;

  constructor(protected readonly store: InMemoryObserverStore) {}

  async refresh(observer: Observer): Promise<void> {
    this.assertActive();
    const stored = this.store.getRules(observer.id);
    const version = this.store.getVersion(observer.id);
    if (stored === undefined || version === undefined) {
      throw new Error(`Observer ${observer.id} is not stored`);
    }
    observer.rules = stored;
    observer.version = version;
  }

  async saveRules(observer: Observer, rules: RawRuleConfiguration): Promise<void> {
    this.assertActive();
    observer.rules = rules;
    this.pending.push({ observer, rules: structuredClone(rules) });
  }

  async commit(): Promise<void> {
    this.assertActive();
    this.active = false;
    this.store.applyCommit(this.pending);
    this.pending = [];
  }

  async rollback(): Promise<void> {
    this.active = false;
    this.pending = [];
    this.store.recordRollback();
  }

  isActive(): boolean {
    return this.active;
  }

  private assertActive(): void {
    if (!this.active) {
      throw new Error('Transaction is no longer active');
    }
  }
}

/**
 * In-memory observer store for development/testing
 *
 * Any number of transactions may be open at once. Stored values are deep
 * copies, so a caller mutating its Observer record does not change what is
 * persisted.
 */
export class InMemoryObserverStore implements ObserverPersistence {
  private store: Map<number, StoredObserver> = new Map();
  private commitCount = 0;
  private rollbackCount = 0;

  constructor(observers: readonly Observer[] = []) {
    for (const observer of observers) {
      this.put(observer);
    }
  }

  /** Stores (or overwrites) an observer outside any transaction */
  put(observer: Observer): void {
    this.store.set(observer.id, {
      rules: structuredClone(observer.rules),
      version: observer.version,
    });
  }

  /** Current persisted rules of an observer */
  getRules(observerId: number): Observer['rules'] | undefined {
    const stored = this.store.get(observerId);
    return stored === undefined ? undefined : structuredClone(stored.rules);
  }

  getVersion(observerId: number): number | undefined {
    return this.store.get(observerId)?.version;
  }

  async beginTransaction(): Promise<ObserverTransaction> {
    return this.createTransaction();
  }

  /** Stores the writes of a committing transaction, bumping each observer's version */
  applyCommit(writes: readonly PendingWrite[]): void {
    for (const write of writes) {
      const version = (this.store.get(write.observer.id)?.version ?? 0) + 1;
      this.store.set(write.observer.id, { rules: write.rules, version });
      write.observer.version = version;
    }
    this.commitCount++;
  }

  recordRollback(): void {
    this.rollbackCount++;
  }

  getCommitCount(): number {
    return this.commitCount;
  }

  getRollbackCount(): number {
    return this.rollbackCount;
  }

  protected createTransaction(): InMemoryObserverTransaction {
    return new InMemoryObserverTransaction(this);
  }
}
