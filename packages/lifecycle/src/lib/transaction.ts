import { AsyncLocalStorage } from 'node:async_hooks';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

/**
 * Runs work inside a transaction. Implementations must be re-entrant: a call
 * made while a transaction is already open joins it instead of opening a new
 * one.
 */
export interface TransactionRunner {
  runInTransaction<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Storage-side transaction primitives. Savepoint support is optional; without
 * it a failing nested scope leaves its partial writes to the enclosing
 * transaction's outcome.
 */
export interface TransactionDriver<Tx, Savepoint = unknown> {
  begin(): Promise<Tx>;
  commit(tx: Tx): Promise<void>;
  rollback(tx: Tx): Promise<void>;
  savepoint?(tx: Tx): Promise<Savepoint>;
  rollbackToSavepoint?(tx: Tx, savepoint: Savepoint): Promise<void>;
  releaseSavepoint?(tx: Tx, savepoint: Savepoint): Promise<void>;
}

interface AmbientFrame<Tx> {
  tx: Tx;
}

/**
 * TransactionRunner that tracks the open transaction through
 * AsyncLocalStorage, so every nested entry point (a cascade spawning another
 * transition, an orchestrator running a batch) shares one transaction.
 */
export class AmbientTransactionRunner<Tx, Savepoint = unknown> implements TransactionRunner {
  private readonly storage = new AsyncLocalStorage<AmbientFrame<Tx>>();
  private readonly logger: Logger;

  constructor(
    private readonly driver: TransactionDriver<Tx, Savepoint>,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('transaction');
  }

  async runInTransaction<T>(fn: () => Promise<T>): Promise<T> {
    const frame = this.storage.getStore();
    if (frame) {
      return this.runNested(frame, fn);
    }

    const tx = await this.driver.begin();
    let result: T;
    try {
      result = await this.storage.run({ tx }, fn);
    } catch (err) {
      await this.undo(() => this.driver.rollback(tx), 'Transaction rollback failed');
      throw err;
    }
    await this.driver.commit(tx);
    return result;
  }

  /** The transaction open on the current async call chain, if any. */
  current(): Tx | undefined {
    return this.storage.getStore()?.tx;
  }

  inTransaction(): boolean {
    return this.storage.getStore() !== undefined;
  }

  private async runNested<T>(frame: AmbientFrame<Tx>, fn: () => Promise<T>): Promise<T> {
    const { driver } = this;
    const { savepoint: openSavepoint, rollbackToSavepoint } = driver;

    if (!openSavepoint || !rollbackToSavepoint) {
      return fn();
    }

    const savepoint = await openSavepoint.call(driver, frame.tx);
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      await this.undo(
        () => rollbackToSavepoint.call(driver, frame.tx, savepoint),
        'Savepoint rollback failed',
      );
      throw err;
    }
    if (driver.releaseSavepoint) {
      await driver.releaseSavepoint(frame.tx, savepoint);
    }
    return result;
  }

  /** A failed rollback is logged; the error that triggered it is what propagates. */
  private async undo(rollback: () => Promise<void>, message: string): Promise<void> {
    try {
      await rollback();
    } catch (rollbackErr) {
      this.logger.error({ err: rollbackErr }, message);
    }
  }
}
