import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '../lib/logger.js';
import { AmbientTransactionRunner } from '../lib/transaction.js';
import type { TransactionDriver } from '../lib/transaction.js';

interface FakeTx {
  id: number;
}

function createDriver(withSavepoints: boolean) {
  const log: string[] = [];
  let transactions = 0;
  let savepoints = 0;

  const driver: TransactionDriver<FakeTx, string> = {
    begin: async () => {
      transactions += 1;
      log.push(`begin ${transactions}`);
      return { id: transactions };
    },
    commit: async (tx) => {
      log.push(`commit ${tx.id}`);
    },
    rollback: async (tx) => {
      log.push(`rollback ${tx.id}`);
    },
  };

  if (withSavepoints) {
    driver.savepoint = async (tx) => {
      savepoints += 1;
      const name = `sp${savepoints}`;
      log.push(`savepoint ${tx.id} ${name}`);
      return name;
    };
    driver.rollbackToSavepoint = async (tx, savepoint) => {
      log.push(`rollback-to ${tx.id} ${savepoint}`);
    };
    driver.releaseSavepoint = async (tx, savepoint) => {
      log.push(`release ${tx.id} ${savepoint}`);
    };
  }

  return { driver, log };
}

describe('AmbientTransactionRunner', () => {
  it('commits a successful transaction', async () => {
    const { driver, log } = createDriver(false);
    const runner = new AmbientTransactionRunner(driver);

    const result = await runner.runInTransaction(async () => 42);

    expect(result).toBe(42);
    expect(log).toEqual(['begin 1', 'commit 1']);
  });

  it('rolls back and rethrows on failure', async () => {
    const { driver, log } = createDriver(false);
    const runner = new AmbientTransactionRunner(driver);
    const failure = new Error('write failed');

    await expect(
      runner.runInTransaction(async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(log).toEqual(['begin 1', 'rollback 1']);
  });

  it('exposes the open transaction only inside the call chain', async () => {
    const { driver } = createDriver(false);
    const runner = new AmbientTransactionRunner(driver);

    expect(runner.inTransaction()).toBe(false);
    const seen = await runner.runInTransaction(async () => ({
      tx: runner.current(),
      open: runner.inTransaction(),
    }));

    expect(seen).toEqual({ tx: { id: 1 }, open: true });
    expect(runner.current()).toBeUndefined();
  });

  // -------------------------------------------------------------------------
  // Nesting
  // -------------------------------------------------------------------------

  it('joins the open transaction when the driver has no savepoints', async () => {
    const { driver, log } = createDriver(false);
    const runner = new AmbientTransactionRunner(driver);

    await runner.runInTransaction(async () => {
      await runner.runInTransaction(async () => {
        expect(runner.current()).toEqual({ id: 1 });
      });
    });

    expect(log).toEqual(['begin 1', 'commit 1']);
  });

  it('releases a savepoint after a nested success', async () => {
    const { driver, log } = createDriver(true);
    const runner = new AmbientTransactionRunner(driver);

    await runner.runInTransaction(() => runner.runInTransaction(async () => 'done'));

    expect(log).toEqual(['begin 1', 'savepoint 1 sp1', 'release 1 sp1', 'commit 1']);
  });

  it('rolls back to the savepoint when a nested scope fails', async () => {
    const { driver, log } = createDriver(true);
    const runner = new AmbientTransactionRunner(driver);

    const outcome = await runner.runInTransaction(async () => {
      try {
        await runner.runInTransaction(async () => {
          throw new Error('nested failure');
        });
      } catch (err) {
        return err instanceof Error ? err.message : 'unknown';
      }
      return 'no failure';
    });

    expect(outcome).toBe('nested failure');
    expect(log).toEqual(['begin 1', 'savepoint 1 sp1', 'rollback-to 1 sp1', 'commit 1']);
  });

  it('opens independent transactions for sibling calls', async () => {
    const { driver, log } = createDriver(false);
    const runner = new AmbientTransactionRunner(driver);

    await runner.runInTransaction(async () => 'first');
    await runner.runInTransaction(async () => 'second');

    expect(log).toEqual(['begin 1', 'commit 1', 'begin 2', 'commit 2']);
  });

  // -------------------------------------------------------------------------
  // Failed rollbacks
  // -------------------------------------------------------------------------

  it('keeps the original error when the rollback itself fails', async () => {
    const { driver } = createDriver(false);
    const rollbackError = new Error('connection lost');
    driver.rollback = async () => {
      throw rollbackError;
    };
    const logger = createLogger('transaction');
    const logError = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const runner = new AmbientTransactionRunner(driver, logger);
    const failure = new Error('write failed');

    await expect(
      runner.runInTransaction(async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(logError).toHaveBeenCalledWith({ err: rollbackError }, 'Transaction rollback failed');
  });

  it('keeps the nested error when rolling back to the savepoint fails', async () => {
    const { driver, log } = createDriver(true);
    const rollbackError = new Error('savepoint gone');
    driver.rollbackToSavepoint = async () => {
      throw rollbackError;
    };
    const logger = createLogger('transaction');
    const logError = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const runner = new AmbientTransactionRunner(driver, logger);
    const failure = new Error('nested failure');

    await expect(
      runner.runInTransaction(() =>
        runner.runInTransaction(async () => {
          throw failure;
        }),
      ),
    ).rejects.toBe(failure);
    expect(logError).toHaveBeenCalledWith({ err: rollbackError }, 'Savepoint rollback failed');
    expect(log).toEqual(['begin 1', 'savepoint 1 sp1', 'rollback 1']);
  });
});
