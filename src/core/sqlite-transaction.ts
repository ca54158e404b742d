/**
 * SQLite transaction boundary for command pipelines.
 *
 * Wraps one better-sqlite3 connection. Each `begin()` opens a
 * `BEGIN IMMEDIATE` transaction; commit and rollback map to `COMMIT` and
 * `ROLLBACK`. A connection can only hold one transaction at a time, so
 * `begin()` waits until the previous transaction on the same manager has
 * been committed or rolled back.
 */

import type Database from 'better-sqlite3';
import { createLogger, type Logger } from './logger.js';
import type { Transaction, TransactionManager } from './pipeline/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SqliteTransactionManagerOptions {
  /** Defaults to `createLogger('sqlite-transaction')`. */
  logger?: Logger;
}

/** Thrown when commit or rollback is called on a finished transaction. */
export class TransactionReleasedError extends Error {
  readonly transactionId: string;

  constructor(transactionId: string) {
    super(`Transaction ${transactionId} has already been released`);
    this.name = 'TransactionReleasedError';
    this.transactionId = transactionId;
  }
}

// ---------------------------------------------------------------------------
// SqliteTransaction
// ---------------------------------------------------------------------------

class SqliteTransaction implements Transaction {
  readonly id: string;

  private released = false;

  constructor(
    id: string,
    private readonly db: Database.Database,
    private readonly release: () => void,
    private readonly logger: Logger,
  ) {
    this.id = id;
  }

  commit(): void {
    this.assertOpen();
    // A failed COMMIT leaves the transaction open; the caller rolls back.
    this.db.exec('COMMIT');
    this.finish();
    this.logger.debug('committed', { transaction: this.id });
  }

  rollback(): void {
    this.assertOpen();
    try {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
    } finally {
      this.finish();
    }
    this.logger.debug('rolled back', { transaction: this.id });
  }

  private assertOpen(): void {
    if (this.released) {
      throw new TransactionReleasedError(this.id);
    }
  }

  private finish(): void {
    this.released = true;
    this.release();
  }
}

// ---------------------------------------------------------------------------
// SqliteTransactionManager
// ---------------------------------------------------------------------------

export class SqliteTransactionManager implements TransactionManager {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  /** Settles when the most recently requested transaction is released. */
  private tail: Promise<void> = Promise.resolve();

  constructor(db: Database.Database, options: SqliteTransactionManagerOptions = {}) {
    this.db = db;
    this.logger = options.logger ?? createLogger('sqlite-transaction');
  }

  async begin(): Promise<Transaction> {
    const previous = this.tail;

    let release: () => void = () => {};
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => released);

    await previous;

    try {
      this.db.exec('BEGIN IMMEDIATE');
    } catch (err: unknown) {
      release();
      throw err;
    }

    const id = crypto.randomUUID();
    this.logger.debug('began', { transaction: id });
    return new SqliteTransaction(id, this.db, release, this.logger);
  }
}
