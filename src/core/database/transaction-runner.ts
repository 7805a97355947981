import { Injectable } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { DataSource, EntityManager } from 'typeorm';

/**
 * SQLite drivers share a single connection across the app, so two open
 * transactions would interleave on it.
 */
const SINGLE_CONNECTION_DRIVERS: ReadonlySet<string> = new Set([
  'better-sqlite3',
  'sqlite',
]);

/**
 * Runs units of work in a transaction. On single-connection drivers the
 * transactions are queued one at a time; pooled drivers run them directly.
 */
@Injectable()
export class TransactionRunner {
  private readonly mutex: Mutex | null;

  constructor(private readonly dataSource: DataSource) {
    this.mutex = SINGLE_CONNECTION_DRIVERS.has(dataSource.options.type)
      ? new Mutex()
      : null;
  }

  run<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    if (!this.mutex) {
      return this.dataSource.transaction(work);
    }
    return this.mutex.runExclusive(() => this.dataSource.transaction(work));
  }

  /**
   * Reads outside a transaction. Serialized drivers wait for the running
   * transaction so uncommitted rows are never observed.
   */
  read<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    if (!this.mutex) {
      return work(this.dataSource.manager);
    }
    return this.mutex.runExclusive(() => work(this.dataSource.manager));
  }
}
