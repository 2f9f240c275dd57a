import Database from 'better-sqlite3';
import { StorageUnavailableError, handleDatabaseError } from './db-errors.js';

type Param = string | number | bigint | null;

/**
 * Prepared-statement wrappers that route driver errors through handleDatabaseError
 */
export class DatabaseHelpers {
  constructor(private db: Database.Database) {}

  /**
   * Throws StorageUnavailableError once the handle has been closed
   */
  ensureOpen(context: string): void {
    if (!this.db.open) {
      throw new StorageUnavailableError(`${context}: connection is closed`);
    }
  }

  /**
   * Runs the operation inside a single transaction (committed on return, rolled back on throw)
   */
  executeTransaction<T>(operation: () => T, context: string): T {
    this.ensureOpen(context);
    try {
      const tx = this.db.transaction(operation);
      return tx();
    } catch (error) {
      handleDatabaseError(error, context);
    }
  }

  /**
   * All rows of a query
   */
  safeQuery<T>(query: string, params: Param[], context: string): T[] {
    this.ensureOpen(context);
    try {
      return this.db.prepare<Param[], T>(query).all(...params);
    } catch (error) {
      handleDatabaseError(error, context);
    }
  }

  /**
   * First row of a query, or null
   */
  safeGet<T>(query: string, params: Param[], context: string): T | null {
    this.ensureOpen(context);
    try {
      return this.db.prepare<Param[], T>(query).get(...params) ?? null;
    } catch (error) {
      handleDatabaseError(error, context);
    }
  }

  /**
   * Executes a write statement
   */
  safeRun(query: string, params: Param[], context: string): Database.RunResult {
    this.ensureOpen(context);
    try {
      return this.db.prepare<Param[]>(query).run(...params);
    } catch (error) {
      handleDatabaseError(error, context);
    }
  }
}
