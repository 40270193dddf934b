/**
 * Database Service
 *
 * Manages the SQLite connection lifecycle and transactional execution.
 * Handles initialization, schema application, and shutdown.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import { getDatabasePath, getSchemaPath } from './app-paths.service.js';
import { getDatabaseSettings } from './config.service.js';
import { databaseLogger as logger, logError } from './logger.service.js';
import { toPersistenceError, type ErrorContext, type PersistenceError } from './persistence/errors.js';

// =============================================================================
// Connection Instance
// =============================================================================

let db: Database.Database | null = null;

export interface DatabaseInitOptions {
  /** File path, or ':memory:' for a private in-memory store */
  path?: string;
}

/**
 * Get the database instance
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return db;
}

// =============================================================================
// Schema
// =============================================================================

/**
 * Apply the catalog schema. Statements are idempotent.
 */
function applySchema(database: Database.Database): void {
  const schemaPath = getSchemaPath();
  const schema = readFileSync(schemaPath, 'utf-8');
  database.exec(schema);
  logger.debug({ schemaPath }, 'Database schema applied');
}

/**
 * Initialize the database connection
 * Must be called before any store operation
 */
export function initializeDatabase(options: DatabaseInitOptions = {}): Database.Database {
  if (db) {
    return db;
  }

  const settings = getDatabaseSettings();
  const path = options.path ?? settings.path ?? getDatabasePath();

  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  logger.info({ path }, 'Initializing database');

  const database = new Database(path);

  try {
    database.pragma(`journal_mode = ${settings.journalMode}`);
    database.pragma('foreign_keys = ON');
    database.pragma(`busy_timeout = ${settings.busyTimeoutMs}`);
    applySchema(database);
  } catch (error) {
    logger.error({ err: error, path }, 'Failed to initialize database');
    database.close();
    throw error;
  }

  db = database;
  logger.info('Database connected successfully');
  return db;
}

/**
 * Close the database connection
 * Safe to call when not initialized
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

/**
 * Check if database is initialized
 */
export function isDatabaseInitialized(): boolean {
  return db !== null;
}

// =============================================================================
// Execution Helpers
// =============================================================================

/**
 * Log a store failure at error level, unless a transaction is still open:
 * the outermost runInTransaction reports it once the work has unwound.
 */
export function logPersistenceFailure(failure: PersistenceError): void {
  if (db?.inTransaction) {
    return;
  }
  logError('persistence', failure, {
    code: failure.code,
    entity: failure.entity,
    operation: failure.operation,
    id: failure.id,
  });
}

/**
 * Run a unit of work atomically. Either every write inside `work` is
 * committed or none is. Nested calls become savepoints of the outer
 * transaction. Failures are rethrown as persistence errors.
 */
export function runInTransaction<T>(context: ErrorContext, work: () => T): T {
  try {
    return getDatabase().transaction(work)();
  } catch (error) {
    const failure = toPersistenceError(error, context);
    logPersistenceFailure(failure);
    throw failure;
  }
}

/**
 * Run a single statement (or read) with error translation and no
 * explicit transaction.
 */
export function runStatement<T>(context: ErrorContext, work: (database: Database.Database) => T): T {
  try {
    return work(getDatabase());
  } catch (error) {
    const failure = toPersistenceError(error, context);
    logPersistenceFailure(failure);
    throw failure;
  }
}
