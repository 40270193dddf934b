/**
 * Batch Writer
 *
 * Three interchangeable ways to insert many rows. They leave the same rows
 * behind and differ only in how many statements and commits they take:
 *
 * - sequential: one INSERT per row, each committed on its own
 * - grouped: multi-row INSERT statements of `chunkSize` rows, one commit
 * - transactional: one INSERT per row inside a single transaction
 */

import type Database from 'better-sqlite3';
import type { BatchInsertResult, BatchStrategy } from '../../types/catalog.types.js';
import { getDatabase, logPersistenceFailure, runInTransaction } from '../database.service.js';
import { batchLogger as logger } from '../logger.service.js';
import { toPersistenceError, type ErrorContext, type PersistenceTarget } from './errors.js';

// =============================================================================
// Types
// =============================================================================

export interface BatchTarget<Row extends object> {
  entity: PersistenceTarget;
  table: string;
  columns: readonly (keyof Row & string)[];
}

export interface BatchOptions {
  strategy: BatchStrategy;
  chunkSize: number;
}

// =============================================================================
// SQL Builders
// =============================================================================

export function buildInsertSql<Row extends object>(target: Pick<BatchTarget<Row>, 'table' | 'columns'>): string {
  const columns = target.columns.join(', ');
  const params = target.columns.map((column) => `@${column}`).join(', ');
  return `INSERT INTO ${target.table} (${columns}) VALUES (${params})`;
}

function buildMultiRowInsertSql<Row extends object>(target: BatchTarget<Row>, rowCount: number): string {
  const placeholders = `(${target.columns.map(() => '?').join(', ')})`;
  const values = Array.from({ length: rowCount }, () => placeholders).join(', ');
  return `INSERT INTO ${target.table} (${target.columns.join(', ')}) VALUES ${values}`;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// =============================================================================
// Strategies
// =============================================================================

function insertSequential<Row extends object>(target: BatchTarget<Row>, rows: readonly Row[]): void {
  const context: ErrorContext = { entity: target.entity, operation: 'insert' };
  let committed = 0;

  try {
    const statement = getDatabase().prepare<[Row]>(buildInsertSql(target));
    for (const row of rows) {
      statement.run(row);
      committed++;
    }
  } catch (error) {
    const failure = toPersistenceError(error, context);
    failure.details.strategy = 'sequential';
    failure.details.committed = committed;
    logPersistenceFailure(failure);
    throw failure;
  }
}

function insertGrouped<Row extends object>(
  target: BatchTarget<Row>,
  rows: readonly Row[],
  chunkSize: number
): void {
  runInTransaction({ entity: target.entity, operation: 'insert' }, () => {
    const database = getDatabase();
    const statements = new Map<number, Database.Statement<unknown[]>>();

    for (const group of chunk(rows, chunkSize)) {
      let statement = statements.get(group.length);
      if (!statement) {
        statement = database.prepare<unknown[]>(buildMultiRowInsertSql(target, group.length));
        statements.set(group.length, statement);
      }
      statement.run(group.flatMap((row) => target.columns.map((column) => row[column])));
    }
  });
}

function insertTransactional<Row extends object>(target: BatchTarget<Row>, rows: readonly Row[]): void {
  runInTransaction({ entity: target.entity, operation: 'insert' }, () => {
    const statement = getDatabase().prepare<[Row]>(buildInsertSql(target));
    for (const row of rows) {
      statement.run(row);
    }
  });
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Insert rows with the chosen strategy.
 * grouped and transactional roll back entirely on failure; sequential keeps
 * the rows committed before the failing one and reports their count in
 * `error.details.committed`.
 */
export function insertBatch<Row extends object>(
  target: BatchTarget<Row>,
  rows: readonly Row[],
  options: BatchOptions
): BatchInsertResult {
  const start = Date.now();

  if (rows.length > 0) {
    switch (options.strategy) {
      case 'sequential':
        insertSequential(target, rows);
        break;
      case 'grouped':
        insertGrouped(target, rows, options.chunkSize);
        break;
      case 'transactional':
        insertTransactional(target, rows);
        break;
    }
  }

  const durationMs = Date.now() - start;
  logger.debug(
    { table: target.table, strategy: options.strategy, rows: rows.length, durationMs },
    'Batch insert completed'
  );

  return { strategy: options.strategy, inserted: rows.length, durationMs };
}
