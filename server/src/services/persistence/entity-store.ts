/**
 * Entity Store
 *
 * One implementation of create/read/update/delete/count shared by every
 * entity kind. A kind plugs in through an EntityMapping that names its
 * table and columns and converts between rows and domain values.
 *
 * Audit rules:
 * - insert sets createdDate and lastModifiedDate to the same fresh instant
 * - update keeps the stored createdDate (the caller's value is ignored)
 *   and moves lastModifiedDate strictly forward
 * - columns a mapping declares immutable keep their stored value on update
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import type {
  AuditedEntity,
  BatchInsertResult,
  BatchStrategy,
  EntityInput,
  EntityKind,
} from '../../types/catalog.types.js';
import { formatIssues } from '../../schemas/catalog.schemas.js';
import { getBatchSettings } from '../config.service.js';
import { logPersistenceFailure, runStatement } from '../database.service.js';
import { insertBatch, buildInsertSql } from './batch-writer.js';
import { nextTimestamp } from './clock.js';
import {
  ConstraintViolationError,
  NotFoundError,
  TransactionFailureError,
  type ErrorContext,
} from './errors.js';
import { laterTimestamp, toSqlList } from './sql-values.js';

// =============================================================================
// Types
// =============================================================================

export type SqlValue = string | number | null;

export interface AuditedRow {
  id: string;
  created_date: string;
  last_modified_date: string;
}

export interface AuditDates {
  createdDate: Date;
  lastModifiedDate: Date;
}

export interface EntityMapping<E extends AuditedEntity, Row extends AuditedRow> {
  kind: EntityKind;
  table: string;
  /** Every column, id and audit columns included */
  columns: readonly (keyof Row & string)[];
  /** Columns fixed at insert; update leaves them as stored */
  immutableColumns?: readonly (keyof Row & string)[];
  schema: z.ZodTypeAny;
  toRow(entity: EntityInput<E>, dates: AuditDates): Row;
  fromRow(row: Row): E;
}

type BindValues = Record<string, unknown>;

// =============================================================================
// Store
// =============================================================================

export class EntityStore<E extends AuditedEntity, Row extends AuditedRow> {
  protected readonly mapping: EntityMapping<E, Row>;
  protected readonly logger: Logger;
  private readonly updateSql: string;
  private readonly updateColumns: readonly (keyof Row & string)[];

  constructor(mapping: EntityMapping<E, Row>, logger: Logger) {
    this.mapping = mapping;
    this.logger = logger;

    const fixed = new Set<string>(['created_date', ...(mapping.immutableColumns ?? [])]);
    this.updateColumns = mapping.columns.filter((column) => !fixed.has(column));

    const assignments = this.updateColumns
      .filter((column) => column !== 'id')
      .map((column) =>
        column === 'last_modified_date'
          ? `${column} = ${laterTimestamp(column, `@${column}`)}`
          : `${column} = @${column}`
      )
      .join(', ');
    this.updateSql = `UPDATE ${mapping.table} SET ${assignments} WHERE id = @id RETURNING *`;
  }

  get kind(): EntityKind {
    return this.mapping.kind;
  }

  protected context(operation: string, id?: string): ErrorContext {
    return { entity: this.mapping.kind, operation, id };
  }

  /**
   * Reject invalid input before any write
   */
  protected validate(entity: EntityInput<E>, operation: string): void {
    const result = this.mapping.schema.safeParse(entity);
    if (!result.success) {
      const issues = formatIssues(result.error);
      const failure = new ConstraintViolationError(
        this.context(operation, entity.id),
        `Invalid ${this.mapping.kind}: ${issues.join('; ')}`,
        { issues }
      );
      logPersistenceFailure(failure);
      throw failure;
    }
  }

  protected bind(row: Row, columns: readonly (keyof Row & string)[]): BindValues {
    const values: BindValues = {};
    for (const column of columns) {
      values[column] = row[column];
    }
    return values;
  }

  /**
   * Select rows of this kind matching a WHERE clause (without the keyword)
   */
  protected selectWhere(operation: string, where: string, params: unknown[] = []): E[] {
    const sql = `SELECT * FROM ${this.mapping.table}${where ? ` WHERE ${where}` : ''}`;
    const rows = runStatement(this.context(operation), (db) => db.prepare<unknown[], Row>(sql).all(...params));
    return rows.map((row) => this.mapping.fromRow(row));
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Insert a new entity. Fails with ConstraintViolation on a duplicate id or
   * a dangling reference.
   */
  insert(entity: EntityInput<E>): E {
    this.validate(entity, 'insert');

    const now = nextTimestamp();
    const row = this.mapping.toRow(entity, { createdDate: now, lastModifiedDate: now });
    const sql = `${buildInsertSql(this.mapping)} RETURNING *`;

    const stored = runStatement(this.context('insert', entity.id), (db) =>
      db.prepare<[BindValues], Row>(sql).get(this.bind(row, this.mapping.columns))
    );

    if (!stored) {
      throw new TransactionFailureError(this.context('insert', entity.id), `${this.mapping.kind} ${entity.id} was not stored`);
    }

    this.logger.debug({ id: entity.id }, `Inserted ${this.mapping.kind}`);
    return this.mapping.fromRow(stored);
  }

  /**
   * Replace every mutable field of an existing entity. Immutable columns and
   * createdDate are carried over from storage.
   * Fails with NotFound when the id does not exist.
   */
  update(entity: EntityInput<E>): E {
    this.validate(entity, 'update');

    const now = nextTimestamp();
    const row = this.mapping.toRow(entity, { createdDate: now, lastModifiedDate: now });

    const stored = runStatement(this.context('update', entity.id), (db) =>
      db.prepare<[BindValues], Row>(this.updateSql).get(this.bind(row, this.updateColumns))
    );

    if (!stored) {
      const failure = new NotFoundError(this.context('update', entity.id));
      logPersistenceFailure(failure);
      throw failure;
    }

    this.logger.debug({ id: entity.id }, `Updated ${this.mapping.kind}`);
    return this.mapping.fromRow(stored);
  }

  /**
   * Insert many entities at once. Every entity is validated before the
   * first row is written.
   */
  insertMany(entities: readonly EntityInput<E>[], strategy?: BatchStrategy): BatchInsertResult {
    for (const entity of entities) {
      this.validate(entity, 'insert');
    }

    const settings = getBatchSettings();
    const rows = entities.map((entity) => {
      const now = nextTimestamp();
      return this.mapping.toRow(entity, { createdDate: now, lastModifiedDate: now });
    });

    return insertBatch({ ...this.mapping, entity: this.mapping.kind }, rows, {
      strategy: strategy ?? settings.defaultStrategy,
      chunkSize: settings.chunkSize,
    });
  }

  /**
   * Delete one entity. A missing id is not an error.
   */
  delete(id: string): void {
    const result = runStatement(this.context('delete', id), (db) =>
      db.prepare<[string]>(`DELETE FROM ${this.mapping.table} WHERE id = ?`).run(id)
    );
    this.logger.debug({ id, deleted: result.changes }, `Deleted ${this.mapping.kind}`);
  }

  /**
   * Delete the given entities with one statement
   */
  deleteByIds(ids: readonly string[]): number {
    if (ids.length === 0) {
      return 0;
    }
    const result = runStatement(this.context('delete'), (db) =>
      db
        .prepare<[string]>(`DELETE FROM ${this.mapping.table} WHERE id IN (SELECT value FROM json_each(?))`)
        .run(toSqlList(ids))
    );
    this.logger.debug({ count: result.changes }, `Deleted ${this.mapping.kind} entities`);
    return result.changes;
  }

  /**
   * Delete every entity of this kind. Safe on an empty store.
   */
  deleteAll(): void {
    const result = runStatement(this.context('deleteAll'), (db) =>
      db.prepare(`DELETE FROM ${this.mapping.table}`).run()
    );
    this.logger.debug({ count: result.changes }, `Deleted all ${this.mapping.kind} entities`);
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Returns null for a missing id; never throws for absence
   */
  findByIdOrNull(id: string): E | null {
    const row = runStatement(this.context('find', id), (db) =>
      db.prepare<[string], Row>(`SELECT * FROM ${this.mapping.table} WHERE id = ?`).get(id)
    );
    return row ? this.mapping.fromRow(row) : null;
  }

  /**
   * Throws NotFound for a missing id
   */
  findById(id: string): E {
    const found = this.findByIdOrNull(id);
    if (!found) {
      throw new NotFoundError(this.context('find', id));
    }
    return found;
  }

  findAll(): E[] {
    return this.selectWhere('find', '');
  }

  findAllByIds(ids: readonly string[]): E[] {
    if (ids.length === 0) {
      return [];
    }
    return this.selectWhere('find', 'id IN (SELECT value FROM json_each(?))', [toSqlList(ids)]);
  }

  exists(id: string): boolean {
    const row = runStatement(this.context('find', id), (db) =>
      db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${this.mapping.table} WHERE id = ?`).get(id)
    );
    return row !== undefined;
  }

  count(): number {
    const row = runStatement(this.context('count'), (db) =>
      db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${this.mapping.table}`).get()
    );
    return row?.count ?? 0;
  }
}
