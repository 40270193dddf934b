/**
 * Library Repository
 */

import type { Library } from '../../types/catalog.types.js';
import { LibrarySchema } from '../../schemas/catalog.schemas.js';
import { runStatement } from '../database.service.js';
import { libraryLogger } from '../logger.service.js';
import { EntityStore, type AuditedRow, type EntityMapping } from './entity-store.js';
import { fromSqlDate, toSqlDate } from './sql-values.js';

interface LibraryRow extends AuditedRow {
  name: string;
  root: string;
}

const libraryMapping: EntityMapping<Library, LibraryRow> = {
  kind: 'library',
  table: 'library',
  columns: ['id', 'name', 'root', 'created_date', 'last_modified_date'],
  schema: LibrarySchema,
  toRow: (library, dates) => ({
    id: library.id,
    name: library.name,
    root: library.root,
    created_date: toSqlDate(dates.createdDate),
    last_modified_date: toSqlDate(dates.lastModifiedDate),
  }),
  fromRow: (row) => ({
    id: row.id,
    name: row.name,
    root: row.root,
    createdDate: fromSqlDate(row.created_date),
    lastModifiedDate: fromSqlDate(row.last_modified_date),
  }),
};

export class LibraryRepository extends EntityStore<Library, LibraryRow> {
  constructor() {
    super(libraryMapping, libraryLogger);
  }

  existsByName(name: string): boolean {
    const row = runStatement(this.context('find'), (db) =>
      db.prepare<[string], { found: number }>('SELECT 1 AS found FROM library WHERE name = ?').get(name)
    );
    return row !== undefined;
  }
}

export const libraryRepository = new LibraryRepository();
