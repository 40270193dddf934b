/**
 * Book Repository
 *
 * Besides the shared entity operations, books can be searched across the
 * library -> series -> book hierarchy, returning either whole books or
 * only their ids for reconciliation callers.
 */

import type { Book, BookSearch } from '../../types/catalog.types.js';
import { BookSchema } from '../../schemas/catalog.schemas.js';
import { runStatement } from '../database.service.js';
import { bookLogger } from '../logger.service.js';
import { EntityStore, type AuditedRow, type EntityMapping } from './entity-store.js';
import { BOOK_FILTERS, buildWhere, type SqlPredicate } from './search-filters.js';
import { fromSqlDate, toSqlDate } from './sql-values.js';

interface BookRow extends AuditedRow {
  name: string;
  url: string;
  file_last_modified: string;
  file_size: number;
  series_id: string;
  library_id: string;
}

const bookMapping: EntityMapping<Book, BookRow> = {
  kind: 'book',
  table: 'book',
  columns: [
    'id',
    'name',
    'url',
    'file_last_modified',
    'file_size',
    'series_id',
    'library_id',
    'created_date',
    'last_modified_date',
  ],
  schema: BookSchema,
  toRow: (book, dates) => ({
    id: book.id,
    name: book.name,
    url: book.url,
    file_last_modified: toSqlDate(book.fileLastModified),
    file_size: book.fileSize,
    series_id: book.seriesId,
    library_id: book.libraryId,
    created_date: toSqlDate(dates.createdDate),
    last_modified_date: toSqlDate(dates.lastModifiedDate),
  }),
  fromRow: (row) => ({
    id: row.id,
    name: row.name,
    url: row.url,
    fileLastModified: fromSqlDate(row.file_last_modified),
    fileSize: row.file_size,
    seriesId: row.series_id,
    libraryId: row.library_id,
    createdDate: fromSqlDate(row.created_date),
    lastModifiedDate: fromSqlDate(row.last_modified_date),
  }),
};

// Metadata may be missing for a book mid-ingestion, hence the LEFT JOIN.
const ORDER_BY = 'ORDER BY (m.number_sort IS NULL), m.number_sort, b.name, b.id';

function whereClause(where: SqlPredicate): string {
  return where.clause ? ` WHERE ${where.clause}` : '';
}

export class BookRepository extends EntityStore<Book, BookRow> {
  constructor() {
    super(bookMapping, bookLogger);
  }

  /**
   * Without a search, every book (unordered). With one, the books matching
   * every set dimension, ordered by metadata numberSort then name.
   */
  override findAll(search?: BookSearch): Book[] {
    if (!search) {
      return super.findAll();
    }

    const where = buildWhere(search, BOOK_FILTERS);
    const sql =
      `SELECT b.* FROM book b LEFT JOIN book_metadata m ON m.book_id = b.id` +
      `${whereClause(where)} ${ORDER_BY}`;

    const rows = runStatement(this.context('search'), (db) =>
      db.prepare<unknown[], BookRow>(sql).all(...where.params)
    );
    return rows.map((row) => this.mapping.fromRow(row));
  }

  /**
   * Ids only, in the same order as findAll(search)
   */
  findAllIds(search: BookSearch): string[] {
    const where = buildWhere(search, BOOK_FILTERS);
    const sql =
      `SELECT b.id FROM book b LEFT JOIN book_metadata m ON m.book_id = b.id` +
      `${whereClause(where)} ${ORDER_BY}`;

    const rows = runStatement(this.context('search'), (db) =>
      db.prepare<unknown[], { id: string }>(sql).all(...where.params)
    );
    return rows.map((row) => row.id);
  }

  findAllIdByLibraryId(libraryId: string): string[] {
    return this.findAllIds({ libraryIds: [libraryId] });
  }

  findAllIdBySeriesId(seriesId: string): string[] {
    return this.findAllIds({ seriesIds: [seriesId] });
  }

  findBySeriesId(seriesId: string): Book[] {
    return this.findAll({ seriesIds: [seriesId] });
  }

  findByLibraryIdAndUrl(libraryId: string, url: string): Book | null {
    const [found] = this.selectWhere('find', 'library_id = ? AND url = ?', [libraryId, url]);
    return found ?? null;
  }

  getLibraryId(bookId: string): string | null {
    const row = runStatement(this.context('find', bookId), (db) =>
      db.prepare<[string], { library_id: string }>('SELECT library_id FROM book WHERE id = ?').get(bookId)
    );
    return row?.library_id ?? null;
  }
}

export const bookRepository = new BookRepository();
