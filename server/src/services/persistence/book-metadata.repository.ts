/**
 * Book Metadata Repository
 *
 * One metadata record per book, keyed by bookId, plus two owned
 * collections: authors (ordered by position) and tags (a set).
 *
 * Writes are transactional: the metadata row and both collections are
 * committed together or not at all. Updates replace the collections
 * wholesale (delete then re-insert) instead of diffing them.
 *
 * findById throws when metadata is missing: a book created through
 * ingestion always has metadata, so absence is an integrity problem.
 * findByIdOrNull is there for reconciliation code that expects gaps.
 */

import type { z } from 'zod';
import type { Author, BookMetadata, BookMetadataInput } from '../../types/catalog.types.js';
import { BookMetadataSchema, formatIssues } from '../../schemas/catalog.schemas.js';
import { getDatabase, logPersistenceFailure, runInTransaction, runStatement } from '../database.service.js';
import { metadataLogger as logger } from '../logger.service.js';
import { nextTimestamp } from './clock.js';
import { ConstraintViolationError, NotFoundError, type ErrorContext } from './errors.js';
import { fromSqlBoolean, fromSqlDate, laterTimestamp, toSqlBoolean, toSqlDate, toSqlList } from './sql-values.js';

// =============================================================================
// Rows
// =============================================================================

interface BookMetadataRow {
  book_id: string;
  title: string;
  title_lock: number;
  summary: string;
  summary_lock: number;
  number: string;
  number_lock: number;
  number_sort: number;
  number_sort_lock: number;
  release_date: string | null;
  release_date_lock: number;
  authors_lock: number;
  tags_lock: number;
  created_date: string;
  last_modified_date: string;
}

interface AuthorRow {
  book_id: string;
  position: number;
  name: string;
  role: string;
}

interface TagRow {
  book_id: string;
  tag: string;
}

type ValidatedMetadata = z.infer<typeof BookMetadataSchema>;

const SCALAR_COLUMNS = [
  'title',
  'title_lock',
  'summary',
  'summary_lock',
  'number',
  'number_lock',
  'number_sort',
  'number_sort_lock',
  'release_date',
  'release_date_lock',
  'authors_lock',
  'tags_lock',
] as const;

function toScalarValues(metadata: ValidatedMetadata): Record<(typeof SCALAR_COLUMNS)[number], unknown> {
  return {
    title: metadata.title,
    title_lock: toSqlBoolean(metadata.titleLock),
    summary: metadata.summary,
    summary_lock: toSqlBoolean(metadata.summaryLock),
    number: metadata.number,
    number_lock: toSqlBoolean(metadata.numberLock),
    number_sort: metadata.numberSort,
    number_sort_lock: toSqlBoolean(metadata.numberSortLock),
    release_date: metadata.releaseDate,
    release_date_lock: toSqlBoolean(metadata.releaseDateLock),
    authors_lock: toSqlBoolean(metadata.authorsLock),
    tags_lock: toSqlBoolean(metadata.tagsLock),
  };
}

function fromRows(row: BookMetadataRow, authors: Author[], tags: Set<string>): BookMetadata {
  return {
    bookId: row.book_id,
    title: row.title,
    summary: row.summary,
    number: row.number,
    numberSort: row.number_sort,
    releaseDate: row.release_date,
    authors,
    tags,
    titleLock: fromSqlBoolean(row.title_lock),
    summaryLock: fromSqlBoolean(row.summary_lock),
    numberLock: fromSqlBoolean(row.number_lock),
    numberSortLock: fromSqlBoolean(row.number_sort_lock),
    releaseDateLock: fromSqlBoolean(row.release_date_lock),
    authorsLock: fromSqlBoolean(row.authors_lock),
    tagsLock: fromSqlBoolean(row.tags_lock),
    createdDate: fromSqlDate(row.created_date),
    lastModifiedDate: fromSqlDate(row.last_modified_date),
  };
}

// =============================================================================
// Repository
// =============================================================================

export class BookMetadataRepository {
  private context(operation: string, bookId?: string): ErrorContext {
    return { entity: 'book_metadata', operation, id: bookId };
  }

  private validate(metadata: BookMetadataInput, operation: string): ValidatedMetadata {
    const result = BookMetadataSchema.safeParse(metadata);
    if (!result.success) {
      const issues = formatIssues(result.error);
      const failure = new ConstraintViolationError(
        this.context(operation, metadata.bookId),
        `Invalid book metadata: ${issues.join('; ')}`,
        { issues }
      );
      logPersistenceFailure(failure);
      throw failure;
    }
    return result.data;
  }

  private insertCollections(metadata: ValidatedMetadata): void {
    const database = getDatabase();

    const insertAuthor = database.prepare<[AuthorRow]>(
      'INSERT INTO book_metadata_author (book_id, position, name, role) VALUES (@book_id, @position, @name, @role)'
    );
    metadata.authors.forEach((author, position) => {
      insertAuthor.run({ book_id: metadata.bookId, position, name: author.name, role: author.role });
    });

    const insertTag = database.prepare<[TagRow]>(
      'INSERT INTO book_metadata_tag (book_id, tag) VALUES (@book_id, @tag)'
    );
    for (const tag of metadata.tags) {
      insertTag.run({ book_id: metadata.bookId, tag });
    }
  }

  private deleteCollections(bookId: string): void {
    const database = getDatabase();
    database.prepare<[string]>('DELETE FROM book_metadata_author WHERE book_id = ?').run(bookId);
    database.prepare<[string]>('DELETE FROM book_metadata_tag WHERE book_id = ?').run(bookId);
  }

  /**
   * Load authors and tags for the given metadata rows
   */
  private assemble(rows: BookMetadataRow[]): BookMetadata[] {
    if (rows.length === 0) {
      return [];
    }

    const database = getDatabase();
    const ids = toSqlList(rows.map((row) => row.book_id));

    const authorRows = database
      .prepare<[string], AuthorRow>(
        'SELECT * FROM book_metadata_author WHERE book_id IN (SELECT value FROM json_each(?)) ORDER BY book_id, position'
      )
      .all(ids);
    const tagRows = database
      .prepare<[string], TagRow>(
        'SELECT * FROM book_metadata_tag WHERE book_id IN (SELECT value FROM json_each(?)) ORDER BY book_id, tag'
      )
      .all(ids);

    const authorsByBook = new Map<string, Author[]>();
    for (const author of authorRows) {
      const authors = authorsByBook.get(author.book_id) ?? [];
      authors.push({ name: author.name, role: author.role });
      authorsByBook.set(author.book_id, authors);
    }

    const tagsByBook = new Map<string, Set<string>>();
    for (const tag of tagRows) {
      const tags = tagsByBook.get(tag.book_id) ?? new Set<string>();
      tags.add(tag.tag);
      tagsByBook.set(tag.book_id, tags);
    }

    return rows.map((row) =>
      fromRows(row, authorsByBook.get(row.book_id) ?? [], tagsByBook.get(row.book_id) ?? new Set())
    );
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Insert metadata for an existing book, with its authors and tags.
   * Fails with ConstraintViolation when the book does not exist or already
   * has metadata.
   */
  insert(metadata: BookMetadataInput): BookMetadata {
    const validated = this.validate(metadata, 'insert');
    const context = this.context('insert', validated.bookId);

    runInTransaction(context, () => {
      const database = getDatabase();

      const book = database.prepare<[string], { id: string }>('SELECT id FROM book WHERE id = ?').get(validated.bookId);
      if (!book) {
        throw new ConstraintViolationError(context, `Cannot insert book_metadata: book ${validated.bookId} does not exist`);
      }

      const now = toSqlDate(nextTimestamp());
      database
        .prepare<[Record<string, unknown>]>(
          `INSERT INTO book_metadata (book_id, ${SCALAR_COLUMNS.join(', ')}, created_date, last_modified_date) ` +
            `VALUES (@book_id, ${SCALAR_COLUMNS.map((column) => `@${column}`).join(', ')}, @created_date, @last_modified_date)`
        )
        .run({
          book_id: validated.bookId,
          ...toScalarValues(validated),
          created_date: now,
          last_modified_date: now,
        });

      this.insertCollections(validated);
    });

    logger.debug({ bookId: validated.bookId }, 'Inserted book metadata');
    return this.findById(validated.bookId);
  }

  /**
   * Replace every field, lock flag and collection of existing metadata.
   * createdDate is kept from storage. Fails with NotFound when the book has
   * no metadata.
   */
  update(metadata: BookMetadataInput): BookMetadata {
    const validated = this.validate(metadata, 'update');
    const context = this.context('update', validated.bookId);

    runInTransaction(context, () => {
      const database = getDatabase();

      const assignments = [
        ...SCALAR_COLUMNS.map((column) => `${column} = @${column}`),
        `last_modified_date = ${laterTimestamp('last_modified_date', '@last_modified_date')}`,
      ].join(', ');
      const result = database
        .prepare<[Record<string, unknown>]>(
          `UPDATE book_metadata SET ${assignments} WHERE book_id = @book_id`
        )
        .run({
          book_id: validated.bookId,
          ...toScalarValues(validated),
          last_modified_date: toSqlDate(nextTimestamp()),
        });

      if (result.changes === 0) {
        throw new NotFoundError(context);
      }

      this.deleteCollections(validated.bookId);
      this.insertCollections(validated);
    });

    logger.debug({ bookId: validated.bookId }, 'Updated book metadata');
    return this.findById(validated.bookId);
  }

  /**
   * Remove metadata and its collections. Missing metadata is not an error.
   */
  delete(bookId: string): void {
    runInTransaction(this.context('delete', bookId), () => {
      this.deleteCollections(bookId);
      getDatabase().prepare<[string]>('DELETE FROM book_metadata WHERE book_id = ?').run(bookId);
    });
    logger.debug({ bookId }, 'Deleted book metadata');
  }

  deleteByBookIds(bookIds: readonly string[]): number {
    if (bookIds.length === 0) {
      return 0;
    }

    const ids = toSqlList(bookIds);
    const deleted = runInTransaction(this.context('delete'), () => {
      const database = getDatabase();
      database
        .prepare<[string]>('DELETE FROM book_metadata_author WHERE book_id IN (SELECT value FROM json_each(?))')
        .run(ids);
      database
        .prepare<[string]>('DELETE FROM book_metadata_tag WHERE book_id IN (SELECT value FROM json_each(?))')
        .run(ids);
      return database
        .prepare<[string]>('DELETE FROM book_metadata WHERE book_id IN (SELECT value FROM json_each(?))')
        .run(ids).changes;
    });

    logger.debug({ count: deleted }, 'Deleted book metadata');
    return deleted;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  findByIdOrNull(bookId: string): BookMetadata | null {
    const [found] = this.findByIds([bookId]);
    return found ?? null;
  }

  /**
   * Throws NotFound when the book has no metadata
   */
  findById(bookId: string): BookMetadata {
    const found = this.findByIdOrNull(bookId);
    if (!found) {
      throw new NotFoundError(this.context('find', bookId), `No metadata for book ${bookId}`);
    }
    return found;
  }

  findByIds(bookIds: readonly string[]): BookMetadata[] {
    if (bookIds.length === 0) {
      return [];
    }

    return runStatement(this.context('find'), (database) => {
      const rows = database
        .prepare<[string], BookMetadataRow>(
          'SELECT * FROM book_metadata WHERE book_id IN (SELECT value FROM json_each(?)) ORDER BY book_id'
        )
        .all(toSqlList(bookIds));
      return this.assemble(rows);
    });
  }

  count(): number {
    const row = runStatement(this.context('count'), (database) =>
      database.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM book_metadata').get()
    );
    return row?.count ?? 0;
  }
}

export const bookMetadataRepository = new BookMetadataRepository();
