/**
 * Catalog Types
 *
 * Domain model for the catalog: libraries own series, series own books,
 * and every book has exactly one metadata record whose fields can be
 * locked individually against automated refreshes.
 */

// =============================================================================
// Entities
// =============================================================================

export type EntityKind = 'library' | 'series' | 'book';

/**
 * Shape shared by every stored entity. Audit dates are assigned by the store.
 */
export interface AuditedEntity {
  id: string;
  createdDate: Date;
  lastModifiedDate: Date;
}

/**
 * What callers hand to insert/update: audit dates are optional because the
 * store ignores them and assigns its own.
 */
export type EntityInput<E extends AuditedEntity> = Omit<E, 'createdDate' | 'lastModifiedDate'> &
  Partial<Pick<E, 'createdDate' | 'lastModifiedDate'>> & { id: string };

export interface Library extends AuditedEntity {
  name: string;
  /** Library root locator (URL or path) */
  root: string;
}

export interface Series extends AuditedEntity {
  name: string;
  /** Folder locator of the series */
  url: string;
  fileLastModified: Date;
  libraryId: string;
}

export interface Book extends AuditedEntity {
  name: string;
  /** Source file locator (URL or path) */
  url: string;
  /** Last modification of the underlying file, not of this record */
  fileLastModified: Date;
  fileSize: number;
  seriesId: string;
  libraryId: string;
}

// =============================================================================
// Book Metadata
// =============================================================================

export interface Author {
  name: string;
  role: string;
}

/**
 * Calendar date without time, formatted YYYY-MM-DD.
 */
export type CalendarDate = string;

export const METADATA_FIELDS = [
  'title',
  'summary',
  'number',
  'numberSort',
  'releaseDate',
  'authors',
  'tags',
] as const;

export type MetadataField = (typeof METADATA_FIELDS)[number];

export type LockFlagName<F extends MetadataField = MetadataField> = `${F}Lock`;

export interface BookMetadataValues {
  title: string;
  summary: string;
  number: string;
  numberSort: number;
  releaseDate: CalendarDate | null;
  /** Order is meaningful */
  authors: Author[];
  tags: Set<string>;
}

export type BookMetadataLocks = { [F in MetadataField as LockFlagName<F>]: boolean };

export interface BookMetadata extends BookMetadataValues, BookMetadataLocks {
  bookId: string;
  createdDate: Date;
  lastModifiedDate: Date;
}

export type BookMetadataInput = Omit<BookMetadata, 'createdDate' | 'lastModifiedDate'> &
  Partial<Pick<BookMetadata, 'createdDate' | 'lastModifiedDate'>>;

/**
 * A proposed set of new values, as produced by a metadata refresh.
 * Absent keys are left untouched.
 */
export type BookMetadataPatch = Partial<BookMetadataValues>;

// =============================================================================
// Search
// =============================================================================

/**
 * Book filter. Every dimension is optional; an absent or empty dimension
 * does not filter. Dimensions combine with AND.
 */
export interface BookSearch {
  libraryIds?: readonly string[];
  seriesIds?: readonly string[];
  /** Case-insensitive substring of the book name */
  searchTerm?: string;
  /** Books carrying any of these tags */
  tags?: readonly string[];
}

export interface SeriesSearch {
  libraryIds?: readonly string[];
  /** Case-insensitive substring of the series name */
  searchTerm?: string;
}

// =============================================================================
// Batch Insert
// =============================================================================

export const BATCH_STRATEGIES = ['sequential', 'grouped', 'transactional'] as const;

export type BatchStrategy = (typeof BATCH_STRATEGIES)[number];

export interface BatchInsertResult {
  strategy: BatchStrategy;
  inserted: number;
  durationMs: number;
}
