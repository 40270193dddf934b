/**
 * Persistence Module
 *
 * Re-exports the stores, search filters and error taxonomy.
 */

export * from './errors.js';
export { nextTimestamp } from './clock.js';
export { EntityStore, type EntityMapping, type AuditedRow, type AuditDates, type SqlValue } from './entity-store.js';
export { insertBatch, type BatchOptions, type BatchTarget } from './batch-writer.js';
export {
  BOOK_FILTERS,
  SERIES_FILTERS,
  buildWhere,
  contains,
  inList,
  type FilterDimension,
  type SqlPredicate,
} from './search-filters.js';
export { LibraryRepository, libraryRepository } from './library.repository.js';
export { SeriesRepository, seriesRepository } from './series.repository.js';
export { BookRepository, bookRepository } from './book.repository.js';
export { BookMetadataRepository, bookMetadataRepository } from './book-metadata.repository.js';
