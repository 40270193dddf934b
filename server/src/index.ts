/**
 * Bindery
 *
 * Persistence core of a media-library server: libraries, series, books and
 * their lockable metadata, stored in SQLite.
 */

import { loadedFrom } from './env.js';
import {
  closeDatabase,
  initializeDatabase,
  isDatabaseInitialized,
  type DatabaseInitOptions,
} from './services/database.service.js';
import { logger } from './services/logger.service.js';
import { bookMetadataRepository } from './services/persistence/book-metadata.repository.js';
import { bookRepository } from './services/persistence/book.repository.js';
import { libraryRepository } from './services/persistence/library.repository.js';
import { seriesRepository } from './services/persistence/series.repository.js';

export * from './types/catalog.types.js';
export * from './services/persistence/index.js';
export {
  initializeDatabase,
  closeDatabase,
  isDatabaseInitialized,
  runInTransaction,
  type DatabaseInitOptions,
} from './services/database.service.js';
export {
  loadConfig,
  saveConfig,
  updateConfig,
  clearConfigCache,
  getBatchSettings,
  getDatabaseSettings,
  type AppConfig,
  type BatchSettings,
  type DatabaseSettings,
} from './services/config.service.js';
export {
  makeLibrary,
  makeSeries,
  makeBook,
  makeBookMetadata,
  makeDefaultBookMetadata,
  type BookMetadataSeed,
} from './services/catalog/catalog.factories.js';
export { registerBook, type RegisteredBook } from './services/catalog/book-lifecycle.service.js';
export {
  applyMetadataPatch,
  refreshBookMetadata,
  setFieldLocks,
  isFieldLocked,
  LOCK_FLAGS,
  type FieldLocks,
  type MetadataPatchResult,
} from './services/metadata/metadata-lock.service.js';
export {
  removeBooks,
  removeSeries,
  removeLibrary,
  type CleanupStepResult,
  type RemovalResult,
} from './services/library/library-cleanup.service.js';
export { logger, createServiceLogger } from './services/logger.service.js';

export interface CatalogStatus {
  libraries: number;
  series: number;
  books: number;
  bookMetadata: number;
}

/**
 * Open the catalog store and report what it holds.
 * Opening the connection registers a shutdown hook that closes it; calling
 * again on an open catalog only reports.
 */
export function openCatalog(options: DatabaseInitOptions = {}): CatalogStatus {
  if (loadedFrom) {
    logger.debug({ path: loadedFrom }, 'Loaded environment file');
  }

  const alreadyOpen = isDatabaseInitialized();
  initializeDatabase(options);

  const status: CatalogStatus = {
    libraries: libraryRepository.count(),
    series: seriesRepository.count(),
    books: bookRepository.count(),
    bookMetadata: bookMetadataRepository.count(),
  };

  if (!alreadyOpen) {
    process.once('beforeExit', () => closeDatabase());
  }

  logger.info(status, 'Catalog opened');
  return status;
}
