/**
 * Book Lifecycle Service
 *
 * Registers a scanned book together with its metadata so that a book is
 * never visible without metadata.
 */

import type { Book, BookMetadata, BookMetadataValues, EntityInput } from '../../types/catalog.types.js';
import { runInTransaction } from '../database.service.js';
import { bookLogger as logger } from '../logger.service.js';
import { bookMetadataRepository } from '../persistence/book-metadata.repository.js';
import { bookRepository } from '../persistence/book.repository.js';
import { makeDefaultBookMetadata } from './catalog.factories.js';

export interface RegisteredBook {
  book: Book;
  metadata: BookMetadata;
}

/**
 * Insert a book and its metadata in one transaction. Unless overridden,
 * the metadata title is the book name and the number is the book's
 * position in its series.
 */
export function registerBook(
  book: EntityInput<Book>,
  metadataOverrides: Partial<BookMetadataValues> = {}
): RegisteredBook {
  const registered = runInTransaction({ entity: 'book', operation: 'register', id: book.id }, () => {
    const position = bookRepository.findAllIdBySeriesId(book.seriesId).length + 1;
    const stored = bookRepository.insert(book);
    const metadata = bookMetadataRepository.insert(makeDefaultBookMetadata(stored, position, metadataOverrides));
    return { book: stored, metadata };
  });

  logger.debug({ bookId: book.id, seriesId: book.seriesId }, 'Registered book');
  return registered;
}
