/**
 * Catalog Factories
 *
 * Build valid entities with a fresh id and sensible defaults. Audit dates
 * are placeholders; the stores assign the real ones.
 */

import { randomUUID } from 'crypto';
import type {
  Book,
  BookMetadata,
  BookMetadataValues,
  Library,
  Series,
} from '../../types/catalog.types.js';

export function makeLibrary(name = 'default', root = `file:/${name}`): Library {
  const now = new Date();
  return {
    id: randomUUID(),
    name,
    root,
    createdDate: now,
    lastModifiedDate: now,
  };
}

export function makeSeries(
  name: string,
  options: { libraryId?: string; url?: string; fileLastModified?: Date } = {}
): Series {
  const now = new Date();
  return {
    id: randomUUID(),
    name,
    url: options.url ?? `file:/${name}`,
    fileLastModified: options.fileLastModified ?? now,
    libraryId: options.libraryId ?? '',
    createdDate: now,
    lastModifiedDate: now,
  };
}

export function makeBook(
  name: string,
  options: {
    libraryId?: string;
    seriesId?: string;
    url?: string;
    fileLastModified?: Date;
    fileSize?: number;
  } = {}
): Book {
  const now = new Date();
  return {
    id: randomUUID(),
    name,
    url: options.url ?? `file:/${name}`,
    fileLastModified: options.fileLastModified ?? now,
    fileSize: options.fileSize ?? 0,
    seriesId: options.seriesId ?? '',
    libraryId: options.libraryId ?? '',
    createdDate: now,
    lastModifiedDate: now,
  };
}

export type BookMetadataSeed = Pick<BookMetadata, 'bookId' | 'title' | 'number' | 'numberSort'> &
  Partial<Omit<BookMetadata, 'bookId' | 'title' | 'number' | 'numberSort'>>;

/**
 * Summary defaults to an empty string, releaseDate to null, collections to
 * empty and every lock to false.
 */
export function makeBookMetadata(seed: BookMetadataSeed): BookMetadata {
  const now = new Date();
  return {
    summary: '',
    releaseDate: null,
    authors: [],
    tags: new Set<string>(),
    titleLock: false,
    summaryLock: false,
    numberLock: false,
    numberSortLock: false,
    releaseDateLock: false,
    authorsLock: false,
    tagsLock: false,
    createdDate: now,
    lastModifiedDate: now,
    ...seed,
  };
}

/**
 * Metadata seeded from a freshly scanned book: the title is the book name
 * and the number its 1-based position in the series.
 */
export function makeDefaultBookMetadata(
  book: Pick<Book, 'id' | 'name'>,
  position: number,
  overrides: Partial<BookMetadataValues> = {}
): BookMetadata {
  return makeBookMetadata({
    bookId: book.id,
    title: book.name,
    number: String(position),
    numberSort: position,
    ...overrides,
  });
}
