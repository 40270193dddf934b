/**
 * Metadata Lock Service Tests
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { openTestDatabase, closeTestDatabase } from '../../__tests__/__fixtures__/test-database.js';
import { makeBook, makeBookMetadata, makeLibrary, makeSeries } from '../../catalog/catalog.factories.js';
import { registerBook } from '../../catalog/book-lifecycle.service.js';
import { bookRepository } from '../../persistence/book.repository.js';
import { bookMetadataRepository } from '../../persistence/book-metadata.repository.js';
import { libraryRepository } from '../../persistence/library.repository.js';
import { seriesRepository } from '../../persistence/series.repository.js';
import { NotFoundError } from '../../persistence/errors.js';
import {
  applyMetadataPatch,
  isFieldLocked,
  refreshBookMetadata,
  setFieldLocks,
} from '../metadata-lock.service.js';

// =============================================================================
// applyMetadataPatch
// =============================================================================

describe('applyMetadataPatch', () => {
  const current = makeBookMetadata({
    bookId: 'b1',
    title: 'Old',
    number: '1',
    numberSort: 1,
    authors: [{ name: 'author', role: 'writer' }],
    tags: new Set(['keep']),
    titleLock: true,
    tagsLock: true,
  });

  it('should apply unlocked fields and skip locked ones', () => {
    const result = applyMetadataPatch(current, {
      title: 'New',
      summary: 'Summary',
      tags: new Set(['other']),
    });

    expect(result.metadata.title).toBe('Old');
    expect(result.metadata.summary).toBe('Summary');
    expect(result.metadata.tags).toEqual(new Set(['keep']));
    expect(result.changed).toEqual(['summary']);
    expect(result.skipped).toEqual(['title', 'tags']);
  });

  it('should not report fields whose value is unchanged', () => {
    const result = applyMetadataPatch(current, {
      title: 'Old',
      number: '1',
      authors: [{ name: 'author', role: 'writer' }],
      tags: new Set(['keep']),
    });

    expect(result.changed).toEqual([]);
    expect(result.skipped).toEqual([]);
  });

  it('should treat author order as significant', () => {
    const metadata = { ...current, authors: [{ name: 'a', role: 'writer' }, { name: 'b', role: 'writer' }] };

    const result = applyMetadataPatch(metadata, {
      authors: [{ name: 'b', role: 'writer' }, { name: 'a', role: 'writer' }],
    });

    expect(result.changed).toEqual(['authors']);
    expect(result.metadata.authors.map((author) => author.name)).toEqual(['b', 'a']);
  });

  it('should leave the current metadata and lock flags untouched', () => {
    const result = applyMetadataPatch(current, { releaseDate: '2024-05-01', authors: [] });

    result.metadata.tags.add('added');

    expect(current.tags).toEqual(new Set(['keep']));
    expect(current.releaseDate).toBeNull();
    expect(current.authors).toHaveLength(1);
    expect(result.metadata.titleLock).toBe(true);
    expect(result.metadata.tagsLock).toBe(true);
    expect(result.changed).toEqual(['releaseDate', 'authors']);
  });

  it('should report lock state per field', () => {
    expect(isFieldLocked(current, 'title')).toBe(true);
    expect(isFieldLocked(current, 'summary')).toBe(false);
  });
});

// =============================================================================
// Persisted Refresh
// =============================================================================

describe('refreshBookMetadata', () => {
  const library = makeLibrary();
  const series = makeSeries('Series', { libraryId: library.id });

  beforeAll(() => {
    openTestDatabase();
    libraryRepository.insert(library);
    seriesRepository.insert(series);
  });

  afterEach(() => {
    bookRepository.deleteAll();
  });

  afterAll(() => {
    seriesRepository.deleteAll();
    libraryRepository.deleteAll();
    closeTestDatabase();
  });

  const register = () => registerBook(makeBook('Book', { libraryId: library.id, seriesId: series.id }));

  it('should persist unlocked changes and keep locked values', () => {
    const { book } = register();
    setFieldLocks(book.id, { title: true });

    const result = refreshBookMetadata(book.id, { title: 'Scanned', tags: new Set(['new']) });
    const stored = bookMetadataRepository.findById(book.id);

    expect(result.changed).toEqual(['tags']);
    expect(result.skipped).toEqual(['title']);
    expect(stored.title).toBe('Book');
    expect(stored.tags).toEqual(new Set(['new']));
    expect(stored.titleLock).toBe(true);
  });

  it('should not write when nothing changes', () => {
    const { book, metadata } = register();

    const result = refreshBookMetadata(book.id, { title: 'Book' });

    expect(result.changed).toEqual([]);
    expect(result.metadata).toEqual(metadata);
    expect(bookMetadataRepository.findById(book.id).lastModifiedDate).toEqual(metadata.lastModifiedDate);
  });

  it('should throw NotFoundError for a book without metadata', () => {
    expect(() => refreshBookMetadata('missing', { title: 'x' })).toThrow(NotFoundError);
  });
});

describe('setFieldLocks', () => {
  const library = makeLibrary();
  const series = makeSeries('Series', { libraryId: library.id });

  beforeAll(() => {
    openTestDatabase();
    libraryRepository.insert(library);
    seriesRepository.insert(series);
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('should change only the named locks', () => {
    const { book } = registerBook(makeBook('Book', { libraryId: library.id, seriesId: series.id }), {
      summary: 'Summary',
    });
    setFieldLocks(book.id, { summary: true });

    const updated = setFieldLocks(book.id, { title: true, summary: false });

    expect(updated.titleLock).toBe(true);
    expect(updated.summaryLock).toBe(false);
    expect(updated.tagsLock).toBe(false);
    expect(updated.summary).toBe('Summary');
    expect(updated.title).toBe('Book');
  });
});
