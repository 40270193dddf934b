/**
 * Library Cleanup Service Tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { openTestDatabase, closeTestDatabase } from '../../__tests__/__fixtures__/test-database.js';
import { makeBook, makeLibrary, makeSeries } from '../../catalog/catalog.factories.js';
import { registerBook } from '../../catalog/book-lifecycle.service.js';
import { bookRepository } from '../../persistence/book.repository.js';
import { bookMetadataRepository } from '../../persistence/book-metadata.repository.js';
import { libraryRepository } from '../../persistence/library.repository.js';
import { seriesRepository } from '../../persistence/series.repository.js';
import { removeBooks, removeLibrary, removeSeries, type RemovalResult } from '../library-cleanup.service.js';
import type { Book, Library, Series } from '../../../types/catalog.types.js';

const stepCounts = (result: RemovalResult) =>
  result.steps.map((step) => ({ stepName: step.stepName, itemsProcessed: step.itemsProcessed }));

describe('Library Cleanup Service', () => {
  let library: Library;
  let first: Series;
  let second: Series;
  let books: Book[];

  beforeAll(() => {
    openTestDatabase();
  });

  beforeEach(() => {
    library = libraryRepository.insert(makeLibrary());
    first = seriesRepository.insert(makeSeries('First', { libraryId: library.id }));
    second = seriesRepository.insert(makeSeries('Second', { libraryId: library.id }));
    books = [
      registerBook(makeBook('1', { libraryId: library.id, seriesId: first.id })).book,
      registerBook(makeBook('2', { libraryId: library.id, seriesId: first.id })).book,
      registerBook(makeBook('3', { libraryId: library.id, seriesId: second.id })).book,
    ];
  });

  afterEach(() => {
    libraryRepository.deleteAll();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  describe('removeSeries', () => {
    it('should remove the series with its books and metadata', () => {
      const result = removeSeries(first.id);

      expect(result.target).toBe('series');
      expect(result.id).toBe(first.id);
      expect(stepCounts(result)).toEqual([
        { stepName: 'Book metadata', itemsProcessed: 2 },
        { stepName: 'Books', itemsProcessed: 2 },
        { stepName: 'Series', itemsProcessed: 1 },
      ]);
      expect(result.totalItemsProcessed).toBe(5);
      expect(bookRepository.findAll().map((book) => book.id)).toEqual([books[2].id]);
      expect(bookMetadataRepository.count()).toBe(1);
      expect(seriesRepository.exists(second.id)).toBe(true);
    });

    it('should remove nothing for an unknown series', () => {
      const result = removeSeries('missing');

      expect(result.totalItemsProcessed).toBe(0);
      expect(bookRepository.count()).toBe(3);
    });
  });

  describe('removeLibrary', () => {
    it('should remove everything under the library', () => {
      const result = removeLibrary(library.id);

      expect(stepCounts(result)).toEqual([
        { stepName: 'Book metadata', itemsProcessed: 3 },
        { stepName: 'Books', itemsProcessed: 3 },
        { stepName: 'Series', itemsProcessed: 2 },
        { stepName: 'Library', itemsProcessed: 1 },
      ]);
      expect(libraryRepository.count()).toBe(0);
      expect(seriesRepository.count()).toBe(0);
      expect(bookRepository.count()).toBe(0);
      expect(bookMetadataRepository.count()).toBe(0);
    });
  });

  describe('removeBooks', () => {
    it('should remove only the given books', () => {
      const result = removeBooks([books[0].id, books[2].id]);

      expect(result.target).toBe('books');
      expect(result.totalItemsProcessed).toBe(4);
      expect(bookRepository.findAll().map((book) => book.id)).toEqual([books[1].id]);
      expect(bookMetadataRepository.findByIdOrNull(books[0].id)).toBeNull();
      expect(bookMetadataRepository.findByIdOrNull(books[1].id)).not.toBeNull();
    });
  });
});
