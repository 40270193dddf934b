/**
 * Book Repository Tests
 *
 * CRUD, audit dates, and search across library -> series -> book.
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import {
  openTestDatabase,
  closeTestDatabase,
  expectCloseTo,
} from '../../__tests__/__fixtures__/test-database.js';
import { makeBook, makeBookMetadata, makeLibrary, makeSeries } from '../../catalog/catalog.factories.js';
import { bookRepository } from '../book.repository.js';
import { bookMetadataRepository } from '../book-metadata.repository.js';
import { libraryRepository } from '../library.repository.js';
import { seriesRepository } from '../series.repository.js';
import { ConstraintViolationError, NotFoundError } from '../errors.js';
import { getDatabase } from '../../database.service.js';

describe('Book Repository', () => {
  const library = makeLibrary();
  const series = makeSeries('Series', { libraryId: library.id });
  const otherLibrary = makeLibrary('other');
  const otherSeries = makeSeries('Other Series', { libraryId: otherLibrary.id });

  beforeAll(() => {
    openTestDatabase();
    libraryRepository.insert(library);
    libraryRepository.insert(otherLibrary);
    seriesRepository.insert(series);
    seriesRepository.insert(otherSeries);
  });

  afterEach(() => {
    bookRepository.deleteAll();
    expect(bookRepository.count()).toBe(0);
  });

  afterAll(() => {
    seriesRepository.deleteAll();
    libraryRepository.deleteAll();
    closeTestDatabase();
  });

  const bookIn = (name: string, target = series) =>
    makeBook(name, { libraryId: target.libraryId, seriesId: target.id });

  // ===========================================================================
  // Insert / Update
  // ===========================================================================

  describe('insert', () => {
    it('should persist every field', () => {
      const now = new Date();
      const book = makeBook('Book', {
        url: 'file://book',
        fileLastModified: now,
        fileSize: 3,
        seriesId: series.id,
        libraryId: library.id,
      });

      bookRepository.insert(book);
      const created = bookRepository.findById(book.id);

      expect(created.id).toBe(book.id);
      expectCloseTo(created.createdDate, now);
      expectCloseTo(created.lastModifiedDate, now);
      expect(created.lastModifiedDate).toEqual(created.createdDate);
      expect(created.name).toBe('Book');
      expect(created.url).toBe('file://book');
      expect(created.fileLastModified.getTime()).toBe(now.getTime());
      expect(created.fileSize).toBe(3);
      expect(created.seriesId).toBe(series.id);
      expect(created.libraryId).toBe(library.id);
    });

    it('should ignore audit dates supplied by the caller', () => {
      const book = { ...bookIn('Book'), createdDate: new Date(0), lastModifiedDate: new Date(0) };

      const created = bookRepository.insert(book);

      expect(created.createdDate.getTime()).toBeGreaterThan(0);
      expect(created.lastModifiedDate.getTime()).toBeGreaterThan(0);
    });

    it('should reject a duplicate id', () => {
      const book = bookIn('Book');
      bookRepository.insert(book);

      expect(() => bookRepository.insert({ ...book, url: 'file://elsewhere' })).toThrow(ConstraintViolationError);
      expect(bookRepository.count()).toBe(1);
    });

    it('should reject a book referencing a missing series', () => {
      const book = makeBook('Orphan', { libraryId: library.id, seriesId: 'missing-series' });

      expect(() => bookRepository.insert(book)).toThrow(ConstraintViolationError);
      expect(bookRepository.count()).toBe(0);
    });

    it('should reject a book whose library is not the library of its series', () => {
      const book = makeBook('Stray', { libraryId: otherLibrary.id, seriesId: series.id });

      expect(() => bookRepository.insert(book)).toThrow(ConstraintViolationError);
      expect(bookRepository.count()).toBe(0);
    });

    it('should reject a second book with the same url in a library', () => {
      bookRepository.insert(bookIn('One'));

      expect(() => bookRepository.insert({ ...bookIn('Two'), url: 'file:/One' })).toThrow(ConstraintViolationError);
    });

    it('should reject invalid input before writing', () => {
      const book = { ...bookIn('Book'), fileSize: -1 };

      expect(() => bookRepository.insert(book)).toThrow('fileSize: File size cannot be negative');
      expect(bookRepository.count()).toBe(0);
    });
  });

  describe('update', () => {
    it('should replace fields, keep createdDate and move lastModifiedDate forward', () => {
      const book = makeBook('Book', {
        url: 'file://book',
        fileSize: 3,
        seriesId: series.id,
        libraryId: library.id,
      });
      bookRepository.insert(book);
      const stored = bookRepository.findById(book.id);

      const modificationDate = new Date();
      bookRepository.update({
        ...stored,
        name: 'Updated',
        url: 'file://updated',
        fileLastModified: modificationDate,
        fileSize: 5,
      });
      const modified = bookRepository.findById(book.id);

      expect(modified.id).toBe(stored.id);
      expect(modified.createdDate).toEqual(stored.createdDate);
      expectCloseTo(modified.lastModifiedDate, modificationDate);
      expect(modified.lastModifiedDate.getTime()).toBeGreaterThan(stored.lastModifiedDate.getTime());
      expect(modified.name).toBe('Updated');
      expect(modified.url).toBe('file://updated');
      expect(modified.fileLastModified.getTime()).toBe(modificationDate.getTime());
      expect(modified.fileSize).toBe(5);
    });

    it('should carry createdDate over from storage, not from the caller', () => {
      const stored = bookRepository.insert(bookIn('Book'));

      const updated = bookRepository.update({ ...stored, createdDate: new Date('2001-01-01T00:00:00.000Z') });

      expect(updated.createdDate).toEqual(stored.createdDate);
    });

    it('should produce a new lastModifiedDate on back-to-back updates', () => {
      const stored = bookRepository.insert(bookIn('Book'));

      const first = bookRepository.update(stored);
      const second = bookRepository.update(first);

      expect(first.lastModifiedDate.getTime()).toBeGreaterThan(stored.lastModifiedDate.getTime());
      expect(second.lastModifiedDate.getTime()).toBeGreaterThan(first.lastModifiedDate.getTime());
    });

    it('should reject moving a book to a library its series is not in', () => {
      const stored = bookRepository.insert(bookIn('Book'));

      expect(() => bookRepository.update({ ...stored, libraryId: otherLibrary.id })).toThrow(ConstraintViolationError);
      expect(bookRepository.findById(stored.id).libraryId).toBe(library.id);
    });

    it('should allow moving a book to a series in another library together with that library', () => {
      const stored = bookRepository.insert(bookIn('Book'));

      const moved = bookRepository.update({ ...stored, libraryId: otherLibrary.id, seriesId: otherSeries.id });

      expect(moved.libraryId).toBe(otherLibrary.id);
      expect(bookRepository.findAllIdBySeriesId(otherSeries.id)).toEqual([stored.id]);
    });

    it('should move lastModifiedDate past a stored date from a clock running ahead', () => {
      const stored = bookRepository.insert(bookIn('Book'));
      getDatabase()
        .prepare<[string, string]>('UPDATE book SET last_modified_date = ? WHERE id = ?')
        .run('2099-01-01T00:00:00.000Z', stored.id);

      const updated = bookRepository.update(stored);

      expect(updated.lastModifiedDate.toISOString()).toBe('2099-01-01T00:00:00.001Z');
      expect(updated.createdDate).toEqual(stored.createdDate);
    });

    it('should throw NotFoundError for a missing id', () => {
      expect(() => bookRepository.update(bookIn('Ghost'))).toThrow(NotFoundError);
      expect(bookRepository.count()).toBe(0);
    });
  });

  // ===========================================================================
  // Reads
  // ===========================================================================

  describe('find', () => {
    it('should return an existing book by id', () => {
      const book = bookIn('Book');
      bookRepository.insert(book);

      const found = bookRepository.findByIdOrNull(book.id);

      expect(found?.name).toBe('Book');
    });

    it('should return null for a missing id', () => {
      expect(bookRepository.findByIdOrNull('128742')).toBeNull();
    });

    it('should throw from findById for a missing id', () => {
      expect(() => bookRepository.findById('128742')).toThrow(NotFoundError);
    });

    it('should return all books', () => {
      bookRepository.insert(bookIn('1'));
      bookRepository.insert(bookIn('2'));

      expect(bookRepository.findAll()).toHaveLength(2);
    });

    it('should find books by ids and report existence', () => {
      const one = bookRepository.insert(bookIn('1'));
      bookRepository.insert(bookIn('2'));

      expect(bookRepository.findAllByIds([one.id, 'missing']).map((book) => book.name)).toEqual(['1']);
      expect(bookRepository.findAllByIds([])).toEqual([]);
      expect(bookRepository.exists(one.id)).toBe(true);
      expect(bookRepository.exists('missing')).toBe(false);
    });

    it('should find a book by library and url', () => {
      const book = bookRepository.insert(bookIn('1'));

      expect(bookRepository.findByLibraryIdAndUrl(library.id, 'file:/1')?.id).toBe(book.id);
      expect(bookRepository.findByLibraryIdAndUrl(otherLibrary.id, 'file:/1')).toBeNull();
    });

    it('should return the library id of a book', () => {
      const book = bookRepository.insert(bookIn('1', otherSeries));

      expect(bookRepository.getLibraryId(book.id)).toBe(otherLibrary.id);
      expect(bookRepository.getLibraryId('missing')).toBeNull();
    });
  });

  // ===========================================================================
  // Search
  // ===========================================================================

  describe('search', () => {
    it('should return books matching library and series', () => {
      bookRepository.insert(bookIn('1'));
      bookRepository.insert(bookIn('2'));
      bookRepository.insert(bookIn('3', otherSeries));

      const found = bookRepository.findAll({ libraryIds: [library.id], seriesIds: [series.id] });

      expect(found.map((book) => book.name)).toEqual(['1', '2']);
    });

    it('should return nothing when dimensions do not intersect', () => {
      bookRepository.insert(bookIn('1'));
      bookRepository.insert(bookIn('3', otherSeries));

      expect(bookRepository.findAll({ libraryIds: [library.id], seriesIds: [otherSeries.id] })).toEqual([]);
    });

    it('should not filter on empty or absent dimensions', () => {
      bookRepository.insert(bookIn('1'));
      bookRepository.insert(bookIn('2', otherSeries));

      expect(bookRepository.findAll({})).toHaveLength(2);
      expect(bookRepository.findAll({ libraryIds: [], seriesIds: [] })).toHaveLength(2);
      expect(bookRepository.findAll({ libraryIds: [otherLibrary.id], seriesIds: [] }).map((b) => b.name)).toEqual(['2']);
    });

    it('should match names case-insensitively', () => {
      bookRepository.insert(bookIn('The Book'));
      bookRepository.insert(bookIn('Another'));

      expect(bookRepository.findAll({ searchTerm: 'BOOK' }).map((book) => book.name)).toEqual(['The Book']);
    });

    it('should treat LIKE wildcards in the search term literally', () => {
      bookRepository.insert(bookIn('100% Pure'));
      bookRepository.insert(bookIn('1000 Pure'));

      expect(bookRepository.findAll({ searchTerm: '100%' }).map((book) => book.name)).toEqual(['100% Pure']);
    });

    it('should filter by metadata tags', () => {
      const action = bookRepository.insert(bookIn('Action'));
      const drama = bookRepository.insert(bookIn('Drama'));
      bookMetadataRepository.insert(
        makeBookMetadata({ bookId: action.id, title: 'A', number: '1', numberSort: 1, tags: new Set(['action']) })
      );
      bookMetadataRepository.insert(
        makeBookMetadata({ bookId: drama.id, title: 'D', number: '2', numberSort: 2, tags: new Set(['drama']) })
      );

      expect(bookRepository.findAll({ tags: ['action'] }).map((book) => book.name)).toEqual(['Action']);
      expect(bookRepository.findAll({ tags: ['action', 'drama'] })).toHaveLength(2);
    });

    it('should order results by metadata numberSort, then name', () => {
      const second = bookRepository.insert(bookIn('A'));
      const first = bookRepository.insert(bookIn('B'));
      bookRepository.insert(bookIn('C'));
      bookMetadataRepository.insert(makeBookMetadata({ bookId: second.id, title: 'A', number: '2', numberSort: 2 }));
      bookMetadataRepository.insert(makeBookMetadata({ bookId: first.id, title: 'B', number: '1', numberSort: 1 }));

      expect(bookRepository.findAll({ seriesIds: [series.id] }).map((book) => book.name)).toEqual(['B', 'A', 'C']);
    });

    it('should return ids by library', () => {
      const one = bookRepository.insert(bookIn('1'));
      const two = bookRepository.insert(bookIn('2'));
      bookRepository.insert(bookIn('3', otherSeries));

      expect(bookRepository.findAllIdByLibraryId(library.id)).toEqual([one.id, two.id]);
    });

    it('should return ids by series', () => {
      bookRepository.insert(bookIn('1'));
      const other = bookRepository.insert(bookIn('2', otherSeries));

      expect(bookRepository.findAllIdBySeriesId(otherSeries.id)).toEqual([other.id]);
      expect(bookRepository.findBySeriesId(otherSeries.id).map((book) => book.id)).toEqual([other.id]);
    });
  });

  // ===========================================================================
  // Delete
  // ===========================================================================

  describe('delete', () => {
    it('should delete all books and be safe to repeat', () => {
      bookRepository.insert(bookIn('1'));
      bookRepository.insert(bookIn('2'));

      bookRepository.deleteAll();
      expect(bookRepository.count()).toBe(0);

      expect(() => bookRepository.deleteAll()).not.toThrow();
      expect(bookRepository.count()).toBe(0);
    });

    it('should delete one book and ignore missing ids', () => {
      const one = bookRepository.insert(bookIn('1'));
      bookRepository.insert(bookIn('2'));

      bookRepository.delete(one.id);
      bookRepository.delete('missing');

      expect(bookRepository.findAll().map((book) => book.name)).toEqual(['2']);
    });

    it('should delete books by ids and report the count', () => {
      const one = bookRepository.insert(bookIn('1'));
      const two = bookRepository.insert(bookIn('2'));
      bookRepository.insert(bookIn('3'));

      expect(bookRepository.deleteByIds([one.id, two.id, 'missing'])).toBe(2);
      expect(bookRepository.deleteByIds([])).toBe(0);
      expect(bookRepository.count()).toBe(1);
    });

    it('should remove metadata with its book', () => {
      const book = bookRepository.insert(bookIn('1'));
      bookMetadataRepository.insert(makeBookMetadata({ bookId: book.id, title: '1', number: '1', numberSort: 1 }));

      bookRepository.delete(book.id);

      expect(bookMetadataRepository.findByIdOrNull(book.id)).toBeNull();
    });
  });
});
