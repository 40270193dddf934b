import { describe, it, expect, afterEach } from 'vitest';
import { closeDatabase, isDatabaseInitialized, makeLibrary, libraryRepository, openCatalog } from '../index.js';

describe('openCatalog', () => {
  afterEach(() => {
    closeDatabase();
  });

  it('should open an empty catalog', () => {
    const status = openCatalog({ path: ':memory:' });

    expect(isDatabaseInitialized()).toBe(true);
    expect(status).toEqual({ libraries: 0, series: 0, books: 0, bookMetadata: 0 });
  });

  it('should report counts again without a second shutdown hook', () => {
    const listeners = process.listenerCount('beforeExit');

    openCatalog({ path: ':memory:' });
    libraryRepository.insert(makeLibrary());
    const status = openCatalog({ path: ':memory:' });

    expect(status.libraries).toBe(1);
    expect(process.listenerCount('beforeExit')).toBe(listeners + 1);
  });

  it('should close idempotently', () => {
    openCatalog({ path: ':memory:' });

    closeDatabase();
    closeDatabase();

    expect(isDatabaseInitialized()).toBe(false);
  });
});
