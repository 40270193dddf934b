/**
 * Library Cleanup Service
 *
 * Removes catalog entities together with everything that depends on them.
 * Dependents go first, all inside one transaction:
 *
 * 1. Book metadata (with authors and tags)
 * 2. Books
 * 3. Series
 * 4. Library
 *
 * Either every step commits or none does. The schema also declares
 * cascades, so the explicit order only matters for reporting counts and
 * for stores opened without foreign-key enforcement.
 */

import { runInTransaction } from '../database.service.js';
import { logDebug, logInfo } from '../logger.service.js';
import { bookMetadataRepository } from '../persistence/book-metadata.repository.js';
import { bookRepository } from '../persistence/book.repository.js';
import { libraryRepository } from '../persistence/library.repository.js';
import { seriesRepository } from '../persistence/series.repository.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Result of a single cleanup step with statistics.
 */
export interface CleanupStepResult {
  stepName: string;
  itemsProcessed: number;
  durationMs: number;
}

export interface RemovalResult {
  target: 'library' | 'series' | 'books';
  id: string;
  totalDurationMs: number;
  steps: CleanupStepResult[];
  totalItemsProcessed: number;
}

// =============================================================================
// Steps
// =============================================================================

function runStep(stepName: string, work: () => number): CleanupStepResult {
  const startTime = Date.now();
  const itemsProcessed = work();
  const durationMs = Date.now() - startTime;
  logDebug('library-cleanup', `${stepName}: removed ${itemsProcessed}`, { durationMs });
  return { stepName, itemsProcessed, durationMs };
}

function removeBookSteps(bookIds: string[]): CleanupStepResult[] {
  return [
    runStep('Book metadata', () => bookMetadataRepository.deleteByBookIds(bookIds)),
    runStep('Books', () => bookRepository.deleteByIds(bookIds)),
  ];
}

function summarize(target: RemovalResult['target'], id: string, startTime: number, steps: CleanupStepResult[]): RemovalResult {
  const result: RemovalResult = {
    target,
    id,
    totalDurationMs: Date.now() - startTime,
    steps,
    totalItemsProcessed: steps.reduce((sum, step) => sum + step.itemsProcessed, 0),
  };

  logInfo('library-cleanup', `Removed ${target} ${id}`, {
    durationMs: result.totalDurationMs,
    totalItemsProcessed: result.totalItemsProcessed,
  });

  return result;
}

// =============================================================================
// Removal Functions
// =============================================================================

/**
 * Remove books and their metadata
 */
export function removeBooks(bookIds: readonly string[]): RemovalResult {
  const startTime = Date.now();
  const ids = [...bookIds];

  const steps = runInTransaction({ entity: 'book', operation: 'remove' }, () => removeBookSteps(ids));

  return summarize('books', ids.join(','), startTime, steps);
}

/**
 * Remove a series with its books and their metadata.
 * Unknown series ids remove nothing.
 */
export function removeSeries(seriesId: string): RemovalResult {
  const startTime = Date.now();

  const steps = runInTransaction({ entity: 'series', operation: 'remove', id: seriesId }, () => {
    const bookIds = bookRepository.findAllIdBySeriesId(seriesId);
    return [
      ...removeBookSteps(bookIds),
      runStep('Series', () => seriesRepository.deleteByIds([seriesId])),
    ];
  });

  return summarize('series', seriesId, startTime, steps);
}

/**
 * Remove a library with all its series, books and book metadata.
 * Unknown library ids remove nothing.
 */
export function removeLibrary(libraryId: string): RemovalResult {
  const startTime = Date.now();

  const steps = runInTransaction({ entity: 'library', operation: 'remove', id: libraryId }, () => {
    const bookIds = bookRepository.findAllIdByLibraryId(libraryId);
    const seriesIds = seriesRepository.findByLibraryId(libraryId).map((series) => series.id);
    return [
      ...removeBookSteps(bookIds),
      runStep('Series', () => seriesRepository.deleteByIds(seriesIds)),
      runStep('Library', () => libraryRepository.deleteByIds([libraryId])),
    ];
  });

  return summarize('library', libraryId, startTime, steps);
}
