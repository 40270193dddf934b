/**
 * Metadata Lock Service
 *
 * Applies refreshed metadata while keeping user edits: a field whose lock
 * flag is set keeps its current value, every other field takes the
 * patch's value. Lock flags are only changed through setFieldLocks.
 */

import {
  METADATA_FIELDS,
  type Author,
  type BookMetadata,
  type BookMetadataPatch,
  type BookMetadataValues,
  type LockFlagName,
  type MetadataField,
} from '../../types/catalog.types.js';
import { runInTransaction } from '../database.service.js';
import { bookMetadataRepository } from '../persistence/book-metadata.repository.js';
import { metadataLogger as logger } from '../logger.service.js';

// =============================================================================
// Types
// =============================================================================

export interface MetadataPatchResult {
  metadata: BookMetadata;
  /** Fields whose value changed */
  changed: MetadataField[];
  /** Fields the patch would have changed but that are locked */
  skipped: MetadataField[];
}

export type FieldLocks = Partial<Record<MetadataField, boolean>>;

// =============================================================================
// Field Helpers
// =============================================================================

export const LOCK_FLAGS: { [F in MetadataField]: LockFlagName<F> } = {
  title: 'titleLock',
  summary: 'summaryLock',
  number: 'numberLock',
  numberSort: 'numberSortLock',
  releaseDate: 'releaseDateLock',
  authors: 'authorsLock',
  tags: 'tagsLock',
};

export function isFieldLocked(metadata: BookMetadata, field: MetadataField): boolean {
  return metadata[LOCK_FLAGS[field]];
}

type FieldValue = BookMetadataValues[MetadataField];

function authorsEqual(a: Author[], b: Author[]): boolean {
  return a.length === b.length && a.every((author, i) => author.name === b[i].name && author.role === b[i].role);
}

function tagsEqual(a: Set<string>, b: Set<string>): boolean {
  return a.size === b.size && [...a].every((tag) => b.has(tag));
}

function valuesEqual(a: FieldValue, b: FieldValue): boolean {
  if (a instanceof Set && b instanceof Set) {
    return tagsEqual(a, b);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return authorsEqual(a, b);
  }
  return a === b;
}

function assignField<F extends MetadataField>(target: BookMetadataValues, field: F, value: BookMetadataValues[F]): void {
  target[field] = value;
}

function copyValue<V extends FieldValue>(value: V): V;
function copyValue(value: FieldValue): FieldValue {
  if (value instanceof Set) {
    return new Set(value);
  }
  if (Array.isArray(value)) {
    return value.map((author) => ({ ...author }));
  }
  return value;
}

// =============================================================================
// Patch Application
// =============================================================================

/**
 * Compute the metadata that results from applying `patch` to `current`.
 * Does not touch storage.
 */
export function applyMetadataPatch(current: BookMetadata, patch: BookMetadataPatch): MetadataPatchResult {
  const next: BookMetadata = {
    ...current,
    authors: copyValue(current.authors),
    tags: copyValue(current.tags),
  };
  const changed: MetadataField[] = [];
  const skipped: MetadataField[] = [];

  for (const field of METADATA_FIELDS) {
    const value = patch[field];
    if (value === undefined) {
      continue;
    }

    if (isFieldLocked(current, field)) {
      if (!valuesEqual(current[field], value)) {
        skipped.push(field);
      }
      continue;
    }

    if (!valuesEqual(current[field], value)) {
      assignField(next, field, copyValue(value));
      changed.push(field);
    }
  }

  return { metadata: next, changed, skipped };
}

/**
 * Read a book's metadata, apply the patch and persist the result in one
 * transaction.
 * Nothing is written when no unlocked field changes.
 */
export function refreshBookMetadata(bookId: string, patch: BookMetadataPatch): MetadataPatchResult {
  const refreshed = runInTransaction({ entity: 'book_metadata', operation: 'refresh', id: bookId }, () => {
    const current = bookMetadataRepository.findById(bookId);
    const result = applyMetadataPatch(current, patch);

    if (result.changed.length === 0) {
      return { ...result, metadata: current };
    }
    return { ...result, metadata: bookMetadataRepository.update(result.metadata) };
  });

  if (refreshed.changed.length === 0) {
    logger.debug({ bookId, skipped: refreshed.skipped }, 'Metadata refresh made no changes');
  } else {
    logger.info({ bookId, changed: refreshed.changed, skipped: refreshed.skipped }, 'Metadata refreshed');
  }
  return refreshed;
}

/**
 * Set or clear lock flags for the given fields, leaving values and other
 * locks unchanged.
 */
export function setFieldLocks(bookId: string, locks: FieldLocks): BookMetadata {
  const current = bookMetadataRepository.findById(bookId);
  const next: BookMetadata = { ...current };

  for (const field of METADATA_FIELDS) {
    const locked = locks[field];
    if (locked !== undefined) {
      next[LOCK_FLAGS[field]] = locked;
    }
  }

  const stored = bookMetadataRepository.update(next);
  logger.debug({ bookId, locks }, 'Metadata locks updated');
  return stored;
}
