/**
 * Search Filters
 *
 * A search object is a set of optional dimensions. Each dimension has its
 * own builder that turns its value into a SQL predicate, or into nothing
 * when the value is absent or empty. Predicates are ANDed.
 *
 * To filter on something new, add the field to the search type and a
 * builder to its registry; `satisfies` below makes a missing builder a
 * compile error.
 */

import type { BookSearch, SeriesSearch } from '../../types/catalog.types.js';
import { toSqlList } from './sql-values.js';

// =============================================================================
// Types
// =============================================================================

export interface SqlPredicate {
  clause: string;
  params: unknown[];
}

export type FilterDimension<S> = (search: S) => SqlPredicate | null;

// =============================================================================
// Predicate Helpers
// =============================================================================

/**
 * `column IN (...)`; an empty or absent list means no filter
 */
export function inList(column: string, values: readonly string[] | undefined): SqlPredicate | null {
  if (!values || values.length === 0) {
    return null;
  }
  return {
    clause: `${column} IN (SELECT value FROM json_each(?))`,
    params: [toSqlList(values)],
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Case-insensitive substring match (SQLite LIKE folds ASCII case)
 */
export function contains(column: string, term: string | undefined): SqlPredicate | null {
  const trimmed = term?.trim();
  if (!trimmed) {
    return null;
  }
  return {
    clause: `${column} LIKE ? ESCAPE '\\'`,
    params: [`%${escapeLike(trimmed)}%`],
  };
}

/**
 * Combine every non-empty predicate with AND. An empty clause means
 * "match everything".
 */
export function buildWhere<S>(search: S, dimensions: Record<string, FilterDimension<S>>): SqlPredicate {
  const predicates = Object.values(dimensions)
    .map((dimension) => dimension(search))
    .filter((predicate): predicate is SqlPredicate => predicate !== null);

  return {
    clause: predicates.map((predicate) => `(${predicate.clause})`).join(' AND '),
    params: predicates.flatMap((predicate) => predicate.params),
  };
}

// =============================================================================
// Registries
// =============================================================================

/** Book dimensions; columns are qualified with the `b` alias */
export const BOOK_FILTERS = {
  libraryIds: (search) => inList('b.library_id', search.libraryIds),
  seriesIds: (search) => inList('b.series_id', search.seriesIds),
  searchTerm: (search) => contains('b.name', search.searchTerm),
  tags: (search) => {
    const tags = inList('t.tag', search.tags);
    if (!tags) {
      return null;
    }
    return {
      clause: `EXISTS (SELECT 1 FROM book_metadata_tag t WHERE t.book_id = b.id AND ${tags.clause})`,
      params: tags.params,
    };
  },
} satisfies Record<keyof BookSearch, FilterDimension<BookSearch>>;

/** Series dimensions; columns are qualified with the `s` alias */
export const SERIES_FILTERS = {
  libraryIds: (search) => inList('s.library_id', search.libraryIds),
  searchTerm: (search) => contains('s.name', search.searchTerm),
} satisfies Record<keyof SeriesSearch, FilterDimension<SeriesSearch>>;
