/**
 * Series Repository
 *
 * Deleting a series removes its books (and their metadata) through the
 * schema's cascade rules. `libraryId` is fixed at insert; an update that
 * supplies another library keeps the stored one.
 */

import type { Series, SeriesSearch } from '../../types/catalog.types.js';
import { SeriesSchema } from '../../schemas/catalog.schemas.js';
import { runStatement } from '../database.service.js';
import { seriesLogger } from '../logger.service.js';
import { EntityStore, type AuditedRow, type EntityMapping } from './entity-store.js';
import { buildWhere, SERIES_FILTERS } from './search-filters.js';
import { fromSqlDate, toSqlDate } from './sql-values.js';

interface SeriesRow extends AuditedRow {
  name: string;
  url: string;
  file_last_modified: string;
  library_id: string;
}

const seriesMapping: EntityMapping<Series, SeriesRow> = {
  kind: 'series',
  table: 'series',
  columns: ['id', 'name', 'url', 'file_last_modified', 'library_id', 'created_date', 'last_modified_date'],
  // a series never changes library
  immutableColumns: ['library_id'],
  schema: SeriesSchema,
  toRow: (series, dates) => ({
    id: series.id,
    name: series.name,
    url: series.url,
    file_last_modified: toSqlDate(series.fileLastModified),
    library_id: series.libraryId,
    created_date: toSqlDate(dates.createdDate),
    last_modified_date: toSqlDate(dates.lastModifiedDate),
  }),
  fromRow: (row) => ({
    id: row.id,
    name: row.name,
    url: row.url,
    fileLastModified: fromSqlDate(row.file_last_modified),
    libraryId: row.library_id,
    createdDate: fromSqlDate(row.created_date),
    lastModifiedDate: fromSqlDate(row.last_modified_date),
  }),
};

export class SeriesRepository extends EntityStore<Series, SeriesRow> {
  constructor() {
    super(seriesMapping, seriesLogger);
  }

  findByLibraryId(libraryId: string): Series[] {
    return this.search({ libraryIds: [libraryId] });
  }

  findByLibraryIdAndUrl(libraryId: string, url: string): Series | null {
    const [found] = this.selectWhere('find', 'library_id = ? AND url = ?', [libraryId, url]);
    return found ?? null;
  }

  /**
   * Series matching every set dimension, ordered by name
   */
  search(search: SeriesSearch): Series[] {
    const where = buildWhere(search, SERIES_FILTERS);
    const sql = `SELECT s.* FROM series s${where.clause ? ` WHERE ${where.clause}` : ''} ORDER BY s.name, s.id`;

    const rows = runStatement(this.context('search'), (db) =>
      db.prepare<unknown[], SeriesRow>(sql).all(...where.params)
    );
    return rows.map((row) => this.mapping.fromRow(row));
  }
}

export const seriesRepository = new SeriesRepository();
