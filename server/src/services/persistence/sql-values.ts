/**
 * Conversions between domain values and SQLite column values.
 */

export function toSqlDate(date: Date): string {
  return date.toISOString();
}

export function fromSqlDate(value: string): Date {
  return new Date(value);
}

export function toSqlBoolean(value: boolean): number {
  return value ? 1 : 0;
}

export function fromSqlBoolean(value: number): boolean {
  return value !== 0;
}

/**
 * Encode a list for `IN (SELECT value FROM json_each(?))`, which keeps the
 * statement at one bound parameter whatever the list length.
 */
export function toSqlList(values: readonly string[]): string {
  return JSON.stringify(values);
}

/**
 * SQL expression for a new modification date: `param` when it is later than
 * the stored `column`, else the stored value plus one millisecond. Keeps
 * modification dates moving forward across processes whose clocks disagree.
 * Both sides are ISO-8601 UTC strings, which order lexically.
 */
export function laterTimestamp(column: string, param: string): string {
  return (
    `CASE WHEN ${param} > ${column} THEN ${param} ` +
    `ELSE strftime('%Y-%m-%dT%H:%M:%fZ', ${column}, '+0.001 seconds') END`
  );
}
