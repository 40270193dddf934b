/**
 * Audit clock.
 *
 * Every timestamp handed out is strictly later than the previous one, so an
 * update can never reuse the lastModifiedDate it replaces, even within the
 * same millisecond. Storage keeps millisecond precision.
 */

let lastIssued = 0;

export function nextTimestamp(): Date {
  const now = Date.now();
  lastIssued = now > lastIssued ? now : lastIssued + 1;
  return new Date(lastIssued);
}
