export interface RecentChangesQuery {
  limit: number;
  days: number;
  /**
   * Pins the reference date. Without it the service evaluates `date(today)`
   * itself.
   */
  today?: Date;
}

/**
 * Builds the Dataview (DQL) table query listing files modified in the last
 * `days` days, newest first.
 */
export function buildRecentChangesQuery({
  limit,
  days,
  today
}: RecentChangesQuery): string {
  const reference = today
    ? `date(${today.toISOString().slice(0, 10)})`
    : 'date(today)';
  return [
    'TABLE file.mtime',
    `WHERE file.mtime >= ${reference} - dur(${days} days)`,
    'SORT file.mtime DESC',
    `LIMIT ${limit}`
  ].join('\n');
}
