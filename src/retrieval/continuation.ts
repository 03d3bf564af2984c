import { ValidationError } from './errors.js';

/**
 * Position after the last row of a page: the sort column plus a unique
 * tiebreak, either a text id or an insertion sequence (SQLite rowid)
 */
export interface KeysetCursor {
  sortKey: string;
  id: string | number;
}

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 500;

export function encodeContinuationToken(cursor: KeysetCursor): string {
  return Buffer.from(JSON.stringify([cursor.sortKey, cursor.id]), 'utf8').toString('base64url');
}

export function decodeContinuationToken(token: string): KeysetCursor {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch {
    throw new ValidationError(['Invalid continuation token']);
  }
  if (!Array.isArray(parsed) || parsed.length !== 2) {
    throw new ValidationError(['Invalid continuation token']);
  }
  const [sortKey, id]: unknown[] = parsed;
  if (typeof sortKey !== 'string' || !(typeof id === 'string' || Number.isSafeInteger(id))) {
    throw new ValidationError(['Invalid continuation token']);
  }
  return { sortKey, id: typeof id === 'number' ? id : String(id) };
}

export function decodeSequenceCursor(token: string): { sortKey: string; seq: number } {
  const { sortKey, id } = decodeContinuationToken(token);
  if (typeof id !== 'number') {
    throw new ValidationError(['Invalid continuation token']);
  }
  return { sortKey, seq: id };
}

export function pageSize(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_PAGE_SIZE;
  return Math.min(Math.max(Math.floor(limit), 1), MAX_PAGE_SIZE);
}

/**
 * Rows were fetched with `limit + 1`; the extra row only signals another page
 */
export function toPage<Row, Item>(
  rows: Row[],
  limit: number,
  map: (row: Row) => Item,
  cursorOf: (row: Row) => KeysetCursor
): { items: Item[]; continuationToken: string | null } {
  const hasMore = rows.length > limit;
  const pageRows = hasMore ? rows.slice(0, limit) : rows;
  const last = pageRows[pageRows.length - 1];
  return {
    items: pageRows.map(map),
    continuationToken: hasMore && last !== undefined ? encodeContinuationToken(cursorOf(last)) : null,
  };
}
