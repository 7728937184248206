/**
 * Cursor-based pagination.
 * The cursor is an opaque base64url string wrapping the sort key.
 */

export interface CursorParams {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginatedResult<T> {
  readonly items: readonly T[];
  readonly nextCursor: string | null;
  readonly hasMore: boolean;
  readonly total?: number | undefined;
}

export const encodeCursor = (value: string): string =>
  Buffer.from(value, "utf8").toString("base64url");

/** Returns null for anything that does not round-trip as base64url */
export const decodeCursor = (cursor: string): string | null => {
  if (cursor.length === 0 || !/^[A-Za-z0-9_-]+$/.test(cursor)) return null;
  const decoded = Buffer.from(cursor, "base64url").toString("utf8");
  return encodeCursor(decoded) === cursor ? decoded : null;
};
