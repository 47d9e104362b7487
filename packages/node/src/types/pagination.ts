/**
 * Cursor-based pagination.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: lastKey }.
 * Keys are the positive integer ids and journal positions lists are
 * ordered by. List endpoints return { data, pagination: { cursor, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(field: string, key: number): string {
  return Buffer.from(JSON.stringify({ f: field, v: key })).toString("base64url");
}

/**
 * @returns The last seen key, or undefined if the cursor is malformed or
 *   was issued for another field.
 */
export function decodeCursor(cursor: string, field: string): number | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null) return undefined;
  if (!("f" in data) || !("v" in data)) return undefined;
  if (data.f !== field || typeof data.v !== "number" || !Number.isSafeInteger(data.v)) {
    return undefined;
  }
  return data.v;
}

/**
 * Page through items sorted ascending by `getKey`.
 *
 * A malformed cursor restarts from the first item.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => number,
  field: string,
): PaginatedResponse<T> {
  let remaining = items;

  if (query.cursor !== undefined) {
    const after = decodeCursor(query.cursor, field);
    if (after !== undefined) {
      remaining = remaining.filter((item) => getKey(item) > after);
    }
  }

  // Fetch one extra to detect hasMore
  const page = remaining.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(field, getKey(last)) : null,
      hasMore,
    },
  };
}
