/**
 * Cursor-based pagination over id-ordered rows.
 *
 * Cursors are base64url-encoded JSON objects: { f: "id", v: lastSeenId }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
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

const CURSOR_FIELD = "id";

export function encodeCursor(id: number): string {
  return Buffer.from(JSON.stringify({ f: CURSOR_FIELD, v: id })).toString("base64url");
}

/**
 * Decode a cursor into the last seen id.
 *
 * @returns The id, or undefined if the cursor is invalid.
 */
export function decodeCursor(cursor: string): number | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (
    typeof data === "object" &&
    data !== null &&
    "f" in data &&
    "v" in data &&
    data.f === CURSOR_FIELD &&
    typeof data.v === "number" &&
    Number.isSafeInteger(data.v)
  ) {
    return data.v;
  }
  return undefined;
}

/**
 * Apply cursor-based pagination to rows.
 *
 * Rows are ordered by ascending id; an invalid cursor restarts at the
 * first page.
 */
export function paginate<T extends { readonly id: number }>(
  items: readonly T[],
  query: PaginationQuery,
): PaginatedResponse<T> {
  const sorted = [...items].sort((a, b) => a.id - b.id);

  let filtered: readonly T[] = sorted;
  if (query.cursor !== undefined) {
    const afterId = decodeCursor(query.cursor);
    if (afterId !== undefined) {
      filtered = sorted.filter((item) => item.id > afterId);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data[data.length - 1];
  const cursor = hasMore && last !== undefined ? encodeCursor(last.id) : null;

  return { data, pagination: { cursor, hasMore } };
}
