/**
 * Cursor-based pagination over position-ordered lists.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, p: position }.
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

interface CursorData {
  readonly f: string;
  readonly p: number;
}

export function encodeCursor(field: string, position: number): string {
  const data: CursorData = { f: field, p: position };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into its field name and last seen position.
 *
 * @returns undefined if the cursor is malformed
 */
export function decodeCursor(
  cursor: string,
): { field: string; position: number } | undefined {
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
    typeof data.f === "string" &&
    "p" in data &&
    typeof data.p === "number" &&
    Number.isInteger(data.p)
  ) {
    return { field: data.f, position: data.p };
  }
  return undefined;
}

/**
 * Apply cursor-based pagination to a list sorted by ascending position.
 *
 * A cursor minted for another field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  positionOf: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const after = decoded.position;
      filtered = filtered.filter((item) => positionOf(item) > after);
    }
  }

  // One extra item tells whether another page exists
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data.at(-1);
  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, positionOf(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
