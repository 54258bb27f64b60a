/**
 * Cursor-based pagination utilities
 */

import { isRecord } from "./guards.js";

export interface CursorPayload {
  sortValue: string | number;
  id: number;
  direction: "forward" | "backward";
}

export interface PaginationMeta {
  cursor: string | null;
  hasMore: boolean;
  limit: number;
  total?: number;
}

/**
 * Encode cursor payload to base64url string
 */
export function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(JSON.stringify(payload)).toString("base64url");
}

/**
 * Decode base64url cursor string to payload
 */
export function decodeCursor(cursor: string): CursorPayload | null {
  try {
    const decoded = Buffer.from(cursor, "base64url").toString("utf-8");
    const payload: unknown = JSON.parse(decoded);
    return isCursorPayload(payload) ? payload : null;
  } catch {
    return null;
  }
}

function isCursorPayload(value: unknown): value is CursorPayload {
  return (
    isRecord(value) &&
    (typeof value.sortValue === "string" ||
      typeof value.sortValue === "number") &&
    typeof value.id === "number" &&
    (value.direction === "forward" || value.direction === "backward")
  );
}

/**
 * Create pagination meta from results
 */
export function createPaginationMeta<T extends { id: number }>(
  items: T[],
  limit: number,
  sortField: keyof T,
  hasMore: boolean,
  total?: number
): PaginationMeta {
  let cursor: string | null = null;

  const lastItem = items[items.length - 1];
  if (hasMore && lastItem !== undefined) {
    const sortValue = lastItem[sortField];
    cursor = encodeCursor({
      sortValue:
        typeof sortValue === "string" || typeof sortValue === "number"
          ? sortValue
          : lastItem.id,
      id: lastItem.id,
      direction: "forward",
    });
  }

  return {
    cursor,
    hasMore,
    limit,
    total,
  };
}

/**
 * Validate cursor and extract payload
 */
export function validateCursor(
  cursor: string | undefined
): CursorPayload | null {
  if (!cursor) {
    return null;
  }

  return decodeCursor(cursor);
}
