import { describe, it, expect } from "vitest";

import {
  createPaginationMeta,
  decodeCursor,
  encodeCursor,
  validateCursor,
} from "../../../src/utils/pagination.js";

describe("utils/pagination", () => {
  describe("cursors", () => {
    it("should decode what it encodes", () => {
      const cursor = encodeCursor({ sortValue: 41, id: 41, direction: "forward" });

      expect(cursor).not.toMatch(/[+/=]/);
      expect(decodeCursor(cursor)).toEqual({
        sortValue: 41,
        id: 41,
        direction: "forward",
      });
    });

    it("should accept string sort values", () => {
      const cursor = encodeCursor({
        sortValue: "2024-06-05T17:00:00.000Z",
        id: 3,
        direction: "backward",
      });

      expect(decodeCursor(cursor)?.sortValue).toBe("2024-06-05T17:00:00.000Z");
    });

    it.each([
      ["garbage", "not-a-cursor"],
      ["JSON of the wrong shape", Buffer.from('{"id":"7"}').toString("base64url")],
      [
        "an unknown direction",
        Buffer.from('{"sortValue":1,"id":1,"direction":"sideways"}').toString(
          "base64url"
        ),
      ],
    ])("should reject %s", (_label, cursor) => {
      expect(decodeCursor(cursor)).toBeNull();
    });

    it("should treat a missing or empty cursor as the first page", () => {
      expect(validateCursor(undefined)).toBeNull();
      expect(validateCursor("")).toBeNull();
    });
  });

  describe("createPaginationMeta", () => {
    const runs = [{ id: 9 }, { id: 8 }, { id: 7 }];

    it("should point the cursor at the last item when more remain", () => {
      const meta = createPaginationMeta(runs, 3, "id", true);

      expect(meta).toEqual({
        cursor: encodeCursor({ sortValue: 7, id: 7, direction: "forward" }),
        hasMore: true,
        limit: 3,
        total: undefined,
      });
    });

    it("should return no cursor on the last page", () => {
      expect(createPaginationMeta(runs, 5, "id", false, 3)).toEqual({
        cursor: null,
        hasMore: false,
        limit: 5,
        total: 3,
      });
    });

    it("should return no cursor for an empty page", () => {
      expect(createPaginationMeta([], 20, "id", true).cursor).toBeNull();
    });

    it("should fall back to the id for non-scalar sort values", () => {
      const items = [{ id: 4, startedAt: new Date(0) }];

      const meta = createPaginationMeta(items, 1, "startedAt", true);

      expect(decodeCursor(meta.cursor ?? "")).toEqual({
        sortValue: 4,
        id: 4,
        direction: "forward",
      });
    });
  });
});
