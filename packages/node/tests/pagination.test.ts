/**
 * Tests for pagination utilities: encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import {
  encodeCursor,
  decodeCursor,
  paginate,
} from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("decodes what encodeCursor produced", () => {
    expect(decodeCursor(encodeCursor("sequence", 12))).toEqual({
      field: "sequence",
      value: 12,
    });
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined when the value is not a number", () => {
    const stringValue = Buffer.from(JSON.stringify({ f: "sequence", v: "12" })).toString(
      "base64url",
    );
    expect(decodeCursor(stringValue)).toBeUndefined();
  });

  it("returns undefined when decoded JSON lacks required fields", () => {
    const missingV = Buffer.from(JSON.stringify({ f: "ok" })).toString("base64url");
    expect(decodeCursor(missingV)).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

describe("paginate", () => {
  const items = [1, 2, 3, 9, 10, 11].map((n) => ({ n }));
  const key = (item: { n: number }): number => item.n;

  it("returns everything when it fits on one page", () => {
    expect(paginate(items, { limit: 10 }, key, "n")).toEqual({
      data: items,
      pagination: { cursor: null, hasMore: false },
    });
  });

  it("walks pages in numeric order", () => {
    const first = paginate(items, { limit: 3 }, key, "n");
    expect(first.data.map(key)).toEqual([1, 2, 3]);
    expect(first.pagination.hasMore).toBe(true);
    expect(first.pagination.cursor).toBe(encodeCursor("n", 3));

    const second = paginate(
      items,
      { limit: 3, cursor: first.pagination.cursor ?? undefined },
      key,
      "n",
    );
    expect(second.data.map(key)).toEqual([9, 10, 11]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores a cursor issued for another field", () => {
    const page = paginate(items, { limit: 2, cursor: encodeCursor("other", 9) }, key, "n");
    expect(page.data.map(key)).toEqual([1, 2]);
  });

  it("ignores a malformed cursor", () => {
    const page = paginate(items, { limit: 2, cursor: "%%%" }, key, "n");
    expect(page.data.map(key)).toEqual([1, 2]);
  });
});
