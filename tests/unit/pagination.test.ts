import { describe, expect, it } from "vitest";
import { decodeCursor, encodeCursor } from "../../src/core/types/pagination.js";

describe("cursor encoding", () => {
  it("decodes what it encodes", () => {
    const cursor = encodeCursor("1700000000000|abc");
    expect(decodeCursor(cursor)).toBe("1700000000000|abc");
  });

  it("produces url-safe cursors", () => {
    expect(encodeCursor("??>>")).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it("rejects garbage", () => {
    expect(decodeCursor("")).toBeNull();
    expect(decodeCursor("not a cursor!")).toBeNull();
  });
});
