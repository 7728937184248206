import { describe, expect, it } from "vitest";
import { err, flatMap, ok, tryCatch, tryCatchAsync } from "../../src/core/types/result.js";

describe("Result", () => {
  it("ok wraps a value", () => {
    const r = ok(42);
    expect(r.ok).toBe(true);
    expect(r.value).toBe(42);
  });

  it("err wraps an error", () => {
    const r = err("boom");
    expect(r.ok).toBe(false);
    expect(r.error).toBe("boom");
  });

  it("flatMap chains fallible steps", () => {
    const half = (n: number) => (n % 2 === 0 ? ok(n / 2) : err("odd"));
    expect(flatMap(ok(8), half)).toEqual({ ok: true, value: 4 });
    expect(flatMap(ok(3), half)).toEqual({ ok: false, error: "odd" });
  });

  it("tryCatch captures thrown errors", () => {
    const boom = new Error("boom");
    expect(tryCatch(() => 5)).toEqual({ ok: true, value: 5 });
    expect(
      tryCatch(() => {
        throw boom;
      }),
    ).toEqual({ ok: false, error: boom });
  });

  it("tryCatchAsync captures rejections", async () => {
    expect(await tryCatchAsync(async () => "x")).toEqual({ ok: true, value: "x" });
    const r = await tryCatchAsync(() => Promise.reject(new Error("nope")));
    expect(r.ok).toBe(false);
  });
});
