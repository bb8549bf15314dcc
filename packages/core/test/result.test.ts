import { describe, it, expect } from "vitest";
import { Ok, Err, isOk, isErr, map, mapErr, andThen, unwrap, all } from "../src/result.js";
import type { Result } from "../src/result.js";

describe("Result", () => {
  describe("constructors and guards", () => {
    it("Ok wraps a value", () => {
      const result = Ok(42);
      expect(result).toEqual({ ok: true, value: 42 });
      expect(isOk(result)).toBe(true);
      expect(isErr(result)).toBe(false);
    });

    it("Err wraps an error", () => {
      const result = Err("boom");
      expect(result).toEqual({ ok: false, error: "boom" });
      expect(isOk(result)).toBe(false);
      expect(isErr(result)).toBe(true);
    });
  });

  describe("map / mapErr", () => {
    it("maps the success value", () => {
      expect(map(Ok(2), (n) => n * 3)).toEqual(Ok(6));
    });

    it("leaves failures alone in map", () => {
      const failed: Result<number, string> = Err("nope");
      expect(map(failed, (n) => n * 3)).toEqual(Err("nope"));
    });

    it("re-types the error in mapErr", () => {
      const failed: Result<number, string> = Err("missing");
      const mapped = mapErr(failed, (e) => new Error(`wrapped: ${e}`));
      expect(mapped.ok).toBe(false);
      if (mapped.ok) return;
      expect(mapped.error.message).toBe("wrapped: missing");
    });

    it("leaves successes alone in mapErr", () => {
      const good: Result<number, string> = Ok(1);
      expect(mapErr(good, (e) => e.length)).toEqual(Ok(1));
    });
  });

  describe("andThen", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`);

    it("chains successful steps", () => {
      expect(andThen(andThen(Ok(8), half), half)).toEqual(Ok(2));
    });

    it("stops at the first failure", () => {
      expect(andThen(andThen(Ok(6), half), half)).toEqual(Err("3 is odd"));
    });
  });

  describe("unwrap", () => {
    it("returns the value", () => {
      expect(unwrap(Ok("x"))).toBe("x");
    });

    it("throws the error", () => {
      expect(() => unwrap(Err(new Error("kaput")))).toThrow("kaput");
    });
  });

  describe("all", () => {
    it("collects values in order", () => {
      expect(all([Ok(1), Ok(2), Ok(3)])).toEqual(Ok([1, 2, 3]));
    });

    it("returns the first error", () => {
      const results: Result<number, string>[] = [Ok(1), Err("second"), Err("third")];
      expect(all(results)).toEqual(Err("second"));
    });

    it("is Ok for an empty list", () => {
      expect(all([])).toEqual(Ok([]));
    });
  });
});
