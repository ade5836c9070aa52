/**
 * Unit tests for Result utilities, ID generation and sorted JSON.
 */
import { describe, expect, it } from "vitest";

import { generateBlankNodeId, generateId } from "../src/utils/id";
import {
  attempt,
  err,
  flatMap,
  isErr,
  isOk,
  map,
  mapErr,
  ok,
  orElse,
  type Result,
  unwrap,
  unwrapOr,
} from "../src/utils/result";
import { sortedJsonStringify } from "../src/utils/sorted-json";

function half(value: number): Result<number, string> {
  if (value % 2 !== 0) return err(`${value} is odd`);
  return ok(value / 2);
}

describe("result utilities", () => {
  it("ok and err build tagged results", () => {
    expect(ok(42)).toEqual({ success: true, data: 42 });
    expect(err("bad")).toEqual({ success: false, error: "bad" });
  });

  it("isOk and isErr narrow", () => {
    expect(isOk(half(4))).toBe(true);
    expect(isErr(half(3))).toBe(true);
  });

  it("unwrap returns data or throws the error", () => {
    expect(unwrap(half(8))).toBe(4);
    const failure = err(new Error("nope"));
    expect(() => unwrap(failure)).toThrow("nope");
  });

  it("unwrapOr falls back on failure", () => {
    expect(unwrapOr(half(3), 0)).toBe(0);
    expect(unwrapOr(half(6), 0)).toBe(3);
  });

  it("map and mapErr transform one side", () => {
    expect(map(half(4), (n) => n * 10)).toEqual({ success: true, data: 20 });
    expect(mapErr(half(5), (message) => message.length)).toEqual({
      success: false,
      error: 8,
    });
  });

  it("flatMap chains and orElse recovers", () => {
    expect(flatMap(half(8), half)).toEqual({ success: true, data: 2 });
    expect(flatMap(half(6), half)).toEqual({ success: false, error: "3 is odd" });
    expect(orElse(half(3), () => ok(0))).toEqual({ success: true, data: 0 });
  });

  describe("attempt", () => {
    it("captures mapped errors", () => {
      const result = attempt(
        () => {
          throw new RangeError("out of range");
        },
        (error) => (error instanceof RangeError ? error.message : undefined),
      );
      expect(result).toEqual({ success: false, error: "out of range" });
    });

    it("rethrows errors the mapper declines", () => {
      expect(() =>
        attempt(
          () => {
            throw new TypeError("wrong");
          },
          () => undefined,
        ),
      ).toThrow(TypeError);
    });

    it("wraps successful values", () => {
      expect(attempt(() => 7, () => "never")).toEqual({ success: true, data: 7 });
    });
  });
});

describe("id generation", () => {
  it("generates distinct operation IDs", () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateId()));
    expect(ids.size).toBe(50);
  });

  it("generates Turtle-safe blank node labels", () => {
    const id = generateBlankNodeId();
    expect(id).toMatch(/^_:b[0-9a-z]{8}$/);
  });
});

describe("sortedJsonStringify", () => {
  it("sorts keys at every depth", () => {
    expect(sortedJsonStringify({ b: 1, a: { d: [{ z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}',
    );
  });

  it("keeps array order", () => {
    expect(sortedJsonStringify([3, 1, 2])).toBe("[3,1,2]");
  });
});
