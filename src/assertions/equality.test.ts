import { describe, it, expect } from "vitest";
import { getResult, isEqual } from "./equality.js";
import { bool, list, map, nil, num, str } from "../types/value.js";

describe("isEqual", () => {
  describe("numbers", () => {
    it("compares values", () => {
      expect(isEqual(num(5), num(5))).toBe(true);
      expect(isEqual(num(5), num(6))).toBe(false);
    });

    it("requires matching units", () => {
      expect(isEqual(num(5, "px"), num(5, "px"))).toBe(true);
      expect(isEqual(num(5, "px"), num(5))).toBe(false);
      expect(isEqual(num(5, "px"), num(5, "em"))).toBe(false);
    });

    it("ignores floating point noise", () => {
      expect(isEqual(num(0.1 + 0.2), num(0.3))).toBe(true);
    });
  });

  it("ignores string quoting", () => {
    expect(isEqual(str("bold"), str("bold", false))).toBe(true);
    expect(isEqual(str("bold"), str("Bold"))).toBe(false);
  });

  it("does not coerce across kinds", () => {
    expect(isEqual(num(1), str("1"))).toBe(false);
    expect(isEqual(nil(), bool(false))).toBe(false);
    expect(isEqual(str(""), list([]))).toBe(false);
  });

  it("compares null and booleans", () => {
    expect(isEqual(nil(), nil())).toBe(true);
    expect(isEqual(bool(true), bool(true))).toBe(true);
    expect(isEqual(bool(true), bool(false))).toBe(false);
  });

  describe("lists", () => {
    it("compares items in order", () => {
      expect(isEqual(list([num(1), num(2)]), list([num(1), num(2)]))).toBe(true);
      expect(isEqual(list([num(1), num(2)]), list([num(2), num(1)]))).toBe(false);
      expect(isEqual(list([num(1)]), list([num(1), num(2)]))).toBe(false);
    });

    it("requires the same separator for multiple items", () => {
      expect(isEqual(list([num(1), num(2)], "comma"), list([num(1), num(2)], "space"))).toBe(false);
      expect(isEqual(list([num(1)], "comma"), list([num(1)], "space"))).toBe(true);
    });

    it("compares nested lists", () => {
      const nested = () => list([list([num(1), num(2)], "space"), str("a")]);
      expect(isEqual(nested(), nested())).toBe(true);
      expect(isEqual(nested(), list([list([num(1), num(3)], "space"), str("a")]))).toBe(false);
    });

    it("treats an empty list and an empty map as equal", () => {
      expect(isEqual(list([]), map([]))).toBe(true);
      expect(isEqual(list([], "space"), list([], "comma"))).toBe(true);
    });
  });

  describe("maps", () => {
    it("ignores entry order", () => {
      const a = map([[str("a"), num(1)], [str("b"), num(2)]]);
      const b = map([[str("b"), num(2)], [str("a"), num(1)]]);
      expect(isEqual(a, b)).toBe(true);
    });

    it("gives the same answer in both directions with repeated keys", () => {
      const x = str("x");
      const repeated = map([[x, num(1)], [x, num(1)]]);
      const distinct = map([[x, num(1)], [str("y"), num(2)]]);
      expect(isEqual(repeated, distinct)).toBe(false);
      expect(isEqual(distinct, repeated)).toBe(false);
    });

    it("compares values per key", () => {
      const a = map([[str("a"), num(1)]]);
      expect(isEqual(a, map([[str("a"), num(2)]]))).toBe(false);
      expect(isEqual(a, map([[str("b"), num(1)]]))).toBe(false);
    });
  });
});

describe("getResult", () => {
  it("passes on equality", () => {
    expect(getResult(num(5), num(5))).toBe("pass");
    expect(getResult(num(5), num(6))).toBe("fail");
  });

  it("passes on inequality when inverted", () => {
    expect(getResult(num(5), num(6), true)).toBe("pass");
    expect(getResult(num(5), num(5), true)).toBe("fail");
  });
});
