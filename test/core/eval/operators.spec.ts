import { describe, it, expect } from "vitest";
import { applyBinary, applyUnary, collect, interpolate } from "../../../src/core/eval/operators";
import type { Computed } from "../../../src/core/eval/operators";
import type { Val } from "../../../src/core/eval/values";
import { VNil, vBool, vInt, vList, vMap, vSet, vStr, vTuple } from "../../../src/core/eval/values";

function value(c: Computed): Val {
  if (c.tag !== "Val") throw new Error(`expected a value, got ${c.failure.message}`);
  return c.v;
}

function reason(c: Computed): string {
  if (c.tag !== "Fail") throw new Error("expected a failure");
  return c.failure.reason;
}

describe("arithmetic", () => {
  it("adds, subtracts and multiplies integers", () => {
    expect(value(applyBinary("add", vInt(2), vInt(3)))).toEqual(vInt(5));
    expect(value(applyBinary("sub", vInt(2), vInt(3)))).toEqual(vInt(-1));
    expect(value(applyBinary("mult", vInt(4), vInt(3)))).toEqual(vInt(12));
  });

  it("divides toward zero", () => {
    expect(value(applyBinary("div", vInt(7), vInt(2)))).toEqual(vInt(3));
    expect(value(applyBinary("div", vInt(-7), vInt(2)))).toEqual(vInt(-3));
    expect(value(applyBinary("mod", vInt(7), vInt(3)))).toEqual(vInt(1));
  });

  it("fails on division by zero", () => {
    expect(reason(applyBinary("div", vInt(1), vInt(0)))).toBe("division-by-zero");
    expect(reason(applyBinary("mod", vInt(1), vInt(0)))).toBe("division-by-zero");
  });

  it("fails when a result leaves the safe integer range", () => {
    expect(reason(applyBinary("add", vInt(9007199254740992), vInt(1)))).toBe("integer-overflow");
    expect(reason(applyBinary("mult", vInt(4294967296), vInt(4294967296)))).toBe("integer-overflow");
    expect(reason(applyBinary("sub", vInt(-Number.MAX_SAFE_INTEGER), vInt(1)))).toBe("integer-overflow");
    expect(value(applyBinary("add", vInt(Number.MAX_SAFE_INTEGER - 1), vInt(1)))).toEqual(vInt(Number.MAX_SAFE_INTEGER));
  });

  it("names the operator in an overflow failure", () => {
    const c = applyBinary("mult", vInt(4294967296), vInt(4294967296));
    expect(c.tag === "Fail" && c.failure.message).toBe("Integer overflow in mult");
    expect(c.tag === "Fail" && c.failure.diagnostics.map((d) => d.code)).toEqual(["E0202"]);
  });

  it("rejects non-integers", () => {
    const c = applyBinary("add", vInt(1), vStr("x"));
    expect(c.tag === "Fail" && c.failure.message).toBe("Type mismatch: expected Int, got String");
  });
});

describe("comparison and equality", () => {
  it("compares integers and strings", () => {
    expect(value(applyBinary("lt", vInt(1), vInt(2)))).toEqual(vBool(true));
    expect(value(applyBinary("gte", vInt(2), vInt(2)))).toEqual(vBool(true));
    expect(value(applyBinary("gt", vStr("a"), vStr("b")))).toEqual(vBool(false));
  });

  it("refuses mixed comparisons", () => {
    expect(reason(applyBinary("lt", vInt(1), vStr("1")))).toBe("type-error");
  });

  it("tests structural equality", () => {
    expect(value(applyBinary("eq", vList([vInt(1)]), vList([vInt(1)])))).toEqual(vBool(true));
    expect(value(applyBinary("neq", vSet([vInt(1), vInt(2)]), vSet([vInt(2), vInt(1)])))).toEqual(vBool(false));
  });
});

describe("logic", () => {
  it("negates booleans", () => {
    expect(value(applyUnary("not", vBool(true)))).toEqual(vBool(false));
    expect(reason(applyUnary("not", vInt(1)))).toBe("type-error");
  });

  it("negates integers", () => {
    expect(value(applyUnary("neg", vInt(4)))).toEqual(vInt(-4));
  });

  it("combines booleans with connectives", () => {
    expect(value(applyBinary("conjunction", vBool(true), vBool(false)))).toEqual(vBool(false));
    expect(value(applyBinary("disjunction", vBool(true), vBool(false)))).toEqual(vBool(true));
    expect(value(applyBinary("or", vBool(false), vBool(false)))).toEqual(vBool(false));
  });
});

describe("collections", () => {
  it("concatenates strings and lists", () => {
    expect(value(applyBinary("concat", vStr("ab"), vStr("cd")))).toEqual(vStr("abcd"));
    expect(value(applyBinary("concat", vList([vInt(1)]), vList([vInt(2)])))).toEqual(vList([vInt(1), vInt(2)]));
    expect(reason(applyBinary("concat", vStr("a"), vList([])))).toBe("type-error");
  });

  it("takes set and map differences", () => {
    expect(value(applyBinary("diff", vSet([vInt(1), vInt(2), vInt(3)]), vSet([vInt(2)])))).toEqual(
      vSet([vInt(1), vInt(3)])
    );
    const m = vMap([
      [vStr("a"), vInt(1)],
      [vStr("b"), vInt(2)],
    ]);
    expect(value(applyBinary("diff", m, vMap([[vStr("a"), VNil]])))).toEqual(vMap([[vStr("b"), vInt(2)]]));
  });

  it("builds collections from operands", () => {
    expect(value(collect("TUPLE", [vInt(1), vInt(2)]))).toEqual(vTuple([vInt(1), vInt(2)]));
    expect(value(collect("SET", [vInt(2), vInt(1), vInt(2)]))).toEqual(vSet([vInt(1), vInt(2)]));
    expect(value(collect("MAP", [vStr("k"), vInt(1)]))).toEqual(vMap([[vStr("k"), vInt(1)]]));
  });

  it("merges a remainder", () => {
    expect(value(collect("LIST", [vInt(1)], vList([vInt(2), vInt(3)])))).toEqual(vList([vInt(1), vInt(2), vInt(3)]));
    expect(reason(collect("LIST", [vInt(1)], vInt(2)))).toBe("type-error");
  });
});

describe("interpolate", () => {
  it("fills known placeholders and leaves the rest", () => {
    const bindings = vMap([
      [vStr("name"), vStr("World")],
      [vStr("n"), vInt(3)],
    ]);
    expect(value(interpolate(vStr("Hello ${name}, ${n} ${other}"), bindings))).toEqual(vStr("Hello World, 3 ${other}"));
  });

  it("needs a string and a map", () => {
    expect(reason(interpolate(vInt(1), vMap([])))).toBe("type-error");
    expect(reason(interpolate(vStr(""), vList([])))).toBe("type-error");
  });
});
