import { describe, it, expect } from "vitest";
import type { Proc } from "../../../src/core/ast";
import { Env } from "../../../src/core/eval/env";
import { matchFormals, matchPattern } from "../../../src/core/eval/match";
import { VNil, vInt, vList, vMap, vSet, vStr, vTuple, vUri } from "../../../src/core/eval/values";
import { bin, int, list, map, nil, pinned, send, set, str, tuple, un, v, wild } from "../../helpers/terms";

const empty = Env.empty();

function bound(p: Proc, value: Parameters<typeof matchPattern>[1], env = empty) {
  const m = matchPattern(p, value, env);
  return m ? Object.fromEntries(m) : null;
}

describe("matchPattern", () => {
  it("binds variables and ignores wildcards", () => {
    expect(bound(v("x"), vInt(1))).toEqual({ x: vInt(1) });
    expect(bound(wild, vStr("anything"))).toEqual({});
  });

  it("compares literals", () => {
    expect(bound(int(3), vInt(3))).toEqual({});
    expect(bound(int(3), vInt(4))).toBeNull();
    expect(bound(str("a"), vInt(1))).toBeNull();
    expect(bound(nil, VNil)).toEqual({});
  });

  it("requires a repeated variable to bind equal values", () => {
    expect(bound(tuple(v("x"), v("x")), vTuple([vInt(1), vInt(1)]))).toEqual({ x: vInt(1) });
    expect(bound(tuple(v("x"), v("x")), vTuple([vInt(1), vInt(2)]))).toBeNull();
  });

  it("compares pinned variables against the environment", () => {
    const env = Env.from([["expected", vInt(7)]]);
    expect(bound(pinned("expected"), vInt(7), env)).toEqual({});
    expect(bound(pinned("expected"), vInt(8), env)).toBeNull();
    expect(bound(pinned("missing"), vInt(8), env)).toBeNull();
  });

  it("matches simple types", () => {
    const intType: Proc = { tag: "SimpleType", type: "Int" };
    const uriType: Proc = { tag: "SimpleType", type: "Uri" };
    expect(bound(intType, vInt(1))).toEqual({});
    expect(bound(intType, vStr("1"))).toBeNull();
    expect(bound(uriType, vUri("a:b"))).toEqual({});
  });

  it("destructures lists with a remainder", () => {
    const headTail: Proc = { tag: "List", elements: [v("head")], remainder: "tail" };
    expect(bound(headTail, vList([vInt(1), vInt(2), vInt(3)]))).toEqual({
      head: vInt(1),
      tail: vList([vInt(2), vInt(3)]),
    });
    expect(bound(headTail, vList([]))).toBeNull();
    expect(bound(list(v("a")), vList([vInt(1), vInt(2)]))).toBeNull();
  });

  it("matches sets regardless of order", () => {
    expect(bound(set(int(2), v("other")), vSet([vInt(1), vInt(2)]))).toEqual({ other: vInt(1) });
    const withRest: Proc = { tag: "Set", elements: [int(1)], remainder: "rest" };
    expect(bound(withRest, vSet([vInt(1), vInt(5), vInt(6)]))).toEqual({ rest: vSet([vInt(5), vInt(6)]) });
  });

  it("matches maps by entry", () => {
    const value = vMap([
      [vStr("id"), vInt(9)],
      [vStr("name"), vStr("ada")],
    ]);
    expect(bound(map([str("id"), v("id")], [str("name"), wild]), value)).toEqual({ id: vInt(9) });
    const rest: Proc = { tag: "Map", entries: [[str("id"), v("id")]], remainder: "others" };
    expect(bound(rest, value)).toEqual({ id: vInt(9), others: vMap([[vStr("name"), vStr("ada")]]) });
    expect(bound(map([str("id"), v("id")]), value)).toBeNull();
  });

  it("supports connectives", () => {
    const intType: Proc = { tag: "SimpleType", type: "Int" };
    expect(bound(bin("conjunction", intType, v("n")), vInt(4))).toEqual({ n: vInt(4) });
    expect(bound(bin("disjunction", int(1), int(2)), vInt(2))).toEqual({});
    expect(bound(un("negation", int(1)), vInt(2))).toEqual({});
    expect(bound(un("negation", int(1)), vInt(1))).toBeNull();
  });

  it("matches negative literals", () => {
    expect(bound(un("neg", int(3)), vInt(-3))).toEqual({});
  });

  it("compares process patterns against quoted processes", () => {
    const p = send(int(1), int(2));
    expect(bound(p, { tag: "Proc", proc: p, env: empty })).toEqual({});
    expect(bound(p, { tag: "Proc", proc: send(int(1), int(3)), env: empty })).toBeNull();
  });
});

describe("matchFormals", () => {
  it("requires the arity to agree", () => {
    expect(matchFormals([v("a"), v("b")], [vInt(1)], empty)).toBeNull();
  });

  it("binds every formal", () => {
    const m = matchFormals([v("a"), tuple(v("b"), wild)], [vInt(1), vTuple([vInt(2), vInt(3)])], empty);
    expect(m && Object.fromEntries(m)).toEqual({ a: vInt(1), b: vInt(2) });
  });
});
