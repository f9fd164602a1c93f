// src/core/eval/operators.ts
// Value computations of the terminal OPERATING / NEGATING / CONJOINING /
// DISJOINING / INTERPOLATING / COLLECTING states.

import type { BinaryOp, UnaryOp } from "../ast";
import type { Failure } from "../../outcome/failure";
import type { CollectionKind } from "./machine";
import type { Val } from "./values";
import { typeName, valEq, valKey, valToText, vBool, vInt, vList, vMap, vSet, vStr, vTuple } from "./values";
import { divisionByZero, integerOverflow, typeMismatch } from "../../outcome/constructors";

export type Computed = { tag: "Val"; v: Val } | { tag: "Fail"; failure: Failure };

export const val = (v: Val): Computed => ({ tag: "Val", v });
export const bad = (failure: Failure): Computed => ({ tag: "Fail", failure });

function wrongType(expected: string, v: Val): Computed {
  return bad(typeMismatch(expected, typeName(v)));
}

/** Integers stay within the range a double represents exactly. */
function checked(op: string, n: number): Computed {
  return Number.isSafeInteger(n) ? val(vInt(n)) : bad(integerOverflow(op));
}

export function applyUnary(op: UnaryOp, v: Val): Computed {
  switch (op) {
    case "not":
    case "negation":
      return v.tag === "Bool" ? val(vBool(!v.b)) : wrongType("Bool", v);
    case "neg":
      return v.tag === "Int" ? val(vInt(-v.n)) : wrongType("Int", v);
  }
}

/**
 * Every binary operator except `matches` (whose right side is a pattern and
 * is never evaluated). `and`/`or` arrive here only when not short-circuited.
 */
export function applyBinary(op: Exclude<BinaryOp, "matches">, l: Val, r: Val): Computed {
  switch (op) {
    case "eq":
      return val(vBool(valEq(l, r)));
    case "neq":
      return val(vBool(!valEq(l, r)));

    case "and":
    case "or":
    case "conjunction":
    case "disjunction": {
      if (l.tag !== "Bool") return wrongType("Bool", l);
      if (r.tag !== "Bool") return wrongType("Bool", r);
      const both = op === "and" || op === "conjunction";
      return val(vBool(both ? l.b && r.b : l.b || r.b));
    }

    case "lt":
    case "lte":
    case "gt":
    case "gte": {
      const cmp = compare(l, r);
      if (cmp.tag === "Fail") return cmp;
      const c = cmp.n;
      const ok = op === "lt" ? c < 0 : op === "lte" ? c <= 0 : op === "gt" ? c > 0 : c >= 0;
      return val(vBool(ok));
    }

    case "add":
    case "sub":
    case "mult":
    case "div":
    case "mod": {
      if (l.tag !== "Int") return wrongType("Int", l);
      if (r.tag !== "Int") return wrongType("Int", r);
      switch (op) {
        case "add":
          return checked(op, l.n + r.n);
        case "sub":
          return checked(op, l.n - r.n);
        case "mult":
          return checked(op, l.n * r.n);
        case "div":
          return r.n === 0 ? bad(divisionByZero()) : val(vInt(Math.trunc(l.n / r.n)));
        case "mod":
          return r.n === 0 ? bad(divisionByZero()) : val(vInt(l.n % r.n));
      }
      break;
    }

    case "concat":
      if (l.tag === "Str" && r.tag === "Str") return val(vStr(l.s + r.s));
      if (l.tag === "List" && r.tag === "List") return val(vList([...l.items, ...r.items]));
      if (l.tag === "Str" || l.tag === "List") return wrongType(typeName(l), r);
      return wrongType("String or List", l);

    case "diff":
      if (l.tag === "Set" && r.tag === "Set") {
        const drop = new Set(r.items.map(valKey));
        return val(vSet(l.items.filter((x) => !drop.has(valKey(x)))));
      }
      if (l.tag === "Map" && r.tag === "Map") {
        const drop = new Set(r.entries.map(([k]) => valKey(k)));
        return val(vMap(l.entries.filter(([k]) => !drop.has(valKey(k)))));
      }
      if (l.tag === "Set" || l.tag === "Map") return wrongType(typeName(l), r);
      return wrongType("Set or Map", l);

    case "interpolate":
      return interpolate(l, r);
  }
  return wrongType("operand", l);
}

function compare(l: Val, r: Val): { tag: "Cmp"; n: number } | { tag: "Fail"; failure: Failure } {
  if (l.tag === "Int" && r.tag === "Int") return { tag: "Cmp", n: l.n - r.n };
  if (l.tag === "Str" && r.tag === "Str") return { tag: "Cmp", n: l.s < r.s ? -1 : l.s > r.s ? 1 : 0 };
  if (l.tag === "Int" || l.tag === "Str") return { tag: "Fail", failure: typeMismatch(typeName(l), typeName(r)) };
  return { tag: "Fail", failure: typeMismatch("Int or String", typeName(l)) };
}

/**
 * `"Hello ${name}" %% {"name": "World"}`: each `${key}` whose key is a
 * string key of the map is replaced by the text of its value; other
 * placeholders are left as written.
 */
export function interpolate(template: Val, bindings: Val): Computed {
  if (template.tag !== "Str") return wrongType("String", template);
  if (bindings.tag !== "Map") return wrongType("Map", bindings);
  const lookup = new Map<string, string>();
  for (const [k, v] of bindings.entries) {
    if (k.tag === "Str") lookup.set(k.s, valToText(v));
  }
  const out = template.s.replace(/\$\{([^}]*)\}/g, (whole, key: string) => lookup.get(key) ?? whole);
  return val(vStr(out));
}

/**
 * Build a collection from evaluated operands. Maps take operands as
 * alternating keys and values. A trailing remainder value, when present,
 * is merged in.
 */
export function collect(kind: CollectionKind, operands: Val[], remainder?: Val): Computed {
  switch (kind) {
    case "TUPLE":
      return val(vTuple(operands));
    case "LIST":
      if (remainder === undefined) return val(vList(operands));
      if (remainder.tag !== "List") return wrongType("List", remainder);
      return val(vList([...operands, ...remainder.items]));
    case "SET":
      if (remainder === undefined) return val(vSet(operands));
      if (remainder.tag !== "Set") return wrongType("Set", remainder);
      return val(vSet([...operands, ...remainder.items]));
    case "MAP": {
      const entries: Array<[Val, Val]> = [];
      for (let i = 0; i + 1 < operands.length; i += 2) {
        entries.push([operands[i], operands[i + 1]]);
      }
      if (remainder === undefined) return val(vMap(entries));
      if (remainder.tag !== "Map") return wrongType("Map", remainder);
      return val(vMap([...remainder.entries, ...entries]));
    }
  }
}
