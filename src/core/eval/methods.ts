// src/core/eval/methods.ts
// Built-in methods on strings and collections, dispatched by name.

import type { Val } from "./values";
import { typeName, valEq, valKey, valToText, VNil, vBool, vInt, vList, vMap, vSet, vStr, vTuple } from "./values";
import type { Computed } from "./operators";
import { applyBinary, bad, val } from "./operators";
import { indexOutOfBounds, typeMismatch, unknownMethod } from "../../outcome/constructors";

type MethodImpl = {
  arity: number;
  apply: (receiver: Val, args: Val[]) => Computed | undefined;
};

// Returning undefined means the receiver type has no such method.
const METHODS: Record<string, MethodImpl> = {
  length: {
    arity: 0,
    apply: (r) => {
      if (r.tag === "Str") return val(vInt(Array.from(r.s).length));
      if (r.tag === "List" || r.tag === "Tuple") return val(vInt(r.items.length));
      return undefined;
    },
  },

  size: {
    arity: 0,
    apply: (r) => {
      if (r.tag === "Set" || r.tag === "List") return val(vInt(r.items.length));
      if (r.tag === "Map") return val(vInt(r.entries.length));
      return undefined;
    },
  },

  nth: {
    arity: 1,
    apply: (r, [i]) => {
      if (r.tag !== "List" && r.tag !== "Tuple") return undefined;
      if (i.tag !== "Int") return bad(typeMismatch("Int", typeName(i)));
      const item = r.items[i.n];
      return i.n >= 0 && item !== undefined ? val(item) : bad(indexOutOfBounds(i.n));
    },
  },

  toString: {
    arity: 0,
    apply: (r: Val) => val(vStr(valToText(r))),
  },

  slice: {
    arity: 2,
    apply: (r, [from, to]) => {
      if (r.tag !== "Str" && r.tag !== "List") return undefined;
      if (from.tag !== "Int") return bad(typeMismatch("Int", typeName(from)));
      if (to.tag !== "Int") return bad(typeMismatch("Int", typeName(to)));
      const items = r.tag === "Str" ? Array.from(r.s) : r.items;
      if (from.n < 0 || from.n > items.length) return bad(indexOutOfBounds(from.n));
      if (to.n < from.n || to.n > items.length) return bad(indexOutOfBounds(to.n));
      return r.tag === "Str"
        ? val(vStr(Array.from(r.s).slice(from.n, to.n).join("")))
        : val(vList(r.items.slice(from.n, to.n)));
    },
  },

  keys: {
    arity: 0,
    apply: (r) => (r.tag === "Map" ? val(vSet(r.entries.map(([k]) => k))) : undefined),
  },

  get: {
    arity: 1,
    apply: (r, [key]) => (r.tag === "Map" ? val(lookup(r.entries, key) ?? VNil) : undefined),
  },

  getOrElse: {
    arity: 2,
    apply: (r, [key, fallback]) => (r.tag === "Map" ? val(lookup(r.entries, key) ?? fallback) : undefined),
  },

  set: {
    arity: 2,
    apply: (r, [key, value]) => (r.tag === "Map" ? val(vMap([...r.entries, [key, value]])) : undefined),
  },

  add: {
    arity: 1,
    apply: (r, [item]) => (r.tag === "Set" ? val(vSet([...r.items, item])) : undefined),
  },

  delete: {
    arity: 1,
    apply: (r, [item]) => {
      const key = valKey(item);
      if (r.tag === "Set") return val(vSet(r.items.filter((x) => valKey(x) !== key)));
      if (r.tag === "Map") return val(vMap(r.entries.filter(([k]) => valKey(k) !== key)));
      return undefined;
    },
  },

  contains: {
    arity: 1,
    apply: (r, [item]) => {
      if (r.tag === "Set" || r.tag === "List") return val(vBool(r.items.some((x) => valEq(x, item))));
      if (r.tag === "Map") return val(vBool(lookup(r.entries, item) !== undefined));
      return undefined;
    },
  },

  union: {
    arity: 1,
    apply: (r, [other]) => {
      if (r.tag === "Set") {
        return other.tag === "Set" ? val(vSet([...r.items, ...other.items])) : bad(typeMismatch("Set", typeName(other)));
      }
      if (r.tag === "Map") {
        return other.tag === "Map"
          ? val(vMap([...r.entries, ...other.entries]))
          : bad(typeMismatch("Map", typeName(other)));
      }
      return undefined;
    },
  },

  diff: {
    arity: 1,
    apply: (r, [other]) => (r.tag === "Set" || r.tag === "Map" ? applyBinary("diff", r, other) : undefined),
  },

  toList: {
    arity: 0,
    apply: (r) => {
      if (r.tag === "List" || r.tag === "Set" || r.tag === "Tuple") return val(vList(r.items));
      if (r.tag === "Map") return val(vList(r.entries.map(([k, v]) => vTuple([k, v]))));
      return undefined;
    },
  },

  toSet: {
    arity: 0,
    apply: (r) => (r.tag === "List" || r.tag === "Set" || r.tag === "Tuple" ? val(vSet(r.items)) : undefined),
  },
};

function lookup(entries: Array<[Val, Val]>, key: Val): Val | undefined {
  const k = valKey(key);
  return entries.find(([ek]) => valKey(ek) === k)?.[1];
}

export function methodNames(): string[] {
  return Object.keys(METHODS);
}

export function callMethod(name: string, receiver: Val, args: Val[]): Computed {
  const impl = Object.prototype.hasOwnProperty.call(METHODS, name) ? METHODS[name] : undefined;
  if (!impl) return bad(unknownMethod(name, typeName(receiver)));
  if (args.length !== impl.arity) {
    return bad(typeMismatch(`${impl.arity} argument(s) to ${name}`, String(args.length)));
  }
  return impl.apply(receiver, args) ?? bad(unknownMethod(name, typeName(receiver)));
}
