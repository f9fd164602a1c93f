// src/core/eval/match.ts
// Structural pattern matching of values against process-term patterns.
// Failure is "no match" (null), never an error.

import type { Proc } from "../ast";
import type { Env } from "./env";
import type { Val } from "./values";
import { valEq, valKey, vList, vMap, vSet } from "./values";

export type MatchBindings = Map<string, Val>;

/**
 * Match a list of formals against a payload. Arity must agree.
 */
export function matchFormals(formals: Proc[], payload: Val[], env: Env): MatchBindings | null {
  if (formals.length !== payload.length) return null;
  let acc: MatchBindings | null = new Map();
  for (let i = 0; i < formals.length && acc; i++) {
    acc = matchPattern(formals[i], payload[i], env, acc);
  }
  return acc;
}

export function matchPattern(
  p: Proc,
  v: Val,
  env: Env,
  acc: MatchBindings = new Map()
): MatchBindings | null {
  switch (p.tag) {
    case "Wildcard":
      return acc;

    case "Var": {
      const prev = acc.get(p.name);
      if (prev === undefined) {
        const next = new Map(acc);
        next.set(p.name, v);
        return next;
      }
      return valEq(prev, v) ? acc : null;
    }

    case "VarRef": {
      const pinned = env.get(p.name);
      return pinned !== undefined && valEq(pinned, v) ? acc : null;
    }

    case "Nil":
      return v.tag === "Nil" ? acc : null;
    case "Unit":
      return v.tag === "Unit" ? acc : null;
    case "Bool":
      return v.tag === "Bool" && v.b === p.value ? acc : null;
    case "Int":
      return v.tag === "Int" && v.n === p.value ? acc : null;
    case "Str":
      return v.tag === "Str" && v.s === p.value ? acc : null;
    case "Uri":
      return v.tag === "Uri" && v.uri === p.value ? acc : null;

    case "SimpleType":
      switch (p.type) {
        case "Bool":
          return v.tag === "Bool" ? acc : null;
        case "Int":
          return v.tag === "Int" ? acc : null;
        case "String":
          return v.tag === "Str" ? acc : null;
        case "Uri":
          return v.tag === "Uri" ? acc : null;
      }
      return null;

    case "Tuple": {
      if (v.tag !== "Tuple" || v.items.length !== p.elements.length) return null;
      return matchSequence(p.elements, v.items, env, acc);
    }

    case "List": {
      if (v.tag !== "List") return null;
      if (p.remainder === undefined) {
        if (v.items.length !== p.elements.length) return null;
        return matchSequence(p.elements, v.items, env, acc);
      }
      if (v.items.length < p.elements.length) return null;
      const head = matchSequence(p.elements, v.items.slice(0, p.elements.length), env, acc);
      return head ? bindRemainder(p.remainder, vList(v.items.slice(p.elements.length)), head) : null;
    }

    case "Set": {
      if (v.tag !== "Set") return null;
      if (p.remainder === undefined && v.items.length !== p.elements.length) return null;
      return matchUnordered(p.elements, v.items, env, acc, (rest, bound) =>
        p.remainder === undefined ? bound : bindRemainder(p.remainder, vSet(rest), bound)
      );
    }

    case "Map": {
      if (v.tag !== "Map") return null;
      if (p.remainder === undefined && v.entries.length !== p.entries.length) return null;
      const entryPatterns: Proc[] = p.entries.map(([k, x]) => ({ tag: "Tuple", elements: [k, x] }));
      const entryValues: Val[] = v.entries.map(([k, x]) => ({ tag: "Tuple", items: [k, x] }));
      return matchUnordered(entryPatterns, entryValues, env, acc, (rest, bound) => {
        if (p.remainder === undefined) return bound;
        const restEntries: Array<[Val, Val]> = [];
        for (const t of rest) {
          if (t.tag === "Tuple" && t.items.length === 2) restEntries.push([t.items[0], t.items[1]]);
        }
        return bindRemainder(p.remainder, vMap(restEntries), bound);
      });
    }

    case "Binary":
      if (p.op === "conjunction") {
        const left = matchPattern(p.left, v, env, acc);
        return left ? matchPattern(p.right, v, env, left) : null;
      }
      if (p.op === "disjunction") {
        return matchPattern(p.left, v, env, acc) ?? matchPattern(p.right, v, env, acc);
      }
      return matchQuoted(p, v, acc);

    case "Unary":
      if (p.op === "negation") {
        return matchPattern(p.arg, v, env, acc) === null ? acc : null;
      }
      if (p.op === "neg" && p.arg.tag === "Int") {
        return v.tag === "Int" && v.n === -p.arg.value ? acc : null;
      }
      return matchQuoted(p, v, acc);

    default:
      return matchQuoted(p, v, acc);
  }
}

function matchSequence(patterns: Proc[], values: Val[], env: Env, acc: MatchBindings): MatchBindings | null {
  let cur: MatchBindings | null = acc;
  for (let i = 0; i < patterns.length && cur; i++) {
    cur = matchPattern(patterns[i], values[i], env, cur);
  }
  return cur;
}

/**
 * Assign each pattern a distinct value (values in canonical order, first fit
 * with backtracking), then hand the unused values to `finish`.
 */
function matchUnordered(
  patterns: Proc[],
  values: Val[],
  env: Env,
  acc: MatchBindings,
  finish: (rest: Val[], bound: MatchBindings) => MatchBindings | null
): MatchBindings | null {
  const used = new Array<boolean>(values.length).fill(false);

  const go = (i: number, cur: MatchBindings): MatchBindings | null => {
    if (i === patterns.length) {
      return finish(values.filter((_, idx) => !used[idx]), cur);
    }
    for (let j = 0; j < values.length; j++) {
      if (used[j]) continue;
      const next = matchPattern(patterns[i], values[j], env, cur);
      if (!next) continue;
      used[j] = true;
      const result = go(i + 1, next);
      if (result) return result;
      used[j] = false;
    }
    return null;
  };

  return go(0, acc);
}

function bindRemainder(name: string, rest: Val, acc: MatchBindings): MatchBindings | null {
  const prev = acc.get(name);
  if (prev !== undefined) return valEq(prev, rest) ? acc : null;
  const next = new Map(acc);
  next.set(name, rest);
  return next;
}

/** Process-shaped patterns compare structurally against quoted processes. */
function matchQuoted(p: Proc, v: Val, acc: MatchBindings): MatchBindings | null {
  if (v.tag !== "Proc") return null;
  return valKey(v) === valKey({ tag: "Proc", proc: p, env: v.env }) ? acc : null;
}

