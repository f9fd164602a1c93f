// src/core/eval/values.ts
// Runtime values exchanged on channels and bound in environments.

import type { Proc } from "../ast";
import { freeVars } from "../ast";
import type { Env } from "./env";

/**
 * Caps: what a holder of an unforgeable name may do with it.
 * Bundles narrow these; nothing widens them.
 */
export type Caps = { read: boolean; write: boolean };

export const FULL_CAPS: Caps = { read: true, write: true };

export type Val =
  | { tag: "Nil" }
  | { tag: "Unit" }
  | { tag: "Bool"; b: boolean }
  | { tag: "Int"; n: number }
  | { tag: "Str"; s: string }
  | { tag: "Uri"; uri: string }
  | { tag: "Chan"; id: string; caps: Caps }
  | { tag: "List"; items: Val[] }
  | { tag: "Tuple"; items: Val[] }
  | { tag: "Set"; items: Val[] }
  | { tag: "Map"; entries: Array<[Val, Val]> }
  | ProcVal;

/** A quoted process together with the environment it closes over. */
export type ProcVal = { tag: "Proc"; proc: Proc; env: Env };

export type ValTag = Val["tag"];
export type ValOf<T extends ValTag> = Extract<Val, { tag: T }>;

export const VNil: Val = { tag: "Nil" };
export const VUnit: Val = { tag: "Unit" };
export const VTrue: Val = { tag: "Bool", b: true };
export const VFalse: Val = { tag: "Bool", b: false };

export function vBool(b: boolean): Val {
  return b ? VTrue : VFalse;
}

export function vInt(n: number): Val {
  return { tag: "Int", n };
}

export function vStr(s: string): Val {
  return { tag: "Str", s };
}

export function vUri(uri: string): Val {
  return { tag: "Uri", uri };
}

export function vChan(id: string, caps: Caps = FULL_CAPS): Val {
  return { tag: "Chan", id, caps };
}

export function vList(items: Val[]): Val {
  return { tag: "List", items };
}

export function vTuple(items: Val[]): Val {
  return { tag: "Tuple", items };
}

/** Build a canonical set: unique by key, ordered by key. */
export function vSet(items: Val[]): Val {
  const byKey = new Map<string, Val>();
  for (const item of items) byKey.set(valKey(item), item);
  return { tag: "Set", items: sortedByKey(byKey) };
}

/** Build a canonical map: later entries win, ordered by key. */
export function vMap(entries: Array<[Val, Val]>): Val {
  const byKey = new Map<string, [Val, Val]>();
  for (const entry of entries) byKey.set(valKey(entry[0]), entry);
  const keys = Array.from(byKey.keys()).sort();
  const out: Array<[Val, Val]> = [];
  for (const k of keys) {
    const entry = byKey.get(k);
    if (entry) out.push(entry);
  }
  return { tag: "Map", entries: out };
}

function sortedByKey(byKey: Map<string, Val>): Val[] {
  const keys = Array.from(byKey.keys()).sort();
  const out: Val[] = [];
  for (const k of keys) {
    const v = byKey.get(k);
    if (v) out.push(v);
  }
  return out;
}

// ─────────────────────────────────────────────────────────────────
// Canonical keys, equality, rendering
// ─────────────────────────────────────────────────────────────────

/**
 * Canonical key: equal values have equal keys. A Chan's capabilities are not
 * part of its identity. A quoted process is keyed by its term together with
 * the values its free variables take in the captured environment.
 */
export function valKey(v: Val): string {
  switch (v.tag) {
    case "Nil":
      return "N";
    case "Unit":
      return "U";
    case "Bool":
      return v.b ? "B1" : "B0";
    case "Int":
      return `I${v.n}`;
    case "Str":
      return `S${JSON.stringify(v.s)}`;
    case "Uri":
      return `R${JSON.stringify(v.uri)}`;
    case "Chan":
      return `C${v.id}`;
    case "List":
      return `L[${v.items.map(valKey).join(",")}]`;
    case "Tuple":
      return `T(${v.items.map(valKey).join(",")})`;
    case "Set":
      return `E{${v.items.map(valKey).join(",")}}`;
    case "Map":
      return `M{${v.entries.map(([k, x]) => `${valKey(k)}:${valKey(x)}`).join(",")}}`;
    case "Proc":
      return `P${JSON.stringify(v.proc)}${closureKey(v)}`;
  }
}

function closureKey(v: ProcVal): string {
  const captured = freeVars(v.proc).flatMap((name) => {
    const bound = v.env.get(name);
    return bound === undefined ? [] : [`${name}=${valKey(bound)}`];
  });
  return captured.length === 0 ? "" : `{${captured.join(";")}}`;
}

export function valEq(a: Val, b: Val): boolean {
  return valKey(a) === valKey(b);
}

/** Human-readable rendering, close to the source language's notation. */
export function showVal(v: Val): string {
  switch (v.tag) {
    case "Nil":
      return "Nil";
    case "Unit":
      return "()";
    case "Bool":
      return v.b ? "true" : "false";
    case "Int":
      return String(v.n);
    case "Str":
      return JSON.stringify(v.s);
    case "Uri":
      return `\`${v.uri}\``;
    case "Chan":
      return capsPrefix(v.caps) + `#${v.id}`;
    case "List":
      return `[${v.items.map(showVal).join(", ")}]`;
    case "Tuple":
      return `(${v.items.map(showVal).join(", ")}${v.items.length === 1 ? "," : ""})`;
    case "Set":
      return `Set(${v.items.map(showVal).join(", ")})`;
    case "Map":
      return `{${v.entries.map(([k, x]) => `${showVal(k)}: ${showVal(x)}`).join(", ")}}`;
    case "Proc":
      return `@{${v.proc.tag}}`;
  }
}

function capsPrefix(caps: Caps): string {
  if (caps.read && caps.write) return "";
  if (caps.write) return "bundle+ ";
  if (caps.read) return "bundle- ";
  return "bundle0 ";
}

/** Plain-text form used by toString and string interpolation. */
export function valToText(v: Val): string {
  if (v.tag === "Str") return v.s;
  if (v.tag === "Uri") return v.uri;
  return showVal(v);
}

export function typeName(v: Val): string {
  switch (v.tag) {
    case "Str":
      return "String";
    case "Chan":
      return "Name";
    default:
      return v.tag;
  }
}

/** True when the value (transitively) contains no process closure. */
export function isGround(v: Val): boolean {
  switch (v.tag) {
    case "Proc":
      return false;
    case "List":
    case "Tuple":
    case "Set":
      return v.items.every(isGround);
    case "Map":
      return v.entries.every(([k, x]) => isGround(k) && isGround(x));
    default:
      return true;
  }
}

/**
 * JSON-friendly projection of a value, used by run reports and the CLI.
 */
export type ValJson =
  | null
  | boolean
  | number
  | string
  | ValJson[]
  | { [key: string]: ValJson };

export function valToJson(v: Val): ValJson {
  switch (v.tag) {
    case "Nil":
    case "Unit":
      return null;
    case "Bool":
      return v.b;
    case "Int":
      return v.n;
    case "Str":
      return v.s;
    case "Uri":
      return { uri: v.uri };
    case "Chan":
      return { name: v.id };
    case "List":
    case "Tuple":
    case "Set":
      return v.items.map(valToJson);
    case "Map": {
      const out: { [key: string]: ValJson } = {};
      for (const [k, x] of v.entries) out[valToText(k)] = valToJson(x);
      return out;
    }
    case "Proc":
      return { process: v.proc.tag };
  }
}
