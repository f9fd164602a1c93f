// src/core/codec/decode.ts
// JSON exchange format: process terms as produced by the parser, and values
// supplied from outside a run.

import {
  array,
  boolean,
  getDotPath,
  lazy,
  literal,
  minLength,
  null_,
  number,
  object,
  optional,
  picklist,
  pipe,
  safeInteger,
  safeParse,
  strictObject,
  string,
  transform,
  tuple,
  union,
  variant,
  type BaseIssue,
  type GenericSchema,
} from "valibot";
import type { BinaryOp, BundleMode, Proc, SimpleTypeName, UnaryOp } from "../ast";
import type { Val } from "../eval/values";
import { VNil, vBool, vChan, vInt, vList, vMap, vSet, vStr, vTuple, vUri } from "../eval/values";
import { DecodeError } from "../errors";

// ─────────────────────────────────────────────────────────────────
// Process terms
// ─────────────────────────────────────────────────────────────────

const SIMPLE_TYPES = ["Bool", "Int", "String", "Uri"] as const satisfies readonly SimpleTypeName[];
const BUNDLE_MODES = ["read", "write", "equiv", "readWrite"] as const satisfies readonly BundleMode[];
const UNARY_OPS = ["not", "neg", "negation"] as const satisfies readonly UnaryOp[];
const BINARY_OPS = [
  "or",
  "and",
  "matches",
  "eq",
  "neq",
  "lt",
  "lte",
  "gt",
  "gte",
  "concat",
  "diff",
  "add",
  "sub",
  "interpolate",
  "mult",
  "div",
  "mod",
  "disjunction",
  "conjunction",
] as const satisfies readonly BinaryOp[];

export const ProcSchema: GenericSchema<unknown, Proc> = lazy(() => ProcVariant);

const SourceSchema = variant("tag", [
  object({ tag: literal("Simple"), channel: ProcSchema }),
  object({ tag: literal("ReceiveSend"), channel: ProcSchema }),
  object({ tag: literal("SendReceive"), channel: ProcSchema, inputs: array(ProcSchema) }),
]);

const BindSchema = object({
  kind: optional(picklist(["linear", "repeated", "peek"]), "linear"),
  patterns: array(ProcSchema),
  source: SourceSchema,
});

/** A receipt is one bind, or several joined with `&`. */
const ReceiptSchema = union([
  pipe(
    BindSchema,
    transform((bind) => [bind])
  ),
  pipe(array(BindSchema), minLength(1)),
]);

const ProcVariant = variant("tag", [
  object({ tag: literal("Nil") }),
  object({ tag: literal("Unit") }),
  object({ tag: literal("Bool"), value: boolean() }),
  object({ tag: literal("Int"), value: pipe(number(), safeInteger()) }),
  object({ tag: literal("Str"), value: string() }),
  object({ tag: literal("Uri"), value: string() }),
  object({ tag: literal("SimpleType"), type: picklist(SIMPLE_TYPES) }),
  object({ tag: literal("List"), elements: array(ProcSchema), remainder: optional(string()) }),
  object({ tag: literal("Set"), elements: array(ProcSchema), remainder: optional(string()) }),
  object({ tag: literal("Tuple"), elements: array(ProcSchema) }),
  object({
    tag: literal("Map"),
    entries: array(tuple([ProcSchema, ProcSchema])),
    remainder: optional(string()),
  }),
  object({ tag: literal("Var"), name: string() }),
  object({ tag: literal("Wildcard") }),
  object({ tag: literal("VarRef"), name: string() }),
  object({ tag: literal("Ref"), name: string(), mode: picklist(["copy", "move"]) }),
  object({ tag: literal("Par"), procs: array(ProcSchema) }),
  object({
    tag: literal("New"),
    decls: array(object({ name: string(), uri: optional(string()) })),
    body: ProcSchema,
  }),
  object({
    tag: literal("Send"),
    channel: ProcSchema,
    inputs: array(ProcSchema),
    persistent: optional(boolean(), false),
  }),
  object({ tag: literal("SendSync"), channel: ProcSchema, inputs: array(ProcSchema), cont: optional(ProcSchema) }),
  object({ tag: literal("For"), receipts: array(ReceiptSchema), body: ProcSchema }),
  object({ tag: literal("Contract"), channel: ProcSchema, formals: array(ProcSchema), body: ProcSchema }),
  object({ tag: literal("If"), cond: ProcSchema, then: ProcSchema, else: optional(ProcSchema) }),
  object({
    tag: literal("Match"),
    expr: ProcSchema,
    cases: array(object({ pattern: ProcSchema, body: ProcSchema })),
  }),
  object({
    tag: literal("Select"),
    branches: array(object({ patterns: array(ProcSchema), channel: ProcSchema, body: ProcSchema })),
  }),
  object({ tag: literal("Bundle"), mode: picklist(BUNDLE_MODES), body: ProcSchema }),
  object({
    tag: literal("Let"),
    bindings: array(object({ pattern: ProcSchema, value: ProcSchema })),
    body: ProcSchema,
    concurrent: optional(boolean(), false),
  }),
  object({ tag: literal("Eval"), name: ProcSchema }),
  object({ tag: literal("Method"), receiver: ProcSchema, name: string(), args: array(ProcSchema) }),
  object({ tag: literal("Unary"), op: picklist(UNARY_OPS), arg: ProcSchema }),
  object({ tag: literal("Binary"), op: picklist(BINARY_OPS), left: ProcSchema, right: ProcSchema }),
]);

// ─────────────────────────────────────────────────────────────────
// Values
// ─────────────────────────────────────────────────────────────────

/**
 * Values in JSON: null, booleans, integers and strings stand for themselves,
 * arrays are lists, and tagged objects carry the rest.
 *
 * @example
 * decodeValue({ map: [["k", 1]] }) // {"k": 1}
 * decodeValue({ name: "ack" })     // the unforgeable name ack
 */
export const ValueSchema: GenericSchema<unknown, Val> = lazy(() => ValueUnion);

const ValueUnion = union([
  pipe(
    null_(),
    transform(() => VNil)
  ),
  pipe(boolean(), transform(vBool)),
  pipe(number(), safeInteger(), transform(vInt)),
  pipe(string(), transform(vStr)),
  pipe(array(ValueSchema), transform(vList)),
  pipe(
    strictObject({ uri: string() }),
    transform((o) => vUri(o.uri))
  ),
  pipe(
    strictObject({ name: string() }),
    transform((o) => vChan(o.name))
  ),
  pipe(
    strictObject({ tuple: array(ValueSchema) }),
    transform((o) => vTuple(o.tuple))
  ),
  pipe(
    strictObject({ set: array(ValueSchema) }),
    transform((o) => vSet(o.set))
  ),
  pipe(
    strictObject({ map: array(tuple([ValueSchema, ValueSchema])) }),
    transform((o) => vMap(o.map))
  ),
]);

// ─────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────

function formatIssues(issues: ReadonlyArray<BaseIssue<unknown>>): string[] {
  return issues.map((issue) => `${getDotPath(issue) ?? "(root)"}: ${issue.message}`);
}

/**
 * Validate a JSON process term. Throws DecodeError listing every issue.
 */
export function decodeProcess(json: unknown): Proc {
  const result = safeParse(ProcSchema, json);
  if (!result.success) {
    const issues = formatIssues(result.issues);
    throw new DecodeError(`Invalid process term: ${issues.join("; ")}`, issues);
  }
  return result.output;
}

export function decodeValue(json: unknown): Val {
  const result = safeParse(ValueSchema, json);
  if (!result.success) {
    const issues = formatIssues(result.issues);
    throw new DecodeError(`Invalid value: ${issues.join("; ")}`, issues);
  }
  return result.output;
}

/** Parse JSON text, then decode it as a process term. */
export function parseProcess(text: string): Proc {
  return decodeProcess(parseJson(text));
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new DecodeError(`Invalid JSON: ${detail}`, [detail]);
  }
}
