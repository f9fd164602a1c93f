// src/core/ast.ts
// Process terms consumed by the engine. The parser collaborator produces these;
// patterns reuse the same shape (free Var nodes are binders).

export type SimpleTypeName = "Bool" | "Int" | "String" | "Uri";

export type BundleMode = "read" | "write" | "equiv" | "readWrite";

export type UnaryOp = "not" | "neg" | "negation";

export type BinaryOp =
  | "or"
  | "and"
  | "matches"
  | "eq"
  | "neq"
  | "lt"
  | "lte"
  | "gt"
  | "gte"
  | "concat"
  | "diff"
  | "add"
  | "sub"
  | "interpolate"
  | "mult"
  | "div"
  | "mod"
  | "disjunction"
  | "conjunction";

export type Proc =
  // ground terms
  | { tag: "Nil" }
  | { tag: "Unit" }
  | { tag: "Bool"; value: boolean }
  | { tag: "Int"; value: number }
  | { tag: "Str"; value: string }
  | { tag: "Uri"; value: string }
  | { tag: "SimpleType"; type: SimpleTypeName }
  // collections
  | { tag: "List"; elements: Proc[]; remainder?: string }
  | { tag: "Set"; elements: Proc[]; remainder?: string }
  | { tag: "Tuple"; elements: Proc[] }
  | { tag: "Map"; entries: Array<[Proc, Proc]>; remainder?: string }
  // variables
  | { tag: "Var"; name: string }
  | { tag: "Wildcard" }
  | { tag: "VarRef"; name: string }
  | { tag: "Ref"; name: string; mode: "copy" | "move" }
  // processes
  | { tag: "Par"; procs: Proc[] }
  | { tag: "New"; decls: NameDecl[]; body: Proc }
  | { tag: "Send"; channel: Proc; inputs: Proc[]; persistent: boolean }
  | { tag: "SendSync"; channel: Proc; inputs: Proc[]; cont?: Proc }
  | { tag: "For"; receipts: Receipt[]; body: Proc }
  | { tag: "Contract"; channel: Proc; formals: Proc[]; body: Proc }
  | { tag: "If"; cond: Proc; then: Proc; else?: Proc }
  | { tag: "Match"; expr: Proc; cases: MatchCase[] }
  | { tag: "Select"; branches: SelectBranch[] }
  | { tag: "Bundle"; mode: BundleMode; body: Proc }
  | { tag: "Let"; bindings: LetBinding[]; body: Proc; concurrent: boolean }
  | { tag: "Eval"; name: Proc }
  // expressions
  | { tag: "Method"; receiver: Proc; name: string; args: Proc[] }
  | { tag: "Unary"; op: UnaryOp; arg: Proc }
  | { tag: "Binary"; op: BinaryOp; left: Proc; right: Proc };

export type NameDecl = { name: string; uri?: string };

export type Source =
  | { tag: "Simple"; channel: Proc }
  | { tag: "ReceiveSend"; channel: Proc }
  | { tag: "SendReceive"; channel: Proc; inputs: Proc[] };

export type Bind = {
  kind: "linear" | "repeated" | "peek";
  patterns: Proc[];
  source: Source;
};

/** Binds joined with `&`: they fire together, once every one has a message. */
export type Receipt = Bind[];

export type MatchCase = { pattern: Proc; body: Proc };

export type SelectBranch = { patterns: Proc[]; channel: Proc; body: Proc };

export type LetBinding = { pattern: Proc; value: Proc };

export type ProcTag = Proc["tag"];

/** Narrow a Proc to the variant carrying the given tag. */
export type ProcOf<T extends ProcTag> = Extract<Proc, { tag: T }>;

const EXPRESSION_TAGS: ReadonlySet<ProcTag> = new Set<ProcTag>([
  "Nil",
  "Unit",
  "Bool",
  "Int",
  "Str",
  "Uri",
  "SimpleType",
  "List",
  "Set",
  "Tuple",
  "Map",
  "Var",
  "Wildcard",
  "VarRef",
  "Ref",
  "Method",
  "Unary",
  "Binary",
]);

/**
 * Expressions reduce to a value. Everything else is a process whose value,
 * when it appears in a value position, is its quoted closure.
 */
export function isExpression(p: Proc): boolean {
  return EXPRESSION_TAGS.has(p.tag);
}

/** Ground literals evaluate without spawning an instance. */
export function isAtomic(p: Proc): boolean {
  switch (p.tag) {
    case "Nil":
    case "Unit":
    case "Bool":
    case "Int":
    case "Str":
    case "Uri":
    case "Var":
    case "VarRef":
      return true;
    default:
      return false;
  }
}

/**
 * Free variable names of a term, in first-occurrence order. Binders introduced
 * by new, receive, contract, match, select and let are excluded inside their
 * scopes.
 */
export function freeVars(p: Proc): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  collectFree(p, new Set(), out, seen);
  return out;
}

function collectFree(p: Proc, bound: Set<string>, out: string[], seen: Set<string>): void {
  const note = (name: string) => {
    if (!bound.has(name) && !seen.has(name)) {
      seen.add(name);
      out.push(name);
    }
  };
  const walk = (q: Proc, b: Set<string> = bound) => collectFree(q, b, out, seen);
  const withBinders = (names: Iterable<string>): Set<string> => {
    const b = new Set(bound);
    for (const n of names) b.add(n);
    return b;
  };

  switch (p.tag) {
    case "Nil":
    case "Unit":
    case "Bool":
    case "Int":
    case "Str":
    case "Uri":
    case "SimpleType":
    case "Wildcard":
      return;
    case "Var":
    case "VarRef":
    case "Ref":
      note(p.name);
      return;
    case "List":
    case "Set":
      p.elements.forEach((e) => walk(e));
      if (p.remainder) note(p.remainder);
      return;
    case "Tuple":
      p.elements.forEach((e) => walk(e));
      return;
    case "Map":
      for (const [k, v] of p.entries) {
        walk(k);
        walk(v);
      }
      if (p.remainder) note(p.remainder);
      return;
    case "Par":
      p.procs.forEach((q) => walk(q));
      return;
    case "New":
      walk(p.body, withBinders(p.decls.map((d) => d.name)));
      return;
    case "Send":
    case "SendSync":
      walk(p.channel);
      p.inputs.forEach((q) => walk(q));
      if (p.tag === "SendSync" && p.cont) walk(p.cont);
      return;
    case "For": {
      const binders: string[] = [];
      for (const receipt of p.receipts) {
        const scope = withBinders(binders);
        for (const r of receipt) {
          walk(r.source.channel, scope);
          if (r.source.tag === "SendReceive") r.source.inputs.forEach((q) => walk(q, scope));
          r.patterns.forEach((pat) => collectPatternRefs(pat, scope, note));
        }
        receipt.forEach((r) => r.patterns.forEach((pat) => binders.push(...patternBinders(pat))));
      }
      walk(p.body, withBinders(binders));
      return;
    }
    case "Contract":
      walk(p.channel);
      p.formals.forEach((f) => collectPatternRefs(f, bound, note));
      walk(p.body, withBinders(p.formals.flatMap(patternBinders)));
      return;
    case "If":
      walk(p.cond);
      walk(p.then);
      if (p.else) walk(p.else);
      return;
    case "Match":
      walk(p.expr);
      for (const c of p.cases) {
        collectPatternRefs(c.pattern, bound, note);
        walk(c.body, withBinders(patternBinders(c.pattern)));
      }
      return;
    case "Select":
      for (const br of p.branches) {
        walk(br.channel);
        br.patterns.forEach((pat) => collectPatternRefs(pat, bound, note));
        walk(br.body, withBinders(br.patterns.flatMap(patternBinders)));
      }
      return;
    case "Bundle":
      walk(p.body);
      return;
    case "Let": {
      const binders: string[] = [];
      for (const b of p.bindings) {
        walk(b.value, p.concurrent ? bound : withBinders(binders));
        binders.push(...patternBinders(b.pattern));
      }
      walk(p.body, withBinders(binders));
      return;
    }
    case "Eval":
      walk(p.name);
      return;
    case "Method":
      walk(p.receiver);
      p.args.forEach((a) => walk(a));
      return;
    case "Unary":
      walk(p.arg);
      return;
    case "Binary":
      walk(p.left);
      if (p.op === "matches") collectPatternRefs(p.right, bound, note);
      else walk(p.right);
      return;
  }
}

/** Names a pattern binds. */
export function patternBinders(p: Proc): string[] {
  switch (p.tag) {
    case "Var":
      return [p.name];
    case "List":
    case "Set":
      return [...p.elements.flatMap(patternBinders), ...(p.remainder ? [p.remainder] : [])];
    case "Tuple":
      return p.elements.flatMap(patternBinders);
    case "Map":
      return [
        ...p.entries.flatMap(([k, v]) => [...patternBinders(k), ...patternBinders(v)]),
        ...(p.remainder ? [p.remainder] : []),
      ];
    case "Binary":
      return p.op === "conjunction" || p.op === "disjunction"
        ? [...patternBinders(p.left), ...patternBinders(p.right)]
        : [];
    default:
      return [];
  }
}

function collectPatternRefs(p: Proc, bound: Set<string>, note: (name: string) => void): void {
  switch (p.tag) {
    case "VarRef":
      if (!bound.has(p.name)) note(p.name);
      return;
    case "List":
    case "Set":
    case "Tuple":
      p.elements.forEach((e) => collectPatternRefs(e, bound, note));
      return;
    case "Map":
      for (const [k, v] of p.entries) {
        collectPatternRefs(k, bound, note);
        collectPatternRefs(v, bound, note);
      }
      return;
    case "Binary":
    case "Unary":
      for (const q of p.tag === "Binary" ? [p.left, p.right] : [p.arg]) collectPatternRefs(q, bound, note);
      return;
    default:
      return;
  }
}

/** Short label for diagnostics. */
export function describeProc(p: Proc): string {
  switch (p.tag) {
    case "Nil":
      return "Nil";
    case "Unit":
      return "()";
    case "Bool":
    case "Int":
      return String(p.value);
    case "Str":
      return JSON.stringify(p.value);
    case "Uri":
      return `\`${p.value}\``;
    case "SimpleType":
      return p.type;
    case "Var":
      return p.name;
    case "Wildcard":
      return "_";
    case "VarRef":
      return `=${p.name}`;
    case "Ref":
      return `${p.mode === "move" ? "move" : "copy"} ${p.name}`;
    case "List":
      return `[${p.elements.map(describeProc).join(", ")}${p.remainder ? `...${p.remainder}` : ""}]`;
    case "Set":
      return `Set(${p.elements.map(describeProc).join(", ")}${p.remainder ? `...${p.remainder}` : ""})`;
    case "Tuple":
      return `(${p.elements.map(describeProc).join(", ")}${p.elements.length === 1 ? "," : ""})`;
    case "Map":
      return `{${p.entries.map(([k, v]) => `${describeProc(k)}: ${describeProc(v)}`).join(", ")}${p.remainder ? `...${p.remainder}` : ""}}`;
    case "Unary":
      return `${p.op === "neg" ? "-" : p.op === "not" ? "not " : "~"}${describeProc(p.arg)}`;
    case "Binary":
      return `${describeProc(p.left)} ${BINARY_SYMBOLS[p.op]} ${describeProc(p.right)}`;
    case "Method":
      return `${describeProc(p.receiver)}.${p.name}(${p.args.map(describeProc).join(", ")})`;
    default:
      return p.tag;
  }
}

export const BINARY_SYMBOLS: Record<BinaryOp, string> = {
  or: "or",
  and: "and",
  matches: "matches",
  eq: "==",
  neq: "!=",
  lt: "<",
  lte: "<=",
  gt: ">",
  gte: ">=",
  concat: "++",
  diff: "--",
  add: "+",
  sub: "-",
  interpolate: "%%",
  mult: "*",
  div: "/",
  mod: "%",
  disjunction: "\\/",
  conjunction: "/\\",
};
