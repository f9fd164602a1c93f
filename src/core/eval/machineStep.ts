// src/core/eval/machineStep.ts
// The transition function. step() reads an instance, one event and a
// read-only view of the channel store, and returns the next state together
// with the effects the scheduler must apply. It never mutates its inputs.

import type { Bind, BundleMode, Proc, ProcOf } from "../ast";
import { describeProc, freeVars, isExpression } from "../ast";
import type { Failure } from "../../outcome/failure";
import {
  cancelled,
  capabilityViolation,
  childFailed,
  malformedTerm,
  patternExhausted,
  timedOut,
  typeMismatch,
  unboundVariable,
} from "../../outcome/constructors";
import type { Env } from "./env";
import type { MatchBindings } from "./match";
import { matchPattern } from "./match";
import type { Caps, Val } from "./values";
import { showVal, typeName, VNil, vBool, vChan, VUnit } from "./values";
import type { Computed } from "./operators";
import { applyBinary, applyUnary, collect, val } from "./operators";
import { callMethod } from "./methods";
import type {
  BundlingMode,
  Effect,
  EngineEvent,
  FsmInstance,
  MachineState,
  OperandSlot,
  Progress,
  StepContext,
  StepOutcome,
} from "./machine";
import type { ReceiveMode, SelectArm } from "../concurrency/store";

const NOT_READY: StepOutcome = { tag: "NotReady" };
const CONTINUE: Effect = { tag: "enqueueSelf", event: { tag: "SIGNAL", signal: "continue" } };
const TERMINATED: MachineState = { tag: "TERMINATED" };

type Cx = {
  inst: FsmInstance;
  env: Env;
  progress: Progress;
  ctx: StepContext;
};

type Child = { term: Proc; env: Env };

// ─────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────

export function step(inst: FsmInstance, event: EngineEvent, ctx: StepContext): StepOutcome {
  const c: Cx = { inst, env: inst.env, progress: inst.progress, ctx };
  const state = inst.state;

  if (state.tag === "TERMINATED") return NOT_READY;

  if (event.tag === "SIGNAL" && event.signal === "cancel") {
    return progressed(TERMINATED, c.env, c.progress, [
      { tag: "cancelChildren" },
      { tag: "finish", failure: cancelled(inst.id) },
    ]);
  }

  if (state.tag === "TERMINATING") {
    if (event.tag !== "SIGNAL") return NOT_READY;
    return progressed(TERMINATED, c.env, c.progress, [{ tag: "finish", failure: c.progress.failure }]);
  }

  if (event.tag === "TIMEOUT") {
    if (state.tag === "WAITING") return failWith(c, timedOut(event.steps, inst.id));
    return progressed(state, c.env, c.progress, []);
  }

  if (event.tag === "CONDITION_MET" || event.tag === "EXPRESSION_EVALUATED" || event.tag === "ERROR") {
    return childEvent(c, event);
  }

  const term = normalize(inst.term);
  switch (term.tag) {
    case "Par":
      return parStep(c, term, event);
    case "New":
      return newStep(c, term, event);
    case "Send":
      return sendStep(c, term, event);
    case "SendSync":
      return sendSyncStep(c, term, event);
    case "For":
      return forStep(c, term, event);
    case "If":
      return ifStep(c, term, event);
    case "Match":
      return matchStep(c, term, event);
    case "Select":
      return selectStep(c, term, event);
    case "Bundle":
      return inst.role === "expression" ? bundleValueStep(c, term, event) : bundleStep(c, term, event);
    case "Let":
      return letStep(c, term, event);
    case "Eval":
      return evalStep(c, term, event);
    case "Ref":
      return refStep(c, term, event);
    case "Method":
    case "Unary":
    case "Binary":
    case "List":
    case "Set":
    case "Tuple":
    case "Map":
      return exprStep(c, term, event);
    default:
      return atomStep(c, term, event);
  }
}

/** A contract is a persistent receive on a single channel. */
function normalize(term: Proc): Proc {
  if (term.tag !== "Contract") return term;
  return {
    tag: "For",
    receipts: [[{ kind: "repeated", patterns: term.formals, source: { tag: "Simple", channel: term.channel } }]],
    body: term.body,
  };
}

// ─────────────────────────────────────────────────────────────────
// Outcome helpers
// ─────────────────────────────────────────────────────────────────

function progressed(state: MachineState, env: Env, progress: Progress, effects: Effect[]): StepOutcome {
  return { tag: "Progressed", state, env, progress, effects };
}

function prepend(effects: Effect[], outcome: StepOutcome): StepOutcome {
  if (outcome.tag === "NotReady" || effects.length === 0) return outcome;
  return { ...outcome, effects: [...effects, ...outcome.effects] };
}

function finishWith(c: Cx, value?: Val): StepOutcome {
  return progressed(TERMINATED, c.env, c.progress, [{ tag: "finish", value }]);
}

function failWith(c: Cx, f: Failure): StepOutcome {
  const failure = stamp(f, c.inst.id);
  return progressed({ tag: "TERMINATING" }, c.env, { ...c.progress, failure }, [{ tag: "cancelChildren" }, CONTINUE]);
}

/** Attribute diagnostics raised by pure helpers to the failing instance. */
function stamp(f: Failure, instanceId: number): Failure {
  if (f.diagnostics.every((d) => d.instanceId !== undefined)) return f;
  return {
    ...f,
    diagnostics: f.diagnostics.map((d) => (d.instanceId === undefined ? { ...d, instanceId } : d)),
  };
}

function fromComputed(c: Cx, r: Computed): StepOutcome {
  return r.tag === "Val" ? finishWith(c, r.v) : failWith(c, r.failure);
}

/** Spawn children and wait for all of them; with none, terminate now. */
function joinOn(c: Cx, children: Child[]): StepOutcome {
  if (children.length === 0) return finishWith(c, c.progress.result);
  const spawns: Effect[] = children.map((ch) => ({ tag: "spawn", term: ch.term, env: ch.env, role: "process" }));
  return progressed({ tag: "JOINING" }, c.env, c.progress, spawns);
}

function mint(c: Cx): { name: Val; progress: Progress } {
  const name = vChan(`${c.inst.id}.${c.progress.minted}`);
  return { name, progress: { ...c.progress, minted: c.progress.minted + 1 } };
}

// ─────────────────────────────────────────────────────────────────
// Child notifications
// ─────────────────────────────────────────────────────────────────

function childEvent(
  c: Cx,
  event: Extract<EngineEvent, { tag: "CONDITION_MET" | "EXPRESSION_EVALUATED" | "ERROR" }>
): StepOutcome {
  const state = c.inst.state;

  // A replicated listener outlives its bodies; their outcomes do not stop it.
  if (c.progress.listening) return progressed(state, c.env, c.progress, []);

  switch (state.tag) {
    case "JOINING": {
      const progress =
        event.tag === "ERROR" && c.progress.failure === undefined
          ? { ...c.progress, failure: childFailed(event.child, event.failure, c.inst.id) }
          : c.progress;
      if (c.inst.pendingChildren.size > 0) return progressed(state, c.env, progress, []);
      return progressed(TERMINATED, c.env, progress, [
        { tag: "finish", value: progress.result, failure: progress.failure },
      ]);
    }
    case "EVALUATING":
      if (event.tag === "ERROR") return failWith(c, childFailed(event.child, event.failure, c.inst.id));
      if (event.tag === "EXPRESSION_EVALUATED") {
        return progressed(state, c.env, { ...c.progress, values: [...c.progress.values, event.value] }, [CONTINUE]);
      }
      return NOT_READY;
    default:
      if (event.tag === "ERROR") return failWith(c, childFailed(event.child, event.failure, c.inst.id));
      return NOT_READY;
  }
}

// ─────────────────────────────────────────────────────────────────
// Operand evaluation
// ─────────────────────────────────────────────────────────────────

type Inline = { tag: "Val"; v: Val; env: Env } | { tag: "Fail"; failure: Failure } | { tag: "Spawn" };

/**
 * Evaluate an operand without a child instance when it is a literal, a
 * variable, a reference or a quoted process. Compound expressions need
 * an expression child.
 */
export function evalInline(p: Proc, env: Env): Inline {
  const ok = (v: Val): Inline => ({ tag: "Val", v, env });
  switch (p.tag) {
    case "Nil":
      return ok(VNil);
    case "Unit":
      return ok(VUnit);
    case "Bool":
      return ok(vBool(p.value));
    case "Int":
      return ok({ tag: "Int", n: p.value });
    case "Str":
      return ok({ tag: "Str", s: p.value });
    case "Uri":
      return ok({ tag: "Uri", uri: p.value });
    case "Var":
    case "VarRef": {
      const v = env.get(p.name);
      return v === undefined ? { tag: "Fail", failure: unboundVariable(p.name) } : ok(v);
    }
    case "Ref": {
      const v = env.get(p.name);
      if (v === undefined) return { tag: "Fail", failure: unboundVariable(p.name) };
      return { tag: "Val", v, env: p.mode === "move" ? env.remove(p.name) : env };
    }
    case "Wildcard":
    case "SimpleType":
      return { tag: "Fail", failure: malformedTerm(`${describeProc(p)} in value position`) };
    case "Bundle":
      return p.body.tag === "Var" || p.body.tag === "Eval" ? { tag: "Spawn" } : ok({ tag: "Proc", proc: p, env });
    default:
      return isExpression(p) ? { tag: "Spawn" } : ok({ tag: "Proc", proc: p, env });
  }
}

/**
 * Evaluate operands left to right, one per step, until `upTo` values are
 * held; then hand over to `complete`.
 */
function drive(
  c: Cx,
  operands: Proc[],
  slot: (i: number) => OperandSlot,
  complete: () => StepOutcome,
  upTo: number = operands.length
): StepOutcome {
  const i = c.progress.values.length;
  if (i >= upTo) return complete();

  const p = operands[i];
  const state: MachineState = { tag: "EVALUATING", ref: { slot: slot(i), index: i } };
  const r = evalInline(p, c.env);
  switch (r.tag) {
    case "Val":
      return progressed(state, r.env, { ...c.progress, values: [...c.progress.values, r.v] }, [CONTINUE]);
    case "Fail":
      return failWith(c, r.failure);
    case "Spawn":
      return progressed(state, c.env, c.progress, [{ tag: "spawn", term: p, env: c.env, role: "expression" }]);
  }
}

function isTick(event: EngineEvent): boolean {
  return event.tag === "SIGNAL";
}

function evaluatingOrInitial(c: Cx): boolean {
  const t = c.inst.state.tag;
  return t === "INITIAL" || t === "EVALUATING";
}

// ─────────────────────────────────────────────────────────────────
// Bindings
// ─────────────────────────────────────────────────────────────────

function withPending(c: Cx, bindings: MatchBindings, patch: Partial<Progress> = {}): Cx {
  return { ...c, progress: { ...c.progress, ...patch, pending: Array.from(bindings.entries()) } };
}

/** Bind the head of the pending list into the scope being built, or the env. */
function bindOne(c: Cx): Cx {
  const [head, ...rest] = c.progress.pending;
  if (head === undefined) return c;
  const [name, v] = head;
  if (c.progress.scope !== undefined) {
    return { ...c, progress: { ...c.progress, pending: rest, scope: c.progress.scope.set(name, v) } };
  }
  return { ...c, env: c.env.set(name, v), progress: { ...c.progress, pending: rest } };
}

/** BINDING(name) for the next pending binding, or `done` when none remain. */
function bindOrElse(c: Cx, done: (c: Cx) => StepOutcome): StepOutcome {
  const head = c.progress.pending[0];
  if (head !== undefined) return progressed({ tag: "BINDING", name: head[0] }, c.env, c.progress, [CONTINUE]);
  return done(c);
}

// ─────────────────────────────────────────────────────────────────
// Capabilities
// ─────────────────────────────────────────────────────────────────

export function capsMode(caps: Caps): string {
  if (caps.read && caps.write) return "readWrite";
  if (caps.write) return "write";
  if (caps.read) return "read";
  return "equiv";
}

function checkCap(channel: Val, operation: "send" | "receive", instanceId: number): Failure | undefined {
  if (channel.tag !== "Chan") return undefined;
  const allowed = operation === "send" ? channel.caps.write : channel.caps.read;
  return allowed ? undefined : capabilityViolation(operation, capsMode(channel.caps), showVal(channel), instanceId);
}

const BUNDLING: Record<BundleMode, BundlingMode> = {
  read: "READ",
  write: "WRITE",
  equiv: "EQUIV",
  readWrite: "RW",
};

export function narrowCaps(caps: Caps, mode: BundlingMode): Caps {
  switch (mode) {
    case "READ":
      return { read: caps.read, write: false };
    case "WRITE":
      return { read: false, write: caps.write };
    case "EQUIV":
      return { read: false, write: false };
    case "RW":
      return caps;
  }
}

export function restrict(v: Val, mode: BundlingMode): Val {
  return v.tag === "Chan" ? { ...v, caps: narrowCaps(v.caps, mode) } : v;
}

// ─────────────────────────────────────────────────────────────────
// Atoms and references
// ─────────────────────────────────────────────────────────────────

function atomStep(c: Cx, term: Proc, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;
  const r = evalInline(term, c.env);
  switch (r.tag) {
    case "Val":
      return finishWith({ ...c, env: r.env }, r.v);
    case "Fail":
      return failWith(c, r.failure);
    case "Spawn":
      return failWith(c, malformedTerm(`cannot evaluate ${describeProc(term)}`));
  }
}

function refStep(c: Cx, term: ProcOf<"Ref">, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;
  if (c.inst.state.tag === "INITIAL") {
    const mode = term.mode === "move" ? "MOVE" : "COPY";
    return progressed({ tag: "REFERENCING", mode }, c.env, c.progress, [CONTINUE]);
  }
  const r = evalInline(term, c.env);
  if (r.tag === "Fail") return failWith(c, r.failure);
  if (r.tag === "Spawn") return NOT_READY;
  return finishWith({ ...c, env: r.env }, r.v);
}

// ─────────────────────────────────────────────────────────────────
// Expressions
// ─────────────────────────────────────────────────────────────────

type ExprTerm = ProcOf<"Method" | "Unary" | "Binary" | "List" | "Set" | "Tuple" | "Map">;

function exprOperands(term: ExprTerm): Proc[] {
  const rest = (name?: string): Proc[] => (name === undefined ? [] : [{ tag: "Var", name }]);
  switch (term.tag) {
    case "Method":
      return [term.receiver, ...term.args];
    case "Unary":
      return [term.arg];
    case "Binary":
      return term.op === "matches" ? [term.left] : [term.left, term.right];
    case "List":
    case "Set":
      return [...term.elements, ...rest(term.remainder)];
    case "Tuple":
      return term.elements;
    case "Map":
      return [...term.entries.flatMap(([k, v]) => [k, v]), ...rest(term.remainder)];
  }
}

function terminalState(term: ExprTerm): MachineState {
  switch (term.tag) {
    case "Method":
      return { tag: "OPERATING", op: term.name };
    case "Unary":
      return term.op === "neg" ? { tag: "OPERATING", op: "neg" } : { tag: "NEGATING" };
    case "Binary":
      switch (term.op) {
        case "matches":
          return { tag: "MATCHING", pattern: 0 };
        case "conjunction":
          return { tag: "CONJOINING" };
        case "disjunction":
          return { tag: "DISJOINING" };
        case "interpolate":
          return { tag: "INTERPOLATING" };
        default:
          return { tag: "OPERATING", op: term.op };
      }
    case "List":
      return { tag: "COLLECTING", kind: "LIST" };
    case "Set":
      return { tag: "COLLECTING", kind: "SET" };
    case "Tuple":
      return { tag: "COLLECTING", kind: "TUPLE" };
    case "Map":
      return { tag: "COLLECTING", kind: "MAP" };
  }
}

function compute(term: ExprTerm, values: Val[], env: Env): Computed {
  const [first, second] = values;
  switch (term.tag) {
    case "Method":
      return callMethod(term.name, first, values.slice(1));
    case "Unary":
      return applyUnary(term.op, first);
    case "Binary": {
      const op = term.op;
      if (op === "matches") return val(vBool(matchPattern(term.right, first, env) !== null));
      return applyBinary(op, first, second);
    }
    case "Tuple":
      return collect("TUPLE", values);
    case "List":
    case "Set":
    case "Map": {
      const kind = term.tag === "List" ? "LIST" : term.tag === "Set" ? "SET" : "MAP";
      if (term.remainder === undefined) return collect(kind, values);
      return collect(kind, values.slice(0, -1), values[values.length - 1]);
    }
  }
}

/**
 * `and` / `or` stop after the left operand when it decides the result.
 * Returns the decided value, a failure for a non-boolean left side, or
 * undefined to keep evaluating.
 */
function shortCircuit(term: ExprTerm, values: Val[]): Computed | undefined {
  if (term.tag !== "Binary" || (term.op !== "and" && term.op !== "or") || values.length !== 1) return undefined;
  const left = values[0];
  if (left.tag !== "Bool") return { tag: "Fail", failure: typeMismatch("Bool", typeName(left)) };
  if (term.op === "and" && !left.b) return val(left);
  if (term.op === "or" && left.b) return val(left);
  return undefined;
}

function exprStep(c: Cx, term: ExprTerm, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;

  if (evaluatingOrInitial(c)) {
    const decided = shortCircuit(term, c.progress.values);
    if (decided?.tag === "Fail") return failWith(c, decided.failure);
    if (decided?.tag === "Val") {
      return progressed(terminalState(term), c.env, { ...c.progress, result: decided.v }, [CONTINUE]);
    }
    return drive(
      c,
      exprOperands(term),
      () => (term.tag === "Method" || term.tag === "Unary" || term.tag === "Binary" ? "operand" : "element"),
      () => progressed(terminalState(term), c.env, c.progress, [CONTINUE])
    );
  }

  if (c.progress.result !== undefined) return finishWith(c, c.progress.result);
  return fromComputed(c, compute(term, c.progress.values, c.env));
}

// ─────────────────────────────────────────────────────────────────
// Parallel composition and name creation
// ─────────────────────────────────────────────────────────────────

function parStep(c: Cx, term: ProcOf<"Par">, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;
  if (c.inst.state.tag === "INITIAL") return progressed({ tag: "FORKING" }, c.env, c.progress, [CONTINUE]);
  return joinOn(
    c,
    term.procs.map((p) => ({ term: p, env: c.env }))
  );
}

function newStep(c: Cx, term: ProcOf<"New">, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;

  const declare = (cx: Cx, index: number): StepOutcome => {
    const decl = term.decls[index];
    if (decl === undefined) return joinOn(cx, [{ term: term.body, env: cx.env }]);
    // A URI declaration names a system channel instead of minting one.
    const fresh = decl.uri !== undefined ? { name: vChan(decl.uri), progress: cx.progress } : mint(cx);
    const entry: [string, Val] = [decl.name, fresh.name];
    const progress = { ...fresh.progress, cursor: index, pending: [entry] };
    return progressed({ tag: "BINDING", name: decl.name }, cx.env, progress, [CONTINUE]);
  };

  if (c.inst.state.tag === "INITIAL") return declare(c, 0);
  const bound = bindOne(c);
  return declare(bound, bound.progress.cursor + 1);
}

// ─────────────────────────────────────────────────────────────────
// Sends
// ─────────────────────────────────────────────────────────────────

const sendSlot = (i: number): OperandSlot => (i === 0 ? "channel" : "payload");

function sendStep(c: Cx, term: ProcOf<"Send">, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;

  if (evaluatingOrInitial(c)) {
    return drive(c, [term.channel, ...term.inputs], sendSlot, () =>
      progressed({ tag: "SENDING" }, c.env, c.progress, [CONTINUE])
    );
  }

  const [channel, ...payload] = c.progress.values;
  const denied = checkCap(channel, "send", c.inst.id);
  if (denied) return failWith(c, denied);
  return prepend(
    [{ tag: "publish", channel, payload, persistence: term.persistent ? "PERSISTENT" : "ONCE" }],
    finishWith(c)
  );
}

function sendSyncStep(c: Cx, term: ProcOf<"SendSync">, event: EngineEvent): StepOutcome {
  const state = c.inst.state;

  if (state.tag === "WAITING") {
    if (event.tag !== "MESSAGE_AVAILABLE") return NOT_READY;
    return term.cont ? joinOn(c, [{ term: term.cont, env: c.env }]) : finishWith(c);
  }
  if (!isTick(event)) return NOT_READY;

  if (evaluatingOrInitial(c)) {
    return drive(c, [term.channel, ...term.inputs], sendSlot, () =>
      progressed({ tag: "SENDING" }, c.env, c.progress, [CONTINUE])
    );
  }

  const [channel, ...payload] = c.progress.values;
  const denied = checkCap(channel, "send", c.inst.id);
  if (denied) return failWith(c, denied);

  const ack = mint(c);
  const effects: Effect[] = [
    { tag: "publish", channel, payload: [...payload, ack.name], persistence: "ONCE" },
    { tag: "request", channel: ack.name, patterns: [{ tag: "Wildcard" }], mode: "ONE_SHOT" },
  ];
  if (c.ctx.syncSendTimeoutSteps !== undefined) {
    effects.push({ tag: "startTimer", steps: c.ctx.syncSendTimeoutSteps });
  }
  return progressed({ tag: "WAITING" }, c.env, { ...ack.progress, channel: ack.name }, effects);
}

// ─────────────────────────────────────────────────────────────────
// Receives
// ─────────────────────────────────────────────────────────────────

function receiveMode(kind: Bind["kind"]): Exclude<ReceiveMode, "RACE"> {
  switch (kind) {
    case "linear":
      return "ONE_SHOT";
    case "repeated":
      return "PERSISTENT";
    case "peek":
      return "PEEK";
  }
}

/** The binds of one receipt receive the same way; undefined when they disagree. */
function receiptMode(receipt: Bind[]): Exclude<ReceiveMode, "RACE"> | undefined {
  const kinds = new Set(receipt.map((b) => b.kind));
  const [kind] = kinds;
  return kinds.size === 1 ? receiveMode(kind) : undefined;
}

function bindOperands(bind: Bind): Proc[] {
  return bind.source.tag === "SendReceive" ? [bind.source.channel, ...bind.source.inputs] : [bind.source.channel];
}

/** Patterns registered for a bind; a receive-send also takes the ack name. */
function bindPatterns(bind: Bind): Proc[] {
  return bind.source.tag === "ReceiveSend" ? [...bind.patterns, { tag: "Wildcard" }] : bind.patterns;
}

function forStep(c: Cx, term: ProcOf<"For">, event: EngineEvent): StepOutcome {
  const state = c.inst.state;
  const receipt = term.receipts[c.progress.cursor];
  if (receipt === undefined) {
    return isTick(event) ? joinOn(c, [{ term: term.body, env: c.env }]) : NOT_READY;
  }
  const mode = receiptMode(receipt);
  if (mode === undefined) {
    if (!isTick(event)) return NOT_READY;
    return failWith(c, malformedTerm(`receipt ${c.progress.cursor} must join binds of one kind`));
  }

  const afterReceipt = (cx: Cx): StepOutcome => {
    const next = cx.progress.cursor + 1;
    if (mode === "PERSISTENT") {
      const scope = cx.progress.scope ?? cx.env;
      const rest = term.receipts.slice(next);
      const body: Proc = rest.length > 0 ? { tag: "For", receipts: rest, body: term.body } : term.body;
      const rearm: Effect[] = [];
      if (cx.progress.components !== undefined) {
        rearm.push({ tag: "join", arms: cx.progress.components, mode, registration: cx.progress.registration });
      } else if (cx.progress.channel !== undefined) {
        rearm.push({
          tag: "request",
          channel: cx.progress.channel,
          patterns: bindPatterns(receipt[0]),
          mode,
          registration: cx.progress.registration,
        });
      }
      return progressed(
        { tag: "RECEIVING", mode },
        cx.env,
        { ...cx.progress, pending: [], scope: undefined },
        [{ tag: "spawn", term: body, env: scope, role: "process" }, ...rearm]
      );
    }
    if (next < term.receipts.length) {
      return progressed(
        { tag: "EVALUATING", ref: { slot: "channel", index: 0 } },
        cx.env,
        {
          ...cx.progress,
          cursor: next,
          values: [],
          pending: [],
          channel: undefined,
          components: undefined,
          registration: undefined,
        },
        [CONTINUE]
      );
    }
    return joinOn(cx, [{ term: term.body, env: cx.env }]);
  };

  switch (state.tag) {
    case "INITIAL":
    case "EVALUATING": {
      if (!isTick(event)) return NOT_READY;
      const slots = receipt.flatMap((b) => bindOperands(b).map((_, i) => sendSlot(i)));
      return drive(c, receipt.flatMap(bindOperands), (i) => slots[i], () => arm(c, receipt, mode));
    }

    case "RECEIVING": {
      if (event.tag !== "MESSAGE_AVAILABLE") return NOT_READY;
      const effects: Effect[] = [];
      receipt.forEach((bind, i) => {
        if (bind.source.tag !== "ReceiveSend") return;
        const payload = event.parts?.[i] ?? event.payload;
        const ack = payload[payload.length - 1];
        if (ack !== undefined) effects.push({ tag: "publish", channel: ack, payload: [VNil], persistence: "ONCE" });
      });
      const persistent = mode === "PERSISTENT";
      const cx = withPending(c, event.bindings, {
        registration: event.registration,
        scope: persistent ? c.env : undefined,
        listening: persistent || c.progress.listening,
      });
      return prepend(effects, bindOrElse(cx, afterReceipt));
    }

    case "BINDING":
      if (!isTick(event)) return NOT_READY;
      return bindOrElse(bindOne(c), afterReceipt);

    default:
      return NOT_READY;
  }
}

/** Register the current receipt with the store: a plain receive, or a join of several. */
function arm(c: Cx, receipt: Bind[], mode: Exclude<ReceiveMode, "RACE">): StepOutcome {
  if (receipt.length === 1) return armOne(c, receipt[0], mode);

  let progress = c.progress;
  let offset = 0;
  const arms: SelectArm[] = [];
  const effects: Effect[] = [];
  for (const bind of receipt) {
    const width = bindOperands(bind).length;
    const [channel, ...inputs] = c.progress.values.slice(offset, offset + width);
    offset += width;

    if (bind.source.tag === "SendReceive") {
      const denied = checkCap(channel, "send", c.inst.id);
      if (denied) return failWith(c, denied);
      const reply = mint({ ...c, progress });
      progress = reply.progress;
      effects.push({ tag: "publish", channel, payload: [...inputs, reply.name], persistence: "ONCE" });
      arms.push({ channel: reply.name, patterns: bind.patterns });
    } else {
      const denied = checkCap(channel, "receive", c.inst.id);
      if (denied) return failWith(c, denied);
      arms.push({ channel, patterns: bindPatterns(bind) });
    }
  }
  effects.push({ tag: "join", arms, mode });
  return progressed({ tag: "RECEIVING", mode }, c.env, { ...progress, components: arms }, effects);
}

function armOne(c: Cx, bind: Bind, mode: Exclude<ReceiveMode, "RACE">): StepOutcome {
  const [channel, ...inputs] = c.progress.values;

  if (bind.source.tag === "SendReceive") {
    const denied = checkCap(channel, "send", c.inst.id);
    if (denied) return failWith(c, denied);
    const reply = mint(c);
    return progressed({ tag: "RECEIVING", mode }, c.env, { ...reply.progress, channel: reply.name }, [
      { tag: "publish", channel, payload: [...inputs, reply.name], persistence: "ONCE" },
      { tag: "request", channel: reply.name, patterns: bind.patterns, mode },
    ]);
  }

  const denied = checkCap(channel, "receive", c.inst.id);
  if (denied) return failWith(c, denied);
  return progressed({ tag: "RECEIVING", mode }, c.env, { ...c.progress, channel }, [
    { tag: "request", channel, patterns: bindPatterns(bind), mode },
  ]);
}

// ─────────────────────────────────────────────────────────────────
// Conditionals, match, select
// ─────────────────────────────────────────────────────────────────

function ifStep(c: Cx, term: ProcOf<"If">, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;

  if (evaluatingOrInitial(c)) {
    return drive(c, [term.cond], () => "condition", () =>
      progressed({ tag: "BRANCHING" }, c.env, c.progress, [CONTINUE])
    );
  }

  const cond = c.progress.values[0];
  if (cond.tag !== "Bool") return failWith(c, typeMismatch("Bool", typeName(cond), c.inst.id));
  if (cond.b) return joinOn(c, [{ term: term.then, env: c.env }]);
  return term.else ? joinOn(c, [{ term: term.else, env: c.env }]) : finishWith(c);
}

function matchStep(c: Cx, term: ProcOf<"Match">, event: EngineEvent): StepOutcome {
  const state = c.inst.state;
  const toBody = (cx: Cx): StepOutcome => {
    const chosen = term.cases[cx.progress.arm ?? 0];
    return chosen ? joinOn(cx, [{ term: chosen.body, env: cx.env }]) : finishWith(cx);
  };

  if (state.tag === "MATCHING" && event.tag === "PATTERN_MATCHED") {
    return bindOrElse(withPending(c, event.bindings, { arm: event.pattern }), toBody);
  }
  if (!isTick(event)) return NOT_READY;

  switch (state.tag) {
    case "INITIAL":
    case "EVALUATING":
      return drive(c, [term.expr], () => "scrutinee", () =>
        progressed({ tag: "MATCHING", pattern: 0 }, c.env, c.progress, [CONTINUE])
      );

    case "MATCHING": {
      const scrutinee = c.progress.values[0];
      const candidate = term.cases[state.pattern];
      if (candidate === undefined) {
        return failWith(
          c,
          patternExhausted(
            showVal(scrutinee),
            term.cases.map((k) => describeProc(k.pattern)),
            c.inst.id
          )
        );
      }
      const bindings = matchPattern(candidate.pattern, scrutinee, c.env);
      if (bindings) {
        return progressed(state, c.env, c.progress, [
          { tag: "enqueueSelf", event: { tag: "PATTERN_MATCHED", bindings, pattern: state.pattern } },
        ]);
      }
      return progressed({ tag: "MATCHING", pattern: state.pattern + 1 }, c.env, c.progress, [CONTINUE]);
    }

    case "BINDING":
      return bindOrElse(bindOne(c), toBody);

    default:
      return NOT_READY;
  }
}

function selectStep(c: Cx, term: ProcOf<"Select">, event: EngineEvent): StepOutcome {
  const state = c.inst.state;
  const toBody = (cx: Cx): StepOutcome => {
    const chosen = term.branches[cx.progress.arm ?? 0];
    return chosen ? joinOn(cx, [{ term: chosen.body, env: cx.env }]) : finishWith(cx);
  };

  switch (state.tag) {
    case "INITIAL":
    case "EVALUATING": {
      if (!isTick(event)) return NOT_READY;
      if (term.branches.length === 0) return finishWith(c);
      return drive(
        c,
        term.branches.map((b) => b.channel),
        () => "channel",
        () => {
          const channels = c.progress.values;
          for (const ch of channels) {
            const denied = checkCap(ch, "receive", c.inst.id);
            if (denied) return failWith(c, denied);
          }
          const arms = term.branches.map((b, i) => ({ channel: channels[i], patterns: b.patterns }));
          return progressed({ tag: "RECEIVING", mode: "RACE" }, c.env, c.progress, [{ tag: "select", arms }]);
        }
      );
    }

    case "RECEIVING":
      if (event.tag !== "MESSAGE_AVAILABLE") return NOT_READY;
      return bindOrElse(withPending(c, event.bindings, { arm: event.arm ?? 0, registration: event.registration }), toBody);

    case "BINDING":
      if (!isTick(event)) return NOT_READY;
      return bindOrElse(bindOne(c), toBody);

    default:
      return NOT_READY;
  }
}

// ─────────────────────────────────────────────────────────────────
// Bundles
// ─────────────────────────────────────────────────────────────────

function bundleStep(c: Cx, term: ProcOf<"Bundle">, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;
  const mode = BUNDLING[term.mode];
  if (c.inst.state.tag === "INITIAL") return progressed({ tag: "BUNDLING", mode }, c.env, c.progress, [CONTINUE]);

  const restricted: Array<[string, Val]> = [];
  for (const name of freeVars(term.body)) {
    const v = c.env.get(name);
    if (v !== undefined) restricted.push([name, restrict(v, mode)]);
  }
  return joinOn(c, [{ term: term.body, env: c.env.extend(restricted) }]);
}

function bundleValueStep(c: Cx, term: ProcOf<"Bundle">, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;
  if (evaluatingOrInitial(c)) {
    const operand = term.body.tag === "Eval" ? term.body.name : term.body;
    return drive(c, [operand], () => "name", () =>
      progressed({ tag: "CONSTRUCTING", kind: "bundle" }, c.env, c.progress, [CONTINUE])
    );
  }
  return finishWith(c, restrict(c.progress.values[0], BUNDLING[term.mode]));
}

// ─────────────────────────────────────────────────────────────────
// Let and eval
// ─────────────────────────────────────────────────────────────────

function letStep(c: Cx, term: ProcOf<"Let">, event: EngineEvent): StepOutcome {
  if (!isTick(event)) return NOT_READY;
  const state = c.inst.state;
  const values = term.bindings.map((b) => b.value);

  const nextBinding = (cx: Cx): StepOutcome => {
    const next = cx.progress.cursor + 1;
    if (next >= term.bindings.length) return joinOn(cx, [{ term: term.body, env: cx.env }]);
    const progress = { ...cx.progress, cursor: next };
    if (term.concurrent) return progressed({ tag: "MATCHING", pattern: next }, cx.env, progress, [CONTINUE]);
    return progressed({ tag: "EVALUATING", ref: { slot: "value", index: next } }, cx.env, progress, [CONTINUE]);
  };

  switch (state.tag) {
    case "INITIAL":
    case "EVALUATING": {
      if (term.bindings.length === 0) return joinOn(c, [{ term: term.body, env: c.env }]);
      const upTo = term.concurrent ? values.length : c.progress.cursor + 1;
      const target = term.concurrent ? 0 : c.progress.cursor;
      return drive(
        c,
        values,
        () => "value",
        () => progressed({ tag: "MATCHING", pattern: target }, c.env, c.progress, [CONTINUE]),
        upTo
      );
    }

    case "MATCHING": {
      const binding = term.bindings[state.pattern];
      const v = c.progress.values[state.pattern];
      if (binding === undefined || v === undefined) return NOT_READY;
      const bindings = matchPattern(binding.pattern, v, c.env);
      if (!bindings) {
        return failWith(c, patternExhausted(showVal(v), [describeProc(binding.pattern)], c.inst.id));
      }
      return bindOrElse(withPending(c, bindings), nextBinding);
    }

    case "BINDING":
      return bindOrElse(bindOne(c), nextBinding);

    default:
      return NOT_READY;
  }
}

function evalStep(c: Cx, term: ProcOf<"Eval">, event: EngineEvent): StepOutcome {
  if (!isTick(event) || !evaluatingOrInitial(c)) return NOT_READY;
  return drive(c, [term.name], () => "name", () => {
    const target = c.progress.values[0];
    if (target.tag === "Proc") return joinOn(c, [{ term: target.proc, env: target.env }]);
    return finishWith(c, target);
  });
}
