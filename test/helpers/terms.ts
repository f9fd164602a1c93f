// test/helpers/terms.ts
// Term builders and engine helpers shared by the specs.

import type { BinaryOp, Bind, BundleMode, NameDecl, Proc, UnaryOp } from "../../src/core/ast";
import { Env } from "../../src/core/eval/env";
import type { FsmInstance, EngineEvent, InstanceRole, StepContext, StepOutcome } from "../../src/core/eval/machine";
import { EMPTY_PROGRESS } from "../../src/core/eval/machine";
import { step } from "../../src/core/eval/machineStep";
import { ChannelStore } from "../../src/core/concurrency/store";
import { silentLogger } from "../../src/core/logging";
import type { RunProcessOptions } from "../../src/runtime";
import { Engine, runProcess } from "../../src/runtime";
import type { RunResult } from "../../src/core/concurrency/types";

// ─────────────────────────────────────────────────────────────────
// Ground terms and variables
// ─────────────────────────────────────────────────────────────────

export const nil: Proc = { tag: "Nil" };
export const wild: Proc = { tag: "Wildcard" };
export const int = (value: number): Proc => ({ tag: "Int", value });
export const str = (value: string): Proc => ({ tag: "Str", value });
export const bool = (value: boolean): Proc => ({ tag: "Bool", value });
export const uri = (value: string): Proc => ({ tag: "Uri", value });
export const v = (name: string): Proc => ({ tag: "Var", name });
export const pinned = (name: string): Proc => ({ tag: "VarRef", name });

// ─────────────────────────────────────────────────────────────────
// Processes
// ─────────────────────────────────────────────────────────────────

export const par = (...procs: Proc[]): Proc => ({ tag: "Par", procs });

export const nu = (decls: Array<string | NameDecl>, body: Proc): Proc => ({
  tag: "New",
  decls: decls.map((d) => (typeof d === "string" ? { name: d } : d)),
  body,
});

export const send = (channel: Proc, ...inputs: Proc[]): Proc => ({ tag: "Send", channel, inputs, persistent: false });

export const sendPersistent = (channel: Proc, ...inputs: Proc[]): Proc => ({
  tag: "Send",
  channel,
  inputs,
  persistent: true,
});

export const sendSync = (channel: Proc, inputs: Proc[], cont?: Proc): Proc => ({ tag: "SendSync", channel, inputs, cont });

export const recv = (patterns: Proc[], channel: Proc, kind: Bind["kind"] = "linear"): Bind => ({
  kind,
  patterns,
  source: { tag: "Simple", channel },
});

export const recvAck = (patterns: Proc[], channel: Proc): Bind => ({
  kind: "linear",
  patterns,
  source: { tag: "ReceiveSend", channel },
});

export const ask = (patterns: Proc[], channel: Proc, inputs: Proc[]): Bind => ({
  kind: "linear",
  patterns,
  source: { tag: "SendReceive", channel, inputs },
});

/** `for (r1; r2; ...) body`; an array receipt joins its binds with `&`. */
export const forComp = (receipts: Array<Bind | Bind[]>, body: Proc): Proc => ({
  tag: "For",
  receipts: receipts.map((r) => (Array.isArray(r) ? r : [r])),
  body,
});

export const contract = (channel: Proc, formals: Proc[], body: Proc): Proc => ({ tag: "Contract", channel, formals, body });

export const ifThen = (cond: Proc, then: Proc, otherwise?: Proc): Proc => ({ tag: "If", cond, then, else: otherwise });

export const match = (expr: Proc, cases: Array<[Proc, Proc]>): Proc => ({
  tag: "Match",
  expr,
  cases: cases.map(([pattern, body]) => ({ pattern, body })),
});

export const select = (branches: Array<[Proc[], Proc, Proc]>): Proc => ({
  tag: "Select",
  branches: branches.map(([patterns, channel, body]) => ({ patterns, channel, body })),
});

export const bundle = (mode: BundleMode, body: Proc): Proc => ({ tag: "Bundle", mode, body });

export const letIn = (bindings: Array<[Proc, Proc]>, body: Proc, concurrent = false): Proc => ({
  tag: "Let",
  bindings: bindings.map(([pattern, value]) => ({ pattern, value })),
  body,
  concurrent,
});

export const evalName = (name: Proc): Proc => ({ tag: "Eval", name });

// ─────────────────────────────────────────────────────────────────
// Expressions
// ─────────────────────────────────────────────────────────────────

export const bin = (op: BinaryOp, left: Proc, right: Proc): Proc => ({ tag: "Binary", op, left, right });
export const un = (op: UnaryOp, arg: Proc): Proc => ({ tag: "Unary", op, arg });
export const call = (receiver: Proc, name: string, ...args: Proc[]): Proc => ({ tag: "Method", receiver, name, args });
export const list = (...elements: Proc[]): Proc => ({ tag: "List", elements });
export const set = (...elements: Proc[]): Proc => ({ tag: "Set", elements });
export const tuple = (...elements: Proc[]): Proc => ({ tag: "Tuple", elements });
export const map = (...entries: Array<[Proc, Proc]>): Proc => ({ tag: "Map", entries });

// ─────────────────────────────────────────────────────────────────
// System output
// ─────────────────────────────────────────────────────────────────

/** `new stdout(`rho:io:stdout`) in { body }` */
export const withStdout = (body: Proc): Proc => nu([{ name: "stdout", uri: "rho:io:stdout" }], body);

/** `stdout!(...inputs)`, inside withStdout */
export const print = (...inputs: Proc[]): Proc => send(v("stdout"), ...inputs);

// ─────────────────────────────────────────────────────────────────
// Engine helpers
// ─────────────────────────────────────────────────────────────────

export function run(term: Proc, options: RunProcessOptions = {}): RunResult {
  return runProcess(term, { logger: silentLogger(), ...options });
}

export function engine(options: RunProcessOptions = {}): Engine {
  return new Engine({ logger: silentLogger(), ...options });
}

export function instance(term: Proc, env: Env = Env.empty(), role: InstanceRole = "process", id = 0): FsmInstance {
  return {
    id,
    term,
    role,
    state: { tag: "INITIAL" },
    env,
    progress: EMPTY_PROGRESS,
    pendingChildren: new Set(),
    mailbox: [],
    parked: [],
    stepCount: 0,
  };
}

export const start: EngineEvent = { tag: "SIGNAL", signal: "start" };
export const tick: EngineEvent = { tag: "SIGNAL", signal: "continue" };

/**
 * Step an instance the way the scheduler does, without applying effects.
 */
export function advance(
  inst: FsmInstance,
  event: EngineEvent,
  ctx: StepContext = { store: new ChannelStore() }
): StepOutcome {
  const outcome = step(inst, event, ctx);
  if (outcome.tag === "Progressed") {
    inst.state = outcome.state;
    inst.env = outcome.env;
    inst.progress = outcome.progress;
  }
  return outcome;
}

/** Effects of a Progressed outcome; fails the test on NotReady. */
export function effectsOf(outcome: StepOutcome) {
  if (outcome.tag !== "Progressed") throw new Error("expected Progressed, got NotReady");
  return outcome.effects;
}
