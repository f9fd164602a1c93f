// src/core/concurrency/scheduler.ts
// Deterministic event-driven scheduler: per-instance mailboxes, a
// round-robin ready ring, and the one place where effects touch the world.

import type { Proc } from "../ast";
import { describeProc } from "../ast";
import { Env } from "../eval/env";
import type { Val } from "../eval/values";
import { showVal, valToText, VNil } from "../eval/values";
import type { Effect, EngineEvent, FsmInstance, InstanceRole, StepContext } from "../eval/machine";
import { EMPTY_PROGRESS, showState } from "../eval/machine";
import { step } from "../eval/machineStep";
import type { Failure } from "../../outcome/failure";
import { budgetExceeded, deadlocked } from "../../outcome/constructors";
import type { Logger } from "../logging";
import { silentLogger } from "../logging";
import type { Delivery, InstanceId, SendPersistence } from "./store";
import { ChannelStore } from "./store";
import type {
  DeadlockReport,
  EngineTrace,
  RunResult,
  RunStatus,
  ScheduleDecision,
  SchedulePolicy,
  SchedulerState,
} from "./types";
import { buildDeadlockReport, isQuiet, listeners, runDiagnostics } from "./critic";

/** URIs of the channels whose messages are captured as run output. */
export const SYSTEM_CHANNELS = {
  stdout: "rho:io:stdout",
  stderr: "rho:io:stderr",
} as const;

// ─────────────────────────────────────────────────────────────────
// Scheduler creation
// ─────────────────────────────────────────────────────────────────

export type SchedulerOptions = {
  policy?: SchedulePolicy;
  syncSendTimeoutSteps?: number;
  logger?: Logger;
};

/**
 * Create a scheduler with its own store, counters and ledger.
 */
export function createScheduler(options: SchedulerOptions = {}): SchedulerState {
  return {
    instances: new Map(),
    ready: [],
    store: new ChannelStore(),
    policy: options.policy ?? { tag: "RoundRobin" },
    stepCount: 0,
    decisions: [],
    replayIndex: 0,
    nextInstanceId: 0,
    timers: [],
    rootId: undefined,
    errors: [],
    output: [],
    errorOutput: [],
    observers: [],
    syncSendTimeoutSteps: options.syncSendTimeoutSteps,
    logger: options.logger ?? silentLogger(),
  };
}

/**
 * Create a replay policy from recorded decisions.
 */
export function createReplayPolicy(decisions: number[]): SchedulePolicy {
  return { tag: "Replay", decisions };
}

export function emit(scheduler: SchedulerState, event: EngineTrace): void {
  for (const observer of scheduler.observers) observer(event);
}

// ─────────────────────────────────────────────────────────────────
// Instance management
// ─────────────────────────────────────────────────────────────────

/**
 * Spawn a new instance and give it its start signal.
 */
export function spawnInstance(
  scheduler: SchedulerState,
  term: Proc,
  env: Env,
  role: InstanceRole = "process",
  parentId?: InstanceId
): FsmInstance {
  const id = scheduler.nextInstanceId++;
  const inst: FsmInstance = {
    id,
    term,
    role,
    state: { tag: "INITIAL" },
    env,
    progress: EMPTY_PROGRESS,
    parentId,
    pendingChildren: new Set(),
    mailbox: [],
    parked: [],
    stepCount: 0,
  };

  scheduler.instances.set(id, inst);
  if (parentId !== undefined) {
    scheduler.instances.get(parentId)?.pendingChildren.add(id);
  }

  emit(scheduler, { tag: "spawn", id, parentId, role, term: describeProc(term) });
  enqueue(scheduler, id, { tag: "SIGNAL", signal: "start" });
  return inst;
}

/** Spawn the top-level instance of a run. */
export function spawnRoot(scheduler: SchedulerState, term: Proc, env: Env = Env.empty()): FsmInstance {
  const root = spawnInstance(scheduler, term, env, "process");
  scheduler.rootId = root.id;
  return root;
}

/**
 * Append an event to an instance's mailbox. Events for terminated or
 * reaped instances are dropped.
 */
export function enqueue(scheduler: SchedulerState, id: InstanceId, event: EngineEvent): boolean {
  const inst = scheduler.instances.get(id);
  if (!inst || inst.state.tag === "TERMINATED") return false;
  inst.mailbox.push(event);
  markReady(scheduler, inst);
  return true;
}

function markReady(scheduler: SchedulerState, inst: FsmInstance): void {
  if (inst.mailbox.length > 0 && !scheduler.ready.includes(inst.id)) {
    scheduler.ready.push(inst.id);
  }
}

// ─────────────────────────────────────────────────────────────────
// Scheduling policy
// ─────────────────────────────────────────────────────────────────

/**
 * Take the next instance off the ready ring according to the policy, and
 * record the decision.
 */
export function selectNext(scheduler: SchedulerState): InstanceId | undefined {
  const ready = scheduler.ready;
  if (ready.length === 0) return undefined;

  let index = 0;
  if (scheduler.policy.tag === "Replay" && scheduler.replayIndex < scheduler.policy.decisions.length) {
    const recorded = scheduler.policy.decisions[scheduler.replayIndex];
    scheduler.replayIndex++;
    // A recorded index beyond the ring falls back to round-robin.
    index = recorded < ready.length ? recorded : 0;
  }

  const readySize = ready.length;
  const [chosen] = ready.splice(index, 1);
  const decision: ScheduleDecision = { chosen, index, readySize, stepCount: scheduler.stepCount };
  scheduler.decisions.push(decision);
  emit(scheduler, { tag: "schedule", decision });
  return chosen;
}

// ─────────────────────────────────────────────────────────────────
// Stepping
// ─────────────────────────────────────────────────────────────────

function stepContext(scheduler: SchedulerState): StepContext {
  return { store: scheduler.store, syncSendTimeoutSteps: scheduler.syncSendTimeoutSteps };
}

function childOf(event: EngineEvent): InstanceId | undefined {
  switch (event.tag) {
    case "CONDITION_MET":
    case "EXPRESSION_EVALUATED":
    case "ERROR":
      return event.child;
    default:
      return undefined;
  }
}

/**
 * One step: the next ready instance handles its oldest event, and all
 * effects are applied before this returns. Returns false when nothing is
 * ready.
 */
export function runStep(scheduler: SchedulerState): boolean {
  const id = selectNext(scheduler);
  if (id === undefined) return false;

  const inst = scheduler.instances.get(id);
  const event = inst?.mailbox.shift();
  if (!inst || !event) return true;
  if (inst.state.tag === "TERMINATED") {
    markReady(scheduler, inst);
    return true;
  }

  // The parent observes its child here; only then is the child reaped.
  const child = childOf(event);
  if (child !== undefined) {
    inst.pendingChildren.delete(child);
    scheduler.instances.delete(child);
  }

  scheduler.stepCount++;
  const from = inst.state;
  const outcome = step(inst, event, stepContext(scheduler));

  if (outcome.tag === "NotReady") {
    inst.parked.push(event);
    emit(scheduler, { tag: "notReady", id, event: event.tag, state: showState(from) });
    markReady(scheduler, inst);
    return true;
  }

  inst.state = outcome.state;
  inst.env = outcome.env;
  inst.progress = outcome.progress;
  inst.stepCount++;
  if (inst.parked.length > 0) {
    inst.mailbox.push(...inst.parked);
    inst.parked = [];
  }

  emit(scheduler, {
    tag: "step",
    id,
    event: event.tag,
    from: showState(from),
    to: showState(outcome.state),
    stepCount: scheduler.stepCount,
  });

  applyEffects(scheduler, inst, outcome.effects);
  markReady(scheduler, inst);
  return true;
}

/**
 * Apply a transition's effects, in order.
 */
export function applyEffects(scheduler: SchedulerState, inst: FsmInstance, effects: Effect[]): void {
  for (const effect of effects) {
    switch (effect.tag) {
      case "spawn":
        spawnInstance(scheduler, effect.term, effect.env, effect.role, inst.id);
        break;

      case "publish":
        publishMessage(scheduler, effect.channel, effect.payload, effect.persistence, inst.id);
        break;

      case "request": {
        const r = scheduler.store.request(
          effect.channel,
          effect.patterns,
          effect.mode,
          inst.id,
          inst.env,
          effect.registration
        );
        emit(scheduler, { tag: "request", id: inst.id, channel: showVal(effect.channel), mode: effect.mode });
        if (r.tag === "Matched") deliver(scheduler, r.delivery);
        break;
      }

      case "join": {
        const r = scheduler.store.join(effect.arms, effect.mode, inst.id, inst.env, effect.registration);
        const channel = effect.arms.map((a) => showVal(a.channel)).join(" & ");
        emit(scheduler, { tag: "request", id: inst.id, channel, mode: effect.mode });
        if (r.tag === "Matched") deliver(scheduler, r.delivery);
        break;
      }

      case "select": {
        const r = scheduler.store.select(effect.arms, inst.id, inst.env);
        if (r.tag === "Matched") deliver(scheduler, r.delivery);
        break;
      }

      case "retract":
        scheduler.store.retract(effect.registration);
        break;

      case "enqueueSelf":
        enqueue(scheduler, inst.id, effect.event);
        break;

      case "startTimer":
        scheduler.timers.push({ instance: inst.id, due: scheduler.stepCount + effect.steps, steps: effect.steps });
        break;

      case "cancelChildren":
        for (const child of Array.from(inst.pendingChildren)) {
          inst.pendingChildren.delete(child);
          cancelInstance(scheduler, child);
        }
        break;

      case "finish":
        finishInstance(scheduler, inst, effect.value, effect.failure);
        break;
    }
  }
}

function deliver(scheduler: SchedulerState, d: Delivery): void {
  enqueue(scheduler, d.continuation, {
    tag: "MESSAGE_AVAILABLE",
    channel: d.channel,
    payload: d.payload,
    bindings: d.bindings,
    registration: d.registration,
    arm: d.arm,
    parts: d.parts,
  });
  const channel = showVal(d.channel);
  scheduler.logger.debug({ to: d.continuation, channel, mode: d.mode }, "deliver");
  emit(scheduler, { tag: "deliver", to: d.continuation, channel, registration: d.registration });
}

function systemStream(channel: Val): "stdout" | "stderr" | undefined {
  if (channel.tag !== "Chan") return undefined;
  if (channel.id === SYSTEM_CHANNELS.stdout) return "stdout";
  if (channel.id === SYSTEM_CHANNELS.stderr) return "stderr";
  return undefined;
}

/**
 * Offer a message to the store, or capture it when it is addressed to a
 * system channel.
 */
export function publishMessage(
  scheduler: SchedulerState,
  channel: Val,
  payload: Val[],
  persistence: SendPersistence,
  owner?: InstanceId
): void {
  const stream = systemStream(channel);
  if (stream) {
    const text = payload.map(valToText).join(" ");
    (stream === "stdout" ? scheduler.output : scheduler.errorOutput).push(text);
    scheduler.logger.info({ stream, text }, "output");
    emit(scheduler, { tag: "output", stream, text });
    return;
  }

  emit(scheduler, {
    tag: "publish",
    from: owner,
    channel: showVal(channel),
    payload: payload.map(showVal),
    persistence,
  });
  // A send that outlives its match goes on to the receives that were
  // already waiting behind the one it matched, each offered once.
  let waiting = scheduler.store.pendingReceives(channel).map((r) => r.id);
  let d = scheduler.store.publish(channel, payload, persistence, owner);
  while (d) {
    deliver(scheduler, d);
    waiting = waiting.slice(waiting.indexOf(d.registration) + 1);
    d = waiting.length > 0 ? scheduler.store.offer(channel, d.sendSeq, waiting) : undefined;
  }
}

/**
 * Record an instance's termination and notify its parent, if the parent
 * is still waiting for it.
 */
function finishInstance(scheduler: SchedulerState, inst: FsmInstance, value?: Val, failure?: Failure): void {
  inst.result = value;
  inst.failure = failure;
  scheduler.store.retractReceivesOf(inst.id);
  scheduler.timers = scheduler.timers.filter((t) => t.instance !== inst.id);

  if (failure && failure.reason !== "cancelled" && failure.reason !== "child-failed") {
    scheduler.errors.push({ instanceId: inst.id, failure });
    scheduler.logger.warn({ instance: inst.id, reason: failure.reason }, failure.message);
    emit(scheduler, { tag: "error", id: inst.id, failure });
  }
  emit(scheduler, {
    tag: "terminated",
    id: inst.id,
    value: value === undefined ? undefined : showVal(value),
    reason: failure?.reason,
  });

  const parent = inst.parentId !== undefined ? scheduler.instances.get(inst.parentId) : undefined;
  if (parent && parent.state.tag !== "TERMINATED" && parent.pendingChildren.has(inst.id)) {
    let note: EngineEvent;
    if (failure && failure.reason !== "cancelled") {
      note = { tag: "ERROR", child: inst.id, failure };
    } else if (inst.role === "expression") {
      note = { tag: "EXPRESSION_EVALUATED", child: inst.id, value: value ?? VNil };
    } else {
      note = { tag: "CONDITION_MET", child: inst.id };
    }
    enqueue(scheduler, parent.id, note);
  } else if (inst.id !== scheduler.rootId) {
    scheduler.instances.delete(inst.id);
  }
}

/**
 * Cancel an instance and, through it, every live descendant. Their receive
 * registrations and the persistent sends they own leave the store. Returns
 * false when the instance is unknown or already terminated.
 */
export function cancelInstance(scheduler: SchedulerState, id: InstanceId): boolean {
  const inst = scheduler.instances.get(id);
  if (!inst || inst.state.tag === "TERMINATED") return false;

  emit(scheduler, { tag: "cancel", id });
  scheduler.logger.debug({ instance: id }, "cancel");

  inst.mailbox = [];
  inst.parked = [];
  scheduler.ready = scheduler.ready.filter((r) => r !== id);

  const outcome = step(inst, { tag: "SIGNAL", signal: "cancel" }, stepContext(scheduler));
  if (outcome.tag === "Progressed") {
    inst.state = outcome.state;
    inst.env = outcome.env;
    inst.progress = outcome.progress;
    applyEffects(scheduler, inst, outcome.effects);
  }
  scheduler.store.retractOwnedBy(id);
  return true;
}

// ─────────────────────────────────────────────────────────────────
// Timers
// ─────────────────────────────────────────────────────────────────

function fireDueTimers(scheduler: SchedulerState): void {
  const due = scheduler.timers.filter((t) => t.due <= scheduler.stepCount);
  if (due.length === 0) return;
  scheduler.timers = scheduler.timers.filter((t) => t.due > scheduler.stepCount);
  for (const t of due) {
    emit(scheduler, { tag: "timeout", id: t.instance, steps: t.steps });
    enqueue(scheduler, t.instance, { tag: "TIMEOUT", steps: t.steps });
  }
}

/** With nothing ready, time jumps to the earliest pending timer. */
function fireEarliestTimer(scheduler: SchedulerState): boolean {
  if (scheduler.timers.length === 0) return false;
  const earliest = scheduler.timers.reduce((a, b) => (b.due < a.due ? b : a));
  scheduler.timers = scheduler.timers.filter((t) => t !== earliest);
  emit(scheduler, { tag: "timeout", id: earliest.instance, steps: earliest.steps });
  enqueue(scheduler, earliest.instance, { tag: "TIMEOUT", steps: earliest.steps });
  return true;
}

// ─────────────────────────────────────────────────────────────────
// Scheduler execution
// ─────────────────────────────────────────────────────────────────

export type RunOptions = {
  /** Maximum steps in this call before stopping with budget-exceeded */
  maxSteps: number;
};

/**
 * Run until nothing is ready or the step budget is spent.
 */
export function runScheduler(scheduler: SchedulerState, options: RunOptions): RunResult {
  const start = scheduler.stepCount;
  scheduler.logger.info({ root: scheduler.rootId, maxSteps: options.maxSteps }, "run start");

  for (;;) {
    fireDueTimers(scheduler);
    if (scheduler.ready.length === 0) {
      if (fireEarliestTimer(scheduler)) continue;
      break;
    }
    if (scheduler.stepCount - start >= options.maxSteps) {
      return finishRun(scheduler, "budget-exceeded", budgetExceeded(`${options.maxSteps} steps`));
    }
    runStep(scheduler);
  }

  return finishRun(scheduler, classify(scheduler));
}

/**
 * Why the run stopped, once nothing is ready.
 */
export function classify(scheduler: SchedulerState): RunStatus {
  const root = scheduler.rootId !== undefined ? scheduler.instances.get(scheduler.rootId) : undefined;
  if (!root) return "done";
  if (root.state.tag === "TERMINATED") return root.failure ? "error" : "done";
  return isQuiet(scheduler, root.id) ? "quiescent" : "deadlock";
}

function finishRun(scheduler: SchedulerState, status: RunStatus, budget?: Failure): RunResult {
  const root = scheduler.rootId !== undefined ? scheduler.instances.get(scheduler.rootId) : undefined;

  let deadlock: DeadlockReport | undefined;
  let failure: Failure | undefined = budget;
  if (status === "deadlock") {
    deadlock = buildDeadlockReport(scheduler);
    failure = deadlocked(deadlock.blocked.map((b) => b.id));
    scheduler.logger.warn({ blocked: deadlock.blocked.length }, deadlock.description);
  } else if (status === "error") {
    failure = root?.failure;
  }

  const result: RunResult = {
    status,
    value: root?.result,
    env: root?.env ?? Env.empty(),
    failure,
    errors: [...scheduler.errors],
    deadlock,
    diagnostics: runDiagnostics(scheduler, status, deadlock),
    listeners: listeners(scheduler),
    matches: scheduler.store.matches,
    output: [...scheduler.output],
    errorOutput: [...scheduler.errorOutput],
    steps: scheduler.stepCount,
    decisions: scheduler.decisions.map((d) => d.index),
  };

  const log = status === "done" || status === "quiescent" ? "info" : "warn";
  scheduler.logger[log]({ status, steps: result.steps, errors: result.errors.length }, "run finished");
  emit(scheduler, { tag: "finish", status, steps: result.steps });
  return result;
}
