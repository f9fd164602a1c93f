// src/core/concurrency/critic.ts
// Wait-for analysis of a stopped run: quiescence, deadlock reports, and
// messages nobody will ever receive.

import { describeProc } from "../ast";
import type { FsmInstance } from "../eval/machine";
import { showState } from "../eval/machine";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { InstanceId } from "./store";
import type { BlockedInstance, DeadlockReport, RunStatus, SchedulerState, WaitEdge } from "./types";

// ─────────────────────────────────────────────────────────────────
// Quiescence
// ─────────────────────────────────────────────────────────────────

/** A replicated receive parked on its channel. */
export function isListener(inst: FsmInstance): boolean {
  return inst.state.tag === "RECEIVING" && inst.state.mode === "PERSISTENT";
}

/**
 * True when the instance can only be woken by outside input: it is a
 * listener or a join, and everything it still waits for is quiet too.
 */
export function isQuiet(scheduler: SchedulerState, id: InstanceId, seen = new Set<InstanceId>()): boolean {
  const inst = scheduler.instances.get(id);
  if (!inst || inst.state.tag === "TERMINATED") return true;
  if (seen.has(id)) return false;
  seen.add(id);
  if (!isListener(inst) && inst.state.tag !== "JOINING") return false;
  for (const child of inst.pendingChildren) {
    if (!isQuiet(scheduler, child, seen)) return false;
  }
  return true;
}

export function listeners(scheduler: SchedulerState): InstanceId[] {
  const out: InstanceId[] = [];
  for (const [id, inst] of scheduler.instances) {
    if (isListener(inst)) out.push(id);
  }
  return out;
}

// ─────────────────────────────────────────────────────────────────
// Wait-for graph
// ─────────────────────────────────────────────────────────────────

function waitedChannels(scheduler: SchedulerState, inst: FsmInstance): string[] {
  return scheduler.store.registrationsOf(inst.id).map((r) => scheduler.store.snapshot(r.channel).channel);
}

/**
 * Build a wait-for graph over live instances. Joins point at each child
 * still pending; receives point at the channels they are registered on.
 */
export function buildWaitForGraph(scheduler: SchedulerState): WaitEdge[] {
  const edges: WaitEdge[] = [];

  for (const [id, inst] of scheduler.instances) {
    switch (inst.state.tag) {
      case "JOINING":
      case "EVALUATING":
        for (const child of inst.pendingChildren) {
          edges.push({ from: id, resource: `instance:${child}`, holder: child });
        }
        break;
      case "RECEIVING":
      case "WAITING":
        for (const channel of waitedChannels(scheduler, inst)) {
          edges.push({ from: id, resource: `channel:${channel}` });
        }
        break;
      default:
        break;
    }
  }

  return edges;
}

/**
 * Detect a cycle in the wait-for graph (classic deadlock detection).
 */
export function detectCycle(edges: WaitEdge[]): InstanceId[] | undefined {
  const next = new Map<InstanceId, InstanceId[]>();
  for (const e of edges) {
    if (e.holder === undefined) continue;
    const list = next.get(e.from) ?? [];
    list.push(e.holder);
    next.set(e.from, list);
  }

  const visited = new Set<InstanceId>();
  const stack = new Set<InstanceId>();
  const path: InstanceId[] = [];

  function dfs(id: InstanceId): InstanceId[] | undefined {
    if (stack.has(id)) return path.slice(path.indexOf(id));
    if (visited.has(id)) return undefined;

    visited.add(id);
    stack.add(id);
    path.push(id);

    for (const holder of next.get(id) ?? []) {
      const cycle = dfs(holder);
      if (cycle) return cycle;
    }

    path.pop();
    stack.delete(id);
    return undefined;
  }

  for (const id of next.keys()) {
    const cycle = dfs(id);
    if (cycle) return cycle;
  }
  return undefined;
}

// ─────────────────────────────────────────────────────────────────
// Deadlock report
// ─────────────────────────────────────────────────────────────────

/**
 * Every live instance that is not quiet, with what it waits on.
 */
export function blockedInstances(scheduler: SchedulerState): BlockedInstance[] {
  const out: BlockedInstance[] = [];

  for (const [id, inst] of scheduler.instances) {
    if (inst.state.tag === "TERMINATED" || isQuiet(scheduler, id)) continue;

    const channels = waitedChannels(scheduler, inst);
    const children = Array.from(inst.pendingChildren);
    let waitsOn: string;
    switch (inst.state.tag) {
      case "RECEIVING":
      case "WAITING":
        waitsOn = channels.length > 0 ? `message on ${channels.join(" | ")}` : "message";
        break;
      case "JOINING":
        waitsOn = `children ${children.join(", ")}`;
        break;
      case "EVALUATING":
        waitsOn = "expression child";
        break;
      default:
        waitsOn = `event in ${inst.state.tag}`;
    }

    out.push({
      id,
      state: showState(inst.state),
      term: describeProc(inst.term),
      waitsOn,
      channel: channels[0],
      children,
    });
  }

  return out;
}

/** Warnings for channels left holding messages no receive will take. */
export function unusedMessages(scheduler: SchedulerState): Diagnostic[] {
  return scheduler.store
    .nonEmptyChannels()
    .filter((c) => c.sends.length > 0 && c.receives.length === 0)
    .map((c) => makeDiagnostic("W0002", { channel: c.channel }));
}

/** Diagnostics attached to a run that stopped with the given status. */
export function runDiagnostics(scheduler: SchedulerState, status: RunStatus, report?: DeadlockReport): Diagnostic[] {
  if (report) return report.diagnostics;
  const out: Diagnostic[] = [];
  const live = listeners(scheduler);
  if (status === "quiescent" && live.length > 0) out.push(makeDiagnostic("W0001", { count: live.length }));
  out.push(...unusedMessages(scheduler));
  return out;
}

export function buildDeadlockReport(scheduler: SchedulerState): DeadlockReport {
  const blocked = blockedInstances(scheduler);
  const edges = buildWaitForGraph(scheduler);
  const cycle = detectCycle(edges);

  const diagnostics = [makeDiagnostic("E0302", { count: blocked.length }), ...unusedMessages(scheduler)];

  return {
    blocked,
    edges,
    cycle,
    channels: scheduler.store.nonEmptyChannels(),
    diagnostics,
    description: describeDeadlock(blocked),
  };
}

function describeDeadlock(blocked: BlockedInstance[]): string {
  const parts = ["Deadlock detected:"];
  for (const b of blocked) {
    parts.push(`  instance ${b.id} (${b.term}) in ${b.state} waiting on ${b.waitsOn}`);
  }
  return parts.join("\n");
}
