// src/core/concurrency/types.ts
// Scheduler state, run results and the engine event ledger.

import type { Env } from "../eval/env";
import type { Val } from "../eval/values";
import type { EventTag, FsmInstance, InstanceRole } from "../eval/machine";
import type { Failure, FailureReason } from "../../outcome/failure";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { Logger } from "../logging";
import type {
  ChannelSnapshot,
  ChannelStore,
  InstanceId,
  MatchRecord,
  ReceiveMode,
  RegistrationId,
  SendPersistence,
} from "./store";

// ─────────────────────────────────────────────────────────────────
// Scheduling policies
// ─────────────────────────────────────────────────────────────────

/**
 * SchedulePolicy: Strategy for selecting the next ready instance.
 */
export type SchedulePolicy =
  | { tag: "RoundRobin" }
  | { tag: "Replay"; decisions: number[] };

/**
 * ScheduleDecision: Record of a scheduling choice.
 */
export type ScheduleDecision = {
  /** Chosen instance */
  chosen: InstanceId;
  /** Index in the ready ring */
  index: number;
  /** Size of the ready ring at decision time */
  readySize: number;
  /** Global step count */
  stepCount: number;
};

// ─────────────────────────────────────────────────────────────────
// Timers
// ─────────────────────────────────────────────────────────────────

export type PendingTimer = {
  instance: InstanceId;
  /** Step count at which TIMEOUT is delivered */
  due: number;
  steps: number;
};

// ─────────────────────────────────────────────────────────────────
// Scheduler state
// ─────────────────────────────────────────────────────────────────

export type RecordedError = {
  instanceId: InstanceId;
  failure: Failure;
};

/**
 * SchedulerState: Everything one run owns. Independent runs never share any
 * part of it.
 */
export type SchedulerState = {
  /** Live and not-yet-reaped instances by id */
  instances: Map<InstanceId, FsmInstance>;
  /** Instance ids with non-empty mailboxes, in round-robin order */
  ready: InstanceId[];
  store: ChannelStore;
  policy: SchedulePolicy;
  stepCount: number;
  decisions: ScheduleDecision[];
  replayIndex: number;
  nextInstanceId: InstanceId;
  timers: PendingTimer[];
  rootId?: InstanceId;
  errors: RecordedError[];
  output: string[];
  errorOutput: string[];
  observers: Array<(event: EngineTrace) => void>;
  syncSendTimeoutSteps?: number;
  logger: Logger;
};

// ─────────────────────────────────────────────────────────────────
// Run results
// ─────────────────────────────────────────────────────────────────

export type RunStatus = "done" | "quiescent" | "deadlock" | "error" | "budget-exceeded";

export type BlockedInstance = {
  id: InstanceId;
  state: string;
  term: string;
  /** What the instance waits for, e.g. a channel or its children */
  waitsOn: string;
  channel?: string;
  children: InstanceId[];
};

export type WaitEdge = {
  from: InstanceId;
  resource: string;
  /** Instance expected to release the resource, when known */
  holder?: InstanceId;
};

export type DeadlockReport = {
  blocked: BlockedInstance[];
  edges: WaitEdge[];
  /** A wait-for cycle, when the instances block each other */
  cycle?: InstanceId[];
  /** Channels still holding entries */
  channels: ChannelSnapshot[];
  diagnostics: Diagnostic[];
  description: string;
};

export type RunResult = {
  status: RunStatus;
  /** Value produced by the root term, when it is an expression */
  value?: Val;
  /** Root instance's environment when the run stopped */
  env: Env;
  /** Root failure, deadlock or exhausted budget */
  failure?: Failure;
  /** Every failure raised by an instance, in order */
  errors: RecordedError[];
  deadlock?: DeadlockReport;
  /** Warnings about the stopped run, or the deadlock report's diagnostics */
  diagnostics: Diagnostic[];
  /** Persistent listeners still registered */
  listeners: InstanceId[];
  matches: readonly MatchRecord[];
  output: string[];
  errorOutput: string[];
  steps: number;
  decisions: number[];
};

// ─────────────────────────────────────────────────────────────────
// Engine event ledger
// ─────────────────────────────────────────────────────────────────

/**
 * EngineTrace: Record of a scheduler operation, emitted to observers.
 */
export type EngineTrace =
  | { tag: "spawn"; id: InstanceId; parentId?: InstanceId; role: InstanceRole; term: string }
  | { tag: "step"; id: InstanceId; event: EventTag; from: string; to: string; stepCount: number }
  | { tag: "notReady"; id: InstanceId; event: EventTag; state: string }
  | { tag: "publish"; from?: InstanceId; channel: string; payload: string[]; persistence: SendPersistence }
  | { tag: "request"; id: InstanceId; channel: string; mode: ReceiveMode }
  | { tag: "deliver"; to: InstanceId; channel: string; registration: RegistrationId }
  | { tag: "output"; stream: "stdout" | "stderr"; text: string }
  | { tag: "terminated"; id: InstanceId; value?: string; reason?: FailureReason }
  | { tag: "error"; id: InstanceId; failure: Failure }
  | { tag: "cancel"; id: InstanceId }
  | { tag: "timeout"; id: InstanceId; steps: number }
  | { tag: "schedule"; decision: ScheduleDecision }
  | { tag: "finish"; status: RunStatus; steps: number };

export type Observer = (event: EngineTrace) => void;
