// src/core/eval/machine.ts
// The closed set of machine states, events and effects, and the FSM instance
// record the scheduler owns.

import type { Proc } from "../ast";
import type { Env } from "./env";
import type { Val } from "./values";
import type { MatchBindings } from "./match";
import type { Failure } from "../../outcome/failure";
import type {
  ChannelStoreView,
  InstanceId,
  ReceiveMode,
  RegistrationId,
  SelectArm,
  SendPersistence,
} from "../concurrency/store";

// ─────────────────────────────────────────────────────────────────
// States
// ─────────────────────────────────────────────────────────────────

/** Which operand an EVALUATING state is working on. */
export type ExprRef = { slot: OperandSlot; index: number };

export type OperandSlot =
  | "channel"
  | "payload"
  | "operand"
  | "condition"
  | "scrutinee"
  | "element"
  | "value"
  | "name";

export type BundlingMode = "READ" | "WRITE" | "EQUIV" | "RW";
export type CollectionKind = "SET" | "MAP" | "LIST" | "TUPLE";
export type ConstructKind = "bundle";

export type MachineState =
  | { tag: "INITIAL" }
  | { tag: "EVALUATING"; ref: ExprRef }
  | { tag: "SENDING" }
  | { tag: "RECEIVING"; mode: ReceiveMode }
  | { tag: "WAITING" }
  | { tag: "BRANCHING" }
  | { tag: "FORKING" }
  | { tag: "JOINING" }
  | { tag: "BINDING"; name: string }
  | { tag: "MATCHING"; pattern: number }
  | { tag: "CONSTRUCTING"; kind: ConstructKind }
  | { tag: "OPERATING"; op: string }
  | { tag: "BUNDLING"; mode: BundlingMode }
  | { tag: "REFERENCING"; mode: "COPY" | "MOVE" }
  | { tag: "INTERPOLATING" }
  | { tag: "CONJOINING" }
  | { tag: "DISJOINING" }
  | { tag: "NEGATING" }
  | { tag: "COLLECTING"; kind: CollectionKind }
  | { tag: "TERMINATING" }
  | { tag: "TERMINATED" };

export type StateTag = MachineState["tag"];

export function showState(s: MachineState): string {
  switch (s.tag) {
    case "EVALUATING":
      return `EVALUATING(${s.ref.slot}:${s.ref.index})`;
    case "RECEIVING":
    case "BUNDLING":
    case "REFERENCING":
      return `${s.tag}(${s.mode})`;
    case "BINDING":
      return `BINDING(${s.name})`;
    case "MATCHING":
      return `MATCHING(${s.pattern})`;
    case "CONSTRUCTING":
    case "COLLECTING":
      return `${s.tag}(${s.kind})`;
    case "OPERATING":
      return `OPERATING(${s.op})`;
    default:
      return s.tag;
  }
}

// ─────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────

export type Signal = "start" | "continue" | "cancel";

export type EngineEvent =
  | { tag: "SIGNAL"; signal: Signal }
  | {
      tag: "MESSAGE_AVAILABLE";
      channel: Val;
      payload: Val[];
      bindings: MatchBindings;
      registration: RegistrationId;
      arm?: number;
      /** One payload per component of a join */
      parts?: Val[][];
    }
  | { tag: "CONDITION_MET"; child: InstanceId }
  | { tag: "EXPRESSION_EVALUATED"; child: InstanceId; value: Val }
  | { tag: "PATTERN_MATCHED"; bindings: MatchBindings; pattern: number }
  | { tag: "TIMEOUT"; steps: number }
  | { tag: "ERROR"; child: InstanceId; failure: Failure };

export type EventTag = EngineEvent["tag"];

// ─────────────────────────────────────────────────────────────────
// Effects
// ─────────────────────────────────────────────────────────────────

export type InstanceRole = "process" | "expression";

export type Effect =
  | { tag: "spawn"; term: Proc; env: Env; role: InstanceRole }
  | { tag: "publish"; channel: Val; payload: Val[]; persistence: SendPersistence }
  | {
      tag: "request";
      channel: Val;
      patterns: Proc[];
      mode: Exclude<ReceiveMode, "RACE">;
      registration?: RegistrationId;
    }
  | {
      tag: "join";
      arms: SelectArm[];
      mode: Exclude<ReceiveMode, "RACE">;
      registration?: RegistrationId;
    }
  | { tag: "select"; arms: SelectArm[] }
  | { tag: "retract"; registration: RegistrationId }
  | { tag: "enqueueSelf"; event: EngineEvent }
  | { tag: "startTimer"; steps: number }
  | { tag: "cancelChildren" }
  | { tag: "finish"; value?: Val; failure?: Failure };

// ─────────────────────────────────────────────────────────────────
// Instance
// ─────────────────────────────────────────────────────────────────

/**
 * Construct-specific progress, carried between steps. Replaced (never
 * mutated) by each Progressed outcome.
 */
export type Progress = {
  /** Operand values evaluated so far */
  values: Val[];
  /** Receipt (for) or binding (let) currently being worked on */
  cursor: number;
  /** Bindings still waiting for their BINDING step */
  pending: Array<[string, Val]>;
  /** Scope being built for a replicated body */
  scope?: Env;
  /** Evaluated channel of the current send/receive */
  channel?: Val;
  /** Channels and patterns of the current join receipt */
  components?: SelectArm[];
  registration?: RegistrationId;
  /** Select arm or match case that fired */
  arm?: number;
  /** Set once a persistent receipt has fired; child outcomes are then ignored */
  listening?: boolean;
  /** Fresh names minted so far by this instance */
  minted: number;
  /** First failure reported by a child while joining */
  failure?: Failure;
  result?: Val;
};

export const EMPTY_PROGRESS: Progress = { values: [], cursor: 0, pending: [], minted: 0 };

export type FsmInstance = {
  id: InstanceId;
  term: Proc;
  role: InstanceRole;
  state: MachineState;
  env: Env;
  progress: Progress;
  parentId?: InstanceId;
  pendingChildren: Set<InstanceId>;
  /** FIFO of events addressed to this instance */
  mailbox: EngineEvent[];
  /** Events that enabled no transition, retried after the next progress */
  parked: EngineEvent[];
  result?: Val;
  failure?: Failure;
  stepCount: number;
};

// ─────────────────────────────────────────────────────────────────
// Transition contract
// ─────────────────────────────────────────────────────────────────

export type StepContext = {
  store: ChannelStoreView;
  /** Deliver TIMEOUT to a WAITING synchronous send after this many steps */
  syncSendTimeoutSteps?: number;
};

export type StepOutcome =
  | { tag: "Progressed"; state: MachineState; env: Env; progress: Progress; effects: Effect[] }
  | { tag: "NotReady" };
