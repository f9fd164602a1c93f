// src/index.ts
// procfsm - Public API
//
// Process terms in, run results out.

// ═══════════════════════════════════════════════════════════════════════════════
// CORE RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { Engine, runProcess, type EngineOptions, type RunProcessOptions } from "./runtime";
export type { Injection } from "./core/inject/validate";
export { checkInjection } from "./core/inject/validate";

// ═══════════════════════════════════════════════════════════════════════════════
// TERMS & VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  Proc,
  ProcOf,
  ProcTag,
  Bind,
  Receipt,
  Source,
  NameDecl,
  MatchCase,
  SelectBranch,
  LetBinding,
  BinaryOp,
  UnaryOp,
  BundleMode,
  SimpleTypeName,
} from "./core/ast";
export { describeProc, freeVars, patternBinders, isExpression } from "./core/ast";

export type { Val, Caps, ProcVal, ValJson } from "./core/eval/values";
export {
  VNil,
  VUnit,
  VTrue,
  VFalse,
  vBool,
  vInt,
  vStr,
  vUri,
  vChan,
  vList,
  vTuple,
  vSet,
  vMap,
  valEq,
  valKey,
  showVal,
  valToText,
  valToJson,
} from "./core/eval/values";
export { Env } from "./core/eval/env";

// ═══════════════════════════════════════════════════════════════════════════════
// STATE MACHINE
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  MachineState,
  StateTag,
  EngineEvent,
  EventTag,
  Effect,
  FsmInstance,
  InstanceRole,
  Progress,
  StepContext,
  StepOutcome,
} from "./core/eval/machine";
export { showState } from "./core/eval/machine";
export { step } from "./core/eval/machineStep";
export { matchPattern, matchFormals, type MatchBindings } from "./core/eval/match";

// ═══════════════════════════════════════════════════════════════════════════════
// CHANNEL STORE & SCHEDULER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/concurrency";

// ═══════════════════════════════════════════════════════════════════════════════
// CODEC, CONFIG, LOGGING, ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/codec";
export * from "./core/config";
export { makeLogger, loggerFor, silentLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel } from "./core/logging";
export { EngineError, InjectionError, DecodeError, ConfigError, EngineStateError } from "./core/errors";
export * from "./outcome";
