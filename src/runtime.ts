// src/runtime.ts
// Engine - the API a caller drives a run through
//
// Usage:
//   import { Engine, decodeProcess } from "procfsm";
//
//   const engine = new Engine({ config: { logging: { level: "warn" } } });
//   engine.load(decodeProcess(json));
//   const result = engine.run();
//   console.log(result.status, result.output);

import type { Proc } from "./core/ast";
import { Env } from "./core/eval/env";
import type { FsmInstance } from "./core/eval/machine";
import type { Val } from "./core/eval/values";
import type { EngineConfig, PartialEngineConfig } from "./core/config";
import { mergeConfigs, validateConfig } from "./core/config";
import type { Logger } from "./core/logging";
import { loggerFor } from "./core/logging";
import { ConfigError, EngineStateError, InjectionError } from "./core/errors";
import type { Injection } from "./core/inject/validate";
import { checkInjection } from "./core/inject/validate";
import type { InstanceId, StoreStats } from "./core/concurrency/store";
import type { Observer, RunResult, SchedulePolicy, SchedulerState } from "./core/concurrency/types";
import {
  cancelInstance,
  createReplayPolicy,
  createScheduler,
  publishMessage,
  runScheduler,
  spawnRoot,
} from "./core/concurrency/scheduler";

/**
 * Options for Engine
 */
export type EngineOptions = {
  /** Overrides merged over the defaults */
  config?: PartialEngineConfig;

  /** Logger to use instead of one built from config.logging */
  logger?: Logger;
};

function policyFor(config: EngineConfig): SchedulePolicy {
  return config.scheduler.policy === "replay"
    ? createReplayPolicy(config.scheduler.replay ?? [])
    : { tag: "RoundRobin" };
}

/**
 * Engine - one logical execution space
 *
 * Owns its scheduler, channel store and counters; two engines never share
 * state. A run may be resumed: inject more messages after run() returns and
 * call run() again.
 */
export class Engine {
  readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly scheduler: SchedulerState;

  constructor(options: EngineOptions = {}) {
    this.config = mergeConfigs(options.config ?? {});
    const check = validateConfig(this.config);
    if (!check.valid) {
      throw new ConfigError(`Invalid configuration: ${check.errors.join("; ")}`, check.errors);
    }

    this.logger = options.logger ?? loggerFor(this.config.logging);
    for (const warning of check.warnings) {
      this.logger.warn({}, warning);
    }

    this.scheduler = createScheduler({
      policy: policyFor(this.config),
      syncSendTimeoutSteps: this.config.scheduler.syncSendTimeoutSteps,
      logger: this.logger,
    });
  }

  /**
   * Load the top-level process. Returns the root instance id.
   */
  load(term: Proc, env: Env = Env.empty()): InstanceId {
    if (this.scheduler.rootId !== undefined) {
      throw new EngineStateError("A process is already loaded");
    }
    return spawnRoot(this.scheduler, term, env).id;
  }

  /**
   * Run until the root terminates, nothing more can happen, or the step
   * budget is spent.
   *
   * @example
   * const result = engine.run({ maxSteps: 10_000 });
   * if (result.status === "deadlock") console.error(result.deadlock?.description);
   */
  run(options: { maxSteps?: number } = {}): RunResult {
    if (this.scheduler.rootId === undefined) {
      throw new EngineStateError("run() called before load()");
    }
    return runScheduler(this.scheduler, {
      maxSteps: options.maxSteps ?? this.config.scheduler.maxSteps,
    });
  }

  /**
   * Publish a message from outside the process tree. Throws InjectionError,
   * leaving the store untouched, when the message is malformed.
   */
  inject(channel: Val, payload: Val[]): void {
    const problem = checkInjection(this.scheduler.store, channel, payload);
    if (problem) {
      this.logger.warn({ reason: problem.reason }, problem.message);
      throw new InjectionError(problem.message, problem);
    }
    publishMessage(this.scheduler, channel, payload, "ONCE");
  }

  /**
   * Cancel an instance and its live descendants.
   */
  cancel(id: InstanceId): boolean {
    return cancelInstance(this.scheduler, id);
  }

  /**
   * Subscribe to the engine event ledger. Returns an unsubscribe function.
   */
  observe(listener: Observer): () => void {
    this.scheduler.observers.push(listener);
    return () => {
      const i = this.scheduler.observers.indexOf(listener);
      if (i >= 0) this.scheduler.observers.splice(i, 1);
    };
  }

  get rootId(): InstanceId | undefined {
    return this.scheduler.rootId;
  }

  instance(id: InstanceId): FsmInstance | undefined {
    return this.scheduler.instances.get(id);
  }

  stats(): StoreStats {
    return this.scheduler.store.stats();
  }
}

export type RunProcessOptions = EngineOptions & {
  env?: Env;
  /** Messages published before the first step, in order */
  inject?: Injection[];
  maxSteps?: number;
  observe?: Observer;
};

/**
 * Load a term into a fresh engine and run it.
 */
export function runProcess(term: Proc, options: RunProcessOptions = {}): RunResult {
  const engine = new Engine(options);
  if (options.observe) engine.observe(options.observe);
  engine.load(term, options.env);
  for (const m of options.inject ?? []) {
    engine.inject(m.channel, m.payload);
  }
  return engine.run({ maxSteps: options.maxSteps });
}
