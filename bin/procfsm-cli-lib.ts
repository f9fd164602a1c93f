// bin/procfsm-cli-lib.ts
// Shared CLI utilities for the procfsm command
// Exported functions for testing

import * as fs from "fs";
import { fileURLToPath } from "url";
import type { PartialEngineConfig, SchedulingPolicyName } from "../src/core/config";
import { SCHEDULING_POLICIES } from "../src/core/config";
import type { LogLevel } from "../src/core/logging";
import { isLogLevel } from "../src/core/logging";
import type { Injection } from "../src/core/inject/validate";
import { decodeValue, parseJson } from "../src/core/codec";
import { DecodeError } from "../src/core/errors";
import type { RunResult } from "../src/core/concurrency/types";
import type { ValJson } from "../src/core/eval/values";
import { showVal, valToJson } from "../src/core/eval/values";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  file?: string;
  config?: string;
  maxSteps?: number;
  policy?: SchedulingPolicyName;
  replay?: number[];
  syncTimeout?: number;
  logLevel?: LogLevel;
  pretty?: boolean;
  json?: boolean;
  trace?: boolean;
  inject: string[];
  errors: string[];
};

export type CliConfig = {
  file?: string;
  configFile?: string;
  overrides: PartialEngineConfig;
  injections: string[];
  json: boolean;
  trace: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function positiveInt(flag: string, raw: string | undefined, errors: string[]): number | undefined {
  const n = Number(raw);
  if (raw === undefined || !Number.isInteger(n) || n < 1) {
    errors.push(`${flag} expects a positive integer, got ${raw ?? "nothing"}`);
    return undefined;
  }
  return n;
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { inject: [], errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (arg === "--max-steps") {
      result.maxSteps = positiveInt(arg, args[++i], result.errors);
    } else if (arg === "--sync-timeout") {
      result.syncTimeout = positiveInt(arg, args[++i], result.errors);
    } else if (arg === "--policy") {
      const name = args[++i];
      const policy = SCHEDULING_POLICIES.find((p) => p === name);
      if (policy) result.policy = policy;
      else result.errors.push(`--policy expects one of ${SCHEDULING_POLICIES.join(", ")}, got ${name ?? "nothing"}`);
    } else if (arg === "--replay") {
      const raw = args[++i] ?? "";
      const decisions = raw.split(",").map((d) => Number(d.trim()));
      if (raw.trim() === "" || decisions.some((d) => !Number.isInteger(d) || d < 0)) {
        result.errors.push(`--replay expects comma-separated indices, got ${raw || "nothing"}`);
      } else {
        result.replay = decisions;
        result.policy = "replay";
      }
    } else if (arg === "--log-level") {
      const level = args[++i];
      if (level !== undefined && isLogLevel(level)) result.logLevel = level;
      else result.errors.push(`--log-level expects a pino level, got ${level ?? "nothing"}`);
    } else if (arg === "--pretty") {
      result.pretty = true;
    } else if (arg === "--json") {
      result.json = true;
    } else if (arg === "--trace") {
      result.trace = true;
    } else if (arg === "--inject" || arg === "-i") {
      const raw = args[++i];
      if (raw === undefined) result.errors.push("--inject expects a JSON message");
      else result.inject.push(raw);
    } else if (arg.startsWith("-")) {
      result.errors.push(`Unknown option: ${arg}`);
    } else if (!result.file) {
      // First non-flag argument is the term file
      result.file = arg;
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
procfsm - run a process term on the FSM engine

USAGE:
  procfsm [options] <term.json>      Run a JSON process term and print the report

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -c, --config <file>                Load configuration from a JSON file
  --max-steps <n>                    Step budget for the run
  --policy <name>                    Scheduling policy: round-robin | replay
  --replay <i,j,...>                 Replay recorded scheduling decisions
  --sync-timeout <n>                 Fail synchronous sends unanswered after n steps
  -i, --inject <json>                Publish {"channel": v, "payload": [v...]} before running
  --log-level <level>                fatal | error | warn | info | debug | trace | silent
  --pretty                           Human-readable logs
  --json                             Print the report as JSON
  --trace                            Print engine events as they happen

ENVIRONMENT:
  PROCFSM_MAX_STEPS, PROCFSM_POLICY, PROCFSM_SYNC_TIMEOUT_STEPS,
  PROCFSM_LOG_LEVEL, PROCFSM_LOG_PRETTY

EXAMPLES:
  procfsm examples/hello.json
  procfsm --inject '{"channel": {"uri": "svc"}, "payload": [1]}' examples/service.json
  procfsm --json --max-steps 5000 examples/hello.json
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return `procfsm v${pkg.version}`;
    }
    return "procfsm v0.1.0";
  } catch {
    return "procfsm v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: CliArgs): CliConfig {
  const overrides: PartialEngineConfig = {};

  if (
    args.maxSteps !== undefined ||
    args.policy !== undefined ||
    args.replay !== undefined ||
    args.syncTimeout !== undefined
  ) {
    overrides.scheduler = {
      maxSteps: args.maxSteps,
      policy: args.policy,
      replay: args.replay,
      syncSendTimeoutSteps: args.syncTimeout,
    };
  }
  if (args.logLevel !== undefined || args.pretty !== undefined) {
    overrides.logging = { level: args.logLevel, pretty: args.pretty };
  }

  return {
    file: args.file,
    configFile: args.config,
    overrides,
    injections: args.inject,
    json: args.json ?? false,
    trace: args.trace ?? false,
  };
}

/**
 * Decode one --inject argument: {"channel": <value>, "payload": [<value>...]}.
 */
export function parseInjection(raw: string): Injection {
  const json = parseJson(raw);
  if (!json || typeof json !== "object" || !("channel" in json) || !("payload" in json)) {
    throw new DecodeError("Injected message needs channel and payload", ["(root): expected {channel, payload}"]);
  }
  if (!Array.isArray(json.payload)) {
    throw new DecodeError("Injected payload must be an array", ["payload: expected array"]);
  }
  return {
    channel: decodeValue(json.channel),
    payload: json.payload.map((item: unknown) => decodeValue(item)),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPORTING
// ═══════════════════════════════════════════════════════════════════════════════

export function formatReport(result: RunResult): string {
  const lines = [`status: ${result.status}`, `steps: ${result.steps}`];

  if (result.value !== undefined) lines.push(`value: ${showVal(result.value)}`);
  for (const text of result.output) lines.push(`stdout: ${text}`);
  for (const text of result.errorOutput) lines.push(`stderr: ${text}`);
  for (const e of result.errors) lines.push(`error: instance ${e.instanceId}: ${e.failure.message}`);
  if (result.failure && result.status !== "deadlock") lines.push(`failure: ${result.failure.message}`);
  if (result.deadlock) lines.push(result.deadlock.description);
  if (result.listeners.length > 0) lines.push(`listeners: ${result.listeners.join(", ")}`);
  for (const d of result.diagnostics) {
    if (d.severity === "warning") lines.push(`warning: ${d.code} ${d.message}`);
  }

  return lines.join("\n");
}

export type JsonReport = {
  status: string;
  steps: number;
  value: ValJson;
  env: Record<string, ValJson>;
  output: string[];
  errorOutput: string[];
  errors: Array<{ instance: number; reason: string; message: string }>;
  failure?: { reason: string; message: string };
  deadlock?: { description: string; blocked: number[] };
  listeners: number[];
  diagnostics: Array<{ code: string; severity: string; message: string }>;
  decisions: number[];
};

export function reportToJson(result: RunResult): JsonReport {
  const env: Record<string, ValJson> = {};
  for (const [name, v] of result.env.entries()) env[name] = valToJson(v);

  return {
    status: result.status,
    steps: result.steps,
    value: result.value === undefined ? null : valToJson(result.value),
    env,
    output: result.output,
    errorOutput: result.errorOutput,
    errors: result.errors.map((e) => ({
      instance: e.instanceId,
      reason: e.failure.reason,
      message: e.failure.message,
    })),
    failure: result.failure ? { reason: result.failure.reason, message: result.failure.message } : undefined,
    deadlock: result.deadlock
      ? { description: result.deadlock.description, blocked: result.deadlock.blocked.map((b) => b.id) }
      : undefined,
    listeners: result.listeners,
    diagnostics: result.diagnostics.map((d) => ({ code: d.code, severity: d.severity, message: d.message })),
    decisions: result.decisions,
  };
}

/** Process exit code for a run status. */
export function exitCodeFor(result: RunResult): number {
  return result.status === "done" || result.status === "quiescent" ? 0 : 1;
}
