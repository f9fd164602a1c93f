// src/core/config/config.ts
// Configuration for the engine: scheduler limits and logging.
// Sources, lowest priority first: defaults, environment, config file, overrides.

import * as fs from "fs";
import * as path from "path";
import {
  array,
  boolean,
  getDotPath,
  integer,
  minValue,
  number,
  object,
  optional,
  picklist,
  pipe,
  safeParse,
  type InferOutput,
} from "valibot";
import { ConfigError } from "../errors";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "../logging";

// =========================================================================
// Configuration Types
// =========================================================================

export type SchedulingPolicyName = "round-robin" | "replay";

export const SCHEDULING_POLICIES: readonly SchedulingPolicyName[] = ["round-robin", "replay"];

export type SchedulerConfig = {
  /** Maximum transition steps per run before the run stops with budget-exceeded */
  maxSteps: number;
  /** Which ready instance steps next */
  policy: SchedulingPolicyName;
  /** Recorded ready-ring indices consumed by the replay policy */
  replay?: number[];
  /** Steps a synchronous send waits for its acknowledgement; unbounded when absent */
  syncSendTimeoutSteps?: number;
};

export type LoggingConfig = {
  level: LogLevel;
  pretty: boolean;
};

export type EngineConfig = {
  scheduler: SchedulerConfig;
  logging: LoggingConfig;
};

export type PartialEngineConfig = {
  scheduler?: Partial<SchedulerConfig>;
  logging?: Partial<LoggingConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  maxSteps: 1_000_000,
  policy: "round-robin",
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: "info",
  pretty: false,
};

export const DEFAULT_CONFIG: EngineConfig = {
  scheduler: DEFAULT_SCHEDULER_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["procfsm.config.json", ".procfsmrc.json"];

// =========================================================================
// Schema
// =========================================================================

const PositiveInt = pipe(number(), integer(), minValue(1));

export const ConfigSchema = object({
  scheduler: optional(
    object({
      maxSteps: optional(PositiveInt),
      policy: optional(picklist(SCHEDULING_POLICIES)),
      replay: optional(array(pipe(number(), integer(), minValue(0)))),
      syncSendTimeoutSteps: optional(PositiveInt),
    })
  ),
  logging: optional(
    object({
      level: optional(picklist(LOG_LEVELS)),
      pretty: optional(boolean()),
    })
  ),
});

export type ConfigInput = InferOutput<typeof ConfigSchema>;

// =========================================================================
// Configuration Loading
// =========================================================================

type EnvSource = Record<string, string | undefined>;

function envInt(env: EnvSource, key: string): number | undefined {
  const n = parseInt(env[key] || "", 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

/**
 * Load configuration from environment variables. Unparseable values fall
 * back to the defaults.
 */
export function configFromEnv(prefix = "PROCFSM", env: EnvSource = process.env): EngineConfig {
  const policy = env[`${prefix}_POLICY`];
  const level = env[`${prefix}_LOG_LEVEL`];
  const pretty = env[`${prefix}_LOG_PRETTY`];

  return mergeConfigs({
    scheduler: {
      maxSteps: envInt(env, `${prefix}_MAX_STEPS`),
      policy: SCHEDULING_POLICIES.find((p) => p === policy),
      syncSendTimeoutSteps: envInt(env, `${prefix}_SYNC_TIMEOUT_STEPS`),
    },
    logging: {
      level: level !== undefined && isLogLevel(level) ? level : undefined,
      pretty: pretty === undefined ? undefined : pretty === "1" || pretty === "true",
    },
  });
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): EngineConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`, [filePath]);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new ConfigError(`Unsupported config file format: ${ext}`, [filePath]);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Config file is not valid JSON: ${filePath}`, [e instanceof Error ? e.message : String(e)]);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g. parsed JSON). Throws
 * ConfigError listing every offending field.
 */
export function configFromObject(data: unknown): EngineConfig {
  const parsed = safeParse(ConfigSchema, data);
  if (!parsed.success) {
    const issues = parsed.issues.map((issue) => `${getDotPath(issue) ?? "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return mergeConfigs(parsed.output);
}

/**
 * Merge configs over the defaults, later ones overriding earlier ones.
 * Undefined fields never override.
 */
export function mergeConfigs(...configs: Array<PartialEngineConfig | ConfigInput>): EngineConfig {
  const result: EngineConfig = {
    scheduler: { ...DEFAULT_CONFIG.scheduler },
    logging: { ...DEFAULT_CONFIG.logging },
  };

  for (const cfg of configs) {
    const s = cfg.scheduler;
    if (s) {
      result.scheduler = {
        maxSteps: s.maxSteps ?? result.scheduler.maxSteps,
        policy: s.policy ?? result.scheduler.policy,
        replay: s.replay ?? result.scheduler.replay,
        syncSendTimeoutSteps: s.syncSendTimeoutSteps ?? result.scheduler.syncSendTimeoutSteps,
      };
    }
    const l = cfg.logging;
    if (l) {
      result.logging = {
        level: l.level ?? result.logging.level,
        pretty: l.pretty ?? result.logging.pretty,
      };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialEngineConfig;
  env?: EnvSource;
  cwd?: string;
}): EngineConfig {
  let config = configFromEnv("PROCFSM", options?.env ?? process.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.resolve(options?.cwd ?? process.cwd(), name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: EngineConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.scheduler.maxSteps) || config.scheduler.maxSteps < 1) {
    errors.push("scheduler.maxSteps must be a positive integer");
  } else if (config.scheduler.maxSteps < 100) {
    warnings.push("scheduler.maxSteps is very low, runs may stop with budget-exceeded");
  }

  const timeout = config.scheduler.syncSendTimeoutSteps;
  if (timeout !== undefined && (!Number.isInteger(timeout) || timeout < 1)) {
    errors.push("scheduler.syncSendTimeoutSteps must be a positive integer");
  }

  if (config.scheduler.policy === "replay" && (config.scheduler.replay ?? []).length === 0) {
    warnings.push("replay policy without recorded decisions behaves as round-robin");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
