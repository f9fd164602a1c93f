// src/core/config/index.ts
// Configuration system exports

export {
  type SchedulingPolicyName,
  type SchedulerConfig,
  type LoggingConfig,
  type EngineConfig,
  type PartialEngineConfig,
  type ConfigInput,
  type ConfigValidation,
  SCHEDULING_POLICIES,
  DEFAULT_SCHEDULER_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  ConfigSchema,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
