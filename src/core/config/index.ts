// src/core/config/index.ts
// Configuration system exports

export {
  type LetScoping,
  type EvalPolicy,
  type RuntimeConfig,
  type AgentLispConfig,
  type ConfigOverrides,
  type ConfigValidation,
  LET_SCOPINGS,
  TRUTHINESS_RULES,
  DEFAULT_POLICY,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
