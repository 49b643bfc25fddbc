// src/core/config/config.ts
// Configuration: evaluation policy and run limits.

import * as fs from "fs";
import * as path from "path";
import type { Truthiness } from "../eval/values";

// =========================================================================
// Configuration Types
// =========================================================================

/**
 * Whether a `let` initializer sees the bindings before it in the same `let`.
 * "parallel": every initializer runs in the enclosing environment.
 * "sequential": each initializer also sees the earlier bindings.
 */
export type LetScoping = "parallel" | "sequential";

export type EvalPolicy = {
  letScoping: LetScoping;
  truthiness: Truthiness;
};

export type RuntimeConfig = {
  /** Steps the run helpers take before giving up */
  maxEvalSteps: number;
};

export type AgentLispConfig = {
  policy: EvalPolicy;
  runtime: RuntimeConfig;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const LET_SCOPINGS: readonly LetScoping[] = ["parallel", "sequential"];
export const TRUTHINESS_RULES: readonly Truthiness[] = ["zero-and-empty-false", "empty-false"];

export const DEFAULT_POLICY: EvalPolicy = {
  letScoping: "parallel",
  truthiness: "zero-and-empty-false",
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxEvalSteps: 100_000,
};

export const DEFAULT_CONFIG: AgentLispConfig = {
  policy: DEFAULT_POLICY,
  runtime: DEFAULT_RUNTIME_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["agentlisp.config.json"];

// =========================================================================
// Field readers
// =========================================================================

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function oneOf<T extends string>(allowed: readonly T[], raw: unknown): T | undefined {
  return allowed.find(a => a === raw);
}

function positiveInt(raw: unknown): number | undefined {
  if (typeof raw === "string" && !/^\d+$/.test(raw.trim())) return undefined;
  const n = typeof raw === "string" ? parseInt(raw, 10) : raw;
  return typeof n === "number" && Number.isInteger(n) && n > 0 ? n : undefined;
}

function field(obj: Record<string, unknown>, camel: string, snake: string): unknown {
  return obj[camel] ?? obj[snake];
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 * Unset or unrecognised values fall back to the defaults.
 */
export function configFromEnv(prefix = "AGENTLISP"): AgentLispConfig {
  return {
    policy: {
      letScoping: oneOf(LET_SCOPINGS, process.env[`${prefix}_LET_SCOPING`]) ?? DEFAULT_POLICY.letScoping,
      truthiness: oneOf(TRUTHINESS_RULES, process.env[`${prefix}_TRUTHINESS`]) ?? DEFAULT_POLICY.truthiness,
    },
    runtime: {
      maxEvalSteps: positiveInt(process.env[`${prefix}_MAX_EVAL_STEPS`]) ?? DEFAULT_RUNTIME_CONFIG.maxEvalSteps,
    },
  };
}

/**
 * Create configuration from a plain object (e.g. parsed JSON).
 * Accepts camelCase or snake_case keys.
 */
export function configFromObject(data: unknown): AgentLispConfig {
  const root = isRecord(data) ? data : {};
  const policyData = isRecord(root.policy) ? root.policy : {};
  const runtimeData = isRecord(root.runtime) ? root.runtime : {};

  return {
    policy: {
      letScoping: oneOf(LET_SCOPINGS, field(policyData, "letScoping", "let_scoping")) ?? DEFAULT_POLICY.letScoping,
      truthiness: oneOf(TRUTHINESS_RULES, policyData.truthiness) ?? DEFAULT_POLICY.truthiness,
    },
    runtime: {
      maxEvalSteps: positiveInt(field(runtimeData, "maxEvalSteps", "max_eval_steps")) ?? DEFAULT_RUNTIME_CONFIG.maxEvalSteps,
    },
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): AgentLispConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return configFromObject(data);
}

export type ConfigOverrides = {
  policy?: Partial<EvalPolicy>;
  runtime?: Partial<RuntimeConfig>;
};

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: AgentLispConfig, ...configs: ConfigOverrides[]): AgentLispConfig {
  let result: AgentLispConfig = { policy: { ...base.policy }, runtime: { ...base.runtime } };

  for (const cfg of configs) {
    result = {
      policy: { ...result.policy, ...cfg.policy },
      runtime: { ...result.runtime, ...cfg.runtime },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigOverrides;
}): AgentLispConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = configFromFile(options.configFile);
  } else {
    const found = DEFAULT_CONFIG_FILES.find(p => fs.existsSync(p));
    if (found) config = configFromFile(found);
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

export function validateConfig(config: AgentLispConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!LET_SCOPINGS.includes(config.policy.letScoping)) {
    errors.push(`Unknown letScoping: ${config.policy.letScoping}`);
  }
  if (!TRUTHINESS_RULES.includes(config.policy.truthiness)) {
    errors.push(`Unknown truthiness: ${config.policy.truthiness}`);
  }
  if (!Number.isInteger(config.runtime.maxEvalSteps) || config.runtime.maxEvalSteps < 1) {
    errors.push("maxEvalSteps must be a positive integer");
  } else if (config.runtime.maxEvalSteps < 100) {
    warnings.push("maxEvalSteps is very low, may cause premature termination");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
