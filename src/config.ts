/**
 * Run configuration: defaults + config file + SWEEP_* env + per-call overrides.
 *
 * Precedence (deterministic, later wins):
 *   1. Hard defaults
 *   2. config/sweep.json (or SWEEP_CONFIG_PATH) when present
 *   3. SWEEP_* environment overrides
 *   4. Overrides passed to resolveRunConfig (HTTP body, tests)
 *
 * The merged object is validated by RunConfigSchema; any issue is a
 * ConfigurationError raised before dispatch.
 */

import { existsSync, readFileSync } from "fs";
import { ConfigurationError, errorMessage } from "./errors.js";
import {
  RunConfigOverridesSchema,
  RunConfigSchema,
  formatIssues,
  type RunConfig,
  type RunConfigOverrides,
} from "./lib/schemas/sweep.js";

export const DEFAULT_CONFIG_PATH = "./config/sweep.json";

export const DEFAULT_RUN_CONFIG: RunConfig = {
  concurrencyLimit: 100,
  invocationTimeoutS: 60,
  retryBudget: 1,
  retryBackoffS: 5,
  minCoveragePct: 70,
  severityThresholds: { Critical: 100, High: 60, Medium: 60, Low: 50, Info: 40 },
  verificationRetries: 2,
  verificationDelayMs: 1000,
  similarityThreshold: 0.5,
  oversizeMultiplier: 2,
  roleWeights: { quality: 1.0, implementation: 1.0, design: 1.2, complexity: 1.5 },
};

type NumericKey =
  | "concurrencyLimit"
  | "invocationTimeoutS"
  | "retryBudget"
  | "retryBackoffS"
  | "minCoveragePct"
  | "similarityThreshold"
  | "verificationRetries";

const ENV_KEYS: ReadonlyArray<[string, NumericKey]> = [
  ["SWEEP_CONCURRENCY_LIMIT", "concurrencyLimit"],
  ["SWEEP_INVOCATION_TIMEOUT_S", "invocationTimeoutS"],
  ["SWEEP_RETRY_BUDGET", "retryBudget"],
  ["SWEEP_RETRY_BACKOFF_S", "retryBackoffS"],
  ["SWEEP_MIN_COVERAGE_PCT", "minCoveragePct"],
  ["SWEEP_SIMILARITY_THRESHOLD", "similarityThreshold"],
  ["SWEEP_VERIFICATION_RETRIES", "verificationRetries"],
];

export interface ResolvedBaseConfig {
  overrides: RunConfigOverrides;
  source: string;
}

function readConfigFile(path: string): RunConfigOverrides {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Unreadable config file ${path}`, [errorMessage(err)]);
  }
  const result = RunConfigOverridesSchema.strict().safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${path}`, formatIssues(result.error.issues));
  }
  return result.data;
}

function readEnvOverrides(env: NodeJS.ProcessEnv): { overrides: RunConfigOverrides; keys: string[] } {
  const overrides: RunConfigOverrides = {};
  const keys: string[] = [];
  const issues: string[] = [];
  for (const [name, key] of ENV_KEYS) {
    const raw = env[name];
    if (raw == null || raw.trim() === "") continue;
    const n = Number(raw);
    if (!Number.isFinite(n)) {
      issues.push(`${name}: expected a number, got "${raw}"`);
      continue;
    }
    overrides[key] = n;
    keys.push(name);
  }
  if (issues.length > 0) throw new ConfigurationError("Invalid environment overrides", issues);
  return { overrides, keys };
}

/** File + env layers, without defaults. Pure over the given env. */
export function resolveBaseConfig(env: NodeJS.ProcessEnv = process.env): ResolvedBaseConfig {
  const path = env.SWEEP_CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const sources: string[] = ["defaults"];

  let fileLayer: RunConfigOverrides = {};
  if (existsSync(path)) {
    fileLayer = readConfigFile(path);
    sources.push(path);
  } else if (env.SWEEP_CONFIG_PATH) {
    throw new ConfigurationError(`SWEEP_CONFIG_PATH points to a missing file: ${path}`);
  }

  const { overrides: envLayer, keys } = readEnvOverrides(env);
  if (keys.length > 0) sources.push(`env (${keys.join(", ")})`);

  return { overrides: mergeOverrides(fileLayer, envLayer), source: sources.join(" + ") };
}

export function mergeOverrides(base: RunConfigOverrides, top: RunConfigOverrides): RunConfigOverrides {
  return {
    ...base,
    ...top,
    severityThresholds: { ...base.severityThresholds, ...top.severityThresholds },
    roleWeights: { ...base.roleWeights, ...top.roleWeights },
  };
}

let cached: ResolvedBaseConfig | null = null;

/** Base layers from process.env, resolved once per process. */
export function getBaseConfig(): ResolvedBaseConfig {
  if (cached) return cached;
  cached = resolveBaseConfig(process.env);
  console.log(`[sweepConfig] source=${cached.source}`);
  return cached;
}

export function resetConfigCache(): void {
  cached = null;
}

/**
 * Final RunConfig for one run. Throws ConfigurationError listing every
 * invalid field.
 */
export function resolveRunConfig(
  overrides: RunConfigOverrides = {},
  base: RunConfigOverrides = getBaseConfig().overrides
): RunConfig {
  const layered = mergeOverrides(base, overrides);
  const candidate = {
    ...DEFAULT_RUN_CONFIG,
    ...layered,
    severityThresholds: { ...DEFAULT_RUN_CONFIG.severityThresholds, ...layered.severityThresholds },
    roleWeights: { ...DEFAULT_RUN_CONFIG.roleWeights, ...layered.roleWeights },
  };
  const result = RunConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError("Invalid run configuration", formatIssues(result.error.issues));
  }
  return result.data;
}

