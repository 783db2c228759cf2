import "dotenv/config";
import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

type EnvSource = Record<string, string | undefined>;

export interface ResearchConfig {
  /** Anthropic API key. Empty only in mock mode. */
  apiKey: string;
  /** Default model for every call */
  model: string;
  /** Model for decomposition, synthesis and citations */
  orchestratorModel: string;
  /** Model for per-subtask research */
  researchModel: string;
  maxSubtasks: number;
  /** Per-call timeout in ms (0 = none) */
  callTimeoutMs: number;
  /** Dispatch research calls concurrently */
  parallel: boolean;
  /** Use the offline mock client instead of the API */
  mock: boolean;
  /** SQLite history path; ":memory:" keeps nothing between runs */
  dbPath: string;
  logLevel: LogLevel;
  logDir: string | undefined;
}

export const DEFAULT_MODEL = "sonnet";
export const DEFAULT_MAX_SUBTASKS = 4;

function env(source: EnvSource, key: string, fallback: string): string {
  const val = source[key]?.trim();
  return val ? val : fallback;
}

function envInt(
  source: EnvSource,
  key: string,
  fallback: string,
  min = 1
): number {
  const raw = env(source, key, fallback);
  const parsed = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (Number.isNaN(parsed) || parsed < min) {
    throw new ConfigError(
      "invalid_value",
      `Invalid value for ${key}: "${raw}" (expected integer >= ${min})`
    );
  }
  return parsed;
}

function envFlag(source: EnvSource, key: string): boolean {
  const raw = env(source, key, "").toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

/** Values the CLI may override on top of the environment. */
export interface ConfigOverrides {
  model?: string;
  orchestratorModel?: string;
  researchModel?: string;
  mock?: boolean;
  parallel?: boolean;
}

/**
 * Build the runtime configuration. Fails fast on a missing API key unless
 * mock mode is on, so no request is ever attempted without credentials.
 */
export function loadConfig(
  source: EnvSource = process.env,
  overrides: ConfigOverrides = {}
): ResearchConfig {
  const mock = overrides.mock ?? envFlag(source, "RESEARCH_MOCK");
  const apiKey = env(source, "ANTHROPIC_API_KEY", "");
  if (!mock && !apiKey) {
    throw new ConfigError(
      "missing_api_key",
      "Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable."
    );
  }

  const model =
    overrides.model ??
    env(source, "RESEARCH_MODEL", env(source, "MODEL_NAME", DEFAULT_MODEL));

  const logLevel = env(source, "RESEARCH_LOG_LEVEL", "warn").toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      "invalid_value",
      `Invalid value for RESEARCH_LOG_LEVEL: "${logLevel}" (expected debug, info, warn or error)`
    );
  }

  return {
    apiKey,
    model,
    orchestratorModel:
      overrides.orchestratorModel ??
      env(source, "RESEARCH_ORCHESTRATOR_MODEL", model),
    researchModel:
      overrides.researchModel ?? env(source, "RESEARCH_WORKER_MODEL", model),
    maxSubtasks: envInt(
      source,
      "RESEARCH_MAX_SUBTASKS",
      String(DEFAULT_MAX_SUBTASKS)
    ),
    callTimeoutMs: envInt(source, "RESEARCH_CALL_TIMEOUT_MS", "120000", 0),
    parallel: overrides.parallel ?? !envFlag(source, "RESEARCH_SEQUENTIAL"),
    mock,
    dbPath: env(source, "RESEARCH_DB_PATH", ":memory:"),
    logLevel,
    logDir: source.RESEARCH_LOG_DIR?.trim() || undefined,
  };
}
