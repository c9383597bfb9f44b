/**
 * Runtime Configuration
 *
 * Environment variables (optionally from a .env file at the workspace root)
 * folded into one RuntimeConfig object. Nothing here is read at import
 * time; the entry point calls loadEnvFile() then loadConfig().
 */

import { config as loadDotenv } from "dotenv";
import * as os from "os";
import { resolve, dirname, join } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@pocketmind/shared/logging";
import { ConfigError } from "./errors.js";
import { DEFAULT_LOG_DIR } from "./logging.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ============================================
// TYPES
// ============================================

export type ModelTier = "fast" | "balanced" | "advanced";

export type ModelTierMap = Record<ModelTier, string>;

export interface RuntimeConfig {
  /** Provider key; may also arrive later through set_api_key */
  apiKey?: string;
  apiBaseUrl: string;
  models: ModelTierMap;
  /** Ceilings for one turn; a query's context can lower or raise them */
  maxIterations: number;
  maxToolCalls: number;
  maxTokens: number;
  /** Token budget for the history window sent with each turn */
  maxContextTokens: number;
  /** Total attempts per model request, including the first */
  retryCount: number;
  /** Base timeout for host-delegated tools; media tools get a multiple */
  toolTimeoutMs: number;
  sandboxTimeoutMs: number;
  /** Where created files land when a tool is given a relative output path */
  outputDir: string;
  wsHost: string;
  wsPort: number;
  logLevel?: LogLevel;
  logDir: string;
}

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_MODELS: ModelTierMap = {
  fast: "claude-haiku-4-5-20251001",
  balanced: "claude-sonnet-4-20250514",
  advanced: "claude-opus-4-20250514",
};

export const DEFAULT_CONFIG: RuntimeConfig = {
  apiBaseUrl: "https://api.anthropic.com",
  models: DEFAULT_MODELS,
  maxIterations: 50,
  maxToolCalls: 50,
  maxTokens: 16384,
  maxContextTokens: 150000,
  retryCount: 3,
  toolTimeoutMs: 30000,
  sandboxTimeoutMs: 30000,
  outputDir: join(os.tmpdir(), "pocketmind-output"),
  wsHost: "127.0.0.1",
  wsPort: 7420,
  logDir: DEFAULT_LOG_DIR,
};

// ============================================
// LOADING
// ============================================

/**
 * Load `.env` from the workspace root into process.env. Existing variables
 * win over the file.
 */
export function loadEnvFile(path: string = resolve(__dirname, "../../.env")): void {
  loadDotenv({ path });
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number = 1): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const logLevel = readString(env, "POCKETMIND_LOG_LEVEL");
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigError(`POCKETMIND_LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, silent (got "${logLevel}")`);
  }

  return {
    apiKey: readString(env, "ANTHROPIC_API_KEY") ?? readString(env, "CLAUDE_API_KEY"),
    apiBaseUrl: readString(env, "ANTHROPIC_BASE_URL") ?? DEFAULT_CONFIG.apiBaseUrl,
    models: {
      fast: readString(env, "POCKETMIND_MODEL_FAST") ?? DEFAULT_MODELS.fast,
      balanced: readString(env, "POCKETMIND_MODEL_BALANCED") ?? DEFAULT_MODELS.balanced,
      advanced: readString(env, "POCKETMIND_MODEL_ADVANCED") ?? DEFAULT_MODELS.advanced,
    },
    maxIterations: readInt(env, "POCKETMIND_MAX_ITERATIONS", DEFAULT_CONFIG.maxIterations),
    maxToolCalls: readInt(env, "POCKETMIND_MAX_TOOL_CALLS", DEFAULT_CONFIG.maxToolCalls, 0),
    maxTokens: readInt(env, "POCKETMIND_MAX_TOKENS", DEFAULT_CONFIG.maxTokens),
    maxContextTokens: readInt(env, "POCKETMIND_MAX_CONTEXT_TOKENS", DEFAULT_CONFIG.maxContextTokens),
    retryCount: readInt(env, "POCKETMIND_RETRY_COUNT", DEFAULT_CONFIG.retryCount),
    toolTimeoutMs: readInt(env, "POCKETMIND_TOOL_TIMEOUT_MS", DEFAULT_CONFIG.toolTimeoutMs),
    sandboxTimeoutMs: readInt(env, "POCKETMIND_SANDBOX_TIMEOUT_MS", DEFAULT_CONFIG.sandboxTimeoutMs),
    outputDir: readString(env, "POCKETMIND_OUTPUT_DIR") ?? DEFAULT_CONFIG.outputDir,
    wsHost: readString(env, "POCKETMIND_WS_HOST") ?? DEFAULT_CONFIG.wsHost,
    wsPort: readInt(env, "POCKETMIND_WS_PORT", DEFAULT_CONFIG.wsPort),
    logLevel,
    logDir: readString(env, "POCKETMIND_LOG_DIR") ?? DEFAULT_CONFIG.logDir,
  };
}
