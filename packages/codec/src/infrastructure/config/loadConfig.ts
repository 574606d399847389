import { config as loadEnv } from "dotenv";
import { ConfigError } from "../../domain/errors/ConfigError";
import type { CompatibilityMode } from "../../domain/interfaces/ICompatibility";
import type { SubjectStrategy } from "../../domain/interfaces/ISubjectNamer";

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const SUBJECT_STRATEGIES = ["topic", "record"] as const;
const COMPATIBILITY_MODES = ["none", "backward", "forward", "full"] as const;

export interface RegistryConfig {
  /** Unset means the in-process registry is used. */
  url?: string;
  timeoutMs: number;
  username?: string;
  password?: string;
  compatibility: CompatibilityMode;
}

export interface LogConfig {
  level: LogLevelName;
  bufferSize: number;
}

export interface SerdeConfig {
  registry: RegistryConfig;
  subjectStrategy: SubjectStrategy;
  log: LogConfig;
}

type Env = Record<string, string | undefined>;

function optionalStringEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim();
}

function optionalIntegerEnv(env: Env, name: string, def: number): number {
  const raw = optionalStringEnv(env, name);
  if (raw === undefined) return def;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`Environment variable ${name} must be a positive integer`, {
      name,
      value: raw,
    });
  }
  return n;
}

function optionalChoiceEnv<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  def: T
): T {
  const raw = optionalStringEnv(env, name);
  if (raw === undefined) return def;
  const choice = choices.find((c) => c === raw.toLowerCase());
  if (choice === undefined) {
    throw new ConfigError(
      `Environment variable ${name} must be one of ${choices.join(", ")}`,
      { name, value: raw }
    );
  }
  return choice;
}

function optionalUrlEnv(env: Env, name: string): string | undefined {
  const raw = optionalStringEnv(env, name);
  if (raw === undefined) return undefined;

  let url: URL;
  try {
    url = new URL(raw);
  } catch (cause) {
    throw new ConfigError(`Environment variable ${name} must be a URL`, {
      name,
      value: raw,
      cause: cause instanceof Error ? cause.message : String(cause),
    });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`Environment variable ${name} must be an http(s) URL`, {
      name,
      value: raw,
    });
  }
  return raw;
}

/**
 * Reads the serde configuration. Without an explicit `env`, a local `.env`
 * file is loaded into `process.env` first; a missing file is ignored.
 */
export function loadConfig(env?: Env): SerdeConfig {
  if (env === undefined) {
    loadEnv();
    return readConfig(process.env);
  }
  return readConfig(env);
}

function readConfig(env: Env): SerdeConfig {
  const username = optionalStringEnv(env, "SCHEMA_REGISTRY_USERNAME");
  const password = optionalStringEnv(env, "SCHEMA_REGISTRY_PASSWORD");
  if ((username === undefined) !== (password === undefined)) {
    throw new ConfigError(
      "SCHEMA_REGISTRY_USERNAME and SCHEMA_REGISTRY_PASSWORD must be set together"
    );
  }

  return {
    registry: {
      url: optionalUrlEnv(env, "SCHEMA_REGISTRY_URL"),
      timeoutMs: optionalIntegerEnv(env, "SCHEMA_REGISTRY_TIMEOUT_MS", 5000),
      username,
      password,
      compatibility: optionalChoiceEnv(env, "SCHEMA_COMPATIBILITY", COMPATIBILITY_MODES, "backward"),
    },
    subjectStrategy: optionalChoiceEnv(env, "SCHEMA_SUBJECT_STRATEGY", SUBJECT_STRATEGIES, "topic"),
    log: {
      level: optionalChoiceEnv(env, "LOG_LEVEL", LOG_LEVELS, "info"),
      bufferSize: optionalIntegerEnv(env, "LOG_BUFFER_SIZE", 50),
    },
  };
}
