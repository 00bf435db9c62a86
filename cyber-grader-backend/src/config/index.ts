import path from "path";
import { isLogLevel, LogLevel } from "../utils/logger";

export interface AppConfig {
  // Server
  nodeEnv: string;
  port: number;
  corsOrigin?: string;
  logLevel: LogLevel;

  // Content
  contentRoot: string;
  contentSource: string;
  contentRepoBranch: string | null;
  contentRefreshSchedule: string;

  // Postgres
  databaseUrl?: string;
  databaseSchema: string;
  databaseBackupSchedule: string;

  // Supabase
  supabaseUrl?: string;
  supabaseKey?: string;

  // Upper bound for any single durable operation
  persistenceTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function getEnvVar(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvVarOptional(env: Env, key: string): string | undefined {
  return env[key] || undefined;
}

function getEnvVarNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid number for environment variable ${key}: ${value}`);
  }
  return parsed;
}

/**
 * Build the process configuration once at start-up. The result is passed to the
 * store factory and the app explicitly; nothing else reads the environment.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const contentRoot = path.resolve(cwd, getEnvVar(env, "CONTENT_ROOT", "content"));

  const databaseSchema = getEnvVar(env, "DATABASE_SCHEMA", "public");
  if (!IDENTIFIER.test(databaseSchema)) {
    throw new Error(`Invalid DATABASE_SCHEMA: ${databaseSchema}`);
  }

  const logLevel = getEnvVar(env, "LOG_LEVEL", "info");
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);
  }

  return Object.freeze({
    nodeEnv: getEnvVar(env, "NODE_ENV", "development"),
    port: getEnvVarNumber(env, "PORT", 8000),
    corsOrigin: getEnvVarOptional(env, "CORS_ORIGIN"),
    logLevel,

    contentRoot,
    contentSource: getEnvVar(env, "CONTENT_SOURCE", contentRoot),
    contentRepoBranch: getEnvVarOptional(env, "CONTENT_REPO_BRANCH") ?? null,
    contentRefreshSchedule: getEnvVar(env, "CONTENT_REFRESH_SCHEDULE", "nightly"),

    databaseUrl: getEnvVarOptional(env, "DATABASE_URL"),
    databaseSchema,
    databaseBackupSchedule: getEnvVar(env, "DATABASE_BACKUP_SCHEDULE", "nightly"),

    supabaseUrl: getEnvVarOptional(env, "SUPABASE_URL"),
    // Service role key takes precedence over the anon key
    supabaseKey:
      getEnvVarOptional(env, "SUPABASE_SERVICE_ROLE_KEY") ??
      getEnvVarOptional(env, "SUPABASE_ANON_KEY"),

    persistenceTimeoutMs: getEnvVarNumber(env, "PERSISTENCE_TIMEOUT_MS", 5000),
  });
}
