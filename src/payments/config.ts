import { join } from 'node:path';
import { DEFAULT_DB_NAME, DEFAULT_FACTS_FILE, DEFAULT_PROBE_TIMEOUT_MS } from '../facts/store.js';
import { ConfigError } from '../types/index.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_AGENT_ID = 'default';
export const DEFAULT_ORACLE_URL = 'https://api.anthropic.com/v1/messages';
export const DEFAULT_ORACLE_MODEL = 'claude-3-5-sonnet-20240620';
export const DEFAULT_REGISTRY_TIMEOUT_MS = 10_000;
export const DEFAULT_DELIVERY_TIMEOUT_MS = 20_000;
export const DEFAULT_ORACLE_TIMEOUT_MS = 20_000;
export const DEFAULT_PORT = 3000;

// ============================================================================
// Environment Config
// ============================================================================

export interface PaymentsEnvConfig {
  /** Identifier of the local agent; receives the points it charges */
  agentId: string;
  registryUrl: string;
  registryTimeoutMs: number;
  deliveryTimeoutMs: number;
  oracle: {
    /** Absent means the heuristic decides */
    apiKey?: string;
    url: string;
    model: string;
    timeoutMs: number;
  };
  facts: {
    mongoUrl?: string;
    dbName: string;
    filePath: string;
    probeTimeoutMs: number;
  };
  port: number;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) throw new ConfigError(`Missing required environment variable: ${name}`);
  return value;
}

function optionalEnv(env: Env, name: string, fallback: string): string {
  return env[name] || fallback;
}

function optionalInt(env: Env, name: string, fallback: number): number {
  const value = env[name];
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Environment variable ${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): PaymentsEnvConfig {
  return {
    agentId: optionalEnv(env, 'AGENT_ID', DEFAULT_AGENT_ID),
    registryUrl: requireEnv(env, 'REGISTRY_URL'),
    registryTimeoutMs: optionalInt(env, 'REGISTRY_TIMEOUT_MS', DEFAULT_REGISTRY_TIMEOUT_MS),
    deliveryTimeoutMs: optionalInt(env, 'DELIVERY_TIMEOUT_MS', DEFAULT_DELIVERY_TIMEOUT_MS),
    oracle: {
      apiKey: env['ANTHROPIC_API_KEY'] || undefined,
      url: optionalEnv(env, 'ORACLE_URL', DEFAULT_ORACLE_URL),
      model: optionalEnv(env, 'ORACLE_MODEL', DEFAULT_ORACLE_MODEL),
      timeoutMs: optionalInt(env, 'ORACLE_TIMEOUT_MS', DEFAULT_ORACLE_TIMEOUT_MS),
    },
    facts: {
      mongoUrl: env['MONGO_URL'] || undefined,
      dbName: optionalEnv(env, 'DB_NAME', DEFAULT_DB_NAME),
      filePath: optionalEnv(env, 'FACTS_FILE', join(process.cwd(), DEFAULT_FACTS_FILE)),
      probeTimeoutMs: optionalInt(env, 'DB_PROBE_TIMEOUT_MS', DEFAULT_PROBE_TIMEOUT_MS),
    },
    port: optionalInt(env, 'PORT', DEFAULT_PORT),
    logLevel: optionalEnv(env, 'LOG_LEVEL', 'info'),
  };
}
