/**
 * Centralized Configuration Management
 *
 * Loads and validates all environment variables at startup.
 * Provides type-safe access to configuration throughout the application.
 */

import dotenv from 'dotenv';

dotenv.config();

export type Env = Record<string, string | undefined>;

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
const COMMITMENTS = ['confirmed', 'finalized'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type StreamCommitment = (typeof COMMITMENTS)[number];

/**
 * Provider entry as written in RPC_URLS (`url` or `url|name`)
 */
export interface ProviderEntry {
  url: string;
  name?: string;
}

export interface Config {
  rpc: {
    providers: ProviderEntry[];
    commitment: StreamCommitment;
    timeoutMs: number;
  };
  stream: {
    pollIntervalSec: number;
    blockDelayThresholdSec: number;
    backoffCap: number;
    backoffUnitMs: number;
  };
  logging: {
    level: LogLevel;
    prettyPrint: boolean;
  };
  env: {
    nodeEnv: string;
    isProduction: boolean;
  };
}

const DEFAULT_RPC_URL = 'https://api.mainnet-beta.solana.com';

/**
 * Get optional environment variable with default
 */
function optionalEnv(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/**
 * Parse integer environment variable
 */
function optionalInt(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid integer for ${key}: ${value}`);
  }
  return parsed;
}

/**
 * Parse boolean environment variable
 */
function optionalBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;

  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;

  throw new Error(`Invalid boolean for ${key}: ${value}`);
}

/**
 * Parse an environment variable restricted to a fixed set of values
 */
function optionalOneOf<T extends string>(
  env: Env,
  key: string,
  allowed: readonly T[],
  defaultValue: T
): T {
  const value = env[key];
  if (!value) return defaultValue;

  const match = allowed.find((candidate) => candidate === value.toLowerCase());
  if (!match) {
    throw new Error(`Invalid ${key}: ${value}. Must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

/**
 * Parse RPC_URLS: url1,url2 or url1|name1,url2|name2
 */
export function parseProviderList(raw: string): ProviderEntry[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const [url, name] = entry.split('|').map((part) => part.trim());
      return name ? { url, name } : { url };
    });
}

/**
 * Build the application configuration from an environment map
 */
export function loadConfig(env: Env = process.env): Config {
  const rpcUrls = env.RPC_URLS || env.SOLANA_RPC_URL || DEFAULT_RPC_URL;

  const loaded: Config = {
    // Solana RPC providers, in failover order
    rpc: {
      providers: parseProviderList(rpcUrls),
      commitment: optionalOneOf(env, 'RPC_COMMITMENT', COMMITMENTS, 'confirmed'),
      timeoutMs: optionalInt(env, 'RPC_TIMEOUT_MS', 10_000),
    },

    // Polling and failover
    stream: {
      pollIntervalSec: optionalInt(env, 'POLL_INTERVAL_SEC', 5),
      blockDelayThresholdSec: optionalInt(env, 'BLOCK_DELAY_THRESHOLD_SEC', 60),
      backoffCap: optionalInt(env, 'BACKOFF_CAP', 300),
      backoffUnitMs: optionalInt(env, 'BACKOFF_UNIT_MS', 1000),
    },

    // Logging
    logging: {
      level: optionalOneOf(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
      prettyPrint: optionalBool(env, 'LOG_PRETTY', env.NODE_ENV !== 'production'),
    },

    // Environment
    env: {
      nodeEnv: optionalEnv(env, 'NODE_ENV', 'development'),
      isProduction: env.NODE_ENV === 'production',
    },
  };

  validateConfig(loaded);
  return loaded;
}

/**
 * Validate configuration at startup
 */
export function validateConfig(cfg: Config): void {
  if (cfg.rpc.providers.length === 0) {
    throw new Error('RPC_URLS must name at least one provider');
  }

  // Validate positive integers
  if (cfg.rpc.timeoutMs <= 0) {
    throw new Error('RPC_TIMEOUT_MS must be positive');
  }
  if (cfg.stream.pollIntervalSec <= 0) {
    throw new Error('POLL_INTERVAL_SEC must be positive');
  }
  if (cfg.stream.blockDelayThresholdSec <= 0) {
    throw new Error('BLOCK_DELAY_THRESHOLD_SEC must be positive');
  }
  if (cfg.stream.backoffCap <= 0) {
    throw new Error('BACKOFF_CAP must be positive');
  }
  if (cfg.stream.backoffUnitMs < 0) {
    throw new Error('BACKOFF_UNIT_MS must not be negative');
  }
}

/**
 * Application Configuration, validated on module load
 */
export const config = loadConfig();
