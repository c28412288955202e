import path from 'path';
import dotenv from 'dotenv';
import type { IClientPolicy } from '../models';
import { DEFAULT_CLIENT_POLICY } from '../models';
import { ConfigError } from '../errors';
import { DEFAULT_WHOIS_ENDPOINT } from '../services/AxiosWhoisTransport';

/**
 * Everything the service needs at startup, resolved once and passed down
 */
export interface IServerConfig {
  host: string;
  port: number;
  /** Absolute path of the suffix configuration file */
  suffixConfigPath: string;
  /** Absolute path of the static UI directory */
  staticDir: string;
  whoisEndpoint: string;
  clientPolicy: IClientPolicy;
}

/**
 * Values given on the command line; they win over the environment
 */
export interface ICliOverrides {
  host?: string;
  port?: number;
}

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;
export const DEFAULT_SUFFIX_CONFIG = path.join('config', 'domain_suffixes.json');
export const DEFAULT_STATIC_DIR = 'static';

/**
 * Load a `.env` file into `process.env` without replacing variables already set
 * @param filePath - Path of the env file
 * @returns Values found in the file; empty when the file does not exist
 */
export function loadEnvFile(filePath: string): Record<string, string> {
  const result = dotenv.config({ path: filePath, override: false });
  if (result.error) {
    if ('code' in result.error && result.error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot load env file ${filePath}: ${result.error.message}`, { cause: result.error });
  }
  return result.parsed ?? {};
}

/**
 * Resolve the server configuration from environment variables and CLI values
 * @param env - Environment, usually `process.env`
 * @param cli - Command-line overrides
 * @param cwd - Base directory for relative paths
 */
export function resolveServerConfig(
  env: NodeJS.ProcessEnv,
  cli: ICliOverrides = {},
  cwd: string = process.cwd()
): IServerConfig {
  const port = cli.port ?? parseInteger(env['DOMAIN_QUERY_PORT'], 'DOMAIN_QUERY_PORT', DEFAULT_PORT);
  if (port > 65535) {
    throw new ConfigError(`DOMAIN_QUERY_PORT must be between 0 and 65535, got ${port}`);
  }

  return {
    host: cli.host ?? nonEmpty(env['DOMAIN_QUERY_HOST']) ?? DEFAULT_HOST,
    port,
    suffixConfigPath: path.resolve(cwd, nonEmpty(env['DOMAIN_QUERY_CONFIG']) ?? DEFAULT_SUFFIX_CONFIG),
    staticDir: path.resolve(cwd, nonEmpty(env['DOMAIN_QUERY_STATIC_DIR']) ?? DEFAULT_STATIC_DIR),
    whoisEndpoint: nonEmpty(env['DOMAIN_QUERY_WHOIS_ENDPOINT']) ?? DEFAULT_WHOIS_ENDPOINT,
    clientPolicy: {
      timeoutMs: parseInteger(env['DOMAIN_QUERY_TIMEOUT_MS'], 'DOMAIN_QUERY_TIMEOUT_MS', DEFAULT_CLIENT_POLICY.timeoutMs),
      maxRetries: parseInteger(env['DOMAIN_QUERY_MAX_RETRIES'], 'DOMAIN_QUERY_MAX_RETRIES', DEFAULT_CLIENT_POLICY.maxRetries),
      retryDelayMs: parseInteger(
        env['DOMAIN_QUERY_RETRY_DELAY_MS'],
        'DOMAIN_QUERY_RETRY_DELAY_MS',
        DEFAULT_CLIENT_POLICY.retryDelayMs
      ),
      respectRateLimit: parseBoolean(
        env['DOMAIN_QUERY_RESPECT_RATE_LIMIT'],
        'DOMAIN_QUERY_RESPECT_RATE_LIMIT',
        DEFAULT_CLIENT_POLICY.respectRateLimit
      )
    }
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(value: string | undefined, name: string, fallback: number): number {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function parseBoolean(value: string | undefined, name: string, fallback: boolean): boolean {
  const raw = nonEmpty(value)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(raw)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(raw)) {
    return false;
  }
  throw new ConfigError(`${name} must be a boolean (true/false), got "${raw}"`);
}
