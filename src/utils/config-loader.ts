import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { RouterConfig } from '../types';
import { ConfigError, describeError, errorCode } from './errors';
import { routerConfigSchema } from './validation-schemas';

// Two levels up from both src/utils and dist/utils
export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/default-config.json');

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<RouterConfig>;
}

/**
 * Build the router configuration: JSON file, then OLLAMA_* environment
 * variables, then explicit overrides. Durations in the environment are
 * seconds; everywhere else they are milliseconds.
 */
export function loadConfig(options: LoadConfigOptions = {}): RouterConfig {
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const env = options.env ?? process.env;

  const merged = {
    ...readConfigFile(configPath),
    ...fromEnv(env),
    ...stripUndefined(options.overrides ?? {})
  };

  try {
    return routerConfigSchema.parse(merged);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.errors
        .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, error);
    }
    throw error;
  }
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`, error);
    }
    throw new ConfigError(`Failed to read configuration: ${describeError(error)}`, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Configuration file is not valid JSON: ${configPath}`, error);
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function fromEnv(env: NodeJS.ProcessEnv): Partial<Record<keyof RouterConfig, unknown>> {
  const result: Partial<Record<keyof RouterConfig, unknown>> = {};

  if (env.OLLAMA_HOSTS) {
    result.hosts = env.OLLAMA_HOSTS.split(',').map(h => h.trim()).filter(h => h.length > 0);
  }
  if (env.OLLAMA_MODEL) {
    result.defaultModel = env.OLLAMA_MODEL;
  }
  if (env.OLLAMA_TIMEOUT) {
    result.timeoutMs = secondsToMs(env.OLLAMA_TIMEOUT);
  }
  if (env.OLLAMA_PROBE_TIMEOUT) {
    result.probeTimeoutMs = secondsToMs(env.OLLAMA_PROBE_TIMEOUT);
  }
  if (env.OLLAMA_LOAD_BALANCING) {
    result.strategy = env.OLLAMA_LOAD_BALANCING;
  }
  if (env.OLLAMA_FAILOVER) {
    result.failoverEnabled = env.OLLAMA_FAILOVER.toLowerCase() === 'true';
  }
  if (env.OLLAMA_HEALTH_CHECK_INTERVAL) {
    result.healthCheckIntervalMs = secondsToMs(env.OLLAMA_HEALTH_CHECK_INTERVAL);
  }
  if (env.OLLAMA_MAX_RETRIES) {
    result.maxRetries = Number(env.OLLAMA_MAX_RETRIES);
  }

  return result;
}

function secondsToMs(value: string): number {
  return Math.round(Number(value) * 1000);
}

function stripUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}
