import { config } from 'dotenv';
import { ConfigurationError } from './errors.js';
import type { OutputFormat, RunConfig } from './types.js';

config();

export const DEFAULT_URL = 'https://postman-echo.com/post';

export interface ConfigOverrides {
  url?: string;
  apiKey?: string;
  rqs?: string | number;
  duration?: string | number;
  timeout?: string | number;
  verbose?: boolean;
  output?: string;
}

type Env = Record<string, string | undefined>;

// Largest delay setTimeout and AbortSignal.timeout accept.
export const MAX_TIMER_MS = 2 ** 31 - 1;

export type RawRunConfig = Omit<RunConfig, 'output'> & { output: string };

function parsePositiveInt(name: string, value: string | number): number {
  if (typeof value === 'string' && !/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return parsed;
}

function parseOutput(value: string): OutputFormat {
  if (value === 'json' || value === 'pretty') {
    return value;
  }
  throw new ConfigurationError(`output must be one of json, pretty; got "${value}"`);
}

export function validateConfig(cfg: RawRunConfig): RunConfig {
  let url: URL;
  try {
    url = new URL(cfg.url);
  } catch {
    throw new ConfigurationError(`url is not a valid URL: "${cfg.url}"`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`url must use http or https, got ${url.protocol}`);
  }
  if (!cfg.apiKey) {
    throw new ConfigurationError('API key is required (--key or BURSTLOAD_API_KEY)');
  }

  const resolved: RunConfig = {
    ...cfg,
    requestsPerTick: parsePositiveInt('requests per tick', cfg.requestsPerTick),
    duration: parsePositiveInt('duration', cfg.duration),
    timeoutMs: parsePositiveInt('timeout', cfg.timeoutMs),
    tickIntervalMs: parsePositiveInt('tick interval', cfg.tickIntervalMs),
    output: parseOutput(cfg.output),
  };

  if (resolved.timeoutMs > MAX_TIMER_MS) {
    throw new ConfigurationError(`timeout must be at most ${MAX_TIMER_MS}ms, got ${resolved.timeoutMs}`);
  }
  const windowMs = (resolved.duration + 1) * resolved.tickIntervalMs;
  if (windowMs > MAX_TIMER_MS) {
    throw new ConfigurationError(
      `run window of (duration + 1) x tick interval must be at most ${MAX_TIMER_MS}ms, got ${windowMs}`
    );
  }
  return resolved;
}

/**
 * Resolves the run configuration: CLI overrides win over environment
 * variables, which win over defaults.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): RunConfig {
  return validateConfig({
    url: overrides.url ?? env.BURSTLOAD_URL ?? DEFAULT_URL,
    apiKey: overrides.apiKey ?? env.BURSTLOAD_API_KEY ?? '',
    requestsPerTick: parsePositiveInt('rqs', overrides.rqs ?? env.BURSTLOAD_RQS ?? 10),
    duration: parsePositiveInt('duration', overrides.duration ?? env.BURSTLOAD_DURATION ?? 1),
    timeoutMs: parsePositiveInt('timeout', overrides.timeout ?? env.BURSTLOAD_TIMEOUT_MS ?? 10000),
    tickIntervalMs: parsePositiveInt('tick interval', env.BURSTLOAD_TICK_MS ?? 1000),
    verbose: overrides.verbose ?? env.BURSTLOAD_VERBOSE === 'true',
    output: overrides.output ?? 'json',
  });
}

export function maskKey(apiKey: string): string {
  if (apiKey.length <= 4) return '****';
  return `${apiKey.slice(0, 4)}${'*'.repeat(Math.min(apiKey.length - 4, 12))}`;
}
