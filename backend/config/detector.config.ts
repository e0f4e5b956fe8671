/**
 * Detector Service Configuration
 * Settings read from the environment (.env.local / .env are loaded by server.ts)
 */

import { ConfigError } from '../utils/errorHandler.js';

export type ClassifierProvider = 'inference' | 'vision-prompt';

export interface ClassifierConfig {
  provider: ClassifierProvider;
  endpoint: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Probability a class must exceed before it wins the verdict */
  threshold: number;
}

export interface DetectorConfig {
  // Server
  host: string;
  port: number;
  corsOrigins: string[];
  maxImageSizeMB: number;

  // Rate limiting
  rateLimitCapacity: number;
  rateLimitWindowSeconds: number;

  // Result cache
  cacheMaxSize: number;
  cacheTtlSeconds: number;

  // Event log
  logDirectory: string;
  logRetentionDays: number;
  logPruneIntervalHours: number;

  classifier: ClassifierConfig;
}

export const DEFAULT_DETECTOR_CONFIG: DetectorConfig = {
  host: '127.0.0.1',
  port: 8000,
  corsOrigins: ['*'],
  maxImageSizeMB: 10,

  rateLimitCapacity: 30,
  rateLimitWindowSeconds: 60,

  cacheMaxSize: 100,
  cacheTtlSeconds: 300,

  logDirectory: './logs',
  logRetentionDays: 30,
  logPruneIntervalHours: 24,

  classifier: {
    provider: 'inference',
    endpoint: 'http://127.0.0.1:8080/classify',
    apiKey: '',
    model: 'deepfake-detector-model-v1',
    timeoutMs: 30000,
    threshold: 0.6
  }
};

type Env = Record<string, string | undefined>;

// Node timers overflow past 2^31-1 ms and fire after 1 ms instead
const MAX_TIMER_MS = 2147483647;
const MAX_PRUNE_INTERVAL_HOURS = 596;

interface NumberRule {
  integer?: boolean;
  min?: number;
  max?: number;
  /** min is exclusive */
  exclusiveMin?: boolean;
}

class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  string(name: string, fallback: string): string {
    const raw = this.env[name]?.trim();
    return raw ? raw : fallback;
  }

  number(name: string, fallback: number, rule: NumberRule = {}): number {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.problems.push(`${name} must be a number (got "${raw}")`);
      return fallback;
    }
    if (rule.integer && !Number.isInteger(value)) {
      this.problems.push(`${name} must be an integer (got "${raw}")`);
      return fallback;
    }
    if (rule.min !== undefined && (rule.exclusiveMin ? value <= rule.min : value < rule.min)) {
      this.problems.push(`${name} must be ${rule.exclusiveMin ? 'greater than' : 'at least'} ${rule.min} (got "${raw}")`);
      return fallback;
    }
    if (rule.max !== undefined && value > rule.max) {
      this.problems.push(`${name} must be at most ${rule.max} (got "${raw}")`);
      return fallback;
    }
    return value;
  }

  list(name: string, fallback: string[]): string[] {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;
    if (raw === '*') return ['*'];
    return raw.split(',').map(origin => origin.trim()).filter(Boolean);
  }

  provider(name: string, fallback: ClassifierProvider): ClassifierProvider {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;
    if (raw === 'inference' || raw === 'vision-prompt') return raw;
    this.problems.push(`${name} must be "inference" or "vision-prompt" (got "${raw}")`);
    return fallback;
  }
}

/**
 * Build the detector configuration from environment variables.
 * Every invalid value is collected and reported together in one ConfigError.
 */
export function loadDetectorConfig(env: Env = process.env): DetectorConfig {
  const defaults = DEFAULT_DETECTOR_CONFIG;
  const read = new EnvReader(env);

  const config: DetectorConfig = {
    host: read.string('HOST', defaults.host),
    port: read.number('PORT', defaults.port, { integer: true, min: 0, max: 65535 }),
    corsOrigins: read.list('CORS_ORIGINS', defaults.corsOrigins),
    maxImageSizeMB: read.number('MAX_IMAGE_SIZE_MB', defaults.maxImageSizeMB, { min: 0, exclusiveMin: true }),

    rateLimitCapacity: read.number('RATE_LIMIT_REQUESTS', defaults.rateLimitCapacity, { integer: true, min: 0 }),
    rateLimitWindowSeconds: read.number('RATE_LIMIT_WINDOW_SECONDS', defaults.rateLimitWindowSeconds, { min: 0, exclusiveMin: true }),

    cacheMaxSize: read.number('CACHE_MAX_SIZE', defaults.cacheMaxSize, { integer: true, min: 0 }),
    cacheTtlSeconds: read.number('CACHE_TTL_SECONDS', defaults.cacheTtlSeconds, { min: 0 }),

    logDirectory: read.string('LOG_DIR', defaults.logDirectory),
    logRetentionDays: read.number('LOG_RETENTION_DAYS', defaults.logRetentionDays, { integer: true, min: 0 }),
    logPruneIntervalHours: read.number('LOG_PRUNE_INTERVAL_HOURS', defaults.logPruneIntervalHours, { min: 0, exclusiveMin: true, max: MAX_PRUNE_INTERVAL_HOURS }),

    classifier: {
      provider: read.provider('CLASSIFIER_PROVIDER', defaults.classifier.provider),
      endpoint: read.string('CLASSIFIER_ENDPOINT', defaults.classifier.endpoint),
      apiKey: read.string('CLASSIFIER_API_KEY', defaults.classifier.apiKey),
      model: read.string('CLASSIFIER_MODEL', defaults.classifier.model),
      timeoutMs: read.number('CLASSIFIER_TIMEOUT_MS', defaults.classifier.timeoutMs, { integer: true, min: 0, exclusiveMin: true, max: MAX_TIMER_MS }),
      threshold: read.number('CLASSIFIER_THRESHOLD', defaults.classifier.threshold, { min: 0.5, max: 1 })
    }
  };

  if (read.problems.length > 0) {
    throw new ConfigError(read.problems);
  }

  return config;
}
