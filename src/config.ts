/**
 * Runtime configuration.
 * Read once from environment variables by the production container; tests
 * build containers from explicit options instead.
 */

import { ConfigError } from './errors.js';
import { isLogLevel } from './providers/ILogProvider.js';
import type { LogLevel } from './providers/ILogProvider.js';

export interface UnderwritingThresholds {
  autoApprove: number;
  autoReject: number;
  reviewMin: number;
  reviewMax: number;
}

export interface AppConfig {
  openai: {
    apiKey: string;
    generationModel: string;
    classifierModel: string;
    embeddingModel: string;
    embeddingDimensions: number;
    /** Generation call timeout. */
    timeoutMs: number;
    maxAttempts: number;
    /** Embedding and classifier call timeout. */
    requestTimeoutMs: number;
  };
  fraud: {
    threshold: number;
    cacheTtlSeconds: number;
  };
  underwriting: UnderwritingThresholds;
  adjudication: {
    fraudOverrideThreshold: number;
    retrievalK: number;
    senderName: string;
  };
  cache: {
    maxEntries: number;
    defaultTtlSeconds: number;
    distributed: boolean;
  };
  logging: {
    level: LogLevel;
    axiomToken: string;
    axiomDataset: string;
  };
  supabase: {
    url: string;
    serviceRoleKey: string;
    /** Vector store and distributed cache query timeout. */
    timeoutMs: number;
  };
}

export const DEFAULT_UNDERWRITING_THRESHOLDS: UnderwritingThresholds = {
  autoApprove: 30,
  autoReject: 85,
  reviewMin: 70,
  reviewMax: 85,
};

export const DEFAULT_CONFIG: AppConfig = {
  openai: {
    apiKey: '',
    generationModel: 'gpt-4o',
    classifierModel: 'gpt-4o-mini',
    embeddingModel: 'text-embedding-3-small',
    embeddingDimensions: 1536,
    timeoutMs: 30_000,
    maxAttempts: 3,
    requestTimeoutMs: 15_000,
  },
  fraud: {
    threshold: 0.75,
    cacheTtlSeconds: 3600,
  },
  underwriting: DEFAULT_UNDERWRITING_THRESHOLDS,
  adjudication: {
    fraudOverrideThreshold: 0.65,
    retrievalK: 5,
    senderName: 'Claims Team',
  },
  cache: {
    maxEntries: 1000,
    defaultTtlSeconds: 3600,
    distributed: false,
  },
  logging: {
    level: 'info',
    axiomToken: '',
    axiomDataset: '',
  },
  supabase: {
    url: '',
    serviceRoleKey: '',
    timeoutMs: 10_000,
  },
};

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const d = DEFAULT_CONFIG;

  const config: AppConfig = {
    openai: {
      apiKey: env.OPENAI_API_KEY ?? d.openai.apiKey,
      generationModel: env.OPENAI_MODEL ?? d.openai.generationModel,
      classifierModel: env.OPENAI_CLASSIFIER_MODEL ?? d.openai.classifierModel,
      embeddingModel: env.OPENAI_EMBEDDING_MODEL ?? d.openai.embeddingModel,
      embeddingDimensions: readInt(env, 'OPENAI_EMBEDDING_DIMENSIONS', d.openai.embeddingDimensions, 1, 4096),
      timeoutMs: readInt(env, 'GENERATION_TIMEOUT_MS', d.openai.timeoutMs, 1000, 300_000),
      maxAttempts: readInt(env, 'GENERATION_MAX_ATTEMPTS', d.openai.maxAttempts, 1, 3),
      requestTimeoutMs: readInt(env, 'OPENAI_REQUEST_TIMEOUT_MS', d.openai.requestTimeoutMs, 1000, 300_000),
    },
    fraud: {
      threshold: readNumber(env, 'FRAUD_THRESHOLD', d.fraud.threshold, 0, 1),
      cacheTtlSeconds: readInt(env, 'CACHE_TTL', d.fraud.cacheTtlSeconds, 1, 86_400 * 7),
    },
    underwriting: {
      autoApprove: readNumber(env, 'AUTO_APPROVE_THRESHOLD', d.underwriting.autoApprove, 0, 100),
      autoReject: readNumber(env, 'AUTO_REJECT_THRESHOLD', d.underwriting.autoReject, 0, 100),
      reviewMin: readNumber(env, 'REVIEW_MIN_THRESHOLD', d.underwriting.reviewMin, 0, 100),
      reviewMax: readNumber(env, 'REVIEW_MAX_THRESHOLD', d.underwriting.reviewMax, 0, 100),
    },
    adjudication: {
      fraudOverrideThreshold: readNumber(
        env,
        'CLAIM_FRAUD_OVERRIDE_THRESHOLD',
        d.adjudication.fraudOverrideThreshold,
        0,
        1
      ),
      retrievalK: readInt(env, 'RETRIEVAL_K', d.adjudication.retrievalK, 1, 50),
      senderName: env.CLAIMS_SENDER_NAME ?? d.adjudication.senderName,
    },
    cache: {
      maxEntries: readInt(env, 'CACHE_MAX_ENTRIES', d.cache.maxEntries, 1, 1_000_000),
      defaultTtlSeconds: readInt(env, 'CACHE_TTL', d.cache.defaultTtlSeconds, 1, 86_400 * 7),
      distributed: readBoolean(env, 'CACHE_DISTRIBUTED', d.cache.distributed),
    },
    logging: {
      level: readLogLevel(env, d.logging.level),
      axiomToken: env.AXIOM_API_KEY ?? d.logging.axiomToken,
      axiomDataset: env.AXIOM_DATASET ?? d.logging.axiomDataset,
    },
    supabase: {
      url: env.SUPABASE_URL ?? d.supabase.url,
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? d.supabase.serviceRoleKey,
      timeoutMs: readInt(env, 'SUPABASE_TIMEOUT_MS', d.supabase.timeoutMs, 100, 120_000),
    },
  };

  const u = config.underwriting;
  if (u.reviewMin > u.reviewMax) {
    throw new ConfigError(
      `REVIEW_MIN_THRESHOLD (${u.reviewMin}) must not exceed REVIEW_MAX_THRESHOLD (${u.reviewMax})`
    );
  }
  if (u.autoApprove > u.autoReject) {
    throw new ConfigError(
      `AUTO_APPROVE_THRESHOLD (${u.autoApprove}) must not exceed AUTO_REJECT_THRESHOLD (${u.autoReject})`
    );
  }

  return config;
}

// ── Readers ──

function readNumber(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  if (value < min || value > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const value = readNumber(env, name, fallback, min, max);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got ${value}`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

function readLogLevel(env: Env, fallback: LogLevel): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (!isLogLevel(raw)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${raw}"`);
  }
  return raw;
}
