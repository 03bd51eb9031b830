/**
 * Production container. Uses real Supabase + OpenAI.
 * Built once per process from environment configuration.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type AppConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { ConfigError } from './errors.js';
import {
  AxiomLogProvider,
  ConsoleLogProvider,
  OpenAIEmbeddingProvider,
  OpenAIGenerationProvider,
  OpenAITextClassifier,
  type ILogProvider,
} from './providers/index.js';
import { SupabasePolicyChunkRepository } from './repositories/SupabasePolicyChunkRepository.js';
import { SupabaseCacheStore } from './stores/SupabaseCacheStore.js';
import { CLAUSE_LABELS } from './services/PolicyIngestionService.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig(process.env);

  if (!config.openai.apiKey) {
    throw new ConfigError('Missing required environment variable: OPENAI_API_KEY');
  }

  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);
  const logProvider = createLogProvider(config);
  const { apiKey, classifierModel, requestTimeoutMs } = config.openai;

  cached = createContainer({
    embeddingProvider: new OpenAIEmbeddingProvider({
      apiKey,
      model: config.openai.embeddingModel,
      dimensions: config.openai.embeddingDimensions,
      timeoutMs: requestTimeoutMs,
    }),
    generationProvider: new OpenAIGenerationProvider(
      {
        apiKey,
        model: config.openai.generationModel,
        timeoutMs: config.openai.timeoutMs,
        maxAttempts: config.openai.maxAttempts,
      },
      logProvider.child({ component: 'generation' })
    ),
    fraudClassifier: new OpenAITextClassifier({
      apiKey,
      model: classifierModel,
      timeoutMs: requestTimeoutMs,
      task: 'whether an insurance claim or application text is fraudulent',
      labels: ['FRAUD', 'LEGITIMATE'],
    }),
    sentimentClassifier: new OpenAITextClassifier({
      apiKey,
      model: classifierModel,
      timeoutMs: requestTimeoutMs,
      task: 'the overall sentiment of the text',
      labels: ['POSITIVE', 'NEGATIVE'],
    }),
    financialClassifier: new OpenAITextClassifier({
      apiKey,
      model: classifierModel,
      timeoutMs: requestTimeoutMs,
      task: "the financial health implied by an applicant's credit and claims profile",
      labels: ['POSITIVE', 'NEGATIVE', 'NEUTRAL'],
    }),
    clauseClassifier: new OpenAITextClassifier({
      apiKey,
      model: classifierModel,
      timeoutMs: requestTimeoutMs,
      task: 'which kind of insurance policy clause the passage is',
      labels: CLAUSE_LABELS,
    }),
    policyChunkRepo: new SupabasePolicyChunkRepository(db, config.supabase.timeoutMs),
    secondaryCache: new SupabaseCacheStore(db, config.supabase.timeoutMs),
    logProvider,
    settings: config,
  });

  return cached;
}

// Axiom logging: uses AxiomLogProvider when configured, falls back to console.
function createLogProvider(config: AppConfig): ILogProvider {
  const { axiomToken, axiomDataset, level } = config.logging;
  if (axiomToken && axiomDataset) {
    return new AxiomLogProvider({
      apiToken: axiomToken,
      dataset: axiomDataset,
      minLevel: level,
      service: 'claims-decision-engine',
    });
  }
  return new ConsoleLogProvider({ outputToConsole: true, json: true, minLevel: level });
}
