/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production, providers and repositories are the OpenAI and Supabase
 * implementations (see container.production.ts); tests swap in mocks.
 */

import type { AppConfig } from './config.js';
import { DEFAULT_CONFIG } from './config.js';
import {
  ModelDetector,
  PatternDetector,
  SentimentDetector,
  StatisticalDetector,
  type ISignalDetector,
} from './detectors/index.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { IGenerationProvider } from './providers/IGenerationProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ITextClassifier } from './providers/ITextClassifier.js';
import type { IPolicyChunkRepository } from './repositories/IPolicyChunkRepository.js';
import type { ICacheStore } from './stores/ICacheStore.js';
import { InMemoryCacheStore } from './stores/InMemoryCacheStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { AdvisorService } from './services/AdvisorService.js';
import { CacheService } from './services/CacheService.js';
import { ClaimAdjudicationService } from './services/ClaimAdjudicationService.js';
import { FraudEnsembleService } from './services/FraudEnsembleService.js';
import { PolicyIngestionService } from './services/PolicyIngestionService.js';
import { RetrievalService } from './services/RetrievalService.js';
import { RiskAssessmentService } from './services/RiskAssessmentService.js';

export type EngineSettings = Pick<AppConfig, 'fraud' | 'underwriting' | 'adjudication' | 'cache'>;

export const DEFAULT_SETTINGS: EngineSettings = {
  fraud: DEFAULT_CONFIG.fraud,
  underwriting: DEFAULT_CONFIG.underwriting,
  adjudication: DEFAULT_CONFIG.adjudication,
  cache: DEFAULT_CONFIG.cache,
};

export interface Container {
  fraudService: FraudEnsembleService;
  riskService: RiskAssessmentService;
  claimService: ClaimAdjudicationService;
  ingestionService: PolicyIngestionService;
  advisorService: AdvisorService;
  retrievalService: RetrievalService;
  cacheService: CacheService;
  logProvider: ILogProvider;
  errorHandler: Middleware;
  logging: Middleware;
}

export interface ContainerDeps {
  embeddingProvider: IEmbeddingProvider;
  generationProvider: IGenerationProvider;
  /** Fraud/legitimate classifier behind the model detector. */
  fraudClassifier: ITextClassifier;
  /** Positive/negative classifier behind the sentiment detector. */
  sentimentClassifier: ITextClassifier;
  /** Financial-profile sentiment; without it the adjustment is 0. */
  financialClassifier?: ITextClassifier | null;
  /** Clause tagger for ingestion; without it every chunk is GENERAL. */
  clauseClassifier?: ITextClassifier | null;
  policyChunkRepo: IPolicyChunkRepository;
  logProvider: ILogProvider;
  /** Distributed cache tier, if any. */
  secondaryCache?: ICacheStore | null;
  settings?: EngineSettings;
  /** Clock, injectable for tests. */
  now?: () => Date;
}

export function createContainer(deps: ContainerDeps): Container {
  const settings = deps.settings ?? DEFAULT_SETTINGS;
  const now = deps.now ?? (() => new Date());
  const log = deps.logProvider;

  const clock = (): number => now().getTime();
  const cacheService = new CacheService(
    new InMemoryCacheStore(settings.cache.maxEntries, clock),
    settings.cache.distributed ? deps.secondaryCache ?? null : null,
    log.child({ component: 'cache' }),
    settings.cache.defaultTtlSeconds,
    clock
  );

  const detectors: ISignalDetector[] = [
    new PatternDetector(),
    new ModelDetector(deps.fraudClassifier),
    new SentimentDetector(deps.sentimentClassifier),
    new StatisticalDetector(),
  ];
  const fraudService = new FraudEnsembleService(
    detectors,
    cacheService,
    log.child({ component: 'fraud' }),
    settings.fraud,
    now
  );

  const retrievalService = new RetrievalService(
    deps.policyChunkRepo,
    deps.embeddingProvider,
    log.child({ component: 'retrieval' })
  );

  const riskService = new RiskAssessmentService(
    fraudService,
    retrievalService,
    deps.generationProvider,
    deps.financialClassifier ?? null,
    settings.underwriting,
    log.child({ component: 'risk' }),
    now
  );

  const claimService = new ClaimAdjudicationService(
    fraudService,
    retrievalService,
    deps.generationProvider,
    log.child({ component: 'claims' }),
    settings.adjudication
  );

  const ingestionService = new PolicyIngestionService(
    fraudService,
    deps.embeddingProvider,
    deps.clauseClassifier ?? null,
    deps.policyChunkRepo,
    log.child({ component: 'ingestion' })
  );

  const advisorService = new AdvisorService(
    retrievalService,
    deps.generationProvider,
    log.child({ component: 'advisor' }),
    settings.adjudication.retrievalK
  );

  return {
    fraudService,
    riskService,
    claimService,
    ingestionService,
    advisorService,
    retrievalService,
    cacheService,
    logProvider: log,
    errorHandler: createErrorHandler(log),
    logging: createLoggingMiddleware(log),
  };
}
