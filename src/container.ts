/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production, repositories and stores are Supabase implementations and the
 * platform provider talks to YouTube; tests swap in mocks.
 */

import type { ISuggestionRepository } from './repositories/ISuggestionRepository.js';
import type { IVideoRepository } from './repositories/IVideoRepository.js';
import type { IUserInterestRepository } from './repositories/IUserInterestRepository.js';
import type { IQuotaStore } from './stores/IQuotaStore.js';
import type { IVideoPlatformProvider } from './providers/IVideoPlatformProvider.js';
import type { INotificationProvider } from './providers/INotificationProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { PipelineConfig, VideoApiConfig } from './config.js';
import { QuotaLedger } from './services/QuotaLedger.js';
import { VideoApiClient } from './services/VideoApiClient.js';
import { DiscoveryService } from './services/DiscoveryService.js';
import { Scorer } from './services/Scorer.js';
import { SuggestionService } from './services/SuggestionService.js';
import { QuotaResetScheduler } from './services/QuotaResetScheduler.js';

export interface Container {
  quotaLedger: QuotaLedger;
  videoApiClient: VideoApiClient;
  discoveryService: DiscoveryService;
  scorer: Scorer;
  suggestionService: SuggestionService;
  quotaResetScheduler: QuotaResetScheduler;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  suggestionRepo: ISuggestionRepository;
  videoRepo: IVideoRepository;
  interestRepo: IUserInterestRepository;
  quotaStore: IQuotaStore;
  videoPlatform: IVideoPlatformProvider;
  notificationProvider: INotificationProvider;
  logProvider: ILogProvider;
  pipeline: PipelineConfig;
  videoApi: Omit<VideoApiConfig, 'apiKey' | 'baseUrl'>;
  schedulerRetryBackoffMs?: number;
  now?: () => Date;
}): Container {
  const { pipeline, videoApi, now } = deps;

  const quotaLedger = new QuotaLedger(deps.quotaStore, deps.notificationProvider, deps.logProvider, {
    dailyLimit: videoApi.dailyQuotaLimit,
    nearLimitFraction: videoApi.nearLimitFraction,
    criticalFraction: videoApi.criticalFraction,
    costModel: {
      searchCost: videoApi.searchCost,
      detailCost: videoApi.detailCost,
      detailBatchSize: videoApi.detailBatchSize,
    },
    now,
  });

  const videoApiClient = new VideoApiClient(
    deps.videoPlatform,
    quotaLedger,
    deps.notificationProvider,
    deps.logProvider,
    { ...videoApi, lookbackDays: pipeline.lookbackDays, now }
  );

  const discoveryService = new DiscoveryService(
    videoApiClient,
    deps.interestRepo,
    deps.notificationProvider,
    deps.logProvider,
    {
      lookbackDays: pipeline.lookbackDays,
      maxResultsPerSource: pipeline.maxResultsPerSource,
      maxResultsPerTopic: pipeline.maxResultsPerTopic,
      now,
    }
  );

  const scorer = new Scorer(pipeline);

  const suggestionService = new SuggestionService(
    deps.suggestionRepo,
    deps.videoRepo,
    deps.interestRepo,
    discoveryService,
    scorer,
    quotaLedger,
    deps.notificationProvider,
    deps.logProvider,
    pipeline,
    now
  );

  const quotaResetScheduler = new QuotaResetScheduler(quotaLedger, suggestionService, deps.logProvider, {
    retryBackoffMs: deps.schedulerRetryBackoffMs,
    now,
  });

  return {
    quotaLedger,
    videoApiClient,
    discoveryService,
    scorer,
    suggestionService,
    quotaResetScheduler,
    logProvider: deps.logProvider,
  };
}
