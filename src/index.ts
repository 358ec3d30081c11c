export { createContainer, type Container } from './container.js';
export { getProductionContainer } from './container.production.js';
export { loadConfig, DEFAULT_PIPELINE_CONFIG, DEFAULT_VIDEO_API_CONFIG, maxPossibleScore } from './config.js';
export type { AppConfig, PipelineConfig, VideoApiConfig } from './config.js';
export * from './errors.js';

export { QuotaLedger } from './services/QuotaLedger.js';
export type { CostEstimate, Reservation, UsageStatistics } from './services/QuotaLedger.js';
export { VideoApiClient } from './services/VideoApiClient.js';
export type { SourceUpdateRequest } from './services/VideoApiClient.js';
export { DiscoveryService } from './services/DiscoveryService.js';
export type { DiscoveryResult, StrategyReport } from './services/DiscoveryService.js';
export { consolidate } from './services/SourceConsolidator.js';
export { Scorer, buildReason, isSourceDue, refreshIntervalDays, scoreDistribution } from './services/Scorer.js';
export { SuggestionService } from './services/SuggestionService.js';
export { QuotaResetScheduler } from './services/QuotaResetScheduler.js';

export * from './providers/index.js';

export type * from './types/models.js';
export type * from './types/api.js';
export type * from './types/common.js';
