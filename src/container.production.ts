/**
 * Production container: Supabase persistence, YouTube Data API, Axiom logging
 * when configured (console otherwise).
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseSuggestionRepository } from './repositories/SupabaseSuggestionRepository.js';
import { SupabaseVideoRepository } from './repositories/SupabaseVideoRepository.js';
import { SupabaseUserInterestRepository } from './repositories/SupabaseUserInterestRepository.js';
import { SupabaseQuotaStore } from './stores/SupabaseQuotaStore.js';
import { YouTubeDataProvider } from './providers/YouTubeDataProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { LogNotificationProvider } from './providers/LogNotificationProvider.js';
import type { INotificationProvider } from './providers/INotificationProvider.js';

let cached: Promise<Container> | null = null;

/**
 * Builds the container once and loads today's quota usage before returning it.
 * @param notificationProvider user-facing sink; defaults to writing notifications to the log
 */
export function getProductionContainer(notificationProvider?: INotificationProvider): Promise<Container> {
  if (!cached) {
    cached = buildContainer(notificationProvider).catch((err: unknown) => {
      cached = null;
      throw err;
    });
  }
  return cached;
}

async function buildContainer(notificationProvider?: INotificationProvider): Promise<Container> {
  const config = loadConfig();
  const db = getSupabaseClient(config.supabaseUrl, config.supabaseServiceRoleKey);

  const logProvider = config.axiom
    ? new AxiomLogProvider({ ...config.axiom, minLevel: config.logLevel })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel });

  const { apiKey, baseUrl, ...videoApi } = config.videoApi;

  const container = createContainer({
    suggestionRepo: new SupabaseSuggestionRepository(db),
    videoRepo: new SupabaseVideoRepository(db),
    interestRepo: new SupabaseUserInterestRepository(db),
    quotaStore: new SupabaseQuotaStore(db),
    videoPlatform: new YouTubeDataProvider({ apiKey, baseUrl }),
    notificationProvider: notificationProvider ?? new LogNotificationProvider(logProvider),
    logProvider,
    pipeline: config.pipeline,
    videoApi,
    schedulerRetryBackoffMs: config.schedulerRetryBackoffMs,
  });

  await container.quotaLedger.init();
  return container;
}
