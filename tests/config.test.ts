import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_VIDEO_API_CONFIG,
  loadConfig,
  maxPossibleScore,
} from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

const baseEnv = {
  SUPABASE_URL: 'https://db.example.com',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
  YOUTUBE_API_KEY: 'test-key',
};

describe('loadConfig', () => {
  it('should apply defaults for optional variables', () => {
    const config = loadConfig(baseEnv);
    expect(config.supabaseUrl).toBe('https://db.example.com');
    expect(config.videoApi.apiKey).toBe('test-key');
    expect(config.videoApi.dailyQuotaLimit).toBe(10_000);
    expect(config.videoApi.baseUrl).toBe(DEFAULT_VIDEO_API_CONFIG.baseUrl);
    expect(config.pipeline).toEqual(DEFAULT_PIPELINE_CONFIG);
    expect(config.axiom).toBeNull();
    expect(config.schedulerRetryBackoffMs).toBe(300_000);
    expect(config.logLevel).toBe('info');
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ...baseEnv,
      YOUTUBE_DAILY_QUOTA: '50000',
      AXIOM_API_KEY: 'test-token',
      AXIOM_DATASET: 'suggestions',
      SCHEDULER_RETRY_BACKOFF_MS: '1000',
      LOG_LEVEL: 'debug',
    });
    expect(config.videoApi.dailyQuotaLimit).toBe(50_000);
    expect(config.axiom).toEqual({ apiToken: 'test-token', dataset: 'suggestions' });
    expect(config.schedulerRetryBackoffMs).toBe(1000);
    expect(config.logLevel).toBe('debug');
  });

  it('should leave Axiom disabled when only the key is set', () => {
    expect(loadConfig({ ...baseEnv, AXIOM_API_KEY: 'test-token' }).axiom).toBeNull();
  });

  it('should name every missing variable', () => {
    expect(() => loadConfig({})).toThrow(
      'Invalid or missing environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, YOUTUBE_API_KEY'
    );
  });

  it('should reject malformed values', () => {
    expect(() => loadConfig({ ...baseEnv, YOUTUBE_DAILY_QUOTA: 'lots' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ ...baseEnv, LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});

describe('maxPossibleScore', () => {
  it('should be the top component score plus the dual-source bonus', () => {
    expect(maxPossibleScore(DEFAULT_PIPELINE_CONFIG)).toBeCloseTo(11, 10);
  });
});
