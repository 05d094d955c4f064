/**
 * Pipeline configuration
 *
 * Credentials and request limits are passed into the services as one explicit
 * object. `loadPipelineConfig` builds it from environment variables.
 */

import { MONITORING_API } from '../constants/monitoring-api';
import { LogLevel, parseLogLevel } from '../util/logger';
import { AppError, ErrorCategory } from '../util/error-handler';
import { parseIntegerSetting, validateString } from '../util/validation';

export interface PipelineConfig {
  apiKey: string;
  siteId: string;
  baseUrl: string;
  /** Longest span (inclusive days) per energy request */
  maxChunkDays: number;
  requestTimeoutMs: number;
  httpRetries: number;
  logLevel: LogLevel;
}

export type PipelineEnv = Record<string, string | undefined>;

export const DEFAULT_PIPELINE_CONFIG: Omit<PipelineConfig, 'apiKey' | 'siteId'> = {
  baseUrl: MONITORING_API.BASE_URL,
  maxChunkDays: MONITORING_API.MAX_DAYS,
  requestTimeoutMs: MONITORING_API.REQUEST_TIMEOUT,
  httpRetries: MONITORING_API.HTTP_RETRIES,
  logLevel: LogLevel.INFO,
};

/**
 * Fill in defaults and validate a partial configuration
 * @throws AppError (VALIDATION, not recoverable) on missing credentials or bad limits
 */
export function createPipelineConfig(
  input: Partial<PipelineConfig> & Pick<PipelineConfig, 'apiKey' | 'siteId'>
): PipelineConfig {
  const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, ...input };

  if (!config.apiKey.trim()) {
    throw new AppError('Missing API key: set SE_API_KEY', ErrorCategory.VALIDATION, undefined, undefined, false);
  }
  if (!config.siteId.trim()) {
    throw new AppError('Missing site ID: set SE_SITE_ID', ErrorCategory.VALIDATION, undefined, undefined, false);
  }
  validateString(config.baseUrl, 'baseUrl', { pattern: /^https?:\/\// });
  if (!Number.isInteger(config.maxChunkDays) || config.maxChunkDays < 1) {
    throw new AppError('Invalid maxChunkDays: must be a positive integer', ErrorCategory.VALIDATION, undefined, undefined, false);
  }

  return {
    ...config,
    apiKey: config.apiKey.trim(),
    siteId: config.siteId.trim(),
  };
}

/**
 * Build the configuration from environment variables:
 * SE_API_KEY, SE_SITE_ID, SE_BASE_URL, SE_MAX_CHUNK_DAYS,
 * SE_REQUEST_TIMEOUT_MS, SE_HTTP_RETRIES, SE_LOG_LEVEL.
 * SE_LOG_LEVEL=debug enables debug output; SE_DEBUG=true does so for
 * loggers built outside the app.
 */
export function loadPipelineConfig(env: PipelineEnv = process.env): PipelineConfig {
  return createPipelineConfig({
    apiKey: env.SE_API_KEY ?? '',
    siteId: env.SE_SITE_ID ?? '',
    baseUrl: env.SE_BASE_URL?.trim() || DEFAULT_PIPELINE_CONFIG.baseUrl,
    maxChunkDays: parseIntegerSetting(env.SE_MAX_CHUNK_DAYS, 'SE_MAX_CHUNK_DAYS', DEFAULT_PIPELINE_CONFIG.maxChunkDays, { min: 1 }),
    requestTimeoutMs: parseIntegerSetting(env.SE_REQUEST_TIMEOUT_MS, 'SE_REQUEST_TIMEOUT_MS', DEFAULT_PIPELINE_CONFIG.requestTimeoutMs, { min: 1 }),
    httpRetries: parseIntegerSetting(env.SE_HTTP_RETRIES, 'SE_HTTP_RETRIES', DEFAULT_PIPELINE_CONFIG.httpRetries, { min: 0, max: 5 }),
    logLevel: parseLogLevel(env.SE_LOG_LEVEL) ?? DEFAULT_PIPELINE_CONFIG.logLevel,
  });
}
