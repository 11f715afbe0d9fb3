/**
 * Application configuration
 * Centralized configuration management with environment validation
 */

import { z } from 'zod';
import { logger } from '../utils/logger';

// Environment validation schema
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).default('info'),
  LOG_FILE: z.string().min(1).default('error_log.txt'),

  // Monitoring
  LOKI_HOST: z.string().optional(),

  // Graph API
  GRAPH_API_BASE_URL: z.string().url().default('https://graph.facebook.com'),
  GRAPH_API_VERSION: z
    .string()
    .regex(/^v\d+\.\d+$/, 'Expected a version such as v16.0')
    .default('v16.0'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300000).default(30000),

  // Member fetching
  PAGE_SIZE: z.coerce.number().int().min(1).max(5000).default(500),
  METADATA_BATCH_SIZE: z.coerce.number().int().min(1).max(50).default(50), // Graph caps ids= at 50

  // Bulk removal
  REMOVAL_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),

  // Retry / backoff for rate-limited calls
  RETRY_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_BACKOFF_FACTOR: z.coerce.number().min(1).max(10).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30000),
});

export type AppConfig = z.infer<typeof envSchema>;

export interface ApiConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export interface ProcessingConfig {
  pageSize: number;
  metadataBatchSize: number;
  removalConcurrency: number;
}

class ConfigManager {
  private config: AppConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadAndValidateConfig(env);
  }

  /**
   * Load and validate environment configuration
   */
  private loadAndValidateConfig(env: NodeJS.ProcessEnv): AppConfig {
    const result = envSchema.safeParse(env);

    if (!result.success) {
      const errors = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);

      logger.error('Configuration validation failed', { errors });
      throw new Error(`Invalid configuration: ${errors.join(', ')}`);
    }

    logger.debug('Configuration loaded successfully', {
      environment: result.data.NODE_ENV,
      apiVersion: result.data.GRAPH_API_VERSION,
      logLevel: result.data.LOG_LEVEL,
    });

    return result.data;
  }

  /**
   * Get Graph API connection settings
   */
  public getApiConfig(): ApiConfig {
    const baseUrl = this.config.GRAPH_API_BASE_URL.replace(/\/+$/, '');
    return {
      baseUrl: `${baseUrl}/${this.config.GRAPH_API_VERSION}`,
      timeoutMs: this.config.REQUEST_TIMEOUT_MS,
    };
  }

  /**
   * Get retry/backoff policy for rate-limited calls
   */
  public getRetryConfig(): RetryConfig {
    return {
      maxRetries: this.config.RETRY_MAX_RETRIES,
      baseDelayMs: this.config.RETRY_BASE_DELAY_MS,
      backoffFactor: this.config.RETRY_BACKOFF_FACTOR,
      maxDelayMs: this.config.RETRY_MAX_DELAY_MS,
    };
  }

  /**
   * Get batching and concurrency settings
   */
  public getProcessingConfig(): ProcessingConfig {
    return {
      pageSize: this.config.PAGE_SIZE,
      metadataBatchSize: this.config.METADATA_BATCH_SIZE,
      removalConcurrency: this.config.REMOVAL_CONCURRENCY,
    };
  }

  public getLoggingConfig() {
    return {
      level: this.config.LOG_LEVEL,
      file: this.config.LOG_FILE,
      lokiHost: this.config.LOKI_HOST,
    };
  }
}

export { ConfigManager };
