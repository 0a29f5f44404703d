/**
 * Environment configuration for the news stream ingestor
 * Loads and validates required environment variables
 */

import { z } from 'zod';

const MIB = 1024 * 1024;

export interface EnvironmentConfig {
  newsApi: {
    apiKey: string;
    baseUrl: string;
    query: string;
    pageSize: number;
    sortBy: 'relevancy' | 'popularity' | 'publishedAt';
    language: string;
    maxPages: number;
    maxRangeHours: number;
    timeoutMs: number;
  };
  kinesis: {
    region: string;
    endpoint?: string;
    streamName: string;
    maxRecordsPerBatch: number;
    maxBatchBytes: number;
    maxRecordBytes: number;
    concurrency: number;
  };
  retry: {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    factor: number;
    jitter: number;
  };
  scheduler: {
    pollIntervalSeconds: number;
    lookbackHours: number;
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
  };
}

const optionalString = (fallback: string) =>
  z.string().trim().optional().transform((value) => (value ? value : fallback));

const integer = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z.object({
  NEWSAPI_KEY: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  NEWSAPI_BASE_URL: optionalString('https://newsapi.org/v2/everything').pipe(z.string().url()),
  NEWSAPI_QUERY: optionalString('technology'),
  // NewsAPI rejects page sizes above 100
  NEWSAPI_PAGE_SIZE: integer(100, 1, 100),
  NEWSAPI_SORT_BY: z.enum(['relevancy', 'popularity', 'publishedAt']).default('publishedAt'),
  NEWSAPI_LANGUAGE: optionalString('en'),
  NEWSAPI_MAX_PAGES: integer(5, 1),
  NEWSAPI_MAX_RANGE_HOURS: integer(720, 1),
  NEWSAPI_TIMEOUT_MS: integer(30_000, 1),

  AWS_REGION: optionalString('us-east-1'),
  AWS_ENDPOINT_URL: z.string().trim().url().optional(),
  KINESIS_STREAM_NAME: optionalString('news-ingest-stream'),
  // PutRecords accepts at most 500 records and 5 MiB per request, 1 MiB per record
  KINESIS_BATCH_SIZE: integer(500, 1, 500),
  KINESIS_MAX_BATCH_BYTES: integer(5 * MIB, 1, 5 * MIB),
  KINESIS_MAX_RECORD_BYTES: integer(MIB, 1, MIB),
  KINESIS_CONCURRENCY: integer(4, 1, 8),

  MAX_RETRIES: integer(3, 0),
  RETRY_INITIAL_DELAY_MS: integer(500, 0),
  RETRY_MAX_DELAY_MS: integer(30_000, 0),
  RETRY_FACTOR: z.coerce.number().min(1).default(2),
  RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.5),

  POLL_INTERVAL_SECONDS: integer(300, 1),
  LOOKBACK_HOURS: integer(24, 1),

  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'info'))
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
});

/**
 * Load and validate environment configuration
 * @throws Error listing every missing or invalid variable
 */
export function loadEnvironmentConfig(
  env: Record<string, string | undefined> = process.env
): EnvironmentConfig {
  // Empty strings count as unset so `FOO=` in a .env file falls back to the default
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    newsApi: {
      apiKey: vars.NEWSAPI_KEY,
      baseUrl: vars.NEWSAPI_BASE_URL,
      query: vars.NEWSAPI_QUERY,
      pageSize: vars.NEWSAPI_PAGE_SIZE,
      sortBy: vars.NEWSAPI_SORT_BY,
      language: vars.NEWSAPI_LANGUAGE,
      maxPages: vars.NEWSAPI_MAX_PAGES,
      maxRangeHours: vars.NEWSAPI_MAX_RANGE_HOURS,
      timeoutMs: vars.NEWSAPI_TIMEOUT_MS
    },
    kinesis: {
      region: vars.AWS_REGION,
      endpoint: vars.AWS_ENDPOINT_URL,
      streamName: vars.KINESIS_STREAM_NAME,
      maxRecordsPerBatch: vars.KINESIS_BATCH_SIZE,
      maxBatchBytes: vars.KINESIS_MAX_BATCH_BYTES,
      maxRecordBytes: vars.KINESIS_MAX_RECORD_BYTES,
      concurrency: vars.KINESIS_CONCURRENCY
    },
    retry: {
      maxRetries: vars.MAX_RETRIES,
      initialDelayMs: vars.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: vars.RETRY_MAX_DELAY_MS,
      factor: vars.RETRY_FACTOR,
      jitter: vars.RETRY_JITTER
    },
    scheduler: {
      pollIntervalSeconds: vars.POLL_INTERVAL_SECONDS,
      lookbackHours: vars.LOOKBACK_HOURS
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}
