import { loadEnvironmentConfig } from '../environment';

describe('loadEnvironmentConfig', () => {
  it('fills in defaults when only the API key is set', () => {
    const config = loadEnvironmentConfig({ NEWSAPI_KEY: 'test-key' });

    expect(config).toEqual({
      newsApi: {
        apiKey: 'test-key',
        baseUrl: 'https://newsapi.org/v2/everything',
        query: 'technology',
        pageSize: 100,
        sortBy: 'publishedAt',
        language: 'en',
        maxPages: 5,
        maxRangeHours: 720,
        timeoutMs: 30_000
      },
      kinesis: {
        region: 'us-east-1',
        endpoint: undefined,
        streamName: 'news-ingest-stream',
        maxRecordsPerBatch: 500,
        maxBatchBytes: 5 * 1024 * 1024,
        maxRecordBytes: 1024 * 1024,
        concurrency: 4
      },
      retry: { maxRetries: 3, initialDelayMs: 500, maxDelayMs: 30_000, factor: 2, jitter: 0.5 },
      scheduler: { pollIntervalSeconds: 300, lookbackHours: 24 },
      logging: { level: 'info' }
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadEnvironmentConfig({
      NEWSAPI_KEY: 'test-key',
      NEWSAPI_QUERY: 'climate',
      NEWSAPI_PAGE_SIZE: '50',
      NEWSAPI_SORT_BY: 'relevancy',
      AWS_REGION: 'eu-west-1',
      AWS_ENDPOINT_URL: 'http://localhost:4566',
      KINESIS_STREAM_NAME: 'articles',
      KINESIS_CONCURRENCY: '8',
      MAX_RETRIES: '0',
      RETRY_JITTER: '0.25',
      POLL_INTERVAL_SECONDS: '60',
      LOG_LEVEL: 'DEBUG'
    });

    expect(config.newsApi.query).toBe('climate');
    expect(config.newsApi.pageSize).toBe(50);
    expect(config.newsApi.sortBy).toBe('relevancy');
    expect(config.kinesis).toEqual(
      expect.objectContaining({ region: 'eu-west-1', endpoint: 'http://localhost:4566', streamName: 'articles', concurrency: 8 })
    );
    expect(config.retry.maxRetries).toBe(0);
    expect(config.retry.jitter).toBe(0.25);
    expect(config.scheduler.pollIntervalSeconds).toBe(60);
    expect(config.logging.level).toBe('debug');
  });

  it('treats empty values as unset', () => {
    const config = loadEnvironmentConfig({ NEWSAPI_KEY: 'test-key', NEWSAPI_QUERY: '', KINESIS_BATCH_SIZE: ' ' });

    expect(config.newsApi.query).toBe('technology');
    expect(config.kinesis.maxRecordsPerBatch).toBe(500);
  });

  it('requires the API key', () => {
    expect(() => loadEnvironmentConfig({})).toThrow('Invalid environment configuration: NEWSAPI_KEY is required');
  });

  it.each([
    ['NEWSAPI_PAGE_SIZE', '200'],
    ['KINESIS_BATCH_SIZE', '501'],
    ['KINESIS_CONCURRENCY', '0'],
    ['RETRY_JITTER', '1.5'],
    ['NEWSAPI_SORT_BY', 'newest'],
    ['LOG_LEVEL', 'verbose'],
    ['POLL_INTERVAL_SECONDS', 'often']
  ])('rejects %s=%s', (name, value) => {
    expect(() => loadEnvironmentConfig({ NEWSAPI_KEY: 'test-key', [name]: value })).toThrow(name);
  });

  it('lists every problem at once', () => {
    expect(() => loadEnvironmentConfig({ NEWSAPI_PAGE_SIZE: '0' })).toThrow(
      /NEWSAPI_KEY is required; NEWSAPI_PAGE_SIZE/
    );
  });
});
