/**
 * Jest setup file for global test configuration
 * Runs before each test file
 */

import type { Article, RawArticle } from '../types/article';
import type { PutRecordOutcome, StreamBackend, StreamRecord } from '../ingestion/stream-backend';

// Global test timeout
jest.setTimeout(30000);

// Mock environment variables for testing
Object.assign(process.env, {
  NODE_ENV: 'test',
  NEWSAPI_KEY: 'test-key',
  KINESIS_STREAM_NAME: 'test-stream',
  LOG_LEVEL: 'error' // Reduce log noise in tests
});

// Mock console methods to reduce noise in tests
const originalConsole = { ...console };

beforeEach(() => {
  console.log = jest.fn();
  console.info = jest.fn();
  console.warn = jest.fn();
  console.error = jest.fn();
  console.debug = jest.fn();
});

afterEach(() => {
  jest.restoreAllMocks();
  jest.clearAllTimers();
});

afterAll(() => {
  console.log = originalConsole.log;
  console.info = originalConsole.info;
  console.warn = originalConsole.warn;
  console.error = originalConsole.error;
  console.debug = originalConsole.debug;
});

// Utility function to create a fetch Response carrying a JSON body
export const createJsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers }
  });

// Utility function to create a raw NewsAPI article
export const createRawArticle = (overrides: RawArticle = {}): RawArticle => ({
  source: { id: null, name: 'Test Source' },
  author: 'Test Author',
  title: 'Test Article',
  description: 'Test description',
  url: 'https://example.com/article',
  urlToImage: null,
  publishedAt: '2026-01-01T00:00:00Z',
  content: 'Test content',
  ...overrides
});

// Utility function to create a canonical article
export const createArticle = (overrides: Partial<Article> = {}): Article => ({
  id: 'a'.repeat(64),
  sourceName: 'Test Source',
  title: 'Test Article',
  content: 'Test content',
  url: 'https://example.com/article',
  author: 'Test Author',
  publishedAt: '2026-01-01T00:00:00.000Z',
  ingestedAt: '2026-01-01T01:00:00.000Z',
  ...overrides
});

/**
 * In-process stand-in for the stream backend.
 * `respond` decides each record's outcome; every call is recorded.
 */
export class FakeStreamBackend implements StreamBackend {
  readonly calls: StreamRecord[][] = [];
  connectivityError: Error | null = null;

  constructor(
    private readonly respond: (record: StreamRecord, call: number) => PutRecordOutcome = () => ({ status: 'ok' })
  ) {}

  async putRecords(_streamName: string, records: StreamRecord[]): Promise<PutRecordOutcome[]> {
    this.calls.push(records);
    const call = this.calls.length;
    return records.map(record => this.respond(record, call));
  }

  async checkConnectivity(): Promise<void> {
    if (this.connectivityError) throw this.connectivityError;
  }

  get batchSizes(): number[] {
    return this.calls.map(call => call.length);
  }
}
