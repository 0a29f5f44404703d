#!/usr/bin/env tsx

/**
 * Runner for the news stream ingestor
 * Loads environment variables, checks the stream, then polls until stopped
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';

// Find project root (go up two levels from scripts/ingestion directory)
const projectRoot = path.resolve(__dirname, '../..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { loadEnvironmentConfig } from '../../src/config/environment';
import { createNewsApiSource } from '../../src/adapters/newsapi';
import { BatchWriter } from '../../src/ingestion/batch-writer';
import { IngestionScheduler } from '../../src/ingestion/scheduler';
import { KinesisStreamBackend, createKinesisClient } from '../../src/utils/kinesisClient';
import { logger } from '../../src/utils/logger';

const HOUR_MS = 60 * 60 * 1000;

async function main() {
  const config = loadEnvironmentConfig();
  logger.setLevel(config.logging.level);

  const client = createKinesisClient(config.kinesis);
  const backend = new KinesisStreamBackend(client);
  const writer = new BatchWriter(backend, {
    streamName: config.kinesis.streamName,
    maxRecordsPerBatch: config.kinesis.maxRecordsPerBatch,
    maxBatchBytes: config.kinesis.maxBatchBytes,
    maxRecordBytes: config.kinesis.maxRecordBytes,
    concurrency: config.kinesis.concurrency,
    maxRetries: config.retry.maxRetries,
    backoff: {
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      factor: config.retry.factor,
      jitter: config.retry.jitter
    }
  });

  const scheduler = new IngestionScheduler(
    { source: createNewsApiSource(config), writer, backend },
    {
      streamName: config.kinesis.streamName,
      pollIntervalMs: config.scheduler.pollIntervalSeconds * 1000,
      lookbackMs: config.scheduler.lookbackHours * HOUR_MS
    }
  );

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info(`Received ${signal}, finishing current tick before shutdown`);
      scheduler.stop();
    });
  }

  logger.info('Starting news ingestion pipeline', {
    query: config.newsApi.query,
    pollIntervalSeconds: config.scheduler.pollIntervalSeconds,
    lookbackHours: config.scheduler.lookbackHours,
    stream: config.kinesis.streamName,
    region: config.kinesis.region
  });

  try {
    await scheduler.start();
  } finally {
    client.destroy();
  }
}

main().then(
  () => process.exit(0),
  error => {
    logger.error('Fatal error, shutting down', error);
    process.exit(1);
  }
);
