/**
 * Batched writer for the article stream.
 *
 * Articles are encoded to wire records, greedily packed into batches that
 * respect the backend's count and byte limits, and submitted with bounded
 * concurrency. The backend may accept only part of a batch: records that
 * failed with a retryable code are repacked into a fresh batch and resubmitted
 * after a backoff delay, up to `maxRetries` times. Everything else is dropped
 * with an auditable reason.
 */

import pLimit from 'p-limit';
import type { Article, DroppedRecord, WireRecord, WriteReport } from '../types/article';
import { logger } from '../utils/logger';
import { BackoffPolicy, Random, RetrySchedule, Sleep, sleep as defaultSleep } from './backoff';
import { errorMessage } from './errors';
import type { PutRecordOutcome, StreamBackend, StreamRecord } from './stream-backend';

export interface BatchLimits {
  maxRecordsPerBatch: number;
  maxBatchBytes: number;
  maxRecordBytes: number;
}

export interface BatchWriterOptions extends BatchLimits {
  streamName: string;
  concurrency: number;
  maxRetries: number;
  backoff: BackoffPolicy;
  sleep?: Sleep;
  random?: Random;
}

export interface PendingRecord extends StreamRecord {
  articleId: string;
  size: number;
  retries: number;
}

type Limit = ReturnType<typeof pLimit>;

interface BatchOutcome {
  succeeded: number;
  retried: number;
  dropped: DroppedRecord[];
}

export function toWireRecord(article: Article): WireRecord {
  return {
    article_id: article.id,
    source_name: article.sourceName,
    title: article.title,
    content: article.content,
    url: article.url,
    author: article.author,
    published_at: article.publishedAt,
    ingested_at: article.ingestedAt
  };
}

export function encodeArticle(article: Article): PendingRecord {
  const data = Buffer.from(JSON.stringify(toWireRecord(article)), 'utf8');
  const partitionKey = article.id;
  return {
    articleId: article.id,
    partitionKey,
    data,
    // Kinesis counts the partition key against both the record and request limits
    size: data.byteLength + Buffer.byteLength(partitionKey, 'utf8'),
    retries: 0
  };
}

/**
 * Greedy packing in input order. Records larger than `maxRecordBytes` are
 * returned separately and never placed in a batch.
 */
export function packBatches(
  records: PendingRecord[],
  limits: BatchLimits
): { batches: PendingRecord[][]; oversized: PendingRecord[] } {
  const batches: PendingRecord[][] = [];
  const oversized: PendingRecord[] = [];
  let current: PendingRecord[] = [];
  let currentBytes = 0;

  for (const record of records) {
    if (record.size > limits.maxRecordBytes || record.size > limits.maxBatchBytes) {
      oversized.push(record);
      continue;
    }
    const full =
      current.length >= limits.maxRecordsPerBatch ||
      currentBytes + record.size > limits.maxBatchBytes;
    if (full && current.length > 0) {
      batches.push(current);
      current = [];
      currentBytes = 0;
    }
    current.push(record);
    currentBytes += record.size;
  }

  if (current.length > 0) {
    batches.push(current);
  }
  return { batches, oversized };
}

export class BatchWriter {
  private readonly sleep: Sleep;
  private readonly random: Random;

  constructor(
    private readonly backend: StreamBackend,
    private readonly options: BatchWriterOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async write(articles: Article[]): Promise<WriteReport> {
    const report: WriteReport = {
      submitted: articles.length,
      succeeded: 0,
      retried: 0,
      permanentlyDropped: 0,
      batches: 0,
      dropped: []
    };
    if (articles.length === 0) {
      return report;
    }

    const { batches, oversized } = packBatches(articles.map(encodeArticle), this.options);
    for (const record of oversized) {
      report.dropped.push({
        articleId: record.articleId,
        stage: 'pack',
        code: 'RecordTooLarge',
        message: `record is ${record.size} bytes, limit is ${Math.min(this.options.maxRecordBytes, this.options.maxBatchBytes)}`,
        retries: 0
      });
    }

    report.batches = batches.length;
    logger.info(`[writer] Submitting ${articles.length - oversized.length} records in ${batches.length} batches`);

    const limit = pLimit(this.options.concurrency);
    const outcomes = await Promise.all(
      batches.map((batch, index) => this.submitBatch(batch, index + 1, limit))
    );

    for (const outcome of outcomes) {
      report.succeeded += outcome.succeeded;
      report.retried += outcome.retried;
      report.dropped.push(...outcome.dropped);
    }
    report.permanentlyDropped = report.dropped.length;
    return report;
  }

  /**
   * Submit one batch until every record has either succeeded or been dropped.
   * Only the backend call takes a limiter slot, so other batches are sent
   * while this one waits out its backoff.
   */
  private async submitBatch(batch: PendingRecord[], batchNumber: number, limit: Limit): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { succeeded: 0, retried: 0, dropped: [] };
    const schedule = new RetrySchedule(this.options.backoff, this.options.maxRetries, this.random);
    let pending = batch;

    while (pending.length > 0) {
      const results = await limit(() => this.putBatch(pending));
      const retryable: { record: PendingRecord; code: string; message: string }[] = [];

      pending.forEach((record, index) => {
        const result = results[index];
        if (result.status === 'ok') {
          outcome.succeeded++;
        } else if (result.retryable) {
          retryable.push({ record, code: result.code, message: result.message });
        } else {
          outcome.dropped.push({
            articleId: record.articleId,
            stage: 'write',
            code: result.code,
            message: result.message,
            retries: record.retries
          });
        }
      });

      if (retryable.length === 0) {
        break;
      }

      const step = schedule.next();
      if (step.kind === 'exhausted') {
        logger.warn(`[writer] Batch ${batchNumber}: giving up on ${retryable.length} records after ${step.retries} retries`);
        for (const { record, code, message } of retryable) {
          outcome.dropped.push({
            articleId: record.articleId,
            stage: 'write',
            code,
            message: `${message} (retries exhausted)`,
            retries: record.retries
          });
        }
        break;
      }

      logger.warn(
        `[writer] Batch ${batchNumber}: ${retryable.length}/${pending.length} records failed, retry ${step.retry} in ${step.delayMs}ms`
      );
      await this.sleep(step.delayMs);

      pending = retryable.map(({ record }) => ({ ...record, retries: record.retries + 1 }));
      outcome.retried += pending.length;
    }

    return outcome;
  }

  private async putBatch(batch: PendingRecord[]): Promise<PutRecordOutcome[]> {
    const records = batch.map(({ partitionKey, data }) => ({ partitionKey, data }));
    let results: PutRecordOutcome[];
    try {
      results = await this.backend.putRecords(this.options.streamName, records);
    } catch (error) {
      logger.error(`[writer] Backend threw while writing ${batch.length} records`, error);
      const message = errorMessage(error);
      return batch.map((): PutRecordOutcome => ({ status: 'error', code: 'RequestFailed', message, retryable: true }));
    }
    if (results.length === batch.length) {
      return results;
    }
    logger.warn(`[writer] Backend returned ${results.length} results for ${batch.length} records`);
    return batch.map((_, index): PutRecordOutcome => results[index] ?? {
      status: 'error',
      code: 'MissingResult',
      message: 'no result for record',
      retryable: true
    });
  }
}
