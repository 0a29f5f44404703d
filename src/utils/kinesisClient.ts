/**
 * Kinesis Data Streams backend
 * Wraps one explicitly constructed KinesisClient. The AWS SDK client is safe
 * for concurrent use, so a single instance is shared by every in-flight batch.
 */

import {
  DescribeStreamSummaryCommand,
  KinesisClient,
  KinesisServiceException,
  PutRecordsCommand
} from '@aws-sdk/client-kinesis';
import type { EnvironmentConfig } from '../config/environment';
import { BackendConnectivityError, errorMessage } from '../ingestion/errors';
import type { PutRecordOutcome, StreamBackend, StreamRecord } from '../ingestion/stream-backend';
import { logger } from './logger';

// Per-record PutRecords error codes worth resubmitting
export const RETRYABLE_RECORD_ERROR_CODES = new Set([
  'ProvisionedThroughputExceededException',
  'InternalFailure',
  'KMSThrottlingException'
]);

const THROTTLING_ERRORS = new Set([
  'ProvisionedThroughputExceededException',
  'LimitExceededException',
  'KMSThrottlingException',
  'ThrottlingException'
]);

const WRITABLE_STATUSES = new Set(['ACTIVE', 'UPDATING']);

export function createKinesisClient(config: EnvironmentConfig['kinesis']): KinesisClient {
  return new KinesisClient({
    region: config.region,
    // LocalStack and other emulators
    ...(config.endpoint ? { endpoint: config.endpoint } : {})
  });
}

/**
 * Whether a failed PutRecords request may succeed if sent again.
 * Anything that is not a service exception (socket resets, timeouts) is retryable.
 */
export function isRetryableRequestError(error: unknown): boolean {
  if (!(error instanceof KinesisServiceException)) {
    return true;
  }
  return error.$fault === 'server' || error.$retryable !== undefined || THROTTLING_ERRORS.has(error.name);
}

export class KinesisStreamBackend implements StreamBackend {
  constructor(private readonly client: KinesisClient) {}

  async putRecords(streamName: string, records: StreamRecord[]): Promise<PutRecordOutcome[]> {
    if (records.length === 0) return [];

    try {
      const response = await this.client.send(
        new PutRecordsCommand({
          StreamName: streamName,
          Records: records.map(record => ({
            Data: record.data,
            PartitionKey: record.partitionKey
          }))
        })
      );

      const entries = response.Records ?? [];
      return records.map((_, index): PutRecordOutcome => {
        const entry = entries[index];
        if (!entry) {
          return { status: 'error', code: 'MissingResult', message: 'no result entry for record', retryable: true };
        }
        if (entry.ErrorCode) {
          return {
            status: 'error',
            code: entry.ErrorCode,
            message: entry.ErrorMessage ?? entry.ErrorCode,
            retryable: RETRYABLE_RECORD_ERROR_CODES.has(entry.ErrorCode)
          };
        }
        return { status: 'ok', sequenceNumber: entry.SequenceNumber, shardId: entry.ShardId };
      });
    } catch (error) {
      const code = error instanceof Error ? error.name : 'UnknownError';
      const retryable = isRetryableRequestError(error);
      logger.warn(`[kinesis] PutRecords request failed for ${records.length} records`, { code, retryable });
      return records.map((): PutRecordOutcome => ({
        status: 'error',
        code,
        message: errorMessage(error),
        retryable
      }));
    }
  }

  async checkConnectivity(streamName: string): Promise<void> {
    let status: string | undefined;
    try {
      const response = await this.client.send(new DescribeStreamSummaryCommand({ StreamName: streamName }));
      status = response.StreamDescriptionSummary?.StreamStatus;
    } catch (error) {
      if (error instanceof KinesisServiceException && error.name === 'ResourceNotFoundException') {
        throw new BackendConnectivityError(`Kinesis stream '${streamName}' not found`, { cause: error });
      }
      throw new BackendConnectivityError(`Error connecting to Kinesis: ${errorMessage(error)}`, { cause: error });
    }

    logger.info(`[kinesis] Stream '${streamName}' status: ${status ?? 'unknown'}`);
    if (!status || !WRITABLE_STATUSES.has(status)) {
      throw new BackendConnectivityError(`Kinesis stream '${streamName}' is not writable (status: ${status ?? 'unknown'})`);
    }
  }
}
