// Contract between the batch writer and the streaming store.
// Implementations must be safe to call concurrently from the writer's worker pool.

export interface StreamRecord {
  partitionKey: string;
  data: Uint8Array;
}

export type PutRecordOutcome =
  | { status: 'ok'; sequenceNumber?: string; shardId?: string }
  | { status: 'error'; code: string; message: string; retryable: boolean };

export interface StreamBackend {
  /**
   * Submit one batch. Outcomes come back in input order, one per record.
   * Request-level failures are reported as per-record errors, not thrown.
   */
  putRecords(streamName: string, records: StreamRecord[]): Promise<PutRecordOutcome[]>;

  /**
   * Resolve when the stream exists and accepts writes; reject with
   * BackendConnectivityError otherwise.
   */
  checkConnectivity(streamName: string): Promise<void>;
}
