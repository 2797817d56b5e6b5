import type { OperationCategory } from './classify.js';

/**
 * Write-only destination for gateway metrics. Implementations must tolerate concurrent
 * calls from every in-flight request; nothing here reads values back.
 */
export interface MetricsSink {
  incInFlight(action: string): void;
  decInFlight(action: string): void;
  observeRequest(action: string, bucket: string, seconds: number): void;
  countRequest(action: string, status: number, bucket: string): void;
  countOperation(category: OperationCategory, bucket: string): void;
  observeTimeToFirstByte(action: string, bucket: string, ms: number): void;
  addBytesReceived(bucket: string, bytes: number): void;
  addBytesSent(bucket: string, bytes: number): void;
  addExternalBytesSent(bucket: string, bytes: number): void;
  recordBucketActive(bucket: string): void;
}
