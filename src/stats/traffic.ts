// src/stats/traffic.ts
import type { IncomingMessage } from 'http';
import type { BucketExtractor } from '../s3/bucket.js';
import { resolveClientAddress } from '../net/clientAddress.js';
import { containsAddress, type PrefixSet } from '../net/prefixSet.js';
import type { MetricsSink } from './sink.js';
import { bucketLabel } from './track.js';

export interface TrafficDeps {
  sink: MetricsSink;
  bucketOf: BucketExtractor;
  internal: PrefixSet | null;
}

/**
 * Byte and first-byte recorders. Handlers call these directly while streaming; each call is
 * independent and may happen any number of times per request.
 */
export function createTrafficRecorder({ sink, bucketOf, internal }: TrafficDeps) {
  return {
    /** `start` is a `process.hrtime.bigint()` reading taken when the request began. */
    timeToFirstByte(action: string, start: bigint, req: IncomingMessage): void {
      const bucket = bucketLabel(bucketOf, req);
      sink.observeTimeToFirstByte(action, bucket, Number(process.hrtime.bigint() - start) / 1e6);
      sink.recordBucketActive(bucket);
    },

    bucketTrafficReceived(bytes: number, req: IncomingMessage): void {
      const bucket = bucketLabel(bucketOf, req);
      sink.recordBucketActive(bucket);
      sink.addBytesReceived(bucket, bytes);
    },

    // Only egress to clients outside the internal networks is billable.
    bucketTrafficSent(bytes: number, req: IncomingMessage): void {
      const bucket = bucketLabel(bucketOf, req);
      sink.recordBucketActive(bucket);
      if (!containsAddress(internal, resolveClientAddress(req))) {
        sink.addExternalBytesSent(bucket, bytes);
      }
      sink.addBytesSent(bucket, bytes);
    },
  };
}

export type TrafficRecorder = ReturnType<typeof createTrafficRecorder>;
