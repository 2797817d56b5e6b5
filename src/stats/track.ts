// src/stats/track.ts
import type { IncomingMessage, ServerResponse } from 'http';
import type { NextFunction } from 'express';
import type { BucketExtractor } from '../s3/bucket.js';
import { billableOperations } from './classify.js';
import type { MetricsSink } from './sink.js';

export type Handler<Req extends IncomingMessage, Res extends ServerResponse> = (
  req: Req,
  res: Res,
  next: NextFunction
) => void | Promise<void>;

export interface TrackDeps {
  sink: MetricsSink;
  bucketOf: BucketExtractor;
}

// Extraction problems only cost the label, never the request.
export function bucketLabel(bucketOf: BucketExtractor, req: IncomingMessage): string {
  try {
    return bucketOf(req).bucket;
  } catch {
    return '';
  }
}

export function elapsedSeconds(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1e9;
}

/**
 * Wraps an S3 handler so every call is counted: in-flight gauge, latency, status and the
 * read/write billing counters. The handler's response and errors pass through untouched;
 * when it throws only the in-flight gauge is settled.
 *
 * Recording happens when the handler settles. A handler that hands the request on with
 * `next()` without writing is recorded with the status the response holds at that point
 * (200 unless it was set), not the one a later handler sends. Wrap the handler that
 * answers the request.
 */
export function createTrack({ sink, bucketOf }: TrackDeps) {
  return function track<Req extends IncomingMessage, Res extends ServerResponse>(
    handler: Handler<Req, Res>,
    action: string
  ): Handler<Req, Res> {
    return async (req, res, next) => {
      sink.incInFlight(action);
      try {
        let bucket = bucketLabel(bucketOf, req);
        const start = process.hrtime.bigint();
        await handler(req, res, next);

        // ServerResponse.statusCode is what writeHead sent (200 if the handler never set one)
        const status = res.statusCode;
        // don't leak bucket names on auth failures
        if (status === 403) bucket = '';

        sink.observeRequest(action, bucket, elapsedSeconds(start));
        sink.countRequest(action, status, bucket);
        sink.recordBucketActive(bucket);
        for (const category of billableOperations(action, req.method, req.headers)) {
          sink.countOperation(category, bucket);
        }
      } finally {
        sink.decInFlight(action);
      }
    };
  };
}

export type Track = ReturnType<typeof createTrack>;
