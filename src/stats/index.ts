// src/stats/index.ts
import { env, s3Domains } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { buildPrefixSet } from '../net/prefixSet.js';
import { bucketExtractor } from '../s3/bucket.js';
import { PrometheusSink } from './prometheus.js';
import { createTrack } from './track.js';
import { createTrafficRecorder } from './traffic.js';

// Built once before any request is served; read-only afterwards.
export const internalNetworks = buildPrefixSet(env.S3_INTERNAL_CIDRS, (token) =>
  logger.warn({ token }, 'ignoring malformed entry in S3_INTERNAL_CIDRS')
);
if (internalNetworks) {
  logger.info({ networks: internalNetworks.prefixes.map(String) }, 'internal networks loaded');
}

export const metrics = new PrometheusSink({
  defaultMetrics: env.NODE_ENV !== 'test',
  bucketIdleMs: env.BUCKET_METRICS_IDLE_SEC * 1000,
});

// Shared by the metrics labels and the routes so both act on the same bucket.
export const bucketOf = bucketExtractor(s3Domains);

export const track = createTrack({ sink: metrics, bucketOf });
export const { timeToFirstByte, bucketTrafficReceived, bucketTrafficSent } =
  createTrafficRecorder({ sink: metrics, bucketOf, internal: internalNetworks });
