// Library entry: building blocks without the env-driven defaults in stats/index.ts
export {
  parseAddress,
  resolveClientAddress,
  isKnownAddress,
  UNKNOWN_ADDRESS,
  type AddressSource,
  type ClientAddress,
  type IpAddress,
} from './net/clientAddress.js';
export { buildPrefixSet, containsAddress, NetworkPrefix, PrefixSet } from './net/prefixSet.js';
export {
  billableOperations,
  classifyOperation,
  isConditional,
  type OperationCategory,
} from './stats/classify.js';
export type { MetricsSink } from './stats/sink.js';
export { PrometheusSink, type PrometheusSinkOptions } from './stats/prometheus.js';
export { createTrack, type Handler, type Track, type TrackDeps } from './stats/track.js';
export { createTrafficRecorder, type TrafficDeps, type TrafficRecorder } from './stats/traffic.js';
export {
  bucketAndObject,
  bucketExtractor,
  type BucketAndObject,
  type BucketExtractor,
} from './s3/bucket.js';
