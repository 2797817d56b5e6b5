import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { OperationCategory } from './classify.js';
import type { MetricsSink } from './sink.js';

const NAMESPACE = 's3';

export interface PrometheusSinkOptions {
  registry?: Registry;
  defaultMetrics?: boolean;
  // Buckets with no traffic for this long have their series dropped by sweepIdleBuckets()
  bucketIdleMs?: number;
}

export class PrometheusSink implements MetricsSink {
  readonly registry: Registry;

  readonly inFlight: Gauge<'type'>;
  readonly requestSeconds: Histogram<'type' | 'bucket'>;
  readonly requests: Counter<'type' | 'code' | 'bucket'>;
  readonly operations: Record<OperationCategory, Counter<'bucket'>>;
  readonly timeToFirstByte: Histogram<'type' | 'bucket'>;
  readonly receivedBytes: Counter<'bucket'>;
  readonly sentBytes: Counter<'bucket'>;
  readonly externalSentBytes: Counter<'bucket'>;

  private readonly bucketIdleMs: number;
  private readonly lastActive = new Map<string, number>();

  constructor(options: PrometheusSinkOptions = {}) {
    const registry = options.registry ?? new Registry();
    this.registry = registry;
    this.bucketIdleMs = options.bucketIdleMs ?? 10 * 60_000;
    if (options.defaultMetrics) collectDefaultMetrics({ register: registry });

    this.inFlight = new Gauge({
      name: `${NAMESPACE}_in_flight_requests`,
      help: 'Current number of in-flight requests being handled by the s3 gateway.',
      labelNames: ['type'],
      registers: [registry],
    });
    this.requestSeconds = new Histogram({
      name: `${NAMESPACE}_request_seconds`,
      help: 'Bucketed histogram of s3 request processing time.',
      labelNames: ['type', 'bucket'],
      buckets: [0.0001, 0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10, 60],
      registers: [registry],
    });
    this.requests = new Counter({
      name: `${NAMESPACE}_request_total`,
      help: 'Counter of s3 requests.',
      labelNames: ['type', 'code', 'bucket'],
      registers: [registry],
    });
    this.operations = {
      read: this.bucketCounter('read_total', 'Billable s3 read operations.'),
      write: this.bucketCounter('write_total', 'Billable s3 write operations.'),
      other: this.bucketCounter('other_total', 'S3 operations that are neither read nor write.'),
    };
    this.timeToFirstByte = new Histogram({
      name: `${NAMESPACE}_time_to_first_byte_millisecond`,
      help: 'Time until the first response byte of a read, in milliseconds.',
      labelNames: ['type', 'bucket'],
      buckets: [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
      registers: [registry],
    });
    this.receivedBytes = this.bucketCounter(
      'bucket_traffic_received_bytes_total',
      'Total number of bytes received by a bucket.'
    );
    this.sentBytes = this.bucketCounter(
      'bucket_traffic_sent_bytes_total',
      'Total number of bytes sent from a bucket.'
    );
    this.externalSentBytes = this.bucketCounter(
      'bucket_external_sent_bytes_total',
      'Bytes sent from a bucket to clients outside the internal networks.'
    );
  }

  private bucketCounter(name: string, help: string): Counter<'bucket'> {
    return new Counter({
      name: `${NAMESPACE}_${name}`,
      help,
      labelNames: ['bucket'],
      registers: [this.registry],
    });
  }

  incInFlight(action: string): void {
    this.inFlight.inc({ type: action });
  }

  decInFlight(action: string): void {
    this.inFlight.dec({ type: action });
  }

  observeRequest(action: string, bucket: string, seconds: number): void {
    this.requestSeconds.observe({ type: action, bucket }, seconds);
  }

  countRequest(action: string, status: number, bucket: string): void {
    this.requests.inc({ type: action, code: String(status), bucket });
  }

  countOperation(category: OperationCategory, bucket: string): void {
    this.operations[category].inc({ bucket });
  }

  observeTimeToFirstByte(action: string, bucket: string, ms: number): void {
    this.timeToFirstByte.observe({ type: action, bucket }, ms);
  }

  addBytesReceived(bucket: string, bytes: number): void {
    this.receivedBytes.inc({ bucket }, bytes);
  }

  addBytesSent(bucket: string, bytes: number): void {
    this.sentBytes.inc({ bucket }, bytes);
  }

  addExternalBytesSent(bucket: string, bytes: number): void {
    this.externalSentBytes.inc({ bucket }, bytes);
  }

  recordBucketActive(bucket: string, now = Date.now()): void {
    if (bucket) this.lastActive.set(bucket, now);
  }

  /** Buckets whose last activity is older than the idle window. */
  idleBuckets(now = Date.now()): string[] {
    const idle: string[] = [];
    for (const [bucket, at] of this.lastActive) {
      if (now - at > this.bucketIdleMs) idle.push(bucket);
    }
    return idle;
  }

  private isIdle(bucket: string, now: number): boolean {
    const at = this.lastActive.get(bucket);
    return at !== undefined && now - at > this.bucketIdleMs;
  }

  /**
   * Drops every series labeled with an idle bucket so deleted or abandoned buckets stop
   * being exported. Returns the buckets that were dropped.
   *
   * Label sets are collected first; idleness is checked again afterwards and the removal
   * itself is synchronous, so a bucket that sees traffic during the collection keeps its
   * series.
   */
  async sweepIdleBuckets(now = Date.now()): Promise<string[]> {
    const dropped: string[] = [];
    for (const bucket of this.idleBuckets(now)) {
      const removals = await this.seriesOf(bucket);
      if (!this.isIdle(bucket, now)) continue;
      this.lastActive.delete(bucket);
      for (const remove of removals) remove();
      dropped.push(bucket);
    }
    return dropped;
  }

  private async seriesOf(bucket: string): Promise<Array<() => void>> {
    const removals: Array<() => void> = [];
    for (const counter of [
      ...Object.values(this.operations),
      this.receivedBytes,
      this.sentBytes,
      this.externalSentBytes,
    ]) {
      removals.push(() => counter.remove({ bucket }));
    }

    for (const { labels } of (await this.requests.get()).values) {
      if (labels.bucket !== bucket) continue;
      const { type, code } = labels;
      removals.push(() => this.requests.remove({ type, code, bucket }));
    }
    for (const histogram of [this.requestSeconds, this.timeToFirstByte]) {
      const seen = new Set<string>();
      for (const { labels } of (await histogram.get()).values) {
        const type = String(labels.type);
        if (labels.bucket !== bucket || seen.has(type)) continue;
        seen.add(type);
        removals.push(() => histogram.remove({ type, bucket }));
      }
    }
    return removals;
  }

  startBucketSweeper(
    intervalMs: number,
    onError: (err: unknown) => void
  ): () => void {
    const timer = setInterval(() => {
      this.sweepIdleBuckets().catch(onError);
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}
