import { describe, expect, it } from 'vitest';
import { buildPrefixSet } from '../../net/prefixSet.js';
import { bucketExtractor } from '../../s3/bucket.js';
import { createTrafficRecorder } from '../traffic.js';
import { MemorySink } from './memorySink.js';
import { makeRequest } from './requests.js';

function setup(cidrs = '10.0.0.0/8, 192.168.0.0/16') {
  const sink = new MemorySink();
  const recorder = createTrafficRecorder({
    sink,
    bucketOf: bucketExtractor([]),
    internal: buildPrefixSet(cidrs),
  });
  return { sink, recorder };
}

describe('bucketTrafficSent', () => {
  it('bills bytes sent to an external client', () => {
    const { sink, recorder } = setup();
    const { req } = makeRequest('GET', '/photos/cat.jpg', { 'x-forwarded-for': '203.0.113.5' });

    recorder.bucketTrafficSent(1024, req);

    expect(sink.sent.get('photos')).toBe(1024);
    expect(sink.externalSent.get('photos')).toBe(1024);
    expect(sink.activeBuckets).toEqual(['photos']);
  });

  it('does not bill bytes sent to an internal client', () => {
    const { sink, recorder } = setup();
    const { req } = makeRequest('GET', '/photos/cat.jpg', { 'x-forwarded-for': '10.20.30.40' });

    recorder.bucketTrafficSent(512, req);

    expect(sink.sent.get('photos')).toBe(512);
    expect(sink.externalSent.has('photos')).toBe(false);
  });

  it('uses the forwarded client, not the internal proxy in front of it', () => {
    const { sink, recorder } = setup();
    const { req } = makeRequest('GET', '/photos/cat.jpg', {
      'x-forwarded-for': '203.0.113.5, 10.0.0.1',
    });

    recorder.bucketTrafficSent(10, req);

    expect(sink.externalSent.get('photos')).toBe(10);
  });

  it('treats everyone as external when no internal networks are configured', () => {
    const { sink, recorder } = setup('');
    const { req } = makeRequest('GET', '/photos/cat.jpg', { 'x-forwarded-for': '127.0.0.1' });

    recorder.bucketTrafficSent(7, req);

    expect(sink.externalSent.get('photos')).toBe(7);
  });

  it('treats unresolvable clients as external', () => {
    const { sink, recorder } = setup();
    const { req } = makeRequest('GET', '/photos/cat.jpg');

    recorder.bucketTrafficSent(3, req);

    expect(sink.externalSent.get('photos')).toBe(3);
  });

  it('accumulates across calls', () => {
    const { sink, recorder } = setup();
    const { req } = makeRequest('GET', '/photos/cat.jpg', { 'x-forwarded-for': '203.0.113.5' });

    recorder.bucketTrafficSent(100, req);
    recorder.bucketTrafficSent(50, req);

    expect(sink.sent.get('photos')).toBe(150);
    expect(sink.externalSent.get('photos')).toBe(150);
  });
});

describe('bucketTrafficReceived', () => {
  it('adds received bytes for the bucket', () => {
    const { sink, recorder } = setup();
    const { req } = makeRequest('PUT', '/photos/cat.jpg');

    recorder.bucketTrafficReceived(2048, req);

    expect(sink.received.get('photos')).toBe(2048);
    expect(sink.sent.size).toBe(0);
  });
});

describe('timeToFirstByte', () => {
  it('observes the elapsed milliseconds for the action and bucket', () => {
    const { sink, recorder } = setup();
    const { req } = makeRequest('GET', '/photos/cat.jpg');
    const start = process.hrtime.bigint() - 5_000_000n;

    recorder.timeToFirstByte('GetObject', start, req);

    expect(sink.ttfb).toHaveLength(1);
    expect(sink.ttfb[0]).toMatchObject({ action: 'GetObject', bucket: 'photos' });
    expect(sink.ttfb[0].ms).toBeGreaterThanOrEqual(5);
    expect(sink.activeBuckets).toEqual(['photos']);
  });
});
