import express, { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { env } from '../config/env.js';
import { bucketAndObject } from '../s3/bucket.js';
import { evaluatePreconditions } from '../s3/conditions.js';
import { MemoryStore, type StoredObject } from '../s3/memoryStore.js';
import { S3Error } from '../s3/errors.js';
import { sendS3Error } from '../middleware/errorHandler.js';
import {
  bucketOf,
  track,
  timeToFirstByte,
  bucketTrafficReceived,
  bucketTrafficSent,
} from '../stats/index.js';

export const store = new MemoryStore();
export const s3 = Router();

const ListQuery = z.object({
  prefix: z.string().optional().default(''),
  'start-after': z.string().optional().default(''),
  'max-keys': z.coerce.number().int().min(0).max(1000).optional().default(1000),
});

const CopySource = z
  .string()
  .transform((s) => bucketAndObject({ url: `/${s.replace(/^\/+/, '')}`, headers: {} }))
  .refine((src) => src.bucket && src.object, 'x-amz-copy-source must be <bucket>/<key>');

// Same extractor as the metrics labels: virtual-hosted for S3_DOMAIN_NAME, else path style
const target = (req: Request) => bucketOf(req);

type S3Handler = (req: Request, res: Response) => Promise<void>;
type Routed = (req: Request, res: Response, next: NextFunction) => void | Promise<void>;
type Level = 'service' | 'bucket' | 'object';

// S3 errors are answered here so the tracked status reflects them; anything else propagates.
function api(action: string, fn: S3Handler) {
  return track(async (req: Request, res: Response) => {
    try {
      await fn(req, res);
    } catch (e) {
      if (!sendS3Error(res, e)) throw e;
    }
  }, action);
}

function requestBody(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

function objectHeaders(res: Response, obj: StoredObject) {
  res.setHeader('ETag', obj.etag);
  res.setHeader('Last-Modified', obj.lastModified.toUTCString());
  res.setHeader('Content-Type', obj.contentType);
  res.setHeader('Content-Length', obj.body.length);
}

// ==== BUCKETS =================================================

async function listBuckets(_req: Request, res: Response) {
  res.json({
    buckets: store.listBuckets().map((b) => ({ name: b.name, creationDate: b.created.toISOString() })),
  });
}

async function createBucket(req: Request, res: Response) {
  const { bucket } = target(req);
  store.createBucket(bucket);
  res.setHeader('Location', `/${bucket}`);
  res.status(200).end();
}

async function headBucket(req: Request, res: Response) {
  const { bucket } = target(req);
  if (!store.hasBucket(bucket)) throw new S3Error('NoSuchBucket');
  res.status(200).end();
}

async function deleteBucket(req: Request, res: Response) {
  store.deleteBucket(target(req).bucket);
  res.status(204).end();
}

async function listObjectsV2(req: Request, res: Response) {
  const { bucket } = target(req);
  const q = ListQuery.parse(req.query);
  const { objects, truncated } = store.listObjects(bucket, {
    prefix: q.prefix,
    startAfter: q['start-after'],
    maxKeys: q['max-keys'],
  });
  const body = Buffer.from(
    JSON.stringify({
      name: bucket,
      prefix: q.prefix,
      keyCount: objects.length,
      isTruncated: truncated,
      contents: objects.map((o) => ({
        key: o.key,
        size: o.body.length,
        etag: o.etag,
        lastModified: o.lastModified.toISOString(),
      })),
    })
  );
  res.type('application/json');
  res.end(body);
  bucketTrafficSent(body.length, req);
}

// ==== OBJECTS =================================================

async function putObject(req: Request, res: Response) {
  const { bucket, object } = target(req);
  const body = requestBody(req);
  bucketTrafficReceived(body.length, req);

  evaluatePreconditions(req.headers, store.findObject(bucket, object), { read: false });
  const obj = store.putObject(bucket, object, body, req.get('content-type') || 'binary/octet-stream');
  res.setHeader('ETag', obj.etag);
  res.status(200).end();
}

async function copyObject(req: Request, res: Response) {
  const { bucket, object } = target(req);
  const src = CopySource.parse(req.get('x-amz-copy-source'));
  const source = store.getObject(src.bucket, src.object);

  evaluatePreconditions(req.headers, source, { read: false, prefix: 'x-amz-copy-source-' });
  evaluatePreconditions(req.headers, store.findObject(bucket, object), { read: false });
  const obj = store.putObject(bucket, object, Buffer.from(source.body), source.contentType);
  res.json({ etag: obj.etag, lastModified: obj.lastModified.toISOString() });
}

async function getObject(req: Request, res: Response) {
  const start = process.hrtime.bigint();
  const { bucket, object } = target(req);
  const obj = store.getObject(bucket, object);

  if (evaluatePreconditions(req.headers, obj, { read: true }) === 'not-modified') {
    res.setHeader('ETag', obj.etag);
    res.status(304).end();
    return;
  }
  objectHeaders(res, obj);
  res.status(200);
  timeToFirstByte('GetObject', start, req);
  res.end(obj.body);
  bucketTrafficSent(obj.body.length, req);
}

async function headObject(req: Request, res: Response) {
  const { bucket, object } = target(req);
  const obj = store.getObject(bucket, object);

  if (evaluatePreconditions(req.headers, obj, { read: true }) === 'not-modified') {
    res.status(304).end();
    return;
  }
  objectHeaders(res, obj);
  res.status(200).end();
}

async function deleteObject(req: Request, res: Response) {
  const { bucket, object } = target(req);
  store.deleteObject(bucket, object);
  res.status(204).end();
}

const copy = api('CopyObject', copyObject);
const put = api('PutObject', putObject);

const routes: Record<Level, Partial<Record<string, Routed>>> = {
  service: {
    GET: api('ListBuckets', listBuckets),
  },
  bucket: {
    PUT: api('CreateBucket', createBucket),
    HEAD: api('HeadBucket', headBucket),
    GET: api('ListObjectsV2', listObjectsV2),
    DELETE: api('DeleteBucket', deleteBucket),
  },
  object: {
    // CopyObject is a PUT that names its source in a header
    PUT: (req, res, next) => (req.get('x-amz-copy-source') ? copy(req, res, next) : put(req, res, next)),
    HEAD: api('HeadObject', headObject),
    GET: api('GetObject', getObject),
    DELETE: api('DeleteObject', deleteObject),
  },
};

function levelOf(req: Request): Level {
  const { bucket, object } = target(req);
  if (!bucket) return 'service';
  return object ? 'object' : 'bucket';
}

s3.use(express.raw({ type: () => true, limit: env.MAX_OBJECT_SIZE }));

// Dispatch on the resolved target, not the path: virtual-hosted requests have no bucket segment
s3.use((req, res, next) => {
  const handler = routes[levelOf(req)][req.method];
  if (!handler) return next();
  return handler(req, res, next);
});
