// src/s3/memoryStore.ts
import crypto from 'crypto';
import { S3Error } from './errors.js';

export interface StoredObject {
  key: string;
  body: Buffer;
  etag: string;
  contentType: string;
  lastModified: Date;
}

export interface ListObjectsQuery {
  prefix: string;
  startAfter: string;
  maxKeys: number;
}

const BUCKET_NAME = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

function etagOf(body: Buffer): string {
  return `"${crypto.createHash('md5').update(body).digest('hex')}"`;
}

// Reference backend for the gateway; objects live only as long as the process.
export class MemoryStore {
  private readonly buckets = new Map<string, { created: Date; objects: Map<string, StoredObject> }>();

  listBuckets(): { name: string; created: Date }[] {
    return [...this.buckets.entries()]
      .map(([name, b]) => ({ name, created: b.created }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  createBucket(name: string): void {
    if (!BUCKET_NAME.test(name)) throw new S3Error('InvalidBucketName', `Invalid bucket name: ${name}`);
    if (this.buckets.has(name)) throw new S3Error('BucketAlreadyOwnedByYou');
    this.buckets.set(name, { created: new Date(), objects: new Map() });
  }

  hasBucket(name: string): boolean {
    return this.buckets.has(name);
  }

  deleteBucket(name: string): void {
    if (this.bucket(name).size) throw new S3Error('BucketNotEmpty');
    this.buckets.delete(name);
  }

  listObjects(bucket: string, q: ListObjectsQuery): { objects: StoredObject[]; truncated: boolean } {
    const keys = [...this.bucket(bucket).keys()]
      .filter((k) => k.startsWith(q.prefix) && k > q.startAfter)
      .sort();
    const page = keys.slice(0, q.maxKeys);
    return {
      objects: page.map((k) => this.getObject(bucket, k)),
      truncated: keys.length > page.length,
    };
  }

  putObject(bucket: string, key: string, body: Buffer, contentType: string): StoredObject {
    const obj: StoredObject = {
      key,
      body,
      etag: etagOf(body),
      contentType,
      lastModified: new Date(),
    };
    this.bucket(bucket).set(key, obj);
    return obj;
  }

  getObject(bucket: string, key: string): StoredObject {
    const obj = this.bucket(bucket).get(key);
    if (!obj) throw new S3Error('NoSuchKey', `The specified key does not exist: ${key}`);
    return obj;
  }

  findObject(bucket: string, key: string): StoredObject | undefined {
    return this.bucket(bucket).get(key);
  }

  deleteObject(bucket: string, key: string): void {
    this.bucket(bucket).delete(key);
  }

  private bucket(name: string): Map<string, StoredObject> {
    const b = this.buckets.get(name);
    if (!b) throw new S3Error('NoSuchBucket', `The specified bucket does not exist: ${name}`);
    return b.objects;
  }
}
