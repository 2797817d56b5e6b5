import type { IncomingHttpHeaders } from 'http';
import { S3Error } from './errors.js';
import type { StoredObject } from './memoryStore.js';

export type Precondition = 'proceed' | 'not-modified';

function header(headers: IncomingHttpHeaders, name: string): string {
  const v = headers[name];
  return (Array.isArray(v) ? v.join(',') : v ?? '').trim();
}

function etagMatches(list: string, etag: string | undefined): boolean {
  if (!etag) return false;
  return list.split(',').some((t) => {
    const tag = t.trim().replace(/^W\//, '');
    return tag === '*' || tag === etag || `"${tag}"` === etag;
  });
}

function seconds(d: Date): number {
  return Math.floor(d.getTime() / 1000);
}

/**
 * Evaluates If-Match / If-None-Match / If-(Un)Modified-Since against the current object.
 * `prefix` selects the copy-source variants (`x-amz-copy-source-`). Failed preconditions
 * throw PreconditionFailed; a matching If-None-Match or If-Modified-Since on a read returns
 * 'not-modified'.
 */
export function evaluatePreconditions(
  headers: IncomingHttpHeaders,
  current: StoredObject | undefined,
  { read, prefix = '' }: { read: boolean; prefix?: string }
): Precondition {
  const ifMatch = header(headers, `${prefix}if-match`);
  const ifNoneMatch = header(headers, `${prefix}if-none-match`);
  const ifModifiedSince = Date.parse(header(headers, `${prefix}if-modified-since`));
  const ifUnmodifiedSince = Date.parse(header(headers, `${prefix}if-unmodified-since`));

  if (ifMatch && !etagMatches(ifMatch, current?.etag)) throw new S3Error('PreconditionFailed');
  if (!ifMatch && current && !Number.isNaN(ifUnmodifiedSince)) {
    if (seconds(current.lastModified) > Math.floor(ifUnmodifiedSince / 1000))
      throw new S3Error('PreconditionFailed');
  }

  if (ifNoneMatch && etagMatches(ifNoneMatch, current?.etag)) {
    if (read) return 'not-modified';
    throw new S3Error('PreconditionFailed');
  }
  if (!ifNoneMatch && read && current && !Number.isNaN(ifModifiedSince)) {
    if (seconds(current.lastModified) <= Math.floor(ifModifiedSince / 1000)) return 'not-modified';
  }
  return 'proceed';
}
