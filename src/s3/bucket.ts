// src/s3/bucket.ts
import type { IncomingMessage } from 'http';

export interface BucketAndObject {
  bucket: string;
  object: string;
}

export type BucketExtractor = (req: Pick<IncomingMessage, 'url' | 'headers'>) => BucketAndObject;

function decode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function hostBucket(host: string | undefined, domains: readonly string[]): string {
  if (!host || !domains.length) return '';
  const name = host.replace(/:\d+$/, '').toLowerCase();
  for (const domain of domains) {
    if (name.endsWith(`.${domain}`)) return name.slice(0, -(domain.length + 1));
  }
  return '';
}

/**
 * Resolves bucket and object key from the request target. `<bucket>.<domain>` hosts use
 * virtual-hosted style for the configured domains, everything else is path style:
 * `/<bucket>/<object...>`. Unknown shapes give empty strings.
 */
export function bucketAndObject(
  req: Pick<IncomingMessage, 'url' | 'headers'>,
  domains: readonly string[] = []
): BucketAndObject {
  const path = (req.url ?? '').split('?')[0].replace(/^\/+/, '');
  const vhost = hostBucket(req.headers.host, domains);
  if (vhost) return { bucket: vhost, object: decode(path) };

  const slash = path.indexOf('/');
  if (slash === -1) return { bucket: decode(path), object: '' };
  return { bucket: decode(path.slice(0, slash)), object: decode(path.slice(slash + 1)) };
}

export function bucketExtractor(domains: readonly string[]): BucketExtractor {
  return (req) => bucketAndObject(req, domains);
}
