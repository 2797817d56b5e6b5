import { IncomingMessage, ServerResponse, type IncomingHttpHeaders, type OutgoingHttpHeaders } from 'http';
import { Socket } from 'net';
import type { Express } from 'express';

export interface InjectOptions {
  method: string;
  url: string;
  headers?: IncomingHttpHeaders;
  body?: string | Buffer;
}

export interface Injected {
  status: number;
  headers: OutgoingHttpHeaders;
  body: Buffer;
}

/**
 * Runs a request through an Express app on real node:http objects with no connection
 * behind them. Resolves once the response has ended and the handler chain has settled.
 */
export function inject(app: Express, { method, url, headers = {}, body }: InjectOptions): Promise<Injected> {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  req.url = url;
  req.headers = { ...headers };
  if (body !== undefined) {
    const payload = typeof body === 'string' ? Buffer.from(body) : body;
    req.headers['content-length'] = String(payload.length);
    req.push(payload);
    req.push(null);
    // body-parser skips a request whose socket is not readable, so hand it the body directly too
    Object.assign(req, { body: payload });
  }

  const res = new ServerResponse(req);
  const end = res.end.bind(res);
  const chunks: Buffer[] = [];

  return new Promise((resolve) => {
    Object.defineProperty(res, 'end', {
      value(chunk?: unknown) {
        if (typeof chunk === 'string') chunks.push(Buffer.from(chunk));
        else if (chunk instanceof Uint8Array) chunks.push(Buffer.from(chunk));
        end();
        // let the tracked handler record its metrics before the caller looks
        setImmediate(() =>
          resolve({ status: res.statusCode, headers: res.getHeaders(), body: Buffer.concat(chunks) })
        );
        return res;
      },
    });
    app(req, res);
  });
}
