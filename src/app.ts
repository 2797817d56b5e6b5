import express from 'express';
import { pinoHttp } from 'pino-http';
import crypto from 'crypto';
import { api } from './routes/index.js';
import { notFound } from './middleware/notFound.js';
import { errorHandler } from './middleware/errorHandler.js';
import { logger } from './utils/logger.js';

export const app = express();
app.disable('x-powered-by');

app.use(
  pinoHttp({
    logger,
    genReqId(req) {
      const hdr = (req.headers['x-request-id'] || '').toString();
      return hdr || crypto.randomUUID();
    },
  })
);

// Echo back the request id for clients and correlation in logs
app.use((req, res, next) => {
  const id = req.id;
  if (id && (typeof id === 'string' || typeof id === 'number')) {
    res.setHeader('X-Request-Id', id);
  }

  next();
});

app.get('/', (_req, res) => res.json({ name: 's3-traffic-meter', version: '0.1.0' }));

app.use(api);

app.use(notFound);
app.use(errorHandler);
