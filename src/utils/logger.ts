// src/utils/logger.ts
import pino from 'pino';
import { env } from '../config/env.js';

export const logger = pino({
  level: env.LOG_LEVEL,
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'req.headers["x-amz-security-token"]',
      'res.headers["set-cookie"]',
    ],
    remove: true,
  },
  base: { service: 's3-traffic-meter' },
});
