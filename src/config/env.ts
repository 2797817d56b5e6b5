import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: resolve(__dirname, '../../.env') });

const Env = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().default(8333),
  LOG_LEVEL: z.string().default('info'),

  // Networks whose egress is not billed, e.g. "10.0.0.0/8, 172.16.0.0/12;192.168.0.0/16".
  // Malformed entries are skipped with a warning.
  S3_INTERNAL_CIDRS: z.string().default(''),
  // Comma separated domains for virtual-hosted style bucket addressing
  S3_DOMAIN_NAME: z.string().default(''),

  BUCKET_METRICS_IDLE_SEC: z.coerce.number().int().positive().default(600), // 10m
  BUCKET_METRICS_SWEEP_SEC: z.coerce.number().int().positive().default(60),

  MAX_OBJECT_SIZE: z.string().default('16mb'),
});

export const env = Env.parse(process.env);

export const s3Domains = env.S3_DOMAIN_NAME.split(',')
  .map((s) => s.trim().toLowerCase())
  .filter(Boolean);
