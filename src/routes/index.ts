import { Router } from 'express';
import { health } from './health.route.js';
import { metricsRoute } from './metrics.route.js';
import { s3 } from './s3.route.js';

export const api = Router();
api.use('/health', health);
api.use('/metrics', metricsRoute);
api.use('/s3', s3);
