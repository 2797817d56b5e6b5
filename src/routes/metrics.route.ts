import { Router } from 'express';
import { metrics } from '../stats/index.js';

export const metricsRoute = Router();

metricsRoute.get('/', async (_req, res, next) => {
  try {
    res.type(metrics.registry.contentType);
    res.send(await metrics.registry.metrics());
  } catch (e) {
    next(e);
  }
});
