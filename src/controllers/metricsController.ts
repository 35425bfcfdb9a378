import express, { Request, Response, Router } from 'express';
import { Registry } from 'prom-client';
import { presenceMetrics } from '../services/metrics';
import { sendError } from '../utils/httpErrors';

export const handleMetrics = (registry: Registry) => async (req: Request, res: Response) => {
  try {
    const body = await registry.metrics();
    res.set('Content-Type', registry.contentType);
    res.send(body);
  } catch (error) {
    sendError(res, error, 'Failed to collect metrics');
  }
};

export function createMetricsRouter(registry: Registry): Router {
  const router: Router = express.Router();
  router.get('/', handleMetrics(registry));
  return router;
}

export default createMetricsRouter(presenceMetrics.registry);
