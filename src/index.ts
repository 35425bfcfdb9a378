import 'dotenv/config';
import express, { ErrorRequestHandler, Express, Router } from 'express';
import cors from 'cors';
import presenceCheckRouter from './controllers/presenceCheckPostController';
import liveStreamRouter from './controllers/liveStreamController';
import metricsRouter from './controllers/metricsController';
import geofenceRouter from './controllers/geofenceController';
import timeWindowsRouter from './controllers/timeWindowsController';
import eventsRouter, { statsRouter } from './controllers/eventsGetController';
import { requireAuth, authErrorHandler } from './middleware/auth';
import { captureRawBody } from './middleware/hmac';

export interface AppRouters {
  presenceCheck: Router;
  liveStream: Router;
  metrics: Router;
  geofence: Router;
  timeWindows: Router;
  events: Router;
  stats: Router;
}

// Malformed JSON bodies are rejected by the parser before any route runs
const bodyErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (err.type === 'entity.parse.failed') {
    res.status(400).json({ error: 'InvalidInput', message: 'Request body is not valid JSON' });
    return;
  }
  next(err);
};

export function createApp(routers: AppRouters): Express {
  const app = express();
  app.use(express.json({ limit: '1mb', verify: captureRawBody }));
  app.use(cors({ origin: '*' }));

  // =============================================================================
  // PUBLIC ROUTES (No bearer token required)
  // =============================================================================

  // Health check endpoint
  app.get('/', (req, res) => {
    res.json({
      message: 'Presence Check API Server is running',
      version: '1.0.0',
    });
  });

  // Device submissions carry their own HMAC signature
  app.use('/presence/check', routers.presenceCheck);
  app.use('/stream', routers.liveStream);
  app.use('/metrics', routers.metrics);

  // Configuration reads are public, writes check the bearer token per route
  app.use('/geofence', routers.geofence);
  app.use('/time-windows', routers.timeWindows);

  // =============================================================================
  // PROTECTED ROUTES (JWT validation required)
  // =============================================================================

  app.use(requireAuth);

  // Event history
  app.use('/events', routers.events);
  app.use('/stats', routers.stats);

  // =============================================================================
  // ERROR HANDLING
  // =============================================================================

  app.use(bodyErrorHandler);
  // Auth error handler (handles 401 Unauthorized errors)
  app.use(authErrorHandler);

  return app;
}

const app = createApp({
  presenceCheck: presenceCheckRouter,
  liveStream: liveStreamRouter,
  metrics: metricsRouter,
  geofence: geofenceRouter,
  timeWindows: timeWindowsRouter,
  events: eventsRouter,
  stats: statsRouter,
});

export { app };
