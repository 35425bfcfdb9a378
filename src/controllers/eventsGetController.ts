import express, { Request, Response, Router } from 'express';
import { getPresenceConfig, PresenceConfig, reportingTimezone } from '../config/presence';
import { EventQueries, MongoEventRecorder } from '../services/eventRecorder';
import { validateCalendarDate, validateEventQuery } from '../services/presence';
import { sendError } from '../utils/httpErrors';

export const handleEventsList = (events: EventQueries) => async (req: Request, res: Response) => {
  try {
    const filter = validateEventQuery(req.query);
    if (!filter.ok) {
      throw filter.error;
    }
    res.json(await events.listEvents(filter.value));
  } catch (error) {
    sendError(res, error, 'Failed to fetch presence events');
  }
};

export const handleEventGet = (events: EventQueries) => async (req: Request, res: Response) => {
  try {
    const event = await events.getEvent(req.params.id);
    if (!event) {
      res.status(404).json({ error: 'Event not found' });
      return;
    }
    res.json(event);
  } catch (error) {
    sendError(res, error, 'Failed to fetch presence event');
  }
};

export const handleDailyStats =
  (events: EventQueries, config: PresenceConfig) => async (req: Request, res: Response) => {
    try {
      const date = validateCalendarDate(req.query.date);
      if (!date.ok) {
        throw date.error;
      }
      res.json(await events.dailyStats(date.value, reportingTimezone(config)));
    } catch (error) {
      sendError(res, error, 'Failed to compute daily statistics');
    }
  };

export function createEventsRouter(events: EventQueries, config: PresenceConfig = getPresenceConfig()): Router {
  const router: Router = express.Router();
  router.get('/', handleEventsList(events));
  // Registered before /:id so "stats" is not taken for an id
  router.get('/stats/daily', handleDailyStats(events, config));
  router.get('/:id', handleEventGet(events));
  return router;
}

export function createStatsRouter(events: EventQueries, config: PresenceConfig = getPresenceConfig()): Router {
  const router: Router = express.Router();
  router.get('/daily', handleDailyStats(events, config));
  return router;
}

const mongoEvents = new MongoEventRecorder();

export const statsRouter = createStatsRouter(mongoEvents);

export default createEventsRouter(mongoEvents);
