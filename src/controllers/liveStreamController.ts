import express, { Request, Response, Router } from 'express';
import { PresenceFeed, presenceFeed } from '../services/liveFeed';

export const HEARTBEAT_INTERVAL_MS = 15000;

/**
 * Server-sent events: one `presence` event per recorded check and a
 * `: heartbeat` comment line every interval.
 */
export const handleLiveStream =
  (feed: PresenceFeed, heartbeatMs: number = HEARTBEAT_INTERVAL_MS) =>
  (req: Request, res: Response) => {
    res.status(200);
    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();
    res.write(': connected\n\n');

    const unsubscribe = feed.subscribe((event) => {
      res.write(`id: ${event.id}\nevent: presence\ndata: ${JSON.stringify(event)}\n\n`);
    });
    const heartbeat = setInterval(() => {
      res.write(': heartbeat\n\n');
    }, heartbeatMs);

    req.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
    });
  };

export function createLiveStreamRouter(feed: PresenceFeed): Router {
  const router: Router = express.Router();
  router.get('/live', handleLiveStream(feed));
  return router;
}

export default createLiveStreamRouter(presenceFeed);
