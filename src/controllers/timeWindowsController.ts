import express, { Request, Response, Router } from 'express';
import { requireAuth } from '../middleware/auth';
import { ConfigurationStore, MongoConfigurationSource } from '../services/configurationSource';
import { validateTimeWindowsInput } from '../services/presence';
import { sendError } from '../utils/httpErrors';

// Replace-all: the posted list becomes the whole set
export const handleTimeWindowsReplace = (store: ConfigurationStore) => async (req: Request, res: Response) => {
  try {
    const windows = validateTimeWindowsInput(req.body);
    if (!windows.ok) {
      throw windows.error;
    }

    const stored = await store.replaceTimeWindows(windows.value);
    res.json(stored);
  } catch (error) {
    sendError(res, error, 'Failed to replace time windows');
  }
};

export const handleTimeWindowsList = (store: ConfigurationStore) => async (req: Request, res: Response) => {
  try {
    res.json(await store.listTimeWindows());
  } catch (error) {
    sendError(res, error, 'Failed to fetch time windows');
  }
};

export function createTimeWindowsRouter(store: ConfigurationStore): Router {
  const router: Router = express.Router();
  router.post('/', requireAuth, handleTimeWindowsReplace(store));
  router.get('/', handleTimeWindowsList(store));
  return router;
}

export default createTimeWindowsRouter(new MongoConfigurationSource());
