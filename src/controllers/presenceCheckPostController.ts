import express, { Request, Response, Router } from 'express';
import { getPresenceConfig, PresenceConfig } from '../config/presence';
import { createHmacGuard } from '../middleware/hmac';
import { getPresenceService, PresenceService } from '../services/presenceService';
import { sendError } from '../utils/httpErrors';

export const handlePresenceCheck = (service: PresenceService) => async (req: Request, res: Response) => {
  try {
    const result = await service.checkPresence(req.body);
    res.status(200).json(result);
  } catch (error) {
    sendError(res, error, 'Failed to check presence');
  }
};

/**
 * POST / : signed device submission, answered with the decision and the
 * recorded event id
 */
export function createPresenceCheckRouter(
  service: PresenceService,
  config: PresenceConfig = getPresenceConfig()
): Router {
  const router: Router = express.Router();
  router.post('/', createHmacGuard(config), handlePresenceCheck(service));
  return router;
}

export default createPresenceCheckRouter(getPresenceService());
