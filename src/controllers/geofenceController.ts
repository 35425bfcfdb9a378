import express, { Request, Response, Router } from 'express';
import { getUserId, requireAuth } from '../middleware/auth';
import { ConfigurationStore, MongoConfigurationSource } from '../services/configurationSource';
import { validateGeofenceInput } from '../services/presence';
import { sendError } from '../utils/httpErrors';

export const handleGeofenceUpsert = (store: ConfigurationStore) => async (req: Request, res: Response) => {
  try {
    const input = validateGeofenceInput(req.body);
    if (!input.ok) {
      throw input.error;
    }

    const geofence = await store.upsertGeofence(input.value);
    console.log(`[GeofenceController] ${getUserId(req) ?? 'unknown user'} stored geofence ${geofence.id}`);
    res.status(201).json(geofence);
  } catch (error) {
    sendError(res, error, 'Failed to store geofence');
  }
};

export const handleGeofenceList = (store: ConfigurationStore) => async (req: Request, res: Response) => {
  try {
    const geofences = await store.listGeofences();
    res.json(geofences);
  } catch (error) {
    sendError(res, error, 'Failed to fetch geofences');
  }
};

export const handleGeofenceToggle = (store: ConfigurationStore) => async (req: Request, res: Response) => {
  try {
    const isActive: unknown = req.body?.isActive;
    if (typeof isActive !== 'boolean') {
      res.status(400).json({ error: 'InvalidInput', message: 'isActive must be a boolean' });
      return;
    }

    const geofence = await store.setGeofenceActive(req.params.id, isActive);
    if (!geofence) {
      res.status(404).json({ error: 'Geofence not found' });
      return;
    }
    console.log(`[GeofenceController] Geofence ${geofence.id} ${isActive ? 'activated' : 'deactivated'}`);
    res.json(geofence);
  } catch (error) {
    sendError(res, error, 'Failed to update geofence');
  }
};

/**
 * Listing is public; creating and toggling geofences needs a bearer token
 */
export function createGeofenceRouter(store: ConfigurationStore): Router {
  const router: Router = express.Router();
  router.post('/', requireAuth, handleGeofenceUpsert(store));
  router.get('/', handleGeofenceList(store));
  router.patch('/:id', requireAuth, handleGeofenceToggle(store));
  return router;
}

export default createGeofenceRouter(new MongoConfigurationSource());
