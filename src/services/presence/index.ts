/**
 * Presence Decision Engine
 * Exports the evaluators, the decision table and boundary validation
 */

export * from './types';
export * from './errors';
export {
  EARTH_RADIUS_METERS,
  assertValidGeometry,
  contains,
  distanceToGeofence,
  findContainingGeofence,
  findNearestGeofence,
  haversineMeters,
  isInsidePolygon,
} from './geofenceEvaluator';
export { activeWindow, isKnownTimezone, parseTimeOfDay, readBounds, secondsOfDay } from './timeWindowMatcher';
export { decide, STATUS_MESSAGES, presentMessage } from './decisionEngine';
export {
  validatePresenceRequest,
  validateGeofenceInput,
  validateTimeWindowsInput,
  validateEventQuery,
  validateCalendarDate,
  DEFAULT_EVENT_LIMIT,
  MAX_EVENT_LIMIT,
  type EventFilter,
  type GeofenceInput,
  type TimeWindowInput,
} from './validation';
