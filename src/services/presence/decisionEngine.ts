/**
 * Decision Engine
 * Combines the time window gate, geofence containment and the verification
 * method into one attendance status.
 *
 * The order is fixed: a timestamp outside every window is `absent` whatever
 * the location, containment is `present` whatever the method, and only then
 * does the method split `late` (manual) from `outside` (automatic).
 */

import { InvalidInputError } from './errors';
import { findContainingGeofence, isValidLatLng } from './geofenceEvaluator';
import { activeWindow } from './timeWindowMatcher';
import { AttendanceStatus, Decision, DecisionContext, PresenceRequest } from './types';

export const STATUS_MESSAGES: Record<Exclude<AttendanceStatus, 'present'>, string> = {
  absent: 'No active time window',
  late: 'Late: manual verification outside every geofence',
  outside: 'Outside every geofence',
};

export const presentMessage = (geofenceName: string): string => `Present inside geofence ${geofenceName}`;

function assertWellFormed(request: PresenceRequest): void {
  if (!isValidLatLng(request.coordinate)) {
    throw new InvalidInputError('Coordinate is out of range', [
      'latitude must be between -90 and 90 and longitude between -180 and 180',
    ]);
  }
  if (Number.isNaN(request.timestamp.getTime())) {
    throw new InvalidInputError('Timestamp is not a valid date', ['timestamp must be a valid date']);
  }
}

export function decide(request: PresenceRequest, context: DecisionContext): Decision {
  assertWellFormed(request);

  const window = activeWindow(context.timeWindows, request.timestamp, context.timezone);
  if (!window) {
    return {
      status: 'absent',
      matchedGeofenceId: null,
      matchedTimeWindowId: null,
      geofenceName: null,
      timeWindowName: null,
      message: STATUS_MESSAGES.absent,
    };
  }

  const match = findContainingGeofence(context.geofences, request.coordinate);
  if (match) {
    return {
      status: 'present',
      matchedGeofenceId: match.geofence.id,
      matchedTimeWindowId: window.id,
      geofenceName: match.geofence.name,
      timeWindowName: window.name,
      message: presentMessage(match.geofence.name),
    };
  }

  const status = request.method === 'manual' ? 'late' : 'outside';
  return {
    status,
    matchedGeofenceId: null,
    matchedTimeWindowId: window.id,
    geofenceName: null,
    timeWindowName: window.name,
    message: STATUS_MESSAGES[status],
  };
}
