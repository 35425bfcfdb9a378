/**
 * Decision Engine Tests
 */

import { decide, STATUS_MESSAGES } from '../decisionEngine';
import { InvalidGeometryError, InvalidInputError } from '../errors';
import { Coordinate, DecisionContext, Geofence, PresenceRequest, VerificationMethod } from '../types';

const campus: Geofence = {
  id: 'gf_campus',
  name: 'Main campus',
  polygon: [
    { latitude: 45.76, longitude: 4.84 },
    { latitude: 45.761, longitude: 4.84 },
    { latitude: 45.761, longitude: 4.8414 },
    { latitude: 45.76, longitude: 4.8414 },
    { latitude: 45.76, longitude: 4.84 },
  ],
  marginMeters: 50,
  priority: 0,
  isActive: true,
};

const context: DecisionContext = {
  geofences: [campus],
  timeWindows: [{ id: 'tw_entry', name: 'Entry', start: '08:00', end: '08:30', isActive: true }],
  timezone: 'UTC',
  version: 1,
};

const insideCampus: Coordinate = { latitude: 45.7605, longitude: 4.8407 };
// About 200 m north of the northern edge
const outsideCampus: Coordinate = { latitude: 45.7628, longitude: 4.8407 };

const request = (overrides: Partial<PresenceRequest> = {}): PresenceRequest => ({
  identity: 'student-001',
  coordinate: insideCampus,
  method: 'automatic',
  timestamp: new Date('2024-03-11T08:10:00Z'),
  ...overrides,
});

describe('decisionEngine', () => {
  describe('scenarios', () => {
    it('A: inside the campus during the entry window is present', () => {
      expect(decide(request(), context)).toEqual({
        status: 'present',
        matchedGeofenceId: 'gf_campus',
        matchedTimeWindowId: 'tw_entry',
        geofenceName: 'Main campus',
        timeWindowName: 'Entry',
        message: 'Present inside geofence Main campus',
      });
    });

    it('B: 200 m outside a 50 m margin with automatic verification is outside', () => {
      expect(decide(request({ coordinate: outsideCampus }), context)).toEqual({
        status: 'outside',
        matchedGeofenceId: null,
        matchedTimeWindowId: 'tw_entry',
        geofenceName: null,
        timeWindowName: 'Entry',
        message: STATUS_MESSAGES.outside,
      });
    });

    it('C: the same point with manual verification is late', () => {
      const decision = decide(request({ coordinate: outsideCampus, method: 'manual' }), context);
      expect(decision.status).toBe('late');
      expect(decision.matchedGeofenceId).toBeNull();
      expect(decision.message).toBe('Late: manual verification outside every geofence');
    });

    it('D: inside the campus at 09:00 with no active window is absent', () => {
      expect(decide(request({ timestamp: new Date('2024-03-11T09:00:00Z') }), context)).toEqual({
        status: 'absent',
        matchedGeofenceId: null,
        matchedTimeWindowId: null,
        geofenceName: null,
        timeWindowName: null,
        message: 'No active time window',
      });
    });

    it('E: a geofence with an unclosed ring raises InvalidGeometry', () => {
      const unclosed: Geofence = { ...campus, polygon: campus.polygon.slice(0, 4) };
      expect(() => decide(request(), { ...context, geofences: [unclosed] })).toThrow(InvalidGeometryError);
    });
  });

  describe('properties', () => {
    const methods: VerificationMethod[] = ['automatic', 'manual'];
    const coordinates: Coordinate[] = [insideCampus, outsideCampus, { latitude: -33.86, longitude: 151.21 }];

    it('should be absent outside every window whatever the coordinate or method', () => {
      for (const coordinate of coordinates) {
        for (const method of methods) {
          const decision = decide(
            request({ coordinate, method, timestamp: new Date('2024-03-11T23:15:00Z') }),
            context
          );
          expect(decision.status).toBe('absent');
        }
      }
    });

    it('should be present inside a geofence whatever the method', () => {
      for (const method of methods) {
        expect(decide(request({ method }), context).status).toBe('present');
      }
    });

    it('should decide outside or late when no geofence is configured', () => {
      const noGeofences: DecisionContext = { ...context, geofences: [] };
      expect(decide(request(), noGeofences).status).toBe('outside');
      expect(decide(request({ method: 'manual' }), noGeofences).status).toBe('late');
    });

    it('should be deterministic for identical inputs and configuration', () => {
      const first = decide(request({ coordinate: outsideCampus }), context);
      const second = decide(request({ coordinate: outsideCampus }), context);
      expect(second).toEqual(first);
    });

    it('should leave the accuracy radius out of the decision', () => {
      const withAccuracy = request({ coordinate: { ...outsideCampus, accuracy: 500 } });
      expect(decide(withAccuracy, context).status).toBe('outside');
    });

    it('should ignore a malformed window once it is inactive', () => {
      const retired = { id: 'tw_old', name: 'Old', start: '23:00', end: '01:00', isActive: false };
      const withRetired: DecisionContext = { ...context, timeWindows: [...context.timeWindows, retired] };
      expect(decide(request({ timestamp: new Date('2024-03-11T12:00:00Z') }), withRetired).status).toBe('absent');
      expect(decide(request(), withRetired).status).toBe('present');
    });

    it('should not check geometry when the time gate already decided absent', () => {
      const unclosed: Geofence = { ...campus, polygon: campus.polygon.slice(0, 4) };
      const decision = decide(request({ timestamp: new Date('2024-03-11T12:00:00Z') }), {
        ...context,
        geofences: [unclosed],
      });
      expect(decision.status).toBe('absent');
    });
  });

  describe('input checks', () => {
    it('should reject out-of-range coordinates with InvalidInput', () => {
      expect(() => decide(request({ coordinate: { latitude: 91, longitude: 0 } }), context)).toThrow(
        InvalidInputError
      );
      expect(() => decide(request({ coordinate: { latitude: 0, longitude: -180.5 } }), context)).toThrow(
        'Coordinate is out of range'
      );
    });

    it('should reject an invalid timestamp with InvalidInput', () => {
      expect(() => decide(request({ timestamp: new Date('not a date') }), context)).toThrow(
        'Timestamp is not a valid date'
      );
    });
  });
});
