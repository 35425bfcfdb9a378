/**
 * Presence Decision Types
 * Shared shapes for the geofence evaluator, time window matcher and decision engine
 */

export type VerificationMethod = 'automatic' | 'manual';

export type AttendanceStatus = 'present' | 'late' | 'absent' | 'outside';

export const ATTENDANCE_STATUSES: readonly AttendanceStatus[] = ['present', 'late', 'absent', 'outside'];

export const VERIFICATION_METHODS: readonly VerificationMethod[] = ['automatic', 'manual'];

export interface LatLng {
  latitude: number;
  longitude: number;
}

/**
 * Reported position. `accuracy` is the device's accuracy radius in meters;
 * it is kept as telemetry and does not take part in the decision.
 */
export interface Coordinate extends LatLng {
  accuracy?: number;
}

export interface Geofence {
  id: string;
  name: string;
  /** Closed ring, first vertex repeated as the last one */
  polygon: readonly LatLng[];
  marginMeters: number;
  /** Higher values are matched first */
  priority: number;
  isActive: boolean;
}

export interface TimeWindow {
  id: string;
  name: string;
  /** Time of day, HH:mm or HH:mm:ss */
  start: string;
  end: string;
  isActive: boolean;
}

/**
 * Read-only view of the configuration store for one decision.
 */
export interface ConfigSnapshot {
  geofences: readonly Geofence[];
  timeWindows: readonly TimeWindow[];
  version: number;
}

export interface DecisionContext extends ConfigSnapshot {
  /** IANA zone the time of day is read in */
  timezone: string;
}

export interface PresenceRequest {
  identity: string;
  coordinate: Coordinate;
  method: VerificationMethod;
  timestamp: Date;
}

export interface Decision {
  status: AttendanceStatus;
  matchedGeofenceId: string | null;
  matchedTimeWindowId: string | null;
  geofenceName: string | null;
  timeWindowName: string | null;
  message: string;
}

export interface GeofenceMatch {
  geofence: Geofence;
  /** 0 when the point is inside the polygon itself */
  distanceMeters: number;
  viaMargin: boolean;
}

export interface NearestGeofence {
  id: string;
  name: string;
  distanceMeters: number;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const Ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const Err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });
