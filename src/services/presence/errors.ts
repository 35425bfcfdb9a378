import { Decision, PresenceRequest } from './types';

export type PresenceErrorKind = 'InvalidInput' | 'InvalidGeometry' | 'InvalidTimeWindow' | 'RecorderFailure';

export class PresenceError extends Error {
  readonly kind: PresenceErrorKind;

  constructor(kind: PresenceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/**
 * Malformed request data. Raised before the engine runs; nothing is recorded.
 */
export class InvalidInputError extends PresenceError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('InvalidInput', message);
    this.issues = issues;
  }
}

/**
 * Corrupt geofence polygon in the configuration store.
 */
export class InvalidGeometryError extends PresenceError {
  readonly geofenceId: string | null;

  constructor(message: string, geofenceId: string | null = null) {
    super('InvalidGeometry', message);
    this.geofenceId = geofenceId;
  }
}

/**
 * Time window in the configuration store whose bounds cannot be read.
 */
export class InvalidTimeWindowError extends PresenceError {
  readonly timeWindowId: string | null;

  constructor(message: string, timeWindowId: string | null = null) {
    super('InvalidTimeWindow', message);
    this.timeWindowId = timeWindowId;
  }
}

/**
 * The decision was computed but persisting it failed. Carries the decision so
 * the caller can retry recording.
 */
export class RecorderFailureError extends PresenceError {
  readonly request: PresenceRequest;
  readonly decision: Decision;

  constructor(message: string, request: PresenceRequest, decision: Decision, cause?: unknown) {
    super('RecorderFailure', message, { cause });
    this.request = request;
    this.decision = decision;
  }
}

export const isConfigurationError = (error: unknown): error is InvalidGeometryError | InvalidTimeWindowError =>
  error instanceof InvalidGeometryError || error instanceof InvalidTimeWindowError;
