/**
 * Presence Service
 * Validates a presence check, decides it against the current configuration,
 * records the outcome and publishes it to the live feed
 */

import { AUTO_TIMEZONE, getPresenceConfig, PresenceConfig } from '../config/presence';
import { getTimezoneFromCoordinates } from '../utils';
import { ConfigurationSource, MongoConfigurationSource } from './configurationSource';
import { EventRecorder, MongoEventRecorder, PresenceEventRecord } from './eventRecorder';
import { presenceFeed } from './liveFeed';
import { PresenceMetrics, presenceMetrics } from './metrics';
import {
  AttendanceStatus,
  Decision,
  NearestGeofence,
  PresenceRequest,
  RecorderFailureError,
  decide,
  findNearestGeofence,
  isConfigurationError,
  validatePresenceRequest,
} from './presence';

export interface NamedRef {
  id: string;
  name: string;
}

export interface PresenceCheckResult {
  status: AttendanceStatus;
  matchedGeofenceId: string | null;
  message: string;
  identity: string;
  timestamp: string;
  timezone: string;
  timeWindow: NamedRef | null;
  geofence: NamedRef | null;
  /** Closest active geofence, reported for late and outside decisions */
  nearestGeofence: NearestGeofence | null;
  eventId: string;
}

export interface PresenceServiceOptions {
  source: ConfigurationSource;
  recorder: EventRecorder;
  config: PresenceConfig;
  publish?: (event: PresenceEventRecord) => void;
  metrics?: PresenceMetrics;
  now?: () => Date;
}

const ref = (id: string | null, name: string | null): NamedRef | null =>
  id !== null && name !== null ? { id, name } : null;

export class PresenceService {
  private source: ConfigurationSource;
  private recorder: EventRecorder;
  private config: PresenceConfig;
  private publish: (event: PresenceEventRecord) => void;
  private metrics: PresenceMetrics;
  private now: () => Date;

  constructor(options: PresenceServiceOptions) {
    this.source = options.source;
    this.recorder = options.recorder;
    this.config = options.config;
    this.publish = options.publish ?? (() => undefined);
    this.metrics = options.metrics ?? presenceMetrics;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Zone the time of day is read in. With "auto" it is the zone at the
   * reported coordinate.
   */
  resolveTimezone(request: PresenceRequest): string {
    if (this.config.timezone === AUTO_TIMEZONE) {
      return getTimezoneFromCoordinates(request.coordinate.latitude, request.coordinate.longitude);
    }
    return this.config.timezone;
  }

  /**
   * Throws InvalidInputError before anything is read, InvalidGeometryError or
   * InvalidTimeWindowError for a corrupt configuration, and
   * RecorderFailureError (carrying the decision) when the event cannot be stored.
   */
  async checkPresence(body: unknown): Promise<PresenceCheckResult> {
    this.metrics.requests.inc();

    const validated = validatePresenceRequest(body, this.now());
    if (!validated.ok) {
      throw validated.error;
    }
    const request = validated.value;

    const snapshot = await this.source.loadSnapshot();
    const timezone = this.resolveTimezone(request);

    let decision: Decision;
    try {
      decision = decide(request, { ...snapshot, timezone });
    } catch (error) {
      if (isConfigurationError(error)) {
        console.error(`[PresenceService] Configuration error (version ${snapshot.version}):`, error.message);
      }
      throw error;
    }

    const nearestGeofence =
      decision.status === 'late' || decision.status === 'outside'
        ? findNearestGeofence(snapshot.geofences, request.coordinate)
        : null;

    const event = await this.record(request, decision);
    this.metrics.successes.inc();

    try {
      this.publish(event);
    } catch (error) {
      console.error('[PresenceService] Failed to publish presence event:', error);
    }

    console.log(`[PresenceService] ${request.identity} ${decision.status} (${request.method}) event ${event.id}`);

    return {
      status: decision.status,
      matchedGeofenceId: decision.matchedGeofenceId,
      message: decision.message,
      identity: request.identity,
      timestamp: request.timestamp.toISOString(),
      timezone,
      timeWindow: ref(decision.matchedTimeWindowId, decision.timeWindowName),
      geofence: ref(decision.matchedGeofenceId, decision.geofenceName),
      nearestGeofence,
      eventId: event.id,
    };
  }

  private async record(request: PresenceRequest, decision: Decision): Promise<PresenceEventRecord> {
    try {
      return await this.recorder.record({
        identity: request.identity,
        latitude: request.coordinate.latitude,
        longitude: request.coordinate.longitude,
        accuracy: request.coordinate.accuracy ?? null,
        status: decision.status,
        method: request.method,
        geofenceId: decision.matchedGeofenceId,
        timeWindowId: decision.matchedTimeWindowId,
        timestamp: request.timestamp,
      });
    } catch (error) {
      console.error('[PresenceService] Failed to record presence event:', error);
      throw new RecorderFailureError('Failed to record presence event', request, decision, error);
    }
  }
}

// Singleton instance
let serviceInstance: PresenceService | null = null;

/**
 * Get the presence service backed by MongoDB, the live feed and the
 * process-wide counters. Serves the default POST /presence/check router.
 */
export function getPresenceService(): PresenceService {
  if (!serviceInstance) {
    serviceInstance = new PresenceService({
      source: new MongoConfigurationSource(),
      recorder: new MongoEventRecorder(),
      config: getPresenceConfig(),
      publish: (event) => presenceFeed.publish(event),
      metrics: presenceMetrics,
    });
  }
  return serviceInstance;
}

/**
 * Reset the singleton (for testing)
 */
export function resetPresenceService(): void {
  serviceInstance = null;
}
