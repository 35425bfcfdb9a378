/**
 * Input Validation
 * Boundary checks run before the engine. Every function returns a tagged
 * Result instead of throwing.
 */

import { z } from 'zod';
import { InvalidInputError } from './errors';
import { assertValidGeometry } from './geofenceEvaluator';
import { readBounds } from './timeWindowMatcher';
import { Err, Geofence, LatLng, Ok, PresenceRequest, Result, TimeWindow, VerificationMethod } from './types';

export type GeofenceInput = Omit<Geofence, 'id'>;

export type TimeWindowInput = Omit<TimeWindow, 'id'>;

export interface EventFilter {
  identity?: string;
  from?: Date;
  to?: Date;
  limit: number;
  offset: number;
}

export const DEFAULT_EVENT_LIMIT = 50;
export const MAX_EVENT_LIMIT = 100;

const latitude = z
  .number({ required_error: 'latitude is required', invalid_type_error: 'latitude must be a number' })
  .finite('latitude must be a finite number')
  .min(-90, 'latitude must be between -90 and 90')
  .max(90, 'latitude must be between -90 and 90');

const longitude = z
  .number({ required_error: 'longitude is required', invalid_type_error: 'longitude must be a number' })
  .finite('longitude must be a finite number')
  .min(-180, 'longitude must be between -180 and 180')
  .max(180, 'longitude must be between -180 and 180');

const presenceRequestSchema = z.object({
  identity: z
    .string({ required_error: 'identity is required', invalid_type_error: 'identity must be a string' })
    .trim()
    .min(1, 'identity must not be empty'),
  latitude,
  longitude,
  accuracy: z
    .number({ invalid_type_error: 'accuracy must be a number' })
    .finite('accuracy must be a finite number')
    .nonnegative('accuracy must not be negative')
    .nullish(),
  method: z.enum(['automatic', 'auto', 'manual'], {
    errorMap: () => ({ message: 'method must be one of automatic, auto, manual' }),
  }),
  timestamp: z
    .string({ invalid_type_error: 'timestamp must be an ISO-8601 string' })
    .datetime({ offset: true, message: 'timestamp must be an ISO-8601 date-time' })
    .nullish(),
});

const geofenceSchema = z.object({
  name: z
    .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
    .trim()
    .min(1, 'name must not be empty'),
  polygon: z.object(
    {
      type: z.literal('Polygon', { errorMap: () => ({ message: 'polygon must be a GeoJSON Polygon' }) }),
      coordinates: z
        .array(z.array(z.tuple([z.number(), z.number()]), { invalid_type_error: 'ring must be an array of [lon, lat]' }))
        .min(1, 'polygon must have an exterior ring'),
    },
    { required_error: 'polygon is required', invalid_type_error: 'polygon must be a GeoJSON Polygon' }
  ),
  marginMeters: z
    .number({ invalid_type_error: 'marginMeters must be a number' })
    .finite('marginMeters must be a finite number')
    .nonnegative('marginMeters must not be negative')
    .default(0),
  priority: z.number({ invalid_type_error: 'priority must be a number' }).int('priority must be an integer').default(0),
  isActive: z.boolean({ invalid_type_error: 'isActive must be a boolean' }).default(true),
});

const timeWindowSchema = z.object({
  name: z
    .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
    .trim()
    .min(1, 'name must not be empty'),
  start: z.string({ required_error: 'start is required', invalid_type_error: 'start must be a string' }),
  end: z.string({ required_error: 'end is required', invalid_type_error: 'end must be a string' }),
  isActive: z.boolean({ invalid_type_error: 'isActive must be a boolean' }).default(true),
});

const eventQuerySchema = z.object({
  identity: z
    .string({ invalid_type_error: 'identity must be a string' })
    .trim()
    .min(1, 'identity must not be empty')
    .optional(),
  from: z
    .string({ invalid_type_error: 'from must be a string' })
    .datetime({ offset: true, message: 'from must be an ISO-8601 date-time' })
    .optional(),
  to: z
    .string({ invalid_type_error: 'to must be a string' })
    .datetime({ offset: true, message: 'to must be an ISO-8601 date-time' })
    .optional(),
  limit: z.coerce
    .number({ invalid_type_error: 'limit must be a number' })
    .int('limit must be an integer')
    .min(1, `limit must be between 1 and ${MAX_EVENT_LIMIT}`)
    .max(MAX_EVENT_LIMIT, `limit must be between 1 and ${MAX_EVENT_LIMIT}`)
    .default(DEFAULT_EVENT_LIMIT),
  offset: z.coerce
    .number({ invalid_type_error: 'offset must be a number' })
    .int('offset must be an integer')
    .min(0, 'offset must not be negative')
    .default(0),
});

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const issuesOf = (error: z.ZodError, prefix = ''): string[] => error.issues.map((issue) => `${prefix}${issue.message}`);

/**
 * Accepts the mobile client's short field names (`matricule`, `lat`, `lon`)
 * next to the canonical ones. `timestamp` defaults to `now`.
 */
export function validatePresenceRequest(body: unknown, now: Date): Result<PresenceRequest, InvalidInputError> {
  if (!isRecord(body)) {
    return Err(new InvalidInputError('Request body must be a JSON object', ['body must be an object']));
  }

  const parsed = presenceRequestSchema.safeParse({
    identity: body.identity ?? body.matricule,
    latitude: body.latitude ?? body.lat,
    longitude: body.longitude ?? body.lon,
    accuracy: body.accuracy,
    method: body.method,
    timestamp: body.timestamp,
  });
  if (!parsed.success) {
    return Err(new InvalidInputError('Invalid presence request', issuesOf(parsed.error)));
  }

  const { identity, accuracy, method, timestamp } = parsed.data;
  const verification: VerificationMethod = method === 'manual' ? 'manual' : 'automatic';

  return Ok({
    identity,
    coordinate: {
      latitude: parsed.data.latitude,
      longitude: parsed.data.longitude,
      ...(accuracy !== null && accuracy !== undefined ? { accuracy } : {}),
    },
    method: verification,
    timestamp: timestamp ? new Date(timestamp) : now,
  });
}

/**
 * GeoJSON Polygon in, internal ring out. An unclosed exterior ring of at
 * least 4 positions is closed here; `margin_m` is accepted for `marginMeters`.
 */
export function validateGeofenceInput(body: unknown): Result<GeofenceInput, InvalidInputError> {
  if (!isRecord(body)) {
    return Err(new InvalidInputError('Request body must be a JSON object', ['body must be an object']));
  }

  const parsed = geofenceSchema.safeParse({
    name: body.name,
    polygon: body.polygon,
    marginMeters: body.marginMeters ?? body.margin_m,
    priority: body.priority,
    isActive: body.isActive,
  });
  if (!parsed.success) {
    return Err(new InvalidInputError('Invalid geofence', issuesOf(parsed.error)));
  }

  const exterior = parsed.data.polygon.coordinates[0];
  if (exterior.length < 4) {
    return Err(
      new InvalidInputError('Invalid geofence', ['polygon ring must have at least 4 positions (including closure)'])
    );
  }
  const [firstLon, firstLat] = exterior[0];
  const [lastLon, lastLat] = exterior[exterior.length - 1];
  const ring = firstLon === lastLon && firstLat === lastLat ? exterior : [...exterior, exterior[0]];
  const polygon: LatLng[] = ring.map(([lon, lat]) => ({ latitude: lat, longitude: lon }));

  const geofence: GeofenceInput = {
    name: parsed.data.name,
    polygon,
    marginMeters: parsed.data.marginMeters,
    priority: parsed.data.priority,
    isActive: parsed.data.isActive,
  };

  try {
    assertValidGeometry({ id: '', ...geofence });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Err(new InvalidInputError('Invalid geofence', [message]));
  }

  return Ok(geofence);
}

/**
 * Replace-all payload: an array of windows (`start_time`/`end_time` accepted
 * for `start`/`end`). Every window must start before it ends.
 */
export function validateTimeWindowsInput(body: unknown): Result<TimeWindowInput[], InvalidInputError> {
  if (!Array.isArray(body)) {
    return Err(new InvalidInputError('Request body must be an array of time windows', ['body must be an array']));
  }

  const windows: TimeWindowInput[] = [];
  const issues: string[] = [];

  body.forEach((item: unknown, index) => {
    const prefix = `[${index}] `;
    if (!isRecord(item)) {
      issues.push(`${prefix}time window must be an object`);
      return;
    }
    const parsed = timeWindowSchema.safeParse({
      name: item.name,
      start: item.start ?? item.start_time,
      end: item.end ?? item.end_time,
      isActive: item.isActive,
    });
    if (!parsed.success) {
      issues.push(...issuesOf(parsed.error, prefix));
      return;
    }
    const bounds = readBounds(parsed.data);
    if (!bounds.ok) {
      issues.push(`${prefix}${bounds.error}`);
      return;
    }
    windows.push(parsed.data);
  });

  if (issues.length > 0) {
    return Err(new InvalidInputError('Invalid time windows', issues));
  }
  return Ok(windows);
}

/**
 * Query string of the event listing. `from` and `to` are inclusive bounds on
 * the verification timestamp.
 */
export function validateEventQuery(query: unknown): Result<EventFilter, InvalidInputError> {
  const source = isRecord(query) ? query : {};
  const parsed = eventQuerySchema.safeParse({
    identity: source.identity ?? source.matricule,
    from: source.from,
    to: source.to,
    limit: source.limit,
    offset: source.offset,
  });
  if (!parsed.success) {
    return Err(new InvalidInputError('Invalid event query', issuesOf(parsed.error)));
  }

  const { identity, limit, offset } = parsed.data;
  const from = parsed.data.from ? new Date(parsed.data.from) : undefined;
  const to = parsed.data.to ? new Date(parsed.data.to) : undefined;
  if (from && to && from.getTime() > to.getTime()) {
    return Err(new InvalidInputError('Invalid event query', ['from must not be after to']));
  }

  return Ok({
    ...(identity ? { identity } : {}),
    ...(from ? { from } : {}),
    ...(to ? { to } : {}),
    limit,
    offset,
  });
}

/**
 * Calendar date as YYYY-MM-DD.
 */
export function validateCalendarDate(value: unknown): Result<string, InvalidInputError> {
  if (typeof value !== 'string' || value.length === 0) {
    return Err(new InvalidInputError('Invalid date', ['date is required (YYYY-MM-DD)']));
  }
  const match = CALENDAR_DATE.exec(value);
  if (!match) {
    return Err(new InvalidInputError('Invalid date', ['date must be YYYY-MM-DD']));
  }
  const [, year, month, day] = match.map(Number);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return Err(new InvalidInputError('Invalid date', [`${value} is not a calendar date`]));
  }
  return Ok(value);
}
