/**
 * Event Recorder
 * Persists presence events and answers the read-side queries over them
 */

import moment from 'moment-timezone';
import { FilterQuery, isValidObjectId } from 'mongoose';
import { IPresenceEvent, PresenceEvent } from '../models/PresenceEvent';
import { AttendanceStatus, EventFilter, VerificationMethod } from './presence';

export interface PresenceEventRecord {
  id: string;
  identity: string;
  latitude: number;
  longitude: number;
  accuracy: number | null;
  status: AttendanceStatus;
  method: VerificationMethod;
  geofenceId: string | null;
  timeWindowId: string | null;
  timestamp: Date;
  recordedAt: Date;
}

export type NewPresenceEvent = Omit<PresenceEventRecord, 'id' | 'recordedAt'>;

export interface EventPage {
  events: PresenceEventRecord[];
  total: number;
  limit: number;
  offset: number;
}

export interface DailyStats {
  date: string;
  timezone: string;
  totalEvents: number;
  presentCount: number;
  lateCount: number;
  absentCount: number;
  outsideCount: number;
  manualCount: number;
  automaticCount: number;
}

export interface EventRecorder {
  /** Stores one event. Recording the same identity and timestamp twice returns the first event. */
  record(event: NewPresenceEvent): Promise<PresenceEventRecord>;
}

export interface EventQueries {
  listEvents(filter: EventFilter): Promise<EventPage>;
  getEvent(id: string): Promise<PresenceEventRecord | null>;
  /** Counts for one calendar date (YYYY-MM-DD) as seen in `timezone` */
  dailyStats(date: string, timezone: string): Promise<DailyStats>;
}

interface StatusMethodCount {
  _id: { status: AttendanceStatus; method: VerificationMethod };
  count: number;
}

type CountField = keyof Omit<DailyStats, 'date' | 'timezone' | 'totalEvents'>;

const STATUS_FIELD: Record<AttendanceStatus, CountField> = {
  present: 'presentCount',
  late: 'lateCount',
  absent: 'absentCount',
  outside: 'outsideCount',
};

const METHOD_FIELD: Record<VerificationMethod, CountField> = {
  automatic: 'automaticCount',
  manual: 'manualCount',
};

const DUPLICATE_KEY = 11000;

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === DUPLICATE_KEY;

export function toEventRecord(doc: IPresenceEvent): PresenceEventRecord {
  return {
    id: String(doc._id),
    identity: doc.identity,
    latitude: doc.latitude,
    longitude: doc.longitude,
    accuracy: doc.accuracy ?? null,
    status: doc.status,
    method: doc.method,
    geofenceId: doc.geofenceId ?? null,
    timeWindowId: doc.timeWindowId ?? null,
    timestamp: doc.timestamp,
    recordedAt: doc.recordedAt,
  };
}

/**
 * Start (inclusive) and end (exclusive) of a calendar date in a zone.
 */
export function dayBounds(date: string, timezone: string): { start: Date; end: Date } {
  const start = moment.tz(date, 'YYYY-MM-DD', true, timezone).startOf('day');
  return { start: start.toDate(), end: start.clone().add(1, 'day').toDate() };
}

export function summarize(date: string, timezone: string, rows: StatusMethodCount[]): DailyStats {
  const stats: DailyStats = {
    date,
    timezone,
    totalEvents: 0,
    presentCount: 0,
    lateCount: 0,
    absentCount: 0,
    outsideCount: 0,
    manualCount: 0,
    automaticCount: 0,
  };

  for (const { _id, count } of rows) {
    stats.totalEvents += count;
    stats[STATUS_FIELD[_id.status]] += count;
    stats[METHOD_FIELD[_id.method]] += count;
  }
  return stats;
}

export class MongoEventRecorder implements EventRecorder, EventQueries {
  async record(event: NewPresenceEvent): Promise<PresenceEventRecord> {
    const { accuracy, ...fields } = event;
    try {
      const doc = await new PresenceEvent({
        ...fields,
        ...(accuracy !== null ? { accuracy } : {}),
      }).save();
      return toEventRecord(doc);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        const existing = await PresenceEvent.findOne({ identity: event.identity, timestamp: event.timestamp }).exec();
        if (existing) {
          console.log(
            `[EventRecorder] Duplicate event for ${event.identity} at ${event.timestamp.toISOString()}, returning ${String(existing._id)}`
          );
          return toEventRecord(existing);
        }
      }
      throw error;
    }
  }

  async listEvents(filter: EventFilter): Promise<EventPage> {
    const query: FilterQuery<IPresenceEvent> = {};
    if (filter.identity) {
      query.identity = filter.identity;
    }
    if (filter.from || filter.to) {
      query.timestamp = {
        ...(filter.from ? { $gte: filter.from } : {}),
        ...(filter.to ? { $lte: filter.to } : {}),
      };
    }

    const [docs, total] = await Promise.all([
      PresenceEvent.find(query).sort({ timestamp: -1, _id: -1 }).skip(filter.offset).limit(filter.limit).exec(),
      PresenceEvent.countDocuments(query).exec(),
    ]);

    return { events: docs.map(toEventRecord), total, limit: filter.limit, offset: filter.offset };
  }

  async getEvent(id: string): Promise<PresenceEventRecord | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await PresenceEvent.findById(id).exec();
    return doc ? toEventRecord(doc) : null;
  }

  async dailyStats(date: string, timezone: string): Promise<DailyStats> {
    const { start, end } = dayBounds(date, timezone);
    const rows = await PresenceEvent.aggregate<StatusMethodCount>([
      { $match: { timestamp: { $gte: start, $lt: end } } },
      { $group: { _id: { status: '$status', method: '$method' }, count: { $sum: 1 } } },
    ]).exec();
    return summarize(date, timezone, rows);
  }
}
