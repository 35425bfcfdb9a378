/**
 * Configuration Source
 * Geofences and time windows as stored in MongoDB, and the read-only snapshot
 * the decision engine works on
 */

import { isValidObjectId } from 'mongoose';
import { GeofenceModel, IGeofence, IPolygon } from '../models/Geofence';
import { CURRENT_TIME_WINDOW_SET, ITimeWindowSet, TimeWindowSet } from '../models/TimeWindowSet';
import { ConfigSnapshot, Geofence, GeofenceInput, LatLng, TimeWindow, TimeWindowInput } from './presence';

export interface TimeWindowSetView {
  version: number;
  timeWindows: TimeWindow[];
}

export interface ConfigurationSource {
  /** Active geofences in insertion order plus the current time window set */
  loadSnapshot(): Promise<ConfigSnapshot>;
}

export interface ConfigurationStore extends ConfigurationSource {
  upsertGeofence(input: GeofenceInput): Promise<Geofence>;
  listGeofences(): Promise<Geofence[]>;
  setGeofenceActive(id: string, isActive: boolean): Promise<Geofence | null>;
  replaceTimeWindows(windows: TimeWindowInput[]): Promise<TimeWindowSetView>;
  listTimeWindows(): Promise<TimeWindowSetView>;
}

export const toGeoJsonPolygon = (ring: readonly LatLng[]): IPolygon => ({
  type: 'Polygon',
  coordinates: [ring.map(({ latitude, longitude }) => [longitude, latitude])],
});

export function toGeofence(doc: IGeofence): Geofence {
  const exterior = doc.polygon?.coordinates?.[0] ?? [];
  return {
    id: String(doc._id),
    name: doc.name,
    polygon: exterior.map(([longitude, latitude]) => ({ latitude, longitude })),
    marginMeters: doc.marginMeters,
    priority: doc.priority ?? 0,
    isActive: doc.isActive,
  };
}

function toTimeWindows(set: ITimeWindowSet | null): TimeWindow[] {
  if (!set) {
    return [];
  }
  return set.windows.map((window) => ({
    id: String(window._id),
    name: window.name,
    start: window.start,
    end: window.end,
    isActive: window.isActive,
  }));
}

const freezeGeofence = (geofence: Geofence): Geofence =>
  Object.freeze({ ...geofence, polygon: Object.freeze(geofence.polygon.map((vertex) => Object.freeze(vertex))) });

export class MongoConfigurationSource implements ConfigurationStore {
  async loadSnapshot(): Promise<ConfigSnapshot> {
    const [geofenceDocs, windowSet] = await Promise.all([
      GeofenceModel.find({ isActive: true }).sort({ createdAt: 1, _id: 1 }).exec(),
      TimeWindowSet.findOne({ key: CURRENT_TIME_WINDOW_SET }).exec(),
    ]);

    return Object.freeze({
      geofences: Object.freeze(geofenceDocs.map((doc) => freezeGeofence(toGeofence(doc)))),
      timeWindows: Object.freeze(toTimeWindows(windowSet).map((window) => Object.freeze(window))),
      version: windowSet?.version ?? 0,
    });
  }

  /**
   * Create or update the geofence with the same name.
   */
  async upsertGeofence(input: GeofenceInput): Promise<Geofence> {
    const doc = await GeofenceModel.findOneAndUpdate(
      { name: input.name },
      {
        $set: {
          polygon: toGeoJsonPolygon(input.polygon),
          marginMeters: input.marginMeters,
          priority: input.priority,
          isActive: input.isActive,
        },
      },
      { upsert: true, new: true, runValidators: true, setDefaultsOnInsert: true }
    ).exec();
    if (!doc) {
      throw new Error(`Geofence "${input.name}" was not stored`);
    }
    console.log(`[ConfigurationSource] Stored geofence "${input.name}" (${String(doc._id)})`);
    return toGeofence(doc);
  }

  async listGeofences(): Promise<Geofence[]> {
    const docs = await GeofenceModel.find({}).sort({ createdAt: -1 }).exec();
    return docs.map(toGeofence);
  }

  async setGeofenceActive(id: string, isActive: boolean): Promise<Geofence | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await GeofenceModel.findByIdAndUpdate(id, { $set: { isActive } }, { new: true }).exec();
    return doc ? toGeofence(doc) : null;
  }

  /**
   * Replaces the whole set in one document write and bumps its version.
   */
  async replaceTimeWindows(windows: TimeWindowInput[]): Promise<TimeWindowSetView> {
    const set = await TimeWindowSet.findOneAndUpdate(
      { key: CURRENT_TIME_WINDOW_SET },
      { $set: { windows }, $inc: { version: 1 } },
      { upsert: true, new: true, runValidators: true }
    ).exec();
    if (!set) {
      throw new Error('Time window set was not stored');
    }
    console.log(`[ConfigurationSource] Replaced time windows (${windows.length}), version ${set.version}`);
    return { version: set.version, timeWindows: sortByStart(toTimeWindows(set)) };
  }

  async listTimeWindows(): Promise<TimeWindowSetView> {
    const set = await TimeWindowSet.findOne({ key: CURRENT_TIME_WINDOW_SET }).exec();
    return { version: set?.version ?? 0, timeWindows: sortByStart(toTimeWindows(set)) };
  }
}

// Zero-padded HH:mm[:ss] strings sort like the times they denote
const sortByStart = (windows: TimeWindow[]): TimeWindow[] =>
  [...windows].sort((a, b) => a.start.localeCompare(b.start));
