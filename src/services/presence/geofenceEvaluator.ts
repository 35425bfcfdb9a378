/**
 * Geofence Evaluator
 * Spherical point-in-polygon with an outward margin in meters
 *
 * Polygon edges are great-circle arcs. Containment is tested in a gnomonic
 * projection centred on the point, where great circles become straight lines,
 * so planar ray casting gives the spherical answer. The margin is checked
 * against the cross-track distance to the nearest edge.
 */

import { InvalidGeometryError } from './errors';
import { Coordinate, Geofence, GeofenceMatch, LatLng, NearestGeofence } from './types';

export const EARTH_RADIUS_METERS = 6371008.8;

const MIN_RING_VERTICES = 4;
const EPSILON = 1e-12;

type Vector3 = [number, number, number];

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

const toVector = (point: LatLng): Vector3 => {
  const lat = toRadians(point.latitude);
  const lon = toRadians(point.longitude);
  return [Math.cos(lat) * Math.cos(lon), Math.cos(lat) * Math.sin(lon), Math.sin(lat)];
};

const dot = (a: Vector3, b: Vector3): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];

const cross = (a: Vector3, b: Vector3): Vector3 => [
  a[1] * b[2] - a[2] * b[1],
  a[2] * b[0] - a[0] * b[2],
  a[0] * b[1] - a[1] * b[0],
];

const length = (a: Vector3): number => Math.sqrt(dot(a, a));

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const isValidLatLng = (point: LatLng): boolean =>
  Number.isFinite(point.latitude) &&
  Number.isFinite(point.longitude) &&
  point.latitude >= -90 &&
  point.latitude <= 90 &&
  point.longitude >= -180 &&
  point.longitude <= 180;

/**
 * Great-circle distance in meters (haversine).
 */
export function haversineMeters(from: LatLng, to: LatLng): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/**
 * Shortest distance in meters from a point to the great-circle arc a→b.
 */
export function distanceToArcMeters(point: LatLng, a: LatLng, b: LatLng): number {
  const p = toVector(point);
  const va = toVector(a);
  const vb = toVector(b);

  const normal = cross(va, vb);
  const normalLength = length(normal);
  if (normalLength < EPSILON) {
    return haversineMeters(point, a);
  }
  const n: Vector3 = [normal[0] / normalLength, normal[1] / normalLength, normal[2] / normalLength];

  const sinCrossTrack = dot(p, n);
  const foot: Vector3 = [p[0] - n[0] * sinCrossTrack, p[1] - n[1] * sinCrossTrack, p[2] - n[2] * sinCrossTrack];

  // The foot of the perpendicular lies on the arc when it sits between a and b
  const onArc =
    length(foot) > EPSILON && dot(cross(va, foot), n) >= 0 && dot(cross(foot, vb), n) >= 0;
  if (onArc) {
    return Math.abs(Math.asin(clamp(sinCrossTrack, -1, 1))) * EARTH_RADIUS_METERS;
  }
  return Math.min(haversineMeters(point, a), haversineMeters(point, b));
}

/**
 * Gnomonic projection centred on `center`. Null for points on the far hemisphere.
 */
function projectGnomonic(center: LatLng, point: LatLng): [number, number] | null {
  const lat0 = toRadians(center.latitude);
  const lat = toRadians(point.latitude);
  const dLon = toRadians(point.longitude - center.longitude);

  const cosC = Math.sin(lat0) * Math.sin(lat) + Math.cos(lat0) * Math.cos(lat) * Math.cos(dLon);
  if (cosC <= EPSILON) {
    return null;
  }
  const x = (Math.cos(lat) * Math.sin(dLon)) / cosC;
  const y = (Math.cos(lat0) * Math.sin(lat) - Math.sin(lat0) * Math.cos(lat) * Math.cos(dLon)) / cosC;
  return [x, y];
}

/**
 * Throws InvalidGeometryError unless the geofence has a closed ring of at
 * least 4 valid vertices and a finite, non-negative margin.
 */
export function assertValidGeometry(geofence: Geofence): void {
  const ring = geofence.polygon;
  if (ring.length < MIN_RING_VERTICES) {
    throw new InvalidGeometryError(
      `Geofence "${geofence.name}" has ${ring.length} vertices; a closed ring needs at least ${MIN_RING_VERTICES}`,
      geofence.id
    );
  }
  const invalidVertex = ring.findIndex((vertex) => !isValidLatLng(vertex));
  if (invalidVertex !== -1) {
    throw new InvalidGeometryError(
      `Geofence "${geofence.name}" has an out-of-range vertex at index ${invalidVertex}`,
      geofence.id
    );
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first.latitude !== last.latitude || first.longitude !== last.longitude) {
    throw new InvalidGeometryError(`Geofence "${geofence.name}" ring is not closed`, geofence.id);
  }
  if (!Number.isFinite(geofence.marginMeters) || geofence.marginMeters < 0) {
    throw new InvalidGeometryError(
      `Geofence "${geofence.name}" margin must be a non-negative number of meters`,
      geofence.id
    );
  }
}

/**
 * Containment in the polygon itself, ignoring the margin.
 */
export function isInsidePolygon(polygon: readonly LatLng[], point: LatLng): boolean {
  const projected: [number, number][] = [];
  for (const vertex of polygon) {
    const xy = projectGnomonic(point, vertex);
    if (!xy) {
      // Part of the ring is a quarter of the globe away
      return false;
    }
    projected.push(xy);
  }

  // Even-odd rule along the +x ray from the origin (the point itself)
  let inside = false;
  for (let i = 0, j = projected.length - 1; i < projected.length; j = i++) {
    const [xi, yi] = projected[i];
    const [xj, yj] = projected[j];
    if (yi > 0 !== yj > 0) {
      const xCross = xi + ((0 - yi) * (xj - xi)) / (yj - yi);
      if (xCross > 0) {
        inside = !inside;
      }
    }
  }
  return inside;
}

/**
 * Distance in meters from the point to the polygon boundary.
 */
export function distanceToBoundaryMeters(polygon: readonly LatLng[], point: LatLng): number {
  let min = Number.POSITIVE_INFINITY;
  for (let i = 1; i < polygon.length; i++) {
    min = Math.min(min, distanceToArcMeters(point, polygon[i - 1], polygon[i]));
  }
  return min;
}

/**
 * 0 inside the polygon, otherwise meters to its nearest edge.
 */
export function distanceToGeofence(geofence: Geofence, coordinate: Coordinate): number {
  assertValidGeometry(geofence);
  if (isInsidePolygon(geofence.polygon, coordinate)) {
    return 0;
  }
  return distanceToBoundaryMeters(geofence.polygon, coordinate);
}

/**
 * True when the coordinate lies inside the polygon buffered by its margin.
 */
export function contains(geofence: Geofence, coordinate: Coordinate): boolean {
  return distanceToGeofence(geofence, coordinate) <= geofence.marginMeters;
}

const rankActive = (geofences: readonly Geofence[]): Geofence[] =>
  geofences
    .map((geofence, index) => ({ geofence, index }))
    .filter(({ geofence }) => geofence.isActive)
    .sort((a, b) => b.geofence.priority - a.geofence.priority || a.index - b.index)
    .map(({ geofence }) => geofence);

/**
 * First active geofence containing the coordinate, or null.
 *
 * Geofences whose polygon holds the point win over geofences matched only
 * through their margin. Within each tier higher priority wins, then the
 * earlier geofence in the list.
 */
export function findContainingGeofence(geofences: readonly Geofence[], coordinate: Coordinate): GeofenceMatch | null {
  const ranked = rankActive(geofences);
  ranked.forEach(assertValidGeometry);

  const distances = ranked.map((geofence) => distanceToGeofence(geofence, coordinate));

  const insideIndex = distances.findIndex((distance) => distance === 0);
  if (insideIndex !== -1) {
    return { geofence: ranked[insideIndex], distanceMeters: 0, viaMargin: false };
  }

  const marginIndex = distances.findIndex((distance, i) => distance <= ranked[i].marginMeters);
  if (marginIndex !== -1) {
    return { geofence: ranked[marginIndex], distanceMeters: distances[marginIndex], viaMargin: true };
  }

  return null;
}

/**
 * Closest active geofence, for reporting only.
 */
export function findNearestGeofence(geofences: readonly Geofence[], coordinate: Coordinate): NearestGeofence | null {
  let nearest: NearestGeofence | null = null;
  for (const geofence of rankActive(geofences)) {
    const distanceMeters = distanceToGeofence(geofence, coordinate);
    if (!nearest || distanceMeters < nearest.distanceMeters) {
      nearest = { id: geofence.id, name: geofence.name, distanceMeters };
    }
  }
  return nearest;
}
