import { find } from 'geo-tz';

/**
 * IANA timezone at the given coordinates, or "UTC" when none is found.
 */
export function getTimezoneFromCoordinates(latitude: number, longitude: number): string {
  try {
    const zones = find(latitude, longitude);
    return zones.length > 0 ? zones[0] : 'UTC';
  } catch (error) {
    console.error('Error finding timezone:', error);
    return 'UTC';
  }
}
