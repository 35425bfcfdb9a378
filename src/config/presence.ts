import 'dotenv/config';
import { isKnownTimezone } from '../services/presence';

export const AUTO_TIMEZONE = 'auto';

export interface PresenceConfig {
  /** IANA zone for reading the time of day, or "auto" to use the zone at the reported coordinate */
  timezone: string;
  apiKey?: string;
  signingSecret?: string;
  hmacSkewSeconds: number;
}

const DEFAULT_HMAC_SKEW_SECONDS = 120;

/**
 * Get presence configuration from environment variables
 */
export function getPresenceConfig(env: NodeJS.ProcessEnv = process.env): PresenceConfig {
  let timezone = env.ATTENDANCE_TIMEZONE || 'UTC';
  if (timezone !== AUTO_TIMEZONE && !isKnownTimezone(timezone)) {
    console.warn(`[PresenceConfig] Unknown ATTENDANCE_TIMEZONE "${timezone}". Defaulting to UTC.`);
    timezone = 'UTC';
  }

  const skew = Number(env.PRESENCE_HMAC_SKEW_SECONDS);

  return {
    timezone,
    apiKey: env.PRESENCE_API_KEY || undefined,
    signingSecret: env.PRESENCE_SIGNING_SECRET || undefined,
    hmacSkewSeconds: Number.isFinite(skew) && skew > 0 ? skew : DEFAULT_HMAC_SKEW_SECONDS,
  };
}

/**
 * Zone calendar dates are reported in; "auto" reports in UTC.
 */
export const reportingTimezone = (config: PresenceConfig): string =>
  config.timezone === AUTO_TIMEZONE ? 'UTC' : config.timezone;
