import { createHmac, timingSafeEqual } from 'crypto';
import { IncomingMessage } from 'http';
import { RequestHandler } from 'express';
import { z } from 'zod';
import { PresenceConfig } from '../config/presence';

// Raw request bytes by request, captured by the JSON parser for signature checks
const rawBodies = new WeakMap<object, Buffer>();

/**
 * `verify` hook for express.json() that keeps the exact bytes the client signed
 */
export const captureRawBody = (req: IncomingMessage, _res: unknown, buf: Buffer): void => {
  rawBodies.set(req, buf);
};

export const getRawBody = (req: object): Buffer => rawBodies.get(req) ?? Buffer.alloc(0);

const isoTimestamp = z.string().datetime({ offset: true });

const safeEqual = (a: string, b: string): boolean => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
};

export const signPayload = (secret: string, ts: string, body: Buffer | string): string =>
  createHmac('sha256', secret).update(`${ts}.`).update(body).digest('hex');

/**
 * HMAC guard for device submissions.
 *
 * Expects `x-api-key`, `x-device-id`, `x-ts` (ISO-8601) and `x-signature`, the
 * hex HMAC-SHA256 of `${x-ts}.${raw body}` under the signing secret.
 */
export function createHmacGuard(config: PresenceConfig, now: () => number = Date.now): RequestHandler {
  return (req, res, next) => {
    const { apiKey, signingSecret } = config;
    if (!apiKey || !signingSecret) {
      console.error('[HmacGuard] PRESENCE_API_KEY and PRESENCE_SIGNING_SECRET must be set');
      res.status(500).json({ error: 'Presence signing is not configured' });
      return;
    }

    const key = req.get('x-api-key');
    const deviceId = req.get('x-device-id');
    const ts = req.get('x-ts');
    const signature = req.get('x-signature');

    if (!key || !deviceId || !ts || !signature) {
      res.status(401).json({ error: 'Unauthorized', message: 'Missing HMAC headers' });
      return;
    }

    if (!safeEqual(key, apiKey)) {
      res.status(401).json({ error: 'Unauthorized', message: 'Unknown API key' });
      return;
    }

    if (!isoTimestamp.safeParse(ts).success) {
      res.status(400).json({ error: 'Invalid x-ts format' });
      return;
    }

    if (Math.abs(now() - Date.parse(ts)) > config.hmacSkewSeconds * 1000) {
      res.status(401).json({ error: 'Unauthorized', message: 'Timestamp skew too large' });
      return;
    }

    const expected = signPayload(signingSecret, ts, getRawBody(req));
    if (!safeEqual(signature.toLowerCase(), expected)) {
      console.warn(`[HmacGuard] Invalid signature from device ${deviceId}`);
      res.status(401).json({ error: 'Unauthorized', message: 'Invalid signature' });
      return;
    }

    res.locals.deviceId = deviceId;
    next();
  };
}
