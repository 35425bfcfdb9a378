import express from 'express';
import request from 'supertest';
import { captureRawBody, createHmacGuard, signPayload } from '../../middleware/hmac';
import { testConfig } from '../fakes';

const NOW = Date.parse('2024-03-11T08:10:00Z');
const TS = '2024-03-11T08:09:30Z';
const BODY = JSON.stringify({ identity: 'student-001', lat: 45.7605, lon: 4.8407, method: 'automatic' });

const buildApp = (config = testConfig()) => {
  const app = express();
  app.use(express.json({ verify: captureRawBody }));
  app.post('/check', createHmacGuard(config, () => NOW), (req, res) => {
    res.json({ deviceId: res.locals.deviceId, body: req.body });
  });
  return app;
};

const signedPost = (
  app: express.Express,
  headers: Partial<Record<'x-api-key' | 'x-device-id' | 'x-ts' | 'x-signature', string>> = {},
  body = BODY
) => {
  const allHeaders = {
    'x-api-key': 'test-api-key',
    'x-device-id': 'device-7',
    'x-ts': TS,
    'x-signature': signPayload('test-secret', TS, body),
    ...headers,
  };
  return request(app).post('/check').set('Content-Type', 'application/json').set(allHeaders).send(body);
};

describe('HMAC guard', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass a correctly signed request through with the device id', async () => {
    const response = await signedPost(buildApp());

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ deviceId: 'device-7', body: JSON.parse(BODY) });
  });

  it('should accept an upper-case hex signature', async () => {
    const response = await signedPost(buildApp(), { 'x-signature': signPayload('test-secret', TS, BODY).toUpperCase() });

    expect(response.status).toBe(200);
  });

  it('should sign the exact bytes that were sent', async () => {
    const spaced = '{ "identity": "student-001", "lat": 45.7605, "lon": 4.8407, "method": "automatic" }';

    const response = await signedPost(buildApp(), { 'x-signature': signPayload('test-secret', TS, BODY) }, spaced);

    expect(response.status).toBe(401);
    expect(response.body.message).toBe('Invalid signature');
  });

  it('should reject a request with a header missing', async () => {
    const response = await request(buildApp())
      .post('/check')
      .set('Content-Type', 'application/json')
      .set({ 'x-api-key': 'test-api-key', 'x-ts': TS, 'x-signature': 'abc' })
      .send(BODY);

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'Unauthorized', message: 'Missing HMAC headers' });
  });

  it('should reject an unknown API key', async () => {
    const response = await signedPost(buildApp(), { 'x-api-key': 'other-key' });

    expect(response.status).toBe(401);
    expect(response.body.message).toBe('Unknown API key');
  });

  it('should answer 400 for an unreadable timestamp', async () => {
    const response = await signedPost(buildApp(), { 'x-ts': 'yesterday' });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Invalid x-ts format' });
  });

  it('should reject a timestamp outside the allowed skew', async () => {
    const stale = '2024-03-11T08:07:59Z';

    const response = await signedPost(buildApp(), { 'x-ts': stale, 'x-signature': signPayload('test-secret', stale, BODY) });

    expect(response.status).toBe(401);
    expect(response.body.message).toBe('Timestamp skew too large');
  });

  it('should accept a timestamp at the edge of the allowed skew', async () => {
    const edge = '2024-03-11T08:12:00Z';

    const response = await signedPost(buildApp(), { 'x-ts': edge, 'x-signature': signPayload('test-secret', edge, BODY) });

    expect(response.status).toBe(200);
  });

  it('should reject a signature made with another secret', async () => {
    const response = await signedPost(buildApp(), { 'x-signature': signPayload('wrong-secret', TS, BODY) });

    expect(response.status).toBe(401);
    expect(response.body.message).toBe('Invalid signature');
  });

  it('should answer 500 when no signing secret is configured', async () => {
    const response = await signedPost(buildApp(testConfig({ signingSecret: undefined })));

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'Presence signing is not configured' });
  });
});
