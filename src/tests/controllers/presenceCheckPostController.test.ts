import request from 'supertest';
import { signPayload } from '../../middleware/hmac';
import { PresenceEventRecord } from '../../services/eventRecorder';
import { PresenceFeed } from '../../services/liveFeed';
import {
  createTestApp,
  InMemoryConfigurationStore,
  InMemoryEventRecorder,
  campus,
  entryWindow,
  testConfig,
} from '../fakes';

const signed = (app: ReturnType<typeof createTestApp>, payload: unknown, ts = new Date().toISOString()) => {
  const body = JSON.stringify(payload);
  return request(app)
    .post('/presence/check')
    .set('Content-Type', 'application/json')
    .set({
      'x-api-key': 'test-api-key',
      'x-device-id': 'device-7',
      'x-ts': ts,
      'x-signature': signPayload('test-secret', ts, body),
    })
    .send(body);
};

describe('POST /presence/check', () => {
  let store: InMemoryConfigurationStore;
  let recorder: InMemoryEventRecorder;
  let feed: PresenceFeed;
  let app: ReturnType<typeof createTestApp>;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new InMemoryConfigurationStore({ geofences: [campus], timeWindows: [entryWindow] });
    recorder = new InMemoryEventRecorder();
    feed = new PresenceFeed();
    app = createTestApp({ config: testConfig(), store, recorder, feed });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should answer present inside the campus during the entry window', async () => {
    const response = await signed(app, {
      matricule: 'STU-42',
      lat: 45.7605,
      lon: 4.8407,
      method: 'auto',
      timestamp: '2024-03-11T08:10:00Z',
    });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: 'present',
      matchedGeofenceId: 'gf_campus',
      message: 'Present inside geofence Main campus',
      identity: 'STU-42',
      timestamp: '2024-03-11T08:10:00.000Z',
      timezone: 'UTC',
      timeWindow: { id: 'tw_entry', name: 'Entry' },
      geofence: { id: 'gf_campus', name: 'Main campus' },
      nearestGeofence: null,
      eventId: 'evt_1',
    });
  });

  it('should answer outside with the nearest geofence for an automatic check far from campus', async () => {
    const response = await signed(app, {
      identity: 'STU-42',
      latitude: 45.7628,
      longitude: 4.8407,
      method: 'automatic',
      timestamp: '2024-03-11T08:10:00Z',
    });

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('outside');
    expect(response.body.message).toBe('Outside every geofence');
    expect(response.body.nearestGeofence).toMatchObject({ id: 'gf_campus', name: 'Main campus' });
  });

  it('should answer absent when no window is open', async () => {
    const response = await signed(app, {
      identity: 'STU-42',
      lat: 45.7605,
      lon: 4.8407,
      method: 'manual',
      timestamp: '2024-03-11T09:00:00Z',
    });

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('absent');
    expect(response.body.message).toBe('No active time window');
  });

  it('should publish the recorded event to the live feed', async () => {
    const received: PresenceEventRecord[] = [];
    feed.subscribe((event) => received.push(event));

    await signed(app, { identity: 'STU-42', lat: 45.7605, lon: 4.8407, method: 'automatic' });

    expect(received).toHaveLength(1);
    expect(received[0].identity).toBe('STU-42');
  });

  it('should answer 400 with every issue for invalid input', async () => {
    const response = await signed(app, { lat: 95, lon: 4.8407, method: 'gps' });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: 'InvalidInput',
      message: 'Invalid presence request',
      issues: ['identity is required', 'latitude must be between -90 and 90', 'method must be one of automatic, auto, manual'],
    });
    expect(recorder.events).toHaveLength(0);
  });

  it('should answer 500 for a corrupt geofence', async () => {
    store.geofences = [{ ...campus, polygon: campus.polygon.slice(0, 4) }];

    const response = await signed(app, {
      identity: 'STU-42',
      lat: 45.7605,
      lon: 4.8407,
      method: 'automatic',
      timestamp: '2024-03-11T08:10:00Z',
    });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'InvalidGeometry', message: 'Geofence "Main campus" ring is not closed' });
  });

  it('should answer 503 with the decision when recording fails', async () => {
    recorder.failWith = new Error('connection reset');

    const response = await signed(app, {
      identity: 'STU-42',
      lat: 45.7605,
      lon: 4.8407,
      method: 'automatic',
      timestamp: '2024-03-11T08:10:00Z',
    });

    expect(response.status).toBe(503);
    expect(response.body).toEqual({
      error: 'RecorderFailure',
      message: 'Failed to record presence event',
      identity: 'STU-42',
      timestamp: '2024-03-11T08:10:00.000Z',
      decision: {
        status: 'present',
        matchedGeofenceId: 'gf_campus',
        matchedTimeWindowId: 'tw_entry',
        geofenceName: 'Main campus',
        timeWindowName: 'Entry',
        message: 'Present inside geofence Main campus',
      },
    });
  });

  it('should answer 401 without a signature', async () => {
    const response = await request(app)
      .post('/presence/check')
      .send({ identity: 'STU-42', lat: 45.7605, lon: 4.8407, method: 'automatic' });

    expect(response.status).toBe(401);
    expect(recorder.events).toHaveLength(0);
  });

  it('should answer 401 for a stale signature', async () => {
    const stale = new Date(Date.now() - 10 * 60 * 1000).toISOString();

    const response = await signed(app, { identity: 'STU-42', lat: 45.7605, lon: 4.8407, method: 'automatic' }, stale);

    expect(response.status).toBe(401);
    expect(response.body.message).toBe('Timestamp skew too large');
  });

  it('should answer 400 for a body that is not JSON', async () => {
    const response = await request(app)
      .post('/presence/check')
      .set('Content-Type', 'application/json')
      .send('{"identity":');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'InvalidInput', message: 'Request body is not valid JSON' });
  });
});
