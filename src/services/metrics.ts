/**
 * Prometheus counters for presence checks, exposed on GET /metrics
 */

import { Counter, Registry } from 'prom-client';

export interface PresenceMetrics {
  registry: Registry;
  /** Every presence check that reached the service */
  requests: Counter;
  /** Checks whose event was recorded */
  successes: Counter;
}

export function createPresenceMetrics(registry: Registry = new Registry()): PresenceMetrics {
  return {
    registry,
    requests: new Counter({
      name: 'presence_requests_total',
      help: 'Presence requests received',
      registers: [registry],
    }),
    successes: new Counter({
      name: 'presence_success_total',
      help: 'Successful presence checks',
      registers: [registry],
    }),
  };
}

export const presenceMetrics = createPresenceMetrics();
