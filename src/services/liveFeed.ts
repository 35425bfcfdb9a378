import { EventEmitter } from 'events';
import type { PresenceEventRecord } from './eventRecorder';

export const PRESENCE_EVENT = 'presence';

/**
 * In-process fan-out of recorded presence events to live stream subscribers.
 */
export class PresenceFeed extends EventEmitter {
  publish(event: PresenceEventRecord): void {
    this.emit(PRESENCE_EVENT, event);
  }

  subscribe(listener: (event: PresenceEventRecord) => void): () => void {
    this.on(PRESENCE_EVENT, listener);
    return () => {
      this.off(PRESENCE_EVENT, listener);
    };
  }
}

export const presenceFeed = new PresenceFeed();
// Every open stream holds one listener
presenceFeed.setMaxListeners(0);
