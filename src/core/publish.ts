// src/core/publish.ts

import type { EventEmitter } from 'events';
import type { Logger } from '../lib/logger';
import type { PoolEvent } from '../types/pool';

/**
 * Hands committed events to every 'event' listener. A listener that throws is
 * logged and skipped; the rest still run and the operation result stands.
 */
export const publishEvents = (emitter: EventEmitter, log: Logger, events: readonly PoolEvent[]): void => {
  for (const event of events) {
    for (const listener of emitter.listeners('event')) {
      try {
        listener.call(emitter, event);
      } catch (error) {
        log.error({ err: error, event: event.type }, 'event listener failed');
      }
    }
  }
};
