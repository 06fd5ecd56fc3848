// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { BuildEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: BuildEvent) => void;
}

/**
 * Typed event bus for build engine events.
 * Wraps eventemitter3 with typed BuildEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed build event, filling in an empty timestamp. */
  emitEvent(event: BuildEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }
}
