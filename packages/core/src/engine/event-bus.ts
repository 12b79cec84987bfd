// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { JobEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: JobEvent) => void;
}

/**
 * Typed event bus for job lifecycle events.
 * Wraps eventemitter3 with typed JobEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed job event, stamping the current time when none is set. */
  emitEvent(event: JobEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }
}
