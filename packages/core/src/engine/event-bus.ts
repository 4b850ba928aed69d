// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

export interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

/**
 * Typed event bus for engine events.
 * Wraps eventemitter3; an empty timestamp is filled in on emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  emitEvent(event: EngineEvent): void {
    this.emit('event', event.timestamp ? event : { ...event, timestamp: new Date().toISOString() });
  }
}
