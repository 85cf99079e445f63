// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { AnalysisEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: AnalysisEvent) => void;
}

/**
 * Typed progress channel between the analysis controller and its renderers.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit an event, stamping the timestamp when the emitter left it blank. */
  emitEvent(event: AnalysisEvent): void {
    this.emit('event', event.timestamp ? event : { ...event, timestamp: new Date().toISOString() });
  }
}
