import { describe, expect, it } from 'vitest';
import { EventBus } from '../../../src/engine/event-bus.js';
import type { AnalysisEvent } from '../../../src/types/events.js';

describe('EventBus', () => {
  it('stamps events emitted without a timestamp', () => {
    const bus = new EventBus();
    const seen: AnalysisEvent[] = [];
    bus.on('event', (event) => seen.push(event));

    bus.emitEvent({ type: 'extraction.completed', characters: 12, timestamp: '' });

    expect(seen).toHaveLength(1);
    expect(seen[0].type).toBe('extraction.completed');
    expect(Number.isNaN(Date.parse(seen[0].timestamp))).toBe(false);
  });

  it('keeps an explicit timestamp', () => {
    const bus = new EventBus();
    const seen: AnalysisEvent[] = [];
    bus.on('event', (event) => seen.push(event));

    bus.emitEvent({ type: 'attempt.blocked', attempt: 1, timestamp: '2026-01-01T00:00:00.000Z' });

    expect(seen[0].timestamp).toBe('2026-01-01T00:00:00.000Z');
  });
});
