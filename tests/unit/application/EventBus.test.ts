import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { CaptureStartedEvent, FrameRejectedEvent } from '../../../src/domain/events/DomainEvents.js';

const startedEvent: CaptureStartedEvent = {
  type: 'capture:started',
  captureId: 'test-capture',
  source: { name: 'test.log', kind: 'static' },
  timestamp: Date.now(),
};

const rejectedEvent: FrameRejectedEvent = {
  type: 'frame:rejected',
  captureId: 'test-capture',
  frameIndex: 2,
  error: { section: 'Vcell', code: 'SECTION_CARDINALITY', message: 'short', expected: 14, observed: 13 },
  timestamp: Date.now(),
};

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('capture:started', handler);
    bus.emit(startedEvent);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(startedEvent);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('capture:started', handler);
    bus.emit(rejectedEvent);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('frame:rejected', handler1);
    bus.on('frame:rejected', handler2);
    bus.emit(rejectedEvent);

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('capture:started', handler);
    bus.off('capture:started', handler);
    bus.emit(startedEvent);

    expect(handler).not.toHaveBeenCalled();
    expect(bus.hasListeners('capture:started')).toBe(false);
  });

  it('should report whether a type has listeners', () => {
    const bus = new EventBus();

    expect(bus.hasListeners('capture:progress')).toBe(false);
    bus.on('capture:progress', vi.fn());
    expect(bus.hasListeners('capture:progress')).toBe(true);
  });

  it('should continue calling other handlers when one throws', () => {
    const bus = new EventBus();
    const failing = vi.fn(() => {
      throw new Error('handler exploded');
    });
    const next = vi.fn();

    bus.on('capture:started', failing);
    bus.on('capture:started', next);

    expect(() => {
      bus.emit(startedEvent);
    }).not.toThrow();
    expect(failing).toHaveBeenCalledOnce();
    expect(next).toHaveBeenCalledOnce();
  });

  it('should do nothing when emitting event with no handlers', () => {
    const bus = new EventBus();

    expect(() => {
      bus.emit(startedEvent);
    }).not.toThrow();
  });
});
