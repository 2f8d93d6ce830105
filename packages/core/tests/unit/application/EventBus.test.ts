import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { ValueAcceptedEvent, SampleAnalyzedEvent } from '../../../src/domain/events/DomainEvents.js';

function accepted(): ValueAcceptedEvent {
  return { type: 'value:accepted', guard: 'test-guard', value: 1, timestamp: Date.now() };
}

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.on('value:accepted', handler);

    const event = accepted();
    bus.emit(event);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.on('value:accepted', handler);

    const event: SampleAnalyzedEvent = { type: 'sample:analyzed', recordsAnalyzed: 3, fields: 2, timestamp: Date.now() };
    bus.emit(event);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();
    bus.on('value:accepted', handler1);
    bus.on('value:accepted', handler2);

    bus.emit(accepted());

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.on('value:accepted', handler);
    bus.off('value:accepted', handler);

    bus.emit(accepted());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should deliver every event to wildcard handlers until removed', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.onAny(handler);

    bus.emit(accepted());
    bus.emit({ type: 'sample:analyzed', recordsAnalyzed: 1, fields: 1, timestamp: Date.now() });
    bus.offAny(handler);
    bus.emit(accepted());

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('should keep dispatching when a handler throws and report the error', () => {
    const onHandlerError = vi.fn();
    const bus = new EventBus({ onHandlerError });
    const failure = new Error('subscriber broke');
    const after = vi.fn();
    const wildcard = vi.fn();

    bus.on('value:accepted', () => {
      throw failure;
    });
    bus.on('value:accepted', after);
    bus.onAny(wildcard);

    const event = accepted();
    expect(() => bus.emit(event)).not.toThrow();

    expect(after).toHaveBeenCalledOnce();
    expect(wildcard).toHaveBeenCalledOnce();
    expect(onHandlerError).toHaveBeenCalledWith(failure, event);
  });

  it('should emit a process warning for handler errors by default', () => {
    const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    const bus = new EventBus();
    bus.on('value:accepted', () => {
      throw new Error('boom');
    });

    bus.emit(accepted());

    expect(warn).toHaveBeenCalledWith("Handler for 'value:accepted' threw: boom", 'EventHandlerWarning');
    warn.mockRestore();
  });
});
