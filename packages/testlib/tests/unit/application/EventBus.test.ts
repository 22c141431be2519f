import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { CheckStartedEvent, CheckSkippedEvent } from '../../../src/domain/events/HarnessEvents.js';

function started(check = 'elements'): CheckStartedEvent {
  return { type: 'check:started', collection: 'numbers', check, timestamp: 1000 };
}

function skipped(): CheckSkippedEvent {
  return {
    type: 'check:skipped',
    collection: 'numbers',
    check: 'nullable',
    reason: 'requires feature ALLOWS_NULL_VALUES',
    timestamp: 1000,
  };
}

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('check:started', handler);
    const event = started();
    bus.emit(event);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('check:started', handler);
    bus.emit(skipped());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const first = vi.fn();
    const second = vi.fn();

    bus.on('check:started', first);
    bus.on('check:started', second);
    bus.emit(started());

    expect(first).toHaveBeenCalledOnce();
    expect(second).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('check:started', handler);
    bus.off('check:started', handler);
    bus.emit(started());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should leave other handlers subscribed when one is removed', () => {
    const bus = new EventBus();
    const removed = vi.fn();
    const kept = vi.fn();

    bus.on('check:started', removed);
    bus.on('check:started', kept);
    bus.off('check:started', removed);
    bus.emit(started());

    expect(removed).not.toHaveBeenCalled();
    expect(kept).toHaveBeenCalledOnce();
  });

  it('should report a throwing handler to onHandlerError and keep dispatching', () => {
    const onHandlerError = vi.fn();
    const bus = new EventBus(onHandlerError);
    const failure = new Error('handler exploded');
    const after = vi.fn();

    bus.on('check:started', () => {
      throw failure;
    });
    bus.on('check:started', after);

    const event = started();
    expect(() => {
      bus.emit(event);
    }).not.toThrow();

    expect(after).toHaveBeenCalledOnce();
    expect(onHandlerError).toHaveBeenCalledOnce();
    expect(onHandlerError).toHaveBeenCalledWith(failure, event);
  });

  it('should emit a process warning for handler errors by default', () => {
    const warn = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    const bus = new EventBus();

    bus.on('check:started', () => {
      throw new Error('handler exploded');
    });
    bus.emit(started());

    expect(warn).toHaveBeenCalledWith("Subscriber for 'check:started' threw: handler exploded", 'HarnessEventWarning');
    warn.mockRestore();
  });

  it('should do nothing when emitting an event with no handlers', () => {
    const bus = new EventBus();

    expect(() => {
      bus.emit(started());
    }).not.toThrow();
  });

  it('should call onAny handlers for every event type', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    const first = started();
    const second = skipped();
    bus.emit(first);
    bus.emit(second);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenNthCalledWith(1, first);
    expect(handler).toHaveBeenNthCalledWith(2, second);
  });

  it('should remove onAny handlers with offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(started());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should isolate throwing onAny handlers', () => {
    const onHandlerError = vi.fn();
    const bus = new EventBus(onHandlerError);
    const good = vi.fn();

    bus.onAny(() => {
      throw new Error('wildcard exploded');
    });
    bus.onAny(good);
    bus.emit(started());

    expect(good).toHaveBeenCalledOnce();
    expect(onHandlerError).toHaveBeenCalledOnce();
  });

  it('should call typed handlers before wildcard handlers', () => {
    const bus = new EventBus();
    const calls: string[] = [];

    bus.onAny(() => calls.push('wildcard'));
    bus.on('check:started', () => calls.push('typed'));
    bus.emit(started());

    expect(calls).toEqual(['typed', 'wildcard']);
  });
});
