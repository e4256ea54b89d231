/**
 * Unit tests for EventBus
 */

import { EventBus } from '../../src/core/EventBus';
import { EventType } from '../../src/types/events';

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  it('should deliver payloads to every subscriber', () => {
    const first = jest.fn();
    const second = jest.fn();
    eventBus.on(EventType.MAPPING_TIMEOUT, first);
    eventBus.on(EventType.MAPPING_TIMEOUT, second);

    eventBus.emit(EventType.MAPPING_TIMEOUT, { keys: 'j' });

    expect(first).toHaveBeenCalledWith({ keys: 'j' });
    expect(second).toHaveBeenCalledWith({ keys: 'j' });
  });

  it('should only deliver events of the subscribed type', () => {
    const handler = jest.fn();
    eventBus.on(EventType.RECORDING_CHANGED, handler);

    eventBus.emit(EventType.MAPPING_TIMEOUT, { keys: 'j' });

    expect(handler).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', () => {
    const handler = jest.fn();
    const unsubscribe = eventBus.on(EventType.RECORDING_CHANGED, handler);

    unsubscribe();
    eventBus.emit(EventType.RECORDING_CHANGED, { recording: true });

    expect(handler).not.toHaveBeenCalled();
  });

  it('should deliver once handlers a single time', () => {
    const handler = jest.fn();
    eventBus.once(EventType.RECORDING_CHANGED, handler);

    eventBus.emit(EventType.RECORDING_CHANGED, { recording: true });
    eventBus.emit(EventType.RECORDING_CHANGED, { recording: false });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ recording: true });
  });

  it('should keep going when a handler throws', () => {
    const consoleError = jest.spyOn(console, 'error').mockImplementation();
    const after = jest.fn();
    eventBus.on(EventType.RECORDING_CHANGED, () => {
      throw new Error('handler failed');
    });
    eventBus.on(EventType.RECORDING_CHANGED, after);

    eventBus.emit(EventType.RECORDING_CHANGED, { recording: true });

    expect(after).toHaveBeenCalled();
    expect(consoleError).toHaveBeenCalledWith(
      '[keystroke:eventBus]',
      'Handler for recording:changed failed:',
      expect.any(Error)
    );

    consoleError.mockRestore();
  });

  it('should wait for async handlers in emitAsync', async () => {
    const order: string[] = [];
    eventBus.on(EventType.RC_LOADING, async () => {
      await Promise.resolve();
      order.push('async');
    });

    await eventBus.emitAsync(EventType.RC_LOADING, { path: '.keystrokerc' });
    order.push('after');

    expect(order).toEqual(['async', 'after']);
  });

  it('should drop every subscription on clear', () => {
    const handler = jest.fn();
    eventBus.on(EventType.RECORDING_CHANGED, handler);

    eventBus.clear();
    eventBus.emit(EventType.RECORDING_CHANGED, { recording: true });

    expect(handler).not.toHaveBeenCalled();
  });
});
