/**
 * EventEmitter Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter, type EventMap } from './EventEmitter';
import { Logger, LogLevel } from './Logger';

interface TestEvents extends EventMap {
  fileNameChanged: string;
  progress: number;
  frame: { width: number; height: number };
}

describe('EventEmitter', () => {
  let emitter: EventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new EventEmitter<TestEvents>();
  });

  describe('on', () => {
    it('EVT-001: subscribes to event', () => {
      const listener = vi.fn();
      emitter.on('fileNameChanged', listener);

      emitter.emit('fileNameChanged', 'render_a');
      expect(listener).toHaveBeenCalledWith('render_a');
    });

    it('EVT-002: multiple listeners for same event', () => {
      const listener1 = vi.fn();
      const listener2 = vi.fn();

      emitter.on('progress', listener1);
      emitter.on('progress', listener2);

      emitter.emit('progress', 0.5);
      expect(listener1).toHaveBeenCalledWith(0.5);
      expect(listener2).toHaveBeenCalledWith(0.5);
    });

    it('returns unsubscribe function', () => {
      const listener = vi.fn();
      const unsubscribe = emitter.on('fileNameChanged', listener);

      emitter.emit('fileNameChanged', 'first');
      unsubscribe();
      emitter.emit('fileNameChanged', 'second');
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('passes object payloads by reference', () => {
      const listener = vi.fn();
      emitter.on('frame', listener);

      const frame = { width: 4, height: 2 };
      emitter.emit('frame', frame);

      expect(listener.mock.calls[0]?.[0]).toBe(frame);
    });
  });

  describe('off', () => {
    it('EVT-003: only removes the given listener', () => {
      const listener1 = vi.fn();
      const listener2 = vi.fn();

      emitter.on('progress', listener1);
      emitter.on('progress', listener2);

      emitter.off('progress', listener1);
      emitter.emit('progress', 1);

      expect(listener1).not.toHaveBeenCalled();
      expect(listener2).toHaveBeenCalledWith(1);
    });

    it('handles removing from non-existent event', () => {
      expect(() => emitter.off('progress', vi.fn())).not.toThrow();
    });
  });

  describe('emit', () => {
    let sink: ReturnType<typeof vi.fn>;

    beforeEach(() => {
      sink = vi.fn();
      Logger.setSink(sink);
    });

    afterEach(() => {
      Logger.setSink(null);
      Logger.setLevel(LogLevel.DEBUG);
    });

    it('does not throw for event with no listeners', () => {
      expect(() => emitter.emit('fileNameChanged', 'nobody')).not.toThrow();
    });

    it('EVT-004: logs a throwing listener and keeps delivering', () => {
      const failure = new Error('listener failed');
      const failing = vi.fn(() => {
        throw failure;
      });
      const normal = vi.fn();

      emitter.on('fileNameChanged', failing);
      emitter.on('fileNameChanged', normal);
      emitter.emit('fileNameChanged', 'x');

      expect(normal).toHaveBeenCalledWith('x');
      expect(sink).toHaveBeenCalledWith(
        LogLevel.ERROR,
        '[EventEmitter]',
        'Listener for "fileNameChanged" threw:',
        failure,
      );
    });
  });

  describe('once', () => {
    it('EVT-005: fires only once', () => {
      const listener = vi.fn();
      emitter.once('progress', listener);

      emitter.emit('progress', 1);
      emitter.emit('progress', 2);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(1);
    });

    it('returns unsubscribe function', () => {
      const listener = vi.fn();
      const unsubscribe = emitter.once('progress', listener);

      unsubscribe();
      emitter.emit('progress', 3);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('removeAllListeners', () => {
    it('EVT-007: removes listeners for one event', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('fileNameChanged', a);
      emitter.on('progress', b);

      emitter.removeAllListeners('fileNameChanged');
      emitter.emit('fileNameChanged', 'x');
      emitter.emit('progress', 5);

      expect(a).not.toHaveBeenCalled();
      expect(b).toHaveBeenCalledWith(5);
    });

    it('EVT-008: removes every listener when no event given', () => {
      const a = vi.fn();
      emitter.on('frame', a);
      emitter.removeAllListeners();
      emitter.emit('frame', { width: 1, height: 1 });
      expect(a).not.toHaveBeenCalled();
    });
  });

  it('handles listener that removes itself', () => {
    let unsubscribe: () => void = () => {};
    const listener = vi.fn(() => {
      unsubscribe();
    });
    unsubscribe = emitter.on('progress', listener);

    emitter.emit('progress', 1);
    emitter.emit('progress', 2);

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
