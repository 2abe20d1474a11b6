import { afterEach, describe, expect, test, vi } from 'vitest';
import { InvariantError } from '../../shared/errors';
import { silentLogger } from '../../shared/logger';
import type { TimerId } from '../../shared/types';
import type { MethodQueue } from '../clock/MethodQueue';
import { inlineQueue } from '../clock/MethodQueue';
import type { WakeTimerHost } from '../clock/WakeTimers';
import { createNodeWakeTimers, MAX_TIMEOUT_DELAY_MS } from '../clock/WakeTimers';
import { DisplayLink } from '../frame/DisplayLink';
import { AppLifecycle } from '../lifecycle/AppLifecycle';
import { VirtualHost } from '../virtual';
import { Timing } from './Timing';
import type { TimingBridge, TimingOptions } from './types';

interface RecordedCall {
  method: string;
  args: unknown[];
}

function setup(options: TimingOptions = {}) {
  const host = new VirtualHost();
  const calls: RecordedCall[] = [];
  const bridge: TimingBridge = {
    enqueueJSCall: (_module, method, args) => calls.push({ method, args }),
    immediatelyCallTimer: (id) => calls.push({ method: 'immediatelyCallTimer', args: [id] }),
  };
  const lifecycle = new AppLifecycle(silentLogger);
  const timing = new Timing({
    clock: host,
    queue: host.queue,
    wakeTimers: host.wakeTimers,
    logger: silentLogger,
    ...options,
  });
  timing.attach(bridge, lifecycle);
  const displayLink = new DisplayLink({ queue: host.queue, logger: silentLogger });
  displayLink.registerObserver(timing);

  /** Move the clock to `time` and deliver a display frame there */
  const tick = (time: number) => {
    host.advanceTo(time);
    displayLink.step(time);
  };
  const timerBatches = () =>
    calls.filter((call) => call.method === 'callTimers').map((call) => call.args[0]);

  return { host, timing, calls, lifecycle, displayLink, tick, timerBatches };
}

describe('Timing', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('attach()', () => {
    test('should throw when attached a second time', () => {
      const { timing } = setup();
      const bridge: TimingBridge = { enqueueJSCall: () => {}, immediatelyCallTimer: () => {} };

      expect(() => timing.attach(bridge)).toThrow(InvariantError);
    });

    test('should ignore inbound calls before being attached', () => {
      const timing = new Timing({ logger: silentLogger });
      timing.createTimer(1, 100, 0, false);

      expect(timing.getStats().timers).toBe(0);
    });
  });

  describe('createTimer()', () => {
    test('should fire a one-shot exactly once, on the first tick at or after its target', () => {
      const { timing, tick, timerBatches } = setup();
      timing.createTimer(1, 100, 0, false);

      tick(99);
      expect(timerBatches()).toEqual([]);

      tick(101);
      expect(timerBatches()).toEqual([[1]]);
      expect(timing.getTimer(1)).toBeUndefined();

      tick(150);
      expect(timerBatches()).toEqual([[1]]);
    });

    test('should reschedule repeating timers from the tick time without catching up', () => {
      const { timing, tick, timerBatches } = setup();
      timing.createTimer(1, 100, 0, true);

      // Scheduler running 250ms behind
      tick(350);
      expect(timerBatches()).toEqual([[1]]);
      expect(timing.getTimer(1)?.targetTime).toBe(450);

      tick(449);
      expect(timerBatches()).toEqual([[1]]);

      tick(450);
      expect(timerBatches()).toEqual([[1], [1]]);
    });

    test('should run short intervals every frame', () => {
      const { timing, tick, timerBatches } = setup();
      timing.createTimer(1, 10, 0, true);

      tick(10);
      tick(26);
      tick(42);

      expect(timerBatches()).toEqual([[1], [1], [1]]);
      expect(timing.getTimer(1)?.targetTime).toBe(42);
    });

    test('should send zero-delay one-shots immediately without registering them', () => {
      const { timing, calls } = setup();
      timing.createTimer(5, 0, 0, false);

      expect(calls).toEqual([{ method: 'immediatelyCallTimer', args: [5] }]);
      expect(timing.getTimer(5)).toBeUndefined();
      expect(timing.getStats().timers).toBe(0);
      expect(timing.state).toBe('idle');
    });

    test('should subtract the scheduling overhead from the duration', () => {
      const { host, timing } = setup();
      host.advanceTo(40);

      timing.createTimer(1, 100, 0, false);
      // Guest clock ahead of the host: no negative overhead
      timing.createTimer(2, 100, 1000, false);

      expect(timing.getTimer(1)?.targetTime).toBe(100);
      expect(timing.getTimer(2)?.targetTime).toBe(140);
    });

    test('should treat negative and non-finite durations as zero', () => {
      const { timing, calls } = setup();
      timing.createTimer(1, -50, 0, false);
      timing.createTimer(2, Number.NaN, 0, false);

      expect(calls).toEqual([
        { method: 'immediatelyCallTimer', args: [1] },
        { method: 'immediatelyCallTimer', args: [2] },
      ]);
    });

    test('should start ticking for a near-term timer', () => {
      const { timing, displayLink } = setup();
      timing.createTimer(1, 500, 0, false);

      expect(timing.state).toBe('active');
      expect(displayLink.isRunning).toBe(true);
    });
  });

  describe('dispatch order', () => {
    test('should order a batch by target time', () => {
      const { timing, tick, timerBatches } = setup();
      timing.createTimer(3, 200, 0, false);
      timing.createTimer(4, 150, 0, false);

      tick(200);

      expect(timerBatches()).toEqual([[4, 3]]);
    });

    test('should keep registration order for equal targets', () => {
      const { timing, tick, timerBatches } = setup();
      timing.createTimer(2, 100, 0, false);
      timing.createTimer(1, 100, 0, false);

      tick(100);

      expect(timerBatches()).toEqual([[2, 1]]);
    });

    test('should fire an interval and a timeout registered together by target time', () => {
      const { timing, tick, timerBatches } = setup();
      timing.createTimer(1, 100, 0, true);
      timing.createTimer(2, 250, 0, false);

      tick(100);
      tick(200);
      tick(300);

      // At 300 the timeout (target 250) is older than the interval (target 300)
      expect(timerBatches()).toEqual([[1], [1], [2, 1]]);
      expect(timing.getTimer(2)).toBeUndefined();
      expect(timing.getTimer(1)?.targetTime).toBe(400);
    });

    test('should still fire a timer deleted while its batch is being sent', () => {
      const host = new VirtualHost();
      const batches: TimerId[][] = [];
      const timing: Timing = new Timing({
        clock: host,
        queue: host.queue,
        wakeTimers: host.wakeTimers,
        logger: silentLogger,
      });
      timing.attach({
        enqueueJSCall: (_module, _method, args) => {
          const ids = args[0];
          if (Array.isArray(ids)) batches.push(ids.filter((id) => typeof id === 'number'));
          timing.deleteTimer(1);
        },
        immediatelyCallTimer: () => {},
      });
      timing.createTimer(1, 100, 0, true);

      host.advanceTo(100);
      timing.didUpdateFrame({ timestamp: 100, deltaTime: 0 });

      expect(batches).toEqual([[1]]);
      expect(timing.getTimer(1)).toBeUndefined();
    });
  });

  describe('deleteTimer()', () => {
    test('should be idempotent and ignore unknown ids', () => {
      const { timing } = setup();
      timing.createTimer(1, 100, 0, false);

      timing.deleteTimer(1);
      timing.deleteTimer(1);
      timing.deleteTimer(42);

      expect(timing.getStats().timers).toBe(0);
    });

    test('should prevent a pending timer from firing', () => {
      const { timing, tick, timerBatches } = setup();
      timing.createTimer(1, 100, 0, false);
      timing.deleteTimer(1);

      tick(100);

      expect(timerBatches()).toEqual([]);
    });
  });

  describe('sleeping', () => {
    test('should arm one wake-up for a far-future timer instead of ticking', () => {
      const { host, timing, displayLink } = setup();
      timing.createTimer(1, 5000, 0, false);

      expect(timing.state).toBe('sleeping');
      expect(displayLink.isRunning).toBe(false);
      expect(timing.getStats().armedWakeDeadline).toBe(5000);
      expect(host.pendingWakeCount).toBe(1);
    });

    test('should not arm a second wake-up for a later timer', () => {
      const { host, timing } = setup();
      timing.createTimer(1, 5000, 0, false);
      timing.createTimer(2, 8000, 0, false);

      expect(timing.getStats().armedWakeDeadline).toBe(5000);
      expect(host.scheduledWakeCount).toBe(1);
    });

    test('should move the wake-up earlier for an earlier timer', () => {
      const { host, timing } = setup();
      timing.createTimer(1, 5000, 0, false);
      timing.createTimer(3, 3000, 0, false);

      expect(timing.getStats().armedWakeDeadline).toBe(3000);
      expect(host.scheduledWakeCount).toBe(1);
      expect(host.pendingWakeCount).toBe(1);
    });

    test('should fire due timers right when the wake-up fires, then go back to sleep', () => {
      const { host, timing, tick, timerBatches } = setup();
      timing.createTimer(1, 5000, 0, false);
      timing.createTimer(2, 8000, 0, false);
      timing.createTimer(3, 3000, 0, false);

      host.advanceTo(3000);
      expect(timerBatches()).toEqual([[3]]);
      expect(timing.state).toBe('active');
      expect(timing.getStats().wakeUps).toBe(1);

      tick(3016);
      expect(timing.state).toBe('sleeping');
      expect(timing.getStats().armedWakeDeadline).toBe(5000);
    });

    test('should go to sleep after a tick with nothing due and a far deadline', () => {
      const { timing, tick } = setup();
      timing.createTimer(1, 100, 0, false);
      timing.createTimer(2, 5000, 0, false);
      expect(timing.state).toBe('active');

      tick(100);
      // A timer fired this frame: stay awake one more frame
      expect(timing.state).toBe('active');

      tick(116);
      expect(timing.state).toBe('sleeping');
      expect(timing.getStats().armedWakeDeadline).toBe(5000);
    });

    test('should keep ticking while the next deadline is within the sleep threshold', () => {
      const { timing, tick } = setup();
      timing.createTimer(1, 900, 0, false);

      tick(16);

      expect(timing.state).toBe('active');
    });

    test('should wake up for a near-term timer registered while sleeping', () => {
      const { host, timing, tick, timerBatches } = setup();
      timing.createTimer(1, 5000, 0, false);
      timing.createTimer(2, 500, 0, false);
      expect(timing.state).toBe('active');

      tick(500);
      tick(516);
      expect(timing.state).toBe('sleeping');
      expect(host.pendingWakeCount).toBe(1);

      host.advanceTo(5000);
      expect(timerBatches()).toEqual([[2], [1]]);
    });

    test('should wake once for a deadline beyond the setTimeout range', () => {
      vi.useFakeTimers();
      vi.setSystemTime(0);
      const clock = { now: () => Date.now() };
      const batches: unknown[] = [];
      const timing = new Timing({
        clock,
        queue: inlineQueue,
        wakeTimers: createNodeWakeTimers(clock),
        logger: silentLogger,
      });
      timing.attach({
        enqueueJSCall: (_module, _method, args) => batches.push(args[0]),
        immediatelyCallTimer: () => {},
      });
      const thirtyDays = 30 * 24 * 3600 * 1000;
      timing.createTimer(1, thirtyDays, 0, false);

      vi.advanceTimersByTime(MAX_TIMEOUT_DELAY_MS);
      expect(timing.getStats()).toMatchObject({ state: 'sleeping', wakeUps: 0, ticks: 0 });

      vi.advanceTimersByTime(thirtyDays - MAX_TIMEOUT_DELAY_MS);
      expect(timing.getStats()).toMatchObject({ wakeUps: 1, ticks: 1 });
      expect(batches).toEqual([[1]]);
      timing.invalidate();
    });

    test('should honour a custom sleep threshold', () => {
      const { timing } = setup({ minimumSleepIntervalMs: 100 });
      timing.createTimer(1, 500, 0, false);

      expect(timing.state).toBe('sleeping');
    });

    test('should hand the wake-up to the method queue before touching state', () => {
      const host = new VirtualHost();
      const tasks: Array<() => void> = [];
      const queue: MethodQueue = { dispatch: (task) => tasks.push(task) };
      const captured: { fire: (() => void) | null } = { fire: null };
      const wakeTimers: WakeTimerHost = {
        schedule(deadline, callback) {
          captured.fire = callback;
          return { fireDate: deadline, reschedule: () => {}, cancel: () => {} };
        },
      };
      const batches: unknown[] = [];
      const timing = new Timing({ clock: host, queue, wakeTimers, logger: silentLogger });
      timing.attach({
        enqueueJSCall: (_module, _method, args) => batches.push(args[0]),
        immediatelyCallTimer: () => {},
      });
      timing.createTimer(1, 5000, 0, false);
      host.advanceTo(5000);

      captured.fire?.();
      expect(tasks).toHaveLength(1);
      expect(batches).toEqual([]);
      expect(timing.state).toBe('sleeping');

      tasks.shift()?.();
      expect(batches).toEqual([[1]]);
      expect(timing.state).toBe('active');
    });
  });

  describe('idle', () => {
    test('should quiesce once the registry is empty', () => {
      const { timing, tick } = setup();
      timing.createTimer(1, 100, 0, false);

      tick(100);
      tick(116);

      expect(timing.state).toBe('idle');
      expect(timing.hasPendingTimers).toBe(false);
    });

    test('should cancel the wake-up when the last timer is deleted while sleeping', () => {
      const { host, timing } = setup();
      timing.createTimer(1, 5000, 0, false);
      timing.deleteTimer(1);

      expect(timing.state).toBe('idle');
      expect(host.pendingWakeCount).toBe(0);
    });
  });

  describe('setSendIdleEvents()', () => {
    test('should start ticking and send the frame start when the frame has time left', () => {
      const { host, timing, displayLink, calls } = setup();
      host.advanceTo(1000);

      timing.setSendIdleEvents(true);
      expect(timing.state).toBe('active');

      displayLink.step(1000);
      expect(calls).toEqual([{ method: 'callIdleCallbacks', args: [1000] }]);
    });

    test('should skip idle callbacks when the frame budget is used up', () => {
      const { host, timing, displayLink, calls } = setup();
      timing.setSendIdleEvents(true);
      host.advanceTo(1016);

      displayLink.step(1000);

      expect(calls).toEqual([]);
    });

    test('should stay awake with an empty registry until idle events are disabled', () => {
      const { timing, tick } = setup();
      timing.setSendIdleEvents(true);

      tick(16);
      expect(timing.state).toBe('active');

      timing.setSendIdleEvents(false);
      tick(32);
      expect(timing.state).toBe('idle');
    });

    test('should never send idle callbacks for a synthetic frame', () => {
      const { timing, calls } = setup();
      timing.setSendIdleEvents(true);

      timing.didUpdateFrame(null);

      expect(calls).toEqual([]);
    });
  });

  describe('lifecycle', () => {
    test('should stop ticking and release the wake-up on termination', () => {
      const { host, timing, lifecycle } = setup();
      timing.createTimer(1, 5000, 0, false);

      lifecycle.emit('willTerminate');

      expect(timing.state).toBe('idle');
      expect(host.pendingWakeCount).toBe(0);
    });

    test('should stop an active timing module on termination', () => {
      const { timing, lifecycle, displayLink } = setup();
      timing.createTimer(1, 100, 0, false);

      lifecycle.emit('willTerminate');

      expect(timing.paused).toBe(true);
      expect(displayLink.isRunning).toBe(false);
    });
  });

  describe('invalidate()', () => {
    test('should drop timers, release the wake-up and detach from lifecycle', () => {
      const { host, timing, lifecycle } = setup();
      timing.createTimer(1, 5000, 0, false);
      timing.createTimer(2, 100, 0, true);

      timing.invalidate();

      expect(timing.getStats().timers).toBe(0);
      expect(timing.state).toBe('idle');
      expect(host.pendingWakeCount).toBe(0);
      expect(lifecycle.listenerCount('willTerminate')).toBe(0);
    });

    test('should be safe to call repeatedly and ignore everything afterwards', () => {
      const { timing, calls } = setup();
      timing.invalidate();
      timing.invalidate();

      timing.createTimer(1, 0, 0, false);
      timing.createTimer(2, 100, 0, false);
      timing.setSendIdleEvents(true);
      timing.didUpdateFrame({ timestamp: 0, deltaTime: 0 });

      expect(calls).toEqual([]);
      expect(timing.getStats().timers).toBe(0);
      expect(timing.state).toBe('idle');
    });

    test('should ignore a wake-up that fires after teardown', () => {
      const host = new VirtualHost();
      const captured: { fire: (() => void) | null } = { fire: null };
      const wakeTimers: WakeTimerHost = {
        schedule(deadline, callback) {
          captured.fire = callback;
          return { fireDate: deadline, reschedule: () => {}, cancel: () => {} };
        },
      };
      const calls: unknown[] = [];
      const timing = new Timing({
        clock: host,
        queue: host.queue,
        wakeTimers,
        logger: silentLogger,
      });
      timing.attach({
        enqueueJSCall: (...args) => calls.push(args),
        immediatelyCallTimer: () => {},
      });
      timing.createTimer(1, 5000, 0, false);
      timing.invalidate();
      host.advanceTo(5000);

      captured.fire?.();

      expect(calls).toEqual([]);
      expect(timing.getStats().ticks).toBe(0);
      expect(timing.paused).toBe(true);
    });
  });
});
