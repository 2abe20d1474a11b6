/**
 * Scenario simulator
 *
 * Replays host-level timer requests and frame ticks against the timing
 * module on a virtual host, and records every outbound call and run-state
 * change with the virtual time it happened at.
 */

import { z } from 'zod';
import { BatchedBridge } from '../host/bridge/BatchedBridge';
import { DisplayLink } from '../host/frame/DisplayLink';
import { AppLifecycle } from '../host/lifecycle/AppLifecycle';
import { Timing } from '../host/timing/Timing';
import type { TimingState } from '../host/timing/types';
import { VirtualHost } from '../host/virtual';
import { ScenarioError } from '../shared/errors';
import { silentLogger } from '../shared/logger';
import type { JSTimersModule, Logger, TimerId } from '../shared/types';
import { JS_TIMERS_MODULE } from '../shared/types';

const at = z.number().nonnegative();

const ScenarioEventSchema = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('create'),
    at,
    id: z.number().int(),
    duration: z.number().nonnegative(),
    repeats: z.boolean().default(false),
    /** Guest clock reading; defaults to `at` (no scheduling overhead) */
    schedulingTimestamp: z.number().optional(),
  }),
  z.object({ op: z.literal('delete'), at, id: z.number().int() }),
  z.object({ op: z.literal('idle'), at, enabled: z.boolean() }),
  z.object({ op: z.literal('tick'), at }),
  z.object({ op: z.literal('advance'), at }),
  z.object({ op: z.literal('terminate'), at }),
]);

const ScenarioSchema = z.object({
  frameDurationMs: z.number().positive().optional(),
  minimumSleepIntervalMs: z.number().nonnegative().optional(),
  events: z.array(ScenarioEventSchema),
});

export type ScenarioEvent = z.infer<typeof ScenarioEventSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;

export type SimulationRecord =
  | { at: number; kind: 'callTimers'; timerIds: TimerId[] }
  | { at: number; kind: 'callIdleCallbacks'; frameStartMs: number }
  | { at: number; kind: 'state'; from: TimingState; to: TimingState };

export interface SimulationOptions {
  debug?: boolean;
  logger?: Logger;
}

/**
 * Validate parsed JSON as a scenario
 */
export function parseScenario(input: unknown): Scenario {
  const result = ScenarioSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ScenarioError(`Invalid scenario: ${details}`);
  }
  return result.data;
}

export function runScenario(
  scenario: Scenario,
  options: SimulationOptions = {}
): SimulationRecord[] {
  const logger = options.logger ?? silentLogger;
  const host = new VirtualHost();
  const records: SimulationRecord[] = [];

  const recorder: JSTimersModule = {
    callTimers(timerIds) {
      records.push({ at: host.now(), kind: 'callTimers', timerIds: [...timerIds] });
    },
    callIdleCallbacks(frameStartMs) {
      records.push({ at: host.now(), kind: 'callIdleCallbacks', frameStartMs });
    },
  };

  const bridge = new BatchedBridge({ scheduleFlush: host.scheduleFlush, logger });
  bridge.registerCallableModule(JS_TIMERS_MODULE, recorder);
  const lifecycle = new AppLifecycle(logger);
  const displayLink = new DisplayLink({ queue: host.queue, logger });
  const timing = new Timing({
    clock: host,
    queue: host.queue,
    wakeTimers: host.wakeTimers,
    frameDurationMs: scenario.frameDurationMs,
    minimumSleepIntervalMs: scenario.minimumSleepIntervalMs,
    debug: options.debug,
    logger,
  });
  timing.attach(bridge, lifecycle);
  displayLink.registerObserver(timing);

  let state = timing.state;
  const observeState = () => {
    const next = timing.state;
    if (next !== state) {
      records.push({ at: host.now(), kind: 'state', from: state, to: next });
      state = next;
    }
  };

  // Stable: events sharing a time keep file order
  const events = [...scenario.events].sort((a, b) => a.at - b.at);
  for (const event of events) {
    let wakeAt = host.nextWakeAt;
    while (wakeAt !== null && wakeAt <= event.at) {
      host.advanceTo(wakeAt);
      observeState();
      wakeAt = host.nextWakeAt;
    }
    host.advanceTo(event.at);
    observeState();

    switch (event.op) {
      case 'create':
        timing.createTimer(
          event.id,
          event.duration,
          event.schedulingTimestamp ?? event.at,
          event.repeats
        );
        break;
      case 'delete':
        timing.deleteTimer(event.id);
        break;
      case 'idle':
        timing.setSendIdleEvents(event.enabled);
        break;
      case 'tick':
        displayLink.step(event.at);
        break;
      case 'terminate':
        lifecycle.emit('willTerminate');
        break;
      case 'advance':
        break;
    }

    host.drain();
    observeState();
  }

  timing.invalidate();
  displayLink.invalidate();
  bridge.invalidate();
  return records;
}

/**
 * One line per record: `t=<time> <what>`
 */
export function formatRecord(record: SimulationRecord): string {
  switch (record.kind) {
    case 'callTimers':
      return `t=${record.at} callTimers ${JSON.stringify(record.timerIds)}`;
    case 'callIdleCallbacks':
      return `t=${record.at} callIdleCallbacks ${record.frameStartMs}`;
    case 'state':
      return `t=${record.at} state ${record.from} -> ${record.to}`;
  }
}
