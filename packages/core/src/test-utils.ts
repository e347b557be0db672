import { vi } from 'vitest';

import {
  createGenerator,
  createResource,
  createUpgrade,
  linearCurve,
} from '@tickwork/content-schema';

import type { TickDispatcher } from './simulation.js';
import type { TelemetryFacade } from './telemetry.js';

/**
 * Blueprints for a one-resource economy: a manual `tapper`, an automatic
 * `miner` and an upgrade track for each.
 */
export function createGoldEconomy() {
  const gold = createResource({ id: 'gold', displayName: 'Gold' });
  const tapper = createGenerator({
    id: 'tapper',
    resource: gold,
    curve: linearCurve(1, 1),
  });
  const tapperUpgrade = createUpgrade({
    id: 'tapper-upgrade',
    target: tapper,
    costs: [{ resource: gold, curve: linearCurve(10, 3) }],
  });
  const miner = createGenerator({
    id: 'miner',
    resource: gold,
    curve: linearCurve(1, 1),
    flags: { automatic: true },
  });
  const minerUpgrade = createUpgrade({
    id: 'miner-upgrade',
    target: miner,
    costs: [{ resource: gold, curve: { kind: 'flat', value: 10 } }],
  });

  return {
    gold,
    tapper,
    tapperUpgrade,
    miner,
    minerUpgrade,
    all: [gold, tapper, tapperUpgrade, miner, minerUpgrade] as const,
  };
}

/** Telemetry facade whose methods are all spies. */
export function createTelemetrySpy() {
  return {
    recordError: vi.fn(),
    recordWarning: vi.fn(),
    recordProgress: vi.fn(),
    recordCounters: vi.fn(),
    recordTick: vi.fn(),
  } satisfies TelemetryFacade;
}

/**
 * Dispatcher that holds tick notifications until the test flushes them.
 */
export function createQueuedDispatcher(): {
  readonly dispatch: TickDispatcher;
  readonly pending: () => number;
  readonly flush: () => void;
} {
  const queue: Array<() => void> = [];
  return {
    dispatch: (callback) => {
      queue.push(callback);
    },
    pending: () => queue.length,
    flush: () => {
      for (const callback of queue.splice(0)) {
        callback();
      }
    },
  };
}

export const runInline: TickDispatcher = (callback) => {
  callback();
};
