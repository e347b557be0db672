/* eslint-disable no-console */

import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import type { TelemetryEventData, TelemetryFacade } from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
  /** Log events to the console in addition to counting them. */
  readonly log?: boolean;
}

const DEFAULT_PREFIX = 'tickwork_';

const PURCHASE_EVENT = 'UpgradePurchased';
const INSUFFICIENT_FUNDS_EVENT = 'InsufficientFunds';

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const log = options.log ?? true;

  if (options.collectDefaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const errors = new Counter({
    name: `${prefix}telemetry_errors_total`,
    help: 'Total number of telemetry errors emitted by the simulation.',
    registers: [registry],
    labelNames: ['event'],
  });

  const warnings = new Counter({
    name: `${prefix}telemetry_warnings_total`,
    help: 'Total number of telemetry warnings emitted by the simulation.',
    registers: [registry],
    labelNames: ['event'],
  });

  const ticks = new Counter({
    name: `${prefix}simulation_ticks_total`,
    help: 'Total number of update steps applied by the simulation.',
    registers: [registry],
  });

  const simulatedSeconds = new Counter({
    name: `${prefix}simulation_simulated_seconds_total`,
    help: 'Total simulated seconds, fast-forwards included.',
    registers: [registry],
  });

  const purchases = new Counter({
    name: `${prefix}simulation_upgrade_purchases_total`,
    help: 'Total number of successful upgrade purchases.',
    registers: [registry],
  });

  const rejectedPurchases = new Counter({
    name: `${prefix}simulation_upgrade_purchases_rejected_total`,
    help: 'Total number of upgrade purchases rejected for insufficient funds.',
    registers: [registry],
  });

  const counterGauge = new Gauge({
    name: `${prefix}simulation_counter`,
    help: 'Latest value of each counter group reported by the simulation.',
    registers: [registry],
    labelNames: ['group', 'counter'],
  });

  const logError = createConsoleLogger('error', log);
  const logWarning = createConsoleLogger('warn', log);
  const logInfo = createConsoleLogger('info', log);

  const facade: PrometheusTelemetryFacade = {
    recordError(event: string, data?: TelemetryEventData) {
      errors.inc({ event });
      logError(`[telemetry:error] ${event}`, data);
    },
    recordWarning(event: string, data?: TelemetryEventData) {
      warnings.inc({ event });
      if (event === INSUFFICIENT_FUNDS_EVENT) {
        rejectedPurchases.inc();
      }
      logWarning(`[telemetry:warning] ${event}`, data);
    },
    recordProgress(event: string, data?: TelemetryEventData) {
      if (event === PURCHASE_EVENT) {
        purchases.inc();
      }
      logInfo(`[telemetry:progress] ${event}`, data);
    },
    recordCounters(group: string, counters: Readonly<Record<string, number>>) {
      for (const [counter, value] of Object.entries(counters)) {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          continue;
        }
        counterGauge.set({ group, counter }, value);
      }
    },
    recordTick(deltaSeconds?: number) {
      ticks.inc();
      if (
        typeof deltaSeconds === 'number' &&
        Number.isFinite(deltaSeconds) &&
        deltaSeconds > 0
      ) {
        simulatedSeconds.inc(deltaSeconds);
      }
    },
    registry,
  };

  return facade;
}

type ConsoleMethod = (message?: unknown, ...optionalParams: unknown[]) => void;

function createConsoleLogger<
  TMethod extends 'error' | 'warn' | 'info',
>(method: TMethod, enabled: boolean): ConsoleMethod {
  if (enabled && typeof console?.[method] === 'function') {
    return console[method].bind(console);
  }
  return () => {};
}
