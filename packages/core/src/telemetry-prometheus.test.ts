import { describe, expect, it, vi } from 'vitest';
import { Registry } from 'prom-client';

import { createPrometheusTelemetry } from './telemetry-prometheus.js';

function createTestTelemetry(registry: Registry) {
  return createPrometheusTelemetry({
    registry,
    collectDefaultMetrics: false,
    prefix: 'test_',
    log: false,
  });
}

async function metricValues(registry: Registry, name: string) {
  return (await registry.getSingleMetric(name)?.get())?.values ?? [];
}

describe('createPrometheusTelemetry', () => {
  it('counts ticks and simulated seconds', async () => {
    const registry = new Registry();
    const telemetry = createTestTelemetry(registry);

    telemetry.recordTick(1);
    telemetry.recordTick(2.5);
    telemetry.recordTick();
    telemetry.recordTick(Number.NaN);

    expect((await metricValues(registry, 'test_simulation_ticks_total'))[0]?.value).toBe(4);
    expect(
      (await metricValues(registry, 'test_simulation_simulated_seconds_total'))[0]?.value,
    ).toBe(3.5);
  });

  it('counts errors and warnings per event', async () => {
    const registry = new Registry();
    const telemetry = createTestTelemetry(registry);

    telemetry.recordError('MissingResourceComponent', { resourceId: 'gold' });
    telemetry.recordError('MissingResourceComponent', { resourceId: 'gems' });
    telemetry.recordWarning('TickDiscarded');

    expect(await metricValues(registry, 'test_telemetry_errors_total')).toEqual([
      expect.objectContaining({
        value: 2,
        labels: { event: 'MissingResourceComponent' },
      }),
    ]);
    expect(await metricValues(registry, 'test_telemetry_warnings_total')).toEqual([
      expect.objectContaining({ value: 1, labels: { event: 'TickDiscarded' } }),
    ]);
  });

  it('tracks accepted and rejected upgrade purchases', async () => {
    const registry = new Registry();
    const telemetry = createTestTelemetry(registry);

    telemetry.recordProgress('UpgradePurchased', { level: 1 });
    telemetry.recordProgress('UpgradePurchased', { level: 2 });
    telemetry.recordProgress('SimulationPaused');
    telemetry.recordWarning('InsufficientFunds', { resourceId: 'gold' });

    expect(
      (await metricValues(registry, 'test_simulation_upgrade_purchases_total'))[0]?.value,
    ).toBe(2);
    expect(
      (await metricValues(registry, 'test_simulation_upgrade_purchases_rejected_total'))[0]
        ?.value,
    ).toBe(1);
  });

  it('keeps the latest finite value of each reported counter', async () => {
    const registry = new Registry();
    const telemetry = createTestTelemetry(registry);

    telemetry.recordCounters('simulation', { listeners: 2, pending: 5 });
    telemetry.recordCounters('simulation', { listeners: 3, pending: Number.NaN });

    expect(await metricValues(registry, 'test_simulation_counter')).toEqual(
      expect.arrayContaining([
        expect.objectContaining({
          value: 3,
          labels: { group: 'simulation', counter: 'listeners' },
        }),
        expect.objectContaining({
          value: 5,
          labels: { group: 'simulation', counter: 'pending' },
        }),
      ]),
    );
  });

  it('logs events to the console unless disabled', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    try {
      createPrometheusTelemetry({
        registry: new Registry(),
        collectDefaultMetrics: false,
      }).recordWarning('TickDiscarded', { delta: 0 });
      createTestTelemetry(new Registry()).recordWarning('TickDiscarded');

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith('[telemetry:warning] TickDiscarded', {
        delta: 0,
      });
    } finally {
      warnSpy.mockRestore();
    }
  });
});
