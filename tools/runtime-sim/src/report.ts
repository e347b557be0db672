import {
  createGenerator,
  createResource,
  createUpgrade,
  exponentialCurve,
  linearCurve,
} from '@tickwork/content-schema';
import {
  formatNumber,
  Simulation,
  type TelemetryFacade,
} from '@tickwork/core';

export const DEFAULT_SECONDS = 60;
export const DEFAULT_LEVEL = 0;
export const DEFAULT_MULTIPLIER = 1;

export interface CliArgs {
  seconds: number;
  level: number;
  multiplier: number;
}

export type ParsedArgs =
  | { readonly kind: 'run'; readonly args: CliArgs }
  | { readonly kind: 'help' }
  | { readonly kind: 'error'; readonly message: string };

export const USAGE =
  `Usage: tsx tools/runtime-sim/src/index.ts [options]\n\n` +
  `Options:\n` +
  `  --seconds <n>      Simulated seconds to fast-forward (default: ${DEFAULT_SECONDS})\n` +
  `  --level <n>        Miner level bought before fast-forwarding (default: ${DEFAULT_LEVEL})\n` +
  `  --multiplier <n>   Time multiplier applied to the run (default: ${DEFAULT_MULTIPLIER})\n` +
  `  --help, -h         Show this message\n`;

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args: CliArgs = {
    seconds: DEFAULT_SECONDS,
    level: DEFAULT_LEVEL,
    multiplier: DEFAULT_MULTIPLIER,
  };

  const iterator = argv[Symbol.iterator]();
  for (let entry = iterator.next(); !entry.done; entry = iterator.next()) {
    const arg = entry.value;
    if (arg === '--seconds') {
      args.seconds = Number(iterator.next().value);
    } else if (arg === '--level') {
      args.level = Number(iterator.next().value);
    } else if (arg === '--multiplier') {
      args.multiplier = Number(iterator.next().value);
    } else if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    } else {
      return { kind: 'error', message: `Unknown option: ${arg}` };
    }
  }

  if (!Number.isFinite(args.seconds) || args.seconds <= 0) {
    return { kind: 'error', message: '--seconds <n> must be a positive number' };
  }
  if (!Number.isInteger(args.level) || args.level < 0) {
    return { kind: 'error', message: '--level <n> must be a non-negative integer' };
  }
  if (!Number.isFinite(args.multiplier) || args.multiplier <= 0) {
    return { kind: 'error', message: '--multiplier <n> must be a positive number' };
  }

  return { kind: 'run', args };
}

/** Blueprints for the demo economy the report runs. */
export function createDemoEconomy() {
  const gold = createResource({ id: 'gold', displayName: 'Gold' });
  const miner = createGenerator({
    id: 'miner',
    resource: gold,
    curve: linearCurve(1, 1),
    flags: { automatic: true },
  });
  const minerUpgrade = createUpgrade({
    id: 'miner-upgrade',
    target: miner,
    costs: [{ resource: gold, curve: exponentialCurve(10) }],
  });

  return { gold, miner, minerUpgrade };
}

export interface ReportEntry {
  readonly id: string;
  readonly value: number;
  readonly display: string;
}

export interface SimulationReport {
  readonly seconds: number;
  readonly multiplier: number;
  readonly simulatedSeconds: number;
  readonly level: number;
  readonly production: ReportEntry;
  readonly nextUpgradeCost: ReportEntry;
  readonly resources: readonly ReportEntry[];
}

function entry(id: string, value: number): ReportEntry {
  return { id, value, display: formatNumber(value) };
}

/**
 * Buys `level` miner upgrades with granted gold, empties the balance and
 * fast-forwards `seconds * multiplier` simulated seconds.
 */
export async function runReport(
  args: CliArgs,
  telemetry?: TelemetryFacade,
): Promise<SimulationReport> {
  const economy = createDemoEconomy();
  const simulation = new Simulation({
    name: 'runtime-sim',
    config: { simulation: { timeMultiplier: args.multiplier } },
    telemetry,
  });

  try {
    await simulation.registerAll([economy.gold, economy.miner, economy.minerUpgrade]);

    for (let level = 0; level < args.level; level += 1) {
      const { costs } = await simulation.info(economy.minerUpgrade);
      for (const cost of costs) {
        await simulation.grant(economy.gold, cost.amount);
      }
      const purchase = await simulation.upgrade(economy.minerUpgrade);
      if (!purchase.success) {
        throw new Error(purchase.error.message);
      }
    }
    await simulation.setValue(economy.gold, 0);

    const simulatedSeconds = args.seconds * simulation.getConfiguration().timeMultiplier;
    simulation.fastForward(simulatedSeconds);

    const info = await simulation.info(economy.minerUpgrade);
    const snapshot = await simulation.snapshot();

    return {
      seconds: args.seconds,
      multiplier: snapshot.configuration.timeMultiplier,
      simulatedSeconds: snapshot.totalDuration,
      level: info.level,
      production: entry('miner', info.value),
      nextUpgradeCost: entry('gold', info.costs[0]?.amount ?? 0),
      resources: snapshot.resources.map((resource) => entry(resource.id, resource.value)),
    };
  } finally {
    simulation.dispose();
  }
}
