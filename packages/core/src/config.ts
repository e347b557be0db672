/**
 * Tunables applied to a running simulation. Updates take effect on the tick
 * after they are applied on the simulation's executor.
 */
export interface SimulationConfiguration {
  /**
   * Scale applied to wall-clock time before it reaches the update step.
   * Values above 1 speed the simulation up, values below 1 slow it down.
   *
   * @defaultValue `1`
   */
  readonly timeMultiplier: number;
}

export interface EngineConfig {
  /**
   * Interval of the periodic tick timer in milliseconds.
   *
   * @defaultValue `1000`
   */
  readonly tickIntervalMs: number;
  readonly simulation: SimulationConfiguration;
}

export type EngineConfigOverrides = Readonly<{
  readonly tickIntervalMs?: number;
  readonly simulation?: Partial<SimulationConfiguration>;
}>;

export const DEFAULT_SIMULATION_CONFIGURATION: SimulationConfiguration =
  Object.freeze({
    timeMultiplier: 1,
  });

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  tickIntervalMs: 1000,
  simulation: DEFAULT_SIMULATION_CONFIGURATION,
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toPositiveNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric <= 0) {
    return undefined;
  }
  return numeric;
}

export function isValidTimeMultiplier(value: unknown): value is number {
  return toPositiveNumber(value) !== undefined;
}

export function resolveSimulationConfiguration(
  overrides: Partial<SimulationConfiguration> | undefined,
  fallback: SimulationConfiguration = DEFAULT_SIMULATION_CONFIGURATION,
): SimulationConfiguration {
  const source = overrides ?? {};
  return Object.freeze({
    timeMultiplier:
      toPositiveNumber(source.timeMultiplier) ?? fallback.timeMultiplier,
  });
}

export function resolveEngineConfig(
  overrides?: EngineConfigOverrides,
): EngineConfig {
  return Object.freeze({
    tickIntervalMs:
      toPositiveNumber(overrides?.tickIntervalMs) ??
      DEFAULT_ENGINE_CONFIG.tickIntervalMs,
    simulation: resolveSimulationConfiguration(overrides?.simulation),
  });
}
