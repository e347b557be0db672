import { performance } from 'node:perf_hooks';

import {
  evaluateCurve,
  type Blueprint,
  type GeneratorDescription,
  type ResourceDescription,
  type UpgradeDescription,
} from '@tickwork/content-schema';

import {
  createComponentStore,
  type ComponentStore,
  type ResourceComponent,
  type SerializedComponentStore,
} from './component-store.js';
import {
  isValidTimeMultiplier,
  resolveEngineConfig,
  resolveSimulationConfiguration,
  type EngineConfig,
  type EngineConfigOverrides,
  type SimulationConfiguration,
} from './config.js';
import { SerialExecutor } from './serial-executor.js';
import {
  createSimulationError,
  type SimulationError,
  type SimulationErrorCode,
  type SimulationFailure,
} from './simulation-errors.js';
import {
  decodeSimulationSave,
  encodeSimulationSave,
  SIMULATION_SAVE_SCHEMA_VERSION,
  type SimulationSaveFormat,
} from './simulation-save.js';
import {
  createContextualTelemetry,
  telemetry as globalTelemetry,
  type TelemetryFacade,
} from './telemetry.js';

const TELEMETRY_TICK_DISCARDED = 'TickDiscarded';
const TELEMETRY_OBSERVER_FAILED = 'TickObserverFailed';
const TELEMETRY_RE_REGISTERED = 'ComponentReRegistered';
const TELEMETRY_CONFIGURATION_INVALID = 'SimulationConfigurationInvalid';
const TELEMETRY_UPGRADE_PURCHASED = 'UpgradePurchased';
const TELEMETRY_PAUSED = 'SimulationPaused';
const TELEMETRY_RESUMED = 'SimulationResumed';
const TELEMETRY_COUNTER_GROUP = 'simulation';

const MS_PER_SECOND = 1000;

export type Clock = () => number;
export type TickDispatcher = (callback: () => void) => void;
export type TickListener = () => void;
export type Unsubscribe = () => void;

export type SimulationMode = 'running' | 'paused';

export interface SimulationOptions {
  readonly name?: string;
  readonly config?: EngineConfigOverrides;
  /**
   * Monotonic clock in milliseconds used to measure elapsed time between
   * ticks. Defaults to `performance.now()`.
   */
  readonly now?: Clock;
  /**
   * Schedules tick notifications outside the simulation's executor.
   * Defaults to `setImmediate`.
   */
  readonly dispatch?: TickDispatcher;
  readonly telemetry?: TelemetryFacade;
}

export interface UpgradeCostInfo {
  readonly resourceId: string;
  readonly displayName: string;
  readonly amount: number;
}

export interface UpgradeInfo {
  /** Target curve evaluated at the current level. */
  readonly value: number;
  readonly level: number;
  /** Price of reaching the next level, one entry per cost. */
  readonly costs: readonly UpgradeCostInfo[];
}

export type PurchaseResult =
  | Readonly<{ readonly success: true; readonly level: number }>
  | SimulationFailure;

export type GenerateResult =
  | Readonly<{ readonly success: true; readonly amount: number }>
  | SimulationFailure;

export type AdjustResult =
  | Readonly<{ readonly success: true; readonly value: number }>
  | SimulationFailure;

export type SimulationSnapshot = Readonly<{
  readonly name: string;
  readonly paused: boolean;
  readonly totalDuration: number;
  readonly configuration: SimulationConfiguration;
}> &
  SerializedComponentStore;

const EMPTY_UPGRADE_INFO: UpgradeInfo = Object.freeze({
  value: 0,
  level: 0,
  costs: Object.freeze([]),
});

interface PendingDeduction {
  readonly resource: ResourceDescription;
  readonly component: ResourceComponent;
  amount: number;
}

/** Saved values waiting for their blueprint; each entry is applied once. */
interface RestoredState {
  readonly resources: Map<string, number>;
  readonly levels: Map<string, number>;
}

const defaultDispatch: TickDispatcher = (callback) => {
  setImmediate(callback);
};

const defaultClock: Clock = () => performance.now();

/**
 * Tick-driven incremental simulation.
 *
 * Every read or write of component state runs on a private
 * {@link SerialExecutor}, including the periodic tick, so timer-driven
 * updates and caller actions never interleave. Tick observers are notified
 * through a separate dispatcher once the tick that produced them has
 * finished, which lets them call back into the simulation freely.
 *
 * The simulation starts paused.
 */
export class Simulation {
  readonly name: string;
  readonly config: EngineConfig;

  private readonly executor: SerialExecutor;
  private readonly store: ComponentStore = createComponentStore();
  private readonly generators = new Map<string, GeneratorDescription>();
  /** Level components created on behalf of a generator, not an upgrade. */
  private readonly implicitLevels = new Set<string>();
  private readonly listeners = new Set<TickListener>();
  private readonly now: Clock;
  private readonly dispatch: TickDispatcher;
  private readonly telemetry: TelemetryFacade;

  private configuration: SimulationConfiguration;
  private mode: SimulationMode = 'paused';
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private lastTickTime: number;
  private elapsedSeconds = 0;
  private restored: RestoredState = {
    resources: new Map(),
    levels: new Map(),
  };

  constructor(options: SimulationOptions = {}) {
    this.name = options.name ?? 'simulation';
    this.config = resolveEngineConfig(options.config);
    this.configuration = this.config.simulation;
    this.now = options.now ?? defaultClock;
    this.dispatch = options.dispatch ?? defaultDispatch;
    this.telemetry = createContextualTelemetry(
      { simulation: this.name },
      options.telemetry ?? globalTelemetry,
    );
    this.executor = new SerialExecutor(this.name, this.telemetry);
    this.lastTickTime = this.now();
  }

  /**
   * Rebuilds a simulation from bytes produced by {@link serialize}. Restored
   * values are applied as blueprints are registered.
   *
   * @throws MalformedPersistedStateError
   */
  static restore(
    bytes: Uint8Array,
    options: SimulationOptions = {},
  ): Simulation {
    const save = decodeSimulationSave(bytes);
    const simulation = new Simulation({
      ...options,
      name: options.name ?? save.name,
    });
    simulation.hydrate(save);
    if (!save.paused) {
      simulation.resume();
    }
    return simulation;
  }

  get paused(): boolean {
    return this.mode === 'paused';
  }

  /** Simulated seconds processed so far, fast-forwards included. */
  get totalDuration(): number {
    return this.elapsedSeconds;
  }

  getConfiguration(): SimulationConfiguration {
    return this.configuration;
  }

  setPaused(paused: boolean): void {
    if (paused) {
      this.pause();
    } else {
      this.resume();
    }
  }

  pause(): void {
    if (this.mode === 'paused') {
      return;
    }
    this.mode = 'paused';
    this.stopTimer();
    this.telemetry.recordProgress(TELEMETRY_PAUSED, {
      totalDuration: this.elapsedSeconds,
    });
  }

  resume(): void {
    if (this.mode === 'running') {
      return;
    }
    this.mode = 'running';
    // Time spent paused must not reach the next tick.
    const resumedAt = this.now();
    this.executor.post(() => {
      this.lastTickTime = resumedAt;
    }, 'resume');
    this.startTimer();
    this.telemetry.recordProgress(TELEMETRY_RESUMED, {
      totalDuration: this.elapsedSeconds,
    });
  }

  /** Stops the timer and drops every tick observer. */
  dispose(): void {
    this.pause();
    this.listeners.clear();
  }

  onTick(listener: TickListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once all work queued before the call has been applied. */
  idle(): Promise<void> {
    return this.executor.idle();
  }

  register(blueprint: Blueprint): Promise<void> {
    return this.executor.run(() => {
      this.applyRegistration(blueprint);
    });
  }

  registerAll(blueprints: readonly Blueprint[]): Promise<void> {
    return this.executor.run(() => {
      for (const blueprint of blueprints) {
        this.applyRegistration(blueprint);
      }
    });
  }

  /** Simulates `seconds` of elapsed time immediately, ignoring the clock. */
  fastForward(seconds: number): void {
    this.executor.post(() => {
      if (!Number.isFinite(seconds) || seconds <= 0) {
        this.telemetry.recordWarning(TELEMETRY_TICK_DISCARDED, {
          source: 'fastForward',
          delta: seconds,
        });
        return;
      }
      this.update(seconds);
    }, 'fastForward');
  }

  updateConfiguration(configuration: Partial<SimulationConfiguration>): void {
    this.executor.post(() => {
      if (
        configuration.timeMultiplier !== undefined &&
        !isValidTimeMultiplier(configuration.timeMultiplier)
      ) {
        this.telemetry.recordWarning(TELEMETRY_CONFIGURATION_INVALID, {
          timeMultiplier: configuration.timeMultiplier,
        });
        return;
      }
      this.configuration = resolveSimulationConfiguration(
        configuration,
        this.configuration,
      );
    }, 'updateConfiguration');
  }

  value(resource: ResourceDescription): Promise<number> {
    return this.executor.run(() => {
      const component = this.store.getResource(resource.id);
      if (!component) {
        this.report(missingResource(resource, 'value'));
        return 0;
      }
      return component.value;
    });
  }

  /**
   * Current effect of an upgrade's target and the price of its next level.
   * Costs are evaluated at `level + 1`.
   */
  info(upgrade: UpgradeDescription): Promise<UpgradeInfo> {
    return this.executor.run(() => {
      const levelComponent = this.store.getUpgrade(upgrade.target.id);
      if (!levelComponent) {
        this.report(missingUpgrade(upgrade.target, 'info'));
        return EMPTY_UPGRADE_INFO;
      }

      const level = levelComponent.level;
      return {
        value: evaluateCurve(upgrade.target.curve, level),
        level,
        costs: upgrade.costs.map((cost) => ({
          resourceId: cost.resource.id,
          displayName: cost.resource.displayName,
          amount: evaluateCurve(cost.curve, level + 1),
        })),
      };
    });
  }

  /**
   * Buys one level of `upgrade`. Every cost is evaluated at the current
   * level and checked before any is deducted; a single shortfall aborts the
   * purchase without touching any balance.
   */
  upgrade(upgrade: UpgradeDescription): Promise<PurchaseResult> {
    return this.executor.run(() => this.purchase(upgrade));
  }

  /** Applies one manual yield of `generator` at its current level. */
  generate(generator: GeneratorDescription): Promise<GenerateResult> {
    return this.executor.run((): GenerateResult => {
      const levelComponent = this.store.getUpgrade(generator.id);
      if (!levelComponent) {
        return this.fail(missingUpgrade(generator, 'generate'));
      }
      const component = this.store.getResource(generator.resource.id);
      if (!component) {
        return this.fail(missingResource(generator.resource, 'generate'));
      }

      const amount = evaluateCurve(generator.curve, levelComponent.level);
      component.value += amount;
      return { success: true, amount };
    });
  }

  /** Adds a fixed, non-negative amount to a resource. */
  grant(resource: ResourceDescription, amount: number): Promise<AdjustResult> {
    return this.executor.run((): AdjustResult => {
      if (!Number.isFinite(amount) || amount < 0) {
        return this.fail(invalidAmount(resource, 'grant', amount));
      }
      const component = this.store.getResource(resource.id);
      if (!component) {
        return this.fail(missingResource(resource, 'grant'));
      }
      component.value += amount;
      return { success: true, value: component.value };
    });
  }

  /** Overwrites a resource balance with a finite, non-negative value. */
  setValue(resource: ResourceDescription, value: number): Promise<AdjustResult> {
    return this.executor.run((): AdjustResult => {
      if (!Number.isFinite(value) || value < 0) {
        return this.fail(invalidAmount(resource, 'setValue', value));
      }
      const component = this.store.getResource(resource.id);
      if (!component) {
        return this.fail(missingResource(resource, 'setValue'));
      }
      component.value = value;
      return { success: true, value };
    });
  }

  snapshot(): Promise<SimulationSnapshot> {
    return this.executor.run(() => ({
      name: this.name,
      paused: this.paused,
      totalDuration: this.elapsedSeconds,
      configuration: this.configuration,
      ...this.exportComponents(),
    }));
  }

  /**
   * Rejects with `MalformedPersistedStateError` when a balance is
   * negative or NaN, since {@link Simulation.restore} could not read it back.
   */
  serialize(): Promise<Uint8Array> {
    return this.executor.run(() =>
      encodeSimulationSave({
        version: SIMULATION_SAVE_SCHEMA_VERSION,
        savedAt: Date.now(),
        name: this.name,
        totalDuration: this.elapsedSeconds,
        paused: this.paused,
        ...this.exportComponents(),
      }),
    );
  }

  private startTimer(): void {
    if (this.intervalHandle !== null) {
      return;
    }
    this.intervalHandle = setInterval(() => {
      this.executor.post(() => this.tick(), 'tick');
    }, this.config.tickIntervalMs);
  }

  private stopTimer(): void {
    if (this.intervalHandle === null) {
      return;
    }
    clearInterval(this.intervalHandle);
    this.intervalHandle = null;
  }

  private tick(): void {
    if (this.mode === 'paused') {
      return;
    }

    const now = this.now();
    const delta =
      ((now - this.lastTickTime) / MS_PER_SECOND) *
      this.configuration.timeMultiplier;
    this.lastTickTime = now;

    if (!Number.isFinite(delta) || delta <= 0) {
      this.telemetry.recordWarning(TELEMETRY_TICK_DISCARDED, {
        source: 'timer',
        delta,
      });
      return;
    }

    this.update(delta);
  }

  private update(delta: number): void {
    for (const generator of this.generators.values()) {
      const levelComponent = this.store.getUpgrade(generator.id);
      if (!levelComponent) {
        this.report(missingUpgrade(generator, 'update'));
        continue;
      }
      const component = this.store.getResource(generator.resource.id);
      if (!component) {
        this.report(missingResource(generator.resource, 'update'));
        continue;
      }
      component.value +=
        evaluateCurve(generator.curve, levelComponent.level) * delta;
    }

    this.elapsedSeconds += delta;
    this.telemetry.recordTick(delta);
    this.telemetry.recordCounters(TELEMETRY_COUNTER_GROUP, {
      resources: this.store.resourceCount,
      upgrades: this.store.upgradeCount,
      generators: this.generators.size,
      listeners: this.listeners.size,
    });
    this.notifyTick();
  }

  private notifyTick(): void {
    if (this.listeners.size === 0) {
      return;
    }
    const listeners = [...this.listeners];
    this.dispatch(() => {
      for (const listener of listeners) {
        try {
          listener();
        } catch (error) {
          this.telemetry.recordError(TELEMETRY_OBSERVER_FAILED, {
            message: error instanceof Error ? error.message : String(error),
          });
        }
      }
    });
  }

  private applyRegistration(blueprint: Blueprint): void {
    switch (blueprint.kind) {
      case 'resource': {
        const existed = this.store.putResource(
          blueprint.id,
          takeRestored(this.restored.resources, blueprint.id),
        );
        if (existed) {
          this.reportReRegistration('resource', blueprint.id);
        }
        return;
      }
      case 'upgrade': {
        const targetId = blueprint.target.id;
        if (this.implicitLevels.delete(targetId)) {
          return;
        }
        const existed = this.store.putUpgrade(
          targetId,
          takeRestored(this.restored.levels, targetId),
        );
        if (existed) {
          this.reportReRegistration('upgrade', targetId);
        }
        return;
      }
      case 'generator': {
        if (!this.store.hasUpgrade(blueprint.id)) {
          this.store.putUpgrade(
            blueprint.id,
            takeRestored(this.restored.levels, blueprint.id),
          );
          this.implicitLevels.add(blueprint.id);
        }
        if (blueprint.flags.automatic) {
          this.generators.set(blueprint.id, blueprint);
        } else {
          this.generators.delete(blueprint.id);
        }
        return;
      }
      default:
        exhaustive(blueprint);
    }
  }

  private purchase(upgrade: UpgradeDescription): PurchaseResult {
    const levelComponent = this.store.getUpgrade(upgrade.target.id);
    if (!levelComponent) {
      return this.fail(missingUpgrade(upgrade.target, 'upgrade'));
    }

    const level = levelComponent.level;
    const deductions = new Map<string, PendingDeduction>();
    for (const cost of upgrade.costs) {
      const component = this.store.getResource(cost.resource.id);
      if (!component) {
        return this.fail(missingResource(cost.resource, 'upgrade'));
      }
      const amount = evaluateCurve(cost.curve, level);
      if (Number.isNaN(amount)) {
        return this.fail(invalidAmount(cost.resource, 'upgrade', amount));
      }
      const pending = deductions.get(cost.resource.id);
      if (pending) {
        pending.amount += amount;
      } else {
        deductions.set(cost.resource.id, {
          resource: cost.resource,
          component,
          amount,
        });
      }
    }

    // NaN amounts or balances, and Infinity - Infinity, are never affordable.
    for (const deduction of deductions.values()) {
      const remaining = deduction.component.value - deduction.amount;
      if (!(remaining >= 0)) {
        return this.fail(
          createSimulationError(
            'InsufficientFunds',
            `Not enough ${deduction.resource.displayName} to upgrade.`,
            {
              upgradeId: upgrade.id,
              resourceId: deduction.resource.id,
              required: deduction.amount,
              available: deduction.component.value,
            },
          ),
        );
      }
    }

    for (const deduction of deductions.values()) {
      deduction.component.value -= deduction.amount;
    }
    levelComponent.level += 1;

    this.telemetry.recordProgress(TELEMETRY_UPGRADE_PURCHASED, {
      upgradeId: upgrade.id,
      targetId: upgrade.target.id,
      level: levelComponent.level,
    });
    return { success: true, level: levelComponent.level };
  }

  private hydrate(save: SimulationSaveFormat): void {
    this.elapsedSeconds = save.totalDuration;
    this.restored = {
      resources: new Map(save.resources.map((entry) => [entry.id, entry.value])),
      levels: new Map(save.upgrades.map((entry) => [entry.id, entry.level])),
    };
  }

  /**
   * Live components plus restored entries whose blueprints have not been
   * registered yet, so a save round-trip never drops state.
   */
  private exportComponents(): SerializedComponentStore {
    const live = this.store.exportForSave();
    const resources = [...live.resources];
    for (const [id, value] of this.restored.resources) {
      if (!this.store.hasResource(id)) {
        resources.push({ id, value });
      }
    }
    const upgrades = [...live.upgrades];
    for (const [id, level] of this.restored.levels) {
      if (!this.store.hasUpgrade(id)) {
        upgrades.push({ id, level });
      }
    }
    return {
      resources: resources.sort((left, right) => left.id.localeCompare(right.id)),
      upgrades: upgrades.sort((left, right) => left.id.localeCompare(right.id)),
    };
  }

  private reportReRegistration(kind: 'resource' | 'upgrade', id: string): void {
    this.telemetry.recordWarning(TELEMETRY_RE_REGISTERED, { kind, id });
  }

  private report(error: SimulationError): void {
    const data = { code: error.code, message: error.message, ...error.details };
    if (isLookupFailure(error.code)) {
      this.telemetry.recordError(error.code, data);
    } else {
      this.telemetry.recordWarning(error.code, data);
    }
  }

  private fail(error: SimulationError): SimulationFailure {
    this.report(error);
    return { success: false, error };
  }
}

function takeRestored(entries: Map<string, number>, id: string): number {
  const value = entries.get(id);
  entries.delete(id);
  return value ?? 0;
}

function isLookupFailure(code: SimulationErrorCode): boolean {
  return code === 'MissingResourceComponent' || code === 'MissingUpgradeComponent';
}

function missingResource(
  resource: ResourceDescription,
  operation: string,
): SimulationError {
  return createSimulationError(
    'MissingResourceComponent',
    `Resource "${resource.displayName}" has not been registered.`,
    { resourceId: resource.id, operation },
  );
}

function missingUpgrade(
  target: GeneratorDescription,
  operation: string,
): SimulationError {
  return createSimulationError(
    'MissingUpgradeComponent',
    `No level is registered for "${target.id}".`,
    { targetId: target.id, operation },
  );
}

function invalidAmount(
  resource: ResourceDescription,
  operation: string,
  amount: number,
): SimulationError {
  return createSimulationError(
    'InvalidAmount',
    `Amount for "${resource.displayName}" must be a finite, non-negative number.`,
    { resourceId: resource.id, operation, amount },
  );
}

function exhaustive(value: never): never {
  throw new Error(`Unsupported blueprint: ${JSON.stringify(value)}`);
}
