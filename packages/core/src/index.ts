export {
  Simulation,
  type AdjustResult,
  type Clock,
  type GenerateResult,
  type PurchaseResult,
  type SimulationMode,
  type SimulationOptions,
  type SimulationSnapshot,
  type TickDispatcher,
  type TickListener,
  type Unsubscribe,
  type UpgradeCostInfo,
  type UpgradeInfo,
} from './simulation.js';

export {
  createSimulationError,
  MalformedPersistedStateError,
  type SimulationError,
  type SimulationErrorCode,
  type SimulationFailure,
} from './simulation-errors.js';

export {
  decodeSimulationSave,
  encodeSimulationSave,
  loadSimulationSaveFormat,
  SIMULATION_SAVE_SCHEMA_VERSION,
  type SimulationSaveFormat,
  type SimulationSaveFormatV1,
} from './simulation-save.js';

export {
  createComponentStore,
  type ComponentStore,
  type ResourceComponent,
  type SerializedComponentStore,
  type SerializedResourceComponent,
  type SerializedUpgradeComponent,
  type UpgradeComponent,
} from './component-store.js';

export { SerialExecutor } from './serial-executor.js';

export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_SIMULATION_CONFIGURATION,
  isValidTimeMultiplier,
  resolveEngineConfig,
  resolveSimulationConfiguration,
  type EngineConfig,
  type EngineConfigOverrides,
  type SimulationConfiguration,
} from './config.js';

export {
  columnLabel,
  describeNumber,
  formatNumber,
  numberSuffix,
} from './number-format.js';

export {
  createConsoleTelemetry,
  createContextualTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';
