export type SimulationErrorCode =
  | 'MissingResourceComponent'
  | 'MissingUpgradeComponent'
  | 'InsufficientFunds'
  | 'InvalidAmount';

export interface SimulationError {
  readonly code: SimulationErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface SimulationFailure {
  readonly success: false;
  readonly error: SimulationError;
}

export function createSimulationError(
  code: SimulationErrorCode,
  message: string,
  details?: Record<string, unknown>,
): SimulationError {
  return details ? { code, message, details } : { code, message };
}

/**
 * Raised when persisted bytes cannot be turned back into a simulation. This
 * is the only failure the engine surfaces to callers as an exception.
 */
export class MalformedPersistedStateError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = 'MalformedPersistedStateError';
  }
}
