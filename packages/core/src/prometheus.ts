/**
 * Prometheus telemetry entry point for Node.js environments.
 *
 * @example
 * import { createPrometheusTelemetry } from '@tickwork/core/prometheus';
 * import { setTelemetry } from '@tickwork/core';
 *
 * const promTelemetry = createPrometheusTelemetry();
 * setTelemetry(promTelemetry);
 */

export {
  createPrometheusTelemetry,
  type PrometheusTelemetryOptions,
  type PrometheusTelemetryFacade,
} from './telemetry-prometheus.js';
