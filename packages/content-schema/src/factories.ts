import type { z } from 'zod';

import { costDescriptionSchema, type CostDescription, type CostInput } from './base/costs.js';
import { ContentSchemaError, formatIssues } from './errors.js';
import {
  generatorDescriptionSchema,
  type GeneratorDescription,
  type GeneratorInput,
} from './modules/generators.js';
import {
  resourceDescriptionSchema,
  type ResourceDescription,
  type ResourceInput,
} from './modules/resources.js';
import {
  upgradeDescriptionSchema,
  type UpgradeDescription,
  type UpgradeInput,
} from './modules/upgrades.js';

// ============================================================================
// Factory Functions
// ============================================================================
// Each factory validates plain input, assigns a fresh identifier when none is
// supplied, and returns a frozen blueprint. Validation failures surface as a
// ContentSchemaError so configuration mistakes fail at startup.

const parseWith = <TOutput, TInput>(
  schema: z.ZodType<TOutput, z.ZodTypeDef, TInput>,
  input: TInput,
  label: string,
): TOutput => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ContentSchemaError(
      `Invalid ${label}: ${formatIssues(result.error.issues)}`,
      result.error.issues,
    );
  }
  return result.data;
};

/**
 * Creates a resource blueprint.
 *
 * @example
 * ```typescript
 * const gold = createResource({ id: 'gold', displayName: 'Gold' });
 * ```
 */
export function createResource(input: ResourceInput): ResourceDescription {
  return parseWith(resourceDescriptionSchema, input, 'resource description');
}

/**
 * Creates a generator blueprint producing into an existing resource.
 *
 * @example
 * ```typescript
 * const tapper = createGenerator({
 *   id: 'tapper',
 *   resource: gold,
 *   curve: linearCurve(1, 1),
 * });
 * ```
 */
export function createGenerator(input: GeneratorInput): GeneratorDescription {
  return parseWith(generatorDescriptionSchema, input, 'generator description');
}

export function createCost(input: CostInput): CostDescription {
  return parseWith(costDescriptionSchema, input, 'cost description');
}

/**
 * Creates an upgrade track for a generator.
 *
 * @example
 * ```typescript
 * const tapperUpgrade = createUpgrade({
 *   target: tapper,
 *   costs: [{ resource: gold, curve: linearCurve(10, 3) }],
 * });
 * ```
 */
export function createUpgrade(input: UpgradeInput): UpgradeDescription {
  return parseWith(upgradeDescriptionSchema, input, 'upgrade description');
}
