import { z } from 'zod';

import {
  costDescriptionSchema,
  ensureUniqueCostResources,
  type CostDescription,
} from '../base/costs.js';
import {
  createIdentifier,
  identifierSchema,
  type Identifier,
} from '../base/ids.js';
import { generatorReferenceSchema, type Upgradable } from './generators.js';

/**
 * Purchasable upgrade track. The simulation keys the level of a track by
 * its target's identifier, so every upgrade aimed at the same generator
 * shares one level.
 */
export type UpgradeDescription<TTarget extends Upgradable = Upgradable> = {
  readonly kind: 'upgrade';
  readonly id: Identifier;
  readonly target: TTarget;
  readonly costs: readonly CostDescription[];
};

export const upgradeDescriptionSchema = z
  .object({
    id: identifierSchema.optional(),
    target: generatorReferenceSchema,
    costs: z.array(costDescriptionSchema).default([]),
  })
  .strict()
  .superRefine((upgrade, ctx) => {
    ensureUniqueCostResources(upgrade.costs, ctx, ['costs']);
  })
  .transform(
    (upgrade): UpgradeDescription =>
      Object.freeze({
        kind: 'upgrade',
        id: upgrade.id ?? createIdentifier(),
        target: upgrade.target,
        costs: Object.freeze([...upgrade.costs]),
      }),
  );

export type UpgradeInput = z.input<typeof upgradeDescriptionSchema>;
