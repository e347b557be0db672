import { z } from 'zod';

import { curveSchema, type Curve } from './curves.js';
import {
  resourceReferenceSchema,
  type ResourceDescription,
} from '../modules/resources.js';

/**
 * Price of one upgrade step in a single resource, as a curve over the level
 * being priced.
 */
export type CostDescription = {
  readonly resource: ResourceDescription;
  readonly curve: Curve;
};

export const costDescriptionSchema = z
  .object({
    resource: resourceReferenceSchema,
    curve: curveSchema,
  })
  .strict()
  .transform(
    (cost): CostDescription =>
      Object.freeze({ resource: cost.resource, curve: Object.freeze(cost.curve) }),
  );

export type CostInput = z.input<typeof costDescriptionSchema>;

export const ensureUniqueCostResources = (
  entries: readonly CostDescription[],
  ctx: z.RefinementCtx,
  path: readonly (string | number)[],
): void => {
  const seen = new Map<string, number>();
  entries.forEach((entry, index) => {
    const existing = seen.get(entry.resource.id);
    if (existing !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path, index, 'resource'],
        message: `Duplicate cost resource "${entry.resource.id}" also declared at index ${existing}.`,
      });
      return;
    }
    seen.set(entry.resource.id, index);
  });
};
