import { z } from 'zod';

import {
  createIdentifier,
  identifierSchema,
  type Identifier,
} from '../base/ids.js';

type ResourceDescriptionInput = {
  readonly id?: z.input<typeof identifierSchema>;
  readonly displayName: string;
};

/**
 * Immutable blueprint naming a countable quantity. The live amount is held
 * by the simulation, keyed by `id`.
 */
export type ResourceDescription = {
  readonly kind: 'resource';
  readonly id: Identifier;
  readonly displayName: string;
};

export const displayNameSchema = z
  .string()
  .trim()
  .min(1, { message: 'Display name must contain at least one character.' })
  .max(64, { message: 'Display name must contain at most 64 characters.' });

export const resourceDescriptionSchema: z.ZodType<
  ResourceDescription,
  z.ZodTypeDef,
  ResourceDescriptionInput
> = z
  .object({
    id: identifierSchema.optional(),
    displayName: displayNameSchema,
  })
  .strict()
  .transform((resource) =>
    Object.freeze({
      kind: 'resource' as const,
      id: resource.id ?? createIdentifier(),
      displayName: resource.displayName,
    }),
  );

const resolvedResourceSchema = z.object({
  kind: z.literal('resource'),
  id: identifierSchema,
  displayName: displayNameSchema,
});

export const isResourceDescription = (
  value: unknown,
): value is ResourceDescription =>
  resolvedResourceSchema.safeParse(value).success;

/**
 * Accepts an already-constructed resource blueprint and passes the same
 * reference through, so nested descriptions keep their identity.
 */
export const resourceReferenceSchema = z.custom<ResourceDescription>(
  isResourceDescription,
  { message: 'Expected a resource description created by createResource().' },
);

export type ResourceInput = z.input<typeof resourceDescriptionSchema>;
