import { z } from 'zod';

import { curveSchema, type Curve } from '../base/curves.js';
import {
  createIdentifier,
  identifierSchema,
  type Identifier,
} from '../base/ids.js';
import {
  resourceReferenceSchema,
  type ResourceDescription,
} from './resources.js';

export type GeneratorFlags = {
  /**
   * Automatic generators produce on every tick. Manual ones only produce
   * when the simulation is asked to generate for them.
   */
  readonly automatic: boolean;
};

/**
 * Blueprint for a producer of one resource. The curve maps the generator's
 * level to production per second for automatic generators, or to the yield
 * of a single manual action.
 */
export type GeneratorDescription = {
  readonly kind: 'generator';
  readonly id: Identifier;
  readonly resource: ResourceDescription;
  readonly curve: Curve;
  readonly flags: GeneratorFlags;
};

/** Anything an upgrade track can raise the level of. */
export type Upgradable = GeneratorDescription;

const generatorFlagsSchema = z
  .object({
    automatic: z.boolean().default(false),
  })
  .strict();

export const generatorDescriptionSchema = z
  .object({
    id: identifierSchema.optional(),
    resource: resourceReferenceSchema,
    curve: curveSchema,
    flags: generatorFlagsSchema.default({}),
  })
  .strict()
  .transform(
    (generator): GeneratorDescription =>
      Object.freeze({
        kind: 'generator',
        id: generator.id ?? createIdentifier(),
        resource: generator.resource,
        curve: Object.freeze(generator.curve),
        flags: Object.freeze(generator.flags),
      }),
  );

export type GeneratorInput = z.input<typeof generatorDescriptionSchema>;

const resolvedGeneratorSchema = z.object({
  kind: z.literal('generator'),
  id: identifierSchema,
  resource: resourceReferenceSchema,
  curve: curveSchema,
  flags: z.object({ automatic: z.boolean() }),
});

export const isGeneratorDescription = (
  value: unknown,
): value is GeneratorDescription =>
  resolvedGeneratorSchema.safeParse(value).success;

export const generatorReferenceSchema = z.custom<GeneratorDescription>(
  isGeneratorDescription,
  { message: 'Expected a generator description created by createGenerator().' },
);
