import { randomUUID } from 'node:crypto';

import { z } from 'zod';

const IDENTIFIER_PATTERN = /^[A-Za-z0-9][-./:\w]{0,127}$/;

/**
 * Opaque identifier shared by every blueprint namespace. Resources and
 * upgradables draw from the same format but are keyed separately by the
 * engine.
 */
export const identifierSchema = z
  .string()
  .trim()
  .min(1, { message: 'Identifier must contain at least one character.' })
  .max(128, { message: 'Identifier must contain at most 128 characters.' })
  .regex(IDENTIFIER_PATTERN, {
    message:
      'Identifier must start with an alphanumeric character and may include "-", "_", ".", "/", or ":" thereafter.',
  })
  .pipe(z.string().brand<'Identifier'>());

export type Identifier = z.infer<typeof identifierSchema>;
export type IdentifierInput = z.input<typeof identifierSchema>;

export const createIdentifier = (): Identifier =>
  identifierSchema.parse(randomUUID());

export const isIdentifier = (value: unknown): value is Identifier =>
  identifierSchema.safeParse(value).success;
