import { z } from 'zod';

const FINITE_NUMBER_MESSAGE = 'Value must be a finite number.';
const NONNEGATIVE_NUMBER_MESSAGE = 'Value must be greater than or equal to 0.';

const ensureFinite = (value: number, ctx: z.RefinementCtx) => {
  if (!Number.isFinite(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: FINITE_NUMBER_MESSAGE,
    });
    return z.NEVER;
  }

  return value;
};

export const finiteNumberSchema = z.coerce
  .number()
  .transform((value, ctx) => ensureFinite(value, ctx));

export const nonNegativeNumberSchema = finiteNumberSchema.refine(
  (value) => value >= 0,
  {
    message: NONNEGATIVE_NUMBER_MESSAGE,
  },
);

export const nonNegativeIntegerSchema = nonNegativeNumberSchema.refine(
  Number.isInteger,
  {
    message: 'Value must be a non-negative integer.',
  },
);
