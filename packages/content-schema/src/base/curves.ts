import { z } from 'zod';

import { finiteNumberSchema } from './numbers.js';

const linearCurveSchema = z
  .object({
    kind: z.literal('linear'),
    initial: finiteNumberSchema,
    factor: finiteNumberSchema,
  })
  .strict();

const exponentialCurveSchema = z
  .object({
    kind: z.literal('exponential'),
    scale: finiteNumberSchema.default(1),
  })
  .strict();

const flatCurveSchema = z
  .object({
    kind: z.literal('flat'),
    value: finiteNumberSchema,
  })
  .strict();

/**
 * Growth shape mapping an upgrade level to a magnitude. Curves are plain
 * data so blueprints stay serializable; {@link evaluateCurve} gives them
 * their function semantics.
 */
export const curveSchema = z.discriminatedUnion('kind', [
  linearCurveSchema,
  exponentialCurveSchema,
  flatCurveSchema,
]);

export type Curve = z.infer<typeof curveSchema>;
export type CurveInput = z.input<typeof curveSchema>;
export type CurveKind = Curve['kind'];

export type LinearCurve = Extract<Curve, { kind: 'linear' }>;
export type ExponentialCurve = Extract<Curve, { kind: 'exponential' }>;
export type FlatCurve = Extract<Curve, { kind: 'flat' }>;

export const CURVE_KINDS: readonly CurveKind[] = Object.freeze([
  'linear',
  'exponential',
  'flat',
]);

/** `level * factor + initial` */
export const linearCurve = (initial: number, factor: number): LinearCurve =>
  Object.freeze({ kind: 'linear', initial, factor });

/** `scale * e^level`; the default scale yields exactly `e^level`. */
export const exponentialCurve = (scale = 1): ExponentialCurve =>
  Object.freeze({ kind: 'exponential', scale });

export const flatCurve = (value: number): FlatCurve =>
  Object.freeze({ kind: 'flat', value });

/**
 * Coerces a caller-provided level onto the curve domain. Levels are
 * integers at or above zero; anything else collapses onto the nearest
 * valid level below it.
 */
export const normalizeLevel = (level: number): number => {
  if (!Number.isFinite(level) || level <= 0) {
    return 0;
  }
  return Math.floor(level);
};

export const evaluateCurve = (curve: Curve, level: number): number => {
  const normalized = normalizeLevel(level);
  switch (curve.kind) {
    case 'linear':
      return normalized * curve.factor + curve.initial;
    case 'exponential':
      return curve.scale * Math.exp(normalized);
    case 'flat':
      return curve.value;
    default:
      return exhaustive(curve);
  }
};

const exhaustive = (value: never): never => {
  throw new Error(`Unsupported curve: ${JSON.stringify(value)}`);
};
