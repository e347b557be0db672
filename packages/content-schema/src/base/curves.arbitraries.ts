import * as fc from 'fast-check';

import {
  CURVE_KINDS,
  exponentialCurve,
  flatCurve,
  linearCurve,
  type Curve,
  type CurveKind,
} from './curves.js';

export const DEFAULT_CURVE_PROPERTY_SEED = 424242;

/** Exponential curves overflow past this level; property runs stay below it. */
export const MAX_FINITE_EXPONENTIAL_LEVEL = 709;

export type CurveArbitraryOptions = {
  readonly kinds?: readonly CurveKind[];
  /** Bound on the absolute value of generated coefficients. */
  readonly magnitude?: number;
  /** Restrict coefficients to non-negative values, as prices and yields are. */
  readonly nonNegative?: boolean;
};

const createCoefficientArbitrary = (
  magnitude: number,
  nonNegative: boolean,
): fc.Arbitrary<number> =>
  fc.double({
    min: nonNegative ? 0 : -magnitude,
    max: magnitude,
    noNaN: true,
    noDefaultInfinity: true,
  });

export const createCurveArbitrary = (
  options: CurveArbitraryOptions = {},
): fc.Arbitrary<Curve> => {
  const kinds = options.kinds ?? CURVE_KINDS;
  const coefficient = createCoefficientArbitrary(
    options.magnitude ?? 1e6,
    options.nonNegative ?? false,
  );

  const byKind: Record<CurveKind, fc.Arbitrary<Curve>> = {
    linear: fc
      .tuple(coefficient, coefficient)
      .map(([initial, factor]) => linearCurve(initial, factor)),
    exponential: coefficient.map((scale) => exponentialCurve(scale)),
    flat: coefficient.map((value) => flatCurve(value)),
  };

  return fc.oneof(...kinds.map((kind) => byKind[kind]));
};

export const createLevelArbitrary = (
  maxLevel = MAX_FINITE_EXPONENTIAL_LEVEL,
): fc.Arbitrary<number> => fc.integer({ min: 0, max: maxLevel });
