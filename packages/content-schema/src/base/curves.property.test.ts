import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import {
  createCurveArbitrary,
  createLevelArbitrary,
  DEFAULT_CURVE_PROPERTY_SEED,
} from './curves.arbitraries.js';
import {
  curveSchema,
  evaluateCurve,
  exponentialCurve,
  flatCurve,
  linearCurve,
} from './curves.js';

const propertyConfig = (offset: number): fc.Parameters<unknown> => ({
  numRuns: 200,
  seed: DEFAULT_CURVE_PROPERTY_SEED + offset,
});

const coefficient = fc.double({
  min: -1e6,
  max: 1e6,
  noNaN: true,
  noDefaultInfinity: true,
});

describe('curve properties', () => {
  it('matches factor * level + initial for linear curves', () => {
    fc.assert(
      fc.property(coefficient, coefficient, createLevelArbitrary(), (initial, factor, level) => {
        expect(evaluateCurve(linearCurve(initial, factor), level)).toBe(
          level * factor + initial,
        );
      }),
      propertyConfig(0),
    );
  });

  it('matches e^level for exponential curves', () => {
    fc.assert(
      fc.property(createLevelArbitrary(), (level) => {
        expect(evaluateCurve(exponentialCurve(), level)).toBe(Math.exp(level));
      }),
      propertyConfig(1),
    );
  });

  it('returns the constant for flat curves', () => {
    fc.assert(
      fc.property(coefficient, createLevelArbitrary(), (value, level) => {
        expect(evaluateCurve(flatCurve(value), level)).toBe(value);
      }),
      propertyConfig(2),
    );
  });

  it('is deterministic and defined for every generated curve and level', () => {
    fc.assert(
      fc.property(createCurveArbitrary(), createLevelArbitrary(), (curve, level) => {
        const first = evaluateCurve(curve, level);
        const second = evaluateCurve(curve, level);
        expect(Number.isNaN(first)).toBe(false);
        expect(Object.is(first, second)).toBe(true);
      }),
      propertyConfig(3),
    );
  });

  it('round-trips generated curves through the schema unchanged', () => {
    fc.assert(
      fc.property(createCurveArbitrary(), (curve) => {
        expect(curveSchema.parse(curve)).toEqual(curve);
      }),
      propertyConfig(4),
    );
  });
});
