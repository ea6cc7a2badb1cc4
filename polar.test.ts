import { describe, it, expect } from 'vitest';
import { fromPolar, inPrincipalDomain, roundTripError, roundTripHolds, toPolar } from './polar.js';
import { complex, equals } from './complex.js';

describe('toPolar', () => {
  it('gives angle and radius in the right half-plane', () => {
    const [angle, radius] = toPolar(complex(1, 1));
    expect(angle).toBeCloseTo(Math.PI / 4, 12);
    expect(radius).toBeCloseTo(Math.SQRT2, 12);
  });

  it('loses the quadrant for negative real parts', () => {
    const [angle, radius] = toPolar(complex(-1, -1));
    expect(angle).toBeCloseTo(Math.PI / 4, 12);
    expect(radius).toBeCloseTo(Math.SQRT2, 12);
  });

  it('follows IEEE division on the imaginary axis', () => {
    expect(toPolar(complex(0, 2))).toEqual([Math.PI / 2, 2]);
    expect(toPolar(complex(0, -2))).toEqual([-Math.PI / 2, 2]);
  });

  it('has no angle at the origin', () => {
    const [angle, radius] = toPolar(complex(0, 0));
    expect(angle).toBeNaN();
    expect(radius).toBe(0);
  });
});

describe('fromPolar', () => {
  it('places the point on the circle', () => {
    expect(equals(fromPolar(Math.PI / 2, 2), complex(0, 2))).toBe(true);
    expect(equals(fromPolar(Math.PI, 1), complex(-1, 0))).toBe(true);
    expect(fromPolar(0, 3)).toEqual({ re: 3, im: 0 });
  });
});

describe('round trip', () => {
  const inside: Array<[number, number]> = [[0, 1], [0.5, 2], [-1.2, 0.75], [1.5, 10], [-1.5, 3]];
  const outside: Array<[number, number]> = [[2, 1], [-2.5, 3], [Math.PI, 1], [0.5, -2]];

  it('holds on the principal domain', () => {
    for (const [angle, radius] of inside) {
      expect(inPrincipalDomain(angle, radius)).toBe(true);
      expect(roundTripHolds(angle, radius)).toBe(true);
    }
  });

  it('fails outside it', () => {
    for (const [angle, radius] of outside) {
      expect(inPrincipalDomain(angle, radius)).toBe(false);
      expect(roundTripHolds(angle, radius)).toBe(false);
    }
  });

  it('reflects the angle by π when the point lands in the left half-plane', () => {
    const err = roundTripError(2, 1);
    expect(err.angle).toBeCloseTo(Math.PI, 12);
    expect(err.radius).toBeCloseTo(0, 12);
  });

  it('recovers |r| but not the angle for a negative radius', () => {
    const [angle, radius] = toPolar(fromPolar(0.5, -2));
    expect(angle).toBeCloseTo(0.5, 12);
    expect(radius).toBeCloseTo(2, 12);
  });

  it('loses the angle at radius zero', () => {
    expect(inPrincipalDomain(0.3, 0)).toBe(false);
    expect(roundTripError(0.3, 0).angle).toBeNaN();
    expect(roundTripHolds(0.3, 0)).toBe(false);
  });
});
