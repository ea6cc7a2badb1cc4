// polar.ts
// Conversion between rectangular and polar form.
//
// toPolar uses the one-argument arctangent of im/re, not atan2. The angle it
// returns is always in [-π/2, π/2] (or NaN at the origin), so points with
// re < 0 come back reflected through the origin. The round trip
// toPolar(fromPolar(θ, r)) = (θ, r) therefore only holds for -π/2 < θ < π/2
// and r > 0. Keep it that way: the demo uses the failure outside that range.

import { complex, sqnorm } from './complex.js';
import type { Complex } from './complex.js';

export type Polar = readonly [angle: number, radius: number];

export function toPolar(c: Complex): Polar {
  return [Math.atan(c.im / c.re), Math.sqrt(sqnorm(c))];
}

export function fromPolar(angle: number, radius: number): Complex {
  return complex(radius * Math.cos(angle), radius * Math.sin(angle));
}

/** Where the round trip is expected to hold. */
export function inPrincipalDomain(angle: number, radius: number): boolean {
  return angle > -Math.PI / 2 && angle < Math.PI / 2 && radius > 0;
}

export interface RoundTripError {
  angle: number;
  radius: number;
}

export function roundTripError(angle: number, radius: number): RoundTripError {
  const [a, r] = toPolar(fromPolar(angle, radius));
  return { angle: Math.abs(a - angle), radius: Math.abs(r - radius) };
}

/** NaN errors (angle lost at the origin) count as a failure. */
export function roundTripHolds(angle: number, radius: number, tolerance: number = 1e-9): boolean {
  const err = roundTripError(angle, radius);
  return err.angle <= tolerance && err.radius <= tolerance;
}
