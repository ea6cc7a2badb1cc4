// complex.ts
// Complex numbers as immutable pairs of reals, and their field structure.

import type { Field } from './field.js';

export interface Complex {
  readonly re: number;
  readonly im: number;
}

/** Raised when an operation is undefined for its argument, e.g. the inverse of zero. */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DomainError';
  }
}

export function complex(re: number, im: number = 0): Complex {
  return Object.freeze({ re, im });
}

export const ZERO: Complex = complex(0, 0);
export const ONE: Complex = complex(1, 0);
export const I: Complex = complex(0, 1);

export function add(a: Complex, b: Complex): Complex {
  return complex(a.re + b.re, a.im + b.im);
}

export function neg(a: Complex): Complex {
  return complex(-a.re, -a.im);
}

export function sub(a: Complex, b: Complex): Complex {
  return complex(a.re - b.re, a.im - b.im);
}

/**
 * (a.re + a.im·i)(b.re + b.im·i) = (a.re·b.re − a.im·b.im) + (a.re·b.im + a.im·b.re)i
 */
export function mul(a: Complex, b: Complex): Complex {
  return complex(a.re * b.re - a.im * b.im, a.re * b.im + a.im * b.re);
}

/** re² + im² */
export function sqnorm(a: Complex): number {
  return a.re * a.re + a.im * a.im;
}

export function abs(a: Complex): number {
  return Math.sqrt(sqnorm(a));
}

export function conj(a: Complex): Complex {
  return complex(a.re, -a.im);
}

/**
 * Multiplicative inverse conj(a) / |a|².
 * Throws DomainError when the squared magnitude is exactly 0 in floating point,
 * which includes values small enough for re² + im² to underflow.
 */
export function inv(a: Complex): Complex {
  const n = sqnorm(a);
  if (n === 0) {
    throw new DomainError(`cannot invert ${toString(a)}: squared magnitude is zero`);
  }
  return complex(a.re / n, -a.im / n);
}

export function div(a: Complex, b: Complex): Complex {
  return mul(a, inv(b));
}

export function isZero(a: Complex): boolean {
  return a.re === 0 && a.im === 0;
}

/** Component-wise comparison within an absolute tolerance. */
export function equals(a: Complex, b: Complex, tolerance: number = 1e-10): boolean {
  return Math.abs(a.re - b.re) <= tolerance && Math.abs(a.im - b.im) <= tolerance;
}

export function toString(c: Complex, precision?: number): string {
  const fmt = (x: number) => (precision === undefined ? String(x) : x.toFixed(precision));
  const sign = c.im < 0 ? '-' : '+';
  return `${fmt(c.re)} ${sign} ${fmt(Math.abs(c.im))}i`;
}

export const complexField: Field<Complex> = {
  zero: ZERO,
  one: ONE,
  add,
  neg,
  mul,
  inv,
};
