/**
 * Numeric Typeclass
 *
 * Integer arithmetic in dictionary-passing style, so the arithmetic
 * demonstration can run at different widths. Fixed-width instances wrap
 * around on overflow (two's complement) instead of failing.
 *
 * @example
 * ```typescript
 * numericInt64.add(9223372036854775807n, 1n); // → -9223372036854775808n
 * numericBigInt.add(9223372036854775807n, 1n); // → 9223372036854775808n
 * ```
 */

import type { Eq } from "./eq.js";
import { eqBigInt, eqNumber } from "./eq.js";

// ============================================================================
// Numeric
// ============================================================================

export interface Numeric<A> extends Eq<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  /** Integer division, truncating toward zero */
  div(a: A, b: A): A;
  fromNumber(n: number): A;
  zero(): A;
  one(): A;
}

/**
 * Names of the available numeric widths
 */
export type NumericWidth = "int64" | "int32" | "number" | "bigint";

export const NUMERIC_WIDTHS: readonly NumericWidth[] = ["int64", "int32", "number", "bigint"];

// ============================================================================
// Instances
// ============================================================================

/**
 * Arbitrary-precision integers; never overflows.
 */
export const numericBigInt: Numeric<bigint> = {
  eqv: eqBigInt.eqv,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  fromNumber: (n) => BigInt(Math.trunc(n)),
  zero: () => 0n,
  one: () => 1n,
};

const wrap64 = (a: bigint): bigint => BigInt.asIntN(64, a);

/**
 * 64-bit signed integers backed by bigint, wrapped after every operation.
 */
export const numericInt64: Numeric<bigint> = {
  eqv: eqBigInt.eqv,
  add: (a, b) => wrap64(a + b),
  sub: (a, b) => wrap64(a - b),
  mul: (a, b) => wrap64(a * b),
  div: (a, b) => wrap64(a / b),
  fromNumber: (n) => wrap64(BigInt(Math.trunc(n))),
  zero: () => 0n,
  one: () => 1n,
};

/**
 * 32-bit signed integers backed by number.
 */
export const numericInt32: Numeric<number> = {
  eqv: eqNumber.eqv,
  add: (a, b) => (a + b) | 0,
  sub: (a, b) => (a - b) | 0,
  mul: (a, b) => Math.imul(a, b),
  div: (a, b) => (a / b) | 0,
  fromNumber: (n) => n | 0,
  zero: () => 0,
  one: () => 1,
};

/**
 * IEEE doubles; exact only up to Number.MAX_SAFE_INTEGER.
 */
export const numericNumber: Numeric<number> = {
  eqv: eqNumber.eqv,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => Math.trunc(a / b),
  fromNumber: (n) => Math.trunc(n),
  zero: () => 0,
  one: () => 1,
};

// ============================================================================
// Derived Operations
// ============================================================================

export function sum<A>(N: Numeric<A>): (a: A, b: A) => A {
  return (a, b) => N.add(a, b);
}

export function dif<A>(N: Numeric<A>): (a: A, b: A) => A {
  return (a, b) => N.sub(a, b);
}

export function sqr<A>(N: Numeric<A>): (a: A) => A {
  return (a) => N.mul(a, a);
}

/**
 * x(x+1)/2, the sum 0 + 1 + ... + x
 */
export function sn1<A>(N: Numeric<A>): (x: A) => A {
  return (x) => N.div(N.mul(x, N.add(x, N.one())), N.fromNumber(2));
}

/**
 * x(x+1)(2x+1)/6, the sum of squares 0² + 1² + ... + x²
 */
export function sn2<A>(N: Numeric<A>): (x: A) => A {
  return (x) => {
    const twoXPlusOne = N.add(N.add(x, x), N.one());
    return N.div(N.mul(N.mul(x, N.add(x, N.one())), twoXPlusOne), N.fromNumber(6));
  };
}
