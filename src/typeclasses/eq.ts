/**
 * Eq Typeclass
 *
 * Structural equality, used by the law checks to compare results.
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 */

import type { Sequence } from "../data/sequence.js";

// ============================================================================
// Eq
// ============================================================================

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

// ============================================================================
// Eq Combinators
// ============================================================================

/**
 * Eq that uses strict equality
 */
export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => x === y };
}

/**
 * Eq by mapping to a comparable value
 */
export function eqBy<A, B>(E: Eq<B>, f: (a: A) => B): Eq<A> {
  return { eqv: (x, y) => E.eqv(f(x), f(y)) };
}

/**
 * Eq for arrays (element-wise)
 */
export function eqArray<A>(E: Eq<A>): Eq<A[]> {
  return {
    eqv: (xs, ys) => {
      if (xs.length !== ys.length) return false;
      return xs.every((x, i) => E.eqv(x, ys[i]));
    },
  };
}

/**
 * Eq for sequences: same length, element-wise, order-sensitive.
 * Neither sequence is consumed.
 */
export function eqSequence<A>(E: Eq<A>): Eq<Sequence<A>> {
  return {
    eqv: (xs, ys) => {
      if (xs.size !== ys.size) return false;
      const others = ys.toArray();
      let i = 0;
      for (const x of xs) {
        if (!E.eqv(x, others[i++])) return false;
      }
      return true;
    },
  };
}

// ============================================================================
// Instances
// ============================================================================

export const eqNumber: Eq<number> = eqStrict();

export const eqBigInt: Eq<bigint> = eqStrict();

export const eqString: Eq<string> = eqStrict();

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eqv: (x: A, y: A) => boolean): Eq<A> {
  return { eqv };
}
