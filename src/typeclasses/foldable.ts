/**
 * Foldable Typeclass
 *
 * Data structures that can be reduced to a summary value, left to right.
 */

import type { Kind, TypeFunction } from "../hkt.js";

export interface Foldable<F extends TypeFunction> {
  readonly foldLeft: <A, B>(fa: Kind<F, A>, b: B, f: (b: B, a: A) => B) => B;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Check if all elements satisfy a predicate
 */
export function forall<F extends TypeFunction>(
  F: Foldable<F>,
): <A>(fa: Kind<F, A>, p: (a: A) => boolean) => boolean {
  return <A>(fa: Kind<F, A>, p: (a: A) => boolean): boolean =>
    F.foldLeft<A, boolean>(fa, true, (acc, a) => acc && p(a));
}
