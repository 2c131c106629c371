/**
 * Law Definition Types
 *
 * Laws are data, not just comments: each one is a named predicate that a
 * verifier can run against sample values and report on.
 *
 * @example
 * ```typescript
 * const doubleIsEven: Law<[number]> = {
 *   name: "double is even",
 *   arity: 1,
 *   check: (x) => (x + x) % 2 === 0,
 * };
 * ```
 *
 * @module
 */

import type { Eq } from "../typeclasses/eq.js";
import type { Kind, TypeFunction } from "../hkt.js";

// ============================================================================
// Proof Hints
// ============================================================================

/**
 * Which algebraic rule a law instantiates.
 */
export type ProofHint = "identity-left" | "identity-right" | "associativity" | "homomorphism";

// ============================================================================
// Core Law Type
// ============================================================================

export interface Law<Args extends unknown[] = unknown[]> {
  /**
   * Human-readable name of the law.
   * @example "left identity", "associativity"
   */
  readonly name: string;

  /**
   * Returns true if the law holds for the given inputs.
   */
  readonly check: (...args: Args) => boolean;

  /**
   * Number of values the law needs.
   */
  readonly arity: number;

  readonly proofHint?: ProofHint;

  /**
   * The law in plain English; shown when verification fails.
   */
  readonly description?: string;
}

/**
 * A collection of laws over the same argument tuple.
 */
export type LawSet<Args extends unknown[] = unknown[]> = readonly Law<Args>[];

/**
 * Equality for F[A], used by law generators over a Monad<F>.
 */
export type EqFA<F extends TypeFunction, A> = Eq<Kind<F, A>>;

// ============================================================================
// Verification Results
// ============================================================================

export type LawVerificationResult<Args extends unknown[] = unknown[]> =
  | {
      readonly status: "held";
      readonly law: string;
      readonly samples: number;
    }
  | {
      readonly status: "failed";
      readonly law: string;
      readonly description?: string;
      readonly counterexample: Args;
    };

export interface VerificationSummary<Args extends unknown[] = unknown[]> {
  readonly total: number;
  readonly held: number;
  readonly failed: number;
  readonly results: readonly LawVerificationResult<Args>[];
}
