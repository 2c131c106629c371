/**
 * Runtime law verification over a set of sample values.
 *
 * @module
 */

import type { Law, LawSet, LawVerificationResult, VerificationSummary } from "./types.js";

/**
 * Check one law against every sample, stopping at the first counterexample.
 */
export function verifyLaw<A>(law: Law<[A]>, samples: Iterable<A>): LawVerificationResult<[A]> {
  let count = 0;
  for (const x of samples) {
    if (!law.check(x)) {
      return {
        status: "failed",
        law: law.name,
        description: law.description,
        counterexample: [x],
      };
    }
    count++;
  }
  return { status: "held", law: law.name, samples: count };
}

/**
 * Check every law against every sample.
 *
 * @example
 * ```typescript
 * const summary = verifyLaws(monadLaws(sequenceMonad, eq, square, double), [0, 1, 2]);
 * summary.failed; // → 0
 * ```
 */
export function verifyLaws<A>(laws: LawSet<[A]>, samples: Iterable<A>): VerificationSummary<[A]> {
  const values = [...samples];
  const results = laws.map((law) => verifyLaw(law, values));
  const failed = results.filter((r) => r.status === "failed").length;
  return {
    total: results.length,
    held: results.length - failed,
    failed,
    results,
  };
}

/**
 * Conjunction of every law at a single value.
 */
export function allLawsHold<A>(laws: LawSet<[A]>): (x: A) => boolean {
  return (x) => laws.every((law) => law.check(x));
}
