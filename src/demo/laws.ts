/**
 * Monad law harness for the sequence monad.
 *
 * The laws are instantiated with two fixed endofunctors, `square` and
 * `double`, and folded as a conjunction over every generated value.
 */

import type { Kleisli, Sequence } from "../data/sequence.js";
import { unit } from "../data/sequence.js";
import { sequenceFoldable, sequenceMonad } from "../instances.js";
import type { SequenceF } from "../hkt.js";
import { forall } from "../typeclasses/foldable.js";
import { eqSequence } from "../typeclasses/eq.js";
import type { Numeric } from "../typeclasses/numeric.js";
import type { LawSet, VerificationSummary } from "../laws/types.js";
import { monadLaws } from "../laws/monad.js";
import { allLawsHold, verifyLaws } from "../laws/verify.js";

export interface Endofunctors<N> {
  /** x → unit(x * x) */
  readonly square: Kleisli<N, N>;
  /** x → unit(x + x) */
  readonly double: Kleisli<N, N>;
}

export function endofunctors<N>(N: Numeric<N>): Endofunctors<N> {
  return {
    square: (x) => unit(N.mul(x, x)),
    double: (x) => unit(N.add(x, x)),
  };
}

/**
 * Left identity, right identity and associativity of `sequenceMonad`,
 * with `square` as f and `double` as g.
 */
export function sequenceMonadLaws<N>(N: Numeric<N>): LawSet<[N]> {
  const { square, double } = endofunctors(N);
  return monadLaws<SequenceF, N>(sequenceMonad, eqSequence(N), square, double);
}

export interface LawCheck<N> {
  readonly valid: boolean;
  /** Per-law results; only computed when some law failed */
  readonly summary?: VerificationSummary<[N]>;
}

/**
 * Fold the conjunction of `laws` over `samples`. `samples` is not consumed.
 */
export function checkLaws<N>(laws: LawSet<[N]>, samples: Sequence<N>): LawCheck<N> {
  const valid = forall(sequenceFoldable)(samples, allLawsHold(laws));
  if (valid) {
    return { valid };
  }
  return { valid, summary: verifyLaws(laws, samples) };
}
