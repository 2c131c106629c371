/**
 * Monad Laws
 *
 * The three Kleisli-triple laws, instantiated for a fixed pair of
 * endofunctors so each law becomes a predicate over a single value `x`:
 *
 *   - Left identity:  flatMap(pure(x), f) === f(x)
 *   - Right identity: flatMap(pure(x), pure) === pure(x)
 *   - Associativity:  flatMap(flatMap(pure(x), g), f) === flatMap(pure(x), g >=> f)
 *
 * Every side is rebuilt on each check because flatMap may consume its input.
 *
 * @module
 */

import type { Kind, TypeFunction } from "../hkt.js";
import type { Monad } from "../typeclasses/monad.js";
import { andThen } from "../typeclasses/monad.js";
import type { EqFA, LawSet } from "./types.js";

/**
 * Generate the monad laws for an instance.
 *
 * @param M - The Monad instance to verify
 * @param EqFA - Eq instance for comparing F[A] values
 * @param f - Endofunctor applied last
 * @param g - Endofunctor applied first in the associativity law
 */
export function monadLaws<F extends TypeFunction, A>(
  M: Monad<F>,
  EqFA: EqFA<F, A>,
  f: (a: A) => Kind<F, A>,
  g: (a: A) => Kind<F, A>,
): LawSet<[A]> {
  const kleisli = andThen(M);
  return [
    {
      name: "left identity",
      arity: 1,
      proofHint: "identity-left",
      description: "pure is left identity for flatMap: flatMap(pure(x), f) === f(x)",
      check: (x: A): boolean => EqFA.eqv(M.flatMap<A, A>(M.pure(x), f), f(x)),
    },
    {
      name: "right identity",
      arity: 1,
      proofHint: "identity-right",
      description: "pure is right identity for flatMap: flatMap(pure(x), pure) === pure(x)",
      check: (x: A): boolean => EqFA.eqv(M.flatMap<A, A>(M.pure(x), M.pure), M.pure(x)),
    },
    {
      name: "associativity",
      arity: 1,
      proofHint: "associativity",
      description:
        "flatMap is associative: flatMap(flatMap(pure(x), g), f) === flatMap(pure(x), y => flatMap(g(y), f))",
      check: (x: A): boolean =>
        EqFA.eqv(
          M.flatMap<A, A>(M.flatMap<A, A>(M.pure(x), g), f),
          M.flatMap<A, A>(M.pure(x), kleisli<A, A, A>(g, f)),
        ),
    },
  ];
}

/**
 * map agrees with flatMap followed by pure, for a fixed function.
 */
export function mapConsistencyLaws<F extends TypeFunction, A>(
  M: Monad<F>,
  EqFA: EqFA<F, A>,
  h: (a: A) => A,
): LawSet<[A]> {
  return [
    {
      name: "map derived from flatMap",
      arity: 1,
      proofHint: "homomorphism",
      description: "map(pure(x), h) === flatMap(pure(x), y => pure(h(y)))",
      check: (x: A): boolean =>
        EqFA.eqv(
          M.map<A, A>(M.pure(x), h),
          M.flatMap<A, A>(M.pure(x), (y: A) => M.pure<A>(h(y))),
        ),
    },
  ];
}
