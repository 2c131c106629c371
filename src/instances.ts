/**
 * Typeclass instances for Sequence
 *
 * Thin views over the Kleisli triple in `data/sequence.ts`, so generic code
 * written against `Monad<F>` and `Foldable<F>` can run on sequences.
 *
 * Note that `flatMap` consumes its input like `prod`, while `map` and
 * `foldLeft` leave it intact.
 */

import type { SequenceF } from "./hkt.js";
import type { Monad } from "./typeclasses/monad.js";
import type { Foldable } from "./typeclasses/foldable.js";
import type { Sequence } from "./data/sequence.js";
import { unit, prod, fmap, foldl } from "./data/sequence.js";

export const sequenceMonad: Monad<SequenceF> = {
  pure: unit,
  flatMap: <A, B>(fa: Sequence<A>, f: (a: A) => Sequence<B>): Sequence<B> => prod(f, fa),
  map: <A, B>(fa: Sequence<A>, f: (a: A) => B): Sequence<B> => fmap(f, fa),
};

export const sequenceFoldable: Foldable<SequenceF> = {
  foldLeft: <A, B>(fa: Sequence<A>, b: B, f: (b: B, a: A) => B): B => foldl(f, fa, b),
};
