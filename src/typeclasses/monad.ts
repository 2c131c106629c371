/**
 * Functor and Monad Typeclasses
 *
 * A Monad is a Kleisli triple (F, pure, flatMap); `map` and `flatten` are
 * derived from the other two.
 *
 * Laws:
 *   - Left identity: flatMap(pure(a), f) === f(a)
 *   - Right identity: flatMap(m, pure) === m
 *   - Associativity: flatMap(flatMap(m, g), f) === flatMap(m, a => flatMap(g(a), f))
 */

import type { Kind, TypeFunction } from "../hkt.js";

// ============================================================================
// Functor
// ============================================================================

export interface Functor<F extends TypeFunction> {
  readonly map: <A, B>(fa: Kind<F, A>, f: (a: A) => B) => Kind<F, B>;
}

// ============================================================================
// Monad
// ============================================================================

/**
 * Monad typeclass - pure (unit) and flatMap (bind/prod)
 */
export interface Monad<F extends TypeFunction> extends Functor<F> {
  readonly pure: <A>(a: A) => Kind<F, A>;
  readonly flatMap: <A, B>(fa: Kind<F, A>, f: (a: A) => Kind<F, B>) => Kind<F, B>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Flatten a nested structure
 */
export function flatten<F extends TypeFunction>(
  M: Monad<F>,
): <A>(ffa: Kind<F, Kind<F, A>>) => Kind<F, A> {
  return <A>(ffa: Kind<F, Kind<F, A>>): Kind<F, A> =>
    M.flatMap<Kind<F, A>, A>(ffa, (fa: Kind<F, A>) => fa);
}

/**
 * map expressed through flatMap and pure
 */
export function mapViaFlatMap<F extends TypeFunction>(
  M: Monad<F>,
): <A, B>(fa: Kind<F, A>, f: (a: A) => B) => Kind<F, B> {
  return <A, B>(fa: Kind<F, A>, f: (a: A) => B): Kind<F, B> =>
    M.flatMap<A, B>(fa, (a: A) => M.pure<B>(f(a)));
}

/**
 * Kleisli composition (>=>)
 */
export function andThen<F extends TypeFunction>(
  M: Monad<F>,
): <A, B, C>(f: (a: A) => Kind<F, B>, g: (b: B) => Kind<F, C>) => (a: A) => Kind<F, C> {
  return <A, B, C>(f: (a: A) => Kind<F, B>, g: (b: B) => Kind<F, C>) =>
    (a: A): Kind<F, C> =>
      M.flatMap<B, C>(f(a), g);
}

// ============================================================================
// Instance Creator
// ============================================================================

/**
 * Create a Monad instance whose map is derived from flatMap
 */
export function makeMonad<F extends TypeFunction>(
  pure: <A>(a: A) => Kind<F, A>,
  flatMap: <A, B>(fa: Kind<F, A>, f: (a: A) => Kind<F, B>) => Kind<F, B>,
): Monad<F> {
  return {
    pure,
    flatMap,
    map: <A, B>(fa: Kind<F, A>, f: (a: A) => B): Kind<F, B> =>
      flatMap<A, B>(fa, (a: A) => pure<B>(f(a))),
  };
}
