/**
 * Function combinators
 *
 * Point-free helpers used to build the arithmetic demonstration out of
 * small pieces.
 */

/**
 * The identity function
 */
export function identity<A>(a: A): A {
  return a;
}

/**
 * Right-to-left composition: `compose(f, g)(z) === f(g(z))`
 */
export function compose<A, B, C>(f: (b: B) => C, g: (a: A) => B): (a: A) => C {
  return (a) => f(g(a));
}

/**
 * Fix the second argument of a binary function: `partial(f, y)(z) === f(z, y)`
 *
 * @example
 * ```typescript
 * const minusOne = partial((a: number, b: number) => a - b, 1);
 * minusOne(5); // → 4
 * ```
 */
export function partial<A, B, C>(f: (a: A, b: B) => C, b: B): (a: A) => C {
  return (a) => f(a, b);
}
