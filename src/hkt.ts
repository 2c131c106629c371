/**
 * Higher-Kinded Types for monadplay
 *
 * TypeScript cannot abstract over a type constructor directly, so typeclasses
 * such as `Monad<F>` take a *type-level function* instead: an interface whose
 * `_` member is computed from a phantom `__kind__` parameter.
 *
 * ```typescript
 * interface SequenceF extends TypeFunction {
 *   readonly _: Sequence<this["__kind__"]>;
 * }
 *
 * type Numbers = Kind<SequenceF, number>; // → Sequence<number>
 * ```
 *
 * The encoding exists only at the type level and is erased at runtime.
 */

import type { Sequence } from "./data/sequence.js";

// ============================================================================
// Core Encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply a type-level function to an argument.
 *
 * `this["__kind__"]` inside `F` resolves to `A` because `this` is the
 * intersection below.
 */
export type Kind<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

// ============================================================================
// Type-Level Functions
// ============================================================================

/**
 * Type-level function for `Sequence<A>`.
 *
 * @example
 * ```typescript
 * type Numbers = Kind<SequenceF, number>; // → Sequence<number>
 * ```
 */
export interface SequenceF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Sequence<this["__kind__"]>;
}

/**
 * Type-level function for `Array<A>`.
 */
export interface ArrayF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Array<this["__kind__"]>;
}
