/**
 * Typeclasses
 *
 * Each typeclass module is exported as a namespace to avoid name collisions,
 * with the interfaces also exported directly.
 */

export * as MonadOps from "./monad.js";
export type { Functor, Monad } from "./monad.js";

export * as FoldableOps from "./foldable.js";
export type { Foldable } from "./foldable.js";

export * as EqOps from "./eq.js";
export type { Eq } from "./eq.js";

export * as NumericOps from "./numeric.js";
export type { Numeric, NumericWidth } from "./numeric.js";
