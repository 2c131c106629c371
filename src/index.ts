/**
 * monadplay: the list monad, built from `unit` and `prod`
 *
 * A mutable singly-linked `Sequence`, the Kleisli triple (Sequence, unit, prod),
 * the operations derived from it, and runtime checks of the monad laws.
 *
 * @example
 * ```typescript
 * import { Sequence, unit, prod, fmap, foldl } from "monadplay";
 *
 * const xs = Sequence.of(1, 2, 3);
 * const pairs = prod((x: number) => Sequence.of(x, -x), xs.clone());
 * pairs.toArray(); // → [1, -1, 2, -2, 3, -3]
 *
 * foldl((acc: number, x: number) => acc + x, fmap((x: number) => x * x, xs), 0); // → 14
 * ```
 */

// ============================================================================
// HKT Foundation
// ============================================================================

export type { Kind, TypeFunction, SequenceF, ArrayF } from "./hkt.js";

// ============================================================================
// Data
// ============================================================================

export { Sequence, iota, unit, prod, join, fmap, foldl } from "./data/sequence.js";
export type { Kleisli } from "./data/sequence.js";

// ============================================================================
// Typeclasses and Instances
// ============================================================================

export * as TC from "./typeclasses/index.js";
export type { Functor, Monad, Foldable, Eq, Numeric, NumericWidth } from "./typeclasses/index.js";

export { eqSequence, eqNumber, eqBigInt } from "./typeclasses/eq.js";
export {
  numericInt64,
  numericInt32,
  numericNumber,
  numericBigInt,
} from "./typeclasses/numeric.js";
export { sequenceMonad, sequenceFoldable } from "./instances.js";

// ============================================================================
// Combinators
// ============================================================================

export { identity, compose, partial } from "./syntax/function.js";

// ============================================================================
// Laws
// ============================================================================

export * from "./laws/index.js";

// ============================================================================
// Demonstration
// ============================================================================

export { runDemo, runDemoWith, type DemoResult, type DemoOptions } from "./demo/index.js";
export { checkArithmetic, type ArithmeticReport } from "./demo/arithmetic.js";
export { checkLaws, sequenceMonadLaws, endofunctors } from "./demo/laws.js";

// ============================================================================
// Configuration and Errors
// ============================================================================

export {
  resolveConfig,
  validateConfig,
  DEFAULT_CONFIG,
  type MonadplayConfig,
} from "./core/config.js";
export { MonadplayError, ConfigError, UsageError, type ExitCode } from "./core/errors.js";
