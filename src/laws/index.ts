/**
 * Law Definitions
 *
 * Structured law definitions and a runtime verifier.
 *
 * ```typescript
 * import { monadLaws, verifyLaws } from "monadplay/laws";
 *
 * const laws = monadLaws(sequenceMonad, eqSequence(eqNumber), square, double);
 * verifyLaws(laws, [0, 1, 2, 3]).failed; // → 0
 * ```
 *
 * @module
 */

export type {
  Law,
  LawSet,
  ProofHint,
  EqFA,
  LawVerificationResult,
  VerificationSummary,
} from "./types.js";

export { monadLaws, mapConsistencyLaws } from "./monad.js";

export { verifyLaw, verifyLaws, allLawsHold } from "./verify.js";
