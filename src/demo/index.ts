/**
 * The demonstration: verify the monad laws over 0..length-1, then, only if
 * they hold, run the arithmetic checks.
 */

import { iota } from "../data/sequence.js";
import type { Numeric } from "../typeclasses/numeric.js";
import { numericBigInt, numericInt32, numericInt64, numericNumber } from "../typeclasses/numeric.js";
import type { LawSet } from "../laws/types.js";
import type { MonadplayConfig } from "../core/config.js";
import type { Logger } from "../core/logger.js";
import type { ArithmeticReport } from "./arithmetic.js";
import { checkArithmetic } from "./arithmetic.js";
import { checkLaws, sequenceMonadLaws } from "./laws.js";
import { formatArithmeticReport, formatLawCheck } from "./report.js";

export interface DemoResult {
  /** Report lines, in output order */
  readonly lines: readonly string[];
  readonly lawsValid: boolean;
  /** Absent when the laws failed and the arithmetic was skipped */
  readonly arithmetic?: ArithmeticReport;
  /** Every law and every arithmetic check held */
  readonly passed: boolean;
}

export interface DemoOptions<N> {
  readonly numeric: Numeric<N>;
  readonly length: number;
  /** Laws to verify (default: the sequence monad laws at this width) */
  readonly laws?: LawSet<[N]>;
  readonly logger?: Logger;
}

export function runDemoWith<N>(options: DemoOptions<N>): DemoResult {
  const { numeric: N, length, logger } = options;
  const laws = options.laws ?? sequenceMonadLaws(N);
  const xs = iota(length, 0, N.fromNumber);

  logger?.debug(`checking ${laws.map((l) => l.name).join(", ")} over 0..${length - 1}`);
  const check = checkLaws(laws, xs);
  const lines = ["", ...formatLawCheck(check)];

  if (!check.valid) {
    logger?.debug(`${check.summary?.failed ?? 0} of ${laws.length} laws failed; skipping arithmetic`);
    return { lines: [...lines, ""], lawsValid: false, passed: false };
  }

  logger?.debug("running arithmetic checks");
  const arithmetic = checkArithmetic(N, xs);
  lines.push(...formatArithmeticReport(length, arithmetic), "");

  return {
    lines,
    lawsValid: true,
    arithmetic,
    passed: arithmetic.sumOfDoubles && arithmetic.sumOfSquares && arithmetic.squareOfSums,
  };
}

/**
 * Run the demonstration at the configured numeric width.
 */
export function runDemo(config: MonadplayConfig, logger?: Logger): DemoResult {
  logger?.debug(`numeric width: ${config.numeric}, length: ${config.length}`);
  switch (config.numeric) {
    case "int64":
      return runDemoWith({ numeric: numericInt64, length: config.length, logger });
    case "int32":
      return runDemoWith({ numeric: numericInt32, length: config.length, logger });
    case "number":
      return runDemoWith({ numeric: numericNumber, length: config.length, logger });
    case "bigint":
      return runDemoWith({ numeric: numericBigInt, length: config.length, logger });
  }
}
