/**
 * Text report lines for the demonstration.
 */

import type { LawCheck } from "./laws.js";
import type { ArithmeticReport } from "./arithmetic.js";

export function formatLawCheck<N>(check: LawCheck<N>): string[] {
  if (check.valid) {
    return [
      "left identity, right identity, associativity laws valid.",
      "... so, it is a monad after all!",
      "... so, we can now start playing and pay the consequences!",
    ];
  }

  const lines = ["left identity, right identity, associativity laws NOT valid."];
  for (const result of check.summary?.results ?? []) {
    if (result.status === "failed") {
      lines.push(`... ${result.law} failed for x = ${String(result.counterexample[0])}`);
    }
  }
  return lines;
}

export function formatArithmeticReport(length: number, report: ArithmeticReport): string[] {
  const last = length - 1;
  return [
    `Sum of doubles of integer sequence 0,1,2,3,...,${last} test: ${report.sumOfDoubles}`,
    `Sum of squares of integer sequence 0,1,2,3,...,${last} test: ${report.sumOfSquares}`,
    `Sum of squares vs square of sums (provided no overflow): ${
      report.squareOfSums ? "true" : "false (you overflowed it!)"
    }`,
  ];
}
