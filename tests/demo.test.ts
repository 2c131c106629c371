/**
 * Tests for the law harness, the arithmetic checks and the report lines
 */

import { describe, it, expect, vi } from "vitest";
import { Sequence, iota, prod } from "../src/data/sequence.js";
import type { SequenceF } from "../src/hkt.js";
import { makeMonad } from "../src/typeclasses/monad.js";
import { eqSequence } from "../src/typeclasses/eq.js";
import { numericBigInt, numericInt32, numericInt64, numericNumber } from "../src/typeclasses/numeric.js";
import { monadLaws } from "../src/laws/monad.js";
import { checkLaws, endofunctors, sequenceMonadLaws } from "../src/demo/laws.js";
import { checkArithmetic, sigmaDx2, sigmaSqr, sigmaSquares } from "../src/demo/arithmetic.js";
import { formatArithmeticReport } from "../src/demo/report.js";
import { runDemo, runDemoWith } from "../src/demo/index.js";
import { createLogger } from "../src/core/logger.js";
import { DEFAULT_CONFIG } from "../src/core/config.js";

const VALID_REPORT_0_TO_99 = [
  "",
  "left identity, right identity, associativity laws valid.",
  "... so, it is a monad after all!",
  "... so, we can now start playing and pay the consequences!",
  "Sum of doubles of integer sequence 0,1,2,3,...,99 test: true",
  "Sum of squares of integer sequence 0,1,2,3,...,99 test: true",
  "Sum of squares vs square of sums (provided no overflow): true",
  "",
];

describe("endofunctors", () => {
  it("square and double should wrap their results with unit", () => {
    const { square, double } = endofunctors(numericNumber);
    expect(square(7).toArray()).toEqual([49]);
    expect(double(7).toArray()).toEqual([14]);
  });
});

describe("checkLaws", () => {
  it("should hold for 0..99 and leave the samples intact", () => {
    const xs = iota(100, 0, numericInt64.fromNumber);
    expect(checkLaws(sequenceMonadLaws(numericInt64), xs)).toEqual({ valid: true });
    expect(xs.size).toBe(100);
  });

  it("should summarize failures for a broken monad", () => {
    // reverses multi-element inputs and truncates results of singleton inputs
    const skewed = makeMonad<SequenceF>(
      <A>(a: A): Sequence<A> => Sequence.of(a),
      <A, B>(fa: Sequence<A>, f: (a: A) => Sequence<B>): Sequence<B> => {
        if (fa.size > 1) return prod(f, Sequence.fromIterable(fa.toArray().reverse()));
        const out = prod(f, fa).toArray();
        return Sequence.fromIterable(out.length > 1 ? out.slice(0, -1) : out);
      },
    );
    const { square } = endofunctors(numericNumber);
    const spread = (x: number): Sequence<number> => Sequence.of(x, x + 1);
    const laws = monadLaws<SequenceF, number>(skewed, eqSequence(numericNumber), square, spread);

    const check = checkLaws(laws, iota(3, 0, (n) => n));
    expect(check.valid).toBe(false);
    expect(check.summary?.results.map((r) => r.status)).toEqual(["held", "held", "failed"]);
    expect(check.summary?.results[2]).toMatchObject({ law: "associativity", counterexample: [0] });
  });
});

describe("arithmetic", () => {
  const xs = iota(100, 0, numericBigInt.fromNumber);

  it("should compute the sums for 0..99 exactly", () => {
    expect(sigmaSquares(numericBigInt, xs)).toBe(328350n);
    expect(sigmaSqr(numericBigInt, xs)).toBe(24502500n);
    expect(sigmaDx2(numericBigInt, xs)).toBe(16665000n);
    expect(xs.size).toBe(100);
  });

  it("should pass every check for 0..99 at each width", () => {
    const allTrue = { sumOfDoubles: true, sumOfSquares: true, squareOfSums: true };
    expect(checkArithmetic(numericBigInt, xs)).toEqual(allTrue);
    expect(checkArithmetic(numericInt64, iota(100, 0, numericInt64.fromNumber))).toEqual(allTrue);
    expect(checkArithmetic(numericInt32, iota(100, 0, numericInt32.fromNumber))).toEqual(allTrue);
    expect(checkArithmetic(numericNumber, iota(100, 0, numericNumber.fromNumber))).toEqual(allTrue);
  });

  it("should hold trivially for an empty sequence", () => {
    expect(checkArithmetic(numericInt64, Sequence.empty<bigint>())).toEqual({
      sumOfDoubles: true,
      sumOfSquares: true,
      squareOfSums: true,
    });
  });

  it("should let the pairwise identity overflow at 32 bits", () => {
    expect(checkArithmetic(numericInt32, iota(1000, 0, numericInt32.fromNumber))).toEqual({
      sumOfDoubles: true,
      sumOfSquares: true,
      squareOfSums: false,
    });
  });
});

describe("formatArithmeticReport", () => {
  it("should flag an overflowed identity", () => {
    const lines = formatArithmeticReport(1000, {
      sumOfDoubles: true,
      sumOfSquares: false,
      squareOfSums: false,
    });
    expect(lines).toEqual([
      "Sum of doubles of integer sequence 0,1,2,3,...,999 test: true",
      "Sum of squares of integer sequence 0,1,2,3,...,999 test: false",
      "Sum of squares vs square of sums (provided no overflow): false (you overflowed it!)",
    ]);
  });
});

describe("runDemo", () => {
  it("should print the full report for the default configuration", () => {
    const result = runDemo(DEFAULT_CONFIG);
    expect(result.lines).toEqual(VALID_REPORT_0_TO_99);
    expect(result.lawsValid).toBe(true);
    expect(result.passed).toBe(true);
  });

  it("should produce the same report at every width for 0..99", () => {
    for (const numeric of ["int32", "number", "bigint"] as const) {
      expect(runDemo({ ...DEFAULT_CONFIG, numeric }).lines).toEqual(VALID_REPORT_0_TO_99);
    }
  });

  it("should report overflow without failing the laws", () => {
    const result = runDemo({ ...DEFAULT_CONFIG, numeric: "int32", length: 1000 });
    expect(result.lawsValid).toBe(true);
    expect(result.passed).toBe(false);
    expect(result.lines.slice(4)).toEqual([
      "Sum of doubles of integer sequence 0,1,2,3,...,999 test: true",
      "Sum of squares of integer sequence 0,1,2,3,...,999 test: true",
      "Sum of squares vs square of sums (provided no overflow): false (you overflowed it!)",
      "",
    ]);
  });

  it("should skip the arithmetic when a law fails", () => {
    const stutter = makeMonad<SequenceF>(
      <A>(a: A): Sequence<A> => Sequence.of(a, a),
      <A, B>(fa: Sequence<A>, f: (a: A) => Sequence<B>): Sequence<B> => prod(f, fa),
    );
    const { square, double } = endofunctors(numericNumber);
    const laws = monadLaws<SequenceF, number>(stutter, eqSequence(numericNumber), square, double);

    const result = runDemoWith({ numeric: numericNumber, length: 5, laws });
    expect(result.lines).toEqual([
      "",
      "left identity, right identity, associativity laws NOT valid.",
      "... left identity failed for x = 0",
      "... right identity failed for x = 0",
      "",
    ]);
    expect(result.arithmetic).toBeUndefined();
    expect(result.passed).toBe(false);
  });

  it("should log progress in verbose mode", () => {
    const out = vi.fn<(line: string) => void>();
    runDemo({ ...DEFAULT_CONFIG, length: 3, verbose: true }, createLogger({ verbose: true, out }));
    expect(out.mock.calls.map(([line]) => line)).toEqual([
      "[monadplay] numeric width: int64, length: 3",
      "[monadplay] checking left identity, right identity, associativity over 0..2",
      "[monadplay] running arithmetic checks",
    ]);
  });
});
