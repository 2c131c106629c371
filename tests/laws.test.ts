/**
 * Tests for the monad law generators and the law verifier
 */

import { describe, it, expect } from "vitest";
import { Sequence, iota, prod, unit } from "../src/data/sequence.js";
import type { SequenceF } from "../src/hkt.js";
import { sequenceMonad } from "../src/instances.js";
import { makeMonad } from "../src/typeclasses/monad.js";
import { eqNumber, eqSequence } from "../src/typeclasses/eq.js";
import { monadLaws, mapConsistencyLaws } from "../src/laws/monad.js";
import { allLawsHold, verifyLaw, verifyLaws } from "../src/laws/verify.js";
import type { Law } from "../src/laws/types.js";

const eq = eqSequence(eqNumber);
const square = (x: number): Sequence<number> => unit(x * x);
const double = (x: number): Sequence<number> => unit(x + x);
const samples = [...iota(100, 0, (n) => n)];

// pure duplicates its argument, which breaks both identity laws
const stutterMonad = makeMonad<SequenceF>(
  <A>(a: A): Sequence<A> => Sequence.of(a, a),
  <A, B>(fa: Sequence<A>, f: (a: A) => Sequence<B>): Sequence<B> => prod(f, fa),
);

describe("monadLaws", () => {
  it("should produce left identity, right identity and associativity", () => {
    const laws = monadLaws<SequenceF, number>(sequenceMonad, eq, square, double);
    expect(laws.map((l) => l.name)).toEqual(["left identity", "right identity", "associativity"]);
    expect(laws.map((l) => l.proofHint)).toEqual(["identity-left", "identity-right", "associativity"]);
    expect(laws.every((l) => l.arity === 1)).toBe(true);
  });

  it("should hold for the sequence monad over 0..99", () => {
    const summary = verifyLaws(monadLaws<SequenceF, number>(sequenceMonad, eq, square, double), samples);
    expect(summary).toEqual({
      total: 3,
      held: 3,
      failed: 0,
      results: [
        { status: "held", law: "left identity", samples: 100 },
        { status: "held", law: "right identity", samples: 100 },
        { status: "held", law: "associativity", samples: 100 },
      ],
    });
  });

  it("should hold for endofunctors producing several results", () => {
    const spread = (x: number): Sequence<number> => Sequence.of(x, x + 1);
    const drop = (x: number): Sequence<number> => (x % 3 === 0 ? Sequence.empty() : unit(x));
    const laws = monadLaws<SequenceF, number>(sequenceMonad, eq, spread, drop);
    expect(verifyLaws(laws, samples).failed).toBe(0);
  });

  it("should catch a monad whose pure is not an identity", () => {
    const summary = verifyLaws(monadLaws<SequenceF, number>(stutterMonad, eq, square, double), samples);
    expect(summary.failed).toBe(2);
    expect(summary.results[0]).toMatchObject({ status: "failed", law: "left identity", counterexample: [0] });
    expect(summary.results[1]).toMatchObject({ status: "failed", law: "right identity", counterexample: [0] });
    expect(summary.results[2]).toEqual({ status: "held", law: "associativity", samples: 100 });
  });
});

describe("mapConsistencyLaws", () => {
  it("should hold for the sequence monad", () => {
    const laws = mapConsistencyLaws<SequenceF, number>(sequenceMonad, eq, (x) => x * 3 - 1);
    expect(verifyLaws(laws, samples).failed).toBe(0);
  });
});

describe("verifyLaw", () => {
  const positive: Law<[number]> = {
    name: "positive",
    arity: 1,
    description: "x > 0",
    check: (x) => x > 0,
  };

  it("should report the first counterexample", () => {
    expect(verifyLaw(positive, [3, 2, -1, -5])).toEqual({
      status: "failed",
      law: "positive",
      description: "x > 0",
      counterexample: [-1],
    });
  });

  it("should count samples when the law holds", () => {
    expect(verifyLaw(positive, [1, 2])).toEqual({ status: "held", law: "positive", samples: 2 });
  });

  it("allLawsHold should be the conjunction at one value", () => {
    const even: Law<[number]> = { name: "even", arity: 1, check: (x) => x % 2 === 0 };
    const both = allLawsHold([positive, even]);
    expect(both(2)).toBe(true);
    expect(both(3)).toBe(false);
    expect(both(-2)).toBe(false);
  });
});
