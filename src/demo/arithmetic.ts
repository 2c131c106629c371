/**
 * Arithmetic built from the sequence combinators.
 *
 * For xs = 0, 1, ..., n-1 and m = n-1:
 *
 *   (a) Σ 2x                         = 2 · m(m+1)/2
 *   (b) Σ x²                         = m(m+1)(2m+1)/6
 *   (c) n · Σx² − (Σx)²              = ½ · ΣᵢΣⱼ (xᵢ − xⱼ)²
 *
 * Nothing guards against overflow: at a narrow width (c) is expected to fail.
 */

import type { Sequence } from "../data/sequence.js";
import { prod, fmap, foldl } from "../data/sequence.js";
import type { Numeric } from "../typeclasses/numeric.js";
import { sum, dif, sqr, sn1, sn2 } from "../typeclasses/numeric.js";
import { compose, partial } from "../syntax/function.js";
import { endofunctors } from "./laws.js";

export interface ArithmeticReport {
  readonly sumOfDoubles: boolean;
  readonly sumOfSquares: boolean;
  readonly squareOfSums: boolean;
}

/**
 * Σ x², squaring through `fmap`
 */
export function sigmaSquares<N>(N: Numeric<N>, xs: Sequence<N>): N {
  return foldl(sum(N), fmap(sqr(N), xs), N.zero());
}

/**
 * (Σ x)²
 */
export function sigmaSqr<N>(N: Numeric<N>, xs: Sequence<N>): N {
  return sqr(N)(foldl(sum(N), xs, N.zero()));
}

/**
 * ΣᵢΣⱼ (xᵢ − xⱼ)²: for each z, the squared distances of every element to z.
 */
export function sigmaDx2<N>(N: Numeric<N>, xs: Sequence<N>): N {
  const dxSqr = (z: N, l: Sequence<N>): Sequence<N> => fmap(compose(sqr(N), partial(dif(N), z)), l);
  return foldl(sum(N), prod(partial(dxSqr, xs), xs.clone()), N.zero());
}

/**
 * Run the three checks. `xs` is not consumed.
 */
export function checkArithmetic<N>(N: Numeric<N>, xs: Sequence<N>): ArithmeticReport {
  const { square, double } = endofunctors(N);
  const add = sum(N);
  const m = N.fromNumber(xs.size - 1);
  const n = N.fromNumber(xs.size);

  const doubles = foldl(add, prod(double, xs.clone()), N.zero());
  const squares = foldl(add, prod(square, xs.clone()), N.zero());

  const lhs = N.sub(N.mul(n, sigmaSquares(N, xs)), sigmaSqr(N, xs));
  const rhs = N.div(sigmaDx2(N, xs), N.fromNumber(2));

  return {
    sumOfDoubles: N.eqv(doubles, N.mul(N.fromNumber(2), sn1(N)(m))),
    sumOfSquares: N.eqv(squares, sn2(N)(m)),
    squareOfSums: N.eqv(lhs, rhs),
  };
}
