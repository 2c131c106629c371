/**
 * Mutable Sequence Data Type
 *
 * An ordered, finite, singly-linked list with O(1) `pushBack`, `popFront` and
 * `splice`. Unlike an immutable cons list, a `Sequence` is owned by whoever
 * holds it: `prod` and `join` consume their input, leaving it empty, and move
 * nodes into the result instead of copying them. Splicing or binding an
 * already consumed sequence throws a `RangeError`.
 *
 * The module-level functions form a Kleisli triple over `Sequence`:
 *
 *   - `unit`:  A => Sequence<A>
 *   - `prod`:  (A => Sequence<B>, Sequence<A>) => Sequence<B>   (bind)
 *
 * and derive `join`, `fmap` and `foldl` from them.
 */

import { identity } from "../syntax/function.js";

// ============================================================================
// Sequence Type Definition
// ============================================================================

interface Node<A> {
  readonly value: A;
  next: Node<A> | undefined;
}

/**
 * A function producing a sequence from a single value.
 */
export type Kleisli<A, B> = (a: A) => Sequence<B>;

export class Sequence<A> implements Iterable<A> {
  private first: Node<A> | undefined = undefined;
  private last: Node<A> | undefined = undefined;
  private count = 0;
  private spent = false;

  // ==========================================================================
  // Constructors
  // ==========================================================================

  /**
   * The empty sequence
   */
  static empty<A = never>(): Sequence<A> {
    return new Sequence<A>();
  }

  /**
   * Create a sequence from variadic arguments
   */
  static of<A>(...as: A[]): Sequence<A> {
    return Sequence.fromIterable(as);
  }

  /**
   * Create a sequence from an iterable, preserving its order
   */
  static fromIterable<A>(iter: Iterable<A>): Sequence<A> {
    const seq = new Sequence<A>();
    for (const a of iter) {
      seq.pushBack(a);
    }
    return seq;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  get size(): number {
    return this.count;
  }

  /**
   * True once the nodes have been moved out by `splice` or `prod`.
   */
  get consumed(): boolean {
    return this.spent;
  }

  isEmpty(): boolean {
    return this.first === undefined;
  }

  /**
   * The first element.
   * @throws RangeError if the sequence is empty
   */
  front(): A {
    if (this.first === undefined) {
      throw new RangeError("front: sequence is empty");
    }
    return this.first.value;
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Append an element at the end
   */
  pushBack(a: A): this {
    const node: Node<A> = { value: a, next: undefined };
    if (this.last === undefined) {
      this.first = node;
    } else {
      this.last.next = node;
    }
    this.last = node;
    this.count++;
    return this;
  }

  /**
   * Remove and return the first element.
   * @throws RangeError if the sequence is empty
   */
  popFront(): A {
    const node = this.first;
    if (node === undefined) {
      throw new RangeError("popFront: sequence is empty");
    }
    this.first = node.next;
    if (this.first === undefined) {
      this.last = undefined;
    }
    this.count--;
    return node.value;
  }

  /**
   * Move every node of `other` to the end of this sequence in O(1).
   * `other` is left empty and marked consumed.
   *
   * @throws RangeError if `other` is this sequence or was already consumed
   */
  splice(other: Sequence<A>): this {
    if (other === this) {
      throw new RangeError("splice: cannot splice a sequence into itself");
    }
    if (other.spent) {
      throw new RangeError("splice: sequence was already consumed");
    }
    other.spent = true;
    if (other.first === undefined) return this;

    if (this.last === undefined) {
      this.first = other.first;
    } else {
      this.last.next = other.first;
    }
    this.last = other.last;
    this.count += other.count;

    other.first = undefined;
    other.last = undefined;
    other.count = 0;
    return this;
  }

  // ==========================================================================
  // Conversions
  // ==========================================================================

  /**
   * A shallow copy with fresh nodes
   */
  clone(): Sequence<A> {
    return Sequence.fromIterable(this);
  }

  toArray(): A[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<A> {
    let current = this.first;
    while (current !== undefined) {
      yield current.value;
      current = current.next;
    }
  }

  toString(): string {
    return `Sequence(${this.toArray().join(", ")})`;
  }
}

/**
 * Consecutive integers `start, start + 1, ..., start + length - 1`,
 * lifted through `fromNumber`.
 *
 * @throws RangeError if length is negative or not an integer
 */
export function iota<N>(length: number, start: number, fromNumber: (n: number) => N): Sequence<N> {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`iota: length must be a non-negative integer, got ${length}`);
  }
  const seq = new Sequence<N>();
  for (let i = 0; i < length; i++) {
    seq.pushBack(fromNumber(start + i));
  }
  return seq;
}

// ============================================================================
// Kleisli Triple
// ============================================================================

/**
 * Wrap a value as a one-element sequence.
 */
export function unit<A>(a: A): Sequence<A> {
  return new Sequence<A>().pushBack(a);
}

/**
 * Bind: the concatenation, in input order, of `f(x)` for every `x` in `xs`.
 *
 * Consumes `xs`, and every sequence `f` returns is spliced into the result,
 * so `f` must return a fresh sequence on each call. Iterative, so the stack
 * does not grow with the input. `f` is never called for an empty input.
 *
 * @throws RangeError if `xs`, or a sequence returned by `f`, was already consumed
 */
export function prod<A, B>(f: Kleisli<A, B>, xs: Sequence<A>): Sequence<B> {
  if (xs.consumed) {
    throw new RangeError("prod: sequence was already consumed");
  }
  const input = new Sequence<A>().splice(xs);
  const out = new Sequence<B>();
  while (!input.isEmpty()) {
    out.splice(f(input.popFront()));
  }
  return out;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Flatten a sequence of sequences. Consumes `xss` and its inner sequences.
 *
 * @throws RangeError if an inner sequence appears twice
 */
export function join<A>(xss: Sequence<Sequence<A>>): Sequence<A> {
  return prod<Sequence<A>, A>(identity, xss);
}

/**
 * Map over a sequence via `prod` and `unit`. `xs` is not consumed.
 */
export function fmap<A, B>(f: (a: A) => B, xs: Sequence<A>): Sequence<B> {
  return prod((a: A) => unit(f(a)), xs.clone());
}

/**
 * Left fold in sequence order. `xs` is not consumed.
 */
export function foldl<A, B>(f: (b: B, a: A) => B, xs: Sequence<A>, b: B): B {
  let acc = b;
  for (const a of xs) {
    acc = f(acc, a);
  }
  return acc;
}
