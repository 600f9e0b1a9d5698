/**
 * Weighted sampling without replacement
 *
 * Winners are drawn one at a time. On each draw a remaining participant is
 * picked with probability weight / (sum of remaining weights), then removed
 * from the pool. All arithmetic is exact bigint arithmetic over integer
 * weights, so no floating-point drift builds up across draws.
 */

import type { ParticipantAggregate, SampleResult } from '@/types';
import { InvalidWinnerCountError } from './errors';
import { randomBelow, type RandomSource } from './random';

/**
 * Fenwick tree over non-negative integer weights
 *
 * Supports prefix-sum search and removal in O(log n).
 */
export class WeightTree {
  private readonly tree: bigint[];
  private readonly weights: bigint[];
  private remaining: bigint;

  constructor(weights: readonly bigint[]) {
    const n = weights.length;
    this.weights = [...weights];
    this.tree = new Array<bigint>(n + 1).fill(0n);
    this.remaining = 0n;

    for (let i = 0; i < n; i++) {
      if (weights[i] < 0n) {
        throw new RangeError('Weights must be non-negative');
      }
      this.tree[i + 1] = weights[i];
      this.remaining += weights[i];
    }

    for (let i = 1; i <= n; i++) {
      const parent = i + (i & -i);
      if (parent <= n) {
        this.tree[parent] += this.tree[i];
      }
    }
  }

  get size(): number {
    return this.weights.length;
  }

  /** Sum of weights still in the tree */
  get total(): bigint {
    return this.remaining;
  }

  /**
   * Index of the item whose cumulative weight range contains target,
   * i.e. the first index with prefixSum(index + 1) > target.
   * Zero-weight items are never returned.
   */
  find(target: bigint): number {
    if (target < 0n || target >= this.remaining) {
      throw new RangeError('Target outside the remaining weight');
    }

    let position = 0;
    let rest = target;
    let step = highestPowerOfTwo(this.weights.length);

    while (step > 0) {
      const next = position + step;
      if (next <= this.weights.length && this.tree[next] <= rest) {
        position = next;
        rest -= this.tree[next];
      }
      step >>= 1;
    }

    return position;
  }

  /** Set an item's weight to zero */
  remove(index: number): void {
    const weight = this.weights[index];
    if (weight === 0n) return;

    this.weights[index] = 0n;
    this.remaining -= weight;

    for (let i = index + 1; i <= this.weights.length; i += i & -i) {
      this.tree[i] -= weight;
    }
  }
}

/**
 * Draw up to `count` distinct items, each draw proportional to remaining weight
 *
 * Items with zero weight are never drawn. Returns fewer than `count` items
 * only when the positive-weight pool runs out. Output is in draw order.
 */
export function weightedSampleWithoutReplacement<T>(
  items: readonly T[],
  weightOf: (item: T) => bigint,
  count: number,
  random: RandomSource
): T[] {
  const tree = new WeightTree(items.map(weightOf));
  const drawn: T[] = [];

  while (drawn.length < count && tree.total > 0n) {
    const index = tree.find(randomBelow(random, tree.total));
    drawn.push(items[index]);
    tree.remove(index);
  }

  return drawn;
}

export interface DrawOptions {
  /** Number of winners requested */
  count: number;
  /** Extra participants drawn after the winners */
  alternates?: number;
  random: RandomSource;
}

/**
 * Draw winners (and optional alternates) from the participant aggregate
 *
 * Only participants with positive total weight are eligible. A population
 * smaller than the requested count is drawn in full and reported as
 * `insufficient_population`; an empty one yields `no_eligible_participants`.
 */
export function drawWinners(
  participants: Iterable<ParticipantAggregate>,
  options: DrawOptions
): SampleResult {
  const { count, alternates = 0, random } = options;

  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidWinnerCountError('Winner count must be a positive integer', count);
  }
  if (!Number.isInteger(alternates) || alternates < 0) {
    throw new InvalidWinnerCountError('Alternate count must be a non-negative integer', alternates);
  }

  const eligible = Array.from(participants).filter(p => p.totalWeight > 0);

  if (eligible.length === 0) {
    return { status: 'no_eligible_participants', winners: [], alternates: [], requested: count };
  }

  const effective = Math.min(count, eligible.length);
  const drawn = weightedSampleWithoutReplacement(
    eligible,
    p => BigInt(p.totalWeight),
    effective + alternates,
    random
  );

  const winners = drawn.slice(0, effective);
  const alternateList = drawn.slice(effective);

  if (effective < count) {
    return {
      status: 'insufficient_population',
      winners,
      alternates: alternateList,
      requested: count,
      effective,
    };
  }

  return { status: 'complete', winners, alternates: alternateList, requested: count };
}

function highestPowerOfTwo(n: number): number {
  let power = 1;
  while (power * 2 <= n) {
    power *= 2;
  }
  return n === 0 ? 0 : power;
}
