/**
 * Random sources for the draw
 *
 * Unseeded draws read the operating system CSPRNG. Seeded draws expand the
 * seed with SHA-256 in counter mode, so anyone holding the seed and the
 * participant list can replay the draw and get the same winners.
 */

import { createHash, randomBytes } from 'node:crypto';
import { InvalidSeedError } from './errors';

/**
 * A stream of uniformly distributed bytes
 */
export interface RandomSource {
  nextBytes(length: number): Uint8Array;
}

/**
 * Platform CSPRNG
 */
export class SecureRandom implements RandomSource {
  nextBytes(length: number): Uint8Array {
    return new Uint8Array(randomBytes(length));
  }
}

/**
 * Deterministic generator: block i is SHA-256("<seed>:<i>")
 */
export class SeededRandom implements RandomSource {
  readonly seed: string;
  private counter = 0;
  private pool: Buffer = Buffer.alloc(0);

  constructor(seed: string) {
    if (seed.length === 0) {
      throw new InvalidSeedError('Seed must not be empty');
    }
    this.seed = seed;
  }

  nextBytes(length: number): Uint8Array {
    while (this.pool.length < length) {
      const block = createHash('sha256').update(`${this.seed}:${this.counter}`).digest();
      this.counter++;
      this.pool = Buffer.concat([this.pool, block]);
    }

    const out = new Uint8Array(this.pool.subarray(0, length));
    this.pool = this.pool.subarray(length);
    return out;
  }
}

/**
 * Seeded source when a seed is given, otherwise the fallback (CSPRNG by default)
 */
export function createRandomSource(seed?: string, fallback?: RandomSource): RandomSource {
  if (seed !== undefined) {
    return new SeededRandom(seed);
  }
  return fallback ?? new SecureRandom();
}

/**
 * Uniform integer in [0, max) of arbitrary size
 *
 * Uses rejection sampling on the smallest whole number of bytes that covers
 * max - 1, so every value is equally likely.
 */
export function randomBelow(source: RandomSource, max: bigint): bigint {
  if (max <= 0n) {
    throw new RangeError('Max must be positive');
  }
  if (max === 1n) {
    return 0n;
  }

  const bits = (max - 1n).toString(2).length;
  const byteLength = Math.ceil(bits / 8);
  const excess = BigInt(byteLength * 8 - bits);

  let value: bigint;
  do {
    value = bytesToBigInt(source.nextBytes(byteLength)) >> excess;
  } while (value >= max);

  return value;
}

/**
 * Generate a random hex string of specified length
 */
export function generateRandomHex(bytes: number = 16): string {
  return Array.from(randomBytes(bytes))
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}
