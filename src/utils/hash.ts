/**
 * Cryptographic hashing utilities for verification
 *
 * Uses SHA-256 from node:crypto
 */

import { createHash } from 'node:crypto';
import type { ParticipantAggregate } from '@/types';
import { generateRandomHex } from './random';

/**
 * Generate SHA-256 hash of a string
 */
export function sha256(message: string): string {
  return createHash('sha256').update(message, 'utf8').digest('hex');
}

/**
 * Generate a hash of the weighted participant list for verification
 *
 * This allows anyone to verify that the participant list and its weights
 * weren't modified after the draw was performed.
 */
export function hashParticipants(participants: readonly ParticipantAggregate[]): string {
  // Sort by username to ensure consistent ordering
  const sorted = [...participants].sort((a, b) =>
    a.username < b.username ? -1 : a.username > b.username ? 1 : 0
  );

  const canonical = sorted.map(p => `${p.username}:${p.totalWeight}`).join(',');

  return sha256(canonical);
}

/**
 * Generate a verification hash for a complete draw
 *
 * Winners are hashed in draw order, since rank is part of the result.
 */
export function generateDrawHash(
  timestamp: Date,
  participantHash: string,
  winners: readonly string[],
  seed?: string
): string {
  const data = `${timestamp.toISOString()}|${participantHash}|${winners.join(',')}|${seed ?? ''}`;
  return sha256(data);
}

/**
 * Generate a short verification ID from a hash
 *
 * More user-friendly than a full hash
 */
export function shortId(hash: string, length: number = 8): string {
  return hash.substring(0, length).toUpperCase();
}

/**
 * Generate a draw ID combining timestamp and randomness
 */
export function generateDrawId(now: Date = new Date()): string {
  const timestamp = now.getTime().toString(36);
  return `${timestamp}-${generateRandomHex(3)}`.toUpperCase();
}
