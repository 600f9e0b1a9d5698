/**
 * Entry validation and weighting
 *
 * An entry counts only when it tags three accounts. Each entry's weight is
 * its like count plus one, so an unliked entry still carries a chance.
 */

import type {
  Diagnostic,
  InvalidReason,
  InvalidReasonCounts,
  InvalidRecord,
  NormalizedRecord,
  ValidationResult,
  ValidEntry,
} from '@/types';

const LIKES_CAP = Number.MAX_SAFE_INTEGER - 1;

export const INVALID_REASONS: readonly InvalidReason[] = [
  'missing_mention_1',
  'missing_mention_2',
  'missing_mention_3',
];

/**
 * Extract the like count from a free-text engagement cell
 *
 * Takes the first run of decimal digits: "Liked by 5 people" is 5,
 * "12 and 34" is 12, anything without digits is 0.
 */
export function extractLikes(engagementRaw: string | undefined): number {
  if (!engagementRaw) {
    return 0;
  }

  const match = /[0-9]+/.exec(engagementRaw);
  if (!match) {
    return 0;
  }

  // Runs past ~309 digits parse to Infinity, which the cap also absorbs
  return Math.min(Number(match[0]), LIKES_CAP);
}

/**
 * Weight of a single entry
 */
export function entryWeight(likes: number): number {
  return likes + 1;
}

/**
 * Split normalized records into valid entries and rejected records
 */
export function validateEntries(records: readonly NormalizedRecord[]): ValidationResult {
  const diagnostics: Diagnostic[] = [];

  if (records.length === 0) {
    diagnostics.push({
      code: 'EmptyInputError',
      stage: 'validate',
      message: 'No records to validate',
    });
    return {
      entries: [],
      invalid: [],
      stats: { total: 0, valid: 0, invalid: 0 },
      diagnostics,
    };
  }

  const entries: ValidEntry[] = [];
  const invalid: InvalidRecord[] = [];

  for (const record of records) {
    const reasons = getInvalidReasons(record);

    if (reasons.length > 0) {
      invalid.push({ record, reasons });
      continue;
    }

    const likes = extractLikes(record.engagementRaw);
    entries.push({ ...record, likes, weight: entryWeight(likes) });
  }

  return {
    entries,
    invalid,
    stats: {
      total: records.length,
      valid: entries.length,
      invalid: invalid.length,
    },
    diagnostics,
  };
}

function getInvalidReasons(record: NormalizedRecord): InvalidReason[] {
  const reasons: InvalidReason[] = [];

  if (!hasValue(record.mention1)) reasons.push('missing_mention_1');
  if (!hasValue(record.mention2)) reasons.push('missing_mention_2');
  if (!hasValue(record.mention3)) reasons.push('missing_mention_3');

  return reasons;
}

function hasValue(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Get a human-readable description for an invalid reason
 */
export function getInvalidReasonLabel(reason: InvalidReason): string {
  const labels: Record<InvalidReason, string> = {
    missing_mention_1: 'First tag missing',
    missing_mention_2: 'Second tag missing',
    missing_mention_3: 'Third tag missing',
  };

  return labels[reason];
}

/**
 * How often each reason occurs among rejected records
 *
 * A record missing several tags counts once under each of them.
 */
export function countInvalidReasons(invalid: readonly InvalidRecord[]): InvalidReasonCounts {
  const counts: InvalidReasonCounts = {
    missing_mention_1: 0,
    missing_mention_2: 0,
    missing_mention_3: 0,
  };

  for (const { reasons } of invalid) {
    for (const reason of reasons) {
      counts[reason]++;
    }
  }

  return counts;
}
