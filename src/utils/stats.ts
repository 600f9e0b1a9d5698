/**
 * Descriptive statistics over a finished draw
 */

import type {
  AggregateResult,
  AuditEntry,
  GroupStats,
  HighVolumeParticipant,
  HighVolumeReport,
  ParticipantAggregate,
  ResultSummary,
  ValidEntry,
  WinnerStats,
} from '@/types';

export interface HighVolumeOptions {
  /** Participants with more entries than this are flagged */
  threshold: number;
  /** Entries shown per flagged participant */
  sampleSize: number;
}

/**
 * Per-winner rows plus winner and non-winner group summaries
 */
export function summarizeResults(
  participants: ReadonlyMap<string, ParticipantAggregate>,
  winners: readonly ParticipantAggregate[]
): ResultSummary {
  const winnerNames = new Set(winners.map(w => w.username));
  const nonWinners = Array.from(participants.values()).filter(p => !winnerNames.has(p.username));

  const rows: WinnerStats[] = winners.map((winner, index) => ({
    rank: index + 1,
    username: winner.username,
    profileRef: winner.profileRef,
    entries: winner.entryCount,
    likes: winner.totalLikes,
    score: winner.totalWeight,
  }));

  return {
    winners: rows,
    winnerGroup: summarizeGroup(winners),
    nonWinnerGroup: summarizeGroup(nonWinners),
  };
}

/**
 * Totals and per-participant averages for a group; averages are 0 for an empty group
 */
export function summarizeGroup(group: readonly ParticipantAggregate[]): GroupStats {
  let entries = 0;
  let likes = 0;

  for (const participant of group) {
    entries += participant.entryCount;
    likes += participant.totalLikes;
  }

  const count = group.length;

  return {
    participants: count,
    entries,
    likes,
    averageEntries: count > 0 ? entries / count : 0,
    averageLikes: count > 0 ? likes / count : 0,
  };
}

/**
 * Flag participants whose entry count exceeds the threshold
 *
 * Most entries first; equal counts keep first-appearance order.
 */
export function findHighVolumeParticipants(
  aggregate: Pick<AggregateResult, 'participants' | 'entriesByParticipant'>,
  options: HighVolumeOptions
): HighVolumeReport {
  const { threshold, sampleSize } = options;

  const flagged: HighVolumeParticipant[] = Array.from(aggregate.participants.values())
    .filter(p => p.entryCount > threshold)
    .sort((a, b) => b.entryCount - a.entryCount)
    .map(p => ({
      username: p.username,
      entryCount: p.entryCount,
      sample: (aggregate.entriesByParticipant.get(p.username) ?? [])
        .slice(0, Math.max(0, sampleSize))
        .map(toAuditEntry),
    }));

  return { threshold, participants: flagged };
}

function toAuditEntry(entry: ValidEntry): AuditEntry {
  return {
    timeToken: entry.timeToken,
    tags: [entry.mention1 ?? '', entry.mention2 ?? '', entry.mention3 ?? ''],
    comment: entry.commentText ? entry.commentText : '[No Text]',
  };
}
