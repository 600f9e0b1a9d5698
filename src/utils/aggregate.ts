/**
 * Per-participant aggregation of valid entries
 */

import type {
  AggregateResult,
  Diagnostic,
  ParticipantAggregate,
  ValidEntry,
} from '@/types';

/**
 * Group valid entries by username in a single pass
 *
 * Map keys keep the order in which each username first appears. The profile
 * reference comes from a participant's first entry and is never replaced,
 * even when later rows scraped a different URL. Weight and like totals stop
 * at Number.MAX_SAFE_INTEGER so they stay exact when handed to the sampler.
 */
export function aggregateParticipants(entries: readonly ValidEntry[]): AggregateResult {
  const participants = new Map<string, ParticipantAggregate>();
  const entriesByParticipant = new Map<string, ValidEntry[]>();
  const diagnostics: Diagnostic[] = [];

  if (entries.length === 0) {
    diagnostics.push({
      code: 'EmptyInputError',
      stage: 'aggregate',
      message: 'No valid entries to aggregate',
    });
    return { participants, entriesByParticipant, participantCount: 0, diagnostics };
  }

  for (const entry of entries) {
    const existing = participants.get(entry.username);

    if (existing) {
      participants.set(entry.username, {
        ...existing,
        totalWeight: saturatingAdd(existing.totalWeight, entry.weight),
        entryCount: existing.entryCount + 1,
        totalLikes: saturatingAdd(existing.totalLikes, entry.likes),
      });
      entriesByParticipant.get(entry.username)?.push(entry);
    } else {
      participants.set(entry.username, {
        username: entry.username,
        totalWeight: entry.weight,
        entryCount: 1,
        totalLikes: entry.likes,
        profileRef: entry.profileRef,
      });
      entriesByParticipant.set(entry.username, [entry]);
    }
  }

  return {
    participants,
    entriesByParticipant,
    participantCount: participants.size,
    diagnostics,
  };
}

function saturatingAdd(a: number, b: number): number {
  return Math.min(a + b, Number.MAX_SAFE_INTEGER);
}

/**
 * Look up pre-selected winners in the aggregate
 *
 * Usernames are matched exactly. Names with no valid entries are reported
 * as excluded; a name listed twice counts once, at its first position.
 */
export function lookupParticipants(
  participants: ReadonlyMap<string, ParticipantAggregate>,
  usernames: readonly string[]
): { found: ParticipantAggregate[]; excluded: string[]; diagnostics: Diagnostic[] } {
  const found: ParticipantAggregate[] = [];
  const excluded: string[] = [];
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();

  for (const username of usernames) {
    if (seen.has(username)) continue;
    seen.add(username);

    const participant = participants.get(username);
    if (participant) {
      found.push(participant);
    } else {
      excluded.push(username);
      diagnostics.push({
        code: 'RequestedWinnerNotEligible',
        username,
        message: `@${username} has no valid entries and was excluded`,
      });
    }
  }

  return { found, excluded, diagnostics };
}
