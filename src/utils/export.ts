/**
 * Export utilities for saving draw results
 */

import { COMMENT_SCHEMA } from '@/types';
import type {
  Draw,
  ExportFormat,
  HighVolumeReport,
  NormalizedRecord,
  ParticipantAggregate,
  ReportOptions,
} from '@/types';
import { toRawRecord } from './normalize';
import { shortId } from './hash';
import { getInvalidReasonLabel, INVALID_REASONS } from './validate';

const PROFILE_NOT_FOUND = 'Profile URL not found';

/**
 * Export the winner summary table to CSV format
 */
export function exportToCSV(draw: Draw): string {
  const lines: string[] = [];

  // Header
  lines.push('Rank,Username,Profile URL,Total Valid Entries,Total Likes on Entries,Final Winning Score');

  for (const row of draw.summary.winners) {
    lines.push(
      [
        row.rank.toString(),
        escapeCSV(row.username),
        escapeCSV(row.profileRef ?? PROFILE_NOT_FOUND),
        row.entries.toString(),
        row.likes.toString(),
        row.score.toString(),
      ].join(',')
    );
  }

  return lines.join('\n');
}

/**
 * Write normalized records back out under the known column names
 */
export function exportCleanedCSV(records: readonly NormalizedRecord[]): string {
  const lines = [COMMENT_SCHEMA.join(',')];

  for (const record of records) {
    lines.push(toRawRecord(record).map(value => escapeCSV(value ?? '')).join(','));
  }

  return lines.join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Export draw results to JSON format
 */
export function exportToJSON(draw: Draw): string {
  const exportData = {
    drawId: draw.id,
    timestamp: draw.timestamp.toISOString(),
    mode: draw.mode,
    verification: {
      participantHash: draw.participantHash,
      drawHash: draw.drawHash,
      randomSeed: draw.seed ?? null,
    },
    statistics: {
      rowsRead: draw.inputCount,
      duplicatesRemoved: draw.duplicatesRemoved,
      records: draw.recordCount,
      validEntries: draw.validation.valid,
      invalidEntries: draw.validation.invalid,
      participants: draw.participants.length,
      winnersRequested: draw.winnerCount,
      winnersSelected: draw.winners.length,
    },
    invalidReasons: draw.invalidReasons,
    winners: draw.summary.winners,
    alternates: draw.alternates.map(formatParticipantForExport),
    excluded: draw.excluded,
    groups: {
      winners: draw.summary.winnerGroup,
      nonWinners: draw.summary.nonWinnerGroup,
    },
    diagnostics: draw.diagnostics,
  };

  return JSON.stringify(exportData, null, 2);
}

function formatParticipantForExport(participant: ParticipantAggregate): Record<string, unknown> {
  return {
    username: participant.username,
    profileUrl: participant.profileRef ?? null,
    entries: participant.entryCount,
    likes: participant.totalLikes,
    score: participant.totalWeight,
  };
}

/**
 * Export results as a plain text report
 */
export function exportToText(draw: Draw, options: ReportOptions): string {
  const lines: string[] = [];

  lines.push('Comment Giveaway Results');
  lines.push(`Draw ID: ${draw.id}`);
  lines.push(`Date: ${draw.timestamp.toISOString()}`);
  lines.push(`Mode: ${draw.mode === 'random' ? 'weighted random draw' : 'pre-selected winners'}`);
  if (draw.seed !== undefined) {
    lines.push(`Seed: ${draw.seed}`);
  }
  lines.push('');

  if (draw.winners.length === 0) {
    lines.push(
      draw.mode === 'lookup'
        ? 'None of the requested winners has a valid entry.'
        : 'No eligible participants to pick from.'
    );
  } else {
    lines.push(`Winners (${draw.winners.length}):`);
    lines.push('-'.repeat(40));
    for (const row of draw.summary.winners) {
      lines.push(`Winner #${row.rank}: @${row.username}`);
      lines.push(`  Profile: ${row.profileRef ?? PROFILE_NOT_FOUND}`);
      lines.push(`  Total Valid Entries: ${row.entries}`);
      lines.push(`  Total Likes on Entries: ${row.likes}`);
      lines.push(`  Final Winning Score: ${row.score}`);
    }
  }

  if (draw.mode === 'random' && draw.winners.length > 0 && draw.winners.length < draw.winnerCount) {
    lines.push('');
    lines.push(
      `Note: only ${draw.winners.length} participants were eligible, so all of them were picked ` +
        `(${draw.winnerCount} requested).`
    );
  }

  if (draw.alternates.length > 0) {
    lines.push('');
    lines.push(`Alternates (${draw.alternates.length}):`);
    lines.push('-'.repeat(40));
    draw.alternates.forEach((alt, index) => {
      lines.push(`${index + 1}. @${alt.username} (score ${alt.totalWeight})`);
    });
  }

  if (draw.excluded.length > 0) {
    lines.push('');
    lines.push('Excluded (no valid entries):');
    for (const username of draw.excluded) {
      lines.push(`- @${username}`);
    }
  }

  const nonWinners = draw.summary.nonWinnerGroup;

  lines.push('');
  lines.push('Statistics:');
  lines.push(`- Rows read: ${draw.inputCount}`);
  lines.push(`- Duplicate rows removed: ${draw.duplicatesRemoved}`);
  lines.push(`- Valid entries: ${draw.validation.valid}`);
  lines.push(`- Invalid entries: ${draw.validation.invalid}`);
  for (const reason of INVALID_REASONS) {
    if (draw.invalidReasons[reason] > 0) {
      lines.push(`  - ${getInvalidReasonLabel(reason)}: ${draw.invalidReasons[reason]}`);
    }
  }
  lines.push(`- Participants with valid entries: ${draw.participants.length}`);
  lines.push(`- Non-winning participants: ${nonWinners.participants}`);
  lines.push(`- Valid entries from non-winners: ${nonWinners.entries}`);
  lines.push(`- Likes on non-winners' entries: ${nonWinners.likes}`);
  lines.push(`- Average valid entries per non-winner: ${nonWinners.averageEntries.toFixed(2)}`);
  lines.push(`- Average likes per non-winner: ${nonWinners.averageLikes.toFixed(2)}`);
  lines.push('');
  lines.push(`Verification Hash: ${draw.drawHash.substring(0, 16)}... (${shortId(draw.drawHash)})`);

  if (options.charts && draw.winners.length > 0) {
    lines.push('');
    lines.push(renderScoreChart(draw.winners));
  }

  return lines.join('\n');
}

/**
 * Horizontal bar chart of winner scores, highest first
 */
export function renderScoreChart(winners: readonly ParticipantAggregate[], width: number = 40): string {
  const sorted = [...winners].sort((a, b) => b.totalWeight - a.totalWeight);
  const max = sorted.length > 0 ? sorted[0].totalWeight : 0;
  const labelWidth = Math.max(0, ...sorted.map(w => w.username.length + 1));

  const lines = ['Engagement Score of Each Winner'];
  for (const winner of sorted) {
    const length = max > 0 ? Math.max(1, Math.round((winner.totalWeight / max) * width)) : 0;
    lines.push(`${`@${winner.username}`.padEnd(labelWidth)} | ${'#'.repeat(length)} ${winner.totalWeight}`);
  }

  return lines.join('\n');
}

/**
 * Text report of participants above the high-volume threshold
 */
export function renderHighVolumeReport(report: HighVolumeReport): string {
  if (report.participants.length === 0) {
    return `No users found with more than ${report.threshold} valid entries.`;
  }

  const lines: string[] = [];
  lines.push(`High-Volume Entry Report (Threshold > ${report.threshold} entries)`);
  lines.push('='.repeat(40));

  for (const participant of report.participants) {
    lines.push(`User: ${participant.username}`);
    lines.push(`Total Valid Entries: ${participant.entryCount}`);
    lines.push('');
    lines.push('Sample of their entries:');
    for (const entry of participant.sample) {
      lines.push(
        `  - Time: ${entry.timeToken ?? ''}, Tags: ${entry.tags.join(', ')}, Comment: "${entry.comment}"`
      );
    }
    lines.push('');
    lines.push('-'.repeat(30));
  }

  return lines.join('\n');
}

/**
 * Export draw results in specified format
 */
export function exportDraw(draw: Draw, format: ExportFormat, options: ReportOptions): string {
  switch (format) {
    case 'csv':
      return exportToCSV(draw);
    case 'json':
      return exportToJSON(draw);
    case 'text':
      return exportToText(draw, options);
  }
}

/**
 * File name for a saved draw
 */
export function drawFileName(draw: Draw, format: ExportFormat): string {
  const extensions: Record<ExportFormat, string> = {
    csv: 'csv',
    json: 'json',
    text: 'txt',
  };

  const date = draw.timestamp.toISOString().split('T')[0];
  return `giveaway-${draw.id}-${date}.${extensions[format]}`;
}
