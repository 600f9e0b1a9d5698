import { describe, it, expect } from 'vitest';
import {
  drawFileName,
  exportCleanedCSV,
  exportDraw,
  exportToCSV,
  exportToJSON,
  exportToText,
  renderHighVolumeReport,
  renderScoreChart,
} from './export';
import { summarizeResults } from './stats';
import { createParticipant, createRecord } from '@/test/fixtures';
import type { Draw, ParticipantAggregate } from '@/types';

const u1 = createParticipant('u1', {
  totalWeight: 4,
  entryCount: 2,
  totalLikes: 2,
  profileRef: 'https://example.com/u1',
});
const u2 = createParticipant('u2', { totalWeight: 2, entryCount: 1, totalLikes: 1 });
const u3 = createParticipant('u3', { totalWeight: 1, entryCount: 1, totalLikes: 0 });

function createDraw(winners: ParticipantAggregate[], overrides: Partial<Draw> = {}): Draw {
  const participants = [u1, u2, u3];
  const byName = new Map(participants.map((p): [string, ParticipantAggregate] => [p.username, p]));

  return {
    id: 'ABC-123',
    timestamp: new Date('2026-01-02T03:04:05.000Z'),
    mode: 'random',
    seed: 'test-seed',
    inputCount: 6,
    recordCount: 5,
    duplicatesRemoved: 1,
    validation: { total: 5, valid: 4, invalid: 1 },
    invalidReasons: { missing_mention_1: 0, missing_mention_2: 0, missing_mention_3: 1 },
    participants,
    winners,
    alternates: [],
    excluded: [],
    winnerCount: winners.length,
    summary: summarizeResults(byName, winners),
    participantHash: 'a'.repeat(64),
    drawHash: '0123456789abcdef'.repeat(4),
    diagnostics: [],
    ...overrides,
  };
}

describe('exportToCSV', () => {
  it('writes the winner summary table', () => {
    expect(exportToCSV(createDraw([u1, u2]))).toBe(
      [
        'Rank,Username,Profile URL,Total Valid Entries,Total Likes on Entries,Final Winning Score',
        '1,u1,https://example.com/u1,2,2,4',
        '2,u2,Profile URL not found,1,1,2',
      ].join('\n')
    );
  });
});

describe('exportCleanedCSV', () => {
  it('writes records under the schema header and escapes cells', () => {
    const csv = exportCleanedCSV([
      createRecord({ username: 'alice', commentText: 'hi, "all"', engagementRaw: '2 likes' }),
    ]);
    const [header, row] = csv.split('\n');

    expect(header.split(',').length).toBe(14);
    expect(header.startsWith('profile_url,profile_picture_url,username,')).toBe(true);
    expect(row).toBe(',,alice,,,"hi, ""all""",friend_a,,friend_b,,friend_c,,2 likes,');
  });
});

describe('exportToText', () => {
  it('lists winners with their statistics', () => {
    const lines = exportToText(createDraw([u1, u2]), { charts: false }).split('\n');

    expect(lines[0]).toBe('Comment Giveaway Results');
    expect(lines).toContain('Draw ID: ABC-123');
    expect(lines).toContain('Seed: test-seed');
    expect(lines).toContain('Winners (2):');
    expect(lines).toContain('Winner #1: @u1');
    expect(lines).toContain('  Profile: https://example.com/u1');
    expect(lines).toContain('Winner #2: @u2');
    expect(lines).toContain('  Profile: Profile URL not found');
    expect(lines).toContain('  Final Winning Score: 2');
    expect(lines).toContain('- Duplicate rows removed: 1');
    expect(lines).toContain('  - Third tag missing: 1');
    expect(lines).not.toContain('  - First tag missing: 0');
    expect(lines).toContain('- Non-winning participants: 1');
    expect(lines).toContain('- Average valid entries per non-winner: 1.00');
    expect(lines).toContain('- Average likes per non-winner: 0.00');
    expect(lines).toContain('Verification Hash: 0123456789abcdef... (01234567)');
    expect(lines).not.toContain('Engagement Score of Each Winner');
  });

  it('appends the score chart when charts are enabled', () => {
    const lines = exportToText(createDraw([u1, u2]), { charts: true }).split('\n');

    expect(lines).toContain('Engagement Score of Each Winner');
  });

  it('notes a clamped draw', () => {
    const text = exportToText(createDraw([u1, u2, u3], { winnerCount: 10 }), { charts: false });

    expect(text.split('\n')).toContain(
      'Note: only 3 participants were eligible, so all of them were picked (10 requested).'
    );
  });

  it('reports an empty draw', () => {
    const lines = exportToText(createDraw([]), { charts: true }).split('\n');

    expect(lines).toContain('No eligible participants to pick from.');
    expect(lines).not.toContain('Engagement Score of Each Winner');
  });

  it('reports a lookup where no requested winner is eligible', () => {
    const draw = createDraw([], { mode: 'lookup', seed: undefined, excluded: ['ghost'], winnerCount: 1 });
    const lines = exportToText(draw, { charts: false }).split('\n');

    expect(lines).toContain('None of the requested winners has a valid entry.');
    expect(lines).not.toContain('No eligible participants to pick from.');
    expect(lines).toContain('- @ghost');
  });

  it('lists alternates and excluded usernames', () => {
    const draw = createDraw([u1], { mode: 'lookup', seed: undefined, alternates: [u3], excluded: ['ghost'] });
    const lines = exportToText(draw, { charts: false }).split('\n');

    expect(lines).toContain('Mode: pre-selected winners');
    expect(lines).toContain('1. @u3 (score 1)');
    expect(lines).toContain('- @ghost');
    expect(lines.some(line => line.startsWith('Seed:'))).toBe(false);
  });
});

describe('exportToJSON', () => {
  it('exports verification data and statistics', () => {
    const data = JSON.parse(exportToJSON(createDraw([u1])));

    expect(data.drawId).toBe('ABC-123');
    expect(data.timestamp).toBe('2026-01-02T03:04:05.000Z');
    expect(data.verification.randomSeed).toBe('test-seed');
    expect(data.statistics).toEqual({
      rowsRead: 6,
      duplicatesRemoved: 1,
      records: 5,
      validEntries: 4,
      invalidEntries: 1,
      participants: 3,
      winnersRequested: 1,
      winnersSelected: 1,
    });
    expect(data.invalidReasons).toEqual({ missing_mention_1: 0, missing_mention_2: 0, missing_mention_3: 1 });
    expect(data.winners[0]).toEqual({
      rank: 1,
      username: 'u1',
      profileRef: 'https://example.com/u1',
      entries: 2,
      likes: 2,
      score: 4,
    });
    expect(data.groups.nonWinners.participants).toBe(2);
  });
});

describe('renderScoreChart', () => {
  it('draws bars scaled to the highest score', () => {
    expect(renderScoreChart([u2, u1], 10)).toBe(
      ['Engagement Score of Each Winner', '@u1 | ########## 4', '@u2 | ##### 2'].join('\n')
    );
  });
});

describe('renderHighVolumeReport', () => {
  it('lists flagged users with sample entries', () => {
    const text = renderHighVolumeReport({
      threshold: 2,
      participants: [
        {
          username: 'flood',
          entryCount: 3,
          sample: [{ timeToken: '1h', tags: ['a', 'b', 'c'], comment: '[No Text]' }],
        },
      ],
    });

    expect(text).toBe(
      [
        'High-Volume Entry Report (Threshold > 2 entries)',
        '========================================',
        'User: flood',
        'Total Valid Entries: 3',
        '',
        'Sample of their entries:',
        '  - Time: 1h, Tags: a, b, c, Comment: "[No Text]"',
        '',
        '------------------------------',
      ].join('\n')
    );
  });

  it('says so when nobody is flagged', () => {
    expect(renderHighVolumeReport({ threshold: 50, participants: [] })).toBe(
      'No users found with more than 50 valid entries.'
    );
  });
});

describe('exportDraw', () => {
  it('dispatches on format', () => {
    const draw = createDraw([u1]);

    expect(exportDraw(draw, 'csv', { charts: false })).toBe(exportToCSV(draw));
    expect(exportDraw(draw, 'json', { charts: false })).toBe(exportToJSON(draw));
    expect(exportDraw(draw, 'text', { charts: false })).toBe(exportToText(draw, { charts: false }));
  });
});

describe('drawFileName', () => {
  it('combines draw id, date and extension', () => {
    const draw = createDraw([u1]);

    expect(drawFileName(draw, 'text')).toBe('giveaway-ABC-123-2026-01-02.txt');
    expect(drawFileName(draw, 'json')).toBe('giveaway-ABC-123-2026-01-02.json');
  });
});
