import { describe, it, expect } from 'vitest';
import { GiveawayService } from './giveaway';
import { commentRow, tagged } from '@/test/fixtures';
import type { RandomSource } from '@/utils';

const zeroRandom: RandomSource = {
  nextBytes: length => new Uint8Array(length),
};

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

const rows = [
  commentRow(tagged('u1', { action_type: '2 likes', comment_text: 'pick me' })),
  commentRow(tagged('u1', { comment_text: 'again' })),
  commentRow(tagged('u2', { action_type: '1 like' })),
  commentRow(tagged('u1', { comment_text: 'again' })),
  commentRow({ username: 'u3', mentioned_user_1_username: 'friend_a' }),
];

describe('GiveawayService.prepare', () => {
  it('runs normalization, validation and aggregation', () => {
    const prepared = new GiveawayService().prepare({ records: rows });

    expect(prepared.normalized.inputCount).toBe(5);
    expect(prepared.normalized.records).toHaveLength(4);
    expect(prepared.normalized.duplicatesRemoved).toBe(1);
    expect(prepared.validation.stats).toEqual({ total: 4, valid: 3, invalid: 1 });
    expect(prepared.aggregate.participants.get('u1')).toMatchObject({
      totalWeight: 4,
      entryCount: 2,
      totalLikes: 2,
    });
    expect(prepared.aggregate.participants.get('u2')).toMatchObject({
      totalWeight: 2,
      entryCount: 1,
      totalLikes: 1,
    });
    expect(prepared.aggregate.participants.has('u3')).toBe(false);
    expect(prepared.diagnostics).toEqual([]);
  });

  it('collects diagnostics from every stage', () => {
    const prepared = new GiveawayService().prepare({ records: [] });

    expect(prepared.diagnostics.map(d => d.code)).toEqual([
      'EmptyInputError',
      'EmptyInputError',
      'EmptyInputError',
    ]);
  });
});

describe('GiveawayService random draws', () => {
  it('favours participants in proportion to their weight', () => {
    const service = new GiveawayService({ now: fixedNow });
    const prepared = service.prepare({ records: rows });

    let u1Wins = 0;
    for (let i = 0; i < 3000; i++) {
      const draw = service.complete(prepared, { kind: 'random', count: 1, seed: `seed-${i}` });
      if (draw.winners[0].username === 'u1') u1Wins++;
    }

    // u1 holds 4 of 6 weight units
    expect(u1Wins).toBeGreaterThan(1850);
    expect(u1Wins).toBeLessThan(2150);
  });

  it('replays a seeded draw', () => {
    const first = new GiveawayService({ now: fixedNow }).run({ records: rows }, {
      kind: 'random',
      count: 1,
      seed: 'test-seed',
    });
    const second = new GiveawayService({ now: fixedNow }).run({ records: rows }, {
      kind: 'random',
      count: 1,
      seed: 'test-seed',
    });

    expect(second.winners).toEqual(first.winners);
    expect(second.participantHash).toBe(first.participantHash);
    expect(second.drawHash).toBe(first.drawHash);
    expect(first.seed).toBe('test-seed');
  });

  it('uses the injected source for unseeded draws', () => {
    const draw = new GiveawayService({ random: zeroRandom, now: fixedNow }).run(
      { records: rows },
      { kind: 'random', count: 2 }
    );

    expect(draw.winners.map(w => w.username)).toEqual(['u1', 'u2']);
    expect(draw.seed).toBeUndefined();
    expect(draw.timestamp.toISOString()).toBe('2026-01-02T03:04:05.000Z');
    expect(draw.summary.nonWinnerGroup.participants).toBe(0);
    expect(draw.invalidReasons).toEqual({
      missing_mention_1: 0,
      missing_mention_2: 1,
      missing_mention_3: 1,
    });
  });

  it('draws alternates after the winners', () => {
    const draw = new GiveawayService({ random: zeroRandom }).run(
      { records: rows },
      { kind: 'random', count: 1, alternates: 1 }
    );

    expect(draw.winners.map(w => w.username)).toEqual(['u1']);
    expect(draw.alternates.map(w => w.username)).toEqual(['u2']);
  });

  it('picks everyone when fewer participants than winners are eligible', () => {
    const draw = new GiveawayService({ random: zeroRandom }).run(
      { records: rows },
      { kind: 'random', count: 5 }
    );

    expect(draw.winners).toHaveLength(2);
    expect(draw.winnerCount).toBe(5);
    expect(draw.diagnostics).toContainEqual(
      expect.objectContaining({ code: 'InsufficientPopulation', requested: 5, effective: 2 })
    );
  });

  it('reports when nobody is eligible', () => {
    const draw = new GiveawayService().run(
      { records: [commentRow({ username: 'u3', mentioned_user_1_username: 'friend_a' })] },
      { kind: 'random', count: 3 }
    );

    expect(draw.winners).toEqual([]);
    expect(draw.diagnostics.map(d => d.code)).toEqual(['EmptyInputError', 'NoEligibleParticipants']);
  });
});

describe('GiveawayService lookup draws', () => {
  it('returns eligible usernames and excludes the rest', () => {
    const draw = new GiveawayService().run(
      { records: rows },
      { kind: 'lookup', usernames: ['u2', 'ghost', 'u2'] }
    );

    expect(draw.mode).toBe('lookup');
    expect(draw.winners.map(w => w.username)).toEqual(['u2']);
    expect(draw.excluded).toEqual(['ghost']);
    expect(draw.winnerCount).toBe(2);
    expect(draw.diagnostics).toEqual([
      {
        code: 'RequestedWinnerNotEligible',
        username: 'ghost',
        message: '@ghost has no valid entries and was excluded',
      },
    ]);
  });
});

describe('GiveawayService.auditHighVolume', () => {
  it('flags participants above the threshold', () => {
    const service = new GiveawayService();
    const report = service.auditHighVolume(service.prepare({ records: rows }), {
      threshold: 1,
      sampleSize: 1,
    });

    expect(report.participants).toEqual([
      {
        username: 'u1',
        entryCount: 2,
        sample: [{ timeToken: undefined, tags: ['friend_a', 'friend_b', 'friend_c'], comment: 'pick me' }],
      },
    ]);
  });
});
