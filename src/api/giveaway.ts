/**
 * Giveaway Service
 *
 * Runs the pipeline over one batch of scraped comment rows:
 * - Remove exact duplicate rows
 * - Keep entries that tag three accounts, weighted by likes + 1
 * - Total each participant's weight
 * - Draw winners, or look up a pre-selected winner list
 */

import type {
  AggregateResult,
  Diagnostic,
  Draw,
  DrawMode,
  HighVolumeReport,
  NormalizeResult,
  ParticipantAggregate,
  RawRecord,
  ValidationResult,
} from '@/types';
import {
  aggregateParticipants,
  countInvalidReasons,
  createRandomSource,
  drawWinners,
  findHighVolumeParticipants,
  generateDrawHash,
  generateDrawId,
  hashParticipants,
  lookupParticipants,
  normalizeRecords,
  SecureRandom,
  summarizeResults,
  validateEntries,
  type HighVolumeOptions,
  type RandomSource,
} from '@/utils';
import { createLogger, type Logger } from '@/utils/logger';

export interface GiveawayInput {
  /** Data rows in file order */
  records: readonly RawRecord[];
  /** Column names, when the source had a header */
  header?: readonly string[];
}

/**
 * Output of every stage before winners are chosen
 */
export interface PreparedGiveaway {
  normalized: NormalizeResult;
  validation: ValidationResult;
  aggregate: AggregateResult;
  diagnostics: Diagnostic[];
}

export interface GiveawayServiceOptions {
  logger?: Logger;
  /** Source for draws that carry no seed */
  random?: RandomSource;
  /** Clock used to stamp draws */
  now?: () => Date;
}

/**
 * Giveaway Service
 */
export class GiveawayService {
  private log: Logger;
  private random: RandomSource;
  private now: () => Date;

  constructor(options: GiveawayServiceOptions = {}) {
    this.log = options.logger ?? createLogger('giveaway');
    this.random = options.random ?? new SecureRandom();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Normalize, validate and aggregate a batch of rows
   */
  prepare(input: GiveawayInput): PreparedGiveaway {
    const normalized = normalizeRecords(input.records, input.header);
    this.log.info('Records normalized', {
      rows: normalized.inputCount,
      kept: normalized.records.length,
      duplicatesRemoved: normalized.duplicatesRemoved,
    });

    const validation = validateEntries(normalized.records);
    this.log.info('Entries validated', { ...validation.stats });

    const aggregate = aggregateParticipants(validation.entries);
    this.log.info('Participants aggregated', { participants: aggregate.participantCount });

    const diagnostics = [...normalized.diagnostics, ...validation.diagnostics, ...aggregate.diagnostics];
    for (const diagnostic of diagnostics) {
      this.log.warn(diagnostic.message, { code: diagnostic.code });
    }

    return { normalized, validation, aggregate, diagnostics };
  }

  /**
   * Run the whole pipeline and produce a draw
   */
  run(input: GiveawayInput, mode: DrawMode): Draw {
    return this.complete(this.prepare(input), mode);
  }

  /**
   * Choose winners for an already prepared batch
   */
  complete(prepared: PreparedGiveaway, mode: DrawMode): Draw {
    const { normalized, validation, aggregate } = prepared;
    const diagnostics: Diagnostic[] = [...prepared.diagnostics];
    const participants = Array.from(aggregate.participants.values());

    let winners: ParticipantAggregate[] = [];
    let alternates: ParticipantAggregate[] = [];
    let excluded: string[] = [];
    let winnerCount = 0;
    let seed: string | undefined;

    switch (mode.kind) {
      case 'random': {
        seed = mode.seed;
        const random = createRandomSource(seed, this.random);
        const result = drawWinners(participants, {
          count: mode.count,
          alternates: mode.alternates,
          random,
        });

        winners = result.winners;
        alternates = result.alternates;
        winnerCount = mode.count;

        if (result.status === 'insufficient_population') {
          diagnostics.push({
            code: 'InsufficientPopulation',
            requested: result.requested,
            effective: result.effective,
            message: `Only ${result.effective} eligible participants for ${result.requested} requested winners; picking all of them`,
          });
        } else if (result.status === 'no_eligible_participants') {
          diagnostics.push({
            code: 'NoEligibleParticipants',
            message: 'No eligible participants to pick from',
          });
        }

        this.log.info('Winners drawn', {
          requested: mode.count,
          drawn: winners.length,
          alternates: alternates.length,
          seeded: seed !== undefined,
        });
        break;
      }

      case 'lookup': {
        const lookup = lookupParticipants(aggregate.participants, mode.usernames);
        winners = lookup.found;
        excluded = lookup.excluded;
        winnerCount = lookup.found.length + lookup.excluded.length;
        diagnostics.push(...lookup.diagnostics);

        this.log.info('Pre-selected winners looked up', {
          found: winners.length,
          excluded: excluded.length,
        });
        break;
      }
    }

    for (const diagnostic of diagnostics.slice(prepared.diagnostics.length)) {
      this.log.warn(diagnostic.message, { code: diagnostic.code });
    }

    const timestamp = this.now();
    const participantHash = hashParticipants(participants);
    const drawHash = generateDrawHash(
      timestamp,
      participantHash,
      winners.map(w => w.username),
      seed
    );

    return {
      id: generateDrawId(timestamp),
      timestamp,
      mode: mode.kind,
      seed,
      inputCount: normalized.inputCount,
      recordCount: normalized.records.length,
      duplicatesRemoved: normalized.duplicatesRemoved,
      validation: validation.stats,
      invalidReasons: countInvalidReasons(validation.invalid),
      participants,
      winners,
      alternates,
      excluded,
      winnerCount,
      summary: summarizeResults(aggregate.participants, winners),
      participantHash,
      drawHash,
      diagnostics,
    };
  }

  /**
   * Flag participants with unusually many entries for manual review
   */
  auditHighVolume(prepared: PreparedGiveaway, options: HighVolumeOptions): HighVolumeReport {
    const report = findHighVolumeParticipants(prepared.aggregate, options);

    if (report.participants.length > 0) {
      this.log.warn('High-volume participants found', {
        threshold: options.threshold,
        count: report.participants.length,
      });
    }

    return report;
  }
}
