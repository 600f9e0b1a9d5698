/**
 * Core types for the comment giveaway picker
 */

/**
 * Column names of a scraped comments export, in file order
 */
export const COMMENT_SCHEMA = [
  'profile_url',
  'profile_picture_url',
  'username',
  'post_comment_url',
  'time_elapsed',
  'comment_text',
  'mentioned_user_1_username',
  'mentioned_user_1_url',
  'mentioned_user_2_username',
  'mentioned_user_2_url',
  'mentioned_user_3_username',
  'mentioned_user_3_url',
  'action_type',
  'extra_empty_column',
] as const;

export type CommentColumn = (typeof COMMENT_SCHEMA)[number];

/**
 * One ingested row. `undefined` marks an empty cell.
 */
export type RawRecord = readonly (string | undefined)[];

/**
 * A deduplicated comment row mapped onto the known schema
 */
export interface NormalizedRecord {
  /** Index of the first occurrence in the raw input */
  position: number;
  /** Commenter's profile URL */
  profileRef?: string;
  profilePictureUrl?: string;
  /** Commenter's username, the participant identity */
  username: string;
  commentUrl?: string;
  /** Relative time as scraped ("2w", "3d") */
  timeToken?: string;
  commentText?: string;
  mention1?: string;
  mention1Url?: string;
  mention2?: string;
  mention2Url?: string;
  mention3?: string;
  mention3Url?: string;
  /** Free-text engagement cell, e.g. "5 likes" */
  engagementRaw?: string;
  /** Trailing column of the scraper export, usually empty */
  extraEmptyColumn?: string;
}

/**
 * A record that qualifies as a contest entry
 */
export interface ValidEntry extends NormalizedRecord {
  /** First digit run found in the engagement text, 0 if none */
  likes: number;
  /** likes + 1, never below 1 */
  weight: number;
}

/**
 * Why a record was rejected as an entry
 */
export type InvalidReason = 'missing_mention_1' | 'missing_mention_2' | 'missing_mention_3';

export type InvalidReasonCounts = Record<InvalidReason, number>;

export interface InvalidRecord {
  record: NormalizedRecord;
  reasons: InvalidReason[];
}

/**
 * Per-participant totals over their valid entries
 */
export interface ParticipantAggregate {
  username: string;
  /** Sum of entry weights */
  totalWeight: number;
  entryCount: number;
  totalLikes: number;
  /** Profile URL from the participant's first valid entry */
  profileRef?: string;
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export interface SchemaMismatch {
  code: 'SchemaMismatch';
  expected: number;
  actual: number;
  /** Rows whose own length differed from the batch arity */
  irregularRows: number;
  message: string;
}

export interface EmptyInput {
  code: 'EmptyInputError';
  stage: 'normalize' | 'validate' | 'aggregate';
  message: string;
}

export interface NoEligibleParticipants {
  code: 'NoEligibleParticipants';
  message: string;
}

export interface InsufficientPopulation {
  code: 'InsufficientPopulation';
  requested: number;
  effective: number;
  message: string;
}

export interface RequestedWinnerNotEligible {
  code: 'RequestedWinnerNotEligible';
  username: string;
  message: string;
}

/**
 * Recoverable conditions surfaced alongside results, never thrown
 */
export type Diagnostic =
  | SchemaMismatch
  | EmptyInput
  | NoEligibleParticipants
  | InsufficientPopulation
  | RequestedWinnerNotEligible;

// ---------------------------------------------------------------------------
// Stage results
// ---------------------------------------------------------------------------

export interface NormalizeResult {
  records: NormalizedRecord[];
  /** Raw rows received */
  inputCount: number;
  duplicatesRemoved: number;
  diagnostics: Diagnostic[];
}

export interface ValidationStats {
  total: number;
  valid: number;
  invalid: number;
}

export interface ValidationResult {
  entries: ValidEntry[];
  invalid: InvalidRecord[];
  stats: ValidationStats;
  diagnostics: Diagnostic[];
}

export interface AggregateResult {
  /** Keyed by username, in order of first appearance */
  participants: Map<string, ParticipantAggregate>;
  /** Valid entries per username, in input order */
  entriesByParticipant: Map<string, ValidEntry[]>;
  participantCount: number;
  diagnostics: Diagnostic[];
}

/**
 * Outcome of a weighted draw
 */
export type SampleResult =
  | {
      status: 'complete';
      winners: ParticipantAggregate[];
      alternates: ParticipantAggregate[];
      requested: number;
    }
  | {
      status: 'insufficient_population';
      winners: ParticipantAggregate[];
      alternates: ParticipantAggregate[];
      requested: number;
      effective: number;
    }
  | {
      status: 'no_eligible_participants';
      winners: ParticipantAggregate[];
      alternates: ParticipantAggregate[];
      requested: number;
    };

/**
 * How winners are chosen for a run
 */
export type DrawMode =
  | { kind: 'random'; count: number; seed?: string; alternates?: number }
  | { kind: 'lookup'; usernames: string[] };

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

/**
 * One winner row of the summary table
 */
export interface WinnerStats {
  rank: number;
  username: string;
  profileRef?: string;
  entries: number;
  likes: number;
  score: number;
}

export interface GroupStats {
  participants: number;
  entries: number;
  likes: number;
  averageEntries: number;
  averageLikes: number;
}

export interface ResultSummary {
  winners: WinnerStats[];
  winnerGroup: GroupStats;
  nonWinnerGroup: GroupStats;
}

/**
 * An entry sample shown in the high-volume audit
 */
export interface AuditEntry {
  timeToken?: string;
  tags: [string, string, string];
  comment: string;
}

export interface HighVolumeParticipant {
  username: string;
  entryCount: number;
  sample: AuditEntry[];
}

export interface HighVolumeReport {
  threshold: number;
  participants: HighVolumeParticipant[];
}

/**
 * A completed giveaway run
 */
export interface Draw {
  /** Unique draw identifier */
  id: string;
  /** When the draw was performed */
  timestamp: Date;
  mode: DrawMode['kind'];
  /** Seed used for a reproducible draw */
  seed?: string;
  /** Rows before deduplication */
  inputCount: number;
  /** Rows after deduplication */
  recordCount: number;
  duplicatesRemoved: number;
  validation: ValidationStats;
  /** Rejected records per missing tag */
  invalidReasons: InvalidReasonCounts;
  participants: ParticipantAggregate[];
  /** Ordered winners, rank 1 first */
  winners: ParticipantAggregate[];
  alternates: ParticipantAggregate[];
  /** Lookup usernames without valid entries */
  excluded: string[];
  /** Number of winners requested */
  winnerCount: number;
  summary: ResultSummary;
  /** SHA-256 of the weighted participant list */
  participantHash: string;
  /** SHA-256 binding timestamp, participants, winners and seed */
  drawHash: string;
  diagnostics: Diagnostic[];
}

/**
 * Export format options
 */
export type ExportFormat = 'csv' | 'json' | 'text';

/**
 * Reporting capabilities decided once at startup
 */
export interface ReportOptions {
  /** Render score charts */
  charts: boolean;
}
