/**
 * Record normalization: exact-duplicate removal and schema mapping
 */

import { COMMENT_SCHEMA } from '@/types';
import type {
  CommentColumn,
  Diagnostic,
  NormalizedRecord,
  NormalizeResult,
  RawRecord,
} from '@/types';

type ColumnMap = Partial<Record<CommentColumn, number>>;

/**
 * Deduplicate raw rows and map them onto the comment schema
 *
 * Two rows are duplicates only when every schema cell is identical, so a
 * participant who posts the same tags twice at different times keeps both
 * entries. Cells beyond the schema take no part in the comparison.
 * The first occurrence wins and survivors keep their relative order.
 *
 * @param header - Column names from the source file, if it had any. When every
 *   name belongs to the known schema, columns are matched by name; otherwise
 *   they are matched by position.
 */
export function normalizeRecords(rows: readonly RawRecord[], header?: readonly string[]): NormalizeResult {
  const diagnostics: Diagnostic[] = [];

  if (rows.length === 0) {
    diagnostics.push({
      code: 'EmptyInputError',
      stage: 'normalize',
      message: 'No records to normalize',
    });
    return { records: [], inputCount: 0, duplicatesRemoved: 0, diagnostics };
  }

  const arity = header?.length ?? rows[0].length;
  const columns = resolveColumns(arity, header);

  const records: NormalizedRecord[] = [];
  const seen = new Set<string>();
  let irregularRows = 0;

  rows.forEach((row, position) => {
    if (row.length !== arity) {
      irregularRows++;
    }

    const record = toNormalizedRecord(row, columns, position);
    const key = rowKey(toRawRecord(record));
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    records.push(record);
  });

  if (arity !== COMMENT_SCHEMA.length || irregularRows > 0) {
    diagnostics.push({
      code: 'SchemaMismatch',
      expected: COMMENT_SCHEMA.length,
      actual: arity,
      irregularRows,
      message:
        `Expected ${COMMENT_SCHEMA.length} columns, found ${arity}` +
        (irregularRows > 0 ? ` (${irregularRows} rows of a different length)` : '') +
        '. Columns were mapped onto the first available schema fields.',
    });
  }

  return {
    records,
    inputCount: rows.length,
    duplicatesRemoved: rows.length - records.length,
    diagnostics,
  };
}

/**
 * Convert a normalized record back into a row in schema order
 */
export function toRawRecord(record: NormalizedRecord): RawRecord {
  const byColumn: Record<CommentColumn, string | undefined> = {
    profile_url: record.profileRef,
    profile_picture_url: record.profilePictureUrl,
    username: record.username,
    post_comment_url: record.commentUrl,
    time_elapsed: record.timeToken,
    comment_text: record.commentText,
    mentioned_user_1_username: record.mention1,
    mentioned_user_1_url: record.mention1Url,
    mentioned_user_2_username: record.mention2,
    mentioned_user_2_url: record.mention2Url,
    mentioned_user_3_username: record.mention3,
    mentioned_user_3_url: record.mention3Url,
    action_type: record.engagementRaw,
    extra_empty_column: record.extraEmptyColumn,
  };

  return COMMENT_SCHEMA.map(column => byColumn[column]);
}

function resolveColumns(arity: number, header?: readonly string[]): ColumnMap {
  const columns: ColumnMap = {};
  const known = new Set<string>(COMMENT_SCHEMA);

  if (header && header.length > 0 && header.every(name => known.has(name))) {
    for (const column of COMMENT_SCHEMA) {
      const index = header.indexOf(column);
      if (index >= 0) {
        columns[column] = index;
      }
    }
    return columns;
  }

  // Positional: surplus columns fall off the end
  COMMENT_SCHEMA.slice(0, arity).forEach((column, index) => {
    columns[column] = index;
  });
  return columns;
}

function toNormalizedRecord(row: RawRecord, columns: ColumnMap, position: number): NormalizedRecord {
  const cell = (column: CommentColumn): string | undefined => {
    const index = columns[column];
    return index === undefined ? undefined : row[index];
  };

  return {
    position,
    profileRef: cell('profile_url'),
    profilePictureUrl: cell('profile_picture_url'),
    username: cell('username') ?? '',
    commentUrl: cell('post_comment_url'),
    timeToken: cell('time_elapsed'),
    commentText: cell('comment_text'),
    mention1: cell('mentioned_user_1_username'),
    mention1Url: cell('mentioned_user_1_url'),
    mention2: cell('mentioned_user_2_username'),
    mention2Url: cell('mentioned_user_2_url'),
    mention3: cell('mentioned_user_3_username'),
    mention3Url: cell('mentioned_user_3_url'),
    engagementRaw: cell('action_type'),
    extraEmptyColumn: cell('extra_empty_column'),
  };
}

// Empty cells serialize as null, so "" and a missing cell never collide
function rowKey(row: RawRecord): string {
  return JSON.stringify(row.map(value => (value === undefined ? null : value)));
}
