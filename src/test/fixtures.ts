import { COMMENT_SCHEMA } from '@/types';
import type {
  CommentColumn,
  NormalizedRecord,
  ParticipantAggregate,
  RawRecord,
  ValidEntry,
} from '@/types';

export type CommentFields = Partial<Record<CommentColumn, string>>;

/**
 * A raw row in schema order; unspecified cells are empty
 */
export function commentRow(fields: CommentFields): RawRecord {
  return COMMENT_SCHEMA.map(column => fields[column]);
}

/**
 * The same row as a CSV line
 */
export function commentLine(fields: CommentFields): string {
  return COMMENT_SCHEMA.map(column => fields[column] ?? '').join(',');
}

export const COMMENT_HEADER = COMMENT_SCHEMA.join(',');

export function tagged(username: string, fields: CommentFields = {}): CommentFields {
  return {
    username,
    mentioned_user_1_username: 'friend_a',
    mentioned_user_2_username: 'friend_b',
    mentioned_user_3_username: 'friend_c',
    ...fields,
  };
}

export const createRecord = (overrides: Partial<NormalizedRecord> = {}): NormalizedRecord => ({
  position: 0,
  username: 'testuser',
  mention1: 'friend_a',
  mention2: 'friend_b',
  mention3: 'friend_c',
  ...overrides,
});

export const createEntry = (
  username: string,
  likes: number,
  overrides: Partial<NormalizedRecord> = {}
): ValidEntry => ({
  ...createRecord({ username, ...overrides }),
  likes,
  weight: likes + 1,
});

export const createParticipant = (
  username: string,
  overrides: Partial<ParticipantAggregate> = {}
): ParticipantAggregate => ({
  username,
  totalWeight: 1,
  entryCount: 1,
  totalLikes: 0,
  ...overrides,
});
