import { describe, it, expect } from 'vitest';
import { TimelineService } from './timeline';
import { InvalidTimestampError } from './errors';
import type { Comment, Item } from './types';

const ref = { repository: 'acme/widgets', kind: 'issue' as const, number: 42 };

function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    ...ref,
    title: 'Crash',
    author: 'alice',
    state: 'open',
    url: null,
    createdAt: '2024-03-01T09:00:00Z',
    updatedAt: null,
    closedAt: null,
    labels: [],
    body: 'body',
    ...overrides,
  };
}

function makeComment(id: number | null, createdAt: string | null, overrides: Partial<Comment> = {}): Comment {
  return {
    id,
    item: ref,
    kind: 'issue-comment',
    author: 'bob',
    body: `comment ${id}`,
    createdAt,
    url: null,
    ...overrides,
  };
}

describe('TimelineService', () => {
  const service = new TimelineService();

  it('should put the body first even when comments are older', () => {
    const timeline = service.buildTimeline(makeItem(), [makeComment(1, '2020-01-01T00:00:00Z')]);

    expect(timeline.entries[0].kind).toBe('body');
    expect(timeline.entries[0].createdAt?.toISOString()).toBe('2024-03-01T09:00:00.000Z');
    expect(timeline.entries).toHaveLength(2);
  });

  it('should order comments by time, then by id', () => {
    const timeline = service.buildTimeline(makeItem(), [
      makeComment(5, '2024-03-01T12:00:00Z'),
      makeComment(3, '2024-03-01T10:00:00Z'),
      makeComment(2, '2024-03-01T12:00:00Z'),
    ]);

    const ids = timeline.entries.slice(1).map(entry => (entry.kind === 'body' ? null : entry.comment.id));
    expect(ids).toEqual([3, 2, 5]);
  });

  it('should put id-less ties after comments with ids, in input order', () => {
    const timeline = service.buildTimeline(makeItem(), [
      makeComment(null, '2024-03-01T10:00:00Z', { body: 'first' }),
      makeComment(null, '2024-03-01T10:00:00Z', { body: 'second' }),
      makeComment(1, '2024-03-01T10:00:00Z', { body: 'third' }),
    ]);

    const bodies = timeline.entries.slice(1).map(entry => (entry.kind === 'body' ? null : entry.comment.body));
    expect(bodies).toEqual(['third', 'first', 'second']);
  });

  it('should order ids ascending around an id-less comment', () => {
    const timeline = service.buildTimeline(makeItem(), [
      makeComment(5, '2024-03-01T10:00:00Z'),
      makeComment(null, '2024-03-01T10:00:00Z'),
      makeComment(3, '2024-03-01T10:00:00Z'),
    ]);

    const ids = timeline.entries.slice(1).map(entry => (entry.kind === 'body' ? null : entry.comment.id));
    expect(ids).toEqual([3, 5, null]);
  });

  it('should merge review comments into the same ordering', () => {
    const review = makeComment(10, '2024-03-01T11:00:00Z', {
      kind: 'review-comment',
      anchor: { path: 'src/a.ts', line: 3 },
    });
    const timeline = service.buildTimeline(
      makeItem({ kind: 'pull_request' }),
      [makeComment(1, '2024-03-01T10:00:00Z'), makeComment(2, '2024-03-01T12:00:00Z')],
      [review]
    );

    expect(timeline.entries.map(entry => entry.kind)).toEqual(['body', 'issue-comment', 'review-comment', 'issue-comment']);
  });

  it('should compare instants, not strings', () => {
    const timeline = service.buildTimeline(makeItem(), [
      makeComment(1, '2024-03-01T10:30:00+02:00'),
      makeComment(2, '2024-03-01T09:00:00Z'),
    ]);

    const ids = timeline.entries.slice(1).map(entry => (entry.kind === 'body' ? null : entry.comment.id));
    expect(ids).toEqual([1, 2]);
  });

  it('should reject comments with invalid or absent timestamps', () => {
    expect(() => service.buildTimeline(makeItem(), [makeComment(1, 'yesterday')])).toThrow(InvalidTimestampError);
    expect(() => service.buildTimeline(makeItem(), [makeComment(1, null)])).toThrow(
      'Invalid timestamp null in issue #42 comment 1');
  });

  it('should reject an invalid item timestamp and allow an absent one', () => {
    expect(() => service.buildTimeline(makeItem({ createdAt: 'soon' }), [])).toThrow(
      'Invalid timestamp "soon" in issue #42 created_at');
    const timeline = service.buildTimeline(makeItem({ createdAt: null }), []);
    expect(timeline.entries[0].createdAt).toBeNull();
  });

  it('should return a frozen timeline', () => {
    const timeline = service.buildTimeline(makeItem(), []);
    expect(Object.isFrozen(timeline)).toBe(true);
    expect(Object.isFrozen(timeline.entries)).toBe(true);
  });
});
