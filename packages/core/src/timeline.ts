import { injectable } from 'inversify';
import type { BodyEntry, Comment, CommentEntry, Item, Timeline } from './types';
import { InvalidTimestampError } from './errors';
import { parseTimestamp } from './utils';

export interface ITimelineService {
  buildTimeline(item: Item, issueComments: readonly Comment[], reviewComments?: readonly Comment[]): Timeline;
}

@injectable()
export class TimelineService implements ITimelineService {
  buildTimeline(item: Item, issueComments: readonly Comment[], reviewComments: readonly Comment[] = []): Timeline {
    const label = `${item.kind === 'issue' ? 'issue' : 'pull request'} #${item.number}`;

    let itemCreated: Date | null = null;
    if (item.createdAt !== null) {
      itemCreated = parseTimestamp(item.createdAt);
      if (!itemCreated) {
        throw new InvalidTimestampError(item.createdAt, `${label} created_at`);
      }
    }

    const indexed = [...issueComments, ...reviewComments].map((comment, index) => {
      const createdAt = parseTimestamp(comment.createdAt);
      if (!createdAt) {
        throw new InvalidTimestampError(comment.createdAt, `${label} comment ${comment.id ?? '(no id)'}`);
      }
      const entry: CommentEntry = { kind: comment.kind, createdAt, comment };
      return { entry, index };
    });

    // Total order: time, then comments with an id (ascending) before those without, then input order.
    indexed.sort((a, b) => {
      const byTime = a.entry.createdAt.getTime() - b.entry.createdAt.getTime();
      if (byTime !== 0) return byTime;
      const left = a.entry.comment.id;
      const right = b.entry.comment.id;
      if (left !== null && right !== null && left !== right) return left - right;
      if (left !== null && right === null) return -1;
      if (left === null && right !== null) return 1;
      return a.index - b.index;
    });
    const comments = indexed.map(({ entry }) => entry);

    const body: BodyEntry = {
      kind: 'body',
      author: item.author,
      createdAt: itemCreated,
      body: item.body,
    };

    const entries: [BodyEntry, ...CommentEntry[]] = [body, ...comments];
    return Object.freeze({ item, entries: Object.freeze(entries) });
  }
}
