import { injectable } from 'inversify';
import type { CommentEntry, Item, RelatedLink, Timeline } from './types';
import { InvalidTimestampError, RenderError } from './errors';
import { formatTimestamp, parseTimestamp } from './utils';

export const NONE = '(none)';

export interface RenderOptions {
  related?: readonly RelatedLink[];
  /** Applied to the body, then to every comment in timeline order. */
  rewrite?: (text: string) => string;
}

export interface IMarkdownRenderer {
  render(timeline: Timeline, options?: RenderOptions): string;
}

@injectable()
export class MarkdownRenderer implements IMarkdownRenderer {
  render(timeline: Timeline, options: RenderOptions = {}): string {
    const { item } = timeline;
    const [body, ...comments] = timeline.entries;
    const rewrite = options.rewrite ?? ((text: string) => text);
    const context = describe(item);

    if (item.title === null) {
      throw new RenderError('title', context);
    }
    if (!body.createdAt) {
      throw new RenderError('created_at', context);
    }

    const heading = item.kind === 'issue'
      ? `# Issue #${item.number}: ${item.title}`
      : `# PR #${item.number}: ${item.title}`;

    const metadata = [
      `- URL: ${item.url || NONE}`,
      `- State: ${item.state ? item.state.toUpperCase() : NONE}`,
      `- Author: ${item.author || NONE}`,
      `- Labels: ${item.labels.length > 0 ? item.labels.join(', ') : NONE}`,
      `- Created: ${formatTimestamp(body.createdAt)}`,
      `- Updated: ${optionalTimestamp(item.updatedAt, `${context} updated_at`)}`,
      `- Closed: ${optionalTimestamp(item.closedAt, `${context} closed_at`)}`,
    ];
    if (item.pull) {
      metadata.push(
        `- Merged: ${optionalTimestamp(item.pull.mergedAt, `${context} merged_at`)}`,
        `- Draft: ${item.pull.draft ? 'yes' : 'no'}`,
        `- Branch: ${item.pull.headRef || NONE} -> ${item.pull.baseRef || NONE}`,
      );
    }

    const description = rewrite(body.body ?? '');
    const commentBlocks = comments.map(entry => renderComment(entry, rewrite));

    const related = options.related ?? [];
    const relatedSection = related.length > 0
      ? related.map(link => `- [${link.label} #${link.number}](${link.url})`).join('\n')
      : '_None_';

    const content = [
      heading,
      '',
      ...metadata,
      '',
      '## Description',
      '',
      description.trim() ? description : '_No description_',
      '',
      item.kind === 'issue' ? '## Related PRs' : '## Related Issues',
      '',
      relatedSection,
      '',
      '## Comments',
      '',
      commentBlocks.length > 0 ? commentBlocks.join('\n\n') : '_No comments_',
    ];

    return normalizeDocument(content.join('\n'));
  }
}

function renderComment(entry: CommentEntry, rewrite: (text: string) => string): string {
  const { comment } = entry;
  let header = `### ${comment.author || 'unknown'} | ${formatTimestamp(entry.createdAt)}`;
  if (comment.anchor) {
    const location = comment.anchor.line !== null
      ? `${comment.anchor.path}:${comment.anchor.line}`
      : comment.anchor.path;
    header += ` | review on \`${location}\``;
  }
  const text = rewrite(comment.body ?? '');
  return `${header}\n\n${text.trim() ? text : '_No content_'}`;
}

function optionalTimestamp(value: string | null, context: string): string {
  if (value === null || value === '') return NONE;
  const date = parseTimestamp(value);
  if (!date) {
    throw new InvalidTimestampError(value, context);
  }
  return formatTimestamp(date);
}

function describe(item: Item): string {
  return `${item.kind === 'issue' ? 'issue' : 'pull request'} #${item.number}`;
}

/**
 * LF line endings, no trailing whitespace on any line, exactly one trailing
 * newline.
 */
export function normalizeDocument(text: string): string {
  const lines = text.replace(/\r\n?/g, '\n').split('\n').map(line => line.replace(/\s+$/, ''));
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.join('\n') + '\n';
}
