import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import type { ZodError } from 'zod';
import type { Comment, CommentKind, ExportConfig, Item, ItemKind } from './types';
import { RawCommentSchema, RawItemSchema, toComment, toItem } from './schemas';
import { MalformedCaptureError, errorMessage } from './errors';
import { isNotFound, slugifyRepository } from './utils';
import { ConsoleLogger, LogLevel } from './logger';
import type { ILogger } from './logger';

export interface RepositoryCapture {
  repository: string;
  issues: Item[];
  pulls: Item[];
  warnings: string[];
}

export interface ItemComments {
  issueComments: Comment[];
  reviewComments: Comment[];
  warnings: string[];
}

export interface IRawStoreReader {
  readRepository(repository: string): Promise<RepositoryCapture>;
  readComments(item: Item): Promise<ItemComments>;
  getRepositoryDir(repository: string): string;
}

@injectable()
export class RawStoreReader implements IRawStoreReader {
  private logger: ILogger;

  constructor(
    @inject('config') private config: Pick<ExportConfig, 'rawRoot'>,
    @inject('ILogger') @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  getRepositoryDir(repository: string): string {
    return path.join(this.config.rawRoot, slugifyRepository(repository));
  }

  async readRepository(repository: string): Promise<RepositoryCapture> {
    const dir = this.getRepositoryDir(repository);
    const issuesFile = path.join(dir, 'issues.json');
    const pullsFile = path.join(dir, 'prs.json');

    const issueEntries = await this.readTopLevel(issuesFile);
    const pullEntries = await this.readTopLevel(pullsFile);

    const warnings: string[] = [];
    const issues = this.toItems(issueEntries, repository, 'issue', issuesFile, warnings);
    const pulls = this.toItems(pullEntries, repository, 'pull_request', pullsFile, warnings);

    warnings.forEach(warning => this.logger.warn(warning));
    return { repository, issues, pulls, warnings };
  }

  async readComments(item: Item): Promise<ItemComments> {
    const dir = this.getRepositoryDir(item.repository);
    const warnings: string[] = [];

    if (item.kind === 'issue') {
      const issueComments = await this.readCommentFile(
        path.join(dir, 'issue_comments', `ISSUE-${item.number}.json`), item, 'issue-comment', warnings);
      warnings.forEach(warning => this.logger.warn(warning));
      return { issueComments, reviewComments: [], warnings };
    }

    const issueComments = await this.readCommentFile(
      path.join(dir, 'pr_issue_comments', `PR-${item.number}.json`), item, 'issue-comment', warnings);
    const reviewComments = await this.readCommentFile(
      path.join(dir, 'pr_review_comments', `PR-${item.number}.json`), item, 'review-comment', warnings);
    warnings.forEach(warning => this.logger.warn(warning));
    return { issueComments, reviewComments, warnings };
  }

  private async readTopLevel(filePath: string): Promise<unknown[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new MalformedCaptureError(filePath, 'file is missing');
      }
      throw error;
    }

    let entries: unknown[] | null;
    try {
      entries = parsePaginated(text);
    } catch (error) {
      throw new MalformedCaptureError(filePath, `invalid JSON (${errorMessage(error)})`, error);
    }
    if (!entries) {
      throw new MalformedCaptureError(filePath, 'expected a paginated array');
    }
    return entries;
  }

  private toItems(entries: unknown[], repository: string, kind: ItemKind, filePath: string, warnings: string[]): Item[] {
    const items: Item[] = [];
    const seen = new Set<number>();

    entries.forEach((entry, index) => {
      // The issues endpoint also lists pull requests; those come from prs.json.
      if (kind === 'issue' && isRecord(entry) && 'pull_request' in entry) {
        return;
      }
      const result = RawItemSchema.safeParse(entry);
      if (!result.success) {
        warnings.push(`${filePath} entry ${index}: ${formatZodError(result.error)}`);
        return;
      }
      if (seen.has(result.data.number)) {
        warnings.push(`${filePath} entry ${index}: duplicate number ${result.data.number} ignored`);
        return;
      }
      seen.add(result.data.number);
      items.push(toItem(result.data, repository, kind));
    });

    return items;
  }

  private async readCommentFile(filePath: string, item: Item, kind: CommentKind, warnings: string[]): Promise<Comment[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return [];
      warnings.push(`Failed to read ${filePath}: ${errorMessage(error)}`);
      return [];
    }

    let entries: unknown[] | null;
    try {
      entries = parsePaginated(text, ['comments', 'data']);
    } catch (error) {
      warnings.push(`Failed to parse ${filePath}: ${errorMessage(error)}; treating as zero comments`);
      return [];
    }
    if (!entries) {
      warnings.push(`${filePath} is not a comment array; treating as zero comments`);
      return [];
    }

    const comments: Comment[] = [];
    entries.forEach((entry, index) => {
      const result = RawCommentSchema.safeParse(entry);
      if (result.success) {
        comments.push(toComment(result.data, { repository: item.repository, kind: item.kind, number: item.number }, kind));
      } else {
        warnings.push(`${filePath} entry ${index}: ${formatZodError(result.error)}`);
      }
    });
    return comments;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatZodError(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

/**
 * Parses the output of a paginated capture into one flat array.
 *
 * Accepts a single array, an array of page arrays, or several arrays written
 * back to back. When `wrapperKeys` is given, a single object holding an array
 * under one of those keys is accepted as well. Returns null for any other
 * shape; throws SyntaxError for invalid JSON.
 */
export function parsePaginated(text: string, wrapperKeys: string[] = []): unknown[] | null {
  const values = splitJsonValues(text).map((value): unknown => JSON.parse(value));
  if (values.length === 0) {
    return null;
  }

  if (values.length === 1) {
    const [value] = values;
    if (Array.isArray(value)) {
      return value.length > 0 && value.every(page => Array.isArray(page)) ? value.flat() : value;
    }
    if (isRecord(value)) {
      for (const key of wrapperKeys) {
        const wrapped = value[key];
        if (Array.isArray(wrapped)) return wrapped;
      }
    }
    return null;
  }

  const pages: unknown[] = [];
  for (const value of values) {
    if (!Array.isArray(value)) return null;
    pages.push(...value);
  }
  return pages;
}

/**
 * Splits text holding one or more top-level JSON objects/arrays into the
 * source text of each value.
 */
export function splitJsonValues(text: string): string[] {
  const values: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (depth === 0) {
      if (ch === '[' || ch === '{') {
        start = i;
        depth = 1;
      } else if (!/\s/.test(ch) && ch !== '\uFEFF') {
        throw new SyntaxError(`Unexpected character ${JSON.stringify(ch)} at offset ${i}`);
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ']' || ch === '}') {
      depth--;
      if (depth === 0) {
        values.push(text.slice(start, i + 1));
      }
    }
  }

  if (depth !== 0 || inString) {
    throw new SyntaxError('Unexpected end of JSON input');
  }
  return values;
}
