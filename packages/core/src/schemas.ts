import { z } from 'zod';
import type { Comment, CommentKind, Item, ItemKind, ItemRef } from './types';

/**
 * Zod schemas for the raw capture files. Both the REST shape (`user.login`,
 * `created_at`) and the gh CLI shape (`author.login`, `createdAt`) are
 * accepted. Unknown fields are stripped.
 */

const ActorSchema = z.object({ login: z.string().nullish() }).nullish();

const AuthorSchema = z.union([z.string(), z.object({ login: z.string().nullish() })]).nullish();

const LabelSchema = z.union([z.string(), z.object({ name: z.string().nullish() })]);

const RefSchema = z.object({ ref: z.string().nullish() }).nullish();

export const RawItemSchema = z.object({
  number: z.number().int(),
  title: z.string().nullish(),
  user: ActorSchema,
  author: AuthorSchema,
  state: z.string().nullish(),
  html_url: z.string().nullish(),
  url: z.string().nullish(),
  created_at: z.string().nullish(),
  createdAt: z.string().nullish(),
  updated_at: z.string().nullish(),
  updatedAt: z.string().nullish(),
  closed_at: z.string().nullish(),
  closedAt: z.string().nullish(),
  merged_at: z.string().nullish(),
  mergedAt: z.string().nullish(),
  draft: z.boolean().nullish(),
  isDraft: z.boolean().nullish(),
  head: RefSchema,
  base: RefSchema,
  headRefName: z.string().nullish(),
  baseRefName: z.string().nullish(),
  labels: z.array(LabelSchema).nullish(),
  body: z.string().nullish(),
});

export type RawItem = z.infer<typeof RawItemSchema>;

export const RawCommentSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  user: ActorSchema,
  author: AuthorSchema,
  body: z.string().nullish(),
  created_at: z.string().nullish(),
  createdAt: z.string().nullish(),
  html_url: z.string().nullish(),
  url: z.string().nullish(),
  path: z.string().nullish(),
  line: z.number().int().nullish(),
  original_line: z.number().int().nullish(),
});

export type RawComment = z.infer<typeof RawCommentSchema>;

function login(user: RawItem['user'], author: RawItem['author']): string | null {
  if (user?.login) return user.login;
  if (typeof author === 'string') return author || null;
  return author?.login ?? null;
}

function labelNames(labels: RawItem['labels']): string[] {
  const names = new Set<string>();
  for (const label of labels ?? []) {
    const name = typeof label === 'string' ? label : label.name;
    if (name) names.add(name);
  }
  return [...names].sort();
}

export function toItem(raw: RawItem, repository: string, kind: ItemKind): Item {
  const item: Item = {
    repository,
    kind,
    number: raw.number,
    title: raw.title ?? null,
    author: login(raw.user, raw.author),
    state: raw.state ?? null,
    url: raw.html_url ?? raw.url ?? null,
    createdAt: raw.created_at ?? raw.createdAt ?? null,
    updatedAt: raw.updated_at ?? raw.updatedAt ?? null,
    closedAt: raw.closed_at ?? raw.closedAt ?? null,
    labels: labelNames(raw.labels),
    body: raw.body ?? null,
  };
  if (kind === 'issue') {
    return item;
  }
  return {
    ...item,
    pull: {
      mergedAt: raw.merged_at ?? raw.mergedAt ?? null,
      draft: raw.draft ?? raw.isDraft ?? false,
      headRef: raw.head?.ref ?? raw.headRefName ?? null,
      baseRef: raw.base?.ref ?? raw.baseRefName ?? null,
    },
  };
}

export function toComment(raw: RawComment, item: ItemRef, kind: CommentKind): Comment {
  const comment: Comment = {
    // Non-numeric ids (GraphQL node ids) cannot order ties; input order applies.
    id: typeof raw.id === 'number' ? raw.id : null,
    item,
    kind,
    author: login(raw.user, raw.author),
    body: raw.body ?? null,
    createdAt: raw.created_at ?? raw.createdAt ?? null,
    url: raw.html_url ?? raw.url ?? null,
  };
  if (kind === 'review-comment' && raw.path) {
    return { ...comment, anchor: { path: raw.path, line: raw.line ?? raw.original_line ?? null } };
  }
  return comment;
}

export const AssetReferenceSchema = z.object({
  item: z.object({
    repository: z.string(),
    kind: z.enum(['issue', 'pull_request']),
    number: z.number().int(),
  }),
  url: z.string(),
  origin: z.enum(['direct', 'session']),
  index: z.number().int().positive(),
  localPath: z.string(),
  documentPath: z.string(),
});

export const AssetManifestSchema = z.object({
  repository: z.string(),
  references: z.array(AssetReferenceSchema),
});
