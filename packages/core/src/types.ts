export type ItemKind = 'issue' | 'pull_request';

export type CommentKind = 'issue-comment' | 'review-comment';

export interface ItemRef {
  readonly repository: string;
  readonly kind: ItemKind;
  readonly number: number;
}

export interface PullRequestDetails {
  readonly mergedAt: string | null;
  readonly draft: boolean;
  readonly headRef: string | null;
  readonly baseRef: string | null;
}

export interface Item extends ItemRef {
  readonly title: string | null;
  readonly author: string | null;
  readonly state: string | null;
  readonly url: string | null;
  readonly createdAt: string | null;
  readonly updatedAt: string | null;
  readonly closedAt: string | null;
  readonly labels: readonly string[];
  readonly body: string | null;
  readonly pull?: PullRequestDetails;
}

export interface DiffAnchor {
  readonly path: string;
  readonly line: number | null;
}

export interface Comment {
  readonly id: number | null;
  readonly item: ItemRef;
  readonly kind: CommentKind;
  readonly author: string | null;
  readonly body: string | null;
  readonly createdAt: string | null;
  readonly url: string | null;
  readonly anchor?: DiffAnchor;
}

export interface BodyEntry {
  readonly kind: 'body';
  readonly author: string | null;
  readonly createdAt: Date | null;
  readonly body: string | null;
}

export interface CommentEntry {
  readonly kind: CommentKind;
  readonly createdAt: Date;
  readonly comment: Comment;
}

export type TimelineEntry = BodyEntry | CommentEntry;

/** entries[0] is always the body entry. */
export interface Timeline {
  readonly item: Item;
  readonly entries: readonly [BodyEntry, ...CommentEntry[]];
}

export type AssetOrigin = 'direct' | 'session';

export type ResolutionState = 'pending' | 'fetched' | 'missing';

export interface AssetReference {
  readonly item: ItemRef;
  readonly url: string;
  readonly origin: AssetOrigin;
  /** 1-based order of first appearance within the item */
  readonly index: number;
  /** Relative to the repository output directory, e.g. assets/issues/42/001_abc.img */
  readonly localPath: string;
  /** Relative to the repository output directory, e.g. issues/ISSUE-42.md */
  readonly documentPath: string;
}

export interface AssetManifest {
  repository: string;
  references: AssetReference[];
}

export interface MissingAttachmentRecord {
  repository: string;
  repositorySlug: string;
  kind: ItemKind;
  number: number;
  url: string;
  localPath: string;
  documentPath: string;
  reason: string;
  timestamp: string;
}

export interface OriginRule {
  host: string;
  pathPrefix?: string;
  origin: AssetOrigin;
}

export interface RelatedLink {
  label: string;
  number: number;
  url: string;
}

export interface ExportConfig {
  repositories: string[];
  rawRoot: string;
  outRoot: string;
  profileDir: string;
  token?: string;
  originRules: OriginRule[];
  fetch: FetchSettings;
}

export interface FetchSettings {
  concurrency: number;
  maxAttempts: number;
  baseDelayMs: number;
  timeoutMs: number;
  sessionDelayMs: number;
  headless: boolean;
  /** Installed browser to drive instead of a downloaded Chromium, e.g. `chrome` */
  browserChannel?: string;
}
