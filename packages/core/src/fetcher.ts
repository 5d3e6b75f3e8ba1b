import { injectable, inject, optional } from 'inversify';
import axios from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import type { AssetReference, ExportConfig, MissingAttachmentRecord, ResolutionState } from './types';
import type { IMissingAttachmentJournal } from './journal';
import type { BrowserSessionHandle } from './session';
import { ExponentialBackoff } from './backoff';
import { TaskQueue } from './queue';
import {
  ExportError,
  FetchPermanentError,
  FetchTransientError,
  LoginRequiredError,
  SessionUnavailableError,
  errorMessage,
} from './errors';
import { fileSize, isNotFound, looksLikeHtml, readHead, slugifyRepository, writeFileAtomic } from './utils';
import { ConsoleLogger, LogLevel } from './logger';
import type { ILogger } from './logger';

export interface FetchRequest {
  repository: string;
  /** Repository output directory; reference paths resolve against it. */
  outputDir: string;
  references: readonly AssetReference[];
  journal: IMissingAttachmentJournal;
  /** Shared browser session for session-gated references. */
  session?: BrowserSessionHandle;
}

export interface FetchSummary {
  total: number;
  fetched: number;
  /** Already on disk; counted in `fetched` as well. */
  skipped: number;
  missing: number;
}

export interface IAttachmentFetcher {
  fetchAttachments(request: FetchRequest): Promise<FetchSummary>;
}

interface Outcome {
  state: Exclude<ResolutionState, 'pending'>;
  skipped: boolean;
  reason?: string;
}

const USER_AGENT = 'issuevault/0.1';
const HTML_SNIFF_BYTES = 256;

@injectable()
export class AttachmentFetcher implements IAttachmentFetcher {
  private logger: ILogger;

  constructor(
    @inject('config') private config: Pick<ExportConfig, 'token' | 'fetch'>,
    @inject('ILogger') @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  async fetchAttachments(request: FetchRequest): Promise<FetchSummary> {
    const { references } = request;
    const settings = this.config.fetch;
    const directQueue = new TaskQueue(settings.concurrency);
    const sessionQueue = new TaskQueue(1, settings.sessionDelayMs);
    const outcomes: Outcome[] = [];

    const results = await Promise.allSettled(references.map(async (reference, index) => {
      const queue = reference.origin === 'direct' ? directQueue : sessionQueue;
      outcomes[index] = await queue.add(() => this.resolve(reference, request));
    }));
    // Only local write failures reach here; fetch failures are outcomes.
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }

    const timestamp = new Date().toISOString();
    const records: MissingAttachmentRecord[] = [];
    references.forEach((reference, index) => {
      const outcome = outcomes[index];
      if (outcome.state === 'missing') {
        records.push({
          repository: request.repository,
          repositorySlug: slugifyRepository(request.repository),
          kind: reference.item.kind,
          number: reference.item.number,
          url: reference.url,
          localPath: reference.localPath,
          documentPath: reference.documentPath,
          reason: outcome.reason ?? 'unknown',
          timestamp,
        });
      }
    });
    await request.journal.append(records);

    const summary: FetchSummary = {
      total: references.length,
      fetched: outcomes.filter(o => o.state === 'fetched').length,
      skipped: outcomes.filter(o => o.skipped).length,
      missing: records.length,
    };
    this.logger.info(
      `${request.repository}: ${summary.fetched}/${summary.total} attachments present ` +
      `(${summary.skipped} already on disk), ${summary.missing} missing`);
    return summary;
  }

  private async resolve(reference: AssetReference, request: FetchRequest): Promise<Outcome> {
    const target = path.join(request.outputDir, reference.localPath);
    if (await isPresent(target)) {
      this.logger.debug(`Skipping ${reference.url}: ${reference.localPath} exists`);
      return { state: 'fetched', skipped: true };
    }

    const backoff = new ExponentialBackoff({
      maxAttempts: this.config.fetch.maxAttempts,
      baseDelay: this.config.fetch.baseDelayMs,
      jitterRange: this.config.fetch.baseDelayMs / 4,
      onRetry: (attempt, delay, error) => this.logger.debug(
        `Attempt ${attempt} for ${reference.url} failed (${errorMessage(error)}); retrying in ${Math.round(delay)}ms`),
    });

    const result = await backoff.execute(() => reference.origin === 'direct'
      ? this.getDirect(reference.url)
      : this.getViaSession(reference.url, request.session));

    if (!result.success || !result.value) {
      const reason = reasonFor(result.error);
      this.logger.warn(`Missing attachment ${reference.url} for ${reference.documentPath}: ${reason}`);
      return { state: 'missing', skipped: false, reason };
    }

    await writeFileAtomic(target, result.value);
    this.logger.debug(`Fetched ${reference.url} -> ${reference.localPath} (${result.value.length} bytes)`);
    return { state: 'fetched', skipped: false };
  }

  private async getDirect(url: string): Promise<Buffer> {
    const headers: Record<string, string> = {
      'User-Agent': USER_AGENT,
      Accept: 'application/octet-stream',
    };
    if (this.config.token) {
      headers.Authorization = `token ${this.config.token}`;
    }

    let status: number;
    let data: ArrayBuffer;
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.config.fetch.timeoutMs,
        headers,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw new FetchTransientError(`Request to ${url} failed: ${errorMessage(error)}`, undefined, error);
    }
    return checkResponse(url, status, Buffer.from(data));
  }

  private async getViaSession(url: string, handle: BrowserSessionHandle | undefined): Promise<Buffer> {
    if (!handle) {
      throw new SessionUnavailableError('No browser session was provided for session-gated attachments');
    }
    const session = await handle.acquire();

    let lastError: unknown;
    for (const candidate of sessionCandidates(url)) {
      let response;
      try {
        response = await session.get(candidate, this.config.fetch.timeoutMs);
      } catch (error) {
        throw new FetchTransientError(`Session request to ${candidate} failed: ${errorMessage(error)}`, undefined, error);
      }
      try {
        const body = checkResponse(candidate, response.status, response.body);
        if (response.contentType?.toLowerCase().includes('text/html') || looksLikeHtml(body)) {
          throw new LoginRequiredError(candidate);
        }
        return body;
      } catch (error) {
        // Transient failures retry the whole sequence; permanent ones try the next form.
        if (error instanceof FetchTransientError) throw error;
        lastError = error;
      }
    }
    throw lastError;
  }
}

function checkResponse(url: string, status: number, body: Buffer): Buffer {
  if (status === 429 || status >= 500) {
    throw new FetchTransientError(`HTTP ${status} for ${url}`, status);
  }
  if (status < 200 || status >= 300) {
    throw new FetchPermanentError(`HTTP ${status} for ${url}`, status);
  }
  if (body.length === 0) {
    throw new FetchPermanentError(`Empty response body for ${url}`);
  }
  return body;
}

/**
 * URLs to try for a session-gated attachment: as written, then with
 * `download=1` for `github.com/user-attachments/` links.
 */
export function sessionCandidates(url: string): string[] {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return [url];
  }
  if (parsed.hostname !== 'github.com' || !parsed.pathname.startsWith('/user-attachments/') ||
    parsed.searchParams.get('download') === '1') {
    return [url];
  }
  parsed.searchParams.set('download', '1');
  return [url, parsed.toString()];
}

export function reasonFor(error: unknown): string {
  if (error instanceof SessionUnavailableError) {
    return 'session-unavailable';
  }
  if (error instanceof LoginRequiredError) {
    return 'login-required';
  }
  if (error instanceof FetchTransientError || error instanceof FetchPermanentError) {
    if (error.statusCode !== undefined) return `http-${error.statusCode}`;
    return error instanceof FetchTransientError ? 'network-error' : 'empty-body';
  }
  if (error instanceof ExportError) {
    return error.code.toLowerCase();
  }
  return errorMessage(error);
}

/**
 * A target counts as present when it has content that is not an HTML page,
 * or when the normalizer has already renamed it to a sibling with the same stem.
 */
async function isPresent(target: string): Promise<boolean> {
  if (await fileSize(target) > 0) {
    return !looksLikeHtml(await readHead(target, HTML_SNIFF_BYTES));
  }
  const dir = path.dirname(target);
  const base = path.basename(target);
  const stem = path.basename(base, path.extname(base));
  let names: string[];
  try {
    names = await fs.promises.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
  return names.some(name =>
    name !== base && !name.endsWith('.tmp') && path.basename(name, path.extname(name)) === stem);
}
