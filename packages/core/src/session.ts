import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import { chromium } from 'playwright-core';
import type { BrowserContext } from 'playwright-core';
import type { ExportConfig } from './types';
import { SessionUnavailableError, errorMessage } from './errors';
import { ConsoleLogger, LogLevel } from './logger';
import type { ILogger } from './logger';

export interface SessionResponse {
  status: number;
  contentType?: string;
  body: Buffer;
}

/** An authenticated browser context able to fetch session-gated URLs. */
export interface BrowserSession {
  get(url: string, timeoutMs: number): Promise<SessionResponse>;
  close(): Promise<void>;
}

export interface IBrowserSessionProvider {
  open(): Promise<BrowserSession>;
}

export const LOGIN_URL = 'https://github.com/login';

@injectable()
export class PlaywrightSessionProvider implements IBrowserSessionProvider {
  private logger: ILogger;

  constructor(
    @inject('config') private config: Pick<ExportConfig, 'profileDir' | 'fetch'>,
    @inject('ILogger') @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  async open(): Promise<BrowserSession> {
    const context = await this.launch(this.config.fetch.headless);
    return new PlaywrightSession(context);
  }

  /**
   * Opens a visible browser on the login page and keeps it open until
   * `waitForUser` resolves, so the profile stores the logged-in session.
   */
  async login(waitForUser: () => Promise<void>): Promise<void> {
    const context = await this.launch(false);
    try {
      const page = await context.newPage();
      await page.goto(LOGIN_URL);
      await waitForUser();
    } finally {
      await context.close();
    }
  }

  private async launch(headless: boolean): Promise<BrowserContext> {
    const { profileDir } = this.config;
    await fs.promises.mkdir(profileDir, { recursive: true });
    this.logger.debug(`Launching browser on profile ${profileDir} (headless: ${headless})`);
    try {
      return await chromium.launchPersistentContext(profileDir, {
        headless,
        channel: this.config.fetch.browserChannel,
      });
    } catch (error) {
      throw new SessionUnavailableError(`Cannot start a browser session on ${profileDir}: ${errorMessage(error)}`, error);
    }
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(private readonly context: BrowserContext) {}

  async get(url: string, timeoutMs: number): Promise<SessionResponse> {
    // The request context shares cookies with the persistent profile.
    const response = await this.context.request.get(url, { timeout: timeoutMs, failOnStatusCode: false });
    return {
      status: response.status(),
      contentType: response.headers()['content-type'],
      body: await response.body(),
    };
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/**
 * Owned handle on the shared browser session: opened on first use, reused
 * afterwards, closed by whoever created it. A failed open is remembered so
 * every later acquire fails fast with the same SessionUnavailableError.
 */
export class BrowserSessionHandle {
  private session?: Promise<BrowserSession>;

  constructor(private readonly provider: IBrowserSessionProvider) {}

  acquire(): Promise<BrowserSession> {
    if (!this.session) {
      this.session = this.provider.open().catch((error: unknown) => {
        throw error instanceof SessionUnavailableError
          ? error
          : new SessionUnavailableError(`Cannot start a browser session: ${errorMessage(error)}`, error);
      });
    }
    return this.session;
  }

  async close(): Promise<void> {
    const pending = this.session;
    this.session = undefined;
    if (!pending) return;
    // A session that never opened has nothing to close; acquire() already reported why.
    const session = await pending.then(s => s, () => undefined);
    if (session) {
      await session.close();
    }
  }
}

export async function withBrowserSession<T>(
  provider: IBrowserSessionProvider,
  fn: (handle: BrowserSessionHandle) => Promise<T>
): Promise<T> {
  const handle = new BrowserSessionHandle(provider);
  try {
    return await fn(handle);
  } finally {
    await handle.close();
  }
}
