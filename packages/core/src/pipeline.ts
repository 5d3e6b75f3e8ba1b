import { injectable, inject, optional } from 'inversify';
import type { ExportConfig } from './types';
import type { IExportService, ExportSummary } from './exporter';
import { readManifest } from './exporter';
import type { IAttachmentFetcher, FetchSummary } from './fetcher';
import type { IExtensionNormalizer, NormalizeSummary } from './normalizer';
import type { BrowserSessionHandle, IBrowserSessionProvider } from './session';
import { withBrowserSession } from './session';
import { FileJournal, journalPath } from './journal';
import { TYPES } from './tokens';
import { errorMessage } from './errors';
import { ConsoleLogger, LogLevel } from './logger';
import type { ILogger } from './logger';

export interface RepositoryRun {
  repository: string;
  export?: ExportSummary;
  fetch?: FetchSummary;
  normalize?: NormalizeSummary;
  /** Set when the repository was aborted; later stages did not run. */
  error?: unknown;
}

export type Stage = 'export' | 'fetch' | 'normalize';

export const ALL_STAGES: readonly Stage[] = ['export', 'fetch', 'normalize'];

export interface IPipelineRunner {
  run(stages: readonly Stage[]): Promise<RepositoryRun[]>;
}

/**
 * Runs the requested stages for every configured repository, one repository
 * at a time. A failing repository is recorded and the next one proceeds; the
 * browser session is shared by all repositories and closed at the end.
 */
@injectable()
export class PipelineRunner implements IPipelineRunner {
  private logger: ILogger;

  constructor(
    @inject('config') private config: Pick<ExportConfig, 'repositories' | 'outRoot'>,
    @inject(TYPES.IExportService) private exporter: IExportService,
    @inject(TYPES.IAttachmentFetcher) private fetcher: IAttachmentFetcher,
    @inject(TYPES.IExtensionNormalizer) private normalizer: IExtensionNormalizer,
    @inject(TYPES.IBrowserSessionProvider) private sessions: IBrowserSessionProvider,
    @inject('ILogger') @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  run(stages: readonly Stage[]): Promise<RepositoryRun[]> {
    if (!stages.includes('fetch')) {
      return this.runAll(stages);
    }
    return withBrowserSession(this.sessions, session => this.runAll(stages, session));
  }

  private async runAll(stages: readonly Stage[], session?: BrowserSessionHandle): Promise<RepositoryRun[]> {
    const runs: RepositoryRun[] = [];
    for (const repository of this.config.repositories) {
      const run: RepositoryRun = { repository };
      try {
        await this.runRepository(run, stages, session);
      } catch (error) {
        this.logger.error(`${repository}: ${errorMessage(error)}`);
        run.error = error;
      }
      runs.push(run);
    }
    return runs;
  }

  private async runRepository(run: RepositoryRun, stages: readonly Stage[], session?: BrowserSessionHandle): Promise<void> {
    const { repository } = run;
    const outputDir = this.exporter.getOutputDir(repository);

    if (stages.includes('export')) {
      run.export = await this.exporter.exportRepository(repository);
    }
    if (stages.includes('fetch')) {
      const references = run.export?.references ?? (await readManifest(outputDir)).references;
      run.fetch = await this.fetcher.fetchAttachments({
        repository,
        outputDir,
        references,
        journal: new FileJournal(journalPath(this.config.outRoot, repository)),
        session,
      });
    }
    if (stages.includes('normalize')) {
      run.normalize = await this.normalizer.normalizeRepository(outputDir);
    }
  }
}
