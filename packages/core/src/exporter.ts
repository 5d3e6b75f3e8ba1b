import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import type { AssetManifest, AssetReference, ExportConfig, Item, ItemKind } from './types';
import type { IRawStoreReader } from './reader';
import type { ITimelineService } from './timeline';
import type { IMarkdownRenderer } from './renderer';
import type { IRelatedLinkResolver } from './related';
import type { IAssetExtractor } from './assets';
import { AssetManifestSchema } from './schemas';
import { TYPES } from './tokens';
import { InvalidTimestampError, MalformedCaptureError, RenderError, errorMessage } from './errors';
import { documentPath, isNotFound, slugifyRepository, writeFileAtomic } from './utils';
import { ConsoleLogger, LogLevel } from './logger';
import type { ILogger } from './logger';

export const MANIFEST_FILE = 'asset-manifest.json';

export interface ItemFailure {
  kind: ItemKind;
  number: number;
  code: string;
  message: string;
}

export interface ExportSummary {
  repository: string;
  outputDir: string;
  issues: number;
  pulls: number;
  failures: ItemFailure[];
  warnings: string[];
  references: AssetReference[];
}

export interface IExportService {
  getOutputDir(repository: string): string;
  exportRepository(repository: string): Promise<ExportSummary>;
}

/**
 * Render pass: reads the capture, renders one Markdown document per item,
 * and records every asset reference in the repository's manifest.
 */
@injectable()
export class ExportService implements IExportService {
  private logger: ILogger;

  constructor(
    @inject('config') private config: Pick<ExportConfig, 'outRoot'>,
    @inject(TYPES.IRawStoreReader) private reader: IRawStoreReader,
    @inject(TYPES.ITimelineService) private timelines: ITimelineService,
    @inject(TYPES.IRelatedLinkResolver) private related: IRelatedLinkResolver,
    @inject(TYPES.IAssetExtractor) private extractor: IAssetExtractor,
    @inject(TYPES.IMarkdownRenderer) private renderer: IMarkdownRenderer,
    @inject('ILogger') @optional() logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  getOutputDir(repository: string): string {
    return path.join(this.config.outRoot, slugifyRepository(repository));
  }

  async exportRepository(repository: string): Promise<ExportSummary> {
    const capture = await this.reader.readRepository(repository);
    const outputDir = this.getOutputDir(repository);
    const issueNumbers = new Set(capture.issues.map(item => item.number));
    const pullNumbers = new Set(capture.pulls.map(item => item.number));

    const summary: ExportSummary = {
      repository,
      outputDir,
      issues: 0,
      pulls: 0,
      failures: [],
      warnings: [...capture.warnings],
      references: [],
    };

    const items = [...capture.issues, ...capture.pulls];
    const progress = progressReporter(items.length, (done, percent) =>
      this.logger.info(`${repository}: rendered ${done}/${items.length} items (${percent}%)`));

    for (const item of items) {
      try {
        const references = await this.exportItem(item, outputDir, issueNumbers, pullNumbers, summary.warnings);
        summary.references.push(...references);
        if (item.kind === 'issue') {
          summary.issues++;
        } else {
          summary.pulls++;
        }
      } catch (error) {
        if (!(error instanceof InvalidTimestampError) && !(error instanceof RenderError)) {
          throw error;
        }
        this.logger.warn(`Skipping ${item.kind === 'issue' ? 'issue' : 'pull request'} #${item.number}: ${error.message}`);
        summary.failures.push({ kind: item.kind, number: item.number, code: error.code, message: error.message });
      }
      progress();
    }

    const manifest: AssetManifest = { repository, references: summary.references };
    await writeFileAtomic(path.join(outputDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n');

    this.logger.info(
      `${repository}: exported ${summary.issues} issues and ${summary.pulls} pull requests ` +
      `(${summary.failures.length} skipped, ${summary.references.length} attachments)`);
    return summary;
  }

  private async exportItem(
    item: Item,
    outputDir: string,
    issueNumbers: ReadonlySet<number>,
    pullNumbers: ReadonlySet<number>,
    warnings: string[]
  ): Promise<AssetReference[]> {
    const comments = await this.reader.readComments(item);
    warnings.push(...comments.warnings);

    const timeline = this.timelines.buildTimeline(item, comments.issueComments, comments.reviewComments);
    const related = item.kind === 'issue'
      ? this.related.relatedPulls(
        item.repository,
        [item.body, ...timeline.entries.slice(1).map(entry => entry.kind === 'body' ? entry.body : entry.comment.body)],
        pullNumbers)
      : this.related.relatedIssues(item.repository, item.body, issueNumbers);

    const collector = this.extractor.createCollector(item);
    const markdown = this.renderer.render(timeline, { related, rewrite: text => collector.rewrite(text) });
    await writeFileAtomic(path.join(outputDir, documentPath(item)), markdown);

    for (const url of collector.unrecognized) {
      this.logger.debug(`${documentPath(item)}: leaving ${url} as is`);
    }
    return collector.references;
  }
}

/** Calls `report` each time another 5% of `total` is done, and at the end. */
function progressReporter(total: number, report: (done: number, percent: number) => void): () => void {
  const step = Math.max(1, Math.ceil(total / 20));
  let done = 0;
  return () => {
    done++;
    if (done % step === 0 || done === total) {
      report(done, Math.floor((done / total) * 100));
    }
  };
}

export async function readManifest(outputDir: string): Promise<AssetManifest> {
  const filePath = path.join(outputDir, MANIFEST_FILE);
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new MalformedCaptureError(filePath, 'manifest is missing; run export first');
    }
    throw error;
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new MalformedCaptureError(filePath, `invalid JSON (${errorMessage(error)})`, error);
  }
  const result = AssetManifestSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedCaptureError(filePath, result.error.issues[0]?.message ?? 'invalid manifest');
  }
  return result.data;
}
