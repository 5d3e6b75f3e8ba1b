import { Container } from 'inversify';
import type { ExportConfig } from './types';
import { TYPES } from './tokens';
import { RawStoreReader } from './reader';
import type { IRawStoreReader } from './reader';
import { TimelineService } from './timeline';
import type { ITimelineService } from './timeline';
import { MarkdownRenderer } from './renderer';
import type { IMarkdownRenderer } from './renderer';
import { RelatedLinkResolver } from './related';
import type { IRelatedLinkResolver } from './related';
import { AssetExtractor } from './assets';
import type { IAssetExtractor } from './assets';
import { ExportService } from './exporter';
import type { IExportService } from './exporter';
import { AttachmentFetcher } from './fetcher';
import type { IAttachmentFetcher } from './fetcher';
import { ExtensionNormalizer } from './normalizer';
import type { IExtensionNormalizer } from './normalizer';
import { PlaywrightSessionProvider } from './session';
import type { IBrowserSessionProvider } from './session';
import { PipelineRunner } from './pipeline';
import type { IPipelineRunner } from './pipeline';
import { GitService } from './git';
import type { IGitService } from './git';
import { ConsoleLogger } from './logger';
import type { ILogger } from './logger';

export { TYPES } from './tokens';

export function createContainer(config: ExportConfig, logger: ILogger = new ConsoleLogger()): Container {
  const container = new Container();
  container.bind<IRawStoreReader>(TYPES.IRawStoreReader).to(RawStoreReader).inSingletonScope();
  container.bind<ITimelineService>(TYPES.ITimelineService).to(TimelineService).inSingletonScope();
  container.bind<IMarkdownRenderer>(TYPES.IMarkdownRenderer).to(MarkdownRenderer).inSingletonScope();
  container.bind<IRelatedLinkResolver>(TYPES.IRelatedLinkResolver).to(RelatedLinkResolver).inSingletonScope();
  container.bind<IAssetExtractor>(TYPES.IAssetExtractor).to(AssetExtractor).inSingletonScope();
  container.bind<IExportService>(TYPES.IExportService).to(ExportService).inSingletonScope();
  container.bind<IAttachmentFetcher>(TYPES.IAttachmentFetcher).to(AttachmentFetcher).inSingletonScope();
  container.bind<IExtensionNormalizer>(TYPES.IExtensionNormalizer).to(ExtensionNormalizer).inSingletonScope();
  container.bind<IBrowserSessionProvider>(TYPES.IBrowserSessionProvider).to(PlaywrightSessionProvider).inSingletonScope();
  container.bind<IPipelineRunner>(TYPES.IPipelineRunner).to(PipelineRunner).inSingletonScope();
  container.bind<IGitService>(TYPES.IGitService).to(GitService).inSingletonScope();

  // Bind config
  container.bind<ExportConfig>(TYPES.Config).toConstantValue(config);
  container.bind<ILogger>(TYPES.ILogger).toConstantValue(logger);

  return container;
}
