/**
 * Container keys. Services resolve the configuration and the logger through
 * the string keys; every service has its own symbol.
 */
export const TYPES = {
  Config: 'config',
  ILogger: 'ILogger',
  IRawStoreReader: Symbol.for('IRawStoreReader'),
  ITimelineService: Symbol.for('ITimelineService'),
  IMarkdownRenderer: Symbol.for('IMarkdownRenderer'),
  IRelatedLinkResolver: Symbol.for('IRelatedLinkResolver'),
  IAssetExtractor: Symbol.for('IAssetExtractor'),
  IExportService: Symbol.for('IExportService'),
  IAttachmentFetcher: Symbol.for('IAttachmentFetcher'),
  IExtensionNormalizer: Symbol.for('IExtensionNormalizer'),
  IBrowserSessionProvider: Symbol.for('IBrowserSessionProvider'),
  IPipelineRunner: Symbol.for('IPipelineRunner'),
  IGitService: Symbol.for('IGitService'),
} as const;
