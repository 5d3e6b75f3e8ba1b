import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ALL_STAGES, PipelineRunner } from './pipeline';
import type { ExportSummary, IExportService } from './exporter';
import { MANIFEST_FILE } from './exporter';
import type { FetchRequest, FetchSummary, IAttachmentFetcher } from './fetcher';
import type { IExtensionNormalizer, NormalizeSummary } from './normalizer';
import type { BrowserSession, IBrowserSessionProvider } from './session';
import { MalformedCaptureError } from './errors';
import { ConsoleLogger, LogLevel } from './logger';
import type { AssetReference } from './types';

const REFERENCE: AssetReference = {
  item: { repository: 'acme/widgets', kind: 'issue', number: 1 },
  url: 'https://github.com/user-attachments/assets/abc',
  origin: 'session',
  index: 1,
  localPath: 'assets/issues/1/001_abc.img',
  documentPath: 'issues/ISSUE-1.md',
};

describe('PipelineRunner', () => {
  let outRoot: string;
  let exportRepository: Mock<(repository: string) => Promise<ExportSummary>>;
  let fetchAttachments: Mock<(request: FetchRequest) => Promise<FetchSummary>>;
  let normalizeRepository: Mock<(outputDir: string) => Promise<NormalizeSummary>>;
  let close: Mock<() => Promise<void>>;
  let open: Mock<() => Promise<BrowserSession>>;
  let exporter: IExportService;
  let fetcher: IAttachmentFetcher;
  let normalizer: IExtensionNormalizer;
  let provider: IBrowserSessionProvider;

  const exportSummary = (repository: string): ExportSummary => ({
    repository,
    outputDir: path.join(outRoot, repository.replace('/', '_')),
    issues: 1,
    pulls: 0,
    failures: [],
    warnings: [],
    references: [REFERENCE],
  });
  const fetchSummary: FetchSummary = { total: 1, fetched: 1, skipped: 0, missing: 0 };
  const normalizeSummary: NormalizeSummary = { renamed: 0, documentsUpdated: 0, flagged: [] };

  const createRunner = (repositories: string[]) => new PipelineRunner(
    { repositories, outRoot }, exporter, fetcher, normalizer, provider, new ConsoleLogger(LogLevel.SILENT));

  beforeEach(() => {
    outRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'issuevault-pipeline-'));
    exportRepository = vi.fn<(repository: string) => Promise<ExportSummary>>(
      async repository => exportSummary(repository));
    fetchAttachments = vi.fn<(request: FetchRequest) => Promise<FetchSummary>>(async request => {
      await request.session?.acquire();
      return fetchSummary;
    });
    normalizeRepository = vi.fn<(outputDir: string) => Promise<NormalizeSummary>>(async () => normalizeSummary);
    close = vi.fn<() => Promise<void>>(async () => undefined);
    const session: BrowserSession = { get: vi.fn(), close };
    open = vi.fn<() => Promise<BrowserSession>>(async () => session);

    exporter = {
      getOutputDir: (repository: string) => path.join(outRoot, repository.replace('/', '_')),
      exportRepository,
    };
    fetcher = { fetchAttachments };
    normalizer = { normalizeRepository };
    provider = { open };
  });

  afterEach(() => {
    fs.rmSync(outRoot, { recursive: true, force: true });
  });

  it('should run every stage per repository and close the shared session', async () => {
    const runs = await createRunner(['acme/widgets', 'acme/gadgets']).run(ALL_STAGES);

    expect(runs).toEqual([
      { repository: 'acme/widgets', export: exportSummary('acme/widgets'), fetch: fetchSummary, normalize: normalizeSummary },
      { repository: 'acme/gadgets', export: exportSummary('acme/gadgets'), fetch: fetchSummary, normalize: normalizeSummary },
    ]);
    expect(open).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(normalizeRepository).toHaveBeenCalledWith(path.join(outRoot, 'acme_gadgets'));
  });

  it('should hand the fresh references and a per-repository journal to the fetcher', async () => {
    await createRunner(['acme/widgets']).run(ALL_STAGES);

    const request: FetchRequest = fetchAttachments.mock.calls[0][0];
    expect(request.repository).toBe('acme/widgets');
    expect(request.outputDir).toBe(path.join(outRoot, 'acme_widgets'));
    expect(request.references).toEqual([REFERENCE]);
    expect(request.journal).toMatchObject({
      filePath: path.join(outRoot, 'missing_attachments_acme_widgets.jsonl'),
    });
  });

  it('should read the manifest when fetching on its own', async () => {
    const outputDir = path.join(outRoot, 'acme_widgets');
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(path.join(outputDir, MANIFEST_FILE), JSON.stringify({ repository: 'acme/widgets', references: [REFERENCE] }));

    const runs = await createRunner(['acme/widgets']).run(['fetch']);

    expect(exportRepository).not.toHaveBeenCalled();
    expect(fetchAttachments.mock.calls[0][0].references).toEqual([REFERENCE]);
    expect(runs[0].fetch).toEqual(fetchSummary);
  });

  it('should not open a browser for stages that do not fetch', async () => {
    await createRunner(['acme/widgets']).run(['export', 'normalize']);

    expect(open).not.toHaveBeenCalled();
    expect(fetchAttachments).not.toHaveBeenCalled();
  });

  it('should record a failed repository and continue with the next', async () => {
    const error = new MalformedCaptureError('issues.json', 'file is missing');
    exportRepository.mockRejectedValueOnce(error);

    const runs = await createRunner(['acme/broken', 'acme/widgets']).run(ALL_STAGES);

    expect(runs[0]).toEqual({ repository: 'acme/broken', error });
    expect(runs[1].normalize).toEqual(normalizeSummary);
    expect(fetchAttachments).toHaveBeenCalledTimes(1);
  });

  it('should close the session when a stage throws', async () => {
    normalizeRepository.mockRejectedValue(new Error('EACCES'));

    const runs = await createRunner(['acme/widgets']).run(ALL_STAGES);

    expect(runs[0].error).toBeInstanceOf(Error);
    expect(close).toHaveBeenCalledTimes(1);
  });
});
