import { injectable, inject, optional } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import {
  detectImageExtension,
  documentFileName,
  isNotFound,
  kindFromFolder,
  normalizeExtension,
  readHead,
  writeFileAtomic,
} from './utils';
import { ConsoleLogger, LogLevel } from './logger';
import type { ILogger } from './logger';

export interface NormalizeSummary {
  renamed: number;
  documentsUpdated: number;
  /** Asset files (relative to the output directory) left as they were. */
  flagged: string[];
}

export interface IExtensionNormalizer {
  normalizeRepository(outputDir: string): Promise<NormalizeSummary>;
}

const SNIFF_BYTES = 16;

@injectable()
export class ExtensionNormalizer implements IExtensionNormalizer {
  private logger: ILogger;

  constructor(@inject('ILogger') @optional() logger?: ILogger) {
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  async normalizeRepository(outputDir: string): Promise<NormalizeSummary> {
    const summary: NormalizeSummary = { renamed: 0, documentsUpdated: 0, flagged: [] };

    for (const folder of ['issues', 'prs']) {
      const kind = kindFromFolder(folder);
      if (!kind) continue;
      const numbers = (await listEntries(path.join(outputDir, 'assets', folder)))
        .filter(name => /^\d+$/.test(name))
        .sort((a, b) => Number(a) - Number(b));

      for (const number of numbers) {
        const assetDir = path.join(outputDir, 'assets', folder, number);
        const files = await this.normalizeFolder(assetDir, `assets/${folder}/${number}`, summary);
        const document = path.join(outputDir, folder, documentFileName(kind, Number(number)));
        if (await this.relinkDocument(document, `../assets/${folder}/${number}/`, files)) {
          summary.documentsUpdated++;
        }
      }
    }

    this.logger.info(
      `${outputDir}: renamed ${summary.renamed} assets, updated ${summary.documentsUpdated} documents, ` +
      `${summary.flagged.length} flagged`);
    return summary;
  }

  /** Returns the folder's file names after renaming. */
  private async normalizeFolder(dir: string, relativeDir: string, summary: NormalizeSummary): Promise<Set<string>> {
    const names = (await listEntries(dir)).filter(name => !name.endsWith('.tmp')).sort();
    const files = new Set(names);

    for (const name of names) {
      const filePath = path.join(dir, name);
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) continue;

      const detected = detectImageExtension(await readHead(filePath, SNIFF_BYTES));
      if (!detected) {
        this.logger.warn(`Unrecognized content in ${relativeDir}/${name}`);
        summary.flagged.push(`${relativeDir}/${name}`);
        continue;
      }

      const ext = path.extname(name);
      if (normalizeExtension(ext) === detected) continue;

      const target = name.slice(0, name.length - ext.length) + detected;
      if (files.has(target)) {
        this.logger.warn(`Cannot rename ${relativeDir}/${name}: ${target} already exists`);
        summary.flagged.push(`${relativeDir}/${name}`);
        continue;
      }

      await fs.promises.rename(filePath, path.join(dir, target));
      files.delete(name);
      files.add(target);
      summary.renamed++;
      this.logger.debug(`Renamed ${relativeDir}/${name} -> ${target}`);
    }

    return files;
  }

  /**
   * Points links into `prefix` whose file is gone at the file that now has
   * the same stem. Returns whether the document changed.
   */
  private async relinkDocument(documentPath: string, prefix: string, files: Set<string>): Promise<boolean> {
    let text: string;
    try {
      text = await fs.promises.readFile(documentPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }

    const byStem = new Map<string, string>();
    for (const file of files) {
      byStem.set(stemOf(file), file);
    }

    const pattern = new RegExp(`${escapeRegExp(prefix)}([^\\s)"'<>]+)`, 'g');
    const updated = text.replace(pattern, (link: string, file: string) => {
      if (files.has(file)) return link;
      const replacement = byStem.get(stemOf(file));
      return replacement ? prefix + replacement : link;
    });

    if (updated === text) return false;
    await writeFileAtomic(documentPath, updated);
    return true;
  }
}

function stemOf(name: string): string {
  return name.slice(0, name.length - path.extname(name).length);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

async function listEntries(dir: string): Promise<string[]> {
  try {
    return await fs.promises.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
}
