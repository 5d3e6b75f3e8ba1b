import * as fs from 'fs';
import * as path from 'path';
import type { MissingAttachmentRecord } from './types';
import { isNotFound, slugifyRepository } from './utils';

/**
 * Append-only sink for attachments that could not be resolved. Records are
 * never rewritten; repeated runs may append the same URL again.
 */
export interface IMissingAttachmentJournal {
  append(records: readonly MissingAttachmentRecord[]): Promise<void>;
}

export function journalPath(outRoot: string, repository: string): string {
  return path.join(outRoot, `missing_attachments_${slugifyRepository(repository)}.jsonl`);
}

/** One JSON object per line. */
export class FileJournal implements IMissingAttachmentJournal {
  private writeQueue: Promise<void> = Promise.resolve(); // Serialize appends within this process

  constructor(private readonly filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  append(records: readonly MissingAttachmentRecord[]): Promise<void> {
    if (records.length === 0) {
      return this.writeQueue;
    }
    const lines = records.map(record => JSON.stringify(record)).join('\n') + '\n';
    const next = this.writeQueue.then(async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.appendFile(this.filePath, lines, 'utf-8');
    });
    // A failed append must not poison later ones; the caller still sees the failure.
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  async readAll(): Promise<MissingAttachmentRecord[]> {
    return readJournal(this.filePath);
  }
}

export class MemoryJournal implements IMissingAttachmentJournal {
  readonly records: MissingAttachmentRecord[] = [];

  async append(records: readonly MissingAttachmentRecord[]): Promise<void> {
    this.records.push(...records);
  }
}

export async function readJournal(filePath: string): Promise<MissingAttachmentRecord[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
  return content
    .split('\n')
    .filter(line => line.trim())
    .map((line): MissingAttachmentRecord => JSON.parse(line));
}
