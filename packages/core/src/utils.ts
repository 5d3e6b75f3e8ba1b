import * as fs from 'fs';
import * as path from 'path';
import { nanoid } from 'nanoid';
import type { ItemKind, ItemRef } from './types';

/**
 * Converts `OWNER/REPO` into the `OWNER_REPO` folder name used by both the
 * raw capture and the rendered output.
 */
export function slugifyRepository(repository: string): string {
  return repository.replace(/\//g, '_');
}

export function splitRepository(repository: string): { owner: string; name: string } {
  const index = repository.indexOf('/');
  return { owner: repository.slice(0, index), name: repository.slice(index + 1) };
}

export function repositoryUrl(repository: string): string {
  return `https://github.com/${repository}`;
}

export function kindFolder(kind: ItemKind): 'issues' | 'prs' {
  return kind === 'issue' ? 'issues' : 'prs';
}

export function kindFromFolder(folder: string): ItemKind | undefined {
  if (folder === 'issues') return 'issue';
  if (folder === 'prs') return 'pull_request';
  return undefined;
}

export function documentFileName(kind: ItemKind, number: number): string {
  return kind === 'issue' ? `ISSUE-${number}.md` : `PR-${number}.md`;
}

/** Document path relative to the repository output directory. */
export function documentPath(item: Pick<ItemRef, 'kind' | 'number'>): string {
  return `${kindFolder(item.kind)}/${documentFileName(item.kind, item.number)}`;
}

/** Asset folder relative to the repository output directory. */
export function assetFolder(item: Pick<ItemRef, 'kind' | 'number'>): string {
  return `assets/${kindFolder(item.kind)}/${item.number}`;
}

/** ASCII-only safe file name fragment. */
export function sanitizeName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^_+|_+$/g, '');
  return cleaned || 'image';
}

/**
 * Deterministic asset file name for the index-th distinct URL of an item:
 * `NNN_<basename><ext>`. The extension comes from the URL path, or `.img`
 * when the URL has none; the real type is only known after download.
 */
export function filenameFromUrl(url: string, index: number): string {
  let base = '';
  try {
    base = path.posix.basename(new URL(url).pathname);
  } catch {
    base = '';
  }
  const rawExt = path.posix.extname(base);
  const name = sanitizeName(base.slice(0, base.length - rawExt.length)).slice(0, 40);
  let ext = rawExt.toLowerCase();
  if (!ext || ext.length > 10 || !/^\.[a-z0-9]+$/.test(ext)) {
    ext = '.img';
  }
  return `${String(index).padStart(3, '0')}_${name}${ext}`;
}

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parses an ISO 8601 timestamp with an explicit zone. Anything else returns
 * null: Date.parse on free-form strings is implementation-defined.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (typeof value !== 'string' || !ISO_TIMESTAMP.test(value)) {
    return null;
  }
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

/** `YYYY-MM-DD HH:MM:SS UTC` */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/**
 * Detects an image format from its leading bytes (magic numbers).
 * Returns the canonical extension with a leading dot, or null.
 */
export function detectImageExtension(bytes: Uint8Array): string | null {
  if (bytes.length >= 8 &&
    bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47 &&
    bytes[4] === 0x0d && bytes[5] === 0x0a && bytes[6] === 0x1a && bytes[7] === 0x0a) {
    return '.png';
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return '.jpg';
  }
  if (bytes.length >= 6) {
    const head = String.fromCharCode(...bytes.subarray(0, 6));
    if (head === 'GIF87a' || head === 'GIF89a') {
      return '.gif';
    }
  }
  if (bytes.length >= 12) {
    const riff = String.fromCharCode(...bytes.subarray(0, 4));
    const fourCC = String.fromCharCode(...bytes.subarray(4, 8));
    const brand = String.fromCharCode(...bytes.subarray(8, 12));
    if (riff === 'RIFF' && brand === 'WEBP') {
      return '.webp';
    }
    if (fourCC === 'ftyp') {
      const lowered = brand.toLowerCase();
      if (lowered.startsWith('avif')) return '.avif';
      if (lowered.startsWith('heic') || lowered.startsWith('heif') || lowered.startsWith('mif1')) return '.heic';
    }
  }
  return null;
}

/** `.jpeg` and `.jpg` name the same format. */
export function normalizeExtension(ext: string): string {
  const lowered = ext.toLowerCase();
  return lowered === '.jpeg' ? '.jpg' : lowered;
}

/**
 * Writes a file through a uniquely named temp file and a rename, so readers
 * never observe a partial file.
 */
export async function writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${nanoid(8)}.tmp`;
  try {
    await fs.promises.writeFile(tmpPath, data);
    await fs.promises.rename(tmpPath, filePath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
}

/** Size of a file, or 0 when it does not exist. */
export async function fileSize(filePath: string): Promise<number> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile() ? stat.size : 0;
  } catch (error) {
    if (isNotFound(error)) return 0;
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Leading bytes of a file, for content sniffing. */
export async function readHead(filePath: string, length: number): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

const HTML_START = /^\s*<(?:!doctype\s+html|html|head|body)\b/i;

/** True for content that starts like an HTML page, such as a sign-in redirect. */
export function looksLikeHtml(bytes: Uint8Array): boolean {
  return HTML_START.test(Buffer.from(bytes.subarray(0, 256)).toString('utf-8'));
}
