import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  assetFolder,
  detectImageExtension,
  documentPath,
  fileSize,
  filenameFromUrl,
  formatTimestamp,
  kindFromFolder,
  looksLikeHtml,
  normalizeExtension,
  parseTimestamp,
  sanitizeName,
  slugifyRepository,
  splitRepository,
  writeFileAtomic,
} from './utils';

const PNG = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d];

function ascii(text: string): number[] {
  return [...text].map(ch => ch.charCodeAt(0));
}

describe('Repository naming', () => {
  it('should slugify OWNER/REPO', () => {
    expect(slugifyRepository('acme/widgets')).toBe('acme_widgets');
  });

  it('should split OWNER/REPO', () => {
    expect(splitRepository('acme/widgets.js')).toEqual({ owner: 'acme', name: 'widgets.js' });
  });

  it('should map items to document and asset paths', () => {
    expect(documentPath({ kind: 'issue', number: 42 })).toBe('issues/ISSUE-42.md');
    expect(documentPath({ kind: 'pull_request', number: 7 })).toBe('prs/PR-7.md');
    expect(assetFolder({ kind: 'pull_request', number: 7 })).toBe('assets/prs/7');
    expect(kindFromFolder('prs')).toBe('pull_request');
    expect(kindFromFolder('other')).toBeUndefined();
  });
});

describe('sanitizeName', () => {
  it('should replace unsafe characters and trim underscores', () => {
    expect(sanitizeName('héllo wörld')).toBe('h_llo_w_rld');
    expect(sanitizeName('__a b__')).toBe('a_b');
  });

  it('should fall back to image when nothing is left', () => {
    expect(sanitizeName('')).toBe('image');
    expect(sanitizeName('%%%')).toBe('image');
  });
});

describe('filenameFromUrl', () => {
  it('should use .img when the URL has no extension', () => {
    expect(filenameFromUrl('https://github.com/user-attachments/assets/abc', 1)).toBe('001_abc.img');
  });

  it('should keep a short extension in lower case', () => {
    expect(filenameFromUrl('https://user-images.githubusercontent.com/1/photo.PNG', 2)).toBe('002_photo.png');
  });

  it('should sanitize the basename', () => {
    expect(filenameFromUrl('https://x.example/a%20b.jpeg', 3)).toBe('003_a_20b.jpeg');
  });

  it('should cap the name at 40 characters', () => {
    expect(filenameFromUrl(`https://x.example/${'a'.repeat(50)}.gif`, 1)).toBe(`001_${'a'.repeat(40)}.gif`);
  });

  it('should replace long or odd extensions with .img', () => {
    expect(filenameFromUrl('https://x.example/file.verylongextension', 1)).toBe('001_file.img');
    expect(filenameFromUrl('https://x.example/file.tar-gz', 1)).toBe('001_file.img');
  });

  it('should name an empty path image', () => {
    expect(filenameFromUrl('https://x.example/', 12)).toBe('012_image.img');
  });

  it('should ignore the query string', () => {
    expect(filenameFromUrl('https://x.example/shot.png?token=test-secret', 1)).toBe('001_shot.png');
  });
});

describe('Timestamps', () => {
  it('should parse ISO 8601 with a zone', () => {
    expect(parseTimestamp('2024-01-02T03:04:05Z')?.toISOString()).toBe('2024-01-02T03:04:05.000Z');
    expect(parseTimestamp('2024-01-02T03:04:05+02:00')?.toISOString()).toBe('2024-01-02T01:04:05.000Z');
  });

  it('should reject anything else', () => {
    expect(parseTimestamp('2024-01-02')).toBeNull();
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp('2024-13-45T00:00:00Z')).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
  });

  it('should format in UTC', () => {
    expect(formatTimestamp(new Date('2024-05-06T07:08:09.123Z'))).toBe('2024-05-06 07:08:09 UTC');
  });
});

describe('looksLikeHtml', () => {
  it('should recognize pages and reject images', () => {
    expect(looksLikeHtml(Buffer.from('<!DOCTYPE html><title>Sign in to GitHub</title>'))).toBe(true);
    expect(looksLikeHtml(Buffer.from('\n  <html lang="en">'))).toBe(true);
    expect(looksLikeHtml(Buffer.from(PNG))).toBe(false);
    expect(looksLikeHtml(Buffer.from('<svg xmlns="http://www.w3.org/2000/svg"/>'))).toBe(false);
  });
});

describe('detectImageExtension', () => {
  it('should recognize common image signatures', () => {
    expect(detectImageExtension(Buffer.from(PNG))).toBe('.png');
    expect(detectImageExtension(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('.jpg');
    expect(detectImageExtension(Buffer.from(ascii('GIF89a')))).toBe('.gif');
    expect(detectImageExtension(Buffer.from([...ascii('RIFF'), 0, 0, 0, 0, ...ascii('WEBP')]))).toBe('.webp');
    expect(detectImageExtension(Buffer.from([0, 0, 0, 0x20, ...ascii('ftypavif')]))).toBe('.avif');
    expect(detectImageExtension(Buffer.from([0, 0, 0, 0x18, ...ascii('ftypheic')]))).toBe('.heic');
  });

  it('should return null for other content', () => {
    expect(detectImageExtension(Buffer.from(ascii('<html><body>')))).toBeNull();
    expect(detectImageExtension(Buffer.from([0x89, 0x50]))).toBeNull();
    expect(detectImageExtension(Buffer.alloc(0))).toBeNull();
  });

  it('should treat .jpeg as .jpg', () => {
    expect(normalizeExtension('.JPEG')).toBe('.jpg');
    expect(normalizeExtension('.Png')).toBe('.png');
  });
});

describe('File helpers', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'issuevault-utils-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write atomically and create parent directories', async () => {
    const target = path.join(tempDir, 'a', 'b', 'doc.md');
    await writeFileAtomic(target, 'hello\n');
    await writeFileAtomic(target, 'again\n');

    expect(fs.readFileSync(target, 'utf-8')).toBe('again\n');
    expect(fs.readdirSync(path.dirname(target))).toEqual(['doc.md']);
  });

  it('should report file sizes and 0 for missing files', async () => {
    const target = path.join(tempDir, 'blob.bin');
    fs.writeFileSync(target, Buffer.from([1, 2, 3]));

    expect(await fileSize(target)).toBe(3);
    expect(await fileSize(path.join(tempDir, 'nope'))).toBe(0);
  });
});
