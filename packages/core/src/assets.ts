import { injectable, inject } from 'inversify';
import * as path from 'path';
import type { AssetOrigin, AssetReference, ExportConfig, ItemRef, OriginRule } from './types';
import { assetFolder, documentPath, filenameFromUrl } from './utils';

export const DEFAULT_ORIGIN_RULES: OriginRule[] = [
  { host: 'github.com', pathPrefix: '/user-attachments/', origin: 'session' },
  { host: 'user-images.githubusercontent.com', origin: 'direct' },
  { host: 'private-user-images.githubusercontent.com', origin: 'direct' },
];

/**
 * Markdown images and links, `![alt](url "title")` / `[text](url)`, an image
 * wrapped in a link, `[![alt](url)](url)`, and HTML `<img src=...>`. The `d`
 * flag exposes each URL's span inside the match so only URLs are rewritten.
 */
const ASSET_LINK_PATTERN = new RegExp([
  String.raw`\[\s*!\[[^\]]*\]\(\s*(?<inner>[^)\s]+)(?:\s+["'][^"']*["'])?\s*\)\s*\]\(\s*(?<outer>[^)\s]+)(?:\s+["'][^"']*["'])?\s*\)`,
  String.raw`!?\[[^\]]*\]\(\s*(?<md>[^)\s]+)(?:\s+["'][^"']*["'])?\s*\)`,
  String.raw`<img\b[^>]*?\bsrc=(?:(?<q>["'])(?<html>.*?)\k<q>|(?<bare>[^>\s]+))[^>]*?>`,
].join('|'), 'dgis');

const URL_GROUPS = ['inner', 'outer', 'md', 'html', 'bare'] as const;

export interface IAssetExtractor {
  classify(url: string): AssetOrigin | null;
  createCollector(item: ItemRef): AssetCollector;
}

@injectable()
export class AssetExtractor implements IAssetExtractor {
  constructor(@inject('config') private config: Pick<ExportConfig, 'originRules'>) {}

  classify(url: string): AssetOrigin | null {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return null;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return null;
    }
    const host = parsed.hostname.toLowerCase();
    const rule = this.config.originRules.find(
      r => r.host.toLowerCase() === host && (!r.pathPrefix || parsed.pathname.startsWith(r.pathPrefix)));
    return rule ? rule.origin : null;
  }

  createCollector(item: ItemRef): AssetCollector {
    return new AssetCollector(item, url => this.classify(url));
  }
}

/**
 * Collects the asset references of one item while rewriting its text.
 * Feed it the body first, then each comment in timeline order: sequence
 * numbers follow first appearance.
 */
export class AssetCollector {
  private readonly byUrl = new Map<string, AssetReference>();
  private readonly documentPath: string;
  private readonly ignored = new Set<string>();

  constructor(private readonly item: ItemRef, private readonly classify: (url: string) => AssetOrigin | null) {
    this.documentPath = documentPath(item);
  }

  rewrite(text: string): string {
    let result = '';
    let last = 0;

    for (const match of text.matchAll(ASSET_LINK_PATTERN)) {
      for (const [start, end] of urlSpans(match)) {
        const link = this.linkFor(text.slice(start, end));
        if (!link) continue;
        result += text.slice(last, start) + link;
        last = end;
      }
    }

    return result + text.slice(last);
  }

  get references(): AssetReference[] {
    return [...this.byUrl.values()];
  }

  /** Absolute URLs seen in asset syntax that matched no known origin. */
  get unrecognized(): string[] {
    return [...this.ignored];
  }

  private linkFor(url: string): string | null {
    if (!/^https?:\/\//i.test(url)) {
      return null;
    }

    let reference = this.byUrl.get(url);
    if (!reference) {
      const origin = this.classify(url);
      if (!origin) {
        this.ignored.add(url);
        return null;
      }
      const index = this.byUrl.size + 1;
      reference = {
        item: { repository: this.item.repository, kind: this.item.kind, number: this.item.number },
        url,
        origin,
        index,
        localPath: `${assetFolder(this.item)}/${filenameFromUrl(url, index)}`,
        documentPath: this.documentPath,
      };
      this.byUrl.set(url, reference);
    }

    return path.posix.relative(path.posix.dirname(this.documentPath), reference.localPath);
  }
}

function urlSpans(match: RegExpMatchArray): Array<[number, number]> {
  const groups = match.indices?.groups;
  if (!groups) return [];
  const spans: Array<[number, number]> = [];
  for (const name of URL_GROUPS) {
    const span = groups[name];
    if (span && span[1] > span[0]) spans.push(span);
  }
  return spans;
}
