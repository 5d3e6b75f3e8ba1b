import { injectable } from 'inversify';
import type { RelatedLink } from './types';
import { repositoryUrl, splitRepository } from './utils';

export interface IRelatedLinkResolver {
  /** Pull requests mentioned by an issue's body and comments. */
  relatedPulls(repository: string, texts: readonly (string | null)[], pullNumbers: ReadonlySet<number>): RelatedLink[];
  /** Issues a pull request's body says it closes. */
  relatedIssues(repository: string, body: string | null, issueNumbers: ReadonlySet<number>): RelatedLink[];
}

const PR_CONTEXT_PATTERN = /(?:\bpr\b|\bpull\s+request\b|\bpull\b|\bmerge\b)\s*#(\d+)/gi;

const CLOSING_PATTERN = /\b(?:fixe[sd]?|close[sd]?|resolve[sd]?)\s+(?:([\w.-]+)\/([\w.-]+))?#(\d+)/gi;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

@injectable()
export class RelatedLinkResolver implements IRelatedLinkResolver {
  relatedPulls(repository: string, texts: readonly (string | null)[], pullNumbers: ReadonlySet<number>): RelatedLink[] {
    const { owner, name } = splitRepository(repository);
    const urlPattern = new RegExp(
      `https?://github\\.com/${escapeRegExp(owner)}/${escapeRegExp(name)}/pull/(\\d+)`, 'gi');
    const found = new Set<number>();

    for (const text of texts) {
      if (!text) continue;
      for (const match of text.matchAll(urlPattern)) {
        found.add(Number(match[1]));
      }
      for (const match of text.matchAll(PR_CONTEXT_PATTERN)) {
        found.add(Number(match[1]));
      }
    }

    return this.toLinks(found, pullNumbers, `${repositoryUrl(repository)}/pull`, 'PR');
  }

  relatedIssues(repository: string, body: string | null, issueNumbers: ReadonlySet<number>): RelatedLink[] {
    if (!body) return [];
    const { owner, name } = splitRepository(repository);
    const found = new Set<number>();

    for (const match of body.matchAll(CLOSING_PATTERN)) {
      const [, matchOwner, matchRepo, number] = match;
      if (matchOwner && matchRepo &&
        (matchOwner.toLowerCase() !== owner.toLowerCase() || matchRepo.toLowerCase() !== name.toLowerCase())) {
        continue;
      }
      found.add(Number(number));
    }

    return this.toLinks(found, issueNumbers, `${repositoryUrl(repository)}/issues`, 'Issue');
  }

  private toLinks(found: Set<number>, known: ReadonlySet<number>, baseUrl: string, label: string): RelatedLink[] {
    return [...found]
      .filter(number => known.has(number))
      .sort((a, b) => a - b)
      .map(number => ({ label, number, url: `${baseUrl}/${number}` }));
  }
}
