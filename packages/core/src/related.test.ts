import { describe, it, expect } from 'vitest';
import { RelatedLinkResolver } from './related';

describe('RelatedLinkResolver', () => {
  const resolver = new RelatedLinkResolver();

  describe('relatedPulls', () => {
    it('should find same-repository PR URLs and PR mentions', () => {
      const links = resolver.relatedPulls('acme/widgets', [
        'Fixed by https://github.com/acme/widgets/pull/12 and PR #3',
        'see pull request #5, merge #99',
        null,
        'elsewhere: https://github.com/other/repo/pull/4',
      ], new Set([3, 4, 5, 12]));

      expect(links).toEqual([
        { label: 'PR', number: 3, url: 'https://github.com/acme/widgets/pull/3' },
        { label: 'PR', number: 5, url: 'https://github.com/acme/widgets/pull/5' },
        { label: 'PR', number: 12, url: 'https://github.com/acme/widgets/pull/12' },
      ]);
    });

    it('should ignore bare issue references', () => {
      expect(resolver.relatedPulls('acme/widgets', ['see #3'], new Set([3]))).toEqual([]);
    });
  });

  describe('relatedIssues', () => {
    it('should follow closing keywords within the same repository', () => {
      const links = resolver.relatedIssues(
        'acme/widgets',
        'Fixes #10, closes acme/widgets#11 and resolves other/repo#12. Also closed #13, refs #14',
        new Set([10, 11, 12, 13, 14])
      );

      expect(links.map(link => link.number)).toEqual([10, 11, 13]);
      expect(links[0]).toEqual({ label: 'Issue', number: 10, url: 'https://github.com/acme/widgets/issues/10' });
    });

    it('should return nothing for an empty body', () => {
      expect(resolver.relatedIssues('acme/widgets', null, new Set([1]))).toEqual([]);
    });
  });
});
