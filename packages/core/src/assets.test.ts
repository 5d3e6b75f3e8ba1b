import { describe, it, expect } from 'vitest';
import { AssetExtractor, DEFAULT_ORIGIN_RULES } from './assets';

const item = { repository: 'acme/widgets', kind: 'issue' as const, number: 42 };

describe('AssetExtractor', () => {
  const extractor = new AssetExtractor({ originRules: DEFAULT_ORIGIN_RULES });

  describe('classify', () => {
    it('should map known hosts to their origin', () => {
      expect(extractor.classify('https://github.com/user-attachments/assets/abc')).toBe('session');
      expect(extractor.classify('https://user-images.githubusercontent.com/1/a.png')).toBe('direct');
      expect(extractor.classify('https://private-user-images.githubusercontent.com/1/a.png?jwt=x')).toBe('direct');
    });

    it('should ignore other URLs', () => {
      expect(extractor.classify('https://github.com/acme/widgets/issues/1')).toBeNull();
      expect(extractor.classify('https://example.com/a.png')).toBeNull();
      expect(extractor.classify('ftp://user-images.githubusercontent.com/a.png')).toBeNull();
      expect(extractor.classify('not a url')).toBeNull();
    });
  });

  describe('AssetCollector', () => {
    it('should rewrite only asset URLs and share paths between duplicates', () => {
      const collector = extractor.createCollector(item);
      const text = [
        '![shot](https://user-images.githubusercontent.com/1/a.png "title")',
        '<img src="https://github.com/user-attachments/assets/abc" width=100>',
        '[link](https://github.com/acme/widgets/pull/1)',
        '![again](https://user-images.githubusercontent.com/1/a.png)',
      ].join('\n');

      expect(collector.rewrite(text)).toBe([
        '![shot](../assets/issues/42/001_a.png "title")',
        '<img src="../assets/issues/42/002_abc.img" width=100>',
        '[link](https://github.com/acme/widgets/pull/1)',
        '![again](../assets/issues/42/001_a.png)',
      ].join('\n'));

      expect(collector.references).toEqual([
        {
          item,
          url: 'https://user-images.githubusercontent.com/1/a.png',
          origin: 'direct',
          index: 1,
          localPath: 'assets/issues/42/001_a.png',
          documentPath: 'issues/ISSUE-42.md',
        },
        {
          item,
          url: 'https://github.com/user-attachments/assets/abc',
          origin: 'session',
          index: 2,
          localPath: 'assets/issues/42/002_abc.img',
          documentPath: 'issues/ISSUE-42.md',
        },
      ]);
      expect(collector.unrecognized).toEqual(['https://github.com/acme/widgets/pull/1']);
    });

    it('should continue numbering across texts of the same item', () => {
      const collector = extractor.createCollector(item);
      collector.rewrite('![a](https://user-images.githubusercontent.com/1/a.png)');

      expect(collector.rewrite('<img src=https://user-images.githubusercontent.com/1/b.gif>'))
        .toBe('<img src=../assets/issues/42/002_b.gif>');
      expect(collector.references.map(r => r.index)).toEqual([1, 2]);
    });

    it('should rewrite both URLs of an image wrapped in a link', () => {
      const collector = extractor.createCollector(item);
      const text = [
        '[![img](https://github.com/user-attachments/assets/abc)](https://github.com/user-attachments/assets/abc)',
        '[![thumb](https://user-images.githubusercontent.com/1/t.png)](https://user-images.githubusercontent.com/1/full.png)',
        '[![badge](https://example.com/b.svg)](https://github.com/acme/widgets)',
      ].join('\n');

      expect(collector.rewrite(text)).toBe([
        '[![img](../assets/issues/42/001_abc.img)](../assets/issues/42/001_abc.img)',
        '[![thumb](../assets/issues/42/002_t.png)](../assets/issues/42/003_full.png)',
        '[![badge](https://example.com/b.svg)](https://github.com/acme/widgets)',
      ].join('\n'));
      expect(collector.references.map(r => r.localPath)).toEqual([
        'assets/issues/42/001_abc.img',
        'assets/issues/42/002_t.png',
        'assets/issues/42/003_full.png',
      ]);
    });

    it('should leave relative links and data URIs alone', () => {
      const collector = extractor.createCollector(item);
      const text = '![x](./local.png) ![y](data:image/png;base64,AAAA) ![z](/abs/path.png)';

      expect(collector.rewrite(text)).toBe(text);
      expect(collector.references).toEqual([]);
    });

    it('should place pull request assets under prs', () => {
      const collector = extractor.createCollector({ ...item, kind: 'pull_request', number: 7 });

      expect(collector.rewrite('![s](https://user-images.githubusercontent.com/9/s.jpg)'))
        .toBe('![s](../assets/prs/7/001_s.jpg)');
      expect(collector.references[0].documentPath).toBe('prs/PR-7.md');
    });

    it('should honor configured origins', () => {
      const custom = new AssetExtractor({
        originRules: [{ host: 'cdn.example', pathPrefix: '/user-attachments/', origin: 'direct' }],
      });
      const collector = custom.createCollector(item);

      expect(collector.rewrite('see ![img](https://cdn.example/user-attachments/abc)'))
        .toBe('see ![img](../assets/issues/42/001_abc.img)');
      expect(custom.classify('https://cdn.example/other/abc')).toBeNull();
    });
  });
});
