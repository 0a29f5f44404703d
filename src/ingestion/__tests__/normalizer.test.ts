/**
 * Unit tests for article normalization and identity
 */

import { createHash } from 'crypto';
import { cleanText, generateArticleId, normalizeArticle } from '../normalizer';
import { createRawArticle } from '../../__tests__/setup';

const fixedClock = (iso: string) => () => new Date(iso);

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

describe('normalizeArticle', () => {
  describe('identity', () => {
    it('derives a fixed 64-hex id from source name, title and url', () => {
      const raw = { source: { name: 'BBC' }, title: 'A', url: 'http://x', publishedAt: '2026-01-01T00:00:00Z' };

      const first = normalizeArticle(raw, fixedClock('2026-01-01T01:00:00Z'));
      const later = normalizeArticle(raw, fixedClock('2026-03-01T12:00:00Z'));

      expect(first.ok).toBe(true);
      expect(later.ok).toBe(true);
      if (!first.ok || !later.ok) return;

      expect(first.article.id).toMatch(/^[0-9a-f]{64}$/);
      expect(first.article.id).toBe(sha256('BBC\u001fA\u001fhttp://x'));
      expect(later.article.id).toBe(first.article.id);
      expect(first.article.ingestedAt).toBe('2026-01-01T01:00:00.000Z');
      expect(later.article.ingestedAt).toBe('2026-03-01T12:00:00.000Z');
    });

    it('gives the same id to articles that differ only outside the identity fields', () => {
      const a = normalizeArticle(createRawArticle({ description: 'one', author: 'Ann', publishedAt: '2026-01-01T00:00:00Z' }));
      const b = normalizeArticle(createRawArticle({ description: 'two', author: null, publishedAt: '2026-02-01T00:00:00Z', content: null }));

      expect(a.ok && b.ok && a.article.id === b.article.id).toBe(true);
    });

    it('gives different ids when any identity field changes', () => {
      const base = generateArticleId('BBC', 'A', 'http://x');

      expect(generateArticleId('CNN', 'A', 'http://x')).not.toBe(base);
      expect(generateArticleId('BBC', 'B', 'http://x')).not.toBe(base);
      expect(generateArticleId('BBC', 'A', 'http://y')).not.toBe(base);
    });

    it('keeps field boundaries unambiguous', () => {
      expect(generateArticleId('ab', 'c', 'http://x')).not.toBe(generateArticleId('a', 'bc', 'http://x'));
    });

    it('hashes the cleaned title so whitespace noise does not split ids', () => {
      const tidy = normalizeArticle(createRawArticle({ title: 'Big news' }));
      const noisy = normalizeArticle(createRawArticle({ title: '  Big\n\n news ' }));

      expect(tidy.ok && noisy.ok && tidy.article.id === noisy.article.id).toBe(true);
    });
  });

  describe('required fields', () => {
    it('skips a record without a title', () => {
      const result = normalizeArticle(createRawArticle({ title: undefined }));

      expect(result).toEqual({
        ok: false,
        skipped: { reason: 'MissingTitle', detail: 'title is missing or empty' }
      });
    });

    it.each([
      ['blank', '   '],
      ['removed placeholder', '[Removed]'],
      ['non-string', 42]
    ])('treats a %s title as missing', (_label, title) => {
      const result = normalizeArticle(createRawArticle({ title }));

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.skipped.reason).toBe('MissingTitle');
    });

    it('skips a record without a url', () => {
      const result = normalizeArticle(createRawArticle({ url: '  ' }));

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.skipped.reason).toBe('MissingOrMalformedURL');
    });

    it('skips a record whose publish date does not parse', () => {
      const result = normalizeArticle(createRawArticle({ publishedAt: 'not-a-date' }));

      expect(result).toEqual({
        ok: false,
        skipped: {
          reason: 'MissingOrMalformedPublishedAt',
          detail: 'publishedAt is not a timestamp: "not-a-date"'
        }
      });
    });

    it('skips a record without a publish date', () => {
      const result = normalizeArticle(createRawArticle({ publishedAt: undefined }));

      expect(result).toEqual({
        ok: false,
        skipped: {
          reason: 'MissingOrMalformedPublishedAt',
          detail: 'publishedAt is not a timestamp: null'
        }
      });
    });
  });

  describe('optional fields', () => {
    it('builds the full canonical article', () => {
      const result = normalizeArticle(
        createRawArticle({ publishedAt: '2026-01-01T02:00:00+02:00' }),
        fixedClock('2026-01-01T05:00:00Z')
      );

      expect(result).toEqual({
        ok: true,
        article: {
          id: sha256('Test Source\u001fTest Article\u001fhttps://example.com/article'),
          sourceName: 'Test Source',
          title: 'Test Article',
          content: 'Test content',
          url: 'https://example.com/article',
          author: 'Test Author',
          publishedAt: '2026-01-01T00:00:00.000Z',
          ingestedAt: '2026-01-01T05:00:00.000Z'
        }
      });
    });

    it('defaults missing source, author and content', () => {
      const result = normalizeArticle({
        title: 'Only the basics',
        url: 'https://example.com/basics',
        publishedAt: '2026-01-01T00:00:00Z'
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.article.sourceName).toBe('');
      expect(result.article.author).toBeNull();
      expect(result.article.content).toBe('');
    });

    it('treats a blank author as null', () => {
      const result = normalizeArticle(createRawArticle({ author: '   ' }));

      expect(result.ok && result.article.author).toBeNull();
    });

    it('falls back to the description when content was removed', () => {
      const result = normalizeArticle(createRawArticle({ content: '[Removed]', description: 'A  short\nsummary' }));

      expect(result.ok && result.article.content).toBe('A short summary');
    });

    it('accepts a plain string source', () => {
      const result = normalizeArticle(createRawArticle({ source: ' Reuters ' }));

      expect(result.ok && result.article.sourceName).toBe('Reuters');
    });

    it('does not throw on a source of the wrong shape', () => {
      const result = normalizeArticle(createRawArticle({ source: 17 }));

      expect(result.ok && result.article.sourceName).toBe('');
    });
  });
});

describe('cleanText', () => {
  it('collapses whitespace and trims', () => {
    expect(cleanText('  a \t b\n\nc ')).toBe('a b c');
  });

  it('returns an empty string for non-strings', () => {
    expect(cleanText(undefined)).toBe('');
    expect(cleanText(null)).toBe('');
    expect(cleanText({})).toBe('');
  });
});
