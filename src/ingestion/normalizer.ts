/**
 * Turns raw search API articles into canonical Articles.
 * Malformed optional fields fall back to defaults; only a missing title, url
 * or publish date makes a record skippable.
 */

import CryptoJS from 'crypto-js';
import type { Article, RawArticle, SkippedRecord } from '../types/article';

// Placeholder NewsAPI serves in place of articles that were taken down
const REMOVED_PLACEHOLDER = '[Removed]';

// ASCII unit separator between the identity fields
const ID_SEPARATOR = '\u001f';

export type Clock = () => Date;

export type NormalizeResult =
  | { ok: true; article: Article }
  | { ok: false; skipped: SkippedRecord };

/**
 * Collapse runs of whitespace and trim
 */
export function cleanText(value: unknown): string {
  if (typeof value !== 'string') return '';
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Deterministic article id: SHA-256 over the stable identity fields
 */
export function generateArticleId(sourceName: string, title: string, url: string): string {
  return CryptoJS.SHA256([sourceName, title, url].join(ID_SEPARATOR)).toString(CryptoJS.enc.Hex);
}

function readSourceName(source: unknown): string {
  if (typeof source === 'string') return cleanText(source);
  if (source !== null && typeof source === 'object' && 'name' in source) {
    return cleanText(source.name);
  }
  return '';
}

function readContent(raw: RawArticle): string {
  const content = cleanText(raw.content);
  if (content && content !== REMOVED_PLACEHOLDER) {
    return content;
  }
  const description = cleanText(raw.description);
  return description === REMOVED_PLACEHOLDER ? '' : description;
}

function parseTimestamp(value: unknown): string | null {
  if (typeof value !== 'string' || !value.trim()) return null;
  const time = Date.parse(value.trim());
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

export function normalizeArticle(raw: RawArticle, now: Clock = () => new Date()): NormalizeResult {
  const title = cleanText(raw.title);
  if (!title || title === REMOVED_PLACEHOLDER) {
    return { ok: false, skipped: { reason: 'MissingTitle', detail: 'title is missing or empty' } };
  }

  const url = typeof raw.url === 'string' ? raw.url.trim() : '';
  if (!url) {
    return { ok: false, skipped: { reason: 'MissingOrMalformedURL', detail: 'url is missing or empty' } };
  }

  const publishedAt = parseTimestamp(raw.publishedAt);
  if (!publishedAt) {
    return {
      ok: false,
      skipped: {
        reason: 'MissingOrMalformedPublishedAt',
        detail: `publishedAt is not a timestamp: ${JSON.stringify(raw.publishedAt ?? null)}`
      }
    };
  }

  const sourceName = readSourceName(raw.source);
  const author = cleanText(raw.author);

  return {
    ok: true,
    article: {
      id: generateArticleId(sourceName, title, url),
      sourceName,
      title,
      content: readContent(raw),
      url,
      author: author || null,
      publishedAt,
      ingestedAt: now().toISOString()
    }
  };
}
