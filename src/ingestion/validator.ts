import { z } from 'zod';
import type { Article, ArticleRuleViolation, Result, ValidationError } from '../types/article';

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.host !== '';
  } catch {
    return false;
  }
}

// Key order is rule order: zod reports issues in shape order, so the first
// issue is the first violated rule.
const articleRules = z.object({
  title: z.string().refine(title => title.trim().length > 0, 'title is empty'),
  url: z.string().refine(isHttpUrl, 'url is not an absolute http(s) URL'),
  publishedAt: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'publishedAt is not a valid timestamp')
});

const RULE_BY_FIELD: Record<keyof z.infer<typeof articleRules>, ArticleRuleViolation> = {
  title: 'MissingTitle',
  url: 'MissingOrMalformedURL',
  publishedAt: 'MissingOrMalformedPublishedAt'
};

function isRuleField(field: unknown): field is keyof typeof RULE_BY_FIELD {
  return typeof field === 'string' && field in RULE_BY_FIELD;
}

/**
 * Check a canonical Article against the required-field rules.
 * Returns the Article itself when valid; reports only the first violation.
 */
export function validateArticle(article: Article): Result<Article, ValidationError> {
  const checked = articleRules.safeParse(article);
  if (checked.success) {
    return { ok: true, value: article };
  }

  const [issue] = checked.error.issues;
  const field = issue?.path[0];
  return {
    ok: false,
    error: {
      kind: isRuleField(field) ? RULE_BY_FIELD[field] : 'MissingTitle',
      message: issue?.message ?? 'article failed validation'
    }
  };
}
