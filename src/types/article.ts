// Raw article as returned by the news search API. Every field is untrusted:
// it may be missing, null or of an unexpected JSON type.
export type RawArticle = Record<string, unknown>;

// Canonical article flowing through the pipeline after normalization
export interface Article {
  id: string;                // SHA-256 hex of (sourceName, title, url)
  sourceName: string;        // May be empty
  title: string;             // Non-empty, whitespace-collapsed
  content: string;           // May be empty
  url: string;               // Absolute HTTP(S) link
  author: string | null;
  publishedAt: string;       // ISO 8601 timestamp
  ingestedAt: string;        // ISO 8601 timestamp of normalization
}

// Payload written to the stream. Consumers depend on these exact field names.
export interface WireRecord {
  article_id: string;
  source_name: string;
  title: string;
  content: string;
  url: string;
  author: string | null;
  published_at: string;
  ingested_at: string;
}

export type ArticleRuleViolation =
  | 'MissingTitle'
  | 'MissingOrMalformedURL'
  | 'MissingOrMalformedPublishedAt';

export interface SkippedRecord {
  reason: ArticleRuleViolation;
  detail: string;
}

export interface ValidationError {
  kind: ArticleRuleViolation;
  message: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface PollWindow {
  from: Date;
  to: Date;
}

export interface ArticlePage {
  page: number;
  totalResults: number;
  articles: RawArticle[];
}

export type DropStage = 'normalize' | 'validate' | 'pack' | 'write';

export interface DroppedRecord {
  articleId: string | null;  // null when the record never got an id
  stage: DropStage;
  code: string;
  message: string;
  retries: number;
}

export interface WriteReport {
  submitted: number;
  succeeded: number;
  retried: number;
  permanentlyDropped: number;
  batches: number;
  dropped: DroppedRecord[];
}
