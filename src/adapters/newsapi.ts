// NewsAPI "everything" adapter
// Pages through the search endpoint for one poll window, retrying transient
// failures and surfacing fatal ones immediately.
import pRetry from 'p-retry';
import { z } from 'zod';
import type { ArticlePage, PollWindow, RawArticle } from '../types/article';
import type { EnvironmentConfig } from '../config/environment';
import { BackoffPolicy, Random, Sleep, backoffDelay, sleep as defaultSleep } from '../ingestion/backoff';
import { SourceFatalError, SourceTransientError, errorMessage } from '../ingestion/errors';
import type { FetchSource } from '../ingestion/fetch-source';
import { logger } from '../utils/logger';

const HOUR_MS = 60 * 60 * 1000;

// NewsAPI's error code once a plan's result cap has been paged past
const MAXIMUM_RESULTS_REACHED = 'maximumResultsReached';

export type NewsApiSourceOptions = EnvironmentConfig['newsApi'] & {
  maxRetries: number;
  backoff: BackoffPolicy;
  sleep?: Sleep;
  random?: Random;
};

export interface SearchPage {
  articles: RawArticle[];
  totalResults: number;
  nextPage: number | null;
}

const okResponseSchema = z.object({
  status: z.literal('ok'),
  totalResults: z.number().int().nonnegative(),
  articles: z.array(z.record(z.unknown()))
});

const errorResponseSchema = z.object({
  status: z.literal('error'),
  code: z.string().optional(),
  message: z.string().optional()
});

/**
 * Parse a Retry-After header given either as seconds or as an HTTP date
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const value = header.trim();
  if (/^\d+(\.\d+)?$/.test(value)) {
    return Math.round(Number(value) * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export class NewsApiSource implements FetchSource {
  private readonly sleep: Sleep;
  private readonly random: Random;

  constructor(private readonly options: NewsApiSourceOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async *fetch(window: PollWindow): AsyncGenerator<ArticlePage> {
    this.assertWindowInRange(window);

    let page: number | null = 1;
    let fetched = 0;
    while (page !== null) {
      const result = await this.searchPage(window, page);
      if (result.articles.length > 0) {
        fetched += result.articles.length;
        yield { page, totalResults: result.totalResults, articles: result.articles };
      }
      page = result.nextPage;
    }
    logger.info(`[newsapi] Total articles fetched: ${fetched}`);
  }

  /**
   * Fetch one page, retrying transient failures with backoff.
   * Rejects with SourceFatalError or, once retries run out, SourceTransientError.
   */
  async searchPage(window: PollWindow, page: number): Promise<SearchPage> {
    // p-retry counts attempts; the delay between them comes from the shared backoff policy
    return pRetry(
      async () => {
        try {
          return await this.requestPage(window, page);
        } catch (error) {
          if (error instanceof SourceFatalError) {
            throw new pRetry.AbortError(error);
          }
          throw error;
        }
      },
      {
        retries: this.options.maxRetries,
        factor: 1,
        minTimeout: 0,
        maxTimeout: 0,
        onFailedAttempt: async error => {
          if (error.retriesLeft === 0) return;
          const hint = error instanceof SourceTransientError ? error.retryAfterMs : undefined;
          const delayMs = hint ?? backoffDelay(this.options.backoff, error.attemptNumber, this.random);
          logger.warn(
            `[newsapi] Page ${page} attempt ${error.attemptNumber} failed: ${error.message}. Retrying in ${delayMs}ms`
          );
          await this.sleep(delayMs);
        }
      }
    );
  }

  private assertWindowInRange(window: PollWindow) {
    const spanMs = window.to.getTime() - window.from.getTime();
    if (spanMs <= 0) {
      throw new SourceFatalError(`Poll window is empty: ${window.from.toISOString()} - ${window.to.toISOString()}`);
    }
    if (spanMs > this.options.maxRangeHours * HOUR_MS) {
      throw new SourceFatalError(
        `Poll window of ${(spanMs / HOUR_MS).toFixed(1)}h exceeds the source's maximum range of ${this.options.maxRangeHours}h`
      );
    }
  }

  private buildUrl(window: PollWindow, page: number): string {
    const params = new URLSearchParams({
      q: this.options.query,
      from: window.from.toISOString(),
      to: window.to.toISOString(),
      pageSize: String(this.options.pageSize),
      page: String(page),
      sortBy: this.options.sortBy,
      language: this.options.language
    });
    return `${this.options.baseUrl}?${params.toString()}`;
  }

  private async requestPage(window: PollWindow, page: number): Promise<SearchPage> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    let body: unknown;
    try {
      response = await fetch(this.buildUrl(window, page), {
        headers: { 'X-Api-Key': this.options.apiKey, Accept: 'application/json' },
        signal: controller.signal
      });
      body = await readJson(response);
    } catch (error) {
      const reason = error instanceof Error && error.name === 'AbortError'
        ? `Request timed out after ${this.options.timeoutMs}ms`
        : `Network error: ${errorMessage(error)}`;
      throw new SourceTransientError(reason, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    if (response.status === 429) {
      throw new SourceTransientError('Rate limited (429)', {
        status: 429,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after'))
      });
    }
    if (response.status >= 500) {
      throw new SourceTransientError(`NewsAPI returned ${response.status}`, { status: response.status });
    }

    const apiError = errorResponseSchema.safeParse(body);
    if (apiError.success) {
      if (apiError.data.code === MAXIMUM_RESULTS_REACHED) {
        logger.warn(`[newsapi] Result cap reached at page ${page}, stopping pagination`);
        return { articles: [], totalResults: 0, nextPage: null };
      }
      throw new SourceFatalError(`NewsAPI error: ${apiError.data.message ?? apiError.data.code ?? 'Unknown error'}`, {
        status: response.status,
        code: apiError.data.code
      });
    }
    if (!response.ok) {
      throw new SourceFatalError(`NewsAPI returned ${response.status}`, { status: response.status });
    }
    if (body === undefined) {
      throw new SourceTransientError(`NewsAPI returned an unreadable body for page ${page}`, { status: response.status });
    }

    const parsed = okResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceFatalError(`Unexpected NewsAPI response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const { articles, totalResults } = parsed.data;
    const totalPages = Math.ceil(totalResults / this.options.pageSize);
    let nextPage: number | null = page + 1;
    if (articles.length === 0 || page >= totalPages) {
      nextPage = null;
    } else if (page >= this.options.maxPages) {
      logger.info(`[newsapi] Page cap of ${this.options.maxPages} reached (${totalPages} pages available)`);
      nextPage = null;
    }

    logger.info(`[newsapi] Fetched ${articles.length} articles (page ${page}, total: ${totalResults})`);
    return { articles, totalResults, nextPage };
  }
}

// Returns undefined for bodies that are not JSON
async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch (error) {
    logger.debug('[newsapi] Response body is not JSON', { status: response.status, error: errorMessage(error) });
    return undefined;
  }
}

export function createNewsApiSource(config: EnvironmentConfig): NewsApiSource {
  return new NewsApiSource({
    ...config.newsApi,
    maxRetries: config.retry.maxRetries,
    backoff: {
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      factor: config.retry.factor,
      jitter: config.retry.jitter
    }
  });
}
