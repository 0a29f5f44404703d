/**
 * Polling scheduler: the only driver of the pipeline.
 *
 *   idle → fetching → processing → writing → sleeping → fetching …
 *
 * One tick runs at a time and finishes, retries included, before the next
 * one starts. The poll window is recomputed every tick and nothing is
 * persisted between ticks, so articles seen before are fetched again and
 * rely on their deterministic id for downstream deduplication.
 */

import type { Article, DroppedRecord, PollWindow, RawArticle, WriteReport } from '../types/article';
import { logger } from '../utils/logger';
import { Sleep, sleep as defaultSleep } from './backoff';
import type { BatchWriter } from './batch-writer';
import { BackendConnectivityError, SourceFatalError, SourceTransientError, errorMessage } from './errors';
import type { FetchSource } from './fetch-source';
import { Clock, normalizeArticle } from './normalizer';
import type { StreamBackend } from './stream-backend';
import { validateArticle } from './validator';

const PREVIEW_COUNT = 20;
const PREVIEW_CONTENT_CHARS = 200;

export type SchedulerState = 'idle' | 'fetching' | 'processing' | 'writing' | 'sleeping' | 'stopped';

export interface SchedulerDeps {
  source: FetchSource;
  writer: Pick<BatchWriter, 'write'>;
  backend: Pick<StreamBackend, 'checkConnectivity'>;
}

export interface SchedulerOptions {
  streamName: string;
  pollIntervalMs: number;
  lookbackMs: number;
  maxTicks?: number; // unbounded when omitted
  now?: Clock;
  sleep?: Sleep;
}

export interface TickReport {
  tick: number;
  window: PollWindow;
  pages: number;
  fetched: number;
  valid: number;
  duplicates: number;
  skipped: Record<string, number>;
  rejected: DroppedRecord[];
  writeReport: WriteReport | null;
  error: string | null;
  durationMs: number;
}

export class IngestionScheduler {
  private currentState: SchedulerState = 'idle';
  private ticks = 0;
  private readonly stopController = new AbortController();
  private readonly now: Clock;
  private readonly sleep: Sleep;

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get tickCount(): number {
    return this.ticks;
  }

  /**
   * Ask the loop to finish. The running tick drains normally; a pending
   * sleep ends at once and no further tick starts.
   */
  stop() {
    if (this.stopController.signal.aborted) return;
    logger.info(`[scheduler] Stop requested while ${this.currentState}`);
    this.stopController.abort();
  }

  /**
   * Check the backend once, then poll until stopped or `maxTicks` is reached.
   * Rejects only when the startup connectivity check fails.
   */
  async start(): Promise<void> {
    const signal = this.stopController.signal;
    try {
      await this.deps.backend.checkConnectivity(this.options.streamName);
    } catch (error) {
      this.currentState = 'stopped';
      logger.error('[scheduler] Backend connectivity check failed, not starting', error);
      throw error instanceof BackendConnectivityError
        ? error
        : new BackendConnectivityError(errorMessage(error), { cause: error });
    }

    logger.info(`[scheduler] Starting with ${this.options.pollIntervalMs / 1000}s interval`);
    while (!signal.aborted) {
      await this.runTick();

      if (this.options.maxTicks !== undefined && this.ticks >= this.options.maxTicks) {
        logger.info(`[scheduler] Reached max ticks (${this.options.maxTicks}), stopping`);
        break;
      }
      if (signal.aborted) break;

      this.currentState = 'sleeping';
      logger.info(`[scheduler] Waiting ${this.options.pollIntervalMs / 1000}s until next tick`);
      await this.sleep(this.options.pollIntervalMs, signal);
    }

    this.currentState = 'stopped';
    logger.info(`[scheduler] Stopped after ${this.ticks} ticks`);
  }

  /**
   * One poll cycle. Never throws: failures are logged and recorded on the report.
   */
  async runTick(): Promise<TickReport> {
    this.ticks += 1;
    const startedAt = Date.now();
    const to = this.now();
    const report: TickReport = {
      tick: this.ticks,
      window: { from: new Date(to.getTime() - this.options.lookbackMs), to },
      pages: 0,
      fetched: 0,
      valid: 0,
      duplicates: 0,
      skipped: {},
      rejected: [],
      writeReport: null,
      error: null,
      durationMs: 0
    };

    logger.info(
      `[scheduler] Tick ${report.tick}: window ${report.window.from.toISOString()} - ${report.window.to.toISOString()}`
    );

    try {
      this.currentState = 'fetching';
      const raw: RawArticle[] = [];
      for await (const page of this.deps.source.fetch(report.window)) {
        report.pages += 1;
        raw.push(...page.articles);
      }
      report.fetched = raw.length;

      this.currentState = 'processing';
      const articles = this.processArticles(raw, report);
      report.valid = articles.length;
      this.logPreview(articles);

      this.currentState = 'writing';
      if (articles.length === 0) {
        logger.warn(`[scheduler] Tick ${report.tick}: no valid articles to write`);
      } else {
        report.writeReport = await this.deps.writer.write(articles);
        for (const dropped of report.writeReport.dropped) {
          logger.warn('[scheduler] Dropped record', dropped);
        }
      }
    } catch (error) {
      report.error = errorMessage(error);
      if (error instanceof SourceFatalError) {
        logger.error(`[scheduler] Tick ${report.tick}: source rejected the request, skipping tick`, error);
      } else if (error instanceof SourceTransientError) {
        logger.error(`[scheduler] Tick ${report.tick}: source unavailable after retries, skipping tick`, error);
      } else {
        logger.error(`[scheduler] Tick ${report.tick}: unexpected error`, error);
      }
    }

    report.durationMs = Date.now() - startedAt;
    logger.info(`[scheduler] Tick ${report.tick} completed`, {
      pages: report.pages,
      fetched: report.fetched,
      valid: report.valid,
      duplicates: report.duplicates,
      skipped: report.skipped,
      succeeded: report.writeReport?.succeeded ?? 0,
      retried: report.writeReport?.retried ?? 0,
      dropped: report.writeReport?.permanentlyDropped ?? 0,
      error: report.error,
      durationMs: report.durationMs
    });
    return report;
  }

  /**
   * Normalize, validate and deduplicate one tick's raw articles.
   * Rejected records are tallied and never retried.
   */
  private processArticles(raw: RawArticle[], report: TickReport): Article[] {
    const byId = new Map<string, Article>();

    const reject = (dropped: DroppedRecord) => {
      report.rejected.push(dropped);
      report.skipped[dropped.code] = (report.skipped[dropped.code] ?? 0) + 1;
      logger.debug('[scheduler] Rejected record', dropped);
    };

    for (const item of raw) {
      const normalized = normalizeArticle(item, this.now);
      if (!normalized.ok) {
        reject({
          articleId: null,
          stage: 'normalize',
          code: normalized.skipped.reason,
          message: normalized.skipped.detail,
          retries: 0
        });
        continue;
      }

      const validated = validateArticle(normalized.article);
      if (!validated.ok) {
        reject({
          articleId: normalized.article.id,
          stage: 'validate',
          code: validated.error.kind,
          message: validated.error.message,
          retries: 0
        });
        continue;
      }

      if (byId.has(validated.value.id)) {
        report.duplicates += 1;
        continue;
      }
      byId.set(validated.value.id, validated.value);
    }

    logger.info(
      `[scheduler] Processed ${byId.size}/${raw.length} articles (${report.rejected.length} rejected, ${report.duplicates} duplicates)`
    );
    return Array.from(byId.values());
  }

  private logPreview(articles: Article[]) {
    if (logger.level !== 'debug') return;
    articles.slice(0, PREVIEW_COUNT).forEach((article, index) => {
      const content = article.content || '(no content)';
      logger.debug(`  [${index + 1}] ${article.title}`, {
        source: article.sourceName,
        publishedAt: article.publishedAt,
        url: article.url,
        content: content.length > PREVIEW_CONTENT_CHARS ? `${content.slice(0, PREVIEW_CONTENT_CHARS)}...` : content
      });
    });
    if (articles.length > PREVIEW_COUNT) {
      logger.debug(`  ... and ${articles.length - PREVIEW_COUNT} more articles`);
    }
  }
}
