import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import type { ListResult, SourceAdapter, SourceArticle } from './index.js';
import { RejectedByBackend, TransientAdapterError } from '../errors.js';
import { fetchArticleContent } from '../utils/article-fetcher.js';
import { parseRetryAfter, raiseForStatus } from '../utils/http.js';
import { getLogger } from '../utils/logger.js';
import { htmlToText } from '../utils/text.js';
import type { CallOptions } from '../utils/timeout.js';

export interface ReadwiseSourceConfig {
  token: string;
  baseUrl: string;
  category: string;
  location?: string;
  maxRateLimitRetries: number;
  // Retry-Afterがない429で待つ秒数
  defaultRetryAfterSeconds: number;
}

const readwiseDocumentSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  author: z.string().nullish(),
  source_url: z.string().nullish(),
  summary: z.string().nullish(),
  html_content: z.string().nullish(),
  updated_at: z.string().nullish(),
});

const readwiseListSchema = z.object({
  results: z.array(readwiseDocumentSchema).default([]),
  nextPageCursor: z.string().nullish(),
});

type ReadwiseDocument = z.infer<typeof readwiseDocumentSchema>;

const SERVICE = 'readwise';

function laterTimestamp(a: string | null, b: string): string {
  if (a === null) return b;
  const ta = Date.parse(a);
  const tb = Date.parse(b);
  if (Number.isNaN(tb)) return a;
  if (Number.isNaN(ta)) return b;
  return tb > ta ? b : a;
}

/**
 * Readwise Reader API (v3) のクライアント。
 * updatedAfterで新着を列挙し、本文は記事ごとに取得する。
 */
export class ReadwiseSource implements SourceAdapter {
  name = SERVICE;

  private config: ReadwiseSourceConfig;
  private logger = getLogger();

  constructor(config: ReadwiseSourceConfig) {
    this.config = config;
  }

  async listNew(cursor: string | null, options: CallOptions = {}): Promise<ListResult> {
    const articles = new Map<string, SourceArticle>();
    let nextCursor = cursor;
    let pageCursor: string | null = null;
    let pages = 0;

    do {
      const params = new URLSearchParams({ category: this.config.category });
      if (this.config.location) params.set('location', this.config.location);
      if (cursor) params.set('updatedAfter', cursor);
      if (pageCursor) params.set('pageCursor', pageCursor);

      const page = await this.requestList(params, options.signal);
      pages++;

      for (const doc of page.results) {
        if (doc.updated_at) {
          nextCursor = laterTimestamp(nextCursor, doc.updated_at);
        }
        if (!doc.source_url) {
          this.logger.debug({ id: doc.id, title: doc.title }, '元URLのない記事をスキップ');
          continue;
        }
        articles.set(doc.id, this.toArticle(doc, doc.source_url));
      }

      pageCursor = page.nextPageCursor ?? null;
    } while (pageCursor);

    this.logger.info({ count: articles.size, pages, cursor }, 'Readwiseから新着記事を取得');
    return { articles: [...articles.values()], nextCursor };
  }

  async fetchContent(sourceId: string, options: CallOptions = {}): Promise<string> {
    const params = new URLSearchParams({ id: sourceId, withHtmlContent: 'true' });
    const page = await this.requestList(params, options.signal);
    const doc = page.results.find((d) => d.id === sourceId);

    if (!doc) {
      throw new RejectedByBackend(`Readwiseに記事が見つかりません: ${sourceId}`);
    }

    const text = doc.html_content ? htmlToText(doc.html_content) : '';
    if (text.length > 0) {
      this.logger.debug({ sourceId, length: text.length }, 'Readwiseの本文を使用');
      return text;
    }

    // Readwise側に本文がなければ元記事から抽出
    if (doc.source_url) {
      this.logger.info({ sourceId, url: doc.source_url }, 'Readwiseに本文がないため元記事から取得');
      const fetched = await fetchArticleContent(doc.source_url, { signal: options.signal });
      if (fetched?.textContent) {
        return fetched.textContent;
      }
    }

    throw new TransientAdapterError(`本文を取得できませんでした: ${sourceId}`);
  }

  private toArticle(doc: ReadwiseDocument, url: string): SourceArticle {
    return {
      sourceId: doc.id,
      title: doc.title || 'Untitled',
      url,
      author: doc.author || undefined,
      summary: doc.summary || undefined,
      updatedAt: doc.updated_at ?? undefined,
    };
  }

  private async requestList(
    params: URLSearchParams,
    signal?: AbortSignal
  ): Promise<z.infer<typeof readwiseListSchema>> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/list/?${params.toString()}`;

    for (let attempt = 0; ; attempt++) {
      const response = await fetch(url, {
        headers: { Authorization: `Token ${this.config.token}` },
        signal,
      });

      if (response.status === 429 && attempt < this.config.maxRateLimitRetries) {
        const retryAfter =
          parseRetryAfter(response.headers.get('Retry-After')) ?? this.config.defaultRetryAfterSeconds;
        this.logger.warn({ retryAfter, attempt: attempt + 1 }, 'Readwiseのレート制限、待機します');
        await sleep(retryAfter * 1000, undefined, { signal });
        continue;
      }

      await raiseForStatus(SERVICE, response);

      const result = readwiseListSchema.safeParse(await response.json());
      if (!result.success) {
        throw new TransientAdapterError(`Readwiseのレスポンス形式が不正です: ${result.error.message}`);
      }
      return result.data;
    }
  }
}
