import type { Config } from '../config/index.js';
import type { CallOptions } from '../utils/timeout.js';
import { ReadwiseSource } from './readwise.js';

// ソースから見つかった記事
export interface SourceArticle {
  sourceId: string;   // ソース側の安定したID
  title: string;
  url: string;        // 元記事のURL
  author?: string;
  summary?: string;
  updatedAt?: string; // ソース側の更新日時（ISO 8601）
}

export interface ListResult {
  articles: SourceArticle[];
  // 次回の問い合わせに使うカーソル。新着がなければ渡したカーソルのまま
  nextCursor: string | null;
}

/**
 * 記事ソースの契約。
 * 同じカーソルで何度呼んでも安全でなければならない。
 */
export interface SourceAdapter {
  name: string;
  listNew(cursor: string | null, options?: CallOptions): Promise<ListResult>;
  fetchContent(sourceId: string, options?: CallOptions): Promise<string>;
}

// 設定からソースを作成（トークンはここで確認する）
export function createSourceFromConfig(config: Config): SourceAdapter {
  const readwise = config.source.readwise;
  if (!readwise.token) {
    throw new Error('Readwiseのトークンが設定されていません (READWISE_TOKEN)');
  }
  return new ReadwiseSource({
    token: readwise.token,
    baseUrl: readwise.baseUrl,
    category: readwise.category,
    location: readwise.location,
    maxRateLimitRetries: readwise.maxRateLimitRetries,
    defaultRetryAfterSeconds: readwise.defaultRetryAfterSeconds,
  });
}

export { ReadwiseSource, type ReadwiseSourceConfig } from './readwise.js';
