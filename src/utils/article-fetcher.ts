import { Readability } from '@mozilla/readability';
import { parseHTML } from 'linkedom';
import { TransientAdapterError } from '../errors.js';
import { getLogger } from './logger.js';
import { normalizeWhitespace } from './text.js';

export interface FetchedArticle {
  title: string;
  textContent: string;
  excerpt?: string;
  byline?: string;
  siteName?: string;
}

export interface FetchArticleOptions {
  signal?: AbortSignal;
  userAgent?: string;
}

// 記事ページを取得し、Readabilityで本文を抽出する
export async function fetchArticleContent(
  url: string,
  options: FetchArticleOptions = {}
): Promise<FetchedArticle | null> {
  const logger = getLogger();
  logger.debug({ url }, '記事本文を取得中');

  const response = await fetch(url, {
    headers: {
      'User-Agent': options.userAgent ?? 'Mozilla/5.0 (compatible; readcast/1.0)',
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    },
    signal: options.signal,
  });

  if (!response.ok) {
    // 4xxはページ側の問題なので本文なしとして扱う
    if (response.status >= 500 || response.status === 429) {
      throw new TransientAdapterError(`記事ページの取得に失敗しました (HTTP ${response.status}): ${url}`);
    }
    logger.warn({ url, status: response.status }, '記事取得失敗');
    return null;
  }

  const html = await response.text();
  const { document } = parseHTML(html);

  // linkedomのDocumentはDOM型と互換だが型定義が異なる
  const reader = new Readability(document as unknown as Document);
  const article = reader.parse();

  if (!article?.textContent) {
    logger.warn({ url }, '記事のパースに失敗');
    return null;
  }

  const textContent = normalizeWhitespace(article.textContent);
  logger.debug({ url, contentLength: textContent.length }, '記事本文を取得完了');

  return {
    title: article.title ?? '',
    textContent,
    excerpt: article.excerpt ?? undefined,
    byline: article.byline ?? undefined,
    siteName: article.siteName ?? undefined,
  };
}

// テキストを指定文字数に制限（文の途中で切らない）
export function truncateContent(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  // 最大長さ付近で文末を探す
  const truncated = text.slice(0, maxLength);
  const lastPeriod = Math.max(
    truncated.lastIndexOf('。'),
    truncated.lastIndexOf('. '),
    truncated.lastIndexOf('! '),
    truncated.lastIndexOf('? '),
    truncated.lastIndexOf('\n')
  );

  if (lastPeriod > maxLength * 0.7) {
    return truncated.slice(0, lastPeriod + 1).trimEnd();
  }

  return truncated + '...';
}
