import RSS from 'rss';
import type { ArticleRecord } from '../storage/schema.js';
import { formatDuration } from '../utils/audio.js';
import { escapeHtml } from '../utils/text.js';

export interface FeedMetadata {
  title: string;
  description: string;
  baseUrl: string;
  feedKey: string;
  siteUrl?: string;
  language: string;
  imageUrl?: string;
  author?: string;
  category?: string;
}

// 公開URLと相対位置をスラッシュ1つでつなぐ
export function joinUrl(baseUrl: string, location: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${location.replace(/^\/+/, '')}`;
}

function compareByPublishedDesc(a: ArticleRecord, b: ArticleRecord): number {
  const ta = a.publishedAt ?? '';
  const tb = b.publishedAt ?? '';
  if (ta !== tb) {
    return ta < tb ? 1 : -1;
  }
  return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
}

// 番組ノート（元記事へのリンクと要約）
function showNotesHtml(record: ArticleRecord): string {
  const parts: string[] = [];
  if (record.summary) {
    parts.push(`<p>${escapeHtml(record.summary)}</p>`);
  }
  if (record.author) {
    parts.push(`<p>著者: ${escapeHtml(record.author)}</p>`);
  }
  parts.push(`<p>元記事: <a href="${escapeHtml(record.originalUrl)}">${escapeHtml(record.title)}</a></p>`);
  return parts.join('\n');
}

/**
 * 公開済みレコードからポッドキャストのRSSを生成する。
 * 入力だけで出力が決まる（lastBuildDateを除く）。
 * GUIDはsourceIdなので、公開URLを変えてもエピソードは重複しない。
 */
export function renderPodcastFeed(records: ArticleRecord[], meta: FeedMetadata): string {
  const episodes = records.filter((r) => r.artifactLocation && r.publishedAt).sort(compareByPublishedDesc);
  const newest = episodes[0]?.publishedAt;
  const imageUrl = meta.imageUrl;

  const feed = new RSS({
    title: meta.title,
    description: meta.description,
    feed_url: joinUrl(meta.baseUrl, meta.feedKey),
    site_url: meta.siteUrl ?? meta.baseUrl,
    image_url: imageUrl,
    language: meta.language,
    pubDate: newest,
    custom_namespaces: {
      itunes: 'http://www.itunes.com/dtds/podcast-1.0.dtd',
      content: 'http://purl.org/rss/1.0/modules/content/',
    },
    custom_elements: [
      ...(imageUrl ? [{ 'itunes:image': { _attr: { href: imageUrl } } }] : []),
      ...(meta.author ? [{ 'itunes:author': meta.author }] : []),
      {
        'itunes:category': {
          _attr: {
            text: meta.category ?? 'Technology',
          },
        },
      },
      { 'itunes:explicit': 'no' },
      { 'itunes:type': 'episodic' },
    ],
  });

  for (const record of episodes) {
    const location = record.artifactLocation ?? '';
    const mediaUrl = joinUrl(meta.baseUrl, location);
    const notes = showNotesHtml(record);

    feed.item({
      title: record.title,
      description: notes,
      url: record.originalUrl,
      guid: record.sourceId,
      author: record.author,
      date: record.publishedAt ?? record.updatedAt,
      enclosure: {
        url: mediaUrl,
        size: record.artifactBytes,
        type: 'audio/mpeg',
      },
      custom_elements: [
        ...(record.durationSeconds !== undefined
          ? [{ 'itunes:duration': formatDuration(record.durationSeconds) }]
          : []),
        ...(record.author ? [{ 'itunes:author': record.author }] : []),
        { 'itunes:summary': record.summary ?? record.title },
        { 'itunes:explicit': 'no' },
        { 'content:encoded': { _cdata: notes } },
      ],
    });
  }

  return feed.xml({ indent: true });
}
