import type { PublishAdapter, PublishTarget } from './index.js';
import { renderPodcastFeed, type FeedMetadata } from './rss-feed.js';
import type { ArticleRecord } from '../storage/schema.js';
import { safeFileName } from '../storage/work-dir.js';
import { getLogger } from '../utils/logger.js';
import type { CallOptions } from '../utils/timeout.js';

export interface PodcastPublisherConfig {
  keyPrefix: string;
  feed: FeedMetadata;
}

const FEED_CONTENT_TYPE = 'application/rss+xml; charset=utf-8';

/**
 * 音声をターゲットに置き、公開済みレコードからfeed.xmlを書き出す。
 */
export class PodcastPublisher implements PublishAdapter {
  name: string;

  private target: PublishTarget;
  private config: PodcastPublisherConfig;
  private logger = getLogger();

  constructor(target: PublishTarget, config: PodcastPublisherConfig) {
    this.target = target;
    this.config = config;
    this.name = `podcast:${target.name}`;
  }

  async store(data: Buffer, sourceId: string, options: CallOptions = {}): Promise<string> {
    const key = `${this.config.keyPrefix}${safeFileName(sourceId)}.mp3`;
    await this.target.putObject(key, data, 'audio/mpeg', options);
    this.logger.info({ sourceId, key, size: data.length }, '音声を保存しました');
    return key;
  }

  renderFeed(records: ArticleRecord[]): Buffer {
    return Buffer.from(renderPodcastFeed(records, this.config.feed), 'utf-8');
  }

  async publishFeed(records: ArticleRecord[], options: CallOptions = {}): Promise<void> {
    const body = this.renderFeed(records);
    await this.target.putObject(this.config.feed.feedKey, body, FEED_CONTENT_TYPE, options);
    this.logger.info({ key: this.config.feed.feedKey, episodes: records.length }, 'RSSフィードを公開しました');
  }
}
