import type { Config } from '../config/index.js';
import type { ArticleRecord } from '../storage/schema.js';
import type { CallOptions } from '../utils/timeout.js';
import { LocalTarget } from './local-target.js';
import { PodcastPublisher } from './podcast-publisher.js';
import { S3Target, r2Endpoint } from './s3-target.js';

// 音声・フィードの置き場所（S3互換ストレージ or ローカルディレクトリ）
export interface PublishTarget {
  name: string;
  putObject(key: string, body: Buffer, contentType: string, options?: CallOptions): Promise<void>;
}

/**
 * 公開側の契約。
 * storeは公開先での相対位置を返す。絶対URLはフィード生成時に組み立てる。
 */
export interface PublishAdapter {
  name: string;
  store(data: Buffer, sourceId: string, options?: CallOptions): Promise<string>;
  renderFeed(records: ArticleRecord[]): Buffer;
  publishFeed(records: ArticleRecord[], options?: CallOptions): Promise<void>;
}

// 設定から公開先を作成（S3の認証情報はここで確認する）
export function createPublishTarget(config: Config): PublishTarget {
  const publish = config.publish;
  if (publish.target === 'local') {
    return new LocalTarget(publish.local.dir);
  }

  const { bucket, accessKeyId, secretAccessKey, accountId, region } = publish.s3;
  if (!bucket || !accessKeyId || !secretAccessKey) {
    throw new Error(
      'S3互換ストレージの認証情報が不足しています (R2_BUCKET_NAME, R2_ACCESS_KEY_ID, R2_SECRET_ACCESS_KEY)'
    );
  }
  const endpoint = publish.s3.endpoint ?? (accountId ? r2Endpoint(accountId) : undefined);
  return new S3Target({ bucket, region, endpoint, accessKeyId, secretAccessKey });
}

export function createPublisherFromConfig(config: Config): PublishAdapter {
  const publish = config.publish;
  return new PodcastPublisher(createPublishTarget(config), {
    keyPrefix: publish.keyPrefix,
    feed: {
      ...publish.feed,
      baseUrl: publish.baseUrl,
      feedKey: publish.feedKey,
    },
  });
}

export { PodcastPublisher, type PodcastPublisherConfig } from './podcast-publisher.js';
export { renderPodcastFeed, joinUrl, type FeedMetadata } from './rss-feed.js';
export { S3Target, classifyS3Error, r2Endpoint, type S3TargetConfig } from './s3-target.js';
export { LocalTarget } from './local-target.js';
export { createServer, startServer, type ServerConfig } from './server.js';
