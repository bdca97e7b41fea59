import { PutObjectCommand, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import type { PublishTarget } from './index.js';
import { SystemicAuthError, TransientAdapterError } from '../errors.js';
import type { CallOptions } from '../utils/timeout.js';

export interface S3TargetConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId: string;
  secretAccessKey: string;
}

const AUTH_ERROR_CODES = new Set(['AccessDenied', 'InvalidAccessKeyId', 'SignatureDoesNotMatch', 'ExpiredToken']);

// R2のS3互換エンドポイント
export function r2Endpoint(accountId: string): string {
  return `https://${accountId}.r2.cloudflarestorage.com`;
}

/**
 * S3互換オブジェクトストレージ（Cloudflare R2 / AWS S3）
 */
export class S3Target implements PublishTarget {
  name = 's3';

  private client: S3Client;
  private bucket: string;

  constructor(config: S3TargetConfig, client?: S3Client) {
    this.bucket = config.bucket;
    this.client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
      });
  }

  async putObject(key: string, body: Buffer, contentType: string, options: CallOptions = {}): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
          ContentLength: body.length,
        }),
        { abortSignal: options.signal }
      );
    } catch (error) {
      throw classifyS3Error(error, key);
    }
  }
}

export function classifyS3Error(error: unknown, key: string): Error {
  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    if (status === 401 || status === 403 || AUTH_ERROR_CODES.has(error.name)) {
      return new SystemicAuthError('storage', `認証に失敗しました (${error.name})`, { cause: error });
    }
    return new TransientAdapterError(`アップロードに失敗しました: ${key} (${error.name})`, { cause: error });
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new TransientAdapterError(`アップロードに失敗しました: ${key} (${message})`, { cause: error });
}
