import { z } from 'zod';
import type { CreateResult, GeneratedArtifact, GenerationAdapter, GenerationInput, PollResult } from './index.js';
import { TransientAdapterError } from '../errors.js';
import { raiseForStatus, readErrorDetail } from '../utils/http.js';
import { getLogger } from '../utils/logger.js';
import type { CallOptions } from '../utils/timeout.js';

export interface HttpGeneratorConfig {
  baseUrl: string;
  apiToken: string;
  language: string;
}

const createResponseSchema = z.object({
  id: z.string().min(1),
});

const statusResponseSchema = z.object({
  status: z.enum(['queued', 'pending', 'running', 'completed', 'ready', 'failed']),
  error: z.string().nullish(),
});

const SERVICE = 'generation';

/**
 * ジョブ型の音声生成サービス（HTTP）。
 *   POST   /jobs            → { id }
 *   GET    /jobs/:id        → { status, error? }
 *   GET    /jobs/:id/audio  → 音声バイナリ
 *   DELETE /jobs/:id
 */
export class HttpGenerator implements GenerationAdapter {
  name = 'http';

  private config: HttpGeneratorConfig;
  private logger = getLogger();

  constructor(config: HttpGeneratorConfig) {
    this.config = config;
  }

  async create(input: GenerationInput, options: CallOptions = {}): Promise<CreateResult> {
    const response = await fetch(this.url('/jobs'), {
      method: 'POST',
      headers: {
        ...this.headers(),
        'Content-Type': 'application/json',
        // 同じ記事の二重作成をサービス側で弾けるようにする
        'Idempotency-Key': input.sourceId,
      },
      body: JSON.stringify({
        title: input.title,
        author: input.author,
        content: input.content,
        language: this.config.language,
      }),
      signal: options.signal,
    });

    if (response.status === 400 || response.status === 422) {
      const reason = await readErrorDetail(response);
      this.logger.warn({ sourceId: input.sourceId, reason }, '生成サービスが記事を拒否しました');
      return { status: 'rejected', reason };
    }
    await raiseForStatus(SERVICE, response);

    const body = createResponseSchema.safeParse(await response.json());
    if (!body.success) {
      throw new TransientAdapterError(`生成サービスのレスポンスにジョブIDがありません: ${body.error.message}`);
    }

    this.logger.info({ sourceId: input.sourceId, jobId: body.data.id }, '生成ジョブを作成しました');
    return { status: 'created', jobId: body.data.id };
  }

  async poll(jobId: string, options: CallOptions = {}): Promise<PollResult> {
    const response = await fetch(this.url(`/jobs/${encodeURIComponent(jobId)}`), {
      headers: this.headers(),
      signal: options.signal,
    });
    if (response.status === 404) {
      return { status: 'failed', reason: 'ジョブが見つかりません' };
    }
    await raiseForStatus(SERVICE, response);

    const body = statusResponseSchema.safeParse(await response.json());
    if (!body.success) {
      throw new TransientAdapterError(`生成サービスのステータス形式が不正です: ${body.error.message}`);
    }

    switch (body.data.status) {
      case 'completed':
      case 'ready':
        return { status: 'ready' };
      case 'failed':
        return { status: 'failed', reason: body.data.error || 'unknown error' };
      default:
        return { status: 'pending' };
    }
  }

  async download(jobId: string, options: CallOptions = {}): Promise<GeneratedArtifact> {
    const response = await fetch(this.url(`/jobs/${encodeURIComponent(jobId)}/audio`), {
      headers: this.headers(),
      signal: options.signal,
    });
    await raiseForStatus(SERVICE, response);

    const data = Buffer.from(await response.arrayBuffer());
    const contentType = response.headers.get('Content-Type') ?? 'audio/mpeg';
    this.logger.debug({ jobId, size: data.length, contentType }, '生成音声をダウンロードしました');
    return { data, contentType };
  }

  async release(jobId: string, options: CallOptions = {}): Promise<void> {
    const response = await fetch(this.url(`/jobs/${encodeURIComponent(jobId)}`), {
      method: 'DELETE',
      headers: this.headers(),
      signal: options.signal,
    });
    if (response.status === 404) {
      return;
    }
    await raiseForStatus(SERVICE, response);
  }

  private url(pathname: string): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}${pathname}`;
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.config.apiToken}` };
  }
}
