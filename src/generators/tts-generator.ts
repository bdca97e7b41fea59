import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import type { CreateResult, GeneratedArtifact, GenerationAdapter, GenerationInput, PollResult } from './index.js';
import type { TTSProvider } from '../tts/index.js';
import { readFileIfExists, writeFileAtomic } from '../storage/atomic.js';
import { truncateContent } from '../utils/article-fetcher.js';
import { concatMp3Buffers } from '../utils/audio.js';
import { getLogger } from '../utils/logger.js';
import { splitText } from '../utils/text.js';
import type { CallOptions } from '../utils/timeout.js';

export interface TTSGeneratorConfig {
  jobsDir: string;
  chunkSize: number;
  concurrency: number;
  minContentLength: number;
  maxContentLength: number;
}

/**
 * 手元のTTSで記事を読み上げる生成バックエンド。
 * createの中で合成まで済ませ、完成した音声をジョブIDのファイルとして置く。
 */
export class TTSGenerator implements GenerationAdapter {
  name: string;

  private provider: TTSProvider;
  private config: TTSGeneratorConfig;
  private logger = getLogger();

  constructor(provider: TTSProvider, config: TTSGeneratorConfig) {
    this.provider = provider;
    this.config = config;
    this.name = `tts:${provider.name}`;
  }

  async create(input: GenerationInput, options: CallOptions = {}): Promise<CreateResult> {
    const body = input.content.trim();
    if (body.length < this.config.minContentLength) {
      return {
        status: 'rejected',
        reason: `本文が短すぎます (${body.length}文字 < ${this.config.minContentLength}文字)`,
      };
    }

    const intro = input.author ? `${input.title}\n\n${input.author}` : input.title;
    const script = `${intro}\n\n${truncateContent(body, this.config.maxContentLength)}`;
    const chunks = splitText(script, { maxChunkSize: this.config.chunkSize });
    this.logger.info({ sourceId: input.sourceId, chunkCount: chunks.length }, 'テキストを分割しました');

    // チャンクを並列処理
    const audioBuffers: Buffer[] = new Array<Buffer>(chunks.length);
    const concurrency = Math.max(1, this.config.concurrency);

    for (let i = 0; i < chunks.length; i += concurrency) {
      const batch = chunks.slice(i, i + concurrency);
      const batchResults = await Promise.all(
        batch.map(async (chunk, index) => {
          const buffer = await this.provider.generateAudio(chunk, { signal: options.signal });
          return { index: i + index, buffer };
        })
      );

      for (const { index, buffer } of batchResults) {
        audioBuffers[index] = buffer;
      }

      this.logger.debug(
        { processed: Math.min(i + concurrency, chunks.length), total: chunks.length },
        'バッチ処理完了'
      );
    }

    const combined = await concatMp3Buffers(audioBuffers, path.join(this.config.jobsDir, '.temp'));

    const jobId = `tts-${randomUUID()}`;
    await writeFileAtomic(this.jobPath(jobId), combined);
    this.logger.info({ sourceId: input.sourceId, jobId, size: combined.length }, '音声を生成しました');

    return { status: 'created', jobId };
  }

  async poll(jobId: string): Promise<PollResult> {
    try {
      await fs.access(this.jobPath(jobId));
      return { status: 'ready' };
    } catch {
      return { status: 'failed', reason: `生成済みの音声ファイルがありません: ${jobId}` };
    }
  }

  async download(jobId: string): Promise<GeneratedArtifact> {
    const data = await readFileIfExists(this.jobPath(jobId));
    if (!data) {
      throw new Error(`生成済みの音声ファイルがありません: ${jobId}`);
    }
    return { data, contentType: 'audio/mpeg' };
  }

  async release(jobId: string): Promise<void> {
    await fs.rm(this.jobPath(jobId), { force: true });
  }

  private jobPath(jobId: string): string {
    return path.join(this.config.jobsDir, `${path.basename(jobId)}.mp3`);
  }
}
