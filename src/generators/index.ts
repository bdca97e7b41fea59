import path from 'path';
import type { Config } from '../config/index.js';
import { createTTSProvider } from '../tts/index.js';
import type { CallOptions } from '../utils/timeout.js';
import { HttpGenerator } from './http-generator.js';
import { TTSGenerator } from './tts-generator.js';

// 生成ジョブの入力
export interface GenerationInput {
  sourceId: string;  // 冪等キーとしても使う
  title: string;
  author?: string;
  content: string;
}

export type CreateResult =
  | { status: 'created'; jobId: string }
  | { status: 'rejected'; reason: string };

export type PollResult =
  | { status: 'pending' }
  | { status: 'ready' }
  | { status: 'failed'; reason: string };

export interface GeneratedArtifact {
  data: Buffer;
  contentType: string;
}

/**
 * 音声生成バックエンドの契約。
 * createは冪等ではないため、呼び出し側はジョブIDの有無を確認してから呼ぶ。
 */
export interface GenerationAdapter {
  name: string;
  create(input: GenerationInput, options?: CallOptions): Promise<CreateResult>;
  poll(jobId: string, options?: CallOptions): Promise<PollResult>;
  download(jobId: string, options?: CallOptions): Promise<GeneratedArtifact>;
  // 公開先に保存した後、リモート側のジョブを片付ける（任意）
  release?(jobId: string, options?: CallOptions): Promise<void>;
}

// 設定から生成バックエンドを作成
export function createGeneratorFromConfig(config: Config): GenerationAdapter {
  const generation = config.generation;

  if (generation.provider === 'http') {
    const { baseUrl, apiToken, language } = generation.http;
    if (!baseUrl) {
      throw new Error('生成サービスのURLが設定されていません (GENERATION_API_URL)');
    }
    if (!apiToken) {
      throw new Error('生成サービスのトークンが設定されていません (GENERATION_API_TOKEN)');
    }
    return new HttpGenerator({ baseUrl, apiToken, language });
  }

  const tts = generation.tts;
  const provider = createTTSProvider({
    provider: tts.provider,
    model: tts.model,
    voices: tts.voices,
    apiKey: tts.apiKey,
    speakerPrompt: tts.speakerPrompt,
    tempDir: path.join(config.storage.workDir, 'tmp'),
  });
  return new TTSGenerator(provider, {
    jobsDir: path.join(config.storage.workDir, 'jobs'),
    chunkSize: tts.chunkSize,
    concurrency: tts.concurrency,
    minContentLength: generation.minContentLength,
    maxContentLength: tts.maxContentLength,
  });
}

export { HttpGenerator, type HttpGeneratorConfig } from './http-generator.js';
export { TTSGenerator, type TTSGeneratorConfig } from './tts-generator.js';
