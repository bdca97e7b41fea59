import { z } from 'zod';

// Readwise Reader設定
const readwiseSchema = z.object({
  token: z.string().optional(),
  baseUrl: z.string().url().default('https://readwise.io/api/v3'),
  category: z.string().default('article'),
  location: z.string().optional(),
  maxRateLimitRetries: z.number().int().nonnegative().default(3),
  defaultRetryAfterSeconds: z.number().positive().default(60),
});

const sourceSchema = z.object({
  readwise: readwiseSchema.default({}),
});

// ジョブ型の生成サービス設定
const httpGenerationSchema = z.object({
  baseUrl: z.string().optional(),
  apiToken: z.string().optional(),
  language: z.string().default('ja'),
});

// TTS設定
const ttsSchema = z.object({
  provider: z.enum(['gemini', 'openai']).default('gemini'),
  model: z.string().default('gemini-2.5-flash-preview-tts'),
  voices: z.array(z.string()).default(['Laomedeia']),
  speakerPrompt: z.string().optional(),
  chunkSize: z.number().default(1500),
  concurrency: z.number().default(6),
  maxContentLength: z.number().default(20000),
  apiKey: z.string().optional(),
});

const generationSchema = z.object({
  provider: z.enum(['http', 'tts']).default('tts'),
  http: httpGenerationSchema.default({}),
  tts: ttsSchema.default({}),
  minContentLength: z.number().int().nonnegative().default(200),
  maxPendingMinutes: z.number().positive().default(120),
  minArtifactBytes: z.number().int().nonnegative().default(100_000),
  ffmpegPath: z.string().optional(),
});

// S3互換ストレージ（Cloudflare R2 / AWS S3）
const s3Schema = z.object({
  bucket: z.string().optional(),
  region: z.string().default('auto'),
  endpoint: z.string().optional(),
  accountId: z.string().optional(),
  accessKeyId: z.string().optional(),
  secretAccessKey: z.string().optional(),
});

// フィードのメタデータ
const feedSchema = z.object({
  title: z.string().default('Readcast'),
  description: z.string().default('あとで読む記事を読み上げるポッドキャスト'),
  siteUrl: z.string().optional(),
  language: z.string().default('ja'),
  imageUrl: z.string().optional(),
  author: z.string().optional(),
  category: z.string().default('Technology'),
});

const publishSchema = z.object({
  target: z.enum(['s3', 'local']).default('local'),
  // 公開URL。フィード生成時に相対位置と結合する
  baseUrl: z.string().url().default('http://localhost:3000'),
  keyPrefix: z.string().default('episodes/'),
  feedKey: z.string().default('feed.xml'),
  s3: s3Schema.default({}),
  local: z
    .object({
      dir: z.string().default('./output/public'),
    })
    .default({}),
  feed: feedSchema.default({}),
});

// ステージごとの最大試行回数
const maxAttemptsSchema = z.object({
  fetch: z.number().int().positive().default(3),
  create: z.number().int().positive().default(3),
  generate: z.number().int().positive().default(5),
  download: z.number().int().positive().default(5),
  store: z.number().int().positive().default(5),
  publish: z.number().int().positive().default(5),
});

const pipelineSchema = z.object({
  // 1回の実行で行う外部呼び出しの上限
  limit: z.number().int().positive().default(20),
  timeouts: z
    .object({
      sourceSeconds: z.number().positive().default(60),
      generationSeconds: z.number().positive().default(600),
      publishSeconds: z.number().positive().default(120),
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: maxAttemptsSchema.default({}),
      backoffBaseSeconds: z.number().nonnegative().default(300),
      backoffMaxSeconds: z.number().nonnegative().default(6 * 60 * 60),
    })
    .default({}),
});

// スケジュール設定
const scheduleSchema = z.object({
  cron: z.string().default('0 * * * *'),
  timezone: z.string().default('Asia/Tokyo'),
});

// サーバー設定
const serverSchema = z.object({
  port: z.number().default(3000),
});

// 保存先設定
const storageSchema = z.object({
  dataDir: z.string().default('./data'),
  workDir: z.string().default('./data/work'),
});

// ログ設定
const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  pretty: z.boolean().default(true),
});

// メイン設定スキーマ
export const configSchema = z.object({
  source: sourceSchema.default({}),
  generation: generationSchema.default({}),
  publish: publishSchema.default({}),
  pipeline: pipelineSchema.default({}),
  schedule: scheduleSchema.default({}),
  server: serverSchema.default({}),
  storage: storageSchema.default({}),
  logging: loggingSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
