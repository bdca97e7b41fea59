import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { Pipeline, type PipelineSettings } from './index.js';
import { DEFAULT_RETRY_SETTINGS } from './policy.js';
import { reprocessRecord, republishFeed, seedCursor } from './maintenance.js';
import {
  LockHeldError,
  QuotaExceededError,
  SystemicAuthError,
  TransientAdapterError,
} from '../errors.js';
import type { CreateResult, GeneratedArtifact, GenerationAdapter, GenerationInput, PollResult } from '../generators/index.js';
import { LocalTarget } from '../publishers/local-target.js';
import { PodcastPublisher } from '../publishers/podcast-publisher.js';
import type { ListResult, SourceAdapter } from '../sources/index.js';
import { JsonRecordStore } from '../storage/record-store.js';
import type { ArticleRecord } from '../storage/schema.js';
import { WorkDir } from '../storage/work-dir.js';
import { convertToMp3 } from '../utils/audio.js';
import type { CallOptions } from '../utils/timeout.js';

vi.mock('../utils/audio.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/audio.js')>();
  return {
    ...actual,
    getAudioDuration: vi.fn(async () => 321),
    convertToMp3: vi.fn(async () => Buffer.alloc(4096, 2)),
  };
});

const T0 = new Date('2026-01-10T00:00:00.000Z');
const AUDIO = Buffer.alloc(2048, 1);

function minutesFrom(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60 * 1000);
}

function makeRecord(sourceId: string, overrides: Partial<ArticleRecord> = {}): ArticleRecord {
  return {
    sourceId,
    title: `記事 ${sourceId}`,
    originalUrl: `https://example.com/${sourceId}`,
    state: 'discovered',
    attempts: {},
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function createFakeSource() {
  return {
    name: 'fake-source',
    listNew: vi.fn(
      async (cursor: string | null, _options?: CallOptions): Promise<ListResult> => ({ articles: [], nextCursor: cursor })
    ),
    fetchContent: vi.fn(async (sourceId: string, _options?: CallOptions): Promise<string> => `${sourceId}の本文`),
  } satisfies SourceAdapter;
}

function createFakeGenerator() {
  return {
    name: 'fake-generator',
    create: vi.fn(
      async (input: GenerationInput, _options?: CallOptions): Promise<CreateResult> => ({
        status: 'created',
        jobId: `job-${input.sourceId}`,
      })
    ),
    poll: vi.fn(async (_jobId: string, _options?: CallOptions): Promise<PollResult> => ({ status: 'ready' })),
    download: vi.fn(
      async (_jobId: string, _options?: CallOptions): Promise<GeneratedArtifact> => ({
        data: AUDIO,
        contentType: 'audio/mpeg',
      })
    ),
    release: vi.fn(async (_jobId: string, _options?: CallOptions): Promise<void> => {}),
  } satisfies GenerationAdapter;
}

function createPublisher(publicDir: string, baseUrl: string): PodcastPublisher {
  return new PodcastPublisher(new LocalTarget(publicDir), {
    keyPrefix: 'episodes/',
    feed: {
      title: 'テスト番組',
      description: 'テスト用のフィード',
      baseUrl,
      feedKey: 'feed.xml',
      language: 'ja',
    },
  });
}

describe('Pipeline', () => {
  let tempDir: string;
  let dataDir: string;
  let publicDir: string;
  let clock: Date;
  let source: ReturnType<typeof createFakeSource>;
  let generator: ReturnType<typeof createFakeGenerator>;
  let publisher: PodcastPublisher;
  let workDir: WorkDir;
  let settings: PipelineSettings;

  beforeEach(async () => {
    // テスト用の一時ディレクトリを作成
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'readcast-test-'));
    dataDir = path.join(tempDir, 'data');
    publicDir = path.join(tempDir, 'public');
    clock = T0;
    source = createFakeSource();
    generator = createFakeGenerator();
    publisher = createPublisher(publicDir, 'https://podcast.example.com');
    workDir = new WorkDir(path.join(tempDir, 'work'));
    settings = {
      limit: 20,
      retry: DEFAULT_RETRY_SETTINGS,
      timeouts: { sourceMs: 1000, generationMs: 1000, publishMs: 1000 },
      maxPendingMinutes: 120,
      minArtifactBytes: 1024,
      tempDir: path.join(tempDir, 'tmp'),
    };
    vi.mocked(convertToMp3).mockClear();
  });

  afterEach(async () => {
    // テスト後に一時ディレクトリを削除
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createPipeline(overrides: Partial<PipelineSettings> = {}): Pipeline {
    return new Pipeline({
      store: new JsonRecordStore(dataDir),
      source,
      generator,
      publisher,
      workDir,
      settings: { ...settings, ...overrides },
      now: () => clock,
    });
  }

  async function seed(...records: ArticleRecord[]): Promise<void> {
    const store = new JsonRecordStore(dataDir);
    await store.open();
    for (const record of records) {
      await store.upsert(record);
    }
    await store.close();
  }

  async function readRecords(): Promise<ArticleRecord[]> {
    const store = new JsonRecordStore(dataDir);
    await store.open({ readOnly: true });
    const records = store.loadAll();
    await store.close();
    return records;
  }

  async function readRecord(sourceId: string): Promise<ArticleRecord | undefined> {
    return (await readRecords()).find((r) => r.sourceId === sourceId);
  }

  describe('発見', () => {
    it('空のストアで1件見つかり、limit=1ならfetchedで止まる', async () => {
      source.listNew.mockResolvedValueOnce({
        articles: [{ sourceId: 'a1', title: '記事1', url: 'https://example.com/a1' }],
        nextCursor: '2026-01-09T12:00:00.000Z',
      });

      const report = await createPipeline().run({ limit: 1 });

      const records = await readRecords();
      expect(records).toHaveLength(1);
      expect(records[0]?.state).toBe('fetched');
      expect(report.discovered).toBe(1);
      expect(report.advanced).toBe(1);
      expect(report.budgetUsed).toBe(1);
      expect(generator.create).not.toHaveBeenCalled();
      expect(await workDir.readContent('a1')).toBe('a1の本文');
    });

    it('発見に成功したらカーソルを進める', async () => {
      source.listNew.mockResolvedValueOnce({ articles: [], nextCursor: '2026-01-09T12:00:00.000Z' });

      await createPipeline().run();

      const store = new JsonRecordStore(dataDir);
      await store.open({ readOnly: true });
      expect(store.getCursor()).toBe('2026-01-09T12:00:00.000Z');
      await store.close();
    });

    it('同じ記事が何度返されてもレコードは1件', async () => {
      source.listNew.mockResolvedValue({
        articles: [{ sourceId: 'a1', title: '記事1', url: 'https://example.com/a1' }],
        nextCursor: null,
      });

      await createPipeline().run({ limit: 1 });
      const second = await createPipeline().run({ limit: 1 });

      const records = await readRecords();
      expect(records).toHaveLength(1);
      expect(second.discovered).toBe(0);
      // 2回目の実行では既存レコードが先に進む
      expect(records[0]?.state).toBe('generating');
    });

    it('一覧取得が一時的に失敗しても既存レコードは処理し、カーソルは進めない', async () => {
      await seed(makeRecord('e1'));
      source.listNew.mockRejectedValueOnce(new TransientAdapterError('接続エラー'));

      await createPipeline().run({ limit: 1 });

      expect((await readRecord('e1'))?.state).toBe('fetched');
      const store = new JsonRecordStore(dataDir);
      await store.open({ readOnly: true });
      expect(store.getCursor()).toBeNull();
      await store.close();
    });

    it('一覧取得がクォータ超過でも既存レコードは処理し、カーソルは進めない', async () => {
      await seed(makeRecord('e1'));
      source.listNew.mockRejectedValueOnce(new QuotaExceededError('readwise', 'rate limited'));

      const report = await createPipeline().run({ limit: 1 });

      expect((await readRecord('e1'))?.state).toBe('fetched');
      expect(report.budgetUsed).toBe(1);
      expect(report.halted).toBeNull();
      const store = new JsonRecordStore(dataDir);
      await store.open({ readOnly: true });
      expect(store.getCursor()).toBeNull();
      await store.close();
    });

    it('recentを指定すると、カーソルを使わずに更新日時の新しい順にN件だけ取り込む', async () => {
      await seedCursor(new JsonRecordStore(dataDir), T0);
      await seed(makeRecord('n2', { state: 'published' }));
      source.listNew.mockResolvedValueOnce({
        articles: [
          { sourceId: 'n1', title: '記事1', url: 'https://example.com/n1', updatedAt: '2026-01-01T00:00:00.000Z' },
          { sourceId: 'n3', title: '記事3', url: 'https://example.com/n3', updatedAt: '2026-01-03T00:00:00.000Z' },
          { sourceId: 'n2', title: '記事2', url: 'https://example.com/n2', updatedAt: '2026-01-02T00:00:00.000Z' },
          { sourceId: 'n0', title: '日時なし', url: 'https://example.com/n0' },
        ],
        nextCursor: '2026-01-09T12:00:00.000Z',
      });

      const report = await createPipeline().run({ limit: 0, recent: 2 });

      expect(source.listNew).toHaveBeenCalledWith(null, expect.anything());
      // 新しい2件はn3とn2。n2は登録済みなのでn3だけ増える
      expect(report.discovered).toBe(1);
      expect((await readRecords()).map((r) => r.sourceId).sort()).toEqual(['n2', 'n3']);
      const store = new JsonRecordStore(dataDir);
      await store.open({ readOnly: true });
      expect(store.getCursor()).toBe('2026-01-10T00:00:00.000Z');
      await store.close();
    });

    it('initで設定したカーソルで一覧を取得する', async () => {
      await seedCursor(new JsonRecordStore(dataDir), T0);

      await createPipeline().run();

      expect(source.listNew).toHaveBeenCalledWith('2026-01-10T00:00:00.000Z', expect.anything());
    });
  });

  describe('生成', () => {
    it('生成中のジョブがreadyになれば、createを呼ばずにdownloadedまで進む', async () => {
      await seed(
        makeRecord('b1', {
          state: 'generating',
          generationJobId: 'job-b1',
          generationStartedAt: minutesFrom(T0, -10).toISOString(),
        })
      );

      const report = await createPipeline().run({ limit: 2 });

      const record = await readRecord('b1');
      expect(record?.state).toBe('downloaded');
      expect(record?.artifactBytes).toBe(2048);
      expect(record?.durationSeconds).toBe(321);
      expect(generator.create).not.toHaveBeenCalled();
      expect(generator.poll).toHaveBeenCalledTimes(1);
      expect(generator.poll).toHaveBeenCalledWith('job-b1', expect.anything());
      expect(report.budgetUsed).toBe(2);
    });

    it('予算が足りれば公開まで進み、フィードに載る', async () => {
      await seed(
        makeRecord('b1', {
          state: 'generating',
          generationJobId: 'job-b1',
          generationStartedAt: minutesFrom(T0, -10).toISOString(),
        })
      );

      const report = await createPipeline().run();

      const record = await readRecord('b1');
      expect(record?.state).toBe('published');
      expect(record?.artifactLocation).toBe('episodes/b1.mp3');
      expect(record?.publishedAt).toBe(T0.toISOString());
      expect(report.published).toBe(1);
      expect(report.feedPublished).toBe(true);
      expect(generator.release).toHaveBeenCalledWith('job-b1', expect.anything());

      const stored = await fs.readFile(path.join(publicDir, 'episodes', 'b1.mp3'));
      expect(stored.length).toBe(2048);
      const feed = await fs.readFile(path.join(publicDir, 'feed.xml'), 'utf-8');
      expect(feed).toContain('url="https://podcast.example.com/episodes/b1.mp3"');

      // 保存後は作業ファイルを残さない
      expect(await workDir.readArtifact('b1')).toBeNull();
    });

    it('作成時に拒否されたら、試行回数を使わずに放棄する', async () => {
      await seed(makeRecord('c1', { state: 'fetched' }));
      generator.create.mockResolvedValueOnce({ status: 'rejected', reason: 'too short' });

      const report = await createPipeline().run();

      const record = await readRecord('c1');
      expect(record?.state).toBe('abandoned');
      expect(record?.abandonedFrom).toBe('creating');
      expect(record?.attempts).toEqual({});
      expect(record?.lastError).toBe('create: too short');
      expect(report.abandoned).toBe(1);
      expect(report.retried).toBe(0);
      expect(generator.create).toHaveBeenCalledTimes(1);
      // 取得し直した本文も残さない
      expect(await workDir.readContent('c1')).toBeNull();
    });

    it('ジョブIDがあるcreatingのレコードにはcreateを呼ばず、予算も使わない', async () => {
      await seed(makeRecord('r1', { state: 'creating', generationJobId: 'job-existing' }));

      const report = await createPipeline().run({ limit: 1 });

      // generatingへの移行は無料なので、1回分の予算でポーリングまで進む
      const record = await readRecord('r1');
      expect(record?.state).toBe('generated');
      expect(record?.generationJobId).toBe('job-existing');
      expect(generator.create).not.toHaveBeenCalled();
      expect(generator.poll).toHaveBeenCalledWith('job-existing', expect.anything());
      expect(report.budgetUsed).toBe(1);
    });

    it('作業ディレクトリに本文がなければ作成前に取得し直す', async () => {
      await seed(makeRecord('x1', { state: 'fetched' }));

      await createPipeline().run({ limit: 1 });

      expect(source.fetchContent).toHaveBeenCalledTimes(1);
      expect(generator.create).toHaveBeenCalledWith(
        { sourceId: 'x1', title: '記事 x1', author: undefined, content: 'x1の本文' },
        expect.anything()
      );
      expect((await readRecord('x1'))?.state).toBe('generating');
    });

    it('生成中なら更新日時だけ進めて次の記事に予算を回す', async () => {
      await seed(
        makeRecord('g1', {
          state: 'generating',
          generationJobId: 'job-g1',
          generationStartedAt: minutesFrom(T0, -10).toISOString(),
        }),
        makeRecord('g2', { updatedAt: '2026-01-02T00:00:00.000Z' })
      );
      generator.poll.mockResolvedValueOnce({ status: 'pending' });

      const report = await createPipeline().run({ limit: 2 });

      const g1 = await readRecord('g1');
      expect(g1?.state).toBe('generating');
      expect(g1?.updatedAt).toBe(T0.toISOString());
      expect((await readRecord('g2'))?.state).toBe('fetched');
      expect(report.advanced).toBe(1);
      expect(report.retried).toBe(0);
    });

    it('待ち時間の上限を過ぎたジョブはポーリングせずに放棄する', async () => {
      await seed(
        makeRecord('g1', {
          state: 'generating',
          generationJobId: 'job-g1',
          generationStartedAt: minutesFrom(T0, -180).toISOString(),
        })
      );

      await createPipeline().run();

      const record = await readRecord('g1');
      expect(record?.state).toBe('abandoned');
      expect(record?.lastError).toBe('generate: 生成ジョブが120分以内に完了しませんでした');
      expect(record?.attempts).toEqual({});
      expect(generator.poll).not.toHaveBeenCalled();
    });

    it('ジョブが失敗と報告されたら放棄する', async () => {
      await seed(
        makeRecord('g1', {
          state: 'generating',
          generationJobId: 'job-g1',
          generationStartedAt: minutesFrom(T0, -10).toISOString(),
        })
      );
      generator.poll.mockResolvedValueOnce({ status: 'failed', reason: 'voice unavailable' });

      await createPipeline().run();

      const record = await readRecord('g1');
      expect(record?.state).toBe('abandoned');
      expect(record?.lastError).toBe('generate: 生成ジョブが失敗しました: voice unavailable');
      expect(generator.release).toHaveBeenCalledTimes(1);
      expect(generator.release).toHaveBeenCalledWith('job-g1', expect.anything());
    });

    it('放棄した記事の作業ファイルと使えなくなったジョブを片付ける', async () => {
      await seed(
        makeRecord('r1', { state: 'fetched' }),
        makeRecord('g1', {
          state: 'generating',
          generationJobId: 'job-g1',
          generationStartedAt: minutesFrom(T0, -180).toISOString(),
          updatedAt: '2026-01-02T00:00:00.000Z',
        }),
        makeRecord('s1', { state: 'generated', generationJobId: 'job-s1', updatedAt: '2026-01-03T00:00:00.000Z' })
      );
      await workDir.writeContent('r1', 'r1の本文');
      await workDir.writeContent('g1', 'g1の本文');
      await workDir.writeContent('s1', 's1の本文');
      generator.create.mockResolvedValueOnce({ status: 'rejected', reason: 'too short' });
      generator.download.mockResolvedValueOnce({ data: Buffer.alloc(10), contentType: 'audio/mpeg' });

      const report = await createPipeline().run();

      expect(report.abandoned).toBe(3);
      for (const sourceId of ['r1', 'g1', 's1']) {
        expect((await readRecord(sourceId))?.state).toBe('abandoned');
        expect(await workDir.readContent(sourceId)).toBeNull();
      }
      expect(generator.release.mock.calls.map(([jobId]) => jobId).sort()).toEqual(['job-g1', 'job-s1']);
    });

    it('再試行上限で放棄した記事は作業ファイルだけ消し、ジョブは残す', async () => {
      await seed(
        makeRecord('d1', {
          state: 'generated',
          generationJobId: 'job-d1',
          attempts: { download: DEFAULT_RETRY_SETTINGS.maxAttempts.download - 1 },
        })
      );
      await workDir.writeContent('d1', 'd1の本文');
      generator.download.mockRejectedValueOnce(new TransientAdapterError('接続がリセットされました'));

      await createPipeline().run();

      const record = await readRecord('d1');
      expect(record?.state).toBe('abandoned');
      expect(record?.abandonedFrom).toBe('generated');
      expect(await workDir.readContent('d1')).toBeNull();
      expect(generator.release).not.toHaveBeenCalled();
    });

    it('小さすぎる音声は放棄する', async () => {
      await seed(makeRecord('s1', { state: 'generated', generationJobId: 'job-s1' }));
      generator.download.mockResolvedValueOnce({ data: Buffer.alloc(10), contentType: 'audio/mpeg' });

      await createPipeline().run();

      const record = await readRecord('s1');
      expect(record?.state).toBe('abandoned');
      expect(record?.lastError).toBe('download: 生成された音声が小さすぎます (10バイト < 1024バイト)');
    });

    it('MP3以外の音声は変換してから保存する', async () => {
      await seed(makeRecord('m1', { state: 'generated', generationJobId: 'job-m1' }));
      generator.download.mockResolvedValueOnce({ data: AUDIO, contentType: 'audio/mp4' });

      await createPipeline().run({ limit: 1 });

      expect(convertToMp3).toHaveBeenCalledWith(AUDIO, 'audio/mp4', path.join(tempDir, 'tmp'));
      const record = await readRecord('m1');
      expect(record?.state).toBe('downloaded');
      expect(record?.artifactBytes).toBe(4096);
    });
  });

  describe('失敗と再試行', () => {
    it('一時的な失敗は試行回数を数え、バックオフが明けるまで再試行しない', async () => {
      await seed(makeRecord('t1'));
      source.fetchContent.mockRejectedValueOnce(new TransientAdapterError('接続がリセットされました'));

      const first = await createPipeline().run({ limit: 1 });
      let record = await readRecord('t1');
      expect(record?.state).toBe('discovered');
      expect(record?.attempts).toEqual({ fetch: 1 });
      expect(record?.lastError).toBe('fetch: 接続がリセットされました');
      expect(first.retried).toBe(1);

      // 1分後はまだバックオフ中
      clock = minutesFrom(T0, 1);
      const second = await createPipeline().run({ limit: 1 });
      expect(second.budgetUsed).toBe(0);
      expect(source.fetchContent).toHaveBeenCalledTimes(1);

      // 5分を過ぎたら再試行する
      clock = minutesFrom(T0, 6);
      await createPipeline().run({ limit: 1 });
      record = await readRecord('t1');
      expect(record?.state).toBe('fetched');
      expect(source.fetchContent).toHaveBeenCalledTimes(2);
    });

    it('タイムアウトは一時的な失敗として数える', async () => {
      await seed(makeRecord('t1'));
      source.fetchContent.mockImplementationOnce(() => new Promise<string>(() => {}));

      await createPipeline({ timeouts: { sourceMs: 20, generationMs: 1000, publishMs: 1000 } }).run({ limit: 1 });

      const record = await readRecord('t1');
      expect(record?.attempts).toEqual({ fetch: 1 });
      expect(record?.lastError).toBe('fetch: 本文の取得が20msでタイムアウトしました');
    });

    it('試行回数が上限に達したら放棄する', async () => {
      await seed(makeRecord('t1', { attempts: { fetch: 2 }, lastAttemptAt: '2026-01-01T00:00:00.000Z' }));
      source.fetchContent.mockRejectedValueOnce(new TransientAdapterError('接続エラー'));

      const report = await createPipeline().run();

      const record = await readRecord('t1');
      expect(record?.state).toBe('abandoned');
      expect(record?.abandonedFrom).toBe('discovered');
      expect(record?.attempts).toEqual({ fetch: 3 });
      expect(record?.lastError).toBe('fetch: 再試行上限(3回)に達しました: 接続エラー');
      expect(report.abandoned).toBe(1);
    });

    it('1件の失敗が他の記事の処理を妨げない', async () => {
      await seed(makeRecord('f1'), makeRecord('f2', { updatedAt: '2026-01-02T00:00:00.000Z' }));
      source.fetchContent.mockImplementation(async (sourceId: string) => {
        if (sourceId === 'f1') {
          throw new TransientAdapterError('503 Service Unavailable');
        }
        return `${sourceId}の本文`;
      });

      const report = await createPipeline().run({ limit: 2 });

      expect((await readRecord('f1'))?.attempts).toEqual({ fetch: 1 });
      expect((await readRecord('f2'))?.state).toBe('fetched');
      expect(report.retried).toBe(1);
      expect(report.advanced).toBe(1);
    });

    it('認証エラーで実行を中断し、どのレコードも変更しない', async () => {
      await seed(
        makeRecord('d1'),
        makeRecord('d2', { updatedAt: '2026-01-02T00:00:00.000Z' }),
        makeRecord('d3', { updatedAt: '2026-01-03T00:00:00.000Z' })
      );
      const before = await readRecords();
      source.fetchContent.mockRejectedValue(new SystemicAuthError('readwise', 'token expired'));

      await expect(createPipeline().run()).rejects.toBeInstanceOf(SystemicAuthError);

      expect(source.fetchContent).toHaveBeenCalledTimes(1);
      expect(await readRecords()).toEqual(before);
      // ロックは解放されている
      await expect(fs.access(path.join(dataDir, 'pipeline.lock'))).rejects.toThrow();
    });

    it('クォータ超過なら残りを次回に回して正常終了する', async () => {
      await seed(makeRecord('q1'), makeRecord('q2', { updatedAt: '2026-01-02T00:00:00.000Z' }));
      const before = await readRecords();
      source.fetchContent.mockRejectedValue(new QuotaExceededError('readwise', 'rate limited'));

      const report = await createPipeline().run();

      expect(report.halted).toBe('quota');
      expect(source.fetchContent).toHaveBeenCalledTimes(1);
      expect(await readRecords()).toEqual(before);
    });

    it('別の実行がロックを保持していれば開始しない', async () => {
      const holder = new JsonRecordStore(dataDir);
      await holder.open();

      try {
        await expect(createPipeline().run()).rejects.toBeInstanceOf(LockHeldError);
        expect(source.listNew).not.toHaveBeenCalled();
      } finally {
        await holder.close();
      }
    });

    it('前回の実行が残した同じPIDのロックは回収して実行する', async () => {
      await seed(makeRecord('l1'));
      // 再起動したコンテナでは前回と同じPIDになる
      await fs.writeFile(
        path.join(dataDir, 'pipeline.lock'),
        JSON.stringify({ pid: process.pid, token: 'previous-run', acquiredAt: T0.toISOString() })
      );

      await createPipeline().run({ limit: 1 });

      expect((await readRecord('l1'))?.state).toBe('fetched');
      await expect(fs.access(path.join(dataDir, 'pipeline.lock'))).rejects.toThrow();
    });

    it('フィードの書き出しに失敗したらstoredのまま公開を再試行する', async () => {
      await seed(makeRecord('p1', { state: 'downloaded', generationJobId: 'job-p1' }));
      const publishFeed = vi
        .spyOn(publisher, 'publishFeed')
        .mockRejectedValueOnce(new TransientAdapterError('書き込みに失敗しました'));

      const first = await createPipeline().run();
      let record = await readRecord('p1');
      expect(record?.state).toBe('stored');
      expect(record?.publishedAt).toBe(T0.toISOString());
      expect(record?.attempts).toEqual({ publish: 1 });
      expect(first.published).toBe(0);

      clock = minutesFrom(T0, 6);
      const second = await createPipeline().run();
      record = await readRecord('p1');
      expect(record?.state).toBe('published');
      // 公開日時は最初に記録したもの
      expect(record?.publishedAt).toBe(T0.toISOString());
      expect(second.published).toBe(1);
      expect(publishFeed).toHaveBeenCalledTimes(2);
    });
  });

  describe('運用コマンド', () => {
    it('公開URLを変えてフィードを作り直しても、レコードは変わらない', async () => {
      const published = Array.from({ length: 10 }, (_, i) =>
        makeRecord(`p${i}`, {
          state: 'published',
          generationJobId: `job-p${i}`,
          artifactLocation: `episodes/p${i}.mp3`,
          artifactBytes: 2048,
          publishedAt: new Date(Date.UTC(2026, 0, 1 + i)).toISOString(),
        })
      );
      await seed(...published);
      const stateFile = path.join(dataDir, 'pipeline-state.json');
      const before = await fs.readFile(stateFile, 'utf-8');

      const moved = createPublisher(publicDir, 'https://cdn.example.com/podcast/');
      const count = await republishFeed(new JsonRecordStore(dataDir), moved, 1000);

      expect(count).toBe(10);
      const feed = await fs.readFile(path.join(publicDir, 'feed.xml'), 'utf-8');
      for (let i = 0; i < 10; i++) {
        expect(feed).toContain(`url="https://cdn.example.com/podcast/episodes/p${i}.mp3"`);
      }
      expect(feed).not.toContain('podcast.example.com');
      expect(await fs.readFile(stateFile, 'utf-8')).toBe(before);
    });

    it('放棄された記事を放棄前の状態に戻して再処理できる', async () => {
      await seed(
        makeRecord('a1', {
          state: 'abandoned',
          abandonedFrom: 'creating',
          attempts: { fetch: 1, create: 3 },
          lastAttemptAt: T0.toISOString(),
        })
      );

      const reset = await reprocessRecord(new JsonRecordStore(dataDir), 'a1', T0);
      expect(reset.state).toBe('creating');
      expect(reset.attempts).toEqual({ fetch: 1, create: 0 });
      expect(reset.lastAttemptAt).toBeUndefined();

      await createPipeline().run({ limit: 1 });
      expect((await readRecord('a1'))?.state).toBe('generating');
      expect(generator.create).toHaveBeenCalledTimes(1);
    });

    it('公開済みの記事は再処理できない', async () => {
      await seed(
        makeRecord('p1', {
          state: 'published',
          generationJobId: 'job-p1',
          artifactLocation: 'episodes/p1.mp3',
          publishedAt: T0.toISOString(),
        })
      );

      await expect(reprocessRecord(new JsonRecordStore(dataDir), 'p1', T0)).rejects.toThrow(
        '公開済みの記事は再処理できません: p1'
      );
    });
  });
});
