import path from 'path';
import type { Config } from '../config/index.js';
import { QuotaExceededError, RejectedByBackend, errorMessage } from '../errors.js';
import { createGeneratorFromConfig, type GeneratedArtifact, type GenerationAdapter } from '../generators/index.js';
import { createPublisherFromConfig, type PublishAdapter } from '../publishers/index.js';
import { createSourceFromConfig, type ListResult, type SourceAdapter, type SourceArticle } from '../sources/index.js';
import { JsonRecordStore, type RecordStore } from '../storage/record-store.js';
import type { ArticleRecord } from '../storage/schema.js';
import { WorkDir } from '../storage/work-dir.js';
import { configureFfmpeg, convertToMp3, getAudioDuration, isMp3 } from '../utils/audio.js';
import { getLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { FailurePolicy, abandon, type RetrySettings } from './policy.js';
import { STAGE_FOR_STATE, assertTransition, isTerminal } from './states.js';

export interface PipelineSettings {
  limit: number;
  retry: RetrySettings;
  timeouts: {
    sourceMs: number;
    generationMs: number;
    publishMs: number;
  };
  // 生成ジョブの待ち時間の上限
  maxPendingMinutes: number;
  // これより小さい音声は生成失敗とみなす
  minArtifactBytes: number;
  tempDir: string;
}

export interface PipelineDeps {
  store: RecordStore;
  source: SourceAdapter;
  generator: GenerationAdapter;
  publisher: PublishAdapter;
  workDir: WorkDir;
  settings: PipelineSettings;
  now?: () => Date;
}

export interface RunOptions {
  limit?: number;
  // カーソルを使わず、更新日時の新しい順にN件だけ取り込む
  recent?: number;
}

export interface RunReport {
  discovered: number;
  advanced: number;
  retried: number;
  abandoned: number;
  published: number;
  budgetUsed: number;
  // クォータ超過で途中終了した場合
  halted: 'quota' | null;
  feedPublished: boolean;
}

// 1回の実行で行える外部呼び出しの残り回数
class Budget {
  used = 0;
  private limit: number;

  constructor(limit: number) {
    this.limit = limit;
  }

  get remaining(): number {
    return this.limit - this.used;
  }

  take(): void {
    this.used++;
  }
}

// 1ステップの結果。advancedは次のステップに続けてよい
type StepResult =
  | { type: 'advanced'; record: ArticleRecord }
  | { type: 'waiting'; record: ArticleRecord }
  | { type: 'abandoned'; record: ArticleRecord };

// 予算ループの対象外（公開はフィードフェーズで行う）
function isLoopTarget(record: ArticleRecord): boolean {
  return !isTerminal(record.state) && record.state !== 'stored';
}

function compareByUpdatedAt(a: ArticleRecord, b: ArticleRecord): number {
  if (a.updatedAt !== b.updatedAt) {
    return a.updatedAt < b.updatedAt ? -1 : 1;
  }
  return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
}

// 更新日時の新しい順。更新日時のない記事は最後
function compareByRecency(a: SourceArticle, b: SourceArticle): number {
  if (a.updatedAt === b.updatedAt) return 0;
  if (a.updatedAt === undefined) return 1;
  if (b.updatedAt === undefined) return -1;
  return a.updatedAt < b.updatedAt ? 1 : -1;
}

export function newRecord(article: SourceArticle, now: Date): ArticleRecord {
  const timestamp = now.toISOString();
  return {
    sourceId: article.sourceId,
    title: article.title,
    originalUrl: article.url,
    author: article.author,
    summary: article.summary,
    state: 'discovered',
    attempts: {},
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * 記事ごとの状態機械を1回分進めるオーケストレーター。
 * 状態はすべてレコードストアにあり、遷移のたびに即座に保存する。
 */
export class Pipeline {
  private store: RecordStore;
  private source: SourceAdapter;
  private generator: GenerationAdapter;
  private publisher: PublishAdapter;
  private workDir: WorkDir;
  private settings: PipelineSettings;
  private policy: FailurePolicy;
  private now: () => Date;
  private logger = getLogger();

  constructor(deps: PipelineDeps) {
    this.store = deps.store;
    this.source = deps.source;
    this.generator = deps.generator;
    this.publisher = deps.publisher;
    this.workDir = deps.workDir;
    this.settings = deps.settings;
    this.policy = new FailurePolicy(deps.settings.retry);
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * 1回分の実行。ロックを取り、発見・前進・公開の順に処理する。
   * 認証エラー・ストアの破損・ロック競合はそのまま投げる。
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    const limit = options.limit ?? this.settings.limit;
    const report: RunReport = {
      discovered: 0,
      advanced: 0,
      retried: 0,
      abandoned: 0,
      published: 0,
      budgetUsed: 0,
      halted: null,
      feedPublished: false,
    };

    await this.store.open();
    try {
      this.logger.info({ limit, recent: options.recent }, 'パイプライン実行を開始');

      await this.discover(report, options.recent);

      const budget = new Budget(limit);
      try {
        await this.advanceRecords(budget, report);
      } finally {
        report.budgetUsed = budget.used;
      }

      await this.publishPhase(report);

      this.logger.info({ ...report }, 'パイプライン実行が完了しました');
      return report;
    } finally {
      await this.store.close();
    }
  }

  /**
   * 新着記事をレコードにする。一覧の取得に失敗してもカーソルを進めないだけで、
   * 既存レコードの処理は続ける。
   * recentを指定した場合はカーソルを読まず、更新もしない。
   */
  private async discover(report: RunReport, recent?: number): Promise<void> {
    const cursor = recent === undefined ? this.store.getCursor() : null;

    let listed: ListResult;
    try {
      listed = await withTimeout('記事一覧の取得', this.settings.timeouts.sourceMs, (signal) =>
        this.source.listNew(cursor, { signal })
      );
    } catch (error) {
      const kind = this.policy.classify(error);
      if (kind === 'systemic') throw error;
      this.logger.warn(
        { error: errorMessage(error), quota: kind === 'quota' },
        '記事一覧の取得に失敗しました。既存の記事だけ処理します'
      );
      return;
    }

    const articles =
      recent === undefined ? listed.articles : [...listed.articles].sort(compareByRecency).slice(0, recent);

    const now = this.now();
    for (const article of articles) {
      if (this.store.get(article.sourceId)) {
        continue;
      }
      await this.store.upsert(newRecord(article, now));
      report.discovered++;
      this.logger.info({ sourceId: article.sourceId, title: article.title }, '新しい記事を登録しました');
    }

    if (recent === undefined && listed.nextCursor !== cursor) {
      await this.store.setCursor(listed.nextCursor);
    }
  }

  private async advanceRecords(budget: Budget, report: RunReport): Promise<void> {
    const now = this.now();
    const due = this.store
      .loadAll()
      .filter((r) => isLoopTarget(r) && this.policy.isDue(r, now))
      .sort(compareByUpdatedAt);

    this.logger.debug({ due: due.length, budget: budget.remaining }, '処理対象のレコード');

    for (const initial of due) {
      if (budget.remaining <= 0) {
        break;
      }

      let record = initial;
      let moved = false;
      while (budget.remaining > 0 && isLoopTarget(record)) {
        let result: StepResult;
        try {
          result = await this.step(record, budget);
        } catch (error) {
          if (error instanceof QuotaExceededError) {
            this.logger.warn({ sourceId: record.sourceId, error: error.message }, 'クォータ超過。残りは次回に回します');
            report.halted = 'quota';
            if (moved) report.advanced++;
            return;
          }
          result = await this.handleFailure(record, error, report);
        }

        record = result.record;
        if (result.type !== 'advanced') {
          break;
        }
        moved = true;
      }
      if (moved) report.advanced++;
    }
  }

  // ステップの例外をレコードに記録する。認証エラー・クォータ超過は呼び出し元に投げる
  private async handleFailure(record: ArticleRecord, error: unknown, report: RunReport): Promise<StepResult> {
    const kind = this.policy.classify(error);
    if (kind === 'systemic' || kind === 'quota') {
      throw error;
    }

    // ステップ内で保存済みの状態（creating等）を起点にする
    const current = this.store.get(record.sourceId) ?? record;
    const stage = STAGE_FOR_STATE[current.state] ?? 'fetch';
    const next = structuredClone(current);
    const now = this.now();

    if (kind === 'rejected') {
      const reason = error instanceof RejectedByBackend ? error.reason : errorMessage(error);
      abandon(next, `${stage}: ${reason}`, now);
      await this.persist(current, next);
      // 拒否されたジョブは再利用できない
      await this.discardWork(next, { releaseJob: true });
      report.abandoned++;
      this.logger.warn({ sourceId: next.sourceId, stage, reason }, '記事を放棄しました（拒否）');
      return { type: 'abandoned', record: next };
    }

    const outcome = this.policy.recordFailure(next, stage, error, now);
    await this.persist(current, next);

    if (outcome.action === 'abandon') {
      // reprocessで戻せるようにジョブは残す
      await this.discardWork(next, { releaseJob: false });
      report.abandoned++;
      this.logger.error(
        { sourceId: next.sourceId, stage, attempts: outcome.attempts, error: errorMessage(error) },
        '再試行上限に達したため記事を放棄しました'
      );
      return { type: 'abandoned', record: next };
    }

    report.retried++;
    this.logger.warn(
      { sourceId: next.sourceId, stage, attempts: outcome.attempts, error: errorMessage(error) },
      'ステップが失敗しました。次回再試行します'
    );
    return { type: 'waiting', record: next };
  }

  private async step(record: ArticleRecord, budget: Budget): Promise<StepResult> {
    switch (record.state) {
      case 'discovered':
        return this.fetchStep(record, budget);
      case 'fetched':
      case 'creating':
        return this.createStep(record, budget);
      case 'generating':
        return this.pollStep(record, budget);
      case 'generated':
        return this.downloadStep(record, budget);
      case 'downloaded':
        return this.storeStep(record, budget);
      default:
        throw new Error(`前進できない状態です: ${record.state}`);
    }
  }

  // discovered → fetched
  private async fetchStep(record: ArticleRecord, budget: Budget): Promise<StepResult> {
    budget.take();
    const content = await this.fetchContent(record.sourceId);
    await this.workDir.writeContent(record.sourceId, content);

    const next = this.touch(record, { state: 'fetched' });
    await this.persist(record, next);
    this.logger.info({ sourceId: record.sourceId, length: content.length }, '本文を取得しました');
    return { type: 'advanced', record: next };
  }

  // fetched/creating → generating
  private async createStep(record: ArticleRecord, budget: Budget): Promise<StepResult> {
    // 作成済みのジョブがあれば再作成しない（外部呼び出しがないので予算も使わない）
    if (record.state === 'creating' && record.generationJobId) {
      const next = this.touch(record, { state: 'generating' });
      await this.persist(record, next);
      return { type: 'advanced', record: next };
    }

    budget.take();

    let creating = record;
    if (record.state === 'fetched') {
      // 外部のジョブ作成より先に「作成中」を保存する
      creating = this.touch(record, { state: 'creating' });
      await this.persist(record, creating);
    }

    let content = await this.workDir.readContent(record.sourceId);
    if (content === null) {
      this.logger.info({ sourceId: record.sourceId }, '作業ディレクトリに本文がないため再取得します');
      content = await this.fetchContent(record.sourceId);
      await this.workDir.writeContent(record.sourceId, content);
    }

    const body = content;
    const result = await withTimeout('生成ジョブの作成', this.settings.timeouts.generationMs, (signal) =>
      this.generator.create(
        { sourceId: record.sourceId, title: record.title, author: record.author, content: body },
        { signal }
      )
    );

    if (result.status === 'rejected') {
      throw new RejectedByBackend(result.reason);
    }

    const now = this.now();
    const next = this.touch(creating, {
      state: 'generating',
      generationJobId: result.jobId,
      generationStartedAt: now.toISOString(),
    });
    await this.persist(creating, next);
    this.logger.info({ sourceId: record.sourceId, jobId: result.jobId }, '生成ジョブを作成しました');
    return { type: 'advanced', record: next };
  }

  // generating → generated
  private async pollStep(record: ArticleRecord, budget: Budget): Promise<StepResult> {
    const jobId = this.requireJobId(record);
    const now = this.now();

    const startedAt = record.generationStartedAt ? Date.parse(record.generationStartedAt) : Number.NaN;
    if (!Number.isNaN(startedAt) && now.getTime() - startedAt > this.settings.maxPendingMinutes * 60 * 1000) {
      throw new RejectedByBackend(`生成ジョブが${this.settings.maxPendingMinutes}分以内に完了しませんでした`);
    }

    budget.take();
    const status = await withTimeout('生成ジョブの確認', this.settings.timeouts.generationMs, (signal) =>
      this.generator.poll(jobId, { signal })
    );

    switch (status.status) {
      case 'ready': {
        const next = this.touch(record, { state: 'generated' });
        await this.persist(record, next);
        this.logger.info({ sourceId: record.sourceId, jobId }, '音声生成が完了しました');
        return { type: 'advanced', record: next };
      }
      case 'failed':
        throw new RejectedByBackend(`生成ジョブが失敗しました: ${status.reason}`);
      case 'pending': {
        // 更新日時を進めて、次回は後回しにする
        const next = this.touch(record, {});
        await this.persist(record, next);
        this.logger.debug({ sourceId: record.sourceId, jobId }, '音声はまだ生成中です');
        return { type: 'waiting', record: next };
      }
    }
  }

  // generated → downloaded
  private async downloadStep(record: ArticleRecord, budget: Budget): Promise<StepResult> {
    budget.take();
    const data = await this.downloadArtifact(record);
    await this.workDir.writeArtifact(record.sourceId, data);

    const next = this.touch(record, {
      state: 'downloaded',
      artifactBytes: data.length,
      durationSeconds: await this.measureDuration(record.sourceId, data),
    });
    await this.persist(record, next);
    this.logger.info({ sourceId: record.sourceId, size: data.length }, '音声をダウンロードしました');
    return { type: 'advanced', record: next };
  }

  // downloaded → stored
  private async storeStep(record: ArticleRecord, budget: Budget): Promise<StepResult> {
    budget.take();

    let data = await this.workDir.readArtifact(record.sourceId);
    if (data === null) {
      this.logger.info({ sourceId: record.sourceId }, '作業ディレクトリに音声がないため再ダウンロードします');
      data = await this.downloadArtifact(record);
    }

    const artifact = data;
    const location = await withTimeout('音声の保存', this.settings.timeouts.publishMs, (signal) =>
      this.publisher.store(artifact, record.sourceId, { signal })
    );

    const next = this.touch(record, {
      state: 'stored',
      artifactLocation: location,
      artifactBytes: artifact.length,
    });
    await this.persist(record, next);

    await this.releaseJob(next);
    await this.workDir.remove(record.sourceId);
    return { type: 'advanced', record: next };
  }

  /**
   * 保存済みの記事を公開済みと合わせてフィードに書き出す。
   * フィードは差分ではなく毎回全件から作り直す。
   */
  private async publishPhase(report: RunReport): Promise<void> {
    const now = this.now();
    const all = this.store.loadAll();
    const pending = all.filter((r) => r.state === 'stored' && this.policy.isDue(r, now));
    if (pending.length === 0) {
      return;
    }

    // 公開日時を先に保存しておく（書き出し後に落ちても日時が変わらない）
    const stamped: ArticleRecord[] = [];
    for (const record of pending) {
      if (record.publishedAt) {
        stamped.push(record);
        continue;
      }
      const next = { ...structuredClone(record), publishedAt: now.toISOString() };
      await this.store.upsert(next);
      stamped.push(next);
    }

    const published = all.filter((r) => r.state === 'published');
    try {
      await withTimeout('フィードの公開', this.settings.timeouts.publishMs, (signal) =>
        this.publisher.publishFeed([...published, ...stamped], { signal })
      );
    } catch (error) {
      if (this.policy.classify(error) === 'systemic') throw error;

      for (const record of stamped) {
        const next = structuredClone(record);
        const outcome = this.policy.recordFailure(next, 'publish', error, this.now());
        await this.persist(record, next);
        if (outcome.action === 'abandon') report.abandoned++;
        else report.retried++;
      }
      this.logger.warn({ count: stamped.length, error: errorMessage(error) }, 'フィードの公開に失敗しました');
      return;
    }

    report.feedPublished = true;
    for (const record of stamped) {
      const next = this.touch(record, { state: 'published' });
      await this.persist(record, next);
      report.published++;
    }
    this.logger.info({ published: stamped.length, total: published.length + stamped.length }, 'エピソードを公開しました');
  }

  private async fetchContent(sourceId: string): Promise<string> {
    return withTimeout('本文の取得', this.settings.timeouts.sourceMs, (signal) =>
      this.source.fetchContent(sourceId, { signal })
    );
  }

  private async downloadArtifact(record: ArticleRecord): Promise<Buffer> {
    const jobId = this.requireJobId(record);
    const artifact: GeneratedArtifact = await withTimeout(
      '生成音声のダウンロード',
      this.settings.timeouts.generationMs,
      (signal) => this.generator.download(jobId, { signal })
    );

    let data = artifact.data;
    if (!isMp3(artifact.contentType)) {
      this.logger.debug({ sourceId: record.sourceId, contentType: artifact.contentType }, 'MP3に変換します');
      data = await convertToMp3(data, artifact.contentType, this.settings.tempDir);
    }

    if (data.length < this.settings.minArtifactBytes) {
      throw new RejectedByBackend(
        `生成された音声が小さすぎます (${data.length}バイト < ${this.settings.minArtifactBytes}バイト)`
      );
    }
    return data;
  }

  private async measureDuration(sourceId: string, data: Buffer): Promise<number | undefined> {
    try {
      return await getAudioDuration(data);
    } catch (error) {
      this.logger.debug({ sourceId, error: errorMessage(error) }, '再生時間を取得できませんでした');
      return undefined;
    }
  }

  // 生成ジョブの後片付け。失敗しても記事の処理には影響させない
  private async releaseJob(record: ArticleRecord): Promise<void> {
    const release = this.generator.release?.bind(this.generator);
    const jobId = record.generationJobId;
    if (!release || !jobId) {
      return;
    }
    try {
      await withTimeout('生成ジョブの削除', this.settings.timeouts.generationMs, (signal) =>
        release(jobId, { signal })
      );
    } catch (error) {
      this.logger.warn({ sourceId: record.sourceId, jobId, error: errorMessage(error) }, '生成ジョブを削除できませんでした');
    }
  }

  private async discardWork(record: ArticleRecord, options: { releaseJob: boolean }): Promise<void> {
    if (options.releaseJob) {
      await this.releaseJob(record);
    }
    try {
      await this.workDir.remove(record.sourceId);
    } catch (error) {
      this.logger.warn({ sourceId: record.sourceId, error: errorMessage(error) }, '作業ファイルを削除できませんでした');
    }
  }

  private requireJobId(record: ArticleRecord): string {
    if (!record.generationJobId) {
      throw new Error(`generationJobIdがありません: ${record.sourceId}`);
    }
    return record.generationJobId;
  }

  // 外部呼び出しを伴う更新。updatedAtとlastAttemptAtを進める
  private touch(record: ArticleRecord, changes: Partial<ArticleRecord>): ArticleRecord {
    const timestamp = this.now().toISOString();
    return { ...structuredClone(record), ...changes, updatedAt: timestamp, lastAttemptAt: timestamp };
  }

  private async persist(before: ArticleRecord, after: ArticleRecord): Promise<void> {
    if (before.state !== after.state) {
      assertTransition(before, after);
    }
    await this.store.upsert(after);
  }
}

export function pipelineSettingsFromConfig(config: Config): PipelineSettings {
  return {
    limit: config.pipeline.limit,
    retry: {
      maxAttempts: config.pipeline.retry.maxAttempts,
      backoffBaseSeconds: config.pipeline.retry.backoffBaseSeconds,
      backoffMaxSeconds: config.pipeline.retry.backoffMaxSeconds,
    },
    timeouts: {
      sourceMs: config.pipeline.timeouts.sourceSeconds * 1000,
      generationMs: config.pipeline.timeouts.generationSeconds * 1000,
      publishMs: config.pipeline.timeouts.publishSeconds * 1000,
    },
    maxPendingMinutes: config.generation.maxPendingMinutes,
    minArtifactBytes: config.generation.minArtifactBytes,
    tempDir: path.join(config.storage.workDir, 'tmp'),
  };
}

// 設定からパイプラインを組み立てる（各アダプタの認証情報もここで確認される）
export function createPipeline(config: Config): Pipeline {
  configureFfmpeg(config.generation.ffmpegPath);
  return new Pipeline({
    store: new JsonRecordStore(config.storage.dataDir),
    source: createSourceFromConfig(config),
    generator: createGeneratorFromConfig(config),
    publisher: createPublisherFromConfig(config),
    workDir: new WorkDir(config.storage.workDir),
    settings: pipelineSettingsFromConfig(config),
  });
}

export {
  readStatus,
  reprocessRecord,
  republishFeed,
  seedCursor,
  summarizeRecords,
  type StatusSummary,
} from './maintenance.js';
export { FailurePolicy, DEFAULT_RETRY_SETTINGS, type RetrySettings } from './policy.js';
export { Scheduler, type SchedulerConfig } from './scheduler.js';
