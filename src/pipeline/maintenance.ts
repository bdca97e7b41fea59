import type { PublishAdapter } from '../publishers/index.js';
import type { RecordStore } from '../storage/record-store.js';
import type { ArticleRecord } from '../storage/schema.js';
import { getLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { STAGE_FOR_STATE, type PipelineState } from './states.js';

export interface StatusSummary {
  total: number;
  cursor: string | null;
  byState: Record<PipelineState, number>;
  abandoned: { sourceId: string; title: string; abandonedFrom?: PipelineState; lastError?: string }[];
}

export function summarizeRecords(records: ArticleRecord[], cursor: string | null): StatusSummary {
  const byState: Record<PipelineState, number> = {
    discovered: 0,
    fetched: 0,
    creating: 0,
    generating: 0,
    generated: 0,
    downloaded: 0,
    stored: 0,
    published: 0,
    abandoned: 0,
  };
  for (const record of records) {
    byState[record.state]++;
  }

  return {
    total: records.length,
    cursor,
    byState,
    abandoned: records
      .filter((r) => r.state === 'abandoned')
      .map((r) => ({
        sourceId: r.sourceId,
        title: r.title,
        abandonedFrom: r.abandonedFrom,
        lastError: r.lastError,
      })),
  };
}

// 読み取り専用で開いて状態を集計する
export async function readStatus(store: RecordStore): Promise<StatusSummary> {
  await store.open({ readOnly: true });
  try {
    return summarizeRecords(store.loadAll(), store.getCursor());
  } finally {
    await store.close();
  }
}

/**
 * 公開済みレコードからフィードを作り直して書き出す。
 * レコードは一切変更しない（公開URLの設定を直した後などに使う）。
 */
export async function republishFeed(
  store: RecordStore,
  publisher: PublishAdapter,
  timeoutMs: number
): Promise<number> {
  await store.open({ readOnly: true });
  let published: ArticleRecord[];
  try {
    published = store.loadAll().filter((r) => r.state === 'published');
  } finally {
    await store.close();
  }

  await withTimeout('フィードの公開', timeoutMs, (signal) => publisher.publishFeed(published, { signal }));
  getLogger().info({ episodes: published.length }, 'フィードを再生成しました');
  return published.length;
}

// 未処理の過去記事をスキップするため、カーソルを現在時刻にする
export async function seedCursor(store: RecordStore, now: Date = new Date()): Promise<string> {
  await store.open();
  try {
    const cursor = now.toISOString();
    await store.setCursor(cursor);
    getLogger().info({ cursor }, 'カーソルを初期化しました');
    return cursor;
  } finally {
    await store.close();
  }
}

/**
 * 運用者による再処理。
 * 放棄された記事は放棄前の状態に戻し、そのステージの試行回数をリセットする。
 * 処理中の記事はバックオフを解除して次回の実行で対象にする。
 */
export async function reprocessRecord(
  store: RecordStore,
  sourceId: string,
  now: Date = new Date()
): Promise<ArticleRecord> {
  await store.open();
  try {
    const record = store.get(sourceId);
    if (!record) {
      throw new Error(`レコードが見つかりません: ${sourceId}`);
    }
    if (record.state === 'published') {
      throw new Error(`公開済みの記事は再処理できません: ${sourceId}`);
    }

    const next: ArticleRecord = { ...record, lastAttemptAt: undefined, updatedAt: now.toISOString() };

    if (record.state === 'abandoned') {
      const resumeState = record.abandonedFrom;
      if (!resumeState) {
        throw new Error(`放棄前の状態が記録されていません: ${sourceId}`);
      }
      next.state = resumeState;
      next.abandonedFrom = undefined;

      const stage = STAGE_FOR_STATE[resumeState];
      if (stage) {
        const attempts = { ...record.attempts };
        attempts[stage] = 0;
        next.attempts = attempts;
      }
      if (resumeState === 'generating') {
        // 待ち時間の上限を数え直す
        next.generationStartedAt = now.toISOString();
      }
    }

    await store.upsert(next);
    getLogger().info({ sourceId, from: record.state, to: next.state }, '記事を再処理対象にしました');
    return next;
  } finally {
    await store.close();
  }
}
