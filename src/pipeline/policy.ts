import { QuotaExceededError, RejectedByBackend, SystemicAuthError, errorMessage } from '../errors.js';
import type { ArticleRecord } from '../storage/schema.js';
import { STAGE_FOR_STATE, type Stage } from './states.js';

export interface RetrySettings {
  maxAttempts: Record<Stage, number>;
  backoffBaseSeconds: number;
  backoffMaxSeconds: number;
}

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxAttempts: {
    fetch: 3,
    create: 3,
    generate: 5,
    download: 5,
    store: 5,
    publish: 5,
  },
  backoffBaseSeconds: 300,
  backoffMaxSeconds: 6 * 60 * 60,
};

/**
 * 失敗の分類
 * - systemic: 実行全体を中断（認証失効）
 * - quota: 残りの記事を次回に回す
 * - rejected: 再試行しても結果は同じなので即座に放棄
 * - transient: 試行回数を数えて再試行
 */
export type FailureKind = 'systemic' | 'quota' | 'rejected' | 'transient';

export type FailureOutcome = { action: 'retry'; attempts: number } | { action: 'abandon'; attempts: number };

export class FailurePolicy {
  private settings: RetrySettings;

  constructor(settings: RetrySettings = DEFAULT_RETRY_SETTINGS) {
    this.settings = settings;
  }

  classify(error: unknown): FailureKind {
    if (error instanceof SystemicAuthError) return 'systemic';
    if (error instanceof QuotaExceededError) return 'quota';
    if (error instanceof RejectedByBackend) return 'rejected';
    return 'transient';
  }

  maxAttempts(stage: Stage): number {
    return this.settings.maxAttempts[stage];
  }

  /**
   * 一時的な失敗をレコードに記録する（レコードを直接更新）。
   * 上限に達したらabandonedにする。
   */
  recordFailure(record: ArticleRecord, stage: Stage, error: unknown, now: Date): FailureOutcome {
    const attempts = (record.attempts[stage] ?? 0) + 1;
    record.attempts = { ...record.attempts };
    record.attempts[stage] = attempts;
    record.lastError = `${stage}: ${errorMessage(error)}`;
    record.lastAttemptAt = now.toISOString();
    record.updatedAt = now.toISOString();

    if (attempts >= this.maxAttempts(stage)) {
      abandon(record, `${stage}: 再試行上限(${attempts}回)に達しました: ${errorMessage(error)}`, now);
      return { action: 'abandon', attempts };
    }
    return { action: 'retry', attempts };
  }

  // n回目の失敗後に待つ時間
  backoffDelayMs(attempts: number): number {
    if (attempts <= 0) return 0;
    const seconds = this.settings.backoffBaseSeconds * 2 ** (attempts - 1);
    return Math.min(seconds, this.settings.backoffMaxSeconds) * 1000;
  }

  // 直前の失敗からのバックオフが明けているか
  isDue(record: ArticleRecord, now: Date): boolean {
    const stage = STAGE_FOR_STATE[record.state];
    if (!stage) return false;

    const attempts = record.attempts[stage] ?? 0;
    if (attempts === 0 || !record.lastAttemptAt) return true;

    const last = Date.parse(record.lastAttemptAt);
    if (Number.isNaN(last)) return true;
    return now.getTime() >= last + this.backoffDelayMs(attempts);
  }
}

// 放棄する（試行回数は増やさない）
export function abandon(record: ArticleRecord, reason: string, now: Date): void {
  if (record.state !== 'abandoned') {
    record.abandonedFrom = record.state;
  }
  record.state = 'abandoned';
  record.lastError = reason;
  record.updatedAt = now.toISOString();
}
