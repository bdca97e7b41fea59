// パイプライン全体で使うエラー分類

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ネットワーク障害・タイムアウト・5xxなど、再試行すれば回復しうる失敗
export class TransientAdapterError extends PipelineError {}

// バックエンドが内容を拒否した（本文が短すぎる等）。再試行しない
export class RejectedByBackend extends PipelineError {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`バックエンドに拒否されました: ${reason}`, options);
    this.reason = reason;
  }
}

// 認証・セッションの失効。実行全体を即座に中断する
export class SystemicAuthError extends PipelineError {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(`${service}: ${message}`, options);
    this.service = service;
  }
}

// レート制限・クォータ超過。残りの記事は次回の実行に回す
export class QuotaExceededError extends PipelineError {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(`${service}: ${message}`, options);
    this.service = service;
  }
}

// 状態ファイルが読めない・壊れている。重複生成を避けるため処理を進めない
export class StoreCorruption extends PipelineError {}

// 別のインスタンスがロックを保持している
export class LockHeldError extends PipelineError {
  readonly holderPid?: number;

  constructor(message: string, holderPid?: number) {
    super(message);
    this.holderPid = holderPid;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
