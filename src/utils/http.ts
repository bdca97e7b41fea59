import { QuotaExceededError, SystemicAuthError, TransientAdapterError } from '../errors.js';

// レスポンス本文からエラーメッセージを取り出す（JSONの error / message / detail）
export async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  if (!text) {
    return response.statusText;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null) {
      for (const key of ['error', 'message', 'detail', 'reason'] as const) {
        if (key in parsed) {
          const value: unknown = Reflect.get(parsed, key);
          if (typeof value === 'string' && value.length > 0) {
            return value;
          }
        }
      }
    }
  } catch {
    // JSONでなければ本文をそのまま使う
  }
  return text.slice(0, 200);
}

/**
 * HTTPステータスをエラー分類に対応付ける。
 * 401/403 → 認証失効、429 → クォータ超過、それ以外 → 一時的な失敗。
 */
export async function raiseForStatus(service: string, response: Response): Promise<void> {
  if (response.ok) {
    return;
  }

  const detail = await readErrorDetail(response);
  const message = `HTTP ${response.status}: ${detail}`;

  if (response.status === 401 || response.status === 403) {
    throw new SystemicAuthError(service, `認証に失敗しました (${message})`);
  }
  if (response.status === 429) {
    throw new QuotaExceededError(service, `レート制限に達しました (${message})`);
  }
  throw new TransientAdapterError(`${service}: リクエストに失敗しました (${message})`);
}

// Retry-Afterヘッダーを秒数として解釈（日付形式にも対応）
export function parseRetryAfter(value: string | null, now: Date = new Date()): number | null {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, Math.ceil((date - now.getTime()) / 1000));
}
