import { TransientAdapterError } from '../errors.js';

// 外部呼び出しのオプション
export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * 外部呼び出しに上限時間を設ける。
 * 時間切れになったらsignalをabortし、TransientAdapterErrorで失敗させる。
 * signalを無視するアダプタでも呼び出し側は待たされない。
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientAdapterError(`${label}が${timeoutMs}msでタイムアウトしました`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
