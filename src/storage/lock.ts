import fs, { type FileHandle } from 'fs/promises';
import { randomUUID } from 'crypto';
import { LockHeldError } from '../errors.js';
import { getLogger } from '../utils/logger.js';

interface LockHolder {
  pid: number;
  token?: string;
  acquiredAt: string;
}

export interface FileLockOptions {
  // 保持者はこの間隔の数分の一ごとにmtimeを更新する。更新が途絶えたロックは回収する
  staleMs?: number;
}

const DEFAULT_STALE_MS = 5 * 60 * 1000;

// このプロセス内で保持中のロックのトークン
const heldTokens = new Set<string>();

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: 存在するが権限がない
    return (error as NodeJS.ErrnoException).code === 'EPERM';
  }
}

function parseHolder(content: string): LockHolder | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'pid' in parsed &&
      typeof parsed.pid === 'number' &&
      'acquiredAt' in parsed &&
      typeof parsed.acquiredAt === 'string'
    ) {
      const token = 'token' in parsed && typeof parsed.token === 'string' ? parsed.token : undefined;
      return { pid: parsed.pid, token, acquiredAt: parsed.acquiredAt };
    }
  } catch {
    // 壊れたロックファイルは保持者なしとして扱う
  }
  return null;
}

function isStale(holder: LockHolder | null, ageMs: number, staleMs: number): boolean {
  if (!holder || ageMs > staleMs) {
    return true;
  }
  if (holder.pid === process.pid) {
    // コンテナではPIDが再起動後も同じになる。トークンで判定する
    return holder.token === undefined || !heldTokens.has(holder.token);
  }
  return !isProcessAlive(holder.pid);
}

function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && (error as NodeJS.ErrnoException).code === code;
}

interface LockSnapshot {
  content: string;
  holder: LockHolder | null;
  ageMs: number;
}

/**
 * 単一ライター用のロックファイル。
 *
 * 一時ファイルに保持者を書いてからlinkで置くので、ロックファイルは常に完全な内容を持つ。
 * 古いロックはrenameで退避し、退避した内容が判定したものと同じ場合だけ回収する。
 * 競合して新しいロックを退避してしまったら元に戻して諦める。
 */
export class FileLock {
  private lockPath: string;
  private staleMs: number;
  private token: string | null = null;
  private heartbeat: NodeJS.Timeout | null = null;
  private logger = getLogger();

  constructor(lockPath: string, options: FileLockOptions = {}) {
    this.lockPath = lockPath;
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
  }

  async acquire(): Promise<void> {
    if (this.token) {
      throw new LockHeldError(`ロックは既に取得済みです: ${this.lockPath}`, process.pid);
    }

    const token = randomUUID();
    const holder: LockHolder = { pid: process.pid, token, acquiredAt: new Date().toISOString() };
    const tempPath = `${this.lockPath}.${token}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(holder));

    // link直後に同じプロセスの別インスタンスが読んでも保持中と判定されるよう先に登録する
    heldTokens.add(token);
    try {
      for (let attempt = 0; attempt < 3; attempt++) {
        try {
          await fs.link(tempPath, this.lockPath);
          this.token = token;
          this.startHeartbeat();
          this.logger.debug({ path: this.lockPath }, 'ロックを取得しました');
          return;
        } catch (error) {
          if (!isErrorCode(error, 'EEXIST')) {
            throw error;
          }
        }

        const current = await this.snapshot();
        if (!current) {
          // 読む前に解放された
          continue;
        }
        if (!isStale(current.holder, current.ageMs, this.staleMs)) {
          const pid = current.holder?.pid;
          throw new LockHeldError(
            `別のインスタンスが実行中です (pid=${pid}, since=${current.holder?.acquiredAt})`,
            pid
          );
        }

        this.logger.warn({ path: this.lockPath, holder: current.holder }, '古いロックファイルを回収します');
        if (!(await this.evict(current.content))) {
          throw new LockHeldError(`ロックの回収中に別のインスタンスが取得しました: ${this.lockPath}`);
        }
      }

      throw new LockHeldError(`ロックを取得できませんでした: ${this.lockPath}`);
    } catch (error) {
      heldTokens.delete(token);
      throw error;
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  /**
   * ロックファイルがまだ自分のものか確かめる。
   * 停止していた間に回収されていれば LockHeldError。
   */
  async assertHeld(): Promise<void> {
    if (!this.token) {
      throw new LockHeldError(`ロックを保持していません: ${this.lockPath}`);
    }
    const current = await this.snapshot();
    if (current?.holder?.token !== this.token) {
      throw new LockHeldError(`ロックが別のインスタンスに奪われました: ${this.lockPath}`, current?.holder?.pid);
    }
  }

  async release(): Promise<void> {
    const token = this.token;
    if (!token) {
      return;
    }
    this.stopHeartbeat();
    this.token = null;
    heldTokens.delete(token);

    const current = await this.snapshot();
    if (current?.holder?.token === token) {
      await fs.rm(this.lockPath, { force: true });
      this.logger.debug({ path: this.lockPath }, 'ロックを解放しました');
    } else {
      this.logger.warn({ path: this.lockPath }, 'ロックは既に別のインスタンスのものになっています');
    }
  }

  private async snapshot(): Promise<LockSnapshot | null> {
    let handle: FileHandle;
    try {
      handle = await fs.open(this.lockPath, 'r');
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
    try {
      const stat = await handle.stat();
      const content = await handle.readFile('utf-8');
      return { content, holder: parseHolder(content), ageMs: Date.now() - stat.mtimeMs };
    } finally {
      await handle.close();
    }
  }

  // 退避できた（または既に消えていた）ら true
  private async evict(expected: string): Promise<boolean> {
    const gravePath = `${this.lockPath}.${randomUUID()}.stale`;
    try {
      await fs.rename(this.lockPath, gravePath);
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        return true;
      }
      throw error;
    }

    try {
      const moved = await fs.readFile(gravePath, 'utf-8');
      if (moved === expected) {
        return true;
      }
      try {
        await fs.link(gravePath, this.lockPath);
      } catch (error) {
        if (!isErrorCode(error, 'EEXIST')) {
          throw error;
        }
        // 戻す前に別のインスタンスが取得した。奪われた側は書き込み前の確認で気づく
      }
      return false;
    } finally {
      await fs.rm(gravePath, { force: true });
    }
  }

  private startHeartbeat(): void {
    const interval = Math.max(1000, Math.floor(this.staleMs / 5));
    this.heartbeat = setInterval(() => {
      const now = new Date();
      void fs.utimes(this.lockPath, now, now).catch((error: unknown) => {
        this.logger.warn({ err: error, path: this.lockPath }, 'ロックファイルの更新に失敗しました');
      });
    }, interval);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }
}
