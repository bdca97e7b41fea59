import fs from 'fs/promises';
import path from 'path';
import { readFileIfExists, writeFileAtomic } from './atomic.js';

// ファイル名に使えるようにIDをエンコード
export function safeFileName(sourceId: string): string {
  return encodeURIComponent(sourceId).replace(/\./g, '%2E');
}

/**
 * 実行をまたいで保持する作業ファイル（取得した本文・ダウンロードした音声）。
 * 消えていても再取得できるキャッシュとして扱う。
 */
export class WorkDir {
  private contentDir: string;
  private artifactDir: string;

  constructor(rootDir: string) {
    this.contentDir = path.join(rootDir, 'content');
    this.artifactDir = path.join(rootDir, 'artifacts');
  }

  async writeContent(sourceId: string, text: string): Promise<void> {
    await writeFileAtomic(this.contentPath(sourceId), text);
  }

  async readContent(sourceId: string): Promise<string | null> {
    const buffer = await readFileIfExists(this.contentPath(sourceId));
    return buffer ? buffer.toString('utf-8') : null;
  }

  async writeArtifact(sourceId: string, data: Buffer): Promise<void> {
    await writeFileAtomic(this.artifactPath(sourceId), data);
  }

  async readArtifact(sourceId: string): Promise<Buffer | null> {
    return readFileIfExists(this.artifactPath(sourceId));
  }

  // 公開先への保存が済んだら作業ファイルを削除
  async remove(sourceId: string): Promise<void> {
    await fs.rm(this.contentPath(sourceId), { force: true });
    await fs.rm(this.artifactPath(sourceId), { force: true });
  }

  private contentPath(sourceId: string): string {
    return path.join(this.contentDir, `${safeFileName(sourceId)}.txt`);
  }

  private artifactPath(sourceId: string): string {
    return path.join(this.artifactDir, `${safeFileName(sourceId)}.mp3`);
  }
}
