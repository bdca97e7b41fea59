import path from 'path';
import type { PublishTarget } from './index.js';
import { writeFileAtomic } from '../storage/atomic.js';

// ローカルディレクトリに公開する（serveコマンドで配信）
export class LocalTarget implements PublishTarget {
  name = 'local';

  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async putObject(key: string, body: Buffer): Promise<void> {
    await writeFileAtomic(this.resolveKey(key), body);
  }

  resolveKey(key: string): string {
    const filePath = path.resolve(this.rootDir, key);
    if (!filePath.startsWith(this.rootDir + path.sep)) {
      throw new Error(`公開ディレクトリの外には書き込めません: ${key}`);
    }
    return filePath;
  }
}
