import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { WorkDir, safeFileName } from './work-dir.js';

describe('WorkDir', () => {
  let tempDir: string;
  let workDir: WorkDir;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'readcast-work-'));
    workDir = new WorkDir(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('本文と音声を保存して読み戻せる', async () => {
    await workDir.writeContent('a1', '本文です。');
    await workDir.writeArtifact('a1', Buffer.from([1, 2, 3]));

    expect(await workDir.readContent('a1')).toBe('本文です。');
    expect([...((await workDir.readArtifact('a1')) ?? [])]).toEqual([1, 2, 3]);
  });

  it('存在しなければnull', async () => {
    expect(await workDir.readContent('missing')).toBeNull();
    expect(await workDir.readArtifact('missing')).toBeNull();
  });

  it('removeで作業ファイルを消す', async () => {
    await workDir.writeContent('a1', '本文です。');
    await workDir.writeArtifact('a1', Buffer.from([1]));

    await workDir.remove('a1');

    expect(await workDir.readContent('a1')).toBeNull();
    expect(await workDir.readArtifact('a1')).toBeNull();
  });

  it('ファイルがなくてもremoveは失敗しない', async () => {
    await expect(workDir.remove('missing')).resolves.toBeUndefined();
  });
});

describe('safeFileName', () => {
  it('パス区切りやドットをエンコードする', () => {
    expect(safeFileName('../a/b.c')).toBe('%2E%2E%2Fa%2Fb%2Ec');
  });
});
