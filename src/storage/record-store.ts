import fs from 'fs/promises';
import path from 'path';
import { StoreCorruption } from '../errors.js';
import { getLogger } from '../utils/logger.js';
import { readFileIfExists, writeFileAtomic } from './atomic.js';
import { FileLock } from './lock.js';
import {
  articleRecordSchema,
  emptyDocument,
  storeDocumentSchema,
  type ArticleRecord,
  type StoreDocument,
} from './schema.js';

export const STATE_FILE_NAME = 'pipeline-state.json';
export const LOCK_FILE_NAME = 'pipeline.lock';

export interface OpenOptions {
  // ロックを取らずに読み込む（status等）。書き込みは拒否される
  readOnly?: boolean;
}

// レコードストアの契約
export interface RecordStore {
  open(options?: OpenOptions): Promise<void>;
  close(): Promise<void>;
  loadAll(): ArticleRecord[];
  get(sourceId: string): ArticleRecord | undefined;
  upsert(record: ArticleRecord): Promise<void>;
  getCursor(): string | null;
  setCursor(cursor: string | null): Promise<void>;
}

function compareRecords(a: ArticleRecord, b: ArticleRecord): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
}

/**
 * 1つのJSONドキュメントに全レコードとカーソルを保存するストア。
 * 書き込みのたびにドキュメント全体を原子的に置き換える。
 */
export class JsonRecordStore implements RecordStore {
  private filePath: string;
  private lock: FileLock;
  private doc: StoreDocument | null = null;
  private readOnly = false;
  private logger = getLogger();

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, STATE_FILE_NAME);
    this.lock = new FileLock(path.join(dataDir, LOCK_FILE_NAME));
  }

  async open(options: OpenOptions = {}): Promise<void> {
    this.readOnly = options.readOnly ?? false;

    if (!this.readOnly) {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await this.lock.acquire();
    }

    let doc: StoreDocument;
    try {
      doc = await this.readDocument();
    } catch (error) {
      await this.lock.release();
      throw error;
    }
    this.doc = doc;

    this.logger.debug(
      { path: this.filePath, count: Object.keys(doc.records).length, readOnly: this.readOnly },
      'レコードストアを読み込みました'
    );
  }

  async close(): Promise<void> {
    this.doc = null;
    await this.lock.release();
  }

  loadAll(): ArticleRecord[] {
    const doc = this.requireDocument();
    return Object.values(doc.records)
      .map((record) => structuredClone(record))
      .sort(compareRecords);
  }

  get(sourceId: string): ArticleRecord | undefined {
    const record = this.requireDocument().records[sourceId];
    return record ? structuredClone(record) : undefined;
  }

  async upsert(record: ArticleRecord): Promise<void> {
    const doc = this.requireWritableDocument();
    const validated = articleRecordSchema.parse(record);

    const next: StoreDocument = {
      ...doc,
      records: { ...doc.records, [validated.sourceId]: validated },
    };
    await this.writeDocument(next);
  }

  getCursor(): string | null {
    return this.requireDocument().cursor;
  }

  async setCursor(cursor: string | null): Promise<void> {
    const doc = this.requireWritableDocument();
    await this.writeDocument({ ...doc, cursor });
    this.logger.debug({ cursor }, 'カーソルを更新しました');
  }

  private async writeDocument(next: StoreDocument): Promise<void> {
    // ロックを失っていれば書き込まない
    await this.lock.assertHeld();
    await writeFileAtomic(this.filePath, JSON.stringify(next, null, 2));
    // 書き込みが完了してからメモリ上の状態を差し替える
    this.doc = next;
  }

  private async readDocument(): Promise<StoreDocument> {
    const content = await readFileIfExists(this.filePath);
    if (content === null) {
      this.logger.debug({ path: this.filePath }, '状態ファイルが存在しないため、新規作成');
      return emptyDocument();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content.toString('utf-8'));
    } catch (error) {
      throw new StoreCorruption(`状態ファイルをJSONとして読めません: ${this.filePath}`, { cause: error });
    }

    const result = storeDocumentSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown';
      throw new StoreCorruption(`状態ファイルの形式が不正です (${where}): ${this.filePath}`, {
        cause: result.error,
      });
    }

    for (const [key, record] of Object.entries(result.data.records)) {
      if (key !== record.sourceId) {
        throw new StoreCorruption(`レコードのキーとsourceIdが一致しません: ${key} != ${record.sourceId}`);
      }
    }

    return result.data;
  }

  private requireDocument(): StoreDocument {
    if (!this.doc) {
      throw new Error('レコードストアが開かれていません');
    }
    return this.doc;
  }

  private requireWritableDocument(): StoreDocument {
    const doc = this.requireDocument();
    if (this.readOnly) {
      throw new Error('読み取り専用で開いたストアには書き込めません');
    }
    return doc;
  }
}
