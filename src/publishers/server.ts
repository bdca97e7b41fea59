import express, { type Express } from 'express';
import type { StatusSummary } from '../pipeline/index.js';
import { getLogger } from '../utils/logger.js';

export interface ServerConfig {
  publicDir: string;
  feedKey: string;
  status?: () => Promise<StatusSummary>;
}

/**
 * ローカル公開ディレクトリの配信サーバー。
 * フィードと音声は公開ディレクトリの相対パスそのままで配信する。
 */
export function createServer(config: ServerConfig): Express {
  const app = express();
  const logger = getLogger();

  // ヘルスチェックエンドポイント
  app.get('/health', (_req, res) => {
    res.status(200).send('OK');
  });

  // ステータスエンドポイント
  app.get('/status', async (_req, res) => {
    if (!config.status) {
      res.json({ healthy: true });
      return;
    }

    try {
      res.json({ healthy: true, ...(await config.status()) });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ error: message }, 'ステータス取得エラー');
      res.status(500).json({ error: message });
    }
  });

  app.get(`/${config.feedKey}`, (_req, res, next) => {
    res.type('application/rss+xml');
    logger.debug('RSSフィードへのアクセス');
    next();
  });

  app.use(express.static(config.publicDir, { index: false }));

  return app;
}

export function startServer(app: Express, port: number): Promise<void> {
  const logger = getLogger();

  return new Promise((resolve) => {
    app.listen(port, () => {
      logger.info({ port }, `サーバーが起動しました: http://localhost:${port}`);
      resolve();
    });
  });
}
