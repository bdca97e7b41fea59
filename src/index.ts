#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type Config } from './config/index.js';
import { LockHeldError, QuotaExceededError, StoreCorruption, SystemicAuthError, errorMessage } from './errors.js';
import {
  Scheduler,
  createPipeline,
  readStatus,
  reprocessRecord,
  republishFeed,
  seedCursor,
  type RunOptions,
} from './pipeline/index.js';
import { createPublisherFromConfig, createServer, startServer } from './publishers/index.js';
import { JsonRecordStore } from './storage/record-store.js';
import { createLogger, getLogger } from './utils/logger.js';

const COMMANDS = ['run', 'init', 'render-feed', 'reprocess', 'status', 'batch', 'serve'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseCount(args: string[], flag: string): number | undefined {
  const value = args.find((a) => a.startsWith(`${flag}=`))?.split('=')[1];
  if (value === undefined) return undefined;
  const count = parseInt(value, 10);
  if (!Number.isInteger(count) || count <= 0) {
    throw new Error(`${flag}には正の整数を指定してください: ${value}`);
  }
  return count;
}

function usage(): string {
  return [
    'Usage: readcast <command> [--config=path] [--limit=N] [--recent=N]',
    '',
    'Commands:',
    '  run                 1回実行する（デフォルト）',
    '                      --recent=N でカーソルを使わず最新N件だけ取り込む',
    '  init                カーソルを現在時刻にして過去の記事をスキップする',
    '  render-feed         公開済みの記事からフィードを作り直す',
    '  reprocess <id>      記事を再処理の対象に戻す',
    '  status              状態ごとの件数と放棄された記事を表示する',
    '  batch               スケジュールに従って繰り返し実行する',
    '  serve               ローカルの公開ディレクトリを配信する',
  ].join('\n');
}

async function runCommand(command: Command, config: Config, positional: string[], options: RunOptions): Promise<number> {
  const logger = getLogger();
  const store = new JsonRecordStore(config.storage.dataDir);

  switch (command) {
    case 'run': {
      const pipeline = createPipeline(config);
      const report = await pipeline.run(options);
      console.log(
        JSON.stringify({
          discovered: report.discovered,
          advanced: report.advanced,
          retried: report.retried,
          abandoned: report.abandoned,
          published: report.published,
        })
      );
      return 0;
    }

    case 'init': {
      const cursor = await seedCursor(store);
      console.log(`cursor: ${cursor}`);
      return 0;
    }

    case 'render-feed': {
      const publisher = createPublisherFromConfig(config);
      const count = await republishFeed(store, publisher, config.pipeline.timeouts.publishSeconds * 1000);
      console.log(`episodes: ${count}`);
      return 0;
    }

    case 'reprocess': {
      const sourceId = positional[0];
      if (!sourceId) {
        console.error('reprocessには記事のIDを指定してください');
        return 2;
      }
      const record = await reprocessRecord(store, sourceId);
      console.log(`${record.sourceId}: ${record.state}`);
      return 0;
    }

    case 'status': {
      const summary = await readStatus(store);
      console.log(JSON.stringify(summary, null, 2));
      return 0;
    }

    case 'batch': {
      const pipeline = createPipeline(config);
      const scheduler = new Scheduler(pipeline, {
        cron: config.schedule.cron,
        timezone: config.schedule.timezone,
        limit: options.limit,
      });
      scheduler.start();

      // シグナルハンドリング
      const shutdown = () => {
        logger.info('シャットダウンを開始します');
        scheduler.stop();
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      // 起動時に1回実行するオプション
      if (process.argv.includes('--run-now')) {
        logger.info('起動時に即座に実行します');
        await scheduler.runOnce();
      }
      return -1;
    }

    case 'serve': {
      if (config.publish.target !== 'local') {
        console.error('serveは公開先がlocalの場合のみ使えます');
        return 2;
      }
      const app = createServer({
        publicDir: config.publish.local.dir,
        feedKey: config.publish.feedKey,
        status: () => readStatus(new JsonRecordStore(config.storage.dataDir)),
      });
      await startServer(app, config.server.port);
      logger.info(`RSSフィード: http://localhost:${config.server.port}/${config.publish.feedKey}`);
      return -1;
    }
  }
}

async function main(): Promise<void> {
  // コマンドライン引数を解析
  const args = process.argv.slice(2);
  const configPath = args.find((a) => a.startsWith('--config='))?.split('=')[1];
  const options: RunOptions = { limit: parseCount(args, '--limit'), recent: parseCount(args, '--recent') };
  const positional = args.filter((a) => !a.startsWith('--'));

  if (args.includes('--help') || args.includes('-h')) {
    console.log(usage());
    return;
  }

  const name = positional.shift() ?? 'run';
  if (!isCommand(name)) {
    console.error(`不明なコマンドです: ${name}\n\n${usage()}`);
    process.exit(2);
  }

  // 設定を読み込み
  const config = loadConfig(configPath);

  // ロガーを初期化
  createLogger({ level: config.logging.level, pretty: config.logging.pretty });
  const logger = getLogger();
  logger.debug({ command: name }, 'readcastを起動します');

  try {
    const code = await runCommand(name, config, positional, options);
    // 常駐するコマンドは-1を返す
    if (code >= 0) {
      process.exitCode = code;
    }
  } catch (error) {
    if (error instanceof QuotaExceededError) {
      logger.warn({ error: error.message }, 'クォータ超過のため終了します');
      return;
    }
    if (error instanceof SystemicAuthError) {
      logger.fatal({ service: error.service, error: error.message }, '認証エラーのため実行を中断しました');
    } else if (error instanceof StoreCorruption) {
      logger.fatal({ error: error.message }, '状態ファイルが壊れているため処理を中止しました');
    } else if (error instanceof LockHeldError) {
      logger.fatal({ pid: error.holderPid, error: error.message }, '別の実行が進行中です');
    } else {
      logger.fatal({ error: errorMessage(error) }, '実行に失敗しました');
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('起動エラー:', error);
  process.exit(1);
});
