import cron, { type ScheduledTask } from 'node-cron';
import type { Pipeline, RunReport } from './index.js';
import { errorMessage } from '../errors.js';
import { getLogger } from '../utils/logger.js';

export interface SchedulerConfig {
  cron: string;
  timezone: string;
  limit?: number;
}

export class Scheduler {
  private pipeline: Pipeline;
  private config: SchedulerConfig;
  private task: ScheduledTask | null = null;
  private running = false;
  private logger = getLogger();

  constructor(pipeline: Pipeline, config: SchedulerConfig) {
    this.pipeline = pipeline;
    this.config = config;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('スケジューラーは既に開始されています');
      return;
    }

    // cron式のバリデーション
    if (!cron.validate(this.config.cron)) {
      throw new Error(`無効なcron式です: ${this.config.cron}`);
    }

    this.task = cron.schedule(
      this.config.cron,
      async () => {
        await this.runOnce();
      },
      {
        timezone: this.config.timezone,
      }
    );

    this.logger.info(
      { cron: this.config.cron, timezone: this.config.timezone },
      'スケジューラーを開始しました'
    );
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.info('スケジューラーを停止しました');
    }
  }

  /**
   * 1回実行する。前回の実行が終わっていなければスキップ。
   * 失敗はログに残し、次のスケジュールで再度実行する。
   */
  async runOnce(): Promise<RunReport | null> {
    if (this.running) {
      this.logger.warn('前回の実行が終わっていないためスキップします');
      return null;
    }

    this.running = true;
    this.logger.info({ cron: this.config.cron }, 'スケジュールされたパイプライン実行を開始');
    try {
      const report = await this.pipeline.run({ limit: this.config.limit });
      this.logger.info({ ...report }, 'スケジュール実行が完了しました');
      return report;
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'スケジュール実行が失敗しました');
      return null;
    } finally {
      this.running = false;
    }
  }
}
