/**
 * Batch Scheduler
 *
 * Runs the pipeline over every RECEIVED file on a fixed interval.
 * Overlapping ticks in this process are skipped; overlapping runs in other
 * processes are safe because each file is claimed atomically.
 */

import { loggers, logError } from '../lib/logger';
import { runBatch, type BatchRunResult, type PipelineContext } from './pipelineOrchestrator';

const log = loggers.scheduler;

export interface BatchSchedulerConfig {
  enabled: boolean;
  intervalMinutes: number;
  /** delay before the first run, so the server can finish starting */
  initialDelayMs: number;
  /** files picked up per run */
  batchLimit: number;
}

const DEFAULT_CONFIG: BatchSchedulerConfig = {
  enabled: true,
  intervalMinutes: 5,
  initialDelayMs: 10000,
  batchLimit: 100,
};

export interface SchedulerStatus {
  running: boolean;
  enabled: boolean;
  intervalMinutes: number;
  lastRunTime: Date | null;
  lastResult: Omit<BatchRunResult, 'results'> | null;
}

export class BatchScheduler {
  private readonly config: BatchSchedulerConfig;
  private interval: NodeJS.Timeout | null = null;
  private initialRun: NodeJS.Timeout | null = null;
  private isRunning = false;
  private lastRunTime: Date | null = null;
  private lastResult: Omit<BatchRunResult, 'results'> | null = null;

  constructor(
    private readonly ctx: PipelineContext,
    config: Partial<BatchSchedulerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  start(): void {
    if (this.interval) {
      log.info('Batch scheduler already started');
      return;
    }

    if (!this.config.enabled) {
      log.info('Batch scheduler disabled in configuration');
      return;
    }

    log.info({ intervalMinutes: this.config.intervalMinutes }, 'Starting batch scheduler');

    this.initialRun = setTimeout(() => {
      this.initialRun = null;
      this.tick();
    }, this.config.initialDelayMs);

    this.interval = setInterval(() => this.tick(), this.config.intervalMinutes * 60 * 1000);
  }

  stop(): void {
    if (this.initialRun) {
      clearTimeout(this.initialRun);
      this.initialRun = null;
    }
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      log.info('Batch scheduler stopped');
    }
  }

  /**
   * Runs one batch now. Resolves to null when a run is already in progress.
   */
  async trigger(): Promise<BatchRunResult | null> {
    if (this.isRunning) {
      log.info('Batch run already in progress, skipping');
      return null;
    }

    this.isRunning = true;
    try {
      const result = await runBatch(this.ctx, { limit: this.config.batchLimit });
      const { results: _results, ...counts } = result;
      this.lastResult = counts;
      return result;
    } finally {
      this.lastRunTime = new Date();
      this.isRunning = false;
    }
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.isRunning,
      enabled: this.config.enabled,
      intervalMinutes: this.config.intervalMinutes,
      lastRunTime: this.lastRunTime,
      lastResult: this.lastResult,
    };
  }

  private tick(): void {
    this.trigger().catch((error) => {
      logError(log, error, 'Scheduled batch run failed');
    });
  }
}

export function initializeBatchScheduler(
  ctx: PipelineContext,
  config: Partial<BatchSchedulerConfig> = {}
): BatchScheduler {
  const scheduler = new BatchScheduler(ctx, config);
  scheduler.start();
  return scheduler;
}
