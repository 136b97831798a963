/**
 * 提取调度器
 * 顺序 / 并行 / 混合三种模式；信号量限制同时打开的会话数
 */

import { setMaxListeners } from 'node:events';
import { sleepOrCancel } from '../utils/async';
import { createEnhancedLogger } from '../utils/logger';
import { Semaphore } from '../utils/semaphore';
import { ErrorCode, ScraperErrors, handleError, taskStatusFor } from './errors';
import defaultEventBus, { CrawlerEventBus } from './event-bus';
import { ExtractionWorker } from './extraction-worker';
import { outputPathFor } from './resume-tracker';
import { ancestorsOf } from './structure-builder';
import type {
  ExecutionMode,
  ExtractionTask,
  ResumeState,
  RunSummary,
  SidebarStructure,
  TaskResult,
  TaskStatus,
} from './types';

export interface OrchestratorSettings {
  enabled: boolean;
  maxConcurrentTasks: number;
  minItemsForParallel: number;
  taskStartDelayMs: number;
  runTimeoutMs?: number;
  failureWindow: number;
  minFailureSamples: number;
  failureRateThreshold: number;
  maxConsecutiveResourceErrors: number;
}

export interface RunOptions {
  outputRoot: string;
  signal?: AbortSignal;
  maxItems?: number;
  /** Extract only the pending item with this id. */
  onlyItemId?: string;
  fromCache?: boolean;
  warnings?: string[];
}

/**
 * Outcome of the last `size` finished tasks.
 */
export class FailureWindow {
  private outcomes: boolean[] = [];

  constructor(private readonly size: number) {}

  record(success: boolean): void {
    this.outcomes.push(success);
    if (this.outcomes.length > this.size) this.outcomes.shift();
  }

  get samples(): number {
    return this.outcomes.length;
  }

  get failureRate(): number {
    if (this.outcomes.length === 0) return 0;
    return this.outcomes.filter((ok) => !ok).length / this.outcomes.length;
  }

  exceeds(threshold: number, minSamples: number): boolean {
    return this.samples >= minSamples && this.failureRate >= threshold;
  }
}

/**
 * Spaces session starts at least `delayMs` apart across all tasks.
 */
class StartSpacer {
  private nextSlot = 0;

  constructor(private readonly delayMs: number) {}

  async wait(signal?: AbortSignal): Promise<void> {
    if (this.delayMs <= 0) return;
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.delayMs;
    await sleepOrCancel(slot - now, signal);
  }
}

function emptyStatusCounts(): Record<TaskStatus, number> {
  return { Success: 0, ExtractionError: 0, NavigationError: 0, Timeout: 0, Skipped: 0 };
}

export class ExtractionOrchestrator {
  private readonly logger = createEnhancedLogger('ExtractionOrchestrator');

  constructor(
    private readonly worker: ExtractionWorker,
    private readonly settings: OrchestratorSettings,
    private readonly eventBus: CrawlerEventBus = defaultEventBus,
  ) {}

  selectMode(pendingCount: number): Exclude<ExecutionMode, 'hybrid'> {
    if (!this.settings.enabled || this.settings.maxConcurrentTasks <= 1) return 'sequential';
    if (pendingCount < this.settings.minItemsForParallel) return 'sequential';
    return 'parallel';
  }

  buildTasks(
    structure: SidebarStructure,
    resume: ResumeState,
    outputRoot: string,
    maxItems?: number,
    onlyItemId?: string,
  ): ExtractionTask[] {
    const selected = onlyItemId !== undefined ? resume.pending.filter((id) => id === onlyItemId) : resume.pending;
    const pending = maxItems !== undefined ? selected.slice(0, maxItems) : selected;
    return pending.map((id) => ({
      item: structure.items[id],
      ancestors: ancestorsOf(structure, id),
      sourceUrl: structure.sourceUrl,
      outputPath: outputPathFor(structure, id, outputRoot),
    }));
  }

  async run(structure: SidebarStructure, resume: ResumeState, options: RunOptions): Promise<RunSummary> {
    const startedAt = Date.now();
    const tasks = this.buildTasks(structure, resume, options.outputRoot, options.maxItems, options.onlyItemId);
    const warnings = [...(options.warnings ?? [])];
    if (options.onlyItemId !== undefined && tasks.length === 0) {
      const message = `No pending item with id: ${options.onlyItemId}`;
      this.logger.warn(message);
      warnings.push(message);
    }
    let mode: ExecutionMode = this.selectMode(tasks.length);

    const semaphore = new Semaphore(mode === 'parallel' ? this.settings.maxConcurrentTasks : 1);
    const controller = new AbortController();
    // Every queued or in-flight task listens on this signal.
    setMaxListeners(0, controller.signal);
    let abortReason: string | undefined;
    let abortCode: ErrorCode | undefined;
    const abort = (reason: string, code: ErrorCode = ErrorCode.CANCELLED) => {
      if (controller.signal.aborted) return;
      abortReason = reason;
      abortCode = code;
      this.logger.warn('Aborting run', { reason });
      controller.abort(ScraperErrors.cancelled(reason));
    };

    const onExternalAbort = () => abort('Interrupted');
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }
    const runTimer = this.settings.runTimeoutMs
      ? setTimeout(() => abort(`Run deadline of ${this.settings.runTimeoutMs}ms reached`), this.settings.runTimeoutMs)
      : undefined;

    this.logger.info('Starting extraction', {
      mode,
      tasks: tasks.length,
      done: resume.done.size,
      maxConcurrentTasks: semaphore.limit,
    });

    const results: Array<TaskResult | undefined> = new Array(tasks.length);
    const failures = new FailureWindow(this.settings.failureWindow);
    const spacer = new StartSpacer(this.settings.taskStartDelayMs);
    let finished = 0;
    let consecutiveResourceErrors = 0;

    const record = (index: number, result: TaskResult) => {
      results[index] = result;
      finished++;
      this.eventBus.emitProgress({ current: finished, target: tasks.length, itemId: result.itemId, status: result.status });

      if (result.status === 'Skipped') return;
      failures.record(result.status === 'Success');

      if (result.errorCode === ErrorCode.RESOURCE_ERROR) {
        consecutiveResourceErrors++;
        if (consecutiveResourceErrors >= this.settings.maxConsecutiveResourceErrors) {
          abort(`${consecutiveResourceErrors} consecutive session start failures`, ErrorCode.RESOURCE_ERROR);
        }
      } else {
        consecutiveResourceErrors = 0;
      }

      if (mode === 'parallel' && failures.exceeds(this.settings.failureRateThreshold, this.settings.minFailureSamples)) {
        mode = 'hybrid';
        semaphore.setPermits(1);
        this.logger.warn('Failure rate over threshold, continuing sequentially', {
          failureRate: failures.failureRate,
          samples: failures.samples,
        });
      }
    };

    const runTask = async (task: ExtractionTask, index: number): Promise<void> => {
      const taskStart = Date.now();
      let result: TaskResult;
      try {
        result = await this.worker.extract(task, semaphore, {
          signal: controller.signal,
          beforeSessionStart: () => spacer.wait(controller.signal),
        });
      } catch (error: unknown) {
        const scraperError = handleError(error, { itemId: task.item.id });
        result = Object.freeze({
          itemId: task.item.id,
          status: taskStatusFor(scraperError),
          error: scraperError.message,
          errorCode: scraperError.code,
          durationMs: Date.now() - taskStart,
          attempts: 0,
        });
      }
      record(index, result);
    };

    try {
      if (mode === 'sequential') {
        for (let i = 0; i < tasks.length; i++) {
          await runTask(tasks[i], i);
        }
      } else {
        await Promise.all(tasks.map((task, i) => runTask(task, i)));
      }
    } finally {
      if (runTimer) clearTimeout(runTimer);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }

    const ordered = results.filter((r): r is TaskResult => r !== undefined);
    const byStatus = emptyStatusCounts();
    for (const result of ordered) byStatus[result.status]++;

    const summary: RunSummary = {
      mode,
      total: ordered.length,
      succeeded: byStatus.Success,
      failed: byStatus.ExtractionError + byStatus.NavigationError + byStatus.Timeout,
      skipped: byStatus.Skipped,
      byStatus,
      results: ordered,
      aborted: controller.signal.aborted,
      abortReason,
      abortCode,
      durationMs: Date.now() - startedAt,
      fromCache: options.fromCache ?? false,
      warnings,
    };

    this.logger.info('Extraction finished', {
      mode: summary.mode,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      aborted: summary.aborted,
    });
    this.eventBus.emitComplete(summary);
    return summary;
  }
}
