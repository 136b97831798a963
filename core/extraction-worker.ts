/**
 * 单页提取 Worker
 * 每个任务独占一个自动化会话：导航 → 提取 → 原子写入 → 释放
 */

import { promises as fsPromises } from 'node:fs';
import { retryWithBackoff, sleep } from '../utils/async';
import { writeJsonAtomic } from '../utils/filesystem';
import { createModuleLogger } from '../utils/logger';
import { Semaphore } from '../utils/semaphore';
import { ErrorCode, ScraperError, ScraperErrors, handleError, taskStatusFor } from './errors';
import { ExtractedPage, pageContentSchema } from './schemas';
import type { AutomationSession, PageContent, SessionFactory } from './session';
import type { ExtractionTask, TaskResult, TaskStatus } from './types';

const logger = createModuleLogger('ExtractionWorker');

export interface WorkerSettings {
  navigationMs: number;
  sidebarWaitMs: number;
  contentWaitMs: number;
  expandDelayMs: number;
  itemTimeoutMs: number;
  gracePeriodMs: number;
  sessionStartRetries: number;
  retryBaseDelayMs?: number;
}

export interface ExtractOptions {
  signal?: AbortSignal;
  /** Awaited after the permit is granted and before the session starts. */
  beforeSessionStart?: () => Promise<void>;
}

function buildResult(
  task: ExtractionTask,
  status: TaskStatus,
  startedAt: number,
  attempts: number,
  extra: { error?: ScraperError; outputRef?: string } = {},
): TaskResult {
  return Object.freeze({
    itemId: task.item.id,
    status,
    error: extra.error?.message,
    errorCode: extra.error?.code,
    outputRef: extra.outputRef,
    durationMs: Date.now() - startedAt,
    attempts,
  });
}

/**
 * Runs `fn`, converting foreign errors into a ScraperError with `code`.
 * ScraperErrors raised inside keep their own code.
 */
async function phase<T>(code: ErrorCode, fn: () => Promise<T>, context: Record<string, unknown>): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    if (error instanceof ScraperError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ScraperError(code, message, {
      context,
      originalError: error instanceof Error ? error : undefined,
    });
  }
}

export class ExtractionWorker {
  constructor(
    private readonly factory: SessionFactory,
    private readonly settings: WorkerSettings,
  ) {}

  async extract(task: ExtractionTask, semaphore: Semaphore, options: ExtractOptions = {}): Promise<TaskResult> {
    const { signal } = options;
    const startedAt = Date.now();

    try {
      await semaphore.acquire(signal);
    } catch {
      return buildResult(task, 'Skipped', startedAt, 0, { error: ScraperErrors.cancelled('Run aborted before start') });
    }

    try {
      if (signal?.aborted) {
        return buildResult(task, 'Skipped', startedAt, 0, { error: ScraperErrors.cancelled('Run aborted before start') });
      }
      if (options.beforeSessionStart) await options.beforeSessionStart();

      const session = this.factory.create(`item:${task.item.id}`);
      const attempt = { count: 0 };
      const stop = new AbortController();
      const work = this.run(task, session, attempt, startedAt, stop.signal, signal);
      let result: TaskResult;
      try {
        result = await this.guard(task, work, attempt, startedAt, signal);
      } finally {
        stop.abort();
        await this.closeQuietly(session, task);
      }

      // The permit is held until the abandoned attempt has wound down.
      const settled = await this.drain(work);
      if (settled === null) {
        logger.warn('Abandoned attempt did not settle after close', { itemId: task.item.id });
      } else if (result.status !== 'Success' && settled.status === 'Success') {
        await this.discardArtifact(task);
      }
      return result;
    } finally {
      semaphore.release();
    }
  }

  private async run(
    task: ExtractionTask,
    session: AutomationSession,
    attempt: { count: number },
    startedAt: number,
    stop: AbortSignal,
    signal?: AbortSignal,
  ): Promise<TaskResult> {
    const { item } = task;
    const context = { itemId: item.id, title: item.title };
    const checkpoint = () => {
      if (stop.aborted) throw ScraperErrors.cancelled('Item abandoned', context);
    };

    try {
      try {
        await retryWithBackoff(
          async () => {
            attempt.count++;
            await session.start();
          },
          {
            maxRetries: this.settings.sessionStartRetries,
            baseDelay: this.settings.retryBaseDelayMs ?? 1000,
            shouldRetry: () => !stop.aborted && !signal?.aborted,
            onRetry: (error, n) =>
              logger.warn('Session start failed, retrying', { ...context, attempt: n, error: String(error) }),
          },
        );
      } catch (error: unknown) {
        throw ScraperErrors.resourceError(
          `Session failed to start after ${attempt.count} attempts`,
          context,
          error instanceof Error ? error : undefined,
        );
      }
      checkpoint();

      await phase(ErrorCode.NAVIGATION_FAILED, async () => {
        await session.navigate(task.sourceUrl, this.settings.navigationMs);
        if (!(await session.waitForNavigation(this.settings.sidebarWaitMs))) {
          throw ScraperErrors.sidebarNotFound(task.sourceUrl, this.settings.sidebarWaitMs);
        }
        for (const ancestor of task.ancestors) {
          if (!ancestor.targetRef) continue;
          checkpoint();
          const opened = await session.expand(ancestor.targetRef);
          if (!opened) logger.debug('Ancestor did not expand', { ...context, ancestor: ancestor.title });
          if (this.settings.expandDelayMs > 0) await sleep(this.settings.expandDelayMs);
        }
        if (!item.targetRef) throw ScraperErrors.elementNotFound('(empty)', context);
        checkpoint();
        await session.activate(item.targetRef);
      }, context);
      checkpoint();

      const ready = await phase(
        ErrorCode.TIMEOUT,
        () => session.waitForContent(this.settings.contentWaitMs),
        context,
      );
      if (!ready) {
        throw ScraperErrors.TimeoutError(`Content did not settle within ${this.settings.contentWaitMs}ms`, context);
      }

      const content = await phase(ErrorCode.DATA_EXTRACTION_FAILED, () => session.readContent(), context);
      const page = this.toPage(task, content);
      checkpoint();

      await phase(ErrorCode.FILE_SYSTEM_ERROR, () => writeJsonAtomic(task.outputPath, page), {
        ...context,
        outputPath: task.outputPath,
      });

      logger.debug('Page extracted', { ...context, outputPath: task.outputPath });
      return buildResult(task, 'Success', startedAt, attempt.count, { outputRef: task.outputPath });
    } catch (error: unknown) {
      const scraperError = handleError(error, context);
      logger.warn('Extraction failed', { ...context, code: scraperError.code, message: scraperError.message });
      return buildResult(task, taskStatusFor(scraperError), startedAt, attempt.count, { error: scraperError });
    }
  }

  private toPage(task: ExtractionTask, content: PageContent): ExtractedPage {
    const parsed = pageContentSchema.safeParse(content);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw ScraperErrors.validationFailed(
        `Extracted content rejected: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid'}`,
        { itemId: task.item.id },
      );
    }
    return {
      itemId: task.item.id,
      breadcrumbs: task.ancestors.map((ancestor) => ancestor.title),
      ...parsed.data,
      extractedAt: new Date().toISOString(),
    };
  }

  /**
   * Bounds one attempt by the per-item timeout and, once the run is aborted,
   * by the grace period. The losing attempt is told to stop and its session
   * is closed by the caller, which then waits for it to wind down.
   */
  private guard(
    task: ExtractionTask,
    work: Promise<TaskResult>,
    attempt: { count: number },
    startedAt: number,
    signal?: AbortSignal,
  ): Promise<TaskResult> {
    return new Promise<TaskResult>((resolve) => {
      let graceTimer: ReturnType<typeof setTimeout> | undefined;

      const settle = (result: TaskResult) => {
        clearTimeout(itemTimer);
        if (graceTimer) clearTimeout(graceTimer);
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      const itemTimer = setTimeout(() => {
        settle(buildResult(task, 'Timeout', startedAt, attempt.count, {
          error: ScraperErrors.TimeoutError(`Item exceeded ${this.settings.itemTimeoutMs}ms`, { itemId: task.item.id }),
        }));
      }, this.settings.itemTimeoutMs);

      const onAbort = () => {
        graceTimer = setTimeout(() => {
          settle(buildResult(task, 'Timeout', startedAt, attempt.count, {
            error: ScraperErrors.TimeoutError('Run aborted and grace period elapsed', { itemId: task.item.id }),
          }));
        }, this.settings.gracePeriodMs);
      };

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      work.then(settle, (error: unknown) => {
        const scraperError = handleError(error, { itemId: task.item.id });
        settle(buildResult(task, taskStatusFor(scraperError), startedAt, attempt.count, { error: scraperError }));
      });
    });
  }

  private async drain(work: Promise<TaskResult>): Promise<TaskResult | null> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), this.settings.gracePeriodMs);
    });
    try {
      return await Promise.race([work, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Removes a page written by an attempt whose result was already reported as failed. */
  private async discardArtifact(task: ExtractionTask): Promise<void> {
    try {
      await fsPromises.rm(task.outputPath, { force: true });
    } catch (error: unknown) {
      logger.warn('Could not remove artifact of abandoned attempt', {
        itemId: task.item.id,
        outputPath: task.outputPath,
        error: String(error),
      });
    }
  }

  private async closeQuietly(session: AutomationSession, task: ExtractionTask): Promise<void> {
    try {
      await session.close();
    } catch (error: unknown) {
      logger.warn('Session close failed', { itemId: task.item.id, error: String(error) });
    }
  }
}
