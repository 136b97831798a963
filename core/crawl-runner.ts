/**
 * 爬取流程入口
 * 发现结构 → 计算续跑状态 → 调度提取，汇总为 RunSummary
 */

import * as path from 'node:path';
import { BLOCKED_RESOURCE_TYPES } from '../config/constants';
import type { AppConfig } from '../utils/config-manager';
import { createEnhancedLogger } from '../utils/logger';
import { CacheStore } from './cache-store';
import { ErrorCode, ScraperError, handleError } from './errors';
import defaultEventBus, { CrawlerEventBus } from './event-bus';
import { initialExpansionState } from './expansion-gate';
import { ExtractionOrchestrator } from './extraction-orchestrator';
import { ExtractionWorker } from './extraction-worker';
import { PuppeteerSessionFactory } from './puppeteer-session';
import { ResumeTracker } from './resume-tracker';
import type { SessionFactory } from './session';
import { DiscoveryResult, StructureDiscoverer } from './structure-discoverer';
import type { ExpansionOverrides, ExpansionSessionState, ResumeReport, RunSummary } from './types';

export interface CrawlRequest {
  overrides?: ExpansionOverrides;
  /** Expansion state carried over from an earlier run in the same process. */
  state?: ExpansionSessionState;
  signal?: AbortSignal;
  /** Extract only this item. */
  onlyItemId?: string;
  /** Called with the summary before a run-level failure is thrown. */
  onSummary?: (summary: RunSummary) => void;
}

export interface CrawlOutcome {
  summary: RunSummary;
  state: ExpansionSessionState;
}

export interface ResumeInfo {
  report: ResumeReport;
  fromCache: boolean;
  state: ExpansionSessionState;
}

export class CrawlRunner {
  private readonly logger = createEnhancedLogger('CrawlRunner');
  private readonly cache: CacheStore;
  private readonly discoverer: StructureDiscoverer;
  private readonly tracker = new ResumeTracker();
  private readonly orchestrator: ExtractionOrchestrator;

  constructor(
    private readonly config: AppConfig,
    private readonly factory: SessionFactory = CrawlRunner.browserFactory(config),
    private readonly eventBus: CrawlerEventBus = defaultEventBus,
  ) {
    const { cache, delays, behavior, concurrency } = config;

    this.cache = new CacheStore({
      dir: cache.dir,
      minValidItems: cache.minValidItems,
      minValidRatio: cache.minValidRatio,
    });

    this.discoverer = new StructureDiscoverer(this.cache, {
      navigationMs: delays.navigationMs,
      sidebarWaitMs: delays.sidebarWaitMs,
      expandDelayMs: delays.expandDelayMs,
      postExpandSettleMs: delays.postExpandSettleMs,
      maxExpandAttempts: behavior.maxExpandAttempts,
      skipTitles: behavior.skipTitles,
    });

    const worker = new ExtractionWorker(factory, {
      navigationMs: delays.navigationMs,
      sidebarWaitMs: delays.sidebarWaitMs,
      contentWaitMs: delays.contentWaitMs,
      expandDelayMs: delays.expandDelayMs,
      itemTimeoutMs: concurrency.itemTimeoutMs,
      gracePeriodMs: concurrency.gracePeriodMs,
      sessionStartRetries: concurrency.sessionStartRetries,
    });

    this.orchestrator = new ExtractionOrchestrator(
      worker,
      {
        enabled: concurrency.enabled,
        maxConcurrentTasks: concurrency.maxConcurrentTasks,
        minItemsForParallel: concurrency.minItemsForParallel,
        taskStartDelayMs: concurrency.taskStartDelayMs,
        runTimeoutMs: concurrency.runTimeoutMs,
        failureWindow: concurrency.failureWindow,
        minFailureSamples: concurrency.minFailureSamples,
        failureRateThreshold: concurrency.failureRateThreshold,
        maxConsecutiveResourceErrors: concurrency.maxConsecutiveResourceErrors,
      },
      eventBus,
    );
  }

  static browserFactory(config: AppConfig): SessionFactory {
    return new PuppeteerSessionFactory(
      {
        headless: config.browser.headless,
        executablePath: config.browser.executablePath,
        userAgent: config.browser.userAgent,
        viewport: config.browser.viewport,
        blockResources: config.browser.blockResources,
        blockedResourceTypes: BLOCKED_RESOURCE_TYPES,
      },
      config.selectors,
    );
  }

  get outputRoot(): string {
    return path.resolve(this.config.output.baseDir);
  }

  /**
   * Discovery uses its own session, closed before extraction begins.
   */
  async discover(request: CrawlRequest = {}): Promise<DiscoveryResult> {
    const session = this.factory.create('discovery');
    try {
      return await this.discoverer.discover(session, {
        sourceUrl: this.config.target.url,
        overrides: request.overrides ?? {},
        state: request.state ?? initialExpansionState(),
      });
    } finally {
      try {
        await session.close();
      } catch (error: unknown) {
        this.logger.warn('Discovery session close failed', { error: String(error) });
      }
    }
  }

  async resumeInfo(request: CrawlRequest = {}): Promise<ResumeInfo> {
    const discovery = await this.discover(request);
    const report = await this.tracker.buildResumeReport(discovery.structure, this.outputRoot);
    return { report, fromCache: discovery.fromCache, state: discovery.state };
  }

  async run(request: CrawlRequest = {}): Promise<CrawlOutcome> {
    const overrides = request.overrides ?? {};
    let discovery: DiscoveryResult;
    try {
      discovery = await this.discover(request);
    } catch (error: unknown) {
      const scraperError = handleError(error);
      this.eventBus.emitError(scraperError);
      throw scraperError;
    }
    const { structure } = discovery;

    const resume = await this.tracker.partition(structure, this.outputRoot, overrides.force ?? false);
    this.logger.info('Resume state', {
      done: resume.done.size,
      pending: resume.pending.length,
      fromCache: discovery.fromCache,
    });

    const summary = await this.orchestrator.run(structure, resume, {
      outputRoot: this.outputRoot,
      signal: request.signal,
      maxItems: this.config.output.maxItems,
      onlyItemId: request.onlyItemId,
      fromCache: discovery.fromCache,
      warnings: discovery.warnings,
    });

    if (summary.aborted && summary.abortCode === ErrorCode.RESOURCE_ERROR) {
      request.onSummary?.(summary);
      const error = new ScraperError(ErrorCode.RESOURCE_ERROR, summary.abortReason ?? 'Sessions could not be started', {
        retryable: false,
        context: { succeeded: summary.succeeded, failed: summary.failed, skipped: summary.skipped },
      });
      this.eventBus.emitError(error);
      throw error;
    }

    request.onSummary?.(summary);
    return { summary, state: discovery.state };
  }
}
