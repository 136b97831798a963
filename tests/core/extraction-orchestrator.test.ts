/**
 * ExtractionOrchestrator 单元测试
 */

import { getMaxListeners } from 'node:events';
import { promises as fsPromises } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ErrorCode } from '../../core/errors';
import { CrawlProgressData, createEventBus } from '../../core/event-bus';
import { ExtractionOrchestrator, FailureWindow, OrchestratorSettings } from '../../core/extraction-orchestrator';
import { ExtractionWorker, WorkerSettings } from '../../core/extraction-worker';
import { ResumeTracker } from '../../core/resume-tracker';
import type { SidebarStructure } from '../../core/types';
import { FailureMode, FakeFactoryOptions, FakeSessionFactory, FakeSite, menuSite } from '../helpers/fake-session';
import { discoverFakeSite, idOf } from '../helpers/structures';

const workerSettings: WorkerSettings = {
  navigationMs: 1000,
  sidebarWaitMs: 1000,
  contentWaitMs: 1000,
  expandDelayMs: 0,
  itemTimeoutMs: 5000,
  gracePeriodMs: 1000,
  sessionStartRetries: 0,
  retryBaseDelayMs: 1,
};

const orchestratorSettings: OrchestratorSettings = {
  enabled: true,
  maxConcurrentTasks: 3,
  minItemsForParallel: 5,
  taskStartDelayMs: 0,
  failureWindow: 10,
  minFailureSamples: 5,
  failureRateThreshold: 0.5,
  maxConsecutiveResourceErrors: 3,
};

function failing(titles: string[], mode: FailureMode = 'activate'): Record<string, FailureMode> {
  return Object.fromEntries(titles.map((title) => [title, mode]));
}

describe('ExtractionOrchestrator', () => {
  let workDir: string;
  let outputRoot: string;

  beforeEach(async () => {
    workDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'navtree-orchestrator-'));
    outputRoot = path.join(workDir, 'output');
  });

  afterEach(async () => {
    await fsPromises.rm(workDir, { recursive: true, force: true });
  });

  async function runSite(
    site: FakeSite,
    options: FakeFactoryOptions = {},
    settings: Partial<OrchestratorSettings> = {},
    run: { abortAfterMs?: number; maxItems?: number; onlyTitle?: string } = {},
  ) {
    const structure: SidebarStructure = await discoverFakeSite(site, path.join(workDir, 'cache'));
    const resume = await new ResumeTracker().partition(structure, outputRoot, false);
    const factory = new FakeSessionFactory(site, options);
    const eventBus = createEventBus();
    const progress: CrawlProgressData[] = [];
    eventBus.on(eventBus.events.CRAWL_PROGRESS, (data: CrawlProgressData) => progress.push(data));
    const orchestrator = new ExtractionOrchestrator(
      new ExtractionWorker(factory, workerSettings),
      { ...orchestratorSettings, ...settings },
      eventBus,
    );
    const controller = new AbortController();
    const timer = run.abortAfterMs !== undefined ? setTimeout(() => controller.abort(), run.abortAfterMs) : undefined;
    try {
      const summary = await orchestrator.run(structure, resume, {
        outputRoot,
        signal: controller.signal,
        maxItems: run.maxItems,
        onlyItemId: run.onlyTitle !== undefined ? idOf(structure, run.onlyTitle) : undefined,
      });
      return { structure, factory, summary, progress };
    } finally {
      clearTimeout(timer);
    }
  }

  it('never holds more sessions than the permit count', async () => {
    const { factory, summary } = await runSite(menuSite(12), { opDelayMs: 5 });

    expect(summary.mode).toBe('parallel');
    expect(factory.maxOpen).toBe(3);
    expect(factory.openCount).toBe(0);
    expect(summary.succeeded).toBe(12);
  });

  it('isolates a single failing item', async () => {
    const { structure, summary } = await runSite(menuSite(10), { opDelayMs: 2, failures: failing(['Page 4']) });

    expect(summary.total).toBe(10);
    expect(summary.succeeded).toBe(9);
    expect(summary.failed).toBe(1);
    expect(summary.byStatus.NavigationError).toBe(1);
    expect(summary.results[3]).toMatchObject({ itemId: idOf(structure, 'Page 4'), status: 'NavigationError' });
    expect(summary.mode).toBe('parallel');
  });

  it('returns results in task order', async () => {
    const { structure, summary } = await runSite(menuSite(6), { opDelayMs: 1 });

    expect(summary.results.map((r) => r.itemId)).toEqual(
      Array.from({ length: 6 }, (_, i) => idOf(structure, `Page ${i + 1}`)),
    );
  });

  it('runs sequentially below the parallel threshold', async () => {
    const { factory, summary } = await runSite(menuSite(4), { opDelayMs: 2 });

    expect(summary.mode).toBe('sequential');
    expect(factory.maxOpen).toBe(1);
    expect(summary.succeeded).toBe(4);
  });

  it('runs sequentially when concurrency is disabled', async () => {
    const { factory, summary } = await runSite(menuSite(8), { opDelayMs: 2 }, { enabled: false });

    expect(summary.mode).toBe('sequential');
    expect(factory.maxOpen).toBe(1);
  });

  it('falls back to one session at a time when most tasks fail', async () => {
    const titles = Array.from({ length: 8 }, (_, i) => `Page ${i + 1}`);
    const { summary } = await runSite(menuSite(12), { opDelayMs: 2, failures: failing(titles) });

    expect(summary.mode).toBe('hybrid');
    expect(summary.failed).toBe(8);
    expect(summary.succeeded).toBe(4);
  });

  it('skips queued tasks and lets in-flight ones finish after an interrupt', async () => {
    const { factory, summary } = await runSite(menuSite(12), { opDelayMs: 20 }, {}, { abortAfterMs: 10 });

    expect(summary.aborted).toBe(true);
    expect(summary.abortReason).toBe('Interrupted');
    expect(summary.abortCode).toBe(ErrorCode.CANCELLED);
    expect(summary.succeeded).toBe(3);
    expect(summary.skipped).toBe(9);
    expect(summary.failed).toBe(0);
    expect(factory.sessions).toHaveLength(3);
    expect(factory.openCount).toBe(0);
  });

  it('aborts at the run deadline', async () => {
    const { summary } = await runSite(menuSite(12), { opDelayMs: 20 }, { runTimeoutMs: 10 });

    expect(summary.aborted).toBe(true);
    expect(summary.abortReason).toBe('Run deadline of 10ms reached');
    expect(summary.skipped).toBe(9);
  });

  it('aborts the run after consecutive session start failures', async () => {
    const { summary } = await runSite(menuSite(12), { alwaysFailStart: true });

    expect(summary.aborted).toBe(true);
    expect(summary.abortCode).toBe(ErrorCode.RESOURCE_ERROR);
    expect(summary.abortReason).toMatch(/consecutive session start failures$/);
    expect(summary.succeeded).toBe(0);
    expect(summary.skipped).toBeGreaterThan(0);
    expect(summary.failed + summary.skipped).toBe(12);
    expect(summary.results.filter((r) => r.status === 'ExtractionError').every((r) => r.errorCode === ErrorCode.RESOURCE_ERROR)).toBe(true);
  });

  it('stops after maxItems pending items', async () => {
    const { summary } = await runSite(menuSite(12), {}, {}, { maxItems: 4 });

    expect(summary.total).toBe(4);
    expect(summary.mode).toBe('sequential');
  });

  it('extracts only the requested item', async () => {
    const { structure, factory, summary } = await runSite(menuSite(6), {}, {}, { onlyTitle: 'Page 5' });

    expect(summary.total).toBe(1);
    expect(summary.results[0]).toMatchObject({ itemId: idOf(structure, 'Page 5'), status: 'Success' });
    expect(factory.sessions.map((session) => session.id)).toEqual([`item:${idOf(structure, 'Page 5')}`]);
    expect(summary.warnings).toEqual([]);
  });

  it('warns when the requested item is not pending', async () => {
    const structure = await discoverFakeSite(menuSite(3), path.join(workDir, 'cache'));
    const resume = await new ResumeTracker().partition(structure, outputRoot, false);
    const orchestrator = new ExtractionOrchestrator(
      new ExtractionWorker(new FakeSessionFactory(menuSite(3)), workerSettings),
      orchestratorSettings,
      createEventBus(),
    );

    const summary = await orchestrator.run(structure, resume, { outputRoot, onlyItemId: 'no-such-item' });

    expect(summary.total).toBe(0);
    expect(summary.warnings).toEqual(['No pending item with id: no-such-item']);
  });

  it('lifts the listener limit on the run signal shared by every task', async () => {
    const site = menuSite(12);
    const structure = await discoverFakeSite(site, path.join(workDir, 'cache'));
    const resume = await new ResumeTracker().partition(structure, outputRoot, false);
    const worker = new ExtractionWorker(new FakeSessionFactory(site), workerSettings);
    const extract = jest.spyOn(worker, 'extract');
    const orchestrator = new ExtractionOrchestrator(worker, orchestratorSettings, createEventBus());

    const summary = await orchestrator.run(structure, resume, { outputRoot });

    const signal = extract.mock.calls[0][2]?.signal;
    if (!signal) throw new Error('extract was called without a run signal');
    expect(summary.succeeded).toBe(12);
    expect(extract).toHaveBeenCalledTimes(12);
    expect(getMaxListeners(signal)).toBe(0);
  });

  it('skips items already done', async () => {
    await runSite(menuSite(6), {}, {}, { maxItems: 2 });
    const { summary } = await runSite(menuSite(6));

    expect(summary.total).toBe(4);
    expect(summary.mode).toBe('sequential');
  });

  it('emits progress for every finished task', async () => {
    const { progress } = await runSite(menuSite(6), { opDelayMs: 1 });

    expect(progress).toHaveLength(6);
    expect(progress.map((p) => p.current)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(progress.every((p) => p.target === 6 && p.status === 'Success')).toBe(true);
  });
});

describe('ExtractionOrchestrator.selectMode', () => {
  const worker = new ExtractionWorker(new FakeSessionFactory(menuSite(1)), workerSettings);

  it.each([
    [{}, 5, 'parallel'],
    [{}, 4, 'sequential'],
    [{ enabled: false }, 20, 'sequential'],
    [{ maxConcurrentTasks: 1 }, 20, 'sequential'],
  ] as const)('with %j and %i pending picks %s', (settings, pending, expected) => {
    const orchestrator = new ExtractionOrchestrator(worker, { ...orchestratorSettings, ...settings }, createEventBus());
    expect(orchestrator.selectMode(pending)).toBe(expected);
  });
});

describe('FailureWindow', () => {
  it('needs the minimum sample count before it trips', () => {
    const window = new FailureWindow(10);
    for (let i = 0; i < 4; i++) window.record(false);
    expect(window.exceeds(0.5, 5)).toBe(false);
    window.record(false);
    expect(window.exceeds(0.5, 5)).toBe(true);
  });

  it('only remembers the last outcomes', () => {
    const window = new FailureWindow(4);
    [false, false, false, false, true, true, true].forEach((ok) => window.record(ok));
    expect(window.samples).toBe(4);
    expect(window.failureRate).toBe(0.25);
  });

  it('trips at exactly the threshold', () => {
    const window = new FailureWindow(10);
    [true, false, true, false, true, false].forEach((ok) => window.record(ok));
    expect(window.exceeds(0.5, 5)).toBe(true);
  });
});
