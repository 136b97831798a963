/**
 * ExtractionWorker 单元测试
 */

import { promises as fsPromises } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ErrorCode, ScraperErrors } from '../../core/errors';
import { ExtractionWorker, WorkerSettings } from '../../core/extraction-worker';
import { isArtifactValid, outputPathFor } from '../../core/resume-tracker';
import { extractedPageSchema } from '../../core/schemas';
import { ancestorsOf } from '../../core/structure-builder';
import type { ExtractionTask, SidebarStructure } from '../../core/types';
import { Semaphore } from '../../utils/semaphore';
import { FakeFactoryOptions, FakeSessionFactory, FakeSite, menuSite } from '../helpers/fake-session';
import { discoverFakeSite, idOf } from '../helpers/structures';

const settings: WorkerSettings = {
  navigationMs: 1000,
  sidebarWaitMs: 1000,
  contentWaitMs: 1000,
  expandDelayMs: 0,
  itemTimeoutMs: 2000,
  gracePeriodMs: 50,
  sessionStartRetries: 2,
  retryBaseDelayMs: 1,
};

describe('ExtractionWorker', () => {
  const site = menuSite(3);
  let workDir: string;
  let structure: SidebarStructure;

  beforeEach(async () => {
    workDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'navtree-worker-'));
    structure = await discoverFakeSite(site, path.join(workDir, 'cache'));
  });

  afterEach(async () => {
    await fsPromises.rm(workDir, { recursive: true, force: true });
  });

  function taskIn(from: SidebarStructure, title: string): ExtractionTask {
    const id = idOf(from, title);
    return {
      item: from.items[id],
      ancestors: ancestorsOf(from, id),
      sourceUrl: from.sourceUrl,
      outputPath: outputPathFor(from, id, path.join(workDir, 'output')),
    };
  }

  function taskFor(title: string): ExtractionTask {
    return taskIn(structure, title);
  }

  function setup(options: FakeFactoryOptions = {}, overrides: Partial<WorkerSettings> = {}) {
    const factory = new FakeSessionFactory(site, options);
    const worker = new ExtractionWorker(factory, { ...settings, ...overrides });
    const semaphore = new Semaphore(1);
    return { factory, worker, semaphore };
  }

  it('extracts a page, writes it and releases everything', async () => {
    const { factory, worker, semaphore } = setup();
    const task = taskFor('Page 2');

    const result = await worker.extract(task, semaphore);

    expect(result.status).toBe('Success');
    expect(result.outputRef).toBe(task.outputPath);
    expect(result.attempts).toBe(1);
    expect(await isArtifactValid(task.outputPath, task.item.id)).toBe(true);
    const written = extractedPageSchema.parse(JSON.parse(await fsPromises.readFile(task.outputPath, 'utf-8')));
    expect(written.title).toBe('Page 2');
    expect(written.breadcrumbs).toEqual(['Endpoints']);
    expect(factory.leakedSessions).toEqual([]);
    expect(semaphore.inUse).toBe(0);
  });

  it('opens the ancestor menu in its own session before activating the page', async () => {
    const { factory, worker, semaphore } = setup();
    const task = taskFor('Page 1');

    await worker.extract(task, semaphore);

    const [session] = factory.sessions;
    expect([...session.expanded]).toEqual([task.ancestors[0].targetRef]);
    expect(session.activated).toEqual([task.item.targetRef]);
  });

  it('opens a menu that is also a page before activating a page inside it', async () => {
    const linked: FakeSite = {
      layout: 'nested',
      nodes: [{ title: 'Users', toggle: true, target: true, children: [{ title: 'List users' }, { title: 'Get user' }] }],
    };
    const linkedStructure = await discoverFakeSite(linked, path.join(workDir, 'linked-cache'));
    const factory = new FakeSessionFactory(linked);
    const worker = new ExtractionWorker(factory, settings);
    const task = taskIn(linkedStructure, 'List users');

    const result = await worker.extract(task, new Semaphore(1));

    expect(task.ancestors.map((ancestor) => [ancestor.title, ancestor.isExpandable])).toEqual([['Users', false]]);
    expect(result.status).toBe('Success');
    expect([...factory.sessions[0].expanded]).toEqual(['path:Users']);
    expect(factory.sessions[0].activated).toEqual(['path:Users / List users']);
  });

  it('returns a frozen result', async () => {
    const { worker, semaphore } = setup();
    const result = await worker.extract(taskFor('Page 1'), semaphore);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('reports a failed click as a NavigationError', async () => {
    const { factory, worker, semaphore } = setup({ failures: { 'Page 1': 'activate' } });

    const result = await worker.extract(taskFor('Page 1'), semaphore);

    expect(result.status).toBe('NavigationError');
    expect(result.errorCode).toBe(ErrorCode.NAVIGATION_FAILED);
    expect(factory.leakedSessions).toEqual([]);
    expect(semaphore.inUse).toBe(0);
  });

  it('reports content that never settles as a Timeout', async () => {
    const { worker, semaphore } = setup({ failures: { 'Page 1': 'no-content' } });

    const result = await worker.extract(taskFor('Page 1'), semaphore);

    expect(result.status).toBe('Timeout');
    expect(result.error).toBe('Content did not settle within 1000ms');
  });

  it('reports a read failure as an ExtractionError', async () => {
    const { worker, semaphore } = setup({ failures: { 'Page 1': 'content' } });

    const result = await worker.extract(taskFor('Page 1'), semaphore);

    expect(result.status).toBe('ExtractionError');
    expect(result.errorCode).toBe(ErrorCode.DATA_EXTRACTION_FAILED);
  });

  it('rejects content without a title', async () => {
    const { worker, semaphore } = setup({ failures: { 'Page 1': 'invalid-content' } });
    const task = taskFor('Page 1');

    const result = await worker.extract(task, semaphore);

    expect(result.status).toBe('ExtractionError');
    expect(result.errorCode).toBe(ErrorCode.VALIDATION_ERROR);
    expect(result.error).toBe('Extracted content rejected: title: page has no title');
    expect(await isArtifactValid(task.outputPath, task.item.id)).toBe(false);
  });

  it('reports an unwritable output path as an ExtractionError', async () => {
    const { worker, semaphore } = setup();
    const task = taskFor('Page 1');
    await fsPromises.mkdir(path.join(workDir, 'output'), { recursive: true });
    await fsPromises.writeFile(path.dirname(task.outputPath), 'not a directory', 'utf-8');

    const result = await worker.extract(task, semaphore);

    expect(result.status).toBe('ExtractionError');
    expect(result.errorCode).toBe(ErrorCode.FILE_SYSTEM_ERROR);
  });

  it('retries a failing session start', async () => {
    const { factory, worker, semaphore } = setup({ startFailures: 2 });

    const result = await worker.extract(taskFor('Page 1'), semaphore);

    expect(result.status).toBe('Success');
    expect(result.attempts).toBe(3);
    expect(factory.startAttempts).toBe(3);
  });

  it('gives up on session start after the retry bound', async () => {
    const { factory, worker, semaphore } = setup({ alwaysFailStart: true });

    const result = await worker.extract(taskFor('Page 1'), semaphore);

    expect(result.status).toBe('ExtractionError');
    expect(result.errorCode).toBe(ErrorCode.RESOURCE_ERROR);
    expect(result.error).toBe('Session failed to start after 3 attempts');
    expect(factory.startAttempts).toBe(3);
    expect(factory.sessions[0].closed).toBe(true);
    expect(semaphore.inUse).toBe(0);
  });

  it('times out an item that hangs', async () => {
    const { factory, worker, semaphore } = setup({ failures: { 'Page 1': 'hang' } }, { itemTimeoutMs: 100 });

    const result = await worker.extract(taskFor('Page 1'), semaphore);

    expect(result.status).toBe('Timeout');
    expect(result.error).toBe('Item exceeded 100ms');
    expect(factory.leakedSessions).toEqual([]);
    expect(semaphore.inUse).toBe(0);
  });

  it('keeps the permit until a session still launching at the timeout is torn down', async () => {
    const { factory, worker, semaphore } = setup({ opDelayMs: 200 }, { itemTimeoutMs: 50 });
    const task = taskFor('Page 1');

    const result = await worker.extract(task, semaphore);

    expect(result.status).toBe('Timeout');
    expect(result.error).toBe('Item exceeded 50ms');
    expect(factory.startAttempts).toBe(1);
    expect(factory.openCount).toBe(0);
    expect(factory.leakedSessions).toEqual([]);
    expect(semaphore.inUse).toBe(0);
    expect(await isArtifactValid(task.outputPath, task.item.id)).toBe(false);
  });

  it('never holds more browsers than permits when items time out during launch', async () => {
    const wide = menuSite(8);
    const wideStructure = await discoverFakeSite(wide, path.join(workDir, 'wide-cache'));
    const factory = new FakeSessionFactory(wide, { opDelayMs: 60 });
    const worker = new ExtractionWorker(factory, { ...settings, itemTimeoutMs: 40 });
    const semaphore = new Semaphore(2);
    const tasks = Array.from({ length: 8 }, (_, i) => taskIn(wideStructure, `Page ${i + 1}`));

    const results = await Promise.all(tasks.map((task) => worker.extract(task, semaphore)));

    expect(results.map((result) => result.status)).toEqual(Array.from({ length: 8 }, () => 'Timeout'));
    expect(factory.startAttempts).toBe(8);
    expect(factory.maxOpen).toBeLessThanOrEqual(2);
    expect(factory.openCount).toBe(0);
    expect(factory.leakedSessions).toEqual([]);
    expect(semaphore.inUse).toBe(0);
  });

  it('skips without opening a session when the run is already aborted', async () => {
    const { factory, worker, semaphore } = setup();
    const controller = new AbortController();
    controller.abort(ScraperErrors.cancelled());

    const result = await worker.extract(taskFor('Page 1'), semaphore, { signal: controller.signal });

    expect(result.status).toBe('Skipped');
    expect(result.attempts).toBe(0);
    expect(factory.sessions).toHaveLength(0);
  });

  it('skips a task still waiting for a permit when the run aborts', async () => {
    const { factory, worker, semaphore } = setup();
    const controller = new AbortController();
    await semaphore.acquire();

    const pending = worker.extract(taskFor('Page 1'), semaphore, { signal: controller.signal });
    controller.abort(ScraperErrors.cancelled());
    const result = await pending;

    expect(result.status).toBe('Skipped');
    expect(factory.sessions).toHaveLength(0);
    expect(semaphore.inUse).toBe(1);
    semaphore.release();
  });

  it('gives an in-flight item the grace period after an abort, then times it out', async () => {
    const { factory, worker, semaphore } = setup({ failures: { 'Page 1': 'hang' } });
    const controller = new AbortController();

    const pending = worker.extract(taskFor('Page 1'), semaphore, { signal: controller.signal });
    setTimeout(() => controller.abort(ScraperErrors.cancelled()), 20);
    const result = await pending;

    expect(result.status).toBe('Timeout');
    expect(result.error).toBe('Run aborted and grace period elapsed');
    expect(factory.leakedSessions).toEqual([]);
  });
});
