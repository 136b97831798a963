/**
 * In-memory AutomationSession for tests.
 *
 * A FakeSite describes a navigation tree; every session created by the
 * factory starts with all menus collapsed and tracks its own expansions, the
 * way a fresh browser would. The factory counts open sessions so tests can
 * assert the concurrency bound.
 */

import type { AutomationSession, NavLayout, NavNodeInfo, PageContent, SessionFactory } from '../../core/session';

export interface FakeNode {
  title: string;
  id?: string;
  children?: FakeNode[];
  /** Header marker (flat layouts). */
  header?: boolean;
  /** Collapsible menu. */
  toggle?: boolean;
  /** Links to its own content page. Defaults to true for leaves. */
  target?: boolean;
  /** Every expansion reveals one more collapsed child, forever. */
  endless?: boolean;
}

export type FailureMode = 'activate' | 'content' | 'no-content' | 'invalid-content' | 'hang';

export interface FakeSite {
  layout: NavLayout;
  nodes: FakeNode[];
  sidebarPresent?: boolean;
}

export interface FakeFactoryOptions {
  /** The first N calls to start() fail. */
  startFailures?: number;
  /** Every start() fails. */
  alwaysFailStart?: boolean;
  /** Failure injected for the item whose title matches. */
  failures?: Record<string, FailureMode>;
  /** Delay applied to page operations, in ms. */
  opDelayMs?: number;
}

interface Located {
  node: FakeNode;
  ref: string;
  titles: string[];
  parentRef: string | null;
  depth: number;
}

function childrenOf(node: FakeNode): FakeNode[] {
  if (node.endless) {
    return [{ title: `${node.title}+`, toggle: true, endless: true }];
  }
  return node.children ?? [];
}

function refOf(node: FakeNode, titles: string[]): string {
  return node.id ? `id:${node.id}` : `path:${titles.join(' / ')}`;
}

function hasTarget(node: FakeNode): boolean {
  if (node.target !== undefined) return node.target;
  return !node.header && !node.toggle && childrenOf(node).length === 0;
}

const delay = (ms: number) => (ms > 0 ? new Promise<void>((resolve) => setTimeout(resolve, ms)) : Promise.resolve());

export class FakeSession implements AutomationSession {
  started = false;
  closed = false;
  readonly expanded = new Set<string>();
  readonly activated: string[] = [];
  private current: Located | null = null;
  private open = false;
  private starting: Promise<void> | null = null;
  private readonly closeWaiters: Array<() => void> = [];

  constructor(
    readonly id: string,
    private readonly site: FakeSite,
    private readonly factory: FakeSessionFactory,
  ) {}

  /** Holds a browser: launched and not yet closed. */
  get isOpen(): boolean {
    return this.open;
  }

  async start(): Promise<void> {
    if (this.closed) throw new Error('Session closed');
    if (this.started) return;
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    await this.starting;
  }

  private async launch(): Promise<void> {
    this.factory.startAttempts++;
    await delay(this.factory.options.opDelayMs ?? 0);
    if (this.factory.shouldFailStart()) {
      throw new Error('Failed to launch the browser process');
    }
    if (this.closed) throw new Error('Session closed during launch');
    this.started = true;
    this.open = true;
    this.factory.opened(this);
  }

  async navigate(_url: string, _timeoutMs: number): Promise<void> {
    this.requireStarted();
    this.current = null;
    await delay(this.factory.options.opDelayMs ?? 0);
    this.requireStarted();
  }

  async waitForNavigation(_timeoutMs: number): Promise<boolean> {
    this.requireStarted();
    return this.site.sidebarPresent !== false;
  }

  async detectLayout(): Promise<NavLayout> {
    this.requireStarted();
    return this.site.layout;
  }

  async listCollapsed(): Promise<string[]> {
    this.factory.listCollapsedCalls++;
    return this.visible()
      .filter((entry) => entry.node.toggle && !this.expanded.has(entry.ref))
      .map((entry) => entry.ref);
  }

  async expand(ref: string): Promise<boolean> {
    this.factory.expandCalls++;
    const entry = this.visible().find((candidate) => candidate.ref === ref);
    if (!entry || !entry.node.toggle) return false;
    this.expanded.add(ref);
    return true;
  }

  async readNavNodes(): Promise<NavNodeInfo[]> {
    this.factory.readNavCalls++;
    const flat = this.site.layout === 'flat';
    return this.visible().map((entry) => ({
      ref: entry.ref,
      text: entry.node.title,
      declaredId: entry.node.id ?? null,
      parentRef: flat ? null : entry.parentRef,
      depth: entry.depth,
      isHeader: entry.node.header ?? false,
      hasToggle: entry.node.toggle ?? false,
      expanded: this.expanded.has(entry.ref),
      hasTarget: hasTarget(entry.node),
    }));
  }

  async activate(ref: string): Promise<void> {
    this.requireStarted();
    await delay(this.factory.options.opDelayMs ?? 0);
    this.requireStarted();
    const entry = this.visible().find((candidate) => candidate.ref === ref);
    if (!entry) throw new Error(`No node matches ${ref}`);
    const failure = this.factory.failureFor(entry.node.title);
    if (failure === 'activate') throw new Error(`Click on ${ref} did not navigate`);
    if (failure === 'hang') {
      // Never settles on its own; closing the session ends it, as closing a browser does.
      await new Promise<void>((resolve) => this.closeWaiters.push(resolve));
      throw new Error('Protocol error: Target closed');
    }
    this.activated.push(ref);
    this.current = entry;
  }

  async waitForContent(_timeoutMs: number): Promise<boolean> {
    await delay(this.factory.options.opDelayMs ?? 0);
    this.requireStarted();
    if (!this.current) return false;
    return this.factory.failureFor(this.current.node.title) !== 'no-content';
  }

  async readContent(): Promise<PageContent> {
    const entry = this.current;
    if (!entry) throw new Error('No page loaded');
    const failure = this.factory.failureFor(entry.node.title);
    if (failure === 'content') throw new Error('Content region vanished');
    return {
      title: failure === 'invalid-content' ? '' : entry.node.title,
      url: `https://docs.example.test/${entry.ref}`,
      description: `About ${entry.node.title}`,
      parameters: [{ name: 'limit', location: 'query', type: 'integer', required: false, description: 'Page size' }],
      responses: [{ statusCode: '200', description: 'OK', fields: [] }],
      schemaFields: [],
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const wake of this.closeWaiters.splice(0)) wake();
    if (this.starting) {
      await this.starting.catch(() => undefined);
    }
    if (this.open) {
      this.open = false;
      this.factory.closedOne(this);
    }
  }

  private requireStarted(): void {
    if (this.closed) throw new Error('Protocol error: Target closed');
    if (!this.started) throw new Error('Session not started');
  }

  /** Nodes currently rendered, in document order. */
  private visible(): Located[] {
    const result: Located[] = [];
    const walk = (nodes: FakeNode[], titles: string[], parentRef: string | null, depth: number) => {
      for (const node of nodes) {
        const path = [...titles, node.title];
        const ref = refOf(node, path);
        result.push({ node, ref, titles: path, parentRef, depth });
        const open = !node.toggle || this.expanded.has(ref);
        if (open) {
          walk(childrenOf(node), path, ref, node.header ? depth : depth + 1);
        }
      }
    };
    walk(this.site.nodes, [], null, 0);
    return result;
  }
}

export class FakeSessionFactory implements SessionFactory {
  readonly sessions: FakeSession[] = [];
  openCount = 0;
  maxOpen = 0;
  startAttempts = 0;
  listCollapsedCalls = 0;
  expandCalls = 0;
  readNavCalls = 0;
  private failedStarts = 0;

  constructor(
    readonly site: FakeSite,
    readonly options: FakeFactoryOptions = {},
  ) {}

  create(label: string): FakeSession {
    const session = new FakeSession(label, this.site, this);
    this.sessions.push(session);
    return session;
  }

  get leakedSessions(): FakeSession[] {
    return this.sessions.filter((session) => session.isOpen);
  }

  opened(_session: FakeSession): void {
    this.openCount++;
    this.maxOpen = Math.max(this.maxOpen, this.openCount);
  }

  closedOne(_session: FakeSession): void {
    this.openCount--;
  }

  shouldFailStart(): boolean {
    if (this.options.alwaysFailStart) return true;
    if (this.failedStarts < (this.options.startFailures ?? 0)) {
      this.failedStarts++;
      return true;
    }
    return false;
  }

  failureFor(title: string): FailureMode | undefined {
    return this.options.failures?.[title];
  }
}

/** `count` leaf pages named "Page 1".."Page N" under one collapsible menu. */
export function menuSite(count: number, menuTitle: string = 'Endpoints'): FakeSite {
  return {
    layout: 'nested',
    nodes: [
      {
        title: menuTitle,
        toggle: true,
        children: Array.from({ length: count }, (_, i) => ({ title: `Page ${i + 1}` })),
      },
    ],
  };
}
