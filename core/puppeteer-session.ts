/**
 * Puppeteer implementation of AutomationSession.
 *
 * Every navigation node gets a `data-crawler-ref` attribute derived from its
 * declared id or its title path, so a fresh browser can find the same node
 * again. Each session launches its own browser.
 */

import { TimeoutError } from 'puppeteer-core';
import type { Page } from 'puppeteer-core';
import { REF_ATTRIBUTE } from '../config/constants';
import type { SelectorProfile } from '../config/selectors';
import { createModuleLogger } from '../utils/logger';
import { BrowserLaunchOptions, BrowserManager } from './browser-manager';
import { ScraperErrors } from './errors';
import { annotateNavNodes, clickRef, contentSettled, detectNavLayout, extractContent } from './page-scripts';
import type { AutomationSession, NavLayout, NavNodeInfo, PageContent, SessionFactory } from './session';

const logger = createModuleLogger('PuppeteerSession');

export class PuppeteerSession implements AutomationSession {
  private manager: BrowserManager | null = null;
  private page: Page | null = null;
  private starting: Promise<void> | null = null;
  private closed = false;

  constructor(
    public readonly id: string,
    private readonly launchOptions: BrowserLaunchOptions,
    private readonly profile: SelectorProfile,
  ) {}

  /** Launches the browser once; concurrent callers share the launch. Fails after close(). */
  async start(): Promise<void> {
    if (this.closed) throw ScraperErrors.sessionClosed(this.id);
    if (this.page) return;
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    await this.starting;
  }

  private async launch(): Promise<void> {
    const manager = new BrowserManager();
    this.manager = manager;
    try {
      await manager.launch(this.launchOptions);
      const page = await manager.createPage(this.launchOptions);
      if (this.closed) throw ScraperErrors.sessionClosed(this.id);
      this.page = page;
    } catch (error: unknown) {
      if (this.manager === manager) this.manager = null;
      await manager.close();
      throw error;
    }
    logger.debug('Session started', { session: this.id });
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const page = this.requirePage();
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    } catch (error: unknown) {
      throw ScraperErrors.navigationFailed(url, error instanceof Error ? error : undefined);
    }
  }

  async waitForNavigation(timeoutMs: number): Promise<boolean> {
    return this.waitOrFalse(() =>
      this.requirePage().waitForSelector(this.profile.container, { timeout: timeoutMs, visible: true }),
    );
  }

  async detectLayout(): Promise<NavLayout> {
    return this.requirePage().evaluate(detectNavLayout, this.profile);
  }

  async listCollapsed(): Promise<string[]> {
    const nodes = await this.readNavNodes();
    return nodes.filter((node) => node.hasToggle && !node.expanded).map((node) => node.ref);
  }

  async expand(ref: string): Promise<boolean> {
    const page = this.requirePage();
    await page.evaluate(annotateNavNodes, this.profile, REF_ATTRIBUTE);
    return page.evaluate(clickRef, this.profile, REF_ATTRIBUTE, ref, 'expand' as const);
  }

  async readNavNodes(): Promise<NavNodeInfo[]> {
    return this.requirePage().evaluate(annotateNavNodes, this.profile, REF_ATTRIBUTE);
  }

  async activate(ref: string): Promise<void> {
    const page = this.requirePage();
    await page.evaluate(annotateNavNodes, this.profile, REF_ATTRIBUTE);
    const clicked = await page.evaluate(clickRef, this.profile, REF_ATTRIBUTE, ref, 'activate' as const);
    if (!clicked) {
      throw ScraperErrors.elementNotFound(ref, { session: this.id });
    }
  }

  async waitForContent(timeoutMs: number): Promise<boolean> {
    return this.waitOrFalse(() =>
      this.requirePage().waitForFunction(contentSettled, { timeout: timeoutMs, polling: 500 }, this.profile.content),
    );
  }

  async readContent(): Promise<PageContent> {
    return this.requirePage().evaluate(extractContent, this.profile.content);
  }

  /** Idempotent. A launch still in flight is awaited and its browser torn down. */
  async close(): Promise<void> {
    this.closed = true;
    const starting = this.starting;
    if (starting) {
      try {
        await starting;
      } catch (error: unknown) {
        logger.debug('Launch ended by close', { session: this.id, error: String(error) });
      }
    }
    const manager = this.manager;
    this.manager = null;
    this.page = null;
    if (manager) await manager.close();
  }

  private requirePage(): Page {
    if (!this.page) throw ScraperErrors.sessionNotStarted();
    return this.page;
  }

  private async waitOrFalse(wait: () => Promise<unknown>): Promise<boolean> {
    try {
      await wait();
      return true;
    } catch (error: unknown) {
      if (error instanceof TimeoutError) return false;
      throw error;
    }
  }
}

export class PuppeteerSessionFactory implements SessionFactory {
  constructor(
    private readonly launchOptions: BrowserLaunchOptions,
    private readonly profile: SelectorProfile,
  ) {}

  create(label: string): AutomationSession {
    return new PuppeteerSession(label, this.launchOptions, this.profile);
  }
}
