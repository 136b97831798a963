/**
 * 导航结构发现
 * 缓存优先；缓存未命中或被覆盖时展开侧边栏并实时解析
 */

import { sleep } from '../utils/async';
import { createEnhancedLogger } from '../utils/logger';
import { CacheStore } from './cache-store';
import { ScraperErrors, handleError } from './errors';
import { decideExpansion, ExpansionReason } from './expansion-gate';
import type { AutomationSession } from './session';
import { buildStructure } from './structure-builder';
import type { ExpansionOverrides, ExpansionSessionState, SidebarStructure } from './types';

export interface DiscoverySettings {
  navigationMs: number;
  sidebarWaitMs: number;
  expandDelayMs: number;
  postExpandSettleMs: number;
  maxExpandAttempts: number;
  skipTitles: string[];
}

export interface DiscoveryRequest {
  sourceUrl: string;
  overrides: ExpansionOverrides;
  state: ExpansionSessionState;
}

export interface ExpansionOutcome {
  rounds: number;
  expanded: number;
  converged: boolean;
  remaining: number;
}

export interface DiscoveryResult {
  structure: SidebarStructure;
  fromCache: boolean;
  expansionRan: boolean;
  expansionReason: ExpansionReason;
  state: ExpansionSessionState;
  warnings: string[];
}

export class StructureDiscoverer {
  private readonly logger = createEnhancedLogger('StructureDiscoverer');

  constructor(
    private readonly cache: CacheStore,
    private readonly settings: DiscoverySettings,
  ) {}

  async discover(session: AutomationSession, request: DiscoveryRequest): Promise<DiscoveryResult> {
    const { sourceUrl, overrides } = request;
    const warnings: string[] = [];
    this.logger.setContext({ sourceUrl });

    const cached = overrides.force ? null : await this.cache.load(sourceUrl);

    if (cached) {
      const decision = decideExpansion(request.state, { fromCache: true, overrides });
      if (!decision.expand) {
        this.logger.info('Using cached structure, expansion skipped', {
          reason: decision.reason,
          items: cached.totalItemCount,
        });
        return {
          structure: cached,
          fromCache: true,
          expansionRan: false,
          expansionReason: decision.reason,
          state: decision.next,
          warnings,
        };
      }

      this.logger.info('Cached structure present but an override requests full expansion', { overrides });
      try {
        const live = await this.discoverLive(session, sourceUrl, warnings);
        if (overrides.validateCache) this.reportCacheDrift(cached, live);
        return {
          structure: live,
          fromCache: false,
          expansionRan: true,
          expansionReason: decision.reason,
          state: decision.next,
          warnings,
        };
      } catch (error: unknown) {
        const scraperError = handleError(error, { operation: 'rediscover' });
        this.logger.warn('Live rediscovery failed, keeping cached structure', {
          code: scraperError.code,
          message: scraperError.message,
        });
        warnings.push(`Live rediscovery failed (${scraperError.code}): ${scraperError.message}`);
        // Expansion did not complete, so a later override in this process may still try again.
        return {
          structure: cached,
          fromCache: true,
          expansionRan: false,
          expansionReason: decision.reason,
          state: request.state,
          warnings,
        };
      }
    }

    const decision = decideExpansion(request.state, { fromCache: false, overrides });
    const structure = await this.discoverLive(session, sourceUrl, warnings);
    return {
      structure,
      fromCache: false,
      expansionRan: true,
      expansionReason: decision.reason,
      state: decision.next,
      warnings,
    };
  }

  /**
   * Expands collapsed nodes round by round until a scan finds nothing new or
   * the attempt bound is reached. Each ref is clicked at most once.
   */
  async expandAll(session: AutomationSession): Promise<ExpansionOutcome> {
    const attempted = new Set<string>();
    let rounds = 0;
    let expanded = 0;

    while (rounds < this.settings.maxExpandAttempts) {
      rounds++;
      const fresh = (await session.listCollapsed()).filter((ref) => !attempted.has(ref));
      if (fresh.length === 0) {
        return { rounds, expanded, converged: true, remaining: 0 };
      }

      this.logger.debug(`Expansion round ${rounds}`, { pending: fresh.length });
      for (const ref of fresh) {
        attempted.add(ref);
        if (await session.expand(ref)) {
          expanded++;
        } else {
          this.logger.debug('Expand click had no effect', { ref });
        }
        if (this.settings.expandDelayMs > 0) await sleep(this.settings.expandDelayMs);
      }
    }

    const remaining = (await session.listCollapsed()).filter((ref) => !attempted.has(ref)).length;
    return { rounds, expanded, converged: remaining === 0, remaining };
  }

  private async discoverLive(
    session: AutomationSession,
    sourceUrl: string,
    warnings: string[],
  ): Promise<SidebarStructure> {
    return this.logger.trackAsync('discoverLive', async () => {
      await session.start();
      await session.navigate(sourceUrl, this.settings.navigationMs);

      const found = await session.waitForNavigation(this.settings.sidebarWaitMs);
      if (!found) {
        throw ScraperErrors.sidebarNotFound(sourceUrl, this.settings.sidebarWaitMs);
      }

      const layout = await session.detectLayout();
      if (layout === 'unknown') {
        throw ScraperErrors.parseFailed('Navigation layout matches neither nested nor flat variant', {
          url: sourceUrl,
        });
      }

      const outcome = await this.expandAll(session);
      this.logger.info('Expansion finished', { layout, ...outcome });
      if (!outcome.converged) {
        const warning = ScraperErrors.partialExpansion(outcome.rounds, outcome.remaining);
        this.logger.warn(warning.message, { code: warning.code });
        warnings.push(warning.message);
      }
      if (outcome.expanded > 0 && this.settings.postExpandSettleMs > 0) {
        await sleep(this.settings.postExpandSettleMs);
      }

      const nodes = await session.readNavNodes();
      const structure = buildStructure(nodes, layout, {
        sourceUrl,
        skipTitles: this.settings.skipTitles,
      });
      this.logger.info('Structure parsed', {
        layout,
        items: structure.totalItemCount,
        valid: structure.validItemCount,
        roots: structure.roots.length,
      });

      try {
        await this.cache.save(structure);
      } catch (error: unknown) {
        const scraperError = handleError(error, { operation: 'cache.save' });
        this.logger.error('Failed to save structure cache', scraperError);
        warnings.push(`Structure cache not saved: ${scraperError.message}`);
      }
      return structure;
    });
  }

  private reportCacheDrift(cached: SidebarStructure, live: SidebarStructure): void {
    const cachedIds = new Set(Object.keys(cached.items));
    const liveIds = new Set(Object.keys(live.items));
    const added = [...liveIds].filter((id) => !cachedIds.has(id)).length;
    const removed = [...cachedIds].filter((id) => !liveIds.has(id)).length;
    this.logger.info('Cache validation', {
      cachedItems: cached.totalItemCount,
      liveItems: live.totalItemCount,
      added,
      removed,
    });
  }
}
