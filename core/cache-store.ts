/**
 * Structure cache
 * One JSON file per source URL, written atomically and fully re-validated on load.
 */

import { createHash } from 'node:crypto';
import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import { CACHE_SCHEMA_VERSION, MIN_VALID_ITEMS, MIN_VALID_RATIO } from '../config/constants';
import { slugify, writeJsonAtomic } from '../utils/filesystem';
import { createModuleLogger } from '../utils/logger';
import { safeJsonParse } from '../utils/safe-json';
import { CacheRecord, cacheRecordSchema } from './schemas';
import { countValidItems, findStructureViolation } from './structure-builder';
import type { SidebarItem, SidebarStructure } from './types';

const logger = createModuleLogger('CacheStore');

export interface CacheStoreOptions {
  dir: string;
  minValidItems?: number;
  minValidRatio?: number;
}

export type CacheInspection =
  | { status: 'hit'; path: string; structure: SidebarStructure }
  | { status: 'miss'; path: string; reason: string }
  | { status: 'invalid'; path: string; reason: string };

/**
 * SHA-256 over the roots and items with a fixed key order, so the checksum
 * does not depend on how the record was serialized.
 */
export function structureChecksum(structure: Pick<SidebarStructure, 'items' | 'roots'>): string {
  const canonicalItems = Object.keys(structure.items)
    .sort()
    .map((key) => {
      const item: SidebarItem = structure.items[key];
      return [key, item.id, item.title, item.level, item.parentId, item.children, item.isExpandable, item.targetRef];
    });
  return createHash('sha256')
    .update(JSON.stringify({ roots: structure.roots, items: canonicalItems }))
    .digest('hex');
}

export class CacheStore {
  private readonly dir: string;
  private readonly minValidItems: number;
  private readonly minValidRatio: number;

  constructor(options: CacheStoreOptions) {
    this.dir = options.dir;
    this.minValidItems = options.minValidItems ?? MIN_VALID_ITEMS;
    this.minValidRatio = options.minValidRatio ?? MIN_VALID_RATIO;
  }

  pathFor(sourceUrl: string): string {
    let key: string;
    try {
      const url = new URL(sourceUrl);
      key = `${url.host}${url.pathname}`;
    } catch {
      key = sourceUrl;
    }
    return path.join(this.dir, `${slugify(key, 'site')}.structure.json`);
  }

  /**
   * Loads and classifies the cache without throwing.
   */
  async inspect(sourceUrl: string): Promise<CacheInspection> {
    const filePath = this.pathFor(sourceUrl);

    let raw: string;
    try {
      raw = await fsPromises.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      const reason = isNotFound(error) ? 'no cache file' : `unreadable: ${errorMessage(error)}`;
      return { status: 'miss', path: filePath, reason };
    }

    let parsed: unknown;
    try {
      parsed = safeJsonParse(raw);
    } catch (error: unknown) {
      return { status: 'invalid', path: filePath, reason: `malformed JSON: ${errorMessage(error)}` };
    }

    const result = cacheRecordSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      return {
        status: 'invalid',
        path: filePath,
        reason: `record shape: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`,
      };
    }

    const reason = this.rejectionReason(result.data, sourceUrl);
    if (reason) {
      return { status: 'invalid', path: filePath, reason };
    }
    return { status: 'hit', path: filePath, structure: result.data.structure };
  }

  /**
   * Returns the cached structure, or null for a missing or untrusted cache.
   */
  async load(sourceUrl: string): Promise<SidebarStructure | null> {
    const inspection = await this.inspect(sourceUrl);
    switch (inspection.status) {
      case 'hit':
        logger.info('Structure cache hit', {
          path: inspection.path,
          items: inspection.structure.totalItemCount,
        });
        return inspection.structure;
      case 'miss':
        logger.debug('Structure cache miss', { path: inspection.path, reason: inspection.reason });
        return null;
      case 'invalid':
        logger.warn('Structure cache rejected', { path: inspection.path, reason: inspection.reason });
        return null;
    }
  }

  async save(structure: SidebarStructure): Promise<string> {
    const filePath = this.pathFor(structure.sourceUrl);
    const record: CacheRecord = {
      schemaVersion: CACHE_SCHEMA_VERSION,
      sourceUrl: structure.sourceUrl,
      capturedAt: structure.capturedAt,
      integrity: {
        itemCount: Object.keys(structure.items).length,
        checksum: structureChecksum(structure),
      },
      structure,
    };
    await writeJsonAtomic(filePath, record);
    logger.info('Structure cache saved', { path: filePath, items: structure.totalItemCount });
    return filePath;
  }

  async clear(sourceUrl: string): Promise<void> {
    await fsPromises.rm(this.pathFor(sourceUrl), { force: true });
  }

  private rejectionReason(record: CacheRecord, sourceUrl: string): string | null {
    const { structure } = record;

    if (record.schemaVersion > CACHE_SCHEMA_VERSION) {
      return `unsupported schema version ${record.schemaVersion}`;
    }
    if (record.sourceUrl !== sourceUrl || structure.sourceUrl !== sourceUrl) {
      return `cached for ${record.sourceUrl}, not ${sourceUrl}`;
    }
    if (record.integrity.itemCount !== Object.keys(structure.items).length) {
      return `item count ${Object.keys(structure.items).length} does not match integrity count ${record.integrity.itemCount}`;
    }
    if (record.integrity.checksum !== structureChecksum(structure)) {
      return 'checksum mismatch';
    }

    const violation = findStructureViolation(structure);
    if (violation) return `malformed structure: ${violation}`;

    const validItems = countValidItems(structure);
    if (validItems !== structure.validItemCount) {
      return `validItemCount ${structure.validItemCount} does not match ${validItems} valid items`;
    }
    if (structure.totalItemCount < this.minValidItems) {
      return `only ${structure.totalItemCount} items, need at least ${this.minValidItems}`;
    }
    const ratio = structure.validItemCount / structure.totalItemCount;
    if (!(ratio > this.minValidRatio)) {
      return `valid ratio ${ratio.toFixed(3)} not above ${this.minValidRatio}`;
    }
    return null;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
