/**
 * Resume partitioning
 * An item is done when its output document exists and still parses as a page
 * for the same item; everything else among the leaves is pending.
 */

import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import { slugify } from '../utils/filesystem';
import { safeJsonParse } from '../utils/safe-json';
import { extractedPageSchema } from './schemas';
import { leafIds } from './structure-builder';
import type { ResumeReport, ResumeState, SidebarStructure } from './types';

/**
 * Slug of an item's title, suffixed with -2, -3... when earlier siblings
 * share the same slug.
 */
function segmentFor(structure: SidebarStructure, itemId: string): string {
  const item = structure.items[itemId];
  const base = slugify(item.title);
  const siblings = item.parentId ? structure.items[item.parentId]?.children ?? [] : structure.roots;
  let clashes = 0;
  for (const siblingId of siblings) {
    if (siblingId === itemId) break;
    const sibling = structure.items[siblingId];
    if (sibling && slugify(sibling.title) === base) clashes++;
  }
  return clashes === 0 ? base : `${base}-${clashes + 1}`;
}

/**
 * outputRoot/<ancestor slugs...>/<title slug>.json
 */
export function outputPathFor(structure: SidebarStructure, itemId: string, outputRoot: string): string {
  if (!structure.items[itemId]) {
    throw new Error(`Unknown item ${itemId}`);
  }
  const segments: string[] = [];
  const seen = new Set<string>();
  let parentId = structure.items[itemId].parentId;
  while (parentId && !seen.has(parentId) && structure.items[parentId]) {
    seen.add(parentId);
    segments.unshift(segmentFor(structure, parentId));
    parentId = structure.items[parentId].parentId;
  }
  return path.join(outputRoot, ...segments, `${segmentFor(structure, itemId)}.json`);
}

/**
 * Non-empty, valid JSON, matching the page shape, written for this item.
 */
export async function isArtifactValid(filePath: string, itemId: string): Promise<boolean> {
  let raw: string;
  try {
    raw = await fsPromises.readFile(filePath, 'utf-8');
  } catch {
    return false;
  }
  if (raw.trim() === '') return false;

  let parsed: unknown;
  try {
    parsed = safeJsonParse(raw);
  } catch {
    return false;
  }
  const result = extractedPageSchema.safeParse(parsed);
  return result.success && result.data.itemId === itemId;
}

export class ResumeTracker {
  async partition(structure: SidebarStructure, outputRoot: string, force: boolean): Promise<ResumeState> {
    const leaves = leafIds(structure);
    if (force) {
      return { done: new Set(), pending: leaves };
    }

    const checks = await Promise.all(
      leaves.map(async (id) => ({
        id,
        done: await isArtifactValid(outputPathFor(structure, id, outputRoot), id),
      })),
    );

    const done = new Set<string>();
    const pending: string[] = [];
    for (const check of checks) {
      if (check.done) {
        done.add(check.id);
      } else {
        pending.push(check.id);
      }
    }
    return { done, pending };
  }

  async buildResumeReport(structure: SidebarStructure, outputRoot: string): Promise<ResumeReport> {
    const state = await this.partition(structure, outputRoot, false);
    const total = state.done.size + state.pending.length;
    return {
      total,
      done: state.done.size,
      pending: state.pending.length,
      completionPercent: total === 0 ? 100 : Math.round((state.done.size / total) * 1000) / 10,
      pendingItems: state.pending.map((id) => ({ title: structure.items[id].title, id })),
    };
  }
}

export function formatResumeReport(report: ResumeReport, maxListed: number = 20): string {
  const lines = [
    `Total pages:   ${report.total}`,
    `Completed:     ${report.done}`,
    `Pending:       ${report.pending}`,
    `Progress:      ${report.completionPercent}%`,
  ];
  if (report.pendingItems.length > 0) {
    lines.push('', 'Pending pages:');
    for (const entry of report.pendingItems.slice(0, maxListed)) {
      lines.push(`  - ${entry.title} (${entry.id})`);
    }
    if (report.pendingItems.length > maxListed) {
      lines.push(`  ... and ${report.pendingItems.length - maxListed} more`);
    }
  }
  return lines.join('\n');
}
