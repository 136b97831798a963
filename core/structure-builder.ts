/**
 * Turns a snapshot of navigation nodes into a SidebarStructure.
 *
 * Pure: no session, no filesystem. Both layouts end in the same item table so
 * ids, levels and expandability are decided in one place.
 */

import { createHash } from 'node:crypto';
import { ScraperErrors } from './errors';
import type { NavLayout, NavNodeInfo } from './session';
import type { AncestorRef, SidebarItem, SidebarStructure } from './types';

export interface BuildOptions {
  sourceUrl: string;
  capturedAt?: string;
  skipTitles?: string[];
}

interface Draft {
  node: NavNodeInfo;
  title: string;
  parent: Draft | null;
  children: Draft[];
}

const ID_HASH_LENGTH = 16;

/**
 * Deterministic id for nodes that declare none: a hash of the ancestor title
 * path, the node's own title and its level.
 */
export function syntheticId(ancestorTitles: string[], title: string, level: number): string {
  const digest = createHash('sha256')
    .update(JSON.stringify([ancestorTitles, title, level]))
    .digest('hex');
  return `nav-${digest.slice(0, ID_HASH_LENGTH)}`;
}

function normalizeTitle(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function shouldSkip(title: string, skipTitles: Set<string>): boolean {
  return skipTitles.has(title.toLowerCase());
}

function parseNested(nodes: NavNodeInfo[], skipTitles: Set<string>): Draft[] {
  const byRef = new Map<string, Draft>();
  const skipped = new Set<string>();
  const roots: Draft[] = [];

  for (const node of nodes) {
    if (node.parentRef && skipped.has(node.parentRef)) {
      skipped.add(node.ref);
      continue;
    }
    const title = normalizeTitle(node.text);
    if (shouldSkip(title, skipTitles)) {
      skipped.add(node.ref);
      continue;
    }
    const parent = node.parentRef ? byRef.get(node.parentRef) ?? null : null;
    const draft: Draft = { node, title, parent, children: [] };
    byRef.set(node.ref, draft);
    if (parent) {
      parent.children.push(draft);
    } else {
      roots.push(draft);
    }
  }
  return roots;
}

/**
 * Flat layouts list every entry as a sibling. A header opens a new top-level
 * group; other entries nest under the closest preceding entry with a smaller
 * depth, so a menu's children trail it.
 */
function parseFlat(nodes: NavNodeInfo[], skipTitles: Set<string>): Draft[] {
  const roots: Draft[] = [];
  let stack: Array<{ draft: Draft; depth: number }> = [];
  let skipDepth: number | null = null;

  for (const node of nodes) {
    const title = normalizeTitle(node.text);

    if (node.isHeader) {
      skipDepth = null;
      if (shouldSkip(title, skipTitles)) {
        skipDepth = Number.NEGATIVE_INFINITY;
        stack = [];
        continue;
      }
      const draft: Draft = { node, title, parent: null, children: [] };
      roots.push(draft);
      stack = [{ draft, depth: Number.NEGATIVE_INFINITY }];
      continue;
    }

    if (skipDepth !== null) {
      if (node.depth > skipDepth) continue;
      skipDepth = null;
    }
    if (shouldSkip(title, skipTitles)) {
      skipDepth = node.depth;
      continue;
    }

    while (stack.length > 0 && stack[stack.length - 1].depth >= node.depth) {
      stack.pop();
    }
    const parent = stack.length > 0 ? stack[stack.length - 1].draft : null;
    const draft: Draft = { node, title, parent, children: [] };
    if (parent) {
      parent.children.push(draft);
    } else {
      roots.push(draft);
    }
    stack.push({ draft, depth: node.depth });
  }
  return roots;
}

/**
 * Builds the item table from a node snapshot. Throws PARSING_ERROR for an
 * unknown layout or an empty result.
 */
export function buildStructure(
  nodes: NavNodeInfo[],
  layout: NavLayout,
  options: BuildOptions,
): SidebarStructure {
  if (layout === 'unknown') {
    throw ScraperErrors.parseFailed('Navigation layout matches neither nested nor flat variant', {
      url: options.sourceUrl,
    });
  }

  const skipTitles = new Set((options.skipTitles ?? []).map((t) => normalizeTitle(t).toLowerCase()));
  const roots = layout === 'nested' ? parseNested(nodes, skipTitles) : parseFlat(nodes, skipTitles);

  const items: Record<string, SidebarItem> = {};
  const rootIds: string[] = [];
  let validItemCount = 0;

  const assignId = (draft: Draft, ancestorTitles: string[], level: number): string => {
    const declared = draft.node.declaredId?.trim();
    const base = declared || syntheticId(ancestorTitles, draft.title, level);
    let id = base;
    for (let suffix = 2; Object.hasOwn(items, id); suffix++) {
      id = `${base}-${suffix}`;
    }
    return id;
  };

  const visit = (draft: Draft, parentId: string | null, ancestorTitles: string[], level: number): string => {
    const id = assignId(draft, ancestorTitles, level);
    const { node } = draft;
    const targetRef = node.hasTarget || node.hasToggle ? node.ref : '';
    const item: SidebarItem = {
      id,
      title: draft.title,
      level,
      parentId,
      children: [],
      isExpandable: node.isHeader || (node.hasToggle && !node.hasTarget),
      targetRef,
    };
    items[id] = item;
    if (item.title && item.targetRef) validItemCount++;

    const childTitles = [...ancestorTitles, draft.title];
    for (const child of draft.children) {
      item.children.push(visit(child, id, childTitles, level + 1));
    }
    return id;
  };

  for (const root of roots) {
    rootIds.push(visit(root, null, [], 0));
  }

  const totalItemCount = Object.keys(items).length;
  if (totalItemCount === 0) {
    throw ScraperErrors.parseFailed('Navigation snapshot produced no items', {
      url: options.sourceUrl,
      layout,
      nodeCount: nodes.length,
    });
  }

  return {
    items,
    roots: rootIds,
    sourceUrl: options.sourceUrl,
    capturedAt: options.capturedAt ?? new Date().toISOString(),
    totalItemCount,
    validItemCount,
  };
}

/**
 * A content page: nothing below it, not a container, and something to click.
 */
export function isLeaf(item: SidebarItem): boolean {
  return item.children.length === 0 && !item.isExpandable && item.targetRef !== '';
}

/** Leaf ids in depth-first source order. */
export function leafIds(structure: SidebarStructure): string[] {
  const result: string[] = [];
  const walk = (id: string) => {
    const item = structure.items[id];
    if (!item) return;
    if (isLeaf(item)) result.push(id);
    for (const child of item.children) walk(child);
  };
  for (const root of structure.roots) walk(root);
  return result;
}

/** Ancestors from the root down to the item's parent. */
export function ancestorsOf(structure: SidebarStructure, id: string): AncestorRef[] {
  const chain: AncestorRef[] = [];
  const seen = new Set<string>();
  let current = structure.items[id]?.parentId ?? null;
  while (current && !seen.has(current)) {
    seen.add(current);
    const item = structure.items[current];
    if (!item) break;
    chain.unshift({
      id: item.id,
      title: item.title,
      targetRef: item.targetRef,
      isExpandable: item.isExpandable,
    });
    current = item.parentId;
  }
  return chain;
}

/**
 * Returns the first broken forest invariant, or null when the structure is
 * well formed.
 */
export function findStructureViolation(structure: SidebarStructure): string | null {
  const { items, roots } = structure;

  for (const [key, item] of Object.entries(items)) {
    if (item.id !== key) return `item key ${key} does not match id ${item.id}`;
    if (item.parentId !== null && !items[item.parentId]) {
      return `item ${key} references missing parent ${item.parentId}`;
    }
    for (const childId of item.children) {
      const child = items[childId];
      if (!child) return `item ${key} lists missing child ${childId}`;
      if (child.parentId !== key) return `child ${childId} does not point back to ${key}`;
    }
  }

  const rootSet = new Set(roots);
  if (rootSet.size !== roots.length) return 'duplicate root id';
  for (const rootId of roots) {
    const root = items[rootId];
    if (!root) return `missing root ${rootId}`;
    if (root.parentId !== null) return `root ${rootId} has a parent`;
  }

  const visited = new Set<string>();
  const stack = [...roots];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    if (visited.has(id)) return `item ${id} reachable twice (cycle or shared child)`;
    visited.add(id);
    stack.push(...items[id].children);
  }
  if (visited.size !== Object.keys(items).length) return 'items unreachable from roots';

  if (structure.totalItemCount !== visited.size) {
    return `totalItemCount ${structure.totalItemCount} does not match ${visited.size} items`;
  }
  return null;
}

export function countValidItems(structure: SidebarStructure): number {
  return Object.values(structure.items).filter((item) => item.title !== '' && item.targetRef !== '').length;
}
