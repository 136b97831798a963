/**
 * Functions evaluated inside the page by PuppeteerSession.
 *
 * Each one is serialized by `page.evaluate`, so it must be self-contained:
 * no imports at run time and no closures over module scope.
 */

import type { SelectorProfile } from '../config/selectors';
import type { NavLayout, NavNodeInfo, PageContent } from './session';

/**
 * Stamps refs on every navigation node and returns them in document order.
 * Runs inside the page.
 */
export function annotateNavNodes(profile: SelectorProfile, refAttr: string): NavNodeInfo[] {
  const container = document.querySelector(profile.container);
  if (!container) return [];

  const elements = Array.from(container.querySelectorAll<HTMLElement>(profile.item));
  const known = new Set<Element>(elements);
  const clean = (value: string | null | undefined) => (value ?? '').replace(/\s+/g, ' ').trim();
  const own = (el: HTMLElement, selector: string): HTMLElement | null => {
    const found = Array.from(el.querySelectorAll<HTMLElement>(selector));
    return found.find((candidate) => candidate.closest(profile.item) === el) ?? null;
  };
  const parentOf = (el: HTMLElement): HTMLElement | null => {
    let cursor = el.parentElement;
    while (cursor && cursor !== container) {
      if (known.has(cursor)) return cursor;
      cursor = cursor.parentElement;
    }
    return null;
  };
  const textOf = (el: HTMLElement): string => {
    const label = own(el, profile.label);
    if (label) return clean(label.textContent);
    return clean(
      Array.from(el.childNodes)
        .filter((node) => node.nodeType === Node.TEXT_NODE)
        .map((node) => node.textContent)
        .join(' '),
    );
  };

  const info = new Map<HTMLElement, { text: string; parent: HTMLElement | null; nesting: number }>();
  for (const el of elements) {
    const parent = parentOf(el);
    const parentInfo = parent ? info.get(parent) : undefined;
    info.set(el, { text: textOf(el), parent, nesting: parentInfo ? parentInfo.nesting + 1 : 0 });
  }

  const pathOf = (el: HTMLElement): string => {
    const titles: string[] = [];
    let cursor: HTMLElement | null = el;
    while (cursor) {
      const entry = info.get(cursor);
      if (!entry) break;
      titles.unshift(entry.text);
      cursor = entry.parent;
    }
    return titles.join(' / ');
  };

  const seen = new Map<string, number>();
  const nodes: NavNodeInfo[] = [];
  for (const el of elements) {
    const entry = info.get(el);
    if (!entry) continue;
    const link = el.matches(profile.link) ? el : own(el, profile.link);
    const href = link?.getAttribute('href') ?? '';
    const toggle = el.matches(profile.toggle) ? el : own(el, profile.toggle);
    const expandedAttr = toggle?.getAttribute('aria-expanded') ?? el.getAttribute('aria-expanded');
    const childList = own(el, profile.childList);
    const declaredId = el.getAttribute(profile.idAttribute) || link?.getAttribute(profile.idAttribute) || null;
    const levelAttr = Number.parseInt(el.getAttribute(profile.levelAttribute) ?? '', 10);

    let depth = entry.nesting;
    if (!Number.isNaN(levelAttr)) {
      depth = levelAttr;
    } else if (entry.nesting === 0) {
      const style = window.getComputedStyle(el);
      depth = Math.round((Number.parseFloat(style.paddingLeft) + Number.parseFloat(style.marginLeft)) / 12) || 0;
    }

    const base = declaredId ? `id:${declaredId}` : `path:${pathOf(el)}`;
    const occurrence = (seen.get(base) ?? 0) + 1;
    seen.set(base, occurrence);
    const ref = occurrence === 1 ? base : `${base}#${occurrence}`;
    el.setAttribute(refAttr, ref);

    const parentEntry = entry.parent;
    nodes.push({
      ref,
      text: entry.text,
      declaredId,
      parentRef: parentEntry ? parentEntry.getAttribute(refAttr) : null,
      depth,
      isHeader: el.matches(profile.header),
      hasToggle: Boolean(toggle),
      expanded:
        expandedAttr !== null
          ? expandedAttr === 'true'
          : Boolean(childList && childList.offsetParent !== null),
      hasTarget: href !== '' && href !== '#' && !href.startsWith('javascript:'),
    });
  }
  return nodes;
}

export function detectNavLayout(profile: SelectorProfile): NavLayout {
  const container = document.querySelector(profile.container);
  if (!container) return 'unknown';
  const items = Array.from(container.querySelectorAll(profile.item));
  if (items.length === 0) return 'unknown';
  const nested = items.some((item) => {
    const list = item.querySelector(profile.childList);
    return list !== null && list.querySelector(profile.item) !== null;
  });
  if (nested) return 'nested';
  const hasToggles = items.some((item) => item.matches(profile.toggle) || item.querySelector(profile.toggle) !== null);
  if (hasToggles) return 'nested';
  if (items.some((item) => item.matches(profile.header))) return 'flat';
  return 'nested';
}

export function clickRef(profile: SelectorProfile, refAttr: string, ref: string, mode: 'expand' | 'activate'): boolean {
  const escaped = typeof CSS !== 'undefined' && typeof CSS.escape === 'function' ? CSS.escape(ref) : ref.replace(/["\\]/g, '\\$&');
  const el = document.querySelector<HTMLElement>(`[${refAttr}="${escaped}"]`);
  if (!el) return false;
  const own = (selector: string): HTMLElement | null => {
    const found = Array.from(el.querySelectorAll<HTMLElement>(selector));
    return found.find((candidate) => candidate.closest(profile.item) === el) ?? null;
  };
  if (mode === 'expand') {
    // Only the toggle opens a menu; the label may be a link.
    const toggle = el.matches(profile.toggle) ? el : own(profile.toggle);
    if (!toggle) return false;
    if ((toggle.getAttribute('aria-expanded') ?? el.getAttribute('aria-expanded')) === 'true') return true;
    toggle.scrollIntoView({ block: 'center' });
    toggle.click();
    return true;
  }
  const target = (el.matches(profile.link) ? el : own(profile.link)) ?? own(profile.label) ?? el;
  target.scrollIntoView({ block: 'center' });
  target.click();
  return true;
}

export function contentSettled(content: SelectorProfile['content']): boolean {
  const root = document.querySelector(content.root);
  if (!root) return false;
  const title = root.querySelector(content.title);
  if (!title || !(title.textContent ?? '').trim()) return false;
  const marker = document.documentElement;
  const length = String((root.textContent ?? '').length);
  const stable = marker.getAttribute('data-crawler-content-length') === length;
  marker.setAttribute('data-crawler-content-length', length);
  return stable;
}

export function extractContent(content: SelectorProfile['content']): PageContent {
  const root = document.querySelector(content.root) ?? document.body;
  const text = (el: Element | null | undefined) => (el?.textContent ?? '').replace(/\s+/g, ' ').trim();
  const cells = (row: Element) => Array.from(row.querySelectorAll('td, th')).map((cell) => text(cell));
  const isRequired = (value: string) => /^(yes|true|required)$/i.test(value) || /\brequired\b/i.test(value);

  const blocks = Array.from(root.querySelectorAll(content.responseBlock));
  const responses = blocks
    .map((block) => ({
      statusCode: text(block.querySelector(content.responseStatus)) || block.getAttribute('data-status') || '',
      description: text(block.querySelector(content.responseDescription)),
      fields: Array.from(block.querySelectorAll(content.fieldRow)).map((row) => {
        const [name = '', type = '', required = '', description = ''] = cells(row);
        return { name, type, required: isRequired(required), description };
      }),
    }))
    .filter((response) => response.statusCode !== '');

  const parameters = Array.from(root.querySelectorAll(content.parameterRow))
    .map((row) => {
      const [name = '', location = '', type = '', required = '', description = ''] = cells(row);
      return { name, location, type, required: isRequired(required), description };
    })
    .filter((parameter) => parameter.name !== '');

  const schemaFields = Array.from(root.querySelectorAll(content.schemaFieldRow))
    .filter((row) => !blocks.some((block) => block.contains(row)))
    .map((row) => {
      const [name = '', type = '', required = '', description = ''] = cells(row);
      return { name, type, required: isRequired(required), description };
    })
    .filter((field) => field.name !== '');

  const description = text(root.querySelector(content.description));
  return {
    title: text(root.querySelector(content.title)) || document.title,
    url: window.location.href,
    description: description || null,
    parameters,
    responses,
    schemaFields,
  };
}
