import { z } from 'zod';

/**
 * CSS selectors the browser adapter uses to find navigation nodes and page
 * content. The defaults target common documentation themes; a vendor-specific
 * profile goes in the config file under `selectors`.
 */
export const selectorProfileSchema = z.object({
  /** Root element of the navigation sidebar. */
  container: z.string().min(1),
  /** One navigation entry (page, menu or header). */
  item: z.string().min(1),
  /** Visible label inside an entry. */
  label: z.string().min(1),
  /** Link to the entry's own content page. */
  link: z.string().min(1),
  /** Toggle affordance inside an entry. */
  toggle: z.string().min(1),
  /** Nested child list inside an entry. */
  childList: z.string().min(1),
  /** Group header markers in flat layouts. */
  header: z.string().min(1),
  /** Attribute carrying the entry's declared id, when the site sets one. */
  idAttribute: z.string().min(1),
  /** Attribute carrying indentation depth in flat layouts, when the site sets one. */
  levelAttribute: z.string().min(1),
  content: z.object({
    root: z.string().min(1),
    title: z.string().min(1),
    description: z.string().min(1),
    parameterRow: z.string().min(1),
    responseBlock: z.string().min(1),
    responseStatus: z.string().min(1),
    responseDescription: z.string().min(1),
    fieldRow: z.string().min(1),
    schemaFieldRow: z.string().min(1),
  }),
});

export type SelectorProfile = z.infer<typeof selectorProfileSchema>;

export const DEFAULT_SELECTOR_PROFILE: SelectorProfile = {
  container: 'nav[aria-label="Sidebar"], aside nav, .sidebar, [role="navigation"]',
  item: 'li, [role="treeitem"], .sidebar-heading',
  label: 'a, button, span',
  link: 'a[href]',
  toggle: '[aria-expanded], .caret, .toggle',
  childList: 'ul, ol, [role="group"]',
  header: '.sidebar-heading, [role="heading"], .menu-header',
  idAttribute: 'data-id',
  levelAttribute: 'aria-level',
  content: {
    root: 'main, article, [role="main"]',
    title: 'h1',
    description: 'h1 ~ p, .description',
    parameterRow: 'table.parameters tbody tr, [data-section="parameters"] tr',
    responseBlock: '.response, [data-section="responses"] > section',
    responseStatus: '.status-code, [data-status]',
    responseDescription: '.response-description, p',
    fieldRow: 'tbody tr',
    schemaFieldRow: '[data-section="schema"] tbody tr, table.schema tbody tr',
  },
};
