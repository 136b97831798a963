/**
 * Static defaults shared by the browser layer and the crawl pipeline.
 */

export const BROWSER_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-blink-features=AutomationControlled',
] as const;

export const BROWSER_VIEWPORT = { width: 1280, height: 960 };

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

/** Documentation pages render fine without these. */
export const BLOCKED_RESOURCE_TYPES = ['image', 'media', 'font'] as const;

export const CACHE_SCHEMA_VERSION = 1;
export const MIN_VALID_ITEMS = 10;
export const MIN_VALID_RATIO = 0.1;

export const DEFAULT_MAX_EXPAND_ATTEMPTS = 15;
export const MIN_ITEMS_FOR_PARALLEL = 5;

export const DEFAULT_CONFIG_FILE = 'crawler.config.json';

/** Attribute the browser adapter stamps on navigation nodes so fresh lookups can find them. */
export const REF_ATTRIBUTE = 'data-crawler-ref';
