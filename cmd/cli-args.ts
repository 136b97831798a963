/**
 * Command line parsing for the crawl command.
 */

import type { ConfigOverrides } from '../utils/config-manager';
import { LOG_LEVELS, LogLevel } from '../utils/logger';
import type { ExpansionOverrides } from '../core/types';

export interface CliOptions {
  configPath?: string;
  /** Extract only the pending item with this id. */
  testItemId?: string;
  resumeInfo: boolean;
  help: boolean;
  expansion: ExpansionOverrides;
  config: ConfigOverrides;
}

export const USAGE = `Usage: navtree-crawl [options]

  --config <path>           JSON config file (default: crawler.config.json)
  --url <url>               Documentation site to crawl
  --output <dir>            Output directory for page documents
  --force                   Ignore cache and existing outputs
  --force-full-expansion    Re-expand the navigation even on a cache hit
  --validate-cache          Re-expand and compare against the cached structure
  --resume-info             Print completion status and exit
  --max-items <n>           Extract at most n pending pages
  --max-expand-attempts <n> Expansion passes before discovery gives up
  --test-item-id <id>       Extract only the item with this id
  --no-headless             Show the browser window
  --concurrency <n>         Maximum concurrent sessions
  --sequential              Disable parallel extraction
  --log-level <level>       error | warn | info | verbose | debug
  --help                    Show this message`;

const LEVELS: readonly string[] = Object.values(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.includes(value);
}

function positiveInt(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} expects a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Parses argv (without the node and script entries).
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { resumeInfo: false, help: false, expansion: {}, config: {} };
  const { config } = options;

  const valueOf = (index: number, flag: string): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        options.configPath = valueOf(i++, arg);
        break;
      case '--url':
        config.target = { url: valueOf(i++, arg) };
        break;
      case '--output':
        config.output = { ...config.output, baseDir: valueOf(i++, arg) };
        break;
      case '--max-items':
        config.output = { ...config.output, maxItems: positiveInt(arg, valueOf(i++, arg)) };
        break;
      case '--max-expand-attempts':
        config.behavior = { ...config.behavior, maxExpandAttempts: positiveInt(arg, valueOf(i++, arg)) };
        break;
      case '--test-item-id':
        options.testItemId = valueOf(i++, arg);
        break;
      case '--force':
        options.expansion.force = true;
        break;
      case '--force-full-expansion':
        options.expansion.forceFullExpansion = true;
        break;
      case '--validate-cache':
        options.expansion.validateCache = true;
        break;
      case '--resume-info':
        options.resumeInfo = true;
        break;
      case '--no-headless':
        config.browser = { ...config.browser, headless: false };
        break;
      case '--concurrency':
        config.concurrency = { ...config.concurrency, maxConcurrentTasks: positiveInt(arg, valueOf(i++, arg)) };
        break;
      case '--sequential':
        config.concurrency = { ...config.concurrency, enabled: false };
        break;
      case '--log-level': {
        const level = valueOf(i++, arg);
        if (!isLogLevel(level)) {
          throw new Error(`--log-level must be one of ${LEVELS.join(', ')}`);
        }
        config.logging = { level };
        break;
      }
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }
  return options;
}
