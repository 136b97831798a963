/**
 * 统一配置管理器
 * 默认值 < 配置文件 < 环境变量 < 命令行覆盖，合并后统一用 zod 校验
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ErrorCode, ScraperError } from '../core/errors';
import { Env, parseEnv } from '../core/env';
import { DEFAULT_SELECTOR_PROFILE, selectorProfileSchema } from '../config/selectors';
import {
  BROWSER_USER_AGENT,
  BROWSER_VIEWPORT,
  DEFAULT_CONFIG_FILE,
  DEFAULT_MAX_EXPAND_ATTEMPTS,
  MIN_ITEMS_FOR_PARALLEL,
  MIN_VALID_ITEMS,
  MIN_VALID_RATIO,
} from '../config/constants';
import { safeJsonParse } from './safe-json';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const appConfigSchema = z.object({
  target: z.object({
    url: z.string().url(),
  }),

  output: z.object({
    baseDir: z.string().min(1),
    /** Stops after this many pending items; unset means no limit. */
    maxItems: positiveInt.optional(),
  }),

  cache: z.object({
    dir: z.string().min(1),
    minValidItems: positiveInt,
    minValidRatio: z.number().min(0).max(1),
  }),

  browser: z.object({
    headless: z.boolean(),
    executablePath: z.string().optional(),
    userAgent: z.string().min(1),
    viewport: z.object({
      width: positiveInt,
      height: positiveInt,
    }),
    blockResources: z.boolean(),
  }),

  delays: z.object({
    navigationMs: positiveInt,
    sidebarWaitMs: positiveInt,
    expandDelayMs: nonNegativeInt,
    postExpandSettleMs: nonNegativeInt,
    contentWaitMs: positiveInt,
  }),

  behavior: z.object({
    maxExpandAttempts: positiveInt,
    skipTitles: z.array(z.string()),
  }),

  concurrency: z.object({
    enabled: z.boolean(),
    maxConcurrentTasks: positiveInt,
    minItemsForParallel: positiveInt,
    taskStartDelayMs: nonNegativeInt,
    sessionStartRetries: nonNegativeInt,
    itemTimeoutMs: positiveInt,
    runTimeoutMs: positiveInt.optional(),
    gracePeriodMs: nonNegativeInt,
    failureWindow: positiveInt,
    minFailureSamples: positiveInt,
    failureRateThreshold: z.number().gt(0).max(1),
    maxConsecutiveResourceErrors: positiveInt,
  }),

  selectors: selectorProfileSchema,

  logging: z.object({
    level: z.enum(['debug', 'verbose', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends ReadonlyArray<unknown>
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export type ConfigOverrides = DeepPartial<AppConfig>;

/** Defaults without a target URL; the URL must come from a file, env or CLI. */
export function defaultConfig(): DeepPartial<AppConfig> {
  return {
    output: {
      baseDir: path.resolve(process.cwd(), 'output'),
    },
    cache: {
      dir: path.resolve(process.cwd(), '.cache'),
      minValidItems: MIN_VALID_ITEMS,
      minValidRatio: MIN_VALID_RATIO,
    },
    browser: {
      headless: true,
      userAgent: BROWSER_USER_AGENT,
      viewport: { ...BROWSER_VIEWPORT },
      blockResources: true,
    },
    delays: {
      navigationMs: 30000,
      sidebarWaitMs: 45000,
      expandDelayMs: 500,
      postExpandSettleMs: 2000,
      contentWaitMs: 15000,
    },
    behavior: {
      maxExpandAttempts: DEFAULT_MAX_EXPAND_ATTEMPTS,
      skipTitles: [],
    },
    concurrency: {
      enabled: true,
      maxConcurrentTasks: 3,
      minItemsForParallel: MIN_ITEMS_FOR_PARALLEL,
      taskStartDelayMs: 500,
      sessionStartRetries: 2,
      itemTimeoutMs: 120000,
      gracePeriodMs: 10000,
      failureWindow: 10,
      minFailureSamples: 5,
      failureRateThreshold: 0.5,
      maxConsecutiveResourceErrors: 3,
    },
    selectors: DEFAULT_SELECTOR_PROFILE,
    logging: {
      level: 'info',
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 深度合并（数组整体替换，undefined 不覆盖）
 */
export function mergeConfig(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const value = source[key];
    if (value === undefined) continue;
    const existing = result[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      result[key] = mergeConfig(existing, value);
    } else if (isPlainObject(value)) {
      result[key] = mergeConfig({}, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

export class ConfigManager {
  private readonly config: AppConfig;
  private readonly configFilePath: string;
  private readonly explicitPath: boolean;

  constructor(
    configFilePath?: string,
    private readonly overrides: ConfigOverrides = {},
    private readonly envSource: NodeJS.ProcessEnv = process.env,
  ) {
    this.explicitPath = Boolean(configFilePath);
    this.configFilePath = path.resolve(configFilePath || DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 加载配置（命令行 > 环境变量 > 配置文件 > 默认值）
   */
  private load(): AppConfig {
    let merged: Record<string, unknown> = mergeConfig({}, defaultConfig());
    merged = mergeConfig(merged, this.loadFromFile());
    merged = mergeConfig(merged, this.loadFromEnv());
    merged = mergeConfig(merged, this.overrides);
    return this.validate(merged);
  }

  /**
   * 从文件加载配置
   */
  private loadFromFile(): Record<string, unknown> {
    if (!fs.existsSync(this.configFilePath)) {
      if (this.explicitPath) {
        throw new ScraperError(ErrorCode.INVALID_CONFIG, `Config file not found: ${this.configFilePath}`, {
          context: { filePath: this.configFilePath },
        });
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = safeJsonParse(fs.readFileSync(this.configFilePath, 'utf-8'));
    } catch (error: unknown) {
      throw new ScraperError(
        ErrorCode.INVALID_CONFIG,
        `Failed to load config file ${this.configFilePath}: ${error instanceof Error ? error.message : String(error)}`,
        { context: { filePath: this.configFilePath }, originalError: error instanceof Error ? error : undefined },
      );
    }
    if (!isPlainObject(parsed)) {
      throw new ScraperError(ErrorCode.INVALID_CONFIG, `Config file must contain a JSON object: ${this.configFilePath}`, {
        context: { filePath: this.configFilePath },
      });
    }
    return parsed;
  }

  /**
   * 从环境变量加载配置
   */
  private loadFromEnv(): ConfigOverrides {
    let env: Env;
    try {
      env = parseEnv(this.envSource);
    } catch (error: unknown) {
      throw new ScraperError(
        ErrorCode.INVALID_CONFIG,
        `Invalid environment: ${error instanceof z.ZodError ? formatIssues(error) : String(error)}`,
      );
    }

    return {
      target: env.CRAWLER_TARGET_URL ? { url: env.CRAWLER_TARGET_URL } : undefined,
      output: env.OUTPUT_DIR ? { baseDir: path.resolve(env.OUTPUT_DIR) } : undefined,
      cache: env.CACHE_DIR ? { dir: path.resolve(env.CACHE_DIR) } : undefined,
      browser: {
        headless: env.BROWSER_HEADLESS,
        executablePath: env.CHROME_PATH,
      },
      concurrency: {
        enabled: env.CONCURRENCY_ENABLED,
        maxConcurrentTasks: env.MAX_CONCURRENT_TASKS,
      },
      logging: env.LOG_LEVEL ? { level: env.LOG_LEVEL } : undefined,
    };
  }

  /**
   * 验证配置
   */
  private validate(candidate: Record<string, unknown>): AppConfig {
    const result = appConfigSchema.safeParse(candidate);
    if (!result.success) {
      throw new ScraperError(ErrorCode.INVALID_CONFIG, `Invalid configuration: ${formatIssues(result.error)}`, {
        context: { filePath: this.configFilePath },
      });
    }
    const config = result.data;
    return {
      ...config,
      output: { ...config.output, baseDir: path.resolve(config.output.baseDir) },
      cache: { ...config.cache, dir: path.resolve(config.cache.dir) },
    };
  }

  getConfig(): AppConfig {
    return { ...this.config };
  }

  getConfigFilePath(): string {
    return this.configFilePath;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
