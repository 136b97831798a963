/**
 * Utils Module Exports
 * 统一导出工具模块
 */

export * from './async';
export {
  type AppConfig,
  appConfigSchema,
  type ConfigOverrides,
  ConfigManager,
  defaultConfig,
  mergeConfig,
} from './config-manager';
export * from './filesystem';
export {
  closeLogger,
  createEnhancedLogger,
  createModuleLogger,
  EnhancedLogger,
  LOG_LEVELS,
  type LogContext,
  type LogLevel,
  logger,
  type ModuleLogger,
  setLogLevel,
} from './logger';
export { type SafeParseOptions, safeJsonParse } from './safe-json';
export { Semaphore } from './semaphore';
