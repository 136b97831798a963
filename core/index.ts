/**
 * Core Module Exports
 * 统一导出核心模块，建立清晰的模块边界
 */

export * from './types';
export type {
  AutomationSession,
  NavLayout,
  NavNodeInfo,
  PageContent,
  ParameterRecord,
  ResponseRecord,
  SchemaField,
  SessionFactory,
} from './session';

// Errors
export {
  ErrorClassifier,
  ErrorCode,
  type ErrorContext,
  handleError,
  ScraperError,
  ScraperErrors,
  taskStatusFor,
} from './errors';

// Structure
export { ancestorsOf, buildStructure, findStructureViolation, isLeaf, leafIds } from './structure-builder';
export { CacheStore, type CacheInspection, type CacheStoreOptions, structureChecksum } from './cache-store';
export { type CacheRecord, type ExtractedPage, extractedPageSchema, pageContentSchema } from './schemas';
export { decideExpansion, type ExpansionDecision, type ExpansionReason, initialExpansionState } from './expansion-gate';
export {
  type DiscoveryRequest,
  type DiscoveryResult,
  type DiscoverySettings,
  type ExpansionOutcome,
  StructureDiscoverer,
} from './structure-discoverer';

// Extraction
export { formatResumeReport, isArtifactValid, outputPathFor, ResumeTracker } from './resume-tracker';
export { type ExtractOptions, ExtractionWorker, type WorkerSettings } from './extraction-worker';
export {
  ExtractionOrchestrator,
  FailureWindow,
  type OrchestratorSettings,
  type RunOptions,
} from './extraction-orchestrator';
export { CrawlRunner, type CrawlOutcome, type CrawlRequest, type ResumeInfo } from './crawl-runner';

// Browser
export { type BrowserLaunchOptions, BrowserManager } from './browser-manager';
export { PuppeteerSession, PuppeteerSessionFactory } from './puppeteer-session';

// Events
export { type CrawlProgressData, CrawlerEventBus, createEventBus } from './event-bus';
