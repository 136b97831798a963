/**
 * Error Handling Module (Consolidated)
 * Contains Error Codes, ScraperError, Classifier, Utils and the ScraperErrors factory.
 */

import type { TaskStatus } from './types';

// ==========================================
// Part 1: Error Codes & Types
// ==========================================

export enum ErrorCode {
  // Network Errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',
  TIMEOUT = 'TIMEOUT',
  DNS_ERROR = 'DNS_ERROR',
  // Browser/Puppeteer Errors
  BROWSER_CRASHED = 'BROWSER_CRASHED',
  RESOURCE_ERROR = 'RESOURCE_ERROR',
  NAVIGATION_FAILED = 'NAVIGATION_FAILED',
  SELECTOR_TIMEOUT = 'SELECTOR_TIMEOUT',
  ELEMENT_NOT_FOUND = 'ELEMENT_NOT_FOUND',
  // Structure Discovery Errors
  SIDEBAR_NOT_FOUND = 'SIDEBAR_NOT_FOUND',
  PARTIAL_EXPANSION = 'PARTIAL_EXPANSION',
  CACHE_INVALID = 'CACHE_INVALID',
  // Data Extraction Errors
  DATA_EXTRACTION_FAILED = 'DATA_EXTRACTION_FAILED',
  PARSING_ERROR = 'PARSING_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  // Run Control
  CANCELLED = 'CANCELLED',
  // System Errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  // Aliases
  INVALID_CONFIG = 'CONFIG_ERROR',
}

export interface ErrorContext {
  url?: string;
  itemId?: string;
  operation?: string;
  retryCount?: number;
  [key: string]: unknown;
}

// ==========================================
// Part 2: ScraperError Class
// ==========================================

export class ScraperError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      retryable?: boolean;
      context?: ErrorContext;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'ScraperError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScraperError);
    }
  }

  public isRecoverable(): boolean {
    return this.retryable;
  }

  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.SIDEBAR_NOT_FOUND:
        return 'Navigation sidebar did not appear on the page.';
      case ErrorCode.PARSING_ERROR:
        return 'Navigation structure could not be parsed.';
      case ErrorCode.RESOURCE_ERROR:
        return 'Browser session could not be started.';
      case ErrorCode.NETWORK_ERROR:
        return 'Network error.';
      case ErrorCode.TIMEOUT:
        return 'Operation timed out.';
      default:
        return this.message;
    }
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
            stack: this.originalError.stack,
          }
        : undefined,
    };
  }
}

// ==========================================
// Part 3: Error Classifier
// ==========================================

export class ErrorClassifier {
  static classify(error: unknown, context?: ErrorContext): ScraperError {
    if (error instanceof ScraperError) {
      if (context) Object.assign(error.context, context);
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const originalError = error instanceof Error ? error : undefined;
    const lowerMessage = message.toLowerCase();

    // Network Errors
    if (
      lowerMessage.includes('network') ||
      lowerMessage.includes('connection refused') ||
      lowerMessage.includes('econnrefused') ||
      lowerMessage.includes('socket hang up') ||
      lowerMessage.includes('net::err')
    ) {
      return new ScraperError(ErrorCode.NETWORK_ERROR, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    // Timeouts
    if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
      return new ScraperError(ErrorCode.TIMEOUT, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    // Browser/Puppeteer
    if (
      lowerMessage.includes('puppeteer') ||
      lowerMessage.includes('chromium') ||
      lowerMessage.includes('browser') ||
      lowerMessage.includes('target closed') ||
      lowerMessage.includes('session closed')
    ) {
      return new ScraperError(ErrorCode.BROWSER_CRASHED, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    // Navigation
    if (lowerMessage.includes('navigation') || lowerMessage.includes('navigating')) {
      return new ScraperError(ErrorCode.NAVIGATION_FAILED, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    // Selectors
    if (lowerMessage.includes('selector') || lowerMessage.includes('element')) {
      return new ScraperError(ErrorCode.ELEMENT_NOT_FOUND, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    return new ScraperError(ErrorCode.UNKNOWN_ERROR, message, {
      retryable: false,
      context,
      originalError,
    });
  }
}

// ==========================================
// Part 4: Error Utilities
// ==========================================

export function handleError(error: unknown, context?: ErrorContext): ScraperError {
  if (error instanceof ScraperError) {
    if (context && Object.keys(context).length > 0) Object.assign(error.context, context);
    return error;
  }
  const scraperError = ErrorClassifier.classify(error);
  if (context && Object.keys(context).length > 0) Object.assign(scraperError.context, context);
  return scraperError;
}

/**
 * Maps a failure onto the per-item status recorded in a TaskResult.
 */
export function taskStatusFor(error: unknown): TaskStatus {
  const { code } = handleError(error);
  switch (code) {
    case ErrorCode.TIMEOUT:
    case ErrorCode.SELECTOR_TIMEOUT:
      return 'Timeout';
    case ErrorCode.NAVIGATION_FAILED:
    case ErrorCode.ELEMENT_NOT_FOUND:
    case ErrorCode.SIDEBAR_NOT_FOUND:
    case ErrorCode.NETWORK_ERROR:
    case ErrorCode.CONNECTION_REFUSED:
    case ErrorCode.DNS_ERROR:
      return 'NavigationError';
    case ErrorCode.CANCELLED:
      return 'Skipped';
    default:
      return 'ExtractionError';
  }
}

// ==========================================
// Part 5: ScraperErrors Factory
// ==========================================

export const ScraperErrors = {
  sidebarNotFound: (url: string, timeoutMs: number) =>
    new ScraperError(
      ErrorCode.SIDEBAR_NOT_FOUND,
      `Navigation container not found within ${timeoutMs}ms`,
      { retryable: false, context: { url, timeoutMs } },
    ),

  parseFailed: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.PARSING_ERROR, message, {
      retryable: false,
      context,
    }),

  partialExpansion: (rounds: number, remaining: number) =>
    new ScraperError(
      ErrorCode.PARTIAL_EXPANSION,
      `Expansion stopped after ${rounds} rounds with ${remaining} collapsed nodes still pending`,
      { retryable: false, context: { rounds, remaining } },
    ),

  resourceError: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.RESOURCE_ERROR, message, {
      retryable: true,
      context,
      originalError,
    }),

  navigationFailed: (url: string, error?: Error) =>
    new ScraperError(ErrorCode.NAVIGATION_FAILED, `Navigation failed: ${url}`, {
      retryable: true,
      context: { url },
      originalError: error,
    }),

  elementNotFound: (ref: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.ELEMENT_NOT_FOUND, `Navigation node not found: ${ref}`, {
      retryable: true,
      context: { ...context, ref },
    }),

  TimeoutError: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.TIMEOUT, message, {
      retryable: true,
      context,
    }),

  BrowserError: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.BROWSER_CRASHED, message, {
      retryable: true,
      context,
      originalError,
    }),

  dataExtractionFailed: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.DATA_EXTRACTION_FAILED, message, {
      retryable: false,
      context,
    }),

  validationFailed: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.VALIDATION_ERROR, message, {
      retryable: false,
      context,
    }),

  fileSystemError: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.FILE_SYSTEM_ERROR, message, {
      retryable: false,
      context,
      originalError,
    }),

  cancelled: (reason: string = 'Run aborted', context?: ErrorContext) =>
    new ScraperError(ErrorCode.CANCELLED, reason, {
      retryable: false,
      context,
    }),

  sessionNotStarted: () =>
    new ScraperError(ErrorCode.INTERNAL_ERROR, 'Automation session not started', {
      retryable: false,
    }),

  sessionClosed: (sessionId: string) =>
    new ScraperError(ErrorCode.INTERNAL_ERROR, 'Automation session already closed', {
      retryable: false,
      context: { sessionId },
    }),

  invalidConfiguration: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.CONFIG_ERROR, message, {
      retryable: false,
      context,
    }),
};
