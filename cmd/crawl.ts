#!/usr/bin/env node

/**
 * navtree-crawl
 *
 * 发现文档站点的导航结构并逐页提取为 JSON
 *
 * Usage:
 *   navtree-crawl --url https://docs.example.com/reference
 *   navtree-crawl --config crawler.config.json --resume-info
 *   navtree-crawl --force-full-expansion --concurrency 5
 */

import { CrawlRunner } from '../core/crawl-runner';
import { ScraperError, handleError } from '../core/errors';
import { formatResumeReport } from '../core/resume-tracker';
import type { RunSummary } from '../core/types';
import { ConfigManager } from '../utils/config-manager';
import { closeLogger, createEnhancedLogger, setLogLevel } from '../utils/logger';
import { CliOptions, parseCliArgs, USAGE } from './cli-args';

const logger = createEnhancedLogger('CLI');

export function formatSummary(summary: RunSummary): string {
  const lines = [
    '',
    `Mode:          ${summary.mode}${summary.fromCache ? ' (cached structure)' : ''}`,
    `Tasks:         ${summary.total}`,
    `Succeeded:     ${summary.succeeded}`,
    `Failed:        ${summary.failed}`,
    `Skipped:       ${summary.skipped}`,
    `Duration:      ${(summary.durationMs / 1000).toFixed(1)}s`,
  ];
  if (summary.aborted) {
    lines.push(`Aborted:       ${summary.abortReason ?? 'yes'}`);
  }
  const failures = summary.results.filter((r) => r.status !== 'Success' && r.status !== 'Skipped');
  if (failures.length > 0) {
    lines.push('', 'Failures:');
    for (const failure of failures) {
      lines.push(`  - ${failure.itemId} [${failure.status}] ${failure.error ?? ''}`.trimEnd());
    }
  }
  if (summary.warnings.length > 0) {
    lines.push('', 'Warnings:');
    for (const warning of summary.warnings) lines.push(`  - ${warning}`);
  }
  return lines.join('\n');
}

async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error: unknown) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = new ConfigManager(options.configPath, options.config).getConfig();
  setLogLevel(config.logging.level);

  const controller = new AbortController();
  let interrupts = 0;
  const onSigint = () => {
    interrupts++;
    if (interrupts > 1) {
      logger.warn('Second interrupt, exiting immediately');
      process.exit(130);
    }
    logger.warn('Interrupt received, finishing in-flight pages (Ctrl+C again to force)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    const runner = new CrawlRunner(config);

    if (options.resumeInfo) {
      const info = await runner.resumeInfo({ overrides: options.expansion });
      console.log(formatResumeReport(info.report));
      return 0;
    }

    const { summary } = await runner.run({
      overrides: options.expansion,
      signal: controller.signal,
      onlyItemId: options.testItemId,
      onSummary: (s) => console.log(formatSummary(s)),
    });
    return summary.failed > 0 || summary.aborted ? 1 : 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .catch((error: unknown) => {
      const scraperError = handleError(error);
      logger.error('Crawl failed', scraperError);
      console.error(error instanceof ScraperError ? error.getUserMessage() : scraperError.message);
      return 1;
    })
    .then(async (code) => {
      await closeLogger();
      process.exit(code);
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
}
