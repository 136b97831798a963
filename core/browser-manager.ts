/**
 * 浏览器管理器
 * 负责浏览器的启动、配置和关闭
 */

import puppeteerCore, { Browser, HTTPRequest, Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import * as constants from '../config/constants';
import { createModuleLogger } from '../utils/logger';
import { ScraperErrors } from './errors';

const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

const logger = createModuleLogger('BrowserManager');

export interface BrowserLaunchOptions {
    headless?: boolean;
    executablePath?: string;
    userAgent?: string;
    viewport?: { width: number; height: number };
    blockResources?: boolean;
    blockedResourceTypes?: readonly string[];
}

/**
 * 浏览器管理器类
 */
export class BrowserManager {
    private browser: Browser | null = null;
    private page: Page | null = null;

    /**
     * 启动浏览器
     */
    async launch(options: BrowserLaunchOptions = {}): Promise<void> {
        if (!options.executablePath) {
            throw ScraperErrors.invalidConfiguration(
                'browser.executablePath is not set (config file or CHROME_PATH)'
            );
        }

        const browser: Browser = await puppeteer.launch({
            headless: options.headless !== false,
            executablePath: options.executablePath,
            args: [...constants.BROWSER_ARGS],
            defaultViewport: options.viewport ?? constants.BROWSER_VIEWPORT,
            // Signals belong to the CLI's shutdown handler.
            handleSIGINT: false,
            handleSIGTERM: false,
            handleSIGHUP: false
        });
        this.browser = browser;
        logger.debug('Browser launched', { headless: options.headless !== false });
    }

    /**
     * 创建新页面并配置
     */
    async createPage(options: BrowserLaunchOptions = {}): Promise<Page> {
        if (!this.browser) {
            throw ScraperErrors.BrowserError('Browser not launched. Call launch() first.');
        }

        this.page = await this.browser.newPage();
        await this.page.setUserAgent(options.userAgent || constants.BROWSER_USER_AGENT);

        if (options.blockResources !== false) {
            await this.setupRequestInterception(options.blockedResourceTypes);
        }

        return this.page;
    }

    /**
     * 设置请求拦截以屏蔽不必要的资源
     */
    private async setupRequestInterception(blockedTypes?: readonly string[]): Promise<void> {
        if (!this.page) {
            throw ScraperErrors.BrowserError('Page not created. Call createPage() first.');
        }

        const typesToBlock: readonly string[] = blockedTypes || constants.BLOCKED_RESOURCE_TYPES;

        await this.page.setRequestInterception(true);
        this.page.on('request', (req: HTTPRequest) => {
            if (req.isInterceptResolutionHandled()) return;
            const handled = typesToBlock.includes(req.resourceType()) ? req.abort() : req.continue();
            handled.catch((error: unknown) => {
                logger.debug('Request interception failed', { url: req.url(), error: String(error) });
            });
        });
    }

    /**
     * 关闭浏览器
     * 正常关闭失败时强制结束进程
     */
    async close(): Promise<void> {
        if (!this.browser) {
            return;
        }

        const browser = this.browser;
        this.browser = null;
        this.page = null;

        try {
            await browser.close();
            logger.debug('Browser closed');
        } catch (closeError: unknown) {
            logger.warn('Browser close failed, killing process', { error: String(closeError) });
            const browserProcess = browser.process();
            if (browserProcess?.pid) {
                try {
                    process.kill(browserProcess.pid, 'SIGKILL');
                } catch (killError: unknown) {
                    logger.error('Failed to kill browser process', killError instanceof Error ? killError : undefined, {
                        pid: browserProcess.pid
                    });
                }
            }
        }
    }
}
