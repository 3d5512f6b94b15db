import { chromium, type Browser, type Page } from 'playwright-core';
import type { BrowserCookie } from '../types';

/**
 * The few browser operations a tunnel login needs
 */
export interface BrowserSession {
    open(url: string): Promise<void>;
    fill(selector: string, value: string): Promise<void>;
    /** Evaluate a JavaScript expression in the page */
    evaluate(expression: string): Promise<unknown>;
    currentUrl(): string;
    cookies(): Promise<BrowserCookie[]>;
    close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserSession>;

export interface ChromiumOptions {
    /** Installed browser channel, e.g. "chrome" */
    channel: string;
    /** Browser binary; takes precedence over the channel */
    executablePath?: string;
}

class PlaywrightSession implements BrowserSession {
    constructor(private readonly browser: Browser, private readonly page: Page) {}

    async open(url: string): Promise<void> {
        await this.page.goto(url);
    }

    async fill(selector: string, value: string): Promise<void> {
        await this.page.fill(selector, value);
    }

    evaluate(expression: string): Promise<unknown> {
        return this.page.evaluate<unknown>(expression);
    }

    currentUrl(): string {
        return this.page.url();
    }

    cookies(): Promise<BrowserCookie[]> {
        return this.page.context().cookies();
    }

    close(): Promise<void> {
        return this.browser.close();
    }
}

/**
 * Launcher for a headed Chromium driven through playwright-core
 *
 * playwright-core ships no browser, so an installed Chrome channel or an
 * explicit executable is used.
 */
export const launchChromium = (options: ChromiumOptions): BrowserLauncher => async () => {
    const browser = await chromium.launch({
        headless: false,
        ...(options.executablePath ? { executablePath: options.executablePath } : { channel: options.channel }),
        args: ['--disable-blink-features=AutomationControlled']
    });

    try {
        const context = await browser.newContext();
        const page = await context.newPage();
        return new PlaywrightSession(browser, page);
    } catch (error) {
        await browser.close();
        throw error;
    }
}
