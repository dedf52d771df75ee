/**
 * src/extractors/pageDriver.ts
 *
 * The page-interaction capability the extractor drives, and its Playwright
 * implementation. The extractor never touches Playwright directly.
 */

import type { Locator, Page } from 'playwright';

// ─── Capability ───────────────────────────────────────────────────────────────

/** Opaque handle to an element found on the page. */
export interface PageElement {
    isVisible(): Promise<boolean>;
}

export interface PageDriver {
    /** Throws when the page cannot be loaded at all. */
    navigate(url: string): Promise<void>;
    /** Polls `predicate` until it holds or `timeoutMs` elapses. */
    waitUntil(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean>;
    findElements(selector: string): Promise<PageElement[]>;
    click(element: PageElement): Promise<void>;
    currentMarkup(): Promise<string>;
    /** Removes every match (cookie banners, modals); returns how many were removed. */
    removeElements(selector: string): Promise<number>;
}

// ─── Playwright ───────────────────────────────────────────────────────────────

class LocatorElement implements PageElement {
    constructor(readonly locator: Locator) {}

    isVisible(): Promise<boolean> {
        return this.locator.isVisible();
    }
}

export interface PlaywrightDriverOptions {
    navigationTimeoutMs: number;
    pollIntervalMs?: number;
    clickTimeoutMs?: number;
}

export class PlaywrightPageDriver implements PageDriver {
    private readonly pollIntervalMs: number;
    private readonly clickTimeoutMs: number;

    constructor(private readonly page: Page, private readonly options: PlaywrightDriverOptions) {
        this.pollIntervalMs = options.pollIntervalMs ?? 250;
        this.clickTimeoutMs = options.clickTimeoutMs ?? 5_000;
    }

    async navigate(url: string): Promise<void> {
        const response = await this.page.goto(url, {
            waitUntil: 'domcontentloaded',
            timeout: this.options.navigationTimeoutMs,
        });
        if (response && response.status() >= 400) {
            throw new Error(`HTTP ${response.status()} for ${url}`);
        }
    }

    async waitUntil(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean> {
        const deadline = Date.now() + timeoutMs;
        for (;;) {
            if (await predicate()) return true;
            if (Date.now() >= deadline) return false;
            await this.page.waitForTimeout(this.pollIntervalMs);
        }
    }

    async findElements(selector: string): Promise<PageElement[]> {
        const locators = await this.page.locator(selector).all();
        return locators.map((locator) => new LocatorElement(locator));
    }

    async click(element: PageElement): Promise<void> {
        if (!(element instanceof LocatorElement)) {
            throw new TypeError('Element was not found by this driver');
        }
        await element.locator.scrollIntoViewIfNeeded({ timeout: this.clickTimeoutMs });
        await element.locator.click({ timeout: this.clickTimeoutMs });
    }

    currentMarkup(): Promise<string> {
        return this.page.content();
    }

    removeElements(selector: string): Promise<number> {
        return this.page.locator(selector).evaluateAll((nodes) => {
            for (const node of nodes) node.remove();
            return nodes.length;
        });
    }
}
