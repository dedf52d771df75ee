/**
 * src/crawler.ts
 *
 * Runs the departures extractor inside a Crawlee PlaywrightCrawler.
 *
 * The crawler owns the browser (launch, fingerprinting, retries on
 * navigation failure); the extractor only sees a PageDriver. The single
 * request uses `skipNavigation` so the extractor performs the navigation
 * itself and can tell "page never loaded" apart from "listing not ready".
 */

import * as fs from 'fs';
import * as path from 'path';
import { Configuration, PlaywrightCrawler } from 'crawlee';
import type { ListingSite } from './config/chopin.js';
import { ExtractionFailed } from './errors.js';
import { extractDepartures, type ExtractionResult } from './extractors/departures.js';
import { PlaywrightPageDriver } from './extractors/pageDriver.js';

export interface CrawlOptions {
    site: ListingSite;
    airport: string;
    todayMarker: string;
    runId: string;
    readyTimeoutMs: number;
    settleTimeoutMs: number;
    runBudgetMs: number;
    /** Epoch ms; shared by every navigation attempt of the run. */
    deadline: number;
    maxIterations: number;
    navigationRetries: number;
    headless: boolean;
    userAgent?: string;
    debugDir: string;
}

export type CrawlFn = (options: CrawlOptions) => Promise<ExtractionResult>;

async function writeDebugPage(debugDir: string, markup: string): Promise<string> {
    await fs.promises.mkdir(debugDir, { recursive: true });
    const file = path.join(debugDir, 'debug_page.html');
    await fs.promises.writeFile(file, markup, 'utf-8');
    return file;
}

export const crawlDepartures: CrawlFn = async (options) => {
    const outcome: { result?: ExtractionResult; error?: Error } = {};

    const crawler = new PlaywrightCrawler(
        {
            headless: options.headless,
            maxConcurrency: 1,
            maxRequestRetries: options.navigationRetries,
            // Headroom over the run budget for browser start-up and the final parse.
            requestHandlerTimeoutSecs: Math.ceil(options.runBudgetMs / 1000) + 60,
            launchContext: {
                userAgent: options.userAgent,
                launchOptions: {
                    args: [
                        '--no-sandbox',
                        '--disable-dev-shm-usage',
                        '--disable-blink-features=AutomationControlled',
                    ],
                },
            },

            async requestHandler({ page, log }) {
                const driver = new PlaywrightPageDriver(page, { navigationTimeoutMs: options.readyTimeoutMs * 2 });
                outcome.result = await extractDepartures(driver, {
                    site: options.site,
                    airport: options.airport,
                    todayMarker: options.todayMarker,
                    readyTimeoutMs: options.readyTimeoutMs,
                    settleTimeoutMs: options.settleTimeoutMs,
                    maxIterations: options.maxIterations,
                    deadline: options.deadline,
                    log,
                    onDiagnostics: async (markup) => {
                        const file = await writeDebugPage(options.debugDir, markup);
                        log.warning(`[Crawler] Page saved to ${file}`);
                    },
                });
            },

            failedRequestHandler({ request, log }, error) {
                log.error(`[Crawler] Giving up on ${request.url} after ${request.retryCount} retries: ${error.message}`);
                outcome.error = error;
            },
        },
        new Configuration({ persistStorage: false })
    );

    // A fresh unique key per run; the in-memory request queue would otherwise
    // treat the listing URL as already handled on the next scheduled cycle.
    await crawler.run([{ url: options.site.url, uniqueKey: `${options.site.url}#${options.runId}`, skipNavigation: true }]);

    if (outcome.result) return outcome.result;
    if (outcome.error instanceof ExtractionFailed) throw outcome.error;
    if (outcome.error) throw ExtractionFailed.navigation(options.site.url, outcome.error);
    throw ExtractionFailed.noResult(options.site.url);
};
