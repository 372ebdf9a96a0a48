import { chromium, type Browser, type BrowserContext, type Page, type Request, type Response } from 'playwright-core';
import type { BrowserSettings } from '../../../config/CompareConfig.js';
import { LIMITS } from '../../../config/constants.js';
import type { Logger } from '../../../core/Logger.js';
import { describeError } from '../../../shared/utils/errors.js';
import type { BrowserDriver, NavigationOptions, NetworkEvent, PageScript } from '../BrowserDriver.js';

/**
 * Chromium through playwright-core. Network events land in a bounded ring,
 * native dialogs are answered immediately and their texts queued.
 */
export class PlaywrightDriver implements BrowserDriver {
    private events: NetworkEvent[] = [];
    private alerts: string[] = [];

    private constructor(
        private readonly browser: Browser,
        private readonly context: BrowserContext,
        private readonly page: Page,
        private readonly settings: BrowserSettings,
        private readonly logger: Logger
    ) {
        this.attachListeners();
    }

    static async launch(settings: BrowserSettings, logger: Logger): Promise<PlaywrightDriver> {
        const browser = await chromium.launch({
            headless: settings.headless,
            executablePath: settings.executable
        });
        const context = await browser.newContext({
            viewport: { width: settings.width, height: settings.height },
            ignoreHTTPSErrors: true
        });
        const page = await context.newPage();
        logger.verbose(`🚀 Chromium ready (${settings.width}x${settings.height}, headless=${settings.headless})`);
        return new PlaywrightDriver(browser, context, page, settings, logger);
    }

    private attachListeners(): void {
        this.page.on('request', (request: Request) => {
            this.record({
                kind: 'request',
                url: request.url(),
                timestamp: Date.now(),
                resourceType: request.resourceType(),
                isMainFrame: this.isMainFrame(request)
            });
        });

        this.page.on('response', (response: Response) => {
            const headers = response.headers();
            this.record({
                kind: 'response',
                url: response.url(),
                timestamp: Date.now(),
                resourceType: response.request().resourceType(),
                isMainFrame: this.isMainFrame(response.request()),
                status: response.status(),
                contentType: headers['content-type'] ?? '',
                headers
            });
        });

        this.page.on('requestfinished', (request: Request) => {
            this.record({
                kind: 'finished',
                url: request.url(),
                timestamp: Date.now(),
                resourceType: request.resourceType(),
                isMainFrame: this.isMainFrame(request)
            });
        });

        this.page.on('requestfailed', (request: Request) => {
            this.record({
                kind: 'failed',
                url: request.url(),
                timestamp: Date.now(),
                resourceType: request.resourceType(),
                isMainFrame: this.isMainFrame(request),
                failure: request.failure()?.errorText
            });
        });

        this.page.on('dialog', dialog => {
            this.alerts.push(dialog.message());
            const answer = this.settings.alertAction === 'accept' ? dialog.accept() : dialog.dismiss();
            answer.catch((error: unknown) => this.logger.warn(`Dialog could not be answered: ${describeError(error)}`));
        });
    }

    /** Service worker requests have no frame. */
    private isMainFrame(request: Request): boolean {
        return request.serviceWorker() === null && request.frame() === this.page.mainFrame();
    }

    private record(event: NetworkEvent): void {
        this.events.push(event);
        if (this.events.length > LIMITS.NETWORK_RING_SIZE) {
            this.events.splice(0, this.events.length - LIMITS.NETWORK_RING_SIZE);
        }
    }

    async goto(url: string, options: NavigationOptions): Promise<void> {
        await this.page.goto(url, { timeout: options.timeoutMs, waitUntil: 'commit' });
    }

    async currentUrl(): Promise<string> {
        return this.page.url();
    }

    async content(): Promise<string> {
        return await this.page.content();
    }

    /**
     * The script travels as source text; arguments are JSON.
     */
    async evaluate<A, R>(script: PageScript<A, R>, arg: A): Promise<R> {
        const expression = `(${script.toString()})(${JSON.stringify(arg) ?? 'undefined'})`;
        return await this.page.evaluate<R>(expression);
    }

    async screenshot(): Promise<Buffer> {
        return await this.page.screenshot({ type: 'png' });
    }

    drainNetworkEvents(): NetworkEvent[] {
        const drained = this.events;
        this.events = [];
        return drained;
    }

    drainAlerts(): string[] {
        const drained = this.alerts;
        this.alerts = [];
        return drained;
    }

    async clearSession(): Promise<void> {
        await this.context.clearCookies();
        await this.page.evaluate(() => {
            // opaque origins (about:blank) throw on storage access
            if (window.location.protocol.startsWith('http')) {
                window.localStorage.clear();
                window.sessionStorage.clear();
            }
        });
    }

    async close(): Promise<void> {
        await this.context.close();
        await this.browser.close();
    }
}
