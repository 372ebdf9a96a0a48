/**
 * One live browser connection pointed at one deployment.
 *
 * Navigation and script failures are retried per configuration; once the
 * retries are used up the visit is cancelled (VisitCancelled), never the crawl.
 */

import { LIMITS } from '../config/constants.js';
import type { Context } from '../core/Context.js';
import type { Logger } from '../core/Logger.js';
import type { ClickableDescriptor, SiteSide } from '../core/types.js';
import { Capture } from '../capture/Capture.js';
import { HtmlCanonicalizer } from '../capture/HtmlCanonicalizer.js';
import { VisitCancelled } from '../shared/utils/errors.js';
import type { BrowserDriver, NetworkEvent } from './adapters/BrowserDriver.js';
import { ClickCommand } from './commands/ClickCommand.js';
import { CommandExecutor } from './commands/CommandExecutor.js';
import { NavigateCommand } from './commands/NavigateCommand.js';
import { ScriptCommand } from './commands/ScriptCommand.js';
import {
    discoverClickables,
    documentContentType,
    fetchStatus,
    findEquivalentLocator,
    handleSelect,
    probeSignature,
    type FormReport
} from './PageScripts.js';
import { composeSignature } from './PageSignature.js';
import { PageReadiness, isMainDocumentResponse, type ReadinessResult } from './PageReadiness.js';

export interface DocumentStatus {
    status: number;
    contentType: string;
    headers: Record<string, string>;
}

/** `text/html; charset=utf-8` → `text/html` */
export function bareContentType(value: string): string {
    return value.split(';')[0].trim();
}

/**
 * Status of the main document from the network log: the response whose URL is
 * the final URL, else the latest document response.
 */
export function statusFromEvents(events: NetworkEvent[], finalUrl: string): DocumentStatus | undefined {
    const documents = events.filter(isMainDocumentResponse);
    const match = documents.filter(event => event.url === finalUrl).pop() ?? documents.pop();
    if (!match || match.status === undefined) return undefined;
    return {
        status: match.status,
        contentType: bareContentType(match.contentType ?? ''),
        headers: { ...match.headers }
    };
}

export class BrowserSession {
    private readonly executor: CommandExecutor;
    private readonly readiness: PageReadiness;
    private readonly canonicalizer: HtmlCanonicalizer;
    private readonly logger: Logger;
    private cachedSignature: string | undefined;
    private lastReadiness: ReadinessResult | undefined;

    constructor(
        private readonly driver: BrowserDriver,
        private readonly ctx: Context,
        readonly which: SiteSide
    ) {
        this.logger = ctx.logger.child(`Session:${which}`);
        this.executor = new CommandExecutor(driver, this.logger);
        this.readiness = new PageReadiness(driver, ctx.config.browser, this.logger);
        this.canonicalizer = new HtmlCanonicalizer(ctx.config.compare.htmls.ignore, this.logger);
    }

    get baseUrl(): string {
        return this.ctx.baseUrl(this.which);
    }

    urlFor(place: string): string {
        return `${this.baseUrl}${place.startsWith('/') ? place : `/${place}`}`;
    }

    /** Network log of the most recent readiness wait. */
    get lastNetworkLog(): NetworkEvent[] {
        return this.lastReadiness?.events ?? [];
    }

    /**
     * @throws VisitCancelled `navigate_failed` or `not_ready`
     */
    async navigate(place: string): Promise<ReadinessResult> {
        this.cachedSignature = undefined;
        const url = this.urlFor(place);
        this.logger.verbose(`🌐 ${url}`);
        this.driver.drainNetworkEvents();
        await this.executor.execute(new NavigateCommand(url, this.ctx.config.browser.timeoutMs), this.ctx.config.browser.navigate);
        return await this.awaitReady(true);
    }

    /**
     * False when the locator addresses nothing on the current page.
     * @throws VisitCancelled `click_failed` or `not_ready`
     */
    async click(locator: string): Promise<boolean> {
        this.cachedSignature = undefined;
        this.driver.drainNetworkEvents();
        const clicked = await this.executor.executeOnce(new ClickCommand(locator));
        if (!clicked) {
            this.logger.verbose(`Locator not found: ${locator}`);
            return false;
        }
        this.logger.verbose(`🖱️ ${locator}`);
        await this.awaitReady(false);
        return true;
    }

    async discoverClickables(): Promise<ClickableDescriptor[]> {
        const byClick = this.ctx.config.crawl.byClick;
        return await this.executor.execute(new ScriptCommand(discoverClickables, {
            finders: byClick.finders,
            cssExcludes: byClick.cssExcludes,
            textMax: LIMITS.CLICKABLE_TEXT_MAX
        }), this.ctx.config.browser.execJs);
    }

    async findEquivalentLocator(descriptor: ClickableDescriptor): Promise<string | null> {
        const byClick = this.ctx.config.crawl.byClick;
        return await this.executor.execute(new ScriptCommand(findEquivalentLocator, {
            descriptor,
            finders: byClick.finders,
            minScore: byClick.minEquivalenceScore,
            textMax: LIMITS.CLICKABLE_TEXT_MAX
        }), this.ctx.config.browser.execJs);
    }

    /**
     * Drives the configured forms present on the current page. Forms absent
     * from the page are skipped.
     */
    async handleForms(): Promise<FormReport[]> {
        const reports: FormReport[] = [];
        for (const form of this.ctx.config.forms) {
            const report = await this.executor.execute(new ScriptCommand(handleSelect, {
                selector: form.selector,
                submitSelector: form.submitSelector ?? ''
            }), this.ctx.config.browser.execJs);
            if (!report.found) {
                this.logger.debug(`Form ${form.selector} not on this page`);
                continue;
            }
            this.cachedSignature = undefined;
            this.logger.info(`📝 ${form.selector}: ${report.values.length} option(s), ${report.submitted} submit(s)`);
            reports.push(report);
        }
        return reports;
    }

    /** Cached until the next navigate or click. */
    async signature(): Promise<string> {
        if (this.cachedSignature === undefined) {
            const probe = await this.executor.execute(new ScriptCommand(probeSignature, null), this.ctx.config.browser.execJs);
            const foreign = probe.frames.filter(frame => !frame.sameOrigin);
            if (foreign.length > 0) {
                this.logger.verbose(`${foreign.length} cross-origin frame(s) not descended`);
            }
            this.cachedSignature = composeSignature(probe);
        }
        return this.cachedSignature;
    }

    /**
     * Snapshot of the current page. Uses the alerts and network log of the
     * readiness wait that preceded it.
     */
    async captureCurrentPage(): Promise<Capture> {
        const readiness = this.lastReadiness;
        const url = await this.driver.currentUrl();
        const raw = await this.driver.content();
        const canonical = this.canonicalizer.canonicalize(raw);
        const status = await this.documentStatus(readiness?.events ?? [], url);

        return Capture.create({
            which: this.which,
            url,
            html: canonical.html,
            domHash: canonical.domHash,
            status: status.status,
            contentType: status.contentType,
            headers: status.headers,
            alerts: readiness?.alerts ?? [],
            signature: await this.signature(),
            screenshot: this.wantsScreenshots() ? await this.driver.screenshot() : undefined
        });
    }

    async screenshot(): Promise<Buffer> {
        return await this.driver.screenshot();
    }

    /** Fresh cookies and storage, e.g. before logging in again. */
    async reset(): Promise<void> {
        this.cachedSignature = undefined;
        this.lastReadiness = undefined;
        await this.driver.clearSession();
        this.logger.info('Session reset');
    }

    async close(): Promise<void> {
        await this.driver.close();
    }

    private wantsScreenshots(): boolean {
        return this.ctx.config.compare.screenshots.enabled || this.ctx.sideDir(this.which) !== '';
    }

    private async awaitReady(expectDocument: boolean): Promise<ReadinessResult> {
        const result = await this.readiness.waitReady(expectDocument);
        this.lastReadiness = result;
        if (!result.ready) {
            throw new VisitCancelled('not_ready', `${this.which}: page not ready`);
        }
        return result;
    }

    /**
     * Network log first, then a same-origin fetch probe, then 200 with the
     * document's own content type.
     */
    private async documentStatus(events: NetworkEvent[], url: string): Promise<DocumentStatus> {
        const fromLog = statusFromEvents(events, url);
        if (fromLog) return fromLog;

        const policy = this.ctx.config.browser.execJs;
        const probed = await this.executor.execute(new ScriptCommand(fetchStatus, null), policy);
        if (probed) {
            return { status: probed.status, contentType: bareContentType(probed.contentType), headers: {} };
        }

        this.logger.debug(`No status for ${url}; assuming 200`);
        const contentType = await this.executor.execute(new ScriptCommand(documentContentType, null), policy);
        return { status: 200, contentType: bareContentType(contentType), headers: {} };
    }
}
