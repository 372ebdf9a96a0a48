/**
 * Drives a session pair through one role's frontier: resolve each step on
 * both deployments, compare, record, and enqueue what the reference page offers.
 */

import type { ByClickSettings } from '../config/CompareConfig.js';
import type { ArtifactPlace, ArtifactWriter } from '../capture/ArtifactWriter.js';
import type { Capture, CompareOptions } from '../capture/Capture.js';
import { ScreenshotComparator } from '../capture/ScreenshotComparator.js';
import type { Context } from '../core/Context.js';
import type { Logger } from '../core/Logger.js';
import type { ClickableDescriptor } from '../core/types.js';
import { ErrorHandler, ErrorSeverity } from '../shared/utils/ErrorHandler.js';
import { ContractError, describeError } from '../shared/utils/errors.js';
import { CrawlResult, formatSummary } from './CrawlResult.js';
import { Frontier } from './Frontier.js';
import { QueueItem } from './QueueItem.js';
import type { PairOutcome, SessionPair } from './SessionPair.js';

export function filterClickables(clickables: readonly ClickableDescriptor[], settings: ByClickSettings): ClickableDescriptor[] {
    return clickables.filter(clickable =>
        !(clickable.href && settings.hrefDeny.some(pattern => pattern.test(clickable.href))) &&
        !(clickable.text && settings.textDeny.some(pattern => pattern.test(clickable.text))) &&
        !settings.locatorDeny.some(pattern => pattern.test(clickable.locator))
    );
}

export class Crawler {
    private readonly frontier: Frontier;
    private readonly result = new CrawlResult();
    private readonly successiveErrors = new Map<string, number>();
    private readonly comparator: ScreenshotComparator | undefined;
    private readonly logger: Logger;

    constructor(
        private readonly ctx: Context,
        private readonly pair: SessionPair,
        private readonly artifacts: ArtifactWriter
    ) {
        this.logger = ctx.logger.child('Crawler');
        this.frontier = new Frontier(msg => this.logger.debug(msg));
        const screenshots = ctx.config.compare.screenshots;
        this.comparator = screenshots.enabled ? new ScreenshotComparator(screenshots) : undefined;
    }

    /** Configured signature chains, else the role's routes. */
    seed(): QueueItem[] {
        const role = this.ctx.role;
        if (role.signatures.length > 0) {
            return role.signatures.map(seed => QueueItem.fromSeed(seed.steps));
        }
        return role.routes.map(route => QueueItem.link(route));
    }

    async run(): Promise<CrawlResult> {
        const { maxVisited, intermediateResultsEvery } = this.ctx.config.crawl;
        this.frontier.addItems(this.seed());
        this.logger.info(`🕷️ Crawling role ${this.ctx.role.name}: ${this.ctx.baseUrl('ref')} vs ${this.ctx.baseUrl('new')}`);

        for (let item = this.frontier.next(); item; item = this.frontier.next()) {
            if (maxVisited > 0 && this.result.counters.visited >= maxVisited) {
                this.logger.info(`Reached max_visited (${maxVisited}); ${this.frontier.length + 1} step(s) left`);
                break;
            }

            const keepGoing = await this.visit(item);

            const visited = this.result.counters.visited;
            if (intermediateResultsEvery > 0 && visited > 0 && visited % intermediateResultsEvery === 0) {
                this.report('Intermediate results');
            }
            if (!keepGoing) break;
        }

        const summary = this.report('Results');
        this.artifacts.writeSummary(summary);
        return this.result;
    }

    get outcome(): CrawlResult {
        return this.result;
    }

    /** False when the successive-error guard stops the crawl. */
    private async visit(item: QueueItem): Promise<boolean> {
        if (!this.frontier.markSeen(item)) {
            this.logger.debug(`Already resolved: ${item.signature()}`);
            return true;
        }

        const visited = this.result.countVisit(item);
        item.markVisited(visited);
        this.logger.info(`#${visited} ${item.describe()}`);

        let outcome: PairOutcome;
        try {
            outcome = await this.pair.visit(item);
        } catch (error) {
            if (error instanceof ContractError) throw error;
            this.logger.error(`#${visited} ${describeError(error)}`);
            this.result.unexpected(item, 'exception');
            return this.noteFailure('exception');
        }

        const { ref, new: next } = outcome;
        if (!ref.ok || !next.ok) {
            const reason = !ref.ok ? ref.reason : next.ok ? 'no_reason' : next.reason;
            this.logger.warn(`#${visited} cancelled: ${reason}`);
            this.result.cancel(item, reason);
            return this.noteFailure(reason);
        }

        item.destination = ref.capture.signature;
        if (await this.compareAndRecord(item, ref.capture, next.capture)) {
            this.successiveErrors.clear();
        }
        return true;
    }

    /** False when both sides share an error status and nothing was compared. */
    private async compareAndRecord(item: QueueItem, ref: Capture, next: Capture): Promise<boolean> {
        const visited = item.visited ?? 0;

        if (ref.status >= 400 && ref.status === next.status) {
            this.logger.verbose(`#${visited} both sides answered ${ref.status}`);
            this.result.record(item, ref, next, []);
            return false;
        }

        const refPlace: ArtifactPlace = { visited, path: ref.path, signature: ref.signature, locator: item.locator };
        const newPlace: ArtifactPlace = { visited, path: next.path, signature: next.signature, locator: item.locator };
        this.writeArtifacts(ref, refPlace);
        this.writeArtifacts(next, newPlace);

        const compare = await ref.compare(next, this.compareOptions(refPlace));
        this.result.record(item, ref, next, compare);
        if (compare.length > 0) {
            this.logger.warn(`#${visited} differs: ${compare.join(', ')}`);
        }

        await this.enqueueFrom(item, ref);
        await this.handleForms();
        return true;
    }

    private writeArtifacts(capture: Capture, place: ArtifactPlace): void {
        this.artifacts.writeHtml(capture.which, place, capture.html);
        if (capture.screenshot) {
            this.artifacts.writeScreenshot(capture.which, place, capture.screenshot);
        }
    }

    private compareOptions(place: ArtifactPlace): CompareOptions {
        const comparator = this.comparator;
        return {
            htmls: this.ctx.config.compare.htmls.enabled,
            screenshots: comparator ? {
                comparator,
                onMismatch: async (ref, next, verdict) => {
                    if (!ref.screenshot || !next.screenshot) return;
                    this.logger.warn(`#${place.visited} ${verdict.differingPixels} differing pixels (max ${verdict.thresholdCount})`);
                    const refPng = ref.screenshot;
                    const newPng = next.screenshot;
                    const diff = await ErrorHandler.safeExecute<Buffer | undefined>(
                        () => comparator.renderDiff(refPng, newPng),
                        { component: 'Crawler', operation: 'renderDiff', logger: this.logger },
                        undefined,
                        ErrorSeverity.WARNING
                    );
                    this.artifacts.writeDiffs(place, refPng, newPng, diff);
                }
            } : undefined
        };
    }

    private async handleForms(): Promise<void> {
        if (this.ctx.config.forms.length === 0) return;
        await ErrorHandler.safeExecute(
            () => this.pair.handleForms(),
            { component: 'Crawler', operation: 'handleForms', logger: this.logger },
            undefined,
            ErrorSeverity.WARNING
        );
    }

    private async enqueueFrom(item: QueueItem, ref: Capture): Promise<void> {
        const { byClick, byLink, sameHost } = this.ctx.config.crawl;
        const chain = item.chainPlus();
        const options = { origin: ref.signature, chain, depth: item.depth + 1 };
        const candidates: QueueItem[] = [];

        if (byClick.enabled) {
            const clickables = await ErrorHandler.safeExecute(
                () => this.pair.discoverClickables(),
                { component: 'Crawler', operation: 'discoverClickables', logger: this.logger },
                [],
                ErrorSeverity.WARNING
            );
            for (const clickable of filterClickables(clickables, byClick)) {
                candidates.push(QueueItem.click(clickable, options));
            }
        }

        if (byLink.enabled) {
            for (const place of ref.extractLinks(byLink, { baseUrl: this.ctx.baseUrl('ref'), sameHost })) {
                candidates.push(QueueItem.link(place, options));
            }
        }

        this.frontier.addItems(candidates);
    }

    private noteFailure(reason: string): boolean {
        const count = (this.successiveErrors.get(reason) ?? 0) + 1;
        this.successiveErrors.set(reason, count);
        const max = this.ctx.config.crawl.successiveErrorsMax;
        if (max > 0 && count >= max) {
            this.logger.warn(`${count} successive "${reason}" outcomes; stopping role ${this.ctx.role.name}`);
            return false;
        }
        return true;
    }

    private report(title: string) {
        const summary = this.result.summary(this.ctx.role.name, this.ctx.roleDir);
        this.logger.info(`${title}:`);
        for (const line of formatSummary(summary)) this.logger.info(line);
        return summary;
    }
}
