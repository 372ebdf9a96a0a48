import type { BrowserSession } from '../browser/BrowserSession.js';
import type { Capture } from '../capture/Capture.js';
import type { ArtifactWriter } from '../capture/ArtifactWriter.js';
import type { Context } from '../core/Context.js';
import type { Logger } from '../core/Logger.js';
import type { ClickableDescriptor } from '../core/types.js';
import { ErrorHandler, ErrorSeverity } from '../shared/utils/ErrorHandler.js';
import { VisitCancelled } from '../shared/utils/errors.js';
import { ChainReplayer } from './ChainReplayer.js';
import type { QueueItem } from './QueueItem.js';

/**
 * Resolves queue items on one session. The reference side matches origins
 * exactly; the mirroring side compares across hosts and may fall back to an
 * equivalent element.
 */
export class SideVisitor {
    private readonly replayer: ChainReplayer;
    private readonly logger: Logger;

    constructor(
        readonly session: BrowserSession,
        private readonly ctx: Context,
        private readonly artifacts: ArtifactWriter
    ) {
        this.logger = ctx.logger.child(`Visitor:${session.which}`);
        const mirror = session.which === 'new';
        this.replayer = new ChainReplayer(session, {
            comparison: mirror ? 'across-hosts' : 'exact',
            allowEquivalent: mirror
        }, this.logger);
    }

    get which() {
        return this.session.which;
    }

    /**
     * @throws VisitCancelled with the reason the step could not be resolved
     */
    async visit(item: QueueItem): Promise<Capture> {
        const visited = item.visited ?? 0;
        try {
            const target = item.target;
            if (target.kind === 'link') {
                await this.session.navigate(target.path);
            } else {
                await this.replayer.restore(item, (hop, hopNumber) => this.hopScreenshot(visited, hop, hopNumber));
                if (!(await this.replayer.clickOrEquivalent(target.descriptor))) {
                    throw new VisitCancelled(this.which === 'new' ? 'no_capture' : 'click_failed',
                        `${this.which}: nothing to click for ${target.descriptor.locator}`);
                }
            }
            return await this.session.captureCurrentPage();
        } catch (error) {
            if (error instanceof VisitCancelled && error.reason === 'not_ready') {
                this.artifacts.writePerfLog(this.which, visited, this.session.lastNetworkLog);
            }
            throw error;
        }
    }

    async discoverClickables(): Promise<ClickableDescriptor[]> {
        return await this.session.discoverClickables();
    }

    private async hopScreenshot(visited: number, hop: QueueItem, hopNumber: number): Promise<void> {
        if (!this.ctx.config.crawl.byClick.intermediateScreenshots) return;
        await ErrorHandler.safeExecute(async () => {
            const png = await this.session.screenshot();
            const signature = await this.session.signature();
            this.artifacts.writeScreenshot(this.which, {
                visited,
                path: hop.path ?? '',
                signature,
                locator: hop.locator
            }, png, `chain${String(hopNumber).padStart(2, '0')}`);
        }, { component: 'SideVisitor', operation: 'hopScreenshot', logger: this.logger }, undefined, ErrorSeverity.WARNING);
    }
}
