import type { Capture } from '../capture/Capture.js';
import type { Logger } from '../core/Logger.js';
import type { ClickableDescriptor } from '../core/types.js';
import { VisitCancelled } from '../shared/utils/errors.js';
import type { QueueItem } from './QueueItem.js';
import type { SideVisitor } from './SideVisitor.js';

export type SideOutcome =
    | { ok: true; capture: Capture }
    | { ok: false; reason: string };

export interface PairOutcome {
    ref: SideOutcome;
    new: SideOutcome;
}

/**
 * The two sessions a crawl drives, wherever they live.
 */
export interface SessionPair {
    /** Resolves the step on the reference side, then mirrors it on the new side. */
    visit(item: QueueItem): Promise<PairOutcome>;
    /** Clickables on the reference side's current page. */
    discoverClickables(): Promise<ClickableDescriptor[]>;
    /** Runs the configured form handlers on both current pages. */
    handleForms(): Promise<void>;
    close(): Promise<void>;
}

/** Cancellation becomes an outcome; anything else propagates. */
export async function settle(fn: () => Promise<Capture>): Promise<SideOutcome> {
    try {
        return { ok: true, capture: await fn() };
    } catch (error) {
        if (error instanceof VisitCancelled) {
            return { ok: false, reason: error.reason };
        }
        throw error;
    }
}

/**
 * Both sessions in this process, driven one after the other.
 */
export class InProcessSessionPair implements SessionPair {
    constructor(
        private readonly ref: SideVisitor,
        private readonly next: SideVisitor,
        private readonly logger: Logger
    ) { }

    async visit(item: QueueItem): Promise<PairOutcome> {
        const ref = await settle(() => this.ref.visit(item));
        if (!ref.ok) {
            this.logger.verbose(`ref side cancelled (${ref.reason}); new side skipped`);
            return { ref, new: { ok: false, reason: 'skipped' } };
        }
        const next = await settle(() => this.next.visit(item));
        return { ref, new: next };
    }

    async discoverClickables(): Promise<ClickableDescriptor[]> {
        return await this.ref.discoverClickables();
    }

    async handleForms(): Promise<void> {
        await this.ref.session.handleForms();
        await this.next.session.handleForms();
    }

    async close(): Promise<void> {
        await Promise.all([this.ref.session.close(), this.next.session.close()]);
    }
}
