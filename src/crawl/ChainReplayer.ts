import type { BrowserSession } from '../browser/BrowserSession.js';
import { samePlace, type PlaceComparison } from '../browser/PageSignature.js';
import type { Logger } from '../core/Logger.js';
import type { ClickableDescriptor } from '../core/types.js';
import { ContractError, VisitCancelled } from '../shared/utils/errors.js';
import type { QueueItem } from './QueueItem.js';

export type HopObserver = (hop: QueueItem, hopNumber: number) => Promise<void>;

export interface ReplayOptions {
    /** How the current signature is matched against the recorded origin */
    comparison: PlaceComparison;
    /** Fall back to an equivalent element when a stored locator misses */
    allowEquivalent: boolean;
}

/**
 * Brings a session back to the page a click step was discovered on by
 * replaying the step's ancestors in order. Each hop is replayed directly;
 * a hop is never itself restored.
 */
export class ChainReplayer {
    constructor(
        private readonly session: BrowserSession,
        private readonly options: ReplayOptions,
        private readonly logger: Logger
    ) { }

    /**
     * @returns the number of hops replayed (0 when already at the origin)
     * @throws VisitCancelled `chain_exhausted` when the chain ends elsewhere,
     *         `chain_click_failed` when a hop's element cannot be found
     */
    async restore(item: QueueItem, onHop?: HopObserver): Promise<number> {
        const origin = item.origin;
        if (origin === undefined) {
            throw new ContractError('cannot restore a step without origin', { step: item.signature() });
        }
        if (await this.isAt(origin)) return 0;

        this.logger.verbose(`Restoring ${item.describe()} through ${item.chain.length} hop(s)`);
        let replayed = 0;
        for (const hop of item.chain) {
            await this.replayHop(hop);
            replayed++;
            if (onHop) await onHop(hop, replayed);
            if (await this.isAt(origin)) return replayed;
        }
        throw new VisitCancelled('chain_exhausted', `origin not reached after ${replayed} hop(s)`);
    }

    async replayHop(hop: QueueItem): Promise<void> {
        const target = hop.target;
        if (target.kind === 'link') {
            await this.session.navigate(target.path);
            return;
        }
        if (!(await this.clickOrEquivalent(target.descriptor))) {
            throw new VisitCancelled('chain_click_failed', `hop not clickable: ${target.descriptor.locator}`);
        }
    }

    /** The stored locator first; an equivalent element only when that misses. */
    async clickOrEquivalent(descriptor: ClickableDescriptor): Promise<boolean> {
        if (await this.session.click(descriptor.locator)) return true;
        if (!this.options.allowEquivalent) return false;

        const equivalent = await this.session.findEquivalentLocator(descriptor);
        if (!equivalent || equivalent === descriptor.locator) return false;
        this.logger.verbose(`Using equivalent ${equivalent} for ${descriptor.locator}`);
        return await this.session.click(equivalent);
    }

    private async isAt(origin: string): Promise<boolean> {
        return samePlace(await this.session.signature(), origin, this.options.comparison);
    }
}
