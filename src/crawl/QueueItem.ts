/**
 * One navigation step: follow a link, or click an element on a known page.
 * Carries the ordered ancestor steps needed to get back to where it applies.
 */

import type { SeedStep } from '../config/CompareConfig.js';
import type { ClickableDescriptor, ClickableKind } from '../core/types.js';
import { ContractError, RpcProtocolError } from '../shared/utils/errors.js';
import { Validators } from '../shared/utils/JsonValidator.js';

export type QueueItemKind = 'link' | 'click';

export interface LinkTarget {
    kind: 'link';
    path: string;
}

export interface ClickTarget {
    kind: 'click';
    descriptor: ClickableDescriptor;
}

export type QueueTarget = LinkTarget | ClickTarget;

export interface QueueItemOptions {
    /** Signature of the page the step was discovered on; required for clicks */
    origin?: string;
    chain?: readonly QueueItem[];
    depth?: number;
}

export interface SerializedQueueItem {
    target: QueueTarget;
    origin?: string;
    depth: number;
    visited?: number;
    destination?: string;
    chain: SerializedQueueItem[];
}

export class QueueItem {
    readonly chain: readonly QueueItem[];
    readonly origin: string | undefined;
    readonly depth: number;
    private visitedOrdinal: number | undefined;
    private destinationSignature: string | undefined;

    private constructor(readonly target: QueueTarget, options: QueueItemOptions) {
        this.origin = options.origin;
        this.depth = options.depth ?? 0;
        this.chain = Object.freeze([...(options.chain ?? [])]);
    }

    static link(path: string, options: QueueItemOptions = {}): QueueItem {
        return new QueueItem({ kind: 'link', path: path || '/' }, options);
    }

    /**
     * @throws ContractError without an origin signature or locator
     */
    static click(descriptor: ClickableDescriptor, options: QueueItemOptions): QueueItem {
        if (!options.origin) {
            throw new ContractError('click step needs an origin signature', { locator: descriptor.locator });
        }
        if (!descriptor.locator) {
            throw new ContractError('click step needs a locator', { origin: options.origin });
        }
        return new QueueItem({ kind: 'click', descriptor: { ...descriptor } }, options);
    }

    /** The last step becomes the item, the steps before it its chain. */
    static fromSeed(steps: readonly SeedStep[]): QueueItem {
        if (steps.length === 0) {
            throw new ContractError('a seeded signature needs at least one step');
        }
        let chain: readonly QueueItem[] = [];
        let item: QueueItem | undefined;
        for (const step of steps) {
            item = step.kind === 'link'
                ? QueueItem.link(step.path, { chain })
                : QueueItem.click({
                    locator: step.locator,
                    text: step.text,
                    href: step.href,
                    kind: step.clickKind,
                    onclick: step.onclick,
                    frameKey: step.locator.split('::')[0]
                }, { origin: step.origin, chain });
            chain = item.chainPlus();
        }
        if (!item) throw new ContractError('a seeded signature needs at least one step');
        return item;
    }

    get kind(): QueueItemKind {
        return this.target.kind;
    }

    get locator(): string | undefined {
        return this.target.kind === 'click' ? this.target.descriptor.locator : undefined;
    }

    get path(): string | undefined {
        return this.target.kind === 'link' ? this.target.path : undefined;
    }

    /**
     * Identity used for de-duplication:
     * `link|<path>` or `click|<origin>|<locator>`.
     */
    signature(): string {
        return this.target.kind === 'link'
            ? `link|${this.target.path}`
            : `click|${this.origin ?? ''}|${this.target.descriptor.locator}`;
    }

    /** This item's chain followed by this item without its own chain. */
    chainPlus(): readonly QueueItem[] {
        return Object.freeze([...this.chain, this.withoutChain()]);
    }

    withoutChain(): QueueItem {
        const copy = new QueueItem(this.target, { origin: this.origin, depth: this.depth });
        copy.visitedOrdinal = this.visitedOrdinal;
        copy.destinationSignature = this.destinationSignature;
        return copy;
    }

    get visited(): number | undefined {
        return this.visitedOrdinal;
    }

    /**
     * @throws ContractError when the item was already visited
     */
    markVisited(ordinal: number): void {
        if (this.visitedOrdinal !== undefined) {
            throw new ContractError('queue item visited twice', { signature: this.signature(), ordinal });
        }
        this.visitedOrdinal = ordinal;
    }

    get destination(): string | undefined {
        return this.destinationSignature;
    }

    set destination(signature: string | undefined) {
        this.destinationSignature = signature;
    }

    describe(): string {
        return this.target.kind === 'link'
            ? `link ${this.target.path}`
            : `click ${this.target.descriptor.locator} "${this.target.descriptor.text}"`;
    }

    toJSON(): SerializedQueueItem {
        return {
            target: this.target,
            origin: this.origin,
            depth: this.depth,
            visited: this.visitedOrdinal,
            destination: this.destinationSignature,
            chain: this.chain.map(step => step.toJSON())
        };
    }

    /**
     * @throws RpcProtocolError when `raw` is not a serialized item
     */
    static fromJSON(raw: unknown): QueueItem {
        if (!Validators.object(raw) || !Validators.object(raw.target)) {
            throw new RpcProtocolError('queue item: expected an object with a target');
        }
        const chainRaw = raw.chain ?? [];
        if (!Validators.array()(chainRaw)) {
            throw new RpcProtocolError('queue item: chain must be a list');
        }
        const chain = chainRaw.map(step => QueueItem.fromJSON(step));
        const origin = Validators.string(raw.origin) ? raw.origin : undefined;
        const depth = Validators.number(raw.depth) ? raw.depth : 0;
        const target = raw.target;

        let item: QueueItem;
        if (target.kind === 'link' && Validators.string(target.path)) {
            item = QueueItem.link(target.path, { origin, chain, depth });
        } else if (target.kind === 'click' && isDescriptor(target.descriptor)) {
            item = QueueItem.click(target.descriptor, { origin, chain, depth });
        } else {
            throw new RpcProtocolError('queue item: unknown target');
        }

        if (Validators.number(raw.visited)) item.visitedOrdinal = raw.visited;
        if (Validators.string(raw.destination)) item.destinationSignature = raw.destination;
        return item;
    }
}

const CLICKABLE_KINDS: readonly ClickableKind[] = ['a', 'button', 'onclick', 'role-link', 'other'];

export function isDescriptor(value: unknown): value is ClickableDescriptor {
    return Validators.object(value)
        && Validators.string(value.locator)
        && Validators.string(value.text)
        && Validators.string(value.href)
        && Validators.string(value.onclick)
        && Validators.string(value.frameKey)
        && CLICKABLE_KINDS.some(kind => kind === value.kind);
}
