import type { QueueItem } from './QueueItem.js';

/**
 * FIFO of pending steps plus the set of step signatures already resolved.
 * An item is enqueued only when neither resolved nor already pending.
 */
export class Frontier {
    private queue: QueueItem[] = [];
    private pending = new Set<string>();
    private seen = new Set<string>();

    constructor(private readonly log: (msg: string) => void = () => undefined) { }

    public addItems(items: readonly QueueItem[]): number {
        let addedCount = 0;
        for (const item of items) {
            const key = item.signature();
            if (this.seen.has(key) || this.pending.has(key)) continue;
            this.pending.add(key);
            this.queue.push(item);
            addedCount++;
        }
        if (addedCount > 0) {
            this.log(`[Frontier] +${addedCount} (pending ${this.queue.length})`);
        }
        return addedCount;
    }

    public next(): QueueItem | undefined {
        const item = this.queue.shift();
        if (item) this.pending.delete(item.signature());
        return item;
    }

    /**
     * Records the item as resolved. False when its signature was resolved before.
     */
    public markSeen(item: QueueItem): boolean {
        const key = item.signature();
        if (this.seen.has(key)) return false;
        this.seen.add(key);
        return true;
    }

    public isSeen(item: QueueItem): boolean {
        return this.seen.has(item.signature());
    }

    public get length(): number { return this.queue.length; }
    public get seenCount(): number { return this.seen.size; }
}
