import { describe, expect, it } from 'vitest';
import { Frontier } from '../../src/crawl/Frontier.js';
import { QueueItem } from '../../src/crawl/QueueItem.js';

describe('Frontier', () => {
    it('enqueues each signature once while pending', () => {
        const log: string[] = [];
        const frontier = new Frontier(msg => log.push(msg));

        expect(frontier.addItems([QueueItem.link('/a'), QueueItem.link('/a'), QueueItem.link('/b')])).toBe(2);
        expect(frontier.length).toBe(2);
        expect(log).toEqual(['[Frontier] +2 (pending 2)']);
    });

    it('serves items first in, first out', () => {
        const frontier = new Frontier();
        frontier.addItems([QueueItem.link('/a'), QueueItem.link('/b')]);

        expect(frontier.next()?.path).toBe('/a');
        expect(frontier.next()?.path).toBe('/b');
        expect(frontier.next()).toBeUndefined();
    });

    it('never enqueues a resolved signature again', () => {
        const frontier = new Frontier();
        frontier.addItems([QueueItem.link('/a')]);
        const item = frontier.next();
        if (!item) throw new Error('expected an item');

        expect(frontier.markSeen(item)).toBe(true);
        expect(frontier.markSeen(QueueItem.link('/a'))).toBe(false);
        expect(frontier.addItems([QueueItem.link('/a')])).toBe(0);
        expect(frontier.isSeen(QueueItem.link('/a'))).toBe(true);
        expect(frontier.seenCount).toBe(1);
    });
});
