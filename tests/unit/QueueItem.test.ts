import { describe, expect, it } from 'vitest';
import type { ClickableDescriptor } from '../../src/core/types.js';
import { QueueItem } from '../../src/crawl/QueueItem.js';
import { ContractError, RpcProtocolError } from '../../src/shared/utils/errors.js';

const button: ClickableDescriptor = {
    locator: 'top::/html[1]/body[1]/button[1]',
    text: 'Open',
    href: '',
    kind: 'button',
    onclick: '',
    frameKey: 'top'
};

describe('QueueItem', () => {
    it('identifies links by path and clicks by origin and locator', () => {
        expect(QueueItem.link('/a').signature()).toBe('link|/a');
        expect(QueueItem.link('').path).toBe('/');
        expect(QueueItem.click(button, { origin: 'top:http://ref.test/a|doc:1#1' }).signature())
            .toBe('click|top:http://ref.test/a|doc:1#1|top::/html[1]/body[1]/button[1]');
    });

    it('requires an origin and a locator for clicks', () => {
        expect(() => QueueItem.click(button, {})).toThrow(ContractError);
        expect(() => QueueItem.click({ ...button, locator: '' }, { origin: 'o' })).toThrow(ContractError);
    });

    it('grows the chain by exactly one step per generation', () => {
        const root = QueueItem.link('/a');
        const first = QueueItem.click(button, { origin: 'sig-a', chain: root.chainPlus(), depth: 1 });
        const second = QueueItem.click({ ...button, locator: 'top:://*[@id="next"]' }, { origin: 'sig-b', chain: first.chainPlus(), depth: 2 });

        expect(root.chainPlus().map(step => step.signature())).toEqual(['link|/a']);
        expect(second.chain.map(step => step.signature())).toEqual([
            'link|/a',
            'click|sig-a|top::/html[1]/body[1]/button[1]'
        ]);
        expect(second.chain.every(step => step.chain.length === 0)).toBe(true);
        expect(Object.isFrozen(second.chain)).toBe(true);
    });

    it('is visited once', () => {
        const item = QueueItem.link('/a');
        item.markVisited(4);

        expect(item.visited).toBe(4);
        expect(item.withoutChain().visited).toBe(4);
        expect(() => item.markVisited(5)).toThrow(ContractError);
    });

    it('survives the wire with its chain and bookkeeping', () => {
        const root = QueueItem.link('/a?x=1');
        const item = QueueItem.click(button, { origin: 'sig-a', chain: root.chainPlus(), depth: 1 });
        item.markVisited(9);
        item.destination = 'sig-b';

        const back = QueueItem.fromJSON(JSON.parse(JSON.stringify(item)));

        expect(back.signature()).toBe(item.signature());
        expect(back.chain.map(step => step.signature())).toEqual(['link|/a?x=1']);
        expect(back.depth).toBe(1);
        expect(back.visited).toBe(9);
        expect(back.destination).toBe('sig-b');
        expect(back.target).toEqual({ kind: 'click', descriptor: button });
    });

    it('rejects malformed wire data', () => {
        expect(() => QueueItem.fromJSON(null)).toThrow(RpcProtocolError);
        expect(() => QueueItem.fromJSON({ target: { kind: 'hover' } })).toThrow(RpcProtocolError);
        expect(() => QueueItem.fromJSON({ target: { kind: 'link', path: '/a' }, chain: 'x' })).toThrow(RpcProtocolError);
    });

    it('turns a seeded chain into an item whose ancestors are the earlier steps', () => {
        const item = QueueItem.fromSeed([
            { kind: 'link', path: '/a' },
            { kind: 'click', origin: 'sig-a', locator: 'top/1::/html[1]/body[1]/a[2]', text: 'More', href: '/more', clickKind: 'a', onclick: '' }
        ]);

        expect(item.kind).toBe('click');
        expect(item.origin).toBe('sig-a');
        expect(item.chain.map(step => step.signature())).toEqual(['link|/a']);
        expect(item.target).toEqual({
            kind: 'click',
            descriptor: { locator: 'top/1::/html[1]/body[1]/a[2]', text: 'More', href: '/more', kind: 'a', onclick: '', frameKey: 'top/1' }
        });
        expect(() => QueueItem.fromSeed([])).toThrow(ContractError);
    });
});
