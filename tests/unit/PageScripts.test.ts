import { JSDOM } from 'jsdom';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { clickByLocator, findEquivalentLocator, handleSelect, type EquivalenceQuery } from '../../src/browser/PageScripts.js';
import type { ClickableDescriptor } from '../../src/core/types.js';

function query(wanted: Partial<ClickableDescriptor>, minScore = 2): EquivalenceQuery {
    return {
        descriptor: { locator: 'top::/html[1]/body[1]/button[9]', text: '', href: '', kind: 'button', onclick: '', frameKey: 'top', ...wanted },
        finders: ['a', 'button', '[onclick]'],
        minScore,
        textMax: 160
    };
}

let view: Window & typeof globalThis;
let document: Document;

/** jsdom lays nothing out; every element gets one client rect and a no-op scroll. */
function layOut(target: Window & typeof globalThis): void {
    Object.defineProperty(target.Element.prototype, 'getClientRects', {
        configurable: true,
        value: () => [{ x: 0, y: 0, width: 10, height: 10 }]
    });
    Object.defineProperty(target.Element.prototype, 'scrollIntoView', { configurable: true, value: () => undefined });
}

beforeEach(() => {
    const dom = new JSDOM('<!DOCTYPE html><html><head></head><body></body></html>', { url: 'http://ref.test/' });
    const defaultView = dom.window.document.defaultView;
    if (!defaultView) throw new Error('jsdom gave no window');
    view = defaultView;
    document = view.document;
    layOut(view);
    vi.stubGlobal('window', view);
    vi.stubGlobal('document', document);
    vi.stubGlobal('XPathResult', view.XPathResult);
});

afterEach(() => {
    vi.unstubAllGlobals();
    view.close();
});

describe('findEquivalentLocator', () => {
    it('prefers the element with the exact text', () => {
        document.body.innerHTML = '<button id="draft">Save draft</button><button id="save">Save</button>';

        expect(findEquivalentLocator(query({ text: 'Save' }))).toBe('top:://*[@id="save"]');
    });

    it('returns null when no candidate reaches the minimum score', () => {
        document.body.innerHTML = '<button id="save">Save</button>';

        expect(findEquivalentLocator(query({ text: 'Delete' }))).toBeNull();
    });

    it('breaks a text tie on the href path', () => {
        document.body.innerHTML = '<a id="invoices" href="/invoices">Orders</a><a id="orders" href="/orders?page=2">Orders</a>';

        expect(findEquivalentLocator(query({ kind: 'a', text: 'Orders', href: 'http://ref.test/orders?page=1' })))
            .toBe('top:://*[@id="orders"]');
    });

    it('breaks a text tie on the normalized onclick', () => {
        document.body.innerHTML = '<div id="close" onclick="hide(3)">Open</div><div id="open" onclick="show( 12 )">Open</div>';

        expect(findEquivalentLocator(query({ kind: 'onclick', text: 'Open', onclick: 'show(0)' })))
            .toBe('top:://*[@id="open"]');
    });

    it('only considers elements of the wanted kind', () => {
        document.body.innerHTML = '<a id="link" href="/x">Save</a><button id="other">Cancel</button>';

        expect(findEquivalentLocator(query({ text: 'Save' }, 0))).toBe('top:://*[@id="other"]');
    });

    it('addresses an element without a unique id by its position', () => {
        document.body.innerHTML = '<div><button>Save</button><button>Send</button></div><button id="dup">A</button><button id="dup">B</button>';

        expect(findEquivalentLocator(query({ text: 'Send' }))).toBe('top::/html[1]/body[1]/div[1]/button[2]');
        expect(findEquivalentLocator(query({ text: 'B' }))).toBe('top::/html[1]/body[1]/button[2]');
    });
});

describe('clickByLocator', () => {
    it('clicks an element of the top document', () => {
        document.body.innerHTML = '<button>One</button><button>Two</button>';
        const clicked: string[] = [];
        document.body.addEventListener('click', event => {
            if (event.target instanceof view.HTMLElement) clicked.push(event.target.textContent ?? '');
        });

        expect(clickByLocator('top::/html[1]/body[1]/button[2]')).toBe(true);
        expect(clicked).toEqual(['Two']);
    });

    it('descends into a frame by its frame key', () => {
        const frame = document.createElement('iframe');
        document.body.appendChild(frame);
        const inner = frame.contentDocument;
        const frameView = inner?.defaultView;
        if (!inner || !frameView) throw new Error('jsdom gave the frame no document');
        inner.body.innerHTML = '<button id="go">Go</button>';
        layOut(frameView);
        let clicks = 0;
        inner.getElementById('go')?.addEventListener('click', () => { clicks++; });

        expect(clickByLocator('top/1:://*[@id="go"]')).toBe(true);
        expect(clicks).toBe(1);
        expect(clickByLocator('top/2:://*[@id="go"]')).toBe(false);
        expect(clickByLocator('top:://*[@id="go"]')).toBe(false);
    });

    it('refuses a locator without a frame key', () => {
        expect(clickByLocator('//*[@id="go"]')).toBe(false);
    });
});

describe('handleSelect', () => {
    const FORM = '<form id="filter"><select id="sort">'
        + '<option value=""></option>'
        + '<option value="asc">Ascending</option>'
        + '<option value="x" disabled>Hidden</option>'
        + '<option>Newest</option>'
        + '</select><button id="apply" type="button">Apply</button></form>';

    it('chooses each enabled option, firing change and the submit control', () => {
        document.body.innerHTML = FORM;
        const changes: string[] = [];
        const select = document.querySelector('select');
        if (!select) throw new Error('fixture has no select');
        select.addEventListener('change', () => changes.push(select.value));
        let submits = 0;
        document.getElementById('apply')?.addEventListener('click', () => { submits++; });

        const report = handleSelect({ selector: 'select#sort', submitSelector: '#apply' });

        expect(report).toEqual({ found: true, values: ['asc', 'Newest'], submitted: 2 });
        expect(changes).toEqual(['asc', 'Newest']);
        expect(submits).toBe(2);
    });

    it('finds the select inside the addressed element and relies on change alone', () => {
        document.body.innerHTML = FORM;

        expect(handleSelect({ selector: '#filter', submitSelector: '' })).toEqual({ found: true, values: ['asc', 'Newest'], submitted: 0 });
    });

    it('reports a form missing from the page', () => {
        document.body.innerHTML = FORM;

        expect(handleSelect({ selector: '#absent', submitSelector: '' })).toEqual({ found: false, values: [], submitted: 0 });
        expect(handleSelect({ selector: 'select[', submitSelector: '' })).toEqual({ found: false, values: [], submitted: 0 });
    });
});
