/**
 * Functions evaluated inside the page.
 *
 * Each one is shipped as source text, so it may only use its argument, the
 * DOM and functions declared in its own body.
 */

import type { ClickableDescriptor, ClickableKind } from '../core/types.js';

export interface FrameProbe {
    /** Position in the frame tree, e.g. "1" or "1.2" */
    index: string;
    id: string;
    src: string;
    sameOrigin: boolean;
    href: string;
}

export interface SignatureProbe {
    href: string;
    fingerprint: string;
    frames: FrameProbe[];
}

export interface DiscoveryOptions {
    finders: string[];
    cssExcludes: string[];
    textMax: number;
}

export interface EquivalenceQuery {
    descriptor: ClickableDescriptor;
    finders: string[];
    minScore: number;
    textMax: number;
}

export interface FormQuery {
    selector: string;
    /** Empty when no submit control is configured */
    submitSelector: string;
}

export interface FormReport {
    found: boolean;
    /** Option values chosen, in document order */
    values: string[];
    submitted: number;
}

export interface StatusProbe {
    status: number;
    contentType: string;
}

export function probeBody(_: null): boolean {
    return document.body !== null;
}

/** Cheap change detector: visible text length and element count. */
export function probeDomFingerprint(_: null): [number, number] {
    const text = document.body ? document.body.innerText : '';
    return [text.length, document.getElementsByTagName('*').length];
}

export function probeSignature(_: null): SignatureProbe {
    const frames: FrameProbe[] = [];

    function walk(doc: Document, prefix: string): void {
        const nodes = doc.querySelectorAll<HTMLIFrameElement | HTMLFrameElement>('iframe, frame');
        nodes.forEach((node, i) => {
            const index = prefix ? `${prefix}.${i + 1}` : String(i + 1);
            const child = node.contentDocument;
            frames.push({
                index,
                id: node.id,
                src: node.getAttribute('src') ?? '',
                sameOrigin: child !== null,
                href: child && child.location ? child.location.href : ''
            });
            if (child) walk(child, index);
        });
    }

    walk(document, '');
    const text = document.body ? document.body.innerText : '';
    return {
        href: window.location.href,
        fingerprint: `${text.length}#${document.getElementsByTagName('*').length}`,
        frames
    };
}

export function discoverClickables(options: DiscoveryOptions): ClickableDescriptor[] {
    const found: ClickableDescriptor[] = [];

    function canonText(el: Element): string {
        const raw = el.textContent || el.getAttribute('aria-label') || el.getAttribute('title') || el.getAttribute('value') || '';
        return raw.replace(/\s+/g, ' ').trim().slice(0, options.textMax);
    }

    function kindOf(el: Element): ClickableKind {
        const tag = el.tagName.toLowerCase();
        if (tag === 'a') return 'a';
        if (tag === 'button') return 'button';
        if (tag === 'input' && /^(button|submit)$/i.test(el.getAttribute('type') ?? '')) return 'button';
        if (el.hasAttribute('onclick')) return 'onclick';
        if (el.getAttribute('role') === 'link') return 'role-link';
        return 'other';
    }

    function xpathFor(el: Element, doc: Document): string {
        const id = el.getAttribute('id');
        if (id && !id.includes('"') && doc.querySelectorAll(`[id="${id}"]`).length === 1) {
            return `//*[@id="${id}"]`;
        }
        const steps: string[] = [];
        let node: Element | null = el;
        while (node) {
            const tag = node.tagName.toLowerCase();
            let position = 1;
            let sibling = node.previousElementSibling;
            while (sibling) {
                if (sibling.tagName.toLowerCase() === tag) position++;
                sibling = sibling.previousElementSibling;
            }
            steps.unshift(`${tag}[${position}]`);
            node = node.parentElement;
        }
        return `/${steps.join('/')}`;
    }

    function usable(el: Element, view: Window): boolean {
        if (el.getClientRects().length === 0) return false;
        const style = view.getComputedStyle(el);
        if (style.visibility === 'hidden' || style.display === 'none') return false;
        if (el.hasAttribute('disabled') || el.getAttribute('aria-disabled') === 'true') return false;
        for (const selector of options.cssExcludes) {
            try {
                if (el.closest(selector)) return false;
            } catch {
                continue;
            }
        }
        return true;
    }

    function collect(doc: Document, frameKey: string): void {
        const view = doc.defaultView;
        if (!view) return;
        const seen = new Set<Element>();
        for (const finder of options.finders) {
            let matches: NodeListOf<Element>;
            try {
                matches = doc.querySelectorAll(finder);
            } catch {
                continue;
            }
            matches.forEach(el => {
                if (seen.has(el) || !usable(el, view)) return;
                seen.add(el);
                found.push({
                    locator: `${frameKey}::${xpathFor(el, doc)}`,
                    text: canonText(el),
                    href: el.getAttribute('href') ?? '',
                    kind: kindOf(el),
                    onclick: (el.getAttribute('onclick') ?? '').replace(/\s+/g, '').replace(/\d+/g, '0'),
                    frameKey
                });
            });
        }

        const frames = doc.querySelectorAll<HTMLIFrameElement | HTMLFrameElement>('iframe, frame');
        frames.forEach((frame, i) => {
            if (frame.contentDocument) collect(frame.contentDocument, `${frameKey}/${i + 1}`);
        });
    }

    collect(document, 'top');
    return found;
}

/**
 * Best-scoring element of the same kind on the current page, or null when
 * nothing reaches `minScore`.
 */
export function findEquivalentLocator(query: EquivalenceQuery): string | null {
    const wanted = query.descriptor;
    const best = { locator: '', score: Number.NEGATIVE_INFINITY };

    function canonText(el: Element): string {
        const raw = el.textContent || el.getAttribute('aria-label') || el.getAttribute('title') || el.getAttribute('value') || '';
        return raw.replace(/\s+/g, ' ').trim().slice(0, query.textMax);
    }

    function kindOf(el: Element): ClickableKind {
        const tag = el.tagName.toLowerCase();
        if (tag === 'a') return 'a';
        if (tag === 'button') return 'button';
        if (tag === 'input' && /^(button|submit)$/i.test(el.getAttribute('type') ?? '')) return 'button';
        if (el.hasAttribute('onclick')) return 'onclick';
        if (el.getAttribute('role') === 'link') return 'role-link';
        return 'other';
    }

    function hrefPath(href: string, base: string): string {
        if (!href) return '';
        try {
            return new URL(href, base).pathname;
        } catch {
            return href;
        }
    }

    function tokens(text: string): Set<string> {
        return new Set(text.toLowerCase().split(/\W+/).filter(Boolean));
    }

    function jaccard(a: string, b: string): number {
        const ta = tokens(a);
        const tb = tokens(b);
        if (ta.size === 0 && tb.size === 0) return 0;
        let shared = 0;
        ta.forEach(t => { if (tb.has(t)) shared++; });
        return shared / (ta.size + tb.size - shared);
    }

    function xpathFor(el: Element, doc: Document): string {
        const id = el.getAttribute('id');
        if (id && !id.includes('"') && doc.querySelectorAll(`[id="${id}"]`).length === 1) {
            return `//*[@id="${id}"]`;
        }
        const steps: string[] = [];
        let node: Element | null = el;
        while (node) {
            const tag = node.tagName.toLowerCase();
            let position = 1;
            let sibling = node.previousElementSibling;
            while (sibling) {
                if (sibling.tagName.toLowerCase() === tag) position++;
                sibling = sibling.previousElementSibling;
            }
            steps.unshift(`${tag}[${position}]`);
            node = node.parentElement;
        }
        return `/${steps.join('/')}`;
    }

    const selectorByKind: Record<ClickableKind, string> = {
        'a': 'a',
        'button': 'button, input[type="button"], input[type="submit"]',
        'onclick': '[onclick]',
        'role-link': '[role="link"]',
        'other': query.finders.join(', ')
    };

    function score(doc: Document, frameKey: string): void {
        let candidates: NodeListOf<Element>;
        try {
            candidates = doc.querySelectorAll(selectorByKind[wanted.kind]);
        } catch {
            return;
        }
        const wantedPath = hrefPath(wanted.href, doc.baseURI);
        candidates.forEach(el => {
            if (kindOf(el) !== wanted.kind || el.getClientRects().length === 0) return;
            const text = canonText(el);
            let value = 0;
            if (wanted.text && text === wanted.text) value += 3;
            else if (wanted.text && text && (text.includes(wanted.text) || wanted.text.includes(text))) value += 1;
            if (wantedPath && hrefPath(el.getAttribute('href') ?? '', doc.baseURI) === wantedPath) value += 2;
            const onclick = (el.getAttribute('onclick') ?? '').replace(/\s+/g, '').replace(/\d+/g, '0');
            if (wanted.onclick && onclick === wanted.onclick) value += 2;
            value += jaccard(text, wanted.text);
            if (value > best.score) {
                best.locator = `${frameKey}::${xpathFor(el, doc)}`;
                best.score = value;
            }
        });

        const frames = doc.querySelectorAll<HTMLIFrameElement | HTMLFrameElement>('iframe, frame');
        frames.forEach((frame, i) => {
            if (frame.contentDocument) score(frame.contentDocument, `${frameKey}/${i + 1}`);
        });
    }

    score(document, 'top');
    return best.locator && best.score >= query.minScore ? best.locator : null;
}

/** Scrolls the addressed element into view and clicks it. */
export function clickByLocator(locator: string): boolean {
    const split = locator.indexOf('::');
    if (split < 0) return false;
    const frameKey = locator.slice(0, split);
    const xpath = locator.slice(split + 2);

    let doc: Document | null = document;
    for (const part of frameKey.split('/').slice(1)) {
        if (!doc) break;
        const frames: NodeListOf<HTMLIFrameElement | HTMLFrameElement> = doc.querySelectorAll<HTMLIFrameElement | HTMLFrameElement>('iframe, frame');
        const frame = frames.item(Number(part) - 1);
        doc = frame ? frame.contentDocument : null;
    }
    if (!doc || !doc.defaultView) return false;
    const view = doc.defaultView;

    const node = doc.evaluate(xpath, doc, null, XPathResult.FIRST_ORDERED_NODE_TYPE, null).singleNodeValue;
    if (!(node instanceof view.HTMLElement)) return false;

    node.scrollIntoView({ block: 'center', inline: 'center' });
    try {
        node.click();
    } catch {
        node.dispatchEvent(new view.MouseEvent('click', { bubbles: true, cancelable: true, view }));
    }
    return true;
}

/**
 * Chooses every enabled, non-empty option of the addressed `<select>` in turn,
 * firing `change` and clicking the submit control after each choice.
 */
export function handleSelect(query: FormQuery): FormReport {
    const report: FormReport = { found: false, values: [], submitted: 0 };
    const view = document.defaultView;
    if (!view) return report;

    let target: Element | null;
    try {
        target = document.querySelector(query.selector);
    } catch {
        return report;
    }
    if (!target) return report;
    const select = target instanceof view.HTMLSelectElement ? target : target.querySelector('select');
    if (!select) return report;
    report.found = true;

    const scope: ParentNode = select.form ?? document;
    for (const option of Array.from(select.options)) {
        if (option.disabled) continue;
        const value = option.value || option.text.trim();
        if (!value) continue;
        select.value = option.value;
        select.dispatchEvent(new view.Event('change', { bubbles: true }));
        report.values.push(value);

        if (!query.submitSelector) continue;
        let submit: Element | null = null;
        try {
            submit = scope.querySelector(query.submitSelector);
        } catch {
            submit = null;
        }
        if (submit instanceof view.HTMLElement) {
            submit.click();
            report.submitted++;
        }
    }
    return report;
}

/** Same-origin probe of the current URL without following redirects. */
export async function fetchStatus(_: null): Promise<StatusProbe | null> {
    try {
        const response = await fetch(window.location.href, {
            redirect: 'manual',
            credentials: 'include',
            cache: 'no-store'
        });
        if (response.status === 0) return null;
        return { status: response.status, contentType: response.headers.get('content-type') ?? '' };
    } catch {
        return null;
    }
}

export function documentContentType(_: null): string {
    return document.contentType;
}
