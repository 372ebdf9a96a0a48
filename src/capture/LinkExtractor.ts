import { JSDOM } from 'jsdom';
import type { ByLinkSettings } from '../config/CompareConfig.js';

export interface LinkScope {
    /** URL the HTML was rendered from; relative hrefs resolve against it */
    pageUrl: string;
    /** Base URL of the deployment being crawled */
    baseUrl: string;
    sameHost: boolean;
}

function allowed(value: string, allow: RegExp[], deny: RegExp[]): boolean {
    if (allow.length > 0 && !allow.some(pattern => pattern.test(value))) return false;
    return !deny.some(pattern => pattern.test(value));
}

/**
 * Outbound link targets of a page as sorted, unique paths
 * (with query when `honorQuery` is set).
 */
export function extractLinks(html: string, settings: ByLinkSettings, scope: LinkScope): string[] {
    const dom = new JSDOM(html);
    const doc = dom.window.document;
    const base = new URL(scope.baseUrl);
    const places = new Set<string>();

    for (const finder of settings.finders) {
        let elements: Element[];
        try {
            elements = Array.from(doc.querySelectorAll(finder.find));
        } catch {
            continue;
        }

        for (const element of elements) {
            const href = (element.getAttribute(finder.member) ?? '').trim();
            if (!href || !allowed(href, settings.hrefAllow, settings.hrefDeny)) continue;

            let url: URL;
            try {
                url = new URL(href, scope.pageUrl);
            } catch {
                continue;
            }
            if (url.protocol !== 'http:' && url.protocol !== 'https:') continue;
            if (scope.sameHost && url.host !== base.host) continue;

            const place = settings.honorQuery ? `${url.pathname}${url.search}` : url.pathname;
            if (!allowed(`${base.origin}${place}`, settings.urlAllow, settings.urlDeny)) continue;
            places.add(place);
        }
    }

    dom.window.close();
    return [...places].sort();
}
