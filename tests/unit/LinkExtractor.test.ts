import { describe, expect, it } from 'vitest';
import { extractLinks } from '../../src/capture/LinkExtractor.js';
import type { ByLinkSettings } from '../../src/config/CompareConfig.js';

const settings: ByLinkSettings = {
    enabled: true,
    finders: [{ find: 'a[href]', member: 'href' }, { find: '[data-href]', member: 'data-href' }],
    honorQuery: true,
    hrefAllow: [],
    hrefDeny: [/^#|^javascript:|^mailto:/],
    urlAllow: [],
    urlDeny: [/\blogout\b/]
};

const page = `<html><body>
    <a href="/b?x=1#frag">B</a>
    <a href="c">C</a>
    <a href="#top">Top</a>
    <a href="mailto:someone@example.test">Mail</a>
    <a href="http://other.test/z">Other</a>
    <a href="/logout">Leave</a>
    <a href="  /b?x=1 ">Again</a>
    <span data-href="/a">A</span>
</body></html>`;

const scope = { pageUrl: 'http://ref.test/dir/page', baseUrl: 'http://ref.test', sameHost: true };

describe('extractLinks', () => {
    it('resolves, filters, de-duplicates and sorts', () => {
        expect(extractLinks(page, settings, scope)).toEqual(['/a', '/b?x=1', '/dir/c']);
    });

    it('drops the query unless honored', () => {
        expect(extractLinks(page, { ...settings, honorQuery: false }, scope)).toEqual(['/a', '/b', '/dir/c']);
    });

    it('keeps other hosts when not restricted', () => {
        expect(extractLinks(page, settings, { ...scope, sameHost: false })).toEqual(['/a', '/b?x=1', '/dir/c', '/z']);
    });

    it('applies the href allow list', () => {
        expect(extractLinks(page, { ...settings, hrefAllow: [/^\/b/] }, scope)).toEqual(['/b?x=1']);
    });
});
