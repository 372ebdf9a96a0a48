import { describe, expect, it, vi } from 'vitest';
import { Capture, type CaptureData } from '../../src/capture/Capture.js';
import { ScreenshotComparator } from '../../src/capture/ScreenshotComparator.js';
import type { ByLinkSettings } from '../../src/config/CompareConfig.js';
import { RpcProtocolError } from '../../src/shared/utils/errors.js';
import { blackPixels, solidPng } from '../helpers/png.js';

const refData: CaptureData = {
    which: 'ref',
    url: 'http://ref.test/a?x=1',
    html: '<html><head></head><body><a href="/b">b</a></body></html>',
    domHash: 'hash-1',
    status: 200,
    contentType: 'text/html',
    headers: { 'content-type': 'text/html' },
    alerts: [],
    signature: 'top:http://ref.test/a?x=1|doc:1#1'
};

const newData: CaptureData = { ...refData, which: 'new', url: 'http://new.test/a?x=1', signature: 'top:http://new.test/a?x=1|doc:1#1' };

const comparator = new ScreenshotComparator({ enabled: true, rmseThreshold: 0.01, thresholdCount: 3 });

describe('Capture', () => {
    it('passes two equal pages', async () => {
        const ref = Capture.create(refData);
        const next = Capture.create(newData);

        expect(await ref.compare(next, { htmls: true })).toEqual([]);
    });

    it('compares content types case-insensitively', async () => {
        const ref = Capture.create(refData);

        expect(await ref.compare(Capture.create({ ...newData, contentType: 'TEXT/HTML' }), { htmls: true })).toEqual([]);
        expect(await ref.compare(Capture.create({ ...newData, contentType: 'application/json' }), { htmls: true })).toEqual(['content-type']);
    });

    it('reports a DOM hash mismatch only when HTML checks are on', async () => {
        const ref = Capture.create(refData);
        const next = Capture.create({ ...newData, domHash: 'hash-2' });

        expect(await ref.compare(next, { htmls: true })).toEqual(['DOM hash']);
        expect(await ref.compare(next, { htmls: false })).toEqual([]);
    });

    it('expects 200 from the reference side and the same status from the other', async () => {
        const ref = Capture.create(refData);

        expect(await ref.compare(Capture.create({ ...newData, status: 500 }), { htmls: false })).toEqual(['status 200≠500']);
        expect(await Capture.create({ ...refData, status: 302 }).compare(Capture.create({ ...newData, status: 200 }), { htmls: false }))
            .toEqual(['ref status 302', 'status 302≠200']);
    });

    it('reports the alerts of each side', async () => {
        const ref = Capture.create({ ...refData, alerts: ['Saved'] });
        const next = Capture.create({ ...newData, alerts: ['Saved', 'Oops'] });

        expect(await ref.compare(next, { htmls: true })).toEqual(['ref alerts: Saved', 'new alerts: Saved | Oops']);
    });

    it('runs every check even after a failure', async () => {
        const ref = Capture.create({ ...refData, screenshot: solidPng(10, 10) });
        const next = Capture.create({ ...newData, contentType: 'text/plain', domHash: 'other', alerts: ['x'], screenshot: solidPng(10, 10, blackPixels(4)) });

        expect(await ref.compare(next, { htmls: true, screenshots: { comparator } })).toEqual([
            'content-type',
            'DOM hash',
            'new alerts: x',
            'screenshot_threshold_count'
        ]);
    });

    it('hands a failed visual comparison to the mismatch handler', async () => {
        const onMismatch = vi.fn(async () => undefined);
        const ref = Capture.create({ ...refData, screenshot: solidPng(10, 10) });
        const next = Capture.create({ ...newData, screenshot: solidPng(10, 10, blackPixels(4)) });

        await ref.compare(next, { htmls: true, screenshots: { comparator, onMismatch } });

        expect(onMismatch).toHaveBeenCalledTimes(1);
        expect(onMismatch).toHaveBeenCalledWith(ref, next, expect.objectContaining({ differingPixels: 4, passed: false }));
    });

    it('reports a missing screenshot', async () => {
        const ref = Capture.create({ ...refData, screenshot: solidPng(10, 10) });

        expect(await ref.compare(Capture.create(newData), { htmls: false, screenshots: { comparator } })).toEqual(['screenshot_missing']);
    });

    it('exposes path and query of the final URL', () => {
        expect(Capture.create(refData).path).toBe('/a?x=1');
    });

    it('extracts links from its HTML', () => {
        const settings: ByLinkSettings = {
            enabled: true,
            finders: [{ find: 'a[href]', member: 'href' }],
            honorQuery: true,
            hrefAllow: [],
            hrefDeny: [],
            urlAllow: [],
            urlDeny: []
        };
        expect(Capture.create(refData).extractLinks(settings, { baseUrl: 'http://ref.test', sameHost: true })).toEqual(['/b']);
    });

    it('travels as JSON with a base64 screenshot', () => {
        const png = solidPng(2, 2);
        const wire = JSON.parse(JSON.stringify(Capture.create({ ...refData, alerts: ['hi'], screenshot: png })));

        expect(wire.screenshot).toBe(png.toString('base64'));
        const back = Capture.fromJSON(wire);
        expect(back.screenshot?.equals(png)).toBe(true);
        expect(back.alerts).toEqual(['hi']);
        expect(back.signature).toBe(refData.signature);
    });

    it('rejects malformed wire data', () => {
        expect(() => Capture.fromJSON({})).toThrow(RpcProtocolError);
        expect(() => Capture.fromJSON({ ...refData, which: 'old' })).toThrow(RpcProtocolError);
        expect(() => Capture.fromJSON({ ...refData, status: '200' })).toThrow(RpcProtocolError);
    });
});
