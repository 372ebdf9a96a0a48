import { PNG } from 'pngjs';
import { describe, expect, it } from 'vitest';
import { ScreenshotComparator } from '../../src/capture/ScreenshotComparator.js';
import { blackPixels, solidPng } from '../helpers/png.js';

const comparator = new ScreenshotComparator({ enabled: true, rmseThreshold: 0.01, thresholdCount: 3 });

describe('ScreenshotComparator', () => {
    it('passes identical images', async () => {
        const verdict = await comparator.compare(solidPng(10, 10), solidPng(10, 10));

        expect(verdict).toEqual({ differingPixels: 0, thresholdCount: 3, passed: true, width: 10, height: 10, cropped: false });
    });

    it('passes at exactly threshold_count differing pixels', async () => {
        const verdict = await comparator.compare(solidPng(10, 10), solidPng(10, 10, blackPixels(3)));

        expect(verdict.differingPixels).toBe(3);
        expect(verdict.passed).toBe(true);
    });

    it('fails one pixel above threshold_count', async () => {
        const verdict = await comparator.compare(solidPng(10, 10), solidPng(10, 10, blackPixels(4)));

        expect(verdict.differingPixels).toBe(4);
        expect(verdict.passed).toBe(false);
    });

    it('counts only pixels beyond the color distance', async () => {
        // limit is 0.01 * 441.67 ≈ 4.42
        const near = solidPng(10, 10, [{ x: 0, y: 0, rgb: [252, 255, 255] }]);
        const far = solidPng(10, 10, [{ x: 0, y: 0, rgb: [250, 255, 255] }]);

        expect((await comparator.compare(solidPng(10, 10), near)).differingPixels).toBe(0);
        expect((await comparator.compare(solidPng(10, 10), far)).differingPixels).toBe(1);
    });

    it('crops differently sized images to their overlap', async () => {
        const verdict = await comparator.compare(solidPng(10, 10), solidPng(12, 10));

        expect(verdict.cropped).toBe(true);
        expect(verdict.width).toBe(10);
        expect(verdict.height).toBe(10);
        expect(verdict.differingPixels).toBe(0);
    });

    it('renders a diff image of the same size', async () => {
        const diff = await comparator.renderDiff(solidPng(10, 10), solidPng(10, 10, blackPixels(4)));
        const decoded = PNG.sync.read(diff);

        expect(decoded.width).toBe(10);
        expect(decoded.height).toBe(10);
    });
});
