import pixelmatch from 'pixelmatch';
import { PNG } from 'pngjs';
import sharp from 'sharp';
import type { ScreenshotSettings } from '../config/CompareConfig.js';
import { COMPARISON } from '../config/constants.js';

export interface ScreenshotVerdict {
    differingPixels: number;
    thresholdCount: number;
    passed: boolean;
    width: number;
    height: number;
    /** The two images had different sizes and were cropped to their overlap */
    cropped: boolean;
}

/**
 * Thresholded pixel-difference count. A pixel differs when the euclidean
 * distance of its RGB values exceeds `rmseThreshold * MAX_RGB_DISTANCE`;
 * up to `thresholdCount` differing pixels still pass.
 */
export class ScreenshotComparator {
    constructor(private readonly settings: ScreenshotSettings) { }

    get distanceThreshold(): number {
        return this.settings.rmseThreshold * COMPARISON.MAX_RGB_DISTANCE;
    }

    async compare(refPng: Buffer, newPng: Buffer): Promise<ScreenshotVerdict> {
        const [ref, next, cropped] = await this.align(refPng, newPng);
        const differingPixels = this.countDifferences(ref, next);
        return {
            differingPixels,
            thresholdCount: this.settings.thresholdCount,
            passed: differingPixels <= this.settings.thresholdCount,
            width: ref.width,
            height: ref.height,
            cropped
        };
    }

    /** Both images must have the same size. */
    countDifferences(a: PNG, b: PNG): number {
        const limit = this.distanceThreshold;
        let count = 0;
        for (let i = 0; i < a.width * a.height * 4; i += 4) {
            const dr = a.data[i] - b.data[i];
            const dg = a.data[i + 1] - b.data[i + 1];
            const db = a.data[i + 2] - b.data[i + 2];
            if (Math.sqrt(dr * dr + dg * dg + db * db) > limit) count++;
        }
        return count;
    }

    /** Highlighted diff image of the overlapping area. */
    async renderDiff(refPng: Buffer, newPng: Buffer): Promise<Buffer> {
        const [ref, next] = await this.align(refPng, newPng);
        const diff = new PNG({ width: ref.width, height: ref.height });
        pixelmatch(ref.data, next.data, diff.data, ref.width, ref.height, { threshold: 0.1 });
        return PNG.sync.write(diff);
    }

    private async align(refPng: Buffer, newPng: Buffer): Promise<[PNG, PNG, boolean]> {
        const ref = PNG.sync.read(refPng);
        const next = PNG.sync.read(newPng);
        if (ref.width === next.width && ref.height === next.height) {
            return [ref, next, false];
        }

        const region = {
            left: 0,
            top: 0,
            width: Math.min(ref.width, next.width),
            height: Math.min(ref.height, next.height)
        };
        const [refCrop, newCrop] = await Promise.all([
            sharp(refPng).extract(region).png().toBuffer(),
            sharp(newPng).extract(region).png().toBuffer()
        ]);
        return [PNG.sync.read(refCrop), PNG.sync.read(newCrop), true];
    }
}
