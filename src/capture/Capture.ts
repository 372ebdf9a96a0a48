/**
 * Immutable snapshot of one visited page: the unit of comparison.
 */

import type { ByLinkSettings } from '../config/CompareConfig.js';
import { isSiteSide, type SiteSide } from '../core/types.js';
import { RpcProtocolError } from '../shared/utils/errors.js';
import { Validators } from '../shared/utils/JsonValidator.js';
import { extractLinks, type LinkScope } from './LinkExtractor.js';
import type { ScreenshotComparator, ScreenshotVerdict } from './ScreenshotComparator.js';

export interface CaptureData {
    which: SiteSide;
    /** Final URL after redirects */
    url: string;
    /** Canonical HTML */
    html: string;
    domHash: string;
    status: number;
    contentType: string;
    headers: Record<string, string>;
    alerts: string[];
    signature: string;
    screenshot?: Buffer;
}

/** Wire form; the screenshot travels base64-encoded. */
export type SerializedCapture = Omit<CaptureData, 'screenshot'> & { screenshot?: string };

export type ScreenshotMismatchHandler = (
    ref: Capture,
    next: Capture,
    verdict: ScreenshotVerdict
) => Promise<void>;

export interface CompareOptions {
    htmls: boolean;
    screenshots?: {
        comparator: ScreenshotComparator;
        onMismatch?: ScreenshotMismatchHandler;
    };
}

export const MISMATCH = {
    REF_STATUS: 'ref status',
    STATUS: 'status',
    CONTENT_TYPE: 'content-type',
    DOM_HASH: 'DOM hash',
    SCREENSHOT: 'screenshot_threshold_count',
    SCREENSHOT_MISSING: 'screenshot_missing',
} as const;

export class Capture {
    private constructor(private readonly data: Readonly<CaptureData>) { }

    static create(data: CaptureData): Capture {
        return new Capture(Object.freeze({
            ...data,
            headers: { ...data.headers },
            alerts: [...data.alerts]
        }));
    }

    get which(): SiteSide { return this.data.which; }
    get url(): string { return this.data.url; }
    get html(): string { return this.data.html; }
    get domHash(): string { return this.data.domHash; }
    get status(): number { return this.data.status; }
    get contentType(): string { return this.data.contentType; }
    get headers(): Readonly<Record<string, string>> { return this.data.headers; }
    get alerts(): readonly string[] { return this.data.alerts; }
    get signature(): string { return this.data.signature; }
    get screenshot(): Buffer | undefined { return this.data.screenshot; }

    /** Path and query of the final URL. */
    get path(): string {
        try {
            const url = new URL(this.data.url);
            return `${url.pathname}${url.search}`;
        } catch {
            return this.data.url;
        }
    }

    /**
     * Mismatch reasons against the capture of the other deployment; empty means pass.
     * Every check runs regardless of earlier failures. The reference side is
     * expected to answer 200 and the other side the same status.
     */
    async compare(other: Capture, options: CompareOptions): Promise<string[]> {
        const errors: string[] = [];

        if (this.status !== 200) {
            errors.push(`${MISMATCH.REF_STATUS} ${this.status}`);
        }
        if (this.status !== other.status) {
            errors.push(`${MISMATCH.STATUS} ${this.status}≠${other.status}`);
        }

        if (options.htmls) {
            if (this.contentType.toLowerCase() !== other.contentType.toLowerCase()) {
                errors.push(MISMATCH.CONTENT_TYPE);
            }
            if (this.domHash !== other.domHash) {
                errors.push(MISMATCH.DOM_HASH);
            }
        }

        for (const capture of [this, other]) {
            if (capture.alerts.length > 0) {
                errors.push(`${capture.which} alerts: ${capture.alerts.join(' | ')}`);
            }
        }

        if (options.screenshots) {
            if (!this.screenshot || !other.screenshot) {
                errors.push(MISMATCH.SCREENSHOT_MISSING);
            } else {
                const verdict = await options.screenshots.comparator.compare(this.screenshot, other.screenshot);
                if (!verdict.passed) {
                    errors.push(MISMATCH.SCREENSHOT);
                    await options.screenshots.onMismatch?.(this, other, verdict);
                }
            }
        }

        return errors;
    }

    extractLinks(settings: ByLinkSettings, scope: Omit<LinkScope, 'pageUrl'>): string[] {
        return extractLinks(this.data.html, settings, { ...scope, pageUrl: this.data.url });
    }

    toJSON(): SerializedCapture {
        const { screenshot, ...rest } = this.data;
        return {
            ...rest,
            headers: { ...rest.headers },
            alerts: [...rest.alerts],
            screenshot: screenshot?.toString('base64')
        };
    }

    /**
     * @throws RpcProtocolError when `raw` is not a serialized capture
     */
    static fromJSON(raw: unknown): Capture {
        if (!Validators.object(raw)) {
            throw new RpcProtocolError('capture: expected an object');
        }
        const text = (key: string): string => {
            const value = raw[key];
            if (!Validators.string(value)) throw new RpcProtocolError(`capture.${key}: expected a string`);
            return value;
        };

        const which = text('which');
        if (!isSiteSide(which)) throw new RpcProtocolError(`capture.which: unknown side "${which}"`);
        if (!Validators.number(raw.status)) throw new RpcProtocolError('capture.status: expected a number');
        if (!Validators.array(Validators.string)(raw.alerts)) throw new RpcProtocolError('capture.alerts: expected strings');

        const headers: Record<string, string> = {};
        if (Validators.object(raw.headers)) {
            for (const [key, value] of Object.entries(raw.headers)) {
                if (Validators.string(value)) headers[key] = value;
            }
        }

        const screenshot = raw.screenshot;
        return Capture.create({
            which,
            url: text('url'),
            html: text('html'),
            domHash: text('domHash'),
            status: raw.status,
            contentType: text('contentType'),
            headers,
            alerts: raw.alerts,
            signature: text('signature'),
            screenshot: Validators.string(screenshot) ? Buffer.from(screenshot, 'base64') : undefined
        });
    }
}
