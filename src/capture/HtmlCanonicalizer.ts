/**
 * Reduces rendered HTML to a canonical text whose MD5 is the DOM hash.
 */

import { createHash } from 'crypto';
import { JSDOM } from 'jsdom';
import type { HtmlIgnoreRules } from '../config/CompareConfig.js';
import type { Logger } from '../core/Logger.js';
import { ErrorHandler, ErrorSeverity } from '../shared/utils/ErrorHandler.js';

const TIMESTAMP = /\b\d{10}\b/g;
const CACHE_BUSTER = /(^|[?&])v=[^&#]*(&?)/gi;

export interface CanonicalHtml {
    html: string;
    domHash: string;
}

/** Drops `v=` query parameters and the separator they leave behind. */
export function stripCacheBusters(value: string): string {
    return value.replace(CACHE_BUSTER, (_match: string, lead: string, tail: string) => (tail ? lead : ''));
}

function globally(pattern: RegExp): RegExp {
    return pattern.flags.includes('g') ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}

export function hashText(text: string): string {
    return createHash('md5').update(text.normalize('NFC'), 'utf8').digest('hex');
}

export class HtmlCanonicalizer {
    constructor(
        private readonly rules: HtmlIgnoreRules,
        private readonly logger: Logger
    ) { }

    canonicalize(rawHtml: string): CanonicalHtml {
        const dom = new JSDOM(rawHtml);
        const doc = dom.window.document;

        for (const selector of this.rules.domSelectors) {
            ErrorHandler.safeExecuteSync(
                () => doc.querySelectorAll(selector).forEach(node => node.remove()),
                { component: 'HtmlCanonicalizer', operation: 'ignoreSelector', data: { selector }, logger: this.logger },
                undefined,
                ErrorSeverity.WARNING
            );
        }

        for (const element of Array.from(doc.querySelectorAll('*'))) {
            for (const attribute of Array.from(element.attributes)) {
                if (this.rules.domAttributes.some(pattern => pattern.test(attribute.name))) {
                    element.removeAttribute(attribute.name);
                    continue;
                }
                const cleaned = stripCacheBusters(attribute.value.replace(TIMESTAMP, '<TS>'));
                if (cleaned !== attribute.value) {
                    element.setAttribute(attribute.name, cleaned);
                }
            }
        }

        let text = dom.serialize();
        dom.window.close();

        for (const pattern of this.rules.textPatterns) {
            text = text.replace(globally(pattern), '<var>');
        }
        text = text.replace(/\s+/g, ' ');

        return { html: text, domHash: hashText(text) };
    }
}
