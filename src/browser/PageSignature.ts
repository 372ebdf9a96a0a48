/**
 * Structural fingerprint of where a browser currently is:
 *
 *   top:<href>|doc:<textLength>#<elementCount>|if:<index>#<id>#<src>#<path>|...
 *
 * Equal signatures mean the same place. Between the two deployments the hosts
 * differ, so the cross-host comparison uses path and frame tree only.
 */

import type { FrameProbe, SignatureProbe } from './PageScripts.js';

export type PlaceComparison = 'exact' | 'across-hosts';

export interface ParsedSignature {
    top: string;
    doc: string;
    frames: string[];
}

function framePath(frame: FrameProbe): string {
    if (!frame.sameOrigin || !frame.href || frame.href === 'about:blank') return '';
    try {
        return new URL(frame.href).pathname;
    } catch {
        return '';
    }
}

export function composeSignature(probe: SignatureProbe): string {
    const parts = [`top:${probe.href}`, `doc:${probe.fingerprint}`];
    for (const frame of probe.frames) {
        parts.push(`if:${frame.index}#${frame.id}#${frame.src}#${framePath(frame)}`);
    }
    return parts.join('|');
}

export function parseSignature(signature: string): ParsedSignature {
    const docAt = signature.indexOf('|doc:');
    if (!signature.startsWith('top:') || docAt < 0) {
        return { top: signature, doc: '', frames: [] };
    }
    const top = signature.slice('top:'.length, docAt);
    const [doc, ...frames] = signature.slice(docAt + '|doc:'.length).split('|if:');
    return { top, doc, frames };
}

function pathOf(href: string): string {
    try {
        const url = new URL(href);
        return `${url.pathname}${url.search}`;
    } catch {
        return href;
    }
}

/** The key two signatures must share to count as the same place. */
export function placeKey(signature: string, comparison: PlaceComparison): string {
    if (comparison === 'exact') return signature;
    // Across hosts only path, query and frames count; the doc: fingerprint goes with the origin.
    const parsed = parseSignature(signature);
    return [`top:${pathOf(parsed.top)}`, ...parsed.frames.map(frame => `if:${frame}`)].join('|');
}

export function samePlace(a: string, b: string, comparison: PlaceComparison): boolean {
    return placeKey(a, comparison) === placeKey(b, comparison);
}

/** Everything but the top URL; used in artifact names. */
export function signatureDetails(signature: string): string[] {
    const parsed = parseSignature(signature);
    if (!parsed.doc) return [];
    return [`doc:${parsed.doc}`, ...parsed.frames.map(frame => `if:${frame}`)];
}
