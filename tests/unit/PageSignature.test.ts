import { describe, expect, it } from 'vitest';
import { composeSignature, parseSignature, placeKey, samePlace, signatureDetails } from '../../src/browser/PageSignature.js';
import type { SignatureProbe } from '../../src/browser/PageScripts.js';

const probe: SignatureProbe = {
    href: 'http://ref.test/a?x=1',
    fingerprint: '12#30',
    frames: [
        { index: '1', id: 'main', src: '/f', sameOrigin: true, href: 'http://ref.test/frame/inner?q=2' },
        { index: '2', id: '', src: 'http://ads.test/x', sameOrigin: false, href: '' }
    ]
};

const REF_SIGNATURE = 'top:http://ref.test/a?x=1|doc:12#30|if:1#main#/f#/frame/inner|if:2##http://ads.test/x#';

describe('PageSignature', () => {
    it('composes top URL, fingerprint and frame tree', () => {
        expect(composeSignature(probe)).toBe(REF_SIGNATURE);
    });

    it('parses what it composes', () => {
        expect(parseSignature(REF_SIGNATURE)).toEqual({
            top: 'http://ref.test/a?x=1',
            doc: '12#30',
            frames: ['1#main#/f#/frame/inner', '2##http://ads.test/x#']
        });
    });

    it('keys across hosts by path, query and frames only', () => {
        expect(placeKey(REF_SIGNATURE, 'across-hosts')).toBe('top:/a?x=1|if:1#main#/f#/frame/inner|if:2##http://ads.test/x#');
        expect(placeKey(REF_SIGNATURE, 'exact')).toBe(REF_SIGNATURE);
    });

    it('treats the same page on the other deployment as the same place across hosts', () => {
        const mirrored = composeSignature({ ...probe, href: 'http://new.test/a?x=1', fingerprint: '14#31' });

        expect(samePlace(REF_SIGNATURE, mirrored, 'across-hosts')).toBe(true);
        expect(samePlace(REF_SIGNATURE, mirrored, 'exact')).toBe(false);
    });

    it('distinguishes a different query', () => {
        const other = composeSignature({ ...probe, href: 'http://ref.test/a?x=2' });
        expect(samePlace(REF_SIGNATURE, other, 'across-hosts')).toBe(false);
    });

    it('lists the details used in artifact names', () => {
        expect(signatureDetails('top:http://h/a/b|doc:12#30')).toEqual(['doc:12#30']);
        expect(signatureDetails('not a signature')).toEqual([]);
    });
});
