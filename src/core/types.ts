/** One of the two compared deployments. */
export type SiteSide = 'ref' | 'new';

export const SITE_SIDES: readonly SiteSide[] = ['ref', 'new'];

export function isSiteSide(value: string): value is SiteSide {
    return value === 'ref' || value === 'new';
}

export type ClickableKind = 'a' | 'button' | 'onclick' | 'role-link' | 'other';

/**
 * A clickable element as seen by the discovery script.
 * `locator` addresses the element structurally, `frameKey` names the document it lives in.
 */
export interface ClickableDescriptor {
    locator: string;
    text: string;
    href: string;
    kind: ClickableKind;
    onclick: string;
    frameKey: string;
}
