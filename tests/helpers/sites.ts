import type { DriverFactory } from '../../src/core/CompareRunner.js';
import type { ClickableDescriptor, SiteSide } from '../../src/core/types.js';
import { FakeDriver, type FakePage } from './FakeDriver.js';
import { NEW_BASE, REF_BASE, html } from './fixtures.js';

export type Site = Record<string, FakePage>;

export const OPEN_BUTTON = 'top:://*[@id="open"]';
export const OPEN_BUTTON_MOVED = 'top:://*[@id="open-panel"]';

export function button(locator: string, text: string): ClickableDescriptor {
    return { locator, text, href: '', kind: 'button', onclick: '', frameKey: 'top' };
}

/** Home links to /a, /b and a page that exists on neither side; /b differs. */
export function linkedSites(): Record<SiteSide, Site> {
    const home = html('<a href="/a">A</a><a href="/b">B</a><a href="/missing">M</a>');
    return {
        ref: {
            '/': { html: home },
            '/a': { html: html('Alpha') },
            '/b': { html: html('Total 10') }
        },
        new: {
            '/': { html: home },
            '/a': { html: html('Alpha') },
            '/b': { html: html('Total 11') }
        }
    };
}

/** linkedSites() with a sort select on both home pages. */
export function formSites(): Record<SiteSide, Site> {
    const sites = linkedSites();
    for (const site of [sites.ref, sites.new]) {
        site['/'] = { ...site['/'], forms: { 'select#sort': ['asc', 'desc'] } };
    }
    return sites;
}

/** Home has one button opening /panel; `newHome` overrides the new side's home. */
export function clickSites(newHome?: Partial<FakePage>): Record<SiteSide, Site> {
    const home: FakePage = {
        html: html('<button id="open">Open</button>'),
        clickables: [button(OPEN_BUTTON, 'Open')],
        clicks: { [OPEN_BUTTON]: '/panel' }
    };
    const panel: FakePage = { html: html('panel') };
    return {
        ref: { '/': home, '/panel': panel },
        new: { '/': { ...home, ...newHome }, '/panel': panel }
    };
}

/** Hands out one FakeDriver per side and keeps them for inspection. */
export class FakeBrowsers {
    readonly drivers = new Map<SiteSide, FakeDriver>();

    constructor(private readonly sites: Record<SiteSide, Site>) { }

    readonly factory: DriverFactory = async which => {
        const driver = new FakeDriver(which === 'ref' ? REF_BASE : NEW_BASE, this.sites[which]);
        this.drivers.set(which, driver);
        return driver;
    };

    driver(which: SiteSide): FakeDriver {
        const driver = this.drivers.get(which);
        if (!driver) throw new Error(`no ${which} browser was launched`);
        return driver;
    }
}
