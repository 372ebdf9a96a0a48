import type { BrowserDriver } from '../adapters/BrowserDriver.js';
import { clickByLocator } from '../PageScripts.js';
import type { Command } from './Command.js';

/**
 * Clicks an element by structural locator. Resolves to false when the
 * locator matches nothing; never retried, a second click could land on the next page.
 */
export class ClickCommand implements Command<boolean> {
    readonly type = 'click';
    readonly label: string;

    constructor(private readonly locator: string) {
        this.label = locator;
    }

    async execute(driver: BrowserDriver): Promise<boolean> {
        return await driver.evaluate(clickByLocator, this.locator);
    }
}
