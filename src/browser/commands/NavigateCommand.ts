import type { BrowserDriver } from '../adapters/BrowserDriver.js';
import type { Command } from './Command.js';

export class NavigateCommand implements Command<void> {
    readonly type = 'navigate';
    readonly label: string;

    constructor(
        private readonly url: string,
        private readonly timeoutMs: number
    ) {
        this.label = url;
    }

    async execute(driver: BrowserDriver): Promise<void> {
        await driver.goto(this.url, { timeoutMs: this.timeoutMs });
    }
}
