import type { BrowserDriver, PageScript } from '../adapters/BrowserDriver.js';
import type { Command } from './Command.js';

/**
 * Runs one in-page function.
 */
export class ScriptCommand<A, R> implements Command<R> {
    readonly type = 'script';
    readonly label: string;

    constructor(
        private readonly script: PageScript<A, R>,
        private readonly arg: A,
        label?: string
    ) {
        this.label = label ?? (script.name || 'anonymous');
    }

    async execute(driver: BrowserDriver): Promise<R> {
        return await driver.evaluate(this.script, this.arg);
    }
}
