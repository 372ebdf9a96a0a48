import type { BrowserDriver } from '../adapters/BrowserDriver.js';

/**
 * Command interface for encapsulating browser actions.
 * Enables uniform logging and retry handling by the CommandExecutor.
 */
export interface Command<T> {
    /** Action type identifier; also the cancel reason prefix */
    readonly type: 'navigate' | 'script' | 'click';

    /** Human-readable label for logging */
    readonly label: string;

    execute(driver: BrowserDriver): Promise<T>;

    /**
     * Optional check run after execute(); a false result counts as a failed attempt.
     */
    validate?(result: T, driver: BrowserDriver): Promise<boolean>;
}
