import type { RetrySettings } from '../../config/CompareConfig.js';
import type { Logger } from '../../core/Logger.js';
import { ContractError, VisitCancelled, describeError } from '../../shared/utils/errors.js';
import { sleep } from '../../shared/utils/polling.js';
import type { BrowserDriver } from '../adapters/BrowserDriver.js';
import type { Command } from './Command.js';

/**
 * CommandExecutor centralizes command execution with retry logic.
 * Exhausting the retries cancels the current visit with `<type>_failed`.
 */
export class CommandExecutor {
    constructor(
        private readonly driver: BrowserDriver,
        private readonly logger: Logger
    ) { }

    /**
     * Execute a command with automatic retry logic.
     * @throws VisitCancelled once every attempt failed
     * @throws ContractError immediately, without retrying
     */
    async execute<T>(command: Command<T>, policy: RetrySettings): Promise<T> {
        const totalAttempts = policy.retries + 1;
        let lastError: unknown;

        for (let attempt = 1; attempt <= totalAttempts; attempt++) {
            try {
                this.logger.debug(`Executing ${command.type}: "${command.label}" (attempt ${attempt}/${totalAttempts})`);
                const result = await command.execute(this.driver);

                if (command.validate && !(await command.validate(result, this.driver))) {
                    throw new Error(`Execution completed but validation failed for ${command.type}`);
                }
                return result;
            } catch (error) {
                if (error instanceof ContractError) throw error;
                lastError = error;

                if (attempt < totalAttempts) {
                    this.logger.warn(`Retry ${attempt}/${policy.retries} for ${command.type}: "${command.label}" (${describeError(error)})`);
                    await sleep(policy.sleepMs);
                }
            }
        }

        this.logger.error(`Failed after ${totalAttempts} attempt(s): ${command.type}: "${command.label}": ${describeError(lastError)}`);
        throw new VisitCancelled(`${command.type}_failed`, describeError(lastError));
    }

    /**
     * Execute a command without retry (single attempt).
     * @throws VisitCancelled when the attempt fails
     */
    async executeOnce<T>(command: Command<T>): Promise<T> {
        return await this.execute(command, { retries: 0, sleepMs: 0 });
    }
}
