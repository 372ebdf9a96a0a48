import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildCompareConfig, type CompareConfig } from '../../src/config/CompareConfig.js';
import { Context } from '../../src/core/Context.js';
import { ConsoleLogger, MemorySink, type Logger } from '../../src/core/Logger.js';
import { JsonValidator, type JsonObject } from '../../src/shared/utils/JsonValidator.js';

export const REF_BASE = 'http://ref.test';
export const NEW_BASE = 'http://new.test';

export function memoryLogger(): { logger: Logger; sink: MemorySink } {
    const sink = new MemorySink();
    return { logger: new ConsoleLogger('debug', 'Test', sink), sink };
}

export function tempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'site-diff-'));
}

/** Short timings and no retry sleeps; `raw` is merged over them. */
export function testConfig(root: string, raw: JsonObject = {}, logger: Logger = memoryLogger().logger): CompareConfig {
    const base: JsonObject = {
        bases: { ref: REF_BASE, new: NEW_BASE },
        browser: {
            timeout_ms: 300,
            quiet_ms: 10,
            poll_ms: 2,
            navigate: { retries: 0, sleep_ms: 0 },
            exec_js: { retries: 0, sleep_ms: 0 }
        },
        dirs: { root }
    };
    return buildCompareConfig(JsonValidator.deepMerge(base, raw), { logger, env: {} });
}

export function testContext(root: string, raw: JsonObject = {}): { ctx: Context; sink: MemorySink } {
    const { logger, sink } = memoryLogger();
    const config = testConfig(root, raw, logger);
    return { ctx: new Context(config, config.roles[0], logger), sink };
}

export function html(body: string, head = ''): string {
    return `<html><head>${head}</head><body>${body}</body></html>`;
}
