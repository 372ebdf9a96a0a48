import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ErrorHandler, ErrorSeverity } from '../../src/shared/utils/ErrorHandler.js';
import { ContractError } from '../../src/shared/utils/errors.js';
import { JsonValidator, Validators } from '../../src/shared/utils/JsonValidator.js';
import { memoryLogger, tempDir } from '../helpers/fixtures.js';

describe('ErrorHandler', () => {
    it('logs by severity and returns the fallback', async () => {
        const { logger, sink } = memoryLogger();

        const value = await ErrorHandler.safeExecute(
            async () => { throw new Error('disk full'); },
            { component: 'Writer', operation: 'save', data: { file: 'a.html' }, logger },
            'fallback'
        );
        ErrorHandler.safeExecuteSync(() => { throw new Error('late'); }, { component: 'Writer', logger }, 0, ErrorSeverity.WARNING);
        ErrorHandler.safeExecuteSync(() => { throw new Error('ignored'); }, { component: 'Writer', logger }, 0, ErrorSeverity.SILENT);

        expect(value).toBe('fallback');
        expect(sink.lines).toEqual([
            '[Test] ❌ [Writer.save] disk full {"file":"a.html"}',
            '[Test] ⚠️ [Writer] late'
        ]);
    });

    it('re-throws critical errors', () => {
        const { logger } = memoryLogger();

        expect(() => ErrorHandler.handle(new Error('fatal'), { component: 'Runner', logger }, ErrorSeverity.CRITICAL))
            .toThrow('fatal');
    });

    it('turns a failed assertion into a contract error', () => {
        const { logger, sink } = memoryLogger();

        expect(() => ErrorHandler.assert(false, 'port out of range', { component: 'Config', data: { port: -1 }, logger }))
            .toThrow(ContractError);
        expect(sink.lines).toEqual(['[Test] ❌ [Config] CRITICAL: port out of range {"port":-1}']);
    });
});

describe('JsonValidator', () => {
    it('parses and validates', () => {
        expect(JsonValidator.parse('{"a":1}', Validators.object)).toEqual({ success: true, data: { a: 1 } });
        expect(JsonValidator.parse('[1]', Validators.object)).toEqual({
            success: false,
            error: 'Validation failed: data does not match expected shape'
        });
        expect(JsonValidator.parse('{', Validators.object).success).toBe(false);
    });

    it('reads files that must exist', () => {
        const dir = tempDir();
        const file = path.join(dir, 'config.json');
        fs.writeFileSync(file, '{"bases":{}}');

        expect(JsonValidator.parseFile(file, Validators.object)).toEqual({ bases: {} });
        expect(() => JsonValidator.parseFile(path.join(dir, 'absent.json'), Validators.object)).toThrow(ContractError);
    });

    it('merges nested objects and replaces everything else', () => {
        const merged = JsonValidator.deepMerge(
            { crawl: { max_visited: 10, by_link: { enabled: false } }, routes: ['/a'] },
            { crawl: { by_link: { enabled: true } }, routes: ['/b'], skipped: undefined }
        );

        expect(merged).toEqual({ crawl: { max_visited: 10, by_link: { enabled: true } }, routes: ['/b'] });
    });

    it('validates list items', () => {
        expect(Validators.array(Validators.string)(['a', 'b'])).toBe(true);
        expect(Validators.array(Validators.string)(['a', 1])).toBe(false);
        expect(Validators.number(NaN)).toBe(false);
    });
});
