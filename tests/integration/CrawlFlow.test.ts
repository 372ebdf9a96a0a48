import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { CompareRunner } from '../../src/core/CompareRunner.js';
import type { JsonObject } from '../../src/shared/utils/JsonValidator.js';
import { memoryLogger, tempDir, testConfig } from '../helpers/fixtures.js';
import { FakeBrowsers, OPEN_BUTTON_MOVED, clickSites, formSites, linkedSites } from '../helpers/sites.js';

function runner(raw: JsonObject, browsers: FakeBrowsers) {
    const root = tempDir();
    const { logger, sink } = memoryLogger();
    const config = testConfig(root, raw, logger);
    return { root, sink, runner: new CompareRunner(config, logger, browsers.factory) };
}

describe('in-process crawl', () => {
    it('compares a single identical page', async () => {
        const browsers = new FakeBrowsers(linkedSites());
        const { root, runner: compare } = runner({ crawl: { max_visited: 1 } }, browsers);

        const [run] = await compare.run();

        expect(run.role).toBe('default');
        expect(run.result.recordedCount).toBe(1);
        expect(run.result.statusBucket(200).map(record => record.compare)).toEqual([[]]);
        expect(run.result.hasFailures()).toBe(false);
        expect(fs.existsSync(path.join(root, 'default', 'results', 'summary.json'))).toBe(true);
        expect(browsers.driver('ref').closed).toBe(true);
        expect(browsers.driver('new').closed).toBe(true);
    });

    it('follows links and reports what differs', async () => {
        const browsers = new FakeBrowsers(linkedSites());
        const { root, runner: compare } = runner({ crawl: { by_link: { enabled: true } } }, browsers);

        const [run] = await compare.run();
        const summary = run.result.summary('default', root);

        expect(summary).toMatchObject({ visited: 4, byLink: 4, byClick: 0, maxDepth: 1, errors: 1 });
        expect(summary.perStatus).toEqual({ '200': 3, '404': 1 });
        expect(summary.differences).toEqual({ 'DOM hash': { count: 1, visited: [3] } });
        expect(browsers.driver('ref').calls).toEqual([
            'goto http://ref.test/',
            'goto http://ref.test/a',
            'goto http://ref.test/b',
            'goto http://ref.test/missing'
        ]);
        expect(fs.existsSync(path.join(root, 'default', 'ref', 'htmls', '000003_ref__b_doc_47#1.html'))).toBe(true);
        expect(fs.existsSync(path.join(root, 'default', 'new', 'htmls', '000003_new__b_doc_47#1.html'))).toBe(true);

        const written = JSON.parse(fs.readFileSync(path.join(root, 'default', 'results', 'summary.json'), 'utf-8'));
        expect(written.differences).toEqual({ 'DOM hash': { count: 1, visited: [3] } });
    });

    it('clicks through and mirrors the click on the new side', async () => {
        const browsers = new FakeBrowsers(clickSites());
        const { root, runner: compare } = runner({ crawl: { by_click: { enabled: true } } }, browsers);

        const [run] = await compare.run();

        expect(run.result.summary('default', root)).toMatchObject({ visited: 2, byLink: 1, byClick: 1, maxDepth: 1, errors: 0 });
        expect(browsers.driver('new').calls).toEqual(['goto http://new.test/', 'click top:://*[@id="open"]']);
    });

    it('falls back to an equivalent element on the new side', async () => {
        const browsers = new FakeBrowsers(clickSites({
            clicks: { [OPEN_BUTTON_MOVED]: '/panel' },
            equivalents: { 'top:://*[@id="open"]': OPEN_BUTTON_MOVED }
        }));
        const { root, runner: compare } = runner({ crawl: { by_click: { enabled: true } } }, browsers);

        const [run] = await compare.run();

        expect(run.result.summary('default', root)).toMatchObject({ visited: 2, errors: 0, cancelled: {} });
        expect(browsers.driver('new').calls).toContain(`click ${OPEN_BUTTON_MOVED}`);
    });

    it('cancels a click the new side cannot mirror', async () => {
        const browsers = new FakeBrowsers(clickSites({ clicks: {} }));
        const { root, runner: compare } = runner({ crawl: { by_click: { enabled: true } } }, browsers);

        const [run] = await compare.run();

        expect(run.result.summary('default', root).cancelled).toEqual({ no_capture: { count: 1, visited: [2] } });
        expect(run.result.hasFailures()).toBe(false);
    });

    it('drives configured forms on both sides after the compare', async () => {
        const browsers = new FakeBrowsers(formSites());
        const { runner: compare } = runner({ crawl: { max_visited: 1 }, forms: { 'select#sort': { submit_selector: '#apply' } } }, browsers);

        const [run] = await compare.run();

        expect(run.result.hasFailures()).toBe(false);
        expect(browsers.driver('ref').calls).toEqual(['goto http://ref.test/', 'form select#sort']);
        expect(browsers.driver('new').calls).toEqual(['goto http://new.test/', 'form select#sort']);
    });

    it('skips disabled roles unless one is named', async () => {
        const raw: JsonObject = {
            roles: {
                visitor: { routes: ['/'] },
                admin: { enabled: false, routes: ['/a'] }
            },
            crawl: { max_visited: 1 }
        };

        const all = runner(raw, new FakeBrowsers(linkedSites()));
        expect((await all.runner.run()).map(run => run.role)).toEqual(['visitor']);
        expect(all.sink.lines).toContain('[Runner] Skipping 1 disabled role(s)');

        const named = runner(raw, new FakeBrowsers(linkedSites()));
        expect((await named.runner.run({ roleName: 'admin' })).map(run => run.role)).toEqual(['admin']);
    });
});
