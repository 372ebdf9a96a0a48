import type { BrowserDriver } from '../browser/adapters/BrowserDriver.js';
import { PlaywrightDriver } from '../browser/adapters/playwright/PlaywrightDriver.js';
import { BrowserSession } from '../browser/BrowserSession.js';
import { ArtifactWriter } from '../capture/ArtifactWriter.js';
import { findRole, type BrowserSettings, type CompareConfig, type RoleSettings } from '../config/CompareConfig.js';
import { Crawler } from '../crawl/Crawler.js';
import type { CrawlResult } from '../crawl/CrawlResult.js';
import { InProcessSessionPair, type SessionPair } from '../crawl/SessionPair.js';
import { SideVisitor } from '../crawl/SideVisitor.js';
import { DaemonSessionPair } from '../rpc/DaemonSessionPair.js';
import { RpcServer } from '../rpc/RpcServer.js';
import { workerCommands } from '../rpc/WorkerCommands.js';
import { describeError } from '../shared/utils/errors.js';
import { Context } from './Context.js';
import type { Logger } from './Logger.js';
import type { SiteSide } from './types.js';

export type DriverFactory = (which: SiteSide, settings: BrowserSettings, logger: Logger) => Promise<BrowserDriver>;

export const launchChromium: DriverFactory = (_which, settings, logger) => PlaywrightDriver.launch(settings, logger);

export interface RunOptions {
    /** Runs this role even when it is disabled; all enabled roles otherwise. */
    roleName?: string;
    /** Talk to two running workers instead of launching browsers here. */
    distributed?: boolean;
}

export interface RoleRun {
    role: string;
    result: CrawlResult;
}

/**
 * Drives one crawl per role, each with its own pair of sessions.
 */
export class CompareRunner {
    private readonly logger: Logger;

    constructor(
        private readonly config: CompareConfig,
        logger: Logger,
        private readonly driverFactory: DriverFactory = launchChromium
    ) {
        this.logger = logger.child('Runner');
    }

    selectRoles(roleName?: string): RoleSettings[] {
        if (roleName) return [findRole(this.config, roleName)];
        const enabled = this.config.roles.filter(role => role.enabled);
        const skipped = this.config.roles.length - enabled.length;
        if (skipped > 0) this.logger.info(`Skipping ${skipped} disabled role(s)`);
        return enabled;
    }

    async run(options: RunOptions = {}): Promise<RoleRun[]> {
        const runs: RoleRun[] = [];
        for (const role of this.selectRoles(options.roleName)) {
            runs.push({ role: role.name, result: await this.runRole(role, options.distributed ?? false) });
        }
        return runs;
    }

    async runRole(role: RoleSettings, distributed: boolean): Promise<CrawlResult> {
        const ctx = new Context(this.config, role, this.logger.child(role.name));
        const artifacts = new ArtifactWriter(ctx);
        const pair = distributed
            ? await this.connectWorkers(ctx)
            : await this.launchPair(ctx, artifacts);

        try {
            return await new Crawler(ctx, pair, artifacts).run();
        } finally {
            await pair.close().catch(error =>
                this.logger.warn(`Closing sessions of ${role.name}: ${describeError(error)}`));
        }
    }

    private async connectWorkers(ctx: Context): Promise<SessionPair> {
        const pair = DaemonSessionPair.fromContext(ctx);
        await pair.waitUntilReady();
        return pair;
    }

    private async launchPair(ctx: Context, artifacts: ArtifactWriter): Promise<SessionPair> {
        const ref = await this.visitorFor(ctx, 'ref', artifacts);
        let next: SideVisitor;
        try {
            next = await this.visitorFor(ctx, 'new', artifacts);
        } catch (error) {
            await ref.session.close();
            throw error;
        }
        return new InProcessSessionPair(ref, next, ctx.logger.child('Pair'));
    }

    private async visitorFor(ctx: Context, which: SiteSide, artifacts: ArtifactWriter): Promise<SideVisitor> {
        const driver = await this.driverFactory(which, this.config.browser, ctx.logger.child(`Browser:${which}`));
        return new SideVisitor(new BrowserSession(driver, ctx, which), ctx, artifacts);
    }
}

/**
 * A running worker: one browser session behind an RPC port.
 */
export class WorkerHandle {
    private constructor(
        readonly port: number,
        private readonly server: RpcServer,
        private readonly visitor: SideVisitor
    ) { }

    static async start(
        config: CompareConfig,
        roleName: string,
        which: SiteSide,
        port: number,
        logger: Logger,
        driverFactory: DriverFactory = launchChromium
    ): Promise<WorkerHandle> {
        const role = findRole(config, roleName);
        const ctx = new Context(config, role, logger.child(`${role.name}:${which}`), { kind: 'daemon', which, port });
        const driver = await driverFactory(which, config.browser, ctx.logger.child('Browser'));
        const visitor = new SideVisitor(new BrowserSession(driver, ctx, which), ctx, new ArtifactWriter(ctx));
        const server = new RpcServer(workerCommands(visitor, ctx), ctx.logger.child('Rpc'));

        let bound: number;
        try {
            bound = await server.listen(port, config.rpc.host);
        } catch (error) {
            await visitor.session.close();
            throw error;
        }
        ctx.logger.info(`🤖 Worker ${ctx.describe()} ready`);
        return new WorkerHandle(bound, server, visitor);
    }

    async stop(): Promise<void> {
        await this.server.close();
        await this.visitor.session.close();
    }
}
