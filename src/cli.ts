#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';
import { loadCompareConfig, type ConfigOverrides } from './config/CompareConfig.js';
import { CompareRunner, WorkerHandle } from './core/CompareRunner.js';
import { ConsoleLogger, parseLogLevel, type Logger } from './core/Logger.js';
import { isSiteSide, type SiteSide } from './core/types.js';
import { ContractError, describeError } from './shared/utils/errors.js';

dotenv.config();

type CompareCliOptions = {
    config: string;
    role?: string;
    maxVisited?: number;
    byLink?: boolean;
    byClick?: boolean;
    distributed?: boolean;
    output?: string;
    verbose?: boolean;
};

type WorkerCliOptions = {
    config: string;
    role: string;
    which: SiteSide;
    port: number;
    verbose?: boolean;
};

function parseCount(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function parseSide(value: string): SiteSide {
    if (!isSiteSide(value)) {
        throw new InvalidArgumentError('Expected "ref" or "new".');
    }
    return value;
}

function loggerFor(verbose: boolean | undefined, component: string): Logger {
    return new ConsoleLogger(verbose ? 'verbose' : parseLogLevel(process.env.LOG_LEVEL), component);
}

function fail(logger: Logger, error: unknown): void {
    if (error instanceof ContractError) {
        logger.error(`${error.message} ${JSON.stringify(error.details)}`);
        process.exitCode = 2;
        return;
    }
    logger.error(describeError(error));
    process.exitCode = 1;
}

const program = new Command();

program
    .name('site-diff-crawler')
    .description('Crawls a reference and a new deployment side by side and reports what differs')
    .version('1.0.0');

const compare = program
    .command('compare')
    .description('Crawl every enabled role (or one) and compare both sites')
    .requiredOption('--config <file>', 'Configuration file', process.env.COMPARE_CONFIG)
    .option('--role <name>', 'Only this role')
    .option('--max-visited <n>', 'Stop after this many visits (0 = no limit)', parseCount)
    .option('--by-link', 'Follow links')
    .option('--no-by-link', 'Do not follow links')
    .option('--by-click', 'Follow clickables')
    .option('--no-by-click', 'Do not follow clickables')
    .option('--distributed', 'Drive two running workers instead of local browsers')
    .option('--output <dir>', 'Output directory')
    .option('--verbose', 'Verbose logging');

compare.action(async () => {
    const options = compare.opts<CompareCliOptions>();
    const logger = loggerFor(options.verbose, 'Compare');
    const overrides: ConfigOverrides = {
        maxVisited: options.maxVisited,
        byLink: options.byLink,
        byClick: options.byClick,
        outputDir: options.output
    };

    try {
        const config = loadCompareConfig(options.config, { logger, overrides, env: process.env });
        const runs = await new CompareRunner(config, logger).run({
            roleName: options.role,
            distributed: options.distributed
        });
        const failed = runs.filter(run => run.result.hasFailures()).map(run => run.role);
        if (failed.length > 0) {
            logger.warn(`Differences in: ${failed.join(', ')}`);
            process.exitCode = 1;
        } else {
            logger.info('✅ No differences');
        }
    } catch (error) {
        fail(logger, error);
    }
});

const worker = program
    .command('worker')
    .description('Serve one browser session over RPC')
    .requiredOption('--config <file>', 'Configuration file', process.env.COMPARE_CONFIG)
    .requiredOption('--role <name>', 'Role whose session this worker owns')
    .requiredOption('--which <side>', 'ref or new', parseSide)
    .requiredOption('--port <n>', 'Port to listen on', parseCount)
    .option('--verbose', 'Verbose logging');

worker.action(async () => {
    const options = worker.opts<WorkerCliOptions>();
    const logger = loggerFor(options.verbose, 'Worker');

    try {
        const config = loadCompareConfig(options.config, { logger, env: process.env });
        const handle = await WorkerHandle.start(config, options.role, options.which, options.port, logger);
        const shutdown = () => {
            logger.info('🛑 Stopping worker');
            handle.stop().catch(error => fail(logger, error));
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    } catch (error) {
        fail(logger, error);
    }
});

program.parseAsync(process.argv).catch(error => {
    console.error(`❌ ${describeError(error)}`);
    process.exitCode = 1;
});
