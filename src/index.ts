export { loadCompareConfig, buildCompareConfig, findRole } from './config/CompareConfig.js';
export type { CompareConfig, RoleSettings, ConfigOverrides, FormSettings } from './config/CompareConfig.js';
export { CompareRunner, WorkerHandle, launchChromium } from './core/CompareRunner.js';
export type { DriverFactory, RoleRun, RunOptions } from './core/CompareRunner.js';
export { Context } from './core/Context.js';
export { ConsoleLogger, parseLogLevel } from './core/Logger.js';
export type { Logger, LogLevel } from './core/Logger.js';
export type { SiteSide, ClickableDescriptor } from './core/types.js';
export type { BrowserDriver, NetworkEvent } from './browser/adapters/BrowserDriver.js';
export { PlaywrightDriver } from './browser/adapters/playwright/PlaywrightDriver.js';
export { BrowserSession } from './browser/BrowserSession.js';
export { Capture } from './capture/Capture.js';
export { ArtifactWriter } from './capture/ArtifactWriter.js';
export { Crawler } from './crawl/Crawler.js';
export { CrawlResult, formatSummary } from './crawl/CrawlResult.js';
export { QueueItem } from './crawl/QueueItem.js';
export { RpcClient, broadcast } from './rpc/RpcClient.js';
export { RpcServer } from './rpc/RpcServer.js';
export { DaemonSessionPair } from './rpc/DaemonSessionPair.js';
export * from './shared/utils/errors.js';
