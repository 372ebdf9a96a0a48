/**
 * Comparison run configuration.
 *
 * A JSON file (snake_case keys) is laid over the defaults in constants.ts,
 * then environment and command-line overrides are applied. Patterns are
 * compiled here, once; the rest of the code only sees typed settings.
 */

import { ErrorHandler, ErrorSeverity } from '../shared/utils/ErrorHandler.js';
import { ContractError } from '../shared/utils/errors.js';
import { JsonValidator, Validators, type JsonObject } from '../shared/utils/JsonValidator.js';
import type { Logger } from '../core/Logger.js';
import type { ClickableKind, SiteSide } from '../core/types.js';
import { toConfigValue, resolveConfigValue, type ResolveOptions } from './ConfigValue.js';
import { BROWSER, COMPARISON, DIRS, DISCOVERY, LIMITS, RPC, TIMING } from './constants.js';

export interface RetrySettings {
    retries: number;
    sleepMs: number;
}

export type AlertAction = 'accept' | 'dismiss';

export interface BrowserSettings {
    width: number;
    height: number;
    headless: boolean;
    executable?: string;
    alertAction: AlertAction;
    timeoutMs: number;
    quietMs: number;
    pollMs: number;
    navigate: RetrySettings;
    execJs: RetrySettings;
}

export interface HtmlIgnoreRules {
    domSelectors: string[];
    domAttributes: RegExp[];
    textPatterns: RegExp[];
}

export interface HtmlCompareSettings {
    enabled: boolean;
    ignore: HtmlIgnoreRules;
}

export interface ScreenshotSettings {
    enabled: boolean;
    rmseThreshold: number;
    thresholdCount: number;
}

export interface LinkFinder {
    find: string;
    member: string;
}

export interface ByLinkSettings {
    enabled: boolean;
    finders: LinkFinder[];
    honorQuery: boolean;
    hrefAllow: RegExp[];
    hrefDeny: RegExp[];
    urlAllow: RegExp[];
    urlDeny: RegExp[];
}

export interface ByClickSettings {
    enabled: boolean;
    finders: string[];
    cssExcludes: string[];
    hrefDeny: RegExp[];
    textDeny: RegExp[];
    locatorDeny: RegExp[];
    intermediateScreenshots: boolean;
    minEquivalenceScore: number;
}

export interface CrawlSettings {
    maxVisited: number;
    sameHost: boolean;
    successiveErrorsMax: number;
    intermediateResultsEvery: number;
    byLink: ByLinkSettings;
    byClick: ByClickSettings;
}

export interface DirSettings {
    root: string;
    ref: string;
    new: string;
    diffs: string;
}

export interface RpcSettings {
    host: string;
    refPort: number;
    newPort: number;
    sendTimeoutMs: number;
    answerTimeoutMs: number;
    pollMs: number;
}

export type SeedStep =
    | { kind: 'link'; path: string }
    | { kind: 'click'; origin: string; locator: string; text: string; href: string; clickKind: ClickableKind; onclick: string };

export interface SignatureSeed {
    label: string;
    steps: SeedStep[];
}

export interface RoleSettings {
    name: string;
    enabled: boolean;
    routes: string[];
    signatures: SignatureSeed[];
    reloginUrlPattern?: RegExp;
}

/** A form control driven after each compared page. */
export interface FormSettings {
    /** CSS selector of a `<select>` or of an element holding one */
    selector: string;
    /** Clicked after each option is chosen; without it the `change` event is relied on */
    submitSelector?: string;
}

export interface CompareConfig {
    bases: Record<SiteSide, string>;
    browser: BrowserSettings;
    compare: {
        htmls: HtmlCompareSettings;
        screenshots: ScreenshotSettings;
    };
    crawl: CrawlSettings;
    forms: FormSettings[];
    dirs: DirSettings;
    rpc: RpcSettings;
    roles: RoleSettings[];
}

/** Command-line overrides; only the given fields apply. */
export interface ConfigOverrides {
    maxVisited?: number;
    byLink?: boolean;
    byClick?: boolean;
    outputDir?: string;
}

export interface LoadOptions extends ResolveOptions {
    logger: Logger;
    overrides?: ConfigOverrides;
    env?: NodeJS.ProcessEnv;
}

const CLICKABLE_KINDS: readonly ClickableKind[] = ['a', 'button', 'onclick', 'role-link', 'other'];

function isClickableKind(value: string): value is ClickableKind {
    return CLICKABLE_KINDS.some(kind => kind === value);
}

/**
 * Typed, path-addressed reads over the raw JSON tree.
 */
class ConfigReader {
    constructor(
        private readonly root: JsonObject,
        private readonly logger: Logger
    ) { }

    lookup(keyPath: string, from: JsonObject = this.root): unknown {
        let node: unknown = from;
        for (const part of keyPath.split('.')) {
            if (!Validators.object(node)) return undefined;
            node = node[part];
        }
        return node;
    }

    number(keyPath: string, fallback: number, from?: JsonObject): number {
        const raw = this.lookup(keyPath, from);
        if (raw === undefined || raw === null || raw === '') return fallback;
        const value = typeof raw === 'string' ? Number(raw) : raw;
        if (!Validators.number(value)) {
            throw new ContractError(`${keyPath}: expected a number`, { keyPath, value: raw });
        }
        return value;
    }

    boolean(keyPath: string, fallback: boolean, from?: JsonObject): boolean {
        const raw = this.lookup(keyPath, from);
        if (raw === undefined || raw === null) return fallback;
        if (Validators.boolean(raw)) return raw;
        if (raw === 1 || raw === '1' || raw === 'true') return true;
        if (raw === 0 || raw === '0' || raw === 'false') return false;
        throw new ContractError(`${keyPath}: expected a boolean`, { keyPath, value: raw });
    }

    string(keyPath: string, fallback: string, from?: JsonObject): string {
        const raw = this.lookup(keyPath, from);
        if (raw === undefined || raw === null) return fallback;
        if (!Validators.string(raw)) {
            throw new ContractError(`${keyPath}: expected a string`, { keyPath, value: raw });
        }
        return raw;
    }

    strings(keyPath: string, fallback: readonly string[], from?: JsonObject): string[] {
        const raw = this.lookup(keyPath, from);
        if (raw === undefined || raw === null) return [...fallback];
        if (Validators.string(raw)) return [raw];
        if (!Validators.array(Validators.string)(raw)) {
            throw new ContractError(`${keyPath}: expected a list of strings`, { keyPath });
        }
        return raw;
    }

    /** Invalid expressions are skipped with a warning. */
    patterns(keyPath: string, fallback: readonly string[], from?: JsonObject): RegExp[] {
        return compilePatterns(this.strings(keyPath, fallback, from), keyPath, this.logger);
    }

    object(keyPath: string, from?: JsonObject): JsonObject | undefined {
        const raw = this.lookup(keyPath, from);
        return Validators.object(raw) ? raw : undefined;
    }
}

export function compilePatterns(sources: readonly string[], keyPath: string, logger: Logger): RegExp[] {
    const compiled: RegExp[] = [];
    for (const source of sources) {
        try {
            compiled.push(new RegExp(source));
        } catch (error) {
            ErrorHandler.handle(error, {
                component: 'Config',
                operation: keyPath,
                logger
            }, ErrorSeverity.WARNING);
        }
    }
    return compiled;
}

function normalizeRoute(route: string): string {
    return route.startsWith('/') ? route : `/${route}`;
}

function parseSeedStep(raw: unknown, keyPath: string): SeedStep {
    if (!Validators.object(raw)) {
        throw new ContractError(`${keyPath}: expected an object`, { keyPath });
    }
    const str = (key: string, required: boolean): string => {
        const value = raw[key];
        if (Validators.string(value)) return value;
        if (required || value !== undefined) {
            throw new ContractError(`${keyPath}.${key}: expected a string`, { keyPath });
        }
        return '';
    };

    if (raw.kind === 'link') {
        return { kind: 'link', path: normalizeRoute(str('path', true)) };
    }
    if (raw.kind === 'click') {
        const clickKind = str('click_kind', false) || 'other';
        if (!isClickableKind(clickKind)) {
            throw new ContractError(`${keyPath}.click_kind: unknown kind "${clickKind}"`, { keyPath });
        }
        return {
            kind: 'click',
            origin: str('origin', true),
            locator: str('locator', true),
            text: str('text', false),
            href: str('href', false),
            clickKind,
            onclick: str('onclick', false)
        };
    }
    throw new ContractError(`${keyPath}.kind: expected "link" or "click"`, { keyPath });
}

function parseRoles(reader: ConfigReader, logger: Logger): RoleSettings[] {
    const rolesNode = reader.object('roles');
    if (!rolesNode || Object.keys(rolesNode).length === 0) {
        return [{ name: 'default', enabled: true, routes: ['/'], signatures: [] }];
    }

    return Object.entries(rolesNode).map(([name, node]) => {
        const roleNode = Validators.object(node) ? node : {};
        const signatures: SignatureSeed[] = [];
        const sigNode = reader.object('signatures', roleNode);
        for (const [label, steps] of Object.entries(sigNode ?? {})) {
            if (!Validators.array()(steps) || steps.length === 0) {
                throw new ContractError(`roles.${name}.signatures.${label}: expected a non-empty list of steps`, { label });
            }
            signatures.push({
                label,
                steps: steps.map((step, i) => parseSeedStep(step, `roles.${name}.signatures.${label}[${i}]`))
            });
        }

        const reloginSource = reader.string('relogin_url_pattern', '', roleNode);
        const [reloginUrlPattern] = reloginSource
            ? compilePatterns([reloginSource], `roles.${name}.relogin_url_pattern`, logger)
            : [];

        return {
            name,
            enabled: reader.boolean('enabled', true, roleNode),
            routes: reader.strings('routes', ['/'], roleNode).map(normalizeRoute),
            signatures,
            reloginUrlPattern
        };
    });
}

/** `{ "<selector>": { "submit_selector": "…" } }`, in selector order */
function parseForms(reader: ConfigReader): FormSettings[] {
    const formsNode = reader.object('forms') ?? {};
    return Object.keys(formsNode).sort().map(selector => {
        const node = formsNode[selector] ?? {};
        if (!Validators.object(node)) {
            throw new ContractError(`forms.${selector}: expected an object`, { selector });
        }
        const submitSelector = reader.string('submit_selector', '', node);
        return submitSelector ? { selector, submitSelector } : { selector };
    });
}

function envOverrides(env: NodeJS.ProcessEnv): JsonObject {
    const crawl: JsonObject = {};
    if (env.COMPARE_MAX_VISITED !== undefined) crawl.max_visited = env.COMPARE_MAX_VISITED;
    if (env.COMPARE_BY_LINK !== undefined) crawl.by_link = { enabled: env.COMPARE_BY_LINK };
    if (env.COMPARE_BY_CLICK !== undefined) crawl.by_click = { enabled: env.COMPARE_BY_CLICK };
    return Object.keys(crawl).length > 0 ? { crawl } : {};
}

function cliOverrides(overrides: ConfigOverrides): JsonObject {
    const crawl: JsonObject = {};
    if (overrides.maxVisited !== undefined) crawl.max_visited = overrides.maxVisited;
    if (overrides.byLink !== undefined) crawl.by_link = { enabled: overrides.byLink };
    if (overrides.byClick !== undefined) crawl.by_click = { enabled: overrides.byClick };
    const result: JsonObject = { crawl };
    if (overrides.outputDir !== undefined) result.dirs = { root: overrides.outputDir };
    return result;
}

function checkUrl(value: string, keyPath: string): string {
    ErrorHandler.assert(value.length > 0, `${keyPath} is required`, { component: 'Config', data: { keyPath } });
    try {
        return new URL(value).toString().replace(/\/$/, '');
    } catch {
        throw new ContractError(`${keyPath}: not a valid URL: ${value}`, { keyPath });
    }
}

function checkPort(value: number, keyPath: string): number {
    ErrorHandler.assert(
        Number.isInteger(value) && value >= 0 && value <= 65535,
        `${keyPath}: invalid port ${value}`,
        { component: 'Config', data: { keyPath } }
    );
    return value;
}

/**
 * Builds settings from an already-parsed JSON tree.
 * @throws ContractError on a missing base URL, a too-small viewport, a negative bound or a bad port
 */
export function buildCompareConfig(raw: JsonObject, options: LoadOptions): CompareConfig {
    const { logger } = options;
    const merged = JsonValidator.deepMerge(
        JsonValidator.deepMerge(raw, envOverrides(options.env ?? {})),
        cliOverrides(options.overrides ?? {})
    );
    const reader = new ConfigReader(merged, logger);

    const executableRaw = reader.lookup('browser.executable');
    const rootRaw = reader.lookup('dirs.root');

    const width = reader.number('browser.width', BROWSER.WIDTH);
    const height = reader.number('browser.height', BROWSER.HEIGHT);
    ErrorHandler.assert(width > LIMITS.MIN_WIDTH, `browser.width must be greater than ${LIMITS.MIN_WIDTH}`, { component: 'Config', data: { width } });
    ErrorHandler.assert(height > LIMITS.MIN_HEIGHT, `browser.height must be greater than ${LIMITS.MIN_HEIGHT}`, { component: 'Config', data: { height } });

    const alertAction = reader.string('browser.alert_action', BROWSER.ALERT_ACTION);
    if (alertAction !== 'accept' && alertAction !== 'dismiss') {
        throw new ContractError(`browser.alert_action: expected "accept" or "dismiss"`, { alertAction });
    }

    const maxVisited = reader.number('crawl.max_visited', LIMITS.MAX_VISITED);
    ErrorHandler.assert(maxVisited >= 0, 'crawl.max_visited must not be negative', { component: 'Config', data: { maxVisited } });

    const config: CompareConfig = {
        bases: {
            ref: checkUrl(reader.string('bases.ref', ''), 'bases.ref'),
            new: checkUrl(reader.string('bases.new', ''), 'bases.new')
        },
        browser: {
            width,
            height,
            headless: reader.boolean('browser.headless', BROWSER.HEADLESS),
            executable: executableRaw === undefined
                ? undefined
                : resolveConfigValue(toConfigValue(executableRaw, 'browser.executable'), options),
            alertAction,
            timeoutMs: reader.number('browser.timeout_ms', TIMING.READY_TIMEOUT),
            quietMs: reader.number('browser.quiet_ms', TIMING.QUIET_WINDOW),
            pollMs: reader.number('browser.poll_ms', TIMING.POLL_INTERVAL),
            navigate: {
                retries: reader.number('browser.navigate.retries', LIMITS.NAVIGATE_RETRIES),
                sleepMs: reader.number('browser.navigate.sleep_ms', TIMING.NAVIGATE_RETRY_SLEEP)
            },
            execJs: {
                retries: reader.number('browser.exec_js.retries', LIMITS.SCRIPT_RETRIES),
                sleepMs: reader.number('browser.exec_js.sleep_ms', TIMING.SCRIPT_RETRY_SLEEP)
            }
        },
        compare: {
            htmls: {
                enabled: reader.boolean('compare.htmls.enabled', true),
                ignore: {
                    domSelectors: reader.strings('compare.htmls.ignore.dom_selectors', COMPARISON.IGNORE_DOM_SELECTORS),
                    domAttributes: reader.patterns('compare.htmls.ignore.dom_attributes', COMPARISON.IGNORE_DOM_ATTRIBUTES),
                    textPatterns: reader.patterns('compare.htmls.ignore.text_patterns', [])
                }
            },
            screenshots: {
                enabled: reader.boolean('compare.screenshots.enabled', false),
                rmseThreshold: reader.number('compare.screenshots.rmse_threshold', COMPARISON.RMSE_THRESHOLD),
                thresholdCount: reader.number('compare.screenshots.threshold_count', COMPARISON.THRESHOLD_COUNT)
            }
        },
        crawl: {
            maxVisited,
            sameHost: reader.boolean('crawl.same_host', true),
            successiveErrorsMax: reader.number('crawl.successive_errors_max', LIMITS.SUCCESSIVE_ERRORS_MAX),
            intermediateResultsEvery: reader.number('crawl.intermediate_results_every', LIMITS.INTERMEDIATE_RESULTS_EVERY),
            byLink: {
                enabled: reader.boolean('crawl.by_link.enabled', false),
                finders: parseLinkFinders(reader.lookup('crawl.by_link.finders')),
                honorQuery: reader.boolean('crawl.by_link.honor_query', true),
                hrefAllow: reader.patterns('crawl.by_link.href_allow_patterns', []),
                hrefDeny: reader.patterns('crawl.by_link.href_deny_patterns', DISCOVERY.LINK_HREF_DENY),
                urlAllow: reader.patterns('crawl.by_link.url_allow_patterns', []),
                urlDeny: reader.patterns('crawl.by_link.url_deny_patterns', DISCOVERY.DESTRUCTIVE_DENY)
            },
            byClick: {
                enabled: reader.boolean('crawl.by_click.enabled', false),
                finders: reader.strings('crawl.by_click.finders', DISCOVERY.CLICK_FINDERS),
                cssExcludes: reader.strings('crawl.by_click.css_excludes', []),
                hrefDeny: reader.patterns('crawl.by_click.href_deny_patterns', DISCOVERY.CLICK_HREF_DENY),
                textDeny: reader.patterns('crawl.by_click.text_deny_patterns', []),
                locatorDeny: reader.patterns('crawl.by_click.locator_deny_patterns', DISCOVERY.DESTRUCTIVE_DENY),
                intermediateScreenshots: reader.boolean('crawl.by_click.intermediate_screenshots', true),
                minEquivalenceScore: reader.number('crawl.by_click.min_equivalence_score', LIMITS.MIN_EQUIVALENCE_SCORE)
            }
        },
        forms: parseForms(reader),
        dirs: {
            root: rootRaw === undefined
                ? DIRS.ROOT
                : resolveConfigValue(toConfigValue(rootRaw, 'dirs.root'), options) ?? DIRS.ROOT,
            ref: reader.string('dirs.ref', DIRS.REF),
            new: reader.string('dirs.new', DIRS.NEW),
            diffs: reader.string('dirs.diffs', DIRS.DIFFS)
        },
        rpc: {
            host: reader.string('rpc.host', RPC.HOST),
            refPort: checkPort(reader.number('rpc.ref_port', RPC.REF_PORT), 'rpc.ref_port'),
            newPort: checkPort(reader.number('rpc.new_port', RPC.NEW_PORT), 'rpc.new_port'),
            sendTimeoutMs: reader.number('rpc.send_timeout_ms', TIMING.RPC_SEND_TIMEOUT),
            answerTimeoutMs: reader.number('rpc.answer_timeout_ms', TIMING.RPC_ANSWER_TIMEOUT),
            pollMs: reader.number('rpc.poll_ms', TIMING.RPC_POLL_INTERVAL)
        },
        roles: parseRoles(reader, logger)
    };

    return config;
}

function parseLinkFinders(raw: unknown): LinkFinder[] {
    if (raw === undefined || raw === null) {
        return DISCOVERY.LINK_FINDERS.map(finder => ({ ...finder }));
    }
    const isFinder = (value: unknown): value is LinkFinder =>
        Validators.object(value) && Validators.string(value.find) && Validators.string(value.member);
    if (!Validators.array(isFinder)(raw)) {
        throw new ContractError('crawl.by_link.finders: expected a list of {find, member}', {});
    }
    return raw.map(finder => ({ find: finder.find, member: finder.member }));
}

/**
 * Reads and validates a configuration file.
 * @throws ContractError when the file is missing, malformed or breaks a load-time check
 */
export function loadCompareConfig(filePath: string, options: LoadOptions): CompareConfig {
    const raw = JsonValidator.parseFile(filePath, Validators.object);
    options.logger.verbose(`Loaded configuration from ${filePath}`);
    return buildCompareConfig(raw, options);
}

export function findRole(config: CompareConfig, name: string): RoleSettings {
    const role = config.roles.find(r => r.name === name);
    if (!role) {
        throw new ContractError(`Unknown role "${name}"`, { known: config.roles.map(r => r.name) });
    }
    return role;
}

export function portFor(config: CompareConfig, which: SiteSide): number {
    return which === 'ref' ? config.rpc.refPort : config.rpc.newPort;
}
