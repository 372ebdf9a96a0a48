/**
 * Built-in defaults for every configuration key.
 * Avoids magic numbers scattered across the codebase.
 */

// ============================================================
// TIMING CONSTANTS (milliseconds)
// ============================================================

export const TIMING = {
    /** Overall readiness budget shared by body, network and DOM waits */
    READY_TIMEOUT: 5000,

    /** Quiet window for network idle and DOM stability */
    QUIET_WINDOW: 500,

    /** Poll interval for readiness probes */
    POLL_INTERVAL: 100,

    /** Sleep between navigate retries */
    NAVIGATE_RETRY_SLEEP: 1000,

    /** Sleep between in-page script retries */
    SCRIPT_RETRY_SLEEP: 500,

    /** Budget for connecting to a worker */
    RPC_SEND_TIMEOUT: 10000,

    /** Budget for a worker to answer one command */
    RPC_ANSWER_TIMEOUT: 120000,

    /** First connect retry sleep; doubles up to RPC_MAX_BACKOFF */
    RPC_POLL_INTERVAL: 100,

    /** Upper bound for the connect retry sleep */
    RPC_MAX_BACKOFF: 1000,
} as const;

// ============================================================
// LIMITS
// ============================================================

export const LIMITS = {
    /** Retries after the first navigate attempt */
    NAVIGATE_RETRIES: 2,

    /** Retries after the first in-page script attempt */
    SCRIPT_RETRIES: 2,

    /** Network events kept by the browser adapter */
    NETWORK_RING_SIZE: 5000,

    /** Visits per role; 0 means unbounded */
    MAX_VISITED: 10,

    /** Consecutive failures with one reason before a crawl stops */
    SUCCESSIVE_ERRORS_MAX: 10,

    /** Log the running summary every N visits */
    INTERMEDIATE_RESULTS_EVERY: 100,

    /** Longest clickable text kept for matching */
    CLICKABLE_TEXT_MAX: 160,

    /** Minimum score for an equivalent element on the new side */
    MIN_EQUIVALENCE_SCORE: 2,

    /** Smallest accepted viewport (exclusive) */
    MIN_WIDTH: 4,
    MIN_HEIGHT: 3,
} as const;

// ============================================================
// BROWSER
// ============================================================

export const BROWSER = {
    WIDTH: 1366,
    HEIGHT: 768,
    HEADLESS: true,
    ALERT_ACTION: 'accept',
} as const;

// ============================================================
// COMPARISON
// ============================================================

export const COMPARISON = {
    /** Largest RGB euclidean distance between two 8-bit pixels */
    MAX_RGB_DISTANCE: 441.67,

    /** Fraction of MAX_RGB_DISTANCE above which a pixel differs */
    RMSE_THRESHOLD: 0.01,

    /** Differing pixels tolerated on visually identical renders */
    THRESHOLD_COUNT: 10,

    IGNORE_DOM_SELECTORS: ['script', 'style'],
    IGNORE_DOM_ATTRIBUTES: ['^aria-'],
} as const;

// ============================================================
// DISCOVERY
// ============================================================

export const DISCOVERY = {
    CLICK_FINDERS: [
        'a[href]',
        '[role="link"]',
        '[data-link]',
        '[data-router-link]',
        'button',
        '[onclick]',
    ],

    CLICK_HREF_DENY: ['^#|^callto:|^mailto:|^tel:'],

    LINK_FINDERS: [{ find: 'a[href]', member: 'href' }],

    LINK_HREF_DENY: ['^#|^javascript:|^callto:|^mailto:|^tel:'],

    /** Destructive or session-ending targets, applied to locators and URLs */
    DESTRUCTIVE_DENY: [
        '\\bexit\\b',
        '\\blogout\\b',
        '\\bdelete\\b',
        '\\bsignin\\b',
        '\\bsignout\\b',
    ],
} as const;

// ============================================================
// OUTPUT LAYOUT
// ============================================================

export const DIRS = {
    ROOT: './output',
    REF: 'ref',
    NEW: 'new',
    DIFFS: 'diffs',
    HTMLS: 'htmls',
    SCREENSHOTS: 'screenshots',
    PERF_LOGS: 'perf_logs',
    RESULTS: 'results',
} as const;

export const RPC = {
    HOST: '127.0.0.1',
    REF_PORT: 7701,
    NEW_PORT: 7702,
} as const;
