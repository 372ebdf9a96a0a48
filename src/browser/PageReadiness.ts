/**
 * Three-stage readiness wait sharing one deadline:
 * body present, network quiet, DOM fingerprint stable.
 * Only a missing body makes the page unready; an unstable DOM is a warning.
 */

import type { Logger } from '../core/Logger.js';
import { describeError } from '../shared/utils/errors.js';
import { deadlineIn, pollUntil, sleep, type Deadline } from '../shared/utils/polling.js';
import type { BrowserDriver, NetworkEvent } from './adapters/BrowserDriver.js';
import { probeBody, probeDomFingerprint } from './PageScripts.js';

export interface ReadinessTiming {
    timeoutMs: number;
    quietMs: number;
    pollMs: number;
}

export interface ReadinessResult {
    ready: boolean;
    alerts: string[];
    events: NetworkEvent[];
    sawDocument: boolean;
    domStable: boolean;
}

export interface NetworkIdleResult {
    idle: boolean;
    sawDocument: boolean;
    events: NetworkEvent[];
}

export function isMainDocumentResponse(event: NetworkEvent): boolean {
    return event.kind === 'response' && event.resourceType === 'document' && event.isMainFrame;
}

export class PageReadiness {
    private alerts: string[] = [];

    constructor(
        private readonly driver: BrowserDriver,
        private readonly timing: ReadinessTiming,
        private readonly logger: Logger
    ) { }

    /**
     * @param expectDocument whether a main-document response must be seen
     *        before the network can count as idle (true after navigate, false after an in-page click)
     */
    async waitReady(expectDocument: boolean): Promise<ReadinessResult> {
        this.alerts = [];
        const deadline = deadlineIn(this.timing.timeoutMs);

        const hasBody = await this.waitForBody(deadline);
        if (!hasBody) {
            this.logger.warn(`No body within ${this.timing.timeoutMs}ms`);
            return {
                ready: false,
                alerts: this.collectAlerts(),
                events: this.driver.drainNetworkEvents(),
                sawDocument: false,
                domStable: false
            };
        }

        const network = await this.waitForNetworkIdle(deadline, expectDocument);
        if (!network.idle) {
            this.logger.verbose(`Network not idle before deadline (${network.events.length} events, document=${network.sawDocument})`);
        }

        const domStable = await this.waitForDomStable(deadline);
        if (!domStable) {
            this.logger.warn('DOM did not settle; capturing anyway');
        }

        return {
            ready: true,
            alerts: this.collectAlerts(),
            events: network.events,
            sawDocument: network.sawDocument,
            domStable
        };
    }

    async waitForBody(deadline: Deadline): Promise<boolean> {
        const found = await pollUntil(async () => {
            this.collectAlerts();
            try {
                return (await this.driver.evaluate(probeBody, null)) ? true : undefined;
            } catch (error) {
                this.logger.debug(`Body probe failed: ${describeError(error)}`);
                return undefined;
            }
        }, deadline, this.timing.pollMs);
        return found === true;
    }

    async waitForNetworkIdle(deadline: Deadline, expectDocument: boolean): Promise<NetworkIdleResult> {
        const events: NetworkEvent[] = [];
        let sawDocument = false;
        let lastActivity = Date.now();

        for (;;) {
            this.collectAlerts();
            const batch = this.driver.drainNetworkEvents();
            if (batch.length > 0) {
                events.push(...batch);
                lastActivity = Date.now();
                if (batch.some(isMainDocumentResponse)) sawDocument = true;
            }

            if ((sawDocument || !expectDocument) && Date.now() - lastActivity >= this.timing.quietMs) {
                return { idle: true, sawDocument, events };
            }
            if (deadline.expired()) {
                return { idle: false, sawDocument, events };
            }
            await sleep(Math.min(this.timing.pollMs, deadline.remaining()));
        }
    }

    async waitForDomStable(deadline: Deadline): Promise<boolean> {
        let last: string | undefined;
        let since = Date.now();

        const stable = await pollUntil(async () => {
            let key: string;
            try {
                key = (await this.driver.evaluate(probeDomFingerprint, null)).join('#');
            } catch (error) {
                this.logger.debug(`DOM probe failed: ${describeError(error)}`);
                last = undefined;
                return undefined;
            }
            if (key !== last) {
                last = key;
                since = Date.now();
                return undefined;
            }
            return Date.now() - since >= this.timing.quietMs ? true : undefined;
        }, deadline, this.timing.pollMs);
        return stable === true;
    }

    private collectAlerts(): string[] {
        this.alerts.push(...this.driver.drainAlerts());
        return [...this.alerts];
    }
}
