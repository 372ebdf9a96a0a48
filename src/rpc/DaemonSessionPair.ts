import { Capture } from '../capture/Capture.js';
import { portFor } from '../config/CompareConfig.js';
import type { Context } from '../core/Context.js';
import type { Logger } from '../core/Logger.js';
import { SITE_SIDES, type ClickableDescriptor } from '../core/types.js';
import { isDescriptor, type QueueItem } from '../crawl/QueueItem.js';
import type { PairOutcome, SessionPair, SideOutcome } from '../crawl/SessionPair.js';
import { RpcProtocolError, TransientError } from '../shared/utils/errors.js';
import { Validators } from '../shared/utils/JsonValidator.js';
import type { CallResult } from './protocol.js';
import { RpcClient, broadcast, passThrough, type ReplayHandlers } from './RpcClient.js';
import { RELOGIN_TOKEN } from './WorkerCommands.js';

type VisitResult =
    | { captured: true; capture: Capture }
    | { captured: false; reason: string };

export function decodeVisitAnswer(answer: unknown): VisitResult {
    if (!Validators.object(answer)) {
        throw new RpcProtocolError('visit answer: expected an object');
    }
    if (answer.status === 'captured') {
        return { captured: true, capture: Capture.fromJSON(answer.capture) };
    }
    if (answer.status === 'cancelled' && Validators.string(answer.reason)) {
        return { captured: false, reason: answer.reason };
    }
    throw new RpcProtocolError('visit answer: unknown status');
}

export function decodeClickables(answer: unknown): ClickableDescriptor[] {
    if (!Validators.array(isDescriptor)(answer)) {
        throw new RpcProtocolError('clickables: expected a list of descriptors');
    }
    return answer;
}

function toOutcome(result: CallResult<VisitResult> | undefined): SideOutcome {
    if (!result) return { ok: false, reason: 'rpc:missing' };
    switch (result.kind) {
        case 'ok':
            return result.value.captured
                ? { ok: true, capture: result.value.capture }
                : { ok: false, reason: result.value.reason };
        case 'replay':
            return { ok: false, reason: `rpc:replay:${result.token}` };
        case 'error':
            return { ok: false, reason: `rpc:${result.reason}` };
    }
}

/**
 * The two sessions live in worker processes; each step is broadcast to both
 * and each worker restores and mirrors on its own.
 */
export class DaemonSessionPair implements SessionPair {
    private readonly handlers: ReplayHandlers;

    constructor(
        private readonly ref: RpcClient,
        private readonly next: RpcClient,
        private readonly logger: Logger
    ) {
        this.handlers = {
            [RELOGIN_TOKEN]: async endpoint => {
                const client = endpoint.name === this.ref.endpoint.name ? this.ref : this.next;
                const reset = await client.call('reset_session', {}, passThrough);
                return reset.kind === 'ok';
            }
        };
    }

    static fromContext(ctx: Context): DaemonSessionPair {
        const { rpc } = ctx.config;
        const [ref, next] = SITE_SIDES.map(which => new RpcClient(
            { name: which, host: rpc.host, port: portFor(ctx.config, which) },
            rpc,
            ctx.logger.child(`Rpc:${which}`)
        ));
        return new DaemonSessionPair(ref, next, ctx.logger.child('Daemons'));
    }

    /**
     * @throws TransientError when a worker does not answer within the budgets
     */
    async waitUntilReady(): Promise<void> {
        const results = await broadcast([this.ref, this.next], 'internal_status', {}, passThrough);
        for (const [name, result] of results) {
            if (result.kind !== 'ok') {
                throw new TransientError(`worker ${name} not reachable (${result.kind === 'error' ? result.reason : result.token})`, 'socket');
            }
        }
        this.logger.info('✅ Both workers answer');
    }

    async visit(item: QueueItem): Promise<PairOutcome> {
        const command = item.kind === 'link' ? 'navigate_and_capture' : 'click_and_capture';
        const results = await broadcast([this.ref, this.next], command, { item: item.toJSON() }, decodeVisitAnswer, this.handlers);
        return {
            ref: toOutcome(results.get(this.ref.endpoint.name)),
            new: toOutcome(results.get(this.next.endpoint.name))
        };
    }

    /**
     * @throws TransientError when the reference worker cannot answer
     */
    async discoverClickables(): Promise<ClickableDescriptor[]> {
        const result = await this.ref.call('discover_clickables', {}, decodeClickables);
        if (result.kind !== 'ok') {
            throw new TransientError(`discover_clickables failed (${result.kind === 'error' ? result.reason : result.token})`, 'socket');
        }
        return result.value;
    }

    async handleForms(): Promise<void> {
        const results = await broadcast([this.ref, this.next], 'handle_forms', {}, passThrough);
        for (const [name, result] of results) {
            if (result.kind !== 'ok') {
                this.logger.warn(`handle_forms failed on ${name} (${result.kind === 'error' ? result.reason : result.token})`);
            }
        }
    }

    async close(): Promise<void> {
        this.logger.verbose('Workers keep running; they are stopped by whoever started them');
    }
}
