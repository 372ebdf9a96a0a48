import type { Capture, SerializedCapture } from '../capture/Capture.js';
import type { Context } from '../core/Context.js';
import type { ClickableDescriptor } from '../core/types.js';
import { QueueItem, type QueueItemKind } from '../crawl/QueueItem.js';
import type { SideVisitor } from '../crawl/SideVisitor.js';
import { RpcProtocolError, VisitCancelled } from '../shared/utils/errors.js';
import { Validators } from '../shared/utils/JsonValidator.js';
import type { CommandTable } from './RpcServer.js';

/** Asks the caller to reset this worker's session and re-issue the command. */
export const RELOGIN_TOKEN = 'relogin';

export type VisitAnswer =
    | { status: 'captured'; capture: SerializedCapture }
    | { status: 'cancelled'; reason: string };

export interface WorkerStatus {
    role: string;
    which: string;
    visits: number;
    cancelled: number;
    lastVisited?: number;
}

function itemFrom(args: unknown, kind: QueueItemKind): QueueItem {
    if (!Validators.object(args)) {
        throw new RpcProtocolError('expected {item}');
    }
    const item = QueueItem.fromJSON(args.item);
    if (item.kind !== kind) {
        throw new RpcProtocolError(`expected a ${kind} step, got ${item.kind}`);
    }
    return item;
}

/**
 * The commands a worker answers, bound to its one session.
 */
export function workerCommands(visitor: SideVisitor, ctx: Context): CommandTable {
    const logger = ctx.logger.child('Worker');
    const status: WorkerStatus = {
        role: ctx.role.name,
        which: visitor.which,
        visits: 0,
        cancelled: 0
    };

    const relogin = ctx.role.reloginUrlPattern;

    async function visit(item: QueueItem): Promise<VisitAnswer | typeof RELOGIN_TOKEN> {
        status.visits++;
        status.lastVisited = item.visited;
        let capture: Capture;
        try {
            capture = await visitor.visit(item);
        } catch (error) {
            if (error instanceof VisitCancelled) {
                status.cancelled++;
                return { status: 'cancelled', reason: error.reason };
            }
            throw error;
        }
        if (relogin && relogin.test(capture.url)) {
            logger.warn(`Landed on ${capture.url}; asking for a new login`);
            return RELOGIN_TOKEN;
        }
        return { status: 'captured', capture: capture.toJSON() };
    }

    return {
        internal_status: async () => undefined,
        ping: async () => 'pong',
        status: async () => ({ ...status }),
        navigate_and_capture: async args => await visit(itemFrom(args, 'link')),
        click_and_capture: async args => await visit(itemFrom(args, 'click')),
        discover_clickables: async (): Promise<ClickableDescriptor[]> => await visitor.discoverClickables(),
        handle_forms: async () => await visitor.session.handleForms(),
        signature: async () => await visitor.session.signature(),
        reset_session: async () => {
            await visitor.session.reset();
            return true;
        }
    };
}
