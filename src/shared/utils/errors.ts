/**
 * Error taxonomy.
 *
 * - ContractError: a caller broke a precondition (bad config, reused item). Aborts the run.
 * - TransientError: a browser or socket step failed and may succeed when retried.
 * - VisitCancelled: one visit gave up; the crawl records the reason and moves on.
 * - RpcProtocolError: a worker sent something that is not a valid answer.
 */

export class ContractError extends Error {
    constructor(
        message: string,
        readonly details: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'ContractError';
    }
}

export class TransientError extends Error {
    constructor(
        message: string,
        readonly operation: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'TransientError';
    }
}

export class VisitCancelled extends Error {
    constructor(
        readonly reason: string,
        message: string = reason
    ) {
        super(message);
        this.name = 'VisitCancelled';
    }
}

export class RpcProtocolError extends Error {
    constructor(
        message: string,
        readonly reason: string = 'protocol'
    ) {
        super(message);
        this.name = 'RpcProtocolError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
