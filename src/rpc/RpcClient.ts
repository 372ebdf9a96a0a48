/**
 * Client side of the worker protocol: one short-lived connection per call,
 * connect retried with backoff inside the send budget, answer awaited
 * inside the answer budget.
 */

import * as net from 'net';
import { StringDecoder } from 'string_decoder';
import { TIMING } from '../config/constants.js';
import type { Logger } from '../core/Logger.js';
import { RpcProtocolError, TransientError, describeError } from '../shared/utils/errors.js';
import { deadlineIn, sleep } from '../shared/utils/polling.js';
import {
    ResponseAccumulator,
    decodeEnvelope,
    encodeRequest,
    type CallResult,
    type Envelope
} from './protocol.js';

export interface RpcEndpoint {
    name: string;
    host: string;
    port: number;
}

export interface RpcTimeouts {
    sendTimeoutMs: number;
    answerTimeoutMs: number;
    pollMs: number;
}

/** Performs the out-of-band action a replay token asks for; false means it failed. */
export type ReplayHandler = (endpoint: RpcEndpoint) => Promise<boolean>;
export type ReplayHandlers = Readonly<Record<string, ReplayHandler>>;

/** Turns a decoded answer into the caller's type; throws RpcProtocolError on a bad shape. */
export type AnswerDecoder<T> = (answer: unknown) => T;

export interface Exchange {
    body: string;
    /** Already destroyed; kept for inspection */
    socket: net.Socket;
}

export const passThrough: AnswerDecoder<unknown> = answer => answer;

export class RpcClient {
    constructor(
        readonly endpoint: RpcEndpoint,
        private readonly timeouts: RpcTimeouts,
        private readonly logger: Logger
    ) { }

    /**
     * @throws TransientError (operation "socket") once the send budget is spent
     */
    async connect(): Promise<net.Socket> {
        const deadline = deadlineIn(this.timeouts.sendTimeoutMs);
        let backoff = Math.max(1, this.timeouts.pollMs);
        let lastError: unknown;

        for (;;) {
            try {
                return await this.tryConnect(Math.max(1, deadline.remaining()));
            } catch (error) {
                lastError = error;
            }
            if (deadline.expired()) {
                throw new TransientError(
                    `${this.endpoint.name}: cannot connect to ${this.endpoint.host}:${this.endpoint.port}: ${describeError(lastError)}`,
                    'socket',
                    { cause: lastError }
                );
            }
            this.logger.debug(`${this.endpoint.name}: connect retry in ${backoff}ms`);
            await sleep(Math.min(backoff, deadline.remaining()));
            backoff = Math.min(backoff * 2, TIMING.RPC_MAX_BACKOFF);
        }
    }

    private tryConnect(timeoutMs: number): Promise<net.Socket> {
        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ host: this.endpoint.host, port: this.endpoint.port });
            const timer = setTimeout(() => {
                socket.destroy();
                reject(new Error('connect timeout'));
            }, timeoutMs);
            socket.once('error', error => {
                clearTimeout(timer);
                socket.destroy();
                reject(error);
            });
            socket.once('connect', () => {
                clearTimeout(timer);
                socket.removeAllListeners('error');
                resolve(socket);
            });
        });
    }

    /**
     * Sends one request and reads the whole response.
     * @throws TransientError with operation "socket" or "timeout"
     */
    async exchange(command: string, args: unknown): Promise<Exchange> {
        const request = encodeRequest(command, args);
        const socket = await this.connect();

        return await new Promise<Exchange>((resolve, reject) => {
            const accumulator = new ResponseAccumulator();
            const decoder = new StringDecoder('utf8');
            let settled = false;

            const finish = (error?: Error) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                socket.destroy();
                if (error) reject(error);
                else resolve({ body: accumulator.body, socket });
            };

            const timer = setTimeout(
                () => finish(new TransientError(`${this.endpoint.name}: no answer to ${command} within ${this.timeouts.answerTimeoutMs}ms`, 'timeout')),
                this.timeouts.answerTimeoutMs
            );

            socket.on('data', (chunk: Buffer) => {
                accumulator.push(decoder.write(chunk));
                if (accumulator.complete) finish();
            });
            socket.on('end', () => {
                accumulator.push(`${decoder.end()}\n`);
                finish(accumulator.complete
                    ? undefined
                    : new TransientError(`${this.endpoint.name}: connection closed before the answer ended`, 'socket'));
            });
            socket.on('error', error => finish(new TransientError(`${this.endpoint.name}: ${error.message}`, 'socket')));

            socket.end(request);
        });
    }

    /**
     * One attempt: a known replay token comes back as `replay`, never as a value.
     */
    private async attempt<T>(command: string, args: unknown, decode: AnswerDecoder<T>, tokens: ReadonlySet<string>): Promise<CallResult<T>> {
        let envelope: Envelope;
        try {
            envelope = decodeEnvelope((await this.exchange(command, args)).body);
        } catch (error) {
            if (error instanceof TransientError) return { kind: 'error', reason: error.operation };
            if (error instanceof RpcProtocolError) return { kind: 'error', reason: error.reason };
            throw error;
        }

        if ('error' in envelope) {
            this.logger.warn(`${this.endpoint.name}: ${command} failed in worker: ${envelope.error}`);
            return { kind: 'error', reason: 'worker' };
        }
        const answer = envelope.answer;
        if (typeof answer === 'string' && tokens.has(answer)) {
            return { kind: 'replay', token: answer };
        }
        try {
            return { kind: 'ok', value: decode(answer) };
        } catch (error) {
            if (error instanceof RpcProtocolError) {
                this.logger.warn(`${this.endpoint.name}: ${command}: ${error.message}`);
                return { kind: 'error', reason: error.reason };
            }
            throw error;
        }
    }

    /**
     * Sends a command, running at most one replay handler per token before
     * re-issuing it. Failures come back as `error` results with a reason code:
     * socket, timeout, protocol, worker, `sub:<token>` (handler failed) or
     * `replay:<token>` (same token requested twice).
     */
    async call<T>(
        command: string,
        args: unknown,
        decode: AnswerDecoder<T>,
        handlers: ReplayHandlers = {}
    ): Promise<CallResult<T>> {
        const tokens = new Set(Object.keys(handlers));
        const replayed = new Set<string>();

        for (;;) {
            const result = await this.attempt(command, args, decode, tokens);
            if (result.kind !== 'replay') return result;

            const token = result.token;
            if (replayed.has(token)) {
                this.logger.error(`${this.endpoint.name}: ${command} asked for "${token}" again`);
                return { kind: 'error', reason: `replay:${token}` };
            }
            replayed.add(token);
            this.logger.info(`🔁 ${this.endpoint.name}: ${command} needs "${token}"`);

            let handled: boolean;
            try {
                handled = await handlers[token](this.endpoint);
            } catch (error) {
                this.logger.error(`${this.endpoint.name}: "${token}" handler threw: ${describeError(error)}`);
                handled = false;
            }
            if (!handled) return { kind: 'error', reason: `sub:${token}` };
        }
    }
}

/**
 * The same command to every client at once; one client's failure does not
 * affect the others.
 */
export async function broadcast<T>(
    clients: readonly RpcClient[],
    command: string,
    args: unknown,
    decode: AnswerDecoder<T>,
    handlers: ReplayHandlers = {}
): Promise<Map<string, CallResult<T>>> {
    const results = await Promise.all(clients.map(async client => {
        const result = await client.call(command, args, decode, handlers);
        return [client.endpoint.name, result] as const;
    }));
    return new Map(results);
}
