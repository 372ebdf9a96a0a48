import * as net from 'net';
import { StringDecoder } from 'string_decoder';
import type { Logger } from '../core/Logger.js';
import { ContractError, describeError } from '../shared/utils/errors.js';
import { encodeResponse, parseRequest, type Envelope, type ParsedRequest } from './protocol.js';

/** An undefined result is answered with the bare terminator. */
export type CommandHandler = (args: unknown) => Promise<unknown>;
export type CommandTable = Readonly<Record<string, CommandHandler>>;

/**
 * Worker side of the protocol. Requests are handled one at a time in
 * arrival order, since they all drive the same browser session.
 */
export class RpcServer {
    private readonly server: net.Server;
    private queue: Promise<void> = Promise.resolve();

    constructor(
        private readonly commands: CommandTable,
        private readonly logger: Logger
    ) {
        this.server = net.createServer({ allowHalfOpen: true }, socket => this.accept(socket));
    }

    /** Resolves with the bound port (useful with port 0). */
    listen(port: number, host: string): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(port, host, () => {
                this.server.off('error', reject);
                const address = this.server.address();
                const bound = address !== null && typeof address === 'object' ? address.port : port;
                this.logger.info(`👂 Listening on ${host}:${bound}`);
                resolve(bound);
            });
        });
    }

    close(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close(error => (error ? reject(error) : resolve()));
        });
    }

    private accept(socket: net.Socket): void {
        const decoder = new StringDecoder('utf8');
        let raw = '';

        socket.on('data', (chunk: Buffer) => {
            raw += decoder.write(chunk);
        });
        socket.on('error', error => this.logger.warn(`Client socket: ${error.message}`));
        socket.on('end', () => {
            raw += decoder.end();
            this.queue = this.queue
                .then(() => this.respond(socket, raw))
                .catch(error => this.logger.error(`Response failed: ${describeError(error)}`));
        });
    }

    private async respond(socket: net.Socket, raw: string): Promise<void> {
        const envelope = await this.dispatch(raw);
        if (socket.destroyed) {
            this.logger.warn('Client left before the answer was ready');
            return;
        }
        socket.end(encodeResponse(envelope));
    }

    async dispatch(raw: string): Promise<Envelope | undefined> {
        let request: ParsedRequest;
        try {
            request = parseRequest(raw);
        } catch (error) {
            return { error: describeError(error) };
        }

        const handler = Object.hasOwn(this.commands, request.command) ? this.commands[request.command] : undefined;
        if (!handler) {
            this.logger.warn(`Unknown command ${request.command}`);
            return { error: `unknown command ${request.command}` };
        }

        this.logger.verbose(`⇠ ${request.command}`);
        try {
            const answer = await handler(request.args);
            return answer === undefined ? undefined : { answer };
        } catch (error) {
            if (error instanceof ContractError) {
                this.logger.error(`${request.command}: contract violation: ${error.message}`);
            } else {
                this.logger.error(`${request.command}: ${describeError(error)}`);
            }
            return { error: describeError(error) };
        }
    }
}
