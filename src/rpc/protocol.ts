/**
 * Line protocol between the comparing process and a worker.
 *
 *   request:  "<command> <json args>" then the client half-closes
 *   response: the JSON envelope split into numbered, newline-terminated
 *             fragments ("<n> <text>"), then a line reading exactly "OK"
 *
 * The envelope is {"answer": value} or {"error": message}. An empty body
 * (only the "OK" line) stands for `true`.
 */

import { RpcProtocolError } from '../shared/utils/errors.js';
import { Validators } from '../shared/utils/JsonValidator.js';

export const TERMINATOR = 'OK';
export const FRAGMENT_SIZE = 4096;

export type CallResult<T> =
    | { kind: 'ok'; value: T }
    | { kind: 'replay'; token: string }
    | { kind: 'error'; reason: string };

export type Envelope =
    | { answer: unknown }
    | { error: string };

export interface ParsedRequest {
    command: string;
    args: unknown;
}

export function encodeRequest(command: string, args: unknown = {}): string {
    if (!/^[\w-]+$/.test(command)) {
        throw new RpcProtocolError(`invalid command name "${command}"`);
    }
    return `${command} ${JSON.stringify(args)}`;
}

/**
 * @throws RpcProtocolError on a missing command or malformed arguments
 */
export function parseRequest(raw: string): ParsedRequest {
    const text = raw.trim();
    const space = text.indexOf(' ');
    const command = space < 0 ? text : text.slice(0, space);
    const argsText = space < 0 ? '' : text.slice(space + 1).trim();
    if (!command) {
        throw new RpcProtocolError('empty request');
    }
    if (!argsText) {
        return { command, args: {} };
    }
    try {
        return { command, args: JSON.parse(argsText) };
    } catch {
        throw new RpcProtocolError(`malformed arguments for ${command}`);
    }
}

export function encodeResponse(envelope: Envelope | undefined): string {
    if (envelope === undefined) return `${TERMINATOR}\n`;
    const body = JSON.stringify(envelope);
    const lines: string[] = [];
    for (let i = 0; i < body.length; i += FRAGMENT_SIZE) {
        lines.push(`${lines.length + 1} ${body.slice(i, i + FRAGMENT_SIZE)}`);
    }
    lines.push(TERMINATOR);
    return `${lines.join('\n')}\n`;
}

/**
 * Collects response chunks until the terminator line, dropping each
 * fragment's sequence number.
 */
export class ResponseAccumulator {
    private buffer = '';
    private fragments: string[] = [];
    private done = false;

    push(chunk: string): void {
        if (this.done) return;
        this.buffer += chunk;
        const lines = this.buffer.split(/\r?\n/);
        this.buffer = lines.pop() ?? '';
        for (const line of lines) {
            if (line === TERMINATOR) {
                this.done = true;
                return;
            }
            this.fragments.push(line.replace(/^\d+ /, ''));
        }
    }

    get complete(): boolean {
        return this.done;
    }

    get body(): string {
        return this.fragments.join('');
    }
}

/**
 * @throws RpcProtocolError when the body is not a valid envelope
 */
export function decodeEnvelope(body: string): Envelope {
    if (body === '') return { answer: true };
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch {
        throw new RpcProtocolError('answer is not JSON');
    }
    if (Validators.object(parsed)) {
        if (Validators.string(parsed.error)) return { error: parsed.error };
        if ('answer' in parsed) return { answer: parsed.answer };
    }
    throw new RpcProtocolError('answer envelope missing');
}
