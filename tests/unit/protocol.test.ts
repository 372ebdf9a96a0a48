import { describe, expect, it } from 'vitest';
import {
    FRAGMENT_SIZE,
    ResponseAccumulator,
    decodeEnvelope,
    encodeRequest,
    encodeResponse,
    parseRequest
} from '../../src/rpc/protocol.js';
import { RpcProtocolError } from '../../src/shared/utils/errors.js';

describe('worker protocol', () => {
    describe('requests', () => {
        it('writes the command then its JSON arguments', () => {
            expect(encodeRequest('ping')).toBe('ping {}');
            expect(encodeRequest('navigate_and_capture', { item: { path: '/' } })).toBe('navigate_and_capture {"item":{"path":"/"}}');
        });

        it('rejects command names with spaces', () => {
            expect(() => encodeRequest('two words')).toThrow(RpcProtocolError);
        });

        it('parses with and without arguments', () => {
            expect(parseRequest('status')).toEqual({ command: 'status', args: {} });
            expect(parseRequest('signature {"a":1}\n')).toEqual({ command: 'signature', args: { a: 1 } });
        });

        it('rejects malformed arguments', () => {
            expect(() => parseRequest('ping {oops')).toThrow('malformed arguments for ping');
            expect(() => parseRequest('   ')).toThrow('empty request');
        });
    });

    describe('responses', () => {
        it('answers an undefined result with the terminator alone', () => {
            expect(encodeResponse(undefined)).toBe('OK\n');
        });

        it('numbers each fragment', () => {
            expect(encodeResponse({ answer: 'x' })).toBe('1 {"answer":"x"}\nOK\n');
        });

        it('splits long bodies and strips only the sequence number', () => {
            const value = `${'a'.repeat(FRAGMENT_SIZE - 11)}7 tail`;
            const lines = encodeResponse({ answer: value }).split('\n');

            expect(lines).toHaveLength(4);
            expect(lines[0]).toBe(`1 {"answer":"${'a'.repeat(FRAGMENT_SIZE - 11)}`);
            expect(lines.slice(1)).toEqual(['2 7 tail"}', 'OK', '']);

            const accumulator = new ResponseAccumulator();
            accumulator.push(lines.join('\n'));
            expect(decodeEnvelope(accumulator.body)).toEqual({ answer: value });
        });

        it('accumulates across chunk boundaries', () => {
            const accumulator = new ResponseAccumulator();
            accumulator.push('1 {"ans');
            accumulator.push('wer":"x"}\nO');
            expect(accumulator.complete).toBe(false);
            accumulator.push('K\n');

            expect(accumulator.complete).toBe(true);
            expect(accumulator.body).toBe('{"answer":"x"}');
        });

        it('ignores anything after the terminator', () => {
            const accumulator = new ResponseAccumulator();
            accumulator.push('OK\n1 {"answer":1}\n');

            expect(accumulator.body).toBe('');
        });
    });

    describe('decodeEnvelope', () => {
        it('treats an empty body as true', () => {
            expect(decodeEnvelope('')).toEqual({ answer: true });
        });

        it('reads answers and errors', () => {
            expect(decodeEnvelope('{"answer":null}')).toEqual({ answer: null });
            expect(decodeEnvelope('{"error":"boom"}')).toEqual({ error: 'boom' });
        });

        it.each([
            ['not json', 'answer is not JSON'],
            ['{"other":1}', 'answer envelope missing'],
            ['[1]', 'answer envelope missing']
        ])('rejects %s', (body, message) => {
            expect(() => decodeEnvelope(body)).toThrow(message);
        });
    });
});
