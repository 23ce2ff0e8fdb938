import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Server } from 'node:http';
import { Readable } from 'node:stream';
import {
    EventStreamConnection,
    StreamCancelledError,
    type EventStreamFetch,
    type EventStreamResponse,
} from '../EventStreamConnection.js';

const streamResponse = (chunks: Array<string | Buffer>): EventStreamResponse => ({
    ok: true,
    status: 200,
    body: Readable.from(chunks),
});

describe('EventStreamConnection', () => {
    it('delivers framed payloads and stops once aborted', async () => {
        const controller = new AbortController();
        const payloads: string[] = [];
        const requests: Array<{ url: string; headers: Record<string, string> }> = [];

        const fetchImpl: EventStreamFetch = async (url, init) => {
            requests.push({ url, headers: init.headers });
            return streamResponse(['data: {"a":1}\n\n', Buffer.from('data: {"b"'), ':2}\n\n']);
        };
        const connection = new EventStreamConnection({
            baseUrl: 'http://127.0.0.1:4096/',
            reconnectDelayMs: 10,
            fetchImpl,
            onPayload: (payload) => {
                payloads.push(payload);
                if (payloads.length === 2) controller.abort();
            },
        });

        await expect(connection.run(controller.signal)).rejects.toBeInstanceOf(StreamCancelledError);
        expect(payloads).toEqual(['{"a":1}', '{"b":2}']);
        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe('http://127.0.0.1:4096/event');
        expect(requests[0].headers.Accept).toBe('text/event-stream');
    });

    it('reconnects after a failed connection attempt', async () => {
        const controller = new AbortController();
        const payloads: string[] = [];
        let attempts = 0;

        const fetchImpl: EventStreamFetch = async () => {
            attempts += 1;
            if (attempts === 1) {
                return { ok: false, status: 503, body: null };
            }
            return streamResponse(['data: hello\n\n']);
        };
        const connection = new EventStreamConnection({
            baseUrl: 'http://127.0.0.1:4096',
            reconnectDelayMs: 1,
            fetchImpl,
            onPayload: (payload) => {
                payloads.push(payload);
                controller.abort();
            },
        });

        await expect(connection.run(controller.signal)).rejects.toBeInstanceOf(StreamCancelledError);
        expect(attempts).toBe(2);
        expect(payloads).toEqual(['hello']);
    });

    it('reconnects after the server closes the stream', async () => {
        const controller = new AbortController();
        const payloads: string[] = [];
        let attempts = 0;

        const fetchImpl: EventStreamFetch = async () => {
            attempts += 1;
            return streamResponse([`data: attempt-${attempts}\n\n`]);
        };
        const connection = new EventStreamConnection({
            baseUrl: 'http://127.0.0.1:4096',
            reconnectDelayMs: 1,
            fetchImpl,
            onPayload: (payload) => {
                payloads.push(payload);
                if (payloads.length === 2) controller.abort();
            },
        });

        await expect(connection.run(controller.signal)).rejects.toBeInstanceOf(StreamCancelledError);
        expect(payloads).toEqual(['attempt-1', 'attempt-2']);
    });

    it('flushes a trailing event without a blank line', async () => {
        const controller = new AbortController();
        const payloads: string[] = [];

        const connection = new EventStreamConnection({
            baseUrl: 'http://127.0.0.1:4096',
            fetchImpl: async () => streamResponse(['data: tail']),
            onPayload: (payload) => {
                payloads.push(payload);
                controller.abort();
            },
        });

        await expect(connection.run(controller.signal)).rejects.toBeInstanceOf(StreamCancelledError);
        expect(payloads).toEqual(['tail']);
    });

    it('does not connect when already cancelled', async () => {
        const controller = new AbortController();
        controller.abort();
        let attempts = 0;

        const connection = new EventStreamConnection({
            baseUrl: 'http://127.0.0.1:4096',
            fetchImpl: async () => {
                attempts += 1;
                return streamResponse([]);
            },
            onPayload: () => undefined,
        });

        await expect(connection.run(controller.signal)).rejects.toBeInstanceOf(StreamCancelledError);
        expect(attempts).toBe(0);
    });

    it('keeps the transport error as the cause when cancelled mid-request', async () => {
        const controller = new AbortController();
        const failure = new Error('The operation was aborted');

        const connection = new EventStreamConnection({
            baseUrl: 'http://127.0.0.1:4096',
            fetchImpl: async () => {
                controller.abort();
                throw failure;
            },
            onPayload: () => undefined,
        });

        await expect(connection.run(controller.signal)).rejects.toMatchObject({
            name: 'StreamCancelledError',
            cause: failure,
        });
    });
});

describe('EventStreamConnection over an open HTTP stream', () => {
    let server: Server;
    let baseUrl: string;

    beforeEach(async () => {
        // 写出一帧后保持连接，不结束响应
        server = createServer((_req, res) => {
            res.writeHead(200, { 'Content-Type': 'text/event-stream' });
            res.write('data: {"first":true}\n\n');
        });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('test server has no port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    });

    it('abort ends a read that is waiting for the next chunk', async () => {
        const controller = new AbortController();
        const payloads: string[] = [];
        const connection = new EventStreamConnection({
            baseUrl,
            reconnectDelayMs: 10,
            onPayload: (payload) => {
                payloads.push(payload);
                setTimeout(() => controller.abort(), 50);
            },
        });

        const startedAt = Date.now();
        await expect(connection.run(controller.signal)).rejects.toBeInstanceOf(StreamCancelledError);
        expect(payloads).toEqual(['{"first":true}']);
        expect(Date.now() - startedAt).toBeLessThan(2000);
    });
});
