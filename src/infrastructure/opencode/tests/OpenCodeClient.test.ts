import { describe, it, expect } from 'vitest';
import { Response } from 'node-fetch';
import { OpenCodeApiError, OpenCodeClient, type FetchLike } from '../OpenCodeClient.js';

type RecordedRequest = { url: string; method: string; body: unknown };

const json = (value: unknown, status = 200) =>
    new Response(JSON.stringify(value), { status, headers: { 'Content-Type': 'application/json' } });

function createClient(responses: Response[]) {
    const requests: RecordedRequest[] = [];
    const fetchImpl: FetchLike = async (url, init) => {
        requests.push({
            url,
            method: init?.method ?? 'GET',
            body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
        });
        const next = responses.shift();
        if (!next) throw new Error(`No response queued for ${url}`);
        return next;
    };
    const client = new OpenCodeClient({ baseUrl: 'http://localhost:4096/', fetchImpl });
    return { client, requests };
}

describe('OpenCodeClient', () => {
    it('creates a session with a title', async () => {
        const { client, requests } = createClient([json({ id: 'ses_1', title: 'Telegram Chat 42' })]);

        const session = await client.createSession('Telegram Chat 42');

        expect(session.id).toBe('ses_1');
        expect(requests).toEqual([{ url: 'http://localhost:4096/session', method: 'POST', body: { title: 'Telegram Chat 42' } }]);
    });

    it('sends agent and model with the prompt', async () => {
        const { client, requests } = createClient([new Response(null, { status: 204 })]);

        await client.promptAsync('ses_1', 'hi', { agent: 'oracle', providerId: 'anthropic', modelId: 'claude-test' });

        expect(requests[0]).toEqual({
            url: 'http://localhost:4096/session/ses_1/prompt_async',
            method: 'POST',
            body: {
                parts: [{ type: 'text', text: 'hi' }],
                agent: 'oracle',
                model: { providerID: 'anthropic', modelID: 'claude-test' },
            },
        });
    });

    it('leaves out the model unless both parts are set', async () => {
        const { client, requests } = createClient([json({ success: true })]);

        await client.promptAsync('ses_1', 'hi', { agent: '', providerId: 'anthropic', modelId: '' });

        expect(requests[0].body).toEqual({ parts: [{ type: 'text', text: 'hi' }] });
    });

    it('rejects when the server refuses the prompt', async () => {
        const { client } = createClient([json({ success: false })]);

        await expect(client.promptAsync('ses_1', 'hi')).rejects.toThrow('OpenCode rejected the prompt');
    });

    it('raises OpenCodeApiError on unexpected statuses', async () => {
        const { client } = createClient([new Response('boom', { status: 500 })]);

        const error = await client.promptAsync('ses_1', 'hi').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(OpenCodeApiError);
        expect(error).toMatchObject({
            status: 500,
            path: '/session/ses_1/prompt_async',
            body: 'boom',
            message: 'OpenCode /session/ses_1/prompt_async responded with status 500',
        });
    });

    it('encodes session IDs in paths', async () => {
        const { client, requests } = createClient([json({ id: 'a/b', title: 'x' }), new Response(null, { status: 204 })]);

        await client.getSession('a/b');
        await client.deleteSession('a/b');

        expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
            'GET http://localhost:4096/session/a%2Fb',
            'DELETE http://localhost:4096/session/a%2Fb',
        ]);
    });

    it('flattens message parts into history entries', async () => {
        const { client } = createClient([
            json([
                {
                    info: { id: 'm1', sessionID: 'ses_1', role: 'user' },
                    parts: [{ type: 'text', text: 'fix the bug' }],
                },
                {
                    info: { id: 'm2', sessionID: 'ses_1', role: 'assistant', tokens: { total: 120 }, cost: 0.5 },
                    parts: [
                        { type: 'reasoning', text: 'hidden' },
                        { type: 'text', text: 'Done.' },
                        { type: 'text', text: '' },
                        { type: 'text', text: 'Tests pass.' },
                    ],
                },
            ]),
        ]);

        const messages = await client.getMessages('ses_1');

        expect(messages).toEqual([
            { id: 'm1', role: 'user', content: 'fix the bug', tokens: 0, cost: 0 },
            { id: 'm2', role: 'assistant', content: 'Done.\nTests pass.', tokens: 120, cost: 0.5 },
        ]);
    });

    it('lists models of connected providers only', async () => {
        const { client } = createClient([
            json({
                all: [
                    { id: 'anthropic', name: 'Anthropic', models: { 'claude-test': { id: 'claude-test', name: 'Claude Test' } } },
                    { id: 'openai', name: 'OpenAI', models: { 'gpt-test': { id: 'gpt-test', name: 'GPT Test' } } },
                ],
                connected: ['anthropic'],
            }),
        ]);

        expect(await client.listModels()).toEqual([{ providerId: 'anthropic', modelId: 'claude-test', name: 'Claude Test' }]);
    });

    it('fails the health check when the server reports unhealthy', async () => {
        const { client } = createClient([json({ healthy: false, version: '0.0.1' })]);

        await expect(client.health()).rejects.toThrow('OpenCode server is not healthy');
    });

    it('returns the diff as text', async () => {
        const { client } = createClient([new Response('--- a/file.ts\n+++ b/file.ts', { status: 200 })]);

        expect(await client.getDiff('ses_1')).toBe('--- a/file.ts\n+++ b/file.ts');
    });
});
