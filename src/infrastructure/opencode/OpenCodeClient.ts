import fetch, { type RequestInit, type Response } from 'node-fetch';
import type { Agent } from 'node:http';
import type {
    HistoryMessage,
    IConversationBackend,
    ModelChoice,
    PromptOptions,
} from '../../features/session/ports/IConversationBackend.js';
import type {
    ApiMessage,
    HealthResponse,
    OpenCodeSession,
    ProviderResponse,
    SuccessResponse,
} from './types.js';
import { logger } from '../../platform/logger.js';

const COMPONENT = 'OpenCodeClient';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * OpenCode REST 调用失败 (非预期的 HTTP 状态)
 */
export class OpenCodeApiError extends Error {
    constructor(
        public readonly status: number,
        public readonly path: string,
        public readonly body: string = ''
    ) {
        super(`OpenCode ${path} responded with status ${status}`);
        this.name = 'OpenCodeApiError';
    }
}

export interface OpenCodeClientOptions {
    baseUrl: string;
    requestTimeoutMs?: number;
    agent?: Agent;
    /** 测试时注入 */
    fetchImpl?: FetchLike;
}

/**
 * OpenCode HTTP API 客户端 (非流式部分)
 * 流式事件见 EventStreamConnection
 */
export class OpenCodeClient implements IConversationBackend {
    private readonly baseUrl: string;
    private readonly requestTimeoutMs: number;
    private readonly agent?: Agent;
    private readonly fetchImpl: FetchLike;

    constructor(options: OpenCodeClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
        this.agent = options.agent;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async health(): Promise<HealthResponse> {
        const path = '/global/health';
        const response = await this.request('GET', path);
        const health = await this.expectJson<HealthResponse>(response, path, [200]);
        if (!health.healthy) {
            throw new Error('OpenCode server is not healthy');
        }
        return health;
    }

    async getProviders(): Promise<ProviderResponse> {
        const path = '/provider';
        return this.expectJson<ProviderResponse>(await this.request('GET', path), path, [200]);
    }

    async listModels(): Promise<ModelChoice[]> {
        const { all, connected } = await this.getProviders();
        const connectedIds = new Set(connected);
        const models: ModelChoice[] = [];
        for (const provider of all) {
            if (!connectedIds.has(provider.id)) continue;
            for (const model of Object.values(provider.models ?? {})) {
                models.push({ providerId: provider.id, modelId: model.id, name: model.name });
            }
        }
        return models;
    }

    async createSession(title: string): Promise<OpenCodeSession> {
        const path = '/session';
        const response = await this.request('POST', path, { title });
        return this.expectJson<OpenCodeSession>(response, path, [200, 201]);
    }

    async listSessions(): Promise<OpenCodeSession[]> {
        const path = '/session';
        return this.expectJson<OpenCodeSession[]>(await this.request('GET', path), path, [200]);
    }

    async getSession(id: string): Promise<OpenCodeSession> {
        const path = `/session/${encodeURIComponent(id)}`;
        return this.expectJson<OpenCodeSession>(await this.request('GET', path), path, [200]);
    }

    async deleteSession(id: string): Promise<void> {
        const path = `/session/${encodeURIComponent(id)}`;
        await this.expectStatus(await this.request('DELETE', path), path, [200, 204]);
    }

    async renameSession(id: string, title: string): Promise<OpenCodeSession> {
        const path = `/session/${encodeURIComponent(id)}`;
        const response = await this.request('PATCH', path, { title });
        return this.expectJson<OpenCodeSession>(response, path, [200]);
    }

    /**
     * 历史消息，只保留 text part (以换行拼接)
     */
    async getMessages(id: string): Promise<HistoryMessage[]> {
        const path = `/session/${encodeURIComponent(id)}/message`;
        const apiMessages = await this.expectJson<ApiMessage[]>(await this.request('GET', path), path, [200]);

        return apiMessages.map((message) => ({
            id: message.info.id,
            role: message.info.role,
            content: message.parts
                .filter((part) => part.type === 'text' && part.text)
                .map((part) => part.text)
                .join('\n'),
            tokens: message.info.tokens?.total ?? 0,
            cost: message.info.cost ?? 0,
        }));
    }

    /**
     * 异步提交 prompt，回复通过事件流返回
     */
    async promptAsync(id: string, text: string, options: PromptOptions = {}): Promise<void> {
        const path = `/session/${encodeURIComponent(id)}/prompt_async`;
        const payload: Record<string, unknown> = {
            parts: [{ type: 'text', text }],
        };
        if (options.agent) {
            payload.agent = options.agent;
        }
        if (options.providerId && options.modelId) {
            payload.model = { providerID: options.providerId, modelID: options.modelId };
        }

        const response = await this.request('POST', path, payload);
        if (response.status === 204) return;

        const result = await this.expectJson<SuccessResponse>(response, path, [200, 202]);
        if (!result.success) {
            throw new Error('OpenCode rejected the prompt');
        }
    }

    async abort(id: string): Promise<void> {
        const path = `/session/${encodeURIComponent(id)}/abort`;
        await this.expectStatus(await this.request('POST', path), path, [200, 202]);
    }

    async getDiff(id: string): Promise<string> {
        const path = `/session/${encodeURIComponent(id)}/diff`;
        const response = await this.request('GET', path);
        await this.expectStatus(response, path, [200]);
        return response.text();
    }

    // ============ 内部 ============

    private async request(method: string, path: string, body?: unknown): Promise<Response> {
        const init: RequestInit = {
            method,
            agent: this.agent,
            signal: AbortSignal.timeout(this.requestTimeoutMs),
        };
        if (body !== undefined) {
            init.headers = { 'Content-Type': 'application/json' };
            init.body = JSON.stringify(body);
        }

        const startTime = Date.now();
        const response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
        logger.debug({
            kind: 'infra',
            component: COMPONENT,
            message: 'OpenCode request finished',
            meta: { method, path, status: response.status, durationMs: Date.now() - startTime },
        });
        return response;
    }

    private async expectStatus(response: Response, path: string, accepted: number[]): Promise<void> {
        if (accepted.includes(response.status)) return;
        const text = await response.text();
        throw new OpenCodeApiError(response.status, path, text.slice(0, 500));
    }

    private async expectJson<T>(response: Response, path: string, accepted: number[]): Promise<T> {
        await this.expectStatus(response, path, accepted);
        return (await response.json()) as T;
    }
}
