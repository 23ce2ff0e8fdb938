import fetch from 'node-fetch';
import type { Agent } from 'node:http';
import { setTimeout as delay } from 'node:timers/promises';
import { SseFrameDecoder } from '../../features/relay/rules/eventCodec.js';
import { logger } from '../../platform/logger.js';

const COMPONENT = 'EventStreamConnection';

export const DEFAULT_RECONNECT_DELAY_MS = 2000;

/**
 * 关闭信号触发，run() 以此结束
 */
export class StreamCancelledError extends Error {
    constructor(message = 'Event stream cancelled', options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StreamCancelledError';
    }
}

/**
 * /event 返回非 200
 */
export class EventStreamHttpError extends Error {
    constructor(
        public readonly status: number,
        public readonly url: string
    ) {
        super(`Event stream responded with status ${status}`);
        this.name = 'EventStreamHttpError';
    }
}

export interface EventStreamResponse {
    ok: boolean;
    status: number;
    body: AsyncIterable<Uint8Array | string> | null;
}

export type EventStreamFetch = (
    url: string,
    init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<EventStreamResponse>;

export interface EventStreamConnectionOptions {
    baseUrl: string;
    /** 每个完整 SSE 事件的 data 载荷 */
    onPayload: (payload: string) => void;
    reconnectDelayMs?: number;
    /** 代理 (proxy-agent)，只在默认 fetch 下生效 */
    agent?: Agent;
    /** 测试时注入 */
    fetchImpl?: EventStreamFetch;
}

/**
 * OpenCode 全局事件流 (GET /event) 的长连接
 *
 * 断开后固定间隔重连，直到 signal 被 abort。
 * abort 会销毁响应流，因此阻塞中的读取也会立即结束。
 */
export class EventStreamConnection {
    private readonly url: string;
    private readonly onPayload: (payload: string) => void;
    private readonly reconnectDelayMs: number;
    private readonly fetchImpl: EventStreamFetch;

    constructor(options: EventStreamConnectionOptions) {
        this.url = `${options.baseUrl.replace(/\/+$/, '')}/event`;
        this.onPayload = options.onPayload;
        this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
        const agent = options.agent;
        this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, { ...init, agent }));
    }

    /**
     * 连接 -> 读取 -> 断开 -> 等待 -> 重连，只会以 StreamCancelledError 结束
     */
    async run(signal: AbortSignal): Promise<never> {
        logger.info({ kind: 'infra', component: COMPONENT, message: 'Event stream starting', meta: { url: this.url } });

        for (;;) {
            if (signal.aborted) {
                throw new StreamCancelledError();
            }

            try {
                await this.connectAndRead(signal);
                if (!signal.aborted) {
                    logger.info({ kind: 'infra', component: COMPONENT, message: 'Event stream closed by server', meta: { url: this.url } });
                }
            } catch (error) {
                if (signal.aborted) {
                    throw new StreamCancelledError(undefined, { cause: error });
                }
                logger.warn({
                    kind: 'infra',
                    component: COMPONENT,
                    message: 'Event stream disconnected',
                    error,
                    meta: { url: this.url, retryInMs: this.reconnectDelayMs },
                });
            }

            try {
                await delay(this.reconnectDelayMs, undefined, { signal });
            } catch (error) {
                throw new StreamCancelledError(undefined, { cause: error });
            }
        }
    }

    private async connectAndRead(signal: AbortSignal): Promise<void> {
        const response = await this.fetchImpl(this.url, {
            headers: {
                Accept: 'text/event-stream',
                'Cache-Control': 'no-cache',
                Connection: 'keep-alive',
            },
            signal,
        });

        if (!response.ok) {
            throw new EventStreamHttpError(response.status, this.url);
        }

        logger.info({ kind: 'infra', component: COMPONENT, message: 'Event stream connected', meta: { url: this.url } });

        if (!response.body) return;

        const frames = new SseFrameDecoder();
        const text = new TextDecoder('utf-8');

        for await (const chunk of response.body) {
            const decoded = typeof chunk === 'string' ? chunk : text.decode(chunk, { stream: true });
            for (const payload of frames.push(decoded)) {
                this.onPayload(payload);
            }
        }

        for (const payload of frames.flush()) {
            this.onPayload(payload);
        }
    }
}
