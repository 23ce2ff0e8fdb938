/**
 * 请求上下文 (AsyncLocalStorage)
 *
 * 两类入口各自开一个 trace：
 * - Telegram update: 新 traceId，处理过程中 setChatId
 * - relay 投递: 沿用注册时的 traceId，并带上 conversationId
 * logger 从这里读取字段，调用方无需手动传递。
 */

import { AsyncLocalStorage } from 'async_hooks';
import { nanoid } from 'nanoid';

export interface TraceContext {
    traceId: string;
    /** Telegram chat ID */
    chatId?: string;
    /** OpenCode session ID */
    conversationId?: string;
}

const storage = new AsyncLocalStorage<TraceContext>();

/** 12 位 nanoid */
export function generateTraceId(): string {
    return nanoid(12);
}

/**
 * 以完整上下文运行 fn；上下文对象会被复制，fn 内的 setChatId 不影响调用方
 */
export async function runInTrace<T>(context: TraceContext, fn: () => Promise<T>): Promise<T> {
    return storage.run({ ...context }, fn);
}

/**
 * @example
 * await runWithTraceId(generateTraceId(), async () => {
 *     setChatId(chatId);
 *     logger.info({ ... }); // 带上 traceId 与 chatId
 * });
 */
export async function runWithTraceId<T>(traceId: string, fn: () => Promise<T>): Promise<T> {
    return runInTrace({ traceId }, fn);
}

export function getTraceContext(): TraceContext | undefined {
    return storage.getStore();
}

export function getTraceId(): string | undefined {
    return storage.getStore()?.traceId;
}

export function getChatId(): string | undefined {
    return storage.getStore()?.chatId;
}

export function getConversationId(): string | undefined {
    return storage.getStore()?.conversationId;
}

/**
 * 不在 trace 内调用时什么也不做
 */
export function setChatId(chatId: string): void {
    const store = storage.getStore();
    if (store) {
        store.chatId = chatId;
    }
}
