import type { MessageSink } from '../../../core/ports/MessageSink.js';
import {
    GENERATOR_ROLE,
    type MessageCompletedEvent,
    type PartDeltaEvent,
    type PartSnapshotEvent,
    type RelayEvent,
} from '../domain/RelayEvent.js';
import type { RegistryEntry } from '../domain/RegistryEntry.js';
import { decodeRelayEvent } from '../rules/eventCodec.js';
import { applyPartDelta, applyPartSnapshot } from '../rules/partAssembler.js';
import { SessionRegistry } from './SessionRegistry.js';
import { ThrottledDispatcher, type ThrottledDispatcherOptions } from './ThrottledDispatcher.js';
import { logger } from '../../../platform/logger.js';
import { generateTraceId, getTraceId, runInTrace } from '../../../platform/tracing.js';

const COMPONENT = 'StreamRelay';

export type StreamRelayOptions = ThrottledDispatcherOptions;

/**
 * Layer 2 Usecase: OpenCode 事件 -> Telegram 消息
 * 职责：
 * 1. 维护 conversation -> chat 的注册表 (register / unregister / activeCount)
 * 2. 按 conversationId 路由事件，交给 partAssembler 更新状态
 * 3. 状态变化时节流投递，完成时强制投递并移除 entry
 */
export class StreamRelay {
    private readonly registry = new SessionRegistry();
    private readonly dispatcher: ThrottledDispatcher;
    private readonly pending: Set<Promise<void>> = new Set();

    constructor(sink: MessageSink, options: StreamRelayOptions) {
        this.dispatcher = new ThrottledDispatcher(sink, this.registry, options);
    }

    /**
     * 绑定 conversation 到 chat 的占位消息；已存在时重置状态
     */
    register(conversationId: string, chatId: string, messageId: number | null = null): void {
        const traceId = getTraceId() ?? generateTraceId();
        this.registry.register(conversationId, chatId, messageId, traceId);
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Conversation registered',
            meta: { conversationId, chatId, messageId },
        });
    }

    /**
     * 移除 entry，不做最终投递
     */
    unregister(conversationId: string): void {
        if (this.registry.unregister(conversationId)) {
            logger.info({ kind: 'biz', component: COMPONENT, message: 'Conversation unregistered', meta: { conversationId } });
        }
    }

    activeCount(): number {
        return this.registry.activeCount();
    }

    isTracking(conversationId: string): boolean {
        return this.registry.get(conversationId) !== undefined;
    }

    /**
     * 连接层的回调：解码一帧并处理，投递在后台进行 (见 drain)
     */
    handlePayload(payload: string): void {
        let event: RelayEvent;
        try {
            event = decodeRelayEvent(payload);
        } catch (error) {
            logger.warn({
                kind: 'infra',
                component: COMPONENT,
                message: 'Discarding undecodable event',
                error,
                meta: { payload: payload.slice(0, 200) },
            });
            return;
        }

        const handled = this.handleEvent(event).catch((error: unknown) => {
            logger.error({ kind: 'sys', component: COMPONENT, message: 'Event handling failed', error, meta: { kind: event.kind } });
        });
        this.pending.add(handled);
        void handled.finally(() => this.pending.delete(handled));
    }

    /**
     * 等待所有后台投递完成 (关闭或测试时使用)
     */
    async drain(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.all([...this.pending]);
        }
    }

    async handleEvent(event: RelayEvent): Promise<void> {
        switch (event.kind) {
            case 'part-snapshot':
                return this.onPartSnapshot(event);
            case 'part-delta':
                return this.onPartDelta(event);
            case 'message-completed':
                return this.onMessageCompleted(event);
            case 'ignored':
                return;
            case 'unknown':
                logger.debug({ kind: 'infra', component: COMPONENT, message: 'Unhandled event type', meta: { type: event.type } });
                return;
            case 'malformed':
                logger.debug({
                    kind: 'infra',
                    component: COMPONENT,
                    message: 'Discarding malformed event',
                    meta: { type: event.type, reason: event.reason },
                });
                return;
        }
    }

    private async onPartSnapshot(event: PartSnapshotEvent): Promise<void> {
        const entry = this.registry.get(event.conversationId);
        if (!entry) return;
        if (applyPartSnapshot(entry, event)) {
            await this.inEntryTrace(entry, () => this.dispatcher.emit(entry));
        }
    }

    private async onPartDelta(event: PartDeltaEvent): Promise<void> {
        const entry = this.registry.get(event.conversationId);
        if (!entry) return;
        if (applyPartDelta(entry, event)) {
            await this.inEntryTrace(entry, () => this.dispatcher.emit(entry));
        }
    }

    private async onMessageCompleted(event: MessageCompletedEvent): Promise<void> {
        if (event.role !== GENERATOR_ROLE || !event.finishReason) return;

        // 先移除，之后到达的同一 conversation 事件直接被忽略
        const entry = this.registry.take(event.conversationId);
        if (!entry) return;

        await this.inEntryTrace(entry, async () => {
            await this.dispatcher.emitFinal(entry);
            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Conversation completed',
                meta: { conversationId: entry.conversationId, finishReason: event.finishReason, replyLength: entry.accumulatedText.length },
            });
        });
    }

    private inEntryTrace(entry: RegistryEntry, fn: () => Promise<void>): Promise<void> {
        return runInTrace({ traceId: entry.traceId, chatId: entry.chatId, conversationId: entry.conversationId }, fn);
    }
}
