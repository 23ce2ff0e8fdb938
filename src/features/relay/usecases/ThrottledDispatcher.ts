import { ContentUnchangedError, type MessageSink } from '../../../core/ports/MessageSink.js';
import type { RegistryEntry } from '../domain/RegistryEntry.js';
import { composeDisplay, composeFinalDisplay, DEFAULT_MAX_MESSAGE_LENGTH } from '../rules/displayComposer.js';
import type { SessionRegistry } from './SessionRegistry.js';
import { logger } from '../../../platform/logger.js';

const COMPONENT = 'ThrottledDispatcher';

export interface ThrottledDispatcherOptions {
    /** 两次非强制投递之间的最小间隔 */
    throttleMs: number;
    maxMessageLength?: number;
    /** 时钟，测试时注入 */
    now?: () => number;
}

/**
 * 把 entry 的当前状态投递到 Telegram
 * - emit: 节流投递；节流窗口内或已有投递进行中时直接丢弃 (不排队)
 * - emitFinal: 完成时的强制投递，等待进行中的投递结束后再执行
 *
 * sink 错误只记录日志，不重试，等待下一个状态变化再尝试
 */
export class ThrottledDispatcher {
    private readonly throttleMs: number;
    private readonly maxMessageLength: number;
    private readonly now: () => number;

    constructor(
        private readonly sink: MessageSink,
        private readonly registry: SessionRegistry,
        options: ThrottledDispatcherOptions
    ) {
        this.throttleMs = options.throttleMs;
        this.maxMessageLength = options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH;
        this.now = options.now ?? Date.now;
    }

    async emit(entry: RegistryEntry): Promise<void> {
        if (entry.inFlight) return;
        if (entry.lastEmissionAt !== null && this.now() - entry.lastEmissionAt < this.throttleMs) return;

        const display = composeDisplay(entry.accumulatedText, entry.statusLine, this.maxMessageLength);
        if (!display) return;

        await this.track(entry, this.deliver(entry, display));
    }

    async emitFinal(entry: RegistryEntry): Promise<void> {
        if (entry.inFlight) {
            await entry.inFlight;
        }
        const display = composeFinalDisplay(entry.accumulatedText, this.maxMessageLength);
        await this.track(entry, this.deliver(entry, display));
    }

    private async track(entry: RegistryEntry, delivery: Promise<void>): Promise<void> {
        entry.inFlight = delivery;
        try {
            await delivery;
        } finally {
            if (entry.inFlight === delivery) {
                entry.inFlight = null;
            }
        }
    }

    private async deliver(entry: RegistryEntry, text: string): Promise<void> {
        const { chatId, conversationId } = entry;
        try {
            if (entry.messageId === null) {
                entry.messageId = await this.sink.create(chatId, text);
            } else {
                await this.sink.update(chatId, entry.messageId, text);
            }
        } catch (error) {
            if (error instanceof ContentUnchangedError) {
                logger.debug({ kind: 'sys', component: COMPONENT, message: 'Message content unchanged', meta: { conversationId } });
            } else {
                logger.warn({
                    kind: 'sys',
                    component: COMPONENT,
                    message: 'Failed to deliver relay update',
                    error,
                    meta: { conversationId, chatId, messageId: entry.messageId },
                });
                return;
            }
        }

        if (this.registry.isCurrent(entry)) {
            entry.lastEmissionAt = this.now();
        }
    }
}
