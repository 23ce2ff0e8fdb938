import { createRegistryEntry, type RegistryEntry } from '../domain/RegistryEntry.js';

/**
 * conversationId -> 投递状态
 *
 * 所有读写都在事件循环的同步片段内完成，不跨 await 持有，
 * 因此不需要额外的锁。同一个 chat 可以同时挂着多个 conversation，
 * 各自编辑自己的占位消息。
 */
export class SessionRegistry {
    private entries: Map<string, RegistryEntry> = new Map();

    /**
     * 创建或重置 entry；不影响其他 conversation
     */
    register(conversationId: string, chatId: string, messageId: number | null, traceId: string): RegistryEntry {
        const entry = createRegistryEntry(conversationId, chatId, messageId, traceId);
        this.entries.set(conversationId, entry);
        return entry;
    }

    unregister(conversationId: string): boolean {
        return this.take(conversationId) !== undefined;
    }

    /**
     * 移除并返回 entry (完成时使用)
     */
    take(conversationId: string): RegistryEntry | undefined {
        const entry = this.entries.get(conversationId);
        if (!entry) return undefined;

        this.entries.delete(conversationId);
        entry.auxiliaryPartIds.clear();
        return entry;
    }

    get(conversationId: string): RegistryEntry | undefined {
        return this.entries.get(conversationId);
    }

    /**
     * entry 是否仍是当前注册的那一个 (未被移除或重新注册替换)
     */
    isCurrent(entry: RegistryEntry): boolean {
        return this.entries.get(entry.conversationId) === entry;
    }

    activeCount(): number {
        return this.entries.size;
    }
}
