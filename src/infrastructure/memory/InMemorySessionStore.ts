import type { ChatSession, ChatSessionStore } from '../../core/ports/ChatSessionStore.js';

/**
 * 进程内存实现：未配置 Upstash 时使用，重启即丢失
 */
export class InMemorySessionStore implements ChatSessionStore {
    private sessions: Map<string, ChatSession> = new Map();

    async get(chatId: string): Promise<ChatSession | null> {
        const session = this.sessions.get(chatId);
        return session ? { ...session } : null;
    }

    async set(session: ChatSession): Promise<void> {
        this.sessions.set(session.chatId, { ...session });
    }

    async delete(chatId: string): Promise<void> {
        this.sessions.delete(chatId);
    }

    async incrementCount(chatId: string, now: number = Date.now()): Promise<void> {
        const session = this.sessions.get(chatId);
        if (!session) return;
        session.messageCount += 1;
        session.lastUsed = now;
    }

    async listAll(): Promise<ChatSession[]> {
        return [...this.sessions.values()]
            .map((session) => ({ ...session }))
            .sort((a, b) => b.lastUsed - a.lastUsed);
    }

    async deleteAll(): Promise<void> {
        this.sessions.clear();
    }
}
