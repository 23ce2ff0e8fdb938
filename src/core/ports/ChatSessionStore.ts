/**
 * Telegram chat -> OpenCode session 的映射记录
 * sessionId 为空表示只保存了 agent / model 偏好，尚未创建会话
 */
export type ChatSession = {
    chatId: string;
    sessionId: string;
    title: string;
    agent: string;
    modelProvider: string;
    modelId: string;
    messageCount: number;
    /** ms */
    createdAt: number;
    /** ms */
    lastUsed: number;
};

export interface ChatSessionStore {
    get(chatId: string): Promise<ChatSession | null>;
    /** upsert */
    set(session: ChatSession): Promise<void>;
    delete(chatId: string): Promise<void>;

    /** messageCount + 1 并刷新 lastUsed；记录不存在时不做任何事 */
    incrementCount(chatId: string, now?: number): Promise<void>;

    /** 按 lastUsed 倒序 */
    listAll(): Promise<ChatSession[]>;
    deleteAll(): Promise<void>;
}

export function emptyChatSession(chatId: string, now: number): ChatSession {
    return {
        chatId,
        sessionId: '',
        title: '',
        agent: '',
        modelProvider: '',
        modelId: '',
        messageCount: 0,
        createdAt: now,
        lastUsed: now,
    };
}
