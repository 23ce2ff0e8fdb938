/**
 * Session Usecase 对 OpenCode 的依赖 (Port)
 * 实现: infrastructure/opencode/OpenCodeClient
 */

export interface ConversationInfo {
    id: string;
    title: string;
}

/** 展示用的简化消息 */
export interface HistoryMessage {
    id: string;
    role: string;
    content: string;
    tokens: number;
    cost: number;
}

export interface PromptOptions {
    agent?: string;
    providerId?: string;
    modelId?: string;
}

export interface ModelChoice {
    providerId: string;
    modelId: string;
    name: string;
}

export interface IConversationBackend {
    createSession(title: string): Promise<ConversationInfo>;
    listSessions(): Promise<ConversationInfo[]>;
    getSession(id: string): Promise<ConversationInfo>;
    deleteSession(id: string): Promise<void>;
    renameSession(id: string, title: string): Promise<ConversationInfo>;
    getMessages(id: string): Promise<HistoryMessage[]>;
    promptAsync(id: string, text: string, options?: PromptOptions): Promise<void>;
    abort(id: string): Promise<void>;
    getDiff(id: string): Promise<string>;
    /** 已连接 provider 下的全部模型 */
    listModels(): Promise<ModelChoice[]>;
}
