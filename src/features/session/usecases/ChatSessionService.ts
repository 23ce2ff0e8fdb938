import { emptyChatSession, type ChatSession, type ChatSessionStore } from '../../../core/ports/ChatSessionStore.js';
import type {
    ConversationInfo,
    HistoryMessage,
    IConversationBackend,
    ModelChoice,
} from '../ports/IConversationBackend.js';
import type { AgentCatalog } from '../domain/agents.js';
import { MAX_LISTED_SESSIONS } from '../rules/sessionFormat.js';
import { logger } from '../../../platform/logger.js';

const COMPONENT = 'ChatSessionService';

export interface ChatSessionServiceOptions {
    agents: AgentCatalog;
    defaultAgent: string;
    /** 时钟，测试时注入 */
    now?: () => number;
}

export type SessionListing = {
    total: number;
    shown: ConversationInfo[];
    activeId: string;
};

export type UsageStats = {
    totalMessages: number;
    sessions: number;
};

export type PurgeResult = {
    deleted: number;
    failed: number;
};

/**
 * Session Usecase (Layer 2)
 * 职责：
 * 1. 维护 Telegram chat <-> OpenCode session 的映射 (ChatSessionStore)
 * 2. 会话生命周期：创建 / 切换 / 重命名 / 删除 / 清空
 * 3. 每个 chat 的 agent 与 model 偏好
 */
export class ChatSessionService {
    private readonly agents: AgentCatalog;
    private readonly defaultAgent: string;
    private readonly now: () => number;
    private models: ModelChoice[] = [];

    constructor(
        private readonly store: ChatSessionStore,
        private readonly backend: IConversationBackend,
        options: ChatSessionServiceOptions
    ) {
        this.agents = options.agents;
        this.defaultAgent = options.defaultAgent;
        this.now = options.now ?? Date.now;
    }

    // ============ 会话映射 ============

    /**
     * 返回 chat 当前的会话；没有则在 OpenCode 创建一个
     * 已保存的 agent / model 偏好会被保留
     */
    async ensureSession(chatId: string): Promise<ChatSession> {
        const now = this.now();
        const existing = await this.store.get(chatId);

        if (existing && existing.sessionId) {
            await this.store.incrementCount(chatId, now);
            return {
                ...existing,
                agent: existing.agent || this.defaultAgent,
                messageCount: existing.messageCount + 1,
                lastUsed: now,
            };
        }

        const created = await this.backend.createSession(`Telegram Chat ${chatId}`);
        const session: ChatSession = {
            ...(existing ?? emptyChatSession(chatId, now)),
            sessionId: created.id,
            title: created.title,
            agent: existing?.agent || this.defaultAgent,
            messageCount: 1,
            lastUsed: now,
        };
        await this.store.set(session);

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'OpenCode session created',
            meta: { chatId, sessionId: created.id, agent: session.agent },
        });
        return session;
    }

    /**
     * 转发用户消息；回复经事件流异步返回
     */
    async prompt(session: ChatSession, text: string): Promise<void> {
        await this.backend.promptAsync(session.sessionId, text, {
            agent: session.agent,
            providerId: session.modelProvider,
            modelId: session.modelId,
        });
    }

    /**
     * 丢弃映射，下一条消息会新建会话 (OpenCode 侧会话保留)
     */
    async startFresh(chatId: string): Promise<void> {
        await this.store.delete(chatId);
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Session mapping reset', meta: { chatId } });
    }

    /**
     * @returns false 表示 OpenCode 上不存在该会话
     */
    async switchSession(chatId: string, sessionId: string): Promise<boolean> {
        let target: ConversationInfo;
        try {
            target = await this.backend.getSession(sessionId);
        } catch (error) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Switch target lookup failed', error, meta: { chatId, sessionId } });
            return false;
        }

        const now = this.now();
        const existing = await this.store.get(chatId);
        await this.store.set({
            ...(existing ?? emptyChatSession(chatId, now)),
            sessionId: target.id,
            title: target.title,
            messageCount: 0,
            lastUsed: now,
        });
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Session switched', meta: { chatId, sessionId: target.id } });
        return true;
    }

    /**
     * @returns null 表示当前没有会话
     */
    async renameCurrent(chatId: string, title: string): Promise<ConversationInfo | null> {
        const current = await this.store.get(chatId);
        if (!current || !current.sessionId) return null;

        const renamed = await this.backend.renameSession(current.sessionId, title);
        await this.store.set({ ...current, title: renamed.title, lastUsed: this.now() });
        return renamed;
    }

    /**
     * 不传 sessionId 时删除当前会话
     * @returns 被删除的会话 ID；null 表示当前没有会话
     */
    async deleteSession(chatId: string, sessionId?: string): Promise<string | null> {
        const current = await this.store.get(chatId);

        if (!sessionId) {
            if (!current || !current.sessionId) return null;
            try {
                await this.backend.deleteSession(current.sessionId);
            } catch (error) {
                logger.warn({
                    kind: 'biz',
                    component: COMPONENT,
                    message: 'OpenCode session delete failed, dropping mapping anyway',
                    error,
                    meta: { chatId, sessionId: current.sessionId },
                });
            }
            await this.store.delete(chatId);
            return current.sessionId;
        }

        await this.backend.deleteSession(sessionId);
        if (current && current.sessionId === sessionId) {
            await this.store.delete(chatId);
        }
        return sessionId;
    }

    /**
     * 删除映射与对应的 OpenCode 会话
     */
    async clear(chatId: string): Promise<void> {
        const current = await this.store.get(chatId);
        await this.store.delete(chatId);

        if (current && current.sessionId) {
            try {
                await this.backend.deleteSession(current.sessionId);
            } catch (error) {
                logger.warn({
                    kind: 'biz',
                    component: COMPONENT,
                    message: 'OpenCode session delete failed during clear',
                    error,
                    meta: { chatId, sessionId: current.sessionId },
                });
            }
        }
    }

    /**
     * 删除 OpenCode 上的全部会话并清空映射 (管理员)
     */
    async purgeAll(): Promise<PurgeResult> {
        const result: PurgeResult = { deleted: 0, failed: 0 };
        const sessions = await this.backend.listSessions();

        for (const session of sessions) {
            try {
                await this.backend.deleteSession(session.id);
                result.deleted += 1;
            } catch (error) {
                result.failed += 1;
                logger.warn({ kind: 'biz', component: COMPONENT, message: 'Purge: session delete failed', error, meta: { sessionId: session.id } });
            }
        }

        await this.store.deleteAll();
        logger.info({ kind: 'biz', component: COMPONENT, message: 'All sessions purged', meta: result });
        return result;
    }

    /**
     * @returns false 表示当前没有会话
     */
    async abortCurrent(chatId: string): Promise<boolean> {
        const current = await this.store.get(chatId);
        if (!current || !current.sessionId) return false;
        await this.backend.abort(current.sessionId);
        return true;
    }

    async currentSessionId(chatId: string): Promise<string> {
        return (await this.store.get(chatId))?.sessionId ?? '';
    }

    // ============ 偏好 ============

    agentCatalog(): AgentCatalog {
        return this.agents;
    }

    /**
     * @returns false 表示 agent 不在可选列表中
     */
    async setAgent(chatId: string, agent: string): Promise<boolean> {
        if (!this.agents.has(agent)) return false;
        await this.updatePreference(chatId, { agent });
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Agent selected', meta: { chatId, agent } });
        return true;
    }

    async setModel(chatId: string, providerId: string, modelId: string): Promise<void> {
        await this.updatePreference(chatId, { modelProvider: providerId, modelId });
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Model selected', meta: { chatId, providerId, modelId } });
    }

    /**
     * 从 OpenCode 拉取已连接 provider 的模型列表
     */
    async refreshModels(): Promise<ModelChoice[]> {
        this.models = await this.backend.listModels();
        return this.models;
    }

    availableModels(): ModelChoice[] {
        return this.models;
    }

    /**
     * "Claude Sonnet (anthropic)"；未知模型返回 "provider/model"
     */
    modelDisplayName(providerId: string, modelId: string): string {
        const model = this.models.find((choice) => choice.providerId === providerId && choice.modelId === modelId);
        return model ? `${model.name} (${providerId})` : `${providerId}/${modelId}`;
    }

    // ============ 查询 ============

    async getStatus(chatId: string): Promise<ChatSession | null> {
        return this.store.get(chatId);
    }

    async getStats(): Promise<UsageStats> {
        const sessions = await this.store.listAll();
        return {
            totalMessages: sessions.reduce((sum, session) => sum + session.messageCount, 0),
            sessions: sessions.length,
        };
    }

    async listSessions(chatId: string): Promise<SessionListing> {
        const sessions = await this.backend.listSessions();
        return {
            total: sessions.length,
            shown: sessions.slice(0, MAX_LISTED_SESSIONS),
            activeId: await this.currentSessionId(chatId),
        };
    }

    /**
     * @returns null 表示当前没有会话
     */
    async getDiff(chatId: string): Promise<string | null> {
        const sessionId = await this.currentSessionId(chatId);
        return sessionId ? this.backend.getDiff(sessionId) : null;
    }

    /**
     * @returns null 表示当前没有会话
     */
    async getHistory(chatId: string): Promise<HistoryMessage[] | null> {
        const sessionId = await this.currentSessionId(chatId);
        return sessionId ? this.backend.getMessages(sessionId) : null;
    }

    private async updatePreference(
        chatId: string,
        changes: Partial<Pick<ChatSession, 'agent' | 'modelProvider' | 'modelId'>>
    ): Promise<void> {
        const now = this.now();
        const existing = await this.store.get(chatId);
        await this.store.set({ ...(existing ?? emptyChatSession(chatId, now)), ...changes, lastUsed: now });
    }
}
