import { logger } from '../../platform/logger.js';
import type { ChatSession, ChatSessionStore } from '../../core/ports/ChatSessionStore.js';

type UpstashResponse = {
    result?: unknown;
    error?: string;
};

const COMPONENT = 'UpstashSessionStore';

/**
 * Upstash Redis (REST) 实现
 *
 * Key 设计：
 * - {ns}:chat:{chatId}  -> ChatSession JSON
 * - {ns}:chats          -> Set<chatId>，用于 listAll / deleteAll
 */
export class UpstashSessionStore implements ChatSessionStore {
    private readonly baseUrl: string;
    private readonly headers: Record<string, string>;
    private readonly namespace: string;
    private readonly fetchImpl: typeof fetch;

    constructor(params: {
        restUrl: string;
        token: string;
        namespace?: string;
        fetchImpl?: typeof fetch;
    }) {
        const { restUrl, token } = params;
        if (!restUrl || !token) {
            throw new Error('UpstashSessionStore requires non-empty restUrl and token');
        }
        this.baseUrl = restUrl.replace(/\/+$/, '');
        this.headers = {
            Authorization: `Bearer ${token}`,
            'Content-Type': 'application/json',
        };
        this.namespace = params.namespace || 'ocbot';
        this.fetchImpl = params.fetchImpl ?? fetch;
        logger.info({
            kind: 'infra',
            component: COMPONENT,
            message: 'UpstashSessionStore initialized',
            meta: { baseUrl: this.baseUrl, namespace: this.namespace },
        });
    }

    private keyChat(chatId: string): string {
        return `${this.namespace}:chat:${chatId}`;
    }

    private keyChatIndex(): string {
        return `${this.namespace}:chats`;
    }

    private encode(value: string): string {
        return encodeURIComponent(value);
    }

    /**
     * SET 的值放在 body 中，其余命令参数拼在路径上
     */
    private async cmd(command: string, ...args: string[]): Promise<UpstashResponse> {
        let response: Response;

        if (command === 'set') {
            if (args.length < 2) {
                throw new Error('SET requires key and value');
            }
            response = await this.fetchImpl(`${this.baseUrl}/set/${this.encode(args[0])}`, {
                method: 'POST',
                headers: this.headers,
                body: args[1],
            });
        } else {
            let url = `${this.baseUrl}/${command}`;
            if (args.length > 0) {
                url = `${url}/${args.map((value) => this.encode(value)).join('/')}`;
            }
            response = await this.fetchImpl(url, { method: 'POST', headers: this.headers });
        }

        if (!response.ok) {
            const text = await response.text();
            throw new Error(`Upstash error ${response.status}: ${text}`);
        }

        const data = (await response.json()) as UpstashResponse;
        if (data && typeof data === 'object' && data.error) {
            throw new Error(String(data.error));
        }
        return data;
    }

    async get(chatId: string): Promise<ChatSession | null> {
        const result = await this.cmd('get', this.keyChat(chatId));
        const session = decodeChatSession(result.result);
        if (result.result !== null && result.result !== undefined && !session) {
            logger.warn({ kind: 'infra', component: COMPONENT, message: 'Ignoring unreadable session record', meta: { chatId } });
        }
        return session;
    }

    async set(session: ChatSession): Promise<void> {
        await this.cmd('set', this.keyChat(session.chatId), JSON.stringify(session));
        await this.cmd('sadd', this.keyChatIndex(), session.chatId);
    }

    async delete(chatId: string): Promise<void> {
        await this.cmd('del', this.keyChat(chatId));
        await this.cmd('srem', this.keyChatIndex(), chatId);
    }

    async incrementCount(chatId: string, now: number = Date.now()): Promise<void> {
        // 读-改-写，非原子；同一 chat 的消息已由限流串行化
        const session = await this.get(chatId);
        if (!session) return;
        session.messageCount += 1;
        session.lastUsed = now;
        await this.set(session);
    }

    async listAll(): Promise<ChatSession[]> {
        const chatIds = await this.listChatIds();
        const sessions = await Promise.all(chatIds.map((chatId) => this.get(chatId)));
        return sessions
            .filter((session): session is ChatSession => session !== null)
            .sort((a, b) => b.lastUsed - a.lastUsed);
    }

    async deleteAll(): Promise<void> {
        const chatIds = await this.listChatIds();
        const keys = chatIds.map((chatId) => this.keyChat(chatId));
        await this.cmd('del', ...keys, this.keyChatIndex());
        logger.info({ kind: 'infra', component: COMPONENT, message: 'All session records deleted', meta: { count: chatIds.length } });
    }

    private async listChatIds(): Promise<string[]> {
        const result = await this.cmd('smembers', this.keyChatIndex());
        if (!Array.isArray(result.result)) return [];
        return result.result.filter((value): value is string => typeof value === 'string');
    }
}

/**
 * 解析 GET 返回的 JSON 字符串，字段不完整时返回 null
 */
export function decodeChatSession(raw: unknown): ChatSession | null {
    if (typeof raw !== 'string' || raw === '' || raw === 'null') return null;

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return null;

    const record = new Map(Object.entries(parsed));
    const text = (key: string): string => {
        const value = record.get(key);
        return typeof value === 'string' ? value : '';
    };
    const num = (key: string): number => {
        const value = record.get(key);
        return typeof value === 'number' && Number.isFinite(value) ? value : 0;
    };

    const chatId = text('chatId');
    if (!chatId) return null;

    return {
        chatId,
        sessionId: text('sessionId'),
        title: text('title'),
        agent: text('agent'),
        modelProvider: text('modelProvider'),
        modelId: text('modelId'),
        messageCount: num('messageCount'),
        createdAt: num('createdAt'),
        lastUsed: num('lastUsed'),
    };
}
