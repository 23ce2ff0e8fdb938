import type {
    ConversationInfo,
    HistoryMessage,
    IConversationBackend,
    ModelChoice,
    PromptOptions,
} from '../../ports/IConversationBackend.js';

/**
 * 内存版 OpenCode：会话 ID 依次为 ses_1, ses_2 ...
 */
export class FakeBackend implements IConversationBackend {
    sessions = new Map<string, ConversationInfo>();
    prompts: Array<{ id: string; text: string; options?: PromptOptions }> = [];
    deleted: string[] = [];
    aborted: string[] = [];
    failingDeletes = new Set<string>();
    promptError: Error | null = null;
    history: HistoryMessage[] = [];
    models: ModelChoice[] = [];
    private counter = 0;

    async createSession(title: string): Promise<ConversationInfo> {
        this.counter += 1;
        const session = { id: `ses_${this.counter}`, title };
        this.sessions.set(session.id, session);
        return session;
    }

    async listSessions(): Promise<ConversationInfo[]> {
        return [...this.sessions.values()];
    }

    async getSession(id: string): Promise<ConversationInfo> {
        const session = this.sessions.get(id);
        if (!session) throw new Error(`Session ${id} not found`);
        return session;
    }

    async deleteSession(id: string): Promise<void> {
        if (this.failingDeletes.has(id)) throw new Error(`Cannot delete ${id}`);
        this.deleted.push(id);
        this.sessions.delete(id);
    }

    async renameSession(id: string, title: string): Promise<ConversationInfo> {
        const renamed = { ...(await this.getSession(id)), title };
        this.sessions.set(id, renamed);
        return renamed;
    }

    async getMessages(): Promise<HistoryMessage[]> {
        return this.history;
    }

    async promptAsync(id: string, text: string, options?: PromptOptions): Promise<void> {
        if (this.promptError) throw this.promptError;
        this.prompts.push({ id, text, options });
    }

    async abort(id: string): Promise<void> {
        this.aborted.push(id);
    }

    async getDiff(): Promise<string> {
        return '+added line';
    }

    async listModels(): Promise<ModelChoice[]> {
        return this.models;
    }
}
