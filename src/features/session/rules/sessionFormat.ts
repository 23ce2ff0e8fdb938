import type { ChatSession } from '../../../core/ports/ChatSessionStore.js';
import type { ConversationInfo, HistoryMessage } from '../ports/IConversationBackend.js';

/** 一次最多列出的会话数 (避免超出 Telegram 消息长度) */
export const MAX_LISTED_SESSIONS = 20;
export const HISTORY_MESSAGE_COUNT = 10;
export const HISTORY_CONTENT_LENGTH = 200;
export const MAX_REPLY_LENGTH = 4000;

/**
 * 展示用的短 ID: 前 8 位 + "..."
 */
export function shortId(id: string): string {
    return id.length <= 8 ? id : `${id.slice(0, 8)}...`;
}

export function formatSessionList(sessions: ConversationInfo[], total: number, activeId: string): string {
    const lines = sessions.map((session, index) => {
        const title = session.title || 'Untitled';
        const indicator = session.id === activeId ? ' [active]' : '';
        return `${index + 1}. ${shortId(session.id)} - ${title}${indicator}`;
    });
    return [
        `Available Sessions (${total} total, showing first ${sessions.length})`,
        '',
        ...lines,
        '',
        'Use /switch <id> to switch sessions',
    ].join('\n');
}

/**
 * 最近 10 条消息，单条截断到 200 字符，整体不超过 4000
 */
export function formatHistory(messages: HistoryMessage[]): string {
    let text = 'Recent Messages\n\n';
    for (const message of messages.slice(-HISTORY_MESSAGE_COUNT)) {
        const role = message.role || 'user';
        const content =
            message.content.length > HISTORY_CONTENT_LENGTH
                ? `${message.content.slice(0, HISTORY_CONTENT_LENGTH)}...`
                : message.content;
        text += `${role}:\n${content}\n\n`;
    }
    return text.length > MAX_REPLY_LENGTH ? `${text.slice(0, MAX_REPLY_LENGTH)}\n... (truncated)` : text;
}

export function formatDiff(diff: string): string {
    if (!diff) return 'No changes';
    const body = diff.length > MAX_REPLY_LENGTH ? `${diff.slice(0, MAX_REPLY_LENGTH)}\n\n... (truncated)` : diff;
    return `Current Changes\n\n${body}`;
}

/**
 * 3723000 -> "1h 2m 3s"
 */
export function formatUptime(ms: number): string {
    const totalSeconds = Math.round(ms / 1000);
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;
    if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
    if (minutes > 0) return `${minutes}m ${seconds}s`;
    return `${seconds}s`;
}

export function formatStatus(uptimeMs: number, activeStreams: number, session: ChatSession | null): string {
    let text = `Bot Status\n\nUptime: ${formatUptime(uptimeMs)}\nActive streams: ${activeStreams}`;
    if (session) {
        const model =
            session.modelProvider && session.modelId ? `${session.modelId} (${session.modelProvider})` : 'server default';
        text +=
            `\nSession: ${session.sessionId ? shortId(session.sessionId) : 'none'}` +
            `\nModel: ${model}` +
            `\nAgent: ${session.agent || 'default'}` +
            `\nMessages: ${session.messageCount}`;
    }
    return text;
}
