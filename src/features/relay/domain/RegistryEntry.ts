/**
 * 一个正在生成回复的 OpenCode 会话在 Telegram 侧的投递状态
 */
export interface RegistryEntry {
    conversationId: string;
    chatId: string;
    /** 注册时所在请求的 trace ID，relay 日志沿用它 */
    traceId: string;
    /** 占位消息 ID；首次投递前可能为空 */
    messageId: number | null;
    /** 已组装的可见文本，只会被整体替换或追加 */
    accumulatedText: string;
    /** 短暂状态提示 ("Thinking..." 等)，追加可见文本时清空 */
    statusLine: string;
    activeTextPartId: string;
    /** reasoning 等不可见 part，其 delta 一律丢弃 */
    auxiliaryPartIds: Set<string>;
    /** 上一次成功投递的时间 (ms)，null 表示尚未投递 */
    lastEmissionAt: number | null;
    /** 正在进行中的投递 */
    inFlight: Promise<void> | null;
}

export function createRegistryEntry(
    conversationId: string,
    chatId: string,
    messageId: number | null,
    traceId: string
): RegistryEntry {
    return {
        conversationId,
        chatId,
        traceId,
        messageId,
        accumulatedText: '',
        statusLine: '',
        activeTextPartId: '',
        auxiliaryPartIds: new Set(),
        lastEmissionAt: null,
        inFlight: null,
    };
}
