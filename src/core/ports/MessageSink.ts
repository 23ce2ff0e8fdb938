/**
 * 投递目标 (Telegram 消息) 的能力声明
 * relay 只依赖这个接口，不关心具体的 Bot 库
 */
export interface MessageSink {
    /**
     * 发送一条新消息
     * @returns 新消息的 message ID
     */
    create(chatId: string, text: string): Promise<number>;

    /**
     * 编辑已有消息
     * 内容未变化时应抛出 ContentUnchangedError
     */
    update(chatId: string, messageId: number, text: string): Promise<void>;
}

/**
 * 目标内容与要写入的内容相同 (Telegram: "message is not modified")
 * relay 视为成功的空操作
 */
export class ContentUnchangedError extends Error {
    constructor(message = 'Message content is unchanged', options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ContentUnchangedError';
    }
}
