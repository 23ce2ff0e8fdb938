import { ContentUnchangedError, type MessageSink } from '../../core/ports/MessageSink.js';

/**
 * relay 用到的 Bot API 子集 (TelegramBot 满足该接口)
 */
export interface TelegramMessageApi {
    sendMessage(chatId: string, text: string): Promise<{ message_id: number }>;
    editMessageText(text: string, options: { chat_id: string; message_id: number }): Promise<unknown>;
}

/**
 * MessageSink 的 Telegram 实现
 */
export class TelegramMessageSink implements MessageSink {
    constructor(private readonly bot: TelegramMessageApi) {}

    async create(chatId: string, text: string): Promise<number> {
        const message = await this.bot.sendMessage(chatId, text);
        return message.message_id;
    }

    async update(chatId: string, messageId: number, text: string): Promise<void> {
        try {
            await this.bot.editMessageText(text, { chat_id: chatId, message_id: messageId });
        } catch (error) {
            if (isNotModifiedError(error)) {
                throw new ContentUnchangedError(undefined, { cause: error });
            }
            throw error;
        }
    }
}

/**
 * Telegram: "Bad Request: message is not modified: ..."
 */
export function isNotModifiedError(error: unknown): boolean {
    return error instanceof Error && error.message.includes('message is not modified');
}
