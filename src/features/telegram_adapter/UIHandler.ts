import TelegramBot from 'node-telegram-bot-api';
import type { AgentCatalog } from '../session/domain/agents.js';
import type { ConversationInfo, ModelChoice } from '../session/ports/IConversationBackend.js';
import { shortId } from '../session/rules/sessionFormat.js';

/** 底部菜单中直接映射为 /new 的按钮 */
export const NEW_CHAT_BUTTON = 'New chat';

export const CALLBACK_SWITCH = 'switch_';
export const CALLBACK_AGENT = 'agent_';
export const CALLBACK_MODEL = 'model_';

/** 注册到 Telegram 的指令 (输入框自动补全) */
export const BOT_COMMANDS: TelegramBot.BotCommand[] = [
    { command: 'start', description: 'Start fresh' },
    { command: 'help', description: 'Show commands' },
    { command: 'new', description: 'New conversation' },
    { command: 'stop', description: 'Stop current operation' },
    { command: 'sessions', description: 'List all sessions' },
    { command: 'switch', description: 'Switch to session' },
    { command: 'rename', description: 'Rename session' },
    { command: 'delete', description: 'Delete session' },
    { command: 'purge', description: 'Delete all sessions' },
    { command: 'agent', description: 'Switch agent' },
    { command: 'model', description: 'Select model' },
    { command: 'diff', description: 'Show file changes' },
    { command: 'history', description: 'Show message history' },
    { command: 'status', description: 'Bot status' },
    { command: 'stats', description: 'Usage statistics' },
    { command: 'clear', description: 'Clear current session' },
    { command: 'think', description: 'Toggle thinking display' },
];

export const START_TEXT = `OpenCode Bot

Connected to OpenCode AI. Conversations preserved!

Commands:
/start - Start fresh
/help - Show commands
/new - New conversation
/sessions - List sessions
/agent - Switch agent
/rename - Rename session
/delete - Delete session
/purge - Delete all sessions
/diff - Show current changes
/history - Show message history
/stop - Stop current operation
/status - Bot status
/stats - Usage statistics
/clear - Clear current session`;

export const HELP_TEXT = `Available Commands

Basic:
/start - Start fresh
/help - Show this help
/new - New conversation
/stop - Stop current operation

Session:
/sessions - List all sessions
/switch <id> - Switch to session
/rename <title> - Rename session
/delete <id> - Delete session
/purge - Delete all sessions

Agent:
/agent - Switch agent
/agent <name> - Set agent directly

Tools:
/diff - Show changes
/history - Show messages
/model - Select model
/model <provider/model> - Set model directly
/think - Toggle thinking display

Info:
/status - Bot status
/stats - Usage statistics
/clear - Clear current session`;

export class UIHandler {
    static createMainMenuKeyboard(): TelegramBot.ReplyKeyboardMarkup {
        return {
            keyboard: [
                [{ text: 'List files' }, { text: 'Docker status' }],
                [{ text: 'System info' }, { text: NEW_CHAT_BUTTON }],
            ],
            resize_keyboard: true,
            one_time_keyboard: false,
        };
    }

    static createSessionsKeyboard(sessions: ConversationInfo[]): TelegramBot.InlineKeyboardMarkup {
        return {
            inline_keyboard: sessions.map((session) => [
                { text: `Switch to ${shortId(session.id)}`, callback_data: `${CALLBACK_SWITCH}${session.id}` },
            ]),
        };
    }

    static createAgentKeyboard(agents: AgentCatalog): TelegramBot.InlineKeyboardMarkup {
        return {
            inline_keyboard: [...agents].map(([name, description]) => [
                { text: `${name} - ${description}`, callback_data: `${CALLBACK_AGENT}${name}` },
            ]),
        };
    }

    static createModelKeyboard(models: ModelChoice[]): TelegramBot.InlineKeyboardMarkup {
        return {
            inline_keyboard: models.map((model) => [
                {
                    text: `${model.name} (${model.providerId})`,
                    callback_data: `${CALLBACK_MODEL}${model.providerId}/${model.modelId}`,
                },
            ]),
        };
    }
}
