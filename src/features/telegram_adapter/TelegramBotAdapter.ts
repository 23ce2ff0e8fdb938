import TelegramBot from 'node-telegram-bot-api';
import type { ChatSession } from '../../core/ports/ChatSessionStore.js';
import type { ChatSessionService } from '../session/usecases/ChatSessionService.js';
import type { HistoryMessage } from '../session/ports/IConversationBackend.js';
import type { StreamRelay } from '../relay/usecases/StreamRelay.js';
import { isAdmin, isAllowed, type RateLimiter } from '../access/rules/accessControl.js';
import { STATUS_THINKING } from '../relay/rules/displayComposer.js';
import { formatDiff, formatHistory, formatSessionList, formatStatus, shortId } from '../session/rules/sessionFormat.js';
import { parseCommand, splitProviderModel, type ParsedCommand } from './commandParser.js';
import {
    BOT_COMMANDS,
    CALLBACK_AGENT,
    CALLBACK_MODEL,
    CALLBACK_SWITCH,
    HELP_TEXT,
    NEW_CHAT_BUTTON,
    START_TEXT,
    UIHandler,
} from './UIHandler.js';
import { proxyUrlOf, type ProxyConfig } from '../../platform/config.js';
import { logger } from '../../platform/logger.js';
import { generateTraceId, runWithTraceId, setChatId } from '../../platform/tracing.js';

const COMPONENT = 'TelegramBot';

const NO_SESSION_TEXT = 'No active session. Send a message first.';
const UNAUTHORIZED_TEXT = 'Unauthorized. You are not allowed to use this bot.';

export interface TelegramBotAdapterDeps {
    sessions: ChatSessionService;
    relay: StreamRelay;
    rateLimiter: RateLimiter;
    allowedUsers: ReadonlySet<string>;
    adminUsers: ReadonlySet<string>;
    /** 进程启动时间 (ms)，/status 显示 uptime */
    startedAt: number;
}

type CommandHandler = (chatId: string, command: ParsedCommand) => Promise<void>;

/** 长轮询断线，node-telegram-bot-api 会自行重试 */
const TRANSIENT_NETWORK_ERRORS = ['ECONNRESET', 'ETIMEDOUT', 'socket disconnected'];

/**
 * 创建 Bot 实例 (Polling 模式，不自动启动)
 */
export function createTelegramBot(token: string, proxy: ProxyConfig | null): TelegramBot {
    const requestOptions = {} as NonNullable<TelegramBot.ConstructorOptions['request']>;
    if (proxy) {
        requestOptions.proxy = proxyUrlOf(proxy);
        logger.info({ kind: 'sys', component: COMPONENT, message: `Using proxy: ${requestOptions.proxy}` });
    }

    const bot = new TelegramBot(token, {
        polling: { autoStart: false }, // 完全由 start() 控制
        request: requestOptions,
    });

    // 必须在 startPolling 之前挂上，否则 polling 异常会成为未处理的 error 事件
    bot.on('polling_error', (error) => {
        const transient = TRANSIENT_NETWORK_ERRORS.some((marker) => error.message.includes(marker));
        if (transient) {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Polling hiccup, library will retry', meta: { reason: error.message } });
        } else {
            logger.error({ kind: 'sys', component: COMPONENT, message: 'Polling failed', error });
        }
    });

    bot.on('error', (error) => {
        logger.error({ kind: 'sys', component: COMPONENT, message: 'Bot emitted error', error });
    });

    return bot;
}

/**
 * Telegram 入口：消息与按钮回调在这里完成鉴权、限流和指令分发。
 * 普通文本转给 ChatSessionService.sendPrompt，流式回复由 StreamRelay 编辑到占位消息上。
 */
export class TelegramBotAdapter {
    private isPolling: boolean = false;
    /** message_id 只在单个 chat 内唯一，key 为 chatId:messageId */
    private processedMessageIds: Set<string> = new Set();
    private readonly MAX_PROCESSED_IDS = 1000;
    private readonly commands: Map<string, CommandHandler>;

    constructor(
        private readonly bot: TelegramBot,
        private readonly deps: TelegramBotAdapterDeps
    ) {
        this.commands = new Map<string, CommandHandler>([
            ['/start', (chatId) => this._handleStart(chatId)],
            ['/help', (chatId) => this.reply(chatId, HELP_TEXT)],
            ['/new', (chatId) => this._handleNew(chatId)],
            ['/stop', (chatId) => this._handleStop(chatId)],
            ['/clear', (chatId) => this._handleClear(chatId)],
            ['/status', (chatId) => this._handleStatus(chatId)],
            ['/stats', (chatId) => this._handleStats(chatId)],
            ['/sessions', (chatId) => this._handleSessions(chatId)],
            ['/switch', (chatId, command) => this._handleSwitch(chatId, command)],
            ['/rename', (chatId, command) => this._handleRename(chatId, command)],
            ['/delete', (chatId, command) => this._handleDelete(chatId, command)],
            ['/purge', (chatId) => this._handlePurge(chatId)],
            ['/diff', (chatId) => this._handleDiff(chatId)],
            ['/history', (chatId) => this._handleHistory(chatId)],
            ['/model', (chatId, command) => this._handleModel(chatId, command)],
            ['/think', (chatId) => this.reply(chatId, 'Thinking display: ON')],
            ['/agent', (chatId, command) => this._handleAgent(chatId, command)],
        ]);
    }

    /** 注册监听器与指令菜单，然后开始长轮询；重复调用无效 */
    async start(): Promise<void> {
        if (this.isPolling) {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'start() called while polling' });
            return;
        }

        this.bot.on('message', (msg) => {
            this._handleMessage(msg).catch((error: unknown) => {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Unhandled message error', error });
            });
        });
        this.bot.on('callback_query', (query) => {
            this._handleCallbackQuery(query).catch((error: unknown) => {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Unhandled callback error', error });
            });
        });

        await this.registerCommands();

        await this.bot.startPolling({
            restart: true,
            polling: {
                params: {
                    timeout: 10, // 长轮询超时 (秒)
                },
            },
        });
        this.isPolling = true;
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Polling Telegram updates' });
    }

    async stop(): Promise<void> {
        if (!this.isPolling) return;
        this.isPolling = false;
        await this.bot.stopPolling();
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Polling stopped' });
    }

    private async registerCommands(): Promise<void> {
        try {
            await this.bot.setMyCommands(BOT_COMMANDS);
            logger.info({ kind: 'sys', component: COMPONENT, message: 'Bot commands registered', meta: { count: BOT_COMMANDS.length } });
        } catch (error) {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Failed to register bot commands', error });
        }
    }

    /**
     * 核心消息处理器
     * 使用 runWithTraceId 包裹，实现全链路追踪
     */
    private async _handleMessage(msg: TelegramBot.Message): Promise<void> {
        const chatId = msg.chat.id.toString();
        const text = msg.text;
        const messageId = msg.message_id;

        await runWithTraceId(generateTraceId(), async () => {
            setChatId(chatId);

            // 去重 (polling 重启时可能收到重复更新)
            const dedupeKey = `${chatId}:${messageId}`;
            if (this.processedMessageIds.has(dedupeKey)) {
                logger.debug({ kind: 'sys', component: COMPONENT, message: 'Ignoring duplicate message', meta: { messageId } });
                return;
            }
            this.rememberMessageId(dedupeKey);

            if (!text) return;

            logger.info({
                kind: 'sys',
                component: COMPONENT,
                message: 'Message received',
                meta: { text: text.slice(0, 100), messageId },
            });

            if (!isAllowed(chatId, this.deps.allowedUsers)) {
                await this.reply(chatId, UNAUTHORIZED_TEXT);
                return;
            }

            try {
                const command = parseCommand(text);
                if (command) {
                    await this._handleCommand(chatId, command);
                } else if (text === NEW_CHAT_BUTTON) {
                    await this._handleNew(chatId);
                } else {
                    await this._handlePrompt(chatId, text);
                }
            } catch (error) {
                logger.error({
                    kind: 'sys',
                    component: COMPONENT,
                    message: 'Error handling message',
                    error,
                    meta: { text: text.slice(0, 50) },
                });
                await this.reply(chatId, 'Sorry, something went wrong. Please try again.').catch((replyError: unknown) => {
                    logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to send error reply', error: replyError });
                });
            }
        });
    }

    private rememberMessageId(key: string): void {
        this.processedMessageIds.add(key);
        if (this.processedMessageIds.size <= this.MAX_PROCESSED_IDS) return;

        // Set 保持插入顺序，删掉最早的 100 个
        const iterator = this.processedMessageIds.values();
        for (let i = 0; i < 100; i++) {
            const next = iterator.next();
            if (next.done) break;
            this.processedMessageIds.delete(next.value);
        }
    }

    /**
     * 指令路由器
     */
    private async _handleCommand(chatId: string, command: ParsedCommand): Promise<void> {
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Command received', meta: { command: command.command } });

        const handler = this.commands.get(command.command);
        if (!handler) {
            logger.debug({ kind: 'biz', component: COMPONENT, message: 'Unknown command', meta: { command: command.command } });
            await this.reply(chatId, 'Unknown command. Send /help to see available commands.');
            return;
        }
        await handler(chatId, command);
    }

    /**
     * 普通文本：限流 -> 确保会话 -> 占位消息 -> 注册 relay -> 异步提交
     */
    private async _handlePrompt(chatId: string, text: string): Promise<void> {
        if (!this.deps.rateLimiter.tryAcquire(chatId)) {
            await this.reply(chatId, 'Please wait a moment before sending another message...');
            return;
        }

        await this.bot.sendChatAction(chatId, 'typing').catch((error: unknown) => {
            logger.debug({ kind: 'sys', component: COMPONENT, message: 'sendChatAction failed', error });
        });

        let session: ChatSession;
        try {
            session = await this.deps.sessions.ensureSession(chatId);
        } catch (error) {
            logger.error({ kind: 'biz', component: COMPONENT, message: 'Failed to create session', error });
            await this.reply(chatId, `Failed to create session: ${errorMessage(error)}`);
            return;
        }

        const placeholder = await this.bot.sendMessage(chatId, STATUS_THINKING);
        this.deps.relay.register(session.sessionId, chatId, placeholder.message_id);

        try {
            await this.deps.sessions.prompt(session, text);
            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Prompt submitted',
                meta: { sessionId: session.sessionId, agent: session.agent, length: text.length },
            });
        } catch (error) {
            logger.error({ kind: 'biz', component: COMPONENT, message: 'Error sending prompt', error, meta: { sessionId: session.sessionId } });
            this.deps.relay.unregister(session.sessionId);
            await this.bot
                .editMessageText(`Error: ${errorMessage(error)}`, { chat_id: chatId, message_id: placeholder.message_id })
                .catch((editError: unknown) => {
                    logger.warn({ kind: 'sys', component: COMPONENT, message: 'Failed to show prompt error', error: editError });
                });
        }
    }

    // ============ 基础指令 ============

    private async _handleStart(chatId: string): Promise<void> {
        await this.deps.sessions.startFresh(chatId);
        await this.bot.sendMessage(chatId, START_TEXT, { reply_markup: UIHandler.createMainMenuKeyboard() });
    }

    private async _handleNew(chatId: string): Promise<void> {
        await this.deps.sessions.startFresh(chatId);
        await this.reply(chatId, 'New conversation started!');
    }

    private async _handleStop(chatId: string): Promise<void> {
        try {
            await this.deps.sessions.abortCurrent(chatId);
        } catch (error) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Abort failed', error });
            await this.reply(chatId, 'Error stopping operation');
            return;
        }
        await this.reply(chatId, 'Stopped');
    }

    private async _handleClear(chatId: string): Promise<void> {
        await this.deps.sessions.clear(chatId);
        await this.reply(chatId, 'Data cleared!');
    }

    private async _handleStatus(chatId: string): Promise<void> {
        const session = await this.deps.sessions.getStatus(chatId);
        const uptimeMs = Date.now() - this.deps.startedAt;
        await this.reply(chatId, formatStatus(uptimeMs, this.deps.relay.activeCount(), session));
    }

    private async _handleStats(chatId: string): Promise<void> {
        const stats = await this.deps.sessions.getStats();
        await this.reply(chatId, `Statistics\n\nTotal messages: ${stats.totalMessages}\nActive sessions: ${stats.sessions}`);
    }

    // ============ 会话指令 ============

    private async _handleSessions(chatId: string): Promise<void> {
        const listing = await this.deps.sessions.listSessions(chatId);
        if (listing.total === 0) {
            await this.reply(chatId, 'No sessions found');
            return;
        }
        await this.bot.sendMessage(chatId, formatSessionList(listing.shown, listing.total, listing.activeId), {
            reply_markup: UIHandler.createSessionsKeyboard(listing.shown),
        });
    }

    private async _handleSwitch(chatId: string, command: ParsedCommand): Promise<void> {
        const sessionId = command.args[0];
        if (!sessionId) {
            await this.reply(chatId, 'Usage: /switch <session_id>');
            return;
        }
        const switched = await this.deps.sessions.switchSession(chatId, sessionId);
        await this.reply(chatId, switched ? `Switched to session: ${shortId(sessionId)}` : 'Session not found');
    }

    private async _handleRename(chatId: string, command: ParsedCommand): Promise<void> {
        if (!command.rest) {
            await this.reply(chatId, 'Usage: /rename <new title>');
            return;
        }
        try {
            const renamed = await this.deps.sessions.renameCurrent(chatId, command.rest);
            await this.reply(chatId, renamed ? `Session renamed to: ${command.rest}` : NO_SESSION_TEXT);
        } catch (error) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Rename failed', error });
            await this.reply(chatId, 'Failed to rename session');
        }
    }

    private async _handleDelete(chatId: string, command: ParsedCommand): Promise<void> {
        let deleted: string | null;
        try {
            deleted = await this.deps.sessions.deleteSession(chatId, command.args[0]);
        } catch (error) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Delete failed', error });
            await this.reply(chatId, 'Failed to delete session');
            return;
        }
        await this.reply(chatId, deleted ? `Deleted session: ${shortId(deleted)}` : 'No active session to delete');
    }

    private async _handlePurge(chatId: string): Promise<void> {
        if (!isAdmin(chatId, this.deps.adminUsers)) {
            await this.reply(chatId, 'Admin only command');
            return;
        }
        const result = await this.deps.sessions.purgeAll();
        const suffix = result.failed > 0 ? ` (${result.failed} could not be deleted)` : '';
        await this.reply(chatId, `All sessions purged!${suffix}`);
    }

    private async _handleDiff(chatId: string): Promise<void> {
        let diff: string | null;
        try {
            diff = await this.deps.sessions.getDiff(chatId);
        } catch (error) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Diff failed', error });
            await this.reply(chatId, 'Failed to get diff');
            return;
        }
        await this.reply(chatId, diff === null ? NO_SESSION_TEXT : formatDiff(diff));
    }

    private async _handleHistory(chatId: string): Promise<void> {
        let messages: HistoryMessage[] | null;
        try {
            messages = await this.deps.sessions.getHistory(chatId);
        } catch (error) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'History failed', error });
            await this.reply(chatId, 'Failed to get history');
            return;
        }
        if (messages === null) {
            await this.reply(chatId, NO_SESSION_TEXT);
        } else if (messages.length === 0) {
            await this.reply(chatId, 'No messages yet');
        } else {
            await this.reply(chatId, formatHistory(messages));
        }
    }

    // ============ 偏好指令 ============

    private async _handleModel(chatId: string, command: ParsedCommand): Promise<void> {
        const { sessions } = this.deps;

        if (command.args.length > 0) {
            const parsed = splitProviderModel(command.args[0]);
            if (!parsed) {
                await this.reply(chatId, 'Invalid format. Use /model provider/model (e.g., /model openai/gpt-4)');
                return;
            }
            const [providerId, modelId] = parsed;
            await sessions.setModel(chatId, providerId, modelId);
            await this.reply(chatId, `Model set to: ${sessions.modelDisplayName(providerId, modelId)}`);
            return;
        }

        let models = sessions.availableModels();
        if (models.length === 0) {
            try {
                models = await sessions.refreshModels();
            } catch (error) {
                logger.warn({ kind: 'biz', component: COMPONENT, message: 'Model list refresh failed', error });
            }
        }
        if (models.length === 0) {
            await this.reply(chatId, 'No providers available. Check OpenCode server connection.');
            return;
        }
        await this.bot.sendMessage(chatId, 'Select a model:', { reply_markup: UIHandler.createModelKeyboard(models) });
    }

    private async _handleAgent(chatId: string, command: ParsedCommand): Promise<void> {
        const agents = this.deps.sessions.agentCatalog();
        const name = command.args[0];

        if (!name) {
            await this.bot.sendMessage(chatId, 'Select an agent:', { reply_markup: UIHandler.createAgentKeyboard(agents) });
            return;
        }
        if (!(await this.deps.sessions.setAgent(chatId, name))) {
            await this.reply(chatId, `Unknown agent: ${name}`);
            return;
        }
        await this.reply(chatId, `Agent set to: ${name} (${agents.get(name) ?? name})`);
    }

    // ============ 按钮回调 ============

    private async _handleCallbackQuery(query: TelegramBot.CallbackQuery): Promise<void> {
        const data = query.data;
        const message = query.message;
        if (!data || !message) return;
        const chatId = message.chat.id.toString();

        await runWithTraceId(generateTraceId(), async () => {
            setChatId(chatId);
            logger.info({ kind: 'biz', component: COMPONENT, message: 'Callback received', meta: { data } });

            if (!isAllowed(chatId, this.deps.allowedUsers)) {
                await this.bot.answerCallbackQuery(query.id, { text: 'Unauthorized' });
                return;
            }

            try {
                if (data.startsWith(CALLBACK_SWITCH)) {
                    await this._handleSwitchCallback(query, message, data.slice(CALLBACK_SWITCH.length));
                } else if (data.startsWith(CALLBACK_AGENT)) {
                    await this._handleAgentCallback(query, message, data.slice(CALLBACK_AGENT.length));
                } else if (data.startsWith(CALLBACK_MODEL)) {
                    await this._handleModelCallback(query, message, data.slice(CALLBACK_MODEL.length));
                } else {
                    await this.bot.answerCallbackQuery(query.id);
                }
            } catch (error) {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Callback handling error', error });
                await this.bot.answerCallbackQuery(query.id, { text: 'Action failed, please retry' }).catch((answerError: unknown) => {
                    logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to answer callback', error: answerError });
                });
            }
        });
    }

    private async _handleSwitchCallback(query: TelegramBot.CallbackQuery, message: TelegramBot.Message, sessionId: string): Promise<void> {
        const chatId = message.chat.id.toString();
        if (!(await this.deps.sessions.switchSession(chatId, sessionId))) {
            await this.bot.answerCallbackQuery(query.id, { text: 'Session not found' });
            return;
        }
        await this.bot.answerCallbackQuery(query.id, { text: `Switched to ${shortId(sessionId)}` });
        await this.editCallbackMessage(message, `Switched to session: ${shortId(sessionId)}`);
    }

    private async _handleAgentCallback(query: TelegramBot.CallbackQuery, message: TelegramBot.Message, agent: string): Promise<void> {
        const chatId = message.chat.id.toString();
        if (!(await this.deps.sessions.setAgent(chatId, agent))) {
            await this.bot.answerCallbackQuery(query.id, { text: 'Unknown agent' });
            return;
        }
        const description = this.deps.sessions.agentCatalog().get(agent) ?? agent;
        await this.bot.answerCallbackQuery(query.id, { text: `Agent: ${agent}` });
        await this.editCallbackMessage(message, `Agent set to: ${agent} (${description})`);
    }

    private async _handleModelCallback(query: TelegramBot.CallbackQuery, message: TelegramBot.Message, payload: string): Promise<void> {
        const parsed = splitProviderModel(payload);
        if (!parsed) {
            await this.bot.answerCallbackQuery(query.id, { text: 'Invalid model' });
            return;
        }
        const [providerId, modelId] = parsed;
        const chatId = message.chat.id.toString();
        await this.deps.sessions.setModel(chatId, providerId, modelId);
        await this.bot.answerCallbackQuery(query.id, { text: `Model: ${modelId}` });
        await this.editCallbackMessage(message, `Model set to: ${this.deps.sessions.modelDisplayName(providerId, modelId)}`);
    }

    // ============ 工具 ============

    private async reply(chatId: string, text: string): Promise<void> {
        await this.bot.sendMessage(chatId, text);
    }

    private async editCallbackMessage(message: TelegramBot.Message, text: string): Promise<void> {
        await this.bot.editMessageText(text, { chat_id: message.chat.id, message_id: message.message_id });
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
