import { ProxyAgent } from 'proxy-agent';
import config, { proxyUrlOf } from './platform/config.js';
import { logger } from './platform/logger.js';
import type { ChatSessionStore } from './core/ports/ChatSessionStore.js';
import { UpstashSessionStore } from './infrastructure/redis/UpstashSessionStore.js';
import { InMemorySessionStore } from './infrastructure/memory/InMemorySessionStore.js';
import { OpenCodeClient } from './infrastructure/opencode/OpenCodeClient.js';
import { EventStreamConnection, StreamCancelledError } from './infrastructure/opencode/EventStreamConnection.js';
import { StreamRelay } from './features/relay/usecases/StreamRelay.js';
import { ChatSessionService } from './features/session/usecases/ChatSessionService.js';
import { resolveAgents } from './features/session/domain/agents.js';
import { RateLimiter } from './features/access/rules/accessControl.js';
import { TelegramMessageSink } from './features/telegram_adapter/TelegramMessageSink.js';
import { TelegramBotAdapter, createTelegramBot } from './features/telegram_adapter/TelegramBotAdapter.js';

const COMPONENT = 'Server';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

/**
 * 配置了代理时，OpenCode 请求同样走代理 (本机地址除外)
 */
function createProxyAgent(): ProxyAgent | undefined {
    if (!config.telegram.proxy) return undefined;
    const proxyUrl = proxyUrlOf(config.telegram.proxy);
    return new ProxyAgent({
        getProxyForUrl: (url: string) => (LOOPBACK_HOSTS.has(new URL(url).hostname) ? '' : proxyUrl),
    });
}

function createSessionStore(): ChatSessionStore {
    if (config.redis.restUrl && config.redis.token) {
        return new UpstashSessionStore({
            restUrl: config.redis.restUrl,
            token: config.redis.token,
            namespace: config.redis.namespace,
        });
    }
    logger.warn({ kind: 'sys', component: COMPONENT, message: 'Upstash not configured, sessions are kept in memory only' });
    return new InMemorySessionStore();
}

async function main(): Promise<void> {
    logger.info({ kind: 'sys', component: COMPONENT, message: '=== OpenCode Telegram Relay ===' });

    if (!config.telegram.token) {
        logger.error({ kind: 'sys', component: COMPONENT, message: 'TELEGRAM_BOT_TOKEN is not set in .env' });
        process.exit(1);
    }

    const agent = createProxyAgent();
    const client = new OpenCodeClient({
        baseUrl: config.opencode.baseUrl,
        requestTimeoutMs: config.opencode.requestTimeoutMs,
        agent,
    });
    const sessions = new ChatSessionService(createSessionStore(), client, {
        agents: resolveAgents(config.agents.raw),
        defaultAgent: config.agents.defaultAgent,
    });

    const bot = createTelegramBot(config.telegram.token, config.telegram.proxy);
    const relay = new StreamRelay(new TelegramMessageSink(bot), {
        throttleMs: config.relay.editThrottleMs,
        maxMessageLength: config.relay.maxMessageLength,
    });
    const connection = new EventStreamConnection({
        baseUrl: config.opencode.baseUrl,
        onPayload: (payload) => relay.handlePayload(payload),
        reconnectDelayMs: config.relay.reconnectDelayMs,
        agent,
    });
    const rateLimiter = new RateLimiter(config.access.rateLimitMs);
    const adapter = new TelegramBotAdapter(bot, {
        sessions,
        relay,
        rateLimiter,
        allowedUsers: config.access.allowedUsers,
        adminUsers: config.access.adminUsers,
        startedAt: Date.now(),
    });

    logger.info({
        kind: 'sys',
        component: COMPONENT,
        message: 'Loaded config',
        meta: {
            opencodeUrl: config.opencode.baseUrl,
            allowedUsers: config.access.allowedUsers.size,
            agents: [...sessions.agentCatalog().keys()],
        },
    });

    try {
        const health = await client.health();
        logger.info({ kind: 'infra', component: COMPONENT, message: 'OpenCode server healthy', meta: { version: health.version } });
    } catch (error) {
        logger.warn({ kind: 'infra', component: COMPONENT, message: 'OpenCode health check failed', error });
    }

    try {
        const models = await sessions.refreshModels();
        logger.info({ kind: 'infra', component: COMPONENT, message: 'Discovered models', meta: { count: models.length } });
    } catch (error) {
        logger.warn({ kind: 'infra', component: COMPONENT, message: 'Could not fetch providers', error });
    }

    rateLimiter.start();

    try {
        await adapter.start();
    } catch (error) {
        logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to start bot', error });
        process.exit(1);
    }

    const controller = new AbortController();
    const relayRun = connection.run(controller.signal).catch((error: unknown) => {
        if (error instanceof StreamCancelledError) {
            logger.info({ kind: 'infra', component: COMPONENT, message: 'Event stream stopped' });
        } else {
            logger.error({ kind: 'infra', component: COMPONENT, message: 'Event stream crashed', error });
        }
    });

    let stopping = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (stopping) return;
        stopping = true;
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Stopping bot...', meta: { signal } });

        controller.abort();
        rateLimiter.stop();
        await adapter.stop();
        await relayRun;
        await relay.drain();
        process.exit(0);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((error: unknown) => {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Shutdown failed', error });
                process.exit(1);
            });
        });
    }

    logger.info({ kind: 'sys', component: COMPONENT, message: 'Bot is running. Press Ctrl+C to stop.' });
}

main().catch((error: unknown) => {
    logger.error({ kind: 'sys', component: COMPONENT, message: 'Fatal startup error', error });
    process.exit(1);
});
