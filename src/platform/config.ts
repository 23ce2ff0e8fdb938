import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface ProxyConfig {
    scheme: string;
    host: string;
    port: number;
}

export interface Config {
    telegram: {
        token: string;
        proxy: ProxyConfig | null;
    };
    opencode: {
        baseUrl: string;
        requestTimeoutMs: number;
    };
    access: {
        allowedUsers: Set<string>;
        adminUsers: Set<string>;
        rateLimitMs: number;
    };
    agents: {
        /** 原始 "name:description,..." 配置，空串表示使用默认 agent 列表 */
        raw: string;
        defaultAgent: string;
    };
    relay: {
        editThrottleMs: number;
        reconnectDelayMs: number;
        maxMessageLength: number;
    };
    logging: {
        level: LogLevel;
        dir: string;
        toFile: boolean;
    };
    redis: {
        restUrl: string;
        token: string;
        namespace: string;
    };
}

/**
 * 解析正整数环境变量，非法值回退到默认值
 */
export function parseIntEnv(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value.trim());
    return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export function parseLogLevel(value: string | undefined): LogLevel {
    const normalized = value?.toLowerCase().trim();
    return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

/**
 * 解析逗号分隔的 Telegram chat ID 列表
 * 注意：logger 依赖 config，这里只能用 console 输出警告
 */
export function parseUserList(value: string | undefined): Set<string> {
    const users = new Set<string>();
    if (!value) return users;

    for (const part of value.split(',')) {
        const id = part.trim();
        if (!id) continue;
        if (!/^-?\d+$/.test(id)) {
            console.warn(`[Config] Ignoring invalid user ID "${id}"`);
            continue;
        }
        users.add(id);
    }
    return users;
}

function parseProxy(): ProxyConfig | null {
    const scheme = process.env.TELEGRAM_PROXY_SCHEME;
    const host = process.env.TELEGRAM_PROXY_HOST;
    const port = parseIntEnv(process.env.TELEGRAM_PROXY_PORT, 0);
    return scheme && host && port > 0 ? { scheme, host, port } : null;
}

export function proxyUrlOf(proxy: ProxyConfig): string {
    return `${proxy.scheme}://${proxy.host}:${proxy.port}`;
}

const config: Config = {
    telegram: {
        token: process.env.TELEGRAM_BOT_TOKEN || '',
        proxy: parseProxy(),
    },
    opencode: {
        baseUrl: (process.env.OPENCODE_URL || 'http://localhost:4096').replace(/\/+$/, ''),
        requestTimeoutMs: parseIntEnv(process.env.OPENCODE_REQUEST_TIMEOUT_MS, 30_000),
    },
    access: {
        allowedUsers: parseUserList(process.env.ALLOWED_USERS),
        adminUsers: parseUserList(process.env.ADMIN_USERS),
        rateLimitMs: parseIntEnv(process.env.RATE_LIMIT_MS, 2000),
    },
    agents: {
        raw: process.env.AGENTS || '',
        defaultAgent: process.env.DEFAULT_AGENT || 'sisyphus',
    },
    relay: {
        editThrottleMs: parseIntEnv(process.env.RELAY_EDIT_THROTTLE_MS, 1000),
        reconnectDelayMs: parseIntEnv(process.env.RELAY_RECONNECT_DELAY_MS, 2000),
        maxMessageLength: parseIntEnv(process.env.RELAY_MAX_MESSAGE_LENGTH, 4000),
    },
    logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
        dir: process.env.LOG_DIR || path.resolve(process.cwd(), 'logs'),
        toFile: process.env.NODE_ENV !== 'test',
    },
    redis: {
        restUrl: process.env.UPSTASH_REDIS_REST_URL || '',
        token: process.env.UPSTASH_REDIS_REST_TOKEN || '',
        namespace: process.env.REDIS_SESSION_NAMESPACE || 'ocbot',
    },
};

export default config;
