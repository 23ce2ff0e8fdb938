/**
 * 结构化日志 (winston)
 *
 * 每条日志自动带上 tracing 中的 traceId / chatId / conversationId。
 * 开发环境输出单行 pretty 文本，生产环境与文件输出 JSON。
 *
 * kind:
 * - biz: 会话与指令 (ChatSessionService, adapter 指令处理)
 * - sys: 进程与 Telegram 适配层
 * - infra: OpenCode HTTP / SSE、Upstash
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getTraceContext } from './tracing.js';
import config from './config.js';

export type LogKind = 'biz' | 'sys' | 'infra';

export interface LogMeta {
    kind: LogKind;
    component: string;
    message: string;
    /** 原样传入，不要包装 */
    error?: unknown;
    meta?: Record<string, unknown>;
}

const IS_DEV = process.env.NODE_ENV !== 'production';

const ERROR_OWN_KEYS = new Set(['name', 'message', 'stack', 'cause']);

/**
 * Error 展开为普通对象，保留 cause 链与自定义字段 (status, body ...)
 */
export function serializeError(error: unknown): Record<string, unknown> | undefined {
    if (error === undefined || error === null) return undefined;

    if (!(error instanceof Error)) {
        return { raw: typeof error === 'string' ? error : String(error) };
    }

    const extra = Object.entries(error).filter(([key]) => !ERROR_OWN_KEYS.has(key));
    return {
        name: error.name,
        message: error.message,
        stack: error.stack,
        ...(error.cause ? { cause: serializeError(error.cause) } : {}),
        ...Object.fromEntries(extra),
    };
}

/** 当前 trace 的标识字段，缺失的用 '-' 占位 */
function traceFields(): { traceId: string; chatId: string; conversationId: string } {
    const context = getTraceContext();
    return {
        traceId: context?.traceId ?? '-',
        chatId: context?.chatId ?? '-',
        conversationId: context?.conversationId ?? '-',
    };
}

const jsonFormat = winston.format.printf(({ level, message, timestamp, error, ...rest }) => {
    return JSON.stringify({
        timestamp,
        level,
        ...traceFields(),
        ...rest,
        ...(error === undefined ? {} : { error: serializeError(error) }),
        message,
    });
});

const prettyFormat = winston.format.printf(({ level, message, timestamp, kind, component, error, meta }) => {
    const { traceId, chatId, conversationId } = traceFields();
    const lines = [
        `${timestamp} [${level.toUpperCase().padEnd(5)}] [${kind || 'sys'}] [${traceId}] [${chatId}/${conversationId}] ${component || 'App'}: ${message}`,
    ];

    const serialized = serializeError(error);
    if (serialized) {
        lines.push(`  error: ${serialized.name ?? 'Error'} - ${serialized.message ?? serialized.raw}`);
        if (serialized.stack) lines.push(`  stack: ${serialized.stack}`);
        if (serialized.cause) lines.push(`  cause: ${JSON.stringify(serialized.cause)}`);
    }

    if (meta && typeof meta === 'object' && Object.keys(meta).length > 0) {
        lines.push(`  meta: ${JSON.stringify(meta)}`);
    }

    return lines.join('\n');
});

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.colorize({ all: IS_DEV }),
            IS_DEV ? prettyFormat : jsonFormat
        ),
    }),
];

// 按天切割，保留 14 天；测试环境 toFile 为 false
if (config.logging.toFile) {
    const fileTransport = new DailyRotateFile({
        dirname: config.logging.dir,
        filename: 'relay-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '50m',
        maxFiles: '14d',
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
            jsonFormat
        ),
    });

    fileTransport.on('rotate', (oldFilename: string, newFilename: string) => {
        console.log(`[Logger] rotated ${oldFilename} -> ${newFilename}`);
    });

    transports.push(fileTransport);
}

const winstonLogger = winston.createLogger({
    level: config.logging.level,
    transports,
});

/**
 * @example
 * logger.warn({
 *     kind: 'infra',
 *     component: 'EventStreamConnection',
 *     message: 'Event stream disconnected',
 *     error,
 *     meta: { url }
 * });
 */
export const logger = {
    debug: ({ message, ...rest }: LogMeta) => winstonLogger.debug(message, rest),
    info: ({ message, ...rest }: LogMeta) => winstonLogger.info(message, rest),
    warn: ({ message, ...rest }: LogMeta) => winstonLogger.warn(message, rest),
    error: ({ message, ...rest }: LogMeta) => winstonLogger.error(message, rest),
};
