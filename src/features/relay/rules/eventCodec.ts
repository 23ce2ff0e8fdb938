import type { PartKind, RelayEvent } from '../domain/RelayEvent.js';

/**
 * Layer A: Rules - OpenCode 事件流解码
 * 1. SseFrameDecoder: 文本块 -> 完整的 data payload
 * 2. decodeRelayEvent: payload(JSON) -> RelayEvent
 * 纯函数，不涉及 IO
 */

export class EventDecodeError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'EventDecodeError';
    }
}

/**
 * text/event-stream 分帧器
 * - 行可能跨 chunk 切开，\r\n 与 \n 都视为行结束
 * - 同一事件的多行 data: 以 \n 拼接
 * - 空行结束一个事件；注释行与 event:/id:/retry: 字段忽略
 */
export class SseFrameDecoder {
    private buffer = '';
    private dataLines: string[] = [];

    push(chunk: string): string[] {
        this.buffer += chunk;
        const payloads: string[] = [];

        let newlineIndex = this.buffer.indexOf('\n');
        while (newlineIndex !== -1) {
            let line = this.buffer.slice(0, newlineIndex);
            this.buffer = this.buffer.slice(newlineIndex + 1);
            if (line.endsWith('\r')) {
                line = line.slice(0, -1);
            }

            const payload = this.acceptLine(line);
            if (payload !== null) {
                payloads.push(payload);
            }
            newlineIndex = this.buffer.indexOf('\n');
        }

        return payloads;
    }

    /**
     * 连接结束时调用：输出未以空行结束的最后一个事件
     */
    flush(): string[] {
        const payloads: string[] = [];
        if (this.buffer.length > 0) {
            const payload = this.acceptLine(this.buffer.endsWith('\r') ? this.buffer.slice(0, -1) : this.buffer);
            this.buffer = '';
            if (payload !== null) payloads.push(payload);
        }
        const trailing = this.acceptLine('');
        if (trailing !== null) payloads.push(trailing);
        return payloads;
    }

    private acceptLine(line: string): string | null {
        if (line === '') {
            if (this.dataLines.length === 0) return null;
            const payload = this.dataLines.join('\n');
            this.dataLines = [];
            return payload;
        }
        if (line.startsWith('data:')) {
            const value = line.slice('data:'.length);
            this.dataLines.push(value.startsWith(' ') ? value.slice(1) : value);
        }
        return null;
    }
}

// ============ payload 解码 ============

/** 已知但与 relay 无关的上游事件 */
const IGNORED_TYPES: ReadonlySet<string> = new Set([
    'server.connected',
    'server.heartbeat',
    'session.created',
    'session.updated',
    'session.status',
    'session.diff',
    'session.idle',
]);

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const readString = (record: Record<string, unknown>, key: string): string | undefined => {
    const value = record[key];
    return typeof value === 'string' ? value : undefined;
};

export function normalizePartKind(raw: string): PartKind {
    switch (raw) {
        case 'text':
        case 'reasoning':
        case 'step-start':
        case 'step-finish':
        case 'tool-invocation':
        case 'tool-result':
            return raw;
        case 'tool-call':
            return 'tool-invocation';
        default:
            return 'other';
    }
}

function decodePartUpdated(type: string, properties: Record<string, unknown>): RelayEvent {
    const part = properties.part;
    if (!isRecord(part)) {
        return { kind: 'malformed', type, reason: 'properties.part must be an object' };
    }
    const conversationId = readString(part, 'sessionID');
    const partId = readString(part, 'id');
    const partType = readString(part, 'type');
    if (!conversationId || !partId || !partType) {
        return { kind: 'malformed', type, reason: 'part.sessionID, part.id and part.type are required' };
    }
    return {
        kind: 'part-snapshot',
        conversationId,
        partId,
        partKind: normalizePartKind(partType),
        text: readString(part, 'text') ?? '',
    };
}

function decodePartDelta(type: string, properties: Record<string, unknown>): RelayEvent {
    const conversationId = readString(properties, 'sessionID');
    const partId = readString(properties, 'partID');
    const field = readString(properties, 'field');
    const delta = readString(properties, 'delta');
    if (!conversationId || partId === undefined || field === undefined || delta === undefined) {
        return { kind: 'malformed', type, reason: 'sessionID, partID, field and delta are required' };
    }
    return { kind: 'part-delta', conversationId, partId, field, delta };
}

function decodeMessageUpdated(type: string, properties: Record<string, unknown>): RelayEvent {
    const info = properties.info;
    if (!isRecord(info)) {
        return { kind: 'malformed', type, reason: 'properties.info must be an object' };
    }
    const conversationId = readString(info, 'sessionID');
    const role = readString(info, 'role');
    if (!conversationId || role === undefined) {
        return { kind: 'malformed', type, reason: 'info.sessionID and info.role are required' };
    }
    return {
        kind: 'message-completed',
        conversationId,
        role,
        finishReason: readString(info, 'finish') ?? '',
    };
}

/**
 * 解码一个 data payload
 * @throws EventDecodeError JSON 非法或缺少 type 字段
 */
export function decodeRelayEvent(payload: string): RelayEvent {
    let raw: unknown;
    try {
        raw = JSON.parse(payload);
    } catch (error) {
        throw new EventDecodeError('Event payload is not valid JSON', { cause: error });
    }

    if (!isRecord(raw) || typeof raw.type !== 'string') {
        throw new EventDecodeError('Event payload has no string "type" field');
    }

    const type = raw.type;
    const properties = isRecord(raw.properties) ? raw.properties : {};

    switch (type) {
        case 'message.part.updated':
            return decodePartUpdated(type, properties);
        case 'message.part.delta':
            return decodePartDelta(type, properties);
        case 'message.updated':
            return decodeMessageUpdated(type, properties);
        default:
            return IGNORED_TYPES.has(type) ? { kind: 'ignored', type } : { kind: 'unknown', type };
    }
}
