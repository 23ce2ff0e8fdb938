/**
 * Layer A: Domain - OpenCode 事件流中 relay 关心的事件
 * 封闭的 tagged union，decoder 与 dispatcher 都按 kind 穷举
 */

export type PartKind =
    | 'text'
    | 'reasoning'
    | 'step-start'
    | 'step-finish'
    | 'tool-invocation'
    | 'tool-result'
    | 'other';

export interface PartSnapshotEvent {
    kind: 'part-snapshot';
    conversationId: string;
    partId: string;
    partKind: PartKind;
    text: string;
}

export interface PartDeltaEvent {
    kind: 'part-delta';
    conversationId: string;
    partId: string;
    field: string;
    delta: string;
}

export interface MessageCompletedEvent {
    kind: 'message-completed';
    conversationId: string;
    role: string;
    /** 空串表示消息仍在生成 */
    finishReason: string;
}

/** 已知但 relay 无需处理的系统事件 (heartbeat, session.* ...) */
export interface IgnoredEvent {
    kind: 'ignored';
    type: string;
}

export interface UnknownEvent {
    kind: 'unknown';
    type: string;
}

/** JSON 合法但缺少必需字段 */
export interface MalformedEvent {
    kind: 'malformed';
    type: string;
    reason: string;
}

export type RelayEvent =
    | PartSnapshotEvent
    | PartDeltaEvent
    | MessageCompletedEvent
    | IgnoredEvent
    | UnknownEvent
    | MalformedEvent;

/** 生成回复的一方 */
export const GENERATOR_ROLE = 'assistant';
