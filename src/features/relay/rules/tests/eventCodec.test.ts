import { describe, it, expect } from 'vitest';
import { decodeRelayEvent, EventDecodeError, normalizePartKind, SseFrameDecoder } from '../eventCodec.js';

describe('SseFrameDecoder', () => {
    it('reassembles a frame split across chunks and CRLF line endings', () => {
        const decoder = new SseFrameDecoder();
        expect(decoder.push('data: {"a"')).toEqual([]);
        expect(decoder.push(':1}\r\n')).toEqual([]);
        expect(decoder.push('\r\n')).toEqual(['{"a":1}']);
    });

    it('joins multiple data lines of one event with a newline', () => {
        const decoder = new SseFrameDecoder();
        expect(decoder.push('data: one\ndata:two\n\n')).toEqual(['one\ntwo']);
    });

    it('ignores comments and non-data fields', () => {
        const decoder = new SseFrameDecoder();
        expect(decoder.push(': ping\nevent: message\nid: 7\nretry: 100\ndata: payload\n\n')).toEqual(['payload']);
    });

    it('yields nothing for blank lines without data', () => {
        const decoder = new SseFrameDecoder();
        expect(decoder.push('\n\n: keepalive\n\n')).toEqual([]);
    });

    it('returns several events from a single chunk', () => {
        const decoder = new SseFrameDecoder();
        expect(decoder.push('data: a\n\ndata: b\n\n')).toEqual(['a', 'b']);
    });

    it('flushes an unterminated trailing event', () => {
        const decoder = new SseFrameDecoder();
        expect(decoder.push('data: first\n\ndata: tail')).toEqual(['first']);
        expect(decoder.flush()).toEqual(['tail']);
        expect(decoder.flush()).toEqual([]);
    });
});

describe('decodeRelayEvent', () => {
    it('maps message.part.updated to a part snapshot', () => {
        const event = decodeRelayEvent(
            JSON.stringify({
                type: 'message.part.updated',
                properties: { part: { id: 'p1', sessionID: 's1', messageID: 'm1', type: 'text', text: 'Hi' } },
            })
        );
        expect(event).toEqual({ kind: 'part-snapshot', conversationId: 's1', partId: 'p1', partKind: 'text', text: 'Hi' });
    });

    it('treats a missing snapshot text as empty and normalizes tool-call', () => {
        const event = decodeRelayEvent(
            JSON.stringify({
                type: 'message.part.updated',
                properties: { part: { id: 'p2', sessionID: 's1', type: 'tool-call' } },
            })
        );
        expect(event).toEqual({ kind: 'part-snapshot', conversationId: 's1', partId: 'p2', partKind: 'tool-invocation', text: '' });
    });

    it('maps message.part.delta', () => {
        const event = decodeRelayEvent(
            JSON.stringify({
                type: 'message.part.delta',
                properties: { sessionID: 's1', messageID: 'm1', partID: 'p1', field: 'text', delta: ' world' },
            })
        );
        expect(event).toEqual({ kind: 'part-delta', conversationId: 's1', partId: 'p1', field: 'text', delta: ' world' });
    });

    it('maps message.updated and defaults a missing finish to empty', () => {
        const finished = decodeRelayEvent(
            JSON.stringify({ type: 'message.updated', properties: { info: { sessionID: 's1', role: 'assistant', finish: 'stop' } } })
        );
        expect(finished).toEqual({ kind: 'message-completed', conversationId: 's1', role: 'assistant', finishReason: 'stop' });

        const running = decodeRelayEvent(
            JSON.stringify({ type: 'message.updated', properties: { info: { sessionID: 's1', role: 'assistant' } } })
        );
        expect(running).toEqual({ kind: 'message-completed', conversationId: 's1', role: 'assistant', finishReason: '' });
    });

    it('separates ignored from unknown event types', () => {
        expect(decodeRelayEvent('{"type":"server.heartbeat","properties":{}}')).toEqual({ kind: 'ignored', type: 'server.heartbeat' });
        expect(decodeRelayEvent('{"type":"session.idle"}')).toEqual({ kind: 'ignored', type: 'session.idle' });
        expect(decodeRelayEvent('{"type":"file.edited","properties":{}}')).toEqual({ kind: 'unknown', type: 'file.edited' });
    });

    it('reports missing fields as malformed', () => {
        const event = decodeRelayEvent('{"type":"message.part.updated","properties":{}}');
        expect(event.kind).toBe('malformed');

        const delta = decodeRelayEvent('{"type":"message.part.delta","properties":{"sessionID":"s1","partID":"p1","field":"text"}}');
        expect(delta.kind).toBe('malformed');
    });

    it('throws EventDecodeError on invalid JSON or a missing type', () => {
        expect(() => decodeRelayEvent('not json')).toThrow(EventDecodeError);
        expect(() => decodeRelayEvent('{"properties":{}}')).toThrow(EventDecodeError);
        expect(() => decodeRelayEvent('[1,2]')).toThrow(EventDecodeError);
    });
});

describe('normalizePartKind', () => {
    it('passes known kinds through and maps the rest to other', () => {
        expect(normalizePartKind('reasoning')).toBe('reasoning');
        expect(normalizePartKind('step-finish')).toBe('step-finish');
        expect(normalizePartKind('file')).toBe('other');
    });
});
