import { describe, it, expect } from 'vitest';
import { emptyChatSession } from '../../../../core/ports/ChatSessionStore.js';
import type { HistoryMessage } from '../../ports/IConversationBackend.js';
import { formatDiff, formatHistory, formatSessionList, formatStatus, formatUptime, shortId } from '../sessionFormat.js';

const message = (role: string, content: string): HistoryMessage => ({ id: 'm', role, content, tokens: 0, cost: 0 });

describe('sessionFormat', () => {
    it('shortens long IDs', () => {
        expect(shortId('ses_1234567890')).toBe('ses_1234...');
        expect(shortId('ses_1234')).toBe('ses_1234');
    });

    it('formats the session list with the active marker', () => {
        const text = formatSessionList(
            [
                { id: 'ses_1234567890', title: 'Fix tests' },
                { id: 's2', title: '' },
            ],
            30,
            's2'
        );

        expect(text).toBe(
            'Available Sessions (30 total, showing first 2)\n\n' +
                '1. ses_1234... - Fix tests\n' +
                '2. s2 - Untitled [active]\n\n' +
                'Use /switch <id> to switch sessions'
        );
    });

    it('formats history entries and shortens long messages', () => {
        const text = formatHistory([message('user', 'hi'), message('', 'x'.repeat(250))]);

        expect(text).toBe(`Recent Messages\n\nuser:\nhi\n\nuser:\n${'x'.repeat(200)}...\n\n`);
    });

    it('shows only the last ten messages', () => {
        const messages = Array.from({ length: 12 }, (_, i) => message('assistant', `m${i}`));
        const text = formatHistory(messages);

        expect(text.startsWith('Recent Messages\n\nassistant:\nm2\n\n')).toBe(true);
        expect(text.split('assistant:\n')).toHaveLength(11);
    });

    it('truncates a history longer than a Telegram message', () => {
        const messages = Array.from({ length: 10 }, () => message('r'.repeat(400), 'c'));
        const text = formatHistory(messages);

        expect(text).toHaveLength(4016);
        expect(text.endsWith('\n... (truncated)')).toBe(true);
    });

    it('formats diffs', () => {
        expect(formatDiff('')).toBe('No changes');
        expect(formatDiff('+a')).toBe('Current Changes\n\n+a');
        expect(formatDiff('d'.repeat(4001))).toBe(`Current Changes\n\n${'d'.repeat(4000)}\n\n... (truncated)`);
    });

    it('formats uptime', () => {
        expect(formatUptime(3_723_000)).toBe('1h 2m 3s');
        expect(formatUptime(123_000)).toBe('2m 3s');
        expect(formatUptime(3_499)).toBe('3s');
        expect(formatUptime(0)).toBe('0s');
    });

    it('formats status with and without a session', () => {
        expect(formatStatus(65_000, 2, null)).toBe('Bot Status\n\nUptime: 1m 5s\nActive streams: 2');

        const session = {
            ...emptyChatSession('42', 0),
            sessionId: 'ses_1234567890',
            agent: 'oracle',
            modelProvider: 'anthropic',
            modelId: 'claude-test',
            messageCount: 4,
        };
        expect(formatStatus(5_000, 0, session)).toBe(
            'Bot Status\n\nUptime: 5s\nActive streams: 0\n' +
                'Session: ses_1234...\nModel: claude-test (anthropic)\nAgent: oracle\nMessages: 4'
        );

        expect(formatStatus(5_000, 0, emptyChatSession('42', 0))).toBe(
            'Bot Status\n\nUptime: 5s\nActive streams: 0\n' +
                'Session: none\nModel: server default\nAgent: default\nMessages: 0'
        );
    });
});
