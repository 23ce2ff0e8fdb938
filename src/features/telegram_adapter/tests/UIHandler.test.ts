import { describe, it, expect } from 'vitest';
import { defaultAgents } from '../../session/domain/agents.js';
import { BOT_COMMANDS, UIHandler } from '../UIHandler.js';

describe('UIHandler', () => {
    it('builds one switch button per session', () => {
        expect(UIHandler.createSessionsKeyboard([{ id: 'ses_1234567890', title: 'Fix' }])).toEqual({
            inline_keyboard: [[{ text: 'Switch to ses_1234...', callback_data: 'switch_ses_1234567890' }]],
        });
    });

    it('lists agents with their descriptions', () => {
        expect(UIHandler.createAgentKeyboard(defaultAgents()).inline_keyboard).toEqual([
            [{ text: 'sisyphus - General coding', callback_data: 'agent_sisyphus' }],
            [{ text: 'oracle - Deep analysis', callback_data: 'agent_oracle' }],
        ]);
    });

    it('encodes provider and model in the callback data', () => {
        const keyboard = UIHandler.createModelKeyboard([{ providerId: 'anthropic', modelId: 'claude-test', name: 'Claude Test' }]);
        expect(keyboard.inline_keyboard).toEqual([[{ text: 'Claude Test (anthropic)', callback_data: 'model_anthropic/claude-test' }]]);
    });

    it('registers every command once', () => {
        const names = BOT_COMMANDS.map((command) => command.command);
        expect(new Set(names).size).toBe(names.length);
        expect(names).toContain('purge');
    });
});
