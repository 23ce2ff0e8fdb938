import { describe, it, expect } from 'vitest';
import { parseIntEnv, parseLogLevel, parseUserList, proxyUrlOf } from '../config.js';

describe('config parsing helpers', () => {
    it('parseIntEnv falls back on empty or invalid values', () => {
        expect(parseIntEnv(undefined, 5)).toBe(5);
        expect(parseIntEnv('  ', 5)).toBe(5);
        expect(parseIntEnv('abc', 5)).toBe(5);
        expect(parseIntEnv('1.5', 5)).toBe(5);
        expect(parseIntEnv('-3', 5)).toBe(5);
        expect(parseIntEnv(' 2500 ', 5)).toBe(2500);
        expect(parseIntEnv('0', 5)).toBe(0);
    });

    it('parseLogLevel accepts known levels case-insensitively', () => {
        expect(parseLogLevel('DEBUG')).toBe('debug');
        expect(parseLogLevel(' warn ')).toBe('warn');
        expect(parseLogLevel('verbose')).toBe('info');
        expect(parseLogLevel(undefined)).toBe('info');
    });

    it('parseUserList keeps numeric IDs and skips the rest', () => {
        const users = parseUserList('123, 456,,abc,-100200');
        expect([...users]).toEqual(['123', '456', '-100200']);
        expect(parseUserList(undefined).size).toBe(0);
        expect(parseUserList('').size).toBe(0);
    });

    it('proxyUrlOf builds a proxy URL', () => {
        expect(proxyUrlOf({ scheme: 'http', host: '127.0.0.1', port: 7890 })).toBe('http://127.0.0.1:7890');
    });
});
