import { describe, it, expect } from 'vitest';
import { correlatedLogger, errorMessage, generateCorrelationId, logger } from '../src/utils/logger';

describe('logger', () => {
    it('tags every line with the service name', () => {
        expect(logger.defaultMeta).toEqual({ service: 'loot-relay' });
    });

    it('generates loot-prefixed correlation ids', () => {
        const id = generateCorrelationId();
        expect(id).toMatch(/^loot-[0-9a-f]{16}$/);
        expect(generateCorrelationId()).not.toBe(id);
    });

    it('returns a child logger for one request', () => {
        const child = correlatedLogger('loot-0000000000000000');
        expect(child).not.toBe(logger);
        expect(typeof child.info).toBe('function');
    });

    it('reads the message of thrown values', () => {
        expect(errorMessage(new Error('connection refused'))).toBe('connection refused');
        expect(errorMessage('plain string')).toBe('plain string');
        expect(errorMessage(42)).toBe('42');
    });
});
