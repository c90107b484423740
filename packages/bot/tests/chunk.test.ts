import { describe, it, expect } from 'vitest';
import { chunkMessage } from '../src/channels/discord/chunk';

describe('chunkMessage', () => {
    it('keeps short messages whole', () => {
        expect(chunkMessage('Battery: Buried City')).toEqual(['Battery: Buried City']);
    });

    it('keeps a message of exactly the limit whole', () => {
        const text = 'x'.repeat(2000);
        expect(chunkMessage(text)).toEqual([text]);
    });

    it('splits on a line break', () => {
        const text = 'a'.repeat(1500) + '\n' + 'b'.repeat(1000);
        expect(chunkMessage(text)).toEqual(['a'.repeat(1500), 'b'.repeat(1000)]);
    });

    it('keeps the full stop when splitting on a sentence', () => {
        const text = 'a'.repeat(14) + '. ' + 'b'.repeat(10);
        expect(chunkMessage(text, 20)).toEqual(['a'.repeat(14) + '.', 'b'.repeat(10)]);
    });

    it('splits on a space when there is no better boundary', () => {
        expect(chunkMessage('aaaaaaaaaaaa bbbbbbbbbb', 20)).toEqual(['aaaaaaaaaaaa', 'bbbbbbbbbb']);
    });

    it('never yields an empty piece after leading whitespace', () => {
        expect(chunkMessage(' '.repeat(2001) + 'x')).toEqual(['x']);
    });

    it('returns one piece for text that is only whitespace', () => {
        expect(chunkMessage(' '.repeat(45), 20)).toEqual([' '.repeat(20)]);
    });

    it('hard-cuts text without boundaries', () => {
        expect(chunkMessage('x'.repeat(45), 20)).toEqual(['x'.repeat(20), 'x'.repeat(20), 'x'.repeat(5)]);
    });
});
