import { MESSAGE_LIMIT } from './constants';

/**
 * Split text into pieces Discord will accept, preferring line, then
 * sentence, then word boundaries in the second half of each piece.
 */
export function chunkMessage(text: string, maxLength: number = MESSAGE_LIMIT): string[] {
    if (text.length <= maxLength) return [text];

    const chunks: string[] = [];
    let remaining = text;

    while (remaining.length > maxLength) {
        let splitAt = remaining.lastIndexOf('\n', maxLength);
        if (splitAt < maxLength / 2) {
            const sentenceEnd = remaining.lastIndexOf('. ', maxLength - 1);
            splitAt = sentenceEnd === -1 ? -1 : sentenceEnd + 1;
        }
        if (splitAt < maxLength / 2) splitAt = remaining.lastIndexOf(' ', maxLength);
        if (splitAt < maxLength / 2) splitAt = maxLength;

        const piece = remaining.substring(0, splitAt).trimEnd();
        if (piece) chunks.push(piece);
        remaining = remaining.substring(splitAt).trimStart();
    }

    if (remaining.length) chunks.push(remaining);
    // Whitespace only: still hand back one piece so callers always have a first message.
    return chunks.length ? chunks : [text.substring(0, maxLength)];
}
