import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebhookClient } from '../src/webhook/client';
import { FALLBACK_REPLIES } from '../src/webhook/response';
import type { LootPayload } from '../src/loot/types';

const URL = 'https://n8n.test/webhook/loot';

const payload: LootPayload = {
    content: '/loot Battery',
    channel_id: '200',
    author_id: '300',
    username: 'raider',
    item: 'Battery',
};

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

describe('WebhookClient', () => {
    let fetchMock: ReturnType<typeof vi.fn>;
    let client: WebhookClient;

    beforeEach(() => {
        fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);
        client = new WebhookClient({ url: URL, timeoutMs: 10000 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('POSTs the payload as JSON with a timeout signal', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ reply: 'ok' }));

        await client.lookup(payload);

        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe(URL);
        expect(init.method).toBe('POST');
        expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
        expect(JSON.parse(init.body)).toEqual(payload);
        expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('returns the reply from an n8n item list', async () => {
        fetchMock.mockResolvedValue(jsonResponse([{ json: { reply: 'X' } }]));
        expect(await client.lookup(payload)).toEqual({ outcome: 'ok', reply: 'X' });
    });

    it('returns the reply from a plain object', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ reply: 'Y' }));
        expect(await client.lookup(payload)).toEqual({ outcome: 'ok', reply: 'Y' });
    });

    it('reports a missing reply field', async () => {
        fetchMock.mockResolvedValue(jsonResponse({}));
        expect(await client.lookup(payload)).toEqual({
            outcome: 'missing_reply',
            reply: FALLBACK_REPLIES.missing_reply,
        });
    });

    it('reports an unexpected shape', async () => {
        fetchMock.mockResolvedValue(jsonResponse(5));
        expect(await client.lookup(payload)).toEqual({
            outcome: 'unexpected',
            reply: FALLBACK_REPLIES.unexpected,
        });
    });

    it('reports a body that is not JSON as unexpected', async () => {
        fetchMock.mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));
        expect((await client.lookup(payload)).outcome).toBe('unexpected');
    });

    it('reports an empty body as unexpected', async () => {
        fetchMock.mockResolvedValue(new Response('', { status: 200 }));
        expect((await client.lookup(payload)).outcome).toBe('unexpected');
    });

    it('treats a non-2xx status as a network error', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ reply: 'should not be used' }, 500));
        expect(await client.lookup(payload)).toEqual({
            outcome: 'network',
            reply: FALLBACK_REPLIES.network,
        });
    });

    it('treats a refused connection as a network error', async () => {
        fetchMock.mockRejectedValue(new TypeError('fetch failed', { cause: new Error('ECONNREFUSED') }));
        await expect(client.lookup(payload)).resolves.toEqual({
            outcome: 'network',
            reply: FALLBACK_REPLIES.network,
        });
    });

    it('treats a timeout as a network error', async () => {
        fetchMock.mockRejectedValue(new DOMException('The operation was aborted due to timeout', 'TimeoutError'));
        expect((await client.lookup(payload)).outcome).toBe('network');
    });

    it('makes a single attempt on failure', async () => {
        fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND n8n.test'));
        await client.lookup(payload);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });
});
