import { z } from 'zod';

// ── Fallback Replies ───────────────────────────────────────────────

export const FALLBACK_REPLIES = {
    network: '⚠️ Error reaching loot system (network error).',
    unexpected: '⚠️ Loot service responded with an unexpected format.',
    missing_reply: '⚠️ Loot service did not provide a reply field.',
} as const;

// ── Response Shapes ────────────────────────────────────────────────

const jsonObject = z.record(z.string(), z.unknown());
type JsonObject = z.infer<typeof jsonObject>;

// n8n's "last node" response mode returns the node's items as a list.
const listShape = z.tuple([jsonObject]).rest(z.unknown());

/**
 * The two accepted webhook bodies plus everything else.
 */
export type WebhookResponse =
    | { kind: 'list'; item: JsonObject }
    | { kind: 'object'; item: JsonObject }
    | { kind: 'unrecognized'; raw: unknown };

export type LookupOutcome = 'ok' | keyof typeof FALLBACK_REPLIES;

export interface LookupResult {
    outcome: LookupOutcome;
    reply: string;
}

export function decodeWebhookResponse(raw: unknown): WebhookResponse {
    const list = listShape.safeParse(raw);
    if (list.success) return { kind: 'list', item: list.data[0] };

    const object = jsonObject.safeParse(raw);
    if (object.success) return { kind: 'object', item: object.data };

    return { kind: 'unrecognized', raw };
}

/**
 * Pull the reply text out of a decoded response. Items may wrap their
 * fields in a `json` object (n8n item format) or carry `reply` directly.
 */
export function extractReply(response: WebhookResponse): LookupResult {
    if (response.kind === 'unrecognized') {
        return { outcome: 'unexpected', reply: FALLBACK_REPLIES.unexpected };
    }

    const { item } = response;
    let holder: JsonObject = item;
    if ('json' in item) {
        const nested = jsonObject.safeParse(item.json);
        if (!nested.success) {
            return { outcome: 'unexpected', reply: FALLBACK_REPLIES.unexpected };
        }
        holder = nested.data;
    }

    const reply = holder.reply;
    if (typeof reply !== 'string' || reply === '') {
        return { outcome: 'missing_reply', reply: FALLBACK_REPLIES.missing_reply };
    }

    return { outcome: 'ok', reply };
}
