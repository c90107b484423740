import type winston from 'winston';
import { logger as rootLogger, errorMessage } from '../utils/logger';
import { webhookRequestCounter, webhookRequestDuration } from '../utils/metrics';
import type { LootPayload } from '../loot/types';
import {
    FALLBACK_REPLIES,
    LookupResult,
    decodeWebhookResponse,
    extractReply,
} from './response';

export interface WebhookClientOptions {
    url: string;
    timeoutMs: number;
}

/**
 * Non-2xx answer from the webhook.
 */
export class WebhookHttpError extends Error {
    constructor(public readonly status: number, public readonly body: string) {
        super(`Webhook responded with HTTP ${status}`);
        this.name = 'WebhookHttpError';
    }
}

/**
 * Single-attempt JSON client for the loot workflow webhook.
 * Never throws: every failure becomes a fallback reply.
 */
export class WebhookClient {
    constructor(private readonly options: WebhookClientOptions) { }

    async lookup(payload: LootPayload, log: winston.Logger = rootLogger): Promise<LookupResult> {
        const endTimer = webhookRequestDuration.startTimer();
        const result = await this.post(payload, log);
        endTimer();
        webhookRequestCounter.labels(result.outcome).inc();
        return result;
    }

    private async post(payload: LootPayload, log: winston.Logger): Promise<LookupResult> {
        let body: string;
        try {
            const res = await fetch(this.options.url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(this.options.timeoutMs),
            });

            body = await res.text();
            log.debug('Webhook response', { status: res.status, body: body.substring(0, 200) });

            if (!res.ok) throw new WebhookHttpError(res.status, body);
        } catch (err) {
            // DNS failures, refused connections, timeouts and HTTP errors all look alike to the user.
            log.error('Error calling loot webhook', {
                error: errorMessage(err),
                status: err instanceof WebhookHttpError ? err.status : undefined,
            });
            return { outcome: 'network', reply: FALLBACK_REPLIES.network };
        }

        let data: unknown;
        try {
            data = JSON.parse(body);
        } catch (err) {
            log.warn('Webhook returned a body that is not JSON', { error: errorMessage(err) });
            return { outcome: 'unexpected', reply: FALLBACK_REPLIES.unexpected };
        }

        const result = extractReply(decodeWebhookResponse(data));
        if (result.outcome !== 'ok') {
            log.warn('Unusable webhook response', { outcome: result.outcome, body: body.substring(0, 200) });
        }
        return result;
    }
}
