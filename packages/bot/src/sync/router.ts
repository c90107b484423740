import { BaseChannelAdapter } from '../channels/base';
import { buildPayload } from '../loot/payload';
import type { LootRequest } from '../loot/types';
import { WebhookClient } from '../webhook/client';
import { Deduplicator } from './deduplicator';
import { correlatedLogger, generateCorrelationId, logger, errorMessage } from '../utils/logger';
import { lootRequestCounter, replyCounter } from '../utils/metrics';

// ── Loot Router ────────────────────────────────────────────────────

/**
 * Routes each loot request from the adapter to the webhook and sends
 * the resulting text back through the same adapter.
 *
 * Every request is handled on its own; the webhook call is the only
 * await before the reply.
 */
export class LootRouter {
    constructor(
        private readonly adapter: BaseChannelAdapter,
        private readonly webhook: WebhookClient,
        private readonly deduplicator: Deduplicator = new Deduplicator(),
    ) { }

    /**
     * Subscribe to the adapter's request events.
     */
    attach(): void {
        this.adapter.on('request', (req) => {
            this.route(req).catch((err) => {
                logger.error('Loot request handling failed', { eventId: req.eventId, error: errorMessage(err) });
            });
        });
    }

    async route(req: LootRequest): Promise<void> {
        if (this.deduplicator.isDuplicate(req.eventId)) return;

        const log = correlatedLogger(generateCorrelationId());
        lootRequestCounter.labels(req.variant).inc();
        log.info('Received loot request', {
            variant: req.variant,
            eventId: req.eventId,
            authorId: req.authorId,
            channelId: req.channelId,
            guildId: req.guildId,
            content: req.content,
        });

        const result = await this.webhook.lookup(buildPayload(req), log);

        const sent = await this.adapter.reply(req.replyTo, result.reply);
        replyCounter.labels(sent ? 'sent' : 'failed').inc();
        log.info('Loot request completed', { outcome: result.outcome, replySent: sent });
    }
}
