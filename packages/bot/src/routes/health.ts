import { FastifyInstance } from 'fastify';
import type { BaseChannelAdapter } from '../channels/base';
import type { BotVariant } from '../config';
import { setupMetrics } from '../utils/metrics';

interface HealthDeps {
    adapter: BaseChannelAdapter;
    variant: BotVariant;
}

/**
 * Liveness and Prometheus endpoints for the bot process.
 */
export default async function healthRoutes(app: FastifyInstance, deps: HealthDeps) {
    app.get('/health', async () => ({
        status: 'ok',
        variant: deps.variant,
        gateway: deps.adapter.status,
    }));

    setupMetrics(app);
}
