import { FastifyInstance } from 'fastify';
import client from 'prom-client';

// Create a Registry
export const register = new client.Registry();
client.collectDefaultMetrics({ register });

// Custom metrics
export const lootRequestCounter = new client.Counter({
    name: 'loot_requests_total',
    help: 'Loot lookups accepted from Discord',
    labelNames: ['variant'],
    registers: [register],
});

export const webhookRequestCounter = new client.Counter({
    name: 'loot_webhook_requests_total',
    help: 'Webhook calls by outcome',
    labelNames: ['outcome'],
    registers: [register],
});

export const webhookRequestDuration = new client.Histogram({
    name: 'loot_webhook_request_duration_seconds',
    help: 'Webhook round-trip time in seconds',
    buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [register],
});

export const replyCounter = new client.Counter({
    name: 'loot_replies_total',
    help: 'Replies sent back to Discord',
    labelNames: ['status'],
    registers: [register],
});

/**
 * Set up Prometheus metrics endpoint on the Fastify app.
 */
export function setupMetrics(app: FastifyInstance): void {
    app.get('/metrics', async (_req, reply) => {
        reply.header('Content-Type', register.contentType);
        return register.metrics();
    });
}
