import Fastify, { FastifyInstance } from 'fastify';
import dotenv from 'dotenv';
import { BotConfig, loadConfig } from './config';
import { DiscordAdapter } from './channels/discord';
import { LootCatalog } from './loot/catalog';
import { LootRouter } from './sync/router';
import { WebhookClient } from './webhook/client';
import healthRoutes from './routes/health';
import { logger, errorMessage } from './utils/logger';

dotenv.config();

let adapter: DiscordAdapter | undefined;
let healthServer: FastifyInstance | undefined;

// ── Startup ──────────────────────────────────────────────────────────
async function start() {
    logger.info('[boot] DISCORD_TOKEN set', { set: Boolean(process.env.DISCORD_TOKEN) });
    logger.info('[boot] N8N_WEBHOOK_URL', { url: process.env.N8N_WEBHOOK_URL });

    // Nothing connects before the configuration is known to be complete
    const config: BotConfig = loadConfig(process.env);

    // 1. Item catalog for /loot autocomplete
    const catalog = LootCatalog.fromFile();
    logger.info(`Loot catalog loaded (${catalog.size} items)`);

    // 2. Discord adapter
    adapter = new DiscordAdapter(
        { botToken: config.discordToken, variant: config.variant, guildId: config.guildId },
        catalog,
    );
    adapter.on('status', (status) => {
        logger.info(`Discord status: ${status}`);
    });
    adapter.on('error', (err) => {
        logger.error('Discord adapter failed', { error: err.message });
        void shutdown(1);
    });

    // 3. Webhook routing
    const webhook = new WebhookClient({ url: config.webhookUrl, timeoutMs: config.webhookTimeoutMs });
    new LootRouter(adapter, webhook).attach();

    // 4. Health + metrics (optional)
    if (config.health) {
        const server = Fastify({
            logger: false, // We use Winston
        });
        healthServer = server;
        await healthRoutes(server, { adapter, variant: config.variant });
        await server.listen({ port: config.health.port, host: config.health.host });
        logger.info(`Health server listening on ${config.health.host}:${config.health.port}`);
    }

    // 5. Connect to Discord
    await adapter.connect();
    logger.info(`Bot is ready and listening for ${config.variant === 'slash' ? '/loot' : '!loot-bot'} commands`);
}

// ── Shutdown ─────────────────────────────────────────────────────────
async function shutdown(code: number): Promise<void> {
    try {
        await adapter?.disconnect();
        await healthServer?.close();
    } catch (err) {
        logger.error('Error during shutdown', { error: errorMessage(err) });
    }
    process.exit(code);
}

process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

start().catch((err) => {
    logger.error('Failed to start', { error: errorMessage(err) });
    void shutdown(1);
});
