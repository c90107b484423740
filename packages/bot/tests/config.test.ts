import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config';

const base = {
    DISCORD_TOKEN: 'test-token',
    N8N_WEBHOOK_URL: 'https://n8n.test/webhook/loot',
};

describe('loadConfig', () => {
    it('applies defaults', () => {
        expect(loadConfig(base)).toEqual({
            discordToken: 'test-token',
            webhookUrl: 'https://n8n.test/webhook/loot',
            variant: 'slash',
            guildId: undefined,
            webhookTimeoutMs: 10000,
            health: undefined,
        });
    });

    it('reads optional settings', () => {
        const config = loadConfig({
            ...base,
            BOT_MODE: 'prefix',
            DISCORD_GUILD_ID: '400',
            WEBHOOK_TIMEOUT_MS: '8000',
            HEALTH_PORT: '9090',
        });
        expect(config.variant).toBe('prefix');
        expect(config.guildId).toBe('400');
        expect(config.webhookTimeoutMs).toBe(8000);
        expect(config.health).toEqual({ port: 9090, host: '0.0.0.0' });
    });

    it('treats blank optional values as unset', () => {
        const config = loadConfig({ ...base, BOT_MODE: '', HEALTH_PORT: ' ' });
        expect(config.variant).toBe('slash');
        expect(config.health).toBeUndefined();
    });

    it('fails when the Discord token is missing', () => {
        expect(() => loadConfig({ N8N_WEBHOOK_URL: base.N8N_WEBHOOK_URL })).toThrow(ConfigError);
    });

    it('fails when the webhook URL is missing or blank', () => {
        expect(() => loadConfig({ DISCORD_TOKEN: 'test-token' })).toThrow(ConfigError);
        expect(() => loadConfig({ ...base, N8N_WEBHOOK_URL: '' })).toThrow(ConfigError);
    });

    it('lists every problem found', () => {
        try {
            loadConfig({});
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigError);
            if (err instanceof ConfigError) {
                expect(err.issues).toEqual(['DISCORD_TOKEN: not set', 'N8N_WEBHOOK_URL: not set']);
            }
        }
    });

    it('rejects an invalid webhook URL', () => {
        expect(() => loadConfig({ ...base, N8N_WEBHOOK_URL: 'not a url' })).toThrow(/N8N_WEBHOOK_URL: not a valid URL/);
    });

    it('rejects an unknown mode', () => {
        expect(() => loadConfig({ ...base, BOT_MODE: 'voice' })).toThrow(ConfigError);
    });

    it('bounds the webhook timeout', () => {
        expect(() => loadConfig({ ...base, WEBHOOK_TIMEOUT_MS: '7999' })).toThrow(/WEBHOOK_TIMEOUT_MS/);
        expect(() => loadConfig({ ...base, WEBHOOK_TIMEOUT_MS: '10001' })).toThrow(/WEBHOOK_TIMEOUT_MS/);
        expect(loadConfig({ ...base, WEBHOOK_TIMEOUT_MS: '8000' }).webhookTimeoutMs).toBe(8000);
    });
});
