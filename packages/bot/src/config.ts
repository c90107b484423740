import { z } from 'zod';

export type BotVariant = 'slash' | 'prefix';

/**
 * Settings the process runs with. Built once at startup and handed to
 * constructors; nothing below server.ts reads process.env.
 */
export interface BotConfig {
    discordToken: string;
    webhookUrl: string;
    variant: BotVariant;
    guildId?: string;
    webhookTimeoutMs: number;
    health?: {
        port: number;
        host: string;
    };
}

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

// Empty strings from a .env file count as unset.
const optionalString = z.preprocess(
    (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
    z.string().trim().optional(),
);

const envSchema = z.object({
    DISCORD_TOKEN: z.string({ required_error: 'not set' }).trim().min(1, 'not set'),
    N8N_WEBHOOK_URL: z.string({ required_error: 'not set' })
        .trim()
        .min(1, 'not set')
        .url('not a valid URL'),
    BOT_MODE: optionalString.pipe(z.enum(['slash', 'prefix']).default('slash')),
    DISCORD_GUILD_ID: optionalString,
    WEBHOOK_TIMEOUT_MS: optionalString.pipe(
        z.coerce.number().int().min(8000).max(10000).default(10000),
    ),
    HEALTH_PORT: optionalString.pipe(z.coerce.number().int().min(1).max(65535).optional()),
    HEALTH_HOST: optionalString.pipe(z.string().default('0.0.0.0')),
});

/**
 * Parse the process environment into a {@link BotConfig}.
 * Throws a ConfigError listing every problem found.
 */
export function loadConfig(env: Record<string, string | undefined>): BotConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
    }

    const e = parsed.data;
    return {
        discordToken: e.DISCORD_TOKEN,
        webhookUrl: e.N8N_WEBHOOK_URL,
        variant: e.BOT_MODE,
        guildId: e.DISCORD_GUILD_ID,
        webhookTimeoutMs: e.WEBHOOK_TIMEOUT_MS,
        health: e.HEALTH_PORT !== undefined
            ? { port: e.HEALTH_PORT, host: e.HEALTH_HOST }
            : undefined,
    };
}
