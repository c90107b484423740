import { z } from 'zod';
import type { BotVariant } from '../../config';

// ── Configuration ──────────────────────────────────────────────────

export interface DiscordConfig {
    botToken: string;
    variant: BotVariant;
    guildId?: string;               // For guild-specific slash commands
}

// ── Gateway Frames ─────────────────────────────────────────────────

export const gatewayPayloadSchema = z.object({
    op: z.number(),
    d: z.unknown(),
    s: z.number().nullish(),
    t: z.string().nullish(),
});

export const helloSchema = z.object({
    heartbeat_interval: z.number().positive(),
});

export const gatewayBotSchema = z.object({
    url: z.string(),
});

// ── Discord API Types ──────────────────────────────────────────────

export const discordUserSchema = z.object({
    id: z.string(),
    username: z.string(),
    global_name: z.string().nullish(),
    bot: z.boolean().optional(),
});
export type DiscordUser = z.infer<typeof discordUserSchema>;

export const readySchema = z.object({
    session_id: z.string(),
    resume_gateway_url: z.string().optional(),
    user: discordUserSchema,
    application: z.object({ id: z.string() }),
});

export const guildSchema = z.object({
    id: z.string(),
    name: z.string().optional(),
    unavailable: z.boolean().optional(),
});

export const messageSchema = z.object({
    id: z.string(),
    channel_id: z.string(),
    guild_id: z.string().optional(),
    author: discordUserSchema,
    content: z.string(),
});
export type DiscordMessagePayload = z.infer<typeof messageSchema>;

const interactionOptionSchema = z.object({
    name: z.string(),
    type: z.number(),
    value: z.union([z.string(), z.number(), z.boolean()]).optional(),
    focused: z.boolean().optional(),
});
export type DiscordInteractionOption = z.infer<typeof interactionOptionSchema>;

export const interactionSchema = z.object({
    id: z.string(),
    application_id: z.string(),
    type: z.number(),                    // 2 = APPLICATION_COMMAND, 4 = AUTOCOMPLETE
    token: z.string(),
    channel_id: z.string().optional(),
    guild_id: z.string().optional(),
    data: z.object({
        name: z.string(),
        options: z.array(interactionOptionSchema).optional(),
    }).optional(),
    member: z.object({ user: discordUserSchema }).optional(),
    user: discordUserSchema.optional(),
});
export type DiscordInteraction = z.infer<typeof interactionSchema>;
