import type { BotVariant } from '../config';

/**
 * Where the reply to a loot request goes.
 */
export type ReplyTarget =
    | { kind: 'channel'; channelId: string }
    | { kind: 'interaction'; applicationId: string; interactionToken: string };

/**
 * A recognized loot lookup, normalized from either listener variant.
 */
export interface LootRequest {
    /** Discord message or interaction ID; used for at-most-once handling. */
    eventId: string;
    variant: BotVariant;
    content: string;
    item?: string;
    channelId: string;
    authorId: string;
    username: string;
    guildId?: string;
    guildName?: string;
    replyTo: ReplyTarget;
}

/**
 * JSON body POSTed to the workflow webhook.
 */
export interface LootPayload {
    content: string;
    channel_id: string;
    author_id: string;
    username: string;
    guild_id?: string;
    guild_name?: string;
    item?: string;
}
