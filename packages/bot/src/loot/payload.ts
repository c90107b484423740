import type { LootPayload, LootRequest } from './types';

/**
 * Flatten a request into the webhook body. Absent guild or item fields
 * are left out rather than sent as null.
 */
export function buildPayload(request: LootRequest): LootPayload {
    const payload: LootPayload = {
        content: request.content,
        channel_id: request.channelId,
        author_id: request.authorId,
        username: request.username,
    };

    if (request.guildId) payload.guild_id = request.guildId;
    if (request.guildName) payload.guild_name = request.guildName;
    if (request.item !== undefined) payload.item = request.item;

    return payload;
}
